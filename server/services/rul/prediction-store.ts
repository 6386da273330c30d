/**
 * 最新预测存储
 *
 * 进程级唯一的共享可变状态，生命周期：
 *   启动 → 等待哨兵 → 每次批量预测成功后整体替换 → 其余位置只读
 *
 * 写入方先完整构造并冻结记录，再以一次赋值发布；
 * 读取方永远只能看到旧记录或新记录，不会看到半成品。
 */

import type { LatestPrediction, PredictionRecord, WaitingSentinel } from './types';

export const WAITING_SENTINEL: Readonly<WaitingSentinel> = Object.freeze({
  status: 'waiting',
  message: 'No predictions yet',
});

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export class LatestPredictionStore {
  private current: Readonly<LatestPrediction> = WAITING_SENTINEL;

  get(): Readonly<LatestPrediction> {
    return this.current;
  }

  publish(record: Omit<PredictionRecord, 'status'>): Readonly<PredictionRecord> {
    const full: PredictionRecord = { ...record, status: 'success' };
    const frozen = deepFreeze(structuredClone(full));
    this.current = frozen;
    return frozen;
  }

  /** 回到等待状态（测试与重启用） */
  reset(): void {
    this.current = WAITING_SENTINEL;
  }
}
