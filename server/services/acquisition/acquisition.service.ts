/**
 * 采集服务
 * ============================================================
 *
 * 单线程协作式循环：
 *   advance → 读取通道（失败沿用最近读数）→ 组装样本 → 推送 → 补足采样间隔
 *
 * 终止条件：仿真通道耗尽、达到 maxSamples、或调用 stop()。
 * 批量模式下结束时冲刷不足一批的剩余样本。
 */

import { setTimeout as delay } from 'timers/promises';
import { SensorReadError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import { VIBRATION_LEVEL_LABELS, type SensorSample, type Vector3 } from '../../../shared/sensorTypes';
import type { SensorChannel } from '../sensors/sensor.types';
import { BatchBuilder } from './batch-builder';
import type { DataPoster } from './data-poster';

const log = createModuleLogger('acquisition');

const ZERO_G: Readonly<Vector3> = Object.freeze({ x: 0, y: 0, z: 0 });

export interface AcquisitionOptions {
  channel: SensorChannel;
  /** 为 null 时只采集不推送 */
  poster: DataPoster | null;
  intervalSec: number;
  /** 逐条推送；否则按批推送 */
  individualSamples: boolean;
  batchSize: number;
  maxSamples?: number;
  /** 秒 */
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onSample?: (sample: SensorSample) => void;
}

export interface AcquisitionSummary {
  samples: number;
  readFailures: number;
  postsSent: number;
  postsFailed: number;
}

export class AcquisitionService {
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private stopped = false;
  private active = false;

  private lastAccel: Vector3 | null = null;
  private lastVoltage: number | null = null;

  constructor(private readonly options: AcquisitionOptions) {
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.sleep = options.sleep ?? (ms => delay(ms));
  }

  get running(): boolean {
    return this.active;
  }

  /** 当前迭代结束后退出循环 */
  stop(): void {
    this.stopped = true;
  }

  async run(): Promise<AcquisitionSummary> {
    const { channel, poster, individualSamples, batchSize, maxSamples, intervalSec } = this.options;
    const batch = poster && !individualSamples ? new BatchBuilder(channel.mode) : null;
    const summary: AcquisitionSummary = { samples: 0, readFailures: 0, postsSent: 0, postsFailed: 0 };

    this.stopped = false;
    this.active = true;
    log.info({
      mode: channel.mode,
      posting: poster ? (batch ? `batch(${batchSize})` : 'individual') : 'disabled',
      intervalSec,
      maxSamples,
    }, 'Acquisition started');

    try {
      while (!this.stopped) {
        if (maxSamples !== undefined && summary.samples >= maxSamples) break;

        const started = this.clock();
        if (!channel.advance()) {
          log.info({ samples: summary.samples }, 'Data source exhausted');
          break;
        }

        const sample = await this.readSample(summary.samples + 1, started, summary);
        summary.samples += 1;
        this.options.onSample?.(sample);

        if (poster && !batch) {
          await this.send(poster, sample, summary);
        } else if (poster && batch) {
          batch.add(sample);
          if (batch.size >= batchSize) {
            const payload = batch.drain();
            if (payload) await this.send(poster, payload, summary);
          }
        }

        const lastIteration = maxSamples !== undefined && summary.samples >= maxSamples;
        if (this.stopped || lastIteration) break;

        const elapsed = this.clock() - started;
        const waitMs = Math.max(0, intervalSec - elapsed) * 1000;
        if (waitMs > 0) await this.sleep(waitMs);
      }

      if (poster && batch && batch.size > 0) {
        const payload = batch.drain();
        if (payload) {
          log.info({ samples: payload.batch_info.sample_count }, 'Flushing partial batch');
          await this.send(poster, payload, summary);
        }
      }
    } finally {
      this.active = false;
    }

    log.info({ ...summary }, 'Acquisition finished');
    return summary;
  }

  // ============================================================
  // 内部方法
  // ============================================================

  private async readSample(sampleNumber: number, timestamp: number, summary: AcquisitionSummary): Promise<SensorSample> {
    const { channel } = this.options;

    const accelerometer = await this.readOr('accelerometer', () => channel.getGForce(), this.lastAccel ?? ZERO_G, summary);
    this.lastAccel = accelerometer;

    const voltage = await this.readOr('vibration', () => channel.getVibrationVoltage(), this.lastVoltage ?? 0, summary);
    this.lastVoltage = voltage;

    const level = await this.readOr(
      'vibration-level',
      () => channel.getVibrationLevel(),
      channel.classifyVibration(voltage),
      summary,
    );

    const sample: SensorSample = {
      timestamp,
      sample_number: sampleNumber,
      accelerometer: { ...accelerometer },
      vibration: { voltage, level: VIBRATION_LEVEL_LABELS[level] },
    };
    const phase = channel.phaseInfo();
    if (phase) sample.phase_info = phase;

    log.debug({ sampleNumber, accelerometer, voltage, level }, 'Sample acquired');
    return sample;
  }

  /** 传感器读取失败时沿用替代值，其他错误照常抛出 */
  private async readOr<T>(
    name: string,
    read: () => Promise<T>,
    fallback: T,
    summary: AcquisitionSummary,
  ): Promise<T> {
    try {
      return await read();
    } catch (err) {
      if (!(err instanceof SensorReadError)) throw err;
      summary.readFailures += 1;
      log.warn({ channel: name, error: err.message }, 'Sensor read failed, reusing last value');
      return fallback;
    }
  }

  private async send(
    poster: DataPoster,
    payload: Parameters<DataPoster['post']>[0],
    summary: AcquisitionSummary,
  ): Promise<void> {
    const result = await poster.post(payload);
    if (result) {
      summary.postsSent += 1;
    } else {
      summary.postsFailed += 1;
    }
  }
}
