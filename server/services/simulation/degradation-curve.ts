/**
 * 分段线性曲线
 * ============================================================
 *
 * 退化因子与振动电压斜坡均以有序段表表达，
 * 断点处的连续性可以逐段机械校验。
 */

import type { ContinuityBreak, CurveSegment, CurveTable, ProgressBand } from './types';

/** 第一个 upTo ≥ progress 的段；超出末段时取末段 */
export function findSegment(table: CurveTable, progress: number): CurveSegment {
  if (table.length === 0) {
    throw new Error('Curve table must contain at least one segment');
  }
  for (const segment of table) {
    if (progress <= segment.upTo) return segment;
  }
  return table[table.length - 1];
}

export function evaluateSegment(segment: CurveSegment, x: number): number {
  return segment.intercept + segment.slope * (x - segment.origin);
}

/**
 * 曲线求值
 * @param progress 选择段的进度
 * @param input 段内线性项的输入，默认即进度本身
 */
export function evaluateCurve(table: CurveTable, progress: number, input: number = progress): number {
  return evaluateSegment(findSegment(table, progress), input);
}

/**
 * 检查相邻段在断点处的左右取值
 * @param inputAt 断点处曲线的输入量（默认为断点本身）
 * @returns 左右差值超过容差的断点列表，空数组表示连续
 */
export function verifyContinuity(
  table: CurveTable,
  tolerance: number = 1e-9,
  inputAt: (breakpoint: number) => number = b => b,
): ContinuityBreak[] {
  const breaks: ContinuityBreak[] = [];
  for (let i = 0; i < table.length - 1; i++) {
    const breakpoint = table[i].upTo;
    const x = inputAt(breakpoint);
    const left = evaluateSegment(table[i], x);
    const right = evaluateSegment(table[i + 1], x);
    if (Math.abs(left - right) > tolerance) {
      breaks.push({ breakpoint, left, right });
    }
  }
  return breaks;
}

/** 第一个 upTo ≥ progress 的标签；超出时取末项 */
export function bandLabel(bands: readonly ProgressBand[], progress: number): string {
  for (const band of bands) {
    if (progress <= band.upTo) return band.label;
  }
  return bands.length > 0 ? bands[bands.length - 1].label : '';
}
