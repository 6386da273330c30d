/**
 * 退化仿真类型定义
 * ============================================================
 *
 * 一台旋转设备从安装到失效的完整生命周期被离散为 totalSamples 个采样点，
 * 进度 p = currentSample / totalSamples 驱动所有分段曲线。
 */

// ============================================================
// 状态
// ============================================================

/** 0 ≤ currentSample ≤ totalSamples，仅由所属仿真器推进 */
export interface DegradationState {
  currentSample: number;
  totalSamples: number;
}

// ============================================================
// 分段线性曲线
// ============================================================

/**
 * 曲线段：进度 ≤ upTo 时生效
 * 取值 = intercept + slope * (x - origin)，x 为该曲线的输入量
 */
export interface CurveSegment {
  upTo: number;
  slope: number;
  intercept: number;
  origin: number;
}

/** 按 upTo 升序排列的段表 */
export type CurveTable = readonly CurveSegment[];

export interface ContinuityBreak {
  breakpoint: number;
  left: number;
  right: number;
}

/** 进度阈值 → 标签 */
export interface ProgressBand {
  upTo: number;
  label: string;
}

// ============================================================
// 随机源
// ============================================================

export interface RandomSource {
  /** [0, 1) 均匀分布 */
  next(): number;
  uniform(min: number, max: number): number;
  gaussian(mean: number, stdDev: number): number;
}

// ============================================================
// 退化参数
// ============================================================

/** 三轴衰减比例 [x, y, z] */
export type AxisRatios = readonly [number, number, number];

export interface AccelerometerModel {
  /** Z 轴静止重力 (g) */
  gravity: number;
  baseAmplitude: number;
  amplitudeGain: number;
  baseFrequency: number;
  frequencyGain: number;
  harmonicThreshold: number;
  harmonicRatio: number;
  harmonicGain: number;
  noiseBase: number;
  noiseGain: number;
  faultProbabilityGain: number;
  faultMin: number;
  faultMax: number;
  primaryRatios: AxisRatios;
  harmonicRatios: AxisRatios;
  faultRatios: AxisRatios;
}

export interface VibrationModel {
  baseVoltage: number;
  mainGain: number;
  baseFrequency: number;
  frequencyGain: number;
  highFrequencyThreshold: number;
  highFrequencyRatio: number;
  highFrequencyGain: number;
  noiseBase: number;
  noiseGain: number;
  shockProbabilityGain: number;
  shockMin: number;
  shockMax: number;
  minVoltage: number;
  maxVoltage: number;
}

/** 振动等级阈值 (V)：< moderate 为 Low，< high 为 Moderate，其余 High */
export interface LevelThresholds {
  moderate: number;
  high: number;
}

export interface DegradationProfile {
  name: string;
  /** 进度 → 退化因子 */
  degradation: CurveTable;
  /** 进度分段，输入为退化因子 → 振动电压斜坡 */
  vibrationVoltage: CurveTable;
  phases: readonly ProgressBand[];
  stages: readonly ProgressBand[];
  accelerometer: AccelerometerModel;
  vibration: VibrationModel;
  levels: LevelThresholds;
}

export interface DegradationSimulatorOptions {
  /** 仿真总时长（时间单位） */
  duration: number;
  /** 每时间单位采样数 */
  samplingRate: number;
  profile?: DegradationProfile;
  random?: RandomSource;
  /** 时间戳来源（秒） */
  clock?: () => number;
}
