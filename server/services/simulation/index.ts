/**
 * 退化仿真模块
 */

export { DegradationSimulator, classifyVibrationLevel, round3 } from './degradation-simulator';
export { SIX_MONTH_LIFECYCLE } from './degradation-profile';
export { bandLabel, evaluateCurve, evaluateSegment, findSegment, verifyContinuity } from './degradation-curve';
export { RandomGenerator, createRandomSource, mulberry32 } from './random';

export type {
  AccelerometerModel,
  AxisRatios,
  ContinuityBreak,
  CurveSegment,
  CurveTable,
  DegradationProfile,
  DegradationSimulatorOptions,
  DegradationState,
  LevelThresholds,
  ProgressBand,
  RandomSource,
  VibrationModel,
} from './types';
