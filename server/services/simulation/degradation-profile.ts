/**
 * 默认退化参数：6 个月生命周期
 * 180 个采样点，每天一个，对应安装 → 早期磨损 → 明显退化 → 临界
 *
 * 所有常数均可通过自定义 DegradationProfile 覆盖。
 */

import type { DegradationProfile } from './types';

export const SIX_MONTH_LIFECYCLE: DegradationProfile = {
  name: 'six-month-lifecycle',

  // 0% → 2% → 20% → 60% → 100%
  degradation: [
    { upTo: 0.40, slope: 0.05, intercept: 0, origin: 0 },
    { upTo: 0.70, slope: 0.60, intercept: 0.02, origin: 0.40 },
    { upTo: 0.90, slope: 2.0, intercept: 0.20, origin: 0.70 },
    { upTo: 1.0, slope: 4.0, intercept: 0.60, origin: 0.90 },
  ],

  // 输入为退化因子：0V → 0.25V | 0.2V → 0.7V | 0.7V → 1.4V | 1.4V → 2.3V
  vibrationVoltage: [
    { upTo: 0.40, slope: 0.5, intercept: 0, origin: 0 },
    { upTo: 0.70, slope: 1.5, intercept: 0.2, origin: 0.02 },
    { upTo: 0.90, slope: 2.0, intercept: 0.7, origin: 0.20 },
    { upTo: 1.0, slope: 2.25, intercept: 1.4, origin: 0.60 },
  ],

  phases: [
    { upTo: 0.40, label: 'New/Healthy' },
    { upTo: 0.70, label: 'Early/Gradual Degradation' },
    { upTo: 0.90, label: 'Advanced Degradation' },
    { upTo: 1.0, label: 'Critical' },
  ],

  stages: [
    { upTo: 0.10, label: 'New Equipment' },
    { upTo: 0.40, label: 'Healthy Operation' },
    { upTo: 0.70, label: 'Early Degradation' },
    { upTo: 0.90, label: 'Advanced Degradation' },
    { upTo: 1.0, label: 'Critical - Maintenance Required' },
  ],

  accelerometer: {
    gravity: 1.0,
    baseAmplitude: 0.05,        // 0.05g → 0.45g
    amplitudeGain: 0.4,
    baseFrequency: 2.0,         // 2Hz → 5Hz
    frequencyGain: 3.0,
    harmonicThreshold: 0.3,
    harmonicRatio: 2.5,
    harmonicGain: 0.2,
    noiseBase: 0.02,
    noiseGain: 0.1,
    faultProbabilityGain: 0.05, // 最高 5%/样本
    faultMin: 0.2,
    faultMax: 0.8,
    primaryRatios: [1, 0.7, 0.3],
    harmonicRatios: [1, 0.8, 0.4],
    faultRatios: [1, 0.6, 0.3],
  },

  vibration: {
    baseVoltage: 0.1,
    mainGain: 0.3,
    baseFrequency: 1.0,         // 1.0Hz → 2.5Hz
    frequencyGain: 1.5,
    highFrequencyThreshold: 0.20,
    highFrequencyRatio: 8,
    highFrequencyGain: 0.25,
    noiseBase: 0.05,
    noiseGain: 0.1,
    shockProbabilityGain: 0.03,
    shockMin: 0.5,
    shockMax: 1.5,
    minVoltage: 0,
    maxVoltage: 3.3,
  },

  levels: {
    moderate: 0.5,
    high: 1.2,
  },
};
