/**
 * 频域特征提取器
 *
 * 与 8 维统计特征分开：频谱熵与主频属于扩展分析，不进入 8 维特征向量。
 */

import {
  dominantFrequency,
  max,
  min,
  peakToPeak,
  powerSpectrum,
  spectralEntropy,
  variance,
} from '../dsp-utils';
import type { ChannelAnalysis, FeatureOptions, SpectralFeatures } from '../types';
import { extractFeatureVector } from './statistical.extractor';

/**
 * @param sampleRate 采样率 (Hz)，主频 = 峰值频点 × sampleRate / n
 */
export function extractSpectralFeatures(values: readonly number[], sampleRate: number): SpectralFeatures {
  const power = powerSpectrum(values);
  return {
    spectral_entropy: spectralEntropy(power),
    dominant_frequency: dominantFrequency(power, sampleRate),
  };
}

/** 8 维特征 + 方差 / 峰峰值 / 极值 + 频域特征 */
export function analyzeChannel(
  values: readonly number[],
  sampleRate: number,
  options: FeatureOptions = {},
): ChannelAnalysis {
  return {
    ...extractFeatureVector(values, options),
    variance: variance(values),
    peak_to_peak: peakToPeak(values),
    max: max(values),
    min: min(values),
    ...extractSpectralFeatures(values, sampleRate),
  };
}
