/**
 * 统计特征提取器
 * ============================================================
 *
 * 输入：单通道有限长序列（仿真或硬件来源一视同仁）
 * 输出：8 维特征向量，顺序见 FEATURE_NAMES
 *
 * 纯函数，无内部状态；相同输入（值与顺序）产生逐位相同的输出。
 */

import { ValidationError } from '../../../core/errors';
import {
  crestFactor,
  histogramEntropy,
  kurtosis,
  mean,
  peak,
  rms,
  skewness,
  stdDev,
} from '../dsp-utils';
import {
  DEFAULT_FEATURE_OPTIONS,
  FEATURE_NAMES,
  type FeatureOptions,
  type FeatureVector8,
} from '../types';

export function extractFeatureVector(values: readonly number[], options: FeatureOptions = {}): FeatureVector8 {
  const { maxHistogramBins, entropyBase } = { ...DEFAULT_FEATURE_OPTIONS, ...options };

  return Object.freeze({
    rms: rms(values),
    peak: peak(values),
    mean: mean(values),
    std_dev: stdDev(values),
    kurtosis: kurtosis(values),
    skewness: skewness(values),
    crest_factor: crestFactor(values),
    entropy: histogramEntropy(values, maxHistogramBins, entropyBase),
  });
}

/** 按固定顺序展开为数组 */
export function toFeatureArray(vector: FeatureVector8): number[] {
  return FEATURE_NAMES.map(name => vector[name]);
}

/** 按固定顺序收拢为向量，长度必须为 8 */
export function fromFeatureArray(values: readonly number[]): FeatureVector8 {
  if (values.length !== FEATURE_NAMES.length) {
    throw new ValidationError(`Expected ${FEATURE_NAMES.length} feature values, got ${values.length}`);
  }
  return Object.freeze({
    rms: values[0],
    peak: values[1],
    mean: values[2],
    std_dev: values[3],
    kurtosis: values[4],
    skewness: values[5],
    crest_factor: values[6],
    entropy: values[7],
  });
}
