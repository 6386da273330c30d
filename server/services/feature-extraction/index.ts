/**
 * 特征提取模块
 * ============================================================
 *
 * 导出：
 *   - 统计提取器: extractFeatureVector / toFeatureArray（固定顺序 8 维）
 *   - 频域提取器: extractSpectralFeatures / analyzeChannel（扩展分析）
 *   - 批量服务: extractBatchFeatures / toFeatureReport / buildModelInput
 *   - DSP 工具: FFT / DFT / 统计 / 直方图熵
 */

export { extractFeatureVector, fromFeatureArray, toFeatureArray } from './extractors/statistical.extractor';
export { extractSpectralFeatures, analyzeChannel } from './extractors/spectral.extractor';

export {
  accelMagnitude,
  buildModelInput,
  extractBatchFeatures,
  modelInputColumns,
  toBearingFeatures,
  toFeatureReport,
} from './feature-extraction.service';

export {
  BEARING_CHANNELS,
  BEARING_FEATURES,
  DEFAULT_FEATURE_OPTIONS,
  FEATURE_NAMES,
} from './types';

export type {
  BatchFeatures,
  BearingFeature,
  ChannelAnalysis,
  ChannelSeries,
  FeatureExtractionReport,
  FeatureName,
  FeatureOptions,
  FeatureVector8,
  ModelInput,
  SpectralFeatures,
} from './types';

export {
  crestFactor,
  dft,
  dominantFrequency,
  fft,
  histogram,
  histogramEntropy,
  isConstant,
  isPowerOfTwo,
  kurtosis,
  max,
  mean,
  min,
  peak,
  peakToPeak,
  powerSpectrum,
  rms,
  shannonEntropy,
  skewness,
  spectralEntropy,
  stdDev,
  variance,
} from './dsp-utils';
