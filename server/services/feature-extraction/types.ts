/**
 * 特征提取：类型定义
 * ============================================================
 *
 * 每个通道（加速度 X / Y / Z、振动、加速度合成幅值）
 * 被约简为固定 8 维统计指纹。
 */

// ============================================================
// 8 维特征向量
// ============================================================

/** 特征固定顺序，模型输入与线上负载均依赖此顺序 */
export const FEATURE_NAMES = [
  'rms',
  'peak',
  'mean',
  'std_dev',
  'kurtosis',
  'skewness',
  'crest_factor',
  'entropy',
] as const;

export type FeatureName = typeof FEATURE_NAMES[number];

export type FeatureVector8 = Readonly<Record<FeatureName, number>>;

export interface FeatureOptions {
  /** 熵直方图最大分箱数，默认 50 */
  maxHistogramBins?: number;
  /** 熵对数底，默认自然对数 */
  entropyBase?: number;
}

export const DEFAULT_FEATURE_OPTIONS: Required<FeatureOptions> = {
  maxHistogramBins: 50,
  entropyBase: Math.E,
};

// ============================================================
// 扩展分析（时域 + 频域）
// ============================================================

export interface SpectralFeatures {
  spectral_entropy: number;
  /** Hz */
  dominant_frequency: number;
}

export interface ChannelAnalysis extends FeatureVector8, SpectralFeatures {
  variance: number;
  peak_to_peak: number;
  max: number;
  min: number;
}

// ============================================================
// 批量提取
// ============================================================

export interface ChannelSeries {
  x: readonly number[];
  y: readonly number[];
  z: readonly number[];
  vibration: readonly number[];
}

export interface BatchFeatures {
  accelX: FeatureVector8;
  accelY: FeatureVector8;
  accelZ: FeatureVector8;
  vibration: FeatureVector8;
  accelMagnitude: FeatureVector8;
}

/** 线上格式：4 通道 × 8 = 32 个原始特征值 + 特征名称 */
export interface FeatureExtractionReport {
  accel_x_features: number[];
  accel_y_features: number[];
  accel_z_features: number[];
  vibration_features: number[];
  accel_magnitude_features: number[];
  feature_names: string[];
  total_features_extracted: number;
}

// ============================================================
// 模型输入布局
// ============================================================

/** 4 个轴承 × 2 个方向 */
export const BEARING_CHANNELS = [
  'B1_x', 'B1_y', 'B2_x', 'B2_y', 'B3_x', 'B3_y', 'B4_x', 'B4_y',
] as const;

export const BEARING_FEATURES = [
  'mean', 'std', 'skew', 'kurtosis', 'entropy', 'rms',
  'max', 'p2p', 'crest', 'clearence', 'shape', 'impulse',
] as const;

export type BearingFeature = typeof BEARING_FEATURES[number];

/** 列名 → 值 */
export type ModelInput = Record<string, number>;
