/**
 * 特征提取服务
 * ============================================================
 *
 * 批量数据 → 各通道 8 维特征 → 模型输入布局
 *
 *   accel x/y/z + vibration ──┐
 *                             ├─→ extractBatchFeatures ─→ buildModelInput (96 列)
 *   |accel| 合成幅值 ─────────┘                         └→ toFeatureReport (32 值)
 *
 * 全部为纯函数，可并发调用，前提是调用期间不修改输入。
 */

import { ValidationError } from '../../core/errors';
import { extractFeatureVector, toFeatureArray } from './extractors/statistical.extractor';
import {
  BEARING_CHANNELS,
  BEARING_FEATURES,
  FEATURE_NAMES,
  type BatchFeatures,
  type BearingFeature,
  type ChannelSeries,
  type FeatureExtractionReport,
  type FeatureOptions,
  type FeatureVector8,
  type ModelInput,
} from './types';

/** 三轴加速度的欧氏幅值 */
export function accelMagnitude(x: readonly number[], y: readonly number[], z: readonly number[]): number[] {
  if (x.length !== y.length || x.length !== z.length) {
    throw new ValidationError('Accelerometer channels must have equal length', {
      x: x.length, y: y.length, z: z.length,
    });
  }
  return x.map((xi, i) => Math.sqrt(xi * xi + y[i] * y[i] + z[i] * z[i]));
}

export function extractBatchFeatures(series: ChannelSeries, options: FeatureOptions = {}): BatchFeatures {
  const magnitude = accelMagnitude(series.x, series.y, series.z);
  return {
    accelX: extractFeatureVector(series.x, options),
    accelY: extractFeatureVector(series.y, options),
    accelZ: extractFeatureVector(series.z, options),
    vibration: extractFeatureVector(series.vibration, options),
    accelMagnitude: extractFeatureVector(magnitude, options),
  };
}

/** 线上报告：X / Y / Z / 振动 4 个通道计入总数，幅值通道附带返回 */
export function toFeatureReport(features: BatchFeatures): FeatureExtractionReport {
  return {
    accel_x_features: toFeatureArray(features.accelX),
    accel_y_features: toFeatureArray(features.accelY),
    accel_z_features: toFeatureArray(features.accelZ),
    vibration_features: toFeatureArray(features.vibration),
    accel_magnitude_features: toFeatureArray(features.accelMagnitude),
    feature_names: [...FEATURE_NAMES],
    total_features_extracted: 4 * FEATURE_NAMES.length,
  };
}

// ============================================================
// 模型输入布局
// ============================================================

/** 8 维向量 → 轴承布局 12 列；均值为 0 时 shape / impulse 取 1 */
export function toBearingFeatures(v: FeatureVector8): Record<BearingFeature, number> {
  return {
    mean: v.mean,
    std: v.std_dev,
    skew: v.skewness,
    kurtosis: v.kurtosis,
    entropy: v.entropy,
    rms: v.rms,
    max: v.peak,
    p2p: v.peak,
    crest: v.crest_factor,
    clearence: v.crest_factor * 0.8,
    shape: v.mean !== 0 ? v.rms / v.mean : 1.0,
    impulse: v.mean !== 0 ? v.peak / v.mean : 1.0,
  };
}

/**
 * 96 列模型输入：x 方向列取加速度合成幅值，y 方向列取振动通道
 * 列名形如 B1_x_mean、B4_y_impulse
 */
export function buildModelInput(accelMagnitudeFeatures: FeatureVector8, vibrationFeatures: FeatureVector8): ModelInput {
  const xColumns = toBearingFeatures(accelMagnitudeFeatures);
  const yColumns = toBearingFeatures(vibrationFeatures);
  const input: ModelInput = {};

  BEARING_CHANNELS.forEach((channel, index) => {
    const source = index % 2 === 0 ? xColumns : yColumns;
    for (const [feature, value] of Object.entries(source)) {
      input[`${channel}_${feature}`] = value;
    }
  });

  return input;
}

/** 所有 96 个列名，按通道再按特征排序 */
export function modelInputColumns(): string[] {
  const columns: string[] = [];
  for (const channel of BEARING_CHANNELS) {
    for (const feature of BEARING_FEATURES) {
      columns.push(`${channel}_${feature}`);
    }
  }
  return columns;
}
