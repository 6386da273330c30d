/**
 * RUL 预测服务
 * ============================================================
 *
 * 批量数据 → 特征提取 → 96 列模型输入 → 模型 → 格式化 + 健康等级
 *
 * 失败语义：
 *   - 样本数不足：跳过预测，仅确认接收（不是错误）
 *   - 模型未加载：常驻降级，每次预测直接报告失败，不重试
 *   - 缺少模型列：仅本次预测失败，以 { error } 返回，不影响后续请求
 */

import { ModelUnavailableError, isMonitorError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import { metricsCollector, type MetricsCollector } from '../../lib/metrics';
import type { BatchInfo, BatchPayload } from '../../../shared/sensorTypes';
import {
  buildModelInput,
  extractBatchFeatures,
  extractFeatureVector,
  fromFeatureArray,
  toFeatureArray,
  toFeatureReport,
  type FeatureExtractionReport,
  type FeatureOptions,
  type FeatureVector8,
} from '../feature-extraction';
import { createRandomSource } from '../simulation';
import { classifyHealth } from './health-classifier';
import { LatestPredictionStore } from './prediction-store';
import { formatRul } from './rul-formatter';
import type { HealthAssessment, RulModel, RulPrediction, RulResult } from './types';

const log = createModuleLogger('rul-prediction');

export interface RulPredictionOptions {
  /** 模型未声明时间单位时使用 */
  minutesPerUnit: number;
  /** 触发预测的最小批量 */
  minBatchSamples: number;
  featureOptions?: FeatureOptions;
  /** 时间戳来源（秒） */
  clock?: () => number;
  metrics?: MetricsCollector;
}

export interface PredictionError {
  error: string;
}

export interface BatchAcknowledgement {
  status: 'success';
  message: string;
  batch_info: BatchInfo;
  sample_count: number;
  mode: string;
  rul_prediction?: RulResult | PredictionError;
  health_status?: HealthAssessment;
  feature_extraction?: FeatureExtractionReport;
}

export interface DirectPredictionResponse {
  status: 'success';
  prediction: RulResult;
  health_status: HealthAssessment;
}

export interface SimulatedPredictionResponse extends DirectPredictionResponse {
  accel_features: number[];
  vib_features: number[];
}

/** 等间距取点，含两端点 */
function linspace(start: number, stop: number, count: number): number[] {
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * step));
}

export class RulPredictionService {
  private readonly options: RulPredictionOptions;
  private readonly clock: () => number;
  private readonly metrics: MetricsCollector;

  constructor(
    private readonly model: RulModel | null,
    private readonly store: LatestPredictionStore,
    options: RulPredictionOptions,
  ) {
    this.options = options;
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.metrics = options.metrics ?? metricsCollector;
  }

  get modelLoaded(): boolean {
    return this.model !== null;
  }

  get latest() {
    return this.store.get();
  }

  /** @throws ModelUnavailableError 模型未加载 */
  ensureModel(): RulModel {
    if (!this.model) {
      this.metrics.recordPrediction('model_unavailable');
      throw new ModelUnavailableError();
    }
    return this.model;
  }

  /**
   * 加速度特征（x 列）+ 振动特征（y 列）→ 格式化 RUL 与健康等级
   * @throws ModelUnavailableError 模型未加载
   * @throws MissingModelFeatureError 模型需要的列不存在
   */
  predict(accelFeatures: FeatureVector8, vibrationFeatures: FeatureVector8): RulPrediction {
    const model = this.ensureModel();

    try {
      const raw = model.predict(buildModelInput(accelFeatures, vibrationFeatures));
      const rul = formatRul(raw, { minutesPerUnit: model.timeUnitMinutes ?? this.options.minutesPerUnit });
      const health = classifyHealth(rul.value);
      this.metrics.recordPrediction('success', rul.value);
      return { rul, health };
    } catch (err) {
      this.metrics.recordPrediction('failure');
      throw err;
    }
  }

  /**
   * 处理批量负载；样本数达到阈值时提取特征并预测，
   * 成功后原子替换最新预测
   */
  processBatch(payload: BatchPayload): BatchAcknowledgement {
    const { batch_info: batchInfo, mode } = payload;
    const sampleCount = batchInfo.sample_count;

    const ack: BatchAcknowledgement = {
      status: 'success',
      message: 'Batch data received and processed',
      batch_info: batchInfo,
      sample_count: sampleCount,
      mode,
    };

    log.info({ sampleCount, mode, duration: batchInfo.end_time - batchInfo.start_time }, 'Batch received');

    if (sampleCount < this.options.minBatchSamples) {
      log.info(
        { have: sampleCount, need: this.options.minBatchSamples },
        'Not enough samples for prediction',
      );
      this.metrics.recordBatch(mode, sampleCount, false);
      return ack;
    }

    try {
      const features = extractBatchFeatures({
        x: payload.accel_data.x,
        y: payload.accel_data.y,
        z: payload.accel_data.z,
        vibration: payload.vib_data,
      }, this.options.featureOptions);
      const report = toFeatureReport(features);
      const { rul, health } = this.predict(features.accelMagnitude, features.vibration);

      this.store.publish({
        rul_prediction: rul,
        health_status: health,
        feature_extraction: report,
        sample_count: sampleCount,
        mode,
        timestamp: this.clock(),
        batch_info: batchInfo,
      });

      log.info({ hours: rul.value, health: health.status }, `RUL prediction: ${rul.formatted}`);
      this.metrics.recordBatch(mode, sampleCount, true);
      return { ...ack, rul_prediction: rul, health_status: health, feature_extraction: report };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (isMonitorError(err) && err.isOperational) {
        log.warn({ code: err.code, message }, 'RUL prediction failed');
      } else {
        log.error({ err }, 'RUL prediction failed');
      }
      this.metrics.recordBatch(mode, sampleCount, false);
      return { ...ack, rul_prediction: { error: message } };
    }
  }

  /** 原始序列：加速度单通道 + 振动 */
  predictFromSeries(accelData: readonly number[], vibData: readonly number[]): DirectPredictionResponse {
    const { rul, health } = this.predict(
      extractFeatureVector(accelData, this.options.featureOptions),
      extractFeatureVector(vibData, this.options.featureOptions),
    );
    return { status: 'success', prediction: rul, health_status: health };
  }

  /** 预提取特征：前 8 个为加速度，后 8 个为振动 */
  predictFromFeatures(features: readonly number[]): DirectPredictionResponse {
    const { rul, health } = this.predict(
      fromFeatureArray(features.slice(0, 8)),
      fromFeatureArray(features.slice(8)),
    );
    return { status: 'success', prediction: rul, health_status: health };
  }

  /**
   * 演示用合成数据：
   *   accel = N(0, 1) + 0.1·sin(linspace(0, 10, n))
   *   vib   = N(0, 0.5) + 0.05·cos(linspace(0, 15, n))
   */
  simulate(samples: number, seed: number): SimulatedPredictionResponse {
    const random = createRandomSource(seed);
    const accelPhase = linspace(0, 10, samples);
    const vibPhase = linspace(0, 15, samples);
    const accelData = accelPhase.map(t => random.gaussian(0, 1) + 0.1 * Math.sin(t));
    const vibData = vibPhase.map(t => random.gaussian(0, 0.5) + 0.05 * Math.cos(t));

    const accelFeatures = extractFeatureVector(accelData, this.options.featureOptions);
    const vibFeatures = extractFeatureVector(vibData, this.options.featureOptions);
    const { rul, health } = this.predict(accelFeatures, vibFeatures);

    return {
      status: 'success',
      prediction: rul,
      health_status: health,
      accel_features: toFeatureArray(accelFeatures),
      vib_features: toFeatureArray(vibFeatures),
    };
  }
}
