/**
 * RUL 后处理类型定义
 */

import type { BatchInfo } from '../../../shared/sensorTypes';
import type { FeatureExtractionReport, ModelInput } from '../feature-extraction/types';

// ============================================================
// 格式化结果
// ============================================================

export type RulUnit = 'months' | 'weeks' | 'days' | 'hours';

interface RulResultBase {
  /** 小时数 */
  value: number;
  formatted: string;
}

export type RulResult =
  | RulResultBase & { unit: 'months'; months: number; days: number }
  | RulResultBase & { unit: 'weeks'; weeks: number; days: number }
  | RulResultBase & { unit: 'days'; days: number; hours: number }
  | RulResultBase & { unit: 'hours'; hours: number; minutes: number };

export interface RulFormatOptions {
  /** 模型输出的一个时间单位对应的分钟数，默认 10 */
  minutesPerUnit?: number;
}

// ============================================================
// 健康等级
// ============================================================

export const HEALTH_STATUSES = ['EXCELLENT', 'GOOD', 'MODERATE', 'POOR', 'CRITICAL'] as const;
export type HealthStatus = typeof HEALTH_STATUSES[number];

export interface HealthAssessment {
  status: HealthStatus;
  label: string;
}

// ============================================================
// 模型
// ============================================================

/** 外部回归模型：按列名取值，输出抽象时间单位 */
export interface RulModel {
  readonly name: string;
  readonly featureNames: readonly string[];
  /** 模型自带的时间单位（分钟），未声明时使用配置值 */
  readonly timeUnitMinutes?: number;
  predict(input: ModelInput): number;
}

// ============================================================
// 预测结果
// ============================================================

export interface RulPrediction {
  rul: RulResult;
  health: HealthAssessment;
}

export interface WaitingSentinel {
  status: 'waiting';
  message: string;
}

export interface PredictionRecord {
  status: 'success';
  rul_prediction: RulResult;
  health_status: HealthAssessment;
  feature_extraction: FeatureExtractionReport;
  sample_count: number;
  mode: string;
  timestamp: number;
  batch_info: BatchInfo;
}

export type LatestPrediction = WaitingSentinel | PredictionRecord;
