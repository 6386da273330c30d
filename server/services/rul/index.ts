/**
 * RUL 后处理模块
 */

export { formatRul, formatHours, predictionToHours, selectBucket, HOURS_PER_DAY, HOURS_PER_WEEK, HOURS_PER_MONTH } from './rul-formatter';
export { classifyHealth } from './health-classifier';
export { LinearRulModel, LinearModelArtifactSchema, loadRulModel, loadRulModelOrNull, parseModelArtifact } from './rul-model';
export { LatestPredictionStore, WAITING_SENTINEL } from './prediction-store';
export { RulPredictionService } from './rul-prediction.service';

export type { LinearModelArtifact } from './rul-model';
export type {
  BatchAcknowledgement,
  DirectPredictionResponse,
  PredictionError,
  RulPredictionOptions,
  SimulatedPredictionResponse,
} from './rul-prediction.service';
export type {
  HealthAssessment,
  HealthStatus,
  LatestPrediction,
  PredictionRecord,
  RulFormatOptions,
  RulModel,
  RulPrediction,
  RulResult,
  RulUnit,
  WaitingSentinel,
} from './types';
