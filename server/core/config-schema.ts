/**
 * ============================================================================
 * 配置验证 Schema（zod）
 * ============================================================================
 *
 * 用途：
 *   1. 启动时验证所有环境变量的类型和范围
 *   2. 提供清晰的错误消息，帮助快速定位配置问题
 *
 * 使用方式：
 *   import { validateConfigOrDie } from './config-schema';
 *   validateConfigOrDie(config);
 *
 * ============================================================================
 */

import { z } from 'zod';
import { createModuleLogger } from './logger';
import type { AppConfig } from './config';

const log = createModuleLogger('config-validator');

// ============================================================
// Schema 定义
// ============================================================

/** 端口号范围验证 */
const portSchema = z.number().int().min(1).max(65535);

const appSchema = z.object({
  name: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+/, 'must be semver format (e.g., 1.0.0)'),
  env: z.enum(['development', 'production', 'test']),
  port: portSchema,
  host: z.string().min(1),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']),
  bodyLimit: z.string().min(1),
});

const acquisitionSchema = z.object({
  mode: z.enum(['sensors', 'simulation']),
  samplingIntervalSec: z.number().min(0).max(3600),
  postData: z.boolean(),
  individualSamples: z.boolean(),
  batchSize: z.number().int().min(1).max(100_000),
  serverUrl: z.string().url('must be a valid URL'),
  postTimeoutMs: z.number().int().min(100),
});

const simulationSchema = z.object({
  duration: z.number().positive(),
  samplingRate: z.number().positive(),
  seed: z.number().int().optional(),
}).refine(s => Math.floor(s.duration * s.samplingRate) >= 1, {
  message: 'duration * samplingRate must yield at least one sample',
});

/** 模拟输入引脚 AIN0-AIN3 */
const pinSchema = z.number().int().min(0).max(3);

const hardwareSchema = z.object({
  iioDevicePath: z.string().min(1),
  accelXPin: pinSchema,
  accelYPin: pinSchema,
  accelZPin: pinSchema,
  vibrationPin: pinSchema,
});

const featureExtractionSchema = z.object({
  maxHistogramBins: z.number().int().min(1),
  entropyBase: z.number().positive().refine(b => b !== 1, 'entropy base must not be 1'),
});

const rulSchema = z.object({
  modelPath: z.string().min(1),
  minutesPerUnit: z.number().positive(),
  minBatchSamples: z.number().int().min(1),
});

/** 完整配置 Schema */
const configSchema = z.object({
  app: appSchema,
  acquisition: acquisitionSchema,
  simulation: simulationSchema,
  hardware: hardwareSchema,
  featureExtraction: featureExtractionSchema,
  rul: rulSchema,
});

// ============================================================
// 公开 API
// ============================================================

export interface ConfigValidationResult {
  success: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * 使用 Zod Schema 验证配置
 *
 * @param cfg - config 对象（来自 config.ts）
 */
export function validateConfigWithSchema(cfg: AppConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // 第一层：Zod schema 验证（类型 + 范围）
  const result = configSchema.safeParse(cfg);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const path = issue.path.join('.');
      errors.push(`${path}: ${issue.message}`);
    }
  }

  // 第二层：引脚冲突
  const pins = [cfg.hardware.accelXPin, cfg.hardware.accelYPin, cfg.hardware.accelZPin, cfg.hardware.vibrationPin];
  if (new Set(pins).size !== pins.length) {
    errors.push(`hardware: analog input pins must be distinct (got ${pins.join(', ')})`);
  }

  // 第三层：运行提示
  if (cfg.acquisition.postData && cfg.acquisition.individualSamples) {
    warnings.push('acquisition.individualSamples: individual samples never trigger RUL prediction');
  }
  if (!cfg.acquisition.individualSamples && cfg.acquisition.batchSize < cfg.rul.minBatchSamples) {
    warnings.push(
      `acquisition.batchSize (${cfg.acquisition.batchSize}) is below rul.minBatchSamples (${cfg.rul.minBatchSamples}); batches will be acknowledged without prediction`,
    );
  }

  const success = errors.length === 0;

  if (errors.length > 0) {
    log.warn({ errors }, `Configuration validation found ${errors.length} error(s)`);
  }

  if (warnings.length > 0) {
    log.warn({ warnings }, `Configuration warnings (${warnings.length})`);
  }

  if (success) {
    log.debug('Configuration validation passed');
  }

  return { success, errors, warnings };
}

/**
 * 启动时验证配置并快速失败
 */
export function validateConfigOrDie(cfg: AppConfig): void {
  const result = validateConfigWithSchema(cfg);
  if (!result.success) {
    log.fatal(
      { errors: result.errors },
      'Configuration validation failed. Fix the above errors and restart.',
    );
    process.exit(1);
  }
}
