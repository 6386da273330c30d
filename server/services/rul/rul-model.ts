/**
 * RUL 回归模型
 * ============================================================
 *
 * 模型工件为 JSON：
 *   {
 *     "name": "...",
 *     "feature_names": ["B1_x_mean", ...],
 *     "scaler": { "mean": [...], "scale": [...] },
 *     "coefficients": [...],
 *     "intercept": 0,
 *     "time_unit_minutes": 10
 *   }
 *
 * 预测 = intercept + Σ coefficients[i] · (x[i] - mean[i]) / scale[i]
 */

import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import { z } from 'zod';
import { createModuleLogger } from '../../core/logger';
import { MissingModelFeatureError, ModelUnavailableError } from '../../core/errors';
import type { ModelInput } from '../feature-extraction/types';
import type { RulModel } from './types';

const log = createModuleLogger('rul-model');

export const LinearModelArtifactSchema = z.object({
  name: z.string().default('linear-rul'),
  feature_names: z.array(z.string().min(1)).min(1),
  scaler: z.object({
    mean: z.array(z.number()),
    scale: z.array(z.number()),
  }),
  coefficients: z.array(z.number()),
  intercept: z.number(),
  time_unit_minutes: z.number().positive().optional(),
}).superRefine((artifact, ctx) => {
  const n = artifact.feature_names.length;
  const lengths: Array<[string, number]> = [
    ['scaler.mean', artifact.scaler.mean.length],
    ['scaler.scale', artifact.scaler.scale.length],
    ['coefficients', artifact.coefficients.length],
  ];
  for (const [path, length] of lengths) {
    if (length !== n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${path} has ${length} entries, expected ${n}`,
        path: path.split('.'),
      });
    }
  }
});

export type LinearModelArtifact = z.infer<typeof LinearModelArtifactSchema>;

/** 标准化 + 线性回归 */
export class LinearRulModel implements RulModel {
  readonly name: string;
  readonly featureNames: readonly string[];
  readonly timeUnitMinutes?: number;

  private readonly mean: readonly number[];
  private readonly scale: readonly number[];
  private readonly coefficients: readonly number[];
  private readonly intercept: number;

  constructor(artifact: LinearModelArtifact) {
    this.name = artifact.name;
    this.featureNames = [...artifact.feature_names];
    this.timeUnitMinutes = artifact.time_unit_minutes;
    this.mean = [...artifact.scaler.mean];
    // 零方差列不缩放
    this.scale = artifact.scaler.scale.map(s => (s === 0 ? 1 : s));
    this.coefficients = [...artifact.coefficients];
    this.intercept = artifact.intercept;
  }

  /**
   * @throws MissingModelFeatureError 输入缺少模型需要的列
   */
  predict(input: ModelInput): number {
    const missing = this.featureNames.filter(name => !(name in input));
    if (missing.length > 0) {
      throw new MissingModelFeatureError(missing, { model: this.name });
    }

    let y = this.intercept;
    this.featureNames.forEach((name, i) => {
      y += this.coefficients[i] * (input[name] - this.mean[i]) / this.scale[i];
    });
    return y;
  }
}

export function parseModelArtifact(raw: unknown): LinearRulModel {
  const result = LinearModelArtifactSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ModelUnavailableError(`Invalid model artifact: ${issues.join('; ')}`, { issues });
  }
  return new LinearRulModel(result.data);
}

/**
 * 从磁盘加载模型
 * @param modelPath 绝对路径，或相对 baseDir（默认当前工作目录）
 * @throws ModelUnavailableError 文件不存在、JSON 非法或结构不符
 */
export async function loadRulModel(modelPath: string, baseDir: string = process.cwd()): Promise<LinearRulModel> {
  const fullPath = isAbsolute(modelPath) ? modelPath : resolve(baseDir, modelPath);

  let text: string;
  try {
    text = await readFile(fullPath, 'utf-8');
  } catch (err) {
    throw new ModelUnavailableError(`Could not read model artifact at ${fullPath}`, {
      path: fullPath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ModelUnavailableError(`Model artifact is not valid JSON: ${fullPath}`, {
      path: fullPath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const model = parseModelArtifact(raw);
  log.info({ path: fullPath, features: model.featureNames.length }, `Model '${model.name}' loaded`);
  return model;
}

/**
 * 启动时加载；失败进入常驻降级模式（返回 null，不重试）
 */
export async function loadRulModelOrNull(modelPath: string, baseDir?: string): Promise<LinearRulModel | null> {
  try {
    return await loadRulModel(modelPath, baseDir);
  } catch (err) {
    log.error({ err, modelPath }, 'Could not load model; predictions are disabled');
    return null;
  }
}
