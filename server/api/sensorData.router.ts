/**
 * 传感器数据 HTTP 接口
 * ============================================================
 *
 *   POST /data       单个样本或批量负载（以 batch_info 区分）
 *   GET  /latest     最近一次成功预测，或等待哨兵
 *   POST /predict    原始序列或 16 个预提取特征 → 预测
 *   GET  /simulate   固定种子的演示预测
 *   GET  /           运行状态文本
 *
 * 请求体先经 zod 校验；校验失败交给错误中间件统一返回 400。
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import { metricsCollector, type MetricsCollector } from '../lib/metrics';
import type { RulPredictionService } from '../services/rul/rul-prediction.service';

const log = createModuleLogger('sensor-data-api');

// ============================================================
// 请求 schema
// ============================================================

const missing = (field: string) => ({ required_error: `Missing required field: ${field}` });

const ACCEL_FIELDS = 'Accelerometer data must have x, y, z fields';
const VIB_FIELDS = 'Vibration data must have voltage, level fields';

const axis = z.number({ required_error: ACCEL_FIELDS, invalid_type_error: 'Accelerometer values must be numbers' });

export const IndividualSampleSchema = z.object({
  timestamp: z.number(missing('timestamp')),
  accelerometer: z.object({ x: axis, y: axis, z: axis }, missing('accelerometer')),
  vibration: z.object({
    voltage: z.number({ required_error: VIB_FIELDS }),
    level: z.string({ required_error: VIB_FIELDS }),
  }, missing('vibration')),
  sample_number: z.number().int().optional(),
});

const series = (field: string) => z.array(z.number(), missing(field));

export const BatchPayloadSchema = z.object({
  mode: z.string().default('unknown'),
  batch_info: z.object({
    sample_count: z.number().int().nonnegative(),
    start_time: z.number(),
    end_time: z.number(),
    duration: z.number().optional(),
  }, missing('batch_info')),
  accel_data: z.object({
    x: series('accel_data.x'),
    y: series('accel_data.y'),
    z: series('accel_data.z'),
  }, missing('accel_data')),
  vib_data: series('vib_data'),
  timestamps: series('timestamps'),
}).superRefine((batch, ctx) => {
  const n = batch.batch_info.sample_count;
  const lengths: Array<[string, number]> = [
    ['accel_data.x', batch.accel_data.x.length],
    ['accel_data.y', batch.accel_data.y.length],
    ['accel_data.z', batch.accel_data.z.length],
    ['vib_data', batch.vib_data.length],
  ];
  for (const [path, length] of lengths) {
    if (length !== n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${path} has ${length} values but batch_info.sample_count is ${n}`,
        path: path.split('.'),
      });
    }
  }
}).transform(batch => ({
  ...batch,
  batch_info: {
    ...batch.batch_info,
    duration: batch.batch_info.duration ?? batch.batch_info.end_time - batch.batch_info.start_time,
  },
}));

export const PredictRequestSchema = z.object({
  accel_data: z.array(z.number()).min(1).optional(),
  vib_data: z.array(z.number()).min(1).optional(),
  features: z.array(z.number()).optional(),
});

export const SimulateQuerySchema = z.object({
  samples: z.coerce.number().int().min(1).max(100_000).default(1000),
  seed: z.coerce.number().int().default(42),
});

// ============================================================
// 路由
// ============================================================

export interface SensorDataRouterDeps {
  predictions: RulPredictionService;
  metrics?: MetricsCollector;
}

function requireJson(req: Request): void {
  if (!req.is('application/json')) {
    throw new ValidationError('Request must be JSON');
  }
}

function isBatchBody(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'batch_info' in body;
}

export function createSensorDataRouter({ predictions, metrics = metricsCollector }: SensorDataRouterDeps): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send(
      'Vibration RUL monitor is running. POST sensor data to /data; GET /latest for the most recent prediction.',
    );
  });

  router.post('/data', (req: Request, res: Response, next: NextFunction) => {
    try {
      requireJson(req);

      if (isBatchBody(req.body)) {
        const batch = BatchPayloadSchema.parse(req.body);
        res.json(predictions.processBatch(batch));
        return;
      }

      const sample = IndividualSampleSchema.parse(req.body);
      const { x, y, z: zg } = sample.accelerometer;
      log.info(
        { timestamp: sample.timestamp, sampleNumber: sample.sample_number },
        `Accel (${x.toFixed(3)}, ${y.toFixed(3)}, ${zg.toFixed(3)}) g | Vib ${sample.vibration.voltage.toFixed(3)} V (${sample.vibration.level})`,
      );
      metrics.recordIndividualSample();
      res.json({
        status: 'success',
        message: 'Individual sensor sample received',
        timestamp: sample.timestamp,
      });
    } catch (err) {
      next(err);
    }
  });

  router.get('/latest', (_req: Request, res: Response) => {
    res.json(predictions.latest);
  });

  router.post('/predict', (req: Request, res: Response, next: NextFunction) => {
    try {
      requireJson(req);
      const body = PredictRequestSchema.parse(req.body);

      predictions.ensureModel();

      if (body.accel_data && body.vib_data) {
        res.json(predictions.predictFromSeries(body.accel_data, body.vib_data));
        return;
      }

      if (body.features) {
        if (body.features.length !== 16) {
          throw new ValidationError("'features' must be a list of 16 values (8 accel, 8 vib).", {
            received: body.features.length,
          });
        }
        res.json(predictions.predictFromFeatures(body.features));
        return;
      }

      throw new ValidationError("Provide either 'accel_data' and 'vib_data', or 'features'.");
    } catch (err) {
      next(err);
    }
  });

  router.get('/simulate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { samples, seed } = SimulateQuerySchema.parse(req.query);
      res.json(predictions.simulate(samples, seed));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
