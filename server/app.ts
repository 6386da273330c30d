/**
 * Express 应用装配
 * 与监听端口分离，测试直接对 createApp() 的结果发请求
 */

import express, { type Express } from 'express';
import { createSensorDataRouter } from './api/sensorData.router';
import { metricsCollector, type MetricsCollector } from './lib/metrics';
import { expressErrorHandler, notFoundHandler, requestIdMiddleware } from './lib/middleware/errorHandler';
import type { RulPredictionService } from './services/rul/rul-prediction.service';

export interface AppDeps {
  predictions: RulPredictionService;
  metrics?: MetricsCollector;
  /** JSON 请求体上限，默认 5mb */
  bodyLimit?: string;
}

export function createApp({ predictions, metrics = metricsCollector, bodyLimit = '5mb' }: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  // ── 中间件挂载 ──────────────────────────────────────────────
  app.use(requestIdMiddleware);
  app.use(metrics.httpMiddleware());
  app.use(express.json({ limit: bodyLimit }));

  // ── 路由 ────────────────────────────────────────────────────
  app.use('/api', metrics.metricsRouter());
  app.use(createSensorDataRouter({ predictions, metrics }));

  app.use(notFoundHandler);
  app.use(expressErrorHandler);

  return app;
}
