/**
 * ============================================================================
 * Prometheus 指标收集器
 * ============================================================================
 *
 * 基于 prom-client 暴露应用级指标，供 Prometheus 抓取 /api/metrics。
 *
 * 指标覆盖：
 * - HTTP 请求延迟/计数/状态码分布
 * - 批量数据接收计数（按模式、是否触发预测）
 * - RUL 预测计数（按结果）与预测小时数分布
 * - 系统资源（Node.js 默认指标）
 *
 * 依赖: prom-client, express, server/core/logger
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';
import { createModuleLogger } from '../core/logger';

const log = createModuleLogger('metrics-collector');

export type PredictionOutcome = 'success' | 'failure' | 'model_unavailable';

// ============================================================
// 指标收集器类
// ============================================================

export class MetricsCollector {
  private readonly register: Registry;
  private readonly httpRequestsTotal: Counter<'method' | 'route' | 'status_code'>;
  private readonly httpRequestDuration: Histogram<'method' | 'route' | 'status_code'>;
  private readonly samplesReceivedTotal: Counter<'kind'>;
  private readonly batchesReceivedTotal: Counter<'mode' | 'predicted'>;
  private readonly predictionsTotal: Counter<'outcome'>;
  private readonly predictedHours: Histogram<string>;

  constructor(options: { defaultMetrics?: boolean; prefix?: string } = {}) {
    const prefix = options.prefix ?? 'rul_';
    this.register = new Registry();

    this.register.setDefaultLabels({
      app: 'vibration-rul-monitor',
      env: process.env.NODE_ENV || 'development',
    });

    // 收集 Node.js 默认指标（CPU、内存、事件循环延迟、GC 等）
    if (options.defaultMetrics ?? true) {
      collectDefaultMetrics({ register: this.register, prefix });
    }

    /** HTTP 请求总数 */
    this.httpRequestsTotal = new Counter({
      name: `${prefix}http_requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code'] as const,
      registers: [this.register],
    });

    /** HTTP 请求延迟分布 */
    this.httpRequestDuration = new Histogram({
      name: `${prefix}http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'route', 'status_code'] as const,
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [this.register],
    });

    this.samplesReceivedTotal = new Counter({
      name: `${prefix}samples_received_total`,
      help: 'Sensor samples received, individually or inside batches',
      labelNames: ['kind'] as const,
      registers: [this.register],
    });

    this.batchesReceivedTotal = new Counter({
      name: `${prefix}batches_received_total`,
      help: 'Sensor batches received',
      labelNames: ['mode', 'predicted'] as const,
      registers: [this.register],
    });

    this.predictionsTotal = new Counter({
      name: `${prefix}predictions_total`,
      help: 'RUL predictions by outcome',
      labelNames: ['outcome'] as const,
      registers: [this.register],
    });

    this.predictedHours = new Histogram({
      name: `${prefix}predicted_hours`,
      help: 'Predicted remaining useful life in hours',
      buckets: [1, 12, 24, 72, 168, 336, 720, 1440, 4320],
      registers: [this.register],
    });
  }

  /**
   * 获取 Express 中间件，用于自动收集 HTTP 指标
   */
  httpMiddleware() {
    return (req: Request, res: Response, next: NextFunction) => {
      const start = process.hrtime.bigint();

      const onFinish = () => {
        res.removeListener('finish', onFinish);
        const elapsed = Number(process.hrtime.bigint() - start) / 1e9;
        const labels = {
          method: req.method,
          route: this.normalizeRoute(req.path),
          status_code: res.statusCode.toString(),
        };
        this.httpRequestsTotal.inc(labels);
        this.httpRequestDuration.observe(labels, elapsed);
      };

      res.on('finish', onFinish);
      next();
    };
  }

  /**
   * 获取 /metrics 路由（挂载在 /api 下）
   */
  metricsRouter(): Router {
    const router = Router();

    router.get('/metrics', async (_req: Request, res: Response) => {
      try {
        res.set('Content-Type', this.register.contentType);
        res.end(await this.register.metrics());
      } catch (err) {
        log.error({ err }, 'Failed to collect metrics');
        res.status(500).end('Error collecting metrics');
      }
    });

    return router;
  }

  // ============================================================
  // 业务指标记录方法
  // ============================================================

  recordIndividualSample(): void {
    this.samplesReceivedTotal.inc({ kind: 'individual' });
  }

  recordBatch(mode: string, sampleCount: number, predicted: boolean): void {
    this.samplesReceivedTotal.inc({ kind: 'batch' }, sampleCount);
    this.batchesReceivedTotal.inc({ mode, predicted: String(predicted) });
  }

  recordPrediction(outcome: PredictionOutcome, hours?: number): void {
    this.predictionsTotal.inc({ outcome });
    if (hours !== undefined) {
      this.predictedHours.observe(hours);
    }
  }

  getRegistry(): Registry {
    return this.register;
  }

  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }

  // ============================================================
  // 内部方法
  // ============================================================

  /** 规范化路由路径，避免高基数标签 */
  private normalizeRoute(path: string): string {
    if (path === '/api/metrics') return '/api/metrics';
    return path.replace(/\/\d+/g, '/:id');
  }
}

// ============================================================
// 单例导出
// ============================================================

export const metricsCollector = new MetricsCollector();
