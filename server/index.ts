import './core/env-loader';

import { createServer } from 'http';
import { createApp } from './app';
import { config, getConfigSummary } from './core/config';
import { validateConfigOrDie } from './core/config-schema';
import { loadedEnvFiles } from './core/env-loader';
import { createModuleLogger, setLogLevel } from './core/logger';
import { metricsCollector } from './lib/metrics';
import { LatestPredictionStore, RulPredictionService, loadRulModelOrNull } from './services/rul';

const log = createModuleLogger('index');

async function startServer() {
  setLogLevel(config.app.logLevel);
  validateConfigOrDie(config);
  log.info({ envFiles: loadedEnvFiles, ...getConfigSummary() }, `${config.app.name} v${config.app.version} starting`);

  // 加载失败进入常驻降级模式：服务照常启动，预测请求报告模型不可用
  const model = await loadRulModelOrNull(config.rul.modelPath);

  const predictions = new RulPredictionService(model, new LatestPredictionStore(), {
    minutesPerUnit: config.rul.minutesPerUnit,
    minBatchSamples: config.rul.minBatchSamples,
    featureOptions: {
      maxHistogramBins: config.featureExtraction.maxHistogramBins,
      entropyBase: config.featureExtraction.entropyBase,
    },
    metrics: metricsCollector,
  });

  const app = createApp({ predictions, metrics: metricsCollector, bodyLimit: config.app.bodyLimit });
  const server = createServer(app);
  const { port, host } = config.app;

  server.listen(port, host, () => {
    log.info(`Server running on http://${host}:${port}/`);
    log.info(`Prometheus metrics available at http://${host}:${port}/api/metrics`);
    if (!predictions.modelLoaded) {
      log.warn({ modelPath: config.rul.modelPath }, 'Model not loaded; prediction requests will fail');
    }
  });

  // Graceful shutdown：连接排空后再退出
  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      log.info('HTTP server closed');
      process.exit(0);
    });
    // 超时强制退出
    setTimeout(() => {
      log.fatal('Forced shutdown after timeout');
      process.exit(1);
    }, 30_000).unref();
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((err) => {
  log.fatal({ err }, 'Server startup failed');
  process.exit(1);
});
