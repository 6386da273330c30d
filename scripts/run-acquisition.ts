#!/usr/bin/env tsx
/**
 * 采集端入口
 *
 * 用法:
 *   npx tsx scripts/run-acquisition.ts simulation --post
 *   npx tsx scripts/run-acquisition.ts sensors --post --individual-samples --interval=0.5
 *   npx tsx scripts/run-acquisition.ts --help
 */

import '../server/core/env-loader';

import { config } from '../server/core/config';
import { validateConfigOrDie } from '../server/core/config-schema';
import { isMonitorError } from '../server/core/errors';
import { createModuleLogger, setLogLevel } from '../server/core/logger';
import { AcquisitionService, DataPoster, USAGE, parseAcquisitionArgs } from '../server/services/acquisition';
import { createSensorChannel } from '../server/services/sensors';

const log = createModuleLogger('run-acquisition');

async function main(): Promise<number> {
  setLogLevel(config.app.logLevel);
  validateConfigOrDie(config);

  const parsed = parseAcquisitionArgs(process.argv.slice(2), {
    mode: config.acquisition.mode,
    post: config.acquisition.postData,
    individualSamples: config.acquisition.individualSamples,
    batchSize: config.acquisition.batchSize,
    serverUrl: config.acquisition.serverUrl,
    intervalSec: config.acquisition.samplingIntervalSec,
    duration: config.simulation.duration,
    seed: config.simulation.seed,
  });

  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  const { options } = parsed;
  const channel = createSensorChannel({
    ...config,
    acquisition: { ...config.acquisition, mode: options.mode },
    simulation: { ...config.simulation, duration: options.duration, seed: options.seed },
  });
  const poster = options.post
    ? new DataPoster(options.serverUrl, { timeoutMs: config.acquisition.postTimeoutMs })
    : null;

  const service = new AcquisitionService({
    channel,
    poster,
    intervalSec: options.intervalSec,
    individualSamples: options.individualSamples,
    batchSize: options.batchSize,
    maxSamples: options.maxSamples,
  });

  const stop = (signal: string) => {
    log.info(`Received ${signal}, stopping after the current sample`);
    service.stop();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  const summary = await service.run();
  console.log(
    `Acquired ${summary.samples} samples | posts: ${summary.postsSent} ok, ${summary.postsFailed} failed | read failures: ${summary.readFailures}`,
  );
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch((err) => {
    if (isMonitorError(err) && err.isOperational) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
    } else {
      log.fatal({ err }, 'Acquisition failed');
    }
    process.exit(1);
  });
