/**
 * 采集 CLI 参数解析
 *
 * 用法:
 *   tsx scripts/run-acquisition.ts simulation --post --batch-size=100
 *   tsx scripts/run-acquisition.ts sensors --post --individual-samples
 *
 * 数值参数同时接受 --key=value 与 --key value 两种写法。
 */

import { ValidationError } from '../../core/errors';
import type { AcquisitionMode } from '../../core/config';

export interface AcquisitionCliOptions {
  mode: AcquisitionMode;
  post: boolean;
  individualSamples: boolean;
  batchSize: number;
  serverUrl: string;
  intervalSec: number;
  /** 仿真时长（秒） */
  duration: number;
  seed?: number;
  maxSamples?: number;
}

export type ParsedCli =
  | { help: true }
  | { help: false; options: AcquisitionCliOptions };

export const USAGE = `Usage: tsx scripts/run-acquisition.ts [sensors|simulation] [options]

Options:
  --post                    Post data to the web server
  --batch                   Post batches of samples (default when posting)
  --individual-samples      Post every sample on its own
  --batch-size=N            Samples per batch (default: 100)
  --server-url=URL          Web server base URL
  --interval=S              Seconds between samples
  --duration=N              Simulated lifecycle length in time units (fractional allowed)
  --seed=N                  Seed for reproducible simulation
  --max-samples=N           Stop after N samples
  --help                    Show this message`;

const VALUE_FLAGS = ['--batch-size', '--server-url', '--interval', '--duration', '--seed', '--max-samples'] as const;
type ValueFlag = typeof VALUE_FLAGS[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAGS.some(f => f === flag);
}

function positiveInt(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${flag} expects a positive integer, got '${raw}'`);
  }
  return value;
}

function positiveNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${flag} expects a positive number, got '${raw}'`);
  }
  return value;
}

function nonNegativeNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${flag} expects a non-negative number, got '${raw}'`);
  }
  return value;
}

export function parseAcquisitionArgs(argv: readonly string[], defaults: AcquisitionCliOptions): ParsedCli {
  const options: AcquisitionCliOptions = { ...defaults };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') return { help: true };
    if (arg === 'sensors' || arg === 'simulation') {
      options.mode = arg;
      continue;
    }
    if (arg === '--post' || arg === '--post-data') {
      options.post = true;
      continue;
    }
    if (arg === '--batch' || arg === '--batch-mode') {
      options.individualSamples = false;
      continue;
    }
    if (arg === '--individual-samples') {
      options.individualSamples = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    if (!isValueFlag(flag)) {
      throw new ValidationError(`Unknown argument '${arg}'`);
    }

    let raw: string;
    if (eq >= 0) {
      raw = arg.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined) throw new ValidationError(`${flag} requires a value`);
      raw = next;
      i += 1;
    }

    switch (flag) {
      case '--batch-size':
        options.batchSize = positiveInt(flag, raw);
        break;
      case '--server-url':
        options.serverUrl = raw;
        break;
      case '--interval':
        options.intervalSec = nonNegativeNumber(flag, raw);
        break;
      case '--duration':
        options.duration = positiveNumber(flag, raw);
        break;
      case '--seed': {
        const seed = Number(raw);
        if (!Number.isInteger(seed)) throw new ValidationError(`--seed expects an integer, got '${raw}'`);
        options.seed = seed;
        break;
      }
      case '--max-samples':
        options.maxSamples = positiveInt(flag, raw);
        break;
    }
  }

  return { help: false, options };
}
