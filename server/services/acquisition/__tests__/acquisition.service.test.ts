/**
 * 采集服务测试
 * 推送目标为进程内 express 接收端
 */
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import express from 'express';
import type { Server } from 'http';

vi.mock('../../../core/logger', () => ({
  createModuleLogger: () => ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { AcquisitionService } from '../acquisition.service';
import { DataPoster } from '../data-poster';
import { SimulatedChannel } from '../../sensors/simulated-channel';
import { DegradationSimulator } from '../../simulation/degradation-simulator';
import { createRandomSource } from '../../simulation/random';
import { SensorReadError } from '../../../core/errors';
import type { SensorChannel } from '../../sensors/sensor.types';
import type { BatchPayload, SensorSample, Vector3, VibrationLevel } from '../../../../shared/sensorTypes';

// ============================================================
// 进程内接收端
// ============================================================

const received: unknown[] = [];
let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = express();
  app.use(express.json());
  app.post('/data', (req, res) => {
    received.push(req.body);
    res.json({ status: 'success' });
  });
  app.post('/reject/data', (_req, res) => {
    res.status(500).json({ error: 'nope' });
  });
  server = await new Promise<Server>(resolve => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  baseUrl = `http://127.0.0.1:${portOf(server)}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

beforeEach(() => {
  received.length = 0;
});

// ============================================================
// 辅助
// ============================================================

function simulatedChannel(duration: number) {
  return new SimulatedChannel(new DegradationSimulator({
    duration,
    samplingRate: 1,
    random: createRandomSource(7),
  }));
}

/** 每次调用前进 0.25 秒 */
function steppingClock() {
  let t = 0;
  return () => {
    const now = t;
    t += 0.25;
    return now;
  };
}

const noSleep = async () => {};

/** 按脚本返回读数或失败的硬件桩 */
class ScriptedChannel implements SensorChannel {
  readonly mode = 'sensors' as const;
  private step = -1;

  constructor(
    private readonly accel: Array<Vector3 | 'fail'>,
    private readonly volts: Array<number | 'fail'>,
  ) {}

  advance(): boolean {
    this.step += 1;
    return true;
  }

  async getGForce(): Promise<Vector3> {
    const value = this.accel[this.step];
    if (value === 'fail' || value === undefined) throw new SensorReadError('AIN0', 'scripted failure');
    return value;
  }

  async getRawVoltage() {
    return { accelerometer: await this.getGForce(), vibration: await this.getVibrationVoltage() };
  }

  async getVibrationVoltage(): Promise<number> {
    const value = this.volts[this.step];
    if (value === 'fail' || value === undefined) throw new SensorReadError('AIN3', 'scripted failure');
    return value;
  }

  async getVibrationLevel(): Promise<VibrationLevel> {
    return this.classifyVibration(await this.getVibrationVoltage());
  }

  classifyVibration(voltage: number): VibrationLevel {
    return voltage > 1 ? 'High' : voltage > 0.1 ? 'Moderate' : 'Low';
  }

  phaseInfo() {
    return undefined;
  }
}

function portOf(s: Server): number {
  const address = s.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP');
  return address.port;
}

function isSample(body: unknown): body is SensorSample {
  return typeof body === 'object' && body !== null && 'sample_number' in body;
}

function isBatch(body: unknown): body is BatchPayload {
  return typeof body === 'object' && body !== null && 'batch_info' in body;
}

// ============================================================
// 测试
// ============================================================

describe('AcquisitionService', () => {
  it('逐条推送：每个样本一次 POST', async () => {
    const service = new AcquisitionService({
      channel: simulatedChannel(5),
      poster: new DataPoster(baseUrl),
      intervalSec: 1,
      individualSamples: true,
      batchSize: 100,
      clock: steppingClock(),
      sleep: noSleep,
    });

    const summary = await service.run();

    expect(summary).toEqual({ samples: 5, readFailures: 0, postsSent: 5, postsFailed: 0 });
    expect(received).toHaveLength(5);
    const samples = received.filter(isSample);
    expect(samples.map(s => s.sample_number)).toEqual([1, 2, 3, 4, 5]);
    expect(samples[0].phase_info?.phase).toBe('New/Healthy');
  });

  it('按批推送：结束时冲刷不足一批的剩余样本', async () => {
    const service = new AcquisitionService({
      channel: simulatedChannel(10),
      poster: new DataPoster(baseUrl),
      intervalSec: 1,
      individualSamples: false,
      batchSize: 4,
      clock: steppingClock(),
      sleep: noSleep,
    });

    const summary = await service.run();

    expect(summary.postsSent).toBe(3);
    const batches = received.filter(isBatch);
    expect(batches.map(b => b.batch_info.sample_count)).toEqual([4, 4, 2]);
    expect(batches[0].mode).toBe('simulation');
    expect(batches[0].accel_data.x).toHaveLength(4);
    expect(batches[2].vib_data).toHaveLength(2);
  });

  it('达到 maxSamples 后停止，且最后一个样本之后不再等待', async () => {
    const sleep = vi.fn(noSleep);
    const service = new AcquisitionService({
      channel: simulatedChannel(100),
      poster: null,
      intervalSec: 1,
      individualSamples: false,
      batchSize: 100,
      maxSamples: 3,
      clock: steppingClock(),
      sleep,
    });

    const summary = await service.run();

    expect(summary.samples).toBe(3);
    expect(sleep.mock.calls).toEqual([[750], [750]]);
  });

  it('处理耗时超过间隔时不等待', async () => {
    const sleep = vi.fn(noSleep);
    const service = new AcquisitionService({
      channel: simulatedChannel(3),
      poster: null,
      intervalSec: 0.2,
      individualSamples: true,
      batchSize: 100,
      clock: steppingClock(),
      sleep,
    });

    await service.run();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stop() 在当前迭代后退出', async () => {
    const samples: SensorSample[] = [];
    const service = new AcquisitionService({
      channel: simulatedChannel(100),
      poster: null,
      intervalSec: 1,
      individualSamples: true,
      batchSize: 100,
      clock: steppingClock(),
      sleep: noSleep,
      onSample: sample => {
        samples.push(sample);
        if (sample.sample_number === 2) service.stop();
      },
    });

    const summary = await service.run();
    expect(summary.samples).toBe(2);
    expect(samples).toHaveLength(2);
    expect(service.running).toBe(false);
  });

  it('读取失败沿用最近读数，首次失败取 0', async () => {
    const samples: SensorSample[] = [];
    const channel = new ScriptedChannel(
      ['fail', { x: 0.1, y: 0.2, z: 0.9 }, 'fail'],
      ['fail', 0.5, 'fail'],
    );
    const service = new AcquisitionService({
      channel,
      poster: null,
      intervalSec: 1,
      individualSamples: true,
      batchSize: 100,
      maxSamples: 3,
      clock: steppingClock(),
      sleep: noSleep,
      onSample: sample => samples.push(sample),
    });

    const summary = await service.run();

    expect(samples.map(s => s.accelerometer)).toEqual([
      { x: 0, y: 0, z: 0 },
      { x: 0.1, y: 0.2, z: 0.9 },
      { x: 0.1, y: 0.2, z: 0.9 },
    ]);
    expect(samples.map(s => s.vibration)).toEqual([
      { voltage: 0, level: 'Low/No Vibration' },
      { voltage: 0.5, level: 'Moderate Vibration' },
      { voltage: 0.5, level: 'Moderate Vibration' },
    ]);
    // 每个失败样本：加速度、电压、等级各失败一次
    expect(summary.readFailures).toBe(6);
    expect(samples[0].phase_info).toBeUndefined();
    expect(samples.map(s => s.timestamp)).toEqual([0, 0.5, 1]);
  });

  it('服务端拒绝时计为失败，不中断采集', async () => {
    const service = new AcquisitionService({
      channel: simulatedChannel(3),
      poster: new DataPoster(`${baseUrl}/reject/`),
      intervalSec: 1,
      individualSamples: true,
      batchSize: 100,
      clock: steppingClock(),
      sleep: noSleep,
    });

    const summary = await service.run();
    expect(summary).toEqual({ samples: 3, readFailures: 0, postsSent: 0, postsFailed: 3 });
  });
});

describe('DataPoster', () => {
  it('去除服务地址末尾斜杠', () => {
    expect(new DataPoster('http://localhost:5000/').url).toBe('http://localhost:5000/data');
  });

  it('成功时返回状态与响应体', async () => {
    const result = await new DataPoster(baseUrl).post({
      timestamp: 1,
      accelerometer: { x: 0, y: 0, z: 1 },
      vibration: { voltage: 0.2, level: 'Low/No Vibration' },
    });
    expect(result).toEqual({ status: 200, body: { status: 'success' } });
  });

  it('连接失败时返回 null', async () => {
    const closed = express().listen(0, '127.0.0.1');
    await new Promise(resolve => closed.once('listening', resolve));
    const port = portOf(closed);
    await new Promise(resolve => closed.close(resolve));

    const result = await new DataPoster(`http://127.0.0.1:${port}`, { timeoutMs: 1000 }).post({
      timestamp: 1,
      accelerometer: { x: 0, y: 0, z: 1 },
      vibration: { voltage: 0.2, level: 'Low/No Vibration' },
    });
    expect(result).toBeNull();
  });
});
