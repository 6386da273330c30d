/**
 * 批量负载组装测试
 */
import { describe, it, expect } from 'vitest';
import { BatchBuilder } from '../batch-builder';
import type { SensorSample } from '../../../../shared/sensorTypes';

function sample(n: number): SensorSample {
  return {
    timestamp: 100 + n * 0.5,
    sample_number: n,
    accelerometer: { x: n, y: -n, z: 1 },
    vibration: { voltage: n / 10, level: 'Low/No Vibration' },
  };
}

describe('BatchBuilder', () => {
  it('空批返回 null', () => {
    expect(new BatchBuilder('simulation').build()).toBeNull();
  });

  it('样本展开为按通道的列式负载', () => {
    const builder = new BatchBuilder('simulation');
    [1, 2, 3].forEach(n => builder.add(sample(n)));

    expect(builder.build()).toEqual({
      mode: 'simulation',
      batch_info: { sample_count: 3, start_time: 100.5, end_time: 101.5, duration: 1 },
      accel_data: { x: [1, 2, 3], y: [-1, -2, -3], z: [1, 1, 1] },
      vib_data: [0.1, 0.2, 0.3],
      timestamps: [100.5, 101, 101.5],
    });
  });

  it('drain 取出后清空', () => {
    const builder = new BatchBuilder('sensors');
    builder.add(sample(1));
    expect(builder.drain()?.batch_info.sample_count).toBe(1);
    expect(builder.size).toBe(0);
    expect(builder.drain()).toBeNull();
  });
});
