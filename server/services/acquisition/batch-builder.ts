/**
 * 批量负载组装
 * 逐个累积样本，满批后转为按通道展开的列式负载
 */

import type { BatchPayload, SensorSample } from '../../../shared/sensorTypes';

export class BatchBuilder {
  private samples: SensorSample[] = [];

  constructor(private readonly mode: string) {}

  get size(): number {
    return this.samples.length;
  }

  add(sample: SensorSample): void {
    this.samples.push(sample);
  }

  /** 当前累积的样本 → 批量负载；空批返回 null */
  build(): BatchPayload | null {
    if (this.samples.length === 0) return null;

    const timestamps = this.samples.map(s => s.timestamp);
    const startTime = timestamps[0];
    const endTime = timestamps[timestamps.length - 1];

    return {
      mode: this.mode,
      batch_info: {
        sample_count: this.samples.length,
        start_time: startTime,
        end_time: endTime,
        duration: endTime - startTime,
      },
      accel_data: {
        x: this.samples.map(s => s.accelerometer.x),
        y: this.samples.map(s => s.accelerometer.y),
        z: this.samples.map(s => s.accelerometer.z),
      },
      vib_data: this.samples.map(s => s.vibration.voltage),
      timestamps,
    };
  }

  /** 取出当前批次并清空 */
  drain(): BatchPayload | null {
    const payload = this.build();
    this.samples = [];
    return payload;
  }
}
