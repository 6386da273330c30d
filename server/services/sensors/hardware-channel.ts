/**
 * 硬件传感器通道
 * ============================================================
 *
 * 四路慢速模拟输入：
 *   AIN0..2 → ADXL335 三轴加速度计
 *   AIN3    → 模拟振动传感器
 *
 * AnalogInput 的默认实现读取 Linux IIO sysfs：
 *   volts = in_voltage{pin}_raw × in_voltage{pin}_scale / 1000
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { SensorReadError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import type { RawVoltage, Vector3, VibrationLevel } from '../../../shared/sensorTypes';
import {
  ADXL335_CALIBRATION,
  type AccelerometerCalibration,
  type AnalogInput,
  type PinMap,
  type SensorChannel,
} from './sensor.types';

const log = createModuleLogger('hardware-channel');

/** 硬件振动分级阈值（伏），严格大于 */
export const HARDWARE_VIBRATION_THRESHOLDS = Object.freeze({ moderate: 0.1, high: 1.0 });

export class IioAnalogInput implements AnalogInput {
  constructor(private readonly devicePath: string) {}

  async readChannel(pin: number): Promise<number> {
    const raw = await this.readNumber(`in_voltage${pin}_raw`, pin);
    const scale = await this.readNumber(`in_voltage${pin}_scale`, pin);
    return raw * scale / 1000;
  }

  private async readNumber(file: string, pin: number): Promise<number> {
    const path = join(this.devicePath, file);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      throw new SensorReadError(`AIN${pin}`, err instanceof Error ? err.message : String(err), { path });
    }
    const value = Number.parseFloat(text.trim());
    if (!Number.isFinite(value)) {
      throw new SensorReadError(`AIN${pin}`, `unparseable value '${text.trim()}'`, { path });
    }
    return value;
  }
}

export class HardwareChannel implements SensorChannel {
  readonly mode = 'sensors' as const;

  constructor(
    private readonly input: AnalogInput,
    private readonly pins: PinMap,
    private readonly calibration: AccelerometerCalibration = ADXL335_CALIBRATION,
  ) {
    log.info({ pins }, 'Hardware channel ready');
  }

  /** 硬件源不会耗尽 */
  advance(): boolean {
    return true;
  }

  async getGForce(): Promise<Vector3> {
    const volts = await this.readAccelerometer();
    const { zeroGBias, sensitivity } = this.calibration;
    return {
      x: (volts.x - zeroGBias) / sensitivity,
      y: (volts.y - zeroGBias) / sensitivity,
      z: (volts.z - zeroGBias) / sensitivity,
    };
  }

  async getRawVoltage(): Promise<RawVoltage> {
    return {
      accelerometer: await this.readAccelerometer(),
      vibration: await this.getVibrationVoltage(),
    };
  }

  async getVibrationVoltage(): Promise<number> {
    return this.read(this.pins.vibration);
  }

  async getVibrationLevel(): Promise<VibrationLevel> {
    return this.classifyVibration(await this.getVibrationVoltage());
  }

  classifyVibration(voltage: number): VibrationLevel {
    if (voltage > HARDWARE_VIBRATION_THRESHOLDS.high) return 'High';
    if (voltage > HARDWARE_VIBRATION_THRESHOLDS.moderate) return 'Moderate';
    return 'Low';
  }

  phaseInfo(): undefined {
    return undefined;
  }

  private async readAccelerometer(): Promise<Vector3> {
    return {
      x: await this.read(this.pins.accelX),
      y: await this.read(this.pins.accelY),
      z: await this.read(this.pins.accelZ),
    };
  }

  private async read(pin: number): Promise<number> {
    try {
      return await this.input.readChannel(pin);
    } catch (err) {
      if (err instanceof SensorReadError) throw err;
      throw new SensorReadError(`AIN${pin}`, err instanceof Error ? err.message : String(err));
    }
  }
}
