/**
 * 仿真传感器通道
 * 包装 DegradationSimulator，对外表现与硬件通道一致
 */

import {
  VIBRATION_LEVELS,
  VIBRATION_LEVEL_LABELS,
  type PhaseInfo,
  type RawVoltage,
  type SensorSample,
  type Vector3,
  type VibrationLevel,
} from '../../../shared/sensorTypes';
import { classifyVibrationLevel } from '../simulation/degradation-simulator';
import type { DegradationSimulator } from '../simulation/degradation-simulator';
import {
  ADXL335_CALIBRATION,
  type AccelerometerCalibration,
  type SensorChannel,
} from './sensor.types';

const RESTING_G: Readonly<Vector3> = Object.freeze({ x: 0, y: 0, z: 1 });
const QUIET_VOLTAGE = 0.2;

export class SimulatedChannel implements SensorChannel {
  readonly mode = 'simulation' as const;
  private last: SensorSample | null = null;

  constructor(
    private readonly simulator: DegradationSimulator,
    private readonly calibration: AccelerometerCalibration = ADXL335_CALIBRATION,
  ) {}

  advance(): boolean {
    const sample = this.simulator.advanceToNextSample();
    if (!sample) return false;
    this.last = sample;
    return true;
  }

  /** 首个样本之前返回静止重力读数 (0, 0, 1) */
  async getGForce(): Promise<Vector3> {
    return { ...(this.last?.accelerometer ?? RESTING_G) };
  }

  /** 按硬件标定反推加速度计电压：V = g · sensitivity + bias */
  async getRawVoltage(): Promise<RawVoltage> {
    const g = await this.getGForce();
    const { zeroGBias, sensitivity } = this.calibration;
    return {
      accelerometer: {
        x: g.x * sensitivity + zeroGBias,
        y: g.y * sensitivity + zeroGBias,
        z: g.z * sensitivity + zeroGBias,
      },
      vibration: await this.getVibrationVoltage(),
    };
  }

  async getVibrationVoltage(): Promise<number> {
    return this.last?.vibration.voltage ?? QUIET_VOLTAGE;
  }

  async getVibrationLevel(): Promise<VibrationLevel> {
    if (!this.last) return 'Low';
    const label = this.last.vibration.level;
    return VIBRATION_LEVELS.find(level => VIBRATION_LEVEL_LABELS[level] === label) ?? 'Low';
  }

  classifyVibration(voltage: number): VibrationLevel {
    return classifyVibrationLevel(voltage, this.simulator.profile.levels);
  }

  phaseInfo(): PhaseInfo | undefined {
    return this.last?.phase_info;
  }
}
