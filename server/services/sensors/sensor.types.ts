/**
 * 传感器通道类型定义
 *
 * 调用方只依赖能力接口，真实硬件与仿真可互换。
 */

import type { AcquisitionMode } from '../../core/config';
import type { PhaseInfo, RawVoltage, Vector3, VibrationLevel } from '../../../shared/sensorTypes';

/** 任一实现（硬件或仿真）都必须满足的能力 */
export interface SensorCapability {
  getGForce(): Promise<Vector3>;
  getRawVoltage(): Promise<RawVoltage>;
  getVibrationLevel(): Promise<VibrationLevel>;
}

/** 采集循环使用的通道 */
export interface SensorChannel extends SensorCapability {
  readonly mode: AcquisitionMode;

  /** 推进到下一个采样点；数据源耗尽时返回 false */
  advance(): boolean;

  getVibrationVoltage(): Promise<number>;

  /** 读数失败时，用替代电压重新分级 */
  classifyVibration(voltage: number): VibrationLevel;

  /** 仅仿真通道提供阶段信息 */
  phaseInfo(): PhaseInfo | undefined;
}

/** 模拟输入：按引脚读取电压（伏） */
export interface AnalogInput {
  readChannel(pin: number): Promise<number>;
}

export interface PinMap {
  accelX: number;
  accelY: number;
  accelZ: number;
  vibration: number;
}

/** ADXL335 标定（3.3 V 供电） */
export interface AccelerometerCalibration {
  zeroGBias: number;
  sensitivity: number;
}

export const ADXL335_CALIBRATION: Readonly<AccelerometerCalibration> = Object.freeze({
  zeroGBias: 1.089,
  sensitivity: 0.145,
});
