/**
 * 传感器通道模块
 */

import type { AppConfig } from '../../core/config';
import { DegradationSimulator, createRandomSource } from '../simulation';
import { HardwareChannel, IioAnalogInput } from './hardware-channel';
import { SimulatedChannel } from './simulated-channel';
import type { AnalogInput, SensorChannel } from './sensor.types';

export { HardwareChannel, IioAnalogInput, HARDWARE_VIBRATION_THRESHOLDS } from './hardware-channel';
export { SimulatedChannel } from './simulated-channel';
export { ADXL335_CALIBRATION } from './sensor.types';
export type {
  AccelerometerCalibration,
  AnalogInput,
  PinMap,
  SensorCapability,
  SensorChannel,
} from './sensor.types';

/** 按配置创建通道；硬件模式可注入模拟输入 */
export function createSensorChannel(cfg: AppConfig, input?: AnalogInput): SensorChannel {
  if (cfg.acquisition.mode === 'sensors') {
    const { iioDevicePath, accelXPin, accelYPin, accelZPin, vibrationPin } = cfg.hardware;
    return new HardwareChannel(input ?? new IioAnalogInput(iioDevicePath), {
      accelX: accelXPin,
      accelY: accelYPin,
      accelZ: accelZPin,
      vibration: vibrationPin,
    });
  }

  const simulator = new DegradationSimulator({
    duration: cfg.simulation.duration,
    samplingRate: cfg.simulation.samplingRate,
    random: createRandomSource(cfg.simulation.seed),
  });
  return new SimulatedChannel(simulator);
}
