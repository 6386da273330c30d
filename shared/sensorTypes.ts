/**
 * 传感器数据共享类型
 * 采集端（仿真 / 硬件）与服务端共用的样本结构与线上负载格式
 */

// ============ 振动等级 ============

export const VIBRATION_LEVELS = ['Low', 'Moderate', 'High'] as const;
export type VibrationLevel = typeof VIBRATION_LEVELS[number];

/** 线上传输使用的等级文本 */
export const VIBRATION_LEVEL_LABELS: Record<VibrationLevel, string> = {
  Low: 'Low/No Vibration',
  Moderate: 'Moderate Vibration',
  High: 'High Vibration',
};

// ============ 基础结构 ============

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** 原始电压读数（加速度计三轴 + 振动传感器），单位 V */
export interface RawVoltage {
  accelerometer: Vector3;
  vibration: number;
}

export interface VibrationReading {
  voltage: number;
  level: string;
}

/** 仿真阶段信息（硬件样本不携带） */
export interface PhaseInfo {
  phase: string;
  stage_detail: string;
  progress_percent: number;
  degradation_factor: number;
  time_elapsed: number;
  remaining_time: number;
}

/** 单个采样点，创建后不再修改 */
export interface SensorSample {
  timestamp: number;
  sample_number: number;
  accelerometer: Vector3;
  vibration: VibrationReading;
  phase_info?: PhaseInfo;
}

// ============ 线上负载 ============

/** 逐条推送负载 */
export interface IndividualPayload {
  timestamp: number;
  accelerometer: Vector3;
  vibration: VibrationReading;
  sample_number?: number;
  phase_info?: PhaseInfo;
}

export interface BatchInfo {
  sample_count: number;
  start_time: number;
  end_time: number;
  duration: number;
}

/** 批量推送负载 */
export interface BatchPayload {
  mode: string;
  batch_info: BatchInfo;
  accel_data: {
    x: number[];
    y: number[];
    z: number[];
  };
  vib_data: number[];
  timestamps: number[];
}
