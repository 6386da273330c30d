/**
 * 统一配置中心
 * 采集端、仿真器、服务端与 RUL 后处理的唯一配置来源
 *
 * 使用方式：
 *   import { config } from '../core/config';
 *   const interval = config.acquisition.samplingIntervalSec;
 *   const minutesPerUnit = config.rul.minutesPerUnit;
 *
 * 环境变量优先级：
 *   环境变量 > .env 文件（env-loader.ts）> 默认值
 *
 * 零依赖原则：本文件仅依赖 process.env，不导入任何其他模块
 */

// ============================================
// 辅助函数
// ============================================

function env(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function envInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  return v ? parseInt(v, 10) : defaultValue;
}

function envFloat(key: string, defaultValue: number): number {
  const v = process.env[key];
  return v ? parseFloat(v) : defaultValue;
}

function envBool(key: string, defaultValue: boolean): boolean {
  const v = process.env[key];
  if (!v) return defaultValue;
  return v === 'true' || v === '1' || v === 'yes';
}

function envOptionalInt(key: string): number | undefined {
  const v = process.env[key];
  return v ? parseInt(v, 10) : undefined;
}

/** 枚举型变量：取值不在允许列表中时回退默认值 */
function envEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const v = process.env[key];
  const match = allowed.find(a => a === v);
  return match ?? defaultValue;
}

const APP_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
const ACQUISITION_MODES = ['sensors', 'simulation'] as const;

// ============================================
// 配置结构
// ============================================

export const config = {

  // ──────────────────────────────────────────
  // 应用基础
  // ──────────────────────────────────────────

  app: {
    name: env('APP_NAME', 'Vibration RUL Monitor'),
    version: env('APP_VERSION', '1.0.0'),
    env: envEnum('NODE_ENV', APP_ENVS, 'development'),
    port: envInt('PORT', 5000),
    host: env('HOST', '0.0.0.0'),
    logLevel: envEnum('LOG_LEVEL', LOG_LEVELS, 'info'),
    /** 请求体上限（批量负载中每通道数组可能较长） */
    bodyLimit: env('BODY_LIMIT', '5mb'),
  },

  // ──────────────────────────────────────────
  // 采集端
  // ──────────────────────────────────────────

  acquisition: {
    /** 数据源：真实传感器 | 仿真 */
    mode: envEnum('ACQUISITION_MODE', ACQUISITION_MODES, 'simulation'),
    /** 采样间隔（秒） */
    samplingIntervalSec: envFloat('SAMPLING_INTERVAL', 1),
    /** 是否向服务端推送数据 */
    postData: envBool('ACQUISITION_POST', false),
    /** 逐条推送（否则按批推送） */
    individualSamples: envBool('ACQUISITION_INDIVIDUAL', false),
    /** 每批采样点数 */
    batchSize: envInt('BATCH_SIZE', 100),
    /** 服务端地址 */
    serverUrl: env('WEBSERVER_URL', 'http://localhost:5000'),
    /** 推送超时（毫秒） */
    postTimeoutMs: envInt('POST_TIMEOUT_MS', 5000),
  },

  // ──────────────────────────────────────────
  // 退化仿真
  // ──────────────────────────────────────────

  simulation: {
    /** 仿真总时长（时间单位，180 = 6 个月，每天一个采样点） */
    duration: envFloat('SIMULATION_DURATION', 180),
    /** 每时间单位采样数 */
    samplingRate: envFloat('SIMULATION_SAMPLING_RATE', 1.0),
    /** 随机种子；未设置时每次运行不同 */
    seed: envOptionalInt('SIMULATION_SEED'),
  },

  // ──────────────────────────────────────────
  // 硬件（ADXL335 加速度计 + 模拟振动传感器）
  // ──────────────────────────────────────────

  hardware: {
    /** Linux IIO 设备目录（慢速模拟输入） */
    iioDevicePath: env('IIO_DEVICE_PATH', '/sys/bus/iio/devices/iio:device0'),
    accelXPin: envInt('ACCEL_X_PIN', 0),
    accelYPin: envInt('ACCEL_Y_PIN', 1),
    accelZPin: envInt('ACCEL_Z_PIN', 2),
    vibrationPin: envInt('VIBRATION_PIN', 3),
  },

  // ──────────────────────────────────────────
  // 特征提取
  // ──────────────────────────────────────────

  featureExtraction: {
    /** 熵直方图最大分箱数 */
    maxHistogramBins: envInt('FEATURE_MAX_HISTOGRAM_BINS', 50),
    /** Shannon 熵对数底（默认自然对数） */
    entropyBase: envFloat('FEATURE_ENTROPY_BASE', Math.E),
  },

  // ──────────────────────────────────────────
  // RUL 预测
  // ──────────────────────────────────────────

  rul: {
    /** 模型工件路径（相对仓库根目录或绝对路径） */
    modelPath: env('RUL_MODEL_PATH', 'models/rul-model.json'),
    /** 模型输出的一个时间单位对应的分钟数 */
    minutesPerUnit: envFloat('RUL_MINUTES_PER_UNIT', 10),
    /** 触发特征提取与预测的最小批量 */
    minBatchSamples: envInt('RUL_MIN_BATCH_SAMPLES', 50),
  },
};

export type AppConfig = typeof config;
export type AcquisitionMode = (typeof ACQUISITION_MODES)[number];

/** 获取脱敏后的配置摘要（启动日志用） */
export function getConfigSummary(): Record<string, unknown> {
  return {
    app: { name: config.app.name, version: config.app.version, env: config.app.env, port: config.app.port },
    acquisition: { mode: config.acquisition.mode, batchSize: config.acquisition.batchSize },
    rul: { modelPath: config.rul.modelPath, minutesPerUnit: config.rul.minutesPerUnit },
  };
}
