/**
 * 统一错误体系
 * 分层错误类 + 错误码 + 自动 HTTP 状态码映射
 *
 * 使用方式：
 *   import { ValidationError, ModelUnavailableError } from '../core/errors';
 *   throw new ValidationError('Accelerometer data must have x, y, z fields', { field: 'accelerometer' });
 *   throw new MissingModelFeatureError(['B1_x_mean']);
 *
 * 退化输入（长度 ≤ 1、方差为 0 等）不是错误：特征提取通过显式前置条件
 * 选择定义好的回退值，不经过本文件。
 */

// ============================================
// 错误码枚举
// ============================================

export enum ErrorCode {
  // 通用错误 (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // 验证错误 (2xxx)
  VALIDATION = 2000,
  INVALID_INPUT = 2001,

  // 资源错误 (4xxx)
  NOT_FOUND = 4000,

  // 设备/传感器错误 (5xxx)
  SENSOR_READ_FAILED = 5100,

  // 模型错误 (9xxx)
  MODEL_UNAVAILABLE = 9000,
  MISSING_MODEL_FEATURE = 9001,
}

// 错误码到 HTTP 状态码的映射
const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.UNKNOWN]: 500,
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.SENSOR_READ_FAILED]: 502,
  [ErrorCode.MODEL_UNAVAILABLE]: 503,
  [ErrorCode.MISSING_MODEL_FEATURE]: 422,
};

// ============================================
// 基础错误类
// ============================================

export class MonitorError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Record<string, unknown> = {},
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code] ?? 500;
    this.context = context;
    this.timestamp = new Date().toISOString();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /** 序列化为 API 响应格式 */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================
// 具体错误类
// ============================================

/** 验证错误 */
export class ValidationError extends MonitorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.VALIDATION, context);
  }
}

/** 资源未找到 */
export class NotFoundError extends MonitorError {
  constructor(resource: string, id?: string | number, context: Record<string, unknown> = {}) {
    const msg = id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`;
    super(msg, ErrorCode.NOT_FOUND, { resource, id, ...context });
  }
}

/**
 * 传感器读取失败
 * 采集循环在本地恢复（沿用该通道最近一次读数，没有则为 0），从不中止采集
 */
export class SensorReadError extends MonitorError {
  constructor(channel: string, message: string, context: Record<string, unknown> = {}) {
    super(`Sensor read failed on ${channel}: ${message}`, ErrorCode.SENSOR_READ_FAILED, { channel, ...context });
  }
}

/**
 * 模型不可用（启动时加载失败）
 * 进入常驻降级模式：此后所有预测请求直接报告失败，不重试
 */
export class ModelUnavailableError extends MonitorError {
  constructor(message = 'Model not loaded on server.', context: Record<string, unknown> = {}) {
    super(message, ErrorCode.MODEL_UNAVAILABLE, context);
  }
}

/** 模型输入 schema 引用了特征向量中不存在的列（仅本次预测失败） */
export class MissingModelFeatureError extends MonitorError {
  public readonly missing: string[];

  constructor(missing: string[], context: Record<string, unknown> = {}) {
    const preview = missing.slice(0, 8).join(', ') + (missing.length > 8 ? ', ...' : '');
    super(`Missing features for scaler: ${preview}`, ErrorCode.MISSING_MODEL_FEATURE, { missing, ...context });
    this.missing = missing;
  }
}

// ============================================
// 错误处理工具
// ============================================

/** 判断是否为 MonitorError */
export function isMonitorError(err: unknown): err is MonitorError {
  return err instanceof MonitorError;
}

/** 将未知错误包装为 MonitorError */
export function wrapError(err: unknown, context: Record<string, unknown> = {}): MonitorError {
  if (isMonitorError(err)) return err;

  if (err instanceof Error) {
    return new MonitorError(err.message, ErrorCode.INTERNAL, {
      originalName: err.name,
      ...context,
    });
  }

  return new MonitorError(String(err), ErrorCode.UNKNOWN, context);
}
