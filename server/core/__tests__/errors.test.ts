/**
 * errors.ts 单元测试
 */
import { describe, it, expect } from 'vitest';
import {
  MonitorError, ErrorCode,
  ValidationError, NotFoundError, SensorReadError,
  ModelUnavailableError, MissingModelFeatureError,
  isMonitorError, wrapError,
} from '../errors';

describe('MonitorError 基础类', () => {
  it('默认错误码为 UNKNOWN', () => {
    const err = new MonitorError('test');
    expect(err.code).toBe(ErrorCode.UNKNOWN);
    expect(err.httpStatus).toBe(500);
    expect(err.isOperational).toBe(true);
    expect(err.message).toBe('test');
    expect(err.timestamp).toBeTruthy();
  });

  it('支持自定义错误码和上下文', () => {
    const err = new MonitorError('test', ErrorCode.VALIDATION, { field: 'vib_data' });
    expect(err.code).toBe(ErrorCode.VALIDATION);
    expect(err.httpStatus).toBe(400);
    expect(err.context).toEqual({ field: 'vib_data' });
  });

  it('toJSON 序列化正确', () => {
    const err = new MonitorError('test', ErrorCode.NOT_FOUND, { id: 'AIN2' });
    const json = err.toJSON();
    expect(json.error).toBe('MonitorError');
    expect(json.code).toBe(ErrorCode.NOT_FOUND);
    expect(json.message).toBe('test');
    expect(json.context).toEqual({ id: 'AIN2' });
    expect(json.timestamp).toBe(err.timestamp);
  });
});

describe('具体错误类', () => {
  it('ValidationError → 400', () => {
    const err = new ValidationError('Request must be JSON', { field: 'body' });
    expect(err.httpStatus).toBe(400);
    expect(err.code).toBe(ErrorCode.VALIDATION);
    expect(err.name).toBe('ValidationError');
  });

  it('NotFoundError 带 resource 和 id', () => {
    const err = new NotFoundError('Route', 'GET /dashboard');
    expect(err.message).toBe("Route 'GET /dashboard' not found");
    expect(err.httpStatus).toBe(404);
    expect(err.context).toEqual({ resource: 'Route', id: 'GET /dashboard' });
  });

  it('NotFoundError 不带 id', () => {
    expect(new NotFoundError('Model artifact').message).toBe('Model artifact not found');
  });

  it('SensorReadError 标注通道 → 502', () => {
    const err = new SensorReadError('AIN1', 'device busy', { path: '/dev/iio' });
    expect(err.message).toBe('Sensor read failed on AIN1: device busy');
    expect(err.httpStatus).toBe(502);
    expect(err.context).toEqual({ channel: 'AIN1', path: '/dev/iio' });
  });

  it('ModelUnavailableError 默认消息 → 503', () => {
    const err = new ModelUnavailableError();
    expect(err.message).toBe('Model not loaded on server.');
    expect(err.httpStatus).toBe(503);
    expect(err.code).toBe(ErrorCode.MODEL_UNAVAILABLE);
  });

  it('MissingModelFeatureError 超过 8 列时截断预览 → 422', () => {
    const missing = Array.from({ length: 10 }, (_, i) => `c${i}`);
    const err = new MissingModelFeatureError(missing);
    expect(err.message).toBe('Missing features for scaler: c0, c1, c2, c3, c4, c5, c6, c7, ...');
    expect(err.missing).toHaveLength(10);
    expect(err.httpStatus).toBe(422);
  });

  it('子类保持 instanceof 链', () => {
    const err = new SensorReadError('AIN0', 'x');
    expect(err).toBeInstanceOf(MonitorError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('SensorReadError');
  });
});

describe('工具函数', () => {
  it('isMonitorError 区分体系内外错误', () => {
    expect(isMonitorError(new ValidationError('x'))).toBe(true);
    expect(isMonitorError(new Error('x'))).toBe(false);
    expect(isMonitorError('x')).toBe(false);
  });

  it('wrapError 原样返回 MonitorError', () => {
    const err = new ModelUnavailableError();
    expect(wrapError(err)).toBe(err);
  });

  it('wrapError 包装普通 Error 为 INTERNAL', () => {
    const wrapped = wrapError(new RangeError('out of range'), { op: 'predict' });
    expect(wrapped.code).toBe(ErrorCode.INTERNAL);
    expect(wrapped.httpStatus).toBe(500);
    expect(wrapped.message).toBe('out of range');
    expect(wrapped.context).toEqual({ originalName: 'RangeError', op: 'predict' });
  });

  it('wrapError 包装非 Error 值为 UNKNOWN', () => {
    const wrapped = wrapError(42);
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN);
    expect(wrapped.message).toBe('42');
  });
});
