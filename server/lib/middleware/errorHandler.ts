/**
 * 全局错误处理中间件
 *
 * 所有错误统一为 JSON：{ error, code, requestId, ... }
 *   - MonitorError     → 按错误码映射的 HTTP 状态
 *   - ZodError         → 400，error 取第一条 issue 的消息
 *   - 非法 JSON 请求体 → 400
 *   - 请求体过大       → 413
 *   - 其他             → 500
 */

import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { ErrorCode, NotFoundError, isMonitorError, wrapError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';

const log = createModuleLogger('http-error');

export const REQUEST_ID_HEADER = 'X-Request-ID';

export interface NormalizedError {
  status: number;
  body: {
    error: string;
    code: ErrorCode;
    [key: string]: unknown;
  };
  stack?: string;
}

/** body-parser 抛出的错误带有 type 字段 */
function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

/**
 * 将错误转换为 HTTP 状态与响应体
 */
export function normalizeError(error: unknown): NormalizedError {
  if (isMonitorError(error)) {
    const body: NormalizedError['body'] = { error: error.message, code: error.code };
    if (Object.keys(error.context).length > 0) body.context = error.context;
    return { status: error.httpStatus, body, stack: error.stack };
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
    return {
      status: 400,
      body: { error: issues[0]?.message ?? 'Invalid request', code: ErrorCode.VALIDATION, issues },
    };
  }

  switch (bodyParserErrorType(error)) {
    case 'entity.parse.failed':
      return { status: 400, body: { error: 'Request body is not valid JSON', code: ErrorCode.INVALID_INPUT } };
    case 'entity.too.large':
      return { status: 413, body: { error: 'Request body too large', code: ErrorCode.INVALID_INPUT } };
    default:
      break;
  }

  const wrapped = wrapError(error);
  return {
    status: wrapped.httpStatus,
    body: { error: wrapped.message, code: wrapped.code },
    stack: error instanceof Error ? error.stack : undefined,
  };
}

function requestIdOf(req: Request, res: Response): string {
  const fromLocals: unknown = res.locals.requestId;
  if (typeof fromLocals === 'string') return fromLocals;
  const header = req.headers[REQUEST_ID_HEADER.toLowerCase()];
  return typeof header === 'string' && header.length > 0 ? header : randomUUID();
}

/**
 * Express 错误处理中间件
 */
export function expressErrorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const requestId = requestIdOf(req, res);
  const { status, body, stack } = normalizeError(error);

  const logData = { requestId, method: req.method, path: req.path, status, code: body.code, error: body.error };
  if (status >= 500) {
    log.error({ ...logData, stack }, 'Request failed');
  } else {
    log.warn(logData, 'Request rejected');
  }

  res.setHeader(REQUEST_ID_HEADER, requestId);
  res.status(status).json({ ...body, requestId });
}

/**
 * 请求 ID 中间件：沿用调用方传入的 ID，否则生成
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = requestIdOf(req, res);
  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  next();
}

/**
 * 404 处理中间件：交给错误中间件统一输出
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
