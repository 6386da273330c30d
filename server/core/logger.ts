/**
 * 统一日志框架
 * 基于自定义 Logger 的结构化日志系统，替代散落的 console.log
 *
 * 输出模式：
 *   - 开发环境：彩色单行输出（时间 / 级别 / 模块 / 消息 / 附加字段）
 *   - 生产环境：JSON Lines，error/fatal 写入 stderr，其余写入 stdout
 *
 * 使用方式：
 *   import { logger, createModuleLogger } from '../core/logger';
 *   const log = createModuleLogger('acquisition');
 *   log.info({ batchSize }, 'Batch posted');
 *   log.error({ err }, 'Sensor read failed');
 */

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

interface LogEntry {
  level: LogLevel;
  module: string;
  timestamp: string;
  message: string;
  [key: string]: unknown;
}

interface LoggerOptions {
  level?: LogLevel;
  module?: string;
  pretty?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',   // gray
  debug: '\x1b[36m',   // cyan
  info: '\x1b[32m',    // green
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
  fatal: '\x1b[35m',   // magenta
};

const RESET = '\x1b[0m';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/** 将 Error 展开为可序列化对象（JSON.stringify 会丢失 message/stack） */
function serializeErrors(extra: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(extra)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
  }
  return out;
}

// ============================================
// Logger 核心类
// ============================================

class Logger {
  /** 仅当显式传入 level 时固化，否则动态跟随 globalLevel */
  private overrideLevel: number | null;
  private module: string;
  private pretty: boolean;
  // logger 是最早初始化的模块，在 config 加载之前就可能被使用，因此直接读取 process.env
  private static globalLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';
  private static logBuffer: LogEntry[] = [];
  private static maxBufferSize = parseInt(process.env.LOG_BUFFER_SIZE || '1000', 10);
  private static listeners: Array<(entry: LogEntry) => void> = [];

  constructor(options: LoggerOptions = {}) {
    this.overrideLevel = options.level ? LOG_LEVELS[options.level] : null;
    this.module = options.module || 'app';
    this.pretty = options.pretty ?? (process.env.NODE_ENV !== 'production');
  }

  /** 动态计算当前有效级别 */
  private get effectiveLevel(): number {
    return this.overrideLevel ?? LOG_LEVELS[Logger.globalLevel];
  }

  /** 设置全局日志级别 */
  static setGlobalLevel(level: LogLevel): void {
    Logger.globalLevel = level;
  }

  /** 注册日志监听器（用于日志聚合/告警） */
  static addListener(fn: (entry: LogEntry) => void): () => void {
    Logger.listeners.push(fn);
    return () => {
      Logger.listeners = Logger.listeners.filter(l => l !== fn);
    };
  }

  /** 获取最近的日志缓冲区（用于诊断） */
  static getRecentLogs(count = 100): LogEntry[] {
    return Logger.logBuffer.slice(-count);
  }

  /** 创建子日志器（继承模块前缀） */
  child(subModule: string): Logger {
    return new Logger({
      module: `${this.module}:${subModule}`,
      pretty: this.pretty,
    });
  }

  trace(data: Record<string, unknown> | string, message?: string | unknown): void {
    this.log('trace', data, message);
  }

  debug(data: Record<string, unknown> | string, message?: string | unknown): void {
    this.log('debug', data, message);
  }

  info(data: Record<string, unknown> | string, message?: string | unknown): void {
    this.log('info', data, message);
  }

  warn(data: Record<string, unknown> | string, message?: string | unknown): void {
    this.log('warn', data, message);
  }

  error(data: Record<string, unknown> | string, message?: string | unknown): void {
    this.log('error', data, message);
  }

  fatal(data: Record<string, unknown> | string, message?: string | unknown): void {
    this.log('fatal', data, message);
  }

  private log(level: LogLevel, data: Record<string, unknown> | string, message?: string | unknown): void {
    if (LOG_LEVELS[level] < this.effectiveLevel) return;

    const timestamp = new Date().toISOString();
    let msg: string;
    let extra: Record<string, unknown> = {};

    if (typeof data === 'string') {
      msg = data;
      // 第二参数是非字符串值（如 Error 对象）时附加到 extra
      if (message !== undefined && typeof message !== 'string') {
        extra = { err: message };
      }
    } else {
      msg = typeof message === 'string' ? message : (message !== undefined ? String(message) : '');
      extra = data;
    }

    const entry: LogEntry = {
      level,
      module: this.module,
      timestamp,
      message: msg,
      ...serializeErrors(extra),
    };

    Logger.logBuffer.push(entry);
    if (Logger.logBuffer.length > Logger.maxBufferSize) {
      Logger.logBuffer = Logger.logBuffer.slice(-Math.floor(Logger.maxBufferSize * 0.6));
    }

    for (const listener of Logger.listeners) {
      try {
        listener(entry);
      } catch (listenerErr) {
        // 监听器异常不能影响日志主路径，仅回显到 stderr
        process.stderr.write(`[logger] listener failed: ${String(listenerErr)}\n`);
      }
    }

    if (this.pretty) {
      this.prettyPrint(level, timestamp, msg, extra);
    } else {
      const output = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
      output.write(JSON.stringify(entry) + '\n');
    }
  }

  private prettyPrint(
    level: LogLevel,
    timestamp: string,
    msg: string,
    extra: Record<string, unknown>,
  ): void {
    const color = LEVEL_COLORS[level];
    const time = timestamp.slice(11, 23); // HH:mm:ss.SSS
    const levelStr = level.toUpperCase().padEnd(5);
    const moduleStr = `[${this.module}]`;

    let extraStr = '';
    if (Object.keys(extra).length > 0) {
      const { err, ...rest } = extra;
      if (err instanceof Error) {
        extraStr = `\n  ${err.stack || err.message}`;
        if (Object.keys(rest).length > 0) {
          extraStr += `\n  ${JSON.stringify(rest)}`;
        }
      } else {
        extraStr = ` ${JSON.stringify(serializeErrors(extra))}`;
      }
    }

    const output = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
    output.write(`${color}${time} ${levelStr}${RESET} ${moduleStr} ${msg}${extraStr}\n`);
  }
}

// ============================================
// 导出 API
// ============================================

/** 全局根日志器 */
export const logger = new Logger({ module: 'rul-monitor' });

/** 创建模块级日志器 */
export function createModuleLogger(module: string): Logger {
  return new Logger({ module });
}

/** 设置全局日志级别 */
export function setLogLevel(level: LogLevel): void {
  Logger.setGlobalLevel(level);
}

/** 注册日志监听器 */
export function addLogListener(fn: (entry: LogEntry) => void): () => void {
  return Logger.addListener(fn);
}

/** 获取最近日志（诊断用） */
export function getRecentLogs(count?: number): LogEntry[] {
  return Logger.getRecentLogs(count);
}

export { Logger, isLogLevel };
export type { LogLevel, LogEntry };
