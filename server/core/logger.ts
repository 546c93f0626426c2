/**
 * 统一日志框架
 * 结构化日志系统，替代散落的 console.log
 *
 * 使用方式：
 *   import { logger, createModuleLogger } from '../core/logger';
 *   const log = createModuleLogger('inference-engine');
 *   log.info({ rules: 9 }, 'Inference engine initialized');
 *   log.error({ err }, 'Rule base validation failed');
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
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function bootLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  return isLogLevel(raw) ? raw : 'info';
}

// ============================================
// Logger 核心类
// ============================================

class Logger {
  /** 仅当显式传入 level 时固化，否则动态跟随 globalLevel */
  private overrideLevel: number | null;
  private module: string;
  private pretty: boolean;
  // logger 在 config 加载之前就可能被使用，这里直接读取 process.env 作为引导 fallback
  private static globalLevel: LogLevel = bootLevel();
  private static logBuffer: LogEntry[] = [];
  // 内存缓冲区仅用于诊断和测试，生产环境应通过 addListener 转发
  private static maxBufferSize = parseInt(process.env.LOG_BUFFER_SIZE || '1000', 10);
  private static listeners: Array<(entry: LogEntry) => void> = [];

  constructor(options: LoggerOptions = {}) {
    this.overrideLevel = options.level ? LOG_LEVELS[options.level] : null;
    this.module = options.module || 'fis';
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

  static getGlobalLevel(): LogLevel {
    return Logger.globalLevel;
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

  trace(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('trace', data, message);
  }

  debug(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('debug', data, message);
  }

  info(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('info', data, message);
  }

  warn(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('warn', data, message);
  }

  error(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('error', data, message);
  }

  fatal(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('fatal', data, message);
  }

  private log(level: LogLevel, data: Record<string, unknown> | string, message?: unknown): void {
    if (LOG_LEVELS[level] < this.effectiveLevel) return;

    const timestamp = new Date().toISOString();
    let msg: string;
    let extra: Record<string, unknown> = {};

    if (typeof data === 'string') {
      msg = data;
      // 第二参数是非字符串值（如 Error 对象）时附加到 extra
      if (message !== undefined && typeof message !== 'string') {
        extra = { err: message instanceof Error ? { message: message.message, stack: message.stack } : message };
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
      ...extra,
    };

    Logger.logBuffer.push(entry);
    if (Logger.logBuffer.length > Logger.maxBufferSize) {
      Logger.logBuffer = Logger.logBuffer.slice(-Math.floor(Logger.maxBufferSize * 0.6));
    }

    for (const listener of Logger.listeners) {
      try {
        listener(entry);
      } catch (err) {
        // 监听器异常不能反过来走 logger，否则会递归
        process.stderr.write(`[logger] listener failed: ${err instanceof Error ? err.message : String(err)}\n`);
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
        extraStr = ` ${JSON.stringify(extra)}`;
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
export const logger = new Logger({ module: 'fis' });

/** 创建模块级日志器 */
export function createModuleLogger(module: string): Logger {
  return new Logger({ module });
}

/** 设置全局日志级别 */
export function setLogLevel(level: LogLevel): void {
  Logger.setGlobalLevel(level);
}

export function getLogLevel(): LogLevel {
  return Logger.getGlobalLevel();
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
