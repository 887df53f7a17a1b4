/**
 * 统一日志框架
 * 结构化日志：模块前缀 + 级别过滤 + 监听器 + 最近日志缓冲区
 *
 * 使用方式：
 *   import { createModuleLogger } from '../core/logger';
 *   const log = createModuleLogger('sag-detector');
 *   log.debug({ channelId, windowSize }, 'RMS series computed');
 *   log.warn({ err }, 'Analysis failed');
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

// logger 在 config 加载之前就可能被使用，这里直接读取 process.env 作为引导值
function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

// ============================================
// Logger 核心类
// ============================================

class Logger {
  /** 显式传入 level 时固化，否则动态跟随 globalLevel */
  private overrideLevel: number | null;
  private module: string;
  private pretty: boolean;
  private static globalLevel: LogLevel = initialLevel();
  private static logBuffer: LogEntry[] = [];
  private static maxBufferSize = parseInt(process.env.LOG_BUFFER_SIZE || '1000', 10);
  private static listeners: Array<(entry: LogEntry) => void> = [];

  constructor(options: LoggerOptions = {}) {
    this.overrideLevel = options.level ? LOG_LEVELS[options.level] : null;
    this.module = options.module || 'app';
    this.pretty = options.pretty ?? (process.env.NODE_ENV !== 'production');
  }

  private get effectiveLevel(): number {
    return this.overrideLevel ?? LOG_LEVELS[Logger.globalLevel];
  }

  static setGlobalLevel(level: LogLevel): void {
    Logger.globalLevel = level;
  }

  static getGlobalLevel(): LogLevel {
    return Logger.globalLevel;
  }

  /** 注册日志监听器（用于日志聚合/测试断言） */
  static addListener(fn: (entry: LogEntry) => void): () => void {
    Logger.listeners.push(fn);
    return () => {
      Logger.listeners = Logger.listeners.filter(l => l !== fn);
    };
  }

  static getRecentLogs(count = 100): LogEntry[] {
    return Logger.logBuffer.slice(-count);
  }

  static clearBuffer(): void {
    Logger.logBuffer = [];
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
      // 第二参数为非字符串值（如 Error）时附加到 extra
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
        // 监听器异常不能影响日志输出本身，改写到 stderr
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
      if (extra.err instanceof Error) {
        extraStr = `\n  ${extra.err.stack || extra.err.message}`;
        const { err: _err, ...rest } = extra;
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
export const logger = new Logger({ module: 'disturbance' });

/** 创建模块级日志器 */
export function createModuleLogger(module: string): Logger {
  return new Logger({ module });
}

export function setLogLevel(level: LogLevel): void {
  Logger.setGlobalLevel(level);
}

export function addLogListener(fn: (entry: LogEntry) => void): () => void {
  return Logger.addListener(fn);
}

/** 获取最近日志（诊断用） */
export function getRecentLogs(count?: number): LogEntry[] {
  return Logger.getRecentLogs(count);
}

export { Logger, isLogLevel, LOG_LEVELS };
export type { LogLevel, LogEntry };
