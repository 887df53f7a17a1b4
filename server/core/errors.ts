/**
 * 统一错误体系
 * 分层错误类 + 错误码
 *
 * 使用方式：
 *   import { ChannelNotFoundError, InvalidWindowError } from '../core/errors';
 *   throw new ChannelNotFoundError('analog', 'VA');
 *   throw new InvalidWindowError(windowSize, samples.length);
 *
 * 分析引擎把这些错误转换为 status = 'failed' 的输出，单个通道失败不影响其它通道。
 */

// ============================================
// 错误码枚举
// ============================================

export enum ErrorCode {
  // 通用错误 (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  NOT_IMPLEMENTED = 1002,

  // 验证错误 (2xxx)
  VALIDATION = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED = 2002,
  OUT_OF_RANGE = 2004,
  INVALID_WINDOW = 2010,
  INVALID_REFERENCE = 2011,

  // 资源错误 (4xxx)
  NOT_FOUND = 4000,
  CHANNEL_NOT_FOUND = 4010,

  // 数据错误 (8xxx)
  DATA_INTEGRITY = 8000,
  INSUFFICIENT_DATA = 8010,
}

// ============================================
// 基础错误类
// ============================================

export class AnalysisError extends Error {
  public readonly code: ErrorCode;
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
    this.context = context;
    this.timestamp = new Date().toISOString();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /** 错误码的符号名，例如 'CHANNEL_NOT_FOUND' */
  get codeName(): string {
    return ErrorCode[this.code];
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      codeName: this.codeName,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================
// 具体错误类
// ============================================

/** 参数验证错误 */
export class ValidationError extends AnalysisError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.VALIDATION, context);
  }
}

/** 资源未找到（分析器等） */
export class NotFoundError extends AnalysisError {
  constructor(resource: string, id?: string | number, context: Record<string, unknown> = {}) {
    const msg = id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`;
    super(msg, ErrorCode.NOT_FOUND, { resource, id, ...context });
  }
}

export type ChannelKind = 'analog' | 'digital';

/** 录波中不存在该通道 */
export class ChannelNotFoundError extends AnalysisError {
  constructor(kind: ChannelKind, channelId: string, context: Record<string, unknown> = {}) {
    super(`${kind} channel '${channelId}' not found`, ErrorCode.CHANNEL_NOT_FOUND, { kind, channelId, ...context });
  }
}

/** 窗口长度越界：<= 0、非整数或超过样本数 */
export class InvalidWindowError extends AnalysisError {
  constructor(windowSize: number, sampleCount: number, context: Record<string, unknown> = {}) {
    super(
      `Invalid window size ${windowSize} for ${sampleCount} samples`,
      ErrorCode.INVALID_WINDOW,
      { windowSize, sampleCount, ...context },
    );
  }
}

/** 参考量越界：额定电压 <= 0、参考时刻不在时间轴范围内 */
export class InvalidReferenceError extends AnalysisError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.INVALID_REFERENCE, context);
  }
}

/** 样本不足以完成显式请求的分析 */
export class InsufficientDataError extends AnalysisError {
  constructor(required: number, available: number, context: Record<string, unknown> = {}) {
    super(
      `Insufficient data: ${required} samples required, ${available} available`,
      ErrorCode.INSUFFICIENT_DATA,
      { required, available, ...context },
    );
  }
}

/** 录波结构不一致（通道长度与时间轴不符等） */
export class DataIntegrityError extends AnalysisError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.DATA_INTEGRITY, context, false); // 非运营性错误
  }
}

// ============================================
// 错误处理工具
// ============================================

export function isAnalysisError(err: unknown): err is AnalysisError {
  return err instanceof AnalysisError;
}

/** 判断是否为可恢复的运营性错误 */
export function isOperationalError(err: unknown): boolean {
  if (isAnalysisError(err)) return err.isOperational;
  return false;
}

/** 将未知错误包装为 AnalysisError */
export function wrapError(err: unknown, context: Record<string, unknown> = {}): AnalysisError {
  if (isAnalysisError(err)) return err;

  if (err instanceof Error) {
    return new AnalysisError(err.message, ErrorCode.INTERNAL, {
      originalName: err.name,
      stack: err.stack,
      ...context,
    });
  }

  return new AnalysisError(String(err), ErrorCode.UNKNOWN, context);
}

export type SafeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AnalysisError };

/** 同步执行并捕获错误，失败时返回包装后的 AnalysisError */
export function safeExec<T>(
  fn: () => T,
  context: Record<string, unknown> = {},
): SafeResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    return { ok: false, error: wrapError(err, context) };
  }
}
