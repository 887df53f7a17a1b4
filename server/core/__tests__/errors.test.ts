/**
 * errors.ts 单元测试
 */
import { describe, it, expect } from 'vitest';
import {
  AnalysisError, ErrorCode,
  ValidationError, NotFoundError, ChannelNotFoundError,
  InvalidWindowError, InvalidReferenceError, InsufficientDataError, DataIntegrityError,
  isAnalysisError, isOperationalError, wrapError, safeExec,
} from '../errors';

describe('AnalysisError 基础类', () => {
  it('默认错误码为 UNKNOWN', () => {
    const err = new AnalysisError('test');
    expect(err.code).toBe(ErrorCode.UNKNOWN);
    expect(err.codeName).toBe('UNKNOWN');
    expect(err.isOperational).toBe(true);
    expect(err.message).toBe('test');
    expect(err.name).toBe('AnalysisError');
    expect(err.timestamp).toBeTruthy();
  });

  it('toJSON 序列化正确', () => {
    const json = new AnalysisError('test', ErrorCode.NOT_FOUND, { id: '123' }).toJSON();
    expect(json.error).toBe('AnalysisError');
    expect(json.code).toBe(4000);
    expect(json.codeName).toBe('NOT_FOUND');
    expect(json.message).toBe('test');
    expect(json.context).toEqual({ id: '123' });
  });
});

describe('具体错误类', () => {
  it('ValidationError', () => {
    const err = new ValidationError('bad ratio', { sagRatio: 2 });
    expect(err).toBeInstanceOf(AnalysisError);
    expect(err.code).toBe(ErrorCode.VALIDATION);
    expect(err.name).toBe('ValidationError');
  });

  it('NotFoundError 带与不带标识', () => {
    expect(new NotFoundError('analyzer', 'fft').message).toBe("analyzer 'fft' not found");
    expect(new NotFoundError('analyzer').message).toBe('analyzer not found');
  });

  it('ChannelNotFoundError', () => {
    const err = new ChannelNotFoundError('digital', 'TRIP');
    expect(err.message).toBe("digital channel 'TRIP' not found");
    expect(err.codeName).toBe('CHANNEL_NOT_FOUND');
    expect(err.context).toEqual({ kind: 'digital', channelId: 'TRIP' });
  });

  it('InvalidWindowError', () => {
    const err = new InvalidWindowError(0, 10);
    expect(err.message).toBe('Invalid window size 0 for 10 samples');
    expect(err.context).toEqual({ windowSize: 0, sampleCount: 10 });
  });

  it('InvalidReferenceError / InsufficientDataError', () => {
    expect(new InvalidReferenceError('out of range').code).toBe(ErrorCode.INVALID_REFERENCE);
    expect(new InsufficientDataError(1, 0).message).toBe('Insufficient data: 1 samples required, 0 available');
  });

  it('DataIntegrityError 是非运营性错误', () => {
    const err = new DataIntegrityError('corrupt');
    expect(err.isOperational).toBe(false);
    expect(isOperationalError(err)).toBe(false);
  });
});

describe('错误处理工具', () => {
  it('isAnalysisError', () => {
    expect(isAnalysisError(new ValidationError('x'))).toBe(true);
    expect(isAnalysisError(new Error('x'))).toBe(false);
    expect(isAnalysisError('x')).toBe(false);
  });

  it('isOperationalError 对普通 Error 返回 false', () => {
    expect(isOperationalError(new ValidationError('x'))).toBe(true);
    expect(isOperationalError(new Error('x'))).toBe(false);
  });

  it('wrapError 保留 AnalysisError 原样', () => {
    const err = new InvalidWindowError(5, 0);
    expect(wrapError(err)).toBe(err);
  });

  it('wrapError 将普通 Error 包装为 INTERNAL', () => {
    const wrapped = wrapError(new TypeError('boom'), { analyzerId: 'voltage_sag' });
    expect(wrapped.code).toBe(ErrorCode.INTERNAL);
    expect(wrapped.message).toBe('boom');
    expect(wrapped.context).toMatchObject({ originalName: 'TypeError', analyzerId: 'voltage_sag' });
  });

  it('wrapError 将非 Error 值包装为 UNKNOWN', () => {
    const wrapped = wrapError('string error');
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN);
    expect(wrapped.message).toBe('string error');
  });

  it('safeExec 成功时返回值', () => {
    expect(safeExec(() => 42)).toEqual({ ok: true, value: 42 });
  });

  it('safeExec 失败时返回包装后的错误', () => {
    const result = safeExec(() => {
      throw new ChannelNotFoundError('analog', 'VA');
    });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.codeName).toBe('CHANNEL_NOT_FOUND');
  });
});
