/**
 * 电压暂降 / 暂升检测测试
 *
 * 信号：60 Hz @ 1 kHz，RMS 窗口 50 点（整 3 周波），额定 120 V
 */
import { describe, it, expect } from 'vitest';
import { detectSags, detectSwells } from './sagSwell';
import { InvalidReferenceError, InvalidWindowError, ValidationError } from '../../core/errors';
import { sine, timeBase } from '../../__tests__/waveforms';

const N = 1000;
const time = timeBase(N);

describe('detectSags', () => {
  const sagged = sine(N, 60, i => (i >= 400 && i < 600 ? 80 : 120));

  it('检测到一次暂降，时间取 RMS 窗口右边沿', () => {
    const sags = detectSags(sagged, time, { nominalVoltage: 120, sagRatio: 0.8, windowSize: 50, channelId: 'VA' });

    expect(sags).toHaveLength(1);
    const [sag] = sags;
    expect(sag.kind).toBe('sag');
    expect(sag.channelId).toBe('VA');
    expect(sag.startTime).toBe(0.431);
    expect(sag.endTime).toBe(0.618);
    expect(sag.duration).toBeCloseTo(0.187, 9);
    expect(sag.minimumMagnitude).toBeCloseTo(80, 6);
    expect(sag.threshold).toBe(96);
    expect(sag.label).toBe("Voltage sag on 'VA' from 0.4310s to 0.6180s (min RMS 80.00, threshold 96.00)");
  });

  it('120 V 恒定幅值在 400 点降到 80 V 持续 200 点，单点窗口', () => {
    const step = Array.from({ length: N }, (_, i) => (i >= 400 && i < 600 ? 80 : 120));
    const sags = detectSags(step, time, { nominalVoltage: 120, sagRatio: 0.8, windowSize: 1 });

    expect(sags.map(s => [s.startTime, s.endTime, s.minimumMagnitude])).toEqual([[0.4, 0.599, 80]]);
  });

  it('默认参数：比例 0.8、窗口 50', () => {
    const sags = detectSags(sagged, time, { nominalVoltage: 120 });
    expect(sags).toHaveLength(1);
    expect(sags[0].startTime).toBe(0.431);
    expect(sags[0].label).toBe('Voltage sag from 0.4310s to 0.6180s (min RMS 80.00, threshold 96.00)');
  });

  it('平稳信号没有暂降', () => {
    expect(detectSags(sine(N, 60, () => 120), time, { nominalVoltage: 120 })).toEqual([]);
  });

  it('录波结束时仍未恢复的暂降在最后一点关闭', () => {
    const tail = sine(N, 60, i => (i >= 800 ? 50 : 120));
    const sags = detectSags(tail, time, { nominalVoltage: 120 });
    expect(sags).toHaveLength(1);
    expect(sags[0].startTime).toBe(0.821);
    expect(sags[0].endTime).toBe(0.999);
    expect(sags[0].minimumMagnitude).toBeCloseTo(50, 6);
  });

  it('样本少于一个窗口或为空时返回空数组', () => {
    expect(detectSags([1, 2, 3], [0, 0.001, 0.002], { nominalVoltage: 120, windowSize: 50 })).toEqual([]);
    expect(detectSags([], [], { nominalVoltage: 120 })).toEqual([]);
  });

  it('额定电压不为正时抛出 InvalidReferenceError', () => {
    expect(() => detectSags(sagged, time, { nominalVoltage: 0 })).toThrow(InvalidReferenceError);
    expect(() => detectSags(sagged, time, { nominalVoltage: -120 })).toThrow('Nominal voltage must be positive, got -120');
  });

  it('窗口非正整数时抛出 InvalidWindowError', () => {
    expect(() => detectSags(sagged, time, { nominalVoltage: 120, windowSize: 0 })).toThrow(InvalidWindowError);
    expect(() => detectSags(sagged, time, { nominalVoltage: 120, windowSize: 2.5 })).toThrow(InvalidWindowError);
  });

  it('暂降比例不在 (0, 1] 时抛出 ValidationError', () => {
    expect(() => detectSags(sagged, time, { nominalVoltage: 120, sagRatio: 1.2 })).toThrow(ValidationError);
    expect(() => detectSags(sagged, time, { nominalVoltage: 120, sagRatio: 0 })).toThrow(ValidationError);
  });

  it('样本数与时间轴不一致时抛出 ValidationError', () => {
    expect(() => detectSags(sagged, time.slice(1), { nominalVoltage: 120 })).toThrow(ValidationError);
  });
});

describe('detectSwells', () => {
  const swelled = sine(N, 60, i => (i >= 400 && i < 600 ? 140 : 120));

  it('检测到一次暂升并记录区段最大值', () => {
    const swells = detectSwells(swelled, time, { nominalVoltage: 120, channelId: 'VA' });

    expect(swells).toHaveLength(1);
    const [swell] = swells;
    expect(swell.kind).toBe('swell');
    expect(swell.startTime).toBe(0.429);
    expect(swell.endTime).toBe(0.62);
    expect(swell.maximumMagnitude).toBeCloseTo(140, 6);
    expect(swell.threshold).toBe(132);
    expect(swell.label).toBe("Voltage swell on 'VA' from 0.4290s to 0.6200s (max RMS 140.00, threshold 132.00)");
  });

  it('暂降信号不产生暂升', () => {
    const sagged = sine(N, 60, i => (i >= 400 && i < 600 ? 80 : 120));
    expect(detectSwells(sagged, time, { nominalVoltage: 120 })).toEqual([]);
  });

  it('暂升比例不大于 1 时抛出 ValidationError', () => {
    expect(() => detectSwells(swelled, time, { nominalVoltage: 120, swellRatio: 1 })).toThrow(
      'Swell ratio must be greater than 1, got 1',
    );
  });
});
