/**
 * CT 饱和检测测试
 *
 * 信号：幅值 100 的 60 Hz 正弦，200..259 点被削平为 150（平顶）
 * 正常正弦 8 点窗口的归一化变化率约 0.24，平顶段为 0
 */
import { describe, it, expect } from 'vitest';
import { detectSaturation, windowVariability } from './ctSaturation';
import { InvalidWindowError, ValidationError } from '../../core/errors';
import { timeBase } from '../../__tests__/waveforms';

const N = 400;
const time = timeBase(N);
const clipped = time.map((t, i) => (i >= 200 && i < 260 ? 150 : 100 * Math.sin(2 * Math.PI * 60 * t)));
const options = { windowSize: 8, flatnessThreshold: 0.05, highCurrentThreshold: 120 };

describe('windowVariability', () => {
  it('常量窗口变化率为 0，峰值为绝对值', () => {
    const out = windowVariability([-5, -5, -5, -5], [0, 1, 2, 3], 3);
    expect(out).toEqual([
      { time: 2, variability: 0, peak: 5 },
      { time: 3, variability: 0, peak: 5 },
    ]);
  });

  it('全零窗口的变化率取 0', () => {
    expect(windowVariability([0, 0, 0], [0, 1, 2], 3)).toEqual([{ time: 2, variability: 0, peak: 0 }]);
  });

  it('rms(逐点差分) / 峰值', () => {
    // 差分 [2, -2]，rms = 2，峰值 2
    const [w] = windowVariability([0, 2, 0], [0, 1, 2], 3);
    expect(w.variability).toBe(1);
  });
});

describe('detectSaturation', () => {
  it('高电流平顶段被标记为一次饱和', () => {
    const events = detectSaturation(clipped, time, { ...options, channelId: 'IA' });

    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event.kind).toBe('saturation');
    expect(event.startTime).toBe(0.207);
    expect(event.endTime).toBe(0.259);
    expect(event.minVariability).toBe(0);
    expect(event.severity).toBe(1);
    expect(event.peakCurrent).toBe(150);
    expect(event.label).toBe("Potential CT saturation on 'IA' from 0.2070s to 0.2590s (severity 1.00, peak 150.00)");
  });

  it('正常正弦没有饱和特征', () => {
    const clean = time.map(t => 100 * Math.sin(2 * Math.PI * 60 * t));
    expect(detectSaturation(clean, time, { ...options, highCurrentThreshold: 0 })).toEqual([]);
  });

  it('平顶峰值不高于电流阈值时不判定饱和', () => {
    expect(detectSaturation(clipped, time, { ...options, highCurrentThreshold: 150 })).toEqual([]);
  });

  it('样本少于一个窗口时返回空数组', () => {
    expect(detectSaturation([1, 2], [0, 1], options)).toEqual([]);
  });

  it('窗口小于 3 时抛出 InvalidWindowError', () => {
    expect(() => detectSaturation(clipped, time, { ...options, windowSize: 2 })).toThrow(InvalidWindowError);
  });

  it('阈值非法时抛出 ValidationError', () => {
    expect(() => detectSaturation(clipped, time, { ...options, flatnessThreshold: 0 })).toThrow(ValidationError);
    expect(() => detectSaturation(clipped, time, { ...options, highCurrentThreshold: -1 })).toThrow(ValidationError);
  });
});
