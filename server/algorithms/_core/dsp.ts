/**
 * DSP 工具库：录波分析用的基础数值函数
 *
 * 提供滑动窗口 RMS、RMS 与峰值、逐点差分、过零点定位
 * 所有检测器的底层数学计算依赖此模块；全部为纯函数。
 *
 * 参考标准:
 * - IEC 61000-4-30 电能质量测量方法（RMS 计算）
 * - IEEE 1159 电能质量监测
 */

import { InvalidWindowError, ValidationError } from '../../core/errors';

// ============================================================
// 1. 统计函数
// ============================================================

export function rms(data: readonly number[]): number {
  return Math.sqrt(data.reduce((s, v) => s + v * v, 0) / data.length);
}

/** 绝对值峰值；大数组上避免 Math.max(...spread) 的栈溢出 */
export function peak(data: readonly number[]): number {
  let p = 0;
  for (const v of data) {
    const a = Math.abs(v);
    if (a > p) p = a;
  }
  return p;
}

// ============================================================
// 2. 滑动窗口 RMS
// ============================================================

/** 每隔多少个输出点重新精确求和一次，限制滑动累加的舍入漂移 */
const RESUM_INTERVAL = 1024;

export function assertWindow(windowSize: number, sampleCount: number): void {
  if (!Number.isInteger(windowSize) || windowSize <= 0 || windowSize > sampleCount) {
    throw new InvalidWindowError(windowSize, sampleCount);
  }
}

/**
 * 滑动窗口 RMS（valid 卷积语义）
 *
 * 输出第 i 点 = sqrt(mean(samples[i .. i+windowSize-1]²))，
 * 长度 = samples.length - windowSize + 1。
 *
 * @throws InvalidWindowError windowSize 非正整数或大于样本数（含空输入）
 */
export function computeRms(samples: readonly number[], windowSize: number): number[] {
  assertWindow(windowSize, samples.length);

  const outLen = samples.length - windowSize + 1;
  const result = new Array<number>(outLen);

  let sumSq = 0;
  for (let i = 0; i < windowSize; i++) sumSq += samples[i] * samples[i];
  result[0] = Math.sqrt(sumSq / windowSize);

  for (let i = 1; i < outLen; i++) {
    if (i % RESUM_INTERVAL === 0) {
      sumSq = 0;
      for (let j = i; j < i + windowSize; j++) sumSq += samples[j] * samples[j];
    } else {
      const leaving = samples[i - 1];
      const entering = samples[i + windowSize - 1];
      sumSq += entering * entering - leaving * leaving;
    }
    // 相消误差可能让和略小于 0
    result[i] = Math.sqrt(Math.max(0, sumSq) / windowSize);
  }

  return result;
}

export interface RmsPoint {
  time: number;
  magnitude: number;
}

/**
 * RMS 序列并对齐时间轴：第 i 点的时间戳取窗口右边沿 time[i + windowSize - 1]，
 * 即 RMS 估计值可用的时刻。
 */
export function rmsSeries(
  samples: readonly number[],
  time: readonly number[],
  windowSize: number,
): RmsPoint[] {
  assertSameLength(samples, time);
  const values = computeRms(samples, windowSize);
  return values.map((magnitude, i) => ({ time: time[i + windowSize - 1], magnitude }));
}

// ============================================================
// 3. 差分与过零点
// ============================================================

/** 逐点差分，长度 n-1 */
export function successiveDifferences(data: readonly number[]): number[] {
  const out = new Array<number>(Math.max(0, data.length - 1));
  for (let i = 1; i < data.length; i++) out[i - 1] = data[i] - data[i - 1];
  return out;
}

/**
 * 过零时刻（线性插值）
 * 以 x >= 0 为正半周，相邻两点符号不同即记一次过零。
 */
export function zeroCrossingTimes(samples: readonly number[], time: readonly number[]): number[] {
  assertSameLength(samples, time);
  const crossings: number[] = [];
  for (let i = 0; i < samples.length - 1; i++) {
    const a = samples[i];
    const b = samples[i + 1];
    if ((a >= 0) !== (b >= 0)) {
      const frac = a / (a - b);
      crossings.push(time[i] + (time[i + 1] - time[i]) * frac);
    }
  }
  return crossings;
}

// ============================================================
// 4. 工具
// ============================================================

export function assertSameLength(samples: readonly unknown[], time: readonly number[]): void {
  if (samples.length !== time.length) {
    throw new ValidationError(
      `Sample count ${samples.length} does not match time base length ${time.length}`,
      { samples: samples.length, time: time.length },
    );
  }
}
