/**
 * CT 饱和检测（启发式）
 *
 * 饱和时二次电流波形被削平，逐点差分塌缩。对每个窗口计算
 *   variability = rms(逐点差分) / 窗口峰值
 * 正常正弦波的 variability 约为 2πf/(fs·√2)，与幅值无关；
 * 平顶段趋近 0。只在窗口峰值高于 highCurrentThreshold 时判定，
 * 低电流静止段的平直不算饱和。
 *
 * 这是特征匹配，不是经过认证的诊断结论。
 */

import { InvalidWindowError, ValidationError } from '../../core/errors';
import { assertSameLength, peak, rms, successiveDifferences } from '../_core/dsp';
import { collectRuns } from '../_core/runs';
import type { SaturationEvent } from '../_core/types';

export const MIN_SATURATION_WINDOW = 3;

export interface SaturationOptions {
  windowSize: number;
  flatnessThreshold: number;
  highCurrentThreshold: number;
  channelId?: string;
}

export interface WindowVariability {
  /** 窗口右边沿时刻 */
  time: number;
  variability: number;
  peak: number;
}

/** 逐窗口的归一化变化率，第 i 点覆盖 samples[i .. i+windowSize-1] */
export function windowVariability(
  samples: readonly number[],
  time: readonly number[],
  windowSize: number,
): WindowVariability[] {
  const out: WindowVariability[] = [];
  for (let i = 0; i + windowSize <= samples.length; i++) {
    const window = samples.slice(i, i + windowSize);
    const p = peak(window);
    const diffRms = rms(successiveDifferences(window));
    out.push({ time: time[i + windowSize - 1], variability: p > 0 ? diffRms / p : 0, peak: p });
  }
  return out;
}

/** 饱和检测参数检查，不触碰样本；sampleCount 只进入错误信息 */
export function assertSaturationOptions(options: SaturationOptions, sampleCount = 0): void {
  const { windowSize, flatnessThreshold, highCurrentThreshold } = options;
  if (!Number.isInteger(windowSize) || windowSize < MIN_SATURATION_WINDOW) {
    throw new InvalidWindowError(windowSize, sampleCount, { minimum: MIN_SATURATION_WINDOW });
  }
  if (!(flatnessThreshold > 0) || !Number.isFinite(flatnessThreshold)) {
    throw new ValidationError(`Flatness threshold must be positive, got ${flatnessThreshold}`, { flatnessThreshold });
  }
  if (!(highCurrentThreshold >= 0) || !Number.isFinite(highCurrentThreshold)) {
    throw new ValidationError(
      `High-current threshold must be non-negative, got ${highCurrentThreshold}`,
      { highCurrentThreshold },
    );
  }
}

export function detectSaturation(
  samples: readonly number[],
  time: readonly number[],
  options: SaturationOptions,
): SaturationEvent[] {
  assertSaturationOptions(options, samples.length);
  const { windowSize, flatnessThreshold, highCurrentThreshold, channelId } = options;
  assertSameLength(samples, time);
  if (samples.length < windowSize) return [];

  const windows = windowVariability(samples, time, windowSize);
  const runs = collectRuns(windows, {
    predicate: w => w.peak > highCurrentThreshold && w.variability < flatnessThreshold,
    magnitude: w => w.variability,
    direction: 'min',
  });

  const on = channelId ? ` on '${channelId}'` : '';
  return runs.map((run): SaturationEvent => {
    const startTime = windows[run.startIndex].time;
    const endTime = windows[run.endIndex].time;
    let peakCurrent = 0;
    for (let i = run.startIndex; i <= run.endIndex; i++) {
      peakCurrent = Math.max(peakCurrent, windows[i].peak);
    }
    const severity = 1 - run.extreme / flatnessThreshold;
    return {
      kind: 'saturation',
      channelId,
      startTime,
      endTime,
      severity,
      minVariability: run.extreme,
      peakCurrent,
      label: `Potential CT saturation${on} from ${startTime.toFixed(4)}s to ${endTime.toFixed(4)}s `
        + `(severity ${severity.toFixed(2)}, peak ${peakCurrent.toFixed(2)})`,
    };
  });
}
