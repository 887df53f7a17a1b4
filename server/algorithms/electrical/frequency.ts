/**
 * 频率检查
 *
 * checkFrequency：元数据声明频率与期望值比较（纯字段比较）
 * estimateFrequencyDeviations：过零法逐周波估计频率，报告超出阈值的周波
 */

import { ValidationError } from '../../core/errors';
import { zeroCrossingTimes } from '../_core/dsp';
import type { FrequencyDeviation, FrequencyError } from '../_core/types';

function assertTolerance(name: string, value: number): void {
  if (!(value >= 0) || !Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a non-negative number, got ${value}`, { [name]: value });
  }
}

/** 声明频率为 0 或偏差超出容差时返回错误描述，否则返回 null */
export function checkFrequency(
  declaredFrequency: number,
  expectedFrequency: number,
  tolerance = 1.0,
): FrequencyError | null {
  assertTolerance('tolerance', tolerance);
  const deviation = declaredFrequency - expectedFrequency;
  if (declaredFrequency !== 0 && Math.abs(deviation) <= tolerance) return null;

  return {
    kind: 'frequency',
    declaredFrequency,
    expectedFrequency,
    tolerance,
    deviation,
    label: declaredFrequency === 0
      ? 'Nominal frequency missing (0 Hz)'
      : `Unexpected frequency detected (${declaredFrequency} Hz, expected ${expectedFrequency} ± ${tolerance} Hz)`,
  };
}

export interface FrequencyEstimateOptions {
  nominalFrequency: number;
  /** 允许偏差 (Hz) */
  threshold?: number;
  channelId?: string;
}

/**
 * 过零法：相隔两次过零为一个完整周波，f = 1 / (t[k+2] - t[k])
 * 过零点少于 3 个时无法形成周波，返回空数组。
 */
export function estimateFrequencyDeviations(
  samples: readonly number[],
  time: readonly number[],
  options: FrequencyEstimateOptions,
): FrequencyDeviation[] {
  const { nominalFrequency, threshold = 1.0, channelId } = options;
  if (!(nominalFrequency > 0) || !Number.isFinite(nominalFrequency)) {
    throw new ValidationError(`Nominal frequency must be positive, got ${nominalFrequency}`, { nominalFrequency });
  }
  assertTolerance('threshold', threshold);

  const crossings = zeroCrossingTimes(samples, time);
  const on = channelId ? ` on '${channelId}'` : '';
  const deviations: FrequencyDeviation[] = [];

  for (let k = 0; k + 2 < crossings.length; k++) {
    const period = crossings[k + 2] - crossings[k];
    if (period <= 0) continue;
    const frequency = 1 / period;
    const deviation = frequency - nominalFrequency;
    if (Math.abs(deviation) > threshold) {
      deviations.push({
        kind: 'frequency_deviation',
        channelId,
        time: crossings[k],
        frequency,
        deviation,
        label: `Frequency ${frequency.toFixed(3)} Hz${on} at ${crossings[k].toFixed(4)}s `
          + `(nominal ${nominalFrequency} Hz)`,
      });
    }
  }
  return deviations;
}

/**
 * 信号的平均频率估计（所有完整周波的均值），不足一个周波时返回 null
 */
export function estimateMeanFrequency(samples: readonly number[], time: readonly number[]): number | null {
  const crossings = zeroCrossingTimes(samples, time);
  if (crossings.length < 3) return null;
  // 首末过零点之间的半周波数
  const halfCycles = crossings.length - 1;
  const span = crossings[crossings.length - 1] - crossings[0];
  return span > 0 ? halfCycles / (2 * span) : null;
}
