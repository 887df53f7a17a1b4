/**
 * 电压暂降 / 暂升检测
 *
 * RMS 序列与 额定电压×比例 比较，连续越限的点合并为一个事件：
 *   - 暂降：rms < nominal × sagRatio，跟踪区段最小值
 *   - 暂升：rms > nominal × swellRatio，跟踪区段最大值
 * 事件时间取 RMS 窗口右边沿；序列结束时未恢复的事件在最后一点关闭。
 * 不设最短持续时间（去抖由调用方自行组合）。
 *
 * 参考标准: IEEE 1159 / IEC 61000-4-30
 */

import { InvalidReferenceError, InvalidWindowError, ValidationError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import { assertSameLength, rmsSeries, type RmsPoint } from '../_core/dsp';
import { collectRuns, type ExtremeDirection, type Run } from '../_core/runs';
import type { SagEvent, SwellEvent } from '../_core/types';

const log = createModuleLogger('sag-swell');

export const DEFAULT_SAG_RATIO = 0.8;
export const DEFAULT_SWELL_RATIO = 1.1;
export const DEFAULT_RMS_WINDOW = 50;

export interface SagOptions {
  nominalVoltage: number;
  sagRatio?: number;
  windowSize?: number;
  channelId?: string;
}

export interface SwellOptions {
  nominalVoltage: number;
  swellRatio?: number;
  windowSize?: number;
  channelId?: string;
}

interface ThresholdRun {
  run: Run;
  startTime: number;
  endTime: number;
}

function assertNominalAndWindow(nominalVoltage: number, windowSize: number, sampleCount: number): void {
  if (!(nominalVoltage > 0) || !Number.isFinite(nominalVoltage)) {
    throw new InvalidReferenceError(`Nominal voltage must be positive, got ${nominalVoltage}`, { nominalVoltage });
  }
  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    throw new InvalidWindowError(windowSize, sampleCount);
  }
}

/** 暂降参数检查，不触碰样本；sampleCount 只进入错误信息 */
export function assertSagOptions(options: SagOptions, sampleCount = 0): void {
  const { nominalVoltage, sagRatio = DEFAULT_SAG_RATIO, windowSize = DEFAULT_RMS_WINDOW } = options;
  if (!(sagRatio > 0 && sagRatio <= 1)) {
    throw new ValidationError(`Sag ratio must be in (0, 1], got ${sagRatio}`, { sagRatio });
  }
  assertNominalAndWindow(nominalVoltage, windowSize, sampleCount);
}

export function assertSwellOptions(options: SwellOptions, sampleCount = 0): void {
  const { nominalVoltage, swellRatio = DEFAULT_SWELL_RATIO, windowSize = DEFAULT_RMS_WINDOW } = options;
  if (!(swellRatio > 1) || !Number.isFinite(swellRatio)) {
    throw new ValidationError(`Swell ratio must be greater than 1, got ${swellRatio}`, { swellRatio });
  }
  assertNominalAndWindow(nominalVoltage, windowSize, sampleCount);
}

/**
 * 公共部分：RMS → 越限区段（参数已由调用方检查）
 * 空输入或样本少于一个窗口时返回空数组（没有可分析的数据不是错误）。
 */
function scanThreshold(
  samples: readonly number[],
  time: readonly number[],
  windowSize: number,
  threshold: number,
  direction: ExtremeDirection,
): ThresholdRun[] {
  assertSameLength(samples, time);

  if (samples.length < windowSize) {
    if (samples.length > 0) {
      log.debug({ samples: samples.length, windowSize }, 'Channel shorter than RMS window, nothing to analyze');
    }
    return [];
  }

  const series = rmsSeries(samples, time, windowSize);
  const runs = collectRuns<RmsPoint>(series, {
    predicate: p => (direction === 'min' ? p.magnitude < threshold : p.magnitude > threshold),
    magnitude: p => p.magnitude,
    direction,
  });

  return runs.map(run => ({
    run,
    startTime: series[run.startIndex].time,
    endTime: series[run.endIndex].time,
  }));
}

function describeChannel(channelId: string | undefined): string {
  return channelId ? ` on '${channelId}'` : '';
}

export function detectSags(
  samples: readonly number[],
  time: readonly number[],
  options: SagOptions,
): SagEvent[] {
  assertSagOptions(options, samples.length);
  const { nominalVoltage, sagRatio = DEFAULT_SAG_RATIO, windowSize = DEFAULT_RMS_WINDOW, channelId } = options;

  const threshold = nominalVoltage * sagRatio;
  return scanThreshold(samples, time, windowSize, threshold, 'min').map(
    ({ run, startTime, endTime }): SagEvent => ({
      kind: 'sag',
      channelId,
      startTime,
      endTime,
      duration: endTime - startTime,
      minimumMagnitude: run.extreme,
      threshold,
      label: `Voltage sag${describeChannel(channelId)} from ${startTime.toFixed(4)}s to ${endTime.toFixed(4)}s `
        + `(min RMS ${run.extreme.toFixed(2)}, threshold ${threshold.toFixed(2)})`,
    }),
  );
}

export function detectSwells(
  samples: readonly number[],
  time: readonly number[],
  options: SwellOptions,
): SwellEvent[] {
  assertSwellOptions(options, samples.length);
  const { nominalVoltage, swellRatio = DEFAULT_SWELL_RATIO, windowSize = DEFAULT_RMS_WINDOW, channelId } = options;

  const threshold = nominalVoltage * swellRatio;
  return scanThreshold(samples, time, windowSize, threshold, 'max').map(
    ({ run, startTime, endTime }): SwellEvent => ({
      kind: 'swell',
      channelId,
      startTime,
      endTime,
      duration: endTime - startTime,
      maximumMagnitude: run.extreme,
      threshold,
      label: `Voltage swell${describeChannel(channelId)} from ${startTime.toFixed(4)}s to ${endTime.toFixed(4)}s `
        + `(max RMS ${run.extreme.toFixed(2)}, threshold ${threshold.toFixed(2)})`,
    }),
  );
}
