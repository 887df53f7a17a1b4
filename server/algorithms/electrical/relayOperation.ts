/**
 * 继电器动作时序检查
 *
 * 以故障参考时刻为界对跳闸开关量做两次扫描：
 *   1. 参考时刻之后第一个为 1 的点 → tripTime / delay
 *   2. 参考时刻及之前第一个为 1 的点 → prematureTripTime
 * 两者都会在结果中给出；分类时 premature 优先：
 *   premature（参考前已跳闸，或时延小于下限）> missing > late（超过上限）> on_time
 */

import { InsufficientDataError, InvalidReferenceError, ValidationError } from '../../core/errors';
import { assertSameLength } from '../_core/dsp';
import type { DelayBounds, TripClassification, TripInfo } from '../_core/types';
import type { BinarySample } from '../../recording/types';

export interface RelayCheckOptions {
  bounds?: DelayBounds;
  channelId?: string;
}

export function assertDelayBounds(bounds: DelayBounds): void {
  const { min, max } = bounds;
  if (!Number.isFinite(min) || !Number.isFinite(max) || min < 0 || min > max) {
    throw new ValidationError(`Invalid expected delay bounds (${min}, ${max})`, { min, max });
  }
}

function classify(
  prematureTripTime: number | undefined,
  delay: number | undefined,
  bounds: DelayBounds | undefined,
): TripClassification {
  if (prematureTripTime !== undefined) return 'premature';
  if (delay === undefined) return 'missing';
  if (bounds && delay < bounds.min) return 'premature';
  if (bounds && delay > bounds.max) return 'late';
  return 'on_time';
}

function buildLabel(info: Omit<TripInfo, 'label'>): string {
  const on = info.channelId ? ` on '${info.channelId}'` : '';
  switch (info.classification) {
    case 'missing':
      return `No relay trip${on} after ${info.referenceTime.toFixed(4)}s`;
    case 'premature':
      if (info.prematureTripTime !== undefined) {
        return `Premature relay trip${on} at ${info.prematureTripTime.toFixed(4)}s `
          + `(at or before reference ${info.referenceTime.toFixed(4)}s)`;
      }
      return `Premature relay trip${on} at ${(info.tripTime ?? info.referenceTime).toFixed(4)}s `
        + `(delay ${((info.delay ?? 0) * 1000).toFixed(2)}ms below minimum)`;
    case 'late':
    case 'on_time':
      return `Relay trip${on} at ${(info.tripTime ?? 0).toFixed(4)}s `
        + `(delay ${((info.delay ?? 0) * 1000).toFixed(2)}ms, ${info.classification === 'late' ? 'late' : 'on time'})`;
  }
}

/**
 * @throws InvalidReferenceError referenceTime 不在 [time[0], time[last]] 内
 * @throws InsufficientDataError 时间轴为空
 */
export function checkRelayOperation(
  tripSamples: readonly BinarySample[],
  time: readonly number[],
  referenceTime: number,
  options: RelayCheckOptions = {},
): TripInfo {
  const { bounds, channelId } = options;
  assertSameLength(tripSamples, time);
  if (time.length === 0) {
    throw new InsufficientDataError(1, 0, { channelId });
  }
  if (!Number.isFinite(referenceTime) || referenceTime < time[0] || referenceTime > time[time.length - 1]) {
    throw new InvalidReferenceError(
      `Reference time ${referenceTime} outside recording range [${time[0]}, ${time[time.length - 1]}]`,
      { referenceTime, start: time[0], end: time[time.length - 1] },
    );
  }
  if (bounds) assertDelayBounds(bounds);

  let tripTime: number | undefined;
  let prematureTripTime: number | undefined;
  for (let i = 0; i < tripSamples.length; i++) {
    if (tripSamples[i] !== 1) continue;
    if (time[i] <= referenceTime) {
      prematureTripTime ??= time[i];
    } else {
      tripTime = time[i];
      break;
    }
  }

  const delay = tripTime !== undefined ? tripTime - referenceTime : undefined;
  const info: Omit<TripInfo, 'label'> = {
    kind: 'trip',
    channelId,
    referenceTime,
    tripTime,
    delay,
    prematureTripTime,
    classification: classify(prematureTripTime, delay, bounds),
    bounds,
  };
  return { ...info, label: buildLabel(info) };
}
