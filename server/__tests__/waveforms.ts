/**
 * 测试用合成录波
 * 1 kHz 采样，时间轴 t[i] = i / 1000
 */
import { createRecording } from '../recording/recording';
import type { BinarySample, Recording } from '../recording/types';

export const SAMPLE_RATE = 1000;

export function timeBase(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i / SAMPLE_RATE);
}

/** 分段幅值的正弦波：amplitude(i) 给出第 i 点的 RMS 幅值 */
export function sine(n: number, frequency: number, rmsAt: (i: number) => number): number[] {
  return timeBase(n).map((t, i) => rmsAt(i) * Math.SQRT2 * Math.sin(2 * Math.PI * frequency * t));
}

/** fromIndex 起恒为 1 的开关量；fromIndex 为 null 时全 0 */
export function stepSignal(n: number, fromIndex: number | null): BinarySample[] {
  return Array.from({ length: n }, (_, i): BinarySample => (fromIndex !== null && i >= fromIndex ? 1 : 0));
}

/**
 * 典型故障录波（1000 点）：
 *   VA   120 V，400..599 点降到 80 V
 *   VB   120 V，无扰动
 *   IA   幅值 100 正弦，200..259 点被削平为 150
 *   TRIP 从 450 点起为 1
 */
export function faultRecording(): Recording {
  const n = 1000;
  const va = sine(n, 60, i => (i >= 400 && i < 600 ? 80 : 120));
  const vb = sine(n, 60, () => 120);
  const ia = timeBase(n).map((t, i) => (i >= 200 && i < 260 ? 150 : 100 * Math.sin(2 * Math.PI * 60 * t)));
  return createRecording({
    metadata: {
      stationName: 'Test Station',
      recorderId: 'REC-1',
      nominalFrequency: 60,
      channelCounts: { total: 4, analog: 3, digital: 1 },
      fileType: 'ASCII',
    },
    time: timeBase(n),
    analog: [
      { id: 'VA', samples: va },
      { id: 'VB', samples: vb },
      { id: 'IA', samples: ia },
    ],
    digital: [{ id: 'TRIP', samples: stepSignal(n, 450) }],
  });
}
