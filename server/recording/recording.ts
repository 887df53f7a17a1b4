/**
 * 录波边界验证与通道访问
 *
 * createRecording 在边界处一次性验证加载器输出（Zod），之后的检测代码
 * 可以假定：时间轴单调递增、每个通道长度与时间轴一致、开关量只含 0/1。
 */

import { z } from 'zod';
import { ChannelNotFoundError, DataIntegrityError, type ChannelKind } from '../core/errors';
import type { BinarySample, ChannelData, Recording, RecordingMetadata } from './types';

// ============================================================
// Schema
// ============================================================

const countSchema = z.number().int().min(0);

const metadataSchema = z.object({
  stationName: z.string().default(''),
  recorderId: z.string().default(''),
  nominalFrequency: z.number().finite().min(0),
  channelCounts: z.object({
    total: countSchema,
    analog: countSchema,
    digital: countSchema,
  }),
  fileType: z.string(),
  triggerTime: z.number().finite().optional(),
});

const analogChannelSchema = z.object({
  id: z.string().trim().min(1),
  samples: z.array(z.number().finite()),
});

const digitalChannelSchema = z.object({
  id: z.string().trim().min(1),
  samples: z.array(z.union([z.literal(0), z.literal(1)])),
});

export const rawRecordingSchema = z.object({
  metadata: metadataSchema,
  time: z.array(z.number().finite()),
  analog: z.array(analogChannelSchema).default([]),
  digital: z.array(digitalChannelSchema).default([]),
}).superRefine((rec, ctx) => {
  for (let i = 1; i < rec.time.length; i++) {
    if (rec.time[i] <= rec.time[i - 1]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['time', i],
        message: `time base must be strictly increasing (${rec.time[i - 1]} -> ${rec.time[i]})`,
      });
      break;
    }
  }

  const seen = new Set<string>();
  const channels = [
    ...rec.analog.map((ch, idx) => ({ ch, path: ['analog', idx] })),
    ...rec.digital.map((ch, idx) => ({ ch, path: ['digital', idx] })),
  ];
  for (const { ch, path } of channels) {
    if (ch.samples.length !== rec.time.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [...path, 'samples'],
        message: `channel '${ch.id}' has ${ch.samples.length} samples, time base has ${rec.time.length}`,
      });
    }
    const key = normalizeChannelId(ch.id);
    if (seen.has(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [...path, 'id'],
        message: `duplicate channel id '${ch.id}'`,
      });
    }
    seen.add(key);
  }
});

/** 加载器输出（验证前） */
export type RawRecording = z.input<typeof rawRecordingSchema>;

// ============================================================
// 构造
// ============================================================

/** 通道标识比较：去除首尾空白、不区分大小写 */
export function normalizeChannelId(id: string): string {
  return id.trim().toLowerCase();
}

/**
 * 验证加载器输出并构造只读 Recording
 * @throws DataIntegrityError 结构不一致（长度不符、时间轴非单调、重复通道等）
 */
export function createRecording(raw: unknown): Recording {
  const result = rawRecordingSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new DataIntegrityError(`Recording failed structural validation: ${issues[0]}`, { issues });
  }

  const { metadata, time, analog, digital } = result.data;
  const meta: RecordingMetadata = { ...metadata, channelCounts: { ...metadata.channelCounts } };

  return Object.freeze({
    metadata: Object.freeze(meta),
    time: Object.freeze([...time]),
    analog: new Map(analog.map(ch => [ch.id, Object.freeze([...ch.samples])] as const)),
    digital: new Map(digital.map(ch => [ch.id, Object.freeze([...ch.samples])] as const)),
  });
}

// ============================================================
// 通道访问
// ============================================================

export class WaveformAccessor {
  private readonly analogIndex = new Map<string, string>();
  private readonly digitalIndex = new Map<string, string>();

  constructor(private readonly recording: Recording) {
    for (const id of recording.analog.keys()) this.analogIndex.set(normalizeChannelId(id), id);
    for (const id of recording.digital.keys()) this.digitalIndex.set(normalizeChannelId(id), id);
  }

  get time(): readonly number[] {
    return this.recording.time;
  }

  listAnalog(): string[] {
    return Array.from(this.recording.analog.keys());
  }

  listDigital(): string[] {
    return Array.from(this.recording.digital.keys());
  }

  hasAnalog(channelId: string): boolean {
    return this.analogIndex.has(normalizeChannelId(channelId));
  }

  hasDigital(channelId: string): boolean {
    return this.digitalIndex.has(normalizeChannelId(channelId));
  }

  /** @throws ChannelNotFoundError */
  analog(channelId: string): ChannelData<number> {
    const id = this.resolve('analog', channelId);
    const samples = this.recording.analog.get(id);
    if (!samples) throw new ChannelNotFoundError('analog', channelId);
    return { id, samples, time: this.recording.time };
  }

  /** @throws ChannelNotFoundError */
  digital(channelId: string): ChannelData<BinarySample> {
    const id = this.resolve('digital', channelId);
    const samples = this.recording.digital.get(id);
    if (!samples) throw new ChannelNotFoundError('digital', channelId);
    return { id, samples, time: this.recording.time };
  }

  private resolve(kind: ChannelKind, channelId: string): string {
    const index = kind === 'analog' ? this.analogIndex : this.digitalIndex;
    const id = index.get(normalizeChannelId(channelId));
    if (id === undefined) throw new ChannelNotFoundError(kind, channelId);
    return id;
  }
}
