/**
 * 录波边界验证与通道访问测试
 */
import { describe, it, expect } from 'vitest';
import { createRecording, normalizeChannelId, WaveformAccessor } from './recording';
import { ChannelNotFoundError, DataIntegrityError } from '../core/errors';
import { faultRecording } from '../__tests__/waveforms';

const metadata = {
  nominalFrequency: 60,
  channelCounts: { total: 2, analog: 1, digital: 1 },
  fileType: 'ASCII',
};

describe('createRecording', () => {
  it('构造只读录波', () => {
    const rec = createRecording({
      metadata,
      time: [0, 0.001, 0.002],
      analog: [{ id: ' VA ', samples: [1, 2, 3] }],
      digital: [{ id: 'TRIP', samples: [0, 0, 1] }],
    });

    expect(rec.metadata.stationName).toBe('');
    expect(rec.analog.get('VA')).toEqual([1, 2, 3]);
    expect(rec.digital.get('TRIP')).toEqual([0, 0, 1]);
    expect(Object.isFrozen(rec.time)).toBe(true);
    expect(Object.isFrozen(rec.analog.get('VA'))).toBe(true);
  });

  it('通道列表可以省略', () => {
    const rec = createRecording({ metadata, time: [0, 1] });
    expect(rec.analog.size).toBe(0);
    expect(rec.digital.size).toBe(0);
  });

  it('通道长度与时间轴不一致', () => {
    expect(() => createRecording({
      metadata,
      time: [0, 0.001, 0.002],
      analog: [{ id: 'VA', samples: [1, 2] }],
    })).toThrow("Recording failed structural validation: analog.0.samples: channel 'VA' has 2 samples, time base has 3");
  });

  it('时间轴不是严格递增', () => {
    expect(() => createRecording({ metadata, time: [0, 0.002, 0.001] })).toThrow(
      'Recording failed structural validation: time.2: time base must be strictly increasing (0.002 -> 0.001)',
    );
  });

  it('通道标识规范化后重复', () => {
    expect(() => createRecording({
      metadata,
      time: [0, 1],
      analog: [{ id: 'VA', samples: [1, 2] }],
      digital: [{ id: ' va ', samples: [0, 1] }],
    })).toThrow("Recording failed structural validation: digital.0.id: duplicate channel id 'va'");
  });

  it('开关量只能是 0 或 1', () => {
    expect(() => createRecording({
      metadata,
      time: [0, 1],
      digital: [{ id: 'TRIP', samples: [0, 2] }],
    })).toThrow(DataIntegrityError);
  });

  it('非对象输入', () => {
    expect(() => createRecording(null)).toThrow(DataIntegrityError);
  });
});

describe('WaveformAccessor', () => {
  const accessor = new WaveformAccessor(faultRecording());

  it('列出通道', () => {
    expect(accessor.listAnalog()).toEqual(['VA', 'VB', 'IA']);
    expect(accessor.listDigital()).toEqual(['TRIP']);
    expect(accessor.time).toHaveLength(1000);
  });

  it('通道查找忽略大小写和首尾空白，返回原始标识', () => {
    const ch = accessor.analog(' va ');
    expect(ch.id).toBe('VA');
    expect(ch.samples).toHaveLength(1000);
    expect(ch.time).toBe(accessor.time);
    expect(accessor.digital('trip').id).toBe('TRIP');
    expect(accessor.hasDigital('Trip')).toBe(true);
    expect(accessor.hasAnalog('TRIP')).toBe(false);
  });

  it('模拟量和开关量分开查找', () => {
    expect(() => accessor.analog('TRIP')).toThrow(ChannelNotFoundError);
    expect(() => accessor.analog('TRIP')).toThrow("analog channel 'TRIP' not found");
    expect(() => accessor.digital('VA')).toThrow("digital channel 'VA' not found");
  });
});

describe('normalizeChannelId', () => {
  it('去除首尾空白并转为小写', () => {
    expect(normalizeChannelId('  Va ')).toBe('va');
  });
});
