/**
 * 录波数据模型
 *
 * Recording 是记录加载器（外部协作方）产出的结构化录波的只读视图：
 * 共享时间轴 + 模拟通道 + 开关量通道 + 配置元数据。
 */

export type BinarySample = 0 | 1;

/** 配置文件声明的通道数量 */
export interface DeclaredChannelCounts {
  total: number;
  analog: number;
  digital: number;
}

export interface RecordingMetadata {
  stationName: string;
  recorderId: string;
  /** 额定系统频率 (Hz)，0 表示未声明 */
  nominalFrequency: number;
  channelCounts: DeclaredChannelCounts;
  /** 数据文件编码：ASCII / BINARY / BINARY32 / FLOAT32 */
  fileType: string;
  /** 触发时刻（秒，相对时间轴） */
  triggerTime?: number;
}

export interface Recording {
  readonly metadata: Readonly<RecordingMetadata>;
  /** 单调递增的采样时刻（秒） */
  readonly time: readonly number[];
  readonly analog: ReadonlyMap<string, readonly number[]>;
  readonly digital: ReadonlyMap<string, readonly BinarySample[]>;
}

/** 通道访问结果：样本序列 + 共享时间轴 */
export interface ChannelData<T> {
  id: string;
  samples: readonly T[];
  time: readonly number[];
}
