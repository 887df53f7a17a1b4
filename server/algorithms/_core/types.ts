/**
 * 故障分析引擎 - 核心类型定义
 *
 * 统一的分析器接口规范，所有分析器实现必须遵循此接口。
 * 设计原则：
 * 1. 输入/输出标准化 - 统一的 AnalyzerInput/AnalyzerOutput 接口
 * 2. 配置驱动 - 阈值、窗口等全部通过 config 显式传入
 * 3. 结论输出 - 每个分析器输出带时间、幅值和可读标签的 Finding
 * 4. 同步纯计算 - 不保留调用之间的状态
 */

import type { Recording } from '../../recording/types';

/** 分析执行状态 */
export type AnalysisStatus = 'completed' | 'failed';

/** 诊断严重等级 */
export type SeverityLevel = 'normal' | 'attention' | 'warning' | 'critical';

// ============================================================
// Findings
// ============================================================

/** 电压暂降事件 */
export interface SagEvent {
  kind: 'sag';
  channelId?: string;
  startTime: number;
  endTime: number;
  duration: number;
  minimumMagnitude: number;
  threshold: number;
  label: string;
}

/** 电压暂升事件 */
export interface SwellEvent {
  kind: 'swell';
  channelId?: string;
  startTime: number;
  endTime: number;
  duration: number;
  maximumMagnitude: number;
  threshold: number;
  label: string;
}

export type TripClassification = 'on_time' | 'late' | 'premature' | 'missing';

export interface DelayBounds {
  min: number;
  max: number;
}

/** 继电器动作检查结果 */
export interface TripInfo {
  kind: 'trip';
  channelId?: string;
  referenceTime: number;
  /** 参考时刻之后第一个跳闸信号 */
  tripTime?: number;
  delay?: number;
  /** 参考时刻及之前出现的第一个跳闸信号 */
  prematureTripTime?: number;
  classification: TripClassification;
  bounds?: DelayBounds;
  label: string;
}

/** CT 饱和区段 */
export interface SaturationEvent {
  kind: 'saturation';
  channelId?: string;
  startTime: number;
  endTime: number;
  /** 0..1，1 表示窗口内波形完全平顶 */
  severity: number;
  minVariability: number;
  peakCurrent: number;
  label: string;
}

/** 元数据声明频率异常 */
export interface FrequencyError {
  kind: 'frequency';
  declaredFrequency: number;
  expectedFrequency: number;
  tolerance: number;
  deviation: number;
  label: string;
}

/** 过零法估计的单周波频率偏差 */
export interface FrequencyDeviation {
  kind: 'frequency_deviation';
  channelId?: string;
  time: number;
  frequency: number;
  deviation: number;
  label: string;
}

export type Finding =
  | SagEvent
  | SwellEvent
  | TripInfo
  | SaturationEvent
  | FrequencyError
  | FrequencyDeviation;

export type FindingKind = Finding['kind'];

// ============================================================
// 分析器接口
// ============================================================

export interface AnalyzerInput {
  recording: Recording;
  /** 被分析的通道；频率元数据检查等不需要通道 */
  channelId?: string;
}

export interface DiagnosisConclusion {
  summary: string;
  severity: SeverityLevel;
}

export interface AnalyzerOutput {
  analyzerId: string;
  status: AnalysisStatus;
  channelId?: string;
  findings: Finding[];
  diagnosis: DiagnosisConclusion;
  metadata: {
    executionTimeMs: number;
    inputDataPoints: number;
    analyzerVersion: string;
    parameters: Record<string, unknown>;
  };
  /** 失败时的错误信息 */
  error?: {
    code: string;
    message: string;
    context: Record<string, unknown>;
  };
}

export interface InputValidation {
  valid: boolean;
  errors?: string[];
}

/** 分析器接口 - 所有分析器必须实现 */
export interface IDisturbanceAnalyzer {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly category: AnalyzerCategory;

  /**
   * 执行分析
   * @param config 调用方覆盖项，与默认配置合并后验证
   * @throws AnalysisError 参数越界、通道缺失等；由引擎转换为 failed 输出
   */
  execute(input: AnalyzerInput, config: Record<string, unknown>): AnalyzerOutput;

  validateInput(input: AnalyzerInput): InputValidation;

  getDefaultConfig(): Record<string, unknown>;
}

export type AnalyzerCategory = 'electrical' | 'comprehensive';

export interface ConfigField {
  name: string;
  type: 'number' | 'string' | 'select';
  default?: number | string;
  options?: Array<number | string>;
  description?: string;
  required?: boolean;
}

/** 分析器注册信息 */
export interface AnalyzerRegistration {
  analyzer: IDisturbanceAnalyzer;
  metadata: {
    description: string;
    tags: string[];
    channelKind: 'analog' | 'digital' | 'none' | 'mixed';
    configFields: ConfigField[];
    complexity: string;
    referenceStandards?: string[];
  };
}
