/**
 * 配置符合性检查
 * 比较配置声明与实际数据：通道数量、文件编码、系统频率。
 */

import { checkFrequency } from '../algorithms/electrical/frequency';
import type { Recording, RecordingMetadata } from './types';

export type ConformanceIssueKind = 'channel_count' | 'file_type' | 'frequency' | 'sample_channels';

export interface ConformanceIssue {
  kind: ConformanceIssueKind;
  severity: 'error' | 'warning';
  message: string;
}

export const VALID_FILE_TYPES = ['ASCII', 'BINARY', 'BINARY32', 'FLOAT32'] as const;

/** 声明的总通道数应等于模拟量 + 开关量 */
export function checkChannelCounts(metadata: RecordingMetadata): ConformanceIssue[] {
  const { total, analog, digital } = metadata.channelCounts;
  const expectedTotal = analog + digital;
  if (total === expectedTotal) return [];
  return [{
    kind: 'channel_count',
    severity: 'error',
    message: `Mismatched channel counts: declared total ${total}, analog + digital = ${expectedTotal}`,
  }];
}

export function checkFileType(metadata: RecordingMetadata): ConformanceIssue[] {
  const fileType = metadata.fileType.trim().toUpperCase();
  if ((VALID_FILE_TYPES as readonly string[]).includes(fileType)) return [];
  return [{
    kind: 'file_type',
    severity: 'error',
    message: `Invalid file type '${metadata.fileType}'. Valid types are: ${VALID_FILE_TYPES.join(', ')}`,
  }];
}

/** 频率缺失或偏离期望值时给出警告 */
export function checkMissingInformation(
  metadata: RecordingMetadata,
  expectedFrequency: number,
  tolerance = 1.0,
): ConformanceIssue[] {
  const error = checkFrequency(metadata.nominalFrequency, expectedFrequency, tolerance);
  return error ? [{ kind: 'frequency', severity: 'warning', message: error.label }] : [];
}

/** 声明的模拟量/开关量数量应与数据中实际的通道数一致 */
export function checkSampleCounts(recording: Recording): ConformanceIssue[] {
  const issues: ConformanceIssue[] = [];
  const declared = recording.metadata.channelCounts;
  if (declared.analog !== recording.analog.size) {
    issues.push({
      kind: 'sample_channels',
      severity: 'error',
      message: `Declared ${declared.analog} analog channels, data contains ${recording.analog.size}`,
    });
  }
  if (declared.digital !== recording.digital.size) {
    issues.push({
      kind: 'sample_channels',
      severity: 'error',
      message: `Declared ${declared.digital} digital channels, data contains ${recording.digital.size}`,
    });
  }
  return issues;
}

export interface ConformanceReport {
  errors: ConformanceIssue[];
  warnings: ConformanceIssue[];
}

export function runConformanceChecks(
  recording: Recording,
  options: { expectedFrequency: number; frequencyTolerance?: number },
): ConformanceReport {
  const all = [
    ...checkChannelCounts(recording.metadata),
    ...checkFileType(recording.metadata),
    ...checkSampleCounts(recording),
    ...checkMissingInformation(recording.metadata, options.expectedFrequency, options.frequencyTolerance),
  ];
  return {
    errors: all.filter(i => i.severity === 'error'),
    warnings: all.filter(i => i.severity === 'warning'),
  };
}
