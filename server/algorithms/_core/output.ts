/**
 * 分析器公共工具：配置解析与标准输出构造
 */

import type { z } from 'zod';
import { ValidationError } from '../../core/errors';
import type { AnalyzerInput, AnalyzerOutput, DiagnosisConclusion, Finding } from './types';

/**
 * 默认配置与调用方覆盖项合并后按 schema 解析
 * @throws ValidationError 字段缺失或类型不符
 */
export function parseConfig<C>(
  schema: z.ZodType<C, z.ZodTypeDef, unknown>,
  defaults: Record<string, unknown>,
  overrides: Record<string, unknown>,
): C {
  const result = schema.safeParse({ ...defaults, ...overrides });
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError(`Invalid analyzer configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export function countDataPoints(input: AnalyzerInput): number {
  return input.recording.time.length;
}

export function createOutput(
  analyzerId: string,
  version: string,
  input: AnalyzerInput,
  config: object,
  startTime: number,
  diagnosis: DiagnosisConclusion,
  findings: Finding[],
): AnalyzerOutput {
  return {
    analyzerId,
    status: 'completed',
    channelId: input.channelId,
    findings,
    diagnosis,
    metadata: {
      executionTimeMs: Date.now() - startTime,
      inputDataPoints: countDataPoints(input),
      analyzerVersion: version,
      parameters: { ...config },
    },
  };
}
