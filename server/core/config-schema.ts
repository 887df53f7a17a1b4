/**
 * ============================================================================
 * 配置验证 Schema：Zod 强类型验证
 * ============================================================================
 *
 * 用途：
 *   1. 验证环境变量解析后的类型和范围（parseFloat 的 NaN 在这里被拦截）
 *   2. 验证参数之间的约束（暂降比例 < 1 < 暂升比例，min <= max）
 *   3. 提供带路径的错误消息，帮助快速定位配置问题
 *
 * 使用方式：
 *   import { validateConfigWithSchema } from './config-schema';
 *   const result = validateConfigWithSchema(config);
 *   if (!result.success) throw new ValidationError(...);
 *
 * ============================================================================
 */

import { z } from 'zod';
import { createModuleLogger } from './logger';

const log = createModuleLogger('config-validator');

// ============================================================
// Schema 定义
// ============================================================

const windowSchema = z.number().int().min(1);
const finite = z.number().finite();

const appSchema = z.object({
  env: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
});

export const analysisDefaultsSchema = z.object({
  rmsWindow: windowSchema,
  sagRatio: finite.gt(0).max(1),
  swellRatio: finite.gt(1),
  saturationWindow: windowSchema.min(3, 'must be at least 3 samples'),
  flatnessThreshold: finite.gt(0),
  highCurrentThreshold: finite.min(0),
  tripDelayBounds: z.object({
    min: finite.min(0),
    max: finite.min(0),
  }).refine(b => b.min <= b.max, { message: 'min must not exceed max' }),
  expectedFrequency: finite.gt(0),
  frequencyTolerance: finite.min(0),
});

const configSchema = z.object({
  app: appSchema,
  analysis: analysisDefaultsSchema,
});

export type ValidatedConfig = z.infer<typeof configSchema>;

// ============================================================
// 公开 API
// ============================================================

export interface ConfigValidationResult {
  success: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * 使用 Zod Schema 验证配置
 */
export function validateConfigWithSchema(cfg: unknown): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const result = configSchema.safeParse(cfg);
  if (!result.success) {
    for (const issue of result.error.issues) {
      errors.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  } else if (result.data.analysis.highCurrentThreshold === 0) {
    warnings.push('analysis.highCurrentThreshold: 0 flags flat windows at any current level');
  }

  const success = errors.length === 0;

  if (errors.length > 0) {
    log.warn({ errors }, `Configuration validation found ${errors.length} error(s)`);
  }
  if (warnings.length > 0) {
    log.debug({ warnings }, `Configuration warnings (${warnings.length})`);
  }

  return { success, errors, warnings };
}
