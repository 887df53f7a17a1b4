/**
 * 分析模块统一注册入口
 *
 * 将电气与综合两类分析器注册到统一执行引擎，并导出公开 API
 */

import { AnalysisEngine } from './_core/engine';
import type { AnalyzerRegistration } from './_core/types';
import { getElectricalAnalyzers } from './electrical';
import { getComprehensiveAnalyzers } from './comprehensive';
import { config, type AnalysisDefaults } from '../core/config';
import { validateConfigWithSchema } from '../core/config-schema';
import { ValidationError } from '../core/errors';
import { createModuleLogger } from '../core/logger';

const log = createModuleLogger('index');

/**
 * 获取所有分析器注册信息
 */
export function getAllAnalyzerRegistrations(defaults: AnalysisDefaults): AnalyzerRegistration[] {
  return [
    ...getElectricalAnalyzers(defaults),
    ...getComprehensiveAnalyzers(defaults),
  ];
}

export function createAnalysisEngine(defaults: AnalysisDefaults): AnalysisEngine {
  const engine = new AnalysisEngine();
  engine.registerAll(getAllAnalyzerRegistrations(defaults));
  return engine;
}

let engineInstance: AnalysisEngine | null = null;

/**
 * 按进程配置创建的共享引擎（首次调用时校验配置）
 * @throws ValidationError 环境变量给出的默认参数不合法
 */
export function getAnalysisEngine(): AnalysisEngine {
  if (!engineInstance) {
    const validation = validateConfigWithSchema(config);
    if (!validation.success) {
      throw new ValidationError(`Invalid configuration: ${validation.errors.join('; ')}`, {
        errors: validation.errors,
      });
    }
    engineInstance = createAnalysisEngine(config.analysis);
    log.debug(`[AnalysisEngine] Registered ${engineInstance.listAnalyzers().length} analyzers`);
  }
  return engineInstance;
}

/**
 * 分析器分类元数据
 */
export const ANALYZER_CATEGORIES = {
  electrical: {
    id: 'electrical',
    name: 'Electrical',
    description: 'Single-channel disturbance detectors: sag, swell, relay timing, CT saturation, frequency',
  },
  comprehensive: {
    id: 'comprehensive',
    name: 'Comprehensive',
    description: 'Multi-channel fault correlation',
  },
} as const;

export type AnalyzerCategoryId = keyof typeof ANALYZER_CATEGORIES;

// 重新导出公开 API
export type {
  IDisturbanceAnalyzer,
  AnalyzerInput,
  AnalyzerOutput,
  AnalyzerRegistration,
  Finding,
  SagEvent,
  SwellEvent,
  TripInfo,
  TripClassification,
  DelayBounds,
  SaturationEvent,
  FrequencyError,
  FrequencyDeviation,
} from './_core/types';
export { AnalysisEngine, type AnalysisTask } from './_core/engine';
export { computeRms, rmsSeries, zeroCrossingTimes } from './_core/dsp';
export { detectSags, detectSwells } from './electrical/sagSwell';
export { checkRelayOperation } from './electrical/relayOperation';
export { detectSaturation } from './electrical/ctSaturation';
export { checkFrequency, estimateFrequencyDeviations, estimateMeanFrequency } from './electrical/frequency';
export { analyzeFaults, gridSearch, type FaultReport, type GridSearchHit } from './comprehensive';
export { createRecording, normalizeChannelId, WaveformAccessor } from '../recording/recording';
export { runConformanceChecks, type ConformanceIssue } from '../recording/conformance';
export type { Recording, RecordingMetadata, BinarySample } from '../recording/types';
export {
  AnalysisError,
  ErrorCode,
  ValidationError,
  NotFoundError,
  ChannelNotFoundError,
  InvalidWindowError,
  InvalidReferenceError,
  InsufficientDataError,
  DataIntegrityError,
} from '../core/errors';
