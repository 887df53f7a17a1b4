/**
 * 统一分析执行引擎
 *
 * 功能:
 * 1. 分析器注册与发现：所有分析器注册到引擎
 * 2. 统一执行入口：execute(analyzerId, input, config)
 * 3. 错误隔离：分析过程中的 AnalysisError 转换为 failed 输出，
 *    批量执行时一个通道失败不影响其它通道
 *
 * 引擎只持有注册表，不缓存结果、不保留执行历史；所有执行都是同步纯计算。
 */

import { NotFoundError, ValidationError, wrapError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import { countDataPoints } from './output';
import type { AnalyzerCategory, AnalyzerInput, AnalyzerOutput, AnalyzerRegistration } from './types';

const log = createModuleLogger('engine');

export interface AnalysisTask {
  analyzerId: string;
  input: AnalyzerInput;
  config?: Record<string, unknown>;
}

export class AnalysisEngine {
  /** 已注册的分析器 */
  private registry = new Map<string, AnalyzerRegistration>();

  // ============================================================
  // 注册与发现
  // ============================================================

  register(registration: AnalyzerRegistration): void {
    const id = registration.analyzer.id;
    if (this.registry.has(id)) {
      log.debug(`Replacing analyzer: ${id}`);
    }
    this.registry.set(id, registration);
  }

  registerAll(registrations: AnalyzerRegistration[]): void {
    for (const reg of registrations) {
      this.register(reg);
    }
    log.debug(`Registered ${registrations.length} analyzers, total: ${this.registry.size}`);
  }

  getAnalyzer(id: string): AnalyzerRegistration | undefined {
    return this.registry.get(id);
  }

  listAnalyzers(filter?: { category?: AnalyzerCategory; tag?: string }): AnalyzerRegistration[] {
    let results = Array.from(this.registry.values());

    if (filter?.category) {
      const category = filter.category;
      results = results.filter(r => r.analyzer.category === category);
    }
    if (filter?.tag) {
      const tag = filter.tag;
      results = results.filter(r => r.metadata.tags.includes(tag));
    }

    return results;
  }

  getCategories(): AnalyzerCategory[] {
    const categories = new Set<AnalyzerCategory>();
    for (const reg of this.registry.values()) {
      categories.add(reg.analyzer.category);
    }
    return Array.from(categories);
  }

  // ============================================================
  // 执行
  // ============================================================

  /**
   * 执行分析器
   * @throws NotFoundError 分析器未注册（调用方编程错误，不转换为输出）
   */
  execute(
    analyzerId: string,
    input: AnalyzerInput,
    config: Record<string, unknown> = {},
  ): AnalyzerOutput {
    const registration = this.registry.get(analyzerId);
    if (!registration) {
      throw new NotFoundError('analyzer', analyzerId);
    }
    const { analyzer } = registration;
    const startTime = Date.now();

    try {
      const validation = analyzer.validateInput(input);
      if (!validation.valid) {
        throw new ValidationError(
          `Input validation failed: ${validation.errors?.join(', ') ?? 'unknown reason'}`,
          { analyzerId, errors: validation.errors },
        );
      }
      return analyzer.execute(input, config);
    } catch (error) {
      const err = wrapError(error, { analyzerId, channelId: input.channelId });
      log.warn({ analyzerId, channelId: input.channelId, code: err.codeName }, `Analysis failed: ${err.message}`);

      return {
        analyzerId,
        status: 'failed',
        channelId: input.channelId,
        findings: [],
        diagnosis: {
          summary: `Analysis failed: ${err.message}`,
          severity: 'attention',
        },
        metadata: {
          executionTimeMs: Date.now() - startTime,
          inputDataPoints: countDataPoints(input),
          analyzerVersion: analyzer.version,
          parameters: { ...analyzer.getDefaultConfig(), ...config },
        },
        error: {
          code: err.codeName,
          message: err.message,
          context: err.context,
        },
      };
    }
  }

  /**
   * 批量执行（串行，互不影响）
   */
  executeBatch(tasks: AnalysisTask[]): AnalyzerOutput[] {
    return tasks.map(task => this.execute(task.analyzerId, task.input, task.config));
  }
}
