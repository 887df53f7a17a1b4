/**
 * 统一配置中心
 * 分析默认参数与日志级别的唯一来源
 *
 * 使用方式：
 *   import { config } from '../core/config';
 *   const engine = createAnalysisEngine(config.analysis);
 *
 * 环境变量优先级：
 *   环境变量 > .env 文件 > 默认值
 *
 * 检测函数从不读取此对象；这里的值只在最外层注入分析器作为默认参数。
 */

import './env-loader';

// ============================================
// 辅助函数
// ============================================

function env(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function envInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  return v ? parseInt(v, 10) : defaultValue;
}

function envFloat(key: string, defaultValue: number): number {
  const v = process.env[key];
  return v ? parseFloat(v) : defaultValue;
}

// ============================================
// 配置结构
// ============================================

export interface AnalysisDefaults {
  /** RMS 滑动窗口（样本数） */
  rmsWindow: number;
  /** 暂降阈值比例（相对额定电压） */
  sagRatio: number;
  /** 暂升阈值比例 */
  swellRatio: number;
  /** CT 饱和检测窗口（样本数） */
  saturationWindow: number;
  /** 归一化变化率低于此值视为波形平顶 */
  flatnessThreshold: number;
  /** 窗口峰值高于此值才判定饱和 */
  highCurrentThreshold: number;
  /** 继电器期望动作时延（秒） */
  tripDelayBounds: { min: number; max: number };
  /** 期望系统频率（Hz） */
  expectedFrequency: number;
  /** 频率容差（Hz） */
  frequencyTolerance: number;
}

export function loadAnalysisDefaults(): AnalysisDefaults {
  return {
    rmsWindow: envInt('ANALYSIS_RMS_WINDOW', 50),
    sagRatio: envFloat('ANALYSIS_SAG_RATIO', 0.8),
    swellRatio: envFloat('ANALYSIS_SWELL_RATIO', 1.1),
    saturationWindow: envInt('ANALYSIS_SATURATION_WINDOW', 8),
    flatnessThreshold: envFloat('ANALYSIS_FLATNESS_THRESHOLD', 0.05),
    highCurrentThreshold: envFloat('ANALYSIS_HIGH_CURRENT_THRESHOLD', 0),
    tripDelayBounds: {
      min: envFloat('ANALYSIS_TRIP_MIN_DELAY', 0),
      max: envFloat('ANALYSIS_TRIP_MAX_DELAY', 0.1),
    },
    expectedFrequency: envFloat('ANALYSIS_EXPECTED_FREQUENCY', 60),
    frequencyTolerance: envFloat('ANALYSIS_FREQUENCY_TOLERANCE', 1.0),
  };
}

export const config = {
  app: {
    env: env('NODE_ENV', 'development'),
    logLevel: env('LOG_LEVEL', 'info'),
  },

  /** 故障分析默认参数 */
  analysis: loadAnalysisDefaults(),
};

export type AppConfig = typeof config;
