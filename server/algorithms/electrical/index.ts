/**
 * 电气故障分析模块：5个分析器
 *
 * 1. 电压暂降：滑动RMS + 越限区段 (IEEE 1159)
 * 2. 电压暂升：同上，方向相反
 * 3. 继电器动作：跳闸时延 + 正常/延迟/提前/拒动分类
 * 4. CT饱和：归一化逐点差分塌缩检测（启发式）
 * 5. 频率偏差：元数据声明频率 + 过零法逐周波估计
 */

import { z } from 'zod';
import { WaveformAccessor } from '../../recording/recording';
import type {
  AnalyzerInput,
  AnalyzerOutput,
  AnalyzerRegistration,
  Finding,
  IDisturbanceAnalyzer,
  InputValidation,
  SeverityLevel,
} from '../_core/types';
import { createOutput, parseConfig } from '../_core/output';
import type { AnalysisDefaults } from '../../core/config';
import { detectSags, detectSwells } from './sagSwell';
import { checkRelayOperation } from './relayOperation';
import { detectSaturation } from './ctSaturation';
import { checkFrequency, estimateFrequencyDeviations, estimateMeanFrequency } from './frequency';

function requireChannel(input: AnalyzerInput, kind: 'analog' | 'digital'): InputValidation {
  if (!input.channelId) return { valid: false, errors: [`${kind} channel id is required`] };
  return { valid: true };
}

// ============================================================
// 1. 电压暂降
// ============================================================

const sagConfigSchema = z.object({
  nominalVoltage: z.number(),
  sagRatio: z.number(),
  windowSize: z.number(),
});

export class VoltageSagAnalyzer implements IDisturbanceAnalyzer {
  readonly id = 'voltage_sag';
  readonly name = 'Voltage sag detection';
  readonly version = '1.0.0';
  readonly category = 'electrical';

  constructor(private readonly defaults: AnalysisDefaults) {}

  getDefaultConfig(): Record<string, unknown> {
    return {
      sagRatio: this.defaults.sagRatio,
      windowSize: this.defaults.rmsWindow,
    };
  }

  validateInput(input: AnalyzerInput): InputValidation {
    return requireChannel(input, 'analog');
  }

  execute(input: AnalyzerInput, config: Record<string, unknown>): AnalyzerOutput {
    const startTime = Date.now();
    const cfg = parseConfig(sagConfigSchema, this.getDefaultConfig(), config);
    const channel = new WaveformAccessor(input.recording).analog(input.channelId ?? '');

    const sags = detectSags(channel.samples, channel.time, { ...cfg, channelId: channel.id });
    const deepest = sags.reduce((m, s) => Math.min(m, s.minimumMagnitude / cfg.nominalVoltage), 1);

    let severity: SeverityLevel = 'normal';
    if (sags.length > 0) severity = deepest < 0.5 ? 'critical' : deepest < 0.7 ? 'warning' : 'attention';

    return createOutput(this.id, this.version, input, cfg, startTime, {
      summary: sags.length > 0
        ? `${sags.length} voltage sag(s) on '${channel.id}', deepest ${(deepest * 100).toFixed(1)}% of nominal`
        : `No voltage sag on '${channel.id}'`,
      severity,
    }, sags);
  }
}

// ============================================================
// 2. 电压暂升
// ============================================================

const swellConfigSchema = z.object({
  nominalVoltage: z.number(),
  swellRatio: z.number(),
  windowSize: z.number(),
});

export class VoltageSwellAnalyzer implements IDisturbanceAnalyzer {
  readonly id = 'voltage_swell';
  readonly name = 'Voltage swell detection';
  readonly version = '1.0.0';
  readonly category = 'electrical';

  constructor(private readonly defaults: AnalysisDefaults) {}

  getDefaultConfig(): Record<string, unknown> {
    return {
      swellRatio: this.defaults.swellRatio,
      windowSize: this.defaults.rmsWindow,
    };
  }

  validateInput(input: AnalyzerInput): InputValidation {
    return requireChannel(input, 'analog');
  }

  execute(input: AnalyzerInput, config: Record<string, unknown>): AnalyzerOutput {
    const startTime = Date.now();
    const cfg = parseConfig(swellConfigSchema, this.getDefaultConfig(), config);
    const channel = new WaveformAccessor(input.recording).analog(input.channelId ?? '');

    const swells = detectSwells(channel.samples, channel.time, { ...cfg, channelId: channel.id });
    const highest = swells.reduce((m, s) => Math.max(m, s.maximumMagnitude / cfg.nominalVoltage), 1);

    return createOutput(this.id, this.version, input, cfg, startTime, {
      summary: swells.length > 0
        ? `${swells.length} voltage swell(s) on '${channel.id}', highest ${(highest * 100).toFixed(1)}% of nominal`
        : `No voltage swell on '${channel.id}'`,
      severity: swells.length === 0 ? 'normal' : highest > 1.2 ? 'warning' : 'attention',
    }, swells);
  }
}

// ============================================================
// 3. 继电器动作
// ============================================================

const relayConfigSchema = z.object({
  referenceTime: z.number(),
  minDelay: z.number().optional(),
  maxDelay: z.number().optional(),
});

export class RelayOperationAnalyzer implements IDisturbanceAnalyzer {
  readonly id = 'relay_operation';
  readonly name = 'Relay operation check';
  readonly version = '1.0.0';
  readonly category = 'electrical';

  constructor(private readonly defaults: AnalysisDefaults) {}

  getDefaultConfig(): Record<string, unknown> {
    return {
      minDelay: this.defaults.tripDelayBounds.min,
      maxDelay: this.defaults.tripDelayBounds.max,
    };
  }

  validateInput(input: AnalyzerInput): InputValidation {
    return requireChannel(input, 'digital');
  }

  execute(input: AnalyzerInput, config: Record<string, unknown>): AnalyzerOutput {
    const startTime = Date.now();
    const cfg = parseConfig(relayConfigSchema, this.getDefaultConfig(), config);
    const channel = new WaveformAccessor(input.recording).digital(input.channelId ?? '');

    // 上下限缺任意一个就不做区间判定
    const bounds = cfg.minDelay !== undefined && cfg.maxDelay !== undefined
      ? { min: cfg.minDelay, max: cfg.maxDelay }
      : undefined;
    const trip = checkRelayOperation(channel.samples, channel.time, cfg.referenceTime, {
      bounds,
      channelId: channel.id,
    });

    const severityByClass: Record<typeof trip.classification, SeverityLevel> = {
      on_time: 'normal',
      late: 'warning',
      premature: 'warning',
      missing: 'critical',
    };

    return createOutput(this.id, this.version, input, cfg, startTime, {
      summary: trip.label,
      severity: severityByClass[trip.classification],
    }, [trip]);
  }
}

// ============================================================
// 4. CT饱和
// ============================================================

const saturationConfigSchema = z.object({
  windowSize: z.number(),
  flatnessThreshold: z.number(),
  highCurrentThreshold: z.number(),
});

export class CtSaturationAnalyzer implements IDisturbanceAnalyzer {
  readonly id = 'ct_saturation';
  readonly name = 'CT saturation detection';
  readonly version = '1.0.0';
  readonly category = 'electrical';

  constructor(private readonly defaults: AnalysisDefaults) {}

  getDefaultConfig(): Record<string, unknown> {
    return {
      windowSize: this.defaults.saturationWindow,
      flatnessThreshold: this.defaults.flatnessThreshold,
      highCurrentThreshold: this.defaults.highCurrentThreshold,
    };
  }

  validateInput(input: AnalyzerInput): InputValidation {
    return requireChannel(input, 'analog');
  }

  execute(input: AnalyzerInput, config: Record<string, unknown>): AnalyzerOutput {
    const startTime = Date.now();
    const cfg = parseConfig(saturationConfigSchema, this.getDefaultConfig(), config);
    const channel = new WaveformAccessor(input.recording).analog(input.channelId ?? '');

    const events = detectSaturation(channel.samples, channel.time, { ...cfg, channelId: channel.id });
    const worst = events.reduce((m, e) => Math.max(m, e.severity), 0);

    return createOutput(this.id, this.version, input, cfg, startTime, {
      summary: events.length > 0
        ? `${events.length} potential CT saturation interval(s) on '${channel.id}' (heuristic)`
        : `No CT saturation signature on '${channel.id}'`,
      severity: events.length === 0 ? 'normal' : worst > 0.8 ? 'warning' : 'attention',
    }, events);
  }
}

// ============================================================
// 5. 频率偏差
// ============================================================

const frequencyConfigSchema = z.object({
  expectedFrequency: z.number(),
  tolerance: z.number(),
});

export class FrequencyDeviationAnalyzer implements IDisturbanceAnalyzer {
  readonly id = 'frequency_deviation';
  readonly name = 'Frequency deviation check';
  readonly version = '1.0.0';
  readonly category = 'electrical';

  constructor(private readonly defaults: AnalysisDefaults) {}

  getDefaultConfig(): Record<string, unknown> {
    return {
      expectedFrequency: this.defaults.expectedFrequency,
      tolerance: this.defaults.frequencyTolerance,
    };
  }

  /** 通道可选：不给通道时只检查元数据 */
  validateInput(_input: AnalyzerInput): InputValidation {
    return { valid: true };
  }

  execute(input: AnalyzerInput, config: Record<string, unknown>): AnalyzerOutput {
    const startTime = Date.now();
    const cfg = parseConfig(frequencyConfigSchema, this.getDefaultConfig(), config);
    const findings: Finding[] = [];

    const declared = checkFrequency(input.recording.metadata.nominalFrequency, cfg.expectedFrequency, cfg.tolerance);
    if (declared) findings.push(declared);

    let measured: number | null = null;
    if (input.channelId) {
      const channel = new WaveformAccessor(input.recording).analog(input.channelId);
      findings.push(...estimateFrequencyDeviations(channel.samples, channel.time, {
        nominalFrequency: cfg.expectedFrequency,
        threshold: cfg.tolerance,
        channelId: channel.id,
      }));
      measured = estimateMeanFrequency(channel.samples, channel.time);
    }

    const parts = [declared ? declared.label : `Declared frequency ${input.recording.metadata.nominalFrequency} Hz`];
    if (measured !== null) parts.push(`measured ${measured.toFixed(3)} Hz`);

    return createOutput(this.id, this.version, input, cfg, startTime, {
      summary: parts.join(', '),
      severity: findings.length === 0 ? 'normal' : declared ? 'warning' : 'attention',
    }, findings);
  }
}

// ============================================================
// 导出
// ============================================================

export function getElectricalAnalyzers(defaults: AnalysisDefaults): AnalyzerRegistration[] {
  return [
    {
      analyzer: new VoltageSagAnalyzer(defaults),
      metadata: {
        description: 'Sliding-window RMS sag detection; contiguous below-threshold runs become events with the minimum RMS',
        tags: ['sag', 'dip', 'rms', 'voltage'],
        channelKind: 'analog',
        configFields: [
          { name: 'nominalVoltage', type: 'number', required: true, description: 'Nominal RMS voltage' },
          { name: 'sagRatio', type: 'number', default: defaults.sagRatio },
          { name: 'windowSize', type: 'number', default: defaults.rmsWindow, description: 'RMS window (samples)' },
        ],
        complexity: 'O(N)',
        referenceStandards: ['IEEE 1159', 'IEC 61000-4-30'],
      },
    },
    {
      analyzer: new VoltageSwellAnalyzer(defaults),
      metadata: {
        description: 'Sliding-window RMS swell detection with the maximum RMS of each run',
        tags: ['swell', 'rms', 'voltage'],
        channelKind: 'analog',
        configFields: [
          { name: 'nominalVoltage', type: 'number', required: true },
          { name: 'swellRatio', type: 'number', default: defaults.swellRatio },
          { name: 'windowSize', type: 'number', default: defaults.rmsWindow },
        ],
        complexity: 'O(N)',
        referenceStandards: ['IEEE 1159', 'IEC 61000-4-30'],
      },
    },
    {
      analyzer: new RelayOperationAnalyzer(defaults),
      metadata: {
        description: 'Trip latency after a reference fault time, classified as on time, late, premature or missing',
        tags: ['relay', 'trip', 'protection'],
        channelKind: 'digital',
        configFields: [
          { name: 'referenceTime', type: 'number', required: true, description: 'Fault reference time (s)' },
          { name: 'minDelay', type: 'number', default: defaults.tripDelayBounds.min },
          { name: 'maxDelay', type: 'number', default: defaults.tripDelayBounds.max },
        ],
        complexity: 'O(N)',
      },
    },
    {
      analyzer: new CtSaturationAnalyzer(defaults),
      metadata: {
        description: 'Heuristic CT saturation signature: collapsed successive-sample variability at elevated current',
        tags: ['ct', 'saturation', 'current'],
        channelKind: 'analog',
        configFields: [
          { name: 'windowSize', type: 'number', default: defaults.saturationWindow },
          { name: 'flatnessThreshold', type: 'number', default: defaults.flatnessThreshold },
          { name: 'highCurrentThreshold', type: 'number', default: defaults.highCurrentThreshold },
        ],
        complexity: 'O(N·W)',
      },
    },
    {
      analyzer: new FrequencyDeviationAnalyzer(defaults),
      metadata: {
        description: 'Declared nominal frequency check plus per-cycle zero-crossing frequency estimation',
        tags: ['frequency', 'zero-crossing'],
        channelKind: 'analog',
        configFields: [
          { name: 'expectedFrequency', type: 'select', options: [50, 60], default: defaults.expectedFrequency },
          { name: 'tolerance', type: 'number', default: defaults.frequencyTolerance },
        ],
        complexity: 'O(N)',
      },
    },
  ];
}
