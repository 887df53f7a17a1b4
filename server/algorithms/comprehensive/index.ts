/**
 * 综合故障分析模块
 *
 * 1. 故障关联：电压暂降起点作为参考时刻，关联跳闸开关量与 CT 饱和
 * 2. 通道网格搜索：对所有 (电压, 电流) 模拟通道组合与全部开关量通道执行故障关联
 *
 * 参数越界在分析任何通道之前抛出，不返回部分结果；
 * 参数合法时，故障关联的每一部分独立执行，某个通道缺失只记录到 errors。
 */

import { z } from 'zod';
import { safeExec, type AnalysisError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import type { AnalysisDefaults } from '../../core/config';
import { WaveformAccessor } from '../../recording/recording';
import type { Recording } from '../../recording/types';
import { createOutput, parseConfig } from '../_core/output';
import type {
  AnalyzerInput,
  AnalyzerOutput,
  AnalyzerRegistration,
  DelayBounds,
  Finding,
  IDisturbanceAnalyzer,
  InputValidation,
  SagEvent,
  SaturationEvent,
  TripInfo,
} from '../_core/types';
import { assertSagOptions, detectSags } from '../electrical/sagSwell';
import { assertDelayBounds, checkRelayOperation } from '../electrical/relayOperation';
import { assertSaturationOptions, detectSaturation } from '../electrical/ctSaturation';

const log = createModuleLogger('fault-correlation');

export type FaultPart = 'sag' | 'relay' | 'saturation';

export interface FaultPartError {
  part: FaultPart;
  channelId: string;
  code: string;
  message: string;
}

export interface FaultAnalysisOptions {
  voltageChannel: string;
  currentChannel: string;
  tripChannel: string;
  nominalVoltage: number;
  sagRatio: number;
  rmsWindow: number;
  saturationWindow: number;
  flatnessThreshold: number;
  highCurrentThreshold: number;
  tripDelayBounds?: DelayBounds;
}

export interface FaultReport {
  voltageChannel: string;
  currentChannel: string;
  tripChannel: string;
  sags: SagEvent[];
  /** 第一次暂降的起点；没有暂降时不检查继电器 */
  referenceTime?: number;
  trip?: TripInfo;
  saturation: SaturationEvent[];
  errors: FaultPartError[];
}

function toPartError(part: FaultPart, channelId: string, err: AnalysisError): FaultPartError {
  return { part, channelId, code: err.codeName, message: err.message };
}

export type FaultParameters = Omit<FaultAnalysisOptions, 'voltageChannel' | 'currentChannel' | 'tripChannel'>;

function assertFaultParameters(options: FaultParameters, sampleCount: number): void {
  assertSagOptions(
    { nominalVoltage: options.nominalVoltage, sagRatio: options.sagRatio, windowSize: options.rmsWindow },
    sampleCount,
  );
  assertSaturationOptions(
    {
      windowSize: options.saturationWindow,
      flatnessThreshold: options.flatnessThreshold,
      highCurrentThreshold: options.highCurrentThreshold,
    },
    sampleCount,
  );
  if (options.tripDelayBounds) assertDelayBounds(options.tripDelayBounds);
}

/**
 * 单组通道的故障关联分析
 *
 * @throws InvalidReferenceError / InvalidWindowError / ValidationError 参数越界
 */
export function analyzeFaults(recording: Recording, options: FaultAnalysisOptions): FaultReport {
  assertFaultParameters(options, recording.time.length);
  const accessor = new WaveformAccessor(recording);
  const errors: FaultPartError[] = [];
  const report: FaultReport = {
    voltageChannel: options.voltageChannel,
    currentChannel: options.currentChannel,
    tripChannel: options.tripChannel,
    sags: [],
    saturation: [],
    errors,
  };

  const sagResult = safeExec(() => {
    const ch = accessor.analog(options.voltageChannel);
    return detectSags(ch.samples, ch.time, {
      nominalVoltage: options.nominalVoltage,
      sagRatio: options.sagRatio,
      windowSize: options.rmsWindow,
      channelId: ch.id,
    });
  });
  if (sagResult.ok) report.sags = sagResult.value;
  else errors.push(toPartError('sag', options.voltageChannel, sagResult.error));

  if (report.sags.length > 0) {
    const referenceTime = report.sags[0].startTime;
    report.referenceTime = referenceTime;
    const tripResult = safeExec(() => {
      const ch = accessor.digital(options.tripChannel);
      return checkRelayOperation(ch.samples, ch.time, referenceTime, {
        bounds: options.tripDelayBounds,
        channelId: ch.id,
      });
    });
    if (tripResult.ok) report.trip = tripResult.value;
    else errors.push(toPartError('relay', options.tripChannel, tripResult.error));
  }

  const satResult = safeExec(() => {
    const ch = accessor.analog(options.currentChannel);
    return detectSaturation(ch.samples, ch.time, {
      windowSize: options.saturationWindow,
      flatnessThreshold: options.flatnessThreshold,
      highCurrentThreshold: options.highCurrentThreshold,
      channelId: ch.id,
    });
  });
  if (satResult.ok) report.saturation = satResult.value;
  else errors.push(toPartError('saturation', options.currentChannel, satResult.error));

  return report;
}

// ============================================================
// 通道网格搜索
// ============================================================

export type GridSearchOptions = FaultParameters;

export interface GridSearchHit {
  voltageChannel: string;
  currentChannel: string;
  sag: SagEvent;
  saturation: SaturationEvent[];
  /** 暂降起点之后确有跳闸的开关量通道 */
  trips: TripInfo[];
}

/**
 * 遍历所有有序 (电压, 电流) 模拟通道对；电压通道出现暂降时，
 * 对电流通道做饱和检测，并对全部开关量通道以暂降起点检查跳闸。
 * 通道均取自录波本身，参数检查通过后检测器的任何异常直接向上抛出。
 *
 * @throws InvalidReferenceError / InvalidWindowError / ValidationError 参数越界
 */
export function gridSearch(recording: Recording, options: GridSearchOptions): GridSearchHit[] {
  assertFaultParameters(options, recording.time.length);
  const accessor = new WaveformAccessor(recording);
  const analog = accessor.listAnalog();
  const digital = accessor.listDigital();
  const hits: GridSearchHit[] = [];

  for (const voltageChannel of analog) {
    const voltage = accessor.analog(voltageChannel);
    const sags = detectSags(voltage.samples, voltage.time, {
      nominalVoltage: options.nominalVoltage,
      sagRatio: options.sagRatio,
      windowSize: options.rmsWindow,
      channelId: voltage.id,
    });
    if (sags.length === 0) continue;
    const sag = sags[0];

    const trips: TripInfo[] = [];
    for (const tripChannel of digital) {
      const ch = accessor.digital(tripChannel);
      const trip = checkRelayOperation(ch.samples, ch.time, sag.startTime, {
        bounds: options.tripDelayBounds,
        channelId: ch.id,
      });
      if (trip.tripTime !== undefined) trips.push(trip);
    }

    for (const currentChannel of analog) {
      if (currentChannel === voltageChannel) continue;
      const current = accessor.analog(currentChannel);
      const saturation = detectSaturation(current.samples, current.time, {
        windowSize: options.saturationWindow,
        flatnessThreshold: options.flatnessThreshold,
        highCurrentThreshold: options.highCurrentThreshold,
        channelId: current.id,
      });
      hits.push({ voltageChannel, currentChannel, sag, saturation, trips });
    }
  }

  log.debug({ combinations: hits.length }, 'Grid search complete');
  return hits;
}

// ============================================================
// 故障关联分析器
// ============================================================

const correlationConfigSchema = z.object({
  currentChannel: z.string().min(1),
  tripChannel: z.string().min(1),
  nominalVoltage: z.number(),
  sagRatio: z.number(),
  rmsWindow: z.number(),
  saturationWindow: z.number(),
  flatnessThreshold: z.number(),
  highCurrentThreshold: z.number(),
  minDelay: z.number().optional(),
  maxDelay: z.number().optional(),
});

export class FaultCorrelationAnalyzer implements IDisturbanceAnalyzer {
  readonly id = 'fault_correlation';
  readonly name = 'Fault correlation';
  readonly version = '1.0.0';
  readonly category = 'comprehensive';

  constructor(private readonly defaults: AnalysisDefaults) {}

  getDefaultConfig(): Record<string, unknown> {
    return {
      sagRatio: this.defaults.sagRatio,
      rmsWindow: this.defaults.rmsWindow,
      saturationWindow: this.defaults.saturationWindow,
      flatnessThreshold: this.defaults.flatnessThreshold,
      highCurrentThreshold: this.defaults.highCurrentThreshold,
      minDelay: this.defaults.tripDelayBounds.min,
      maxDelay: this.defaults.tripDelayBounds.max,
    };
  }

  /** channelId 为电压通道 */
  validateInput(input: AnalyzerInput): InputValidation {
    if (!input.channelId) return { valid: false, errors: ['voltage channel id is required'] };
    return { valid: true };
  }

  execute(input: AnalyzerInput, config: Record<string, unknown>): AnalyzerOutput {
    const startTime = Date.now();
    const cfg = parseConfig(correlationConfigSchema, this.getDefaultConfig(), config);
    const { minDelay, maxDelay, ...rest } = cfg;

    const report = analyzeFaults(input.recording, {
      ...rest,
      voltageChannel: input.channelId ?? '',
      tripDelayBounds: minDelay !== undefined && maxDelay !== undefined ? { min: minDelay, max: maxDelay } : undefined,
    });

    const findings: Finding[] = [...report.sags];
    if (report.trip) findings.push(report.trip);
    findings.push(...report.saturation);

    const parts: string[] = [];
    if (report.sags.length > 0) {
      parts.push(report.sags[0].label);
      if (report.trip) parts.push(report.trip.label);
    } else if (!report.errors.some(e => e.part === 'sag')) {
      parts.push('No voltage sags detected');
    }
    if (report.saturation.length > 0) parts.push(report.saturation[0].label);
    for (const e of report.errors) parts.push(`${e.part} check failed: ${e.message}`);

    const tripProblem = report.trip !== undefined && report.trip.classification !== 'on_time';
    return createOutput(this.id, this.version, input, cfg, startTime, {
      summary: parts.join('; '),
      severity: tripProblem ? 'critical'
        : report.errors.length > 0 || report.saturation.length > 0 ? 'warning'
          : report.sags.length > 0 ? 'attention' : 'normal',
    }, findings);
  }
}

export function getComprehensiveAnalyzers(defaults: AnalysisDefaults): AnalyzerRegistration[] {
  return [
    {
      analyzer: new FaultCorrelationAnalyzer(defaults),
      metadata: {
        description: 'Ties the first voltage sag to the relay trip channel and checks the current channel for CT saturation',
        tags: ['fault', 'correlation', 'sag', 'relay', 'ct'],
        channelKind: 'mixed',
        configFields: [
          { name: 'nominalVoltage', type: 'number', required: true },
          { name: 'currentChannel', type: 'string', required: true },
          { name: 'tripChannel', type: 'string', required: true },
          { name: 'sagRatio', type: 'number', default: defaults.sagRatio },
          { name: 'rmsWindow', type: 'number', default: defaults.rmsWindow },
          { name: 'saturationWindow', type: 'number', default: defaults.saturationWindow },
          { name: 'flatnessThreshold', type: 'number', default: defaults.flatnessThreshold },
          { name: 'highCurrentThreshold', type: 'number', default: defaults.highCurrentThreshold },
          { name: 'minDelay', type: 'number', default: defaults.tripDelayBounds.min },
          { name: 'maxDelay', type: 'number', default: defaults.tripDelayBounds.max },
        ],
        complexity: 'O(N·W)',
      },
    },
  ];
}
