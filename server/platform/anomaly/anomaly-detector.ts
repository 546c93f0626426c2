/**
 * ============================================================================
 * 异常等级检测器 — 对外唯一入口
 * ============================================================================
 *
 * 外部调用方只接触 evaluate(ep, mv, mc)，不直接操作隶属度函数或规则。
 *
 * 配置（语言变量 + 规则库 + 分辨率 + 兜底策略）在构造时一次性建立并冻结，
 * 之后只读；同一进程内可以并存多个互相独立的检测器（例如测试中的退化规则库）。
 *
 * 使用方式：
 *   import { createAnomalyDetector } from './anomaly-detector';
 *   const detector = createAnomalyDetector();
 *   const { score, label } = detector.evaluate(0.12, 0.05, 0.3);
 */

import '../../core/env-loader';
import { config } from '../../core/config';
import { validateConfigOrThrow } from '../../core/config-schema';
import { createModuleLogger, setLogLevel } from '../../core/logger';
import { InferenceEngine } from './fuzzy/inference-engine';
import type { LinguisticVariable } from './fuzzy/linguistic-variable';
import type { RuleBase } from './fuzzy/rule-base';
import type { EvaluationResult, UncoveredPolicy } from './fuzzy/types';
import {
  createInputVariables,
  createOutputVariable,
  createRuleBase,
  type RuleSetName,
} from './default-config';
import { computeWindowIndicators, type WindowIndicators } from './indicators/window-indicators';

const log = createModuleLogger('anomaly-detector');

// ============================================================================
// 检测器配置
// ============================================================================

export interface DetectorConfig {
  /** 输入变量，顺序为 EP, MV, MC */
  readonly inputs: readonly [LinguisticVariable, LinguisticVariable, LinguisticVariable];
  readonly output: LinguisticVariable;
  readonly ruleBase: RuleBase;
  readonly resolution: number;
  readonly uncoveredPolicy: UncoveredPolicy;
}

export interface AnomalyAssessment extends EvaluationResult {
  indicators: WindowIndicators;
}

export class AnomalyDetector {
  readonly config: DetectorConfig;
  private readonly engine: InferenceEngine;

  constructor(detectorConfig: DetectorConfig) {
    this.config = Object.freeze({ ...detectorConfig });
    this.engine = new InferenceEngine(detectorConfig.inputs, detectorConfig.output, detectorConfig.ruleBase, {
      resolution: detectorConfig.resolution,
      uncoveredPolicy: detectorConfig.uncoveredPolicy,
    });
  }

  /**
   * 三个归一化指标 → 异常等级
   *
   * @throws InputOutOfRangeError 任一输入不在对应论域内（默认 [0, 1]）或非有限值
   */
  evaluate(forecastError: number, varianceChange: number, correlationChange: number): EvaluationResult {
    const [ep, mv, mc] = this.config.inputs;
    return this.engine.evaluate({
      [ep.name]: forecastError,
      [mv.name]: varianceChange,
      [mc.name]: correlationChange,
    });
  }

  evaluateIndicators(indicators: WindowIndicators): EvaluationResult {
    return this.evaluate(indicators.forecastError, indicators.varianceChange, indicators.correlationChange);
  }

  /** 从原始窗口与基线直接得到异常等级 */
  evaluateWindow(window: readonly (readonly number[])[], baseline: readonly (readonly number[])[]): AnomalyAssessment {
    const indicators = computeWindowIndicators(window, baseline);
    const result = this.evaluateIndicators(indicators);
    log.debug({ ...indicators, score: result.score, label: result.label }, 'Window evaluated');
    return { ...result, indicators };
  }
}

// ============================================================================
// 工厂
// ============================================================================

export interface CreateDetectorOptions {
  ruleSet?: RuleSetName;
  resolution?: number;
  uncoveredPolicy?: UncoveredPolicy;
  /** 替换默认规则库（例如退化规则库、扩展覆盖） */
  ruleBase?: RuleBase;
}

/**
 * 用默认语言变量构建检测器
 *
 * 未显式给出的参数取自运行时配置（FIS_RULE_SET / FIS_RESOLUTION / FIS_UNCOVERED_POLICY），
 * 校验通过的 LOG_LEVEL 同时应用到全局日志级别。
 * 配置非法时抛 ConfigurationError，初始化即失败。
 */
export function createAnomalyDetector(options: CreateDetectorOptions = {}): AnomalyDetector {
  const runtime = validateConfigOrThrow(config);
  setLogLevel(runtime.app.logLevel);
  const ruleSet = options.ruleSet ?? runtime.fis.ruleSet;

  const detector = new AnomalyDetector({
    inputs: createInputVariables(),
    output: createOutputVariable(),
    ruleBase: options.ruleBase ?? createRuleBase(ruleSet),
    resolution: options.resolution ?? runtime.fis.resolution,
    uncoveredPolicy: options.uncoveredPolicy ?? runtime.fis.uncoveredPolicy,
  });

  log.info({
    app: runtime.app.name,
    ruleSet: options.ruleBase ? 'custom' : ruleSet,
    rulesCount: detector.config.ruleBase.size,
  }, 'Anomaly detector ready');

  return detector;
}
