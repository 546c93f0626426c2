/**
 * ============================================================================
 * Mamdani 推理引擎
 * ============================================================================
 *
 * 一次 evaluate() 的流程：
 *   1. 输入越界检查（不做截断，越界直接抛 InputOutOfRangeError）
 *   2. 模糊化：变量 → (模糊集 → 隶属度)
 *   3. 规则激活：strength_r = weight_r × μ(antecedent_r)
 *      聚合：aggregated[s] = max{ strength_r | consequent_r = s }
 *   4. 质心去模糊化：
 *        μ*(x) = max_s min(aggregated[s], μ_s(x))
 *        score = Σ x·μ*(x) / Σ μ*(x)
 *   5. Σ μ*(x) = 0 时进入兜底分支（见 resolveUncovered）
 *   6. 标签：score 处隶属度最大的输出模糊集，平局取声明顺序靠前者
 *
 * 引擎构造后只读；每次调用只分配局部中间结构，可并发共享。
 */

import { createModuleLogger } from '../../../core/logger';
import { InputOutOfRangeError, ValidationError } from '../../../core/errors';
import { degree, peakOf } from './membership';
import { firingStrength, type RuleBase } from './rule-base';
import type { LinguisticVariable } from './linguistic-variable';
import {
  UNDETERMINED_LABEL,
  type Antecedent,
  type EvaluationResult,
  type FuzzifiedInputs,
  type Rule,
  type RuleFiring,
  type UncoveredPolicy,
} from './types';

const log = createModuleLogger('inference-engine');

// ============================================================================
// 引擎配置
// ============================================================================

export interface InferenceEngineOptions {
  /**
   * 质心积分步长
   * 调参常量，不影响语义；默认 0.01
   */
  resolution: number;

  /**
   * 无规则激活时的策略
   *   - undetermined：返回输出论域中点，标签 'undetermined'
   *   - nearest-rule：取原型点距离输入最近的规则，返回其结论模糊集峰值
   */
  uncoveredPolicy: UncoveredPolicy;
}

export const DEFAULT_ENGINE_OPTIONS: Readonly<InferenceEngineOptions> = Object.freeze({
  resolution: 0.01,
  uncoveredPolicy: 'undetermined',
});

export class InferenceEngine {
  readonly inputs: readonly LinguisticVariable[];
  readonly output: LinguisticVariable;
  readonly ruleBase: RuleBase;
  readonly options: Readonly<InferenceEngineOptions>;
  /** 输出论域采样点，构造时计算一次 */
  private readonly samplePoints: readonly number[];

  constructor(
    inputs: readonly LinguisticVariable[],
    output: LinguisticVariable,
    ruleBase: RuleBase,
    options?: Partial<InferenceEngineOptions>,
  ) {
    this.options = Object.freeze({ ...DEFAULT_ENGINE_OPTIONS, ...options });

    const names = new Set<string>();
    for (const v of inputs) {
      if (names.has(v.name)) {
        throw new ValidationError(`Duplicate input variable '${v.name}'`, { variable: v.name });
      }
      names.add(v.name);
    }
    if (inputs.length === 0) {
      throw new ValidationError('Inference engine needs at least one input variable');
    }

    // 配置期校验：规则引用错误在这里失败，不会拖到推理时
    ruleBase.validate(inputs, output);
    ruleBase.freeze();

    this.inputs = Object.freeze([...inputs]);
    this.output = output;
    this.ruleBase = ruleBase;
    this.samplePoints = Object.freeze(output.samples(this.options.resolution));

    log.info({
      inputs: this.inputs.map(v => v.name),
      output: output.name,
      rulesCount: ruleBase.size,
      resolution: this.options.resolution,
      uncoveredPolicy: this.options.uncoveredPolicy,
    }, 'Inference engine initialized');
  }

  // ==========================================================================
  // 公共 API
  // ==========================================================================

  /**
   * 对一组清晰输入做一次完整推理
   *
   * @param values 变量名 → 清晰值，每个值必须落在对应变量的论域内
   */
  evaluate(values: Readonly<Record<string, number>>): EvaluationResult {
    const fuzzified = this.fuzzify(values);

    const firings: RuleFiring[] = [];
    const aggregated: Record<string, number> = {};
    for (const name of this.output.setNames) {
      aggregated[name] = 0;
    }

    for (const rule of this.ruleBase.rules) {
      const strength = firingStrength(rule, fuzzified);
      firings.push({ ruleId: rule.id, strength });
      if (strength > (aggregated[rule.consequent] ?? 0)) {
        aggregated[rule.consequent] = strength;
      }
    }

    const centroid = this.defuzzify(aggregated);
    if (centroid === null) {
      return this.resolveUncovered(values, aggregated, firings);
    }

    return {
      score: centroid,
      label: this.labelAt(centroid),
      undetermined: false,
      interpolated: false,
      aggregated,
      firings,
    };
  }

  /** 输入检查 + 模糊化 */
  fuzzify(values: Readonly<Record<string, number>>): FuzzifiedInputs {
    const out: FuzzifiedInputs = {};
    for (const variable of this.inputs) {
      const value = values[variable.name];
      if (value === undefined || !variable.contains(value)) {
        throw new InputOutOfRangeError(variable.name, value, variable.domain);
      }
      out[variable.name] = variable.fuzzify(value);
    }
    return out;
  }

  /**
   * 质心去模糊化
   *
   * @returns 质心；聚合隶属度处处为 0 时返回 null
   */
  defuzzify(aggregated: Readonly<Record<string, number>>): number | null {
    const active = this.output.fuzzySets.filter(s => (aggregated[s.name] ?? 0) > 0);
    if (active.length === 0) return null;

    let weighted = 0;
    let total = 0;
    for (const x of this.samplePoints) {
      let mu = 0;
      for (const set of active) {
        const clipped = Math.min(aggregated[set.name] ?? 0, degree(set.shape, x));
        if (clipped > mu) mu = clipped;
      }
      weighted += x * mu;
      total += mu;
    }

    if (total === 0) return null;
    return weighted / total;
  }

  /** score 处隶属度最大的输出模糊集；平局保留声明顺序靠前者 */
  labelAt(score: number): string {
    let best = '';
    let bestDegree = -1;
    for (const set of this.output.fuzzySets) {
      const d = degree(set.shape, score);
      if (d > bestDegree) {
        best = set.name;
        bestDegree = d;
      }
    }
    return best;
  }

  // ==========================================================================
  // 兜底分支
  // ==========================================================================

  /**
   * 没有任何规则以正强度激活时的确定性输出
   *
   * 这是一条正式的返回路径，不是错误：调用方通过 undetermined / interpolated
   * 区分 "计算得到 normal" 与 "没有规则覆盖该输入"。
   */
  private resolveUncovered(
    values: Readonly<Record<string, number>>,
    aggregated: Record<string, number>,
    firings: RuleFiring[],
  ): EvaluationResult {
    if (this.options.uncoveredPolicy === 'nearest-rule') {
      const nearest = this.nearestRule(values);
      if (nearest) {
        const set = this.output.getSet(nearest.consequent);
        if (set) {
          log.debug({ ruleId: nearest.id, inputs: values }, 'No rule fired, using nearest rule');
          return {
            score: peakOf(set.shape),
            label: set.name,
            undetermined: false,
            interpolated: true,
            aggregated,
            firings,
          };
        }
      }
    }

    const [lo, hi] = this.output.domain;
    log.debug({ inputs: values }, 'No rule fired, returning domain midpoint');
    return {
      score: (lo + hi) / 2,
      label: UNDETERMINED_LABEL,
      undetermined: true,
      interpolated: false,
      aggregated,
      firings,
    };
  }

  /**
   * 原型点距离最近的规则（平局取规则顺序靠前者）
   *
   * 叶子距离 = ((x - peak) / (hi - lo))²，AND 求和，OR 取最小。
   * 权重为 0 的规则永远不会激活，不参与比较。
   */
  private nearestRule(values: Readonly<Record<string, number>>): Rule | undefined {
    let best: Rule | undefined;
    let bestDistance = Infinity;
    for (const rule of this.ruleBase.rules) {
      if (rule.weight <= 0) continue;
      const distance = this.prototypeDistance(rule.antecedent, values);
      if (distance < bestDistance) {
        best = rule;
        bestDistance = distance;
      }
    }
    return best;
  }

  private prototypeDistance(antecedent: Antecedent, values: Readonly<Record<string, number>>): number {
    switch (antecedent.kind) {
      case 'term': {
        const variable = this.inputs.find(v => v.name === antecedent.variable);
        const set = variable?.getSet(antecedent.set);
        const value = values[antecedent.variable];
        if (!variable || !set || value === undefined) return Infinity;
        const [lo, hi] = variable.domain;
        const delta = (value - peakOf(set.shape)) / (hi - lo);
        return delta * delta;
      }
      case 'and':
        return antecedent.children.reduce((sum, child) => sum + this.prototypeDistance(child, values), 0);
      case 'or':
        return antecedent.children.reduce((min, child) => Math.min(min, this.prototypeDistance(child, values)), Infinity);
    }
  }
}
