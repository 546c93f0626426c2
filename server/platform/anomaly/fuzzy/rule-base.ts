/**
 * ============================================================================
 * 规则库 — Mamdani IF-THEN 规则
 * ============================================================================
 *
 * 前件为带标签的树：
 *   term(variable, set)  → 直接查表 inputDegrees[variable][set]
 *   and(...children)     → min
 *   or(...children)      → max
 *
 * 规则强度 = weight × 前件隶属度。
 * 规则之间相互独立，顺序只影响诊断输出中的先后。
 *
 * 生命周期：构造 → addRule(...) → freeze()。冻结后只读，可被多个调用方共享。
 */

import { RuleBaseFrozenError, UnknownTermError, ValidationError } from '../../../core/errors';
import type { LinguisticVariable } from './linguistic-variable';
import type { Antecedent, FuzzifiedInputs, Rule, RuleDefinition, TermNode } from './types';

// ============================================================================
// 前件构造器
// ============================================================================

export function term(variable: string, set: string): TermNode {
  return { kind: 'term', variable, set };
}

export function and(...children: Antecedent[]): Antecedent {
  return { kind: 'and', children };
}

export function or(...children: Antecedent[]): Antecedent {
  return { kind: 'or', children };
}

/** 前件中引用的全部叶子（深度优先，保持书写顺序） */
export function collectTerms(antecedent: Antecedent): TermNode[] {
  if (antecedent.kind === 'term') return [antecedent];
  return antecedent.children.flatMap(collectTerms);
}

// ============================================================================
// 前件求值
// ============================================================================

/**
 * 递归求前件隶属度：AND 取最小，OR 取最大
 *
 * 未模糊化的 (变量, 模糊集) 属于配置错误，抛 UnknownTermError。
 */
export function evaluateAntecedent(antecedent: Antecedent, inputDegrees: FuzzifiedInputs): number {
  switch (antecedent.kind) {
    case 'term': {
      const degrees = inputDegrees[antecedent.variable];
      if (degrees === undefined) {
        throw new UnknownTermError(antecedent.variable);
      }
      const value = degrees[antecedent.set];
      if (value === undefined) {
        throw new UnknownTermError(antecedent.variable, antecedent.set);
      }
      return value;
    }
    case 'and':
      return antecedent.children.reduce(
        (acc, child) => Math.min(acc, evaluateAntecedent(child, inputDegrees)),
        1,
      );
    case 'or':
      return antecedent.children.reduce(
        (acc, child) => Math.max(acc, evaluateAntecedent(child, inputDegrees)),
        0,
      );
  }
}

/** 整条规则的激活强度 */
export function firingStrength(rule: Rule, inputDegrees: FuzzifiedInputs): number {
  return rule.weight * evaluateAntecedent(rule.antecedent, inputDegrees);
}

// ============================================================================
// 规则库
// ============================================================================

export class RuleBase {
  private readonly items: Rule[] = [];
  private frozen = false;

  constructor(definitions: readonly RuleDefinition[] = []) {
    for (const def of definitions) {
      this.addRule(def);
    }
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.items.length;
  }

  /** 按添加顺序的只读规则列表 */
  get rules(): readonly Rule[] {
    return this.items;
  }

  /** 追加一条规则；冻结后调用抛 RuleBaseFrozenError */
  addRule(definition: RuleDefinition): this {
    if (this.frozen) {
      throw new RuleBaseFrozenError(definition.id);
    }

    const weight = definition.weight ?? 1.0;
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new ValidationError(`Rule '${definition.id}' weight must be within [0, 1], got ${weight}`, {
        ruleId: definition.id,
        weight,
      });
    }
    if (this.items.some(r => r.id === definition.id)) {
      throw new ValidationError(`Duplicate rule id '${definition.id}'`, { ruleId: definition.id });
    }
    assertNonEmpty(definition.antecedent, definition.id);

    this.items.push(Object.freeze({
      id: definition.id,
      antecedent: deepFreeze(definition.antecedent),
      consequent: definition.consequent,
      weight,
    }));
    return this;
  }

  /**
   * 校验规则引用：前件叶子必须是已定义的输入变量/模糊集，结论必须是输出模糊集
   */
  validate(inputs: readonly LinguisticVariable[], output: LinguisticVariable): void {
    const byName = new Map(inputs.map(v => [v.name, v]));

    for (const rule of this.items) {
      for (const leaf of collectTerms(rule.antecedent)) {
        const variable = byName.get(leaf.variable);
        if (!variable) {
          throw new UnknownTermError(leaf.variable, undefined, { ruleId: rule.id });
        }
        if (!variable.hasSet(leaf.set)) {
          throw new UnknownTermError(leaf.variable, leaf.set, { ruleId: rule.id });
        }
      }
      if (!output.hasSet(rule.consequent)) {
        throw new UnknownTermError(output.name, rule.consequent, { ruleId: rule.id });
      }
    }
  }

  /** 冻结规则库，之后只读 */
  freeze(): this {
    if (!this.frozen) {
      this.frozen = true;
      Object.freeze(this.items);
    }
    return this;
  }
}

function assertNonEmpty(antecedent: Antecedent, ruleId: string): void {
  if (antecedent.kind === 'term') return;
  if (antecedent.children.length === 0) {
    throw new ValidationError(`Rule '${ruleId}' has an empty ${antecedent.kind.toUpperCase()} node`, { ruleId });
  }
  for (const child of antecedent.children) {
    assertNonEmpty(child, ruleId);
  }
}

function deepFreeze(antecedent: Antecedent): Antecedent {
  if (antecedent.kind === 'term') {
    return Object.freeze({ ...antecedent });
  }
  return Object.freeze({
    kind: antecedent.kind,
    children: Object.freeze(antecedent.children.map(deepFreeze)),
  });
}
