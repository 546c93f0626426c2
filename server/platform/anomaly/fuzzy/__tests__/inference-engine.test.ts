/**
 * Mamdani 推理引擎单元测试
 *
 * 覆盖：质心去模糊化、标签选择与平局、兜底分支（undetermined / nearest-rule）、
 *       输入越界、配置期校验、幂等性
 */
import { describe, it, expect } from 'vitest';
import { InferenceEngine } from '../inference-engine';
import { RuleBase, and, term } from '../rule-base';
import { UNDETERMINED_LABEL, type RuleDefinition } from '../types';
import {
  CORRELATION_CHANGE,
  FORECAST_ERROR,
  VARIANCE_CHANGE,
  createInputVariables,
  createOutputVariable,
  createRuleBase,
} from '../../default-config';
import { InputOutOfRangeError, RuleBaseFrozenError, UnknownTermError } from '../../../../core/errors';
import type { InferenceEngineOptions } from '../inference-engine';

function engineWith(ruleBase: RuleBase = createRuleBase('canonical'), options?: Partial<InferenceEngineOptions>) {
  return new InferenceEngine(createInputVariables(), createOutputVariable(), ruleBase, options);
}

function inputs(ep: number, mv: number, mc: number): Record<string, number> {
  return { [FORECAST_ERROR]: ep, [VARIANCE_CHANGE]: mv, [CORRELATION_CHANGE]: mc };
}

const allHighOnly: RuleDefinition[] = [
  {
    id: 'only_all_high',
    antecedent: and(term(FORECAST_ERROR, 'high'), term(VARIANCE_CHANGE, 'high'), term(CORRELATION_CHANGE, 'high')),
    consequent: 'strongly_anomalous',
  },
];

describe('InferenceEngine — 质心去模糊化', () => {
  const engine = engineWith();

  it('(0, 0, 0) 只激活 all-low 规则 → normal，靠近论域低端', () => {
    const result = engine.evaluate(inputs(0, 0, 0));
    // 离散质心：h(N-1)/3，N = 300，h = 0.01
    expect(result.score).toBeCloseTo(0.99667, 4);
    expect(result.label).toBe('normal');
    expect(result.undetermined).toBe(false);
    expect(result.interpolated).toBe(false);
    expect(result.aggregated).toEqual({
      normal: 1,
      slightly_anomalous: 0,
      moderately_anomalous: 0,
      strongly_anomalous: 0,
    });
    expect(result.firings[0]).toEqual({ ruleId: 'R1_normal_all_low', strength: 1 });
  });

  it('(1, 1, 1) → strongly_anomalous，靠近论域高端', () => {
    const result = engine.evaluate(inputs(1, 1, 1));
    // 离散质心：6 + h(2M+1)/3，M = 400
    expect(result.score).toBeCloseTo(8.67, 2);
    expect(result.label).toBe('strongly_anomalous');
    expect(result.aggregated.strongly_anomalous).toBe(1);
  });

  it('(0.5, 0.5, 0.5) → 对称的 moderately 集合，质心为 5', () => {
    const result = engine.evaluate(inputs(0.5, 0.5, 0.5));
    expect(result.score).toBeCloseTo(5, 6);
    expect(result.label).toBe('moderately_anomalous');
  });

  it('同一结论的多条规则取最大强度聚合', () => {
    // EP = 0.3：low = 0.25，medium = 1/3
    const result = engine.evaluate(inputs(0.3, 0, 0));
    expect(result.aggregated.normal).toBeCloseTo(0.25, 10);
    expect(result.aggregated.slightly_anomalous).toBeCloseTo(1 / 3, 10);
    expect(result.firings.map(f => f.ruleId)).toHaveLength(9);
  });

  it('单调性抽查：只增大 EP 时分数不降', () => {
    const base = engine.evaluate(inputs(0, 0, 0)).score;
    const raised = engine.evaluate(inputs(0.3, 0, 0)).score;
    expect(raised).toBeGreaterThan(base);
  });

  it('网格上所有输入的分数都在 [0, 10]', () => {
    const grid = [0, 0.25, 0.5, 0.75, 1];
    for (const a of grid) {
      for (const b of grid) {
        for (const c of grid) {
          const { score } = engine.evaluate(inputs(a, b, c));
          expect(score).toBeGreaterThanOrEqual(0);
          expect(score).toBeLessThanOrEqual(10);
        }
      }
    }
  });

  it('相同输入两次调用结果完全一致', () => {
    const first = engine.evaluate(inputs(0.42, 0.17, 0.63));
    const second = engine.evaluate(inputs(0.42, 0.17, 0.63));
    expect(Object.is(first.score, second.score)).toBe(true);
    expect(second).toEqual(first);
  });

  it('分辨率参数生效', () => {
    const coarse = engineWith(createRuleBase('canonical'), { resolution: 0.5 });
    // 采样点 0, 0.5, …, 3 上的 normal 三角形：质心 = 0.5 × 5 / 3
    expect(coarse.evaluate(inputs(0, 0, 0)).score).toBeCloseTo(5 / 6, 10);
  });

  it('步长不能整除输出论域时按等距网格积分', () => {
    // 0.7 → 14 段，实际步长 10 / 14
    const uneven = engineWith(createRuleBase('canonical'), { resolution: 0.7 });
    const exact = engineWith(createRuleBase('canonical'), { resolution: 10 / 14 });
    expect(uneven.evaluate(inputs(1, 1, 1)).score).toBe(exact.evaluate(inputs(1, 1, 1)).score);
  });

  it('规则权重缩放激活强度', () => {
    const weighted = engineWith(new RuleBase([{
      id: 'half_low',
      antecedent: and(term(FORECAST_ERROR, 'low'), term(VARIANCE_CHANGE, 'low'), term(CORRELATION_CHANGE, 'low')),
      consequent: 'normal',
      weight: 0.5,
    }]));
    const result = weighted.evaluate(inputs(0, 0, 0));
    expect(result.aggregated.normal).toBe(0.5);
    expect(result.firings).toEqual([{ ruleId: 'half_low', strength: 0.5 }]);
    expect(result.label).toBe('normal');
  });
});

describe('InferenceEngine — 标签选择', () => {
  const engine = engineWith();

  it('取隶属度最大的输出模糊集', () => {
    expect(engine.labelAt(0.5)).toBe('normal');
    expect(engine.labelAt(6.5)).toBe('moderately_anomalous');
    expect(engine.labelAt(9)).toBe('strongly_anomalous');
  });

  it('平局取声明顺序靠前者', () => {
    // x = 4：slightly = moderately = 0.5
    expect(engine.labelAt(4)).toBe('slightly_anomalous');
  });
});

describe('InferenceEngine — 无规则激活', () => {
  it('退化规则库：返回论域中点并标记 undetermined，不抛异常', () => {
    const engine = engineWith(new RuleBase(allHighOnly));
    const result = engine.evaluate(inputs(0, 0, 0));
    expect(result.score).toBe(5);
    expect(result.label).toBe(UNDETERMINED_LABEL);
    expect(result.undetermined).toBe(true);
    expect(result.interpolated).toBe(false);
    expect(result.firings).toEqual([{ ruleId: 'only_all_high', strength: 0 }]);
  });

  it('canonical 规则集未覆盖的组合 (low, low, high) 为 undetermined', () => {
    const result = engineWith().evaluate(inputs(0, 0, 1));
    expect(result.undetermined).toBe(true);
    expect(result.score).toBe(5);
    expect(Object.values(result.aggregated).every(v => v === 0)).toBe(true);
  });

  it('nearest-rule 策略：取原型点最近的规则', () => {
    const engine = engineWith(createRuleBase('canonical'), { uncoveredPolicy: 'nearest-rule' });
    // 距离 (0, 0, 1)：all-medium 规则为 0.75，其余 ≥ 1
    const result = engine.evaluate(inputs(0, 0, 1));
    expect(result.label).toBe('moderately_anomalous');
    expect(result.score).toBe(5);
    expect(result.interpolated).toBe(true);
    expect(result.undetermined).toBe(false);
  });

  it('nearest-rule 返回结论模糊集的峰值', () => {
    const engine = engineWith(new RuleBase(allHighOnly), { uncoveredPolicy: 'nearest-rule' });
    const result = engine.evaluate(inputs(0, 0, 0));
    expect(result.label).toBe('strongly_anomalous');
    expect(result.score).toBe(10);
    expect(result.interpolated).toBe(true);
  });

  it('nearest-rule 在规则库为空时退回中点', () => {
    const engine = engineWith(new RuleBase(), { uncoveredPolicy: 'nearest-rule' });
    const result = engine.evaluate(inputs(0.5, 0.5, 0.5));
    expect(result.undetermined).toBe(true);
    expect(result.label).toBe(UNDETERMINED_LABEL);
  });
});

describe('InferenceEngine — 输入与配置错误', () => {
  const engine = engineWith();

  it('越界输入抛 InputOutOfRangeError，不截断', () => {
    expect(() => engine.evaluate(inputs(1.5, 0, 0))).toThrow(InputOutOfRangeError);
    expect(() => engine.evaluate(inputs(0, -0.01, 0))).toThrow(InputOutOfRangeError);
    expect(() => engine.evaluate(inputs(0, 0, Number.NaN))).toThrow(InputOutOfRangeError);
  });

  it('缺失输入抛 InputOutOfRangeError', () => {
    expect(() => engine.evaluate({ [FORECAST_ERROR]: 0.1, [VARIANCE_CHANGE]: 0.1 })).toThrow(InputOutOfRangeError);
  });

  it('越界错误为运营性错误并携带变量名', () => {
    try {
      engine.evaluate(inputs(1.5, 0, 0));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InputOutOfRangeError);
      if (err instanceof InputOutOfRangeError) {
        expect(err.isOperational).toBe(true);
        expect(err.context).toMatchObject({ variable: FORECAST_ERROR, value: 1.5, domain: [0, 1] });
      }
    }
  });

  it('调用期错误不影响后续调用', () => {
    const before = engine.evaluate(inputs(0.2, 0.4, 0.6));
    expect(() => engine.evaluate(inputs(2, 0, 0))).toThrow(InputOutOfRangeError);
    expect(engine.evaluate(inputs(0.2, 0.4, 0.6))).toEqual(before);
  });

  it('规则引用未知模糊集时构造失败', () => {
    const rb = new RuleBase([{ id: 'extreme', antecedent: term(FORECAST_ERROR, 'extreme'), consequent: 'normal' }]);
    expect(() => engineWith(rb)).toThrow(UnknownTermError);
  });

  it('规则结论未知时构造失败', () => {
    const rb = new RuleBase([{ id: 'panic', antecedent: term(FORECAST_ERROR, 'high'), consequent: 'panic' }]);
    expect(() => engineWith(rb)).toThrow(UnknownTermError);
  });

  it('构造后规则库被冻结', () => {
    const rb = createRuleBase('canonical');
    engineWith(rb);
    expect(rb.isFrozen).toBe(true);
    expect(() => rb.addRule({ id: 'late', antecedent: term(FORECAST_ERROR, 'low'), consequent: 'normal' })).toThrow(RuleBaseFrozenError);
  });
});
