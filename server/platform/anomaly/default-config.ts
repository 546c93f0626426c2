/**
 * 异常等级推理的默认语言变量与规则集
 *
 * 输入（论域 [0, 1]）：
 *   forecast_error (EP) / variance_change (MV) / correlation_change (MC)
 *   low = tri(0, 0, 0.4)   medium = tri(0.2, 0.5, 0.8)   high = tri(0.6, 1, 1)
 *
 * 输出 anomaly_level（论域 [0, 10]）：
 *   normal = tri(0, 0, 3)   slightly_anomalous = tri(1, 3, 5)
 *   moderately_anomalous = tri(3, 5, 7)   strongly_anomalous = tri(6, 10, 10)
 */

import { LinguisticVariable } from './fuzzy/linguistic-variable';
import { triangular } from './fuzzy/membership';
import { and, RuleBase, term } from './fuzzy/rule-base';
import type { MembershipShape, RuleDefinition } from './fuzzy/types';

export const FORECAST_ERROR = 'forecast_error';
export const VARIANCE_CHANGE = 'variance_change';
export const CORRELATION_CHANGE = 'correlation_change';
export const ANOMALY_LEVEL = 'anomaly_level';

export const INPUT_DOMAIN = [0, 1] as const;
export const OUTPUT_DOMAIN = [0, 10] as const;

export type AnomalyLabel =
  | 'normal'
  | 'slightly_anomalous'
  | 'moderately_anomalous'
  | 'strongly_anomalous';

export type RuleSetName = 'canonical' | 'extended';

function indicatorSets(): Record<string, MembershipShape> {
  return {
    low: triangular(0.0, 0.0, 0.4),
    medium: triangular(0.2, 0.5, 0.8),
    high: triangular(0.6, 1.0, 1.0),
  };
}

/** 按 EP, MV, MC 顺序返回三个输入变量 */
export function createInputVariables(): [LinguisticVariable, LinguisticVariable, LinguisticVariable] {
  return [
    new LinguisticVariable(FORECAST_ERROR, INPUT_DOMAIN, indicatorSets()),
    new LinguisticVariable(VARIANCE_CHANGE, INPUT_DOMAIN, indicatorSets()),
    new LinguisticVariable(CORRELATION_CHANGE, INPUT_DOMAIN, indicatorSets()),
  ];
}

export function createOutputVariable(): LinguisticVariable {
  const sets: Record<AnomalyLabel, MembershipShape> = {
    normal: triangular(0, 0, 3),
    slightly_anomalous: triangular(1, 3, 5),
    moderately_anomalous: triangular(3, 5, 7),
    strongly_anomalous: triangular(6, 10, 10),
  };
  return new LinguisticVariable(ANOMALY_LEVEL, OUTPUT_DOMAIN, sets);
}

const ep = (set: string) => term(FORECAST_ERROR, set);
const mv = (set: string) => term(VARIANCE_CHANGE, set);
const mc = (set: string) => term(CORRELATION_CHANGE, set);

function allOf(epSet: string, mvSet: string, mcSet: string) {
  return and(ep(epSet), mv(mvSet), mc(mcSet));
}

/** 9 条代表性组合，全部为三输入 AND */
export const CANONICAL_RULES: readonly RuleDefinition[] = [
  { id: 'R1_normal_all_low', antecedent: allOf('low', 'low', 'low'), consequent: 'normal' },
  { id: 'R2_slight_medium_mv', antecedent: allOf('low', 'medium', 'low'), consequent: 'slightly_anomalous' },
  { id: 'R3_slight_medium_ep', antecedent: allOf('medium', 'low', 'low'), consequent: 'slightly_anomalous' },
  { id: 'R4_moderate_all_medium', antecedent: allOf('medium', 'medium', 'medium'), consequent: 'moderately_anomalous' },
  { id: 'R5_moderate_high_ep', antecedent: allOf('high', 'low', 'low'), consequent: 'moderately_anomalous' },
  { id: 'R6_moderate_high_mv_mc', antecedent: allOf('low', 'high', 'high'), consequent: 'moderately_anomalous' },
  { id: 'R7_strong_high_ep_medium', antecedent: allOf('high', 'medium', 'medium'), consequent: 'strongly_anomalous' },
  { id: 'R8_strong_high_ep_mv', antecedent: allOf('high', 'high', 'low'), consequent: 'strongly_anomalous' },
  { id: 'R9_strong_all_high', antecedent: allOf('high', 'high', 'high'), consequent: 'strongly_anomalous' },
];

/**
 * 14 条规则：单个中等指标 → slightly，两两中等 → moderately，
 * 两两高（或高 + 中）→ strongly。部分规则只约束两个输入。
 */
export const EXTENDED_RULES: readonly RuleDefinition[] = [
  { id: 'R1_normal_all_low', antecedent: allOf('low', 'low', 'low'), consequent: 'normal' },

  { id: 'R2_slight_medium_ep', antecedent: allOf('medium', 'low', 'low'), consequent: 'slightly_anomalous' },
  { id: 'R3_slight_medium_mv', antecedent: allOf('low', 'medium', 'low'), consequent: 'slightly_anomalous' },
  { id: 'R4_slight_medium_mc', antecedent: allOf('low', 'low', 'medium'), consequent: 'slightly_anomalous' },

  { id: 'R5_moderate_ep_mv', antecedent: and(ep('medium'), mv('medium')), consequent: 'moderately_anomalous' },
  { id: 'R6_moderate_ep_mc', antecedent: and(ep('medium'), mc('medium')), consequent: 'moderately_anomalous' },
  { id: 'R7_moderate_mv_mc', antecedent: and(mv('medium'), mc('medium')), consequent: 'moderately_anomalous' },

  { id: 'R8_strong_ep_mv', antecedent: and(ep('high'), mv('high')), consequent: 'strongly_anomalous' },
  { id: 'R9_strong_ep_mc', antecedent: and(ep('high'), mc('high')), consequent: 'strongly_anomalous' },
  { id: 'R10_strong_mv_mc', antecedent: and(mv('high'), mc('high')), consequent: 'strongly_anomalous' },

  { id: 'R11_high_ep_medium_mv', antecedent: and(ep('high'), mv('medium')), consequent: 'strongly_anomalous' },
  { id: 'R12_medium_ep_high_mv', antecedent: and(ep('medium'), mv('high')), consequent: 'strongly_anomalous' },
  { id: 'R13_high_ep_medium_mc', antecedent: and(ep('high'), mc('medium')), consequent: 'strongly_anomalous' },
  { id: 'R14_high_mv_medium_mc', antecedent: and(mv('high'), mc('medium')), consequent: 'strongly_anomalous' },
];

const RULE_SETS: Record<RuleSetName, readonly RuleDefinition[]> = {
  canonical: CANONICAL_RULES,
  extended: EXTENDED_RULES,
};

/** 新建一个（未冻结的）规则库实例 */
export function createRuleBase(ruleSet: RuleSetName = 'canonical'): RuleBase {
  return new RuleBase(RULE_SETS[ruleSet]);
}
