/**
 * ============================================================================
 * 模糊推理类型定义
 * ============================================================================
 *
 *   - MembershipShape：隶属度函数形状（带 type 标签的联合类型）
 *   - FuzzySet：命名模糊集（构造后冻结）
 *   - Antecedent：规则前件树 {term | and | or}
 *   - Rule：前件 + 结论模糊集 + 权重
 *   - EvaluationResult：一次推理的输出
 *
 * 所有类型均为纯数据结构，无行为逻辑。
 */

// ============================================================================
// 隶属度函数
// ============================================================================

/** 模糊函数类型 */
export type MembershipShapeType = 'triangular' | 'trapezoidal';

/**
 * 三角形参数，要求 a ≤ b ≤ c，峰值在 b
 */
export interface TriangularShape {
  type: 'triangular';
  a: number;
  b: number;
  c: number;
}

/**
 * 梯形参数，要求 a ≤ b ≤ c ≤ d，平台区间 [b, c]
 */
export interface TrapezoidalShape {
  type: 'trapezoidal';
  a: number;
  b: number;
  c: number;
  d: number;
}

export type MembershipShape = TriangularShape | TrapezoidalShape;

export interface FuzzySet {
  readonly name: string;
  readonly shape: Readonly<MembershipShape>;
}

/** 论域 [lo, hi] */
export type Domain = readonly [number, number];

// ============================================================================
// 规则
// ============================================================================

export interface TermNode {
  kind: 'term';
  variable: string;
  set: string;
}

export interface AndNode {
  kind: 'and';
  children: readonly Antecedent[];
}

export interface OrNode {
  kind: 'or';
  children: readonly Antecedent[];
}

/** 规则前件：叶子 (变量, 模糊集) 或 AND/OR 组合 */
export type Antecedent = TermNode | AndNode | OrNode;

export interface Rule {
  /** 规则标识（诊断/追溯用） */
  id: string;
  antecedent: Antecedent;
  /** 输出变量上的模糊集名称 */
  consequent: string;
  /** 规则权重 ∈ [0, 1]，默认 1.0 */
  weight: number;
}

/** 规则定义输入，weight 可省略 */
export type RuleDefinition = Omit<Rule, 'weight'> & { weight?: number };

/** 变量名 → (模糊集名 → 隶属度) */
export type FuzzifiedInputs = Record<string, Record<string, number>>;

// ============================================================================
// 推理结果
// ============================================================================

/** 无规则激活时的处理策略 */
export type UncoveredPolicy = 'undetermined' | 'nearest-rule';

/** 无规则激活时返回的标签 */
export const UNDETERMINED_LABEL = 'undetermined';

export interface RuleFiring {
  ruleId: string;
  strength: number;
}

export interface EvaluationResult {
  /** 去模糊化后的清晰值（输出论域内） */
  score: number;
  /** 在 score 处隶属度最大的输出模糊集；无规则激活时为 'undetermined' 或最近规则的结论 */
  label: string;
  /** 无规则激活，score 为论域中点 */
  undetermined: boolean;
  /** 无规则激活，结果取自最近规则 */
  interpolated: boolean;
  /** 每个输出模糊集的聚合激活强度（OR = max） */
  aggregated: Record<string, number>;
  /** 按规则顺序的激活强度 */
  firings: RuleFiring[];
}
