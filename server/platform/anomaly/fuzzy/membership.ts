/**
 * ============================================================================
 * 模糊隶属度函数库
 * ============================================================================
 *
 * 支持两种形状：三角形、梯形。
 * 模糊集构造后冻结，degree() 为纯函数，可被并发调用方共享。
 *
 * 零宽边（a === b 或 b === c 等）视为瞬时跳变，单独分支处理，不做除法。
 */

import { InvalidShapeError } from '../../../core/errors';
import type { FuzzySet, MembershipShape, TrapezoidalShape, TriangularShape } from './types';

/** 三角形参数 */
export function triangular(a: number, b: number, c: number): TriangularShape {
  return { type: 'triangular', a, b, c };
}

/** 梯形参数 */
export function trapezoidal(a: number, b: number, c: number, d: number): TrapezoidalShape {
  return { type: 'trapezoidal', a, b, c, d };
}

export function shapeParams(shape: MembershipShape): number[] {
  switch (shape.type) {
    case 'triangular':
      return [shape.a, shape.b, shape.c];
    case 'trapezoidal':
      return [shape.a, shape.b, shape.c, shape.d];
  }
}

/**
 * 构造模糊集
 *
 * 参数必须为有限值且单调不减，否则抛 InvalidShapeError。
 */
export function createFuzzySet(name: string, shape: MembershipShape): FuzzySet {
  const params = shapeParams(shape);

  if (!params.every(p => Number.isFinite(p))) {
    throw new InvalidShapeError(name, shape.type, params, 'parameters must be finite numbers');
  }
  for (let i = 1; i < params.length; i++) {
    if (params[i - 1] > params[i]) {
      throw new InvalidShapeError(name, shape.type, params);
    }
  }

  return Object.freeze({ name, shape: Object.freeze({ ...shape }) });
}

/**
 * 三角形隶属度函数
 *
 *        b
 *       / \
 *      /   \
 *   __/     \__
 *   a         c
 *
 * μ(x) =
 *   0                   if x < a or x > c
 *   1                   if x = b
 *   (x - a) / (b - a)  if a ≤ x < b
 *   (c - x) / (c - b)  if b < x ≤ c
 */
function triangularDegree(x: number, p: TriangularShape): number {
  const { a, b, c } = p;

  if (x < a || x > c) return 0;
  if (x === b) return 1;
  if (x < b) return b === a ? 1 : (x - a) / (b - a);
  return c === b ? 1 : (c - x) / (c - b);
}

/**
 * 梯形隶属度函数
 *
 *        b_____c
 *       /       \
 *      /         \
 *   __/           \__
 *   a               d
 */
function trapezoidalDegree(x: number, p: TrapezoidalShape): number {
  const { a, b, c, d } = p;

  if (x < a || x > d) return 0;
  if (x >= b && x <= c) return 1;
  if (x < b) return b === a ? 1 : (x - a) / (b - a);
  return d === c ? 1 : (d - x) / (d - c);
}

/** 计算 x 在给定形状下的隶属度 ∈ [0, 1] */
export function degree(shape: MembershipShape, x: number): number {
  switch (shape.type) {
    case 'triangular':
      return triangularDegree(x, shape);
    case 'trapezoidal':
      return trapezoidalDegree(x, shape);
  }
}

/** 核心区间中点：三角形取 b，梯形取 (b + c) / 2 */
export function peakOf(shape: MembershipShape): number {
  switch (shape.type) {
    case 'triangular':
      return shape.b;
    case 'trapezoidal':
      return (shape.b + shape.c) / 2;
  }
}
