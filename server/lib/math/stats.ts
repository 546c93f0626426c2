/**
 * 统计工具库
 *
 * 提供均值、总体方差、Pearson 相关矩阵等算法，
 * 用于时间序列窗口的指标提取。矩阵一律为行优先 number[][]（行 = 时间点，列 = 变量）。
 */

import { ValidationError } from '../../core/errors';

// ============================================================
// 1. 基础统计量
// ============================================================

export function clamp(value: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, value));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * 极差 max − min，单次遍历
 */
export function range(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let lo = Infinity;
  let hi = -Infinity;
  for (const v of values) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }
  return hi - lo;
}

/**
 * 总体方差（除以 n）
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return values.reduce((acc, v) => acc + (v - m) ** 2, 0) / values.length;
}

// ============================================================
// 2. 矩阵工具
// ============================================================

/**
 * 校验矩阵：至少一行，每行列数一致且大于 0，元素为有限值
 *
 * @returns 列数
 */
export function assertMatrix(matrix: readonly (readonly number[])[], name = 'matrix'): number {
  if (matrix.length === 0) {
    throw new ValidationError(`${name} must have at least one row`, { name });
  }
  const cols = matrix[0]?.length ?? 0;
  if (cols === 0) {
    throw new ValidationError(`${name} must have at least one column`, { name });
  }
  matrix.forEach((row, i) => {
    if (row.length !== cols) {
      throw new ValidationError(`${name} row ${i} has ${row.length} columns, expected ${cols}`, { name, row: i });
    }
    if (!row.every(v => Number.isFinite(v))) {
      throw new ValidationError(`${name} row ${i} contains non-finite values`, { name, row: i });
    }
  });
  return cols;
}

export function column(matrix: readonly (readonly number[])[], index: number): number[] {
  return matrix.map(row => row[index] ?? 0);
}

export function columnVariances(matrix: readonly (readonly number[])[]): number[] {
  const cols = matrix[0]?.length ?? 0;
  return Array.from({ length: cols }, (_, j) => variance(column(matrix, j)));
}

/**
 * Pearson 相关系数
 *
 * 任一序列方差为 0 时相关系数无定义，这里返回 0（视为不相关）。
 */
export function pearson(x: readonly number[], y: readonly number[]): number {
  const n = Math.min(x.length, y.length);
  if (n === 0) return 0;

  const mx = mean(x.slice(0, n));
  const my = mean(y.slice(0, n));
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = (x[i] ?? 0) - mx;
    const dy = (y[i] ?? 0) - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return 0;
  return clamp(sxy / Math.sqrt(sxx * syy), -1, 1);
}

/**
 * 列之间的相关矩阵（d × d），对角线固定为 1
 */
export function correlationMatrix(matrix: readonly (readonly number[])[]): number[][] {
  const cols = matrix[0]?.length ?? 0;
  const columns = Array.from({ length: cols }, (_, j) => column(matrix, j));
  const out: number[][] = [];
  for (let i = 0; i < cols; i++) {
    const row: number[] = [];
    for (let j = 0; j < cols; j++) {
      row.push(i === j ? 1 : pearson(columns[i] ?? [], columns[j] ?? []));
    }
    out.push(row);
  }
  return out;
}

/** Frobenius 范数 ‖A − B‖_F */
export function frobeniusDistance(a: readonly (readonly number[])[], b: readonly (readonly number[])[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const ra = a[i] ?? [];
    const rb = b[i] ?? [];
    for (let j = 0; j < ra.length; j++) {
      const diff = (ra[j] ?? 0) - (rb[j] ?? 0);
      sum += diff * diff;
    }
  }
  return Math.sqrt(sum);
}
