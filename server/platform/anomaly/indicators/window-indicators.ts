/**
 * ============================================================================
 * 窗口指标提取 — EP / MV / MC
 * ============================================================================
 *
 * 给定一个多变量时间序列窗口与基线（行 = 时间点，列 = 变量），计算三个
 * 归一化到 [0, 1] 的指标，作为模糊推理的输入：
 *
 *   EP  forecast error      MAE / (range(yTrue) + ε)
 *   MV  variance change     mean(clip(var_w / (var_b + ε), 0, 5) − 1) / 4
 *   MC  correlation change  ‖corr_w − corr_b‖_F / (2d + ε)
 *
 * 以上结果全部截断到 [0, 1]。
 */

import { createModuleLogger } from '../../../core/logger';
import { ValidationError } from '../../../core/errors';
import {
  assertMatrix,
  clamp,
  column,
  columnVariances,
  correlationMatrix,
  frobeniusDistance,
  mean,
  range,
} from '../../../lib/math/stats';

const log = createModuleLogger('window-indicators');

const EPS = 1e-6;
/** 方差比上限，超过即视为最大变化 */
const MAX_VARIANCE_RATIO = 5;

export interface WindowIndicators {
  forecastError: number;
  varianceChange: number;
  correlationChange: number;
}

type Matrix = readonly (readonly number[])[];

/**
 * 归一化预测误差
 *
 * @param yTrue 实际值
 * @param yPred 预测值，长度需与 yTrue 一致
 */
export function forecastError(yTrue: readonly number[], yPred: readonly number[]): number {
  if (yTrue.length === 0 || yTrue.length !== yPred.length) {
    throw new ValidationError(
      `forecastError expects two non-empty series of equal length, got ${yTrue.length} and ${yPred.length}`,
      { actual: yTrue.length, predicted: yPred.length },
    );
  }

  const mae = mean(yTrue.map((v, i) => Math.abs(v - (yPred[i] ?? 0))));
  const spread = range(yTrue) + EPS;
  return clamp(mae / (spread + EPS), 0, 1);
}

/**
 * 归一化方差变化（只关注方差增大）
 */
export function varianceChange(window: Matrix, baseline: Matrix): number {
  const cols = assertSameWidth(window, baseline);

  const vw = columnVariances(window);
  const vb = columnVariances(baseline);
  const ratios = Array.from({ length: cols }, (_, j) =>
    clamp((vw[j] ?? 0) / ((vb[j] ?? 0) + EPS), 0, MAX_VARIANCE_RATIO),
  );

  const score = mean(ratios.map(r => r - 1));
  return clamp(score / (MAX_VARIANCE_RATIO - 1), 0, 1);
}

/**
 * 归一化相关结构变化
 */
export function correlationChange(window: Matrix, baseline: Matrix): number {
  const cols = assertSameWidth(window, baseline);

  const diff = frobeniusDistance(correlationMatrix(window), correlationMatrix(baseline));
  return clamp(diff / (2 * cols + EPS), 0, 1);
}

/**
 * 计算窗口的三个指标
 *
 * EP 以基线第 0 列均值作为朴素预测，与窗口第 0 列比较。
 */
export function computeWindowIndicators(window: Matrix, baseline: Matrix): WindowIndicators {
  assertSameWidth(window, baseline);

  const yTrue = column(window, 0);
  const naive = mean(column(baseline, 0));
  const yPred = yTrue.map(() => naive);

  const indicators: WindowIndicators = {
    forecastError: forecastError(yTrue, yPred),
    varianceChange: varianceChange(window, baseline),
    correlationChange: correlationChange(window, baseline),
  };

  log.debug({
    rows: window.length,
    baselineRows: baseline.length,
    ...indicators,
  }, 'Window indicators computed');

  return indicators;
}

function assertSameWidth(window: Matrix, baseline: Matrix): number {
  const cw = assertMatrix(window, 'window');
  const cb = assertMatrix(baseline, 'baseline');
  if (cw !== cb) {
    throw new ValidationError(`window has ${cw} columns but baseline has ${cb}`, { window: cw, baseline: cb });
  }
  return cw;
}
