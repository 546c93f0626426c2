/**
 * 语言变量：一个论域 + 按插入顺序排列的命名模糊集
 */

import { InvalidShapeError, ValidationError } from '../../../core/errors';
import { createFuzzySet, degree } from './membership';
import type { Domain, FuzzySet, MembershipShape } from './types';

export class LinguisticVariable {
  readonly name: string;
  readonly domain: Domain;
  private readonly sets: ReadonlyMap<string, FuzzySet>;

  constructor(name: string, domain: Domain, sets: Record<string, MembershipShape>) {
    const [lo, hi] = domain;
    if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo >= hi) {
      throw new InvalidShapeError(name, 'domain', [lo, hi], 'domain must be finite with lo < hi');
    }

    // 对象键天然唯一，插入顺序即声明顺序
    const map = new Map<string, FuzzySet>();
    for (const [setName, shape] of Object.entries(sets)) {
      map.set(setName, createFuzzySet(setName, shape));
    }

    if (map.size === 0) {
      throw new ValidationError(`Linguistic variable '${name}' needs at least one fuzzy set`, { variable: name });
    }

    this.name = name;
    this.domain = Object.freeze([lo, hi] as const);
    this.sets = map;
    Object.freeze(this);
  }

  /** 模糊集名称（声明顺序） */
  get setNames(): string[] {
    return [...this.sets.keys()];
  }

  hasSet(name: string): boolean {
    return this.sets.has(name);
  }

  getSet(name: string): FuzzySet | undefined {
    return this.sets.get(name);
  }

  /** 全部模糊集（声明顺序） */
  get fuzzySets(): FuzzySet[] {
    return [...this.sets.values()];
  }

  contains(value: number): boolean {
    return Number.isFinite(value) && value >= this.domain[0] && value <= this.domain[1];
  }

  /** 模糊化：返回每个模糊集的隶属度（包括 0） */
  fuzzify(value: number): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [setName, set] of this.sets) {
      out[setName] = degree(set.shape, value);
    }
    return out;
  }

  /**
   * 论域离散化采样点 lo, lo + step, …, hi
   *
   * 步长取 (hi − lo) / steps，保证采样点等距；点用 lo + i * step 计算，避免累加误差。
   */
  samples(resolution: number): number[] {
    if (!(resolution > 0) || !Number.isFinite(resolution)) {
      throw new ValidationError(`Sampling resolution must be a positive number, got ${resolution}`, { variable: this.name, resolution });
    }
    const [lo, hi] = this.domain;
    const steps = Math.max(1, Math.round((hi - lo) / resolution));
    const step = (hi - lo) / steps;
    const points = new Array<number>(steps + 1);
    for (let i = 0; i < steps; i++) {
      points[i] = lo + i * step;
    }
    points[steps] = hi;
    return points;
  }
}
