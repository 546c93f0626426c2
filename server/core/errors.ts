/**
 * 统一错误体系
 * 分层错误类 + 错误码
 *
 * 使用方式：
 *   import { InvalidShapeError, InputOutOfRangeError } from '../core/errors';
 *   throw new InvalidShapeError('low', 'triangular', [0.5, 0.2, 0.8]);
 *   throw new InputOutOfRangeError('forecast_error', 1.5, [0, 1]);
 *
 * 配置期错误（InvalidShape / UnknownTerm）为非运营性错误：启动时发现即终止初始化。
 * 调用期错误（InputOutOfRange）为运营性错误：逐次抛给调用方，不影响共享配置。
 */

// ============================================
// 错误码枚举
// ============================================

export enum ErrorCode {
  // 通用错误 (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // 验证错误 (2xxx)
  VALIDATION = 2000,
  OUT_OF_RANGE = 2004,

  // 模糊系统配置错误 (3xxx)
  INVALID_SHAPE = 3000,
  UNKNOWN_TERM = 3001,
  RULE_BASE_FROZEN = 3002,
  INVALID_CONFIG = 3003,
}

// ============================================
// 基础错误类
// ============================================

export class FuzzyError extends Error {
  public readonly code: ErrorCode;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Record<string, unknown> = {},
    isOperational = true,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date().toISOString();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, new.target);
  }

  /** 序列化为日志/响应格式 */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================
// 具体错误类
// ============================================

/** 通用验证错误 */
export class ValidationError extends FuzzyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.VALIDATION, context);
  }
}

/** 模糊集参数非法（非单调或非有限值） */
export class InvalidShapeError extends FuzzyError {
  constructor(setName: string, shapeType: string, params: readonly number[], reason?: string, context: Record<string, unknown> = {}) {
    const detail = reason ?? 'parameters must be finite and non-decreasing';
    super(
      `Invalid ${shapeType} shape for set '${setName}' (${params.join(', ')}): ${detail}`,
      ErrorCode.INVALID_SHAPE,
      { setName, shapeType, params: [...params], ...context },
      false,
    );
  }
}

/** 规则引用了未定义的 (变量, 模糊集) 组合 */
export class UnknownTermError extends FuzzyError {
  constructor(variable: string, set?: string, context: Record<string, unknown> = {}) {
    const msg = set === undefined
      ? `Unknown linguistic variable '${variable}'`
      : `Unknown term '${set}' on variable '${variable}'`;
    super(msg, ErrorCode.UNKNOWN_TERM, { variable, set, ...context }, false);
  }
}

/** 调用期输入越界或非有限值 */
export class InputOutOfRangeError extends FuzzyError {
  constructor(variable: string, value: number | undefined, domain: readonly [number, number], context: Record<string, unknown> = {}) {
    super(
      `Input '${variable}' = ${String(value)} is outside [${domain[0]}, ${domain[1]}]`,
      ErrorCode.OUT_OF_RANGE,
      { variable, value, domain: [...domain], ...context },
    );
  }
}

/** 规则库冻结后禁止修改 */
export class RuleBaseFrozenError extends FuzzyError {
  constructor(ruleId: string, context: Record<string, unknown> = {}) {
    super(`Rule base is frozen; cannot add rule '${ruleId}'`, ErrorCode.RULE_BASE_FROZEN, { ruleId, ...context }, false);
  }
}

/** 运行时配置非法 */
export class ConfigurationError extends FuzzyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.INVALID_CONFIG, context, false);
  }
}

// ============================================
// 错误处理工具
// ============================================

/** 判断是否为 FuzzyError */
export function isFuzzyError(err: unknown): err is FuzzyError {
  return err instanceof FuzzyError;
}

/** 判断是否为可恢复的运营性错误 */
export function isOperationalError(err: unknown): boolean {
  if (isFuzzyError(err)) return err.isOperational;
  return false;
}

/** 将未知错误包装为 FuzzyError */
export function wrapError(err: unknown, context: Record<string, unknown> = {}): FuzzyError {
  if (isFuzzyError(err)) return err;

  if (err instanceof Error) {
    return new FuzzyError(err.message, ErrorCode.INTERNAL, {
      originalName: err.name,
      stack: err.stack,
      ...context,
    });
  }

  return new FuzzyError(String(err), ErrorCode.UNKNOWN, context);
}
