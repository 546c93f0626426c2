/**
 * ============================================================================
 * 配置验证 Schema — Zod 强类型验证
 * ============================================================================
 *
 * 用途：
 *   1. 启动时验证所有环境变量的类型和范围
 *   2. 把 config.ts 中的原始字符串收窄为枚举类型
 *   3. 配置错误在初始化阶段暴露，而不是推理时
 *
 * 使用方式：
 *   import { validateConfigOrThrow } from './config-schema';
 *   const runtime = validateConfigOrThrow(config);
 *
 * ============================================================================
 */

import { z } from 'zod';
import { createModuleLogger } from './logger';
import { ConfigurationError } from './errors';

const log = createModuleLogger('config-validator');

// ============================================================
// Schema 定义
// ============================================================

/** 应用基础配置 */
const appSchema = z.object({
  name: z.string().min(1),
  env: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
});

/** 推理参数 */
const fisSchema = z.object({
  resolution: z.number().positive().max(1, 'must not exceed 1 (coarser grids distort the centroid)'),
  uncoveredPolicy: z.enum(['undetermined', 'nearest-rule']),
  ruleSet: z.enum(['canonical', 'extended']),
});

/** 完整配置 Schema */
export const runtimeConfigSchema = z.object({
  app: appSchema,
  fis: fisSchema,
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

// ============================================================
// 公开 API
// ============================================================

export interface ConfigValidationResult {
  success: boolean;
  errors: string[];
  warnings: string[];
  config?: RuntimeConfig;
}

/**
 * 使用 Zod Schema 验证配置
 *
 * @param cfg - config 对象（来自 config.ts）
 */
export function validateConfigWithSchema(cfg: unknown): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const result = runtimeConfigSchema.safeParse(cfg);
  if (!result.success) {
    for (const issue of result.error.issues) {
      errors.push(`${issue.path.join('.')}: ${issue.message}`);
    }
    log.warn({ errors }, `Configuration validation found ${errors.length} error(s)`);
    return { success: false, errors, warnings };
  }

  const parsed = result.data;
  // 分辨率过细时每次调用采样点数剧增
  if (parsed.fis.resolution < 1e-4) {
    warnings.push(`fis.resolution: ${parsed.fis.resolution} yields a very dense sampling grid`);
  }
  if (parsed.fis.ruleSet === 'canonical' && parsed.fis.uncoveredPolicy === 'undetermined' && parsed.app.env === 'production') {
    warnings.push('fis: canonical rule set covers 9 of 27 input combinations; uncovered inputs report "undetermined"');
  }

  if (warnings.length > 0) {
    log.warn({ warnings }, `Configuration warnings (${warnings.length})`);
  }
  log.debug('Configuration validation passed');

  return { success: true, errors, warnings, config: parsed };
}

/**
 * 启动时验证配置并快速失败
 */
export function validateConfigOrThrow(cfg: unknown): RuntimeConfig {
  const result = validateConfigWithSchema(cfg);
  if (!result.success || !result.config) {
    log.fatal({ errors: result.errors }, 'Configuration validation failed');
    throw new ConfigurationError('Configuration validation failed', { errors: result.errors });
  }
  return result.config;
}
