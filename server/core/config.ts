/**
 * 统一配置中心
 * 推理引擎运行参数的唯一来源
 *
 * 使用方式：
 *   import { config } from '../core/config';
 *   const step = config.fis.resolution;
 *
 * 环境变量优先级：
 *   环境变量 > .env 文件（见 env-loader.ts）> 默认值
 *
 * 零依赖原则：本文件仅依赖 process.env，类型与范围校验见 config-schema.ts
 */

type EnvSource = Record<string, string | undefined>;

// ============================================
// 辅助函数
// ============================================

function env(source: EnvSource, key: string, defaultValue: string): string {
  return source[key] || defaultValue;
}

function envFloat(source: EnvSource, key: string, defaultValue: number): number {
  const v = source[key];
  return v ? parseFloat(v) : defaultValue;
}

// ============================================
// 配置结构
// ============================================

export function buildConfig(source: EnvSource = process.env) {
  return {
    /** 应用基础配置 */
    app: {
      name: env(source, 'APP_NAME', 'fuzzy-anomaly-level'),
      env: env(source, 'NODE_ENV', 'development'),
      logLevel: env(source, 'LOG_LEVEL', 'info'),
    },

    /** 模糊推理参数 */
    fis: {
      /** 质心积分步长（输出论域离散化分辨率） */
      resolution: envFloat(source, 'FIS_RESOLUTION', 0.01),
      /** 无规则激活时的处理策略：undetermined | nearest-rule */
      uncoveredPolicy: env(source, 'FIS_UNCOVERED_POLICY', 'undetermined'),
      /** 规则集：canonical（9 条）| extended（14 条） */
      ruleSet: env(source, 'FIS_RULE_SET', 'canonical'),
    },
  };
}

export type RawConfig = ReturnType<typeof buildConfig>;

export const config: RawConfig = buildConfig();

/** 配置摘要（诊断输出用） */
export function getConfigSummary(cfg: RawConfig = config): Record<string, Record<string, string>> {
  return {
    app: {
      name: cfg.app.name,
      env: cfg.app.env,
      logLevel: cfg.app.logLevel,
    },
    fis: {
      resolution: String(cfg.fis.resolution),
      uncoveredPolicy: cfg.fis.uncoveredPolicy,
      ruleSet: cfg.fis.ruleSet,
    },
  };
}

export default config;
