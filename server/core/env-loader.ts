/**
 * dotenv 分层加载器
 *
 * 加载优先级（后加载的覆盖先加载的）：
 *   1. .env.development / .env.production（按 NODE_ENV 选择）
 *   2. .env.local（个人覆盖，不提交到 Git）
 *   3. .env
 *   4. 启动前已存在的环境变量始终优先（命令行 FIS_RESOLUTION=0.005 npm test）
 *
 * 注意：此文件必须在读取 config 之前执行（side-effect import）。
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';

const ROOT = fileURLToPath(new URL('../../', import.meta.url));

// 进程启动时已经存在的变量不被文件覆盖
const preset = new Set(Object.keys(process.env));

function loadIfExists(filePath: string): boolean {
  const fullPath = resolve(ROOT, filePath);
  if (!existsSync(fullPath)) return false;

  const result = dotenvConfig({ path: fullPath, override: true, processEnv: {} });
  for (const [key, value] of Object.entries(result.parsed ?? {})) {
    if (!preset.has(key)) process.env[key] = value;
  }
  return true;
}

const nodeEnv = process.env.NODE_ENV || 'development';
const loaded: string[] = [];

for (const file of [`.env.${nodeEnv}`, '.env.local', '.env']) {
  if (loadIfExists(file)) loaded.push(file);
}

if (loaded.length > 0 && process.env.LOG_LEVEL === 'debug') {
  // logger 尚未初始化
  console.debug(`[env-loader] Loaded config files: ${loaded.join(' → ')}`);
}

export { loaded as loadedEnvFiles };
