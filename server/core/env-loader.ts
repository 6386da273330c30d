/**
 * dotenv 分层加载器
 *
 * 加载优先级（后加载的覆盖先加载的）：
 *   1. .env.development / .env.production（按 NODE_ENV 选择）
 *   2. .env.local（个人覆盖，不提交到 Git）
 *   3. .env（兼容旧配置）
 * 进程启动前已存在的环境变量始终保留（命令行 PORT=5001 npm start 优先）。
 *
 * 注意：此文件必须在 config.ts 之前执行（side-effect import）。
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '../../');

const explicitKeys = new Set(Object.keys(process.env));

function loadIfExists(filePath: string): boolean {
  const fullPath = resolve(ROOT, filePath);
  if (!existsSync(fullPath)) return false;

  const parsed = dotenvConfig({ path: fullPath, processEnv: {} }).parsed ?? {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!explicitKeys.has(key)) process.env[key] = value;
  }
  return true;
}

const nodeEnv = process.env.NODE_ENV || 'development';
const loaded: string[] = [];

if (loadIfExists(`.env.${nodeEnv}`)) {
  loaded.push(`.env.${nodeEnv}`);
}

if (loadIfExists('.env.local')) {
  loaded.push('.env.local');
}

if (loadIfExists('.env')) {
  loaded.push('.env');
}

if (loaded.length > 0 && process.env.LOG_LEVEL === 'debug') {
  // logger 尚未初始化，这里使用 console
  console.debug(`[env-loader] Loaded config files: ${loaded.join(' → ')}`);
}

export { loaded as loadedEnvFiles };
