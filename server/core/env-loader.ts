/**
 * dotenv 分层加载器
 *
 * 加载优先级（后加载的覆盖先加载的）：
 *   1. .env.development / .env.production / .env.test（按 NODE_ENV 选择）
 *   2. .env.local（个人覆盖，不提交到 Git）
 *   3. .env
 * 已存在于 process.env 的变量始终优先，不会被文件覆盖。
 *
 * 注意：此文件必须在 config.ts 读取环境变量之前执行（side-effect import）。
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '../../');

// 进程启动时就存在的变量（命令行 / CI 注入），文件不得覆盖
const shellKeys = new Set(Object.keys(process.env));

function loadIfExists(filePath: string): boolean {
  const fullPath = resolve(ROOT, filePath);
  if (!existsSync(fullPath)) return false;

  const result = dotenvConfig({ path: fullPath, processEnv: {} });
  if (result.error) throw result.error;

  for (const [key, value] of Object.entries(result.parsed ?? {})) {
    if (!shellKeys.has(key)) process.env[key] = value;
  }
  return true;
}

const nodeEnv = process.env.NODE_ENV || 'development';
const loaded: string[] = [];

for (const file of [`.env.${nodeEnv}`, '.env.local', '.env']) {
  if (loadIfExists(file)) loaded.push(file);
}

export { loaded as loadedEnvFiles };
