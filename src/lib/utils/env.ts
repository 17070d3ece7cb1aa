/**
 * 環境変数ユーティリティ
 *
 * @description dotenv ファイルの読み込みと Stat-Xplore 関連設定の検証
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { z } from 'zod';

/**
 * 環境変数エラー
 */
export class EnvironmentError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment variables: ${issues.join(', ')}`);
    this.name = 'EnvironmentError';
  }
}

const StatXploreEnvSchema = z.object({
  STATXPLORE_API_KEY: z.string().min(1).optional(),
  STATXPLORE_BASE_URL: z.string().url().optional(),
  STATXPLORE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  STATXPLORE_MAX_RETRIES: z.coerce.number().int().min(0).optional(),
});

export type StatXploreEnv = z.infer<typeof StatXploreEnvSchema>;

export type StatXploreEnvKey = keyof StatXploreEnv;

export const STATXPLORE_ENV_KEYS: readonly StatXploreEnvKey[] = [
  'STATXPLORE_API_KEY',
  'STATXPLORE_BASE_URL',
  'STATXPLORE_TIMEOUT_MS',
  'STATXPLORE_MAX_RETRIES',
];

/**
 * dotenv ファイルを process.env に読み込む
 *
 * 既に設定済みの変数は上書きしない。ファイルが無い場合は何もしない。
 *
 * @param path 省略時はカレントディレクトリの .env
 */
export function loadEnv(path?: string): void {
  config({ path: path ?? resolve(process.cwd(), '.env') });
}

/**
 * Stat-Xplore 関連の環境変数を検証して返す
 *
 * 空文字列は未設定として扱う。skip に含めた変数は読まず、検証もしない。
 *
 * @throws {EnvironmentError} 値の形式が不正な場合
 */
export function readStatXploreEnv(
  env: Record<string, string | undefined> = process.env,
  skip: readonly StatXploreEnvKey[] = []
): StatXploreEnv {
  const read = (key: StatXploreEnvKey) => (skip.includes(key) ? undefined : env[key] || undefined);
  const candidate = {
    STATXPLORE_API_KEY: read('STATXPLORE_API_KEY'),
    STATXPLORE_BASE_URL: read('STATXPLORE_BASE_URL'),
    STATXPLORE_TIMEOUT_MS: read('STATXPLORE_TIMEOUT_MS'),
    STATXPLORE_MAX_RETRIES: read('STATXPLORE_MAX_RETRIES'),
  };

  const result = StatXploreEnvSchema.safeParse(candidate);
  if (!result.success) {
    throw new EnvironmentError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
