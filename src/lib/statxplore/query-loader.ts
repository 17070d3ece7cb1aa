/**
 * クエリローダー
 *
 * @description オブジェクト・ストリーム・ファイルパスのいずれかからクエリを読み込む
 */

import { open } from 'fs/promises';
import type { Readable } from 'stream';
import { z } from 'zod';
import { MalformedQueryError, QueryNotFoundError } from './errors';
import type { QuerySource, StatXploreQuery } from './types';

const QuerySchema = z.record(z.string(), z.unknown());

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * JSON テキストをクエリとして解析
 *
 * @throws {MalformedQueryError} JSON として不正、またはオブジェクトでない場合
 */
export function parseQueryText(text: string): StatXploreQuery {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.trim());
  } catch (error) {
    throw new MalformedQueryError('Query is not valid JSON', { cause: error });
  }

  const result = QuerySchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedQueryError('Query must be a JSON object');
  }
  return result.data;
}

async function loadFromPath(path: string): Promise<StatXploreQuery> {
  const handle = await open(path, 'r').catch((error: unknown) => {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new QueryNotFoundError(path, { cause: error });
    }
    throw error;
  });

  try {
    return parseQueryText(await readAll(handle.createReadStream({ autoClose: false })));
  } finally {
    await handle.close();
  }
}

/**
 * クエリを正規化して返す
 *
 * @throws {MalformedQueryError} JSON が不正な場合
 * @throws {QueryNotFoundError} パスが存在しない場合
 */
export async function loadQuery(source: QuerySource): Promise<StatXploreQuery> {
  switch (source.kind) {
    case 'object':
      return source.query;
    case 'stream':
      return parseQueryText(await readAll(source.stream));
    case 'path':
      return loadFromPath(source.path);
  }
}
