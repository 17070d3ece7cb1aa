/**
 * Stat-Xplore API クライアント
 *
 * @description クエリ読み込み → リクエスト → キューブ解析 → ピボット → 地理コード付与
 * @see https://stat-xplore.dwp.gov.uk/webapi/online-help/Open-Data-API.html
 */

import { z } from 'zod';
import { readStatXploreEnv, STATXPLORE_ENV_KEYS } from '../utils/env';
import { createLogger, type LogContext, type Logger } from '../utils/logger';
import { parseCube } from './cube-parser';
import { isStatXploreError, MalformedResponseError, type AnyStatXploreError } from './errors';
import { annotate } from './geo-codes';
import { loadQuery } from './query-loader';
import { RequestExecutor } from './request-executor';
import { pivot } from './table-pivoter';
import type { HttpTransport } from './transport';
import type {
  Cube,
  FetchResult,
  QuerySource,
  StatXploreRateLimit,
  StatXploreSchemaNode,
  Table,
} from './types';

const SchemaNodeSchema: z.ZodType<StatXploreSchemaNode> = z.lazy(() =>
  z
    .object({
      id: z.string(),
      label: z.string(),
      type: z.string(),
      location: z.string().optional(),
      children: z.array(SchemaNodeSchema).optional(),
    })
    .passthrough()
);

const RateLimitSchema = z
  .object({
    limit: z.number(),
    remaining: z.number(),
    reset: z.number(),
  })
  .passthrough();

const InfoSchema = z.record(z.string(), z.unknown());

export interface StatXploreClientOptions {
  /** API キー（省略時は環境変数 STATXPLORE_API_KEY を使用） */
  apiKey?: string;
  /** API ベースURL（省略時は環境変数 STATXPLORE_BASE_URL、なければ公式URL） */
  baseUrl?: string;
  /** 試行ごとのタイムアウト（ミリ秒、デフォルト: 60000） */
  timeoutMs?: number;
  /** 最大リトライ回数（デフォルト: 3） */
  maxRetries?: number;
  /** リトライ間隔の基本値（ミリ秒、デフォルト: 500） */
  retryDelayMs?: number;
  /** HTTP トランスポート（省略時は global fetch） */
  transport?: HttpTransport;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

export interface FetchTableOptions {
  /** false の場合はピボットせず Cube を返す（デフォルト: true） */
  reshape?: boolean;
  /** 行フィールドの ONS 地理コード列を追加する（デフォルト: false） */
  includeCodes?: boolean;
}

export type FetchTableOutcome<T extends Table | Cube> =
  | { ok: true; value: FetchResult<T> }
  | { ok: false; error: AnyStatXploreError };

/**
 * Stat-Xplore API クライアント
 */
export class StatXploreClient {
  private readonly executor: RequestExecutor;
  private readonly logger: Logger;

  constructor(options?: StatXploreClientOptions) {
    // オプションで指定された設定は環境変数を読まない
    const provided = {
      STATXPLORE_API_KEY: options?.apiKey,
      STATXPLORE_BASE_URL: options?.baseUrl,
      STATXPLORE_TIMEOUT_MS: options?.timeoutMs,
      STATXPLORE_MAX_RETRIES: options?.maxRetries,
    };
    const env = readStatXploreEnv(
      process.env,
      STATXPLORE_ENV_KEYS.filter((key) => provided[key] !== undefined)
    );
    const apiKey = options?.apiKey ?? env.STATXPLORE_API_KEY;
    if (!apiKey) {
      throw new Error('Stat-Xplore API key is required. Set STATXPLORE_API_KEY environment variable.');
    }

    this.logger = createLogger({ client: 'statxplore', ...options?.logContext });
    this.executor = new RequestExecutor({
      apiKey,
      baseUrl: options?.baseUrl ?? env.STATXPLORE_BASE_URL,
      timeoutMs: options?.timeoutMs ?? env.STATXPLORE_TIMEOUT_MS,
      maxRetries: options?.maxRetries ?? env.STATXPLORE_MAX_RETRIES,
      retryDelayMs: options?.retryDelayMs,
      transport: options?.transport,
      logger: this.logger,
    });
  }

  /**
   * テーブルを取得
   *
   * 3次元以上の結果は、次元0と次元2以降を行レベルにして2次元に畳む。
   *
   * @throws {MalformedQueryError} クエリの JSON が不正
   * @throws {QueryNotFoundError} クエリファイルが存在しない
   * @throws {AuthenticationError} APIキーが拒否された
   * @throws {RequestFailedError} クエリが拒否された
   * @throws {ServiceUnavailableError} リトライを使い切った
   * @throws {MalformedResponseError} レスポンス構造が不正
   * @throws {UnexpectedResponseError} 想定外のステータス
   */
  async fetchTable(source: QuerySource, options: FetchTableOptions & { reshape: false }): Promise<FetchResult<Cube>>;
  async fetchTable(source: QuerySource, options?: FetchTableOptions & { reshape?: true }): Promise<FetchResult<Table>>;
  async fetchTable(source: QuerySource, options?: FetchTableOptions): Promise<FetchResult<Table | Cube>>;
  async fetchTable(source: QuerySource, options?: FetchTableOptions): Promise<FetchResult<Table | Cube>> {
    const reshape = options?.reshape ?? true;
    const includeCodes = options?.includeCodes ?? false;

    const query = await loadQuery(source);
    const { body, diagnostics } = await this.executor.execute({ endpoint: 'table', payload: query });
    const { cube, response } = parseCube(body);

    if (!reshape) {
      this.logger.info('Stat-Xplore cube fetched', {
        shape: cube.shape,
        elapsedMs: diagnostics.elapsedMs,
      });
      return { data: pivot(cube, false), response, diagnostics };
    }

    const table = annotate(pivot(cube, true), cube.fields, includeCodes);
    this.logger.info('Stat-Xplore table fetched', {
      rowCount: table.rows.length,
      columnCount: table.columns.length,
      codeColumnCount: table.codeColumns.length,
      elapsedMs: diagnostics.elapsedMs,
    });
    return { data: table, response, diagnostics };
  }

  /**
   * fetchTable の結果を例外ではなく判別可能な値で返す
   *
   * Stat-Xplore 以外の例外（プログラミングエラーなど）はそのまま投げる。
   */
  async tryFetchTable(source: QuerySource, options: FetchTableOptions & { reshape: false }): Promise<FetchTableOutcome<Cube>>;
  async tryFetchTable(source: QuerySource, options?: FetchTableOptions & { reshape?: true }): Promise<FetchTableOutcome<Table>>;
  async tryFetchTable(source: QuerySource, options?: FetchTableOptions): Promise<FetchTableOutcome<Table | Cube>>;
  async tryFetchTable(source: QuerySource, options?: FetchTableOptions): Promise<FetchTableOutcome<Table | Cube>> {
    try {
      return { ok: true, value: await this.fetchTable(source, options) };
    } catch (error) {
      if (isStatXploreError(error)) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * APIキーが有効か確認（info エンドポイント）
   *
   * @throws {AuthenticationError} APIキーが拒否された
   */
  async verifyKey(): Promise<void> {
    await this.executor.execute({ endpoint: 'info' });
  }

  /**
   * info エンドポイント
   */
  async getInfo(): Promise<Record<string, unknown>> {
    const { body } = await this.executor.execute({ endpoint: 'info' });
    return this.validate(InfoSchema, body, 'info');
  }

  /**
   * schema エンドポイント（ID 省略時はルート）
   */
  async getSchema(id?: string): Promise<StatXploreSchemaNode> {
    const { body } = await this.executor.execute({ endpoint: 'schema', path: id });
    return this.validate(SchemaNodeSchema, body, 'schema');
  }

  /**
   * rate_limit エンドポイント
   */
  async getRateLimit(): Promise<StatXploreRateLimit> {
    const { body } = await this.executor.execute({ endpoint: 'rate_limit' });
    return this.validate(RateLimitSchema, body, 'rate_limit');
  }

  private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, endpoint: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new MalformedResponseError(`Stat-Xplore ${endpoint} response is malformed`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}

/**
 * デフォルトクライアントインスタンスを作成
 */
export function createStatXploreClient(options?: StatXploreClientOptions): StatXploreClient {
  return new StatXploreClient(options);
}
