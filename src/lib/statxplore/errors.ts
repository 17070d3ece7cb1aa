/**
 * Stat-Xplore エラー定義
 *
 * @description 呼び出し側が kind で原因を判別できるようにする
 */

export type StatXploreErrorKind =
  | 'authentication'
  | 'request_failed'
  | 'service_unavailable'
  | 'malformed_query'
  | 'query_not_found'
  | 'malformed_response'
  | 'unexpected_response';

/**
 * Stat-Xplore エラーの基底クラス
 */
export abstract class StatXploreError extends Error {
  abstract readonly kind: StatXploreErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * APIキーが拒否された（無効・期限切れ）
 */
export class AuthenticationError extends StatXploreError {
  readonly kind = 'authentication';

  constructor(
    message = 'Authentication to Stat-Xplore failed. Check that the API key is correct.',
    public readonly statusCode?: number
  ) {
    super(message);
  }
}

/**
 * クエリがサービスに拒否された
 */
export class RequestFailedError extends StatXploreError {
  readonly kind = 'request_failed';

  constructor(
    public readonly statusCode: number,
    public readonly detail: string | null
  ) {
    super(
      detail
        ? `Stat-Xplore rejected the query (HTTP ${statusCode}): ${detail}`
        : `Stat-Xplore rejected the query (HTTP ${statusCode}). Check that it is valid.`
    );
  }
}

/**
 * リトライを使い切ってもサービスが利用できない
 */
export class ServiceUnavailableError extends StatXploreError {
  readonly kind = 'service_unavailable';

  constructor(
    public readonly attempts: number,
    public readonly lastStatusCode: number | null,
    options?: { cause?: unknown }
  ) {
    super(
      `Stat-Xplore is unavailable after ${attempts} attempts` +
        (lastStatusCode !== null ? ` (last status ${lastStatusCode})` : '') +
        '. It may be down for maintenance; wait a few minutes and try again.',
      options
    );
  }
}

/**
 * クエリの JSON が解析できない
 */
export class MalformedQueryError extends StatXploreError {
  readonly kind = 'malformed_query';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * クエリファイルが存在しない
 */
export class QueryNotFoundError extends StatXploreError {
  readonly kind = 'query_not_found';

  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Query file not found: ${path}`, options);
  }
}

/**
 * レスポンスの構造がサービスの契約に反している
 */
export class MalformedResponseError extends StatXploreError {
  readonly kind = 'malformed_response';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * 想定外のステータス
 */
export class UnexpectedResponseError extends StatXploreError {
  readonly kind = 'unexpected_response';

  constructor(
    public readonly statusCode: number,
    public readonly body: string
  ) {
    super(`Unexpected response from Stat-Xplore (HTTP ${statusCode})`);
  }
}

export type AnyStatXploreError =
  | AuthenticationError
  | RequestFailedError
  | ServiceUnavailableError
  | MalformedQueryError
  | QueryNotFoundError
  | MalformedResponseError
  | UnexpectedResponseError;

export function isStatXploreError(value: unknown): value is AnyStatXploreError {
  return value instanceof StatXploreError;
}
