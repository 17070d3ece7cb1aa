/**
 * Stat-Xplore リクエスト実行
 *
 * @description APIKey ヘッダー認証、一時的な失敗のリトライ、終端エラーの分類
 * @see https://stat-xplore.dwp.gov.uk/webapi/online-help/Open-Data-API.html
 */

import { z } from 'zod';
import { createLogger, type Logger } from '../utils/logger';
import { RetryableError, RetryExhaustedError, withRetry } from '../utils/retry';
import {
  AuthenticationError,
  MalformedResponseError,
  RequestFailedError,
  ServiceUnavailableError,
  type StatXploreError,
  UnexpectedResponseError,
} from './errors';
import { fetchTransport, TransportError, type HttpResponse, type HttpTransport } from './transport';
import type { RequestDiagnostics, StatXploreEndpoint, StatXploreQuery } from './types';

export const STATXPLORE_BASE_URL = 'https://stat-xplore.dwp.gov.uk/webapi/rest/v1';

/** 混雑・メンテナンス・ゲートウェイタイムアウト */
const TRANSIENT_STATUS_CODES = new Set([429, 502, 503, 504]);

const AUTH_STATUS_CODES = new Set([401, 403]);

/** クエリ内容の問題としてサービスが拒否するステータス */
const REJECTED_STATUS_CODES = new Set([400, 404, 413, 422]);

const ErrorBodySchema = z
  .object({
    message: z.string().optional(),
    error: z.string().optional(),
    errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
  })
  .passthrough();

export interface RequestExecutorOptions {
  apiKey: string;
  /** デフォルト: STATXPLORE_BASE_URL */
  baseUrl?: string;
  /** 試行ごとのタイムアウト（ミリ秒、デフォルト: 60000） */
  timeoutMs?: number;
  /** 最大リトライ回数（デフォルト: 3） */
  maxRetries?: number;
  /** リトライ間隔の基本値（ミリ秒、試行ごとに線形増加、デフォルト: 500） */
  retryDelayMs?: number;
  transport?: HttpTransport;
  logger?: Logger;
}

export interface ExecuteRequest {
  endpoint: StatXploreEndpoint;
  /** エンドポイント以下のパス（例: schema の ID） */
  path?: string;
  /** table エンドポイントに POST するクエリ */
  payload?: StatXploreQuery;
}

export interface ExecutionResult {
  status: number;
  body: unknown;
  diagnostics: RequestDiagnostics;
}

/**
 * エラーレスポンス本文からサービスの詳細メッセージを取り出す
 */
export function extractErrorDetail(body: string): string | null {
  const text = body.trim();
  if (!text) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return text;
  }

  const parsed = ErrorBodySchema.safeParse(json);
  if (!parsed.success) {
    return text;
  }
  const { message, error, errors } = parsed.data;
  if (message) return message;
  if (error) return error;
  if (errors && errors.length > 0) {
    return errors.map((e) => e.message).join('; ');
  }
  return text;
}

/**
 * 非2xxレスポンスをエラーに分類
 *
 * リトライ対象ステータスはここに到達する前に ServiceUnavailableError になるが、
 * maxRetries = 0 の場合も同じ扱いにする。
 */
export function classifyFailure(response: HttpResponse, attempts = 1): StatXploreError {
  const { status } = response;
  if (AUTH_STATUS_CODES.has(status)) {
    return new AuthenticationError(undefined, status);
  }
  if (REJECTED_STATUS_CODES.has(status)) {
    return new RequestFailedError(status, extractErrorDetail(response.body));
  }
  if (TRANSIENT_STATUS_CODES.has(status)) {
    return new ServiceUnavailableError(attempts, status);
  }
  return new UnexpectedResponseError(status, response.body);
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Stat-Xplore への HTTP リクエストを実行
 */
export class RequestExecutor {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(options: RequestExecutorOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? STATXPLORE_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.transport = options.transport ?? fetchTransport;
    this.logger = options.logger ?? createLogger({ client: 'statxplore' });
  }

  /**
   * リクエストを実行し、2xx の場合は JSON 本文を返す
   *
   * @throws {AuthenticationError} 401/403
   * @throws {RequestFailedError} クエリが拒否された
   * @throws {ServiceUnavailableError} リトライを使い切った
   * @throws {UnexpectedResponseError} その他の非2xx
   * @throws {MalformedResponseError} 本文が JSON でない
   */
  async execute(request: ExecuteRequest): Promise<ExecutionResult> {
    const { endpoint, path, payload } = request;
    const url = path
      ? `${this.baseUrl}/${endpoint}/${encodeURI(path)}`
      : `${this.baseUrl}/${endpoint}`;
    const method = endpoint === 'table' ? 'POST' : 'GET';

    const headers: Record<string, string> = {
      APIKey: this.apiKey,
      Accept: 'application/json',
    };
    if (method === 'POST') {
      headers['Content-Type'] = 'application/json';
    }
    const body = method === 'POST' ? JSON.stringify(payload ?? {}) : undefined;

    this.logger.debug('Stat-Xplore request', { endpoint, method, path });

    const timer = this.logger.startTimer('Stat-Xplore request');
    let attempts = 0;
    let response: HttpResponse;

    try {
      response = await withRetry(
        async (attempt) => {
          attempts = attempt;
          let res: HttpResponse;
          try {
            res = await this.transport.send({ url, method, headers, body, timeoutMs: this.timeoutMs });
          } catch (error) {
            if (error instanceof TransportError) {
              throw new RetryableError(error.message, undefined, { cause: error });
            }
            throw error;
          }

          if (TRANSIENT_STATUS_CODES.has(res.status)) {
            throw new RetryableError(`HTTP ${res.status}: ${res.statusText}`, res.status);
          }
          return res;
        },
        {
          maxRetries: this.maxRetries,
          baseDelayMs: this.retryDelayMs,
          backoff: 'linear',
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn('Stat-Xplore request retry', {
              endpoint,
              attempt,
              delayMs,
              statusCode: error.statusCode,
              error,
            });
          },
        }
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        timer.endWithError(error, { endpoint, attempts: error.attempts });
        throw new ServiceUnavailableError(error.attempts, error.lastError.statusCode ?? null, {
          cause: error.lastError,
        });
      }
      this.logger.error('Stat-Xplore request failed', { endpoint, error });
      throw error;
    }

    const elapsedMs = timer.end({ endpoint, statusCode: response.status, attempts });
    const diagnostics: RequestDiagnostics = {
      url,
      method,
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
      elapsedMs,
      attempts,
    };

    if (!isSuccess(response.status)) {
      const failure = classifyFailure(response, attempts);
      this.logger.error('Stat-Xplore request failed (non-retryable)', {
        endpoint,
        statusCode: response.status,
        error: failure,
      });
      throw failure;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body);
    } catch (error) {
      throw new MalformedResponseError(`Stat-Xplore ${endpoint} response is not valid JSON`, {
        cause: error,
      });
    }

    return { status: response.status, body: parsed, diagnostics };
  }
}
