/**
 * HTTP トランスポート
 *
 * @description ステータス・ヘッダー・本文を返すだけの抽象層。既定実装は global fetch を使う
 */

export interface HttpRequest {
  url: string;
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  /** 試行ごとのタイムアウト（ミリ秒） */
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * 接続レベルの失敗（タイムアウト、接続拒否、DNS など）
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly reason: 'timeout' | 'network',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * global fetch によるトランスポート
 */
export const fetchTransport: HttpTransport = {
  async send(request) {
    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(request.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new TransportError(`Request timed out after ${request.timeoutMs}ms`, 'timeout', {
          cause: error,
        });
      }
      throw new TransportError('Network request failed', 'network', { cause: error });
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      if (isTimeout(error)) {
        throw new TransportError(`Response body timed out after ${request.timeoutMs}ms`, 'timeout', {
          cause: error,
        });
      }
      throw new TransportError('Failed to read response body', 'network', { cause: error });
    }

    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      body,
    };
  },
};
