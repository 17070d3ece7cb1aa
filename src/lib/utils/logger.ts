/**
 * 構造化ロギングユーティリティ
 *
 * @description 1行1JSONのログ出力。APIキーを含むフィールドは出力前にマスクする
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** エンドポイント名 (table, info, schema, rate_limit) */
  endpoint?: string;
  /** 試行回数 */
  attempt?: number;
  /** HTTPステータスコード */
  statusCode?: number;
  /** 処理時間（ミリ秒） */
  durationMs?: number;
  /** 行数 */
  rowCount?: number;
  /** 列数 */
  columnCount?: number;
  /** その他のコンテキスト */
  [key: string]: unknown;
}

interface LogPayload extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (additionalContext: LogContext) => Logger;
  startTimer: (label: string) => LogTimer;
}

export interface LogTimer {
  end: (context?: LogContext) => number;
  endWithError: (error: Error, context?: LogContext) => number;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** 値をマスクするキー（大文字小文字を区別しない） */
const REDACTED_KEYS = new Set(['apikey', 'api_key', 'authorization']);

const REDACTED = '[REDACTED]';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

/**
 * 最小ログレベル（呼び出しごとに環境変数を参照）
 */
function minLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(level)) {
    return level;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLogLevel()];
}

/**
 * エラーオブジェクトをシリアライズ可能な形式に変換
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack?.split('\n').slice(0, 5).join('\n'), // スタックトレースを5行に制限
      ...(error.cause ? { cause: serializeError(error.cause) } : {}),
    };
  }
  return { value: String(error) };
}

/**
 * キー名がマスク対象のフィールドを再帰的に置換
 */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = REDACTED_KEYS.has(key.toLowerCase()) ? REDACTED : redact(inner);
    }
    return result;
  }
  return value;
}

/**
 * ロガーを作成
 *
 * @param defaultContext 全ログに付与するデフォルトコンテキスト
 *
 * @example
 * ```typescript
 * const logger = createLogger({ client: 'statxplore' });
 * logger.info('Table fetched', { rowCount: 12 });
 * logger.error('Request failed', { error: err, statusCode: 500 });
 * ```
 */
export function createLogger(defaultContext: LogContext = {}): Logger {
  const log = (level: LogLevel, message: string, context: LogContext = {}) => {
    if (!shouldLog(level)) {
      return;
    }

    const processedContext: LogContext = { ...context };
    if (processedContext.error) {
      processedContext.error = serializeError(processedContext.error);
    }

    const payload: LogPayload = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...defaultContext,
      ...processedContext,
    };

    const jsonStr = JSON.stringify(redact(payload));

    switch (level) {
      case 'error':
        console.error(jsonStr);
        break;
      case 'warn':
        console.warn(jsonStr);
        break;
      default:
        console.log(jsonStr);
    }
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),

    /**
     * 子ロガーを作成（コンテキストを追加）
     */
    child: (additionalContext) => createLogger({ ...defaultContext, ...additionalContext }),

    /**
     * 処理時間を計測するタイマーを開始
     */
    startTimer: (label) => {
      const startTime = Date.now();
      return {
        end: (context) => {
          const durationMs = Date.now() - startTime;
          log('debug', `${label} completed`, { ...context, durationMs });
          return durationMs;
        },
        endWithError: (error, context) => {
          const durationMs = Date.now() - startTime;
          log('error', `${label} failed`, { ...context, durationMs, error });
          return durationMs;
        },
      };
    },
  };
}
