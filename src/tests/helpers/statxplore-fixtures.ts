/**
 * Stat-Xplore テスト用フィクスチャ
 */

import type { Logger } from '@/lib/utils/logger';
import type { HttpRequest, HttpResponse, HttpTransport } from '@/lib/statxplore/transport';
import type {
  NestedValues,
  StatXploreField,
  StatXploreItem,
  StatXploreMeasure,
  StatXploreTableResponse,
} from '@/lib/statxplore/types';

export const TEST_API_KEY = 'test-key';

export const CASELOAD_MEASURE: StatXploreMeasure = {
  uri: 'str:count:UC_Monthly:V_F_UC_CASELOAD_FULL',
  label: 'People on Universal Credit',
};

/**
 * 項目を作成（code を渡すと地理 URI 付き）
 */
export function item(label: string, code?: string): StatXploreItem {
  if (code === undefined) {
    return { type: 'RecordValue', labels: [label] };
  }
  return {
    type: 'RecordValue',
    labels: [label],
    uris: [`str:value:UC_Monthly:V_F_UC_CASELOAD_FULL:COA_CODE:V_C_MASTERGEOG11_LA_TO_REGION:${code}`],
  };
}

/**
 * 合計項目を作成
 */
export function totalItem(label = 'Total'): StatXploreItem {
  return { type: 'Total', labels: [label] };
}

export function field(label: string, labels: Array<string | StatXploreItem>): StatXploreField {
  return {
    uri: `str:field:UC_Monthly:V_F_UC_CASELOAD_FULL:${label.replace(/\s+/g, '_')}`,
    label,
    items: labels.map((entry) => (typeof entry === 'string' ? item(entry) : entry)),
  };
}

/**
 * table レスポンスを作成（単一メジャー）
 */
export function tableResponse(
  fields: StatXploreField[],
  values: NestedValues,
  measure: StatXploreMeasure = CASELOAD_MEASURE
): StatXploreTableResponse {
  return {
    query: { database: 'str:database:UC_Monthly' },
    database: { id: 'str:database:UC_Monthly', label: 'People on Universal Credit' },
    measures: [measure],
    fields,
    cubes: {
      [measure.uri]: { values, precision: 0 },
    },
  };
}

export function jsonResponse(status: number, body: unknown, statusText = ''): HttpResponse {
  return {
    status,
    statusText,
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  };
}

export interface FakeTransport extends HttpTransport {
  requests: HttpRequest[];
}

/**
 * 順番に応答を返すトランスポート（最後の応答は繰り返す）
 */
export function createFakeTransport(...responses: Array<HttpResponse | Error>): FakeTransport {
  const queue = [...responses];
  const requests: HttpRequest[] = [];
  return {
    requests,
    async send(request) {
      requests.push(request);
      const next = queue.length > 1 ? queue.shift() : queue[0];
      if (next === undefined) {
        throw new Error('No response configured');
      }
      if (next instanceof Error) {
        throw next;
      }
      return next;
    },
  };
}

export interface RecordedLog {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

/**
 * 出力せずに記録するロガー
 */
export function createRecordingLogger(elapsedMs = 0): Logger & { records: RecordedLog[] } {
  const records: RecordedLog[] = [];
  const logger: Logger & { records: RecordedLog[] } = {
    records,
    debug: (message, context) => void records.push({ level: 'debug', message, context }),
    info: (message, context) => void records.push({ level: 'info', message, context }),
    warn: (message, context) => void records.push({ level: 'warn', message, context }),
    error: (message, context) => void records.push({ level: 'error', message, context }),
    child: () => logger,
    startTimer: () => ({
      end: () => elapsedMs,
      endWithError: () => elapsedMs,
    }),
  };
  return logger;
}
