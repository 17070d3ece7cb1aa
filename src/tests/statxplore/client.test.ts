/**
 * statxplore/client.ts のユニットテスト
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { tmpdir } from 'os';

vi.mock('@/lib/utils/logger', () => {
  const silent = () => {};
  const logger = {
    info: silent,
    warn: silent,
    error: silent,
    debug: silent,
    child: () => logger,
    startTimer: () => ({ end: () => 12, endWithError: () => 12 }),
  };
  return { createLogger: () => logger };
});

import { StatXploreClient, createStatXploreClient } from '@/lib/statxplore/client';
import {
  AuthenticationError,
  MalformedResponseError,
  QueryNotFoundError,
  ServiceUnavailableError,
} from '@/lib/statxplore/errors';
import { STATXPLORE_BASE_URL } from '@/lib/statxplore/request-executor';
import { EnvironmentError } from '@/lib/utils/env';
import { getCell } from '@/lib/statxplore/table-pivoter';
import {
  TEST_API_KEY,
  createFakeTransport,
  field,
  item,
  jsonResponse,
  tableResponse,
  totalItem,
} from '../helpers/statxplore-fixtures';

const QUERY = {
  database: 'str:database:UC_Monthly',
  measures: ['str:count:UC_Monthly:V_F_UC_CASELOAD_FULL'],
  dimensions: [
    ['str:field:UC_Monthly:V_F_UC_CASELOAD_FULL:COA_CODE'],
    ['str:field:UC_Monthly:F_UC_DATE:DATE_NAME'],
  ],
};

const BODY = tableResponse(
  [
    field('Local Authority', [item('Hartlepool', 'E06000001'), item('Middlesbrough', 'E06000002'), totalItem()]),
    field('Month', ['January 2024', 'February 2024']),
  ],
  [
    [100, 110],
    [200, 220],
    [300, 330],
  ]
);

describe('statxplore/client.ts', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    process.env.STATXPLORE_API_KEY = TEST_API_KEY;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('コンストラクタ', () => {
    it('env変数からAPIキーを取得する', async () => {
      const transport = createFakeTransport(jsonResponse(200, {}));
      const client = new StatXploreClient({ transport });

      await client.verifyKey();

      expect(transport.requests[0].headers.APIKey).toBe(TEST_API_KEY);
    });

    it('オプションのAPIキーを優先する', async () => {
      const transport = createFakeTransport(jsonResponse(200, {}));
      const client = new StatXploreClient({ apiKey: 'custom-key', transport });

      await client.verifyKey();

      expect(transport.requests[0].headers.APIKey).toBe('custom-key');
    });

    it('APIキーなしでエラーを投げる', () => {
      delete process.env.STATXPLORE_API_KEY;

      expect(() => new StatXploreClient()).toThrow('Stat-Xplore API key is required');
    });

    it('env変数のベースURL・リトライ回数を使う', async () => {
      process.env.STATXPLORE_BASE_URL = 'https://stat-xplore.example.test/api';
      process.env.STATXPLORE_MAX_RETRIES = '0';
      const transport = createFakeTransport(jsonResponse(503, ''));
      const client = new StatXploreClient({ transport, retryDelayMs: 0 });

      await expect(client.verifyKey()).rejects.toBeInstanceOf(ServiceUnavailableError);
      expect(transport.requests).toHaveLength(1);
      expect(transport.requests[0].url).toBe('https://stat-xplore.example.test/api/info');
    });

    it('オプションで指定した設定は不正な環境変数より優先する', async () => {
      process.env.STATXPLORE_TIMEOUT_MS = '30s';
      process.env.STATXPLORE_BASE_URL = 'not a url';
      const transport = createFakeTransport(jsonResponse(200, {}));
      const client = new StatXploreClient({
        apiKey: 'custom-key',
        baseUrl: 'https://stat-xplore.example.test/api',
        timeoutMs: 1000,
        transport,
      });

      await client.verifyKey();

      expect(transport.requests[0].url).toBe('https://stat-xplore.example.test/api/info');
      expect(transport.requests[0].timeoutMs).toBe(1000);
    });

    it('オプションで上書きしない不正な環境変数はEnvironmentError', () => {
      process.env.STATXPLORE_TIMEOUT_MS = '30s';

      expect(() => new StatXploreClient({ apiKey: 'custom-key' })).toThrow(EnvironmentError);
    });
  });

  describe('fetchTable', () => {
    it('クエリを送信してピボット済みテーブルを返す', async () => {
      const transport = createFakeTransport(jsonResponse(200, BODY, 'OK'));
      const client = new StatXploreClient({ transport });

      const result = await client.fetchTable({ kind: 'object', query: QUERY });

      expect(transport.requests[0].url).toBe(`${STATXPLORE_BASE_URL}/table`);
      expect(transport.requests[0].body).toBe(JSON.stringify(QUERY));
      expect(result.data.rows.map((row) => row.labels)).toEqual([['Hartlepool'], ['Middlesbrough'], ['Total']]);
      expect(result.data.columns.map((column) => column.label)).toEqual(['January 2024', 'February 2024']);
      expect(getCell(result.data, 'Middlesbrough', 'February 2024')).toBe(220);
      expect(result.data.codeColumns).toEqual([]);
      expect(result.response).toEqual(BODY);
      expect(result.diagnostics).toMatchObject({ status: 200, attempts: 1, elapsedMs: 12 });
    });

    it('includeCodes で地理コード列を追加する', async () => {
      const transport = createFakeTransport(jsonResponse(200, BODY));
      const client = new StatXploreClient({ transport });

      const result = await client.fetchTable({ kind: 'object', query: QUERY }, { includeCodes: true });

      expect(result.data.codeColumns).toEqual([
        { label: 'Local Authority code', fieldIndex: 0, values: ['E06000001', 'E06000002', null] },
      ]);
    });

    it('reshape=false はキューブを返す', async () => {
      const transport = createFakeTransport(jsonResponse(200, BODY));
      const client = new StatXploreClient({ transport });

      const result = await client.fetchTable({ kind: 'object', query: QUERY }, { reshape: false });

      expect(result.data.shape).toEqual([3, 2]);
      expect(result.data.values).toEqual([100, 110, 200, 220, 300, 330]);
    });

    it('クエリファイルが無ければ送信せずに QueryNotFoundError', async () => {
      const transport = createFakeTransport(jsonResponse(200, BODY));
      const client = new StatXploreClient({ transport });

      await expect(
        client.fetchTable({ kind: 'path', path: join(tmpdir(), 'statxplore-missing', 'query.json') })
      ).rejects.toBeInstanceOf(QueryNotFoundError);
      expect(transport.requests).toHaveLength(0);
    });

    it('レスポンスの値の数が合わなければ MalformedResponseError', async () => {
      const broken = { ...BODY, cubes: { [BODY.measures[0].uri]: { values: [1, 2, 3] } } };
      const transport = createFakeTransport(jsonResponse(200, broken));
      const client = new StatXploreClient({ transport });

      await expect(client.fetchTable({ kind: 'object', query: QUERY })).rejects.toBeInstanceOf(
        MalformedResponseError
      );
    });
  });

  describe('tryFetchTable', () => {
    it('成功時は ok=true', async () => {
      const transport = createFakeTransport(jsonResponse(200, BODY));
      const client = new StatXploreClient({ transport });

      const outcome = await client.tryFetchTable({ kind: 'object', query: QUERY });

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.value.data.rows).toHaveLength(3);
      }
    });

    it('Stat-Xplore のエラーは kind で判別できる値で返す', async () => {
      const transport = createFakeTransport(jsonResponse(401, ''));
      const client = new StatXploreClient({ transport });

      const outcome = await client.tryFetchTable({ kind: 'object', query: QUERY });

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.kind).toBe('authentication');
      }
      expect(transport.requests).toHaveLength(1);
    });
  });

  describe('補助エンドポイント', () => {
    it('verifyKey は拒否されたキーで AuthenticationError', async () => {
      const transport = createFakeTransport(jsonResponse(403, ''));
      const client = new StatXploreClient({ transport });

      await expect(client.verifyKey()).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('getInfo は info の本文を返す', async () => {
      const transport = createFakeTransport(jsonResponse(200, { version: '1.0', languages: ['en'] }));
      const client = new StatXploreClient({ transport });

      await expect(client.getInfo()).resolves.toEqual({ version: '1.0', languages: ['en'] });
    });

    it('getSchema は ID をパスに付けてノードを返す', async () => {
      const node = {
        id: 'str:folder:fuc',
        label: 'Universal Credit',
        type: 'FOLDER',
        location: `${STATXPLORE_BASE_URL}/schema/str:folder:fuc`,
        children: [{ id: 'str:database:UC_Monthly', label: 'People on Universal Credit', type: 'DATABASE' }],
      };
      const transport = createFakeTransport(jsonResponse(200, node));
      const client = new StatXploreClient({ transport });

      const result = await client.getSchema('str:folder:fuc');

      expect(transport.requests[0].url).toBe(`${STATXPLORE_BASE_URL}/schema/str:folder:fuc`);
      expect(result).toEqual(node);
    });

    it('getRateLimit は上限と残数を返す', async () => {
      const transport = createFakeTransport(jsonResponse(200, { limit: 2000, remaining: 1998, reset: 1717200000000 }));
      const client = new StatXploreClient({ transport });

      const rateLimit = await client.getRateLimit();

      expect(rateLimit.remaining).toBe(1998);
      expect(rateLimit.limit).toBe(2000);
    });

    it('getRateLimit の本文が不正なら MalformedResponseError', async () => {
      const transport = createFakeTransport(jsonResponse(200, { remaining: 'many' }));
      const client = new StatXploreClient({ transport });

      await expect(client.getRateLimit()).rejects.toBeInstanceOf(MalformedResponseError);
    });
  });

  describe('createStatXploreClient', () => {
    it('新しいインスタンスを生成する', () => {
      expect(createStatXploreClient()).toBeInstanceOf(StatXploreClient);
    });
  });
});
