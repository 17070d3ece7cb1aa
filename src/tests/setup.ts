import { vi, beforeEach, afterEach } from 'vitest';

// 環境変数
process.env.NODE_ENV = 'test';

// 実環境の設定がテストに混ざらないようにする
delete process.env.STATXPLORE_API_KEY;
delete process.env.STATXPLORE_BASE_URL;
delete process.env.STATXPLORE_TIMEOUT_MS;
delete process.env.STATXPLORE_MAX_RETRIES;

// 各テスト前にモックをクリア
beforeEach(() => {
  vi.clearAllMocks();
});

// 各テスト後にタイマーをリセット
afterEach(() => {
  vi.useRealTimers();
});
