export {
  StatXploreClient,
  createStatXploreClient,
  type FetchTableOptions,
  type FetchTableOutcome,
  type StatXploreClientOptions,
} from './lib/statxplore/client';
export { loadQuery, parseQueryText } from './lib/statxplore/query-loader';
export {
  RequestExecutor,
  STATXPLORE_BASE_URL,
  classifyFailure,
  extractErrorDetail,
  type ExecuteRequest,
  type ExecutionResult,
  type RequestExecutorOptions,
} from './lib/statxplore/request-executor';
export {
  parseCube,
  parseCubes,
  flattenValues,
  valueAt,
  toNestedArray,
  type ParsedTableResponse,
} from './lib/statxplore/cube-parser';
export { pivot, getCell, cellCount, rowKey } from './lib/statxplore/table-pivoter';
export { annotate, extractGeoCode, extractGeoCodes, isOnsCode } from './lib/statxplore/geo-codes';
export {
  fetchTransport,
  TransportError,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from './lib/statxplore/transport';
export {
  StatXploreError,
  AuthenticationError,
  RequestFailedError,
  ServiceUnavailableError,
  MalformedQueryError,
  QueryNotFoundError,
  MalformedResponseError,
  UnexpectedResponseError,
  isStatXploreError,
  type AnyStatXploreError,
  type StatXploreErrorKind,
} from './lib/statxplore/errors';
export type * from './lib/statxplore/types';
export {
  loadEnv,
  readStatXploreEnv,
  EnvironmentError,
  STATXPLORE_ENV_KEYS,
  type StatXploreEnv,
  type StatXploreEnvKey,
} from './lib/utils/env';
export { createLogger, type Logger, type LogContext, type LogLevel } from './lib/utils/logger';
