/**
 * Stat-Xplore 型定義
 *
 * @description Open Data API レスポンス型と、キューブ・テーブルの内部表現
 * @see https://stat-xplore.dwp.gov.uk/webapi/online-help/Open-Data-API.html
 */

import type { Readable } from 'stream';

// ============================================
// クエリ
// ============================================

/**
 * table エンドポイントに POST するクエリ
 *
 * database / measures / dimensions / recodes などを含むが、内容は検証しない
 */
export type StatXploreQuery = Record<string, unknown>;

/**
 * クエリの入力元
 */
export type QuerySource =
  | { kind: 'object'; query: StatXploreQuery }
  | { kind: 'stream'; stream: Readable }
  | { kind: 'path'; path: string };

// ============================================
// API レスポンス
// ============================================

/** API エンドポイント */
export type StatXploreEndpoint = 'schema' | 'table' | 'info' | 'rate_limit';

/**
 * キューブの値（ネストされた配列、またはフラット配列）
 */
export type NestedValues = Array<number | null | NestedValues>;

export interface StatXploreItem {
  type?: string;
  labels: string[];
  /** 例: "str:value:UC_Monthly:V_F_UC_CASELOAD_FULL:COA_CODE:V_C_MASTERGEOG11_LA_TO_REGION:E06000001" */
  uris?: string[];
  [key: string]: unknown;
}

export interface StatXploreField {
  uri?: string;
  label: string;
  items: StatXploreItem[];
  [key: string]: unknown;
}

export interface StatXploreMeasure {
  uri: string;
  label: string;
  [key: string]: unknown;
}

/**
 * table エンドポイントのレスポンス
 */
export interface StatXploreTableResponse {
  query?: unknown;
  database?: unknown;
  measures: StatXploreMeasure[];
  fields: StatXploreField[];
  cubes: Record<string, { values: NestedValues; [key: string]: unknown }>;
  [key: string]: unknown;
}

/**
 * schema エンドポイントのノード
 */
export interface StatXploreSchemaNode {
  id: string;
  label: string;
  type: string;
  location?: string;
  children?: StatXploreSchemaNode[];
  [key: string]: unknown;
}

/**
 * rate_limit エンドポイントのレスポンス
 */
export interface StatXploreRateLimit {
  /** 期間内の上限リクエスト数 */
  limit: number;
  /** 残りリクエスト数 */
  remaining: number;
  /** リセット時刻（エポックミリ秒） */
  reset: number;
  [key: string]: unknown;
}

// ============================================
// キューブ
// ============================================

/** セル値（秘匿セルは null） */
export type CellValue = number | null;

/**
 * 軸上の1カテゴリ
 */
export interface Item {
  /** 表示ラベル（labels の先頭） */
  label: string;
  labels: string[];
  uris: string[];
  /** URI から抽出した ONS 地理コード（無い場合は空） */
  codes: string[];
  type?: string;
}

/**
 * キューブの1軸
 */
export interface FieldDefinition {
  uri?: string;
  label: string;
  items: Item[];
}

export interface MeasureDefinition {
  uri: string;
  label: string;
}

/**
 * n 次元キューブ
 *
 * values は行優先（最後の次元が最も速く変化する）のフラット配列。
 * shape[i] === fields[i].items.length、values.length === shape の積。
 */
export interface Cube {
  fields: FieldDefinition[];
  measure: MeasureDefinition;
  shape: number[];
  values: CellValue[];
}

// ============================================
// テーブル
// ============================================

/**
 * テーブルの軸に割り当てたフィールド
 */
export interface TableAxisField {
  /** キューブ上の次元番号 */
  fieldIndex: number;
  label: string;
}

export interface TableColumn {
  label: string;
  /** 列フィールドの項目番号（1次元キューブの場合は null） */
  itemIndex: number | null;
}

export interface TableRow {
  /** 行レベルごとのラベル */
  labels: string[];
  /** 行レベルごとの項目番号 */
  itemIndices: number[];
  cells: CellValue[];
}

/**
 * 地理コード列
 */
export interface CodeColumn {
  /** 例: "National - Regional - LA - OAs code" */
  label: string;
  fieldIndex: number;
  /** rows と同じ順序。コードが無い行は null */
  values: Array<string | null>;
}

/**
 * ピボット済みテーブル
 */
export interface Table {
  measure: MeasureDefinition;
  /** 行インデックスのレベル（次元0、次元2..n-1 の順） */
  rowFields: TableAxisField[];
  columnField: TableAxisField | null;
  columns: TableColumn[];
  rows: TableRow[];
  codeColumns: CodeColumn[];
  /** 行キー → 行番号 */
  rowIndex: ReadonlyMap<string, number>;
  /** 列ラベル → 列番号 */
  columnIndex: ReadonlyMap<string, number>;
}

// ============================================
// 取得結果
// ============================================

/**
 * HTTP 交換の診断情報
 */
export interface RequestDiagnostics {
  url: string;
  method: 'GET' | 'POST';
  status: number;
  statusText: string;
  headers: Record<string, string>;
  /** 全試行を通した経過時間（ミリ秒） */
  elapsedMs: number;
  /** 試行回数（初回を含む） */
  attempts: number;
}

export interface FetchResult<T extends Table | Cube> {
  data: T;
  /** サービスが返したレスポンス本体 */
  response: StatXploreTableResponse;
  diagnostics: RequestDiagnostics;
}
