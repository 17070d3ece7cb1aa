/**
 * ONS 地理コード
 *
 * @description 項目 URI からの ONS コード抽出と、行インデックスへのコード列付与
 */

import type { CodeColumn, FieldDefinition, Table } from './types';

/**
 * ONS コード判定（9文字、先頭が英字。例: E06000001, W92000004）
 */
export function isOnsCode(value: string): boolean {
  return value.length === 9 && /^[A-Za-z]/.test(value);
}

/**
 * 項目 URI の最後のセグメントが ONS コードなら返す
 *
 * @example
 * extractGeoCode('str:value:UC_Monthly:V_F_UC_CASELOAD_FULL:COA_CODE:V_C_MASTERGEOG11_LA_TO_REGION:E06000001')
 * // => 'E06000001'
 */
export function extractGeoCode(uri: string): string | null {
  const separator = uri.lastIndexOf(':');
  if (separator < 0) {
    return null;
  }
  const code = uri.slice(separator + 1);
  return isOnsCode(code) ? code : null;
}

/**
 * URI 群から ONS コードを抽出（重複除去、出現順）
 */
export function extractGeoCodes(uris: string[]): string[] {
  const codes: string[] = [];
  for (const uri of uris) {
    const code = extractGeoCode(uri);
    if (code !== null && !codes.includes(code)) {
      codes.push(code);
    }
  }
  return codes;
}

/**
 * 行インデックスのフィールドごとに地理コード列を付与
 *
 * コードを持つ項目が1つも無いフィールドは列を追加しない。
 * コードの無い行（合計行など）は null。
 */
export function annotate(table: Table, fields: FieldDefinition[], includeCodes = false): Table {
  if (!includeCodes) {
    return table;
  }

  const codeColumns: CodeColumn[] = [];
  table.rowFields.forEach((rowField, level) => {
    const field = fields[rowField.fieldIndex];
    if (!field || !field.items.some((item) => item.codes.length > 0)) {
      return;
    }

    codeColumns.push({
      label: `${field.label} code`,
      fieldIndex: rowField.fieldIndex,
      values: table.rows.map((row) => field.items[row.itemIndices[level]]?.codes[0] ?? null),
    });
  });

  return {
    ...table,
    codeColumns: [...table.codeColumns, ...codeColumns],
  };
}
