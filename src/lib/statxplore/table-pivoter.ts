/**
 * テーブルピボット
 *
 * @description Cube を既定レイアウトの2次元テーブルに変換
 *
 * 既定レイアウト:
 * - 次元0 → 行
 * - 次元1 → 列（2次元以上の場合）
 * - 次元2..n-1 → 追加の行レベル（次元0が最も外側）
 *
 * 1次元の場合はメジャー名の1列のみ。0次元の場合は行キーが空の1×1テーブル。
 * クエリのフィールド順が分析意図と合っているかは判定しない。
 */

import type { CellValue, Cube, Table, TableAxisField, TableColumn, TableRow } from './types';

/** 行キーのレベル区切り（ラベルに現れない文字） */
const ROW_KEY_SEPARATOR = '\u001f';

/**
 * 行ラベルから rowIndex のキーを作る
 */
export function rowKey(labels: string | string[]): string {
  return typeof labels === 'string' ? labels : labels.join(ROW_KEY_SEPARATOR);
}

/**
 * 行優先のストライド
 */
function computeStrides(shape: number[]): number[] {
  const strides = new Array<number>(shape.length).fill(1);
  for (let dim = shape.length - 2; dim >= 0; dim--) {
    strides[dim] = strides[dim + 1] * shape[dim + 1];
  }
  return strides;
}

/**
 * 各次元の項目番号の全組み合わせ（先頭の次元が最も外側）
 */
function* combinations(sizes: number[]): Generator<number[]> {
  if (sizes.some((size) => size === 0)) {
    return;
  }
  const current = new Array<number>(sizes.length).fill(0);
  while (true) {
    yield [...current];
    let dim = sizes.length - 1;
    while (dim >= 0) {
      current[dim]++;
      if (current[dim] < sizes[dim]) {
        break;
      }
      current[dim] = 0;
      dim--;
    }
    if (dim < 0) {
      return;
    }
  }
}

function pivotToTable(cube: Cube): Table {
  const { fields, shape } = cube;
  const strides = computeStrides(shape);

  const rowDims = fields.length === 0 ? [] : [0, ...fields.slice(2).map((_, i) => i + 2)];
  const columnDim = fields.length >= 2 ? 1 : null;

  const rowFields: TableAxisField[] = rowDims.map((dim) => ({
    fieldIndex: dim,
    label: fields[dim].label,
  }));
  const columnField: TableAxisField | null =
    columnDim === null ? null : { fieldIndex: columnDim, label: fields[columnDim].label };

  const columns: TableColumn[] =
    columnDim === null
      ? [{ label: cube.measure.label, itemIndex: null }]
      : fields[columnDim].items.map((item, itemIndex) => ({ label: item.label, itemIndex }));

  const rows: TableRow[] = [];
  for (const itemIndices of combinations(rowDims.map((dim) => shape[dim]))) {
    let baseOffset = 0;
    itemIndices.forEach((itemIndex, level) => {
      baseOffset += itemIndex * strides[rowDims[level]];
    });

    const cells: CellValue[] =
      columnDim === null
        ? [cube.values[baseOffset]]
        : columns.map((_, itemIndex) => cube.values[baseOffset + itemIndex * strides[columnDim]]);

    rows.push({
      labels: itemIndices.map((itemIndex, level) => fields[rowDims[level]].items[itemIndex].label),
      itemIndices,
      cells,
    });
  }

  const rowIndex = new Map<string, number>();
  rows.forEach((row, index) => {
    const key = rowKey(row.labels);
    if (!rowIndex.has(key)) {
      rowIndex.set(key, index);
    }
  });

  const columnIndex = new Map<string, number>();
  columns.forEach((column, index) => {
    if (!columnIndex.has(column.label)) {
      columnIndex.set(column.label, index);
    }
  });

  return {
    measure: cube.measure,
    rowFields,
    columnField,
    columns,
    rows,
    codeColumns: [],
    rowIndex,
    columnIndex,
  };
}

/**
 * Cube をテーブルに変換する。reshape が false の場合は Cube をそのまま返す
 */
export function pivot(cube: Cube, reshape: false): Cube;
export function pivot(cube: Cube, reshape?: true): Table;
export function pivot(cube: Cube, reshape?: boolean): Table | Cube;
export function pivot(cube: Cube, reshape = true): Table | Cube {
  return reshape ? pivotToTable(cube) : cube;
}

/**
 * 行ラベルと列ラベルでセル値を引く
 *
 * 同じラベルが重複する場合は最初の行・列。見つからなければ undefined。
 */
export function getCell(
  table: Table,
  rowLabels: string | string[],
  columnLabel: string
): CellValue | undefined {
  const row = table.rowIndex.get(rowKey(rowLabels));
  const column = table.columnIndex.get(columnLabel);
  if (row === undefined || column === undefined) {
    return undefined;
  }
  return table.rows[row].cells[column];
}

/**
 * テーブルのセル数（行数 × 列数）
 */
export function cellCount(table: Table): number {
  return table.rows.reduce((count, row) => count + row.cells.length, 0);
}
