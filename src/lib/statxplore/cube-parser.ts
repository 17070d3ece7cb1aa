/**
 * キューブパーサー
 *
 * @description table レスポンスのフィールド定義と値配列を Cube に変換
 */

import { z } from 'zod';
import { MalformedResponseError } from './errors';
import { extractGeoCodes } from './geo-codes';
import type {
  CellValue,
  Cube,
  FieldDefinition,
  NestedValues,
  StatXploreTableResponse,
} from './types';

const NestedValuesSchema: z.ZodType<NestedValues> = z.lazy(() =>
  z.array(z.union([z.number(), z.null(), NestedValuesSchema]))
);

const ItemSchema = z
  .object({
    type: z.string().optional(),
    labels: z.array(z.string()).min(1),
    uris: z.array(z.string()).optional(),
  })
  .passthrough();

const FieldSchema = z
  .object({
    uri: z.string().optional(),
    label: z.string(),
    items: z.array(ItemSchema),
  })
  .passthrough();

const MeasureSchema = z
  .object({
    uri: z.string(),
    label: z.string(),
  })
  .passthrough();

const TableResponseSchema = z
  .object({
    measures: z.array(MeasureSchema).min(1),
    fields: z.array(FieldSchema),
    cubes: z.record(z.string(), z.object({ values: NestedValuesSchema }).passthrough()),
  })
  .passthrough();

export interface ParsedTableResponse {
  cube: Cube;
  response: StatXploreTableResponse;
}

/**
 * ネストされた値配列を深さ優先でフラット化
 */
export function flattenValues(values: NestedValues): CellValue[] {
  const flat: CellValue[] = [];
  const visit = (node: NestedValues) => {
    for (const value of node) {
      if (Array.isArray(value)) {
        visit(value);
      } else {
        flat.push(value);
      }
    }
  };
  visit(values);
  return flat;
}

/**
 * レスポンス本文の構造を検証
 *
 * @throws {MalformedResponseError} 必須のメタデータが無い場合
 */
export function validateTableResponse(body: unknown): StatXploreTableResponse {
  const result = TableResponseSchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new MalformedResponseError(`Stat-Xplore table response is malformed: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * フィールド定義を構築（順序はレスポンスのまま）
 */
export function toFieldDefinitions(response: StatXploreTableResponse): FieldDefinition[] {
  return response.fields.map((field) => ({
    uri: field.uri,
    label: field.label,
    items: field.items.map((item) => {
      const uris = item.uris ?? [];
      return {
        label: item.labels[0],
        labels: item.labels,
        uris,
        codes: extractGeoCodes(uris),
        type: item.type,
      };
    }),
  }));
}

/**
 * ネストされた値配列が各次元のサイズと一致しない箇所を返す（一致すれば null）
 *
 * 完全にフラットな配列はここでは検査しない。
 */
function findNestingMismatch(values: NestedValues, fields: FieldDefinition[]): string | null {
  if (!values.some((value) => Array.isArray(value))) {
    return null;
  }

  const visit = (node: NestedValues | CellValue, depth: number, path: number[]): string | null => {
    const at = path.length > 0 ? `values[${path.join('][')}]` : 'values';
    if (depth === fields.length) {
      return Array.isArray(node) ? `${at} is nested deeper than ${fields.length} fields` : null;
    }
    if (!Array.isArray(node)) {
      return `${at} is a single value but field ${fields[depth].label} expects ${fields[depth].items.length} entries`;
    }
    if (node.length !== fields[depth].items.length) {
      return `${at} has ${node.length} entries but field ${fields[depth].label} has ${fields[depth].items.length} items`;
    }
    for (let i = 0; i < node.length; i++) {
      const mismatch = visit(node[i], depth + 1, [...path, i]);
      if (mismatch) {
        return mismatch;
      }
    }
    return null;
  };

  return visit(values, 0, []);
}

function buildCube(
  response: StatXploreTableResponse,
  fields: FieldDefinition[],
  measureIndex: number
): Cube {
  const measure = response.measures[measureIndex];
  const cubeData = response.cubes[measure.uri];
  if (!cubeData) {
    throw new MalformedResponseError(`No cube returned for measure ${measure.uri}`);
  }

  const mismatch = findNestingMismatch(cubeData.values, fields);
  if (mismatch) {
    throw new MalformedResponseError(`Cube for measure ${measure.uri} does not match its fields: ${mismatch}`);
  }

  const shape = fields.map((field) => field.items.length);
  const expected = shape.reduce((product, size) => product * size, 1);
  const values = flattenValues(cubeData.values);
  if (values.length !== expected) {
    throw new MalformedResponseError(
      `Cube for measure ${measure.uri} has ${values.length} values but fields [${shape.join(', ')}] require ${expected}`
    );
  }

  return {
    fields,
    measure: { uri: measure.uri, label: measure.label },
    shape,
    values,
  };
}

/**
 * レスポンス本文を Cube に変換
 *
 * @param measureUri 対象メジャー（省略時は先頭のメジャー）
 * @throws {MalformedResponseError} メタデータ欠落、メジャー不明、値の数やネストの不一致
 */
export function parseCube(body: unknown, measureUri?: string): ParsedTableResponse {
  const response = validateTableResponse(body);
  const fields = toFieldDefinitions(response);

  let measureIndex = 0;
  if (measureUri !== undefined) {
    measureIndex = response.measures.findIndex((measure) => measure.uri === measureUri);
    if (measureIndex < 0) {
      throw new MalformedResponseError(`Measure ${measureUri} is not present in the response`);
    }
  }

  return { cube: buildCube(response, fields, measureIndex), response };
}

/**
 * 全メジャーのキューブを返す（レスポンスのメジャー順）
 */
export function parseCubes(body: unknown): Cube[] {
  const response = validateTableResponse(body);
  const fields = toFieldDefinitions(response);
  return response.measures.map((_, index) => buildCube(response, fields, index));
}

/**
 * 座標のセル値
 */
export function valueAt(cube: Cube, coordinates: number[]): CellValue {
  if (coordinates.length !== cube.shape.length) {
    throw new RangeError(`Expected ${cube.shape.length} coordinates, got ${coordinates.length}`);
  }
  let offset = 0;
  coordinates.forEach((coordinate, dim) => {
    if (!Number.isInteger(coordinate) || coordinate < 0 || coordinate >= cube.shape[dim]) {
      throw new RangeError(`Coordinate ${coordinate} out of range for dimension ${dim}`);
    }
    offset = offset * cube.shape[dim] + coordinate;
  });
  return cube.values[offset];
}

/**
 * 行優先のフラット配列を n 次元配列に戻す
 */
export function toNestedArray(cube: Cube): NestedValues {
  if (cube.shape.length === 0) {
    return [...cube.values];
  }
  let offset = 0;
  const build = (dim: number): NestedValues => {
    const size = cube.shape[dim];
    const result: NestedValues = [];
    for (let i = 0; i < size; i++) {
      if (dim === cube.shape.length - 1) {
        result.push(cube.values[offset++]);
      } else {
        result.push(build(dim + 1));
      }
    }
    return result;
  };
  return build(0);
}
