import { RowProjectionError } from '../errors.js';
import type { CellValue, ColumnType, ResultColumn, Row } from '../catalog/types.js';
import type { RawRow } from '../types.js';

function safeInteger(value: number): number | undefined {
  return Number.isSafeInteger(value) ? value : undefined;
}

// pg hands back int8/numeric/oid as strings unless a type parser says otherwise
function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number') return safeInteger(value);
  if (typeof value === 'bigint') return safeInteger(Number(value));
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return safeInteger(Number(value.trim()));
  return undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 't' || value === 'true') return true;
  if (value === 'f' || value === 'false') return false;
  return undefined;
}

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  return undefined;
}

const converters: Record<ColumnType, (value: unknown) => CellValue | undefined> = {
  string: toText,
  integer: toInteger,
  boolean: toBoolean,
};

/**
 * Builds a row holding exactly the declared columns, in declared order.
 * Columns the raw row lacks become null; extra raw columns are dropped.
 */
export function projectRow(collection: string, columns: readonly ResultColumn[], raw: RawRow): Row {
  const row: Record<string, CellValue> = {};
  for (const column of columns) {
    const value = raw[column.name];
    if (value === null || value === undefined) {
      row[column.name] = null;
      continue;
    }
    const converted = converters[column.type](value);
    if (converted === undefined) {
      throw new RowProjectionError(collection, column.name, value, column.type);
    }
    row[column.name] = converted;
  }
  return Object.freeze(row);
}
