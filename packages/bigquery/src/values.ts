import {
  BigQueryDate,
  BigQueryDatetime,
  BigQueryInt,
  BigQueryTime,
  BigQueryTimestamp,
  Geography,
} from '@google-cloud/bigquery';
import { ColumnType, isStructured } from '@tableshift/core';
import type { Column, SourceRecord } from '@tableshift/core';

/** A field of a BigQuery table schema. */
export interface BigQueryField {
  readonly name: string;
  readonly type: string;
  readonly mode?: string;
}

/** Map a BigQuery field to the column type the transfer engine writes. Repeated fields are structured. */
export function toColumnType(field: Pick<BigQueryField, 'type' | 'mode'>): ColumnType {
  if (field.mode?.toUpperCase() === 'REPEATED') return ColumnType.STRUCTURED;
  switch (field.type.toUpperCase()) {
    case 'INTEGER':
    case 'INT64':
      return ColumnType.INTEGER;
    case 'FLOAT':
    case 'FLOAT64':
    case 'NUMERIC':
    case 'BIGNUMERIC':
    case 'DECIMAL':
    case 'BIGDECIMAL':
      return ColumnType.FLOAT;
    case 'BOOLEAN':
    case 'BOOL':
      return ColumnType.BOOLEAN;
    case 'TIMESTAMP':
    case 'DATETIME':
      return ColumnType.TIMESTAMP;
    case 'RECORD':
    case 'STRUCT':
      return ColumnType.STRUCTURED;
    default:
      return ColumnType.TEXT;
  }
}

interface Decimal {
  toFixed(): string;
}

// NUMERIC and BIGNUMERIC arrive as big.js instances.
function isDecimal(value: unknown): value is Decimal {
  return (
    typeof value === 'object' &&
    value !== null &&
    !isStructured(value) &&
    'toFixed' in value &&
    typeof value.toFixed === 'function'
  );
}

function isWrapper(
  value: unknown,
): value is BigQueryTimestamp | BigQueryDate | BigQueryDatetime | BigQueryTime | BigQueryInt | Geography {
  return (
    value instanceof BigQueryTimestamp ||
    value instanceof BigQueryDate ||
    value instanceof BigQueryDatetime ||
    value instanceof BigQueryTime ||
    value instanceof BigQueryInt ||
    value instanceof Geography
  );
}

/**
 * Replace the client's wrapper objects with plain values, recursing into
 * records and arrays. Buffers are left for the cell tagger.
 */
export function normalizeValue(value: unknown): unknown {
  if (isWrapper(value)) return value.value;
  if (isDecimal(value)) return String(value);
  if (Array.isArray(value)) return value.map(normalizeValue);
  if (isStructured(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, normalizeValue(inner)]));
  }
  return value;
}

export function normalizeRecord(record: SourceRecord): SourceRecord {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, normalizeValue(value)]));
}

function inferType(value: unknown): ColumnType | null {
  if (value === null || value === undefined) return null;
  if (value instanceof BigQueryTimestamp || value instanceof BigQueryDatetime || value instanceof Date) {
    return ColumnType.TIMESTAMP;
  }
  if (value instanceof BigQueryInt) return ColumnType.INTEGER;
  if (isWrapper(value)) return ColumnType.TEXT;
  if (isDecimal(value)) return ColumnType.FLOAT;
  if (typeof value === 'bigint') return ColumnType.INTEGER;
  if (typeof value === 'number') return Number.isInteger(value) ? ColumnType.INTEGER : ColumnType.FLOAT;
  if (typeof value === 'boolean') return ColumnType.BOOLEAN;
  if (isStructured(value)) return ColumnType.STRUCTURED;
  return ColumnType.TEXT;
}

/**
 * Infer columns from query rows when no table schema is at hand.
 *
 * Columns keep first-seen key order; each takes the type of its first non-null
 * value, a column that is null throughout is typed `null`. An integer column
 * that later holds a fraction widens to float.
 */
export function inferColumns(records: readonly SourceRecord[]): Column[] {
  const types = new Map<string, ColumnType | null>();
  for (const record of records) {
    for (const [name, value] of Object.entries(record)) {
      const seen = types.get(name) ?? null;
      const current = inferType(value);
      if (seen === null) {
        types.set(name, current);
      } else if (seen === ColumnType.INTEGER && current === ColumnType.FLOAT) {
        types.set(name, ColumnType.FLOAT);
      }
    }
  }
  return [...types].map(([name, type]) => ({ name, type: type ?? ColumnType.NULL }));
}
