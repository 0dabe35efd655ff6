import type { ColumnType } from './Column.js';
import { DataError } from '../errors/TransferErrors.js';

/** JSON-able value held by a structured cell (arrays and plain objects). */
export type StructuredValue = readonly unknown[] | { readonly [key: string]: unknown };

/**
 * A single dataset value, tagged once at ingestion.
 *
 * Writers switch over `kind` instead of probing runtime types.
 */
export type Cell =
  | { readonly kind: 'null' }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'number'; readonly value: number | bigint }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'structured'; readonly value: StructuredValue };

export type CellKind = Cell['kind'];

export const NULL_CELL: Cell = { kind: 'null' };

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Arrays and plain objects; dates, buffers and class instances are not structured. */
export function isStructured(value: unknown): value is StructuredValue {
  if (Array.isArray(value)) return true;
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Tag a raw value.
 *
 * Order matters: nullish and structured values are recognised before scalars so
 * that arrays are never mistaken for missing data, and booleans and numbers
 * before the string fallback.
 */
export function toCell(value: unknown, type?: ColumnType): Cell {
  if (value === null || value === undefined) return NULL_CELL;
  if (isStructured(value)) return { kind: 'structured', value };
  if (typeof value === 'boolean') return { kind: 'bool', value };
  if (typeof value === 'bigint') return { kind: 'number', value };
  if (typeof value === 'number') {
    return Number.isNaN(value) ? NULL_CELL : { kind: 'number', value };
  }
  if (typeof value === 'string') return textCell(value, type);
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? NULL_CELL : { kind: 'text', value: value.toISOString() };
  }
  if (value instanceof Uint8Array) return { kind: 'text', value: Buffer.from(value).toString('base64') };
  if (typeof value === 'function' || typeof value === 'symbol') {
    throw new DataError(`Unsupported value of type ${typeof value}`);
  }
  return { kind: 'text', value: String(value) };
}

function textCell(value: string, type?: ColumnType): Cell {
  if (type === 'integer' && INTEGER_TEXT.test(value)) {
    const parsed = BigInt(value);
    const asNumber = Number(parsed);
    return { kind: 'number', value: Number.isSafeInteger(asNumber) ? asNumber : parsed };
  }
  if (type === 'float' && FLOAT_TEXT.test(value)) {
    return { kind: 'number', value: Number(value) };
  }
  return { kind: 'text', value };
}
