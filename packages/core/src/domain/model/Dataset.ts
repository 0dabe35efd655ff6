import type { Column } from './Column.js';
import type { Cell } from './Cell.js';
import { toCell } from './Cell.js';
import { DataError } from '../errors/TransferErrors.js';

/** One dataset row: cells in column order. */
export type DatasetRow = readonly Cell[];

/**
 * In-memory table handed over by a source reader.
 *
 * Every row has exactly one cell per column. The transfer engine only reads it.
 */
export interface Dataset {
  readonly columns: readonly Column[];
  readonly rows: readonly DatasetRow[];
}

/** A source record keyed by column name. */
export interface SourceRecord {
  readonly [column: string]: unknown;
}

/** Build a dataset from keyed records, tagging every value with its column's type. */
export function createDataset(columns: readonly Column[], records: readonly SourceRecord[]): Dataset {
  const rows = records.map((record) => columns.map((column) => toCell(record[column.name], column.type)));
  return { columns: [...columns], rows };
}

/** Build a dataset from positional rows. Throws `DataError` when a row's width differs from the column count. */
export function createDatasetFromRows(columns: readonly Column[], values: readonly (readonly unknown[])[]): Dataset {
  const rows = values.map((row, index) => {
    if (row.length !== columns.length) {
      throw new DataError(
        `Row ${String(index)} has ${String(row.length)} values, expected ${String(columns.length)}`,
      );
    }
    return columns.map((column, position) => toCell(row[position], column.type));
  });
  return { columns: [...columns], rows };
}

/** Return a copy of the dataset with its columns renamed positionally. Rows are shared, not copied. */
export function renameColumns(dataset: Dataset, names: readonly string[]): Dataset {
  if (names.length !== dataset.columns.length) {
    throw new DataError(`Expected ${String(dataset.columns.length)} column names, got ${String(names.length)}`);
  }
  return {
    columns: dataset.columns.map((column, index) => ({ ...column, name: names[index] ?? column.name })),
    rows: dataset.rows,
  };
}

export function rowCount(dataset: Dataset): number {
  return dataset.rows.length;
}
