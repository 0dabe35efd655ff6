import { Writable } from 'node:stream';
import parquet from 'parquetjs-lite';
import type { Cell } from '../../domain/model/Cell.js';
import type { Column } from '../../domain/model/Column.js';
import type { Dataset } from '../../domain/model/Dataset.js';
import type { DatasetEncoder } from '../../domain/ports/DatasetEncoder.js';
import { toJsonText } from '../../domain/services/JsonText.js';
import { DataError } from '../../domain/errors/TransferErrors.js';

type FieldType = 'INT64' | 'DOUBLE' | 'BOOLEAN' | 'TIMESTAMP_MILLIS' | 'UTF8';

/** Collects everything the writer emits. parquetjs closes its output with `close(cb)`, file-stream style. */
class BufferSink extends Writable {
  private readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  close(callback: (error?: Error | null) => void): void {
    this.end(() => callback(null));
  }

  contents(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Encodes a dataset as a single Parquet file, every field optional.
 *
 * Column types map to INT64, DOUBLE, BOOLEAN, TIMESTAMP_MILLIS or UTF8. A column
 * whose cells do not fit its declared type (text in an integer column, integers
 * beyond 2^53) is written as UTF8. Structured cells are written as JSON text.
 */
export class ParquetEncoder implements DatasetEncoder {
  readonly format = 'parquet' as const;

  async encode(dataset: Dataset): Promise<Uint8Array> {
    if (dataset.rows.length === 0) {
      throw new DataError('Cannot encode an empty dataset as parquet');
    }

    const types = dataset.columns.map((column, index) => fieldType(column, dataset.rows.map((row) => row[index])));
    const schema = new parquet.ParquetSchema(
      Object.fromEntries(dataset.columns.map((column, index) => [column.name, { type: types[index] ?? 'UTF8', optional: true }])),
    );

    const sink = new BufferSink();
    const writer = await parquet.ParquetWriter.openStream(schema, sink);
    for (const row of dataset.rows) {
      const record: Record<string, unknown> = {};
      dataset.columns.forEach((column, index) => {
        const cell = row[index];
        if (cell && cell.kind !== 'null') {
          record[column.name] = fieldValue(cell, types[index] ?? 'UTF8', column.name);
        }
      });
      await writer.appendRow(record);
    }
    await writer.close();

    return new Uint8Array(sink.contents());
  }
}

function fieldType(column: Column, cells: readonly (Cell | undefined)[]): FieldType {
  const present = cells.filter((cell): cell is Cell => cell !== undefined && cell.kind !== 'null');
  const all = (predicate: (cell: Cell) => boolean): boolean => present.every(predicate);

  switch (column.type) {
    case 'integer':
      return all((cell) => cell.kind === 'number' && isSafeInteger(cell.value)) ? 'INT64' : 'UTF8';
    case 'float':
      return all((cell) => cell.kind === 'number') ? 'DOUBLE' : 'UTF8';
    case 'boolean':
      return all((cell) => cell.kind === 'bool') ? 'BOOLEAN' : 'UTF8';
    case 'timestamp':
      return all((cell) => cell.kind === 'text' && !Number.isNaN(Date.parse(cell.value))) ? 'TIMESTAMP_MILLIS' : 'UTF8';
    default:
      return 'UTF8';
  }
}

function isSafeInteger(value: number | bigint): boolean {
  return typeof value === 'bigint' ? Number.isSafeInteger(Number(value)) : Number.isSafeInteger(value);
}

function fieldValue(cell: Cell, type: FieldType, columnName: string): unknown {
  switch (type) {
    case 'INT64':
    case 'DOUBLE':
      if (cell.kind !== 'number') break;
      return Number(cell.value);
    case 'BOOLEAN':
      if (cell.kind !== 'bool') break;
      return cell.value;
    case 'TIMESTAMP_MILLIS':
      if (cell.kind !== 'text') break;
      return new Date(cell.value);
    case 'UTF8':
      return textOf(cell);
  }
  throw new DataError(`Cell of kind '${cell.kind}' does not fit ${type} column '${columnName}'`);
}

function textOf(cell: Cell): string {
  switch (cell.kind) {
    case 'null':
      return '';
    case 'structured':
      return toJsonText(cell.value);
    case 'bool':
      return String(cell.value);
    case 'number':
      return cell.value.toString();
    case 'text':
      return cell.value;
  }
}
