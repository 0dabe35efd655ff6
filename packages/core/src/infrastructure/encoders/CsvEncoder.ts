import Papa from 'papaparse';
import type { Cell } from '../../domain/model/Cell.js';
import type { Dataset } from '../../domain/model/Dataset.js';
import type { DatasetEncoder } from '../../domain/ports/DatasetEncoder.js';
import { toJsonText } from '../../domain/services/JsonText.js';

export interface CsvEncoderOptions {
  /** Default: `','`. */
  readonly delimiter?: string;
  /** Default: `'\n'`. */
  readonly newline?: string;
}

/** CSV encoder using PapaParse. Header row from the column names; nulls become empty fields. */
export class CsvEncoder implements DatasetEncoder {
  readonly format = 'csv' as const;
  private readonly delimiter: string;
  private readonly newline: string;

  constructor(options: CsvEncoderOptions = {}) {
    this.delimiter = options.delimiter ?? ',';
    this.newline = options.newline ?? '\n';
  }

  encode(dataset: Dataset): Promise<Uint8Array> {
    const text = Papa.unparse(
      {
        fields: dataset.columns.map((column) => column.name),
        data: dataset.rows.map((row) => row.map(fieldText)),
      },
      { delimiter: this.delimiter, newline: this.newline, header: true },
    );
    return Promise.resolve(new TextEncoder().encode(text));
  }
}

function fieldText(cell: Cell): string {
  switch (cell.kind) {
    case 'null':
      return '';
    case 'structured':
      return toJsonText(cell.value);
    case 'bool':
      return cell.value ? 'true' : 'false';
    case 'number':
      return cell.value.toString();
    case 'text':
      return cell.value;
  }
}
