import type { Dataset } from '../model/Dataset.js';

export interface ReadTableOptions {
  /** Maximum number of rows to read. */
  readonly limit?: number;
}

/** Port for the source warehouse. Results are fully materialised; no paging contract. */
export interface SourceReader {
  runQuery(sql: string): Promise<Dataset>;
  readTable(tableId: string, options?: ReadTableOptions): Promise<Dataset>;
  /** Table identifiers of a dataset, or of the reader's default dataset. */
  listTables(datasetName?: string): Promise<string[]>;
}
