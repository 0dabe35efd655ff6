import { ConfigurationError } from '../errors/TransferErrors.js';

/** How a table target treats existing data. */
export const WriteMode = {
  OVERWRITE: 'overwrite',
  APPEND: 'append',
} as const;

export type WriteMode = (typeof WriteMode)[keyof typeof WriteMode];

/** Serialisation format for file targets. */
export const FileFormat = {
  PARQUET: 'parquet',
  CSV: 'csv',
} as const;

export type FileFormat = (typeof FileFormat)[keyof typeof FileFormat];

/** Table name, optionally qualified by catalog and schema. */
export interface TableName {
  readonly catalog?: string;
  readonly schema?: string;
  readonly table: string;
}

/** Serialise the dataset and upload it through the chunked upload protocol. */
export interface FileTarget {
  readonly kind: 'file';
  /** Absolute destination path on the remote file service. */
  readonly path: string;
  readonly format: FileFormat;
  /** Default: `true`. */
  readonly overwrite?: boolean;
}

/** Write the dataset with batched `INSERT` statements. */
export interface TableTarget {
  readonly kind: 'table';
  readonly table: TableName;
  readonly mode: WriteMode;
  /** Rows per `INSERT` statement. Default: the writer's configured batch size. */
  readonly batchSize?: number;
}

/** Upload a Parquet staging file, then create or fill the table from it with SQL. */
export interface StagedTableTarget {
  readonly kind: 'staged-table';
  readonly table: TableName;
  readonly mode: WriteMode;
  /** Absolute path of the staging file on the remote file service. */
  readonly stagingPath: string;
}

export type TransferTarget = FileTarget | TableTarget | StagedTableTarget;

export type TargetKind = TransferTarget['kind'];

export function isWriteMode(value: unknown): value is WriteMode {
  return value === WriteMode.OVERWRITE || value === WriteMode.APPEND;
}

export function isFileFormat(value: unknown): value is FileFormat {
  return value === FileFormat.PARQUET || value === FileFormat.CSV;
}

/** Parse user input into a write mode. Throws `ConfigurationError` for anything else. */
export function parseWriteMode(value: string): WriteMode {
  if (!isWriteMode(value)) {
    throw new ConfigurationError(`Invalid mode: ${value}. Use 'overwrite' or 'append'.`);
  }
  return value;
}

/** Parse user input into a file format. Throws `ConfigurationError` for anything else. */
export function parseFileFormat(value: string): FileFormat {
  if (!isFileFormat(value)) {
    throw new ConfigurationError(`Unsupported format: ${value}. Use 'parquet' or 'csv'.`);
  }
  return value;
}

/** Dotted display form, e.g. `hive_metastore.default.orders`. */
export function formatTableName(name: TableName): string {
  return [name.catalog, name.schema, name.table].filter((part) => part !== undefined && part !== '').join('.');
}
