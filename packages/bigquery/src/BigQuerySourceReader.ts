import { BigQuery } from '@google-cloud/bigquery';
import { z } from 'zod';
import type { Logger } from 'pino';
import { ConfigurationError, createDataset, silentLogger } from '@tableshift/core';
import type { Dataset, ReadTableOptions, SourceReader, SourceRecord } from '@tableshift/core';
import type { BigQueryField } from './values.js';
import { inferColumns, normalizeRecord, toColumnType } from './values.js';

export interface BigQueryQueryOptions {
  readonly query: string;
  /** Return INT64 values as `BigQueryInt` instead of rounding them to `number`. */
  readonly wrapIntegers?: boolean;
}

/** The part of the BigQuery client the reader calls. `BigQuery` satisfies it. */
export interface BigQueryClient {
  query(options: BigQueryQueryOptions): Promise<readonly [unknown[], ...unknown[]]>;
  dataset(datasetId: string, options?: { projectId?: string }): BigQueryDatasetHandle;
}

export interface BigQueryDatasetHandle {
  table(tableId: string): { getMetadata(): Promise<readonly [unknown, ...unknown[]]> };
  getTables(): Promise<readonly [readonly { id?: string }[], ...unknown[]]>;
}

export interface BigQuerySourceReaderOptions {
  readonly projectId: string;
  /** Dataset used for bare table names and for `listTables()` without an argument. */
  readonly dataset?: string;
  readonly logger?: Logger;
}

export interface BigQueryClientOptions {
  readonly projectId: string;
  /** Path to a service account key file. */
  readonly credentialsPath: string;
}

/** Build a BigQuery client authenticated with a service account key file. */
export function createBigQueryClient(options: BigQueryClientOptions): BigQuery {
  return new BigQuery({
    projectId: options.projectId,
    keyFilename: options.credentialsPath,
    scopes: ['https://www.googleapis.com/auth/bigquery'],
  });
}

const tableMetadataSchema = z.object({
  schema: z
    .object({
      fields: z.array(z.object({ name: z.string(), type: z.string(), mode: z.string().optional() })).default([]),
    })
    .optional(),
});

const recordSchema = z.record(z.unknown());

interface TableRef {
  readonly projectId: string;
  readonly datasetId: string;
  readonly tableId: string;
}

/**
 * Source reader over BigQuery.
 *
 * Results are materialised in memory. Table reads take their column types from
 * the table schema; ad-hoc queries infer them from the returned values.
 */
export class BigQuerySourceReader implements SourceReader {
  private readonly logger: Logger;

  constructor(
    private readonly client: BigQueryClient,
    private readonly options: BigQuerySourceReaderOptions,
  ) {
    if (options.projectId.trim() === '') {
      throw new ConfigurationError('BigQuery project id is required');
    }
    this.logger = options.logger ?? silentLogger();
  }

  async runQuery(sql: string): Promise<Dataset> {
    const records = await this.query(sql);
    return createDataset(inferColumns(records), records.map(normalizeRecord));
  }

  async readTable(tableId: string, options: ReadTableOptions = {}): Promise<Dataset> {
    const ref = this.resolve(tableId);
    const fields = await this.fieldsOf(ref);
    let sql = `SELECT * FROM \`${ref.projectId}.${ref.datasetId}.${ref.tableId}\``;
    if (options.limit !== undefined) {
      if (!Number.isInteger(options.limit) || options.limit <= 0) {
        throw new ConfigurationError(`Row limit must be a positive integer, got ${String(options.limit)}`);
      }
      sql += ` LIMIT ${String(options.limit)}`;
    }
    const records = await this.query(sql);
    const columns =
      fields.length > 0
        ? fields.map((field) => ({ name: field.name, type: toColumnType(field) }))
        : inferColumns(records);
    return createDataset(columns, records.map(normalizeRecord));
  }

  async listTables(datasetName?: string): Promise<string[]> {
    const datasetId = datasetName ?? this.options.dataset;
    if (!datasetId) {
      throw new ConfigurationError('No dataset specified. Set BIGQUERY_DATASET or pass a dataset name');
    }
    const [tables] = await this.client.dataset(datasetId).getTables();
    const names = tables.flatMap((table) => (table.id ? [table.id] : []));
    this.logger.info({ dataset: `${this.options.projectId}.${datasetId}`, count: names.length }, 'Found tables');
    return names;
  }

  /** Schema fields of a table, in table order. */
  async tableSchema(tableId: string): Promise<BigQueryField[]> {
    const ref = this.resolve(tableId);
    const fields = await this.fieldsOf(ref);
    this.logger.info(
      { table: `${ref.projectId}.${ref.datasetId}.${ref.tableId}`, columns: fields.length },
      'Read table schema',
    );
    return fields;
  }

  private async query(sql: string): Promise<SourceRecord[]> {
    this.logger.info({ query: sql }, 'Executing query');
    let rows: unknown[];
    try {
      [rows] = await this.client.query({ query: sql, wrapIntegers: true });
    } catch (error) {
      this.logger.error({ err: error }, 'BigQuery query failed');
      throw error;
    }
    const records = rows.map((row) => recordSchema.parse(row));
    this.logger.info({ rows: records.length }, 'Query completed');
    return records;
  }

  private async fieldsOf(ref: TableRef): Promise<BigQueryField[]> {
    const dataset =
      ref.projectId === this.options.projectId
        ? this.client.dataset(ref.datasetId)
        : this.client.dataset(ref.datasetId, { projectId: ref.projectId });
    const [metadata] = await dataset.table(ref.tableId).getMetadata();
    return tableMetadataSchema.parse(metadata).schema?.fields ?? [];
  }

  /** `table`, `dataset.table` or `project.dataset.table`. */
  private resolve(tableId: string): TableRef {
    const parts = tableId.replace(/`/g, '').split('.');
    const [first, second, third] = parts;
    if (parts.some((part) => part === '') || parts.length > 3 || first === undefined) {
      throw new ConfigurationError(`Invalid table id: '${tableId}'`);
    }
    if (third !== undefined && second !== undefined) {
      return { projectId: first, datasetId: second, tableId: third };
    }
    if (second !== undefined) {
      return { projectId: this.options.projectId, datasetId: first, tableId: second };
    }
    if (!this.options.dataset) {
      throw new ConfigurationError(`Table '${tableId}' has no dataset and no default dataset is configured`);
    }
    return { projectId: this.options.projectId, datasetId: this.options.dataset, tableId: first };
  }
}
