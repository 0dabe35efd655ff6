import { ConfigurationError } from '@tableshift/core';
import type { FileFormat, TableName, TargetResolver, TransferTarget, WriteMode } from '@tableshift/core';
import type { AppConfig } from './config.js';

/** How `transfer` moves a dataset: a DBFS file, a staged table load, or SQL inserts. */
export type TransferMethod = 'file' | 'staged' | 'sql';

export const TRANSFER_METHODS: readonly TransferMethod[] = ['file', 'staged', 'sql'];

export const DEFAULT_TARGET_NAME = 'bigquery_data';

export interface TargetRequest {
  readonly table?: string;
  readonly target?: string;
  readonly method: TransferMethod;
  readonly mode: WriteMode;
  readonly format: FileFormat;
}

/** Last segment of a dotted BigQuery table id. */
export function bareTableName(tableId: string): string {
  return tableId.split('.').pop()?.replace(/`/g, '') ?? tableId;
}

/** `--target`, else the source table's own name, else `bigquery_data`. */
export function targetName(request: Pick<TargetRequest, 'table' | 'target'>): string {
  const name = request.target ?? (request.table === undefined ? DEFAULT_TARGET_NAME : bareTableName(request.table));
  if (name.trim() === '' || name.includes('/')) {
    throw new ConfigurationError(`Invalid target name: '${name}'`);
  }
  return name;
}

function destinationTable(config: AppConfig, table: string): TableName {
  return { catalog: config.databricks.catalog, schema: config.databricks.schema, table };
}

export function resolveTarget(request: TargetRequest, config: AppConfig): TransferTarget {
  const name = targetName(request);
  switch (request.method) {
    case 'file':
      return {
        kind: 'file',
        path: `${config.transfer.fileRoot}/${name}.${request.format}`,
        format: request.format,
        overwrite: true,
      };
    case 'staged':
      return {
        kind: 'staged-table',
        table: destinationTable(config, name),
        mode: request.mode,
        stagingPath: `${config.transfer.stagingRoot}/${name}.parquet`,
      };
    case 'sql':
      return {
        kind: 'table',
        table: destinationTable(config, name),
        mode: request.mode,
        batchSize: config.transfer.batchSize,
      };
  }
}

/** Targets for `run-all`: each source table lands in a destination table of the same bare name. */
export function tableTargets(config: AppConfig, mode: WriteMode): TargetResolver {
  return (tableId) => ({
    kind: 'table',
    table: destinationTable(config, bareTableName(tableId)),
    mode,
    batchSize: config.transfer.batchSize,
  });
}
