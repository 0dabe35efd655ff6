import type { Logger } from 'pino';
import { TableTransfer, createLogger } from '@tableshift/core';
import type { SourceReader } from '@tableshift/core';
import { BigQuerySourceReader, createBigQueryClient } from '@tableshift/bigquery';
import { DatabricksHttpClient, DbfsFileService, StatementExecutionConnection } from '@tableshift/databricks';
import type { AppConfig } from './config.js';

/** Everything a command needs, built once per process. */
export interface CliServices {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly source: SourceReader;
  readonly engine: TableTransfer;
}

export function createServices(config: AppConfig): CliServices {
  const logger = createLogger({ level: config.logLevel, pretty: config.prettyLogs, name: 'tableshift' });

  const http = new DatabricksHttpClient({
    host: config.databricks.host,
    token: config.databricks.token,
    logger,
  });
  const files = new DbfsFileService(http);
  const sql = new StatementExecutionConnection(http, {
    warehouseId: config.databricks.warehouseId,
    catalog: config.databricks.catalog,
    schema: config.databricks.schema,
    logger,
  });
  const source = new BigQuerySourceReader(createBigQueryClient(config.bigquery), {
    projectId: config.bigquery.projectId,
    dataset: config.bigquery.dataset,
    logger,
  });

  const engine = new TableTransfer({
    files,
    sql,
    source,
    logger,
    chunkSize: config.transfer.chunkSize,
    batchSize: config.transfer.batchSize,
  });

  return { config, logger, source, engine };
}
