import { TableTransfer, InMemoryFileService, InMemorySqlConnection, silentLogger } from '@tableshift/core';
import type { Dataset, ReadTableOptions, SourceReader } from '@tableshift/core';
import type { AppConfig } from '../../src/config.js';
import type { CliContext } from '../../src/program.js';

export const testConfig: AppConfig = {
  databricks: {
    host: 'test-workspace.cloud.databricks.com',
    token: 'test-token',
    httpPath: '/sql/1.0/warehouses/abc123',
    warehouseId: 'abc123',
    catalog: 'hive_metastore',
    schema: 'default',
  },
  bigquery: { projectId: 'proj', credentialsPath: '/tmp/test-key.json', dataset: 'shop' },
  transfer: {
    fileRoot: '/FileStore/bigquery_data',
    stagingRoot: '/FileStore/staging',
    batchSize: 1000,
    chunkSize: 1024 * 1024,
  },
  logLevel: 'silent',
  prettyLogs: false,
};

/** Source reader answering every query with one dataset and every table read from a map. */
export class StaticSourceReader implements SourceReader {
  readonly queries: string[] = [];
  readonly reads: [string, number | undefined][] = [];

  constructor(
    private readonly tables: ReadonlyMap<string, Dataset>,
    private readonly queryResult?: Dataset,
  ) {}

  runQuery(sql: string): Promise<Dataset> {
    this.queries.push(sql);
    return this.queryResult ? Promise.resolve(this.queryResult) : Promise.reject(new Error('no query result'));
  }

  readTable(tableId: string, options?: ReadTableOptions): Promise<Dataset> {
    this.reads.push([tableId, options?.limit]);
    const dataset = this.tables.get(tableId);
    return dataset ? Promise.resolve(dataset) : Promise.reject(new Error(`Not found: Table ${tableId}`));
  }

  listTables(datasetName?: string): Promise<string[]> {
    return Promise.resolve(datasetName === undefined || datasetName === 'shop' ? [...this.tables.keys()] : []);
  }
}

export interface TestCli {
  readonly ctx: CliContext;
  readonly output: string[];
  readonly files: InMemoryFileService;
  readonly sql: InMemorySqlConnection;
}

export function createTestCli(source: SourceReader): TestCli {
  const output: string[] = [];
  const files = new InMemoryFileService('dbfs:');
  const sql = new InMemorySqlConnection();
  const logger = silentLogger();
  const engine = new TableTransfer({ files, sql, source, logger });
  return {
    ctx: {
      services: () => ({ config: testConfig, logger, source, engine }),
      print: (line) => {
        output.push(line);
      },
    },
    output,
    files,
    sql,
  };
}
