import type { Logger } from 'pino';
import type { Column } from '../../domain/model/Column.js';
import type { Dataset, DatasetRow } from '../../domain/model/Dataset.js';
import type { TableName, TableTarget } from '../../domain/model/TransferTarget.js';
import type { SqlConnection } from '../../domain/ports/SqlConnection.js';
import { formatTableName, isWriteMode } from '../../domain/model/TransferTarget.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { createTableStatement, dropTableStatement, insertStatement } from '../../domain/services/SqlStatements.js';
import { ConfigurationError } from '../../domain/errors/TransferErrors.js';
import { silentLogger } from '../../infrastructure/logging/createLogger.js';
import type { EventBus } from '../EventBus.js';

/** Rows per `INSERT` statement unless a target says otherwise. */
export const DEFAULT_BATCH_SIZE = 1000;

/** Row counts above this make SQL inserts slow enough to warrant a warning. */
export const LARGE_INSERT_THRESHOLD = 50_000;

export interface BatchSqlWriterOptions {
  /** Default: `DEFAULT_BATCH_SIZE` (1000). */
  readonly batchSize?: number;
  readonly logger?: Logger;
  readonly eventBus?: EventBus;
}

/**
 * Writes datasets into a destination table with multi-row `INSERT` statements.
 *
 * Batches run one after another. Every statement auto-commits, so a failure
 * leaves the earlier batches in place; the failing batch's error is thrown and
 * no later batch is attempted.
 */
export class BatchSqlWriter {
  private readonly splitter: BatchSplitter;
  private readonly logger: Logger;
  private readonly eventBus: EventBus | null;

  constructor(
    private readonly connection: SqlConnection,
    options: BatchSqlWriterOptions = {},
  ) {
    this.splitter = new BatchSplitter(options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.logger = options.logger ?? silentLogger();
    this.eventBus = options.eventBus ?? null;
  }

  async createTable(table: TableName, columns: readonly Column[]): Promise<void> {
    if (columns.length === 0) {
      throw new ConfigurationError(`Cannot create ${formatTableName(table)} without columns`);
    }
    await this.connection.execute(createTableStatement(this.connection.dialect, table, columns));
    this.logger.info({ table: formatTableName(table) }, 'Table ready');
  }

  /**
   * Make the table ready for inserts.
   *
   * `overwrite` drops and recreates it. `append` creates it only when it does
   * not exist and never alters an existing table.
   */
  async prepareTable(target: Pick<TableTarget, 'table' | 'mode'>, columns: readonly Column[]): Promise<void> {
    const name = formatTableName(target.table);
    switch (target.mode) {
      case 'overwrite':
        await this.connection.execute(dropTableStatement(this.connection.dialect, target.table));
        this.logger.info({ table: name }, 'Dropped existing table');
        await this.createTable(target.table, columns);
        return;
      case 'append':
        if (await this.connection.tableExists(target.table)) {
          this.logger.info({ table: name }, 'Appending to existing table');
          return;
        }
        await this.createTable(target.table, columns);
        return;
      default:
        throw new ConfigurationError(`Invalid mode: ${String(target.mode)}. Use 'overwrite' or 'append'.`);
    }
  }

  /** Insert rows in batches. Returns the number of rows written; `0` (and no statement) when `rows` is empty. */
  async writeRows(
    table: TableName,
    columns: readonly Column[],
    rows: readonly DatasetRow[],
    batchSize?: number,
  ): Promise<number> {
    return this.insertBatches(table, columns, rows, this.splitterFor(batchSize));
  }

  /** Prepare the target table, then insert every row of the dataset. */
  async write(dataset: Dataset, target: TableTarget): Promise<number> {
    if (!isWriteMode(target.mode)) {
      throw new ConfigurationError(`Invalid mode: ${String(target.mode)}. Use 'overwrite' or 'append'.`);
    }
    // Built before prepareTable: a bad batch size must fail before the drop.
    const splitter = this.splitterFor(target.batchSize);
    if (dataset.rows.length > LARGE_INSERT_THRESHOLD) {
      this.logger.warn(
        { table: formatTableName(target.table), rows: dataset.rows.length },
        'SQL inserts are slow for large datasets; consider a staged table load',
      );
    }
    await this.prepareTable(target, dataset.columns);
    return this.insertBatches(target.table, dataset.columns, dataset.rows, splitter);
  }

  private splitterFor(batchSize: number | undefined): BatchSplitter {
    return batchSize === undefined ? this.splitter : new BatchSplitter(batchSize);
  }

  private async insertBatches(
    table: TableName,
    columns: readonly Column[],
    rows: readonly DatasetRow[],
    splitter: BatchSplitter,
  ): Promise<number> {
    const name = formatTableName(table);
    const totalBatches = splitter.count(rows.length);
    let written = 0;

    for (const batch of splitter.split(rows)) {
      await this.connection.execute(insertStatement(this.connection.dialect, table, columns, batch.items));
      written += batch.items.length;

      this.logger.info(
        { table: name, batch: batch.batchIndex + 1, totalBatches, rowsWritten: written, totalRows: rows.length },
        'Inserted batch',
      );
      this.eventBus?.emit({
        type: 'sql:batch',
        table: name,
        batchIndex: batch.batchIndex,
        rowCount: batch.items.length,
        rowsWritten: written,
        timestamp: Date.now(),
      });
    }

    return written;
  }
}
