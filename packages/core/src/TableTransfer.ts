import type { Logger } from 'pino';
import type { Dataset } from './domain/model/Dataset.js';
import type { TransferTarget } from './domain/model/TransferTarget.js';
import type { TransferOutcome } from './domain/model/TransferOutcome.js';
import type { BatchReport } from './domain/model/BatchReport.js';
import type { DatasetEncoder } from './domain/ports/DatasetEncoder.js';
import type { RemoteFileService } from './domain/ports/RemoteFileService.js';
import type { SourceReader } from './domain/ports/SourceReader.js';
import type { SqlConnection } from './domain/ports/SqlConnection.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { TransferContext } from './application/TransferContext.js';
import { TransferDataset } from './application/usecases/TransferDataset.js';
import { RunBatch } from './application/usecases/RunBatch.js';
import type { TargetResolver } from './application/usecases/RunBatch.js';
import { CsvEncoder } from './infrastructure/encoders/CsvEncoder.js';
import { ParquetEncoder } from './infrastructure/encoders/ParquetEncoder.js';

/** Configuration for a `TableTransfer`. Every port is optional; a transfer that needs a missing one fails fast. */
export interface TableTransferConfig {
  /** Remote file store for file and staged-table targets. */
  readonly files?: RemoteFileService;
  /** Destination SQL service for table and staged-table targets. */
  readonly sql?: SqlConnection;
  /** Source warehouse, required by `runAll()`. */
  readonly source?: SourceReader;
  /** Default: a silent logger. */
  readonly logger?: Logger;
  /** Bytes per appended block. Default: 1 MiB. */
  readonly chunkSize?: number;
  /** Largest payload sent with a single put. Default: 1 MiB. */
  readonly directPutLimit?: number;
  /** Rows per `INSERT`. Default: `1000`. */
  readonly batchSize?: number;
  /** File encoders by format. Default: Parquet and CSV. */
  readonly encoders?: readonly DatasetEncoder[];
}

/**
 * Facade over the transfer engine: single-dataset transfers and batch runs.
 *
 * @example
 * ```typescript
 * const engine = new TableTransfer({ files, sql, source, logger });
 * await engine.transfer(dataset, { kind: 'file', path: '/FileStore/data/orders.parquet', format: 'parquet' });
 * const report = await engine.runAll(['sales.orders'], (id) => ({
 *   kind: 'table',
 *   table: { table: id.split('.').pop() ?? id },
 *   mode: 'overwrite',
 * }));
 * ```
 */
export class TableTransfer {
  private readonly ctx: TransferContext;
  private readonly transferDataset: TransferDataset;
  private readonly runBatch: RunBatch;

  constructor(config: TableTransferConfig = {}) {
    this.ctx = new TransferContext({
      ...config,
      encoders: config.encoders ?? [new ParquetEncoder(), new CsvEncoder()],
    });
    this.transferDataset = new TransferDataset(this.ctx);
    this.runBatch = new RunBatch(this.ctx, this.transferDataset);
  }

  /** Move one dataset to one target. Throws on failure. */
  transfer(dataset: Dataset, target: TransferTarget): Promise<TransferOutcome> {
    return this.transferDataset.execute(dataset, target);
  }

  /** Read, sanitize and transfer each table in order. Never throws for a single table's failure. */
  runAll(tableIds: readonly string[], targetFor: TargetResolver): Promise<BatchReport> {
    return this.runBatch.execute(tableIds, targetFor);
  }

  /** Subscribe to a domain event. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to every domain event. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}
