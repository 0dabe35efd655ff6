import type { Logger } from 'pino';
import type { FileFormat } from '../domain/model/TransferTarget.js';
import type { DatasetEncoder } from '../domain/ports/DatasetEncoder.js';
import type { RemoteFileService } from '../domain/ports/RemoteFileService.js';
import type { SourceReader } from '../domain/ports/SourceReader.js';
import type { SqlConnection } from '../domain/ports/SqlConnection.js';
import { ConfigurationError } from '../domain/errors/TransferErrors.js';
import { silentLogger } from '../infrastructure/logging/createLogger.js';
import { ChunkedUpload } from './services/ChunkedUpload.js';
import { BatchSqlWriter } from './services/BatchSqlWriter.js';
import { StagedTableLoader } from './services/StagedTableLoader.js';
import { EventBus } from './EventBus.js';

export interface TransferContextOptions {
  readonly files?: RemoteFileService;
  readonly sql?: SqlConnection;
  readonly source?: SourceReader;
  readonly encoders?: readonly DatasetEncoder[];
  readonly logger?: Logger;
  readonly chunkSize?: number;
  readonly directPutLimit?: number;
  readonly batchSize?: number;
}

/**
 * Collaborators shared by the use cases of one `TableTransfer`.
 *
 * Built once from explicit options; nothing in here reads the environment.
 * Components that need a port which was not configured are created lazily and
 * fail with `ConfigurationError` at that point.
 */
export class TransferContext {
  readonly eventBus: EventBus;
  readonly logger: Logger;
  readonly files: RemoteFileService | null;
  readonly sql: SqlConnection | null;
  readonly source: SourceReader | null;
  readonly batchSize: number | undefined;

  private readonly encoders: ReadonlyMap<FileFormat, DatasetEncoder>;
  private readonly chunkSize: number | undefined;
  private readonly directPutLimit: number | undefined;
  private uploader: ChunkedUpload | null = null;
  private writer: BatchSqlWriter | null = null;
  private loader: StagedTableLoader | null = null;

  constructor(options: TransferContextOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.eventBus = new EventBus(this.logger);
    this.files = options.files ?? null;
    this.sql = options.sql ?? null;
    this.source = options.source ?? null;
    this.batchSize = options.batchSize;
    this.chunkSize = options.chunkSize;
    this.directPutLimit = options.directPutLimit;
    this.encoders = new Map((options.encoders ?? []).map((encoder) => [encoder.format, encoder]));
  }

  encoderFor(format: FileFormat): DatasetEncoder {
    const encoder = this.encoders.get(format);
    if (!encoder) {
      throw new ConfigurationError(`No encoder configured for format '${format}'`);
    }
    return encoder;
  }

  hasEncoder(format: FileFormat): boolean {
    return this.encoders.has(format);
  }

  requireFiles(): RemoteFileService {
    if (!this.files) {
      throw new ConfigurationError('A remote file service is required for file targets');
    }
    return this.files;
  }

  requireSql(): SqlConnection {
    if (!this.sql) {
      throw new ConfigurationError('A SQL connection is required for table targets');
    }
    return this.sql;
  }

  requireSource(): SourceReader {
    if (!this.source) {
      throw new ConfigurationError('A source reader is required to run a batch');
    }
    return this.source;
  }

  chunkedUpload(): ChunkedUpload {
    this.uploader ??= new ChunkedUpload(this.requireFiles(), {
      chunkSize: this.chunkSize,
      directPutLimit: this.directPutLimit,
      logger: this.logger,
      eventBus: this.eventBus,
    });
    return this.uploader;
  }

  sqlWriter(): BatchSqlWriter {
    this.writer ??= new BatchSqlWriter(this.requireSql(), {
      batchSize: this.batchSize,
      logger: this.logger,
      eventBus: this.eventBus,
    });
    return this.writer;
  }

  stagedLoader(): StagedTableLoader {
    this.loader ??= new StagedTableLoader(this.chunkedUpload(), this.requireFiles(), this.requireSql(), {
      encoder: this.encoderFor('parquet'),
      logger: this.logger,
    });
    return this.loader;
  }
}
