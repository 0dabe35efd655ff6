import type { Logger } from 'pino';
import type { Dataset } from '../../domain/model/Dataset.js';
import type { StagedTableTarget } from '../../domain/model/TransferTarget.js';
import type { DatasetEncoder } from '../../domain/ports/DatasetEncoder.js';
import type { RemoteFileService } from '../../domain/ports/RemoteFileService.js';
import type { SqlConnection } from '../../domain/ports/SqlConnection.js';
import { formatTableName, isWriteMode } from '../../domain/model/TransferTarget.js';
import {
  createTableFromFileStatement,
  dropTableStatement,
  insertFromFileStatement,
} from '../../domain/services/SqlStatements.js';
import { ConfigurationError } from '../../domain/errors/TransferErrors.js';
import { silentLogger } from '../../infrastructure/logging/createLogger.js';
import type { ChunkedUpload } from './ChunkedUpload.js';

export interface StagedTableLoaderOptions {
  /** Must produce Parquet. */
  readonly encoder: DatasetEncoder;
  readonly logger?: Logger;
}

export interface StagedLoadResult {
  readonly rows: number;
  readonly bytes: number;
  readonly uri: string;
}

/**
 * Loads a table from a staged Parquet file.
 *
 * The dataset is uploaded to the staging path first; the table is then created
 * over that file (`overwrite`, or `append` to a missing table) or filled from it
 * with `INSERT … SELECT` (`append` to an existing table).
 */
export class StagedTableLoader {
  private readonly encoder: DatasetEncoder;
  private readonly logger: Logger;

  constructor(
    private readonly uploader: ChunkedUpload,
    private readonly files: RemoteFileService,
    private readonly connection: SqlConnection,
    options: StagedTableLoaderOptions,
  ) {
    if (options.encoder.format !== 'parquet') {
      throw new ConfigurationError(`Staged loads need a parquet encoder, got '${options.encoder.format}'`);
    }
    this.encoder = options.encoder;
    this.logger = options.logger ?? silentLogger();
  }

  async load(dataset: Dataset, target: StagedTableTarget): Promise<StagedLoadResult> {
    if (!isWriteMode(target.mode)) {
      throw new ConfigurationError(`Invalid mode: ${String(target.mode)}. Use 'overwrite' or 'append'.`);
    }

    const payload = await this.encoder.encode(dataset);
    await this.uploader.upload(target.stagingPath, payload, true);

    const dialect = this.connection.dialect;
    const uri = this.files.uriOf(target.stagingPath);
    const name = formatTableName(target.table);

    if (target.mode === 'overwrite') {
      await this.connection.execute(dropTableStatement(dialect, target.table));
      await this.connection.execute(createTableFromFileStatement(dialect, target.table, 'parquet', uri));
      this.logger.info({ table: name, uri }, 'Created table from staged file');
    } else if (await this.connection.tableExists(target.table)) {
      await this.connection.execute(insertFromFileStatement(dialect, target.table, 'parquet', uri));
      this.logger.info({ table: name, uri }, 'Appended staged file to table');
    } else {
      await this.connection.execute(createTableFromFileStatement(dialect, target.table, 'parquet', uri));
      this.logger.info({ table: name, uri }, 'Created table from staged file');
    }

    return { rows: dataset.rows.length, bytes: payload.length, uri };
  }
}
