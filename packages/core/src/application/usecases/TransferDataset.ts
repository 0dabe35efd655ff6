import type { Dataset } from '../../domain/model/Dataset.js';
import type { FileTarget, StagedTableTarget, TableTarget, TransferTarget } from '../../domain/model/TransferTarget.js';
import type { TransferOutcome } from '../../domain/model/TransferOutcome.js';
import { formatTableName, isFileFormat } from '../../domain/model/TransferTarget.js';
import { hasSanitizedColumns } from '../../domain/services/ColumnSanitizer.js';
import { ConfigurationError, DataError, describeError } from '../../domain/errors/TransferErrors.js';
import type { TransferContext } from '../TransferContext.js';

/** Display location of a target: the remote path for files, the dotted table name otherwise. */
export function targetLocation(target: TransferTarget): string {
  return target.kind === 'file' ? target.path : formatTableName(target.table);
}

/**
 * Use case: move one dataset to one target.
 *
 * Validates the target against the configured ports before any remote call,
 * then dispatches on the target kind. Errors propagate to the caller after a
 * `transfer:failed` event.
 */
export class TransferDataset {
  constructor(private readonly ctx: TransferContext) {}

  async execute(dataset: Dataset, target: TransferTarget): Promise<TransferOutcome> {
    this.validate(dataset, target);

    const location = targetLocation(target);
    const startedAt = Date.now();
    this.ctx.logger.info({ kind: target.kind, location, rows: dataset.rows.length }, 'Starting transfer');
    this.ctx.eventBus.emit({
      type: 'transfer:started',
      kind: target.kind,
      location,
      rows: dataset.rows.length,
      timestamp: startedAt,
    });

    try {
      const { rows, bytes } = await this.dispatch(dataset, target);
      const outcome: TransferOutcome = { kind: target.kind, location, rows, bytes, elapsedMs: Date.now() - startedAt };

      this.ctx.logger.info({ ...outcome }, 'Transfer completed');
      this.ctx.eventBus.emit({ type: 'transfer:completed', outcome, timestamp: Date.now() });
      return outcome;
    } catch (error) {
      this.ctx.logger.error({ kind: target.kind, location, err: error }, 'Transfer failed');
      this.ctx.eventBus.emit({
        type: 'transfer:failed',
        kind: target.kind,
        location,
        error: describeError(error),
        timestamp: Date.now(),
      });
      throw error;
    }
  }

  private async dispatch(dataset: Dataset, target: TransferTarget): Promise<{ rows: number; bytes: number }> {
    switch (target.kind) {
      case 'file':
        return this.toFile(dataset, target);
      case 'table':
        return this.toTable(dataset, target);
      case 'staged-table':
        return this.toStagedTable(dataset, target);
    }
  }

  private async toFile(dataset: Dataset, target: FileTarget): Promise<{ rows: number; bytes: number }> {
    const payload = await this.ctx.encoderFor(target.format).encode(dataset);
    const result = await this.ctx.chunkedUpload().upload(target.path, payload, target.overwrite ?? true);
    return { rows: dataset.rows.length, bytes: result.bytes };
  }

  private async toTable(dataset: Dataset, target: TableTarget): Promise<{ rows: number; bytes: number }> {
    const rows = await this.ctx.sqlWriter().write(dataset, target);
    return { rows, bytes: 0 };
  }

  private async toStagedTable(dataset: Dataset, target: StagedTableTarget): Promise<{ rows: number; bytes: number }> {
    const result = await this.ctx.stagedLoader().load(dataset, target);
    return { rows: result.rows, bytes: result.bytes };
  }

  private validate(dataset: Dataset, target: TransferTarget): void {
    if (target.kind === 'table' || target.kind === 'staged-table') {
      if (!hasSanitizedColumns(dataset)) {
        const names = dataset.columns.map((column) => column.name).join(', ');
        throw new DataError(`Column names must be sanitized and unique before a table load: ${names}`);
      }
      this.ctx.requireSql();
    }

    if (target.kind === 'file' || target.kind === 'staged-table') {
      this.ctx.requireFiles();
      const path = target.kind === 'file' ? target.path : target.stagingPath;
      if (!path.startsWith('/')) {
        throw new ConfigurationError(`Remote path must be absolute: ${path}`);
      }
      const format: unknown = target.kind === 'file' ? target.format : 'parquet';
      if (!isFileFormat(format)) {
        throw new ConfigurationError(`Unsupported format: ${String(format)}. Use 'parquet' or 'csv'.`);
      }
      this.ctx.encoderFor(format);
    }
  }
}
