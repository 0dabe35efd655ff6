import type { BatchReport, BatchReportEntry } from '../../domain/model/BatchReport.js';
import type { TransferTarget } from '../../domain/model/TransferTarget.js';
import { buildBatchReport, formatBatchReport } from '../../domain/model/BatchReport.js';
import { sanitizeDataset } from '../../domain/services/ColumnSanitizer.js';
import { describeError } from '../../domain/errors/TransferErrors.js';
import type { TransferContext } from '../TransferContext.js';
import type { TransferDataset } from './TransferDataset.js';

/** Maps a source table identifier to where its data goes. */
export type TargetResolver = (tableId: string) => TransferTarget;

/**
 * Use case: transfer many source tables, one after another.
 *
 * A failing table is recorded in the report and the run moves on. Every
 * identifier is attempted exactly once, in input order.
 */
export class RunBatch {
  constructor(
    private readonly ctx: TransferContext,
    private readonly transfer: TransferDataset,
  ) {}

  async execute(tableIds: readonly string[], targetFor: TargetResolver): Promise<BatchReport> {
    const source = this.ctx.requireSource();
    const startedAt = Date.now();
    const entries: BatchReportEntry[] = [];

    this.ctx.logger.info({ totalTables: tableIds.length }, 'Starting batch run');
    this.ctx.eventBus.emit({ type: 'run:started', totalTables: tableIds.length, timestamp: startedAt });

    for (const [index, tableId] of tableIds.entries()) {
      this.ctx.logger.info({ tableId, position: index + 1, totalTables: tableIds.length }, 'Processing table');

      try {
        const dataset = sanitizeDataset(await source.readTable(tableId));

        if (dataset.rows.length === 0) {
          this.ctx.logger.warn({ tableId }, 'Table is empty, skipping');
          this.ctx.eventBus.emit({ type: 'table:skipped', tableId, timestamp: Date.now() });
          entries.push({ tableId, status: 'skipped', rows: 0 });
          continue;
        }

        const outcome = await this.transfer.execute(dataset, targetFor(tableId));
        entries.push({ tableId, status: 'succeeded', rows: outcome.rows });
        this.ctx.eventBus.emit({ type: 'table:completed', tableId, rows: outcome.rows, timestamp: Date.now() });
      } catch (error) {
        const message = describeError(error);
        this.ctx.logger.error({ tableId, err: error }, 'Table transfer failed');
        this.ctx.eventBus.emit({ type: 'table:failed', tableId, error: message, timestamp: Date.now() });
        entries.push({ tableId, status: 'failed', rows: 0, message });
      }
    }

    const report = buildBatchReport(entries, Date.now() - startedAt);
    this.ctx.logger.info(
      { total: report.total, succeeded: report.succeeded, failed: report.failed, elapsedMs: report.elapsedMs },
      formatBatchReport(report).join('\n'),
    );
    this.ctx.eventBus.emit({ type: 'run:completed', report, timestamp: Date.now() });
    return report;
  }
}
