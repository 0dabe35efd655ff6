/** Outcome of one table within a batch run. `skipped` (empty table) counts as a success. */
export type BatchEntryStatus = 'succeeded' | 'skipped' | 'failed';

export interface BatchReportEntry {
  readonly tableId: string;
  readonly status: BatchEntryStatus;
  /** Rows transferred. `0` for skipped and failed tables. */
  readonly rows: number;
  /** Error message, present only when `status` is `'failed'`. */
  readonly message?: string;
}

/** Immutable summary of a completed batch run, entries in input order. */
export interface BatchReport {
  readonly entries: readonly BatchReportEntry[];
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly elapsedMs: number;
}

/** Freeze a list of entries into a report. */
export function buildBatchReport(entries: readonly BatchReportEntry[], elapsedMs: number): BatchReport {
  const frozen = entries.map((entry) => Object.freeze({ ...entry }));
  const failed = frozen.filter((entry) => entry.status === 'failed').length;
  return Object.freeze({
    entries: Object.freeze(frozen),
    total: frozen.length,
    succeeded: frozen.length - failed,
    failed,
    elapsedMs,
  });
}

export function failedEntries(report: BatchReport): readonly BatchReportEntry[] {
  return report.entries.filter((entry) => entry.status === 'failed');
}

/** Printable summary: timing, success and failure counts, then one line per failed table. */
export function formatBatchReport(report: BatchReport): string[] {
  const lines = [
    `Completed in ${(report.elapsedMs / 1000).toFixed(1)}s`,
    `Success: ${String(report.succeeded)}/${String(report.total)} tables`,
    `Errors:  ${String(report.failed)}/${String(report.total)} tables`,
  ];
  const failures = failedEntries(report);
  if (failures.length > 0) {
    lines.push('Failed tables:');
    for (const entry of failures) {
      lines.push(`  - ${entry.tableId}: ${entry.message ?? 'unknown error'}`);
    }
  }
  return lines;
}
