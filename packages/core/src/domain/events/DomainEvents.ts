import type { TargetKind } from '../model/TransferTarget.js';
import type { TransferOutcome } from '../model/TransferOutcome.js';
import type { BatchReport } from '../model/BatchReport.js';

/** Emitted before a dataset is dispatched to its transfer strategy. */
export interface TransferStartedEvent {
  readonly type: 'transfer:started';
  readonly kind: TargetKind;
  readonly location: string;
  readonly rows: number;
  readonly timestamp: number;
}

export interface TransferCompletedEvent {
  readonly type: 'transfer:completed';
  readonly outcome: TransferOutcome;
  readonly timestamp: number;
}

export interface TransferFailedEvent {
  readonly type: 'transfer:failed';
  readonly kind: TargetKind;
  readonly location: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted once per upload, with the strategy chosen from the payload size. */
export interface UploadStartedEvent {
  readonly type: 'upload:started';
  readonly path: string;
  readonly totalBytes: number;
  readonly strategy: 'direct' | 'streaming';
  readonly timestamp: number;
}

/** Emitted after each appended block of a streaming upload. */
export interface UploadChunkEvent {
  readonly type: 'upload:chunk';
  readonly path: string;
  readonly chunkIndex: number;
  readonly bytesSent: number;
  readonly totalBytes: number;
  readonly timestamp: number;
}

export interface UploadCompletedEvent {
  readonly type: 'upload:completed';
  readonly path: string;
  readonly totalBytes: number;
  readonly timestamp: number;
}

/** Emitted when a streaming upload fails and its handle has been released (or release was attempted). */
export interface UploadAbortedEvent {
  readonly type: 'upload:aborted';
  readonly path: string;
  readonly bytesSent: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after each `INSERT` batch commits. */
export interface SqlBatchEvent {
  readonly type: 'sql:batch';
  readonly table: string;
  readonly batchIndex: number;
  readonly rowCount: number;
  readonly rowsWritten: number;
  readonly timestamp: number;
}

export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly totalTables: number;
  readonly timestamp: number;
}

/** Emitted for an empty source table, which is skipped and counted as a success. */
export interface TableSkippedEvent {
  readonly type: 'table:skipped';
  readonly tableId: string;
  readonly timestamp: number;
}

export interface TableCompletedEvent {
  readonly type: 'table:completed';
  readonly tableId: string;
  readonly rows: number;
  readonly timestamp: number;
}

export interface TableFailedEvent {
  readonly type: 'table:failed';
  readonly tableId: string;
  readonly error: string;
  readonly timestamp: number;
}

export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly report: BatchReport;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | TransferStartedEvent
  | TransferCompletedEvent
  | TransferFailedEvent
  | UploadStartedEvent
  | UploadChunkEvent
  | UploadCompletedEvent
  | UploadAbortedEvent
  | SqlBatchEvent
  | RunStartedEvent
  | TableSkippedEvent
  | TableCompletedEvent
  | TableFailedEvent
  | RunCompletedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
