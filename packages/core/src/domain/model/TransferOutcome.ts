import type { TargetKind } from './TransferTarget.js';

/** Result of a single successful transfer. */
export interface TransferOutcome {
  readonly kind: TargetKind;
  /** Remote file path or dotted table name. */
  readonly location: string;
  readonly rows: number;
  /** Bytes uploaded. `0` for SQL insert targets. */
  readonly bytes: number;
  readonly elapsedMs: number;
}
