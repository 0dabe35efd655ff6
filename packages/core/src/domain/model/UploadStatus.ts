/**
 * Finite state machine for a streaming upload.
 *
 * Valid transitions:
 * - `IDLE` → `OPEN` | `ABORTING`
 * - `OPEN` → `CLOSED` | `ABORTING`
 * - `ABORTING` → `ABORTED`
 * - `CLOSED`, `ABORTED` → (terminal)
 */
export const UploadStatus = {
  IDLE: 'IDLE',
  OPEN: 'OPEN',
  CLOSED: 'CLOSED',
  ABORTING: 'ABORTING',
  ABORTED: 'ABORTED',
} as const;

export type UploadStatus = (typeof UploadStatus)[keyof typeof UploadStatus];

const VALID_TRANSITIONS: Record<UploadStatus, readonly UploadStatus[]> = {
  [UploadStatus.IDLE]: [UploadStatus.OPEN, UploadStatus.ABORTING],
  [UploadStatus.OPEN]: [UploadStatus.CLOSED, UploadStatus.ABORTING],
  [UploadStatus.ABORTING]: [UploadStatus.ABORTED],
  [UploadStatus.CLOSED]: [],
  [UploadStatus.ABORTED]: [],
};

export function canTransition(from: UploadStatus, to: UploadStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: UploadStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
