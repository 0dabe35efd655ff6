import { ConfigurationError } from '../errors/TransferErrors.js';

/**
 * Domain service that partitions a sequence into fixed-size batches.
 *
 * Pure logic, no I/O. The final batch may be shorter than `batchSize`.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigurationError('Batch size must be a positive integer');
    }
  }

  /** Yield `{ items, batchIndex }` for consecutive slices of `items`. */
  *split<T>(items: readonly T[]): Iterable<{ readonly items: readonly T[]; readonly batchIndex: number }> {
    for (let start = 0, batchIndex = 0; start < items.length; start += this.batchSize, batchIndex++) {
      yield { items: items.slice(start, start + this.batchSize), batchIndex };
    }
  }

  /** Yield consecutive byte ranges of `payload` as views (no copy). */
  *chunks(payload: Uint8Array): Iterable<{ readonly chunk: Uint8Array; readonly offset: number }> {
    for (let offset = 0; offset < payload.length; offset += this.batchSize) {
      yield { chunk: payload.subarray(offset, offset + this.batchSize), offset };
    }
  }

  /** Number of batches `length` items split into. */
  count(length: number): number {
    return Math.ceil(length / this.batchSize);
  }
}
