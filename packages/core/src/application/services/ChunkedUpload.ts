import type { Logger } from 'pino';
import type { RemoteFileService, UploadHandle } from '../../domain/ports/RemoteFileService.js';
import type { UploadStatus } from '../../domain/model/UploadStatus.js';
import { canTransition } from '../../domain/model/UploadStatus.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { ConfigurationError, OpenError, TransferError, describeError } from '../../domain/errors/TransferErrors.js';
import { silentLogger } from '../../infrastructure/logging/createLogger.js';
import type { EventBus } from '../EventBus.js';

/** Payloads up to this size are sent with a single `put`. */
export const DIRECT_PUT_LIMIT = 1024 * 1024;

/** Raw bytes per appended block, before transport encoding. */
export const DEFAULT_CHUNK_SIZE = 1024 * 1024;

export interface ChunkedUploadOptions {
  /** Default: `DEFAULT_CHUNK_SIZE` (1 MiB). */
  readonly chunkSize?: number;
  /** Default: `DIRECT_PUT_LIMIT` (1 MiB). */
  readonly directPutLimit?: number;
  readonly logger?: Logger;
  readonly eventBus?: EventBus;
}

export interface UploadResult {
  readonly path: string;
  readonly bytes: number;
  readonly strategy: 'direct' | 'streaming';
  /** Blocks appended. `0` for direct puts. */
  readonly chunks: number;
}

/**
 * Tracks one streaming upload through IDLE → OPEN → CLOSED, or → ABORTING → ABORTED.
 */
class UploadSession {
  status: UploadStatus = 'IDLE';
  handle: UploadHandle | null = null;
  bytesSent = 0;
  chunks = 0;

  constructor(readonly path: string) {}

  transitionTo(next: UploadStatus): void {
    if (!canTransition(this.status, next)) {
      throw new Error(`Invalid upload transition for ${this.path}: ${this.status} → ${next}`);
    }
    this.status = next;
  }
}

/**
 * Chunked upload protocol over a handle-based remote file service.
 *
 * Small payloads go out in one `put`. Larger ones are streamed with
 * `create` → `addBlock`… → `close`. On any failure the handle (if one was
 * acquired) is closed once on a best-effort basis and the original error is
 * re-thrown; a failing cleanup is only logged. Nothing is retried.
 */
export class ChunkedUpload {
  private readonly splitter: BatchSplitter;
  private readonly directPutLimit: number;
  private readonly logger: Logger;
  private readonly eventBus: EventBus | null;

  constructor(
    private readonly files: RemoteFileService,
    options: ChunkedUploadOptions = {},
  ) {
    this.splitter = new BatchSplitter(options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.directPutLimit = options.directPutLimit ?? DIRECT_PUT_LIMIT;
    if (!Number.isInteger(this.directPutLimit) || this.directPutLimit < 0) {
      throw new ConfigurationError('Direct put limit must be a non-negative integer');
    }
    this.logger = options.logger ?? silentLogger();
    this.eventBus = options.eventBus ?? null;
  }

  async upload(path: string, payload: Uint8Array, overwrite = true): Promise<UploadResult> {
    const streaming = payload.length > this.directPutLimit;
    this.logger.info({ path, bytes: payload.length, strategy: streaming ? 'streaming' : 'direct' }, 'Uploading file');
    this.eventBus?.emit({
      type: 'upload:started',
      path,
      totalBytes: payload.length,
      strategy: streaming ? 'streaming' : 'direct',
      timestamp: Date.now(),
    });

    const result = streaming ? await this.stream(path, payload, overwrite) : await this.put(path, payload, overwrite);

    this.eventBus?.emit({ type: 'upload:completed', path, totalBytes: payload.length, timestamp: Date.now() });
    this.logger.info({ path, bytes: payload.length }, 'Upload completed');
    return result;
  }

  private async put(path: string, payload: Uint8Array, overwrite: boolean): Promise<UploadResult> {
    await this.files.put(path, payload, overwrite);
    return { path, bytes: payload.length, strategy: 'direct', chunks: 0 };
  }

  private async stream(path: string, payload: Uint8Array, overwrite: boolean): Promise<UploadResult> {
    const session = new UploadSession(path);

    try {
      session.handle = await this.open(path, overwrite);
      session.transitionTo('OPEN');

      for (const { chunk } of this.splitter.chunks(payload)) {
        await this.files.addBlock(session.handle, chunk);
        session.bytesSent += chunk.length;
        session.chunks++;

        this.logger.info({ path, bytesSent: session.bytesSent, totalBytes: payload.length }, 'Uploaded block');
        this.eventBus?.emit({
          type: 'upload:chunk',
          path,
          chunkIndex: session.chunks - 1,
          bytesSent: session.bytesSent,
          totalBytes: payload.length,
          timestamp: Date.now(),
        });
      }

      await this.files.close(session.handle);
      session.transitionTo('CLOSED');
    } catch (error) {
      await this.abort(session, error);
      throw error;
    }

    return { path, bytes: session.bytesSent, strategy: 'streaming', chunks: session.chunks };
  }

  private async open(path: string, overwrite: boolean): Promise<UploadHandle> {
    try {
      return await this.files.create(path, overwrite);
    } catch (error) {
      if (error instanceof TransferError) throw error;
      throw new OpenError(path, { cause: error });
    }
  }

  private async abort(session: UploadSession, error: unknown): Promise<void> {
    session.transitionTo('ABORTING');

    if (session.handle) {
      try {
        await this.files.close(session.handle);
      } catch (cleanupError) {
        this.logger.warn(
          { path: session.path, handle: session.handle.id, err: cleanupError },
          'Failed to release upload handle after error',
        );
      }
    }

    session.transitionTo('ABORTED');
    this.logger.error({ path: session.path, bytesSent: session.bytesSent, err: error }, 'Upload aborted');
    this.eventBus?.emit({
      type: 'upload:aborted',
      path: session.path,
      bytesSent: session.bytesSent,
      error: describeError(error),
      timestamp: Date.now(),
    });
  }
}
