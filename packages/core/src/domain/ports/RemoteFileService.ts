/**
 * Server-issued token for an in-progress remote file write.
 *
 * Valid only between `create()` and `close()`. Never reused after close.
 */
export interface UploadHandle {
  readonly id: number;
  readonly path: string;
}

/**
 * Port for a handle-based remote file store (e.g. DBFS).
 *
 * Methods receive raw bytes; any transport encoding (base64) is the adapter's
 * concern. Each call is a single request and is never retried.
 */
export interface RemoteFileService {
  /** Write a whole file in one request. */
  put(path: string, contents: Uint8Array, overwrite: boolean): Promise<void>;
  /** Open a streaming upload and return its handle. */
  create(path: string, overwrite: boolean): Promise<UploadHandle>;
  /** Append one block to an open handle. */
  addBlock(handle: UploadHandle, block: Uint8Array): Promise<void>;
  /** Finalise the file and release the handle. Appended blocks become visible to readers only after this. */
  close(handle: UploadHandle): Promise<void>;
  /** URI under which SQL engines can read the file, e.g. `dbfs:/FileStore/x.parquet`. */
  uriOf(path: string): string;
}
