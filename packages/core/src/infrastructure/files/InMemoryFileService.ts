import type { RemoteFileService, UploadHandle } from '../../domain/ports/RemoteFileService.js';
import { ProtocolError } from '../../domain/errors/TransferErrors.js';

/** One call received by the in-memory file service, in arrival order. */
export type FileRequest =
  | { readonly op: 'put'; readonly path: string; readonly bytes: number }
  | { readonly op: 'create'; readonly path: string }
  | { readonly op: 'addBlock'; readonly handle: number; readonly bytes: number }
  | { readonly op: 'close'; readonly handle: number };

/**
 * Non-persistent remote file service. Streamed blocks become visible under their
 * path only when the handle is closed.
 */
export class InMemoryFileService implements RemoteFileService {
  readonly requests: FileRequest[] = [];
  private readonly files = new Map<string, Uint8Array>();
  private readonly open = new Map<number, { path: string; blocks: Uint8Array[] }>();
  private nextHandle = 1;

  constructor(private readonly scheme = 'mem:') {}

  put(path: string, contents: Uint8Array, overwrite: boolean): Promise<void> {
    this.requests.push({ op: 'put', path, bytes: contents.length });
    this.assertWritable(path, overwrite);
    this.files.set(path, Uint8Array.from(contents));
    return Promise.resolve();
  }

  create(path: string, overwrite: boolean): Promise<UploadHandle> {
    this.requests.push({ op: 'create', path });
    this.assertWritable(path, overwrite);
    const id = this.nextHandle++;
    this.open.set(id, { path, blocks: [] });
    return Promise.resolve({ id, path });
  }

  addBlock(handle: UploadHandle, block: Uint8Array): Promise<void> {
    this.requests.push({ op: 'addBlock', handle: handle.id, bytes: block.length });
    this.session(handle).blocks.push(Uint8Array.from(block));
    return Promise.resolve();
  }

  close(handle: UploadHandle): Promise<void> {
    this.requests.push({ op: 'close', handle: handle.id });
    const session = this.session(handle);
    this.open.delete(handle.id);
    this.files.set(session.path, Buffer.concat(session.blocks));
    return Promise.resolve();
  }

  uriOf(path: string): string {
    return `${this.scheme}${path}`;
  }

  /** Contents of a closed file, or `undefined` when nothing was written there. */
  read(path: string): Uint8Array | undefined {
    return this.files.get(path);
  }

  /** Handles created but not yet closed. */
  openHandles(): number[] {
    return [...this.open.keys()];
  }

  private session(handle: UploadHandle): { path: string; blocks: Uint8Array[] } {
    const session = this.open.get(handle.id);
    if (!session) {
      throw new ProtocolError(`Unknown handle ${String(handle.id)}`, {
        statusCode: 404,
        errorCode: 'RESOURCE_DOES_NOT_EXIST',
      });
    }
    return session;
  }

  private assertWritable(path: string, overwrite: boolean): void {
    if (!overwrite && this.files.has(path)) {
      throw new ProtocolError(`A file or directory already exists at ${path}`, {
        statusCode: 400,
        errorCode: 'RESOURCE_ALREADY_EXISTS',
      });
    }
  }
}
