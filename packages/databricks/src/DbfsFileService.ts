import { z } from 'zod';
import type { RemoteFileService, UploadHandle } from '@tableshift/core';
import type { DatabricksHttpClient } from './DatabricksHttpClient.js';

const emptyReply = z.object({}).passthrough();
const createReply = z.object({ handle: z.number().int() });

function base64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Remote file service over the DBFS API.
 *
 * Blocks travel base64-encoded in JSON bodies; DBFS caps each decoded block
 * (and each `put`) at 1 MiB.
 */
export class DbfsFileService implements RemoteFileService {
  constructor(private readonly http: DatabricksHttpClient) {}

  async put(path: string, contents: Uint8Array, overwrite: boolean): Promise<void> {
    await this.http.post('/dbfs/put', { path, contents: base64(contents), overwrite }, emptyReply);
  }

  async create(path: string, overwrite: boolean): Promise<UploadHandle> {
    const reply = await this.http.post('/dbfs/create', { path, overwrite }, createReply);
    return { id: reply.handle, path };
  }

  async addBlock(handle: UploadHandle, block: Uint8Array): Promise<void> {
    await this.http.post('/dbfs/add-block', { handle: handle.id, data: base64(block) }, emptyReply);
  }

  async close(handle: UploadHandle): Promise<void> {
    await this.http.post('/dbfs/close', { handle: handle.id }, emptyReply);
  }

  uriOf(path: string): string {
    return `dbfs:${path}`;
  }
}
