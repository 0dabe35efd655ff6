import type { Dataset } from '../model/Dataset.js';
import type { FileFormat } from '../model/TransferTarget.js';

/** Port for serialising a dataset into a file payload. */
export interface DatasetEncoder {
  readonly format: FileFormat;
  encode(dataset: Dataset): Promise<Uint8Array>;
}
