export { BigQuerySourceReader, createBigQueryClient } from './BigQuerySourceReader.js';
export type {
  BigQueryClient,
  BigQueryClientOptions,
  BigQueryDatasetHandle,
  BigQueryQueryOptions,
  BigQuerySourceReaderOptions,
} from './BigQuerySourceReader.js';
export { toColumnType, inferColumns, normalizeValue, normalizeRecord } from './values.js';
export type { BigQueryField } from './values.js';
