export { DatabricksHttpClient } from './DatabricksHttpClient.js';
export type { DatabricksHttpClientOptions } from './DatabricksHttpClient.js';
export { DbfsFileService } from './DbfsFileService.js';
export { StatementExecutionConnection } from './StatementExecutionConnection.js';
export type { StatementExecutionOptions } from './StatementExecutionConnection.js';
export { warehouseIdFromHttpPath } from './warehouse.js';
