export { SequelizeSqlConnection } from './SequelizeSqlConnection.js';
export type { SequelizeSqlConnectionOptions } from './SequelizeSqlConnection.js';
