import type { TableName } from '../model/TransferTarget.js';
import type { SqlDialect } from '../services/SqlDialect.js';

/** Rows returned by a statement, positional. Empty for DDL and DML. */
export interface SqlResult {
  readonly rows: readonly (readonly unknown[])[];
}

/**
 * Port for a destination SQL service.
 *
 * Every statement auto-commits; there is no cross-statement transaction. The
 * connection is used serially by one writer at a time.
 */
export interface SqlConnection {
  /** Quoting, literal and type rules of the destination. */
  readonly dialect: SqlDialect;
  execute(statement: string): Promise<SqlResult>;
  /** Capability probe used by append mode. Does not throw for a missing table. */
  tableExists(table: TableName): Promise<boolean>;
}
