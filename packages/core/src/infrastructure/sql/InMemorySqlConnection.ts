import type { SqlConnection, SqlResult } from '../../domain/ports/SqlConnection.js';
import type { TableName } from '../../domain/model/TransferTarget.js';
import type { SqlDialect } from '../../domain/services/SqlDialect.js';
import { sparkSqlDialect, qualifiedTableName } from '../../domain/services/SqlDialect.js';

const CREATE = /^CREATE TABLE (?:IF NOT EXISTS )?(\S+)/;
const DROP = /^DROP TABLE (?:IF EXISTS )?(\S+)/;

/**
 * SQL connection that records statements instead of running them.
 *
 * Tracks which tables exist from the `CREATE TABLE` and `DROP TABLE`
 * statements it receives, so `tableExists` answers consistently.
 */
export class InMemorySqlConnection implements SqlConnection {
  readonly statements: string[] = [];
  private readonly tables = new Set<string>();

  constructor(readonly dialect: SqlDialect = sparkSqlDialect) {}

  execute(statement: string): Promise<SqlResult> {
    this.statements.push(statement);

    const created = CREATE.exec(statement);
    if (created?.[1]) this.tables.add(created[1]);
    const dropped = DROP.exec(statement);
    if (dropped?.[1]) this.tables.delete(dropped[1]);

    return Promise.resolve({ rows: [] });
  }

  tableExists(table: TableName): Promise<boolean> {
    return Promise.resolve(this.tables.has(qualifiedTableName(this.dialect, table)));
  }

  /** Register a table as already present. */
  seedTable(table: TableName): void {
    this.tables.add(qualifiedTableName(this.dialect, table));
  }
}
