import { ConnectionError as SequelizeConnectionError } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { Logger } from 'pino';
import { ConnectionError, StatementError, ansiSqlDialect, describeError, silentLogger } from '@tableshift/core';
import type { SqlConnection, SqlDialect, SqlResult, TableName } from '@tableshift/core';

export interface SequelizeSqlConnectionOptions {
  /** Quoting and type rules. Default: ANSI (PostgreSQL, SQLite). */
  readonly dialect?: SqlDialect;
  readonly logger?: Logger;
}

function toPositional(row: unknown): readonly unknown[] {
  if (Array.isArray(row)) return row;
  if (typeof row === 'object' && row !== null) return Object.values(row);
  return [row];
}

/**
 * SQL connection over an existing Sequelize instance.
 *
 * Statements run as raw queries outside any transaction, so each one
 * auto-commits. The caller owns the Sequelize instance and closes it.
 */
export class SequelizeSqlConnection implements SqlConnection {
  readonly dialect: SqlDialect;
  private readonly logger: Logger;

  constructor(
    private readonly sequelize: Sequelize,
    options: SequelizeSqlConnectionOptions = {},
  ) {
    this.dialect = options.dialect ?? ansiSqlDialect;
    this.logger = options.logger ?? silentLogger();
  }

  async execute(statement: string): Promise<SqlResult> {
    let reply: unknown;
    try {
      reply = await this.sequelize.query(statement);
    } catch (error) {
      if (error instanceof SequelizeConnectionError) {
        throw new ConnectionError(`Cannot reach ${this.sequelize.getDialect()} database: ${describeError(error)}`, {
          cause: error,
        });
      }
      throw new StatementError(describeError(error), { cause: error });
    }
    // Raw queries resolve to [results, metadata]; results is only an array for statements that return rows.
    const results: unknown = Array.isArray(reply) ? reply[0] : undefined;
    const rows = Array.isArray(results) ? results.map(toPositional) : [];
    this.logger.debug({ rows: rows.length }, 'Statement executed');
    return { rows };
  }

  async tableExists(table: TableName): Promise<boolean> {
    const tables = await this.sequelize.getQueryInterface().showAllTables();
    return tables.includes(table.table);
  }
}
