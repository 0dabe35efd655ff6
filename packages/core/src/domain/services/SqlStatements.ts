import type { Cell } from '../model/Cell.js';
import type { Column } from '../model/Column.js';
import type { DatasetRow } from '../model/Dataset.js';
import type { TableName } from '../model/TransferTarget.js';
import type { SqlDialect } from './SqlDialect.js';
import { sparkSqlDialect, qualifiedTableName } from './SqlDialect.js';
import { toJsonText } from './JsonText.js';

/** Wrap text in single quotes, doubling embedded single quotes. */
export function quoteText(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

/**
 * Render a cell as a SQL literal.
 *
 * - null → `NULL`
 * - structured → quoted JSON text
 * - bool → the dialect's `TRUE` / `FALSE`
 * - number → decimal text, unquoted (non-finite values are quoted so the engine casts them)
 * - text → quoted text
 */
export function encodeLiteral(cell: Cell, dialect: SqlDialect = sparkSqlDialect): string {
  switch (cell.kind) {
    case 'null':
      return 'NULL';
    case 'structured':
      return quoteText(toJsonText(cell.value));
    case 'bool':
      return dialect.booleanLiteral(cell.value);
    case 'number':
      if (typeof cell.value === 'number' && !Number.isFinite(cell.value)) {
        return quoteText(String(cell.value));
      }
      return cell.value.toString();
    case 'text':
      return quoteText(cell.value);
  }
}

export function createTableStatement(dialect: SqlDialect, table: TableName, columns: readonly Column[]): string {
  const definitions = columns.map(
    (column) => `${dialect.quoteIdentifier(column.name)} ${dialect.columnType(column.type)}`,
  );
  return `CREATE TABLE IF NOT EXISTS ${qualifiedTableName(dialect, table)} (${definitions.join(', ')})`;
}

export function dropTableStatement(dialect: SqlDialect, table: TableName): string {
  return `DROP TABLE IF EXISTS ${qualifiedTableName(dialect, table)}`;
}

/** One multi-row `INSERT` for a batch of rows. */
export function insertStatement(
  dialect: SqlDialect,
  table: TableName,
  columns: readonly Column[],
  rows: readonly DatasetRow[],
): string {
  const names = columns.map((column) => dialect.quoteIdentifier(column.name)).join(', ');
  const values = rows.map((row) => `(${row.map((cell) => encodeLiteral(cell, dialect)).join(', ')})`);
  return `INSERT INTO ${qualifiedTableName(dialect, table)} (${names}) VALUES ${values.join(', ')}`;
}

/** External table over a staged file. */
export function createTableFromFileStatement(
  dialect: SqlDialect,
  table: TableName,
  format: string,
  uri: string,
): string {
  return `CREATE TABLE ${qualifiedTableName(dialect, table)} USING ${format.toUpperCase()} LOCATION ${quoteText(uri)}`;
}

/** Copy every row of a staged file into an existing table. */
export function insertFromFileStatement(dialect: SqlDialect, table: TableName, format: string, uri: string): string {
  return `INSERT INTO ${qualifiedTableName(dialect, table)} SELECT * FROM ${format.toLowerCase()}.${dialect.quoteIdentifier(uri)}`;
}
