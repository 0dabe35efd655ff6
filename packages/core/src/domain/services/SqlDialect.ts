import type { ColumnType } from '../model/Column.js';
import type { TableName } from '../model/TransferTarget.js';

/** Destination-specific spelling of identifiers, booleans and column types. */
export interface SqlDialect {
  readonly name: string;
  quoteIdentifier(identifier: string): string;
  booleanLiteral(value: boolean): string;
  columnType(type: ColumnType): string;
}

function quoteWith(quote: string): (identifier: string) => string {
  return (identifier) => `${quote}${identifier.split(quote).join(quote + quote)}${quote}`;
}

/** Spark SQL as spoken by Databricks SQL warehouses: backtick identifiers, `STRING` for text. */
export const sparkSqlDialect: SqlDialect = {
  name: 'spark',
  quoteIdentifier: quoteWith('`'),
  booleanLiteral: (value) => (value ? 'TRUE' : 'FALSE'),
  columnType: (type) => {
    switch (type) {
      case 'integer':
        return 'BIGINT';
      case 'float':
        return 'DOUBLE';
      case 'boolean':
        return 'BOOLEAN';
      case 'timestamp':
        return 'TIMESTAMP';
      default:
        return 'STRING';
    }
  },
};

/** Standard SQL (PostgreSQL, SQLite): double-quoted identifiers, `TEXT` for text. */
export const ansiSqlDialect: SqlDialect = {
  name: 'ansi',
  quoteIdentifier: quoteWith('"'),
  booleanLiteral: (value) => (value ? 'TRUE' : 'FALSE'),
  columnType: (type) => {
    switch (type) {
      case 'integer':
        return 'BIGINT';
      case 'float':
        return 'DOUBLE PRECISION';
      case 'boolean':
        return 'BOOLEAN';
      case 'timestamp':
        return 'TIMESTAMP';
      default:
        return 'TEXT';
    }
  },
};

/** Quote every part of a possibly qualified table name. */
export function qualifiedTableName(dialect: SqlDialect, name: TableName): string {
  return [name.catalog, name.schema, name.table]
    .filter((part): part is string => part !== undefined && part !== '')
    .map((part) => dialect.quoteIdentifier(part))
    .join('.');
}
