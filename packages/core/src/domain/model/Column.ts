/** Semantic type of a dataset column, independent of source or destination dialect. */
export const ColumnType = {
  INTEGER: 'integer',
  FLOAT: 'float',
  BOOLEAN: 'boolean',
  TIMESTAMP: 'timestamp',
  TEXT: 'text',
  STRUCTURED: 'structured',
  NULL: 'null',
} as const;

export type ColumnType = (typeof ColumnType)[keyof typeof ColumnType];

/** A named, typed column. */
export interface Column {
  readonly name: string;
  readonly type: ColumnType;
}
