import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Sequelize } from 'sequelize';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { StatementError, TableTransfer, createDatasetFromRows } from '@tableshift/core';
import type { TableTarget } from '@tableshift/core';
import { SequelizeSqlConnection } from '../../src/SequelizeSqlConnection.js';
import { BetterSqliteDriver } from '../helpers/BetterSqliteDriver.js';

const orders = createDatasetFromRows(
  [
    { name: 'id', type: 'integer' },
    { name: 'name', type: 'text' },
    { name: 'active', type: 'boolean' },
    { name: 'meta', type: 'structured' },
  ],
  [
    [1, 'Ann', true, { a: 1 }],
    [2, "O'Neil", false, null],
    [3, null, null, [1, 2]],
  ],
);

const ordersTable = (mode: TableTarget['mode']): TableTarget => ({
  kind: 'table',
  table: { table: 'orders' },
  mode,
  batchSize: 2,
});

describe('SequelizeSqlConnection', () => {
  let sequelize: Sequelize;
  let connection: SequelizeSqlConnection;
  let dbPath: string;

  beforeEach(() => {
    dbPath = path.join(os.tmpdir(), `tableshift-${String(Date.now())}-${String(Math.random())}.sqlite`);
    sequelize = new Sequelize({
      dialect: 'sqlite',
      storage: dbPath,
      logging: false,
      dialectModule: { Database: BetterSqliteDriver },
    });
    connection = new SequelizeSqlConnection(sequelize);
  });

  afterEach(async () => {
    await sequelize.close();
    fs.rmSync(dbPath, { force: true });
  });

  it('should return query rows positionally', async () => {
    await connection.execute('CREATE TABLE "t" ("a" BIGINT, "b" TEXT)');
    await connection.execute(`INSERT INTO "t" ("a", "b") VALUES (1, 'x'), (2, 'y')`);

    const result = await connection.execute('SELECT "b", "a" FROM "t" ORDER BY "a"');

    expect(result.rows).toEqual([
      ['x', 1],
      ['y', 2],
    ]);
  });

  it('should return no rows for DDL', async () => {
    await expect(connection.execute('CREATE TABLE "empty" ("a" TEXT)')).resolves.toEqual({ rows: [] });
  });

  it('should report whether a table exists', async () => {
    await expect(connection.tableExists({ table: 'orders' })).resolves.toBe(false);

    await connection.execute('CREATE TABLE "orders" ("id" BIGINT)');

    await expect(connection.tableExists({ table: 'orders' })).resolves.toBe(true);
  });

  it('should raise StatementError for failing statements', async () => {
    const attempt = connection.execute('SELECT * FROM "missing"');

    await expect(attempt).rejects.toBeInstanceOf(StatementError);
    await expect(attempt).rejects.toThrow('no such table: missing');
  });

  it('should load a dataset in batches and read it back', async () => {
    const outcome = await new TableTransfer({ sql: connection }).transfer(orders, ordersTable('overwrite'));

    const result = await connection.execute('SELECT "id", "name", "active", "meta" FROM "orders" ORDER BY "id"');
    expect(outcome.rows).toBe(3);
    expect(result.rows).toEqual([
      [1, 'Ann', 1, '{"a": 1}'],
      [2, "O'Neil", 0, null],
      [3, null, null, '[1, 2]'],
    ]);
  });

  it('should replace rows on overwrite and keep them on append', async () => {
    const engine = new TableTransfer({ sql: connection });
    await engine.transfer(orders, ordersTable('overwrite'));
    await engine.transfer(orders, ordersTable('overwrite'));
    const afterOverwrite = await connection.execute('SELECT COUNT(*) FROM "orders"');

    await engine.transfer(orders, ordersTable('append'));
    const afterAppend = await connection.execute('SELECT COUNT(*) FROM "orders"');

    expect(afterOverwrite.rows).toEqual([[3]]);
    expect(afterAppend.rows).toEqual([[6]]);
  });
});
