import { describe, it, expect, vi } from 'vitest';
import { TableTransfer } from '../../src/TableTransfer.js';
import { InMemorySqlConnection } from '../../src/infrastructure/sql/InMemorySqlConnection.js';
import { createDatasetFromRows } from '../../src/domain/model/Dataset.js';
import type { Dataset } from '../../src/domain/model/Dataset.js';
import type { TableTarget } from '../../src/domain/model/TransferTarget.js';
import { StatementError } from '../../src/domain/errors/TransferErrors.js';
import { FakeSourceReader } from '../helpers/FakeSourceReader.js';
import { captureLogger } from '../helpers/captureLogger.js';

const toTable = (tableId: string): TableTarget => ({
  kind: 'table',
  table: { schema: 'default', table: tableId.split('.').pop() ?? tableId },
  mode: 'overwrite',
});

const rowsOf = (count: number): Dataset =>
  createDatasetFromRows(
    [{ name: 'n', type: 'integer' }],
    Array.from({ length: count }, (_, index) => [index]),
  );

describe('runAll', () => {
  it('should record a failing table and carry on with the rest', async () => {
    const source = new FakeSourceReader(
      new Map<string, Dataset | Error>([
        ['shop.a', rowsOf(2)],
        ['shop.b', rowsOf(1)],
        ['shop.c', rowsOf(3)],
      ]),
    );
    const sql = new InMemorySqlConnection();
    const execute = sql.execute.bind(sql);
    vi.spyOn(sql, 'execute').mockImplementation((statement) =>
      statement.startsWith('INSERT INTO `default`.`b`')
        ? Promise.reject(new StatementError('[TABLE_OR_VIEW_NOT_FOUND] b'))
        : execute(statement),
    );

    const report = await new TableTransfer({ sql, source }).runAll(['shop.a', 'shop.b', 'shop.c'], toTable);

    expect(source.reads).toEqual(['shop.a', 'shop.b', 'shop.c']);
    expect(report.entries).toEqual([
      { tableId: 'shop.a', status: 'succeeded', rows: 2 },
      { tableId: 'shop.b', status: 'failed', rows: 0, message: '[TABLE_OR_VIEW_NOT_FOUND] b' },
      { tableId: 'shop.c', status: 'succeeded', rows: 3 },
    ]);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);
    expect(sql.statements.filter((statement) => statement.startsWith('INSERT INTO `default`.`c`'))).toHaveLength(1);
  });

  it('should record read errors for the table that caused them', async () => {
    const source = new FakeSourceReader(
      new Map<string, Dataset | Error>([
        ['shop.a', new Error('Access Denied: Table shop.a')],
        ['shop.b', rowsOf(1)],
      ]),
    );

    const report = await new TableTransfer({ sql: new InMemorySqlConnection(), source }).runAll(
      ['shop.a', 'shop.b', 'shop.missing'],
      toTable,
    );

    expect(report.entries.map((entry) => [entry.tableId, entry.status, entry.message])).toEqual([
      ['shop.a', 'failed', 'Access Denied: Table shop.a'],
      ['shop.b', 'succeeded', undefined],
      ['shop.missing', 'failed', 'Not found: Table shop.missing'],
    ]);
  });

  it('should skip empty tables without writing and count them as successes', async () => {
    const source = new FakeSourceReader(new Map<string, Dataset | Error>([['shop.empty', rowsOf(0)]]));
    const sql = new InMemorySqlConnection();
    const engine = new TableTransfer({ sql, source });
    const skipped = vi.fn();
    engine.on('table:skipped', skipped);

    const report = await engine.runAll(['shop.empty'], toTable);

    expect(report.entries).toEqual([{ tableId: 'shop.empty', status: 'skipped', rows: 0 }]);
    expect(report.succeeded).toBe(1);
    expect(sql.statements).toEqual([]);
    expect(skipped).toHaveBeenCalledOnce();
  });

  it('should sanitize column names before loading', async () => {
    const source = new FakeSourceReader(
      new Map<string, Dataset | Error>([
        ['shop.people', createDatasetFromRows([{ name: 'First Name', type: 'text' }, { name: 'first-name', type: 'text' }], [['a', 'b']])],
      ]),
    );
    const sql = new InMemorySqlConnection();

    await new TableTransfer({ sql, source }).runAll(['shop.people'], toTable);

    expect(sql.statements[1]).toBe('CREATE TABLE IF NOT EXISTS `default`.`people` (`First_Name` STRING, `first_name` STRING)');
  });

  it('should log the summary with every failure', async () => {
    const source = new FakeSourceReader(new Map<string, Dataset | Error>([['shop.x', new Error('boom')]]));
    const { logger, lines } = captureLogger();

    const report = await new TableTransfer({ sql: new InMemorySqlConnection(), source, logger }).runAll(['shop.x'], toTable);

    const summary = lines[lines.length - 1];
    expect(summary?.['failed']).toBe(1);
    expect(summary?.msg.split('\n').slice(1)).toEqual([
      'Success: 0/1 tables',
      'Errors:  1/1 tables',
      'Failed tables:',
      '  - shop.x: boom',
    ]);
    expect(report.total).toBe(1);
  });

  it('should require a source reader', async () => {
    await expect(new TableTransfer().runAll(['shop.a'], toTable)).rejects.toThrow(
      'A source reader is required to run a batch',
    );
  });
});
