import { describe, it, expect } from 'vitest';
import { resolveTarget, tableTargets, targetName } from '../../src/targets.js';
import { testConfig } from '../helpers/fixtures.js';

describe('targetName', () => {
  it('should prefer --target, then the bare table name, then bigquery_data', () => {
    expect(targetName({ table: 'shop.orders', target: 'orders_copy' })).toBe('orders_copy');
    expect(targetName({ table: 'proj.shop.orders' })).toBe('orders');
    expect(targetName({})).toBe('bigquery_data');
  });

  it('should reject names that are not a single path segment', () => {
    expect(() => targetName({ target: 'a/b' })).toThrow("Invalid target name: 'a/b'");
  });
});

describe('resolveTarget', () => {
  it('should build a file target under the file root', () => {
    expect(
      resolveTarget({ table: 'orders', method: 'file', mode: 'overwrite', format: 'csv' }, testConfig),
    ).toEqual({ kind: 'file', path: '/FileStore/bigquery_data/orders.csv', format: 'csv', overwrite: true });
  });

  it('should build a staged table target with a parquet staging file', () => {
    expect(
      resolveTarget({ table: 'orders', method: 'staged', mode: 'append', format: 'csv' }, testConfig),
    ).toEqual({
      kind: 'staged-table',
      table: { catalog: 'hive_metastore', schema: 'default', table: 'orders' },
      mode: 'append',
      stagingPath: '/FileStore/staging/orders.parquet',
    });
  });

  it('should build a SQL insert target with the configured batch size', () => {
    expect(
      resolveTarget({ target: 'daily', method: 'sql', mode: 'overwrite', format: 'parquet' }, testConfig),
    ).toEqual({
      kind: 'table',
      table: { catalog: 'hive_metastore', schema: 'default', table: 'daily' },
      mode: 'overwrite',
      batchSize: 1000,
    });
  });
});

describe('tableTargets', () => {
  it('should load each source table into a table of the same bare name', () => {
    expect(tableTargets(testConfig, 'append')('shop.customers')).toEqual({
      kind: 'table',
      table: { catalog: 'hive_metastore', schema: 'default', table: 'customers' },
      mode: 'append',
      batchSize: 1000,
    });
  });
});
