import { describe, it, expect } from 'vitest';
import { BigQueryDate, BigQueryInt } from '@google-cloud/bigquery';
import { ConfigurationError, insertStatement, sparkSqlDialect } from '@tableshift/core';
import { BigQuerySourceReader } from '../../src/BigQuerySourceReader.js';
import { FakeBigQueryClient } from '../helpers/FakeBigQueryClient.js';

const ordersMetadata = {
  schema: {
    fields: [
      { name: 'id', type: 'INTEGER', mode: 'REQUIRED' },
      { name: 'total', type: 'NUMERIC' },
      { name: 'placed', type: 'DATE' },
      { name: 'tags', type: 'STRING', mode: 'REPEATED' },
    ],
  },
};

describe('BigQuerySourceReader', () => {
  describe('readTable', () => {
    it('should read a bare table name from the default dataset with its schema types', async () => {
      const client = new FakeBigQueryClient({
        metadata: { 'shop.orders': ordersMetadata },
        rows: [{ id: '7', total: '12.50', placed: new BigQueryDate('2024-05-01'), tags: ['a', 'b'] }],
      });
      const reader = new BigQuerySourceReader(client, { projectId: 'proj', dataset: 'shop' });

      const dataset = await reader.readTable('orders');

      expect(client.queries).toEqual(['SELECT * FROM `proj.shop.orders`']);
      expect(dataset.columns).toEqual([
        { name: 'id', type: 'integer' },
        { name: 'total', type: 'float' },
        { name: 'placed', type: 'text' },
        { name: 'tags', type: 'structured' },
      ]);
      expect(dataset.rows).toEqual([
        [
          { kind: 'number', value: 7 },
          { kind: 'number', value: 12.5 },
          { kind: 'text', value: '2024-05-01' },
          { kind: 'structured', value: ['a', 'b'] },
        ],
      ]);
    });

    it('should resolve dataset-qualified names against the project and apply the limit', async () => {
      const client = new FakeBigQueryClient({ metadata: { 'sales.orders': ordersMetadata } });
      const reader = new BigQuerySourceReader(client, { projectId: 'proj' });

      await reader.readTable('sales.orders', { limit: 10 });

      expect(client.queries).toEqual(['SELECT * FROM `proj.sales.orders` LIMIT 10']);
      expect(client.datasets).toEqual([['sales', undefined]]);
    });

    it('should read fully qualified names from their own project', async () => {
      const client = new FakeBigQueryClient();
      const reader = new BigQuerySourceReader(client, { projectId: 'proj' });

      await reader.readTable('other.sales.orders');

      expect(client.queries).toEqual(['SELECT * FROM `other.sales.orders`']);
      expect(client.datasets).toEqual([['sales', 'other']]);
    });

    it('should infer columns when the table has no schema', async () => {
      const client = new FakeBigQueryClient({ rows: [{ n: 1, label: 'one' }] });
      const reader = new BigQuerySourceReader(client, { projectId: 'proj', dataset: 'shop' });

      const dataset = await reader.readTable('numbers');

      expect(dataset.columns).toEqual([
        { name: 'n', type: 'integer' },
        { name: 'label', type: 'text' },
      ]);
    });

    it('should require a dataset for bare table names', async () => {
      const reader = new BigQuerySourceReader(new FakeBigQueryClient(), { projectId: 'proj' });

      await expect(reader.readTable('orders')).rejects.toThrow(
        "Table 'orders' has no dataset and no default dataset is configured",
      );
    });

    it('should reject limits that are not positive integers', async () => {
      const reader = new BigQuerySourceReader(new FakeBigQueryClient(), { projectId: 'proj', dataset: 'shop' });

      await expect(reader.readTable('orders', { limit: 0 })).rejects.toThrow(
        'Row limit must be a positive integer, got 0',
      );
    });

    it('should reject malformed table ids', async () => {
      const reader = new BigQuerySourceReader(new FakeBigQueryClient(), { projectId: 'proj', dataset: 'shop' });

      await expect(reader.readTable('a..b')).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('runQuery', () => {
    it('should infer column types from the returned values', async () => {
      const client = new FakeBigQueryClient({ rows: [{ id: 1, ok: true, note: null }] });
      const reader = new BigQuerySourceReader(client, { projectId: 'proj' });

      const dataset = await reader.runQuery('SELECT 1 AS id');

      expect(client.queries).toEqual(['SELECT 1 AS id']);
      expect(dataset.columns).toEqual([
        { name: 'id', type: 'integer' },
        { name: 'ok', type: 'boolean' },
        { name: 'note', type: 'null' },
      ]);
      expect(dataset.rows).toEqual([[{ kind: 'number', value: 1 }, { kind: 'bool', value: true }, { kind: 'null' }]]);
    });

    it('should keep INT64 values beyond 2^53 exact', async () => {
      const client = new FakeBigQueryClient({ rows: [{ id: new BigQueryInt('9007199254740993') }] });
      const reader = new BigQuerySourceReader(client, { projectId: 'proj' });

      const dataset = await reader.runQuery('SELECT id FROM big');

      expect(client.queryOptions).toEqual([{ query: 'SELECT id FROM big', wrapIntegers: true }]);
      expect(dataset.columns).toEqual([{ name: 'id', type: 'integer' }]);
      expect(dataset.rows).toEqual([[{ kind: 'number', value: 9007199254740993n }]]);
      expect(insertStatement(sparkSqlDialect, { table: 't' }, dataset.columns, dataset.rows)).toBe(
        'INSERT INTO `t` (`id`) VALUES (9007199254740993)',
      );
    });

    it('should surface query failures', async () => {
      const failure = new Error('Syntax error: Unexpected end of script');
      const reader = new BigQuerySourceReader(new FakeBigQueryClient({ queryError: failure }), { projectId: 'proj' });

      await expect(reader.runQuery('SELECT')).rejects.toBe(failure);
    });
  });

  describe('listTables', () => {
    it('should list the configured dataset by default', async () => {
      const client = new FakeBigQueryClient({ tables: { shop: ['orders', 'customers'] } });
      const reader = new BigQuerySourceReader(client, { projectId: 'proj', dataset: 'shop' });

      await expect(reader.listTables()).resolves.toEqual(['orders', 'customers']);
    });

    it('should list a named dataset', async () => {
      const client = new FakeBigQueryClient({ tables: { archive: ['old_orders'] } });
      const reader = new BigQuerySourceReader(client, { projectId: 'proj', dataset: 'shop' });

      await expect(reader.listTables('archive')).resolves.toEqual(['old_orders']);
    });

    it('should fail without any dataset', async () => {
      const reader = new BigQuerySourceReader(new FakeBigQueryClient(), { projectId: 'proj' });

      await expect(reader.listTables()).rejects.toThrow('No dataset specified');
    });
  });

  it('should return the schema fields of a table', async () => {
    const client = new FakeBigQueryClient({ metadata: { 'shop.orders': ordersMetadata } });
    const reader = new BigQuerySourceReader(client, { projectId: 'proj', dataset: 'shop' });

    const fields = await reader.tableSchema('orders');

    expect(fields.map((field) => [field.name, field.type, field.mode])).toEqual([
      ['id', 'INTEGER', 'REQUIRED'],
      ['total', 'NUMERIC', undefined],
      ['placed', 'DATE', undefined],
      ['tags', 'STRING', 'REPEATED'],
    ]);
  });

  it('should require a project id', () => {
    expect(() => new BigQuerySourceReader(new FakeBigQueryClient(), { projectId: '' })).toThrow(
      'BigQuery project id is required',
    );
  });
});
