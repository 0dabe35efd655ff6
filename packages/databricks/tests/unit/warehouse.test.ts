import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@tableshift/core';
import { warehouseIdFromHttpPath } from '../../src/warehouse.js';
import { DatabricksHttpClient } from '../../src/DatabricksHttpClient.js';

describe('warehouseIdFromHttpPath', () => {
  it.each([
    ['/sql/1.0/warehouses/abc123', 'abc123'],
    ['sql/1.0/warehouses/abc123/', 'abc123'],
    ['/sql/1.0/endpoints/0a1b2c', '0a1b2c'],
    ['/sql/protocolv1/warehouses/XYZ9', 'XYZ9'],
  ])('should read the id from %s', (path, id) => {
    expect(warehouseIdFromHttpPath(path)).toBe(id);
  });

  it('should reject cluster paths', () => {
    expect(() => warehouseIdFromHttpPath('/sql/protocolv1/o/123/0101-abc')).toThrow(ConfigurationError);
  });
});

describe('DatabricksHttpClient', () => {
  it('should require a host and a token', () => {
    expect(() => new DatabricksHttpClient({ host: ' ', token: 'test-token' })).toThrow('Databricks host is required');
    expect(() => new DatabricksHttpClient({ host: 'example.cloud.databricks.com', token: '' })).toThrow(
      'Databricks token is required',
    );
  });
});
