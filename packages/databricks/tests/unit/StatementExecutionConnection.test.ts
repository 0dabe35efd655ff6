import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { StatementError } from '@tableshift/core';
import { DatabricksHttpClient } from '../../src/DatabricksHttpClient.js';
import { StatementExecutionConnection } from '../../src/StatementExecutionConnection.js';

const HOST = 'https://test-workspace.cloud.databricks.com';

function jsonBody(body: unknown): unknown {
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

describe('StatementExecutionConnection', () => {
  let agent: MockAgent;
  let http: DatabricksHttpClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    http = new DatabricksHttpClient({ host: `${HOST}/`, token: 'test-token', dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should submit the statement to the configured warehouse', async () => {
    const submitted: unknown[] = [];
    agent
      .get(HOST)
      .intercept({ path: '/api/2.0/sql/statements', method: 'POST' })
      .reply((options) => {
        submitted.push(jsonBody(options.body));
        return {
          statusCode: 200,
          data: { statement_id: 's-1', status: { state: 'SUCCEEDED' }, result: { data_array: [['1']] } },
        };
      });

    const connection = new StatementExecutionConnection(http, {
      warehouseId: 'abc123',
      catalog: 'main',
      schema: 'sales',
    });
    const result = await connection.execute('SELECT 1');

    expect(result.rows).toEqual([['1']]);
    expect(submitted).toEqual([
      {
        warehouse_id: 'abc123',
        statement: 'SELECT 1',
        wait_timeout: '30s',
        on_wait_timeout: 'CONTINUE',
        disposition: 'INLINE',
        format: 'JSON_ARRAY',
        catalog: 'main',
        schema: 'sales',
      },
    ]);
  });

  it('should return no rows for statements without a result', async () => {
    agent
      .get(HOST)
      .intercept({ path: '/api/2.0/sql/statements', method: 'POST' })
      .reply(200, { statement_id: 's-2', status: { state: 'SUCCEEDED' } });

    const result = await new StatementExecutionConnection(http, { warehouseId: 'abc123' }).execute('DROP TABLE t');

    expect(result.rows).toEqual([]);
  });

  it('should poll a running statement until it finishes', async () => {
    const pool = agent.get(HOST);
    pool
      .intercept({ path: '/api/2.0/sql/statements', method: 'POST' })
      .reply(200, { statement_id: 's-3', status: { state: 'PENDING' } });
    pool
      .intercept({ path: '/api/2.0/sql/statements/s-3', method: 'GET' })
      .reply(200, { statement_id: 's-3', status: { state: 'RUNNING' } });
    pool
      .intercept({ path: '/api/2.0/sql/statements/s-3', method: 'GET' })
      .reply(200, { statement_id: 's-3', status: { state: 'SUCCEEDED' }, result: { data_array: [['7']] } });

    const connection = new StatementExecutionConnection(http, { warehouseId: 'abc123', pollIntervalMs: 0 });

    await expect(connection.execute('SELECT 7')).resolves.toEqual({ rows: [['7']] });
    agent.assertNoPendingInterceptors();
  });

  it('should raise the warehouse error for failed statements', async () => {
    agent
      .get(HOST)
      .intercept({ path: '/api/2.0/sql/statements', method: 'POST' })
      .reply(200, {
        statement_id: 's-4',
        status: { state: 'FAILED', error: { error_code: 'PARSE_SYNTAX_ERROR', message: "Syntax error at 'SELEC'" } },
      });

    const attempt = new StatementExecutionConnection(http, { warehouseId: 'abc123' }).execute('SELEC 1');

    await expect(attempt).rejects.toBeInstanceOf(StatementError);
    await expect(attempt).rejects.toThrow("[PARSE_SYNTAX_ERROR] Syntax error at 'SELEC'");
  });

  it('should treat closed statements as errors', async () => {
    agent
      .get(HOST)
      .intercept({ path: '/api/2.0/sql/statements', method: 'POST' })
      .reply(200, { statement_id: 's-5', status: { state: 'CLOSED' } });

    await expect(new StatementExecutionConnection(http, { warehouseId: 'abc123' }).execute('SELECT 1')).rejects.toThrow(
      'Statement s-5 was closed before its result was read',
    );
  });

  it('should cancel a statement that outlives its timeout', async () => {
    const pool = agent.get(HOST);
    pool
      .intercept({ path: '/api/2.0/sql/statements', method: 'POST' })
      .reply(200, { statement_id: 's-6', status: { state: 'RUNNING' } });
    pool.intercept({ path: '/api/2.0/sql/statements/s-6/cancel', method: 'POST' }).reply(200, {});

    const connection = new StatementExecutionConnection(http, { warehouseId: 'abc123', timeoutMs: 0 });

    await expect(connection.execute('SELECT slow()')).rejects.toThrow(
      'Statement s-6 timed out after 0ms and was cancelled',
    );
    agent.assertNoPendingInterceptors();
  });

  it('should look tables up with SHOW TABLES in their namespace', async () => {
    const statements: unknown[] = [];
    agent
      .get(HOST)
      .intercept({ path: '/api/2.0/sql/statements', method: 'POST' })
      .reply((options) => {
        const body = jsonBody(options.body);
        statements.push(typeof body === 'object' && body !== null && 'statement' in body ? body.statement : undefined);
        return {
          statusCode: 200,
          data: { statement_id: 's-7', status: { state: 'SUCCEEDED' }, result: { data_array: [['sales', 'orders', 'false']] } },
        };
      });

    const exists = await new StatementExecutionConnection(http, { warehouseId: 'abc123' }).tableExists({
      catalog: 'main',
      schema: 'sales',
      table: 'orders',
    });

    expect(exists).toBe(true);
    expect(statements).toEqual(["SHOW TABLES IN `main`.`sales` LIKE 'orders'"]);
  });

  it('should report a missing table when SHOW TABLES returns nothing', async () => {
    agent
      .get(HOST)
      .intercept({ path: '/api/2.0/sql/statements', method: 'POST' })
      .reply(200, { statement_id: 's-8', status: { state: 'SUCCEEDED' }, result: { data_array: [] } });

    await expect(
      new StatementExecutionConnection(http, { warehouseId: 'abc123' }).tableExists({ table: 'ghost' }),
    ).resolves.toBe(false);
  });

  it('should reject replies that do not look like a statement', async () => {
    agent
      .get(HOST)
      .intercept({ path: '/api/2.0/sql/statements', method: 'POST' })
      .reply(200, { unexpected: true });

    await expect(new StatementExecutionConnection(http, { warehouseId: 'abc123' }).execute('SELECT 1')).rejects.toThrow(
      /^Unexpected response from POST \/sql\/statements/,
    );
  });
});
