import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { SqlConnection, SqlResult, TableName } from '@tableshift/core';
import { StatementError, quoteText, silentLogger, sparkSqlDialect } from '@tableshift/core';
import type { DatabricksHttpClient } from './DatabricksHttpClient.js';

const statementState = z.enum(['PENDING', 'RUNNING', 'SUCCEEDED', 'FAILED', 'CANCELED', 'CLOSED']);

const statementReply = z.object({
  statement_id: z.string(),
  status: z.object({
    state: statementState,
    error: z
      .object({
        error_code: z.string().optional(),
        message: z.string().optional(),
      })
      .optional(),
  }),
  result: z
    .object({
      data_array: z.array(z.array(z.unknown())).optional(),
    })
    .optional(),
});

type StatementReply = z.infer<typeof statementReply>;

export interface StatementExecutionOptions {
  readonly warehouseId: string;
  /** Default catalog for unqualified names. */
  readonly catalog?: string;
  /** Default schema for unqualified names. */
  readonly schema?: string;
  /** How long the service holds the submit request open, `'0s'` or `'5s'`…`'50s'`. Default: `'30s'`. */
  readonly waitTimeout?: string;
  /** Delay between status polls. Default: `1000`. */
  readonly pollIntervalMs?: number;
  /** Total time a statement may take before it is cancelled. Default: 10 minutes. */
  readonly timeoutMs?: number;
  readonly logger?: Logger;
}

/**
 * SQL connection over the Databricks SQL Statement Execution API.
 *
 * Statements run on a SQL warehouse and auto-commit. A statement still running
 * after `waitTimeout` is polled until it finishes or `timeoutMs` elapses, at
 * which point it is cancelled.
 */
export class StatementExecutionConnection implements SqlConnection {
  readonly dialect = sparkSqlDialect;
  private readonly waitTimeout: string;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly http: DatabricksHttpClient,
    private readonly options: StatementExecutionOptions,
  ) {
    this.waitTimeout = options.waitTimeout ?? '30s';
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 10 * 60_000;
    this.logger = options.logger ?? silentLogger();
  }

  async execute(statement: string): Promise<SqlResult> {
    const deadline = Date.now() + this.timeoutMs;
    let reply = await this.http.post(
      '/sql/statements',
      {
        warehouse_id: this.options.warehouseId,
        statement,
        wait_timeout: this.waitTimeout,
        on_wait_timeout: 'CONTINUE',
        disposition: 'INLINE',
        format: 'JSON_ARRAY',
        catalog: this.options.catalog,
        schema: this.options.schema,
      },
      statementReply,
    );

    while (reply.status.state === 'PENDING' || reply.status.state === 'RUNNING') {
      if (Date.now() >= deadline) {
        await this.cancel(reply.statement_id);
        throw new StatementError(
          `Statement ${reply.statement_id} timed out after ${String(this.timeoutMs)}ms and was cancelled`,
          { statementId: reply.statement_id },
        );
      }
      await delay(this.pollIntervalMs);
      reply = await this.http.get(`/sql/statements/${encodeURIComponent(reply.statement_id)}`, statementReply);
    }

    return this.settle(reply);
  }

  async tableExists(table: TableName): Promise<boolean> {
    const namespace = [table.catalog, table.schema]
      .filter((part): part is string => part !== undefined && part !== '')
      .map((part) => this.dialect.quoteIdentifier(part))
      .join('.');
    const scope = namespace === '' ? '' : ` IN ${namespace}`;
    const result = await this.execute(`SHOW TABLES${scope} LIKE ${quoteText(table.table)}`);
    return result.rows.length > 0;
  }

  private settle(reply: StatementReply): SqlResult {
    const statementId = reply.statement_id;
    switch (reply.status.state) {
      case 'SUCCEEDED':
        return { rows: reply.result?.data_array ?? [] };
      case 'FAILED': {
        const error = reply.status.error;
        const code = error?.error_code ? `[${error.error_code}] ` : '';
        throw new StatementError(`${code}${error?.message ?? 'Statement failed'}`, { statementId });
      }
      case 'CANCELED':
        throw new StatementError(`Statement ${statementId} was cancelled`, { statementId });
      case 'CLOSED':
        throw new StatementError(`Statement ${statementId} was closed before its result was read`, { statementId });
      default:
        throw new StatementError(`Statement ${statementId} ended in state ${reply.status.state}`, { statementId });
    }
  }

  private async cancel(statementId: string): Promise<void> {
    try {
      await this.http.post(`/sql/statements/${encodeURIComponent(statementId)}/cancel`, {}, z.object({}).passthrough());
    } catch (error) {
      this.logger.warn({ statementId, err: error }, 'Failed to cancel timed-out statement');
    }
  }
}
