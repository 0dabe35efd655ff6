import { request } from 'undici';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import type { Logger } from 'pino';
import { ConfigurationError, ConnectionError, ProtocolError, describeError, silentLogger } from '@tableshift/core';

export interface DatabricksHttpClientOptions {
  /** Workspace host, with or without `https://`. */
  readonly host: string;
  /** Personal access token sent as a bearer token. */
  readonly token: string;
  /** Per-request header and body timeout. Default: `60000`. */
  readonly timeoutMs?: number;
  /** undici dispatcher (connection pool, proxy or mock agent). Default: the global dispatcher. */
  readonly dispatcher?: Dispatcher;
  readonly logger?: Logger;
}

const apiErrorSchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional(),
});

/**
 * Minimal JSON client for the Databricks REST API (`/api/2.0`).
 *
 * Every call is a single request. Transport failures become `ConnectionError`,
 * non-2xx replies `ProtocolError` carrying the API's `error_code`. Replies are
 * validated against a zod schema supplied by the caller.
 */
export class DatabricksHttpClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly logger: Logger;

  constructor(options: DatabricksHttpClientOptions) {
    const host = options.host.trim().replace(/^https?:\/\//, '').replace(/\/+$/, '');
    if (host === '') {
      throw new ConfigurationError('Databricks host is required');
    }
    if (options.token.trim() === '') {
      throw new ConfigurationError('Databricks token is required');
    }
    this.baseUrl = `https://${host}/api/2.0`;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? silentLogger();
  }

  get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return this.send('GET', path, undefined, schema);
  }

  post<T>(path: string, body: object, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return this.send('POST', path, body, schema);
  }

  private async send<T>(
    method: 'GET' | 'POST',
    path: string,
    body: object | undefined,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug({ method, path }, 'Databricks request');

    let statusCode: number;
    let text: string;
    try {
      const response = await request(url, {
        method,
        headers: {
          authorization: `Bearer ${this.token}`,
          'content-type': 'application/json',
          accept: 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        dispatcher: this.dispatcher,
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (error) {
      throw new ConnectionError(`Cannot reach Databricks at ${url}: ${describeError(error)}`, { cause: error });
    }

    const payload = parseJson(text);

    if (statusCode >= 400) {
      const apiError = apiErrorSchema.safeParse(payload);
      const errorCode = apiError.success ? apiError.data.error_code : undefined;
      const detail = (apiError.success ? apiError.data.message : undefined) ?? (text || `HTTP ${String(statusCode)}`);
      throw new ProtocolError(
        `${method} ${path} failed with ${String(statusCode)}${errorCode ? ` ${errorCode}` : ''}: ${detail}`,
        { statusCode, errorCode },
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ProtocolError(`Unexpected response from ${method} ${path}: ${parsed.error.message}`, {
        statusCode,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

function parseJson(text: string): unknown {
  if (text.trim() === '') return {};
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return { message: text };
  }
}
