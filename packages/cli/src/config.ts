import fs from 'node:fs';
import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { ConfigurationError, DEFAULT_BATCH_SIZE, DEFAULT_CHUNK_SIZE } from '@tableshift/core';
import { warehouseIdFromHttpPath } from '@tableshift/databricks';

export interface DatabricksConfig {
  readonly host: string;
  readonly token: string;
  readonly httpPath: string;
  readonly warehouseId: string;
  readonly catalog: string;
  readonly schema: string;
}

export interface BigQueryConfig {
  readonly projectId: string;
  readonly credentialsPath: string;
  readonly dataset?: string;
}

export interface TransferConfig {
  /** DBFS directory for file uploads. */
  readonly fileRoot: string;
  /** DBFS directory for staging files of staged table loads. */
  readonly stagingRoot: string;
  readonly batchSize: number;
  readonly chunkSize: number;
}

export interface AppConfig {
  readonly databricks: DatabricksConfig;
  readonly bigquery: BigQueryConfig;
  readonly transfer: TransferConfig;
  readonly logLevel: LevelWithSilent;
  /** Human-readable logs outside production. */
  readonly prettyLogs: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

const blankAsMissing = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const required = z.preprocess(blankAsMissing, z.string());
const optional = z.preprocess(blankAsMissing, z.string().optional());
const withDefault = (fallback: string) => z.preprocess(blankAsMissing, z.string().default(fallback));
const positiveInt = (fallback: number) =>
  z.preprocess(blankAsMissing, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  DATABRICKS_HOST: required,
  DATABRICKS_TOKEN: required,
  DATABRICKS_HTTP_PATH: required,
  DATABRICKS_CATALOG: withDefault('hive_metastore'),
  DATABRICKS_SCHEMA: withDefault('default'),
  BIGQUERY_PROJECT_ID: required,
  BIGQUERY_CREDENTIALS_PATH: required,
  BIGQUERY_DATASET: optional,
  TRANSFER_FILE_ROOT: withDefault('/FileStore/bigquery_data'),
  TRANSFER_STAGING_ROOT: withDefault('/FileStore/staging'),
  TRANSFER_BATCH_SIZE: positiveInt(DEFAULT_BATCH_SIZE),
  TRANSFER_CHUNK_SIZE: z.preprocess(
    blankAsMissing,
    z.coerce
      .number()
      .int()
      .positive()
      .max(DEFAULT_CHUNK_SIZE, 'DBFS accepts blocks of at most 1 MiB (1048576 bytes)')
      .default(DEFAULT_CHUNK_SIZE),
  ),
  LOG_LEVEL: z.preprocess(
    blankAsMissing,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  NODE_ENV: optional,
});

const trimSlashes = (path: string): string => path.replace(/\/+$/, '');

/**
 * Build the application configuration from environment variables.
 *
 * Every missing required variable is reported in a single `ConfigurationError`.
 * The BigQuery credentials file must exist.
 */
export function loadConfig(
  env: Environment,
  fileExists: (path: string) => boolean = fs.existsSync,
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const missing: string[] = [];
    const invalid: string[] = [];
    for (const issue of parsed.error.issues) {
      const name = issue.path.join('.');
      if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
        missing.push(name);
      } else {
        invalid.push(`${name}: ${issue.message}`);
      }
    }
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing configuration: ${missing.join(', ')}. Please check your .env file.`);
    }
    throw new ConfigurationError(`Invalid configuration: ${invalid.join('; ')}`);
  }

  const vars = parsed.data;
  if (!fileExists(vars.BIGQUERY_CREDENTIALS_PATH)) {
    throw new ConfigurationError(`BigQuery credentials file not found: ${vars.BIGQUERY_CREDENTIALS_PATH}`);
  }

  return {
    databricks: {
      host: vars.DATABRICKS_HOST,
      token: vars.DATABRICKS_TOKEN,
      httpPath: vars.DATABRICKS_HTTP_PATH,
      warehouseId: warehouseIdFromHttpPath(vars.DATABRICKS_HTTP_PATH),
      catalog: vars.DATABRICKS_CATALOG,
      schema: vars.DATABRICKS_SCHEMA,
    },
    bigquery: {
      projectId: vars.BIGQUERY_PROJECT_ID,
      credentialsPath: vars.BIGQUERY_CREDENTIALS_PATH,
      dataset: vars.BIGQUERY_DATASET,
    },
    transfer: {
      fileRoot: trimSlashes(vars.TRANSFER_FILE_ROOT),
      stagingRoot: trimSlashes(vars.TRANSFER_STAGING_ROOT),
      batchSize: vars.TRANSFER_BATCH_SIZE,
      chunkSize: vars.TRANSFER_CHUNK_SIZE,
    },
    logLevel: vars.LOG_LEVEL,
    prettyLogs: vars.NODE_ENV !== 'production',
  };
}
