import { Option } from 'commander';
import type { Command } from 'commander';
import { z } from 'zod';
import { ConfigurationError, rowCount, sanitizeDataset } from '@tableshift/core';
import type { Dataset, SourceReader } from '@tableshift/core';
import type { CliContext } from '../program.js';
import { TRANSFER_METHODS, resolveTarget } from '../targets.js';
import { parseOptions, parsePositiveInteger, writeModeSchema } from './options.js';

const transferOptionsSchema = z
  .object({
    query: z.string().optional(),
    table: z.string().optional(),
    method: z.enum(['file', 'staged', 'sql']),
    target: z.string().optional(),
    mode: writeModeSchema,
    format: z.enum(['parquet', 'csv']),
    limit: z.number().int().positive().optional(),
  })
  .refine((options) => (options.query === undefined) !== (options.table === undefined), {
    message: 'Provide either --query or --table',
  });

async function extract(
  source: SourceReader,
  options: { query?: string; table?: string; limit?: number },
): Promise<Dataset> {
  if (options.query !== undefined) return source.runQuery(options.query);
  if (options.table !== undefined) return source.readTable(options.table, { limit: options.limit });
  throw new ConfigurationError('Provide either --query or --table');
}

export function registerTransfer(program: Command, ctx: CliContext): void {
  program
    .command('transfer')
    .description('Extract a BigQuery table or query result and load it into Databricks')
    .addOption(new Option('-q, --query <sql>', 'SQL query to run on BigQuery').conflicts('table'))
    .addOption(new Option('-t, --table <name>', 'BigQuery table to extract (table, dataset.table or project.dataset.table)'))
    .addOption(new Option('-m, --method <method>', 'how to load the data').choices(TRANSFER_METHODS).default('file'))
    .option('--target <name>', 'destination table or file name (default: the source table name)')
    .addOption(new Option('--mode <mode>', 'write mode for table loads').choices(['overwrite', 'append']).default('overwrite'))
    .addOption(new Option('-f, --format <format>', 'file format for file uploads').choices(['parquet', 'csv']).default('parquet'))
    .option('-l, --limit <n>', 'maximum number of rows to extract', parsePositiveInteger)
    .action(async (raw: unknown) => {
      const options = parseOptions(transferOptionsSchema, raw);
      const { config, logger, source, engine } = ctx.services();
      const started = Date.now();
      logger.info({ method: options.method }, 'Pipeline started: BigQuery to Databricks');

      const extracted = await extract(source, options);
      logger.info(
        { rows: rowCount(extracted), columns: extracted.columns.map((column) => column.name) },
        'Extracted dataset',
      );

      const target = resolveTarget(options, config);
      const dataset = target.kind === 'file' ? extracted : sanitizeDataset(extracted);
      const outcome = await engine.transfer(dataset, target);

      logger.info(
        { rows: outcome.rows, method: options.method, elapsedMs: Date.now() - started },
        'Pipeline completed',
      );
      ctx.print(`Transferred ${String(outcome.rows)} rows to ${outcome.location}`);
    });
}
