import { Option } from 'commander';
import type { Command } from 'commander';
import { z } from 'zod';
import { formatBatchReport } from '@tableshift/core';
import type { CliContext } from '../program.js';
import { tableTargets } from '../targets.js';
import { parseOptions, writeModeSchema } from './options.js';

const runAllOptionsSchema = z.object({ mode: writeModeSchema });

export function registerRunAll(program: Command, ctx: CliContext): void {
  program
    .command('run-all')
    .description('Copy every table of the configured BigQuery dataset into Databricks tables')
    .addOption(new Option('--mode <mode>', 'write mode').choices(['overwrite', 'append']).default('overwrite'))
    .action(async (raw: unknown) => {
      const { mode } = parseOptions(runAllOptionsSchema, raw);
      const { config, logger, source, engine } = ctx.services();

      const tables = await source.listTables();
      if (tables.length === 0) {
        logger.warn({ dataset: config.bigquery.dataset }, 'No tables found in dataset');
        ctx.print('No tables found.');
        return;
      }
      logger.info({ count: tables.length, tables }, 'Found tables');

      const report = await engine.runAll(tables, tableTargets(config, mode));
      for (const line of formatBatchReport(report)) {
        ctx.print(line);
      }
    });
}
