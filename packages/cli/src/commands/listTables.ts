import type { Command } from 'commander';
import { z } from 'zod';
import type { CliContext } from '../program.js';
import { parseOptions } from './options.js';

const listTablesOptionsSchema = z.object({ dataset: z.string().optional() });

export function registerListTables(program: Command, ctx: CliContext): void {
  program
    .command('list-tables')
    .description('List the tables of a BigQuery dataset')
    .option('-d, --dataset <name>', 'dataset to list (default: BIGQUERY_DATASET)')
    .action(async (raw: unknown) => {
      const { dataset } = parseOptions(listTablesOptionsSchema, raw);
      const tables = await ctx.services().source.listTables(dataset);

      ctx.print('Tables in BigQuery dataset:');
      ctx.print('-'.repeat(40));
      tables.forEach((table, index) => {
        ctx.print(`  ${String(index + 1)}. ${table}`);
      });
      ctx.print('');
      ctx.print(`Total: ${String(tables.length)} tables`);
    });
}
