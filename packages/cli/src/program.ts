import { Command } from 'commander';
import type { CliServices } from './services.js';
import { registerTransfer } from './commands/transfer.js';
import { registerRunAll } from './commands/runAll.js';
import { registerListTables } from './commands/listTables.js';

export interface CliContext {
  /** Services for the current process, built on first use. */
  readonly services: () => CliServices;
  /** Write one line of command output. */
  readonly print: (line: string) => void;
}

/**
 * The `tableshift` command.
 *
 * Errors propagate out of `parseAsync`; commander's own exits (help, usage
 * errors) surface as `CommanderError`.
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();
  program.name('tableshift').description('BigQuery to Databricks data pipeline').version('0.1.0').exitOverride();

  registerTransfer(program, ctx);
  registerRunAll(program, ctx);
  registerListTables(program, ctx);

  return program;
}

export type { CliServices } from './services.js';
export { createServices } from './services.js';
export { loadConfig } from './config.js';
export type { AppConfig, Environment } from './config.js';
export { resolveTarget, tableTargets, targetName } from './targets.js';
export type { TransferMethod, TargetRequest } from './targets.js';
