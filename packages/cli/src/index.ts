#!/usr/bin/env tsx
import dotenv from 'dotenv';
import { CommanderError } from 'commander';
import { createLogger, describeError } from '@tableshift/core';
import { loadConfig } from './config.js';
import { createProgram } from './program.js';
import { createServices } from './services.js';
import type { CliServices } from './services.js';

dotenv.config();

let services: CliServices | undefined;

const program = createProgram({
  services: () => (services ??= createServices(loadConfig(process.env))),
  print: (line) => {
    process.stdout.write(`${line}\n`);
  },
});

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
  } else {
    const logger = services?.logger ?? createLogger({ name: 'tableshift' });
    logger.error({ err: error }, `Pipeline failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
