import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { ConfigurationError } from '@tableshift/core';

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/** Validate parsed command options, reporting every problem in one `ConfigurationError`. */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

export const writeModeSchema = z.enum(['overwrite', 'append']);
