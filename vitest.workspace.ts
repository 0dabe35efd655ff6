import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/databricks/vitest.config.ts',
  'packages/bigquery/vitest.config.ts',
  'packages/sql-sequelize/vitest.config.ts',
  'packages/cli/vitest.config.ts',
]);
