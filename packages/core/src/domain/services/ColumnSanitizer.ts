import type { Dataset } from '../model/Dataset.js';
import { renameColumns } from '../model/Dataset.js';
import { DataError } from '../errors/TransferErrors.js';

const DISALLOWED = /[^a-zA-Z0-9_]/g;
const EDGE_UNDERSCORES = /^_+|_+$/g;

/** Replace characters outside `[A-Za-z0-9_]` with `_` and strip leading/trailing underscores. Idempotent. */
export function sanitizeColumnName(name: string): string {
  return name.replace(DISALLOWED, '_').replace(EDGE_UNDERSCORES, '');
}

/**
 * Sanitize a list of column names and make them unique.
 *
 * Repeats get numeric suffixes in first-seen order (`col`, `col_1`, `col_2`).
 * A suffix already used by another column is skipped, so the output never
 * contains duplicates. Already-sanitized unique names come back unchanged.
 *
 * @throws DataError when a name has no characters left after sanitization.
 */
export function sanitizeColumnNames(names: readonly string[]): string[] {
  const cleaned = names.map((name) => {
    const result = sanitizeColumnName(name);
    if (result === '') {
      throw new DataError(`Column name '${name}' is empty after sanitization`);
    }
    return result;
  });

  const taken = new Set<string>(cleaned);
  const emitted = new Set<string>();
  const counters = new Map<string, number>();

  return cleaned.map((name) => {
    if (!emitted.has(name)) {
      emitted.add(name);
      return name;
    }
    let suffix = counters.get(name) ?? 0;
    let candidate: string;
    do {
      suffix++;
      candidate = `${name}_${String(suffix)}`;
    } while (taken.has(candidate) || emitted.has(candidate));
    counters.set(name, suffix);
    taken.add(candidate);
    emitted.add(candidate);
    return candidate;
  });
}

/** True when every name is already in sanitized form and no two names collide. */
export function hasSanitizedColumns(dataset: Dataset): boolean {
  const names = dataset.columns.map((column) => column.name);
  return (
    names.every((name) => name !== '' && sanitizeColumnName(name) === name) && new Set(names).size === names.length
  );
}

/** Rename a dataset's columns to their sanitized, de-duplicated form. */
export function sanitizeDataset(dataset: Dataset): Dataset {
  return renameColumns(
    dataset,
    sanitizeColumnNames(dataset.columns.map((column) => column.name)),
  );
}
