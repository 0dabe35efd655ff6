import { DataError } from '../errors/TransferErrors.js';
import { isStructured } from '../model/Cell.js';

/**
 * Serialise a value as JSON with `", "` between items and `": "` after keys,
 * e.g. `[1, 2]` and `{"a": 1}`.
 *
 * Dates become ISO strings, bigints bare integers and other non-JSON values
 * their string form. Non-finite numbers and `undefined` array items become
 * `null`; `undefined` object properties are omitted.
 *
 * @throws DataError on circular references.
 */
export function toJsonText(value: unknown): string {
  return render(value, new Set<object>());
}

function render(value: unknown, ancestors: Set<object>): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : 'null';
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Date) return JSON.stringify(value.toISOString());
  if (Array.isArray(value) || isStructured(value)) {
    if (ancestors.has(value)) {
      throw new DataError('Cannot serialise a structured value with circular references');
    }
    ancestors.add(value);
    const text = Array.isArray(value) ? renderArray(value, ancestors) : renderObject(value, ancestors);
    ancestors.delete(value);
    return text;
  }
  return JSON.stringify(String(value));
}

function renderArray(items: readonly unknown[], ancestors: Set<object>): string {
  return `[${items.map((item) => render(item, ancestors)).join(', ')}]`;
}

function renderObject(entries: object, ancestors: Set<object>): string {
  const parts: string[] = [];
  for (const [key, item] of Object.entries(entries)) {
    if (item === undefined) continue;
    parts.push(`${JSON.stringify(key)}: ${render(item, ancestors)}`);
  }
  return `{${parts.join(', ')}}`;
}
