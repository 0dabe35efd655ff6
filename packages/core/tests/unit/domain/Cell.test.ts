import { describe, it, expect } from 'vitest';
import { toCell, isStructured } from '../../../src/domain/model/Cell.js';
import { createDataset, createDatasetFromRows } from '../../../src/domain/model/Dataset.js';
import { toJsonText } from '../../../src/domain/services/JsonText.js';
import { DataError } from '../../../src/domain/errors/TransferErrors.js';

describe('toCell', () => {
  it('should tag nullish values and NaN as null', () => {
    expect(toCell(null)).toEqual({ kind: 'null' });
    expect(toCell(undefined)).toEqual({ kind: 'null' });
    expect(toCell(Number.NaN)).toEqual({ kind: 'null' });
  });

  it('should tag arrays and plain objects as structured before anything else', () => {
    expect(toCell([])).toEqual({ kind: 'structured', value: [] });
    expect(toCell({ a: 1 })).toEqual({ kind: 'structured', value: { a: 1 } });
  });

  it('should tag booleans before numbers', () => {
    expect(toCell(true)).toEqual({ kind: 'bool', value: true });
    expect(toCell(0)).toEqual({ kind: 'number', value: 0 });
  });

  it('should parse numeric text only for numeric columns', () => {
    expect(toCell('42', 'integer')).toEqual({ kind: 'number', value: 42 });
    expect(toCell('12345678901234567890', 'integer')).toEqual({ kind: 'number', value: 12345678901234567890n });
    expect(toCell('2.5', 'float')).toEqual({ kind: 'number', value: 2.5 });
    expect(toCell('42', 'text')).toEqual({ kind: 'text', value: '42' });
    expect(toCell('n/a', 'integer')).toEqual({ kind: 'text', value: 'n/a' });
  });

  it('should render dates as ISO text and bytes as base64', () => {
    expect(toCell(new Date('2024-01-02T03:04:05Z'))).toEqual({ kind: 'text', value: '2024-01-02T03:04:05.000Z' });
    expect(toCell(new Date('not a date'))).toEqual({ kind: 'null' });
    expect(toCell(new Uint8Array([104, 105]))).toEqual({ kind: 'text', value: 'aGk=' });
  });

  it('should reject functions and symbols', () => {
    expect(() => toCell(() => 1)).toThrow(DataError);
    expect(() => toCell(Symbol('s'))).toThrow(DataError);
  });

  it('should not treat class instances as structured', () => {
    expect(isStructured(new Map())).toBe(false);
    expect(toCell(new URL('https://example.test/a'))).toEqual({ kind: 'text', value: 'https://example.test/a' });
  });
});

describe('toJsonText', () => {
  it('should use spaced separators', () => {
    expect(toJsonText({ a: [1, 2], b: { c: null } })).toBe('{"a": [1, 2], "b": {"c": null}}');
  });

  it('should handle values JSON cannot', () => {
    expect(toJsonText([10n, Number.NaN, undefined])).toBe('[10, null, null]');
    expect(toJsonText({ skipped: undefined, kept: 1 })).toBe('{"kept": 1}');
  });

  it('should reject circular references', () => {
    const looped: { self?: unknown } = {};
    looped.self = looped;
    expect(() => toJsonText(looped)).toThrow(DataError);
  });
});

describe('createDataset', () => {
  it('should build rows in column order from keyed records', () => {
    const dataset = createDataset(
      [
        { name: 'id', type: 'integer' },
        { name: 'city', type: 'text' },
      ],
      [{ city: 'Lyon', id: 7 }, { id: 8 }],
    );

    expect(dataset.rows).toEqual([
      [
        { kind: 'number', value: 7 },
        { kind: 'text', value: 'Lyon' },
      ],
      [{ kind: 'number', value: 8 }, { kind: 'null' }],
    ]);
  });

  it('should reject rows whose width differs from the column count', () => {
    expect(() => createDatasetFromRows([{ name: 'a', type: 'text' }], [['x', 'y']])).toThrow(
      'Row 0 has 2 values, expected 1',
    );
  });
});
