import { describe, expect, it } from 'vitest';

import { buildSnapshot, parseSnapshot } from '@valscope/printer';

import { formatTypeTable } from './format-type-table.js';

const registryOf = (types: unknown[]) =>
  buildSnapshot(parseSnapshot({ bucketCount: 1, types, value: null })).registry;

describe('formatTypeTable', () => {
  it('describes records with their field names', () => {
    const lines = formatTypeTable(
      registryOf([
        { kind: 'record', name: 'geo.Point', fields: ['x', 'y'] },
        { kind: 'record', name: 'geo.Unit', fields: [] },
      ]),
    );

    expect(lines).toEqual(['bucket 0: record geo.Point { x, y }', 'bucket 0: record geo.Unit { }']);
  });

  it('describes enum cases by arity or field names', () => {
    const lines = formatTypeTable(
      registryOf([
        {
          kind: 'enum',
          name: 'geo.Shape',
          variants: [
            { name: 'Dot' },
            { name: 'Circle', arity: 1 },
            { name: 'Rect', fields: ['w', 'h'] },
          ],
        },
      ]),
    );

    expect(lines).toEqual(['bucket 0: enum geo.Shape = Dot | Circle(1) | Rect { w, h }']);
  });

  it('returns no lines for an empty table', () => {
    expect(formatTypeTable(registryOf([]))).toEqual([]);
  });
});
