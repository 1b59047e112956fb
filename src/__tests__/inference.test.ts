import { describe, it, expect } from 'vitest';
import { discoverExtraFields, inferColumnType, inferColumnTypes, valueKind, type ValueKind } from '../inference';

describe('valueKind', () => {
  it('classifies JSON values', () => {
    expect(valueKind(3)).toBe('integer');
    expect(valueKind(-1.5)).toBe('float');
    expect(valueKind(false)).toBe('boolean');
    expect(valueKind({ a: 1 })).toBe('structured');
    expect(valueKind([1, 2])).toBe('structured');
    expect(valueKind('x')).toBe('string');
    expect(valueKind(new Date(0))).toBe('other');
  });
});

describe('inferColumnType', () => {
  it('maps a single kind deterministically', () => {
    const cases: Array<[ValueKind, string]> = [
      ['integer', 'integer'],
      ['float', 'double'],
      ['boolean', 'boolean'],
      ['structured', 'json'],
      ['string', 'string'],
      ['other', 'string'],
    ];
    for (const [kind, type] of cases) expect(inferColumnType(new Set([kind]))).toBe(type);
  });

  it('falls back to string for zero or mixed kinds', () => {
    expect(inferColumnType(new Set())).toBe('string');
    expect(inferColumnType(new Set<ValueKind>(['integer', 'string']))).toBe('string');
    expect(inferColumnType(new Set<ValueKind>(['integer', 'float']))).toBe('string');
  });
});

describe('discoverExtraFields', () => {
  it('skips known fields, the primary key and null values', () => {
    const observed = discoverExtraFields(new Set(['name']), 'id', { id: 1, name: 'Ann', age: 30, note: null });
    expect(observed).toEqual(new Map([['age', new Set(['integer'])]]));
  });

  it('unions kinds across documents', () => {
    const observed = discoverExtraFields(new Set(), 'id', { score: 3 });
    discoverExtraFields(new Set(), 'id', {}, observed);
    discoverExtraFields(new Set(), 'id', { score: 'x', ratio: 0.25 }, observed);
    expect(observed).toEqual(
      new Map([
        ['score', new Set(['integer', 'string'])],
        ['ratio', new Set(['float'])],
      ]),
    );
    expect(inferColumnTypes(observed)).toEqual(
      new Map([
        ['score', 'string'],
        ['ratio', 'double'],
      ]),
    );
  });

  it('honours a custom primary key', () => {
    const observed = discoverExtraFields(new Set(), 'uid', { uid: 4, id: 'external' });
    expect([...observed.keys()]).toEqual(['id']);
  });
});
