import type { Document, ScalarType } from './types';

/**
 * Concrete kinds of JSON values. `structured` covers both mappings and sequences;
 * `other` is anything a document may carry that has no column mapping (e.g. a Date).
 */
export type ValueKind = 'integer' | 'float' | 'boolean' | 'structured' | 'string' | 'other';

/** fieldname -> kinds observed across the documents of one call */
export type ObservedKinds = Map<string, Set<ValueKind>>;

export function valueKind(value: unknown): ValueKind {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float';
    case 'bigint':
      return 'integer';
    case 'object':
      if (value === null) return 'other';
      if (Array.isArray(value)) return 'structured';
      return Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null
        ? 'structured'
        : 'other';
    default:
      return 'other';
  }
}

/**
 * Accumulate the kinds of top-level keys that are neither known nor the primary key.
 * Null values carry no type information and are skipped.
 */
export function discoverExtraFields(
  known: ReadonlySet<string>,
  primaryKey: string,
  document: Document,
  observed: ObservedKinds = new Map(),
): ObservedKinds {
  for (const [fieldname, value] of Object.entries(document)) {
    if (known.has(fieldname)) continue;
    if (fieldname === primaryKey) continue;
    if (value === null || value === undefined) continue;
    let kinds = observed.get(fieldname);
    if (!kinds) {
      kinds = new Set();
      observed.set(fieldname, kinds);
    }
    kinds.add(valueKind(value));
  }
  return observed;
}

/**
 * Storage type for a newly discovered field. Anything other than exactly one
 * mappable kind becomes a string column.
 */
export function inferColumnType(kinds: ReadonlySet<ValueKind>): ScalarType {
  if (kinds.size === 1) {
    const [kind] = kinds;
    if (kind === 'integer') return 'integer';
    if (kind === 'structured') return 'json';
    if (kind === 'boolean') return 'boolean';
    if (kind === 'float') return 'double';
  }
  return 'string';
}

export function inferColumnTypes(observed: ObservedKinds): Map<string, ScalarType> {
  const out = new Map<string, ScalarType>();
  for (const [fieldname, kinds] of observed) out.set(fieldname, inferColumnType(kinds));
  return out;
}
