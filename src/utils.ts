import type { Document } from './types';

export function isPlainDocument(value: unknown): value is Document {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Integer identifiers are the only keys this engine understands. */
export function isIntegerKey(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}
