/**
 * Record Utilities
 * Schema-optional accessors over untyped upstream JSON. Every accessor takes
 * a fallback for missing or mistyped fields and never throws.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(record: unknown, key: string): unknown {
  return isRecord(record) ? record[key] : undefined;
}

/**
 * Read a scalar as text; numbers and booleans are stringified
 */
export function getString(record: unknown, key: string, fallback: string): string {
  const value = field(record, key);
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

export function getNumber(record: unknown, key: string, fallback: number): number {
  const value = field(record, key);
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function getFlag(record: unknown, key: string): boolean {
  return Boolean(field(record, key));
}

export function getArray(record: unknown, key: string): unknown[] {
  const value = field(record, key);
  return Array.isArray(value) ? value : [];
}

export function getRecords(record: unknown, key: string): JsonRecord[] {
  return getArray(record, key).filter(isRecord);
}

/**
 * Scalar list entries as text, e.g. modes ["tube"] or zones [1, "2"]
 */
export function getStringList(record: unknown, key: string): string[] {
  return getArray(record, key)
    .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
    .map(String);
}

/**
 * Pluck one text field from every object in a list, e.g. line names
 */
export function pluckStrings(record: unknown, listKey: string, key: string): string[] {
  return getRecords(record, listKey).map(item => getString(item, key, ''));
}

/**
 * Narrow a payload to its object entries; null when it is not a list
 */
export function asRecordList(value: unknown): JsonRecord[] | null {
  return Array.isArray(value) ? value.filter(isRecord) : null;
}
