// ============================================================================
// Field Access Helpers
// ============================================================================
// Narrowing helpers for vendor JSON. A field that is missing or has the wrong
// type becomes null (or an empty collection), never an exception.
// ============================================================================

export type JsonRecord = Record<string, unknown>;

export function asRecord(value: unknown): JsonRecord | undefined {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  const record: JsonRecord = Object.fromEntries(Object.entries(value));
  return record;
}

/** Array elements that are objects; anything else yields [] */
export function recordList(value: unknown): JsonRecord[] {
  if (!Array.isArray(value)) return [];
  const records: JsonRecord[] = [];
  for (const item of value) {
    const record = asRecord(item);
    if (record) records.push(record);
  }
  return records;
}

export function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/** Accepts numbers and numeric strings ("9.8") */
export function scoreOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Project one string attribute from each record, dropping absent ones */
export function pluckStrings(records: JsonRecord[], key: string): string[] {
  const out: string[] = [];
  for (const record of records) {
    const value = record[key];
    if (typeof value === 'string') out.push(value);
  }
  return out;
}
