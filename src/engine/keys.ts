/**
 * Composite keys for hash joins between cell tables.
 * Optional parts are included only when the caller decides both sides carry the column.
 */

const SEPARATOR = "␟";

export type KeyPart = string | number | undefined;

/** Undefined parts encode as empty. */
export function compositeKey(parts: ReadonlyArray<KeyPart>): string {
  return parts.map((p) => (p === undefined ? "" : String(p))).join(SEPARATOR);
}

/** Groups rows by key, preserving input order within each bucket. */
export function indexBy<R>(rows: ReadonlyArray<R>, keyOf: (row: R) => string): Map<string, R[]> {
  const index = new Map<string, R[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const bucket = index.get(key);
    if (bucket) bucket.push(row);
    else index.set(key, [row]);
  }
  return index;
}

/** Keeps the first row per key (the first-match semantics of a row scan). */
export function indexFirstBy<R>(rows: ReadonlyArray<R>, keyOf: (row: R) => string): Map<string, R> {
  const index = new Map<string, R>();
  for (const row of rows) {
    const key = keyOf(row);
    if (!index.has(key)) index.set(key, row);
  }
  return index;
}
