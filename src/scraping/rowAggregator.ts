/**
 * Merges rows describing the same entity across several tables.
 */

export interface AggregatedRow {
  key: string;
  /** Concatenated row markup, in table order. */
  data: string;
  /** 1-based position of the key's first appearance. */
  rank: number;
}

/**
 * Group rows by key across `tables`. The first table decides the ordering and
 * rank; later tables append their markup to the matching entry. Rows whose key
 * cannot be determined (league totals, averages) are dropped.
 */
export function aggregateRows(
  tables: ReadonlyArray<readonly string[]>,
  keyOf: (row: string) => string | null,
): AggregatedRow[] {
  const byKey = new Map<string, AggregatedRow>();

  for (const rows of tables) {
    for (const row of rows) {
      const key = keyOf(row);
      if (!key) continue;

      const existing = byKey.get(key);
      if (existing) {
        existing.data += row;
      } else {
        byKey.set(key, { key, data: row, rank: byKey.size + 1 });
      }
    }
  }

  return [...byKey.values()];
}
