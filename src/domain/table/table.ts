/**
 * Column-aware row set. A column is present iff it is listed in `columns`;
 * optional join keys (smokingStatus, group, sumInsured) are decided by presence, never by sniffing values.
 */

export type ColumnOf<R> = keyof R & string;

export type Table<R> = {
  columns: ReadonlyArray<ColumnOf<R>>;
  rows: ReadonlyArray<R>;
};

function isColumnOf<R extends object>(row: R, key: string): key is ColumnOf<R> {
  return key in row;
}

/**
 * Builds a table from records. When columns are not given, a column is present
 * if at least one row carries a defined value for it.
 */
export function tableOf<R extends object>(rows: ReadonlyArray<R>, columns?: ReadonlyArray<ColumnOf<R>>): Table<R> {
  if (columns) return { columns: [...columns], rows };
  const seen = new Set<ColumnOf<R>>();
  const ordered: ColumnOf<R>[] = [];
  for (const row of rows) {
    for (const [key, value] of Object.entries(row)) {
      if (value === undefined || !isColumnOf(row, key)) continue;
      if (!seen.has(key)) {
        seen.add(key);
        ordered.push(key);
      }
    }
  }
  return { columns: ordered, rows };
}

export function hasColumn<R>(table: Table<R>, column: string): boolean {
  const columns: ReadonlyArray<string> = table.columns;
  return columns.includes(column);
}

/** Same columns, different rows (filters and projections keep the source schema). */
export function withRows<R>(table: Table<R>, rows: ReadonlyArray<R>): Table<R> {
  return { columns: table.columns, rows };
}
