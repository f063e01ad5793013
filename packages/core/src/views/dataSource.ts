import type { TableRow } from "../widgets/types.js";

/**
 * Supplies rows and columns for one table page. The core never decides how
 * data is fetched; it only asks for a refresh and reads the result.
 */
export interface DataSource {
  /** Re-fetch. Rejects on failure, keeping the previous header/data. */
  refresh(signal: AbortSignal): Promise<void>;
  header(): readonly string[];
  data(): readonly TableRow[];
}

export type TableData = Readonly<{
  header: readonly string[];
  rows: readonly TableRow[];
}>;

export type FetchTable = (signal: AbortSignal) => Promise<TableData>;

/**
 * DataSource backed by a fetch function. The last successful result is kept.
 */
export function createDataFeeder(fetch: FetchTable): DataSource {
  let header: readonly string[] = Object.freeze([]);
  let rows: readonly TableRow[] = Object.freeze([]);

  return {
    async refresh(signal) {
      const next = await fetch(signal);
      header = Object.freeze(next.header.slice());
      rows = Object.freeze(next.rows.map((row) => Object.freeze(row.slice())));
    },
    header: () => header,
    data: () => rows,
  };
}
