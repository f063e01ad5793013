/**
 * packages/core/src/debug/types.ts — Trace record type definitions.
 *
 * Trace records are the logging channel of the dashboard: the terminal owns
 * stdout, so navigation, refresh and process activity is recorded into a
 * bounded in-memory ring and optionally mirrored to a sink (a log file).
 */

/**
 * Trace record categories:
 *   - navigation: page switches, back navigation, overlays
 *   - refresh: loop activation, cancellation, refresh outcomes
 *   - input: key routing
 *   - process: external command runs
 *   - error: failures surfaced to the user
 */
export type TraceCategory = "navigation" | "refresh" | "input" | "process" | "error";

/**
 * Severity levels (low to high).
 */
export type TraceSeverity = "trace" | "info" | "warn" | "error";

export type TraceRecord = Readonly<{
  /** Monotonic record counter, starting at 1. */
  recordId: number;
  timestampMs: number;
  category: TraceCategory;
  severity: TraceSeverity;
  message: string;
  detail?: Readonly<Record<string, string | number | boolean>>;
}>;

export type TraceQuery = Readonly<{
  category?: TraceCategory;
  minSeverity?: TraceSeverity;
  /** Return at most this many of the newest matching records. */
  limit?: number;
}>;

export type TraceStats = Readonly<{
  totalRecords: number;
  /** Records evicted from the ring because it was full. */
  totalDropped: number;
  errorCount: number;
  warnCount: number;
  currentRingUsage: number;
  ringCapacity: number;
}>;

export type TraceLogOptions = Readonly<{
  /** Ring capacity (default: 512). */
  capacity?: number;
  /** Records below this severity are discarded (default: "info"). */
  minSeverity?: TraceSeverity;
  /** Clock used for timestamps (default: Date.now). */
  now?: () => number;
}>;

export type TraceHandler = (record: TraceRecord) => void;
