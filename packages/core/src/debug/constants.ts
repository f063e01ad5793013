import type { TraceSeverity } from "./types.js";

export const TRACE_DEFAULT_CAPACITY = 512;

export const TRACE_DEFAULT_MIN_SEVERITY: TraceSeverity = "info";

/* --- Severity ranks (match ordering trace < info < warn < error) --- */

export const TRACE_SEV_RANK: Readonly<Record<TraceSeverity, number>> = Object.freeze({
  trace: 0,
  info: 1,
  warn: 2,
  error: 3,
});

export function severityAtLeast(severity: TraceSeverity, min: TraceSeverity): boolean {
  return TRACE_SEV_RANK[severity] >= TRACE_SEV_RANK[min];
}
