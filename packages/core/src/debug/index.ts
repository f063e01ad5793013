/**
 * packages/core/src/debug/index.ts — Trace log public exports.
 *
 * @example
 * ```ts
 * import { createTraceLog, type TraceLog } from "@kubenav/core";
 * ```
 */

export type {
  TraceCategory,
  TraceHandler,
  TraceLogOptions,
  TraceQuery,
  TraceRecord,
  TraceSeverity,
  TraceStats,
} from "./types.js";

export {
  TRACE_DEFAULT_CAPACITY,
  TRACE_DEFAULT_MIN_SEVERITY,
  TRACE_SEV_RANK,
  severityAtLeast,
} from "./constants.js";

export {
  createTraceLog,
  formatTraceRecord,
  NULL_TRACE_LOG,
  type TraceDetail,
  type TraceLog,
} from "./traceLog.js";
