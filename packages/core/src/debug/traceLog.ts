/**
 * packages/core/src/debug/traceLog.ts — Bounded trace log.
 *
 * Usage:
 *   const trace = createTraceLog({ minSeverity: "trace" });
 *   trace.record("navigation", "info", "switch", { page: "pods" });
 *   const errors = trace.query({ category: "error" });
 */

import { invalidProps } from "../errors.js";
import {
  TRACE_DEFAULT_CAPACITY,
  TRACE_DEFAULT_MIN_SEVERITY,
  severityAtLeast,
} from "./constants.js";
import type {
  TraceCategory,
  TraceHandler,
  TraceLogOptions,
  TraceQuery,
  TraceRecord,
  TraceSeverity,
  TraceStats,
} from "./types.js";

export type TraceDetail = Readonly<Record<string, string | number | boolean>>;

export interface TraceLog {
  /**
   * Append a record. Returns the stored record, or null when it was filtered
   * out by `minSeverity`.
   */
  record(
    category: TraceCategory,
    severity: TraceSeverity,
    message: string,
    detail?: TraceDetail,
  ): TraceRecord | null;

  /** Matching records, oldest first. */
  query(filter?: TraceQuery): readonly TraceRecord[];

  /**
   * Subscribe to new records.
   * @returns Unsubscribe function
   */
  subscribe(handler: TraceHandler): () => void;

  clear(): void;

  stats(): TraceStats;
}

function normalizeCapacity(value: number | undefined): number {
  if (value === undefined) return TRACE_DEFAULT_CAPACITY;
  if (!Number.isInteger(value) || value <= 0) {
    invalidProps("trace capacity must be a positive integer");
  }
  return value;
}

export function createTraceLog(opts: TraceLogOptions = {}): TraceLog {
  const capacity = normalizeCapacity(opts.capacity);
  const minSeverity = opts.minSeverity ?? TRACE_DEFAULT_MIN_SEVERITY;
  const now = opts.now ?? Date.now;

  const ring: TraceRecord[] = [];
  const handlers = new Set<TraceHandler>();
  let nextRecordId = 1;
  let totalDropped = 0;
  let errorCount = 0;
  let warnCount = 0;

  return {
    record(category, severity, message, detail) {
      if (!severityAtLeast(severity, minSeverity)) return null;

      const entry: TraceRecord = Object.freeze({
        recordId: nextRecordId++,
        timestampMs: now(),
        category,
        severity,
        message,
        ...(detail === undefined ? {} : { detail: Object.freeze({ ...detail }) }),
      });

      ring.push(entry);
      if (ring.length > capacity) {
        ring.shift();
        totalDropped++;
      }
      if (severity === "error") errorCount++;
      if (severity === "warn") warnCount++;

      for (const handler of handlers) {
        handler(entry);
      }
      return entry;
    },

    query(filter = {}) {
      const matched = ring.filter((entry) => {
        if (filter.category !== undefined && entry.category !== filter.category) return false;
        if (filter.minSeverity !== undefined && !severityAtLeast(entry.severity, filter.minSeverity)) {
          return false;
        }
        return true;
      });
      const limit = filter.limit;
      if (limit !== undefined && limit >= 0 && matched.length > limit) {
        return Object.freeze(matched.slice(matched.length - limit));
      }
      return Object.freeze(matched);
    },

    subscribe(handler) {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },

    clear() {
      ring.length = 0;
    },

    stats() {
      return Object.freeze({
        totalRecords: nextRecordId - 1,
        totalDropped,
        errorCount,
        warnCount,
        currentRingUsage: ring.length,
        ringCapacity: capacity,
      });
    },
  };
}

/**
 * Single-line rendering used by file sinks.
 */
export function formatTraceRecord(entry: TraceRecord): string {
  const stamp = new Date(entry.timestampMs).toISOString();
  let line = `${stamp} ${entry.severity.toUpperCase().padEnd(5)} [${entry.category}] ${entry.message}`;
  if (entry.detail) {
    const keys = Object.keys(entry.detail).sort();
    for (const key of keys) {
      line += ` ${key}=${String(entry.detail[key])}`;
    }
  }
  return line;
}

/**
 * Trace log that records nothing. Used when callers pass no log.
 */
export const NULL_TRACE_LOG: TraceLog = Object.freeze({
  record: () => null,
  query: () => Object.freeze([]),
  subscribe: () => () => {},
  clear: () => {},
  stats: () =>
    Object.freeze({
      totalRecords: 0,
      totalDropped: 0,
      errorCount: 0,
      warnCount: 0,
      currentRingUsage: 0,
      ringCapacity: 0,
    }),
});
