/**
 * packages/core/src/refresh/refreshCoordinator.ts — One live refresh loop.
 *
 * Each activation owns a fresh AbortController and runs one loop:
 *
 *   Idle → Watching → Cancelled
 *
 * The loop waits on the page's signal channel or its abort signal, first one
 * wins. A signal runs `page.refresh()` to completion before the next wait.
 * Activations are disposable: switching back to a page attaches a new loop,
 * a cancelled one is never resumed.
 *
 * Invariants:
 *   - at most one activation is Watching at any instant
 *   - a Cancelled loop makes no further onRefreshed/onError calls, even when
 *     a fetch that was in flight at cancellation completes later
 *   - failures are reported and the loop keeps watching; only cancellation
 *     stops it
 */

import { NULL_TRACE_LOG, type TraceLog } from "../debug/traceLog.js";
import { describeError } from "../errors.js";
import type { SignalChannel } from "./signalChannel.js";

export type RefreshTarget = Readonly<{
  name: string;
  signal: SignalChannel;
  refresh: (signal: AbortSignal) => Promise<void>;
}>;

export type ActivationState = "idle" | "watching" | "cancelled";

export type RefreshActivation = Readonly<{
  /** Monotonic activation id, starting at 1. */
  id: number;
  page: string;
  state: () => ActivationState;
  /** Number of completed refresh attempts (successful or failed). */
  refreshCount: () => number;
  /** Resolves when the loop has exited. */
  done: Promise<void>;
}>;

export type RefreshCoordinatorOptions = Readonly<{
  /** Called after a successful refresh so the surface redraws. */
  onRefreshed?: (page: string) => void;
  /** Called when a refresh failed. */
  onError?: (page: string, error: unknown) => void;
  trace?: TraceLog;
}>;

export type RefreshCoordinator = Readonly<{
  /** Cancel the current activation and attach a new loop to `target`. */
  activate: (target: RefreshTarget) => RefreshActivation;
  /** Cancel the current activation, if any. */
  cancel: () => void;
  /** The live activation; null once its loop has exited. */
  active: () => RefreshActivation | null;
  /** Activations currently Watching (0 or 1). */
  watchingCount: () => number;
  /** Resolves once every loop started so far has exited. */
  settled: () => Promise<void>;
}>;

type MutableActivation = {
  readonly id: number;
  readonly page: string;
  readonly controller: AbortController;
  state: ActivationState;
  refreshes: number;
  done: Promise<void>;
};

export function createRefreshCoordinator(
  opts: RefreshCoordinatorOptions = {},
): RefreshCoordinator {
  const trace = opts.trace ?? NULL_TRACE_LOG;
  const onRefreshed = opts.onRefreshed;
  const onError = opts.onError;

  let current: MutableActivation | null = null;
  let nextId = 1;
  const running = new Set<Promise<void>>();

  async function runLoop(act: MutableActivation, target: RefreshTarget): Promise<void> {
    const abort = act.controller.signal;
    act.state = "watching";
    trace.record("refresh", "trace", "loop watching", { page: act.page, activation: act.id });

    for (;;) {
      const woke = await target.signal.wait(abort);
      if (woke !== "signal") break;

      let failure: unknown = null;
      let failed = false;
      try {
        await target.refresh(abort);
      } catch (error) {
        failed = true;
        failure = error;
      }
      act.refreshes++;
      if (abort.aborted) break;

      if (failed) {
        trace.record("refresh", "warn", "refresh failed", {
          page: act.page,
          error: describeError(failure),
        });
        onError?.(act.page, failure);
      } else {
        trace.record("refresh", "trace", "refreshed", { page: act.page });
        onRefreshed?.(act.page);
      }
    }

    act.state = "cancelled";
    if (current === act) current = null;
    trace.record("refresh", "trace", "loop exited", { page: act.page, activation: act.id });
  }

  function cancelCurrent(): void {
    const act = current;
    if (!act) return;
    current = null;
    act.state = "cancelled";
    act.controller.abort();
    trace.record("refresh", "info", "loop cancelled", { page: act.page, activation: act.id });
  }

  return Object.freeze({
    activate: (target: RefreshTarget) => {
      cancelCurrent();

      const act: MutableActivation = {
        id: nextId++,
        page: target.name,
        controller: new AbortController(),
        state: "idle",
        refreshes: 0,
        done: Promise.resolve(),
      };
      current = act;

      const done = runLoop(act, target).catch((error: unknown) => {
        act.state = "cancelled";
        if (current === act) current = null;
        trace.record("error", "error", "refresh loop crashed", {
          page: act.page,
          error: describeError(error),
        });
        onError?.(act.page, error);
      });
      act.done = done;
      running.add(done);
      void done.finally(() => {
        running.delete(done);
      });

      return Object.freeze({
        id: act.id,
        page: act.page,
        state: () => act.state,
        refreshCount: () => act.refreshes,
        done,
      });
    },
    cancel: cancelCurrent,
    active: () => {
      const act = current;
      if (!act || act.state === "cancelled") return null;
      return Object.freeze({
        id: act.id,
        page: act.page,
        state: () => act.state,
        refreshCount: () => act.refreshes,
        done: act.done,
      });
    },
    watchingCount: () => (current !== null && current.state === "watching" ? 1 : 0),
    settled: async () => {
      await Promise.all(Array.from(running));
    },
  });
}
