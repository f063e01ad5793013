/**
 * packages/core/src/refresh/signalChannel.ts — Coalescing wake-up channel.
 *
 * Logical capacity 1: a notification posted while one is already pending
 * collapses into it. A pending notification is consumed when the waiting
 * consumer resumes, not when it is posted, so any number of notify() calls
 * issued before the consumer runs yield a single wake-up.
 *
 * Single consumer: at most one wait() may be outstanding.
 */

import { KubenavError } from "../errors.js";

export type SignalWaitResult = "signal" | "cancelled" | "closed";

export type SignalChannel = Readonly<{
  /**
   * Post a notification. Never blocks.
   * @returns false when it collapsed into a pending one or the channel is closed
   */
  notify: () => boolean;
  /** True while a posted notification has not been consumed. */
  pending: () => boolean;
  /**
   * Wait for a notification or for `signal` to abort, whichever comes first.
   * Abort is checked before a pending notification.
   */
  wait: (signal: AbortSignal) => Promise<SignalWaitResult>;
  /** Close the channel. An outstanding wait() resolves "closed". */
  close: () => void;
  closed: () => boolean;
}>;

export function createSignalChannel(): SignalChannel {
  let isPending = false;
  let isClosed = false;
  let wake: (() => void) | null = null;

  function wakeWaiter(): void {
    const w = wake;
    wake = null;
    if (w) w();
  }

  async function wait(signal: AbortSignal): Promise<SignalWaitResult> {
    if (wake !== null) {
      throw new KubenavError("KNAV_INVALID_STATE", "signal channel already has a waiting consumer");
    }
    for (;;) {
      if (signal.aborted) return "cancelled";
      if (isClosed) return "closed";
      if (isPending) {
        isPending = false;
        return "signal";
      }

      await new Promise<void>((resolve) => {
        const onAbort = (): void => {
          if (wake === release) wake = null;
          release();
        };
        const release = (): void => {
          signal.removeEventListener("abort", onAbort);
          resolve();
        };
        wake = release;
        signal.addEventListener("abort", onAbort, { once: true });
      });
    }
  }

  return Object.freeze({
    notify: () => {
      if (isClosed || isPending) return false;
      isPending = true;
      wakeWaiter();
      return true;
    },
    pending: () => isPending,
    wait,
    close: () => {
      if (isClosed) return;
      isClosed = true;
      isPending = false;
      wakeWaiter();
    },
    closed: () => isClosed,
  });
}
