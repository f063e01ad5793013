import { setImmediate as nextMacrotask } from "node:timers/promises";

/**
 * Let every queued microtask and one macrotask turn run.
 */
export async function flushAsync(turns = 3): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await nextMacrotask();
  }
}

/**
 * Poll `predicate` on macrotask boundaries until it holds.
 */
export async function waitFor(
  predicate: () => boolean,
  opts: Readonly<{ timeoutMs?: number; label?: string }> = {},
): Promise<void> {
  const timeoutMs = opts.timeoutMs ?? 2000;
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error(`waitFor timed out after ${String(timeoutMs)}ms${opts.label ? `: ${opts.label}` : ""}`);
    }
    await nextMacrotask();
  }
}

export type Deferred<T> = Readonly<{
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}>;

export function createDeferred<T>(): Deferred<T> {
  let resolve: ((value: T) => void) | undefined;
  let reject: ((error: unknown) => void) | undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return Object.freeze({
    promise,
    resolve: (value: T) => resolve?.(value),
    reject: (error: unknown) => reject?.(error),
  });
}
