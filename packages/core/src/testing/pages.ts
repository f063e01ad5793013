import type { PageView } from "../navigation/types.js";
import { createSignalChannel } from "../refresh/signalChannel.js";
import type { VNode } from "../widgets/types.js";
import { ui } from "../widgets/ui.js";

export type TestPage = PageView &
  Readonly<{
    refreshCalls: () => number;
    disposed: () => boolean;
    selection: () => Readonly<{ row: number; column: number }> | null;
  }>;

export type TestPageOptions = Readonly<{
  /** Replaces the default no-op refresh. */
  refresh?: (signal: AbortSignal, call: number) => Promise<void>;
}>;

/**
 * Minimal PageView that counts refreshes and draws its own name.
 */
export function createTestPage(name: string, opts: TestPageOptions = {}): TestPage {
  const signal = createSignalChannel();
  let calls = 0;
  let isDisposed = false;
  let selection: { row: number; column: number } | null = null;
  const refreshImpl = opts.refresh;

  return {
    name,
    signal,
    async refresh(abort: AbortSignal) {
      calls++;
      if (refreshImpl) await refreshImpl(abort, calls);
    },
    draw: (): VNode => ui.text(`${name}#${String(calls)}`),
    select(row: number, column: number) {
      selection = { row, column };
    },
    dispose() {
      isDisposed = true;
      signal.close();
    },
    refreshCalls: () => calls,
    disposed: () => isDisposed,
    selection: () => selection,
  };
}
