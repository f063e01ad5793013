import type { KubectlRunner } from "../../kubectl/runner.js";

export type FakeCall = Readonly<{
  mode: "run" | "stream" | "interactive";
  args: readonly string[];
}>;

export type FakeRunnerOptions = Readonly<{
  namespace?: string;
  /** stdout for `run`, or an Error to reject with. Default: "". */
  respond?: (args: readonly string[]) => string | Error;
  /** Lines `stream` emits before waiting for its abort signal. */
  streamLines?: readonly string[];
}>;

export type FakeRunner = KubectlRunner &
  Readonly<{
    calls: () => readonly FakeCall[];
    lastArgs: () => readonly string[] | undefined;
    /** Streams whose signal has not aborted yet. */
    openStreams: () => number;
  }>;

/**
 * In-process KubectlRunner: records every call and answers from `respond`.
 */
export function createFakeRunner(opts: FakeRunnerOptions = {}): FakeRunner {
  const calls: FakeCall[] = [];
  let streams = 0;
  const respond = opts.respond ?? (() => "");

  const answer = (args: readonly string[]): Promise<string> => {
    const out = respond(args);
    return out instanceof Error ? Promise.reject(out) : Promise.resolve(out);
  };

  return {
    namespace: opts.namespace,
    async run(args) {
      calls.push({ mode: "run", args });
      return answer(args);
    },
    stream(args, onLine, signal) {
      calls.push({ mode: "stream", args });
      for (const line of opts.streamLines ?? []) {
        onLine(line);
      }
      return new Promise<void>((resolve) => {
        if (signal.aborted) {
          resolve();
          return;
        }
        streams++;
        signal.addEventListener(
          "abort",
          () => {
            streams--;
            resolve();
          },
          { once: true },
        );
      });
    },
    async interactive(args) {
      calls.push({ mode: "interactive", args });
      await answer(args);
    },
    calls: () => calls.slice(),
    lastArgs: () => calls[calls.length - 1]?.args,
    openStreams: () => streams,
  };
}

/**
 * kubectl-style table text: every column but the last padded to its width.
 */
export function kubectlTable(rows: readonly (readonly string[])[]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, c) => {
      widths[c] = Math.max(widths[c] ?? 0, cell.length + 3);
    });
  }
  const lines = rows.map((row) =>
    row
      .map((cell, c) => (c === row.length - 1 ? cell : cell.padEnd(widths[c] ?? 0)))
      .join(""),
  );
  return `${lines.join("\n")}\n`;
}
