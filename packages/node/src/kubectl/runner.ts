/**
 * kubectl process runner.
 *
 * Every call prepends the configured `--context` and `--kubeconfig` flags.
 * Namespace selection is left to callers: some commands take `-n`, some
 * `--all-namespaces`, and cluster-scoped kinds take neither.
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { KubenavError, NULL_TRACE_LOG, type TraceLog } from "@kubenav/core";

export type KubectlRunnerOptions = Readonly<{
  /** Executable to spawn (default: "kubectl"). */
  kubectlPath?: string;
  context?: string;
  kubeconfig?: string;
  /** Namespace resource pages are restricted to. All namespaces when unset. */
  namespace?: string;
  trace?: TraceLog;
}>;

export type KubectlRunOptions = Readonly<{ signal?: AbortSignal }>;

export interface KubectlRunner {
  readonly namespace: string | undefined;
  /** Run to completion and return stdout. Rejects with KNAV_PROCESS_FAILED. */
  run(args: readonly string[], opts?: KubectlRunOptions): Promise<string>;
  /**
   * Run a long-lived command (`logs -f`), calling `onLine` per stdout line.
   * Resolves when the process exits or `signal` aborts it.
   */
  stream(args: readonly string[], onLine: (line: string) => void, signal: AbortSignal): Promise<void>;
  /** Run with the terminal's stdin/stdout (`edit`, `exec -it`). */
  interactive(args: readonly string[]): Promise<void>;
}

function processFailed(args: readonly string[], stderr: string, fallback: string): KubenavError {
  const detail = stderr.trim();
  return new KubenavError(
    "KNAV_PROCESS_FAILED",
    detail.length > 0 ? detail : `kubectl ${args.join(" ")}: ${fallback}`,
  );
}

function exitDescription(code: number | null, signal: NodeJS.Signals | null): string {
  if (signal !== null) return `killed by ${signal}`;
  return `exited with code ${String(code)}`;
}

export function createKubectlRunner(opts: KubectlRunnerOptions = {}): KubectlRunner {
  const kubectlPath = opts.kubectlPath ?? "kubectl";
  const trace = opts.trace ?? NULL_TRACE_LOG;
  const globalArgs: string[] = [];
  if (opts.context) globalArgs.push("--context", opts.context);
  if (opts.kubeconfig) globalArgs.push("--kubeconfig", opts.kubeconfig);
  const namespace = opts.namespace && opts.namespace.length > 0 ? opts.namespace : undefined;

  const fullArgs = (args: readonly string[]): string[] => [...globalArgs, ...args];

  function run(args: readonly string[], runOpts: KubectlRunOptions = {}): Promise<string> {
    trace.record("process", "info", "kubectl", { args: args.join(" ") });
    return new Promise<string>((resolve, reject) => {
      const child = spawn(kubectlPath, fullArgs(args), {
        stdio: ["ignore", "pipe", "pipe"],
        ...(runOpts.signal ? { signal: runOpts.signal } : {}),
      });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.once("error", (error) => {
        if (settled) return;
        settled = true;
        trace.record("process", "warn", "kubectl failed to start", { error: error.message });
        reject(processFailed(args, "", error.message));
      });
      child.once("close", (code, signal) => {
        if (settled) return;
        settled = true;
        if (code === 0) {
          resolve(Buffer.concat(stdout).toString("utf8"));
          return;
        }
        const err = processFailed(args, Buffer.concat(stderr).toString("utf8"), exitDescription(code, signal));
        trace.record("process", "warn", "kubectl failed", { args: args.join(" "), error: err.message });
        reject(err);
      });
    });
  }

  function stream(
    args: readonly string[],
    onLine: (line: string) => void,
    signal: AbortSignal,
  ): Promise<void> {
    trace.record("process", "info", "kubectl stream", { args: args.join(" ") });
    return new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const child = spawn(kubectlPath, fullArgs(args), {
        stdio: ["ignore", "pipe", "pipe"],
        signal,
      });
      const stderr: Buffer[] = [];
      let settled = false;
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
      const lines = createInterface({ input: child.stdout, crlfDelay: Number.POSITIVE_INFINITY });
      lines.on("line", onLine);

      child.once("error", (error) => {
        if (settled) return;
        settled = true;
        if (signal.aborted) {
          resolve();
          return;
        }
        reject(processFailed(args, "", error.message));
      });
      child.once("close", (code, exitSignal) => {
        if (settled) return;
        settled = true;
        if (code === 0 || signal.aborted) {
          resolve();
          return;
        }
        reject(processFailed(args, Buffer.concat(stderr).toString("utf8"), exitDescription(code, exitSignal)));
      });
    });
  }

  function interactive(args: readonly string[]): Promise<void> {
    trace.record("process", "info", "kubectl interactive", { args: args.join(" ") });
    return new Promise<void>((resolve, reject) => {
      const child = spawn(kubectlPath, fullArgs(args), { stdio: ["inherit", "inherit", "pipe"] });
      const stderr: Buffer[] = [];
      let settled = false;
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
      child.once("error", (error) => {
        if (settled) return;
        settled = true;
        reject(processFailed(args, "", error.message));
      });
      child.once("close", (code, signal) => {
        if (settled) return;
        settled = true;
        if (code === 0) {
          resolve();
          return;
        }
        reject(processFailed(args, Buffer.concat(stderr).toString("utf8"), exitDescription(code, signal)));
      });
    });
  }

  return Object.freeze({ namespace, run, stream, interactive });
}
