/**
 * Row actions on resource tables. Each action shells out to kubectl and
 * reports failures as an error status over the current page.
 */

import {
  TextView,
  createConfirmDialog,
  describeError,
  NULL_TRACE_LOG,
  type PageAction,
  type PageController,
  type TableView,
  type TraceLog,
} from "@kubenav/core";
import type { KubectlRunner } from "./kubectl/runner.js";

const EXEC_SHELL = [
  "/bin/sh",
  "-c",
  "TERM=xterm-256color; export TERM; [ -x /bin/bash ] && ([ -x /usr/bin/script ] && /usr/bin/script -q -c /bin/bash /dev/null || exec /bin/bash) || exec /bin/sh",
];

/**
 * Background streams started by actions. At most one runs at a time.
 */
export type LogStreams = Readonly<{
  /** Stop the running stream, if any, and return a controller for a new one. */
  open: () => AbortController;
  stopAll: () => void;
  live: () => number;
}>;

export function createLogStreams(): LogStreams {
  const live = new Set<AbortController>();

  const stopAll = (): void => {
    for (const abort of Array.from(live)) {
      abort.abort();
    }
  };

  return Object.freeze({
    open: () => {
      stopAll();
      const abort = new AbortController();
      live.add(abort);
      abort.signal.addEventListener("abort", () => live.delete(abort), { once: true });
      return abort;
    },
    stopAll,
    live: () => live.size,
  });
}

export type ActionContext = Readonly<{
  controller: PageController;
  runner: KubectlRunner;
  streams: LogStreams;
  /** Hand the terminal to `task` and take it back afterwards. */
  suspend: (task: () => Promise<void>) => Promise<void>;
  requestDraw: () => void;
  trace?: TraceLog;
}>;

export type ResourceTarget = Readonly<{
  kind: string;
  namespace: string;
  name: string;
}>;

/**
 * Selected resource of `view`. Rows without a NAMESPACE column fall back to
 * the runner's namespace.
 */
export function resourceTarget(view: TableView, runner: KubectlRunner): ResourceTarget | undefined {
  const { namespace, name } = view.namespaceAndName();
  if (name === "") return undefined;
  return { kind: view.name, namespace: namespace || (runner.namespace ?? ""), name };
}

function namespaceArgs(target: ResourceTarget): string[] {
  return target.namespace === "" ? [] : ["-n", target.namespace];
}

export function yamlArgs(target: ResourceTarget): string[] {
  return ["get", target.kind, ...namespaceArgs(target), target.name, "-o", "yaml"];
}

export function describeArgs(target: ResourceTarget): string[] {
  return ["describe", target.kind, ...namespaceArgs(target), target.name];
}

export function editArgs(target: ResourceTarget): string[] {
  return ["edit", target.kind, ...namespaceArgs(target), target.name];
}

export function deleteArgs(target: ResourceTarget): string[] {
  return ["delete", target.kind, ...namespaceArgs(target), target.name];
}

export function logsArgs(target: ResourceTarget): string[] {
  return ["logs", "-f", ...namespaceArgs(target), target.name, "--all-containers"];
}

export function execArgs(target: ResourceTarget): string[] {
  return ["exec", "-it", ...namespaceArgs(target), target.name, "--", ...EXEC_SHELL];
}

function showText(ctx: ActionContext, title: string, text: string): TextView {
  const view = new TextView({ title, text, onClose: () => ctx.controller.lastPage() });
  ctx.controller.switchPage(ctx.controller.currentPageName(), view);
  return view;
}

export async function showYaml(ctx: ActionContext, view: TableView): Promise<void> {
  const target = resourceTarget(view, ctx.runner);
  if (!target) return;
  const out = await ctx.runner.run(yamlArgs(target));
  showText(ctx, `${target.kind}/${target.name}`, out);
}

export async function describeResource(ctx: ActionContext, view: TableView): Promise<void> {
  const target = resourceTarget(view, ctx.runner);
  if (!target) return;
  const out = await ctx.runner.run(describeArgs(target));
  showText(ctx, `describe ${target.kind}/${target.name}`, out);
}

/**
 * Stream `logs -f` into a following text page. Escape kills the stream and
 * goes back; so does opening another stream or stopping `ctx.streams`.
 * Pods only.
 */
export async function followLogs(ctx: ActionContext, view: TableView): Promise<void> {
  if (view.name !== "pods") return;
  const target = resourceTarget(view, ctx.runner);
  if (!target) return;

  const abort = ctx.streams.open();
  const logView = new TextView({
    title: `logs - (${target.name})`,
    follow: true,
    onClose: () => {
      abort.abort();
      ctx.controller.lastPage();
    },
  });
  ctx.controller.switchPage(ctx.controller.currentPageName(), logView);
  await ctx.runner.stream(
    logsArgs(target),
    (line) => {
      logView.append(line);
      ctx.requestDraw();
    },
    abort.signal,
  );
}

export async function editResource(ctx: ActionContext, view: TableView): Promise<void> {
  const target = resourceTarget(view, ctx.runner);
  if (!target) return;
  await ctx.suspend(() => ctx.runner.interactive(editArgs(target)));
  view.requestRefresh();
}

export async function execShell(ctx: ActionContext, view: TableView): Promise<void> {
  if (view.name !== "pods") return;
  const target = resourceTarget(view, ctx.runner);
  if (!target) return;
  await ctx.suspend(() => ctx.runner.interactive(execArgs(target)));
}

/**
 * Ask for confirmation, then delete. Resolves true once the resource was
 * deleted, false when the dialog was cancelled.
 */
export function deleteResource(ctx: ActionContext, view: TableView): Promise<boolean> {
  const target = resourceTarget(view, ctx.runner);
  if (!target) return Promise.resolve(false);

  return new Promise<boolean>((resolve, reject) => {
    const dialog = createConfirmDialog({
      message: `Do you want to delete ${target.kind} ${target.name}?`,
      buttons: ["delete", "Cancel"],
      onDone: (_index, label) => {
        ctx.controller.lastPage();
        if (label !== "delete") {
          resolve(false);
          return;
        }
        ctx.runner.run(deleteArgs(target)).then(
          () => {
            view.requestRefresh();
            resolve(true);
          },
          reject,
        );
      },
    });
    ctx.controller.insertDialog("delete", view, dialog);
  });
}

/**
 * Run an action in the background; a failure becomes an error status.
 */
export function launch(ctx: ActionContext, label: string, task: () => Promise<unknown>): void {
  const trace = ctx.trace ?? NULL_TRACE_LOG;
  void task().catch((error: unknown) => {
    const message = describeError(error);
    trace.record("error", "warn", "action failed", { action: label, error: message });
    ctx.controller.showStatus(message, { isError: true });
  });
}

export function resourceActions(ctx: ActionContext): readonly PageAction[] {
  const action = (
    shortcut: string,
    title: string,
    run: (c: ActionContext, v: TableView) => Promise<unknown>,
  ): PageAction => ({
    shortcut,
    title,
    run: (view) => launch(ctx, title, () => run(ctx, view)),
  });

  return Object.freeze([
    action("y", "View YAML", showYaml),
    action("d", "Describe", describeResource),
    action("e", "Edit", editResource),
    action("D", "Delete", deleteResource),
    action("l", "Logs", followLogs),
    action("s", "Shell", execShell),
  ]);
}

/** Resource kind for an api-resources row: `deployments` + `apps/v1` → `deployments.apps`. */
export function nestedKind(row: readonly string[]): string | undefined {
  const kind = row[0] ?? "";
  if (kind === "") return undefined;
  const groupVersion = row[1] ?? "";
  const slash = groupVersion.indexOf("/");
  const group = slash < 0 ? "" : groupVersion.slice(0, slash);
  return group === "" ? kind : `${kind}.${group}`;
}
