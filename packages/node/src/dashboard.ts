/**
 * Wires the page controller to kubectl-backed pages, the terminal surface
 * and the keyboard.
 *
 * Keys go to the focused drawable first; unhandled keys fall through to the
 * global bindings (digits, m, escape, r, /, q, ctrl+c). A digit switch or
 * stop() ends any running log stream.
 */

import {
  TableView,
  createPageController,
  createPageRegistry,
  createPositionMemory,
  menuPanel,
  NULL_TRACE_LOG,
  type KeyPress,
  type NavigatorConfig,
  type PageController,
  type PageView,
  type TraceLog,
} from "@kubenav/core";
import { type ActionContext, createLogStreams, nestedKind, resourceActions } from "./actions.js";
import { createApiResourcesFeeder, createResourceFeeder } from "./kubectl/feeders.js";
import type { KubectlRunner } from "./kubectl/runner.js";
import { FOOTER_KINDS, GLOBAL_SHORTCUTS, ROOT_PAGE, findResourceKind, footerLine, pageForDigit } from "./resources.js";
import type { AnsiSurface } from "./terminal/ansiSurface.js";
import type { KeyInput } from "./terminal/input.js";

export type DashboardOptions = Readonly<{
  runner: KubectlRunner;
  surface: AnsiSurface;
  input?: KeyInput;
  appVersion: string;
  clusterVersion: string;
  /** 0 disables periodic refresh. */
  refreshIntervalMs: number;
  navigator?: NavigatorConfig;
  trace?: TraceLog;
  /** q or ctrl+c. */
  onQuit: () => void;
}>;

export type Dashboard = Readonly<{
  controller: PageController;
  start: () => void;
  stop: () => Promise<void>;
  handleKey: (key: KeyPress) => void;
  /** Search text being typed, null outside the search prompt. */
  searchInput: () => string | null;
}>;

export function createDashboard(opts: DashboardOptions): Dashboard {
  const { runner, surface, input } = opts;
  const trace = opts.trace ?? NULL_TRACE_LOG;
  const positions = createPositionMemory();
  const streams = createLogStreams();

  let timer: ReturnType<typeof setInterval> | null = null;
  let search: string | null = null;
  let stopped = false;

  async function suspend(task: () => Promise<void>): Promise<void> {
    input?.pause();
    try {
      await surface.suspend(task);
    } finally {
      input?.resume();
    }
  }

  const registry = createPageRegistry({
    factory: (name) => {
      if (name === ROOT_PAGE) {
        return new TableView({
          name,
          title: "API Resources",
          dataSource: createApiResourcesFeeder(runner),
          positions,
          onSubmit: (view) => {
            const row = view.selectedRow();
            const kind = row ? nestedKind(row) : undefined;
            if (kind) openResource(kind);
          },
        });
      }
      const entry = findResourceKind(name);
      return entry ? resourceTable(entry.kind, entry.title) : undefined;
    },
  });

  const controller = createPageController({
    surface,
    registry,
    positions,
    menu: menuPanel({
      appVersion: opts.appVersion,
      clusterVersion: opts.clusterVersion,
      shortcuts: GLOBAL_SHORTCUTS,
    }),
    trace,
    ...(opts.navigator ? { config: opts.navigator } : {}),
  });

  const actionContext: ActionContext = {
    controller,
    runner,
    streams,
    suspend,
    requestDraw: () => surface.requestDraw(),
    trace,
  };
  const actions = resourceActions(actionContext);

  function resourceTable(kind: string, title: string): PageView {
    return new TableView({
      name: kind,
      title,
      dataSource: createResourceFeeder(runner, kind),
      actions,
      positions,
    });
  }

  function openResource(kind: string): void {
    const existing = registry.ensure(kind);
    controller.openPage(existing ?? resourceTable(kind, kind));
    updateFooter();
  }

  function updateFooter(): void {
    surface.setFooter(footerLine(controller.currentPageName()));
  }

  function startSearch(): void {
    const page = controller.currentPage();
    if (!(page instanceof TableView)) return;
    search = "";
    surface.setPrompt("/");
  }

  function endSearch(): void {
    search = null;
    surface.setPrompt(null);
  }

  function searchKey(key: KeyPress, text: string): void {
    if (key.name === "escape") {
      endSearch();
      return;
    }
    if (key.name === "return" || key.name === "enter") {
      const page = controller.currentPage();
      if (page instanceof TableView) {
        page.setSearch(text);
        trace.record("input", "info", "search", { page: page.name, text });
      }
      endSearch();
      surface.requestDraw();
      return;
    }
    const next = key.name === "backspace" ? text.slice(0, -1) : text + key.sequence;
    search = next;
    surface.setPrompt(`/${next}`);
  }

  function globalKey(key: KeyPress): void {
    if ((key.ctrl && key.name === "c") || key.sequence === "q") {
      trace.record("input", "info", "quit");
      opts.onQuit();
      return;
    }
    const digitPage = pageForDigit(key.sequence);
    if (digitPage !== undefined) {
      streams.stopAll();
      controller.navigate(digitPage);
      updateFooter();
      return;
    }
    if (key.name === "escape") {
      if (controller.menuShown()) {
        controller.hideMenu();
      } else {
        controller.lastPage();
        updateFooter();
      }
      return;
    }
    switch (key.sequence) {
      case "m":
        if (controller.menuShown()) controller.hideMenu();
        else controller.showMenu();
        return;
      case "r":
        controller.refresh();
        return;
      case "/":
        startSearch();
        return;
      default:
        trace.record("input", "trace", "unbound key", { name: key.name });
    }
  }

  function handleKey(key: KeyPress): void {
    if (stopped) return;
    if (search !== null) {
      searchKey(key, search);
      return;
    }
    const focused = surface.focused();
    if (focused?.onKey?.(key)) {
      surface.requestDraw();
      return;
    }
    globalKey(key);
  }

  return Object.freeze({
    controller,
    handleKey,
    searchInput: () => search,
    start() {
      surface.start();
      input?.start(handleKey);
      controller.start();
      updateFooter();
      if (opts.refreshIntervalMs > 0) {
        timer = setInterval(() => {
          controller.refresh();
        }, opts.refreshIntervalMs);
      }
      trace.record("navigation", "info", "dashboard started", {
        pages: FOOTER_KINDS.length,
        intervalMs: opts.refreshIntervalMs,
      });
    },
    async stop() {
      if (stopped) return;
      stopped = true;
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
      input?.stop();
      streams.stopAll();
      await controller.dispose();
      registry.clear();
      surface.stop();
    },
  });
}
