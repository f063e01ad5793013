/**
 * packages/core/src/navigation/pageController.ts — Page switching and history.
 *
 * The controller is the single authority for which page is visible. It owns
 * the Current Page Pointer and the Draw Queue, and drives the refresh
 * coordinator:
 *
 *   switchPage(name) ─▶ pointer changed? ─▶ cancel old loop now
 *                                        └▶ notify page-switch task
 *   page-switch task ─▶ attach a fresh loop to the page that is current
 *                       when it wakes
 *
 * Invariants:
 *   - switches run one at a time, in call order; a switch requested from a
 *     surface callback during a switch runs right after it
 *   - no await inside a switch: pointer and queue mutation never spans a
 *     render or a refresh
 *   - at most one refresh loop is watching, and it belongs to the current page
 *   - nothing here throws on a missing page: lookups fall back to the root page
 *   - page names are trimmed before they become the pointer
 *   - a status overlay leaves history when its timer fires, on top or not
 */

import {
  type NavigatorConfig,
  type ResolvedNavigatorConfig,
  resolveNavigatorConfig,
} from "../config.js";
import { NULL_TRACE_LOG, type TraceLog } from "../debug/traceLog.js";
import { describeError } from "../errors.js";
import {
  type RefreshActivation,
  type RefreshCoordinator,
  createRefreshCoordinator,
} from "../refresh/refreshCoordinator.js";
import { createSignalChannel } from "../refresh/signalChannel.js";
import { statusBox } from "../views/overlays.js";
import type { Drawable } from "../widgets/types.js";
import { composite, ui } from "../widgets/ui.js";
import { createDrawQueue, type DrawQueue } from "./drawQueue.js";
import type { PageRecord, PageRegistry } from "./pageRegistry.js";
import { createPositionMemory, type PositionMemory } from "./positionMemory.js";
import type { DrawSurface, PageTrack, PageView } from "./types.js";

/**
 * Schedule `fn` after `ms`. Returns a cancel function.
 */
export type ScheduleFn = (fn: () => void, ms: number) => () => void;

export type StatusOptions = Readonly<{ isError?: boolean }>;

export type PageControllerOptions = Readonly<{
  surface: DrawSurface;
  registry: PageRegistry;
  positions?: PositionMemory;
  /** Panel composited over the current page by showMenu(). */
  menu?: Drawable;
  config?: NavigatorConfig;
  trace?: TraceLog;
  schedule?: ScheduleFn;
}>;

export interface PageController {
  /** Start the page-switch task and navigate to the root page. Idempotent. */
  start(): void;
  switchPage(name: string, view: Drawable): void;
  /** Registered view of the current page, the root view when there is none. */
  currentPage(): Drawable;
  currentPageName(): string;
  /** Undo one switch. Stays on the root page once history is exhausted. */
  lastPage(): void;
  /**
   * Create or reuse the named page, restore its cursor, switch to it and
   * request a refresh.
   * @returns false when no page can be created for `name`
   */
  navigate(name: string): boolean;
  /** Register an externally built page and navigate to it. */
  openPage(view: PageView): void;
  showMenu(): void;
  hideMenu(): void;
  menuShown(): boolean;
  insertDialog(name: string, base: Drawable, dialog: Drawable): void;
  showStatus(message: string, opts?: StatusOptions): void;
  /**
   * Fire-and-forget refresh request for a page (default: current page).
   * @returns false when it coalesced with a pending request or the page is unknown
   */
  refresh(name?: string): boolean;
  history(): readonly PageTrack[];
  activeRefresh(): RefreshActivation | null;
  readonly positions: PositionMemory;
  readonly registry: PageRegistry;
  readonly config: ResolvedNavigatorConfig;
  /** Stop every task and loop. Resolves once they have exited. */
  dispose(): Promise<void>;
}

const EMPTY_PAGE: Drawable = Object.freeze({ draw: () => ui.text("") });

const defaultSchedule: ScheduleFn = (fn, ms) => {
  const timer = setTimeout(fn, ms);
  return () => clearTimeout(timer);
};

export function createPageController(opts: PageControllerOptions): PageController {
  const { surface, registry } = opts;
  const config = resolveNavigatorConfig(opts.config);
  const positions = opts.positions ?? createPositionMemory();
  const trace = opts.trace ?? NULL_TRACE_LOG;
  const schedule = opts.schedule ?? defaultSchedule;
  const menu = opts.menu;
  const rootName = config.rootPage;

  let pointer = "";
  let menuVisible = false;
  let started = false;
  let disposed = false;
  let switching = false;
  const deferredOps: Array<() => void> = [];
  const pendingDismissals = new Set<() => void>();
  // Registry record each track was pushed against, to detect torn-down pages.
  const trackOwners = new WeakMap<PageTrack, PageRecord>();

  const lifetime = new AbortController();
  const switchSignal = createSignalChannel();
  let watchDone: Promise<void> = Promise.resolve();

  const rootTrack = (): PageTrack =>
    Object.freeze({ name: rootName, view: registry.ensure(rootName) ?? EMPTY_PAGE });

  const queue: DrawQueue = createDrawQueue(rootTrack);

  const coordinator: RefreshCoordinator = createRefreshCoordinator({
    trace,
    onRefreshed: (page) => {
      if (page === pointer) surface.requestDraw();
    },
    onError: (page, error) => {
      if (page !== pointer) return;
      showStatus(describeError(error), { isError: true });
    },
  });

  function serialized(op: () => void): void {
    if (disposed) return;
    if (switching) {
      deferredOps.push(op);
      return;
    }
    switching = true;
    try {
      op();
      for (let next = deferredOps.shift(); next !== undefined; next = deferredOps.shift()) {
        next();
      }
    } finally {
      deferredOps.length = 0;
      switching = false;
    }
  }

  function setPointer(name: string): void {
    if (pointer === name) return;
    const from = pointer;
    pointer = name;
    coordinator.cancel();
    switchSignal.notify();
    trace.record("navigation", "info", "current page changed", { from, to: name });
  }

  function present(name: string, view: Drawable): void {
    surface.show(name, view);
    surface.focus(view);
  }

  function resolveTrack(track: PageTrack): PageTrack {
    const owner = trackOwners.get(track);
    const live = registry.record(track.name);
    if (live === undefined) {
      // Never a registered page: the track is all there is.
      if (owner === undefined && track.name !== rootName) return track;
      if (owner !== undefined) {
        trace.record("navigation", "warn", "history entry outlived its page", {
          page: track.name,
        });
      }
      return rootTrack();
    }
    if (owner !== undefined && owner.view === live.view) return track;
    return Object.freeze({ name: track.name, view: live.view });
  }

  function pushAndShow(name: string, view: Drawable): void {
    menuVisible = false;
    setPointer(name);
    queue.enqueue({ name, view });
    const owner = registry.record(name);
    if (owner !== undefined) trackOwners.set(queue.last(), owner);
    present(name, view);
  }

  function currentPage(): Drawable {
    return registry.get(pointer) ?? registry.ensure(rootName) ?? EMPTY_PAGE;
  }

  // Current page got a new view: drop the old loop and attach to the new one.
  function reattachLoop(): void {
    coordinator.cancel();
    switchSignal.notify();
    trace.record("refresh", "info", "current page view replaced", { page: pointer });
  }

  function attachLoop(): void {
    const view = registry.get(pointer);
    if (!view) {
      trace.record("refresh", "trace", "no refreshable view for page", { page: pointer });
      return;
    }
    coordinator.activate(view);
  }

  async function watch(signal: AbortSignal): Promise<void> {
    for (;;) {
      const woke = await switchSignal.wait(signal);
      if (woke !== "signal") return;
      attachLoop();
    }
  }

  function navigate(requested: string): boolean {
    if (disposed) return false;
    const name = requested.trim();
    const view = registry.ensure(name);
    if (!view) {
      trace.record("navigation", "warn", "unknown page", { page: name });
      return false;
    }
    const pos = positions.lookup(name);
    if (pos) view.select?.(pos.row, pos.column);
    switchPage(name, view);
    view.signal.notify();
    return true;
  }

  function switchPage(name: string, view: Drawable): void {
    serialized(() => {
      trace.record("navigation", "trace", "switch", { page: name });
      pushAndShow(name, view);
    });
  }

  function lastPage(): void {
    serialized(() => {
      menuVisible = false;
      queue.dequeue();
      const top = resolveTrack(queue.last());
      trace.record("navigation", "info", "back", { to: top.name, depth: queue.size() });
      setPointer(top.name);
      present(top.name, top.view);
    });
  }

  function showStatus(message: string, statusOpts: StatusOptions = {}): void {
    const isError = statusOpts.isError === true;
    serialized(() => {
      const base = resolveTrack(queue.last()).view;
      const overlay = composite(base, statusBox(message, isError), config.statusSize);
      trace.record(isError ? "error" : "navigation", isError ? "error" : "info", "status", {
        page: pointer,
        message,
      });
      pushAndShow(pointer === "" ? rootName : pointer, overlay);
      const statusTrack = queue.last();

      const cancel = schedule(() => {
        pendingDismissals.delete(cancel);
        if (queue.last() === statusTrack) {
          lastPage();
        } else if (queue.remove(statusTrack)) {
          trace.record("navigation", "trace", "status expired under another page", {
            page: statusTrack.name,
          });
        }
      }, config.statusDismissMs);
      pendingDismissals.add(cancel);
    });
  }

  return {
    positions,
    registry,
    config,

    start() {
      if (started || disposed) return;
      started = true;
      watchDone = watch(lifetime.signal);
      if (!navigate(rootName)) switchPage(rootName, EMPTY_PAGE);
    },

    switchPage,

    currentPage,

    currentPageName: () => pointer,

    lastPage,

    navigate,

    openPage(view) {
      if (disposed) return;
      const name = view.name.trim();
      if (registry.get(name) !== view) {
        registry.register(name, view);
        if (name === pointer) reattachLoop();
      }
      navigate(name);
    },

    showMenu() {
      if (!menu) return;
      serialized(() => {
        if (menuVisible) return;
        const overlay = composite(currentPage(), menu, config.menuSize);
        menuVisible = true;
        trace.record("navigation", "trace", "menu shown", { page: pointer });
        surface.show(pointer, overlay);
        surface.focus(menu);
      });
    },

    hideMenu() {
      serialized(() => {
        if (!menuVisible) return;
        menuVisible = false;
        const top = resolveTrack(queue.last());
        present(top.name, top.view);
      });
    },

    menuShown: () => menuVisible,

    insertDialog(name, base, dialog) {
      serialized(() => {
        trace.record("navigation", "info", "dialog", { page: pointer, dialog: name });
        pushAndShow(pointer, composite(base, dialog, config.dialogSize));
      });
    },

    showStatus,

    refresh(name) {
      const target = name ?? pointer;
      const view = registry.get(target);
      if (!view) return false;
      return view.signal.notify();
    },

    history: () => queue.entries(),

    activeRefresh: () => coordinator.active(),

    async dispose() {
      if (disposed) return;
      disposed = true;
      for (const cancel of pendingDismissals) {
        cancel();
      }
      pendingDismissals.clear();
      lifetime.abort();
      switchSignal.close();
      coordinator.cancel();
      await watchDone;
      await coordinator.settled();
      trace.record("navigation", "info", "controller disposed");
    },
  };
}
