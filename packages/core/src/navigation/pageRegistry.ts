/**
 * packages/core/src/navigation/pageRegistry.ts — Page name to live view.
 *
 * Names are trimmed on every lookup. Each page carries its own ownership record; removing the record disposes
 * the view (and with it the view's refresh channel), so nothing page-scoped
 * outlives the page.
 */

import { invalidProps } from "../errors.js";
import type { PageView } from "./types.js";

export type PageRecord = Readonly<{
  name: string;
  view: PageView;
  createdAt: number;
}>;

/**
 * Create a view for a page name, or return undefined for unknown names.
 */
export type PageFactory = (name: string) => PageView | undefined;

export type PageRegistry = Readonly<{
  /** Existing view, or a new one from the factory. undefined for unknown names. */
  ensure: (name: string) => PageView | undefined;
  /** Register an externally built view. Replaces (and disposes) a previous one. */
  register: (name: string, view: PageView) => void;
  get: (name: string) => PageView | undefined;
  has: (name: string) => boolean;
  record: (name: string) => PageRecord | undefined;
  /** Dispose and forget a page. Returns false when it was not registered. */
  remove: (name: string) => boolean;
  names: () => readonly string[];
  /** Dispose every page. */
  clear: () => void;
}>;

export type PageRegistryOptions = Readonly<{
  factory?: PageFactory;
  now?: () => number;
}>;

export function createPageRegistry(opts: PageRegistryOptions = {}): PageRegistry {
  const records = new Map<string, PageRecord>();
  const factory = opts.factory;
  const now = opts.now ?? Date.now;

  function store(name: string, view: PageView): void {
    const normalized = name.trim();
    if (normalized.length === 0) {
      invalidProps("page name must be a non-empty string");
    }
    const previous = records.get(normalized);
    if (previous && previous.view !== view) {
      previous.view.dispose?.();
    }
    records.set(normalized, Object.freeze({ name: normalized, view, createdAt: now() }));
  }

  return Object.freeze({
    ensure: (name: string) => {
      const normalized = name.trim();
      if (normalized.length === 0) return undefined;
      const existing = records.get(normalized);
      if (existing) return existing.view;
      const created = factory?.(normalized);
      if (created === undefined) return undefined;
      store(normalized, created);
      return created;
    },
    register: store,
    get: (name: string) => records.get(name.trim())?.view,
    has: (name: string) => records.has(name.trim()),
    record: (name: string) => records.get(name.trim()),
    remove: (name: string) => {
      const existing = records.get(name.trim());
      if (!existing) return false;
      records.delete(existing.name);
      existing.view.dispose?.();
      return true;
    },
    names: () => Object.freeze(Array.from(records.keys())),
    clear: () => {
      const all = Array.from(records.values());
      records.clear();
      for (const rec of all) {
        rec.view.dispose?.();
      }
    },
  });
}
