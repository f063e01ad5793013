/**
 * Resource pages reachable from the footer, and the global shortcut list
 * shown in the menu.
 */

import type { MenuShortcut } from "@kubenav/core";

export const ROOT_PAGE = "root";

export type ResourceKind = Readonly<{
  /** Page name, also the kubectl resource argument. */
  kind: string;
  title: string;
}>;

/** Footer order; digit N opens entry N. */
export const FOOTER_KINDS: readonly ResourceKind[] = Object.freeze([
  { kind: ROOT_PAGE, title: "API Resources" },
  { kind: "pods", title: "Pods" },
  { kind: "deployments", title: "Deployments" },
  { kind: "services", title: "Services" },
  { kind: "nodes", title: "Nodes" },
  { kind: "namespaces", title: "Namespaces" },
  { kind: "configmaps", title: "ConfigMaps" },
  { kind: "secrets", title: "Secrets" },
  { kind: "ingresses", title: "Ingresses" },
]);

export function findResourceKind(kind: string): ResourceKind | undefined {
  return FOOTER_KINDS.find((entry) => entry.kind === kind);
}

/** Page for a digit key ("1".."9"), undefined for anything else. */
export function pageForDigit(sequence: string): string | undefined {
  if (!/^[1-9]$/.test(sequence)) return undefined;
  return FOOTER_KINDS[Number(sequence) - 1]?.kind;
}

/**
 * Footer line with the active page bracketed:
 * `1 API Resources  [2 Pods]  3 Deployments ...`
 */
export function footerLine(activeKind: string): string {
  return FOOTER_KINDS.map((entry, index) => {
    const label = `${String(index + 1)} ${entry.title}`;
    return entry.kind === activeKind ? `[${label}]` : label;
  }).join("  ");
}

export const GLOBAL_SHORTCUTS: readonly MenuShortcut[] = Object.freeze([
  { key: "1-9", description: "Switch resource page" },
  { key: "m", description: "Toggle menu" },
  { key: "Esc", description: "Back" },
  { key: "r", description: "Refresh" },
  { key: "/", description: "Search" },
  { key: "Enter", description: "Open resource kind" },
  { key: "y", description: "View YAML" },
  { key: "d", description: "Describe" },
  { key: "e", description: "Edit" },
  { key: "D", description: "Delete" },
  { key: "l", description: "Logs (pods)" },
  { key: "s", description: "Shell (pods)" },
  { key: "q", description: "Quit" },
]);
