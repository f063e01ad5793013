/**
 * packages/core/src/views/overlays.ts — Status box and menu panel.
 */

import { ui } from "../widgets/ui.js";
import type { Drawable, TableRow, VNode } from "../widgets/types.js";

const LOGO = [
  "  _          _                            ",
  " | |__ _  _ | |__  ___  _ _   __ _ __ __  ",
  " | / /| || || '_ \\/ -_)| ' \\ / _` |\\ V /  ",
  " |_\\_\\ \\_,_||_.__/\\___||_||_|\\__,_| \\_/   ",
].join("\n");

/**
 * Transient message box shown over the current page.
 */
export function statusBox(message: string, isError: boolean): Drawable {
  const node: VNode = ui.text(message, {
    title: isError ? "Error" : "Progress",
    tone: isError ? "error" : "progress",
    align: "center",
    border: true,
  });
  return { draw: () => node };
}

export type MenuShortcut = Readonly<{ key: string; description: string }>;

export type MenuPanelInfo = Readonly<{
  appVersion: string;
  clusterVersion: string;
  shortcuts: readonly MenuShortcut[];
}>;

/**
 * Menu panel: logo, versions and the shortcut list.
 */
export function menuPanel(info: MenuPanelInfo): Drawable {
  const versions: readonly TableRow[] = [
    ["kubenav version:", info.appVersion],
    ["Kubernetes version:", info.clusterVersion],
  ];
  const shortcuts: readonly TableRow[] = info.shortcuts.map((s) => [s.key, s.description]);

  const node = ui.column({ tone: "muted" }, [
    ui.text(LOGO, { align: "center" }),
    ui.table({
      title: "Version",
      header: [],
      rows: versions,
      selectedRow: -1,
      selectedColumn: 0,
    }),
    ui.table({
      title: "Shortcuts",
      header: [],
      rows: shortcuts,
      selectedRow: -1,
      selectedColumn: 0,
    }),
  ]);
  return { draw: () => node };
}
