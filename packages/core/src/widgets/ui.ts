/**
 * packages/core/src/widgets/ui.ts — VNode factory functions.
 */

import type {
  CenterProps,
  ColumnProps,
  ConfirmProps,
  Drawable,
  KeyPress,
  TableProps,
  TextProps,
  VNode,
} from "./types.js";

const EMPTY_PROPS: Readonly<Record<string, never>> = Object.freeze({});

function text(content: string, props: TextProps = {}): VNode {
  return { kind: "text", text: content, props };
}

function table(props: TableProps): VNode {
  return { kind: "table", props };
}

function column(props: ColumnProps, children: readonly VNode[]): VNode {
  return { kind: "column", props, children };
}

/** Stack children bottom to top; later children are drawn over earlier ones. */
function layers(children: readonly VNode[]): VNode {
  return { kind: "layers", props: EMPTY_PROPS, children };
}

/** Place `child` in a width x height box centered in the available area. */
function center(child: VNode, props: CenterProps): VNode {
  return { kind: "center", props, child };
}

function confirm(props: ConfirmProps): VNode {
  return { kind: "confirm", props };
}

export const ui = {
  text,
  table,
  column,
  layers,
  center,
  confirm,
} as const;

/**
 * Drawable with fixed content.
 */
export function staticDrawable(node: VNode, onKey?: (key: KeyPress) => boolean): Drawable {
  if (onKey === undefined) {
    return { draw: () => node };
  }
  return { draw: () => node, onKey };
}

/**
 * Draw `overlay` centered over `base`. Keys go to the overlay.
 *
 * `base` is drawn live, so a page refreshed underneath an overlay shows its
 * new content the next time the composite is drawn.
 */
export function composite(
  base: Drawable,
  overlay: Drawable,
  size: CenterProps,
): Drawable {
  const drawable: Drawable = {
    draw: () => layers([base.draw(), center(overlay.draw(), size)]),
  };
  const overlayKey = overlay.onKey;
  if (overlayKey !== undefined) {
    drawable.onKey = (key) => overlayKey.call(overlay, key);
  }
  return drawable;
}
