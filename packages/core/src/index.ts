/**
 * @kubenav/core
 *
 * Runtime-agnostic navigation core: page history, the single refresh loop,
 * overlays and table/text pages. Must not import node:* modules; process and
 * terminal plumbing lives in @kubenav/node.
 */

export {
  KubenavError,
  describeError,
  invalidProps,
  type KubenavErrorCode,
} from "./errors.js";

export {
  DEFAULT_NAVIGATOR_CONFIG,
  resolveNavigatorConfig,
  type NavigatorConfig,
  type OverlaySize,
  type ResolvedNavigatorConfig,
} from "./config.js";

export * from "./debug/index.js";

export type {
  CenterProps,
  ColumnProps,
  ConfirmProps,
  Drawable,
  KeyPress,
  TableProps,
  TableRow,
  TextAlign,
  TextProps,
  Tone,
  VNode,
} from "./widgets/types.js";
export { composite, staticDrawable, ui } from "./widgets/ui.js";

export * from "./refresh/index.js";
export * from "./navigation/index.js";
export * from "./views/index.js";
