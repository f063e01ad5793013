/**
 * packages/core/src/widgets/types.ts — Drawable tree and input types.
 *
 * A surface renders VNodes; the navigation core only moves Drawables around
 * and never looks inside them.
 */

export type TableRow = readonly string[];

/** Visual tone for text blocks and box borders. */
export type Tone = "normal" | "muted" | "accent" | "progress" | "error";

export type TextAlign = "left" | "center";

export type TextProps = Readonly<{
  /** Border title. A titled text block is drawn inside a box. */
  title?: string;
  tone?: Tone;
  align?: TextAlign;
  border?: boolean;
  /** Keep the last lines visible when the text is taller than its box. */
  tail?: boolean;
  /** Lines to skip from the top (ignored when `tail` is set). */
  scroll?: number;
}>;

export type TableProps = Readonly<{
  title: string;
  header: readonly string[];
  rows: readonly TableRow[];
  /** Selected body row (0-based, header excluded). -1 when the table is empty. */
  selectedRow: number;
  selectedColumn: number;
}>;

export type ColumnProps = Readonly<{
  title?: string;
  tone?: Tone;
}>;

export type CenterProps = Readonly<{
  width: number;
  height: number;
}>;

export type ConfirmProps = Readonly<{
  message: string;
  buttons: readonly string[];
  focusedButton: number;
}>;

export type VNode =
  | Readonly<{ kind: "text"; text: string; props: TextProps }>
  | Readonly<{ kind: "table"; props: TableProps }>
  | Readonly<{ kind: "column"; props: ColumnProps; children: readonly VNode[] }>
  | Readonly<{ kind: "layers"; props: Readonly<Record<string, never>>; children: readonly VNode[] }>
  | Readonly<{ kind: "center"; props: CenterProps; child: VNode }>
  | Readonly<{ kind: "confirm"; props: ConfirmProps }>;

/**
 * Normalized key press, modelled on readline keypress events.
 */
export type KeyPress = Readonly<{
  /** Key name ("a", "escape", "up", "return", "1", ...). */
  name: string;
  /** Printable character for the key, "" for non-printable keys. */
  sequence: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}>;

/**
 * Anything a surface can draw. Drawables are redrawn on demand, so `draw()`
 * always reflects current content.
 */
export interface Drawable {
  draw(): VNode;
  /**
   * Handle a key while this drawable has focus.
   * @returns true when the key was consumed
   */
  onKey?(key: KeyPress): boolean;
}
