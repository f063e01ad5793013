/**
 * VNode → character grid.
 *
 * One code point per cell. Every node clears its own rectangle before
 * drawing, so overlays hide what is underneath them.
 */

import type { TableRow, Tone, VNode } from "@kubenav/core";

export type CellStyle = Readonly<{
  tone: Tone;
  bold: boolean;
  inverse: boolean;
}>;

type Rect = Readonly<{ x: number; y: number; width: number; height: number }>;

const DEFAULT_STYLE: CellStyle = Object.freeze({ tone: "normal", bold: false, inverse: false });

const TONE_SGR: Readonly<Record<Tone, string>> = Object.freeze({
  normal: "39",
  muted: "90",
  accent: "36",
  progress: "33",
  error: "31",
});

const COLUMN_GAP = 2;

function sgr(style: CellStyle): string {
  const codes = ["0", TONE_SGR[style.tone]];
  if (style.bold) codes.push("1");
  if (style.inverse) codes.push("7");
  return `\x1b[${codes.join(";")}m`;
}

function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return a.tone === b.tone && a.bold === b.bold && a.inverse === b.inverse;
}

export class Canvas {
  readonly width: number;
  readonly height: number;
  private readonly chars: string[][];
  private readonly styles: CellStyle[][];

  constructor(width: number, height: number) {
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
    this.chars = [];
    this.styles = [];
    for (let y = 0; y < this.height; y++) {
      this.chars.push(new Array<string>(this.width).fill(" "));
      this.styles.push(new Array<CellStyle>(this.width).fill(DEFAULT_STYLE));
    }
  }

  fill(rect: Rect, style: CellStyle = DEFAULT_STYLE): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.set(x, y, " ", style);
      }
    }
  }

  /** Write `text` from (x, y), clipped at `limitX` (exclusive) and the canvas edge. */
  put(x: number, y: number, text: string, style: CellStyle = DEFAULT_STYLE, limitX = this.width): void {
    let cx = x;
    for (const ch of text) {
      if (cx >= limitX) break;
      this.set(cx, y, ch, style);
      cx++;
    }
  }

  styleAt(x: number, y: number): CellStyle {
    return this.styles[y]?.[x] ?? DEFAULT_STYLE;
  }

  /** Rows without styling, trailing spaces removed. */
  plainLines(): string[] {
    return this.chars.map((row) => row.join("").trimEnd());
  }

  /** Full-width rows with SGR sequences, each ending in a reset. */
  ansiLines(): string[] {
    return this.chars.map((row, y) => {
      const styles = this.styles[y] ?? [];
      let out = "";
      let current: CellStyle | null = null;
      row.forEach((ch, x) => {
        const style = styles[x] ?? DEFAULT_STYLE;
        if (current === null || !sameStyle(current, style)) {
          out += sgr(style);
          current = style;
        }
        out += ch;
      });
      return `${out}\x1b[0m`;
    });
  }

  private set(x: number, y: number, ch: string, style: CellStyle): void {
    const chars = this.chars[y];
    const styles = this.styles[y];
    if (!chars || !styles || x < 0 || x >= this.width) return;
    chars[x] = ch;
    styles[x] = style;
  }
}

function textWidth(text: string): number {
  return Array.from(text).length;
}

function toneStyle(tone: Tone): CellStyle {
  return tone === "normal" ? DEFAULT_STYLE : Object.freeze({ tone, bold: false, inverse: false });
}

function inset(rect: Rect): Rect {
  return {
    x: rect.x + 1,
    y: rect.y + 1,
    width: Math.max(0, rect.width - 2),
    height: Math.max(0, rect.height - 2),
  };
}

function drawBox(canvas: Canvas, rect: Rect, title: string | undefined, style: CellStyle): void {
  if (rect.width < 2 || rect.height < 2) return;
  const right = rect.x + rect.width - 1;
  const bottom = rect.y + rect.height - 1;
  const line = "─".repeat(rect.width - 2);
  canvas.put(rect.x, rect.y, `┌${line}┐`, style);
  canvas.put(rect.x, bottom, `└${line}┘`, style);
  for (let y = rect.y + 1; y < bottom; y++) {
    canvas.put(rect.x, y, "│", style);
    canvas.put(right, y, "│", style);
  }
  if (title !== undefined && title !== "") {
    canvas.put(rect.x + 2, rect.y, ` ${title} `, { ...style, bold: true }, right);
  }
}

function padCell(text: string, width: number): string {
  const w = textWidth(text);
  if (w >= width) return Array.from(text).slice(0, width).join("");
  return text + " ".repeat(width - w);
}

function columnWidths(header: readonly string[], rows: readonly TableRow[], available: number): number[] {
  const count = Math.max(header.length, ...rows.map((row) => row.length), 0);
  const widths: number[] = [];
  for (let c = 0; c < count; c++) {
    let w = textWidth(header[c] ?? "");
    for (const row of rows) {
      w = Math.max(w, textWidth(row[c] ?? ""));
    }
    widths.push(w);
  }
  if (count === 0) return widths;
  const used = widths.reduce((sum, w) => sum + w, 0) + COLUMN_GAP * (count - 1);
  const extra = Math.floor((available - used) / count);
  return extra > 0 ? widths.map((w) => w + extra) : widths;
}

function formatRow(cells: readonly string[], widths: readonly number[]): string {
  return widths.map((w, c) => padCell(cells[c] ?? "", w)).join(" ".repeat(COLUMN_GAP));
}

/** Height a node asks for when stacked in a column. */
export function naturalHeight(node: VNode): number {
  switch (node.kind) {
    case "text": {
      const lines = node.text === "" ? 0 : node.text.split("\n").length;
      const bordered = node.props.border === true || node.props.title !== undefined;
      return lines + (bordered ? 2 : 0);
    }
    case "table":
      return node.props.rows.length + (node.props.header.length > 0 ? 1 : 0) + 2;
    case "column":
      return node.children.reduce((sum, child) => sum + naturalHeight(child), 0);
    case "layers":
      return Math.max(0, ...node.children.map(naturalHeight));
    case "center":
      return node.props.height;
    case "confirm":
      return 5;
  }
}

function renderNode(canvas: Canvas, node: VNode, rect: Rect, tone: Tone): void {
  if (rect.width <= 0 || rect.height <= 0) return;
  switch (node.kind) {
    case "text": {
      const props = node.props;
      const style = toneStyle(props.tone ?? tone);
      canvas.fill(rect, style);
      const bordered = props.border === true || props.title !== undefined;
      const inner = bordered ? inset(rect) : rect;
      if (bordered) drawBox(canvas, rect, props.title, style);

      const all = node.text === "" ? [] : node.text.split("\n");
      const skip = props.tail === true ? Math.max(0, all.length - inner.height) : (props.scroll ?? 0);
      const lines = all.slice(skip, skip + inner.height);
      const centered = props.align === "center";
      const top = centered && bordered ? Math.floor((inner.height - lines.length) / 2) : 0;
      lines.forEach((line, i) => {
        const x = centered ? inner.x + Math.max(0, Math.floor((inner.width - textWidth(line)) / 2)) : inner.x;
        canvas.put(x, inner.y + top + i, line, style, inner.x + inner.width);
      });
      return;
    }
    case "table": {
      const props = node.props;
      const style = toneStyle(tone);
      canvas.fill(rect, style);
      drawBox(canvas, rect, props.title, style);
      const inner = inset(rect);
      const widths = columnWidths(props.header, props.rows, inner.width);
      const limit = inner.x + inner.width;
      let y = inner.y;
      if (props.header.length > 0 && inner.height > 0) {
        canvas.put(inner.x, y, formatRow(props.header, widths), { ...style, bold: true }, limit);
        y++;
      }
      const bodyHeight = inner.y + inner.height - y;
      const selected = props.selectedRow;
      const offset = selected >= bodyHeight ? selected - bodyHeight + 1 : 0;
      for (let i = 0; i < bodyHeight; i++) {
        const index = offset + i;
        const row = props.rows[index];
        if (!row) break;
        const rowStyle = index === selected ? { ...style, inverse: true } : style;
        if (index === selected) canvas.fill({ x: inner.x, y: y + i, width: inner.width, height: 1 }, rowStyle);
        canvas.put(inner.x, y + i, formatRow(row, widths), rowStyle, limit);
      }
      return;
    }
    case "column": {
      const childTone = node.props.tone ?? tone;
      canvas.fill(rect, toneStyle(childTone));
      let y = rect.y;
      const end = rect.y + rect.height;
      node.children.forEach((child, index) => {
        if (y >= end) return;
        const last = index === node.children.length - 1;
        const height = last ? end - y : Math.min(naturalHeight(child), end - y);
        renderNode(canvas, child, { x: rect.x, y, width: rect.width, height }, childTone);
        y += height;
      });
      return;
    }
    case "layers":
      for (const child of node.children) {
        renderNode(canvas, child, rect, tone);
      }
      return;
    case "center": {
      const width = Math.min(node.props.width, rect.width);
      const height = Math.min(node.props.height, rect.height);
      renderNode(
        canvas,
        node.child,
        {
          x: rect.x + Math.floor((rect.width - width) / 2),
          y: rect.y + Math.floor((rect.height - height) / 2),
          width,
          height,
        },
        tone,
      );
      return;
    }
    case "confirm": {
      const style = toneStyle(tone);
      canvas.fill(rect, style);
      drawBox(canvas, rect, undefined, style);
      const inner = inset(rect);
      const limit = inner.x + inner.width;
      const message = node.props.message;
      canvas.put(
        inner.x + Math.max(0, Math.floor((inner.width - textWidth(message)) / 2)),
        inner.y,
        message,
        style,
        limit,
      );
      const labels = node.props.buttons.map((label) => `< ${label} >`);
      const total = labels.reduce((sum, label) => sum + textWidth(label), 0) + COLUMN_GAP * (labels.length - 1);
      let x = inner.x + Math.max(0, Math.floor((inner.width - total) / 2));
      const y = inner.y + inner.height - 1;
      labels.forEach((label, index) => {
        const focused = index === node.props.focusedButton;
        canvas.put(x, y, label, focused ? { ...style, inverse: true } : style, limit);
        x += textWidth(label) + COLUMN_GAP;
      });
      return;
    }
  }
}

export function renderFrame(node: VNode, width: number, height: number): Canvas {
  const canvas = new Canvas(width, height);
  renderNode(canvas, node, { x: 0, y: 0, width: canvas.width, height: canvas.height }, "normal");
  return canvas;
}
