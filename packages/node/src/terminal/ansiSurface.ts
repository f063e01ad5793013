/**
 * Terminal DrawSurface: renders the visible drawable plus a one-line footer
 * on the alternate screen. Draw requests are coalesced to one render per
 * event-loop turn.
 */

import type { DrawSurface, Drawable } from "@kubenav/core";
import terminalSize from "terminal-size";
import { renderFrame } from "./render.js";

const ENTER_SCREEN = "\x1b[?1049h\x1b[?25l\x1b[2J";
const LEAVE_SCREEN = "\x1b[0m\x1b[?25h\x1b[?1049l";

export type TerminalDimensions = Readonly<{ columns: number; rows: number }>;

/** Where frames are written. `process.stdout` satisfies this. */
export type SurfaceOutput = Readonly<{
  write: (chunk: string) => unknown;
  columns?: number;
  rows?: number;
}>;

export type AnsiSurfaceOptions = Readonly<{
  output: SurfaceOutput;
  /** Emit colours and inverse video (default: true). */
  color?: boolean;
  /** Overrides size detection. */
  size?: () => TerminalDimensions;
}>;

export interface AnsiSurface extends DrawSurface {
  focused(): Drawable | null;
  visibleName(): string;
  setFooter(text: string): void;
  /** Replace the footer with an input prompt; null restores the footer. */
  setPrompt(text: string | null): void;
  /** Leave the alternate screen while `task` owns the terminal. */
  suspend(task: () => Promise<void>): Promise<void>;
  start(): void;
  stop(): void;
  /** Render synchronously. */
  drawNow(): void;
  drawCount(): number;
  /** Plain text of the last rendered frame, footer included. */
  lastFrame(): readonly string[];
}

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

function detectSize(output: SurfaceOutput): TerminalDimensions {
  const columns = toPositiveIntOr(output.columns, 0);
  const rows = toPositiveIntOr(output.rows, 0);
  if (columns > 0 && rows > 0) return { columns, rows };
  try {
    const size = terminalSize();
    return { columns: toPositiveIntOr(size.columns, 80), rows: toPositiveIntOr(size.rows, 24) };
  } catch {
    return { columns: 80, rows: 24 };
  }
}

function fit(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length >= width) return chars.slice(0, width).join("");
  return text + " ".repeat(width - chars.length);
}

export function createAnsiSurface(opts: AnsiSurfaceOptions): AnsiSurface {
  const output = opts.output;
  const color = opts.color ?? true;
  const size = opts.size ?? (() => detectSize(output));

  let visible: Drawable | null = null;
  let visibleName = "";
  let focused: Drawable | null = null;
  let footer = "";
  let prompt: string | null = null;
  let pending: NodeJS.Immediate | null = null;
  let active = false;
  let suspended = false;
  let draws = 0;
  let frame: readonly string[] = [];

  function drawNow(): void {
    if (pending !== null) {
      clearImmediate(pending);
      pending = null;
    }
    if (!active || suspended || visible === null) return;
    const { columns, rows } = size();
    const bodyRows = Math.max(1, rows - 1);
    const canvas = renderFrame(visible.draw(), columns, bodyRows);
    const lines = color ? canvas.ansiLines() : canvas.plainLines().map((line) => fit(line, columns));
    const bottom = fit(prompt ?? footer, columns);

    let out = "";
    lines.forEach((line, i) => {
      out += `\x1b[${String(i + 1)};1H${line}`;
    });
    out += `\x1b[${String(bodyRows + 1)};1H${color ? `\x1b[0;7m${bottom}\x1b[0m` : bottom}`;
    output.write(out);

    frame = Object.freeze([...canvas.plainLines(), bottom.trimEnd()]);
    draws++;
  }

  function requestDraw(): void {
    if (pending !== null || suspended || !active) return;
    pending = setImmediate(() => {
      pending = null;
      drawNow();
    });
  }

  return {
    show(name, drawable) {
      visible = drawable;
      visibleName = name;
      requestDraw();
    },
    focus(drawable) {
      focused = drawable;
    },
    requestDraw,
    focused: () => focused,
    visibleName: () => visibleName,
    setFooter(text) {
      footer = text;
      requestDraw();
    },
    setPrompt(text) {
      prompt = text;
      requestDraw();
    },
    async suspend(task) {
      if (pending !== null) {
        clearImmediate(pending);
        pending = null;
      }
      suspended = true;
      output.write(LEAVE_SCREEN);
      try {
        await task();
      } finally {
        suspended = false;
        if (active) {
          output.write(ENTER_SCREEN);
          drawNow();
        }
      }
    },
    start() {
      if (active) return;
      active = true;
      output.write(ENTER_SCREEN);
      drawNow();
    },
    stop() {
      if (!active) return;
      active = false;
      if (pending !== null) {
        clearImmediate(pending);
        pending = null;
      }
      output.write(LEAVE_SCREEN);
    },
    drawNow,
    drawCount: () => draws,
    lastFrame: () => frame,
  };
}
