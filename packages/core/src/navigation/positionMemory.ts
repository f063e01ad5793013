import type { Position } from "./types.js";

/**
 * Last highlighted cell per page, so revisiting a page restores focus.
 */
export type PositionMemory = Readonly<{
  /** Unconditional overwrite. */
  record: (pageName: string, row: number, column: number) => void;
  /** undefined on a first visit. */
  lookup: (pageName: string) => Position | undefined;
  size: () => number;
}>;

export function createPositionMemory(): PositionMemory {
  const positions = new Map<string, Position>();

  return Object.freeze({
    record: (pageName: string, row: number, column: number) => {
      positions.set(pageName, Object.freeze({ row, column }));
    },
    lookup: (pageName: string) => positions.get(pageName),
    size: () => positions.size,
  });
}
