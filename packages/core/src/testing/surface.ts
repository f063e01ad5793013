/**
 * packages/core/src/testing/surface.ts — In-memory DrawSurface for tests.
 */

import type { DrawSurface } from "../navigation/types.js";
import type { Drawable, VNode } from "../widgets/types.js";

export type TestSurfaceShow = Readonly<{ name: string; drawable: Drawable }>;

export type TestSurface = DrawSurface &
  Readonly<{
    /** Every show() call, oldest first. */
    shows: () => readonly TestSurfaceShow[];
    visibleName: () => string | null;
    visible: () => Drawable | null;
    focused: () => Drawable | null;
    drawRequests: () => number;
    /** VNode of the visible drawable, null before the first show(). */
    frame: () => VNode | null;
  }>;

export function createTestSurface(
  hooks: Readonly<{ onShow?: (name: string, drawable: Drawable) => void }> = {},
): TestSurface {
  const shows: TestSurfaceShow[] = [];
  let focused: Drawable | null = null;
  let draws = 0;

  const last = (): TestSurfaceShow | undefined => shows[shows.length - 1];

  return Object.freeze({
    show: (name: string, drawable: Drawable) => {
      shows.push(Object.freeze({ name, drawable }));
      hooks.onShow?.(name, drawable);
    },
    focus: (drawable: Drawable) => {
      focused = drawable;
    },
    requestDraw: () => {
      draws++;
    },
    shows: () => Object.freeze(shows.slice()),
    visibleName: () => last()?.name ?? null,
    visible: () => last()?.drawable ?? null,
    focused: () => focused,
    drawRequests: () => draws,
    frame: () => last()?.drawable.draw() ?? null,
  });
}
