import type { SignalChannel } from "../refresh/signalChannel.js";
import type { Drawable } from "../widgets/types.js";

/**
 * Remembered cursor position of a page.
 */
export type Position = Readonly<{
  row: number;
  column: number;
}>;

/**
 * Draw Queue entry. Immutable snapshot of one switch.
 */
export type PageTrack = Readonly<{
  name: string;
  view: Drawable;
}>;

/**
 * Contract every navigable page fulfils.
 *
 * The view owns its refresh channel; the refresh coordinator only borrows it
 * while the page is current.
 */
export interface PageView extends Drawable {
  /** Page identity (resource kind for table pages). */
  readonly name: string;
  readonly signal: SignalChannel;
  /**
   * Re-fetch data and update what `draw()` returns. Rejects when the fetch
   * failed; previously drawn content stays in place.
   */
  refresh(signal: AbortSignal): Promise<void>;
  /** Restore a remembered cursor position. */
  select?(row: number, column: number): void;
  /** Release resources. Must close `signal`. */
  dispose?(): void;
}

/**
 * Rendering capability consumed by the page controller. The surface owns
 * the terminal; every call is made from the event loop that owns it.
 */
export interface DrawSurface {
  /** Make `drawable` the visible content under `name`. */
  show(name: string, drawable: Drawable): void;
  /** Route input to `drawable`. */
  focus(drawable: Drawable): void;
  /** Schedule a redraw of the visible content. */
  requestDraw(): void;
}
