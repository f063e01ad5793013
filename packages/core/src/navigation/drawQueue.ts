/**
 * packages/core/src/navigation/drawQueue.ts — Navigation history stack.
 *
 * Append-only except for popping the most recent entry and dropping an
 * expired entry by identity. No deduplication and
 * no cap: sessions are short-lived and "back" must be able to replay every
 * switch, repeated visits included.
 */

import type { PageTrack } from "./types.js";

export type DrawQueue = Readonly<{
  enqueue: (track: PageTrack) => void;
  /** Remove the most recent entry. No-op when empty. */
  dequeue: () => void;
  /** Remove the most recent entry identical to `track`. */
  remove: (track: PageTrack) => boolean;
  /** Most recent entry, or the root sentinel when empty. */
  last: () => PageTrack;
  empty: () => boolean;
  size: () => number;
  /** Entries from oldest to newest. */
  entries: () => readonly PageTrack[];
}>;

/**
 * Create an empty draw queue.
 *
 * @param rootSentinel - Resolves the track `last()` returns on an empty queue.
 *   Resolved on each call so the root view can be created after the queue.
 */
export function createDrawQueue(rootSentinel: () => PageTrack): DrawQueue {
  const tracks: PageTrack[] = [];

  return Object.freeze({
    enqueue: (track: PageTrack) => {
      tracks.push(Object.freeze({ name: track.name, view: track.view }));
    },
    dequeue: () => {
      tracks.pop();
    },
    remove: (track: PageTrack) => {
      const index = tracks.lastIndexOf(track);
      if (index < 0) return false;
      tracks.splice(index, 1);
      return true;
    },
    last: () => tracks[tracks.length - 1] ?? rootSentinel(),
    empty: () => tracks.length === 0,
    size: () => tracks.length,
    entries: () => Object.freeze(tracks.slice()),
  });
}
