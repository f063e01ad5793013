import { emitKeypressEvents } from "node:readline";
import type { KeyPress } from "@kubenav/core";

/** Shape of readline's keypress event payload. */
export type ReadlineKey = Readonly<{
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}>;

/** `process.stdin` satisfies this; tests use a PassThrough. */
export type KeyInputStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type KeyInput = Readonly<{
  start: (onKey: (key: KeyPress) => void) => void;
  stop: () => void;
  /** Stop reading while a child process owns the terminal. */
  pause: () => void;
  resume: () => void;
}>;

function isPrintable(str: string): boolean {
  if (Array.from(str).length !== 1) return false;
  const code = str.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}

export function toKeyPress(str: string | undefined, key: ReadlineKey | undefined): KeyPress | null {
  const name = key?.name ?? str ?? "";
  if (name === "") return null;
  const ctrl = key?.ctrl === true;
  const meta = key?.meta === true;
  return {
    name,
    sequence: !ctrl && !meta && str !== undefined && isPrintable(str) ? str : "",
    ctrl,
    meta,
    shift: key?.shift === true,
  };
}

export function createKeyInput(stream: KeyInputStream): KeyInput {
  let handler: ((key: KeyPress) => void) | null = null;
  let listening = false;

  const onKeypress = (str: string | undefined, key: ReadlineKey | undefined): void => {
    const press = toKeyPress(str, key);
    if (press && handler) handler(press);
  };

  function attach(): void {
    if (listening) return;
    listening = true;
    if (stream.isTTY === true) stream.setRawMode?.(true);
    stream.on("keypress", onKeypress);
    stream.resume();
  }

  function detach(): void {
    if (!listening) return;
    listening = false;
    stream.off("keypress", onKeypress);
    if (stream.isTTY === true) stream.setRawMode?.(false);
    stream.pause();
  }

  return Object.freeze({
    start(onKey: (key: KeyPress) => void) {
      handler = onKey;
      emitKeypressEvents(stream);
      attach();
    },
    stop() {
      detach();
      handler = null;
    },
    pause: detach,
    resume() {
      if (handler) attach();
    },
  });
}
