import { invalidProps } from "../errors.js";
import type { Drawable, KeyPress, VNode } from "../widgets/types.js";
import { ui } from "../widgets/ui.js";

export type ConfirmDialogOptions = Readonly<{
  message: string;
  buttons: readonly string[];
  /**
   * Called once with the chosen button, or with index -1 and label "" when
   * the dialog is dismissed with escape.
   */
  onDone: (buttonIndex: number, buttonLabel: string) => void;
}>;

export type ConfirmDialog = Drawable &
  Readonly<{
    focusedButton: () => number;
  }>;

export function createConfirmDialog(opts: ConfirmDialogOptions): ConfirmDialog {
  if (opts.buttons.length === 0) {
    invalidProps("confirm dialog needs at least one button");
  }
  const buttons = Object.freeze(opts.buttons.slice());
  let focused = 0;
  let done = false;

  const finish = (index: number): void => {
    if (done) return;
    done = true;
    opts.onDone(index, index < 0 ? "" : (buttons[index] ?? ""));
  };

  const draw = (): VNode =>
    ui.confirm({ message: opts.message, buttons, focusedButton: focused });

  const onKey = (key: KeyPress): boolean => {
    switch (key.name) {
      case "left":
        focused = (focused + buttons.length - 1) % buttons.length;
        return true;
      case "right":
      case "tab":
        focused = (focused + 1) % buttons.length;
        return true;
      case "return":
      case "enter":
        finish(focused);
        return true;
      case "escape":
        finish(-1);
        return true;
      default:
        return false;
    }
  };

  return { draw, onKey, focusedButton: () => focused };
}
