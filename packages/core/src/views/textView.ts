import type { Drawable, KeyPress, VNode } from "../widgets/types.js";
import { ui } from "../widgets/ui.js";

export type TextViewOptions = Readonly<{
  title: string;
  text?: string;
  /** Keep the newest lines in view (log streams). */
  follow?: boolean;
  /** Escape pressed while focused. */
  onClose?: () => void;
}>;

/**
 * Scrollable text page (YAML, describe output, log streams).
 */
export class TextView implements Drawable {
  readonly title: string;
  private lines: string[];
  private follow: boolean;
  private offset = 0;
  private readonly onClose: (() => void) | undefined;

  constructor(opts: TextViewOptions) {
    this.title = opts.title;
    this.lines = opts.text === undefined || opts.text === "" ? [] : opts.text.split("\n");
    this.follow = opts.follow === true;
    this.onClose = opts.onClose;
  }

  append(line: string): void {
    this.lines.push(line);
  }

  setText(text: string): void {
    this.lines = text === "" ? [] : text.split("\n");
    this.offset = 0;
  }

  text(): string {
    return this.lines.join("\n");
  }

  lineCount(): number {
    return this.lines.length;
  }

  draw(): VNode {
    return ui.text(this.text(), {
      title: this.title,
      border: true,
      ...(this.follow ? { tail: true } : { scroll: this.offset }),
    });
  }

  onKey(key: KeyPress): boolean {
    switch (key.name) {
      case "escape":
        if (!this.onClose) return false;
        this.onClose();
        return true;
      case "up":
        if (this.follow) {
          this.follow = false;
          this.offset = Math.max(0, this.lines.length - 1);
        }
        this.offset = Math.max(0, this.offset - 1);
        return true;
      case "down":
        this.offset = Math.min(Math.max(0, this.lines.length - 1), this.offset + 1);
        return true;
      default:
        return false;
    }
  }
}
