/**
 * packages/core/src/views/tableView.ts — Table page backed by a DataSource.
 *
 * Cursor positions are kept unclamped and clamped on read, so a position
 * restored before the first fetch survives until rows arrive.
 */

import type { PositionMemory } from "../navigation/positionMemory.js";
import type { PageView } from "../navigation/types.js";
import { createSignalChannel, type SignalChannel } from "../refresh/signalChannel.js";
import type { KeyPress, TableRow, VNode } from "../widgets/types.js";
import { ui } from "../widgets/ui.js";
import type { DataSource } from "./dataSource.js";

const PAGE_STEP = 10;

/**
 * Key-triggered action on the selected row.
 */
export type PageAction = Readonly<{
  /** Single printable character. */
  shortcut: string;
  title: string;
  run: (view: TableView) => void;
}>;

export type TableViewOptions = Readonly<{
  /** Page name; also the resource kind for kubectl-backed tables. */
  name: string;
  title?: string;
  dataSource: DataSource;
  actions?: readonly PageAction[];
  /** Selection changes are recorded here under `name`. */
  positions?: PositionMemory;
  /** Enter on a row. */
  onSubmit?: (view: TableView) => void;
}>;

export type NamespacedName = Readonly<{ namespace: string; name: string }>;

function rowMatches(row: TableRow, search: string): boolean {
  if (search === "") return true;
  return row.join("").includes(search);
}

export class TableView implements PageView {
  readonly name: string;
  readonly title: string;
  readonly signal: SignalChannel = createSignalChannel();

  private readonly source: DataSource;
  private readonly actionList: readonly PageAction[];
  private readonly actionByKey: ReadonlyMap<string, PageAction>;
  private readonly positions: PositionMemory | undefined;
  private readonly onSubmit: ((view: TableView) => void) | undefined;

  private header: readonly string[] = Object.freeze([]);
  private rows: readonly TableRow[] = Object.freeze([]);
  private searchText = "";
  private row = 0;
  private column = 0;
  private pending: Promise<void> = Promise.resolve();

  constructor(opts: TableViewOptions) {
    this.name = opts.name;
    this.title = opts.title ?? opts.name;
    this.source = opts.dataSource;
    this.actionList = Object.freeze((opts.actions ?? []).slice());
    const byKey = new Map<string, PageAction>();
    for (const action of this.actionList) {
      byKey.set(action.shortcut, action);
    }
    this.actionByKey = byKey;
    this.positions = opts.positions;
    this.onSubmit = opts.onSubmit;
  }

  /**
   * Re-fetch and rebuild rows. Overlapping calls run one after another.
   */
  refresh(signal: AbortSignal): Promise<void> {
    const run = async (): Promise<void> => {
      await this.source.refresh(signal);
      this.rebuild();
    };
    const next = this.pending.then(run, run);
    this.pending = next.catch(() => undefined);
    return next;
  }

  draw(): VNode {
    const title = this.searchText === "" ? this.title : `${this.title} (/${this.searchText})`;
    return ui.table({
      title,
      header: this.header,
      rows: this.rows,
      selectedRow: this.selectedIndex(),
      selectedColumn: this.column,
    });
  }

  select(row: number, column: number): void {
    this.row = Math.max(0, Math.trunc(row));
    this.column = Math.max(0, Math.trunc(column));
    this.positions?.record(this.name, this.row, this.column);
  }

  moveSelection(delta: number): void {
    if (this.rows.length === 0) return;
    const next = Math.min(this.rows.length - 1, Math.max(0, this.selectedIndex() + delta));
    if (next === this.row) return;
    this.select(next, this.column);
  }

  /** Effective selected row index, -1 when there are no rows. */
  selectedIndex(): number {
    if (this.rows.length === 0) return -1;
    return Math.min(this.row, this.rows.length - 1);
  }

  selectedRow(): TableRow | undefined {
    const index = this.selectedIndex();
    return index < 0 ? undefined : this.rows[index];
  }

  /** First word of the selected row's first cell, "" when nothing is selected. */
  selectedName(): string {
    const cell = this.selectedRow()?.[0] ?? "";
    return cell.split(" ", 2)[0] ?? "";
  }

  /**
   * Namespace and name of the selected resource. Namespace is "" for
   * tables without a leading NAMESPACE column.
   */
  namespaceAndName(): NamespacedName {
    const row = this.selectedRow();
    if (!row) return { namespace: "", name: "" };
    if (this.header[0] === "NAMESPACE") {
      return { namespace: row[0] ?? "", name: row[1] ?? "" };
    }
    return { namespace: "", name: row[0] ?? "" };
  }

  columns(): readonly string[] {
    return this.header;
  }

  visibleRows(): readonly TableRow[] {
    return this.rows;
  }

  search(): string {
    return this.searchText;
  }

  setSearch(text: string): void {
    this.searchText = text;
    this.rebuild();
  }

  actions(): readonly PageAction[] {
    return this.actionList;
  }

  /** Fire-and-forget refresh request on this page's channel. */
  requestRefresh(): boolean {
    return this.signal.notify();
  }

  onKey(key: KeyPress): boolean {
    switch (key.name) {
      case "up":
        this.moveSelection(-1);
        return true;
      case "down":
        this.moveSelection(1);
        return true;
      case "pageup":
        this.moveSelection(-PAGE_STEP);
        return true;
      case "pagedown":
        this.moveSelection(PAGE_STEP);
        return true;
      case "home":
        this.moveSelection(-this.rows.length);
        return true;
      case "end":
        this.moveSelection(this.rows.length);
        return true;
      case "return":
      case "enter":
        if (!this.onSubmit || this.selectedRow() === undefined) return false;
        this.onSubmit(this);
        return true;
      default:
        break;
    }
    if (key.ctrl || key.meta) return false;
    if (key.sequence === "k") {
      this.moveSelection(-1);
      return true;
    }
    if (key.sequence === "j") {
      this.moveSelection(1);
      return true;
    }
    const action = this.actionByKey.get(key.sequence);
    if (!action) return false;
    action.run(this);
    return true;
  }

  dispose(): void {
    this.signal.close();
  }

  private rebuild(): void {
    this.header = this.source.header();
    const search = this.searchText;
    this.rows = Object.freeze(
      this.source.data().filter((row) => {
        if (row.length > 0 && row[0] === "") return false;
        return rowMatches(row, search);
      }),
    );
  }
}
