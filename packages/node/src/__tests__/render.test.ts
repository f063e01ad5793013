import { ui } from "@kubenav/core";
import { assert, describe, test } from "@kubenav/testkit";
import { Canvas, naturalHeight, renderFrame } from "../terminal/render.js";

describe("renderFrame", () => {
  test("titled text is drawn in a box", () => {
    const canvas = renderFrame(ui.text("hello", { title: "T", border: true }), 12, 3);
    assert.deepEqual(canvas.plainLines(), ["┌─ T ──────┐", "│hello     │", "└──────────┘"]);
    assert.equal(canvas.styleAt(3, 0).bold, true);
    assert.equal(canvas.styleAt(1, 1).bold, false);
  });

  test("tail keeps the newest lines in view", () => {
    const canvas = renderFrame(ui.text("a\nb\nc", { border: true, tail: true }), 5, 4);
    assert.deepEqual(canvas.plainLines(), ["┌───┐", "│b  │", "│c  │", "└───┘"]);
  });

  test("table columns share the spare width and the selection is inverse", () => {
    const node = ui.table({
      title: "pods",
      header: ["NAME", "READY"],
      rows: [
        ["web-0", "1/1"],
        ["web-1", "0/1"],
      ],
      selectedRow: 1,
      selectedColumn: 0,
    });
    const canvas = renderFrame(node, 20, 5);
    assert.deepEqual(canvas.plainLines(), [
      `┌─ pods ${"─".repeat(11)}┐`,
      "│NAME      READY   │",
      "│web-0     1/1     │",
      "│web-1     0/1     │",
      `└${"─".repeat(18)}┘`,
    ]);
    assert.equal(canvas.styleAt(1, 1).bold, true);
    assert.equal(canvas.styleAt(1, 2).inverse, false);
    assert.equal(canvas.styleAt(1, 3).inverse, true);
    assert.equal(canvas.styleAt(18, 3).inverse, true);
  });

  test("table scrolls the selected row into view", () => {
    const node = ui.table({
      title: "t",
      header: ["NAME"],
      rows: [["a"], ["b"], ["c"]],
      selectedRow: 2,
      selectedColumn: 0,
    });
    const lines = renderFrame(node, 8, 4).plainLines();
    assert.equal(lines[1]?.startsWith("│NAME"), true);
    assert.equal(lines[2]?.slice(0, 2), "│c");
  });

  test("centered overlay hides only its own rectangle", () => {
    const node = ui.layers([
      ui.text("base"),
      ui.center(ui.text("x", { border: true }), { width: 6, height: 3 }),
    ]);
    assert.deepEqual(renderFrame(node, 10, 5).plainLines(), [
      "base",
      "  ┌────┐",
      "  │x   │",
      "  └────┘",
      "",
    ]);
  });

  test("confirm centers the message and marks the focused button", () => {
    const node = ui.confirm({ message: "Proceed?", buttons: ["delete", "Cancel"], focusedButton: 1 });
    const canvas = renderFrame(node, 30, 5);
    const lines = canvas.plainLines();
    assert.equal(lines[1], `│${" ".repeat(10)}Proceed?${" ".repeat(10)}│`);
    assert.equal(lines[3], "│   < delete >  < Cancel >   │");
    assert.equal(canvas.styleAt(4, 3).inverse, false);
    assert.equal(canvas.styleAt(16, 3).inverse, true);
  });

  test("column stacks children and the last one takes the rest", () => {
    const node = ui.column({}, [ui.text("top"), ui.text("rest")]);
    assert.deepEqual(renderFrame(node, 10, 3).plainLines(), ["top", "rest", ""]);
    assert.equal(naturalHeight(node), 2);
  });
});

describe("Canvas", () => {
  test("ansiLines switches SGR only when the style changes", () => {
    const canvas = new Canvas(3, 1);
    canvas.put(0, 0, "ab", { tone: "error", bold: false, inverse: false });
    assert.deepEqual(canvas.ansiLines(), ["\x1b[0;31mab\x1b[0;39m \x1b[0m"]);
  });

  test("put clips at the limit and the canvas edge", () => {
    const canvas = new Canvas(4, 1);
    canvas.put(1, 0, "abcdef", undefined, 3);
    assert.deepEqual(canvas.plainLines(), [" ab"]);
    canvas.put(2, 0, "xyz");
    assert.deepEqual(canvas.plainLines(), [" axy"]);
  });
});
