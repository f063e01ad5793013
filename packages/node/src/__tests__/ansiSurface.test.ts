import { staticDrawable, ui } from "@kubenav/core";
import { assert, describe, flushAsync, test } from "@kubenav/testkit";
import xtermHeadless from "@xterm/headless";
import { createAnsiSurface } from "../terminal/ansiSurface.js";

const ENTER = "\x1b[?1049h\x1b[?25l\x1b[2J";
const LEAVE = "\x1b[0m\x1b[?25h\x1b[?1049l";

function setup(color = false, columns = 20, rows = 4) {
  const writes: string[] = [];
  const surface = createAnsiSurface({
    output: { write: (chunk: string) => writes.push(chunk) },
    color,
    size: () => ({ columns, rows }),
  });
  return { surface, writes };
}

describe("ansi surface", () => {
  test("nothing is drawn before start", async () => {
    const { surface, writes } = setup();
    surface.show("root", staticDrawable(ui.text("hello")));
    await flushAsync();
    assert.equal(surface.drawCount(), 0);
    assert.deepEqual(writes, []);
    assert.equal(surface.visibleName(), "root");
  });

  test("start enters the alternate screen and draws the visible page", () => {
    const { surface, writes } = setup();
    surface.show("root", staticDrawable(ui.text("hello")));
    surface.setFooter("1 API Resources");
    surface.start();
    assert.equal(writes[0], ENTER);
    assert.equal(surface.drawCount(), 1);
    assert.deepEqual(surface.lastFrame(), ["hello", "", "", "1 API Resources"]);
  });

  test("draw requests in one turn coalesce into one render", async () => {
    const { surface } = setup();
    surface.show("root", staticDrawable(ui.text("a")));
    surface.start();
    surface.requestDraw();
    surface.requestDraw();
    surface.setFooter("footer");
    await flushAsync(1);
    assert.equal(surface.drawCount(), 2);
    assert.equal(surface.lastFrame()[3], "footer");
  });

  test("a prompt replaces the footer until cleared", () => {
    const { surface } = setup();
    surface.show("pods", staticDrawable(ui.text("a")));
    surface.setFooter("2 Pods");
    surface.start();
    surface.setPrompt("/web");
    surface.drawNow();
    assert.equal(surface.lastFrame()[3], "/web");
    surface.setPrompt(null);
    surface.drawNow();
    assert.equal(surface.lastFrame()[3], "2 Pods");
  });

  test("suspend leaves the screen for the task and redraws after", async () => {
    const { surface, writes } = setup();
    surface.show("pods", staticDrawable(ui.text("a")));
    surface.start();
    let drawsDuringTask = -1;
    await surface.suspend(async () => {
      surface.requestDraw();
      await flushAsync(1);
      drawsDuringTask = surface.drawCount();
    });
    assert.equal(drawsDuringTask, 1);
    assert.equal(surface.drawCount(), 2);
    assert.equal(writes[0], ENTER);
    assert.equal(writes[2], LEAVE);
    assert.equal(writes[3], ENTER);
  });

  test("stop leaves the screen and ignores later requests", async () => {
    const { surface, writes } = setup();
    surface.show("pods", staticDrawable(ui.text("a")));
    surface.start();
    surface.stop();
    surface.requestDraw();
    await flushAsync(1);
    assert.equal(writes[writes.length - 1], LEAVE);
    assert.equal(surface.drawCount(), 1);
  });

  test("focus is tracked separately from the visible page", () => {
    const { surface } = setup();
    const page = staticDrawable(ui.text("page"));
    const dialog = staticDrawable(ui.text("dialog"));
    surface.show("pods", page);
    surface.focus(dialog);
    assert.equal(surface.focused(), dialog);
  });

  test("colour output renders on a real terminal emulator", async () => {
    const { surface, writes } = setup(true, 24, 5);
    surface.show(
      "pods",
      staticDrawable(
        ui.table({
          title: "pods",
          header: ["NAME"],
          rows: [["web-0"]],
          selectedRow: 0,
          selectedColumn: 0,
        }),
      ),
    );
    surface.setFooter("[2 Pods]");
    surface.start();

    const term = new xtermHeadless.Terminal({ cols: 24, rows: 5, allowProposedApi: true });
    await new Promise<void>((resolve) => term.write(writes.join(""), resolve));
    const line = (row: number): string => term.buffer.active.getLine(row)?.translateToString(true) ?? "";

    assert.equal(line(0), `┌─ pods ${"─".repeat(15)}┐`);
    assert.equal(line(1), `│NAME${" ".repeat(18)}│`);
    assert.equal(line(2), `│web-0${" ".repeat(17)}│`);
    assert.equal(line(4), "[2 Pods]");
    assert.notEqual(term.buffer.active.getLine(2)?.getCell(1)?.isInverse(), 0);
    term.dispose();
  });
});
