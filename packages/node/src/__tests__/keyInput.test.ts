import { PassThrough } from "node:stream";
import type { KeyPress } from "@kubenav/core";
import { assert, describe, flushAsync, test } from "@kubenav/testkit";
import { createKeyInput, toKeyPress } from "../terminal/input.js";

describe("toKeyPress", () => {
  test("printable keys carry their sequence", () => {
    assert.deepEqual(toKeyPress("m", { name: "m" }), {
      name: "m",
      sequence: "m",
      ctrl: false,
      meta: false,
      shift: false,
    });
  });

  test("characters readline leaves unnamed use the string as name", () => {
    assert.equal(toKeyPress("/", { sequence: "/" })?.name, "/");
    assert.equal(toKeyPress("/", undefined)?.sequence, "/");
  });

  test("control keys have no sequence", () => {
    assert.equal(toKeyPress("\x03", { name: "c", ctrl: true })?.sequence, "");
    assert.equal(toKeyPress("\x1b", { name: "escape" })?.sequence, "");
    assert.equal(toKeyPress("\r", { name: "return" })?.sequence, "");
  });

  test("shifted letters keep the upper-case sequence", () => {
    const press = toKeyPress("D", { name: "d", shift: true });
    assert.equal(press?.sequence, "D");
    assert.equal(press?.shift, true);
  });

  test("empty input is ignored", () => {
    assert.equal(toKeyPress(undefined, undefined), null);
  });
});

describe("key input", () => {
  test("decodes keypress events from the stream", async () => {
    const stream = new PassThrough();
    const input = createKeyInput(stream);
    const keys: KeyPress[] = [];
    input.start((press) => keys.push(press));

    stream.write("q");
    stream.write("\x1b[A");
    await flushAsync();

    assert.deepEqual(
      keys.map((k) => k.name),
      ["q", "up"],
    );
    input.stop();
  });

  test("paused input delivers nothing until resumed", async () => {
    const stream = new PassThrough();
    const input = createKeyInput(stream);
    const keys: string[] = [];
    input.start((press) => keys.push(press.name));

    input.pause();
    stream.write("a");
    await flushAsync();
    assert.deepEqual<string[]>(keys, []);

    input.resume();
    await flushAsync();
    stream.write("b");
    await flushAsync();
    assert.deepEqual(keys.includes("b"), true);
    input.stop();
  });

  test("raw mode is toggled on TTY streams", () => {
    const modes: boolean[] = [];
    const stream = Object.assign(new PassThrough(), {
      isTTY: true,
      setRawMode: (mode: boolean) => modes.push(mode),
    });
    const input = createKeyInput(stream);
    input.start(() => undefined);
    input.stop();
    assert.deepEqual(modes, [true, false]);
  });
});
