import { assert, describe, flushAsync, test } from "@kubenav/testkit";
import { KubenavError } from "../../errors.js";
import { createSignalChannel } from "../signalChannel.js";

describe("signal channel", () => {
  test("a second notify collapses into the pending one", () => {
    const channel = createSignalChannel();
    assert.equal(channel.notify(), true);
    assert.equal(channel.notify(), false);
    assert.equal(channel.pending(), true);
  });

  test("wait consumes a pending notification", async () => {
    const channel = createSignalChannel();
    const abort = new AbortController();
    channel.notify();
    assert.equal(await channel.wait(abort.signal), "signal");
    assert.equal(channel.pending(), false);
  });

  test("notifications posted before the waiter resumes yield one wake-up", async () => {
    const channel = createSignalChannel();
    const abort = new AbortController();
    const results: string[] = [];

    const consume = async (): Promise<void> => {
      for (;;) {
        const woke = await channel.wait(abort.signal);
        results.push(woke);
        if (woke !== "signal") return;
      }
    };
    const done = consume();

    assert.equal(channel.notify(), true);
    assert.equal(channel.notify(), false);
    assert.equal(channel.notify(), false);
    await flushAsync();
    abort.abort();
    await done;

    assert.deepEqual(results, ["signal", "cancelled"]);
  });

  test("abort wins over a pending notification", async () => {
    const channel = createSignalChannel();
    const abort = new AbortController();
    channel.notify();
    abort.abort();
    assert.equal(await channel.wait(abort.signal), "cancelled");
    assert.equal(channel.pending(), true);
  });

  test("close releases the waiter and rejects later notifications", async () => {
    const channel = createSignalChannel();
    const abort = new AbortController();
    const waiting = channel.wait(abort.signal);
    channel.close();
    assert.equal(await waiting, "closed");
    assert.equal(channel.notify(), false);
    assert.equal(channel.closed(), true);
  });

  test("rejects a second concurrent waiter", async () => {
    const channel = createSignalChannel();
    const abort = new AbortController();
    const first = channel.wait(abort.signal);
    await assert.rejects(
      channel.wait(abort.signal),
      (error: unknown) => error instanceof KubenavError && error.code === "KNAV_INVALID_STATE",
    );
    channel.notify();
    assert.equal(await first, "signal");
  });

  test("a cancelled waiter can be replaced", async () => {
    const channel = createSignalChannel();
    const first = new AbortController();
    const waiting = channel.wait(first.signal);
    first.abort();
    assert.equal(await waiting, "cancelled");

    const second = new AbortController();
    const next = channel.wait(second.signal);
    channel.notify();
    assert.equal(await next, "signal");
  });
});
