import { KubenavError, createTraceLog } from "@kubenav/core";
import { assert, describe, test, waitFor } from "@kubenav/testkit";
import { createKubectlRunner } from "../kubectl/runner.js";

// The test process's own node binary stands in for kubectl.
const node = (): ReturnType<typeof createKubectlRunner> =>
  createKubectlRunner({ kubectlPath: process.execPath });

const isProcessFailure = (err: unknown): boolean =>
  err instanceof KubenavError && err.code === "KNAV_PROCESS_FAILED";

describe("kubectl runner", () => {
  test("run resolves with stdout", async () => {
    const out = await node().run(["-e", "process.stdout.write('pods\\nsvc\\n')"]);
    assert.equal(out, "pods\nsvc\n");
  });

  test("a nonzero exit rejects with the trimmed stderr", async () => {
    await assert.rejects(
      node().run(["-e", "process.stderr.write('error: forbidden\\n'); process.exit(3)"]),
      (err: unknown) => isProcessFailure(err) && err instanceof Error && err.message === "error: forbidden",
    );
  });

  test("a silent failure names the command and exit code", async () => {
    await assert.rejects(
      node().run(["-e", "process.exit(2)"]),
      (err: unknown) =>
        err instanceof Error && err.message === "kubectl -e process.exit(2): exited with code 2",
    );
  });

  test("a missing executable rejects with KNAV_PROCESS_FAILED", async () => {
    const runner = createKubectlRunner({ kubectlPath: "/nonexistent/kubenav-test-kubectl" });
    await assert.rejects(runner.run(["version"]), isProcessFailure);
  });

  test("aborting run kills the process and rejects", async () => {
    const abort = new AbortController();
    const pending = node().run(["-e", "setTimeout(() => {}, 10000)"], { signal: abort.signal });
    abort.abort();
    await assert.rejects(pending, isProcessFailure);
  });

  test("stream calls onLine per stdout line and resolves on exit", async () => {
    const lines: string[] = [];
    await node().stream(
      ["-e", "console.log('first'); console.log('second')"],
      (line) => lines.push(line),
      new AbortController().signal,
    );
    assert.deepEqual(lines, ["first", "second"]);
  });

  test("stream resolves once aborted", async () => {
    const abort = new AbortController();
    const lines: string[] = [];
    const done = node().stream(
      ["-e", "setInterval(() => console.log('tick'), 10)"],
      (line) => lines.push(line),
      abort.signal,
    );
    await waitFor(() => lines.length > 0);
    abort.abort();
    await done;
    assert.equal(lines[0], "tick");
  });

  test("stream rejects when the process fails on its own", async () => {
    await assert.rejects(
      node().stream(
        ["-e", "process.stderr.write('pod not found'); process.exit(1)"],
        () => undefined,
        new AbortController().signal,
      ),
      /pod not found/,
    );
  });

  test("namespace is exposed only when non-empty", () => {
    assert.equal(createKubectlRunner({ namespace: "dev" }).namespace, "dev");
    assert.equal(createKubectlRunner({ namespace: "" }).namespace, undefined);
    assert.equal(createKubectlRunner().namespace, undefined);
  });

  test("every command is traced", async () => {
    const trace = createTraceLog();
    await createKubectlRunner({ kubectlPath: process.execPath, trace }).run(["-e", "0"]);
    const entry = trace.query({ category: "process" })[0];
    assert.equal(entry?.message, "kubectl");
    assert.deepEqual(entry?.detail, { args: "-e 0" });
  });
});
