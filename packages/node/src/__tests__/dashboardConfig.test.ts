import { KubenavError } from "@kubenav/core";
import { assert, describe, test } from "@kubenav/testkit";
import { DEFAULT_REFRESH_INTERVAL_MS, HELP_TEXT, resolveDashboardConfig } from "../config.js";

function invalid(message: string): (err: unknown) => boolean {
  return (err) =>
    err instanceof KubenavError && err.code === "KNAV_INVALID_PROPS" && err.message === message;
}

describe("resolveDashboardConfig", () => {
  test("defaults", () => {
    assert.deepEqual(resolveDashboardConfig([]), {
      refreshIntervalMs: DEFAULT_REFRESH_INTERVAL_MS,
      help: false,
      kubectlPath: "kubectl",
    });
  });

  test("reads separate and inline values", () => {
    const config = resolveDashboardConfig([
      "-n",
      "dev",
      "--context=staging",
      "--kubeconfig",
      "/tmp/kubeconfig",
      "--interval=0",
      "--log-file",
      "/tmp/kubenav.log",
    ]);
    assert.equal(config.namespace, "dev");
    assert.equal(config.context, "staging");
    assert.equal(config.kubeconfig, "/tmp/kubeconfig");
    assert.equal(config.refreshIntervalMs, 0);
    assert.equal(config.logFile, "/tmp/kubenav.log");
  });

  test("--kubectl wins over KUBENAV_KUBECTL", () => {
    const env = { KUBENAV_KUBECTL: "/opt/bin/kubectl" };
    assert.equal(resolveDashboardConfig([], env).kubectlPath, "/opt/bin/kubectl");
    assert.equal(resolveDashboardConfig(["--kubectl", "./kubectl"], env).kubectlPath, "./kubectl");
    assert.equal(resolveDashboardConfig([], { KUBENAV_KUBECTL: "" }).kubectlPath, "kubectl");
  });

  test("--help and -h set help", () => {
    assert.equal(resolveDashboardConfig(["--help"]).help, true);
    assert.equal(resolveDashboardConfig(["-h"]).help, true);
    assert.equal(HELP_TEXT.startsWith("kubenav - "), true);
  });

  test("rejects bad arguments", () => {
    assert.throws(() => resolveDashboardConfig(["--watch"]), invalid("Unknown option: --watch"));
    assert.throws(() => resolveDashboardConfig(["--color=auto"]), invalid("Unknown option: --color"));
    assert.throws(() => resolveDashboardConfig(["-n"]), invalid("Missing value for -n"));
    assert.throws(() => resolveDashboardConfig(["pods"]), invalid("Unexpected argument: pods"));
    assert.throws(
      () => resolveDashboardConfig(["--interval", "1.5"]),
      invalid('--interval must be a non-negative integer (ms), got "1.5"'),
    );
    assert.throws(
      () => resolveDashboardConfig(["--interval="]),
      invalid('--interval must be a non-negative integer (ms), got ""'),
    );
  });
});
