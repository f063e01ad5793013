#!/usr/bin/env node
import { createWriteStream, type WriteStream } from "node:fs";
import { argv, env, exit, stderr, stdin, stdout } from "node:process";
import { createTraceLog, describeError, formatTraceRecord } from "@kubenav/core";
import { HELP_TEXT, resolveDashboardConfig, type DashboardConfig } from "./config.js";
import { createDashboard } from "./dashboard.js";
import { createKubectlRunner } from "./kubectl/runner.js";
import { fetchServerVersion } from "./kubectl/version.js";
import { createAnsiSurface } from "./terminal/ansiSurface.js";
import { createKeyInput } from "./terminal/input.js";
import { KUBENAV_VERSION } from "./version.js";

function parseConfig(): DashboardConfig | number {
  try {
    return resolveDashboardConfig(argv.slice(2), env);
  } catch (error) {
    stderr.write(`kubenav: ${describeError(error)}\n`);
    stderr.write("Run with --help for usage.\n");
    return 2;
  }
}

async function main(): Promise<number> {
  const config = parseConfig();
  if (typeof config === "number") return config;
  if (config.help) {
    stdout.write(HELP_TEXT);
    return 0;
  }

  const trace = createTraceLog({ minSeverity: config.logFile ? "trace" : "info" });
  let sink: WriteStream | null = null;
  if (config.logFile) {
    const file = createWriteStream(config.logFile, { flags: "a" });
    sink = file;
    trace.subscribe((entry) => {
      file.write(`${formatTraceRecord(entry)}\n`);
    });
  }

  const runner = createKubectlRunner({
    kubectlPath: config.kubectlPath,
    trace,
    ...(config.context ? { context: config.context } : {}),
    ...(config.kubeconfig ? { kubeconfig: config.kubeconfig } : {}),
    ...(config.namespace ? { namespace: config.namespace } : {}),
  });

  let clusterVersion: string;
  try {
    clusterVersion = await fetchServerVersion(runner);
  } catch (error) {
    stderr.write(`kubenav: cannot reach the cluster: ${describeError(error)}\n`);
    sink?.end();
    return 1;
  }

  const surface = createAnsiSurface({ output: stdout });
  const input = createKeyInput(stdin);

  const code = await new Promise<number>((resolve) => {
    const dashboard = createDashboard({
      runner,
      surface,
      input,
      appVersion: KUBENAV_VERSION,
      clusterVersion,
      refreshIntervalMs: config.refreshIntervalMs,
      trace,
      onQuit: () => {
        void dashboard.stop().then(
          () => resolve(0),
          (error: unknown) => {
            stderr.write(`kubenav: ${describeError(error)}\n`);
            resolve(1);
          },
        );
      },
    });
    dashboard.start();
  });

  sink?.end();
  return code;
}

main().then(
  (code) => exit(code),
  (error: unknown) => {
    stderr.write(`kubenav: ${describeError(error)}\n`);
    exit(1);
  },
);
