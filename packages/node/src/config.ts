import { invalidProps } from "@kubenav/core";

export type DashboardConfig = Readonly<{
  namespace?: string;
  context?: string;
  kubeconfig?: string;
  kubectlPath: string;
  /** Periodic refresh of the current page in ms; 0 disables it. */
  refreshIntervalMs: number;
  logFile?: string;
  help: boolean;
}>;

export const DEFAULT_REFRESH_INTERVAL_MS = 5000;

type Env = Readonly<Record<string, string | undefined>>;

type MutableConfig = {
  namespace?: string;
  context?: string;
  kubeconfig?: string;
  kubectlPath?: string;
  refreshIntervalMs: number;
  logFile?: string;
  help: boolean;
};

type ValueOption = "namespace" | "context" | "kubeconfig" | "kubectl" | "interval" | "log-file";

const VALUE_OPTIONS: Readonly<Record<string, ValueOption>> = Object.freeze({
  "--namespace": "namespace",
  "-n": "namespace",
  "--context": "context",
  "--kubeconfig": "kubeconfig",
  "--kubectl": "kubectl",
  "--interval": "interval",
  "--log-file": "log-file",
});

function parseInterval(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isInteger(n) || n < 0) {
    invalidProps(`--interval must be a non-negative integer (ms), got "${value}"`);
  }
  return n;
}

function apply(config: MutableConfig, option: ValueOption, value: string): void {
  switch (option) {
    case "namespace":
      config.namespace = value;
      return;
    case "context":
      config.context = value;
      return;
    case "kubeconfig":
      config.kubeconfig = value;
      return;
    case "kubectl":
      config.kubectlPath = value;
      return;
    case "interval":
      config.refreshIntervalMs = parseInterval(value);
      return;
    case "log-file":
      config.logFile = value;
      return;
  }
}

/**
 * Parse command-line arguments (without the node and script entries).
 * `KUBENAV_KUBECTL` sets the kubectl executable unless `--kubectl` is given.
 */
export function resolveDashboardConfig(args: readonly string[], env: Env = {}): DashboardConfig {
  const config: MutableConfig = { refreshIntervalMs: DEFAULT_REFRESH_INTERVAL_MS, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      config.help = true;
      continue;
    }
    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq > 0) {
      const option = VALUE_OPTIONS[arg.slice(0, eq)];
      if (!option) invalidProps(`Unknown option: ${arg.slice(0, eq)}`);
      apply(config, option, arg.slice(eq + 1));
      continue;
    }
    const option = VALUE_OPTIONS[arg];
    if (option) {
      const value = args[i + 1];
      if (value === undefined || value === "") invalidProps(`Missing value for ${arg}`);
      apply(config, option, value);
      i++;
      continue;
    }
    if (arg.startsWith("-")) invalidProps(`Unknown option: ${arg}`);
    invalidProps(`Unexpected argument: ${arg}`);
  }

  const kubectlPath = config.kubectlPath ?? env["KUBENAV_KUBECTL"] ?? "kubectl";
  return Object.freeze({
    ...config,
    kubectlPath: kubectlPath === "" ? "kubectl" : kubectlPath,
  });
}

export const HELP_TEXT = [
  "kubenav - terminal dashboard for Kubernetes resources",
  "",
  "Usage:",
  "  kubenav [options]",
  "",
  "Options:",
  "  --namespace, -n <name>   Show resources of one namespace (default: all)",
  "  --context <name>         kubeconfig context to use",
  "  --kubeconfig <path>      kubeconfig file to use",
  "  --kubectl <path>         kubectl executable (env: KUBENAV_KUBECTL)",
  "  --interval <ms>          Refresh the current page every <ms>; 0 disables (default: 5000)",
  "  --log-file <path>        Append trace records to <path>",
  "  --help, -h               Show this help",
  "",
].join("\n");
