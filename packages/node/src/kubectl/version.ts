import { KubenavError } from "@kubenav/core";
import type { KubectlRunner } from "./runner.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * `serverVersion.gitVersion` from `kubectl version -o json` output.
 */
export function parseServerVersion(json: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new KubenavError(
      "KNAV_PARSE_ERROR",
      `kubectl version: invalid JSON (${error instanceof Error ? error.message : String(error)})`,
    );
  }
  const server = isRecord(parsed) ? parsed["serverVersion"] : undefined;
  const gitVersion = isRecord(server) ? server["gitVersion"] : undefined;
  if (typeof gitVersion !== "string" || gitVersion.length === 0) {
    throw new KubenavError("KNAV_PARSE_ERROR", "kubectl version: missing serverVersion.gitVersion");
  }
  return gitVersion;
}

/**
 * Ask the cluster for its version. Rejects when the cluster is unreachable.
 */
export async function fetchServerVersion(runner: KubectlRunner, signal?: AbortSignal): Promise<string> {
  const out = await runner.run(["version", "-o", "json"], signal ? { signal } : {});
  return parseServerVersion(out);
}
