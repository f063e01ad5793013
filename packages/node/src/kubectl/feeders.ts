import { createDataFeeder, type DataSource, type TableData, type TableRow } from "@kubenav/core";
import type { KubectlRunner } from "./runner.js";
import { parseKubectlTable } from "./table.js";

/** Columns of the root page, in display order. */
export const API_RESOURCE_COLUMNS = ["NAME", "APIVERSION", "NAMESPACED", "KIND"] as const;

/**
 * Arguments listing one resource kind, in every namespace unless the runner
 * is pinned to one.
 */
export function resourceListArgs(kind: string, namespace: string | undefined): string[] {
  const args = ["get", kind, "-o", "wide"];
  if (namespace) {
    args.push("-n", namespace);
  } else {
    args.push("--all-namespaces");
  }
  return args;
}

export function createResourceFeeder(runner: KubectlRunner, kind: string): DataSource {
  return createDataFeeder(async (signal) => {
    const out = await runner.run(resourceListArgs(kind, runner.namespace), { signal });
    return parseKubectlTable(out);
  });
}

/**
 * Keep the root page's columns. Older kubectl prints APIGROUP where newer
 * releases print APIVERSION.
 */
export function projectApiResources(table: TableData): TableData {
  const index = (name: string): number => table.header.indexOf(name);
  const sources = API_RESOURCE_COLUMNS.map((name) => {
    const at = index(name);
    return name === "APIVERSION" && at < 0 ? index("APIGROUP") : at;
  });
  const rows: TableRow[] = table.rows.map((row) =>
    sources.map((at) => (at < 0 ? "" : (row[at] ?? ""))),
  );
  return { header: API_RESOURCE_COLUMNS, rows };
}

export function createApiResourcesFeeder(runner: KubectlRunner): DataSource {
  return createDataFeeder(async (signal) => {
    const out = await runner.run(["api-resources"], { signal });
    return projectApiResources(parseKubectlTable(out));
  });
}
