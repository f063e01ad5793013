/**
 * @kubenav/node
 *
 * Node.js side of kubenav: kubectl process plumbing, the ANSI terminal
 * surface, keyboard input and the dashboard bootstrap.
 */

export {
  createKubectlRunner,
  type KubectlRunOptions,
  type KubectlRunner,
  type KubectlRunnerOptions,
} from "./kubectl/runner.js";
export { parseKubectlTable } from "./kubectl/table.js";
export {
  API_RESOURCE_COLUMNS,
  createApiResourcesFeeder,
  createResourceFeeder,
  projectApiResources,
  resourceListArgs,
} from "./kubectl/feeders.js";
export { fetchServerVersion, parseServerVersion } from "./kubectl/version.js";

export {
  createLogStreams,
  deleteResource,
  describeResource,
  editResource,
  execShell,
  followLogs,
  launch,
  nestedKind,
  resourceActions,
  resourceTarget,
  showYaml,
  type ActionContext,
  type LogStreams,
  type ResourceTarget,
} from "./actions.js";

export {
  FOOTER_KINDS,
  GLOBAL_SHORTCUTS,
  ROOT_PAGE,
  findResourceKind,
  footerLine,
  pageForDigit,
  type ResourceKind,
} from "./resources.js";

export { Canvas, renderFrame, type CellStyle } from "./terminal/render.js";
export {
  createAnsiSurface,
  type AnsiSurface,
  type AnsiSurfaceOptions,
  type SurfaceOutput,
  type TerminalDimensions,
} from "./terminal/ansiSurface.js";
export {
  createKeyInput,
  toKeyPress,
  type KeyInput,
  type KeyInputStream,
  type ReadlineKey,
} from "./terminal/input.js";

export {
  DEFAULT_REFRESH_INTERVAL_MS,
  HELP_TEXT,
  resolveDashboardConfig,
  type DashboardConfig,
} from "./config.js";
export { createDashboard, type Dashboard, type DashboardOptions } from "./dashboard.js";
export { KUBENAV_VERSION } from "./version.js";
