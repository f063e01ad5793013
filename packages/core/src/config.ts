import { invalidProps } from "./errors.js";

export type OverlaySize = Readonly<{ width: number; height: number }>;

export type NavigatorConfig = Readonly<{
  /** Name of the page history falls back to (default: "root"). */
  rootPage?: string;
  /** Delay before a status overlay dismisses itself, in ms (default: 1000). */
  statusDismissMs?: number;
  menuSize?: OverlaySize;
  dialogSize?: OverlaySize;
  statusSize?: OverlaySize;
}>;

/** Resolved configuration with defaults applied. */
export type ResolvedNavigatorConfig = Readonly<{
  rootPage: string;
  statusDismissMs: number;
  menuSize: OverlaySize;
  dialogSize: OverlaySize;
  statusSize: OverlaySize;
}>;

/** Default configuration values. */
export const DEFAULT_NAVIGATOR_CONFIG: ResolvedNavigatorConfig = Object.freeze({
  rootPage: "root",
  statusDismissMs: 1000,
  menuSize: Object.freeze({ width: 60, height: 15 }),
  dialogSize: Object.freeze({ width: 40, height: 15 }),
  statusSize: Object.freeze({ width: 100, height: 5 }),
});

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer`);
  return v;
}

function resolveSize(name: string, v: OverlaySize | undefined, fallback: OverlaySize): OverlaySize {
  if (v === undefined) return fallback;
  return Object.freeze({
    width: requirePositiveInt(`${name}.width`, v.width),
    height: requirePositiveInt(`${name}.height`, v.height),
  });
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveNavigatorConfig(
  config: NavigatorConfig | undefined,
): ResolvedNavigatorConfig {
  if (!config) return DEFAULT_NAVIGATOR_CONFIG;

  let rootPage = DEFAULT_NAVIGATOR_CONFIG.rootPage;
  if (config.rootPage !== undefined) {
    rootPage = config.rootPage.trim();
    if (rootPage.length === 0) invalidProps("rootPage must be a non-empty string");
  }
  const statusDismissMs =
    config.statusDismissMs === undefined
      ? DEFAULT_NAVIGATOR_CONFIG.statusDismissMs
      : requireNonNegativeInt("statusDismissMs", config.statusDismissMs);

  return Object.freeze({
    rootPage,
    statusDismissMs,
    menuSize: resolveSize("menuSize", config.menuSize, DEFAULT_NAVIGATOR_CONFIG.menuSize),
    dialogSize: resolveSize("dialogSize", config.dialogSize, DEFAULT_NAVIGATOR_CONFIG.dialogSize),
    statusSize: resolveSize("statusSize", config.statusSize, DEFAULT_NAVIGATOR_CONFIG.statusSize),
  });
}
