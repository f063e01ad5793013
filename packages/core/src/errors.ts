/**
 * Error type for navigation, refresh and process failures.
 */

/**
 * Deterministic error codes. Every error raised by kubenav carries one.
 */
export type KubenavErrorCode =
  | "KNAV_INVALID_PROPS"
  | "KNAV_INVALID_STATE"
  | "KNAV_PROCESS_FAILED"
  | "KNAV_PARSE_ERROR";

export class KubenavError extends Error {
  override readonly name = "KubenavError";
  readonly code: KubenavErrorCode;

  constructor(code: KubenavErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, KubenavError);
    }
  }
}

export function invalidProps(detail: string): never {
  throw new KubenavError("KNAV_INVALID_PROPS", detail);
}

/**
 * Human-readable message for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
