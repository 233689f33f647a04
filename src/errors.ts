/**
 * Build errors.
 *
 * Every stage either meets its postcondition or throws a BuildError. The kind
 * records how the failure was reached:
 *
 * - **precondition**: a required tool or source subtree is absent; no retry.
 * - **transient**: an environment condition that survived its bounded retries.
 * - **fatal**: an external process or file operation failed outright.
 *
 * Best-effort operations (stale directory cleanup) do not throw; they report
 * an advisory value instead (see RemovalResult in fs/remover.ts).
 */

export type FailureKind = "precondition" | "transient" | "fatal";

/** Build error codes, organized by stage. */
export enum BuildErrorCode {
  // --- Dependencies (1xxx) ---
  TOOL_MISSING = 1001,
  TOOL_INSTALL_FAILED = 1002,
  RUNTIME_DOWNLOAD_FAILED = 1003,
  RUNTIME_INSTALL_FAILED = 1004,
  RUNTIME_VERIFY_FAILED = 1005,

  // --- Workspace (2xxx) ---
  WORKSPACE_PREPARE_FAILED = 2001,

  // --- Source (3xxx) ---
  CLONE_FAILED = 3001,
  CHECKOUT_FAILED = 3002,

  // --- Frontend (4xxx) ---
  FRONTEND_MISSING = 4001,
  FRONTEND_BUILD_FAILED = 4002,

  // --- Backend (5xxx) ---
  BACKEND_MISSING = 5001,
  BACKEND_STAGE_FAILED = 5002,
  REQUIREMENTS_INSTALL_FAILED = 5003,

  // --- Packaging (6xxx) ---
  PACKAGE_FAILED = 6001,
  PACKAGE_OUTPUT_MISSING = 6002,

  // --- Deployment (7xxx) ---
  PUBLISH_SOURCE_MISSING = 7001,
  PUBLISH_FAILED = 7002,

  // --- OS integration (8xxx) ---
  COMPANION_APP_NOT_FOUND = 8001,
  OS_INTEGRATION_FAILED = 8002,

  // --- General (9xxx) ---
  UNKNOWN = 9001,
}

export interface BuildErrorOptions {
  kind?: FailureKind;
  /** Captured process output or other debugging info. */
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class BuildError extends Error {
  readonly code: BuildErrorCode;
  readonly kind: FailureKind;
  readonly details: Record<string, unknown>;

  constructor(code: BuildErrorCode, message: string, opts?: BuildErrorOptions) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "BuildError";
    this.code = code;
    this.kind = opts?.kind ?? "fatal";
    this.details = opts?.details ?? {};
  }
}

/** Wrap anything thrown into a BuildError, leaving BuildErrors untouched. */
export function toBuildError(err: unknown): BuildError {
  if (err instanceof BuildError) return err;
  return new BuildError(BuildErrorCode.UNKNOWN, errorMessage(err), { cause: err });
}

/** Safely extract an error message from an unknown error value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Keep the last `maxLines` lines of captured process output. */
export function outputTail(output: string, maxLines = 20): string {
  const lines = output.trimEnd().split(/\r?\n/);
  return lines.slice(-maxLines).join("\n");
}
