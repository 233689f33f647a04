/**
 * Shared type definitions for the forge build pipeline.
 * Kept free of runtime imports so every module can depend on it.
 */

// --- Logging ---

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

// --- Build request ---

/** Placeholder reference that the fetch stage may resolve to a concrete tag. */
export const SENTINEL_RELEASE = "main";

/** What the user asked for. Created once by the CLI and never mutated. */
export interface BuildRequest {
  readonly releaseRef: string;
}

// --- Workspace layout ---

/**
 * Fixed root-relative paths for a run.
 *
 *   <root>/app            fetched loader sources
 *   <root>/src            packaging-ready backend staging
 *   <root>/dist           packager output
 *   <root>/dist/homebrew  staging mirror of the runtime tree
 *   <root>/temp           downloads and other transient files
 *   <root>/build          packager work files
 *   ~/homebrew            per-user runtime tree
 */
export interface WorkspaceLayout {
  readonly root: string;
  readonly fetchRoot: string;
  readonly stagingRoot: string;
  readonly distRoot: string;
  readonly runtimeStagingRoot: string;
  readonly userRuntimeRoot: string;
  readonly tempRoot: string;
  readonly buildRoot: string;
}

// --- Pipeline ---

/** Stage identifiers, in execution order. */
export type StageName =
  | "dependencies"
  | "workspace"
  | "source"
  | "runtime-tree"
  | "frontend"
  | "backend"
  | "requirements"
  | "package"
  | "publish"
  | "os-integration";

/** Paths produced by the packager. */
export interface PackagedExecutables {
  console: string;
  detached: string;
}
