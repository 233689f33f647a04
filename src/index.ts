/**
 * plugin-loader-forge: builds the plugin loader from source and installs it
 * into the per-user runtime tree.
 *
 * Embedders call runBuild() with their own runner, environment and OS hooks;
 * the `forge` CLI wires the real ones.
 */

export { runBuild, type BuildDeps, type BuildOutcome } from "./pipeline/orchestrator.js";
export { loadForgeConfig, resolveForgeConfig, type ForgeConfig } from "./config.js";
export { createForgeLogger, type ForgeLoggerOptions, type LogLevel } from "./logger.js";
export { BuildError, BuildErrorCode, toBuildError, type FailureKind } from "./errors.js";
export { createBuildEnvironment, type BuildEnvironment } from "./env/environment.js";
export {
  createProcessRunner,
  type ProcessRunner,
  type ProcessResult,
  type RunOptions,
} from "./process/runner.js";
export { removeWithRetry, type RemovalResult } from "./fs/remover.js";
export { createTemporaryArtifactSet, type TemporaryArtifactSet } from "./pipeline/artifacts.js";
export { createHttpDownloader, type Downloader } from "./deps/download.js";
export { selectRuntimeHost, type RuntimeInstallHost } from "./deps/runtime-host.js";
export { selectOsIntegration } from "./os/integrator.js";
export { createNoopOsIntegration, type OsIntegration, type ShortcutSpec } from "./os/integration.js";
export { computeLayout } from "./homebrew/layout.js";
export { VERSION_MARKER } from "./homebrew/directory.js";
export {
  SENTINEL_RELEASE,
  type BuildRequest,
  type Logger,
  type StageName,
  type WorkspaceLayout,
} from "./types.js";
