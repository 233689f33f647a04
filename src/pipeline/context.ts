/**
 * Per-run context handed to every stage.
 *
 * Cross-stage state is limited to what lives here: the environment (whose
 * search path the ToolInstaller may extend) and the temporary artifact set.
 * The effective release is passed to each stage as an argument by the
 * orchestrator.
 */

import type { ForgeConfig } from "../config.js";
import type { BuildEnvironment } from "../env/environment.js";
import type { ProcessRunner } from "../process/runner.js";
import type { Logger, WorkspaceLayout } from "../types.js";
import type { TemporaryArtifactSet } from "./artifacts.js";

export interface StageContext {
  readonly config: ForgeConfig;
  readonly layout: WorkspaceLayout;
  readonly env: BuildEnvironment;
  readonly runner: ProcessRunner;
  readonly artifacts: TemporaryArtifactSet;
  readonly logger: Logger;
}

/** Remover settings for a context, so every stage removes trees the same way. */
export function removeOptions(ctx: StageContext): { logger: Logger; attempts: number; delayMs: number } {
  return {
    logger: ctx.logger,
    attempts: ctx.config.retry.removeAttempts,
    delayMs: ctx.config.retry.removeDelayMs,
  };
}
