/**
 * Build orchestrator: runs the stages strictly in sequence.
 *
 *   dependencies → workspace → source → runtime-tree → frontend → backend →
 *   requirements → package → publish → os-integration
 *
 * The first failing stage stops the run; nothing after it executes. The
 * temporary artifact set is released on every exit path. Failures come back
 * as a BuildOutcome value rather than a rejection, so callers decide how to
 * report them.
 */

import type { ForgeConfig } from "../config.js";
import { checkDependencies } from "../deps/checker.js";
import type { Downloader } from "../deps/download.js";
import type { RuntimeInstallHost } from "../deps/runtime-host.js";
import { publishArtifacts, type PublishedTree } from "../deploy/publisher.js";
import type { BuildEnvironment } from "../env/environment.js";
import { BuildError, toBuildError } from "../errors.js";
import { buildFrontend } from "../build/frontend.js";
import { computeLayout } from "../homebrew/layout.js";
import { prepareWorkspace, setupRuntimeTrees } from "../homebrew/provisioner.js";
import { integrateWithOs } from "../os/integrator.js";
import type { OsIntegration } from "../os/integration.js";
import { packageExecutables } from "../package/packager.js";
import type { ProcessRunner } from "../process/runner.js";
import { fetchSource } from "../source/fetcher.js";
import { stageBackend } from "../stage/backend.js";
import { installBackendRequirements } from "../stage/requirements.js";
import type { BuildRequest, Logger, StageName } from "../types.js";
import { createTemporaryArtifactSet, type TemporaryArtifactSet } from "./artifacts.js";
import type { StageContext } from "./context.js";

export interface BuildDeps {
  config: ForgeConfig;
  logger: Logger;
  env: BuildEnvironment;
  runner: ProcessRunner;
  runtimeHost: RuntimeInstallHost;
  downloader: Downloader;
  osIntegration: OsIntegration;
  /** Defaults to a fresh set using the configured remove retry policy. */
  artifacts?: TemporaryArtifactSet;
}

export type BuildOutcome =
  | {
    ok: true;
    release: string;
    completedStages: StageName[];
    /** Runtime tree the loader runs from. */
    installRoot: string;
  }
  | {
    ok: false;
    release: string;
    failedStage: StageName;
    error: BuildError;
    completedStages: StageName[];
  };

export async function runBuild(request: BuildRequest, deps: BuildDeps): Promise<BuildOutcome> {
  const { config, logger } = deps;
  const layout = computeLayout(config);
  const artifacts = deps.artifacts ?? createTemporaryArtifactSet({
    logger,
    removeAttempts: config.retry.removeAttempts,
    removeDelayMs: config.retry.removeDelayMs,
  });
  const ctx: StageContext = {
    config,
    layout,
    env: deps.env,
    runner: deps.runner,
    artifacts,
    logger,
  };

  const completedStages: StageName[] = [];
  let release = request.releaseRef;
  let current: StageName = "dependencies";

  async function stage<T>(name: StageName, fn: () => T | Promise<T>): Promise<T> {
    current = name;
    logger.info(`[forge] Running stage "${name}"`);
    const result = await fn();
    completedStages.push(name);
    return result;
  }

  logger.info(`[forge] Building release "${release}" in ${layout.root}`);

  try {
    await stage("dependencies", () =>
      checkDependencies(ctx, { host: deps.runtimeHost, downloader: deps.downloader }),
    );
    await stage("workspace", () => prepareWorkspace(ctx));

    const fetched = await stage("source", () => fetchSource(ctx, release));
    release = fetched.release;

    await stage("runtime-tree", () => setupRuntimeTrees(ctx));
    await stage("frontend", () => buildFrontend(ctx, release));
    await stage("backend", () => stageBackend(ctx, release));
    await stage("requirements", () => installBackendRequirements(ctx));
    const executables = await stage("package", () => packageExecutables(ctx));
    const published: PublishedTree[] = await stage("publish", () => publishArtifacts(ctx, executables));

    const userTree = published.find((tree) => tree.root === layout.userRuntimeRoot);
    if (!userTree) {
      throw new Error(`nothing was published to ${layout.userRuntimeRoot}`);
    }
    await stage("os-integration", () => integrateWithOs(ctx, deps.osIntegration, userTree));

    logger.info(`[forge] Release ${release} installed to ${layout.userRuntimeRoot}`);
    return { ok: true, release, completedStages, installRoot: layout.userRuntimeRoot };
  } catch (err) {
    const error = toBuildError(err);
    logger.error(`[forge] Stage "${current}" failed: [${error.code}] ${error.message}`);
    return { ok: false, release, failedStage: current, error, completedStages };
  } finally {
    await artifacts.release();
  }
}
