/**
 * Tool installer: makes the pinned language runtime available.
 *
 * Order of preference:
 *   1. the runtime already on the search path, if it is the pinned version
 *   2. a correct runtime in a known install location (prepended to the path)
 *   3. a fresh silent install from the pinned installer
 *
 * After an install the search path is extended and the runtime re-probed a
 * bounded number of times, because a fresh install is not always visible
 * immediately. Exhausting the re-probes is fatal.
 */

import fs from "node:fs";
import path from "node:path";
import { BuildError, BuildErrorCode, errorMessage } from "../errors.js";
import { pathFor } from "../env/environment.js";
import type { StageContext } from "../pipeline/context.js";
import { sleep, withRetry } from "../retry.js";
import type { Downloader } from "./download.js";
import { matchesPinnedVersion, probeTool } from "./probe.js";
import type { RuntimeInstallHost } from "./runtime-host.js";

export type RuntimeSource = "search-path" | "known-location" | "installed";

export interface RuntimeResult {
  source: RuntimeSource;
  version: string;
  /** Directory prepended to the search path, if any. */
  dir?: string;
}

export interface RuntimeInstallDeps {
  host: RuntimeInstallHost;
  downloader: Downloader;
}

const RUNTIME_COMMAND = "node";

export async function ensureRuntime(ctx: StageContext, deps: RuntimeInstallDeps): Promise<RuntimeResult> {
  const { config, env, runner, logger } = ctx;
  const pinned = config.runtime.version;

  const current = await probeTool(runner, env, RUNTIME_COMMAND);
  if (current.found && matchesPinnedVersion(current.version, pinned)) {
    logger.info(`[forge:runtime] Runtime ${current.version} found on search path`);
    return { source: "search-path", version: current.version };
  }
  logger.info(
    current.found
      ? `[forge:runtime] Runtime ${current.version} found, but v${pinned} is required`
      : `[forge:runtime] Runtime not found (${current.reason ?? "unknown"})`,
  );

  const existing = await scanKnownLocations(ctx, deps.host);
  if (existing) return existing;

  await installPinned(ctx, deps);
  return verifyInstalled(ctx, deps.host);
}

/** Look for an already-installed runtime of the pinned version. */
async function scanKnownLocations(
  ctx: StageContext,
  host: RuntimeInstallHost,
): Promise<RuntimeResult | null> {
  const { config, env, runner, logger } = ctx;
  const pinned = config.runtime.version;
  const hostPath = pathFor(host.platform);
  const candidates = [...config.runtime.searchDirs, ...host.runtimeDirs(pinned)];

  for (const dir of candidates) {
    const binary = hostPath.join(dir, host.binaryName);
    if (!fs.existsSync(binary)) continue;

    const probe = await probeTool(runner, env, binary);
    if (probe.found && matchesPinnedVersion(probe.version, pinned)) {
      env.prependPath(dir);
      logger.info(`[forge:runtime] Using runtime ${probe.version} from ${dir}`);
      return { source: "known-location", version: probe.version, dir };
    }
    logger.debug?.(`[forge:runtime] Skipping ${binary}: reports ${probe.version || "nothing"}`);
  }
  return null;
}

async function installPinned(ctx: StageContext, deps: RuntimeInstallDeps): Promise<void> {
  const { config, layout, artifacts, logger } = ctx;
  const { host, downloader } = deps;
  const pinned = config.runtime.version;

  const installer = path.join(layout.tempRoot, host.installerFileName(pinned));
  artifacts.register(layout.tempRoot);
  artifacts.register(installer);

  if (fs.existsSync(installer)) {
    logger.info(`[forge:runtime] Using cached installer ${installer}`);
  } else {
    const url = host.installerUrl(config.runtime.distBaseUrl, pinned);
    logger.info(`[forge:runtime] Downloading ${url}`);
    try {
      await withRetry(
        () => downloader.download(url, installer),
        { maxAttempts: config.retry.downloadAttempts, baseDelayMs: config.retry.downloadDelayMs },
        logger,
        "runtime download",
      );
    } catch (err) {
      throw new BuildError(
        BuildErrorCode.RUNTIME_DOWNLOAD_FAILED,
        `Could not download runtime installer from ${url}: ${errorMessage(err)}`,
        { kind: "transient", cause: err },
      );
    }
  }

  try {
    await host.uninstallConflicting(pinned);
  } catch (err) {
    logger.warn(`[forge:runtime] Uninstalling conflicting runtimes failed: ${errorMessage(err)}`);
  }

  await host.install(installer, pinned);

  logger.info(`[forge:runtime] Waiting ${config.retry.settleDelayMs}ms for the install to settle`);
  await sleep(config.retry.settleDelayMs);
}

/** Extend the search path with the install directories and re-probe. */
async function verifyInstalled(ctx: StageContext, host: RuntimeInstallHost): Promise<RuntimeResult> {
  const { config, env, runner, logger } = ctx;
  const pinned = config.runtime.version;

  // Reverse so the first runtime dir ends up at the front.
  const dirs = [...host.runtimeDirs(pinned), ...host.extraPathDirs()];
  for (const dir of [...dirs].reverse()) {
    env.prependPath(dir);
  }

  try {
    return await withRetry(
      async () => {
        const probe = await probeTool(runner, env, RUNTIME_COMMAND);
        if (!probe.found) {
          throw new Error(`runtime not on search path (${probe.reason ?? "unknown"})`);
        }
        if (!matchesPinnedVersion(probe.version, pinned)) {
          throw new Error(`runtime reports ${probe.version}, expected v${pinned}`);
        }
        logger.info(`[forge:runtime] Installed runtime ${probe.version}`);
        return { source: "installed" as const, version: probe.version, dir: dirs[0] };
      },
      { maxAttempts: config.retry.probeAttempts, baseDelayMs: config.retry.probeDelayMs },
      logger,
      "runtime verification",
    );
  } catch (err) {
    throw new BuildError(
      BuildErrorCode.RUNTIME_VERIFY_FAILED,
      `Runtime v${pinned} installed but not usable: ${errorMessage(err)}. ` +
      "A restart may be needed before the new search path takes effect; run the build again afterwards.",
      { kind: "transient", cause: err },
    );
  }
}
