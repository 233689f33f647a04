/**
 * OS integrator: the last build stage.
 *
 *   1. locate the companion app (Steam)
 *   2. create its remote-debugging flag file
 *   3. create a launcher that starts it in developer mode
 *   4. start the detached loader executable at login
 *
 * Every step is required and safe to redo.
 */

import path from "node:path";
import type { BuildEnvironment } from "../env/environment.js";
import { BuildError, BuildErrorCode, errorMessage } from "../errors.js";
import type { PublishedTree } from "../deploy/publisher.js";
import type { StageContext } from "../pipeline/context.js";
import type { ProcessRunner } from "../process/runner.js";
import type { Logger } from "../types.js";
import { createNoopOsIntegration, type OsIntegration } from "./integration.js";
import { createLinuxOsIntegration } from "./linux.js";
import { createWindowsOsIntegration } from "./windows.js";

export type IntegrationStep = "locate" | "flag-file" | "shortcut" | "autostart";

export interface IntegrationResult {
  skipped: boolean;
  companionDir?: string;
  flagFile?: string;
  shortcut?: string;
  autostart?: string;
}

export function selectOsIntegration(params: {
  env: BuildEnvironment;
  runner: ProcessRunner;
  logger: Logger;
}): OsIntegration {
  switch (params.env.platform) {
    case "win32":
      return createWindowsOsIntegration(params);
    case "linux":
      return createLinuxOsIntegration(params);
    default:
      return createNoopOsIntegration(params.logger, params.env.platform);
  }
}

async function step<T>(name: IntegrationStep, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new BuildError(
      name === "locate" ? BuildErrorCode.COMPANION_APP_NOT_FOUND : BuildErrorCode.OS_INTEGRATION_FAILED,
      `OS integration step "${name}" failed: ${errorMessage(err)}`,
      { kind: name === "locate" ? "precondition" : "fatal", details: { step: name }, cause: err },
    );
  }
}

export async function integrateWithOs(
  ctx: StageContext,
  integration: OsIntegration,
  userTree: PublishedTree,
): Promise<IntegrationResult> {
  const { config, logger } = ctx;

  if (!integration.enabled) {
    logger.info(`[forge:os] No OS integration for ${integration.host}, skipping`);
    return { skipped: true };
  }

  const companion = await step("locate", () => integration.locateCompanionApp());

  const flagFile = path.join(companion.installDir, config.companion.flagFile);
  await step("flag-file", () => integration.createFlagFile(flagFile));
  logger.info(`[forge:os] Created ${flagFile}`);

  const shortcut = await step("shortcut", () =>
    integration.createShortcut({
      name: config.companion.shortcutName,
      target: companion.executable,
      args: config.companion.launchArgs,
    }),
  );
  logger.info(`[forge:os] Created launcher ${shortcut}`);

  const autostart = await step("autostart", () =>
    integration.createAutostartEntry({
      name: config.companion.autostartName,
      target: userTree.detachedExe,
      args: [],
      workingDirectory: path.dirname(userTree.detachedExe),
    }),
  );
  logger.info(`[forge:os] Created autostart entry ${autostart}`);

  return { skipped: false, companionDir: companion.installDir, flagFile, shortcut, autostart };
}
