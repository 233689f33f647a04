/**
 * Frontend builder: drives the external bundler toolchain.
 *
 * The install and build steps run from one generated script so the second
 * step never starts after the first has failed. The script and the version
 * marker written beside it are transient and registered for cleanup.
 */

import fs from "node:fs";
import path from "node:path";
import { BuildError, BuildErrorCode, outputTail } from "../errors.js";
import { isDirectory } from "../fs/copy.js";
import { writeVersionMarker } from "../homebrew/provisioner.js";
import type { StageContext } from "../pipeline/context.js";

export interface FrontendBuildResult {
  frontendDir: string;
  markerPath: string;
  scriptPath: string;
}

export interface BuildScript {
  fileName: string;
  content: string;
  /** How to run the script file. */
  command: string;
  args(scriptPath: string): string[];
}

/** Generate the install-then-build script for a host. */
export function buildScriptFor(platform: NodeJS.Platform, packageManager: string): BuildScript {
  if (platform === "win32") {
    return {
      fileName: "forge-build-frontend.cmd",
      content: [
        "@echo off",
        `call ${packageManager} install || exit /b 1`,
        `call ${packageManager} run build || exit /b 1`,
        "",
      ].join("\r\n"),
      command: "cmd",
      args: (scriptPath) => ["/d", "/c", scriptPath],
    };
  }
  return {
    fileName: "forge-build-frontend.sh",
    content: [
      "#!/bin/sh",
      "set -e",
      `${packageManager} install`,
      `${packageManager} run build`,
      "",
    ].join("\n"),
    command: "sh",
    args: (scriptPath) => [scriptPath],
  };
}

export async function buildFrontend(ctx: StageContext, release: string): Promise<FrontendBuildResult> {
  const { config, layout, env, runner, artifacts, logger } = ctx;
  const frontendDir = path.join(layout.fetchRoot, "frontend");

  if (!isDirectory(frontendDir)) {
    throw new BuildError(
      BuildErrorCode.FRONTEND_MISSING,
      `Frontend directory not found at ${frontendDir}`,
      { kind: "precondition" },
    );
  }

  const markerPath = writeVersionMarker(frontendDir, release);
  artifacts.register(markerPath);

  const script = buildScriptFor(env.platform, config.tools.secondaryPackageManager);
  const scriptPath = path.join(frontendDir, script.fileName);
  fs.writeFileSync(scriptPath, script.content, { encoding: "utf8", mode: 0o755 });
  artifacts.register(scriptPath);

  logger.info(`[forge:frontend] Installing dependencies and building in ${frontendDir}`);
  const result = await runner.run(script.command, script.args(scriptPath), {
    cwd: frontendDir,
    env: env.toProcessEnv(),
    shell: false,
  });
  if (result.exitCode !== 0) {
    throw new BuildError(
      BuildErrorCode.FRONTEND_BUILD_FAILED,
      `Frontend build failed (exit ${result.exitCode}):\n${outputTail(result.output)}`,
      { details: { output: result.output } },
    );
  }

  logger.info("[forge:frontend] Frontend build completed");
  return { frontendDir, markerPath, scriptPath };
}
