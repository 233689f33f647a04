#!/usr/bin/env node
/**
 * Forge CLI: builds and installs the plugin loader from source.
 *
 * Usage:
 *   forge                 Build the newest tagged release
 *   forge <releaseRef>    Build a specific tag or branch (e.g. v2.10.3)
 *   forge help            Show usage
 */

import os from "node:os";
import path from "node:path";
import { loadForgeConfig } from "../config.js";
import { createHttpDownloader } from "../deps/download.js";
import { selectRuntimeHost } from "../deps/runtime-host.js";
import { createBuildEnvironment } from "../env/environment.js";
import { createForgeLogger } from "../logger.js";
import { selectOsIntegration } from "../os/integrator.js";
import { runBuild } from "../pipeline/orchestrator.js";
import { createProcessRunner } from "../process/runner.js";
import { SENTINEL_RELEASE, type BuildRequest } from "../types.js";

/** POSIX hosts extract the pinned runtime here. */
const RUNTIMES_DIR = path.join(os.homedir(), ".forge", "runtimes");

function showHelp(): void {
  console.log(`
Forge: build and install the plugin loader from source

Usage:
  forge [releaseRef]

Arguments:
  releaseRef              Tag or branch to build (default: "${SENTINEL_RELEASE}",
                          which resolves to the newest tag)

Configuration:
  $FORGE_CONFIG, ./forge.json or ~/.forge/forge.json
  FORGE_LOG_LEVEL         debug, info, warn or error

Examples:
  forge
  forge v2.10.3
`);
}

function showNextSteps(release: string, installRoot: string): void {
  console.log(`
Plugin loader ${release} installed to ${installRoot}

Next steps:
  1. Restart Steam using the new launcher shortcut (it starts Steam in developer mode).
  2. The loader starts automatically at your next login. Its executables are in
     ${path.join(installRoot, "services")}.
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const first = args[0];

  if (first === "help" || first === "--help" || first === "-h") {
    showHelp();
    return;
  }
  if (args.length > 1) {
    console.error(`Unexpected arguments: ${args.slice(1).join(" ")}`);
    showHelp();
    process.exit(1);
  }

  const request: BuildRequest = { releaseRef: first ?? SENTINEL_RELEASE };
  const config = loadForgeConfig();
  const logger = createForgeLogger({ level: config.logLevel });
  const env = createBuildEnvironment();
  const runner = createProcessRunner({ logger, platform: env.platform });

  const runtimeHost = selectRuntimeHost(env.platform, {
    runner,
    env,
    logger,
    installTimeoutMs: config.timeouts.installMs,
    runtimesDir: RUNTIMES_DIR,
  });
  if (!runtimeHost) {
    console.error(`Unsupported platform: ${env.platform}`);
    process.exit(1);
  }

  const outcome = await runBuild(request, {
    config,
    logger,
    env,
    runner,
    runtimeHost,
    downloader: createHttpDownloader(),
    osIntegration: selectOsIntegration({ env, runner, logger }),
  });

  if (!outcome.ok) {
    console.error(`Build failed at ${outcome.failedStage}: ${outcome.error.message}`);
    process.exit(1);
  }
  showNextSteps(outcome.release, outcome.installRoot);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
