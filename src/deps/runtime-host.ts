/**
 * Host-specific install mechanics for the pinned language runtime.
 *
 *   win32        MSI installer, silent msiexec install / uninstall
 *   linux/darwin release tarball extracted into a per-user runtimes directory
 *
 * Install and uninstall are the only external calls in the build that carry a
 * timeout.
 */

import fs from "node:fs";
import type { BuildEnvironment } from "../env/environment.js";
import { pathFor } from "../env/environment.js";
import { BuildError, BuildErrorCode, outputTail } from "../errors.js";
import { removeWithRetry } from "../fs/remover.js";
import type { ProcessRunner } from "../process/runner.js";
import type { Logger } from "../types.js";

export interface RuntimeInstallHost {
  readonly platform: NodeJS.Platform;
  /** Runtime binary file name on this host. */
  readonly binaryName: string;
  /** Directories that hold the runtime binary for a given version once installed. */
  runtimeDirs(version: string): string[];
  /** Other directories to put on the search path after an install (global package bins). */
  extraPathDirs(): string[];
  installerFileName(version: string): string;
  installerUrl(distBaseUrl: string, version: string): string;
  /** Remove installed runtimes whose version differs from `version`. */
  uninstallConflicting(version: string): Promise<void>;
  install(installerPath: string, version: string): Promise<void>;
}

interface RuntimeHostParams {
  runner: ProcessRunner;
  env: BuildEnvironment;
  logger: Logger;
  installTimeoutMs: number;
  /** POSIX hosts: directory runtimes are extracted into. */
  runtimesDir: string;
  arch?: string;
}

function distArch(arch: string): string {
  return arch === "ia32" ? "x86" : arch;
}

export function createWindowsRuntimeHost(params: RuntimeHostParams): RuntimeInstallHost {
  const { runner, env, logger, installTimeoutMs } = params;
  const arch = distArch(params.arch ?? process.arch);
  const win = pathFor("win32");
  const programFiles = env.get("ProgramFiles") ?? "C:\\Program Files";
  const appData = env.get("APPDATA");

  async function uninstallConflicting(version: string): Promise<void> {
    const script =
      "Get-ItemProperty 'HKLM:\\Software\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*' | " +
      `Where-Object { $_.DisplayName -eq 'Node.js' -and $_.DisplayVersion -ne '${version}' } | ` +
      "ForEach-Object { Start-Process msiexec.exe -ArgumentList '/x', $_.PSChildName, '/qn', '/norestart' -Wait }";
    const result = await runner.run(
      "powershell",
      ["-NoProfile", "-NonInteractive", "-Command", script],
      { env: env.toProcessEnv(), timeoutMs: installTimeoutMs, shell: false },
    );
    if (result.exitCode !== 0) {
      throw new Error(`uninstall exited with ${result.exitCode}: ${outputTail(result.output, 5)}`);
    }
  }

  async function install(installerPath: string): Promise<void> {
    logger.info(`[forge:runtime] Installing ${installerPath} silently`);
    const result = await runner.run(
      "msiexec",
      ["/i", installerPath, "/qn", "/norestart"],
      { env: env.toProcessEnv(), timeoutMs: installTimeoutMs, shell: false },
    );
    if (result.exitCode !== 0) {
      throw new BuildError(
        BuildErrorCode.RUNTIME_INSTALL_FAILED,
        result.timedOut
          ? `msiexec timed out after ${installTimeoutMs}ms`
          : `msiexec exited with ${result.exitCode}`,
        { details: { output: outputTail(result.output) } },
      );
    }
  }

  return {
    platform: "win32",
    binaryName: "node.exe",
    runtimeDirs: () => [win.join(programFiles, "nodejs")],
    extraPathDirs: () => (appData ? [win.join(appData, "npm")] : []),
    installerFileName: (version) => `node-v${version}-${arch}.msi`,
    installerUrl: (base, version) => `${base}/v${version}/node-v${version}-${arch}.msi`,
    uninstallConflicting,
    install,
  };
}

export function createTarballRuntimeHost(
  params: RuntimeHostParams & { platform: "linux" | "darwin" },
): RuntimeInstallHost {
  const { runner, env, logger, installTimeoutMs, runtimesDir, platform } = params;
  const arch = distArch(params.arch ?? process.arch);
  const posix = pathFor(platform);
  const ext = platform === "linux" ? "tar.xz" : "tar.gz";
  const dirName = (version: string): string => `node-v${version}-${platform}-${arch}`;

  async function uninstallConflicting(version: string): Promise<void> {
    if (!fs.existsSync(runtimesDir)) return;
    for (const entry of fs.readdirSync(runtimesDir)) {
      if (entry.startsWith("node-v") && entry !== dirName(version)) {
        logger.info(`[forge:runtime] Removing conflicting runtime ${entry}`);
        await removeWithRetry(posix.join(runtimesDir, entry), { logger });
      }
    }
  }

  async function install(installerPath: string, version: string): Promise<void> {
    fs.mkdirSync(runtimesDir, { recursive: true });
    logger.info(`[forge:runtime] Extracting ${installerPath} into ${runtimesDir}`);
    const result = await runner.run(
      "tar",
      [platform === "linux" ? "-xJf" : "-xzf", installerPath, "-C", runtimesDir],
      { env: env.toProcessEnv(), timeoutMs: installTimeoutMs, shell: false },
    );
    if (result.exitCode !== 0) {
      throw new BuildError(
        BuildErrorCode.RUNTIME_INSTALL_FAILED,
        result.timedOut
          ? `runtime extraction timed out after ${installTimeoutMs}ms`
          : `tar exited with ${result.exitCode}`,
        { details: { output: outputTail(result.output), version } },
      );
    }
  }

  return {
    platform,
    binaryName: "node",
    runtimeDirs: (version) => [posix.join(runtimesDir, dirName(version), "bin")],
    extraPathDirs: () => [],
    installerFileName: (version) => `${dirName(version)}.${ext}`,
    installerUrl: (base, version) => `${base}/v${version}/${dirName(version)}.${ext}`,
    uninstallConflicting,
    install,
  };
}

/** Pick the runtime install host for a platform, or null when none is supported. */
export function selectRuntimeHost(
  platform: NodeJS.Platform,
  params: RuntimeHostParams,
): RuntimeInstallHost | null {
  switch (platform) {
    case "win32":
      return createWindowsRuntimeHost(params);
    case "linux":
    case "darwin":
      return createTarballRuntimeHost({ ...params, platform });
    default:
      return null;
  }
}
