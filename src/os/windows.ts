/**
 * Windows integration: Steam is found through its registry install path,
 * shortcuts are .lnk files written through the WScript.Shell COM object.
 */

import fs from "node:fs";
import type { BuildEnvironment } from "../env/environment.js";
import { pathFor } from "../env/environment.js";
import type { ProcessRunner } from "../process/runner.js";
import type { Logger } from "../types.js";
import type { CompanionApp, OsIntegration, ShortcutSpec } from "./integration.js";

/** Registry keys holding Steam's InstallPath, 32-bit view first. */
export const STEAM_REGISTRY_KEYS = [
  "HKLM\\SOFTWARE\\WOW6432Node\\Valve\\Steam",
  "HKLM\\SOFTWARE\\Valve\\Steam",
] as const;

const STEAM_EXECUTABLE = "steam.exe";

interface WindowsIntegrationParams {
  runner: ProcessRunner;
  env: BuildEnvironment;
  logger: Logger;
  /** Overrides the existence check on the located executable (tests). */
  fileExists?: (p: string) => boolean;
}

/** Extract a value from `reg query <key> /v <name>` output. */
export function parseRegQueryValue(output: string, name: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const match = /^\s*(\S+)\s+REG_\w+\s+(.*?)\s*$/.exec(line);
    if (match && match[1].toLowerCase() === name.toLowerCase()) {
      return match[2];
    }
  }
  return null;
}

/** Quote a string as a PowerShell single-quoted literal. */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** PowerShell that writes a .lnk shortcut. */
export function shortcutScript(linkPath: string, spec: ShortcutSpec): string {
  const parts = [
    `$s = (New-Object -ComObject WScript.Shell).CreateShortcut(${psQuote(linkPath)})`,
    `$s.TargetPath = ${psQuote(spec.target)}`,
  ];
  if (spec.args.length > 0) parts.push(`$s.Arguments = ${psQuote(spec.args.join(" "))}`);
  if (spec.workingDirectory) parts.push(`$s.WorkingDirectory = ${psQuote(spec.workingDirectory)}`);
  parts.push("$s.Save()");
  return parts.join("; ");
}

export function createWindowsOsIntegration(params: WindowsIntegrationParams): OsIntegration {
  const { runner, env, logger } = params;
  const fileExists = params.fileExists ?? ((p: string) => fs.existsSync(p));
  const win = pathFor("win32");

  function requireVar(name: string): string {
    const value = env.get(name);
    if (!value) throw new Error(`environment variable ${name} is not set`);
    return value;
  }

  async function locateCompanionApp(): Promise<CompanionApp> {
    for (const key of STEAM_REGISTRY_KEYS) {
      const result = await runner.run("reg", ["query", key, "/v", "InstallPath"], {
        env: env.toProcessEnv(),
        shell: false,
      });
      if (result.exitCode !== 0) continue;
      const installDir = parseRegQueryValue(result.stdout, "InstallPath");
      if (!installDir) continue;
      const executable = win.join(installDir, STEAM_EXECUTABLE);
      if (fileExists(executable)) {
        logger.info(`[forge:os] Steam found at ${installDir}`);
        return { installDir, executable };
      }
      logger.warn(`[forge:os] Registry points at ${installDir}, but ${STEAM_EXECUTABLE} is not there`);
    }
    throw new Error("Steam installation not found in registry");
  }

  async function createFlagFile(filePath: string): Promise<void> {
    fs.closeSync(fs.openSync(filePath, "a"));
  }

  async function writeShortcut(dir: string, spec: ShortcutSpec): Promise<string> {
    const linkPath = win.join(dir, `${spec.name}.lnk`);
    const result = await runner.run(
      "powershell",
      ["-NoProfile", "-NonInteractive", "-Command", shortcutScript(linkPath, spec)],
      { env: env.toProcessEnv(), shell: false },
    );
    if (result.exitCode !== 0) {
      throw new Error(`creating ${linkPath} failed (exit ${result.exitCode}): ${result.output.trim()}`);
    }
    return linkPath;
  }

  return {
    host: "win32",
    enabled: true,
    locateCompanionApp,
    createFlagFile,
    createShortcut: async (spec) => writeShortcut(win.join(requireVar("USERPROFILE"), "Desktop"), spec),
    createAutostartEntry: async (spec) =>
      writeShortcut(
        win.join(requireVar("APPDATA"), "Microsoft", "Windows", "Start Menu", "Programs", "Startup"),
        spec,
      ),
  };
}
