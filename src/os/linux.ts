/**
 * Linux integration following the XDG conventions: a launcher in
 * $XDG_DATA_HOME/applications and an autostart entry in
 * $XDG_CONFIG_HOME/autostart, both .desktop files.
 */

import fs from "node:fs";
import type { BuildEnvironment } from "../env/environment.js";
import { pathFor } from "../env/environment.js";
import type { Logger } from "../types.js";
import type { CompanionApp, OsIntegration, ShortcutSpec } from "./integration.js";

interface LinuxIntegrationParams {
  env: BuildEnvironment;
  logger: Logger;
}

const posix = pathFor("linux");

/** Quote one Exec= argument as the desktop entry spec requires. */
export function desktopExecArg(arg: string): string {
  if (!/[\s"'\\`$]/.test(arg)) return arg;
  return `"${arg.replace(/(["`$\\])/g, "\\$1")}"`;
}

export function desktopEntry(spec: ShortcutSpec): string {
  const lines = [
    "[Desktop Entry]",
    "Type=Application",
    `Name=${spec.name}`,
    `Exec=${[spec.target, ...spec.args].map(desktopExecArg).join(" ")}`,
  ];
  if (spec.workingDirectory) lines.push(`Path=${spec.workingDirectory}`);
  lines.push("Terminal=false", "");
  return lines.join("\n");
}

/** File name for a desktop entry: lower-case, dashes for anything unusual. */
export function desktopFileName(name: string): string {
  return `${name.toLowerCase().replace(/[^a-z0-9_.-]+/g, "-")}.desktop`;
}

export function createLinuxOsIntegration(params: LinuxIntegrationParams): OsIntegration {
  const { env, logger } = params;

  function home(): string {
    const value = env.get("HOME");
    if (!value) throw new Error("environment variable HOME is not set");
    return value;
  }

  const dataHome = (): string => env.get("XDG_DATA_HOME") || posix.join(home(), ".local", "share");
  const configHome = (): string => env.get("XDG_CONFIG_HOME") || posix.join(home(), ".config");

  async function locateCompanionApp(): Promise<CompanionApp> {
    const candidates = [posix.join(home(), ".steam", "steam"), posix.join(dataHome(), "Steam")];
    for (const dir of candidates) {
      if (fs.existsSync(dir)) {
        logger.info(`[forge:os] Steam found at ${dir}`);
        return { installDir: fs.realpathSync(dir), executable: "steam" };
      }
    }
    throw new Error(`Steam installation not found (looked in ${candidates.join(", ")})`);
  }

  async function createFlagFile(filePath: string): Promise<void> {
    fs.closeSync(fs.openSync(filePath, "a"));
  }

  function writeEntry(dir: string, spec: ShortcutSpec): string {
    fs.mkdirSync(dir, { recursive: true });
    const entryPath = posix.join(dir, desktopFileName(spec.name));
    fs.writeFileSync(entryPath, desktopEntry(spec), { encoding: "utf8", mode: 0o755 });
    return entryPath;
  }

  return {
    host: "linux",
    enabled: true,
    locateCompanionApp,
    createFlagFile,
    createShortcut: async (spec) => writeEntry(posix.join(dataHome(), "applications"), spec),
    createAutostartEntry: async (spec) => writeEntry(posix.join(configHome(), "autostart"), spec),
  };
}
