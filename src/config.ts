/**
 * Forge configuration resolution.
 * Merges a raw JSON object with sensible defaults.
 *
 *   resolveForgeConfig(raw): field-by-field merge, used by tests and embedders
 *   loadForgeConfig()      : reads from file / env directly (CLI)
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { isLogLevel, type LogLevel } from "./logger.js";

export const DEFAULT_REPOSITORY_URL = "https://github.com/SteamDeckHomebrew/decky-loader.git";

/** Pinned language runtime the frontend toolchain is known to build with. */
export const DEFAULT_RUNTIME_VERSION = "18.18.0";

export interface ForgeConfig {
  /** Scratch root holding app/, src/, dist/, temp/ and build/. */
  workspaceRoot: string;
  /** Per-user runtime tree the loader reads at run time. */
  userRuntimeRoot: string;
  logLevel: LogLevel;
  repository: {
    url: string;
  };
  runtime: {
    /** Exact major.minor.patch, without the leading "v". */
    version: string;
    /** Extra directories scanned for an already-installed runtime. */
    searchDirs: string[];
    /** Base URL the pinned installer is downloaded from. */
    distBaseUrl: string;
  };
  tools: {
    git: string;
    primaryPackageManager: string;
    secondaryPackageManager: string;
    python: string;
  };
  backend: {
    /** Entrypoint script inside the backend directory. */
    entrypoint: string;
    /** Backend runtime package directory. */
    packageDir: string;
  };
  packager: {
    command: string;
    /** Executable base name; the detached variant gets a "_noconsole" suffix. */
    name: string;
    hiddenImports: string[];
    /** Data subtrees of the backend package embedded into the executables. */
    dataDirs: string[];
  };
  companion: {
    /** Flag file that switches the companion app into debug mode. */
    flagFile: string;
    launchArgs: string[];
    shortcutName: string;
    autostartName: string;
  };
  retry: {
    removeAttempts: number;
    removeDelayMs: number;
    probeAttempts: number;
    probeDelayMs: number;
    downloadAttempts: number;
    downloadDelayMs: number;
    /** Pause after a runtime install before the search path is re-probed. */
    settleDelayMs: number;
  };
  timeouts: {
    /** Applies to OS-level install / uninstall steps only. */
    installMs: number;
  };
}

/** Safely coerce an unknown value to a string-keyed record. */
function toRecord(v: unknown): Record<string, unknown> {
  if (typeof v === "object" && v !== null && !Array.isArray(v)) {
    return v as Record<string, unknown>;
  }
  return {};
}

function str(v: unknown, fallback: string): string {
  return typeof v === "string" && v.length > 0 ? v : fallback;
}

function num(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isFinite(v) && v >= 0 ? v : fallback;
}

function strList(v: unknown, fallback: string[]): string[] {
  return Array.isArray(v)
    ? v.filter((s): s is string => typeof s === "string" && s.trim().length > 0)
    : fallback;
}

export function resolveForgeConfig(raw?: Record<string, unknown> | null): ForgeConfig {
  const r = raw ?? {};
  const repoRaw = toRecord(r.repository);
  const runtimeRaw = toRecord(r.runtime);
  const toolsRaw = toRecord(r.tools);
  const backendRaw = toRecord(r.backend);
  const packagerRaw = toRecord(r.packager);
  const companionRaw = toRecord(r.companion);
  const retryRaw = toRecord(r.retry);
  const timeoutsRaw = toRecord(r.timeouts);

  const envLevel = process.env.FORGE_LOG_LEVEL;
  const logLevel: LogLevel = isLogLevel(r.logLevel)
    ? r.logLevel
    : isLogLevel(envLevel) ? envLevel : "info";

  return {
    workspaceRoot: str(r.workspaceRoot, path.join(os.homedir(), ".forge", "workspace")),
    userRuntimeRoot: str(r.userRuntimeRoot, path.join(os.homedir(), "homebrew")),
    logLevel,
    repository: {
      url: str(repoRaw.url, DEFAULT_REPOSITORY_URL),
    },
    runtime: {
      version: str(runtimeRaw.version, DEFAULT_RUNTIME_VERSION).replace(/^v/, ""),
      searchDirs: strList(runtimeRaw.searchDirs, []),
      distBaseUrl: str(runtimeRaw.distBaseUrl, "https://nodejs.org/dist"),
    },
    tools: {
      git: str(toolsRaw.git, "git"),
      primaryPackageManager: str(toolsRaw.primaryPackageManager, "npm"),
      secondaryPackageManager: str(toolsRaw.secondaryPackageManager, "pnpm"),
      python: str(toolsRaw.python, "python"),
    },
    backend: {
      entrypoint: str(backendRaw.entrypoint, "main.py"),
      packageDir: str(backendRaw.packageDir, "decky_loader"),
    },
    packager: {
      command: str(packagerRaw.command, "pyinstaller"),
      name: str(packagerRaw.name, "PluginLoader"),
      hiddenImports: strList(packagerRaw.hiddenImports, ["logging.handlers", "sqlite3"]),
      dataDirs: strList(packagerRaw.dataDirs, ["static", "locales", "plugin"]),
    },
    companion: {
      flagFile: str(companionRaw.flagFile, ".cef-enable-remote-debugging"),
      launchArgs: strList(companionRaw.launchArgs, ["-dev"]),
      shortcutName: str(companionRaw.shortcutName, "Steam"),
      autostartName: str(companionRaw.autostartName, "PluginLoader"),
    },
    retry: {
      removeAttempts: num(retryRaw.removeAttempts, 3),
      removeDelayMs: num(retryRaw.removeDelayMs, 1_000),
      probeAttempts: num(retryRaw.probeAttempts, 3),
      probeDelayMs: num(retryRaw.probeDelayMs, 5_000),
      downloadAttempts: num(retryRaw.downloadAttempts, 3),
      downloadDelayMs: num(retryRaw.downloadDelayMs, 2_000),
      settleDelayMs: num(retryRaw.settleDelayMs, 10_000),
    },
    timeouts: {
      installMs: num(timeoutsRaw.installMs, 600_000),
    },
  };
}

/**
 * Default config file search paths (highest priority first):
 *   1. $FORGE_CONFIG env
 *   2. ./forge.json (cwd)
 *   3. ~/.forge/forge.json
 */
function resolveConfigPath(): string | null {
  if (process.env.FORGE_CONFIG) {
    return process.env.FORGE_CONFIG;
  }
  const cwdPath = path.resolve("forge.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".forge", "forge.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

/**
 * Load forge config from the file system.
 * Falls back to defaults if no config file is found.
 */
export function loadForgeConfig(): ForgeConfig {
  const configPath = resolveConfigPath();
  if (!configPath) {
    return resolveForgeConfig({});
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid forge config at ${configPath}: expected a JSON object`);
  }
  return resolveForgeConfig(toRecord(raw));
}
