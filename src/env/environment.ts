/**
 * Build environment: the explicit environment context threaded through
 * every stage.
 *
 * Holds the executable search path as an ordered list so the ToolInstaller
 * can prepend runtime directories and later stages observe the change through
 * the env they spawn processes with. Nothing in here touches process.env;
 * mutations live for the rest of the run and are never rolled back.
 */

import path from "node:path";

export interface BuildEnvironment {
  readonly platform: NodeJS.Platform;
  /** Search path entries, highest priority first. */
  readonly searchPath: readonly string[];
  /**
   * Put a directory at the front of the search path.
   * Returns false when it was already the first entry.
   */
  prependPath(dir: string): boolean;
  /** Full environment for a child process, with the current search path applied. */
  toProcessEnv(): NodeJS.ProcessEnv;
  /** Read a variable from the underlying environment. */
  get(name: string): string | undefined;
}

export interface BuildEnvironmentOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

export function pathDelimiter(platform: NodeJS.Platform): string {
  return platform === "win32" ? ";" : ":";
}

/** Executable file name for a command on the given host. */
export function executableName(command: string, platform: NodeJS.Platform): string {
  return platform === "win32" && !command.toLowerCase().endsWith(".exe")
    ? `${command}.exe`
    : command;
}

/** Path module matching the target host's separators. */
export function pathFor(platform: NodeJS.Platform): path.PlatformPath {
  return platform === "win32" ? path.win32 : path.posix;
}

/**
 * Find the key holding the search path. Windows environments commonly spell
 * it "Path", and lookups there are case-insensitive.
 */
function searchPathKey(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string {
  if (platform !== "win32") return "PATH";
  return Object.keys(env).find((k) => k.toUpperCase() === "PATH") ?? "PATH";
}

export function createBuildEnvironment(opts?: BuildEnvironmentOptions): BuildEnvironment {
  const platform = opts?.platform ?? process.platform;
  const base: NodeJS.ProcessEnv = { ...(opts?.env ?? process.env) };
  const pathKey = searchPathKey(base, platform);
  const delimiter = pathDelimiter(platform);

  const entries: string[] = (base[pathKey] ?? "")
    .split(delimiter)
    .filter((e) => e.length > 0);

  const sameEntry = (a: string, b: string): boolean =>
    platform === "win32" ? a.toLowerCase() === b.toLowerCase() : a === b;

  function prependPath(dir: string): boolean {
    if (entries.length > 0 && sameEntry(entries[0], dir)) return false;
    const existing = entries.findIndex((e) => sameEntry(e, dir));
    if (existing !== -1) entries.splice(existing, 1);
    entries.unshift(dir);
    return true;
  }

  function toProcessEnv(): NodeJS.ProcessEnv {
    return { ...base, [pathKey]: entries.join(delimiter) };
  }

  return {
    platform,
    get searchPath(): readonly string[] {
      return [...entries];
    },
    prependPath,
    toProcessEnv,
    get: (name: string) => base[name],
  };
}
