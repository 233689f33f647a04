/**
 * OS integration capability: the host-specific hooks the last build stage
 * needs. Implementations:
 *
 *   win32   registry lookup, .lnk shortcuts on the Desktop and in Startup
 *   linux   Steam directory lookup, XDG .desktop launcher and autostart entry
 *   other   no-op (enabled: false), the stage is skipped
 */

import type { Logger } from "../types.js";

export interface CompanionApp {
  /** Installation directory; the debug flag file goes here. */
  installDir: string;
  /** What the launcher shortcut starts. */
  executable: string;
}

export interface ShortcutSpec {
  /** Display name; also the file name of the shortcut. */
  name: string;
  target: string;
  args: string[];
  workingDirectory?: string;
}

export interface OsIntegration {
  readonly host: string;
  /** False for hosts without an implementation; the stage logs and skips. */
  readonly enabled: boolean;
  /** Find the companion app. Throws when it is not installed. */
  locateCompanionApp(): Promise<CompanionApp>;
  /** Create an empty file at `filePath` (leaving an existing one as is). */
  createFlagFile(filePath: string): Promise<void>;
  /** Create a user-visible launcher. Returns its path. */
  createShortcut(spec: ShortcutSpec): Promise<string>;
  /** Create an entry started at login. Returns its path. */
  createAutostartEntry(spec: ShortcutSpec): Promise<string>;
}

export function createNoopOsIntegration(logger: Logger, host: string = process.platform): OsIntegration {
  const skipped = (what: string): void => {
    logger.debug?.(`[forge:os] ${what} not supported on ${host}`);
  };
  return {
    host,
    enabled: false,
    async locateCompanionApp() {
      throw new Error(`companion app lookup is not supported on ${host}`);
    },
    async createFlagFile(filePath) {
      skipped(`flag file ${filePath}`);
    },
    async createShortcut(spec) {
      skipped(`shortcut ${spec.name}`);
      return "";
    },
    async createAutostartEntry(spec) {
      skipped(`autostart entry ${spec.name}`);
      return "";
    },
  };
}
