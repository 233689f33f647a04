import type { BuildEnvironment } from "../env/environment.js";
import type { ProcessRunner } from "../process/runner.js";

export interface ProbeResult {
  found: boolean;
  /** First line of the tool's version output, trimmed. Empty when not found. */
  version: string;
  /** Why the probe failed, when it did. */
  reason?: string;
}

/**
 * Run `<command> --version` with the build environment's search path.
 * A spawn failure or a non-zero exit means the tool is not usable.
 */
export async function probeTool(
  runner: ProcessRunner,
  env: BuildEnvironment,
  command: string,
): Promise<ProbeResult> {
  const result = await runner.run(command, ["--version"], { env: env.toProcessEnv() });
  if (result.spawnError !== undefined) {
    return { found: false, version: "", reason: result.spawnError };
  }
  if (result.exitCode !== 0) {
    return { found: false, version: "", reason: `exit code ${result.exitCode}` };
  }
  const text = result.stdout.trim() || result.output.trim();
  return { found: true, version: text.split(/\r?\n/)[0].trim() };
}

/** Whether a `node --version` style string is exactly the pinned version. */
export function matchesPinnedVersion(reported: string, pinned: string): boolean {
  return reported.trim().replace(/^v/, "") === pinned.replace(/^v/, "");
}
