/**
 * Process runner: the one place external tools are spawned.
 *
 * Every call runs to completion and reports its exit code; a non-zero exit is
 * data for the caller, not an exception. Only OS-level install steps pass a
 * timeout; when it fires the call settles at once with `timedOut` set.
 * Stages depend on the ProcessRunner interface so tests can script tool
 * behaviour without spawning anything.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { errorMessage } from "../errors.js";
import type { Logger } from "../types.js";

/** Exit code reported when the command could not be started at all. */
export const SPAWN_FAILED_EXIT_CODE = 127;

/** Exit code reported when the timeout killed the command. */
export const TIMED_OUT_EXIT_CODE = 124;

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Kill the process after this many milliseconds. */
  timeoutMs?: number;
  /** Run through the host shell. Default: true on Windows (npm/pnpm are .cmd shims). */
  shell?: boolean;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
  /** Set when the process never started (ENOENT, EACCES, ...). */
  spawnError?: string;
  timedOut?: boolean;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], opts?: RunOptions): Promise<ProcessResult>;
}

/** Render a command line for log messages. */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(" ");
}

function quoteArg(arg: string): string {
  return /[\s"]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg;
}

/**
 * Kill the child and everything it started. Windows has no process groups,
 * so the tree goes through taskkill; elsewhere the child leads its own group.
 */
function killTree(child: ChildProcess, platform: NodeJS.Platform, logger: Logger): void {
  const pid = child.pid;
  if (pid === undefined) return;
  if (platform === "win32") {
    const killer = spawn("taskkill", ["/pid", String(pid), "/T", "/F"], { windowsHide: true, stdio: "ignore" });
    killer.on("error", (err) => {
      logger.warn(`[forge:exec] taskkill for pid ${pid} failed: ${err.message}`);
      child.kill();
    });
    return;
  }
  try {
    process.kill(-pid, "SIGKILL");
  } catch (err) {
    logger.debug?.(`[forge:exec] Could not signal process group ${pid}: ${errorMessage(err)}`);
    child.kill("SIGKILL");
  }
}

interface ProcessRunnerParams {
  logger: Logger;
  platform?: NodeJS.Platform;
}

export function createProcessRunner(params: ProcessRunnerParams): ProcessRunner {
  const { logger } = params;
  const platform = params.platform ?? process.platform;

  function run(command: string, args: readonly string[], opts?: RunOptions): Promise<ProcessResult> {
    const useShell = opts?.shell ?? platform === "win32";
    logger.debug?.(`[forge:exec] ${formatCommand(command, args)}${opts?.cwd ? ` (cwd ${opts.cwd})` : ""}`);

    return new Promise((resolve) => {
      let stdout = "";
      let stderr = "";
      let output = "";
      let settled = false;

      const finish = (result: ProcessResult): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(result);
      };

      // With a shell the arguments are joined into one command line, so they
      // must be quoted here. A timed POSIX child gets its own process group so
      // the timeout can kill whatever the shell started.
      const detached = opts?.timeoutMs !== undefined && platform !== "win32";
      const child = useShell
        ? spawn([command, ...args].map(quoteArg).join(" "), [], {
            cwd: opts?.cwd,
            env: opts?.env,
            shell: true,
            detached,
            windowsHide: true,
          })
        : spawn(command, [...args], {
            cwd: opts?.cwd,
            env: opts?.env,
            detached,
            windowsHide: true,
          });

      // The timeout settles the call straight away: a grandchild still holding
      // the output pipes would otherwise delay "close" until it exits.
      const timer = opts?.timeoutMs !== undefined
        ? setTimeout(() => {
            killTree(child, platform, logger);
            child.stdout?.destroy();
            child.stderr?.destroy();
            finish({
              exitCode: TIMED_OUT_EXIT_CODE,
              stdout,
              stderr,
              output,
              timedOut: true,
            });
          }, opts.timeoutMs)
        : undefined;

      child.stdout?.on("data", (chunk: Buffer) => {
        const text = chunk.toString("utf8");
        stdout += text;
        output += text;
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        const text = chunk.toString("utf8");
        stderr += text;
        output += text;
      });

      child.on("error", (err) => {
        finish({
          exitCode: SPAWN_FAILED_EXIT_CODE,
          stdout,
          stderr,
          output,
          spawnError: err.message,
        });
      });

      child.on("close", (code, signal) => {
        finish({
          exitCode: code ?? (signal ? 1 : 0),
          stdout,
          stderr,
          output,
        });
      });
    });
  }

  return { run };
}
