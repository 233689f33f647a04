/**
 * Dependency checker: verifies the external tools a build needs.
 *
 * Policy per tool:
 *
 *   runtime            pinned version, installed by the ToolInstaller if needed
 *   version control    missing → fatal
 *   primary pkg mgr    missing → fatal
 *   secondary pkg mgr  missing → global install via the primary, one re-probe,
 *                      still missing → fatal
 *   backend python     missing → fatal
 *
 * Tools nothing here can install are checked before the runtime, so a
 * missing one aborts the run before any download or install. The package
 * managers come after the runtime: the primary ships with it.
 */

import { BuildError, BuildErrorCode, outputTail } from "../errors.js";
import type { StageContext } from "../pipeline/context.js";
import { formatCommand } from "../process/runner.js";
import { ensureRuntime, type RuntimeInstallDeps, type RuntimeResult } from "./installer.js";
import { probeTool } from "./probe.js";

export type ToolRole =
  | "runtime"
  | "version-control"
  | "primary-package-manager"
  | "secondary-package-manager"
  | "backend-interpreter";

export interface ToolStatus {
  role: ToolRole;
  command: string;
  version: string;
  /** True when this run installed the tool. */
  installed: boolean;
}

export interface DependencyReport {
  runtime: RuntimeResult;
  tools: ToolStatus[];
}

const INSTALL_HINTS: Partial<Record<ToolRole, string>> = {
  "version-control": "install git from https://git-scm.com/downloads",
  "primary-package-manager": "it ships with the language runtime; reinstall the runtime",
  "backend-interpreter": "install Python 3.8 or later",
};

export async function checkDependencies(
  ctx: StageContext,
  deps: RuntimeInstallDeps,
): Promise<DependencyReport> {
  const { config, logger } = ctx;
  logger.info("[forge:deps] Checking dependencies");

  const git = await requireTool(ctx, "version-control", config.tools.git);
  const python = await requireTool(ctx, "backend-interpreter", config.tools.python);

  const runtime = await ensureRuntime(ctx, deps);
  const tools: ToolStatus[] = [
    { role: "runtime", command: "node", version: runtime.version, installed: runtime.source === "installed" },
    git,
  ];
  tools.push(await requireTool(ctx, "primary-package-manager", config.tools.primaryPackageManager));
  tools.push(await ensureSecondaryPackageManager(ctx));
  tools.push(python);

  logger.info("[forge:deps] All dependencies are satisfied");
  return { runtime, tools };
}

async function requireTool(ctx: StageContext, role: ToolRole, command: string): Promise<ToolStatus> {
  const probe = await probeTool(ctx.runner, ctx.env, command);
  if (!probe.found) {
    const hint = INSTALL_HINTS[role];
    throw new BuildError(
      BuildErrorCode.TOOL_MISSING,
      `${command} is not available (${probe.reason ?? "unknown"})${hint ? `; ${hint}` : ""}`,
      { kind: "precondition", details: { role, command } },
    );
  }
  ctx.logger.info(`[forge:deps] ${command}: ${probe.version}`);
  return { role, command, version: probe.version, installed: false };
}

async function ensureSecondaryPackageManager(ctx: StageContext): Promise<ToolStatus> {
  const { config, env, runner, logger } = ctx;
  const command = config.tools.secondaryPackageManager;
  const role: ToolRole = "secondary-package-manager";

  const probe = await probeTool(runner, env, command);
  if (probe.found) {
    logger.info(`[forge:deps] ${command}: ${probe.version}`);
    return { role, command, version: probe.version, installed: false };
  }

  const primary = config.tools.primaryPackageManager;
  const args = ["install", "--global", command];
  logger.info(`[forge:deps] ${command} not found, running ${formatCommand(primary, args)}`);
  const install = await runner.run(primary, args, { env: env.toProcessEnv() });
  if (install.exitCode !== 0) {
    throw new BuildError(
      BuildErrorCode.TOOL_INSTALL_FAILED,
      `Installing ${command} with ${primary} failed (exit ${install.exitCode})`,
      { details: { output: outputTail(install.output) } },
    );
  }

  const reprobe = await probeTool(runner, env, command);
  if (!reprobe.found) {
    throw new BuildError(
      BuildErrorCode.TOOL_INSTALL_FAILED,
      `${command} still not available after installing it (${reprobe.reason ?? "unknown"})`,
    );
  }
  logger.info(`[forge:deps] Installed ${command} ${reprobe.version}`);
  return { role, command, version: reprobe.version, installed: true };
}
