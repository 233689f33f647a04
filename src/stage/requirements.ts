/**
 * Backend requirements: installs the interpreter packages the backend
 * imports, so the packager can find them.
 *
 *   backend/requirements.txt  →  python -m pip install -r requirements.txt
 *   backend/pyproject.toml    →  python -m pip install poetry, then poetry install
 *   neither                   →  warning, nothing installed
 */

import path from "node:path";
import { BuildError, BuildErrorCode, outputTail } from "../errors.js";
import { isFile } from "../fs/copy.js";
import type { StageContext } from "../pipeline/context.js";
import { formatCommand } from "../process/runner.js";

export type RequirementsSource = "requirements.txt" | "pyproject.toml" | "none";

export async function installBackendRequirements(ctx: StageContext): Promise<RequirementsSource> {
  const { config, layout, logger } = ctx;
  const backendDir = path.join(layout.fetchRoot, "backend");
  const python = config.tools.python;

  const requirements = path.join(backendDir, "requirements.txt");
  if (isFile(requirements)) {
    await runStep(ctx, backendDir, python, ["-m", "pip", "install", "-r", requirements]);
    return "requirements.txt";
  }

  if (isFile(path.join(backendDir, "pyproject.toml"))) {
    await runStep(ctx, backendDir, python, ["-m", "pip", "install", "poetry"]);
    await runStep(ctx, backendDir, "poetry", ["install"]);
    return "pyproject.toml";
  }

  logger.warn(`[forge:requirements] No requirements.txt or pyproject.toml in ${backendDir}`);
  return "none";
}

async function runStep(ctx: StageContext, cwd: string, command: string, args: string[]): Promise<void> {
  ctx.logger.info(`[forge:requirements] ${formatCommand(command, args)}`);
  const result = await ctx.runner.run(command, args, { cwd, env: ctx.env.toProcessEnv() });
  if (result.exitCode !== 0) {
    throw new BuildError(
      BuildErrorCode.REQUIREMENTS_INSTALL_FAILED,
      `${formatCommand(command, args)} failed (exit ${result.exitCode})`,
      { details: { output: outputTail(result.output) } },
    );
  }
}
