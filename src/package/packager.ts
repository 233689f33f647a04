/**
 * Executable packager: turns the staged backend into two single-file
 * executables: one attached to a console, one running without a console
 * window. Both embed the same data subtrees of the backend package.
 *
 * The console variant is built first; if it fails the detached variant is not
 * attempted.
 */

import fs from "node:fs";
import path from "node:path";
import { BuildError, BuildErrorCode, outputTail } from "../errors.js";
import { isDirectory } from "../fs/copy.js";
import { DETACHED_SUFFIX } from "../homebrew/directory.js";
import type { StageContext } from "../pipeline/context.js";
import type { PackagedExecutables } from "../types.js";

export type PackageVariant = "console" | "detached";

/** Executable file extension on a host. */
export function executableExtension(platform: NodeJS.Platform): string {
  return platform === "win32" ? ".exe" : "";
}

/** Separator between source and destination in a data declaration. */
export function dataSeparator(platform: NodeJS.Platform): string {
  return platform === "win32" ? ";" : ":";
}

export function variantName(baseName: string, variant: PackageVariant): string {
  return variant === "console" ? baseName : `${baseName}${DETACHED_SUFFIX}`;
}

/**
 * Arguments shared by both variants. Declared data subtrees that are missing
 * from the staged package are left out.
 */
export function commonPackagerArgs(ctx: StageContext): string[] {
  const { config, layout, env, logger } = ctx;
  const { packageDir, entrypoint } = config.backend;
  const sep = dataSeparator(env.platform);

  const args = [
    "--noconfirm",
    "--onefile",
    "--distpath", layout.distRoot,
    "--workpath", layout.buildRoot,
    "--specpath", layout.buildRoot,
  ];

  for (const sub of config.packager.dataDirs) {
    const src = path.join(layout.stagingRoot, packageDir, sub);
    if (!isDirectory(src)) {
      logger.warn(`[forge:package] Data subtree ${packageDir}/${sub} is missing, not embedding it`);
      continue;
    }
    args.push("--add-data", `${src}${sep}${packageDir}/${sub}`);
  }

  for (const mod of config.packager.hiddenImports) {
    args.push(`--hidden-import=${mod}`);
  }

  args.push(path.join(layout.stagingRoot, entrypoint));
  return args;
}

export function variantArgs(ctx: StageContext, variant: PackageVariant, common: string[]): string[] {
  const name = variantName(ctx.config.packager.name, variant);
  return variant === "console"
    ? ["--name", name, ...common]
    : ["--noconsole", "--name", name, ...common];
}

async function packageVariant(ctx: StageContext, variant: PackageVariant, common: string[]): Promise<string> {
  const { config, layout, env, runner, logger } = ctx;
  const name = variantName(config.packager.name, variant);
  const output = path.join(layout.distRoot, `${name}${executableExtension(env.platform)}`);

  logger.info(`[forge:package] Building ${variant} executable ${name}`);
  const result = await runner.run(config.packager.command, variantArgs(ctx, variant, common), {
    cwd: layout.root,
    env: env.toProcessEnv(),
  });
  if (result.exitCode !== 0) {
    throw new BuildError(
      BuildErrorCode.PACKAGE_FAILED,
      `Packaging the ${variant} executable failed (exit ${result.exitCode})`,
      { details: { variant, output: outputTail(result.output) } },
    );
  }
  if (!fs.existsSync(output)) {
    throw new BuildError(
      BuildErrorCode.PACKAGE_OUTPUT_MISSING,
      `Packager reported success but ${output} was not produced`,
      { details: { variant } },
    );
  }
  return output;
}

export async function packageExecutables(ctx: StageContext): Promise<PackagedExecutables> {
  const common = commonPackagerArgs(ctx);
  const consoleExe = await packageVariant(ctx, "console", common);
  const detachedExe = await packageVariant(ctx, "detached", common);
  return { console: consoleExe, detached: detachedExe };
}
