/**
 * Deployment publisher: places both executables and the version marker into
 * the per-user runtime tree and its staging mirror.
 *
 *   <runtime>/services/<name><ext>
 *   <runtime>/services/<name>_noconsole<ext>
 *   <runtime>/.loader.version
 */

import fs from "node:fs";
import path from "node:path";
import { BuildError, BuildErrorCode, errorMessage } from "../errors.js";
import { copyFileInto } from "../fs/copy.js";
import { VERSION_MARKER } from "../homebrew/directory.js";
import { executableExtension, variantName } from "../package/packager.js";
import type { StageContext } from "../pipeline/context.js";
import type { PackagedExecutables } from "../types.js";

export interface PublishedTree {
  root: string;
  consoleExe: string;
  detachedExe: string;
  marker: string;
}

export function publishArtifacts(ctx: StageContext, executables: PackagedExecutables): PublishedTree[] {
  const { config, layout, env, logger } = ctx;
  const marker = path.join(layout.stagingRoot, "dist", VERSION_MARKER);
  const ext = executableExtension(env.platform);

  for (const [label, src] of [
    ["console executable", executables.console],
    ["detached executable", executables.detached],
    ["version marker", marker],
  ] as const) {
    if (!fs.existsSync(src)) {
      throw new BuildError(
        BuildErrorCode.PUBLISH_SOURCE_MISSING,
        `Built ${label} not found at ${src}`,
      );
    }
  }

  const published: PublishedTree[] = [];
  for (const root of [layout.runtimeStagingRoot, layout.userRuntimeRoot]) {
    const services = path.join(root, "services");
    const tree: PublishedTree = {
      root,
      consoleExe: path.join(services, `${variantName(config.packager.name, "console")}${ext}`),
      detachedExe: path.join(services, `${variantName(config.packager.name, "detached")}${ext}`),
      marker: path.join(root, VERSION_MARKER),
    };
    try {
      copyFileInto(executables.console, tree.consoleExe);
      copyFileInto(executables.detached, tree.detachedExe);
      copyFileInto(marker, tree.marker);
    } catch (err) {
      throw new BuildError(
        BuildErrorCode.PUBLISH_FAILED,
        `Publishing to ${root} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    published.push(tree);
  }

  logger.info(`[forge:publish] Published to ${published.map((p) => p.root).join(" and ")}`);
  return published;
}
