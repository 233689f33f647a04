/**
 * Backend stager: assembles the packaging-ready backend under the staging
 * root:
 *
 *   <staging>/<entrypoint>
 *   <staging>/<package>/            backend runtime package
 *   <staging>/<package>/static/     frontend bundle (when the bundler left one in frontend/dist)
 *   <staging>/<package>/plugin/     plugin resources (when the checkout has them)
 *   <staging>/dist/.loader.version
 *
 * Each subtree is replaced whole, so running the stage twice with the same
 * inputs yields the same tree.
 */

import fs from "node:fs";
import path from "node:path";
import { BuildError, BuildErrorCode, errorMessage } from "../errors.js";
import { copyFileInto, isDirectory, isFile, replaceTree } from "../fs/copy.js";
import { writeVersionMarker } from "../homebrew/provisioner.js";
import type { StageContext } from "../pipeline/context.js";

export interface StagedBackend {
  entrypoint: string;
  packageDir: string;
  markerPath: string;
  /** Optional subtrees that were copied, relative to the staging root. */
  merged: string[];
  /** Optional subtrees whose source was absent. */
  skipped: string[];
}

interface OptionalSubtree {
  /** Source, relative to the fetch root. */
  from: string;
  /** Destination, relative to the staged package directory. */
  to: string;
}

const OPTIONAL_SUBTREES: readonly OptionalSubtree[] = [
  { from: path.join("frontend", "dist"), to: "static" },
  { from: "plugin", to: "plugin" },
];

export function stageBackend(ctx: StageContext, release: string): StagedBackend {
  const { config, layout, logger } = ctx;
  const backendDir = path.join(layout.fetchRoot, "backend");
  const { entrypoint, packageDir } = config.backend;

  if (!isDirectory(backendDir)) {
    throw new BuildError(
      BuildErrorCode.BACKEND_MISSING,
      `Backend directory not found at ${backendDir}`,
      { kind: "precondition" },
    );
  }
  const entrySrc = path.join(backendDir, entrypoint);
  if (!isFile(entrySrc)) {
    throw new BuildError(
      BuildErrorCode.BACKEND_MISSING,
      `Backend entrypoint ${entrypoint} not found in ${backendDir}`,
      { kind: "precondition" },
    );
  }
  const packageSrc = path.join(backendDir, packageDir);
  if (!isDirectory(packageSrc)) {
    throw new BuildError(
      BuildErrorCode.BACKEND_MISSING,
      `Backend package ${packageDir} not found in ${backendDir}`,
      { kind: "precondition" },
    );
  }

  try {
    fs.mkdirSync(path.join(layout.stagingRoot, "dist"), { recursive: true });

    const entryDest = path.join(layout.stagingRoot, entrypoint);
    copyFileInto(entrySrc, entryDest);

    const packageDest = path.join(layout.stagingRoot, packageDir);
    logger.info(`[forge:backend] Staging ${packageDir}`);
    replaceTree(packageSrc, packageDest);

    const merged: string[] = [];
    const skipped: string[] = [];
    for (const subtree of OPTIONAL_SUBTREES) {
      const src = path.join(layout.fetchRoot, subtree.from);
      const rel = path.join(packageDir, subtree.to);
      if (!isDirectory(src)) {
        logger.info(`[forge:backend] No ${subtree.from} in checkout, skipping ${rel}`);
        skipped.push(rel);
        continue;
      }
      replaceTree(src, path.join(layout.stagingRoot, rel));
      merged.push(rel);
    }

    const markerPath = writeVersionMarker(path.join(layout.stagingRoot, "dist"), release);
    logger.info(`[forge:backend] Backend staged for ${release}`);
    return { entrypoint: entryDest, packageDir: packageDest, markerPath, merged, skipped };
  } catch (err) {
    throw new BuildError(
      BuildErrorCode.BACKEND_STAGE_FAILED,
      `Staging the backend failed: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}
