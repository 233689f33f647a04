/**
 * Runtime tree provisioner: scratch workspace reset and runtime tree layout.
 *
 * Handles:
 * - Wiping the fetch, staging and runtime-staging trees at run start
 * - Idempotent creation of the runtime subtrees (no-op when present)
 * - Version marker reads and writes
 */

import fs from "node:fs";
import path from "node:path";
import { BuildError, BuildErrorCode, errorMessage } from "../errors.js";
import { removeWithRetry, type RemovalResult } from "../fs/remover.js";
import { removeOptions, type StageContext } from "../pipeline/context.js";
import { RUNTIME_SUBTREES, VERSION_MARKER, type RuntimeSubtree } from "./directory.js";

export interface RuntimeTreeResult {
  root: string;
  /** Subtrees that did not exist before this call. */
  created: RuntimeSubtree[];
}

/**
 * Give the run a clean slate: stale fetch, staging and runtime-staging trees
 * are removed (advisory on failure) and the empty roots recreated.
 */
export async function prepareWorkspace(ctx: StageContext): Promise<RemovalResult[]> {
  const { layout, logger } = ctx;
  logger.info(`[forge:workspace] Preparing ${layout.root}`);

  const results: RemovalResult[] = [];
  for (const dir of [layout.fetchRoot, layout.stagingRoot, layout.runtimeStagingRoot]) {
    results.push(await removeWithRetry(dir, removeOptions(ctx)));
  }

  try {
    fs.mkdirSync(layout.stagingRoot, { recursive: true });
    fs.mkdirSync(layout.runtimeStagingRoot, { recursive: true });
  } catch (err) {
    throw new BuildError(
      BuildErrorCode.WORKSPACE_PREPARE_FAILED,
      `Failed to create workspace directories: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  return results;
}

/** Create a runtime tree root and all of its subtrees. Existing ones are left alone. */
export function ensureRuntimeTree(root: string): RuntimeTreeResult {
  fs.mkdirSync(root, { recursive: true });
  const created: RuntimeSubtree[] = [];
  for (const subtree of RUNTIME_SUBTREES) {
    const full = path.join(root, subtree);
    if (!fs.existsSync(full)) {
      fs.mkdirSync(full, { recursive: true });
      created.push(subtree);
    }
  }
  return { root, created };
}

/** Lay out the staging mirror and the per-user runtime tree. */
export function setupRuntimeTrees(ctx: StageContext): RuntimeTreeResult[] {
  const { layout, logger } = ctx;
  try {
    fs.mkdirSync(path.join(layout.runtimeStagingRoot, "dist"), { recursive: true });
    const results = [layout.runtimeStagingRoot, layout.userRuntimeRoot].map(ensureRuntimeTree);
    for (const r of results) {
      logger.info(
        `[forge:runtime-tree] ${r.root}: ` +
        (r.created.length > 0 ? `created ${r.created.join(", ")}` : "already complete"),
      );
    }
    return results;
  } catch (err) {
    throw new BuildError(
      BuildErrorCode.WORKSPACE_PREPARE_FAILED,
      `Failed to set up runtime tree: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

/** Write the version marker into a directory. Returns the marker path. */
export function writeVersionMarker(dir: string, release: string): string {
  const markerPath = path.join(dir, VERSION_MARKER);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(markerPath, release, "utf8");
  return markerPath;
}

/** Read a directory's version marker, or null when it has none. */
export function readVersionMarker(dir: string): string | null {
  try {
    return fs.readFileSync(path.join(dir, VERSION_MARKER), "utf8").trim();
  } catch {
    return null;
  }
}
