/**
 * Retrying file remover: best-effort recursive deletion.
 *
 * On the target OS file handles are often held by other processes (indexers,
 * antivirus, an editor), and git marks its object files read-only. Removal
 * therefore:
 *
 *   1. clears restrictive permission bits on everything under .git/ and
 *      unlinks those files one by one, swallowing per-file failures;
 *   2. removes the whole tree;
 *   3. repeats the attempt with a fixed delay while the tree is still there.
 *
 * The result is a value. Exhausted attempts produce an "advisory" result and a
 * warning; this function never throws.
 */

import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../types.js";
import { errorMessage } from "../errors.js";
import { withRetry } from "../retry.js";

export type RemovalResult =
  | { kind: "absent" }
  | { kind: "removed"; attempts: number }
  | { kind: "advisory"; attempts: number; message: string };

/** File system operations used by the remover. */
export interface TreeOps {
  exists(target: string): boolean;
  /** Make every file under dir writable and unlink it. Must not throw. */
  stripAndUnlink(dir: string): void;
  removeTree(target: string): void;
}

export interface RemoveOptions {
  logger: Logger;
  /** Total attempts. Default: 3. */
  attempts?: number;
  /** Fixed delay between attempts. Default: 1000ms. */
  delayMs?: number;
  ops?: TreeOps;
}

const VCS_METADATA_DIR = ".git";

function listFiles(dir: string): string[] {
  const files: string[] = [];
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return files;
  }
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFiles(full));
    } else {
      files.push(full);
    }
  }
  return files;
}

export const nodeTreeOps: TreeOps = {
  exists: (target) => fs.existsSync(target),
  stripAndUnlink(dir) {
    for (const file of listFiles(dir)) {
      try {
        fs.chmodSync(file, 0o777);
        fs.unlinkSync(file);
      } catch {
        // Locked file: the tree removal below gets another go at it
      }
    }
  },
  removeTree(target) {
    fs.rmSync(target, { recursive: true, force: true });
  },
};

export async function removeWithRetry(target: string, opts: RemoveOptions): Promise<RemovalResult> {
  const { logger } = opts;
  const ops = opts.ops ?? nodeTreeOps;
  const attempts = opts.attempts ?? 3;
  const delayMs = opts.delayMs ?? 1_000;

  let used = 0;
  try {
    if (!ops.exists(target)) return { kind: "absent" };

    await withRetry(
      async (attempt) => {
        used = attempt;
        const vcsDir = path.join(target, VCS_METADATA_DIR);
        if (ops.exists(vcsDir)) {
          ops.stripAndUnlink(vcsDir);
        }
        ops.removeTree(target);
        if (ops.exists(target)) {
          throw new Error(`${target} still present after removal`);
        }
      },
      { maxAttempts: attempts, baseDelayMs: delayMs },
      logger,
      `remove ${target}`,
    );
    return { kind: "removed", attempts: used };
  } catch (err) {
    const message = errorMessage(err);
    logger.warn(`[forge:remove] Could not fully remove ${target}, continuing anyway: ${message}`);
    return { kind: "advisory", attempts: used, message };
  }
}
