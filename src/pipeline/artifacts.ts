/**
 * Temporary artifact set: paths created mid-run that must not outlive it
 * (generated build scripts, downloaded installers, transient markers).
 *
 * Owned by the orchestrator, which releases it on every exit path.
 */

import type { Logger } from "../types.js";
import { removeWithRetry, type RemovalResult, type TreeOps } from "../fs/remover.js";

export interface TemporaryArtifactSet {
  register(target: string): void;
  list(): readonly string[];
  /** Remove every registered path, newest first. Never throws. */
  release(): Promise<Array<{ path: string; result: RemovalResult }>>;
}

interface ArtifactSetParams {
  logger: Logger;
  removeAttempts?: number;
  removeDelayMs?: number;
  ops?: TreeOps;
}

export function createTemporaryArtifactSet(params: ArtifactSetParams): TemporaryArtifactSet {
  const { logger } = params;
  const paths: string[] = [];

  function register(target: string): void {
    if (!paths.includes(target)) paths.push(target);
  }

  async function release(): Promise<Array<{ path: string; result: RemovalResult }>> {
    const results: Array<{ path: string; result: RemovalResult }> = [];
    while (paths.length > 0) {
      const target = paths.pop();
      if (target === undefined) break;
      const result = await removeWithRetry(target, {
        logger,
        attempts: params.removeAttempts,
        delayMs: params.removeDelayMs,
        ops: params.ops,
      });
      results.push({ path: target, result });
    }
    if (results.length > 0) {
      logger.debug?.(`[forge:artifacts] Released ${results.length} temporary artifact(s)`);
    }
    return results;
  }

  return { register, list: () => [...paths], release };
}
