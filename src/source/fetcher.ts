/**
 * Source fetcher: clones the loader repository at the requested release.
 *
 * The sentinel release is resolved to the most recent reachable tag so that
 * version markers name a real release. Resolution failure is not fatal: the
 * build carries on with the sentinel.
 */

import { BuildError, BuildErrorCode, outputTail } from "../errors.js";
import { removeWithRetry } from "../fs/remover.js";
import { removeOptions, type StageContext } from "../pipeline/context.js";
import { SENTINEL_RELEASE } from "../types.js";

export interface FetchResult {
  /** Effective release for the rest of the run. Never empty. */
  release: string;
  resolvedFromSentinel: boolean;
}

export async function fetchSource(ctx: StageContext, releaseRef: string): Promise<FetchResult> {
  const { config, layout, env, runner, logger } = ctx;
  const git = config.tools.git;
  const processEnv = env.toProcessEnv();

  await removeWithRetry(layout.fetchRoot, removeOptions(ctx));

  logger.info(`[forge:source] Cloning ${config.repository.url} into ${layout.fetchRoot}`);
  const clone = await runner.run(git, ["clone", config.repository.url, layout.fetchRoot], {
    cwd: layout.root,
    env: processEnv,
  });
  if (clone.exitCode !== 0) {
    throw new BuildError(
      BuildErrorCode.CLONE_FAILED,
      `git clone of ${config.repository.url} failed (exit ${clone.exitCode})`,
      { details: { output: outputTail(clone.output) } },
    );
  }

  logger.info(`[forge:source] Checking out ${releaseRef}`);
  const checkout = await runner.run(git, ["checkout", releaseRef], {
    cwd: layout.fetchRoot,
    env: processEnv,
  });
  if (checkout.exitCode !== 0) {
    throw new BuildError(
      BuildErrorCode.CHECKOUT_FAILED,
      `Release "${releaseRef}" could not be checked out (exit ${checkout.exitCode})`,
      { details: { output: outputTail(checkout.output) } },
    );
  }

  if (releaseRef !== SENTINEL_RELEASE) {
    return { release: releaseRef, resolvedFromSentinel: false };
  }

  const describe = await runner.run(git, ["describe", "--tags", "--abbrev=0"], {
    cwd: layout.fetchRoot,
    env: processEnv,
  });
  const tag = describe.stdout.trim().split(/\r?\n/)[0].trim();
  if (describe.exitCode !== 0 || tag.length === 0) {
    logger.warn(
      `[forge:source] Could not resolve "${SENTINEL_RELEASE}" to a tag (exit ${describe.exitCode}); ` +
      `continuing with "${SENTINEL_RELEASE}"`,
    );
    return { release: SENTINEL_RELEASE, resolvedFromSentinel: false };
  }

  logger.info(`[forge:source] Resolved "${SENTINEL_RELEASE}" to ${tag}`);
  return { release: tag, resolvedFromSentinel: true };
}
