import path from "node:path";
import type { ForgeConfig } from "../config.js";
import type { WorkspaceLayout } from "../types.js";

/** Compute the fixed paths of a run. The result is frozen. */
export function computeLayout(config: Pick<ForgeConfig, "workspaceRoot" | "userRuntimeRoot">): WorkspaceLayout {
  const root = path.resolve(config.workspaceRoot);
  const distRoot = path.join(root, "dist");
  return Object.freeze({
    root,
    fetchRoot: path.join(root, "app"),
    stagingRoot: path.join(root, "src"),
    distRoot,
    runtimeStagingRoot: path.join(distRoot, "homebrew"),
    userRuntimeRoot: path.resolve(config.userRuntimeRoot),
    tempRoot: path.join(root, "temp"),
    buildRoot: path.join(root, "build"),
  });
}
