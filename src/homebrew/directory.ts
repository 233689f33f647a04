/**
 * Runtime tree conventions.
 *
 * Standard layout of a runtime tree (both the staging mirror and the
 * per-user copy):
 *
 *   data/        plugin data
 *   logs/        loader and plugin logs
 *   plugins/     installed plugins
 *   services/    PluginLoader executables
 *   settings/    loader and plugin settings
 *   themes/      CSS themes
 *   .loader.version
 */

/** Subtrees every runtime tree must contain. */
export const RUNTIME_SUBTREES = [
  "data",
  "logs",
  "plugins",
  "services",
  "settings",
  "themes",
] as const;

export type RuntimeSubtree = (typeof RUNTIME_SUBTREES)[number];

/** Single-line file recording the release a tree was built from. */
export const VERSION_MARKER = ".loader.version";

/** Suffix distinguishing the console-detached executable. */
export const DETACHED_SUFFIX = "_noconsole";
