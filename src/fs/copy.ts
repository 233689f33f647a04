/**
 * Copy helpers with replace-whole semantics.
 *
 * A subtree is copied into a sibling ".partial" directory first and only then
 * swapped in, so an interrupted copy never leaves a half-written destination.
 */

import fs from "node:fs";
import path from "node:path";

const PARTIAL_SUFFIX = ".partial";

/** Replace `dest` with a full copy of `src`. Creates parent directories. */
export function replaceTree(src: string, dest: string): void {
  const partial = `${dest}${PARTIAL_SUFFIX}`;
  fs.mkdirSync(path.dirname(dest), { recursive: true });
  fs.rmSync(partial, { recursive: true, force: true });
  fs.cpSync(src, partial, { recursive: true, preserveTimestamps: true });
  fs.rmSync(dest, { recursive: true, force: true });
  fs.renameSync(partial, dest);
}

/** Copy a single file, creating the destination directory. */
export function copyFileInto(src: string, dest: string): void {
  fs.mkdirSync(path.dirname(dest), { recursive: true });
  fs.copyFileSync(src, dest);
}

/** Whether a path exists and is a directory. */
export function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

/** Whether a path exists and is a regular file. */
export function isFile(target: string): boolean {
  try {
    return fs.statSync(target).isFile();
  } catch {
    return false;
  }
}
