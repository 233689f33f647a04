import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { removeWithRetry, type TreeOps } from "../../src/fs/remover.js";
import { makeLogger } from "../helpers/fakes.js";

describe("removeWithRetry", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "forge-remover-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reports absent targets without touching anything", async () => {
    const logger = makeLogger();
    const result = await removeWithRetry(path.join(tmpDir, "missing"), { logger, delayMs: 0 });
    expect(result).toEqual({ kind: "absent" });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("removes a checkout whose VCS metadata is read-only", async () => {
    const target = path.join(tmpDir, "app");
    const objects = path.join(target, ".git", "objects", "ab");
    fs.mkdirSync(objects, { recursive: true });
    const packed = path.join(objects, "cdef");
    fs.writeFileSync(packed, "blob");
    fs.chmodSync(packed, 0o444);
    fs.writeFileSync(path.join(target, "README.md"), "# loader");

    const result = await removeWithRetry(target, { logger: makeLogger(), delayMs: 0 });
    expect(result).toEqual({ kind: "removed", attempts: 1 });
    expect(fs.existsSync(target)).toBe(false);
  });

  it("retries while the tree is still present and succeeds later", async () => {
    let present = true;
    let removals = 0;
    const ops: TreeOps = {
      exists: (p) => present && !p.endsWith(".git"),
      stripAndUnlink: vi.fn(),
      removeTree: () => {
        removals++;
        if (removals === 2) present = false;
      },
    };
    const result = await removeWithRetry("/ws/app", { logger: makeLogger(), attempts: 3, delayMs: 0, ops });
    expect(result).toEqual({ kind: "removed", attempts: 2 });
    expect(ops.stripAndUnlink).not.toHaveBeenCalled();
  });

  it("returns an advisory result instead of throwing when removal keeps failing", async () => {
    const logger = makeLogger();
    const ops: TreeOps = {
      exists: () => true,
      stripAndUnlink: vi.fn(),
      removeTree: () => {
        throw new Error("EBUSY: resource busy or locked");
      },
    };
    const result = await removeWithRetry("/ws/app", { logger, attempts: 3, delayMs: 0, ops });
    expect(result).toEqual({
      kind: "advisory",
      attempts: 3,
      message: "EBUSY: resource busy or locked",
    });
    expect(ops.stripAndUnlink).toHaveBeenCalledTimes(3);
    expect(ops.stripAndUnlink).toHaveBeenCalledWith(path.join("/ws/app", ".git"));
    expect(logger.warn).toHaveBeenLastCalledWith(
      "[forge:remove] Could not fully remove /ws/app, continuing anyway: EBUSY: resource busy or locked",
    );
  });

  it("reports a tree that survives removal as advisory", async () => {
    const ops: TreeOps = { exists: (p) => !p.endsWith(".git"), stripAndUnlink: vi.fn(), removeTree: vi.fn() };
    const result = await removeWithRetry("/ws/src", { logger: makeLogger(), attempts: 2, delayMs: 0, ops });
    expect(result).toEqual({
      kind: "advisory",
      attempts: 2,
      message: "/ws/src still present after removal",
    });
  });
});
