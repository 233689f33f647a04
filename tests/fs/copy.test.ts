import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { copyFileInto, isDirectory, isFile, replaceTree } from "../../src/fs/copy.js";

describe("copy helpers", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "forge-copy-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("replaceTree swaps the destination for a full copy", () => {
    const src = path.join(tmpDir, "src");
    fs.mkdirSync(path.join(src, "nested"), { recursive: true });
    fs.writeFileSync(path.join(src, "nested", "a.txt"), "new");

    const dest = path.join(tmpDir, "out", "pkg");
    fs.mkdirSync(dest, { recursive: true });
    fs.writeFileSync(path.join(dest, "stale.txt"), "old");

    replaceTree(src, dest);

    expect(fs.readFileSync(path.join(dest, "nested", "a.txt"), "utf8")).toBe("new");
    expect(fs.existsSync(path.join(dest, "stale.txt"))).toBe(false);
    expect(fs.existsSync(`${dest}.partial`)).toBe(false);
  });

  it("replaceTree clears a leftover partial copy first", () => {
    const src = path.join(tmpDir, "src");
    fs.mkdirSync(src);
    fs.writeFileSync(path.join(src, "a.txt"), "a");
    const dest = path.join(tmpDir, "dest");
    fs.mkdirSync(`${dest}.partial`);
    fs.writeFileSync(path.join(`${dest}.partial`, "junk.txt"), "junk");

    replaceTree(src, dest);

    expect(fs.readdirSync(dest)).toEqual(["a.txt"]);
  });

  it("copyFileInto creates missing parent directories", () => {
    const src = path.join(tmpDir, "main.py");
    fs.writeFileSync(src, "print('hi')");
    const dest = path.join(tmpDir, "a", "b", "main.py");
    copyFileInto(src, dest);
    expect(fs.readFileSync(dest, "utf8")).toBe("print('hi')");
  });

  it("isDirectory and isFile distinguish entries and missing paths", () => {
    const file = path.join(tmpDir, "f");
    fs.writeFileSync(file, "");
    expect(isDirectory(tmpDir)).toBe(true);
    expect(isFile(tmpDir)).toBe(false);
    expect(isFile(file)).toBe(true);
    expect(isDirectory(path.join(tmpDir, "nope"))).toBe(false);
  });
});
