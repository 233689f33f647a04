import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { BuildErrorCode } from "../../src/errors.js";
import {
  commonPackagerArgs,
  dataSeparator,
  executableExtension,
  packageExecutables,
  variantArgs,
  variantName,
} from "../../src/package/packager.js";
import type { StageContext } from "../../src/pipeline/context.js";
import { createFakeRunner, makeContext, type RecordedCall } from "../helpers/fakes.js";

/** Pretend to be the packager: write the named executable into --distpath. */
function fakePackager(call: RecordedCall): void {
  const name = call.args[call.args.indexOf("--name") + 1];
  const dist = call.args[call.args.indexOf("--distpath") + 1];
  fs.mkdirSync(dist, { recursive: true });
  fs.writeFileSync(path.join(dist, name), "binary");
}

describe("packager helpers", () => {
  it("names the variants and host conventions", () => {
    expect(variantName("PluginLoader", "console")).toBe("PluginLoader");
    expect(variantName("PluginLoader", "detached")).toBe("PluginLoader_noconsole");
    expect(executableExtension("win32")).toBe(".exe");
    expect(executableExtension("linux")).toBe("");
    expect(dataSeparator("win32")).toBe(";");
    expect(dataSeparator("darwin")).toBe(":");
  });
});

describe("packageExecutables", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "forge-packager-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function stage(ctx: StageContext): void {
    const pkg = path.join(ctx.layout.stagingRoot, "decky_loader");
    fs.mkdirSync(path.join(pkg, "static"), { recursive: true });
    fs.mkdirSync(path.join(pkg, "plugin"), { recursive: true });
    fs.writeFileSync(path.join(ctx.layout.stagingRoot, "main.py"), "");
  }

  it("builds the shared arguments from the staged tree, skipping missing data subtrees", () => {
    const ctx = makeContext(tmpDir);
    stage(ctx);
    const { layout } = ctx;
    const pkg = path.join(layout.stagingRoot, "decky_loader");

    expect(commonPackagerArgs(ctx)).toEqual([
      "--noconfirm",
      "--onefile",
      "--distpath", layout.distRoot,
      "--workpath", layout.buildRoot,
      "--specpath", layout.buildRoot,
      "--add-data", `${path.join(pkg, "static")}:decky_loader/static`,
      "--add-data", `${path.join(pkg, "plugin")}:decky_loader/plugin`,
      "--hidden-import=logging.handlers",
      "--hidden-import=sqlite3",
      path.join(layout.stagingRoot, "main.py"),
    ]);
    expect(ctx.logger.warn).toHaveBeenCalledWith(
      "[forge:package] Data subtree decky_loader/locales is missing, not embedding it",
    );
  });

  it("marks only the detached variant as console-less", () => {
    const ctx = makeContext(tmpDir);
    expect(variantArgs(ctx, "console", ["main.py"])).toEqual(["--name", "PluginLoader", "main.py"]);
    expect(variantArgs(ctx, "detached", ["main.py"])).toEqual([
      "--noconsole",
      "--name",
      "PluginLoader_noconsole",
      "main.py",
    ]);
  });

  it("builds the console variant first, then the detached one", async () => {
    const runner = createFakeRunner((call) => {
      fakePackager(call);
      return undefined;
    });
    const ctx = makeContext(tmpDir, { runner });
    stage(ctx);

    const result = await packageExecutables(ctx);

    expect(result).toEqual({
      console: path.join(ctx.layout.distRoot, "PluginLoader"),
      detached: path.join(ctx.layout.distRoot, "PluginLoader_noconsole"),
    });
    expect(runner.calls.map((c) => c.args[c.args.indexOf("--name") + 1])).toEqual([
      "PluginLoader",
      "PluginLoader_noconsole",
    ]);
    expect(runner.calls[0].command).toBe("pyinstaller");
    expect(runner.calls[0].opts?.cwd).toBe(ctx.layout.root);
  });

  it("does not attempt the detached variant when the console variant fails", async () => {
    const runner = createFakeRunner(() => ({ exitCode: 1, stderr: "ModuleNotFoundError: aiohttp" }));
    const ctx = makeContext(tmpDir, { runner });
    stage(ctx);

    await expect(packageExecutables(ctx)).rejects.toMatchObject({
      code: BuildErrorCode.PACKAGE_FAILED,
      details: { variant: "console", output: "ModuleNotFoundError: aiohttp" },
    });
    expect(runner.calls).toHaveLength(1);
  });

  it("fails when the packager reports success without producing the executable", async () => {
    const ctx = makeContext(tmpDir);
    stage(ctx);

    await expect(packageExecutables(ctx)).rejects.toMatchObject({
      code: BuildErrorCode.PACKAGE_OUTPUT_MISSING,
      details: { variant: "console" },
    });
  });
});
