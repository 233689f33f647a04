import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { ensureRuntime } from "../../src/deps/installer.js";
import { createTarballRuntimeHost } from "../../src/deps/runtime-host.js";
import { createBuildEnvironment } from "../../src/env/environment.js";
import { BuildErrorCode } from "../../src/errors.js";
import type { StageContext } from "../../src/pipeline/context.js";
import {
  createFakeRunner,
  makeContext,
  makeDownloader,
  makeLogger,
  notFound,
  type FakeHandler,
  type FakeRunner,
} from "../helpers/fakes.js";

describe("ensureRuntime", () => {
  let tmpDir: string;
  let runtimesDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "forge-installer-test-"));
    runtimesDir = path.join(tmpDir, "runtimes");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function setup(handler: FakeHandler, raw?: Record<string, unknown>) {
    const runner: FakeRunner = createFakeRunner(handler);
    const env = createBuildEnvironment({ env: { PATH: "/usr/bin" }, platform: "linux" });
    const ctx: StageContext = makeContext(tmpDir, { runner, env, raw });
    const host = createTarballRuntimeHost({
      runner,
      env,
      logger: makeLogger(),
      installTimeoutMs: 1_000,
      runtimesDir,
      platform: "linux",
      arch: "x64",
    });
    const downloader = makeDownloader();
    return { ctx, runner, env, host, downloader };
  }

  const installedBin = (): string => path.join(runtimesDir, "node-v18.18.0-linux-x64", "bin");

  it("uses the runtime on the search path when it is the pinned version", async () => {
    const { ctx, host, downloader } = setup(() => ({ stdout: "v18.18.0\n" }));
    const result = await ensureRuntime(ctx, { host, downloader });

    expect(result).toEqual({ source: "search-path", version: "v18.18.0" });
    expect(downloader.download).not.toHaveBeenCalled();
  });

  it("prefers a correct runtime in a known location over installing", async () => {
    const known = path.join(tmpDir, "known");
    fs.mkdirSync(known);
    fs.writeFileSync(path.join(known, "node"), "");
    const { ctx, env, host, downloader } = setup(
      (call) => (call.command === path.join(known, "node") ? { stdout: "v18.18.0" } : { stdout: "v16.20.2" }),
      { runtime: { searchDirs: [known] } },
    );

    const result = await ensureRuntime(ctx, { host, downloader });

    expect(result).toEqual({ source: "known-location", version: "v18.18.0", dir: known });
    expect(env.searchPath[0]).toBe(known);
    expect(downloader.download).not.toHaveBeenCalled();
  });

  it("downloads, installs and re-probes when no usable runtime exists", async () => {
    let extracted = false;
    const { ctx, runner, env, host, downloader } = setup((call) => {
      if (call.command === "tar") {
        extracted = true;
        return { exitCode: 0 };
      }
      return extracted ? { stdout: "v18.18.0" } : notFound;
    });

    const result = await ensureRuntime(ctx, { host, downloader });

    const installer = path.join(ctx.layout.tempRoot, "node-v18.18.0-linux-x64.tar.xz");
    expect(result).toEqual({ source: "installed", version: "v18.18.0", dir: installedBin() });
    expect(downloader.download).toHaveBeenCalledWith(
      "https://nodejs.org/dist/v18.18.0/node-v18.18.0-linux-x64.tar.xz",
      installer,
    );
    expect(runner.commandLines()).toContain(`tar -xJf ${installer} -C ${runtimesDir}`);
    expect(env.searchPath).toEqual([installedBin(), "/usr/bin"]);
    expect(ctx.artifacts.list()).toEqual([ctx.layout.tempRoot, installer]);

    await ctx.artifacts.release();
    expect(fs.existsSync(ctx.layout.tempRoot)).toBe(false);
  });

  it("reuses a cached installer", async () => {
    let extracted = false;
    const { ctx, host, downloader } = setup((call) => {
      if (call.command === "tar") {
        extracted = true;
        return {};
      }
      return extracted ? { stdout: "v18.18.0" } : notFound;
    });
    fs.mkdirSync(ctx.layout.tempRoot, { recursive: true });
    fs.writeFileSync(path.join(ctx.layout.tempRoot, "node-v18.18.0-linux-x64.tar.xz"), "cached");

    await ensureRuntime(ctx, { host, downloader });
    expect(downloader.download).not.toHaveBeenCalled();
  });

  it("fails as transient when the installer cannot be downloaded", async () => {
    const { ctx, host, downloader } = setup(() => notFound);
    downloader.download.mockRejectedValue(new Error("GET failed with 503"));

    await expect(ensureRuntime(ctx, { host, downloader })).rejects.toMatchObject({
      code: BuildErrorCode.RUNTIME_DOWNLOAD_FAILED,
      kind: "transient",
    });
    expect(downloader.download).toHaveBeenCalledTimes(3);
  });

  it("fails when the installer exits non-zero", async () => {
    const { ctx, host, downloader } = setup((call) =>
      call.command === "tar" ? { exitCode: 2, stderr: "xz: corrupt data" } : notFound,
    );
    await expect(ensureRuntime(ctx, { host, downloader })).rejects.toMatchObject({
      code: BuildErrorCode.RUNTIME_INSTALL_FAILED,
      details: { output: "xz: corrupt data" },
    });
  });

  it("gives up after the bounded re-probes when the new runtime never shows up", async () => {
    const { ctx, runner, host, downloader } = setup((call) => (call.command === "node" ? notFound : {}));

    await expect(ensureRuntime(ctx, { host, downloader })).rejects.toMatchObject({
      code: BuildErrorCode.RUNTIME_VERIFY_FAILED,
      kind: "transient",
    });
    // One initial probe plus three re-probes.
    expect(runner.commandLines().filter((l) => l === "node --version")).toHaveLength(4);
  });

  it("rejects a runtime that reports the wrong version after install", async () => {
    let extracted = false;
    const { ctx, host, downloader } = setup((call) => {
      if (call.command === "tar") {
        extracted = true;
        return {};
      }
      return extracted ? { stdout: "v20.0.0" } : notFound;
    });

    await expect(ensureRuntime(ctx, { host, downloader })).rejects.toThrow(
      "runtime reports v20.0.0, expected v18.18.0",
    );
  });
});
