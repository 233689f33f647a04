import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { createBuildEnvironment } from "../../src/env/environment.js";
import { BuildErrorCode } from "../../src/errors.js";
import { readVersionMarker } from "../../src/homebrew/provisioner.js";
import { createLinuxOsIntegration } from "../../src/os/linux.js";
import { runBuild, type BuildOutcome } from "../../src/pipeline/orchestrator.js";
import type { StageName } from "../../src/types.js";
import {
  createFakeRunner,
  makeConfig,
  makeDownloader,
  makeLogger,
  makeRuntimeHost,
  type FakeRunner,
} from "../helpers/fakes.js";
import { createToolchain, TOOL_VERSIONS, type ToolchainOptions } from "../helpers/toolchain.js";

const ALL_STAGES: StageName[] = [
  "dependencies",
  "workspace",
  "source",
  "runtime-tree",
  "frontend",
  "backend",
  "requirements",
  "package",
  "publish",
  "os-integration",
];

describe("build pipeline", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "forge-pipeline-test-"));
    fs.mkdirSync(path.join(tmpDir, ".steam", "steam"), { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function build(releaseRef: string, toolchain?: ToolchainOptions) {
    const config = makeConfig(tmpDir);
    const logger = makeLogger();
    const env = createBuildEnvironment({ env: { PATH: "/usr/bin", HOME: tmpDir }, platform: "linux" });
    const runner: FakeRunner = createFakeRunner(createToolchain(toolchain));
    const outcome: BuildOutcome = await runBuild({ releaseRef }, {
      config,
      logger,
      env,
      runner,
      runtimeHost: makeRuntimeHost(),
      downloader: makeDownloader(),
      osIntegration: createLinuxOsIntegration({ env, logger }),
    });
    return { outcome, runner, config, logger };
  }

  const ws = (...parts: string[]): string => path.join(tmpDir, "ws", ...parts);
  const home = (...parts: string[]): string => path.join(tmpDir, "homebrew", ...parts);

  it("builds an explicit release end to end", async () => {
    const { outcome, runner } = await build("v2.10.3");

    expect(outcome).toEqual({
      ok: true,
      release: "v2.10.3",
      completedStages: ALL_STAGES,
      installRoot: home(),
    });
    expect(runner.commandLines()).not.toContain("git describe --tags --abbrev=0");

    // Every marker names the release.
    expect(readVersionMarker(home())).toBe("v2.10.3");
    expect(readVersionMarker(ws("dist", "homebrew"))).toBe("v2.10.3");
    expect(readVersionMarker(ws("src", "dist"))).toBe("v2.10.3");

    expect(fs.readFileSync(home("services", "PluginLoader"), "utf8")).toBe("binary:PluginLoader");
    expect(fs.readFileSync(home("services", "PluginLoader_noconsole"), "utf8")).toBe(
      "binary:PluginLoader_noconsole",
    );
    expect(fs.existsSync(ws("src", "decky_loader", "static", "index.js"))).toBe(true);

    // Transient files are gone.
    expect(fs.existsSync(ws("app", "frontend", ".loader.version"))).toBe(false);
    expect(fs.existsSync(ws("app", "frontend", "forge-build-frontend.sh"))).toBe(false);

    // OS integration ran against the fake home.
    expect(fs.existsSync(path.join(tmpDir, ".steam", "steam", ".cef-enable-remote-debugging"))).toBe(true);
    const autostart = fs.readFileSync(path.join(tmpDir, ".config", "autostart", "pluginloader.desktop"), "utf8");
    expect(autostart).toContain(`\nExec=${home("services", "PluginLoader_noconsole")}\n`);
  });

  it("resolves the sentinel to the newest tag and uses it everywhere", async () => {
    const { outcome } = await build("main", { latestTag: "v2.11.0" });

    expect(outcome.ok).toBe(true);
    expect(outcome.release).toBe("v2.11.0");
    expect(readVersionMarker(home())).toBe("v2.11.0");
    expect(readVersionMarker(ws("src", "dist"))).toBe("v2.11.0");
  });

  it("keeps the sentinel when the repository has no tags", async () => {
    const { outcome, logger } = await build("main");

    expect(outcome.ok).toBe(true);
    expect(outcome.release).toBe("main");
    expect(readVersionMarker(home())).toBe("main");
    expect(logger.warn).toHaveBeenCalledWith(
      '[forge:source] Could not resolve "main" to a tag (exit 128); continuing with "main"',
    );
  });

  it("stops before anything else when a required tool is missing", async () => {
    const versions = { ...TOOL_VERSIONS };
    delete versions.git;
    const { outcome, runner } = await build("v2.10.3", { versions });

    expect(outcome).toMatchObject({ ok: false, failedStage: "dependencies", completedStages: [] });
    if (outcome.ok) return;
    expect(outcome.error.code).toBe(BuildErrorCode.TOOL_MISSING);
    expect(runner.commandLines()).toEqual(["git --version"]);
    expect(fs.existsSync(ws())).toBe(false);
  });

  it("fails at the backend stage when the checkout has no backend", async () => {
    const { outcome, runner } = await build("v2.10.3", { withoutBackend: true });

    expect(outcome).toMatchObject({
      ok: false,
      failedStage: "backend",
      completedStages: ["dependencies", "workspace", "source", "runtime-tree", "frontend"],
    });
    if (outcome.ok) return;
    expect(outcome.error.code).toBe(BuildErrorCode.BACKEND_MISSING);
    expect(runner.calls.some((c) => c.command === "pyinstaller")).toBe(false);
    expect(fs.existsSync(home(".loader.version"))).toBe(false);
  });

  it("never publishes when the console executable fails to package", async () => {
    const { outcome, runner } = await build("v2.10.3", { packagerFailsFor: "PluginLoader" });

    expect(outcome).toMatchObject({ ok: false, failedStage: "package" });
    if (outcome.ok) return;
    expect(outcome.error.code).toBe(BuildErrorCode.PACKAGE_FAILED);
    expect(runner.calls.filter((c) => c.command === "pyinstaller")).toHaveLength(1);
    expect(fs.readdirSync(home("services"))).toEqual([]);
  });

  it("cleans up transient files after a failed frontend build", async () => {
    const { outcome } = await build("v2.10.3", { frontendFails: true });

    expect(outcome).toMatchObject({ ok: false, failedStage: "frontend" });
    if (outcome.ok) return;
    expect(outcome.error.code).toBe(BuildErrorCode.FRONTEND_BUILD_FAILED);
    expect(fs.existsSync(ws("app", "frontend", "forge-build-frontend.sh"))).toBe(false);
    expect(fs.existsSync(ws("app", "frontend", ".loader.version"))).toBe(false);
  });

  it("rebuilds over a previous run", async () => {
    await build("v2.10.3");
    const { outcome } = await build("v2.11.0");

    expect(outcome.ok).toBe(true);
    expect(readVersionMarker(home())).toBe("v2.11.0");
    expect(fs.existsSync(ws("app", ".git", "HEAD"))).toBe(true);
  });
});
