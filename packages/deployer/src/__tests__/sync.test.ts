import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ResolutionError, setLogLevel } from "@agentport/shared";
import { syncDependencies } from "../sync.js";
import { FakeRunner, failed, ok } from "./helpers.js";

describe("syncDependencies", () => {
  let dir: string;

  beforeAll(() => setLogLevel("silent"));

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "agentport-sync-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const uv = (onSync: () => ReturnType<typeof ok>) =>
    new FakeRunner().on("uv", (args) => (args[0] === "sync" ? onSync() : ok("google-adk==1.0.0\nrequests==2.32.3\n")));

  it("syncs the environment, then writes the exported manifest", async () => {
    const runner = uv(() => ok());
    const manifestPath = join(dir, "app", "app_utils", ".requirements.txt");

    const resolved = await syncDependencies({ projectDir: dir, manifestPath, runner });

    expect(runner.calls.map((c) => c.args[0])).toEqual(["sync", "export"]);
    expect(runner.calls[0]?.args).toEqual(["sync"]);
    expect(runner.calls[0]?.options?.cwd).toBe(dir);
    expect(resolved.strategy).toBe("uv-export");
    expect(await readFile(manifestPath, "utf-8")).toBe("google-adk==1.0.0\nrequests==2.32.3\n");
  });

  it("passes --dev to uv sync only", async () => {
    const runner = uv(() => ok());
    await syncDependencies({ projectDir: dir, manifestPath: join(dir, "requirements.txt"), runner, dev: true });

    expect(runner.calls[0]?.args).toEqual(["sync", "--dev"]);
    expect(runner.calls[1]?.args).toContain("--no-dev");
  });

  it("reports a failed uv sync as a resolution error without exporting", async () => {
    const runner = uv(() => failed("error: lockfile is out of date", 2));
    const manifestPath = join(dir, "requirements.txt");

    const attempt = syncDependencies({ projectDir: dir, manifestPath, runner });
    await expect(attempt).rejects.toBeInstanceOf(ResolutionError);
    await expect(attempt).rejects.toThrow("uv sync failed: error: lockfile is out of date");
    expect(runner.calls).toHaveLength(1);
    await expect(readFile(manifestPath, "utf-8")).rejects.toThrow();
  });

  it("reports a missing uv as a resolution error", async () => {
    await expect(
      syncDependencies({ projectDir: dir, manifestPath: join(dir, "requirements.txt"), runner: new FakeRunner() }),
    ).rejects.toThrow("Cannot run uv: spawn uv ENOENT");
  });
});
