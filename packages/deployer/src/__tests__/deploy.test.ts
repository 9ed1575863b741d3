import { afterEach, beforeAll, describe, expect, it } from "vitest";
import { Hono } from "hono";
import { rm, writeFile } from "node:fs/promises";
import {
  AuthorizationError,
  ConfigurationError,
  ResolutionError,
  setLogLevel,
} from "@agentport/shared";
import type { DeploymentDescriptor } from "@agentport/shared";
import { ArtifactPackager } from "../package/packager.js";
import type { SourceArchiver } from "../package/archive.js";
import { RemoteClient } from "../remote/client.js";
import { AgentEngineClient, handleFromOperation } from "../remote/agent-engine.js";
import { DeploymentSubmitter, parseEnvVars } from "../deploy/submitter.js";
import { DeploymentHistory } from "../deploy/history.js";
import { deployAgent } from "../deploy/workflow.js";
import { createAgentProject, createFakeRemote, type FakeRemote } from "./helpers.js";

const TARGET = { projectId: "test-project", region: "us-central1" };

class CountingArchiver implements SourceArchiver {
  calls = 0;
  async archive(): Promise<Buffer> {
    this.calls++;
    return Buffer.from("archive-bytes");
  }
}

describe("deploy", () => {
  let root: string | undefined;
  let remote: FakeRemote;
  let archiver: CountingArchiver;
  let submitter: DeploymentSubmitter;
  let history: DeploymentHistory;

  beforeAll(() => setLogLevel("silent"));

  const setup = (fetch = createFakeRemote().fetch) => {
    archiver = new CountingArchiver();
    const client = new RemoteClient({ baseUrl: "https://engine.test", fetch, baseDelayMs: 1 });
    submitter = new DeploymentSubmitter({ engine: new AgentEngineClient(client), archiver });
    history = new DeploymentHistory(":memory:");
  };

  afterEach(async () => {
    history.close();
    if (root) await rm(root, { recursive: true, force: true });
    root = undefined;
  });

  it("packages and deploys app/ with three requirements, returning the remote handle", async () => {
    remote = createFakeRemote();
    setup(remote.fetch);
    const project = await createAgentProject("google-adk==1.15.1\nhttpx==0.27.2\nopentelemetry-api==1.27.0\n");
    root = project.root;

    const result = await deployAgent(
      {
        sourceRoot: project.sourceRoot,
        entrypoint: "app.agent_engine_app:agent_engine",
        manifestPath: project.manifestPath,
        target: TARGET,
        options: { displayName: "sample-agent", envVars: { LOG_LEVEL: "debug" } },
      },
      { packager: new ArtifactPackager(), submitter, history },
    );

    expect(result.handle).toBe("projects/test-project/locations/us-central1/reasoningEngines/1001");
    expect(result.operation).toBe("projects/test-project/locations/us-central1/reasoningEngines/1001/operations/1");
    expect(remote.requests).toHaveLength(1);
    expect(remote.requests[0]).toEqual({
      method: "POST",
      path: "/v1/projects/test-project/locations/us-central1/reasoningEngines",
      body: {
        displayName: "sample-agent",
        spec: {
          deploymentSpec: { env: [{ name: "LOG_LEVEL", value: "debug" }] },
          sourceCodeSpec: {
            inlineSource: { sourceArchive: "YXJjaGl2ZS1ieXRlcw==" },
            pythonSpec: {
              entrypointModule: "app.agent_engine_app",
              entrypointObject: "agent_engine",
              requirementsFile: "app/app_utils/.requirements.txt",
            },
          },
        },
      },
    });
    expect(history.latest()).toMatchObject({
      handle: result.handle,
      displayName: "sample-agent",
      entrypoint: "app.agent_engine_app:agent_engine",
      projectId: "test-project",
    });

    // Same source, empty manifest: fails before anything is uploaded
    await writeFile(project.manifestPath, "");
    await expect(
      deployAgent(
        {
          sourceRoot: project.sourceRoot,
          entrypoint: "app.agent_engine_app:agent_engine",
          manifestPath: project.manifestPath,
          target: TARGET,
          options: { displayName: "sample-agent" },
        },
        { packager: new ArtifactPackager(), submitter, history },
      ),
    ).rejects.toBeInstanceOf(ResolutionError);
    expect(remote.requests).toHaveLength(1);
    expect(archiver.calls).toBe(1);
  });

  it("rejects a malformed entrypoint before any network call", async () => {
    remote = createFakeRemote();
    setup(remote.fetch);
    const project = await createAgentProject("httpx==0.27.2\n");
    root = project.root;

    await expect(
      deployAgent(
        {
          sourceRoot: project.sourceRoot,
          entrypoint: "app.agent_engine_app.agent_engine",
          manifestPath: project.manifestPath,
          target: TARGET,
          options: { displayName: "sample-agent" },
        },
        { packager: new ArtifactPackager(), submitter, history },
      ),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(remote.requests).toHaveLength(0);
    expect(archiver.calls).toBe(0);
    expect(history.list()).toEqual([]);
  });

  it("creates a new remote agent on every submission", async () => {
    remote = createFakeRemote();
    setup(remote.fetch);
    const project = await createAgentProject("httpx==0.27.2\n");
    root = project.root;
    const packager = new ArtifactPackager();
    const request = { sourceRoot: project.sourceRoot, entrypoint: "app.agent_engine_app:agent_engine", manifestPath: project.manifestPath };

    const first = await submitter.submit(await packager.package(request), TARGET, { displayName: "a" });
    const second = await submitter.submit(await packager.package(request), TARGET, { displayName: "a" });
    expect(first.handle).not.toBe(second.handle);
  });

  it("accepts a descriptor only once", async () => {
    remote = createFakeRemote();
    setup(remote.fetch);
    const project = await createAgentProject("httpx==0.27.2\n");
    root = project.root;
    const descriptor = await new ArtifactPackager().package({
      sourceRoot: project.sourceRoot,
      entrypoint: "app.agent_engine_app:agent_engine",
      manifestPath: project.manifestPath,
    });

    await submitter.submit(descriptor, TARGET, { displayName: "a" });
    await expect(submitter.submit(descriptor, TARGET, { displayName: "a" })).rejects.toThrow(/already submitted/);
    expect(remote.requests).toHaveLength(1);
  });

  it("rejects hand-built descriptors without calling the remote", async () => {
    remote = createFakeRemote();
    setup(remote.fetch);
    const descriptor: DeploymentDescriptor = {
      sourceRoot: "/src/app",
      entrypoint: { module: "app.agent_engine_app", object: "agent_engine" },
      requirementsFile: "app/app_utils/.requirements.txt",
      manifest: { entries: [] },
      files: ["app/agent.py"],
      createdAt: "2026-01-01T00:00:00.000Z",
    };

    await expect(submitter.submit(descriptor, TARGET, { displayName: "a" })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(submitter.submit(Object.freeze({ ...descriptor }), TARGET, { displayName: "a" })).rejects.toBeInstanceOf(
      ResolutionError,
    );
    expect(remote.requests).toHaveLength(0);
  });

  it("surfaces permission failures without retrying", async () => {
    let calls = 0;
    const denied = new Hono();
    denied.post("*", (c) => {
      calls++;
      return c.json({ error: { code: 403, message: "Permission denied" } }, 403);
    });
    setup(async (input, init) => denied.request(input, init));
    const project = await createAgentProject("httpx==0.27.2\n");
    root = project.root;

    await expect(
      deployAgent(
        {
          sourceRoot: project.sourceRoot,
          entrypoint: "app.agent_engine_app:agent_engine",
          manifestPath: project.manifestPath,
          target: TARGET,
          options: { displayName: "sample-agent" },
        },
        { packager: new ArtifactPackager(), submitter, history },
      ),
    ).rejects.toBeInstanceOf(AuthorizationError);
    expect(calls).toBe(1);
    expect(history.latest()).toBeUndefined();
  });
});

describe("handleFromOperation", () => {
  it("prefers the operation response name", () => {
    expect(handleFromOperation({ name: "op", response: { name: "projects/p/locations/r/reasoningEngines/9" } })).toBe(
      "projects/p/locations/r/reasoningEngines/9",
    );
  });

  it("strips the operation suffix", () => {
    expect(handleFromOperation({ name: "projects/p/locations/r/reasoningEngines/9/operations/3" })).toBe(
      "projects/p/locations/r/reasoningEngines/9",
    );
  });
});

describe("parseEnvVars", () => {
  it("parses comma separated pairs", () => {
    expect(parseEnvVars("A=1,B=x=y,,")).toEqual({ A: "1", B: "x=y" });
  });

  it("rejects pairs without a name", () => {
    expect(() => parseEnvVars("=1")).toThrow(ConfigurationError);
    expect(() => parseEnvVars("1A=2")).toThrow(ConfigurationError);
  });
});
