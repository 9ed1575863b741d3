/**
 * In-process stand-ins for the external tools and remote services the
 * deployer talks to.
 */
import { Hono } from "hono";
import { mkdtemp, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CommandOptions, CommandResult, CommandRunner } from "../exec/command-runner.js";
import type { FetchLike } from "../remote/client.js";

export interface RecordedCommand {
  command: string;
  args: string[];
  options?: CommandOptions;
}

type Handler = (args: string[]) => CommandResult | Error;

export function ok(stdout: string | Buffer = ""): CommandResult {
  return { exitCode: 0, stdout: Buffer.isBuffer(stdout) ? stdout : Buffer.from(stdout), stderr: "" };
}

export function failed(stderr: string, exitCode = 2): CommandResult {
  return { exitCode, stdout: Buffer.alloc(0), stderr };
}

/** Scripted CommandRunner: handlers are looked up by command name. */
export class FakeRunner implements CommandRunner {
  calls: RecordedCommand[] = [];
  private handlers = new Map<string, Handler>();

  on(command: string, handler: Handler): this {
    this.handlers.set(command, handler);
    return this;
  }

  async run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const handler = this.handlers.get(command);
    if (!handler) {
      throw new Error(`spawn ${command} ENOENT`);
    }
    const result = handler(args);
    if (result instanceof Error) throw result;
    return result;
  }
}

export interface RecordedRequest {
  method: string;
  path: string;
  body: unknown;
  authorization?: string;
}

export interface FakeRemote {
  app: Hono;
  fetch: FetchLike;
  requests: RecordedRequest[];
}

/**
 * Hono app mimicking the agent engine, pipeline and catalog endpoints.
 * Every request that reaches it is recorded.
 */
export function createFakeRemote(): FakeRemote {
  const app = new Hono();
  const requests: RecordedRequest[] = [];
  let engines = 0;
  let scheduleIds = 0;
  let schedules: Array<{ name: string; displayName: string }> = [];

  app.use("*", async (c, next) => {
    const text = await c.req.raw.clone().text();
    const body: unknown = text ? JSON.parse(text) : undefined;
    const url = new URL(c.req.url);
    requests.push({ method: c.req.method, path: url.pathname + url.search, body, authorization: c.req.header("authorization") });
    await next();
  });

  app.post("/v1/projects/:project/locations/:region/reasoningEngines", (c) => {
    engines++;
    const { project, region } = c.req.param();
    return c.json({
      name: `projects/${project}/locations/${region}/reasoningEngines/${1000 + engines}/operations/${engines}`,
      done: false,
    });
  });

  app.post("/v1/projects/:project/locations/:region/pipelineJobs", (c) => {
    const { project, region } = c.req.param();
    const jobId = c.req.query("pipelineJobId");
    return c.json({ name: `projects/${project}/locations/${region}/pipelineJobs/${jobId}`, state: "PIPELINE_STATE_PENDING" });
  });

  app.get("/v1/projects/:project/locations/:region/schedules", (c) => c.json({ schedules }));

  app.delete("/v1/projects/:project/locations/:region/schedules/:id", (c) => {
    const name = new URL(c.req.url).pathname.replace(/^\/v1\//, "");
    schedules = schedules.filter((s) => s.name !== name);
    return c.json({});
  });

  app.post("/v1/projects/:project/locations/:region/schedules", async (c) => {
    const { project, region } = c.req.param();
    const body = await c.req.json<{ displayName: string }>();
    const schedule = {
      name: `projects/${project}/locations/${region}/schedules/${++scheduleIds}`,
      displayName: body.displayName,
    };
    schedules.push(schedule);
    return c.json(schedule);
  });

  app.post("/v1alpha/projects/:project/locations/:location/collections/:collection/engines/:engine/assistants/default_assistant/agents", (c) => {
    const { project, location, collection, engine } = c.req.param();
    return c.json({
      name: `projects/${project}/locations/${location}/collections/${collection}/engines/${engine}/assistants/default_assistant/agents/42`,
    });
  });

  return {
    app,
    requests,
    fetch: async (input, init) => app.request(input, init),
  };
}

/** Creates `<tmp>/app/agent_engine_app.py` and a requirements file. */
export async function createAgentProject(requirements: string): Promise<{ root: string; sourceRoot: string; manifestPath: string }> {
  const root = await mkdtemp(join(tmpdir(), "agentport-"));
  const sourceRoot = join(root, "app");
  await mkdir(join(sourceRoot, "app_utils"), { recursive: true });
  await mkdir(join(sourceRoot, "__pycache__"), { recursive: true });
  await writeFile(join(sourceRoot, "__init__.py"), "");
  await writeFile(join(sourceRoot, "agent.py"), "root_agent = None\n");
  await writeFile(join(sourceRoot, "agent_engine_app.py"), "agent_engine = object()\n");
  await writeFile(join(sourceRoot, "__pycache__", "agent.cpython-312.pyc"), "");
  const manifestPath = join(root, "requirements.txt");
  await writeFile(manifestPath, requirements);
  return { root, sourceRoot, manifestPath };
}
