import { ResolutionError, createLogger } from "@agentport/shared";
import type { ResolvedManifest } from "@agentport/shared";
import type { CommandRunner } from "./exec/command-runner.js";
import { resolveDependencies, writeManifest, type ResolutionStrategy } from "./resolver/index.js";

const logger = createLogger("sync");

export interface SyncRequest {
  projectDir: string;
  manifestPath: string;
  runner: CommandRunner;
  dev?: boolean;
  exclude?: string[];
  timeoutMs?: number;
  strategies?: readonly ResolutionStrategy[];
}

/** Installs the locked environment with `uv sync`, then exports the manifest. */
export async function syncDependencies(request: SyncRequest): Promise<ResolvedManifest> {
  const args = request.dev ? ["sync", "--dev"] : ["sync"];
  const result = await request.runner
    .run("uv", args, { cwd: request.projectDir, timeoutMs: request.timeoutMs })
    .catch((err: unknown) => {
      throw new ResolutionError(`Cannot run uv: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    });
  if (result.exitCode !== 0) {
    throw new ResolutionError(`uv ${args.join(" ")} failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
  }
  logger.info(`Synchronised environment in ${request.projectDir}`);

  const resolved = await resolveDependencies(
    { projectDir: request.projectDir, runner: request.runner, exclude: request.exclude, timeoutMs: request.timeoutMs },
    request.strategies,
  );
  await writeManifest(request.manifestPath, resolved.manifest);
  return resolved;
}
