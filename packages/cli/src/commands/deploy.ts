import { resolve } from 'node:path';
import {
  AgentEngineClient,
  ArtifactPackager,
  DeploymentHistory,
  DeploymentSubmitter,
  TarArchiver,
  defaultApiEndpoint,
  deployAgent,
  parseEnvVars,
  resolveDependencies,
  resolveProjectId,
  writeManifest,
} from '@agentport/deployer';
import type { Config } from '@agentport/shared';
import { accessToken, remoteClient, type CliContext } from '../context.js';

export interface DeployCommandOptions {
  sourcePackages?: string;
  entrypointModule?: string;
  entrypointObject?: string;
  requirementsFile?: string;
  projectId?: string;
  region?: string;
  displayName?: string;
  description?: string;
  serviceAccount?: string;
  setEnvVars?: string;
  skipExport?: boolean;
}

export async function deployCommand(config: Config, options: DeployCommandOptions, ctx: CliContext): Promise<void> {
  const envVars = options.setEnvVars ? parseEnvVars(options.setEnvVars) : undefined;
  const packager = new ArtifactPackager();
  const source = {
    sourceRoot: options.sourcePackages ?? config.deploy.sourceRoot,
    entrypoint: {
      module: options.entrypointModule ?? config.deploy.entrypointModule,
      object: options.entrypointObject ?? config.deploy.entrypointObject,
    },
  };
  // Local checks first: nothing is exported, overwritten or sent for a bad request
  await packager.validate(source);

  const projectId = await resolveProjectId({
    explicit: [options.projectId, config.project.projectId],
    env: ctx.env,
    runner: ctx.runner,
  });
  const region = options.region ?? config.project.region;
  const token = await accessToken(config, ctx);
  const manifestPath = resolve(options.requirementsFile ?? config.deploy.requirementsFile);

  if (!options.skipExport) {
    const resolved = await resolveDependencies({
      projectDir: resolve(config.deploy.projectDir),
      runner: ctx.runner,
      timeoutMs: config.remote.timeoutMs,
    });
    await writeManifest(manifestPath, resolved.manifest);
  }

  const engine = new AgentEngineClient(
    remoteClient(config, config.remote.apiEndpoint ?? defaultApiEndpoint(region), token, ctx),
  );
  const history = new DeploymentHistory(resolve(config.deploy.historyDbPath));
  try {
    const result = await deployAgent(
      {
        ...source,
        manifestPath,
        target: { projectId, region },
        options: {
          displayName: options.displayName ?? config.deploy.displayName,
          description: options.description ?? config.deploy.description,
          serviceAccount: options.serviceAccount ?? config.deploy.serviceAccount,
          envVars,
        },
      },
      {
        packager,
        submitter: new DeploymentSubmitter({ engine, archiver: new TarArchiver(ctx.runner) }),
        history,
      },
    );
    ctx.out(result.handle);
  } finally {
    history.close();
  }
}
