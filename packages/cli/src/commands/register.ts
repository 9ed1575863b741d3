import {
  CatalogClient,
  DeploymentHistory,
  RegistrationClient,
  registrationInputFromEnv,
  resolveProjectId,
  resolveRegistrationRecord,
} from '@agentport/deployer';
import type { Prompter } from '@agentport/deployer';
import { ConfigurationError } from '@agentport/shared';
import type { Config, RegistrationInput } from '@agentport/shared';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { accessToken, remoteClient, type CliContext } from '../context.js';

export interface RegisterCommandOptions {
  appId?: string;
  agentEngineId?: string;
  displayName?: string;
  description?: string;
  toolDescription?: string;
  projectId?: string;
  region?: string;
  location?: string;
  interactive?: boolean;
}

function latestDeployment(config: Config): RegistrationInput {
  const dbPath = resolve(config.deploy.historyDbPath);
  if (!existsSync(dbPath)) return {};
  const history = new DeploymentHistory(dbPath);
  try {
    const latest = history.latest();
    return latest ? { agentEngine: latest.handle, displayName: latest.displayName } : {};
  } finally {
    history.close();
  }
}

async function optionalProjectId(config: Config, options: RegisterCommandOptions, ctx: CliContext): Promise<string | undefined> {
  try {
    return await resolveProjectId({
      explicit: [options.projectId, config.project.projectId],
      env: ctx.env,
      runner: ctx.runner,
    });
  } catch (err) {
    // Only needed to expand short ids; full resource names carry their project
    if (err instanceof ConfigurationError) return undefined;
    throw err;
  }
}

export async function registerCommand(config: Config, options: RegisterCommandOptions, ctx: CliContext): Promise<void> {
  const interactive = (options.interactive ?? true) && ctx.interactive;
  const args: RegistrationInput = {
    appId: options.appId,
    agentEngine: options.agentEngineId,
    displayName: options.displayName,
    description: options.description,
    toolDescription: options.toolDescription,
  };
  const configured: RegistrationInput = {
    appId: config.registration.appId,
    agentEngine: config.registration.agentEngineId,
    displayName: config.registration.displayName,
    description: config.registration.description,
    toolDescription: config.registration.toolDescription,
  };

  const prompter: Prompter | undefined = interactive ? ctx.createPrompter() : undefined;
  const record = await resolveRegistrationRecord({
    inputs: [args, registrationInputFromEnv(ctx.env), configured, latestDeployment(config)],
    interactive,
    prompter,
  }).finally(() => prompter?.close());

  const token = await accessToken(config, ctx);
  const client = new RegistrationClient({
    catalog: new CatalogClient(remoteClient(config, config.remote.catalogEndpoint, token, ctx)),
    projectId: await optionalProjectId(config, options, ctx),
    location: options.location ?? config.registration.location,
    engineRegion: options.region ?? config.project.region,
  });
  const result = await client.register(record);
  ctx.out(result.agentName);
}
