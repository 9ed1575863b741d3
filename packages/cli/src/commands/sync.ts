import { resolve } from 'node:path';
import { syncDependencies } from '@agentport/deployer';
import type { Config } from '@agentport/shared';
import type { CliContext } from '../context.js';

export interface SyncCommandOptions {
  projectDir?: string;
  requirementsFile?: string;
  dev?: boolean;
}

export async function syncCommand(config: Config, options: SyncCommandOptions, ctx: CliContext): Promise<void> {
  const manifestPath = resolve(options.requirementsFile ?? config.deploy.requirementsFile);
  const resolved = await syncDependencies({
    projectDir: resolve(options.projectDir ?? config.deploy.projectDir),
    manifestPath,
    runner: ctx.runner,
    dev: options.dev,
    timeoutMs: config.remote.timeoutMs,
  });
  ctx.out(`${manifestPath} (${resolved.manifest.entries.length} requirements via ${resolved.strategy})`);
}
