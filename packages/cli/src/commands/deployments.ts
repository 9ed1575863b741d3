import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { DeploymentHistory } from '@agentport/deployer';
import { ConfigurationError } from '@agentport/shared';
import type { Config } from '@agentport/shared';
import type { CliContext } from '../context.js';

export function deploymentsCommand(config: Config, options: { limit?: string }, ctx: CliContext): void {
  const limit = options.limit === undefined ? undefined : Number(options.limit);
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new ConfigurationError(`--limit must be a positive integer, got "${options.limit}"`);
  }
  const dbPath = resolve(config.deploy.historyDbPath);
  if (!existsSync(dbPath)) {
    ctx.out('No deployments recorded.');
    return;
  }

  const history = new DeploymentHistory(dbPath);
  try {
    const records = history.list(limit);
    if (records.length === 0) {
      ctx.out('No deployments recorded.');
      return;
    }
    for (const record of records) {
      ctx.out(`#${record.id}  ${record.createdAt}  ${record.displayName}  ${record.handle}`);
    }
  } finally {
    history.close();
  }
}
