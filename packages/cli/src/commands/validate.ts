import { loadConfig } from '../config-loader.js';
import type { CliContext } from '../context.js';

export function validateCommand(configPath: string | undefined, ctx: CliContext): void {
  const config = loadConfig(configPath, ctx.env);
  ctx.out('Configuration is valid!');
  ctx.out('');
  ctx.out('Settings:');
  ctx.out(`  Project:            ${config.project.projectId ?? '(from gcloud)'}`);
  ctx.out(`  Region:             ${config.project.region}`);
  ctx.out(`  API endpoint:       ${config.remote.apiEndpoint ?? '(regional default)'}`);
  ctx.out(`  Catalog endpoint:   ${config.remote.catalogEndpoint}`);
  ctx.out(`  Timeout:            ${config.remote.timeoutMs}ms x ${config.remote.maxAttempts} attempts`);
  ctx.out(`  Source root:        ${config.deploy.sourceRoot}`);
  ctx.out(`  Entrypoint:         ${config.deploy.entrypointModule}:${config.deploy.entrypointObject}`);
  ctx.out(`  Requirements file:  ${config.deploy.requirementsFile}`);
  ctx.out(`  Pipeline:           ${config.ingestion.pipelineName}`);
  ctx.out(`  Data store:         ${config.ingestion.dataStoreId ?? '(unset)'} (${config.ingestion.dataStoreRegion})`);
}
