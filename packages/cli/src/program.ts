import { Command, Option } from 'commander';
import { createLogger, exitCodeFor, isLogLevel, setLogLevel } from '@agentport/shared';
import { loadConfig } from './config-loader.js';
import type { CliContext } from './context.js';
import { syncCommand } from './commands/sync.js';
import { deployCommand } from './commands/deploy.js';
import { submitPipelineCommand } from './commands/submit-pipeline.js';
import { registerCommand } from './commands/register.js';
import { deploymentsCommand } from './commands/deployments.js';
import { validateCommand } from './commands/validate.js';

type GlobalOptions = {
  config?: string;
  logLevel: string;
};

const logger = createLogger('cli');

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  // Runs a command body with logging configured; failures become exit codes
  const run = async (command: Command, body: (globals: GlobalOptions) => Promise<void> | void): Promise<void> => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    try {
      if (!isLogLevel(globals.logLevel)) {
        throw new Error(`Unknown log level "${globals.logLevel}"`);
      }
      setLogLevel(globals.logLevel);
      await body(globals);
    } catch (err) {
      logger.error(err instanceof Error ? err.message : String(err));
      ctx.setExitCode(exitCodeFor(err));
    }
  };

  program
    .name('agentport')
    .description('Package, deploy and register agents; submit their ingestion pipelines')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to config file')
    .option('-l, --log-level <level>', 'Log level (debug, info, warn, error, silent)', 'info');

  program
    .command('sync-dependencies')
    .description('Install the locked environment and export the requirements manifest')
    .option('--project-dir <dir>', 'Directory containing the uv project')
    .option('--requirements-file <path>', 'Where to write the manifest')
    .option('--dev', 'Include development dependencies in the local environment')
    .action((options, command: Command) =>
      run(command, (globals) => syncCommand(loadConfig(globals.config, ctx.env), options, ctx)),
    );

  program
    .command('deploy')
    .description('Export dependencies, package the agent source and deploy it')
    .option('--source-packages <dir>', 'Source root to package')
    .option('--entrypoint-module <module>', 'Module holding the agent object')
    .option('--entrypoint-object <name>', 'Agent object within the module')
    .option('--requirements-file <path>', 'Requirements manifest path')
    .option('--project-id <id>', 'Target project')
    .option('--region <region>', 'Target region')
    .option('--display-name <name>', 'Display name of the deployed agent')
    .option('--description <text>', 'Description of the deployed agent')
    .option('--service-account <email>', 'Identity the agent runs as')
    .option('--set-env-vars <pairs>', 'Environment variables as KEY=VALUE,KEY2=VALUE2')
    .option('--skip-export', 'Use the existing requirements file instead of exporting')
    .action((options, command: Command) =>
      run(command, (globals) => deployCommand(loadConfig(globals.config, ctx.env), options, ctx)),
    );

  program
    .command('submit-pipeline')
    .alias('data-ingestion')
    .description('Submit the data ingestion pipeline')
    .option('--project-id <id>', 'Target project')
    .option('--region <region>', 'Region the pipeline runs in')
    .option('--data-store-id <id>', 'Data store to ingest into')
    .option('--data-store-region <region>', 'Region of the data store')
    .option('--service-account <email>', 'Identity the pipeline runs as')
    .option('--pipeline-root <uri>', 'gs:// root for pipeline artifacts')
    .option('--pipeline-name <name>', 'Pipeline name')
    .addOption(new Option('--template-uri <uri>', 'Pipeline template URI').conflicts('pipelineSpec'))
    .option('--pipeline-spec <path>', 'Compiled pipeline spec (JSON)')
    .option('--schedule-only', 'Create a recurring schedule instead of a run')
    .option('--cron-schedule <cron>', 'Cron expression for --schedule-only')
    .action((options, command: Command) =>
      run(command, (globals) => submitPipelineCommand(loadConfig(globals.config, ctx.env), options, ctx)),
    );

  program
    .command('register')
    .alias('register-gemini-enterprise')
    .description('Register the deployed agent in the enterprise catalog')
    .option('--app-id <id>', 'Catalog app id or full resource name')
    .option('--agent-engine-id <id>', 'Deployed agent resource name or id (defaults to the latest deploy)')
    .option('--display-name <name>', 'Display name in the catalog')
    .option('--description <text>', 'Agent description')
    .option('--tool-description <text>', 'Tool description')
    .option('--project-id <id>', 'Project used to expand short ids')
    .option('--region <region>', 'Region of the deployed agent')
    .option('--location <location>', 'Catalog location')
    .option('--no-interactive', 'Fail instead of prompting for missing fields')
    .action((options, command: Command) =>
      run(command, (globals) => registerCommand(loadConfig(globals.config, ctx.env), options, ctx)),
    );

  program
    .command('deployments')
    .description('List recorded deployments, newest first')
    .option('-n, --limit <count>', 'Number of entries to show')
    .action((options, command: Command) =>
      run(command, (globals) => deploymentsCommand(loadConfig(globals.config, ctx.env), options, ctx)),
    );

  program
    .command('validate')
    .description('Validate the configuration file')
    .action((_options, command: Command) => run(command, (globals) => validateCommand(globals.config, ctx)));

  return program;
}
