import {
  PipelineSubmitter,
  PipelinesClient,
  defaultApiEndpoint,
  loadPipelineTemplate,
  resolveProjectId,
  validateCron,
  validateJobSpec,
} from '@agentport/deployer';
import { ConfigurationError, expandProjectTemplate } from '@agentport/shared';
import type { Config } from '@agentport/shared';
import { accessToken, remoteClient, type CliContext } from '../context.js';

export interface SubmitPipelineOptions {
  projectId?: string;
  region?: string;
  dataStoreId?: string;
  dataStoreRegion?: string;
  serviceAccount?: string;
  pipelineRoot?: string;
  pipelineName?: string;
  templateUri?: string;
  pipelineSpec?: string;
  scheduleOnly?: boolean;
  cronSchedule?: string;
}

export async function submitPipelineCommand(
  config: Config,
  options: SubmitPipelineOptions,
  ctx: CliContext,
): Promise<void> {
  const { ingestion } = config;
  if (options.scheduleOnly && !options.cronSchedule) {
    throw new ConfigurationError('--schedule-only requires --cron-schedule');
  }

  const projectId = await resolveProjectId({
    explicit: [options.projectId, config.project.projectId],
    env: ctx.env,
    runner: ctx.runner,
  });
  const region = options.region ?? ingestion.region ?? config.project.region;
  const template = await loadPipelineTemplate({
    templateUri: options.templateUri ?? (options.pipelineSpec ? undefined : ingestion.templateUri),
    pipelineSpecPath: options.pipelineSpec ?? (options.templateUri ? undefined : ingestion.pipelineSpecPath),
  });

  const spec = {
    projectId,
    region,
    dataStoreId: options.dataStoreId ?? ingestion.dataStoreId,
    dataStoreRegion: options.dataStoreRegion ?? ingestion.dataStoreRegion,
    serviceAccount: expandProjectTemplate(options.serviceAccount ?? ingestion.serviceAccount, projectId),
    pipelineRoot: expandProjectTemplate(options.pipelineRoot ?? ingestion.pipelineRoot, projectId),
    pipelineName: options.pipelineName ?? ingestion.pipelineName,
  };

  // Fail on a bad spec or cron before asking gcloud for credentials
  validateJobSpec(spec);
  if (options.cronSchedule) validateCron(options.cronSchedule);

  const token = await accessToken(config, ctx);
  const submitter = new PipelineSubmitter({
    client: new PipelinesClient(remoteClient(config, config.remote.apiEndpoint ?? defaultApiEndpoint(region), token, ctx)),
  });

  if (options.scheduleOnly && options.cronSchedule) {
    const schedule = await submitter.schedule(spec, template, options.cronSchedule);
    ctx.out(schedule.scheduleName);
    return;
  }

  const submission = await submitter.submit(spec, template);
  ctx.out(submission.jobName);
  ctx.out(submission.consoleUrl);
}
