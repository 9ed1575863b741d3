import { randomBytes } from "node:crypto";
import { ConfigurationError, SubmissionRejectedError, createLogger } from "@agentport/shared";
import type {
  PipelineJobSpec,
  PipelineSubmission,
  PipelineTemplate,
  ScheduleSubmission,
} from "@agentport/shared";
import type { PipelinesClient } from "../remote/pipelines.js";
import { buildPipelineJob, pipelineParent, runIdFor, validateJobSpec } from "./job.js";

export interface PipelineSubmitterOptions {
  client: PipelinesClient;
  clock?: () => Date;
  // Run id suffix; four random hex digits by default
  nonce?: () => string;
}

const CRON_FIELD = /^[\d*/,\-A-Za-z?LW#]+$/;

export function validateCron(cron: string): string {
  const fields = cron.trim().split(/\s+/);
  if (fields.length !== 5 || !fields.every((f) => CRON_FIELD.test(f))) {
    throw new ConfigurationError(`Invalid cron schedule "${cron}": expected five fields`);
  }
  return fields.join(" ");
}

export function consoleUrl(spec: PipelineJobSpec, jobId: string): string {
  return `https://console.cloud.google.com/vertex-ai/locations/${spec.region}/pipelines/runs/${jobId}?project=${spec.projectId}`;
}

/**
 * PipelineSubmitter drives an ingestion job from Unsubmitted to Submitted.
 * It returns as soon as the run is accepted; execution state afterwards
 * belongs to the remote scheduler and is not polled.
 */
export class PipelineSubmitter {
  private logger = createLogger("pipeline-submitter");
  private options: PipelineSubmitterOptions;

  constructor(options: PipelineSubmitterOptions) {
    this.options = options;
  }

  private now(): Date {
    return this.options.clock?.() ?? new Date();
  }

  private nonce(): string {
    return this.options.nonce?.() ?? randomBytes(2).toString("hex");
  }

  async submit(input: Partial<PipelineJobSpec>, template: PipelineTemplate): Promise<PipelineSubmission> {
    const spec = validateJobSpec(input);
    const submittedAt = this.now();
    const definition = buildPipelineJob(spec, template, runIdFor(spec.pipelineName, submittedAt, this.nonce()));
    const parent = pipelineParent(spec);

    this.logger.info(
      `Submitting ${spec.pipelineName} (${definition.jobId}) to ${parent} for data store ${spec.dataStoreId} in ${spec.dataStoreRegion}`
    );
    try {
      const job = await this.options.client.createJob(parent, definition);
      this.logger.info(`Pipeline run ${job.name} submitted${job.state ? ` (${job.state})` : ""}`);
      return {
        state: "SUBMITTED",
        jobName: job.name,
        consoleUrl: consoleUrl(spec, definition.jobId),
        submittedAt: submittedAt.toISOString(),
      };
    } catch (err) {
      if (err instanceof SubmissionRejectedError) {
        this.logger.error(`Pipeline ${spec.pipelineName} rejected: ${err.remoteMessage}`);
      }
      throw err;
    }
  }

  /**
   * Replaces the recurring schedule named after the pipeline: existing
   * schedules with the same display name are deleted before the new one is
   * created, so resubmitting updates rather than duplicates.
   */
  async schedule(
    input: Partial<PipelineJobSpec>,
    template: PipelineTemplate,
    cron: string,
  ): Promise<ScheduleSubmission> {
    const spec = validateJobSpec(input);
    const expression = validateCron(cron);
    const definition = buildPipelineJob(spec, template, runIdFor(spec.pipelineName, this.now(), this.nonce()));
    const parent = pipelineParent(spec);

    const existing = await this.options.client.listSchedules(parent, spec.pipelineName);
    for (const schedule of existing) {
      this.logger.info(`Deleting existing schedule ${schedule.name}`);
      await this.options.client.deleteSchedule(schedule.name);
    }

    const created = await this.options.client.createSchedule(parent, spec.pipelineName, expression, definition);
    this.logger.info(`Schedule ${created.name} created (${expression})`);
    return {
      scheduleName: created.name,
      cron: expression,
      replaced: existing.map((s) => s.name),
    };
  }
}
