import { z } from "zod";
import type { PipelineJobDefinition } from "@agentport/shared";
import type { RemoteClient } from "./client.js";

const pipelineJobSchema = z.object({
  name: z.string().min(1),
  state: z.string().optional(),
});

const scheduleSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().optional(),
});

const scheduleListSchema = z.object({
  schedules: z.array(scheduleSchema).default([]),
  nextPageToken: z.string().optional(),
});

export type RemotePipelineJob = z.infer<typeof pipelineJobSchema>;
export type RemoteSchedule = z.infer<typeof scheduleSchema>;

function jobBody(definition: PipelineJobDefinition): Omit<PipelineJobDefinition, "jobId"> {
  const { jobId: _jobId, ...body } = definition;
  return body;
}

/** Thin REST binding for pipeline runs and their recurring schedules. */
export class PipelinesClient {
  private client: RemoteClient;

  constructor(client: RemoteClient) {
    this.client = client;
  }

  createJob(parent: string, definition: PipelineJobDefinition): Promise<RemotePipelineJob> {
    return this.client.request(
      pipelineJobSchema,
      "POST",
      `/v1/${parent}/pipelineJobs?pipelineJobId=${encodeURIComponent(definition.jobId)}`,
      jobBody(definition),
    );
  }

  /** Every schedule under `parent` whose display name is exactly `displayName`, across all pages. */
  async listSchedules(parent: string, displayName: string): Promise<RemoteSchedule[]> {
    const filter = encodeURIComponent(`display_name="${displayName}"`);
    const matches: RemoteSchedule[] = [];
    let pageToken: string | undefined;
    do {
      const page = pageToken ? `&pageToken=${encodeURIComponent(pageToken)}` : "";
      const list = await this.client.request(scheduleListSchema, "GET", `/v1/${parent}/schedules?filter=${filter}${page}`);
      // The server-side filter is not relied on; only exact matches are returned
      matches.push(...list.schedules.filter((s) => s.displayName === displayName));
      pageToken = list.nextPageToken || undefined;
    } while (pageToken);
    return matches;
  }

  async deleteSchedule(name: string): Promise<void> {
    await this.client.request(z.unknown(), "DELETE", `/v1/${name}`);
  }

  createSchedule(
    parent: string,
    displayName: string,
    cron: string,
    definition: PipelineJobDefinition,
  ): Promise<RemoteSchedule> {
    return this.client.request(scheduleSchema, "POST", `/v1/${parent}/schedules`, {
      displayName,
      cron,
      maxConcurrentRunCount: 1,
      createPipelineJobRequest: {
        parent,
        pipelineJob: jobBody(definition),
      },
    });
  }
}
