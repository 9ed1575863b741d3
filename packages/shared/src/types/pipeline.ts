export interface PipelineJobSpec {
  projectId: string;
  // Region the pipeline runs in; independent of dataStoreRegion
  region: string;
  dataStoreId: string;
  dataStoreRegion: string;
  serviceAccount: string;
  pipelineRoot: string;
  pipelineName: string;
}

export type PipelineTemplate =
  | { kind: "uri"; templateUri: string }
  | { kind: "spec"; pipelineSpec: Record<string, unknown> };

export type PipelineState =
  | "UNSUBMITTED"
  | "SUBMITTED"
  | "RUNNING"
  | "SUCCEEDED"
  | "FAILED"
  | "SUBMISSION_REJECTED";

export interface PipelineJobDefinition {
  jobId: string;
  displayName: string;
  serviceAccount: string;
  templateUri?: string;
  pipelineSpec?: Record<string, unknown>;
  runtimeConfig: {
    gcsOutputDirectory: string;
    parameterValues: Record<string, string>;
  };
  labels: Record<string, string>;
}

export interface PipelineSubmission {
  state: PipelineState;
  jobName: string;
  consoleUrl: string;
  submittedAt: string;
}

export interface ScheduleSubmission {
  scheduleName: string;
  cron: string;
  replaced: string[];
}
