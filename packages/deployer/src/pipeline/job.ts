import { ConfigurationError, MissingFieldsError } from "@agentport/shared";
import type { PipelineJobDefinition, PipelineJobSpec, PipelineTemplate } from "@agentport/shared";

const SPEC_FIELDS = [
  "projectId",
  "region",
  "dataStoreId",
  "dataStoreRegion",
  "serviceAccount",
  "pipelineRoot",
  "pipelineName",
] as const satisfies readonly (keyof PipelineJobSpec)[];

export function validateJobSpec(spec: Partial<PipelineJobSpec>): PipelineJobSpec {
  const missing = SPEC_FIELDS.filter((field) => !spec[field]?.trim());
  if (missing.length > 0) {
    throw new MissingFieldsError(missing, "pipeline job spec");
  }
  const {
    projectId = "",
    region = "",
    dataStoreId = "",
    dataStoreRegion = "",
    serviceAccount = "",
    pipelineRoot = "",
    pipelineName = "",
  } = spec;

  if (!pipelineRoot.startsWith("gs://") || pipelineRoot.length <= "gs://".length) {
    throw new ConfigurationError(`Pipeline root must be a gs:// URI, got "${pipelineRoot}"`);
  }
  if (!/^[a-z]/.test(slugify(pipelineName))) {
    throw new ConfigurationError(`Pipeline name must start with a letter to form a run id, got "${pipelineName}"`);
  }
  if (!/^[^@\s]+@[^@\s]+$/.test(serviceAccount)) {
    throw new ConfigurationError(`Service account must be an email identity, got "${serviceAccount}"`);
  }
  return { projectId, region, dataStoreId, dataStoreRegion, serviceAccount, pipelineRoot, pipelineName };
}

export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}

/**
 * Run id in the form `<pipeline-name>-YYYYMMDDhhmmssSSS-<nonce>`. The nonce
 * keeps runs submitted in the same millisecond, from separate processes, apart.
 */
export function runIdFor(pipelineName: string, at: Date, nonce: string): string {
  const stamp = at.toISOString().replace(/[-:T.Z]/g, "").slice(0, 17);
  return `${slugify(pipelineName).slice(0, 100)}-${stamp}-${nonce}`;
}

export function pipelineParent(spec: Pick<PipelineJobSpec, "projectId" | "region">): string {
  return `projects/${spec.projectId}/locations/${spec.region}`;
}

/**
 * Composes the job definition for one ingestion run. Only `jobId` depends
 * on the run; every other field is a function of the spec and template.
 */
export function buildPipelineJob(
  spec: PipelineJobSpec,
  template: PipelineTemplate,
  jobId: string,
): PipelineJobDefinition {
  const definition: PipelineJobDefinition = {
    jobId,
    displayName: spec.pipelineName,
    serviceAccount: spec.serviceAccount,
    runtimeConfig: {
      gcsOutputDirectory: spec.pipelineRoot,
      parameterValues: {
        project_id: spec.projectId,
        location: spec.region,
        data_store_id: spec.dataStoreId,
        data_store_region: spec.dataStoreRegion,
      },
    },
    labels: { pipeline: slugify(spec.pipelineName).slice(0, 63) },
  };
  if (template.kind === "uri") {
    definition.templateUri = template.templateUri;
  } else {
    definition.pipelineSpec = template.pipelineSpec;
  }
  return definition;
}
