import { z } from "zod";

const identifier = z.string().min(1);

export const configSchema = z.object({
  project: z.object({
    projectId: identifier.optional(),
    region: identifier.default("us-central1"),
    accessToken: z.string().min(1).optional(),
  }),
  remote: z.object({
    // Defaults to the regional endpoint of the configured project region
    apiEndpoint: z.string().url().optional(),
    catalogEndpoint: z.string().url().default("https://discoveryengine.googleapis.com"),
    timeoutMs: z.number().int().min(100).max(600_000).default(60_000),
    maxAttempts: z.number().int().min(1).max(10).default(3),
    baseDelayMs: z.number().int().min(0).max(60_000).default(1000),
  }),
  deploy: z.object({
    projectDir: z.string().default("."),
    sourceRoot: z.string().default("./app"),
    entrypointModule: identifier.default("app.agent_engine_app"),
    entrypointObject: identifier.default("agent_engine"),
    requirementsFile: z.string().default("app/app_utils/.requirements.txt"),
    displayName: identifier.default("my-agent"),
    description: z.string().optional(),
    serviceAccount: z.string().optional(),
    historyDbPath: z.string().default(".agentport/deployments.db"),
  }),
  ingestion: z.object({
    projectDir: z.string().default("data_ingestion"),
    region: identifier.optional(),
    dataStoreId: identifier.optional(),
    dataStoreRegion: identifier.default("global"),
    serviceAccount: identifier.default("rag-ingestion@{projectId}.iam.gserviceaccount.com"),
    pipelineRoot: z.string().startsWith("gs://").default("gs://{projectId}-rag"),
    pipelineName: identifier.default("data-ingestion-pipeline"),
    templateUri: z.string().optional(),
    pipelineSpecPath: z.string().optional(),
  }),
  registration: z.object({
    appId: z.string().optional(),
    displayName: z.string().optional(),
    description: z.string().optional(),
    toolDescription: z.string().optional(),
    agentEngineId: z.string().optional(),
    location: identifier.default("global"),
  }),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): Config {
  return configSchema.parse(raw);
}

/** Substitutes `{projectId}` placeholders in configured names and URIs. */
export function expandProjectTemplate(template: string, projectId: string): string {
  return template.replaceAll("{projectId}", projectId);
}
