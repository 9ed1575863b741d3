import { z } from "zod";
import type { DeployOptions, DeployTarget, EntrypointRef, RemoteHandle } from "@agentport/shared";
import type { RemoteClient } from "./client.js";

const operationSchema = z.object({
  name: z.string().min(1),
  done: z.boolean().optional(),
  response: z.object({ name: z.string().min(1) }).optional(),
});

export type CreateOperation = z.infer<typeof operationSchema>;

export interface CreateAgentRequest {
  target: DeployTarget;
  options: DeployOptions;
  entrypoint: EntrypointRef;
  requirementsFile: string;
  sourceArchive: Buffer;
}

export function agentEngineParent(target: DeployTarget): string {
  return `projects/${target.projectId}/locations/${target.region}`;
}

/** Strips the `/operations/<id>` suffix from a long-running operation name. */
export function handleFromOperation(operation: CreateOperation): RemoteHandle {
  if (operation.response?.name) return operation.response.name;
  const index = operation.name.indexOf("/operations/");
  return index >= 0 ? operation.name.slice(0, index) : operation.name;
}

export function defaultApiEndpoint(region: string): string {
  return `https://${region}-aiplatform.googleapis.com`;
}

/**
 * AgentEngineClient creates hosted agents from an inline source archive.
 * Each create call produces a new remote agent; the service does not
 * deduplicate by display name.
 */
export class AgentEngineClient {
  private client: RemoteClient;

  constructor(client: RemoteClient) {
    this.client = client;
  }

  async createAgent(request: CreateAgentRequest): Promise<{ handle: RemoteHandle; operation: string }> {
    const { options } = request;
    const body = {
      displayName: options.displayName,
      description: options.description,
      spec: {
        serviceAccount: options.serviceAccount,
        deploymentSpec: options.envVars
          ? { env: Object.entries(options.envVars).map(([name, value]) => ({ name, value })) }
          : undefined,
        sourceCodeSpec: {
          inlineSource: { sourceArchive: request.sourceArchive.toString("base64") },
          pythonSpec: {
            entrypointModule: request.entrypoint.module,
            entrypointObject: request.entrypoint.object,
            requirementsFile: request.requirementsFile,
          },
        },
      },
    };

    const operation = await this.client.request(
      operationSchema,
      "POST",
      `/v1/${agentEngineParent(request.target)}/reasoningEngines`,
      body,
    );
    return { handle: handleFromOperation(operation), operation: operation.name };
  }
}
