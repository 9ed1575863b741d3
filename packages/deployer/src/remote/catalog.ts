import { z } from "zod";
import type { RegistrationRecord } from "@agentport/shared";
import type { RemoteClient } from "./client.js";

const agentSchema = z.object({ name: z.string().min(1) });

/** Enterprise catalog binding: links a hosted agent into an app's assistant. */
export class CatalogClient {
  private client: RemoteClient;

  constructor(client: RemoteClient) {
    this.client = client;
  }

  async createAgent(appName: string, record: RegistrationRecord): Promise<string> {
    const agent = await this.client.request(
      agentSchema,
      "POST",
      `/v1alpha/${appName}/assistants/default_assistant/agents`,
      {
        displayName: record.displayName,
        description: record.description,
        adkAgentDefinition: {
          toolSettings: { toolDescription: record.toolDescription },
          provisionedReasoningEngine: { reasoningEngine: record.agentEngine },
        },
      },
    );
    return agent.name;
  }
}
