import { createLogger } from "@agentport/shared";
import type { RegistrationRecord, RegistrationResult } from "@agentport/shared";
import type { CatalogClient } from "../remote/catalog.js";
import { resolveAppName, resolveEngineName, type NameContext } from "./resource-names.js";

export interface RegistrationClientOptions extends NameContext {
  catalog: CatalogClient;
}

/**
 * RegistrationClient links a deployed agent into an enterprise catalog app.
 * Duplicate registrations are the catalog's concern; nothing is
 * de-duplicated here.
 */
export class RegistrationClient {
  private logger = createLogger("registration");
  private options: RegistrationClientOptions;

  constructor(options: RegistrationClientOptions) {
    this.options = options;
  }

  async register(record: RegistrationRecord): Promise<RegistrationResult> {
    const appName = resolveAppName(record.appId, this.options);
    const agentEngine = resolveEngineName(record.agentEngine, this.options);

    this.logger.info(`Registering ${agentEngine} in ${appName} as "${record.displayName}"`);
    const agentName = await this.options.catalog.createAgent(appName, { ...record, agentEngine });
    this.logger.info(`Registered agent ${agentName}`);
    return { agentName, appName };
  }
}
