import { ConfigurationError } from "@agentport/shared";

const APP_NAME = /^projects\/[^/]+\/locations\/[^/]+\/collections\/[^/]+\/engines\/[^/]+$/;
const ENGINE_NAME = /^projects\/[^/]+\/locations\/[^/]+\/reasoningEngines\/[^/]+$/;
const SHORT_ID = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export interface NameContext {
  projectId?: string;
  // Catalog location, usually "global"
  location: string;
  // Region hosting the agent, used to expand a bare agent engine id
  engineRegion?: string;
}

/** Expands a short catalog app id to its full resource name. */
export function resolveAppName(appId: string, ctx: NameContext): string {
  const value = appId.trim();
  if (value.startsWith("projects/")) {
    if (!APP_NAME.test(value)) {
      throw new ConfigurationError(
        `Invalid app resource name "${value}": expected projects/<p>/locations/<l>/collections/<c>/engines/<id>`
      );
    }
    return value;
  }
  if (!SHORT_ID.test(value)) {
    throw new ConfigurationError(`Invalid app id "${value}"`);
  }
  if (!ctx.projectId) {
    throw new ConfigurationError(`A project id is required to expand the short app id "${value}"`);
  }
  return `projects/${ctx.projectId}/locations/${ctx.location}/collections/default_collection/engines/${value}`;
}

/** Expands a bare agent engine id to its full resource name. */
export function resolveEngineName(engine: string, ctx: NameContext): string {
  const value = engine.trim();
  if (value.startsWith("projects/")) {
    if (!ENGINE_NAME.test(value)) {
      throw new ConfigurationError(
        `Invalid agent engine resource name "${value}": expected projects/<p>/locations/<r>/reasoningEngines/<id>`
      );
    }
    return value;
  }
  if (!SHORT_ID.test(value)) {
    throw new ConfigurationError(`Invalid agent engine id "${value}"`);
  }
  if (!ctx.projectId || !ctx.engineRegion) {
    throw new ConfigurationError(`A project id and region are required to expand the agent engine id "${value}"`);
  }
  return `projects/${ctx.projectId}/locations/${ctx.engineRegion}/reasoningEngines/${value}`;
}
