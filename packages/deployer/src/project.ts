import { ConfigurationError, createLogger } from "@agentport/shared";
import type { CommandRunner } from "./exec/command-runner.js";

const logger = createLogger("project-context");

export interface ProjectSources {
  // Flag or config value, in that order of precedence
  explicit: Array<string | undefined>;
  env: Record<string, string | undefined>;
  // When set, the active gcloud project is consulted last
  runner?: CommandRunner;
}

/**
 * Resolves the project id once, up front, so every operation receives it
 * as explicit input.
 */
export async function resolveProjectId(sources: ProjectSources): Promise<string> {
  for (const value of [...sources.explicit, sources.env.GOOGLE_CLOUD_PROJECT]) {
    if (value?.trim()) return value.trim();
  }

  if (sources.runner) {
    try {
      const result = await sources.runner.run("gcloud", ["config", "get-value", "project"], { timeoutMs: 15_000 });
      const project = result.stdout.toString("utf-8").trim();
      if (result.exitCode === 0 && project && project !== "(unset)") {
        logger.info(`Using active gcloud project ${project}`);
        return project;
      }
    } catch (err) {
      logger.debug("gcloud is not available", err);
    }
  }

  throw new ConfigurationError(
    "No project id: pass --project-id, set project.projectId or GOOGLE_CLOUD_PROJECT, or configure gcloud"
  );
}

export interface CredentialSources {
  // Configured token (config file or AGENTPORT_ACCESS_TOKEN)
  explicit: Array<string | undefined>;
  // When set, the operator's gcloud credentials are consulted last
  runner?: CommandRunner;
}

/**
 * Resolves the bearer token for remote calls: a configured token first,
 * then `gcloud auth print-access-token`. Fails before any remote call when
 * neither yields one.
 */
export async function resolveAccessToken(sources: CredentialSources): Promise<string> {
  for (const value of sources.explicit) {
    if (value?.trim()) return value.trim();
  }

  if (sources.runner) {
    try {
      const result = await sources.runner.run("gcloud", ["auth", "print-access-token"], { timeoutMs: 15_000 });
      const token = result.stdout.toString("utf-8").trim();
      if (result.exitCode === 0 && token) {
        logger.debug("Using gcloud credentials");
        return token;
      }
      logger.debug(`gcloud auth print-access-token failed: ${result.stderr.trim()}`);
    } catch (err) {
      logger.debug("gcloud is not available", err);
    }
  }

  throw new ConfigurationError(
    "No access token: set project.accessToken or AGENTPORT_ACCESS_TOKEN, or run `gcloud auth login`"
  );
}
