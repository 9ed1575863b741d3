import { ConfigurationError, ResolutionError, createLogger } from "@agentport/shared";
import type { DeployOptions, DeployTarget, DeploymentDescriptor, RemoteHandle } from "@agentport/shared";
import type { AgentEngineClient } from "../remote/agent-engine.js";
import type { SourceArchiver } from "../package/archive.js";
import { findDuplicateNames } from "../resolver/index.js";
import { validateEntrypoint } from "../package/entrypoint.js";

export interface SubmitterOptions {
  engine: AgentEngineClient;
  archiver: SourceArchiver;
}

export interface Submission {
  handle: RemoteHandle;
  operation: string;
}

const ENV_VAR_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * DeploymentSubmitter uploads a packaged descriptor to the Agent Engine.
 *
 * Not idempotent: two submissions of equivalent descriptors create two
 * remote agents. A given descriptor object is accepted once.
 */
export class DeploymentSubmitter {
  private logger = createLogger("deployment-submitter");
  private consumed = new WeakSet<DeploymentDescriptor>();
  private options: SubmitterOptions;

  constructor(options: SubmitterOptions) {
    this.options = options;
  }

  async submit(descriptor: DeploymentDescriptor, target: DeployTarget, deploy: DeployOptions): Promise<Submission> {
    this.validate(descriptor, target, deploy);
    this.consumed.add(descriptor);

    const sourceArchive = await this.options.archiver.archive(descriptor);
    this.logger.info(
      `Uploading ${descriptor.files.length} files (${sourceArchive.length} bytes) to projects/${target.projectId}/locations/${target.region}`
    );

    const submission = await this.options.engine.createAgent({
      target,
      options: deploy,
      entrypoint: descriptor.entrypoint,
      requirementsFile: descriptor.requirementsFile,
      sourceArchive,
    });
    this.logger.info(`Deployed ${deploy.displayName} as ${submission.handle}`);
    return submission;
  }

  private validate(descriptor: DeploymentDescriptor, target: DeployTarget, deploy: DeployOptions): void {
    if (this.consumed.has(descriptor)) {
      throw new ConfigurationError("Deployment descriptor was already submitted; package the source again");
    }
    if (!Object.isFrozen(descriptor)) {
      throw new ConfigurationError("Deployment descriptor must come from ArtifactPackager");
    }
    validateEntrypoint(descriptor.entrypoint);
    if (descriptor.manifest.entries.length === 0) {
      throw new ResolutionError("Deployment descriptor has an empty manifest");
    }
    const duplicates = findDuplicateNames(descriptor.manifest);
    if (duplicates.length > 0) {
      throw new ResolutionError(`Deployment descriptor lists duplicate packages: ${duplicates.join(", ")}`);
    }
    if (descriptor.files.length === 0) {
      throw new ConfigurationError(`Nothing to upload from ${descriptor.sourceRoot}`);
    }
    if (!target.projectId) {
      throw new ConfigurationError("Deploy target is missing a project id");
    }
    if (!target.region) {
      throw new ConfigurationError("Deploy target is missing a region");
    }
    if (!deploy.displayName.trim()) {
      throw new ConfigurationError("Display name must not be empty");
    }
    for (const name of Object.keys(deploy.envVars ?? {})) {
      if (!ENV_VAR_NAME.test(name)) {
        throw new ConfigurationError(`Invalid environment variable name "${name}"`);
      }
    }
  }
}

/** Parses `KEY=VALUE,KEY2=VALUE2` as accepted by `deploy --set-env-vars`. */
export function parseEnvVars(value: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const pair of value.split(",")) {
    if (!pair.trim()) continue;
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new ConfigurationError(`Invalid environment variable "${pair}": expected KEY=VALUE`);
    }
    const name = pair.slice(0, eq).trim();
    if (!ENV_VAR_NAME.test(name)) {
      throw new ConfigurationError(`Invalid environment variable name "${name}"`);
    }
    vars[name] = pair.slice(eq + 1);
  }
  return vars;
}
