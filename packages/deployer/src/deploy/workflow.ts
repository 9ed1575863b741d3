import { createLogger } from "@agentport/shared";
import type { DeployOptions, DeployTarget, DeploymentRecord, EntrypointRef } from "@agentport/shared";
import type { ArtifactPackager } from "../package/packager.js";
import { formatEntrypoint } from "../package/entrypoint.js";
import type { DeploymentSubmitter } from "./submitter.js";
import type { DeploymentHistory } from "./history.js";

const logger = createLogger("deploy");

export interface DeployRequest {
  sourceRoot: string;
  entrypoint: EntrypointRef | string;
  manifestPath: string;
  target: DeployTarget;
  options: DeployOptions;
}

export interface DeployDependencies {
  packager: ArtifactPackager;
  submitter: DeploymentSubmitter;
  history?: DeploymentHistory;
}

export interface DeployResult {
  handle: string;
  operation: string;
  record?: DeploymentRecord;
}

/**
 * Packages the source root and submits it. Packaging validates everything
 * locally, so a bad request never reaches the remote target.
 */
export async function deployAgent(request: DeployRequest, deps: DeployDependencies): Promise<DeployResult> {
  const descriptor = await deps.packager.package({
    sourceRoot: request.sourceRoot,
    entrypoint: request.entrypoint,
    manifestPath: request.manifestPath,
  });

  const { handle, operation } = await deps.submitter.submit(descriptor, request.target, request.options);

  let record: DeploymentRecord | undefined;
  if (deps.history) {
    record = deps.history.record({
      handle,
      displayName: request.options.displayName,
      sourceRoot: descriptor.sourceRoot,
      entrypoint: formatEntrypoint(descriptor.entrypoint),
      projectId: request.target.projectId,
      region: request.target.region,
    });
    logger.debug(`Recorded deployment #${record.id}`);
  }

  return { handle, operation, record };
}
