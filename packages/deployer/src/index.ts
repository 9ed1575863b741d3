export { ProcessRunner, type CommandRunner, type CommandOptions, type CommandResult } from "./exec/command-runner.js";

export {
  resolveDependencies,
  writeManifest,
  parseRequirements,
  parseRequirementLine,
  renderRequirements,
  renderEntry,
  normalizeName,
  findDuplicateNames,
  uvExportStrategy,
  DEFAULT_STRATEGIES,
  type ResolutionStrategy,
  type ResolutionContext,
  type ParseOptions,
} from "./resolver/index.js";
export { syncDependencies, type SyncRequest } from "./sync.js";

export {
  ArtifactPackager,
  PACKAGED_REQUIREMENTS_PATH,
  type PackageRequest,
  type SourceRequest,
  type ValidatedSource,
} from "./package/packager.js";
export { parseEntrypoint, validateEntrypoint, formatEntrypoint } from "./package/entrypoint.js";
export { TarArchiver, type SourceArchiver } from "./package/archive.js";

export { RemoteClient, type RemoteClientOptions, type FetchLike } from "./remote/client.js";
export { AgentEngineClient, defaultApiEndpoint, handleFromOperation } from "./remote/agent-engine.js";
export { PipelinesClient } from "./remote/pipelines.js";
export { CatalogClient } from "./remote/catalog.js";

export { DeploymentSubmitter, parseEnvVars, type Submission, type SubmitterOptions } from "./deploy/submitter.js";
export { DeploymentHistory } from "./deploy/history.js";
export { deployAgent, type DeployRequest, type DeployDependencies, type DeployResult } from "./deploy/workflow.js";

export { PipelineSubmitter, validateCron, type PipelineSubmitterOptions } from "./pipeline/submitter.js";
export { buildPipelineJob, validateJobSpec, runIdFor, pipelineParent } from "./pipeline/job.js";
export { loadPipelineTemplate, type TemplateSource } from "./pipeline/template.js";

export { RegistrationClient, type RegistrationClientOptions } from "./registration/client.js";
export { resolveRegistrationRecord, registrationInputFromEnv, type RecordSources } from "./registration/record.js";
export { ReadlinePrompter, type Prompter } from "./registration/prompter.js";
export { resolveAppName, resolveEngineName } from "./registration/resource-names.js";

export { resolveProjectId, resolveAccessToken, type ProjectSources, type CredentialSources } from "./project.js";
