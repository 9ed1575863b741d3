import type { DependencyManifest } from "./manifest.js";

export interface EntrypointRef {
  module: string;
  object: string;
}

// Immutable once built; consumed once by the deployment submitter
export interface DeploymentDescriptor {
  readonly sourceRoot: string;
  readonly entrypoint: Readonly<EntrypointRef>;
  // Path of the requirements file relative to the source root's parent
  readonly requirementsFile: string;
  readonly manifest: Readonly<DependencyManifest>;
  // Packaged files, relative to the source root's parent
  readonly files: readonly string[];
  readonly createdAt: string;
}

export interface DeployTarget {
  projectId: string;
  region: string;
}

export interface DeployOptions {
  displayName: string;
  description?: string;
  serviceAccount?: string;
  envVars?: Record<string, string>;
}

// Resource name of the deployed agent, e.g. projects/p/locations/r/reasoningEngines/123
export type RemoteHandle = string;

export interface DeploymentRecord {
  id: number;
  handle: RemoteHandle;
  displayName: string;
  sourceRoot: string;
  entrypoint: string;
  projectId: string;
  region: string;
  createdAt: string;
}
