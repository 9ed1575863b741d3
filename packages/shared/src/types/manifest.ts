// A single pinned requirement, e.g. `uvicorn[standard]==0.30.1 ; python_version >= "3.10"`
export interface ManifestEntry {
  name: string;
  extras?: string[];
  constraint: string;
  marker?: string;
}

// Ordered, duplicate-free list of requirements packaged with an artifact
export interface DependencyManifest {
  entries: ManifestEntry[];
}

export type StrategyResult =
  | { ok: true; manifest: DependencyManifest }
  | { ok: false; error: string };

export interface ResolvedManifest {
  manifest: DependencyManifest;
  strategy: string;
  attempts: Array<{ strategy: string; error?: string }>;
}
