import { readFile, readdir, stat } from "node:fs/promises";
import { basename, dirname, join, relative, resolve, sep } from "node:path";
import { ConfigurationError, ResolutionError, createLogger } from "@agentport/shared";
import type { DeploymentDescriptor, EntrypointRef } from "@agentport/shared";
import { parseRequirements, writeManifest } from "../resolver/index.js";
import { formatEntrypoint, moduleFileCandidates, parseEntrypoint, validateEntrypoint } from "./entrypoint.js";

// Where the manifest travels inside the packaged source root
export const PACKAGED_REQUIREMENTS_PATH = join("app_utils", ".requirements.txt");

const SKIPPED_DIRS = new Set(["__pycache__", ".venv", "venv", ".git", "node_modules", ".mypy_cache", ".pytest_cache"]);
const SKIPPED_SUFFIXES = [".pyc", ".pyo"];

export interface SourceRequest {
  sourceRoot: string;
  // `{ module, object }` or the combined "module:object" form
  entrypoint: EntrypointRef | string;
}

export interface PackageRequest extends SourceRequest {
  manifestPath: string;
}

export interface ValidatedSource {
  sourceRoot: string;
  entrypoint: EntrypointRef;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

async function collectFiles(root: string, base: string): Promise<string[]> {
  const files: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRS.has(entry.name)) await walk(full);
      } else if (entry.isFile() && !SKIPPED_SUFFIXES.some((s) => entry.name.endsWith(s))) {
        files.push(toPosix(relative(base, full)));
      }
    }
  };
  await walk(root);
  return files.sort();
}

/**
 * ArtifactPackager validates a deploy request and turns it into a frozen
 * DeploymentDescriptor. Every check runs locally; nothing here talks to the
 * remote target.
 */
export class ArtifactPackager {
  private logger = createLogger("artifact-packager");

  /**
   * Checks the entrypoint and source root without touching the manifest, so
   * callers can fail before exporting dependencies or calling the remote.
   */
  async validate(request: SourceRequest): Promise<ValidatedSource> {
    const entrypoint =
      typeof request.entrypoint === "string"
        ? parseEntrypoint(request.entrypoint)
        : validateEntrypoint(request.entrypoint);

    const sourceRoot = resolve(request.sourceRoot);
    const rootStat = await stat(sourceRoot).catch(() => undefined);
    if (!rootStat) {
      throw new ConfigurationError(`Source root not found: ${sourceRoot}`);
    }
    if (!rootStat.isDirectory()) {
      throw new ConfigurationError(`Source root is not a directory: ${sourceRoot}`);
    }

    await this.checkModule(entrypoint, sourceRoot, dirname(sourceRoot));
    return { sourceRoot, entrypoint };
  }

  async package(request: PackageRequest): Promise<DeploymentDescriptor> {
    const { sourceRoot, entrypoint } = await this.validate(request);
    const parent = dirname(sourceRoot);

    const manifestPath = resolve(request.manifestPath);
    const text = await readFile(manifestPath, "utf-8").catch((err: unknown) => {
      throw new ConfigurationError(`Cannot read manifest ${manifestPath}`, { cause: err });
    });
    const manifest = parseRequirements(text);
    if (manifest.entries.length === 0) {
      throw new ResolutionError(`Manifest ${manifestPath} is empty`);
    }

    const packagedManifest = join(sourceRoot, PACKAGED_REQUIREMENTS_PATH);
    await writeManifest(packagedManifest, manifest);

    const files = await collectFiles(sourceRoot, parent);
    Object.freeze(manifest.entries);
    Object.freeze(files);

    const descriptor: DeploymentDescriptor = Object.freeze({
      sourceRoot,
      entrypoint: Object.freeze(entrypoint),
      requirementsFile: toPosix(relative(parent, packagedManifest)),
      manifest: Object.freeze(manifest),
      files,
      createdAt: new Date().toISOString(),
    });

    this.logger.info(
      `Packaged ${basename(sourceRoot)} (${files.length} files, ${manifest.entries.length} requirements, entrypoint ${formatEntrypoint(entrypoint)})`
    );
    return descriptor;
  }

  private async checkModule(entrypoint: EntrypointRef, sourceRoot: string, parent: string): Promise<void> {
    for (const candidate of moduleFileCandidates(entrypoint.module)) {
      const path = join(parent, candidate);
      if (path.startsWith(sourceRoot + sep) && (await isFile(path))) {
        return;
      }
    }
    throw new ConfigurationError(
      `Entrypoint module ${entrypoint.module} does not resolve to a file under ${sourceRoot}`
    );
  }
}
