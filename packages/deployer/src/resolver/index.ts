import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createLogger, ResolutionError } from "@agentport/shared";
import type { DependencyManifest, ResolvedManifest } from "@agentport/shared";
import { DEFAULT_STRATEGIES, type ResolutionContext, type ResolutionStrategy } from "./strategies.js";
import { renderRequirements } from "./requirements.js";

export {
  parseRequirements,
  parseRequirementLine,
  renderRequirements,
  renderEntry,
  normalizeName,
  findDuplicateNames,
  type ParseOptions,
} from "./requirements.js";
export { uvExportStrategy, DEFAULT_STRATEGIES, type ResolutionStrategy, type ResolutionContext } from "./strategies.js";

const logger = createLogger("dependency-resolver");

/**
 * Tries each strategy in order and returns the first non-empty manifest.
 * Throws a ResolutionError listing every failure when none succeeds.
 */
export async function resolveDependencies(
  ctx: ResolutionContext,
  strategies: readonly ResolutionStrategy[] = DEFAULT_STRATEGIES
): Promise<ResolvedManifest> {
  if (strategies.length === 0) {
    throw new ResolutionError("No dependency resolution strategies configured");
  }

  const attempts: ResolvedManifest["attempts"] = [];

  for (const strategy of strategies) {
    logger.debug(`Resolving dependencies with ${strategy.name}`);
    const result = await strategy.resolve(ctx);
    if (result.ok) {
      attempts.push({ strategy: strategy.name });
      logger.info(`Resolved ${result.manifest.entries.length} dependencies with ${strategy.name}`);
      return { manifest: result.manifest, strategy: strategy.name, attempts };
    }
    attempts.push({ strategy: strategy.name, error: result.error });
    logger.warn(`Strategy ${strategy.name} failed: ${result.error}`);
  }

  throw new ResolutionError(
    `Dependency resolution failed:\n${attempts.map((a) => `  ${a.strategy}: ${a.error}`).join("\n")}`
  );
}

export async function writeManifest(path: string, manifest: DependencyManifest): Promise<void> {
  if (manifest.entries.length === 0) {
    throw new ResolutionError(`Refusing to write an empty manifest to ${path}`);
  }
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, renderRequirements(manifest), "utf-8");
  logger.info(`Wrote ${manifest.entries.length} requirements to ${path}`);
}
