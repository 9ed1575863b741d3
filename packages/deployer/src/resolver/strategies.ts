import type { StrategyResult } from "@agentport/shared";
import type { CommandRunner } from "../exec/command-runner.js";
import { parseRequirements, type ParseOptions } from "./requirements.js";

export interface ResolutionContext extends ParseOptions {
  projectDir: string;
  runner: CommandRunner;
  timeoutMs?: number;
}

export interface ResolutionStrategy {
  name: string;
  resolve(ctx: ResolutionContext): Promise<StrategyResult>;
}

const BASE_EXPORT_FLAGS = ["--no-hashes", "--no-header", "--no-dev", "--no-emit-project"];

/**
 * Exports the locked dependency set with `uv export`. Any failure (uv
 * missing, non-zero exit, unparseable or empty output) is returned as a
 * failed result so the next strategy can run.
 */
export function uvExportStrategy(name: string, extraFlags: string[] = []): ResolutionStrategy {
  const args = ["export", ...BASE_EXPORT_FLAGS, ...extraFlags];
  return {
    name,
    async resolve(ctx) {
      try {
        const result = await ctx.runner.run("uv", args, {
          cwd: ctx.projectDir,
          timeoutMs: ctx.timeoutMs,
        });
        if (result.exitCode !== 0) {
          const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
          return { ok: false, error: `uv ${args.join(" ")} failed: ${detail}` };
        }
        const manifest = parseRequirements(result.stdout.toString("utf-8"), ctx);
        if (manifest.entries.length === 0) {
          return { ok: false, error: "uv export produced an empty manifest" };
        }
        return { ok: true, manifest };
      } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
      }
    },
  };
}

// Older uv releases reject --no-annotate; the parser strips annotations either way
export const DEFAULT_STRATEGIES: readonly ResolutionStrategy[] = [
  uvExportStrategy("uv-export", ["--no-annotate"]),
  uvExportStrategy("uv-export-annotated"),
];
