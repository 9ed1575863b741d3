import type { DependencyManifest, ManifestEntry } from "@agentport/shared";
import { ResolutionError, createLogger } from "@agentport/shared";

const logger = createLogger("requirements");

export interface ParseOptions {
  // Packages to drop from the manifest (the project itself, dev-only tools)
  exclude?: string[];
}

// Non-editable path dependencies (`./libs/foo`, `file:///...`) as uv export emits them
const LOCAL_PATH = /^(\.{1,2}[\\/]|[\\/]|~[\\/]|file:)/;

const REQUIREMENT = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[([^\]]*)\])?\s*(.*)$/;

/** PEP 503 name normalisation: case-insensitive, runs of `-_.` are equivalent. */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

function logicalLines(text: string): string[] {
  const lines: string[] = [];
  let pending = "";
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.replace(/\s+$/, "");
    if (line.endsWith("\\")) {
      pending += line.slice(0, -1) + " ";
      continue;
    }
    lines.push(pending + line);
    pending = "";
  }
  if (pending) lines.push(pending);
  return lines;
}

function stripNoise(line: string): string {
  let out = line;
  const comment = out.search(/(^|\s)#/);
  if (comment >= 0) out = out.slice(0, comment);
  out = out.replace(/\s--hash=\S+/g, "");
  return out.trim();
}

/**
 * Parses one logical line. Returns undefined for lines that carry no
 * installable requirement: blanks, comments, options such as `-e .` or
 * `--index-url`, and local paths, which do not exist on the remote runtime.
 */
export function parseRequirementLine(line: string): ManifestEntry | undefined {
  const cleaned = stripNoise(line);
  if (!cleaned || cleaned.startsWith("-") || LOCAL_PATH.test(cleaned)) return undefined;

  const [spec = "", ...markerParts] = cleaned.split(";");
  const match = REQUIREMENT.exec(spec.trim());
  if (!match) {
    throw new ResolutionError(`Unparseable requirement: "${cleaned}"`);
  }

  const [, name = "", extras, constraint = ""] = match;
  const entry: ManifestEntry = { name, constraint: constraint.trim() };
  if (extras !== undefined) {
    entry.extras = extras.split(",").map((e) => e.trim()).filter(Boolean);
  }
  const marker = markerParts.join(";").trim();
  if (marker) entry.marker = marker;
  return entry;
}

function comparable(entry: ManifestEntry): string {
  return renderEntry({ ...entry, name: normalizeName(entry.name) });
}

/**
 * Parses exported requirements into a flat manifest. Hashes, comments,
 * annotations, option lines and local paths are dropped. A package listed twice with the
 * same requirement is kept once; listed twice with different requirements it
 * is a resolution error.
 */
export function parseRequirements(text: string, options: ParseOptions = {}): DependencyManifest {
  const excluded = new Set((options.exclude ?? []).map(normalizeName));
  const seen = new Map<string, ManifestEntry>();
  const entries: ManifestEntry[] = [];

  for (const line of logicalLines(text)) {
    const cleaned = stripNoise(line);
    if (LOCAL_PATH.test(cleaned)) {
      logger.warn(`Dropping local path requirement "${cleaned}": it cannot be installed remotely`);
      continue;
    }
    const entry = parseRequirementLine(line);
    if (!entry) continue;

    const key = normalizeName(entry.name);
    if (excluded.has(key)) continue;

    const previous = seen.get(key);
    if (previous) {
      if (comparable(previous) !== comparable(entry)) {
        throw new ResolutionError(
          `Conflicting requirements for ${entry.name}: "${renderEntry(previous)}" and "${renderEntry(entry)}"`
        );
      }
      continue;
    }
    seen.set(key, entry);
    entries.push(entry);
  }

  return { entries };
}

export function renderEntry(entry: ManifestEntry): string {
  const extras = entry.extras && entry.extras.length > 0 ? `[${entry.extras.join(",")}]` : "";
  const constraint = entry.constraint.startsWith("@") ? ` ${entry.constraint}` : entry.constraint;
  const marker = entry.marker ? ` ; ${entry.marker}` : "";
  return `${entry.name}${extras}${constraint}${marker}`;
}

/** Plain-text requirements file: one requirement per line, no hashes, no comments. */
export function renderRequirements(manifest: DependencyManifest): string {
  return manifest.entries.map(renderEntry).join("\n") + "\n";
}

export function findDuplicateNames(manifest: DependencyManifest): string[] {
  const counts = new Map<string, number>();
  for (const entry of manifest.entries) {
    const key = normalizeName(entry.name);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts].filter(([, count]) => count > 1).map(([name]) => name);
}
