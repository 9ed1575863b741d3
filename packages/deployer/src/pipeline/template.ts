import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ConfigurationError } from "@agentport/shared";
import type { PipelineTemplate } from "@agentport/shared";

export interface TemplateSource {
  templateUri?: string;
  pipelineSpecPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Loads either a template URI or a compiled pipeline spec (JSON) from disk. */
export async function loadPipelineTemplate(source: TemplateSource): Promise<PipelineTemplate> {
  if (source.templateUri && source.pipelineSpecPath) {
    throw new ConfigurationError("Pass either a template URI or a pipeline spec file, not both");
  }
  if (source.templateUri) {
    return { kind: "uri", templateUri: source.templateUri };
  }
  if (!source.pipelineSpecPath) {
    throw new ConfigurationError("A pipeline template URI or compiled pipeline spec file is required");
  }

  const path = resolve(source.pipelineSpecPath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot load pipeline spec ${path}`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Pipeline spec ${path} must be a JSON object`);
  }
  return { kind: "spec", pipelineSpec: parsed };
}
