import { ConfigurationError } from "@agentport/shared";
import type { EntrypointRef } from "@agentport/shared";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isModulePath(value: string): boolean {
  return value.split(".").every((part) => IDENTIFIER.test(part));
}

export function validateEntrypoint(ref: EntrypointRef): EntrypointRef {
  if (!isModulePath(ref.module)) {
    throw new ConfigurationError(`Invalid entrypoint module "${ref.module}": expected a dotted module path`);
  }
  if (!IDENTIFIER.test(ref.object)) {
    throw new ConfigurationError(`Invalid entrypoint object "${ref.object}": expected an identifier`);
  }
  return { module: ref.module, object: ref.object };
}

/** Parses the combined `package.module:object` form. */
export function parseEntrypoint(value: string): EntrypointRef {
  const parts = value.split(":");
  if (parts.length !== 2) {
    throw new ConfigurationError(`Invalid entrypoint "${value}": expected "module:object"`);
  }
  const [module = "", object = ""] = parts;
  return validateEntrypoint({ module: module.trim(), object: object.trim() });
}

export function formatEntrypoint(ref: EntrypointRef): string {
  return `${ref.module}:${ref.object}`;
}

// Candidate files for a module, relative to the directory containing the top-level package
export function moduleFileCandidates(module: string): string[] {
  const base = module.split(".").join("/");
  return [`${base}.py`, `${base}/__init__.py`];
}
