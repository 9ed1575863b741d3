import { ConfigurationError, parseConfig } from '@agentport/shared';
import type { Config } from '@agentport/shared';
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ZodError } from 'zod';

type Env = Record<string, string | undefined>;

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined) return {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigurationError(`Config section "${key}" must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function readJson(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot parse config file ${path}`, { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function toInt(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ConfigurationError(`${name} must be an integer, got "${value}"`);
  }
  return n;
}

export function loadConfig(configPath?: string, env: Env = process.env): Config {
  let raw: Record<string, unknown> = {};

  // 1. Try configPath if provided, else look for agentport.json in CWD
  if (configPath) {
    const resolved = resolve(configPath);
    if (!existsSync(resolved)) {
      throw new ConfigurationError(`Config file not found: ${resolved}`);
    }
    raw = readJson(resolved);
  } else {
    const defaultPath = resolve('agentport.json');
    if (existsSync(defaultPath)) {
      raw = readJson(defaultPath);
    }
  }

  // 2. Build nested structure, applying env var overrides
  const project = section(raw, 'project');
  const remote = section(raw, 'remote');
  const deploy = section(raw, 'deploy');
  const ingestion = section(raw, 'ingestion');
  const registration = section(raw, 'registration');

  const projectId = env.AGENTPORT_PROJECT_ID || env.GOOGLE_CLOUD_PROJECT;
  if (projectId) {
    project.projectId = projectId;
  }
  if (env.AGENTPORT_REGION) {
    project.region = env.AGENTPORT_REGION;
  }
  if (env.AGENTPORT_ACCESS_TOKEN) {
    project.accessToken = env.AGENTPORT_ACCESS_TOKEN;
  }

  if (env.AGENTPORT_API_ENDPOINT) {
    remote.apiEndpoint = env.AGENTPORT_API_ENDPOINT;
  }
  if (env.AGENTPORT_CATALOG_ENDPOINT) {
    remote.catalogEndpoint = env.AGENTPORT_CATALOG_ENDPOINT;
  }
  if (env.AGENTPORT_TIMEOUT_MS) {
    remote.timeoutMs = toInt('AGENTPORT_TIMEOUT_MS', env.AGENTPORT_TIMEOUT_MS);
  }
  if (env.AGENTPORT_MAX_ATTEMPTS) {
    remote.maxAttempts = toInt('AGENTPORT_MAX_ATTEMPTS', env.AGENTPORT_MAX_ATTEMPTS);
  }

  if (env.AGENTPORT_HISTORY_DB) {
    deploy.historyDbPath = env.AGENTPORT_HISTORY_DB;
  }

  // 3. Validate with parseConfig (zod) and return typed Config
  try {
    return parseConfig({ project, remote, deploy, ingestion, registration });
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map((i) => `  ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new ConfigurationError(`Invalid configuration:\n${issues}`, { cause: err });
    }
    throw err;
  }
}
