import { MissingFieldsError } from "@agentport/shared";
import type { RegistrationField, RegistrationInput, RegistrationRecord } from "@agentport/shared";
import type { Prompter } from "./prompter.js";

export const REQUIRED_FIELDS = ["appId", "agentEngine"] as const satisfies readonly RegistrationField[];

const DEFAULT_DISPLAY_NAME = "My Agent";
const DEFAULT_DESCRIPTION = "AI Agent";

const QUESTIONS: Record<RegistrationField, string> = {
  appId: "Enterprise app id or full resource name",
  agentEngine: "Agent engine resource name or id",
  displayName: "Display name",
  description: "Description",
  toolDescription: "Tool description",
};

const FIELD_ORDER: readonly RegistrationField[] = [
  "appId",
  "agentEngine",
  "displayName",
  "description",
  "toolDescription",
];

/** Reads registration inputs from the environment variables operators already use. */
export function registrationInputFromEnv(env: Record<string, string | undefined>): RegistrationInput {
  return {
    appId: env.ID || env.GEMINI_ENTERPRISE_APP_ID,
    displayName: env.GEMINI_DISPLAY_NAME,
    description: env.GEMINI_DESCRIPTION,
    toolDescription: env.GEMINI_TOOL_DESCRIPTION,
    agentEngine: env.AGENT_ENGINE_ID,
  };
}

export interface RecordSources {
  // Highest priority first: explicit arguments, environment, recorded deployment
  inputs: RegistrationInput[];
  interactive: boolean;
  prompter?: Prompter;
}

function merge(inputs: RegistrationInput[]): RegistrationInput {
  const merged: RegistrationInput = {};
  for (const field of FIELD_ORDER) {
    for (const input of inputs) {
      const value = input[field]?.trim();
      if (value) {
        merged[field] = value;
        break;
      }
    }
  }
  return merged;
}

function fallback(field: RegistrationField, merged: RegistrationInput): string | undefined {
  switch (field) {
    case "displayName":
      return DEFAULT_DISPLAY_NAME;
    case "description":
      return DEFAULT_DESCRIPTION;
    case "toolDescription":
      return merged.description ?? DEFAULT_DESCRIPTION;
    default:
      return undefined;
  }
}

/**
 * Produces a complete registration record from the available channels, or
 * a MissingFieldsError naming every required field nobody supplied. In
 * interactive mode each missing field is asked for, with the fallback
 * offered as the default answer.
 */
export async function resolveRegistrationRecord(sources: RecordSources): Promise<RegistrationRecord> {
  const merged = merge(sources.inputs);

  for (const field of FIELD_ORDER) {
    if (merged[field]) continue;
    const defaultValue = fallback(field, merged);
    if (sources.interactive && sources.prompter) {
      const answer = (await sources.prompter.ask(QUESTIONS[field], defaultValue)).trim();
      if (answer) merged[field] = answer;
    } else if (defaultValue) {
      merged[field] = defaultValue;
    }
  }

  const missing = REQUIRED_FIELDS.filter((field) => !merged[field]);
  const { appId, agentEngine, displayName, description, toolDescription } = merged;
  if (missing.length > 0 || !appId || !agentEngine) {
    throw new MissingFieldsError(
      missing,
      sources.interactive ? undefined : "set ID or GEMINI_ENTERPRISE_APP_ID and AGENT_ENGINE_ID, or run interactively"
    );
  }

  return {
    appId,
    agentEngine,
    displayName: displayName ?? DEFAULT_DISPLAY_NAME,
    description: description ?? DEFAULT_DESCRIPTION,
    toolDescription: toolDescription ?? description ?? DEFAULT_DESCRIPTION,
  };
}
