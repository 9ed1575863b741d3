import type { RemoteHandle } from "./deploy.js";

export interface RegistrationRecord {
  // Full catalog resource name or short engine id
  appId: string;
  displayName: string;
  description: string;
  toolDescription: string;
  agentEngine: RemoteHandle;
}

export type RegistrationField = keyof RegistrationRecord;

export type RegistrationInput = Partial<Record<RegistrationField, string>>;

export interface RegistrationResult {
  agentName: string;
  appName: string;
}
