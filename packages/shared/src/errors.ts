export type ErrorKind =
  | "configuration"
  | "resolution"
  | "transient"
  | "authorization"
  | "submission-rejected";

/**
 * Base class for every fatal condition a workflow can raise. The `kind`
 * discriminant drives retry decisions and the CLI exit status.
 */
export abstract class AgentportError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing paths, malformed identifiers. Never retried. */
export class ConfigurationError extends AgentportError {
  readonly kind = "configuration";
}

/** Raised when a required field could not be supplied by any input channel. */
export class MissingFieldsError extends ConfigurationError {
  readonly fields: readonly string[];

  constructor(fields: readonly string[], hint?: string) {
    super(
      `Missing required field${fields.length === 1 ? "" : "s"}: ${fields.join(", ")}` +
        (hint ? ` (${hint})` : "")
    );
    this.fields = fields;
  }
}

/** Every dependency resolution strategy failed, or produced nothing. */
export class ResolutionError extends AgentportError {
  readonly kind = "resolution";
}

/** Network failures and timeouts on remote calls. Eligible for bounded retry. */
export class TransientError extends AgentportError {
  readonly kind = "transient";
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** Credentials or permissions rejected by the remote target. Never retried. */
export class AuthorizationError extends AgentportError {
  readonly kind = "authorization";
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.status = status;
  }
}

/** The remote target refused the request; `remoteMessage` is its body verbatim. */
export class SubmissionRejectedError extends AgentportError {
  readonly kind = "submission-rejected";
  readonly status: number;
  readonly remoteMessage: string;

  constructor(status: number, remoteMessage: string, context?: string) {
    super(`${context ? `${context}: ` : ""}rejected by remote target (${status}): ${remoteMessage}`);
    this.status = status;
    this.remoteMessage = remoteMessage;
  }
}

export function isAgentportError(err: unknown): err is AgentportError {
  return err instanceof AgentportError;
}

export function isRetryable(err: unknown): boolean {
  return err instanceof TransientError;
}

const EXIT_CODES: Record<ErrorKind, number> = {
  configuration: 2,
  resolution: 3,
  transient: 4,
  authorization: 5,
  "submission-rejected": 6,
};

export function exitCodeFor(err: unknown): number {
  return isAgentportError(err) ? EXIT_CODES[err.kind] : 1;
}
