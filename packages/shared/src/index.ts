// Types
export type * from "./types/config.js";
export type * from "./types/manifest.js";
export type * from "./types/deploy.js";
export type * from "./types/pipeline.js";
export type * from "./types/registration.js";

// Values
export { configSchema, parseConfig, expandProjectTemplate } from "./types/config.js";

// Errors
export {
  AgentportError,
  ConfigurationError,
  MissingFieldsError,
  ResolutionError,
  TransientError,
  AuthorizationError,
  SubmissionRejectedError,
  isAgentportError,
  isRetryable,
  exitCodeFor,
} from "./errors.js";
export type { ErrorKind } from "./errors.js";

// Utils
export { createLogger, setLogLevel, isLogLevel } from "./utils/logger.js";
export type { LogLevel, Logger } from "./utils/logger.js";
export { retry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
