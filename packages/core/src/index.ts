/**
 * @equisight/core
 * Core utilities shared across Equisight packages
 */

// Config
export {
  baseEnvSchema,
  loadBaseConfig,
  getBaseConfig,
  resetBaseConfig,
  formatIssues,
  type BaseConfig,
  type BaseEnv,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  EquisightError,
  ConfigError,
  CapabilityError,
  SearchProviderError,
  FetchError,
  NetworkError,
  ValidationError,
  SynthesisError,
  isEquisightError,
  isRetryableError,
  errorMessage,
} from "./errors.js";
