/**
 * Custom Error Types
 * Structured errors shared by every package
 */

/**
 * Base error class for all Equisight errors
 */
export class EquisightError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "EquisightError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends EquisightError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * An external capability (completion, search, fetch, embeddings) is missing or failed
 */
export class CapabilityError extends EquisightError {
  public readonly capability: string;

  constructor(
    message: string,
    capability: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message, "CAPABILITY_ERROR", options);
    this.name = "CapabilityError";
    this.capability = capability;
  }
}

/**
 * Search provider HTTP errors
 */
export class SearchProviderError extends EquisightError {
  public readonly provider: string;
  public readonly status?: number;

  constructor(
    message: string,
    provider: string,
    options?: {
      cause?: unknown;
      status?: number;
      context?: Record<string, unknown>;
    }
  ) {
    // Rate limits are retryable
    const retryable = options?.status === 429;

    super(message, "SEARCH_PROVIDER_ERROR", { ...options, retryable });
    this.name = "SearchProviderError";
    this.provider = provider;
    this.status = options?.status;
  }
}

/**
 * Document fetch/extraction errors
 */
export class FetchError extends EquisightError {
  public readonly url: string;
  public readonly status?: number;

  constructor(
    message: string,
    url: string,
    options?: {
      cause?: unknown;
      status?: number;
    }
  ) {
    super(message, "FETCH_ERROR", {
      cause: options?.cause,
      context: { url, status: options?.status },
      retryable: options?.status !== undefined && options.status >= 500,
    });
    this.name = "FetchError";
    this.url = url;
    this.status = options?.status;
  }
}

/**
 * Network/connectivity errors
 */
export class NetworkError extends EquisightError {
  constructor(message: string, cause?: unknown) {
    super(message, "NETWORK_ERROR", { cause, retryable: true });
    this.name = "NetworkError";
  }
}

/**
 * Validation errors (schemas, inputs)
 */
export class ValidationError extends EquisightError {
  public readonly field?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      cause?: unknown;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", {
      cause: options?.cause,
      context: options?.context,
      retryable: false,
    });
    this.name = "ValidationError";
    this.field = options?.field;
  }
}

/**
 * Report synthesis errors
 */
export class SynthesisError extends EquisightError {
  constructor(message: string, cause?: unknown) {
    super(message, "SYNTHESIS_ERROR", { cause, retryable: false });
    this.name = "SynthesisError";
  }
}

/**
 * Type guard to check if error is an Equisight error
 */
export function isEquisightError(error: unknown): error is EquisightError {
  return error instanceof EquisightError;
}

/**
 * Whether an Equisight error is marked as transient
 */
export function isRetryableError(error: unknown): boolean {
  return isEquisightError(error) && error.retryable;
}

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : String(error);
}
