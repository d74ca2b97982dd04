/**
 * Structured Error Types for character-lens
 *
 * Every failure surfaced by the library is a CharacterLensError subclass, so
 * callers can tell fatal configuration problems from transient provider
 * failures and decide whether to retry.
 */

interface ErrorOptions {
  context?: Record<string, unknown>;
  cause?: Error;
  recoverable?: boolean;
}

/**
 * Base error class for all character-lens errors
 */
export class CharacterLensError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly cause?: Error;

  constructor(message: string, options: ErrorOptions & { code: string }) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.context = options.context;
    this.recoverable = options.recoverable ?? false;
    this.cause = options.cause;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * Unknown provider, malformed options or missing credentials
 */
export class ConfigurationError extends CharacterLensError {
  constructor(configKey: string, reason: string, cause?: Error) {
    super(`Configuration error for '${configKey}': ${reason}`, {
      code: 'CONFIG_ERROR',
      context: { configKey, reason },
      cause,
      recoverable: false, // User must fix configuration
    });
  }
}

/**
 * Provider rejected the credential
 */
export class AuthenticationError extends CharacterLensError {
  constructor(provider: string, statusCode?: number, cause?: Error) {
    super(`Authentication failed for provider: ${provider}`, {
      code: 'AUTH_FAILED',
      context: { provider, statusCode },
      cause,
      recoverable: false,
    });
  }
}

/**
 * Provider signalled throttling
 */
export class RateLimitError extends CharacterLensError {
  public readonly retryAfterMs?: number;

  constructor(provider: string, retryAfterMs?: number, cause?: Error) {
    super(`Rate limit exceeded for provider: ${provider}`, {
      code: 'RATE_LIMITED',
      context: { provider, retryAfterMs },
      cause,
      recoverable: true,
    });
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Network failure, abort or timeout
 */
export class TransportError extends CharacterLensError {
  constructor(provider: string, reason: string, cause?: Error) {
    super(`Transport failure for provider ${provider}: ${reason}`, {
      code: 'TRANSPORT_FAILED',
      context: { provider, reason },
      cause,
      recoverable: true,
    });
  }
}

/**
 * Well-formed error payload returned by the vendor
 */
export class ProviderError extends CharacterLensError {
  constructor(provider: string, statusCode?: number, cause?: Error) {
    super(`Provider ${provider} returned an error${statusCode ? ` (HTTP ${statusCode})` : ''}`, {
      code: 'PROVIDER_ERROR',
      context: { provider, statusCode, detail: cause?.message },
      cause,
      recoverable: statusCode !== undefined && statusCode >= 500, // Service side, may clear up
    });
  }
}

/**
 * Model output did not contain a JSON payload of the expected shape
 */
export class MalformedResponseError extends CharacterLensError {
  constructor(expectedFormat: string, actualResponse: string, cause?: Error) {
    super(`Failed to parse LLM response. Expected format: ${expectedFormat}`, {
      code: 'MALFORMED_RESPONSE',
      context: {
        expectedFormat,
        responsePreview: actualResponse.substring(0, 100),
      },
      cause,
      recoverable: true, // Can retry at a lower temperature
    });
  }
}

/**
 * Invalid argument passed to a public operation
 */
export class ValidationError extends CharacterLensError {
  constructor(field: string, reason: string) {
    super(`Validation failed for '${field}': ${reason}`, {
      code: 'VALIDATION_ERROR',
      context: { field, reason },
      recoverable: false, // User must provide valid input
    });
  }
}

/**
 * Error recovery strategies
 */
export interface ErrorRecoveryStrategy {
  /** Can this error be retried? */
  canRetry: boolean;
  /** Maximum number of retry attempts */
  maxRetries?: number;
  /** Backoff strategy (ms delay between retries) */
  backoffMs?: number[];
}

/**
 * Get recommended recovery strategy for an error
 */
export function getRecoveryStrategy(error: Error): ErrorRecoveryStrategy {
  if (error instanceof CharacterLensError && error.recoverable) {
    if (error instanceof RateLimitError) {
      // Rate limit: exponential backoff, or whatever the provider asked for
      return {
        canRetry: true,
        maxRetries: 3,
        backoffMs:
          error.retryAfterMs !== undefined ? [error.retryAfterMs] : [1000, 5000, 15000],
      };
    }

    if (error instanceof TransportError) {
      return {
        canRetry: true,
        maxRetries: 2,
        backoffMs: [2000, 5000],
      };
    }

    if (error instanceof MalformedResponseError) {
      // Re-asked immediately with a lower temperature
      return {
        canRetry: true,
        maxRetries: 1,
        backoffMs: [0],
      };
    }

    return {
      canRetry: true,
      maxRetries: 3,
      backoffMs: [1000, 2000, 4000],
    };
  }

  return {
    canRetry: false,
  };
}

/**
 * Wrap native errors with character-lens error types
 */
export function wrapError(error: unknown, context?: string): CharacterLensError {
  if (error instanceof CharacterLensError) {
    return error;
  }

  if (error instanceof Error) {
    return new CharacterLensError(error.message, {
      code: 'UNKNOWN_ERROR',
      context: { originalError: error.name, context },
      cause: error,
      recoverable: false,
    });
  }

  return new CharacterLensError(String(error), {
    code: 'UNKNOWN_ERROR',
    context: { context },
    recoverable: false,
  });
}

export function isCharacterLensError(error: unknown): error is CharacterLensError {
  return error instanceof CharacterLensError;
}

export function isRecoverableError(error: unknown): boolean {
  return error instanceof CharacterLensError && error.recoverable;
}

/**
 * Errors that make the whole call unusable, regardless of chunking
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof ConfigurationError || error instanceof AuthenticationError;
}
