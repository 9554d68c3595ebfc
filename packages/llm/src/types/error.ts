export type SDKErrorOptions = {
  readonly cause?: unknown;
};

/**
 * Root of every error this SDK raises. `name` follows the concrete class.
 */
export class SDKError extends Error {
  constructor(message: string, options: SDKErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

/** A provider, model or environment variable is missing or unusable. */
export class ConfigurationError extends SDKError {}

/** The caller passed arguments that cannot be acted on. */
export class ValidationError extends SDKError {}

export class AbortError extends SDKError {}

/**
 * An internal consistency fault, such as a message carrying more than one
 * text part. Never a user error.
 */
export class InvariantViolationError extends SDKError {}

/**
 * A tool call that could not be answered. The agent reports it back to the
 * model as an error result rather than throwing it.
 */
export class ToolExecutionError extends SDKError {
  readonly toolName: string;
  readonly toolCallId: string;

  constructor(message: string, call: { readonly name: string; readonly id: string }, options: SDKErrorOptions = {}) {
    super(message, options);
    this.toolName = call.name;
    this.toolCallId = call.id;
  }
}

/** Typed output was requested but the response held no valid object. */
export class NoObjectGeneratedError extends SDKError {
  /** The text the object was to be decoded from. */
  readonly raw: string;

  constructor(message: string, raw: string, options: SDKErrorOptions = {}) {
    super(message, options);
    this.raw = raw;
  }
}

export type ProviderErrorInit = SDKErrorOptions & {
  readonly provider: string;
  readonly statusCode?: number | null;
  readonly errorCode?: string | null;
  /** Delay the provider asked for before the next attempt, in milliseconds. */
  readonly retryAfterMs?: number | null;
  /** Overrides the class default. */
  readonly retryable?: boolean;
  readonly raw?: unknown;
};

/**
 * Failure reported by a provider adapter. Subclasses classify it; only
 * retryable errors are retried by {@link retry}.
 */
export class ProviderError extends SDKError {
  static readonly retryableByDefault: boolean = false;

  readonly provider: string;
  readonly statusCode: number | null;
  readonly errorCode: string | null;
  readonly retryAfterMs: number | null;
  readonly retryable: boolean;
  readonly raw: unknown;

  constructor(message: string, init: ProviderErrorInit) {
    super(message, init);
    this.provider = init.provider;
    this.statusCode = init.statusCode ?? null;
    this.errorCode = init.errorCode ?? null;
    this.retryAfterMs = init.retryAfterMs ?? null;
    this.retryable = init.retryable ?? new.target.retryableByDefault;
    this.raw = init.raw ?? null;
  }
}

export class AuthenticationError extends ProviderError {}

export class ContextLengthError extends ProviderError {}

export class ContentFilterError extends ProviderError {}

export class RateLimitError extends ProviderError {
  static override readonly retryableByDefault: boolean = true;
}

export class ServerError extends ProviderError {
  static override readonly retryableByDefault: boolean = true;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
