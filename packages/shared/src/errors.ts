/**
 * Unfurl Error Hierarchy
 *
 * Structured error classes shared by the reveal engine, the backend and the
 * HTTP client. All errors extend UnfurlError which provides:
 * - Unique error codes for programmatic handling
 * - Serialization support for client/server communication
 * - Type guards for catching specific error types
 *
 * @example Throwing errors
 * ```typescript
 * throw new NotFoundError('conversation', 'c-42');
 * throw ValidationError.required('message.content');
 * throw ProviderError.quota('openai');
 * ```
 *
 * @example Catching specific errors
 * ```typescript
 * try {
 *   await client.sendMessage({ content: 'Hi' });
 * } catch (error) {
 *   if (isAbortError(error)) {
 *     // request was cancelled by the user
 *   } else if (isTransportError(error)) {
 *     console.log(error.statusCode, error.toJSON());
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., ABORT_CANCELLED, NOT_FOUND_CONVERSATION)
 */
export type UnfurlErrorCode =
  // Abort/Cancellation
  | "ABORT_CANCELLED"
  | "ABORT_TIMEOUT"
  | "ABORT_SIGNAL"
  // Not Found
  | "NOT_FOUND_CONVERSATION"
  | "NOT_FOUND_MESSAGE"
  | "NOT_FOUND_MODEL"
  | "NOT_FOUND_RESOURCE"
  // Validation
  | "VALIDATION_REQUIRED"
  | "VALIDATION_TYPE"
  | "VALIDATION_FORMAT"
  | "VALIDATION_CONSTRAINT"
  // State/Lifecycle
  | "STATE_INVALID"
  | "STATE_TRANSITION"
  // Transport/Network
  | "TRANSPORT_TIMEOUT"
  | "TRANSPORT_CONNECTION"
  | "TRANSPORT_RESPONSE"
  | "TRANSPORT_PARSE"
  // Model provider
  | "PROVIDER_RESPONSE"
  | "PROVIDER_RATE_LIMIT"
  | "PROVIDER_AUTH"
  | "PROVIDER_QUOTA"
  // Request admission
  | "REQUEST_RATE_LIMIT"
  // Context
  | "CONTEXT_NOT_FOUND";

const ERROR_CODES: ReadonlySet<string> = new Set<UnfurlErrorCode>([
  "ABORT_CANCELLED",
  "ABORT_TIMEOUT",
  "ABORT_SIGNAL",
  "NOT_FOUND_CONVERSATION",
  "NOT_FOUND_MESSAGE",
  "NOT_FOUND_MODEL",
  "NOT_FOUND_RESOURCE",
  "VALIDATION_REQUIRED",
  "VALIDATION_TYPE",
  "VALIDATION_FORMAT",
  "VALIDATION_CONSTRAINT",
  "STATE_INVALID",
  "STATE_TRANSITION",
  "TRANSPORT_TIMEOUT",
  "TRANSPORT_CONNECTION",
  "TRANSPORT_RESPONSE",
  "TRANSPORT_PARSE",
  "PROVIDER_RESPONSE",
  "PROVIDER_RATE_LIMIT",
  "PROVIDER_AUTH",
  "PROVIDER_QUOTA",
  "REQUEST_RATE_LIMIT",
  "CONTEXT_NOT_FOUND",
]);

/**
 * Check whether a string is a known error code (e.g. from a server response body).
 */
export function isUnfurlErrorCode(value: unknown): value is UnfurlErrorCode {
  return typeof value === "string" && ERROR_CODES.has(value);
}

/**
 * Serialized error format for transport
 */
export interface SerializedUnfurlError {
  name: string;
  code: UnfurlErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: SerializedUnfurlError | { message: string; name?: string };
  stack?: string;
}

/**
 * Base class for all unfurl errors.
 */
export class UnfurlError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: UnfurlErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  constructor(
    code: UnfurlErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "UnfurlError";
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error for transport (JSON-safe)
   */
  toJSON(): SerializedUnfurlError {
    const serialized: SerializedUnfurlError = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause instanceof UnfurlError) {
      serialized.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      serialized.cause = { message: this.cause.message, name: this.cause.name };
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedUnfurlError): UnfurlError {
    let cause: Error | undefined;
    if (json.cause) {
      cause = "code" in json.cause ? UnfurlError.fromJSON(json.cause) : new Error(json.cause.message);
    }
    return new UnfurlError(json.code, json.message, json.details, cause);
  }
}

// =============================================================================
// Abort/Cancellation Errors
// =============================================================================

/**
 * Error thrown when an operation is aborted or cancelled.
 *
 * @example
 * ```typescript
 * throw new AbortError('User stopped the request');
 * throw AbortError.timeout(30000);
 * ```
 */
export class AbortError extends UnfurlError {
  constructor(
    message: string = "Operation aborted",
    code: "ABORT_CANCELLED" | "ABORT_TIMEOUT" | "ABORT_SIGNAL" = "ABORT_CANCELLED",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "AbortError";
  }

  /**
   * Create from an AbortSignal's reason
   */
  static fromSignal(signal: AbortSignal): AbortError {
    const reason: unknown = signal.reason;
    if (reason instanceof AbortError) {
      return reason;
    }
    const message = reason instanceof Error ? reason.message : String(reason || "Operation aborted");
    return new AbortError(message, "ABORT_SIGNAL", {}, reason instanceof Error ? reason : undefined);
  }

  static timeout(timeoutMs: number): AbortError {
    return new AbortError(`Operation timed out after ${timeoutMs}ms`, "ABORT_TIMEOUT", {
      timeoutMs,
    });
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

export type ResourceType = "conversation" | "message" | "model" | "resource";

/**
 * Error thrown when a required resource cannot be found.
 *
 * @example
 * ```typescript
 * throw new NotFoundError('conversation', 'c-1');
 * throw new NotFoundError('model', 'gpt-5', 'Model is not in the catalog');
 * ```
 */
export class NotFoundError extends UnfurlError {
  readonly resourceType: ResourceType;
  readonly resourceId: string;

  constructor(resourceType: ResourceType, resourceId: string, message?: string, cause?: Error) {
    const codeMap: Record<ResourceType, UnfurlErrorCode> = {
      conversation: "NOT_FOUND_CONVERSATION",
      message: "NOT_FOUND_MESSAGE",
      model: "NOT_FOUND_MODEL",
      resource: "NOT_FOUND_RESOURCE",
    };

    super(
      codeMap[resourceType],
      message || `${resourceType} '${resourceId}' not found`,
      { resourceType, resourceId },
      cause,
    );
    this.name = "NotFoundError";
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input validation fails.
 */
export class ValidationError extends UnfurlError {
  /** Field or parameter that failed validation */
  readonly field: string;

  readonly expected?: string;
  readonly received?: string;

  constructor(
    field: string,
    message: string,
    options: {
      expected?: string;
      received?: string;
      code?:
        | "VALIDATION_REQUIRED"
        | "VALIDATION_TYPE"
        | "VALIDATION_FORMAT"
        | "VALIDATION_CONSTRAINT";
    } = {},
    cause?: Error,
  ) {
    super(
      options.code || "VALIDATION_REQUIRED",
      message,
      {
        field,
        ...(options.expected && { expected: options.expected }),
        ...(options.received && { received: options.received }),
      },
      cause,
    );
    this.name = "ValidationError";
    this.field = field;
    this.expected = options.expected;
    this.received = options.received;
  }

  static required(field: string, message?: string): ValidationError {
    return new ValidationError(field, message || `${field} is required`, {
      code: "VALIDATION_REQUIRED",
    });
  }

  static constraint(field: string, message: string): ValidationError {
    return new ValidationError(field, message, { code: "VALIDATION_CONSTRAINT" });
  }
}

// =============================================================================
// State/Lifecycle Errors
// =============================================================================

/**
 * Error thrown when an operation is attempted in an invalid state.
 *
 * @example
 * ```typescript
 * throw StateError.transition('completed', 'resume');
 * ```
 */
export class StateError extends UnfurlError {
  readonly current: string;
  readonly expectedState?: string;

  constructor(
    current: string,
    expectedState: string | undefined,
    message: string,
    code: "STATE_INVALID" | "STATE_TRANSITION" = "STATE_INVALID",
    cause?: Error,
  ) {
    super(code, message, { current, ...(expectedState && { expectedState }) }, cause);
    this.name = "StateError";
    this.current = current;
    this.expectedState = expectedState;
  }

  /**
   * Create error for an operation not allowed from the current state
   */
  static transition(current: string, operation: string): StateError {
    return new StateError(
      current,
      undefined,
      `Cannot ${operation} from state '${current}'`,
      "STATE_TRANSITION",
    );
  }
}

// =============================================================================
// Transport/Network Errors
// =============================================================================

export type TransportErrorKind = "timeout" | "connection" | "response" | "parse";

/**
 * Error thrown for network/transport failures.
 *
 * @example
 * ```typescript
 * throw TransportError.timeout(30000, '/api/chat');
 * throw TransportError.http(502, '/api/chat', 'Upstream model error');
 * ```
 */
export class TransportError extends UnfurlError {
  readonly transportCode: TransportErrorKind;

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  /** Error code reported by the server body, when it sent one */
  readonly serverCode?: UnfurlErrorCode;

  constructor(
    transportCode: TransportErrorKind,
    message: string,
    options: {
      statusCode?: number;
      url?: string;
      method?: string;
      serverCode?: UnfurlErrorCode;
    } = {},
    cause?: Error,
  ) {
    const codeMap = {
      timeout: "TRANSPORT_TIMEOUT",
      connection: "TRANSPORT_CONNECTION",
      response: "TRANSPORT_RESPONSE",
      parse: "TRANSPORT_PARSE",
    } as const;

    super(
      codeMap[transportCode],
      message,
      {
        transportCode,
        ...(options.statusCode && { statusCode: options.statusCode }),
        ...(options.url && { url: options.url }),
        ...(options.method && { method: options.method }),
        ...(options.serverCode && { serverCode: options.serverCode }),
      },
      cause,
    );
    this.name = "TransportError";
    this.transportCode = transportCode;
    this.statusCode = options.statusCode;
    this.serverCode = options.serverCode;
  }

  static timeout(timeoutMs: number, url?: string): TransportError {
    return new TransportError("timeout", `Request timeout after ${timeoutMs}ms`, { url });
  }

  static connection(message: string, url?: string, cause?: Error): TransportError {
    return new TransportError("connection", message, { url }, cause);
  }

  /**
   * Create an HTTP error (non-2xx response)
   */
  static http(
    statusCode: number,
    url: string,
    message?: string,
    serverCode?: UnfurlErrorCode,
  ): TransportError {
    return new TransportError("response", message || `HTTP ${statusCode}`, {
      statusCode,
      url,
      serverCode,
    });
  }
}

// =============================================================================
// Model Provider Errors
// =============================================================================

export type ProviderErrorCode =
  | "PROVIDER_RESPONSE"
  | "PROVIDER_RATE_LIMIT"
  | "PROVIDER_AUTH"
  | "PROVIDER_QUOTA";

/**
 * Error raised by a completion provider.
 *
 * @example
 * ```typescript
 * throw new ProviderError('openai', 'No message in response');
 * throw ProviderError.rateLimit('openai', 20);
 * ```
 */
export class ProviderError extends UnfurlError {
  readonly provider: string;
  readonly providerErrorCode?: string;

  constructor(
    provider: string,
    message: string,
    code: ProviderErrorCode = "PROVIDER_RESPONSE",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, { provider, ...details }, cause);
    this.name = "ProviderError";
    this.provider = provider;
    const providerErrorCode = details["providerErrorCode"];
    this.providerErrorCode = typeof providerErrorCode === "string" ? providerErrorCode : undefined;
  }

  static rateLimit(provider: string, retryAfter?: number): ProviderError {
    return new ProviderError(
      provider,
      retryAfter ? `Rate limit exceeded. Retry after ${retryAfter}s` : "Rate limit exceeded",
      "PROVIDER_RATE_LIMIT",
      { retryAfter },
    );
  }

  static quota(provider: string): ProviderError {
    return new ProviderError(
      provider,
      "Provider quota exceeded. Please check the account billing.",
      "PROVIDER_QUOTA",
      { providerErrorCode: "insufficient_quota" },
    );
  }

  static auth(provider: string): ProviderError {
    return new ProviderError(provider, "Invalid provider API key", "PROVIDER_AUTH", {
      providerErrorCode: "invalid_api_key",
    });
  }
}

// =============================================================================
// Context Errors
// =============================================================================

export class ContextError extends UnfurlError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: Error) {
    super("CONTEXT_NOT_FOUND", message, details, cause);
    this.name = "ContextError";
  }

  static notFound(): ContextError {
    return new ContextError("Context not found. Ensure you are running within Context.run().");
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isUnfurlError(error: unknown): error is UnfurlError {
  return error instanceof UnfurlError;
}

export function isAbortError(error: unknown): error is AbortError {
  return error instanceof AbortError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isStateError(error: unknown): error is StateError {
  return error instanceof StateError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Ensure a value is an Error, wrapping if necessary.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

/**
 * Wrap any error as an UnfurlError if it isn't already.
 */
export function wrapAsUnfurlError(
  error: unknown,
  defaultCode: UnfurlErrorCode = "STATE_INVALID",
): UnfurlError {
  if (error instanceof UnfurlError) {
    return error;
  }
  const err = ensureError(error);
  return new UnfurlError(defaultCode, err.message, {}, err);
}
