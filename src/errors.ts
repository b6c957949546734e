/**
 * Typed error classes for vodhub
 *
 * Every failure inside the engine is expressed as a VodError so that the
 * optimizer can decide whether to retry and the facade can turn it into an
 * error-flagged envelope.
 */

/**
 * Error codes for categorization
 */
export enum VodErrorCode {
  // Site definition
  CONFIG_ERROR = "CONFIG_ERROR",

  // Backend lifecycle
  BACKEND_INIT_FAILED = "BACKEND_INIT_FAILED",

  // Network errors
  TRANSIENT_NETWORK = "TRANSIENT_NETWORK",
  TIMEOUT = "TIMEOUT",

  // Upstream errors
  PERMANENT_UPSTREAM = "PERMANENT_UPSTREAM",
  MALFORMED_RESPONSE = "MALFORMED_RESPONSE",

  // Control flow
  CANCELLED = "CANCELLED",
  ENGINE_CLOSED = "ENGINE_CLOSED",

  // Unknown
  UNKNOWN = "UNKNOWN",
}

/**
 * Base error class for all vodhub errors
 */
export class VodError extends Error {
  readonly code: VodErrorCode;
  readonly siteKey?: string;
  readonly cause?: Error;
  readonly timestamp: string;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: VodErrorCode,
    options?: {
      siteKey?: string;
      cause?: Error;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "VodError";
    this.code = code;
    this.siteKey = options?.siteKey;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.retryable = options?.retryable ?? false;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      siteKey: this.siteKey,
      timestamp: this.timestamp,
      retryable: this.retryable,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }
}

/**
 * Bad or missing site definition. Fatal to that site only.
 */
export class ConfigError extends VodError {
  readonly field?: string;

  constructor(message: string, options?: { siteKey?: string; field?: string }) {
    super(message, VodErrorCode.CONFIG_ERROR, {
      siteKey: options?.siteKey,
      retryable: false,
    });
    this.name = "ConfigError";
    this.field = options?.field;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

/**
 * A backend failed to initialize (script compile error, module not found)
 */
export class BackendInitError extends VodError {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { siteKey?: string; cause?: Error }) {
    super(`[${backend}] ${message}`, VodErrorCode.BACKEND_INIT_FAILED, {
      ...options,
      retryable: false,
    });
    this.name = "BackendInitError";
    this.backend = backend;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      backend: this.backend,
    };
  }
}

/**
 * Connection reset, DNS failure, 5xx and similar conditions worth retrying
 */
export class TransientNetworkError extends VodError {
  readonly statusCode?: number;

  constructor(message: string, options?: { siteKey?: string; statusCode?: number; cause?: Error }) {
    super(message, VodErrorCode.TRANSIENT_NETWORK, {
      siteKey: options?.siteKey,
      cause: options?.cause,
      retryable: true,
    });
    this.name = "TransientNetworkError";
    this.statusCode = options?.statusCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}

/**
 * A call or attempt ran out of time
 */
export class TimeoutError extends VodError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: { siteKey?: string; cause?: Error }) {
    super(message, VodErrorCode.TIMEOUT, {
      ...options,
      retryable: true,
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      timeoutMs: this.timeoutMs,
    };
  }
}

/**
 * Upstream answered with a status that will not change on retry (404, 410...)
 */
export class PermanentUpstreamError extends VodError {
  readonly statusCode: number;

  constructor(statusCode: number, message?: string, options?: { siteKey?: string }) {
    super(message ?? `Upstream responded with HTTP ${statusCode}`, VodErrorCode.PERMANENT_UPSTREAM, {
      siteKey: options?.siteKey,
      retryable: false,
    });
    this.name = "PermanentUpstreamError";
    this.statusCode = statusCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}

/**
 * Backend output could not be parsed into the content model
 */
export class MalformedResponseError extends VodError {
  constructor(message: string, options?: { siteKey?: string; cause?: Error }) {
    super(message, VodErrorCode.MALFORMED_RESPONSE, {
      ...options,
      retryable: false,
    });
    this.name = "MalformedResponseError";
  }
}

/**
 * The enclosing query was cancelled
 */
export class CancelledError extends VodError {
  constructor(message = "Operation cancelled", options?: { siteKey?: string }) {
    super(message, VodErrorCode.CANCELLED, {
      siteKey: options?.siteKey,
      retryable: false,
    });
    this.name = "CancelledError";
  }
}

/**
 * Engine state error
 */
export class EngineClosedError extends VodError {
  constructor() {
    super("VodEngine has been closed. Create a new instance to continue.", VodErrorCode.ENGINE_CLOSED, {
      retryable: false,
    });
    this.name = "EngineClosedError";
  }
}

/**
 * Map an HTTP status to the matching error
 */
export function errorForStatus(statusCode: number, url: string, siteKey?: string): VodError {
  const message = `HTTP ${statusCode} from ${url}`;
  if (statusCode === 408 || statusCode === 425 || statusCode === 429 || statusCode >= 500) {
    return new TransientNetworkError(message, { siteKey, statusCode });
  }
  return new PermanentUpstreamError(statusCode, message, { siteKey });
}

/**
 * Helper to wrap unknown errors in VodError
 */
export function wrapError(error: unknown, siteKey?: string): VodError {
  if (error instanceof VodError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return new CancelledError(error.message, { siteKey });
    }

    if (error instanceof SyntaxError) {
      return new MalformedResponseError(`Unparsable payload: ${error.message}`, { siteKey, cause: error });
    }

    // Check for common error patterns
    const message = error.message.toLowerCase();
    const code = readErrorCode(error);

    if (message.includes("timeout") || message.includes("timed out") || code === "ETIMEDOUT") {
      return new TimeoutError(error.message, 0, { siteKey, cause: error });
    }

    if (
      code === "ECONNRESET" ||
      code === "ECONNREFUSED" ||
      code === "ENOTFOUND" ||
      code === "EAI_AGAIN" ||
      code === "EPIPE" ||
      message.includes("fetch failed") ||
      message.includes("socket hang up") ||
      message.includes("network")
    ) {
      return new TransientNetworkError(error.message, { siteKey, cause: error });
    }

    return new VodError(error.message, VodErrorCode.UNKNOWN, {
      siteKey,
      cause: error,
      retryable: false,
    });
  }

  return new VodError(String(error), VodErrorCode.UNKNOWN, {
    siteKey,
    retryable: false,
  });
}

/**
 * Read the errno-style code from a Node error or its cause
 */
function readErrorCode(error: Error): string | undefined {
  for (const candidate of [error, error.cause]) {
    if (candidate instanceof Error && "code" in candidate && typeof candidate.code === "string") {
      return candidate.code;
    }
  }
  return undefined;
}
