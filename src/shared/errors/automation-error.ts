/**
 * Automation Error Types
 *
 * Every error raised by the client is an AutomationError. The `retryable`
 * flag is the only thing the retry engine looks at: retryable errors describe
 * transient browser state, everything else is fatal.
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Base error class
 */
export class AutomationError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly retryable: boolean = false,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AutomationError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      details: this.details,
      cause: this.cause ? { name: this.cause.name, message: this.cause.message } : undefined,
    };
  }

  static isAutomationError(error: unknown): error is AutomationError {
    return error instanceof AutomationError;
  }
}

/**
 * Handshake failures, call timeouts and closed transports.
 */
export class ConnectionError extends AutomationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONNECTION_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, false, ErrorSeverity.ERROR, details, cause);
    this.name = 'ConnectionError';
  }

  static closed(details?: Record<string, unknown>): ConnectionError {
    return new ConnectionError(
      'DevTools connection was closed while waiting for the operation to complete',
      ErrorCode.CONNECTION_CLOSED,
      details,
    );
  }
}

/**
 * The browser answered a command with an error response.
 */
export class ProtocolError extends AutomationError {
  constructor(
    message: string,
    public readonly remoteCode: number,
    public readonly method?: string,
  ) {
    super(message, ErrorCode.PROTOCOL_ERROR, false, ErrorSeverity.ERROR, {
      remoteCode,
      method,
    });
    this.name = 'ProtocolError';
  }
}

/**
 * A remote reference no longer resolves to a live browser-side object.
 */
export class StaleHandleError extends AutomationError {
  constructor(details?: Record<string, unknown>, cause?: Error) {
    super(
      "Can't use the handle because its browser-side object no longer exists",
      ErrorCode.STALE_HANDLE,
      true,
      ErrorSeverity.DEBUG,
      details,
      cause,
    );
    this.name = 'StaleHandleError';
  }
}

/**
 * Script evaluated in the page threw.
 */
export class ScriptError extends AutomationError {
  constructor(public readonly description: string) {
    super(`JavaScript error:\n${description}`, ErrorCode.SCRIPT_ERROR, false, ErrorSeverity.ERROR, {
      description,
    });
    this.name = 'ScriptError';
  }
}

/**
 * A wait deadline passed before the awaited condition held.
 */
export class TimeoutError extends AutomationError {
  constructor(
    public readonly expression: string,
    public readonly timeoutMs: number,
    public readonly lastValue?: unknown,
    cause?: Error,
  ) {
    super(
      TimeoutError.buildMessage(expression, timeoutMs, cause),
      ErrorCode.WAIT_TIMEOUT,
      false,
      ErrorSeverity.WARNING,
      { expression, timeoutMs },
      cause,
    );
    this.name = 'TimeoutError';
  }

  private static buildMessage(expression: string, timeoutMs: number, cause?: Error): string {
    const reason = cause ? `\nReason: ${cause.message}` : '';
    return `Timeout after ${timeoutMs}ms waiting for expression: ${expression}${reason}`;
  }
}

/**
 * Generic transient condition, e.g. "element not visible yet".
 */
export class RetryableError extends AutomationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.CONDITION_NOT_MET, true, ErrorSeverity.DEBUG, details);
    this.name = 'RetryableError';
  }
}

/**
 * The caller asked for something that can never succeed.
 */
export class UsageError extends AutomationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_ARGUMENT,
    details?: Record<string, unknown>,
  ) {
    super(message, code, false, ErrorSeverity.ERROR, details);
    this.name = 'UsageError';
  }
}

/**
 * Whether the retry engine may re-run an operation that failed with `error`.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof AutomationError && error.retryable;
}

/**
 * Normalise anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
