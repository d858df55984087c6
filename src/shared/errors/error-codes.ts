/**
 * Error Codes
 *
 * Stable identifiers for every failure the client can raise, plus the
 * severity used when the failure is logged.
 */

export enum ErrorCode {
  // Transport
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  CONNECTION_TIMEOUT = 'CONNECTION_TIMEOUT',
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',
  CALL_TIMEOUT = 'CALL_TIMEOUT',

  // Remote side
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
  SCRIPT_ERROR = 'SCRIPT_ERROR',

  // Handles
  STALE_HANDLE = 'STALE_HANDLE',

  // Waiting
  WAIT_TIMEOUT = 'WAIT_TIMEOUT',
  CONDITION_NOT_MET = 'CONDITION_NOT_MET',

  // Caller mistakes
  INVALID_SELECTOR = 'INVALID_SELECTOR',
  UNSUPPORTED_ELEMENT = 'UNSUPPORTED_ELEMENT',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  FOREIGN_HANDLE = 'FOREIGN_HANDLE',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export enum ErrorSeverity {
  DEBUG = 'debug',
  WARNING = 'warning',
  ERROR = 'error',
}
