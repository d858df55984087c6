/**
 * Error Handling
 *
 * Exports error types and codes
 */

export * from './error-codes.js';
export * from './automation-error.js';
