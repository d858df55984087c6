/**
 * Test Utilities
 *
 * Common test helpers and assertions for the test suite.
 */

import { expect, vi, type Mock } from 'vitest';
import type { Logger } from '../../src/shared/services/logging.service.js';

/**
 * Assert that a value is defined (not null or undefined)
 */
export function assertDefined<T>(value: T | null | undefined, message?: string): asserts value is T {
  expect(value, message).toBeDefined();
  expect(value, message).not.toBeNull();
}

/**
 * Await `promise` and return what it rejected with; fails the test if it
 * resolves.
 */
export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return expect.unreachable('Expected promise to reject');
}

/**
 * Let pending I/O callbacks and setImmediate tasks run.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Promise with its settle functions exposed.
 */
export function createDeferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface MockLogger extends Logger {
  debug: Mock<(message: string, context?: Record<string, unknown>) => void>;
  info: Mock<(message: string, context?: Record<string, unknown>) => void>;
  warning: Mock<(message: string, context?: Record<string, unknown>) => void>;
  error: Mock<(message: string, error?: Error, context?: Record<string, unknown>) => void>;
}

/**
 * Logger whose methods are spies.
 */
export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn<(message: string, context?: Record<string, unknown>) => void>(),
    info: vi.fn<(message: string, context?: Record<string, unknown>) => void>(),
    warning: vi.fn<(message: string, context?: Record<string, unknown>) => void>(),
    error: vi.fn<(message: string, error?: Error, context?: Record<string, unknown>) => void>(),
  };
}
