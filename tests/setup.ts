/**
 * @fileoverview Jest test setup and global utilities
 *
 * Provides custom matchers and utility functions for tests.
 */

import { getRootCause } from '../src/domain/di';

// ============================================================================
// CRITICAL: This export {} makes this file a module
// Without it, declare global won't work properly
// ============================================================================
export {};

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    // eslint-disable-next-line @typescript-eslint/ban-types
    interface Matchers<R, T = {}> {
      /**
       * Check if function throws an error of specific type
       * @param expected Error constructor
       */
      toThrowErrorType(expected: new (...args: never[]) => Error): R;

      /**
       * Check if the innermost `cause` of an error is the given value
       * @param expected Expected root cause (compared by identity)
       */
      toHaveRootCause(expected: unknown): R;
    }
  }

  /**
   * Run a function that is expected to throw and return what it threw
   * @param fn Function to run
   */
  // eslint-disable-next-line no-var
  var captureError: (fn: () => unknown) => unknown;
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

expect.extend({
  /**
   * Check if thrown error is of specific type
   */
  toThrowErrorType(received: () => unknown, expected: new (...args: never[]) => Error) {
    try {
      received();
      return {
        pass: false,
        message: () => `Expected function to throw ${expected.name}, but it didn't throw`,
      };
    } catch (error) {
      const pass = error instanceof expected;
      return {
        pass,
        message: () =>
          pass
            ? `Expected function not to throw ${expected.name}`
            : `Expected function to throw ${expected.name}, but it threw ${
                error instanceof Error ? error.constructor.name : typeof error
              }`,
      };
    }
  },

  /**
   * Check the end of an error's cause chain
   */
  toHaveRootCause(received: unknown, expected: unknown) {
    const root = getRootCause(received);
    const pass = Object.is(root, expected);
    return {
      pass,
      message: () =>
        pass
          ? `Expected root cause not to be ${String(expected)}`
          : `Expected root cause ${String(expected)}, but got ${String(root)}`,
    };
  },
});

// ============================================================================
// Global Utility Functions
// ============================================================================

/**
 * Run a function that must throw and return the thrown value
 *
 * @throws Error if the function returns normally
 *
 * @example
 * ```typescript
 * const error = captureError(() => container.resolve(Fooable));
 * expect(error).toBeInstanceOf(InjectionError);
 * ```
 */
globalThis.captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw, but it returned normally');
};
