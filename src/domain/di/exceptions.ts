/**
 * @fileoverview Injection errors
 *
 * @packageDocumentation
 * @module wirebox/domain/di
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Every resolution failure leaves the container as an {@link InjectionError}.
 * Errors are chained through the standard `cause` property:
 *
 * ```
 * InjectionError: Error while trying to inject InjectionToken(Fooable)
 * └─ InjectionError: Error invoking constructor of Foo
 *    └─ RangeError: value out of range        ← root cause
 * ```
 *
 * Use {@link getCauseChain} or {@link getRootCause} to walk the chain:
 *
 * ```typescript
 * try {
 *   container.resolve(Fooable);
 * } catch (error) {
 *   if (error instanceof InjectionError) {
 *     logger.error('Resolution failed', { root: getRootCause(error) });
 *   }
 *   throw error;
 * }
 * ```
 */

import { type TypeKey, describeTypeKey } from './TypeKey';

/**
 * Why resolution failed at the point where an error was raised.
 *
 * - `no-valid-constructor`: unbound key with zero or several constructors
 * - `provider-failed`: a bound provider (or something it resolved) failed
 * - `constructor-failed`: the constructor body threw
 * - `cyclic-dependency`: the key is already being resolved (cycle detection)
 * - `resolution-failed`: anything else, such as an exhausted call stack
 */
export type InjectionFailureReason =
  | 'no-valid-constructor'
  | 'provider-failed'
  | 'constructor-failed'
  | 'cyclic-dependency'
  | 'resolution-failed';

export interface InjectionErrorOptions {
  /** The key that could not be resolved */
  type?: TypeKey;

  /** Failure classification */
  reason?: InjectionFailureReason;

  /** Underlying failure, kept unaltered */
  cause?: unknown;
}

/**
 * Error thrown when injection fails.
 *
 * @remarks
 * The message names the type that failed. When the failure came from
 * somewhere deeper (a provider, a nested resolution, a constructor body),
 * that failure is available unchanged as `cause`.
 */
export class InjectionError extends Error {
  /**
   * The key this error was raised for, when known.
   */
  public readonly type?: TypeKey;

  /**
   * Failure classification, when known.
   */
  public readonly reason?: InjectionFailureReason;

  constructor(message?: string, options: InjectionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'InjectionError';
    this.type = options.type;
    this.reason = options.reason;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when a key is requested while it is already being resolved.
 *
 * @remarks
 * Only raised by containers created with `detectCycles: true`. Without it a
 * cyclic graph recurses until the call stack is exhausted.
 *
 * @example
 * ```
 * Circular dependency detected: ServiceA -> ServiceB -> ServiceA
 * ```
 */
export class CyclicDependencyError extends InjectionError {
  /**
   * Names of the keys on the cycle, starting and ending with the same key.
   */
  public readonly path: readonly string[];

  constructor(type: TypeKey, resolutionPath: readonly TypeKey[]) {
    const path = [...resolutionPath, type].map(describeTypeKey);

    super(`Circular dependency detected: ${path.join(' -> ')}`, {
      type,
      reason: 'cyclic-dependency',
    });
    this.name = 'CyclicDependencyError';
    this.path = path;
  }
}

/**
 * The error followed by each successive `cause`.
 *
 * @example
 * ```typescript
 * const [outer, inner, root] = getCauseChain(error);
 * ```
 */
export function getCauseChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }

  return chain;
}

/**
 * The innermost failure of a cause chain.
 */
export function getRootCause(error: unknown): unknown {
  const chain = getCauseChain(error);
  return chain.length > 0 ? chain[chain.length - 1] : error;
}
