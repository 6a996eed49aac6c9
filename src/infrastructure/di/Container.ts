/**
 * @fileoverview Container - Core Dependency Resolution Engine
 *
 * @packageDocumentation
 * @module wirebox/infrastructure/di
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements the resolution algorithm.
 *
 * ## Resolution Algorithm
 *
 * ```
 * resolve(type)
 *   1. Record the attempt (logger)
 *   2. Binding found?
 *      - invoke provider, check result against type (structurally)
 *      - any failure → InjectionError(cause)
 *   3. Otherwise, structural construction:
 *      a. Exactly one accessible constructor, or InjectionError
 *      b. Resolve each parameter, left to right
 *      c. Invoke the constructor
 *      d. Constructor failure → InjectionError(cause)
 *   4. Any other failure not yet wrapped → InjectionError(cause)
 * ```
 *
 * Each provider invocation and each constructor invocation adds exactly one
 * wrapper, so a chain of aliases nests as deep as the chain is long.
 *
 * A failure that reaches `resolve` without any wrapper (a throwing custom
 * introspector, or the `RangeError` of an exhausted call stack) gets one
 * more, with reason `resolution-failed`. On a constructor cycle that wrapper
 * is the only one: parameter failures are never wrapped again, so the
 * chain is shorter than one wrapper per constructor on the cycle.
 *
 * ## Cycles
 *
 * By default nothing detects cycles: a cyclic graph recurses until the call
 * stack is exhausted and the `RangeError` surfaces as the root cause of an
 * `InjectionError`. `detectCycles: true` fails fast with
 * `CyclicDependencyError` instead.
 *
 * @example
 * ```typescript
 * const container = new Container({ logger: consoleLogger });
 *
 * container
 *   .bindInstance(Baz, new Baz('xyzzy'))
 *   .bindAlias(Fooable, Foo);
 *
 * const foo = container.resolve(Fooable);
 * ```
 */

import {
  type TypeKey,
  castTo,
  castBoundValue,
  describeTypeKey,
  InjectionError,
  CyclicDependencyError,
} from '../../domain/di';
import type {
  ContainerOptions,
  IConstructorIntrospector,
  IContainer,
} from '../../application/di';
import { type ILogger, noopLogger } from '../../application/logging';

import { BindingRegistry } from './BindingRegistry';
import { ConstructorIntrospector } from './ConstructorIntrospector';

type LogLevel = keyof ILogger;

/**
 * Container - IContainer implementation.
 *
 * @remarks
 * **State:**
 *
 * The only lasting state is the binding registry. Types that are not bound
 * are introspected and constructed again on every request.
 *
 * **Error Wrapping:**
 *
 * - provider invocation: one `provider-failed` wrapper
 * - constructor invocation: one `constructor-failed` wrapper
 * - failure that is still unwrapped when it leaves `resolve` (introspector,
 *   exhausted stack): one `resolution-failed` wrapper, so a constructor cycle
 *   does not nest one wrapper per constructor
 *
 * **Thread Safety:**
 *
 * Resolution is synchronous. Populate the container, then resolve; the
 * registry is not guarded against binds interleaved with resolution.
 */
export class Container implements IContainer {
  readonly name: string;

  private readonly registry = new BindingRegistry();
  private readonly logger: ILogger;
  private readonly introspector: IConstructorIntrospector;
  private readonly detectCycles: boolean;

  /**
   * Keys currently being resolved, outermost first.
   */
  private readonly resolutionPath: TypeKey[] = [];

  constructor(options: ContainerOptions = {}) {
    this.name = options.name ?? 'container';
    this.logger = options.logger ?? noopLogger;
    this.introspector = options.introspector ?? new ConstructorIntrospector();
    this.detectCycles = options.detectCycles ?? false;
  }

  // ============================================================================
  // Bindings
  // ============================================================================

  bindInstance<T>(type: TypeKey<T>, value: T): this {
    this.registry.bindInstance(type, value);
    return this;
  }

  bindAlias<T>(abstractType: TypeKey<T>, concreteType: TypeKey<T>): this {
    this.registry.bindAlias(abstractType, concreteType, this);
    return this;
  }

  isBound(type: TypeKey): boolean {
    return this.registry.has(type);
  }

  // ============================================================================
  // Resolution
  // ============================================================================

  /**
   * Gets an instance of the given type, with its dependencies injected.
   *
   * @throws {InjectionError} If the type or any dependency cannot be resolved
   */
  resolve<T>(type: TypeKey<T>): T {
    const name = describeTypeKey(type);
    const depth = this.resolutionPath.length;

    try {
      this.log('info', `Attempting to resolve ${name}`, {
        container: this.name,
        type: name,
        depth,
      });

      if (this.detectCycles && this.resolutionPath.includes(type)) {
        throw new CyclicDependencyError(type, this.resolutionPath);
      }

      this.resolutionPath.push(type);
      const bound = this.resolveFromBinding(type);
      return bound !== undefined ? bound.value : this.construct(type);
    } catch (error) {
      if (error instanceof InjectionError) {
        throw error;
      }
      // Introspector failures, exhausted call stack
      throw new InjectionError(`Error while resolving ${name}`, {
        type,
        reason: 'resolution-failed',
        cause: error,
      });
    } finally {
      this.resolutionPath.length = depth;
    }
  }

  /**
   * Resolve through an explicit binding.
   *
   * @returns `undefined` when `type` is not bound
   */
  private resolveFromBinding<T>(type: TypeKey<T>): { value: T } | undefined {
    // If we already have a provider registered for this type, use it
    const provider = this.registry.lookup(type);
    if (provider === undefined) {
      return undefined;
    }

    const name = describeTypeKey(type);
    this.log('debug', `Using ${provider.describe()} binding for ${name}`, {
      container: this.name,
      kind: provider.kind,
    });

    try {
      // The provider may call back into resolve, so failures may be nested
      return { value: castBoundValue(type, provider.provide()) };
    } catch (error) {
      throw new InjectionError(`Error while trying to inject ${name}`, {
        type,
        reason: 'provider-failed',
        cause: error,
      });
    }
  }

  /**
   * Structural construction through the type's only constructor.
   */
  private construct<T>(type: TypeKey<T>): T {
    const name = describeTypeKey(type);
    const constructors = this.introspector.getConstructors(type);

    // No heuristic for picking among several constructors
    if (constructors.length !== 1) {
      throw new InjectionError(`Unable to find a valid constructor on ${name}`, {
        type,
        reason: 'no-valid-constructor',
      });
    }

    const [descriptor] = constructors;

    // Failures here are already wrapped by the nested resolve
    const args = descriptor.parameterTypes.map((parameterType) => this.resolve(parameterType));

    let instance: T;
    try {
      instance = castTo(type, Reflect.construct(descriptor.type, args));
    } catch (error) {
      throw new InjectionError(`Error invoking constructor of ${name}`, {
        type,
        reason: 'constructor-failed',
        cause: error,
      });
    }

    this.log('debug', `Constructed ${name}`, {
      container: this.name,
      parameters: descriptor.parameterTypes.map(describeTypeKey),
    });
    return instance;
  }

  /**
   * Forward a record to the logger. A failing logger never fails resolution.
   */
  private log(level: LogLevel, message: string, fields: Record<string, unknown>): void {
    try {
      this.logger[level](message, fields);
    } catch (error) {
      process.emitWarning(
        `Logger failed while recording "${message}": ${String(error)}`,
        'ContainerLoggerWarning',
      );
    }
  }
}
