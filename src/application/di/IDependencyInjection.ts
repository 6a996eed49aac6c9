/**
 * @fileoverview Dependency Injection Container Interfaces
 *
 * @packageDocumentation
 * @module wirebox/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * This file belongs to the **Application Layer**. It defines the contracts
 * of the resolution engine; the implementation lives in
 * `wirebox/infrastructure/di`.
 *
 * ## Architectural Responsibility
 *
 * The container answers one question: *given a type, produce an instance of
 * it*. It does so in two ways:
 *
 * 1. **Explicit bindings**: a fixed instance, or an alias to another type
 * 2. **Structural construction**: inspect the type's only constructor and
 *    resolve each parameter recursively
 *
 * ## Resolution Process
 *
 * ```
 * Step 1: User requests a type
 *   container.resolve(Foo)
 *     ↓
 * Step 2: Binding lookup
 *   Foo bound?  → yes: invoke provider, check result, return it
 *               → no:  continue
 *     ↓
 * Step 3: Inspect constructors
 *   exactly one?  → no: InjectionError (no valid constructor)
 *     ↓
 * Step 4: Resolve parameters left to right
 *   Foo(Bar, Baz)
 *     → resolve(Bar) → Bar(Baz) → resolve(Baz) → bound instance
 *     → resolve(Baz) → bound instance (same object)
 *     ↓
 * Step 5: Invoke the constructor
 *   new Foo(bar, baz)
 * ```
 *
 * Nothing is cached: a type that is not bound is constructed again on every
 * request. Bind an instance to share one.
 *
 * ## Error Scenarios
 *
 * The container throws `InjectionError` in these cases:
 *
 * ### 1. No valid constructor
 *
 * ```typescript
 * // Fooable is an InjectionToken (interface) and is not bound
 * container.resolve(Fooable);
 *
 * // InjectionError: Unable to find a valid constructor on InjectionToken(Fooable)
 * ```
 *
 * ### 2. Provider failure
 *
 * ```typescript
 * container.bindAlias(SimpleMarker, Fooable);
 * container.resolve(SimpleMarker);
 *
 * // InjectionError: Error while trying to inject InjectionToken(SimpleMarker)
 * // cause: InjectionError: Unable to find a valid constructor on InjectionToken(Fooable)
 * ```
 *
 * ### 3. Constructor failure
 *
 * ```typescript
 * @Injectable()
 * class Bogus {
 *   constructor(baz: Baz) {
 *     throw new RangeError('oh no');
 *   }
 * }
 *
 * container.resolve(Bogus);
 *
 * // InjectionError: Error invoking constructor of Bogus
 * // cause: RangeError: oh no
 * ```
 */

import type { Type, TypeKey } from '../../domain/di';
import type { ILogger } from '../logging';

/**
 * Resolves keys to instances.
 *
 * @remarks
 * Providers receive an `IResolver` instead of the whole container so that
 * an alias can resolve its target without access to the bind methods.
 */
export interface IResolver {
  /**
   * Gets an instance of the given type, with its dependencies injected.
   *
   * @throws {InjectionError} If the type or any of its dependencies cannot
   * be resolved
   */
  resolve<T>(type: TypeKey<T>): T;
}

/**
 * Kind of explicit binding.
 *
 * - `instance`: always returns the same pre-built value
 * - `alias`: resolves another key on every invocation
 */
export type ProviderKind = 'instance' | 'alias';

/**
 * Resolution strategy attached to a binding.
 *
 * @remarks
 * A provider is a zero-argument, fallible operation. It may call back into
 * the resolver (aliases do), so invoking it can raise nested failures.
 */
export interface Provider<T> {
  readonly kind: ProviderKind;

  /**
   * Produces a value for the bound key.
   */
  provide(): T;

  /**
   * Short description for log records.
   */
  describe(): string;
}

/**
 * Records explicit resolution strategies for types.
 *
 * @remarks
 * Keys are unique: binding a key again replaces its provider.
 * There is no unbind.
 */
export interface IBindingRegistry {
  bindInstance<T>(type: TypeKey<T>, value: T): void;

  bindAlias<T>(
    abstractType: TypeKey<T>,
    concreteType: TypeKey<T>,
    resolver: IResolver,
  ): void;

  lookup(type: TypeKey): Provider<unknown> | undefined;

  has(type: TypeKey): boolean;
}

/**
 * One accessible constructor of a type.
 *
 * @remarks
 * `parameterTypes` lists the key to resolve for each parameter, in order.
 */
export interface ConstructorDescriptor<T = unknown> {
  readonly type: Type<T>;
  readonly parameterTypes: readonly TypeKey[];
}

/**
 * Enumerates the accessible constructors of a type.
 *
 * @remarks
 * The default implementation reads the metadata recorded by `@Injectable()`.
 * An embedding application can supply its own, for example a registration
 * table of constructor signatures.
 */
export interface IConstructorIntrospector {
  getConstructors<T>(type: TypeKey<T>): ConstructorDescriptor<T>[];
}

/**
 * Container configuration options
 */
export interface ContainerOptions {
  /** Container name, included in log records */
  name?: string;

  /** Sink for resolution records (default: no-op) */
  logger?: ILogger;

  /**
   * Fail fast with `CyclicDependencyError` when a key is requested while it
   * is already being resolved (default: false)
   */
  detectCycles?: boolean;

  /** Constructor introspection strategy (default: decorator metadata) */
  introspector?: IConstructorIntrospector;
}

/**
 * The container's public surface.
 *
 * @example
 * ```typescript
 * const container = new Container({ logger: consoleLogger });
 *
 * // Bind basic dependencies
 * container.bindInstance(Baz, new Baz('hello world'));
 *
 * // Bind an interface to an implementation
 * container.bindAlias(Fooable, Foo);
 *
 * // Get a value from the container
 * const foo = container.resolve(Fooable);
 * ```
 */
export interface IContainer extends IResolver {
  /**
   * Binds the given type to the given instance.
   *
   * @remarks
   * When the type is requested it always resolves to this exact value.
   */
  bindInstance<T>(type: TypeKey<T>, value: T): this;

  /**
   * Binds the given abstract type to the given concrete type.
   *
   * @remarks
   * When the abstract type is requested, the concrete type is resolved in
   * its place. The concrete type is not checked until then.
   */
  bindAlias<T>(abstractType: TypeKey<T>, concreteType: TypeKey<T>): this;

  /**
   * Whether the type has an explicit binding.
   */
  isBound(type: TypeKey): boolean;
}
