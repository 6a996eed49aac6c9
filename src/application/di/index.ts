/**
 * @module wirebox/application/di
 * @description Container contracts and constructor metadata decorators
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  IResolver,
  IContainer,
  IBindingRegistry,
  IConstructorIntrospector,
  ConstructorDescriptor,
  ContainerOptions,
  Provider,
  ProviderKind,
} from './IDependencyInjection';

// ============================================================================
// Decorators
// ============================================================================

/**
 * @example
 * ```typescript
 * import { Injectable, Inject } from 'wirebox/application/di';
 *
 * @Injectable()
 * class Foo {
 *   constructor(public readonly bar: Bar, @Inject(IBaz) public readonly baz: IBaz) {}
 * }
 * ```
 */
export { Injectable, Inject, getConstructorSignatures } from './decorators';
export type { InjectableOptions } from './decorators';
