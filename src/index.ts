/**
 * @fileoverview wirebox - Reflective dependency resolution
 * @description
 * A small dependency-injection container. Types are resolved from explicit
 * bindings (instances and aliases) or constructed through their single
 * decorated constructor, with every failure reported as a chain of
 * {@link InjectionError}s.
 *
 * ## Architecture Layers
 *
 * - **domain**: type keys, injection tokens, injection errors
 * - **application**: container contracts, decorators, logging port
 * - **infrastructure**: the container and its collaborators
 *
 * @packageDocumentation
 * @module wirebox
 * @version 1.0.0
 *
 * @example
 * ```typescript
 * import { Container, Injectable } from 'wirebox';
 *
 * @Injectable()
 * class Greeter {
 *   constructor(private readonly clock: Clock) {}
 * }
 *
 * const container = new Container().bindInstance(Clock, new Clock());
 * const greeter = container.resolve(Greeter);
 * ```
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
