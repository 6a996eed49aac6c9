/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Concrete implementations of the application-layer contracts:
 *
 * - **Container**: the resolution engine
 * - **BindingRegistry**: explicit bindings and their providers
 * - **ConstructorIntrospector**: decorator-metadata based constructor lookup
 *
 * @packageDocumentation
 * @module wirebox/infrastructure
 */

export * from './di';
