/**
 * @fileoverview BindingRegistry - Explicit bindings of a container
 *
 * @module wirebox/infrastructure/di
 *
 * Maps each explicitly bound key to its provider. Keys are compared by
 * reference; binding a key again replaces the previous provider.
 */

import type { TypeKey } from '../../domain/di';
import type { IBindingRegistry, IResolver, Provider } from '../../application/di';

import { AliasProvider, InstanceProvider } from './providers';

export class BindingRegistry implements IBindingRegistry {
  private readonly providers = new Map<TypeKey, Provider<unknown>>();

  /**
   * Binds `type` to a fixed value.
   */
  bindInstance<T>(type: TypeKey<T>, value: T): void {
    this.providers.set(type, new InstanceProvider(value));
  }

  /**
   * Binds `abstractType` to whatever `resolver` produces for `concreteType`.
   *
   * @remarks
   * `concreteType` is not inspected here; failures surface on resolution.
   */
  bindAlias<T>(
    abstractType: TypeKey<T>,
    concreteType: TypeKey<T>,
    resolver: IResolver,
  ): void {
    this.providers.set(abstractType, new AliasProvider(concreteType, resolver));
  }

  lookup(type: TypeKey): Provider<unknown> | undefined {
    return this.providers.get(type);
  }

  has(type: TypeKey): boolean {
    return this.providers.has(type);
  }

  get size(): number {
    return this.providers.size;
  }

  keys(): TypeKey[] {
    return [...this.providers.keys()];
  }
}
