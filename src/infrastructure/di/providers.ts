/**
 * @fileoverview Binding providers
 *
 * @module wirebox/infrastructure/di
 *
 * Two strategies back an explicit binding:
 *
 * - {@link InstanceProvider}: returns the same pre-built value every time
 * - {@link AliasProvider}: resolves another key every time (not cached)
 */

import { type TypeKey, describeTypeKey } from '../../domain/di';
import type { IResolver, Provider } from '../../application/di';

/**
 * Provider for `bindInstance`: always returns the bound value.
 */
export class InstanceProvider<T> implements Provider<T> {
  readonly kind = 'instance' as const;

  constructor(private readonly value: T) {}

  provide(): T {
    return this.value;
  }

  describe(): string {
    return 'instance';
  }
}

/**
 * Provider for `bindAlias`: resolves the concrete key on each invocation.
 *
 * @remarks
 * Repeated resolution of the abstract key re-runs resolution of the
 * concrete key, so the result is only shared when the concrete key is
 * itself instance-bound.
 */
export class AliasProvider<T> implements Provider<T> {
  readonly kind = 'alias' as const;

  constructor(
    private readonly concreteType: TypeKey<T>,
    private readonly resolver: IResolver,
  ) {}

  provide(): T {
    return this.resolver.resolve(this.concreteType);
  }

  describe(): string {
    return `alias of ${describeTypeKey(this.concreteType)}`;
  }
}
