/**
 * @fileoverview InjectionToken - Typed keys for interfaces
 *
 * @packageDocumentation
 * @module wirebox/domain/di
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * TypeScript interfaces are erased at compile time, so there is nothing at
 * run time the container could key a binding on. An `InjectionToken<T>`
 * stands in for the interface: it is a unique object that carries the
 * interface type `T` for the compiler and a description for messages.
 *
 * ```typescript
 * interface Fooable {
 *   getBazValue(): string;
 * }
 *
 * const Fooable = new InjectionToken<Fooable>('Fooable');
 *
 * container.bindAlias(Fooable, Foo);
 * const foo = container.resolve(Fooable); // typed as Fooable
 * ```
 *
 * A token never has a constructor. Resolving an unbound token always fails.
 */

/**
 * Runtime check that narrows an unknown value to `T`.
 */
export type TypeGuard<T> = (value: unknown) => value is T;

/**
 * A typed key for a type that has no runtime constructor (an interface).
 *
 * @remarks
 * Identity is the token object itself: two tokens with the same description
 * are still different keys.
 *
 * The optional guard is used by the container when it checks a provider's
 * result against the requested key. Without a guard every value is accepted.
 *
 * @example
 * ```typescript
 * const Port = new InjectionToken<number>(
 *   'Port',
 *   (value): value is number => typeof value === 'number',
 * );
 * ```
 */
export class InjectionToken<T> {
  /** Phantom property carrying `T` (never set at run time). */
  declare readonly _type: T;

  constructor(
    public readonly description: string,
    private readonly guard?: TypeGuard<T>,
  ) {}

  /**
   * Whether `value` satisfies this token's guard.
   */
  accepts(value: unknown): value is T {
    return this.guard === undefined || this.guard(value);
  }

  toString(): string {
    return `InjectionToken(${this.description})`;
  }
}
