/**
 * @fileoverview TypeKey - Identification of requested types
 *
 * @packageDocumentation
 * @module wirebox/domain/di
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A `TypeKey` identifies what is being requested from the container:
 *
 * 1. **Class constructor** (`Type<T>`): concrete or abstract classes.
 *    ```typescript
 *    container.resolve(UserService);
 *    ```
 *
 * 2. **InjectionToken** (`InjectionToken<T>`): interfaces.
 *    ```typescript
 *    const ILogger = new InjectionToken<ILogger>('ILogger');
 *    container.resolve(ILogger);
 *    ```
 *
 * Keys are compared by reference, so a key is stable for the lifetime of
 * the program and two lookups of the same class always collide.
 */

import { InjectionToken } from './InjectionToken';

/**
 * Any class constructor producing `T`, concrete or abstract.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Key under which a type is bound and resolved.
 */
export type TypeKey<T = unknown> = Type<T> | InjectionToken<T>;

/**
 * Wrapper classes whose values are usually primitives.
 *
 * `'hello' instanceof String` is false, so these are matched by `typeof`.
 */
const PRIMITIVE_TYPES = new Map<unknown, string>([
  [String, 'string'],
  [Number, 'number'],
  [Boolean, 'boolean'],
]);

/**
 * Check if a key is an {@link InjectionToken}.
 */
export function isInjectionToken<T>(key: TypeKey<T>): key is InjectionToken<T> {
  return key instanceof InjectionToken;
}

/**
 * Get a human-readable name for a key.
 *
 * @example
 * ```typescript
 * describeTypeKey(UserService); // 'UserService'
 * describeTypeKey(new InjectionToken('ILogger')); // 'InjectionToken(ILogger)'
 * ```
 */
export function describeTypeKey(key: TypeKey): string {
  if (isInjectionToken(key)) {
    return key.toString();
  }

  return key.name || 'AnonymousClass';
}

/**
 * Check if a value is an instance of a class key.
 */
export function isInstanceOf<T>(type: Type<T>, value: unknown): value is T {
  const primitive = PRIMITIVE_TYPES.get(type);
  if (primitive !== undefined && typeof value === primitive) {
    return true;
  }

  return value instanceof type;
}

/**
 * Checked cast of a resolved value to the requested key.
 *
 * @remarks
 * Class keys use `instanceof` (or `typeof` for the primitive wrappers).
 * Tokens use their guard, if they have one.
 *
 * @throws {TypeError} If the value does not satisfy the key
 */
export function castTo<T>(key: TypeKey<T>, value: unknown): T {
  if (isInjectionToken(key)) {
    if (key.accepts(value)) {
      return value;
    }
  } else if (isInstanceOf(key, value)) {
    return value;
  }

  throw new TypeError(`Cannot cast ${describeValue(value)} to ${describeTypeKey(key)}`);
}

/**
 * Checked cast of a value produced by a binding.
 *
 * @remarks
 * Bound values are checked by the compiler structurally, so a plain object
 * or a test double may stand in for a class. Class keys therefore only
 * reject `null`, `undefined` and primitives of the wrong type for the
 * wrapper classes. Tokens still use their guard.
 *
 * @throws {TypeError} If the value does not satisfy the key
 *
 * @example
 * ```typescript
 * castBoundValue(Settings, { port: 8080 }); // accepted
 * castTo(Settings, { port: 8080 }); // TypeError
 * ```
 */
export function castBoundValue<T>(key: TypeKey<T>, value: unknown): T {
  if (conformsTo(key, value)) {
    return value;
  }

  throw new TypeError(`Cannot cast ${describeValue(value)} to ${describeTypeKey(key)}`);
}

function conformsTo<T>(key: TypeKey<T>, value: unknown): value is T {
  if (isInjectionToken(key)) {
    return key.accepts(value);
  }

  if (PRIMITIVE_TYPES.has(key)) {
    return isInstanceOf(key, value);
  }

  return value !== null && value !== undefined;
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  if (typeof value === 'object') {
    return `instance of ${value.constructor?.name ?? 'Object'}`;
  }

  return typeof value;
}
