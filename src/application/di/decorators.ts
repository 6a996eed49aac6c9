/**
 * @fileoverview Constructor metadata decorators
 *
 * @packageDocumentation
 * @module wirebox/application/di
 *
 * ## Metadata Reflection
 *
 * JavaScript classes do not expose their constructor parameter types at run
 * time. With `emitDecoratorMetadata` the compiler writes them to
 * `design:paramtypes` on every decorated class; `@Injectable()` turns that
 * into a constructor signature the container can introspect:
 *
 * ```typescript
 * import 'reflect-metadata';  // Required!
 *
 * @Injectable()
 * class Bar {
 *   constructor(public readonly baz: Baz) {}
 * }
 * // signature recorded on Bar: [Baz]
 * ```
 *
 * Interface-typed parameters are emitted as `Object`. Name the key with
 * `@Inject()`:
 *
 * ```typescript
 * @Injectable()
 * class Report {
 *   constructor(@Inject(ILogger) private readonly logger: ILogger) {}
 * }
 * ```
 *
 * ## Constructor Count
 *
 * Each `@Injectable` application records one signature. A class decorated
 * twice (for instance to describe two overloads) exposes two constructors,
 * which the container rejects as ambiguous.
 *
 * @example With tsconfig.json setup
 * ```json
 * {
 *   "compilerOptions": {
 *     "experimentalDecorators": true,
 *     "emitDecoratorMetadata": true
 *   }
 * }
 * ```
 */

import 'reflect-metadata';

import { type TypeKey, InjectionToken, describeTypeKey } from '../../domain/di';

const PARAM_TYPES_KEY = 'design:paramtypes';
const CONSTRUCTOR_SIGNATURES_KEY = 'wirebox:constructor-signatures';
const INJECT_OVERRIDES_KEY = 'wirebox:inject-overrides';

/**
 * Options for {@link Injectable}
 */
export interface InjectableOptions {
  /**
   * Explicit parameter keys, in order.
   *
   * @remarks
   * Use when the class is compiled without `emitDecoratorMetadata`, or to
   * describe a signature other than the one the compiler emits.
   */
  params?: readonly TypeKey[];
}

/**
 * Decorator that records a constructor signature for the container.
 *
 * @remarks
 * Without `params`, the signature is the compiler-emitted
 * `design:paramtypes` with any `@Inject()` overrides applied. When neither
 * is available, only a constructor that declares no parameters can be
 * recorded; otherwise nothing is recorded and the class has no accessible
 * constructor.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class Foo {
 *   constructor(public readonly bar: Bar, public readonly baz: Baz) {}
 * }
 *
 * @Injectable({ params: [Baz] })
 * class Legacy {
 *   constructor(baz) {}
 * }
 * ```
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    const signature = options.params ?? readEmittedSignature(target);
    if (signature === undefined) {
      return;
    }

    Reflect.defineMetadata(
      CONSTRUCTOR_SIGNATURES_KEY,
      [...getConstructorSignatures(target), [...signature]],
      target,
    );
  };
}

/**
 * Decorator that names the key to resolve for a constructor parameter.
 *
 * @throws {TypeError} When applied to a method parameter
 *
 * @example
 * ```typescript
 * const ILogger = new InjectionToken<ILogger>('ILogger');
 *
 * @Injectable()
 * class UserService {
 *   constructor(
 *     @Inject(ILogger) private readonly logger: ILogger,
 *     private readonly repository: UserRepository,
 *   ) {}
 * }
 * ```
 */
export function Inject<T>(type: TypeKey<T>): ParameterDecorator {
  return (target, propertyKey, parameterIndex) => {
    if (propertyKey !== undefined) {
      throw new TypeError(
        `@Inject(${describeTypeKey(type)}) is only supported on constructor parameters`,
      );
    }

    const overrides = new Map(getInjectOverrides(target));
    overrides.set(parameterIndex, type);
    Reflect.defineMetadata(INJECT_OVERRIDES_KEY, overrides, target);
  };
}

/**
 * Constructor signatures recorded on the class itself (not inherited).
 *
 * @internal
 */
export function getConstructorSignatures(target: Function): (readonly TypeKey[])[] {
  const recorded: unknown = Reflect.getOwnMetadata(CONSTRUCTOR_SIGNATURES_KEY, target);
  return Array.isArray(recorded) ? recorded.filter(isTypeKeyList) : [];
}

function getInjectOverrides(target: Object): ReadonlyMap<number, TypeKey> {
  const recorded: unknown = Reflect.getOwnMetadata(INJECT_OVERRIDES_KEY, target);
  return recorded instanceof Map ? recorded : new Map<number, TypeKey>();
}

function readEmittedSignature(target: Function): TypeKey[] | undefined {
  const overrides = getInjectOverrides(target);
  // Inherited lookup: a subclass without its own constructor takes its parent's
  const emitted: unknown = Reflect.getMetadata(PARAM_TYPES_KEY, target);

  if (isTypeKeyList(emitted)) {
    return emitted.map((type, index) => overrides.get(index) ?? type);
  }

  const declared: TypeKey[] = [];
  for (let index = 0; index < target.length; index++) {
    const type = overrides.get(index);
    if (type === undefined) {
      return undefined;
    }
    declared.push(type);
  }
  return declared;
}

function isTypeKeyList(value: unknown): value is TypeKey[] {
  return Array.isArray(value) && value.every(isTypeKey);
}

function isTypeKey(value: unknown): value is TypeKey {
  return typeof value === 'function' || value instanceof InjectionToken;
}
