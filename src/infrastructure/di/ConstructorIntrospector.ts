/**
 * @fileoverview ConstructorIntrospector - Reflective constructor enumeration
 *
 * @module wirebox/infrastructure/di
 *
 * | Key | Accessible constructors |
 * |---|---|
 * | `InjectionToken` | none (interface) |
 * | class with `@Injectable` signatures | one per recorded signature |
 * | any other class | none |
 *
 * Only `@Injectable` marks a class as constructible. An undecorated class
 * may be abstract, or a subclass whose implicit constructor would forward
 * nothing to a parent that needs dependencies; neither can be told apart at
 * run time. Built-ins such as `String` or `Object` fall in the same row:
 * bind them explicitly instead.
 */

import { type TypeKey, isInjectionToken } from '../../domain/di';
import {
  type ConstructorDescriptor,
  type IConstructorIntrospector,
  getConstructorSignatures,
} from '../../application/di';

export class ConstructorIntrospector implements IConstructorIntrospector {
  getConstructors<T>(type: TypeKey<T>): ConstructorDescriptor<T>[] {
    if (isInjectionToken(type)) {
      return [];
    }

    return getConstructorSignatures(type).map((parameterTypes) => ({ type, parameterTypes }));
  }
}
