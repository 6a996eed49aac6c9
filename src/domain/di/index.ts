/**
 * @module wirebox/domain/di
 * @description Type keys, tokens and injection errors
 */

export { InjectionToken } from './InjectionToken';
export type { TypeGuard } from './InjectionToken';

export {
  isInjectionToken,
  describeTypeKey,
  isInstanceOf,
  castTo,
  castBoundValue,
} from './TypeKey';
export type { Type, TypeKey } from './TypeKey';

export {
  InjectionError,
  CyclicDependencyError,
  getCauseChain,
  getRootCause,
} from './exceptions';
export type { InjectionFailureReason, InjectionErrorOptions } from './exceptions';
