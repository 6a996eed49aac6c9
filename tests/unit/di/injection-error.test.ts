/**
 * @fileoverview Unit tests for injection errors and cause-chain helpers
 */

import {
  CyclicDependencyError,
  InjectionError,
  InjectionToken,
  getCauseChain,
  getRootCause,
} from '../../../src';

class ServiceA {}
class ServiceB {}

describe('InjectionError', () => {
  it('should be an Error with its own name', () => {
    const error = new InjectionError('Unable to find a valid constructor on ServiceA');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(InjectionError);
    expect(error.name).toBe('InjectionError');
    expect(error.message).toBe('Unable to find a valid constructor on ServiceA');
  });

  it('should not define a cause when none is given', () => {
    const error = new InjectionError('no cause');

    expect('cause' in error).toBe(false);
    expect(error.type).toBeUndefined();
    expect(error.reason).toBeUndefined();
  });

  it('should keep type, reason and cause', () => {
    const cause = new RangeError('out of range');
    const error = new InjectionError('Error invoking constructor of ServiceA', {
      type: ServiceA,
      reason: 'constructor-failed',
      cause,
    });

    expect(error.type).toBe(ServiceA);
    expect(error.reason).toBe('constructor-failed');
    expect(error.cause).toBe(cause);
  });

  it('should allow an empty message', () => {
    expect(new InjectionError().message).toBe('');
  });
});

describe('CyclicDependencyError', () => {
  it('should name the cycle', () => {
    const error = new CyclicDependencyError(ServiceA, [ServiceA, ServiceB]);

    expect(error).toBeInstanceOf(InjectionError);
    expect(error.name).toBe('CyclicDependencyError');
    expect(error.message).toBe(
      'Circular dependency detected: ServiceA -> ServiceB -> ServiceA',
    );
    expect(error.path).toEqual(['ServiceA', 'ServiceB', 'ServiceA']);
    expect(error.type).toBe(ServiceA);
    expect(error.reason).toBe('cyclic-dependency');
  });

  it('should describe tokens on the path', () => {
    const token = new InjectionToken<ServiceB>('Repository');
    const error = new CyclicDependencyError(token, [token]);

    expect(error.path).toEqual(['InjectionToken(Repository)', 'InjectionToken(Repository)']);
  });

  it('should copy the resolution path', () => {
    const resolutionPath = [ServiceA];
    const error = new CyclicDependencyError(ServiceB, resolutionPath);
    resolutionPath.push(ServiceB);

    expect(error.path).toEqual(['ServiceA', 'ServiceB']);
  });
});

describe('Cause chain helpers', () => {
  it('should list the error and every cause', () => {
    const root = new TypeError('root');
    const middle = new InjectionError('middle', { cause: root });
    const outer = new InjectionError('outer', { cause: middle });

    expect(getCauseChain(outer)).toEqual([outer, middle, root]);
    expect(getRootCause(outer)).toBe(root);
  });

  it('should end the chain at a non-error cause', () => {
    const error = new Error('wrapper', { cause: 'plain text' });

    expect(getCauseChain(error)).toEqual([error, 'plain text']);
    expect(getRootCause(error)).toBe('plain text');
  });

  it('should stop on self-referencing chains', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(getCauseChain(first)).toEqual([first, second]);
  });

  it('should return a non-error value as its own root', () => {
    expect(getCauseChain('oops')).toEqual(['oops']);
    expect(getRootCause('oops')).toBe('oops');
    expect(getCauseChain(undefined)).toEqual([]);
    expect(getRootCause(undefined)).toBeUndefined();
  });
});
