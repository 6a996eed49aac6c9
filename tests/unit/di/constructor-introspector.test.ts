/**
 * @fileoverview Unit tests for constructor introspection and the metadata decorators
 */

import 'reflect-metadata';

import {
  ConstructorIntrospector,
  Inject,
  Injectable,
  InjectionToken,
  getConstructorSignatures,
} from '../../../src';

interface Clock {
  now(): number;
}

const CLOCK = new InjectionToken<Clock>('Clock');

class Engine {}

@Injectable()
class Car {
  constructor(public readonly engine: Engine) {}
}

@Injectable()
class Dashboard {
  constructor(
    public readonly car: Car,
    @Inject(CLOCK) public readonly clock: Clock,
  ) {}
}

@Injectable({ params: [Engine, CLOCK] })
class Workshop {
  constructor(
    public readonly engine: Engine,
    public readonly clock: Clock,
  ) {}
}

@Injectable({ params: [Car] })
@Injectable({ params: [Engine, Engine] })
class Garage {
  readonly vehicles: unknown[];

  constructor(...vehicles: unknown[]) {
    this.vehicles = vehicles;
  }
}

@Injectable()
class SportsCar extends Car {}

class UndecoratedCar extends Car {}

class Trailer {
  constructor(public readonly capacity: number) {}
}

@Injectable()
class Horn {}

abstract class Vehicle {
  abstract drive(): string;
}

describe('ConstructorIntrospector', () => {
  const introspector = new ConstructorIntrospector();

  // ==========================================================================
  // Decorated classes
  // ==========================================================================

  describe('decorated classes', () => {
    it('should expose the compiler-emitted signature', () => {
      expect(introspector.getConstructors(Car)).toEqual([
        { type: Car, parameterTypes: [Engine] },
      ]);
    });

    it('should apply @Inject overrides', () => {
      expect(introspector.getConstructors(Dashboard)).toEqual([
        { type: Dashboard, parameterTypes: [Car, CLOCK] },
      ]);
    });

    it('should prefer explicit params', () => {
      expect(introspector.getConstructors(Workshop)).toEqual([
        { type: Workshop, parameterTypes: [Engine, CLOCK] },
      ]);
    });

    it('should expose one constructor per @Injectable application', () => {
      const constructors = introspector.getConstructors(Garage);

      expect(constructors).toHaveLength(2);
      expect(constructors.map((descriptor) => descriptor.parameterTypes)).toEqual([
        [Engine, Engine],
        [Car],
      ]);
    });

    it('should take the parent signature for a decorated subclass without constructor', () => {
      expect(getConstructorSignatures(SportsCar)).toEqual([[Engine]]);
    });

    it('should not inherit recorded signatures', () => {
      expect(getConstructorSignatures(UndecoratedCar)).toEqual([]);
      expect(introspector.getConstructors(UndecoratedCar)).toEqual([]);
    });

    it('should record an empty signature for a class without constructor', () => {
      expect(introspector.getConstructors(Horn)).toEqual([{ type: Horn, parameterTypes: [] }]);
    });
  });

  // ==========================================================================
  // Undecorated classes and tokens
  // ==========================================================================

  describe('undecorated classes', () => {
    it('should expose nothing for a class without parameters', () => {
      expect(introspector.getConstructors(Engine)).toEqual([]);
    });

    it('should expose nothing for an abstract class', () => {
      expect(introspector.getConstructors(Vehicle)).toEqual([]);
    });

    it('should expose nothing when parameters cannot be introspected', () => {
      expect(introspector.getConstructors(Trailer)).toEqual([]);
      expect(introspector.getConstructors(String)).toEqual([]);
      expect(introspector.getConstructors(Object)).toEqual([]);
    });
  });

  describe('tokens', () => {
    it('should never expose a constructor', () => {
      expect(introspector.getConstructors(CLOCK)).toEqual([]);
    });
  });

  // ==========================================================================
  // @Inject placement
  // ==========================================================================

  describe('@Inject', () => {
    it('should reject method parameters', () => {
      expect(() => {
        class Scheduler {
          schedule(@Inject(CLOCK) clock: Clock): number {
            return clock.now();
          }
        }
        return Scheduler;
      }).toThrow(
        new TypeError('@Inject(InjectionToken(Clock)) is only supported on constructor parameters'),
      );
    });
  });
});
