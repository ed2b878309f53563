import { beforeEach, describe, expect, it, vi } from 'vitest';

import { Injector, isWritable } from '../src/core/injector.js';
import { Inject } from '../src/decorators/inject.js';
import { InvalidTargetError } from '../src/errors/errors.js';
import { StaticComponentRegistry } from '../src/registry/static-registry.js';
import type { Dependency } from '../src/types/types.js';

class Clock {}
class Mailer {}

const clock = new Clock();
const mailer = new Mailer();

const resolver = () =>
  vi.fn((dependency: Dependency): unknown => (dependency.type === Clock ? clock : mailer));

describe('isWritable', () => {
  it('follows the prototype chain like assignment does', () => {
    const proto = {};
    Object.defineProperty(proto, 'locked', { value: 1, writable: false });
    Object.defineProperty(proto, 'viaSetter', { set() {}, configurable: true });
    Object.defineProperty(proto, 'getterOnly', { get: () => 1 });
    const instance: object = Object.create(proto);
    Object.defineProperty(instance, 'own', { value: 1, writable: true });

    expect(isWritable(instance, 'own')).toBe(true);
    expect(isWritable(instance, 'missing')).toBe(true);
    expect(isWritable(instance, 'locked')).toBe(false);
    expect(isWritable(instance, 'viaSetter')).toBe(true);
    expect(isWritable(instance, 'getterOnly')).toBe(false);
    expect(isWritable(Object.freeze({ own: 1 }), 'own')).toBe(false);
    expect(isWritable(Object.preventExtensions({}), 'missing')).toBe(false);
  });
});

describe('Injector', () => {
  beforeEach(() => {
    StaticComponentRegistry.reset();
  });

  describe('fields', () => {
    it('assigns every marked field', () => {
      class Service {
        @Inject(Clock) clock?: Clock;
        @Inject(Mailer) mailer?: Mailer;
        untouched = 'as constructed';
      }
      const instance = new Service();

      new Injector().inject(instance, StaticComponentRegistry.describe(Service), resolver());

      expect(instance.clock).toBe(clock);
      expect(instance.mailer).toBe(mailer);
      expect(instance.untouched).toBe('as constructed');
    });

    it('assigns fields declared readonly', () => {
      class Service {
        @Inject(Clock) readonly clock?: Clock;
      }
      const instance = new Service();

      new Injector().inject(instance, StaticComponentRegistry.describe(Service), resolver());

      expect(instance.clock).toBe(clock);
    });

    it('rejects static fields', () => {
      class Service {
        @Inject(Clock) static clock?: Clock;
      }

      expect(() =>
        new Injector().inject(new Service(), StaticComponentRegistry.describe(Service), resolver())
      ).toThrow('Service.clock: static fields cannot be injected.');
    });

    it('checks every field before assigning any', () => {
      class Service {
        @Inject(Clock) clock?: Clock;
        @Inject(Mailer) mailer?: Mailer;

        constructor() {
          Object.defineProperty(this, 'mailer', { value: undefined, writable: false });
        }
      }
      const instance = new Service();
      const resolve = resolver();

      let error: unknown;
      try {
        new Injector().inject(instance, StaticComponentRegistry.describe(Service), resolve);
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(InvalidTargetError);
      const invalid = error instanceof InvalidTargetError ? error : undefined;
      expect(invalid?.member).toBe('mailer');
      expect(invalid?.reason).toBe('immutable-field');
      expect(instance.clock).toBeUndefined();
      expect(resolve).not.toHaveBeenCalled();
    });

    it('rejects fields on frozen instances', () => {
      class Service {
        @Inject(Clock) clock?: Clock;

        constructor() {
          Object.freeze(this);
        }
      }

      expect(() =>
        new Injector().inject(new Service(), StaticComponentRegistry.describe(Service), resolver())
      ).toThrow(InvalidTargetError);
    });
  });

  describe('setters', () => {
    it('calls conforming setters with the resolved dependency', () => {
      class Service {
        received: unknown[] = [];

        @Inject(Mailer)
        setMailer(value: Mailer) {
          this.received.push(value);
        }
      }
      const instance = new Service();

      new Injector().inject(instance, StaticComponentRegistry.describe(Service), resolver());

      expect(instance.received).toEqual([mailer]);
    });

    it('runs fields before setters', () => {
      const order: string[] = [];
      class Service {
        private current?: Clock;

        set clock(value: Clock | undefined) {
          order.push('field');
          this.current = value;
        }
        get clock() {
          return this.current;
        }

        setMailer(_mailer: Mailer) {
          order.push('setter');
        }
      }
      StaticComponentRegistry.registerMethod(Service, 'setMailer', [Mailer], false);
      StaticComponentRegistry.registerField(Service, 'clock', Clock, false);
      const instance = new Service();

      new Injector().inject(instance, StaticComponentRegistry.describe(Service), resolver());

      expect(order).toEqual(['field', 'setter']);
      expect(instance.clock).toBe(clock);
    });

    it('skips methods that do not follow the setter convention', () => {
      const calls: string[] = [];
      class Service {
        @Inject(Mailer)
        wire(_mailer: Mailer) {
          calls.push('wire');
        }

        @Inject(Mailer, Clock)
        setBoth(_mailer: Mailer, _clock: Clock) {
          calls.push('setBoth');
        }

        @Inject(Mailer)
        setNothing() {
          calls.push('setNothing');
        }

        @Inject(Mailer)
        settle(_mailer: Mailer) {
          calls.push('settle');
        }
      }

      new Injector().inject(new Service(), StaticComponentRegistry.describe(Service), resolver());

      expect(calls).toEqual([]);
    });

    it('rejects non-conforming methods in strict mode', () => {
      class Service {
        @Inject(Mailer)
        wire(_mailer: Mailer) {}
      }

      expect(() =>
        new Injector(true).inject(new Service(), StaticComponentRegistry.describe(Service), resolver())
      ).toThrow('Service.wire: methods marked with @Inject() must be named setXxx and take exactly one argument.');
    });
  });

  it('does nothing for definitions without fields or setters', () => {
    class Plain {}
    const resolve = resolver();

    new Injector().inject(new Plain(), StaticComponentRegistry.describe(Plain), resolve);

    expect(resolve).not.toHaveBeenCalled();
  });
});
