/* Activator
 *
 * Turns a selected constructor point plus resolved arguments into an
 * instance. Two paths:
 *  - the class's own constructor, invoked through Reflect.construct so that
 *    TypeScript-private constructors are still reachable
 *  - a static factory method, invoked with the class as `this`
 *
 * Dependency resolution and registration stay in BeanFactory; this module
 * only instantiates and reports timings through the instrumentation hook.
 */

import { InvalidTargetError } from '../errors/index.js';
import type { ConstructorPoint, InstantiateHook, TypeRef } from '../types/types.js';
import { describeType } from './type-ref.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 * Initialized once at module load.
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

export class Activator {
  constructor(private readonly instantiateHook?: InstantiateHook) {}

  /**
   * Instantiate `target` through `point` with already-resolved arguments.
   *
   * Behavior contract
   *  - Errors thrown by the constructor or factory propagate unchanged.
   *  - Throws `InvalidTargetError` when a factory key no longer names a
   *    function, or when the factory returns null or undefined.
   */
  instantiate(target: TypeRef, point: ConstructorPoint, args: readonly unknown[]): unknown {
    const name = describeType(target);
    return this.instrument<unknown>(name, () => {
      if (point.key === null) return Reflect.construct(target, args);

      const member = String(point.key);
      const factory: unknown = Reflect.get(target, point.key);
      if (typeof factory !== 'function') {
        throw new InvalidTargetError(name, member, 'missing-factory');
      }

      const instance: unknown = Reflect.apply(factory, target, args);
      if (instance === null || instance === undefined) {
        throw new InvalidTargetError(name, member, 'empty-factory-result');
      }
      return instance;
    });
  }

  /**
   * Wrap instantiation with performance instrumentation.
   */
  private instrument<T>(typeName: string, execute: () => T): T {
    const hook = this.instantiateHook;
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      hook(typeName, toNs(nowMs() - start));
    }
  }
}
