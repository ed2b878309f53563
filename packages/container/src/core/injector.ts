/* Injector
 *
 * Field and setter injection on an already constructed instance.
 *
 * Fields
 *  - only fields marked with @Inject() are touched
 *  - static fields and fields that are not writable on the instance abort
 *    the whole construction with InvalidTargetError; every marked field is
 *    checked before the first one is assigned
 *
 * Setters
 *  - a marked instance method is a setter iff it is named setXxx, takes
 *    exactly one parameter, and declares exactly one dependency type
 *  - other marked methods are skipped, or rejected when strictSetters is on
 */
import { InvalidTargetError } from '../errors/index.js';
import type { ComponentDefinition, Dependency, MemberKey, SetterPoint } from '../types/types.js';
import { describeType } from './type-ref.js';

const SETTER_PATTERN = /^set[A-Z]/;

/** Resolves one dependency within the current construction request. */
export type DependencyResolver = (dependency: Dependency) => unknown;

/**
 * Whether assigning `key` on `instance` would succeed.
 *
 * Walks the prototype chain the same way [[Set]] does: an own data property
 * must be writable, an inherited data property must be writable and the
 * instance extensible, an accessor must have a setter, and a missing
 * property needs an extensible instance.
 */
export function isWritable(instance: object, key: MemberKey): boolean {
  let owner: object | null = instance;
  while (owner !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(owner, key);
    if (descriptor) {
      if (descriptor.get !== undefined || descriptor.set !== undefined) {
        return descriptor.set !== undefined;
      }
      if (descriptor.writable !== true) return false;
      return owner === instance || Object.isExtensible(instance);
    }
    owner = Object.getPrototypeOf(owner);
  }
  return Object.isExtensible(instance);
}

export class Injector {
  constructor(private readonly strictSetters = false) {}

  /**
   * Run field injection, then setter injection.
   */
  inject(instance: unknown, definition: ComponentDefinition, resolve: DependencyResolver): void {
    if (definition.fields.length === 0 && definition.setters.length === 0) return;
    if (typeof instance !== 'object' || instance === null) return;

    this.injectFields(instance, definition, resolve);
    this.injectSetters(instance, definition, resolve);
  }

  injectFields(instance: object, definition: ComponentDefinition, resolve: DependencyResolver): void {
    const typeName = describeType(definition.target);

    for (const field of definition.fields) {
      const member = String(field.key);
      if (field.isStatic) throw new InvalidTargetError(typeName, member, 'static-field');
      if (!isWritable(instance, field.key)) {
        throw new InvalidTargetError(typeName, member, 'immutable-field');
      }
    }

    for (const field of definition.fields) {
      const value = resolve(field.dependency);
      if (!Reflect.set(instance, field.key, value)) {
        throw new InvalidTargetError(typeName, String(field.key), 'immutable-field');
      }
    }
  }

  injectSetters(instance: object, definition: ComponentDefinition, resolve: DependencyResolver): void {
    const typeName = describeType(definition.target);

    for (const setter of definition.setters) {
      const method: unknown = Object.getOwnPropertyDescriptor(definition.target.prototype, setter.key)?.value;

      if (typeof method !== 'function' || !isSetter(setter, method)) {
        if (this.strictSetters) {
          throw new InvalidTargetError(typeName, String(setter.key), 'not-a-setter');
        }
        continue;
      }

      Reflect.apply(method, instance, [resolve(setter.dependencies[0])]);
    }
  }
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-function-type
function isSetter(setter: SetterPoint, method: Function): boolean {
  return (
    typeof setter.key === 'string' &&
    SETTER_PATTERN.test(setter.key) &&
    method.length === 1 &&
    setter.dependencies.length === 1
  );
}
