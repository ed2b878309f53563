import { isTypeRef } from '../core/type-ref.js';
import { StaticComponentRegistry } from '../registry/index.js';
import type { MemberKey, TypeRef } from '../types/types.js';

/**
 * Decorator returned by @Inject(); valid on classes, static methods,
 * instance methods and properties.
 */
export type InjectDecorator = (
  target: object,
  propertyKey?: MemberKey,
  descriptor?: PropertyDescriptor
) => void;

/**
 * Marks an injection point and declares its dependency types.
 *
 * TypeScript erases parameter and property types, so every injection point
 * lists the classes it depends on explicitly. Qualifiers are attached
 * separately with @Named().
 *
 * Placement decides the kind of injection point:
 * - on the class: marks the class constructor, one type per argument
 * - on a static method: marks that method as a factory constructor
 * - on a property: field injection, exactly one type
 * - on an instance method: setter injection, exactly one type
 *
 * Fields are checked for writability on the constructed instance, not in
 * the type system: a `readonly` field is erased at compile time and gets
 * injected like any other, while a frozen instance, a non-writable property
 * or a getter without a setter is rejected with InvalidTargetError.
 *
 * @param types - Dependency types in parameter order
 *
 * @example
 * ```typescript
 * @Component()
 * @Inject(Database, Logger)
 * class UserService {
 *   constructor(
 *     private db: Database,
 *     @Named('audit') private logger: Logger
 *   ) {}
 *
 *   @Inject(Clock) clock?: Clock;
 *
 *   @Inject(Mailer)
 *   setMailer(mailer: Mailer) { this.mailer = mailer; }
 * }
 * ```
 */
export function Inject(...types: TypeRef[]): InjectDecorator {
  types.forEach((type, index) => {
    if (!isTypeRef(type)) {
      throw new Error(
        `@Inject() expects classes; argument ${index} is ${type === undefined ? 'undefined' : typeof type}. ` +
          'Check for a circular module import that leaves the class undefined at decoration time.'
      );
    }
  });

  return function (target, propertyKey, descriptor) {
    // Class decorator: target is the constructor itself
    if (propertyKey === undefined) {
      if (!isTypeRef(target)) throw new Error('@Inject() must decorate a class or a class member.');
      StaticComponentRegistry.registerConstructor(target, types);
      return;
    }

    // Static members receive the constructor, instance members the prototype
    const isStatic = isTypeRef(target);
    const owner = isStatic ? target : target.constructor;

    if (descriptor === undefined) {
      if (types.length !== 1) {
        throw new Error(
          `@Inject() on field ${owner.name}.${String(propertyKey)} expects exactly one type, got ${types.length}.`
        );
      }
      StaticComponentRegistry.registerField(owner, propertyKey, types[0], isStatic);
      return;
    }

    StaticComponentRegistry.registerMethod(owner, propertyKey, types, isStatic);
  };
}
