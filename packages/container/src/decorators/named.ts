import { DEFAULT_QUALIFIER, isTypeRef } from '../core/type-ref.js';
import { StaticComponentRegistry } from '../registry/index.js';
import type { MemberKey } from '../types/types.js';

/**
 * Decorator returned by @Named(); valid on classes, properties and
 * constructor or method parameters.
 */
export type NamedDecorator = (
  target: object,
  propertyKey?: MemberKey,
  parameterIndex?: number
) => void;

/**
 * Attaches a qualifier.
 *
 * On a parameter or property it selects which registration of the injected
 * type is used. On a class it sets the qualifier the component itself is
 * registered under (same as `@Component({ qualifier })`, which wins when
 * both are present).
 *
 * @example
 * ```typescript
 * @Component()
 * @Inject(Shape, Shape)
 * class ShapeService {
 *   constructor(
 *     @Named('circle') readonly circle: Shape,
 *     @Named('rectangle') readonly rectangle: Shape
 *   ) {}
 * }
 * ```
 */
export function Named(qualifier: string): NamedDecorator {
  if (typeof qualifier !== 'string' || qualifier.length === 0) {
    throw new Error('@Named() expects a non-empty qualifier string.');
  }
  if (qualifier === DEFAULT_QUALIFIER) {
    throw new Error(`@Named('${DEFAULT_QUALIFIER}') is reserved; omit @Named() for the default qualifier.`);
  }

  return function (target, propertyKey, parameterIndex) {
    const isStatic = isTypeRef(target);
    const owner = isStatic ? target : target.constructor;
    // Constructor parameters and the class itself both arrive without a key
    StaticComponentRegistry.registerQualifier(owner, propertyKey, parameterIndex, qualifier, isStatic);
  };
}
