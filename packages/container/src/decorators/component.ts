import { isTypeRef } from '../core/type-ref.js';
import { StaticComponentRegistry } from '../registry/index.js';
import { Lifecycle } from '../types/index.js';
import type { ComponentMetadata, ComponentOptions, TypeRef } from '../types/types.js';

/**
 * Environment check for production mode.
 * Skips metadata freezing in production for minimal performance gain.
 */
const isProd = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const LIFECYCLES: readonly string[] = Object.values(Lifecycle);

/**
 * Marks a class as a managed component.
 *
 * Records the component's lifecycle, qualifier and registration type in the
 * StaticComponentRegistry at module load time. Scanners later turn every
 * decorated class into a Declaration.
 *
 * Requirements:
 * - Constructor arguments are declared with @Inject(...) on the class or on
 *   a static factory; a class without them must be constructible with no
 *   arguments
 * - Lifecycle defaults to Singleton if not specified
 *
 * @param options - Component configuration
 * @param options.qualifier - Qualifier to register under (default qualifier if omitted)
 * @param options.lifecycle - Instance lifecycle (singleton/transient)
 * @param options.provides - Type to register under instead of the class itself
 *
 * @example
 * ```typescript
 * abstract class Shape { abstract area(): number; }
 *
 * @Component({ provides: Shape, qualifier: 'circle' })
 * class Circle extends Shape { area() { return Math.PI; } }
 *
 * @Component({ lifecycle: Lifecycle.Transient })
 * class RequestHandler {}
 * ```
 */
export function Component<T>(options: ComponentOptions<T> = {}): (target: TypeRef<T>) => void {
  if (options.qualifier !== undefined && (typeof options.qualifier !== 'string' || !options.qualifier)) {
    throw new Error('@Component() qualifier must be a non-empty string.');
  }
  if (options.lifecycle !== undefined && !LIFECYCLES.includes(options.lifecycle)) {
    throw new Error(`@Component() lifecycle must be one of: ${LIFECYCLES.join(', ')}.`);
  }
  if (options.provides !== undefined && !isTypeRef(options.provides)) {
    throw new Error('@Component() provides must be a class.');
  }

  return (target) => {
    const metadata: ComponentMetadata = {
      qualifier: options.qualifier ?? null,
      lifecycle: options.lifecycle ?? Lifecycle.Singleton,
      provides: options.provides,
    };

    // Freeze metadata in development for immutability guarantees
    if (!isProd) Object.freeze(metadata);

    StaticComponentRegistry.registerComponent(target, metadata);
  };
}
