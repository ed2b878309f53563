import { createDeclaration } from '../core/declaration.js';
import { StaticComponentRegistry } from '../registry/index.js';
import { Lifecycle, type Declaration, type TypeRef } from '../types/index.js';

/**
 * Source of component declarations, consumed once by ApplicationContext.
 */
export interface ComponentScanner {
  scan(): readonly Declaration[];
}

export interface DecoratorScannerOptions {
  /** Keep only the classes this predicate accepts */
  include?: (target: TypeRef) => boolean;
}

/**
 * Scanner over classes decorated with @Component().
 *
 * Decorators record their metadata when a module is evaluated, so a class
 * is visible to the scanner once its module has been imported. Declarations
 * come out in decoration order.
 *
 * @example
 * ```typescript
 * import './services/index.js';
 *
 * const context = new ApplicationContext(new DecoratorScanner());
 * context.refresh();
 * ```
 */
export class DecoratorScanner implements ComponentScanner {
  constructor(private readonly options: DecoratorScannerOptions = {}) {}

  scan(): Declaration[] {
    const include = this.options.include;
    const declarations: Declaration[] = [];

    for (const target of StaticComponentRegistry.getDecoratedComponents()) {
      if (include && !include(target)) continue;
      const component = StaticComponentRegistry.getComponent(target);
      if (!component) continue;

      declarations.push(
        createDeclaration(component.provides ?? target, {
          implementation: target,
          singleton: component.lifecycle === Lifecycle.Singleton,
          qualifier: component.qualifier,
        })
      );
    }

    return declarations;
  }
}
