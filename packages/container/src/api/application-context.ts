import { BeanFactory } from '../core/bean-factory.js';
import { DEFAULT_QUALIFIER } from '../core/type-ref.js';
import { InvalidContainerConfigError } from '../errors/index.js';
import { DefaultComponentRegistry, type ComponentRegistry } from '../registry/index.js';
import type { ContainerConfig, Declaration, TypeRef } from '../types/types.js';
import type { ComponentScanner } from './scanner.js';

type RefreshState = 'idle' | 'refreshing' | 'ready' | 'failed';

const REGISTRY_METHODS = [
  'register',
  'resolve',
  'containsBean',
  'getQualifiers',
  'getRegisteredTypes',
  'deregister',
] as const;

function isComponentRegistry(value: unknown): value is ComponentRegistry {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'size') === 'number' &&
    REGISTRY_METHODS.every((method) => typeof Reflect.get(value, method) === 'function')
  );
}

/**
 * Container facade.
 *
 * Collects declarations once at construction, builds every singleton on the
 * first refresh(), and afterwards answers lookups straight from the
 * registry.
 *
 * @remarks
 * - refresh() is a one-shot latch: later calls are no-ops, and a call made
 *   while a refresh is running (e.g. from a component constructor) returns
 *   immediately
 * - a failed refresh keeps the singletons built before the failure and
 *   rethrows the same failure on every later call
 * - transient components are never registered; build them through
 *   getBeanFactory().createBean()
 *
 * @example
 * ```typescript
 * const context = new ApplicationContext(new DecoratorScanner(), { name: 'App' });
 * context.refresh();
 * const service = context.getBean(ShapeService);
 * const circle = context.getBean(Shape, 'circle');
 * ```
 */
export class ApplicationContext {
  private readonly name: string;
  private readonly registry: ComponentRegistry;
  private readonly beanFactory: BeanFactory;
  private readonly declarations: readonly Declaration[];

  private state: RefreshState = 'idle';
  private failure: unknown;

  constructor(source: ComponentScanner | readonly Declaration[], config: ContainerConfig = {}) {
    this.validateConfig(config);

    this.name = config.name ?? 'ApplicationContext';
    this.registry = config.registry ?? new DefaultComponentRegistry();
    this.declarations = Object.freeze([...(isDeclarationList(source) ? source : source.scan())]);
    this.beanFactory = new BeanFactory(this.registry, {
      declarations: this.declarations,
      strictSetters: config.strictSetters,
      onInstantiate: config.onInstantiate,
    });
  }

  /**
   * Build every singleton declaration, in declaration order.
   *
   * @throws BeanInstantiationError for the first singleton that fails; the
   *         context stays partially initialized and cannot be refreshed again
   */
  refresh(): void {
    if (this.state === 'failed') throw this.failure;
    if (this.state !== 'idle') return;

    this.state = 'refreshing';
    try {
      for (const declaration of this.declarations) {
        if (declaration.singleton) this.beanFactory.createBean(declaration);
      }
      this.state = 'ready';
    } catch (e) {
      this.state = 'failed';
      this.failure = e;
      throw e;
    }
  }

  isRefreshed(): boolean {
    return this.state === 'ready';
  }

  /**
   * @throws BeanNotFoundError if no bean is registered for the pair
   */
  getBean<T>(type: TypeRef<T>, qualifier: string = DEFAULT_QUALIFIER): T {
    return this.registry.resolve(type, qualifier);
  }

  containsBean(type: TypeRef, qualifier: string = DEFAULT_QUALIFIER): boolean {
    return this.registry.containsBean(type, qualifier);
  }

  getName(): string {
    return this.name;
  }

  getRegistry(): ComponentRegistry {
    return this.registry;
  }

  getBeanFactory(): BeanFactory {
    return this.beanFactory;
  }

  getDeclarations(): readonly Declaration[] {
    return this.declarations;
  }

  private validateConfig(config: ContainerConfig): void {
    if (config.name !== undefined && (typeof config.name !== 'string' || !config.name)) {
      throw new InvalidContainerConfigError(`'name' must be a non-empty string.`);
    }
    if (config.strictSetters !== undefined && typeof config.strictSetters !== 'boolean') {
      throw new InvalidContainerConfigError(`'strictSetters' must be a boolean.`);
    }
    if (config.onInstantiate !== undefined && typeof config.onInstantiate !== 'function') {
      throw new InvalidContainerConfigError(`'onInstantiate' must be a function.`);
    }
    if (config.registry !== undefined && !isComponentRegistry(config.registry)) {
      throw new InvalidContainerConfigError(
        `'registry' must have a numeric size and implement ${REGISTRY_METHODS.join(', ')}.`
      );
    }
  }
}

function isDeclarationList(
  source: ComponentScanner | readonly Declaration[]
): source is readonly Declaration[] {
  return Array.isArray(source);
}
