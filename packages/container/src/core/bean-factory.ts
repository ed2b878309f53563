/* BeanFactory
 *
 * The construction engine. Given a Declaration it produces a fully wired
 * instance:
 *
 *  1. singleton already registered → return it, nothing is built
 *  2. type already in flight for this request → CyclicDependencyError
 *  3. mark the type in flight (unwound on every exit path)
 *  4. select a constructor, resolve its arguments, instantiate
 *  5. singleton → register before injection, so a cycle broken by field or
 *     setter injection can resolve this instance from the registry
 *     (if injection then fails, this registration and every singleton
 *     registered during the injection are removed again, since those may
 *     hold the half-injected instance)
 *  6. field injection, then setter injection
 *  7. leave the in-flight set and return
 *
 * Dependencies are looked up in the registry first. When the registry has no
 * entry but a declaration for the same (type, qualifier) is known, that
 * declaration is built recursively within the same ConstructionContext.
 * Otherwise the registry's BeanNotFoundError propagates.
 *
 * Every failure leaves createBean() as a BeanInstantiationError naming the
 * innermost failing type, with the original error as `cause`.
 */
import {
  BeanInstantiationError,
  CyclicDependencyError,
  InvalidArgumentError,
} from '../errors/index.js';
import type { ComponentRegistry } from '../registry/component-registry.js';
import { StaticComponentRegistry } from '../registry/static-registry.js';
import type { BeanFactoryOptions, Declaration, Dependency } from '../types/types.js';
import { Activator } from './activator.js';
import { ConstructionContext, type Registration } from './construction-context.js';
import { selectConstructor } from './constructor-selector.js';
import { DeclarationIndex } from './declaration.js';
import { Injector } from './injector.js';
import { describeType, isTypeRef, normalizeQualifier } from './type-ref.js';

export class BeanFactory {
  private readonly declarations: DeclarationIndex;
  private readonly activator: Activator;
  private readonly injector: Injector;

  constructor(
    private readonly registry: ComponentRegistry,
    options: BeanFactoryOptions = {}
  ) {
    this.declarations = new DeclarationIndex(options.declarations);
    this.activator = new Activator(options.onInstantiate);
    this.injector = new Injector(options.strictSetters ?? false);
  }

  /**
   * Build (or, for a registered singleton, return) the component described
   * by `declaration`.
   *
   * Each call starts a new ConstructionContext, so independent calls never
   * share in-flight state.
   *
   * @throws InvalidArgumentError if the declaration is malformed
   * @throws BeanInstantiationError for any construction failure
   */
  createBean<T>(declaration: Declaration<T>): T {
    if (declaration == null || !isTypeRef(declaration.componentType)) {
      throw new InvalidArgumentError('declaration', 'must carry a component type');
    }
    // A singleton short-circuit returns what register<T>() stored, and a
    // fresh build instantiates declaration.implementation: TypeRef<T>
    return this.build(declaration, new ConstructionContext()) as T;
  }

  private build(declaration: Declaration, context: ConstructionContext): unknown {
    const type = declaration.componentType;
    const qualifier = normalizeQualifier(declaration.qualifier);

    if (declaration.singleton && this.registry.containsBean(type, qualifier)) {
      return this.registry.resolve(type, qualifier);
    }

    try {
      return this.construct(declaration, qualifier, context);
    } catch (e) {
      // Already carries the innermost failing type
      if (e instanceof BeanInstantiationError) throw e;
      throw new BeanInstantiationError(describeType(type), e);
    }
  }

  private construct(declaration: Declaration, qualifier: string, context: ConstructionContext): unknown {
    const type = declaration.componentType;

    if (context.has(type)) throw new CyclicDependencyError(context.cycleTo(type));

    context.enter(type);
    try {
      const definition = StaticComponentRegistry.describe(declaration.implementation);
      const ctor = selectConstructor(definition);
      const args = ctor.dependencies.map((dep) => this.resolveDependency(dep, context));
      const instance = this.activator.instantiate(declaration.implementation, ctor, args);

      const mark = context.registrationMark;
      if (declaration.singleton) {
        this.registry.register(type, qualifier, instance);
        context.recordRegistration({ type, qualifier, instance });
      }

      try {
        this.injector.inject(instance, definition, (dep) => this.resolveDependency(dep, context));
      } catch (e) {
        // Nothing registered during a transient's injection can reach it
        if (declaration.singleton) this.rollback(context.takeRegistrationsSince(mark));
        throw e;
      }

      return instance;
    } finally {
      context.leave(type);
    }
  }

  private resolveDependency(dependency: Dependency, context: ConstructionContext): unknown {
    const qualifier = normalizeQualifier(dependency.qualifier);

    if (this.registry.containsBean(dependency.type, qualifier)) {
      return this.registry.resolve(dependency.type, qualifier);
    }

    const declaration = this.declarations.find(dependency.type, qualifier);
    if (declaration) return this.build(declaration, context);

    // Not registered and not declared: surfaces BeanNotFoundError
    return this.registry.resolve(dependency.type, qualifier);
  }

  private rollback(registrations: readonly Registration[]): void {
    for (const { type, qualifier, instance } of registrations) {
      // Leave entries alone that someone replaced in the meantime
      if (this.registry.containsBean(type, qualifier) && this.registry.resolve(type, qualifier) === instance) {
        this.registry.deregister(type, qualifier);
      }
    }
  }
}
