import type { ComponentRegistry } from '../registry/component-registry.js';

/**
 * Reference to a component type.
 *
 * Any class qualifies, including abstract classes and classes whose
 * constructor is private: only the runtime function and its prototype are
 * required. Registry keys compare these references by identity.
 *
 * @template T - Instance type produced by the class
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-function-type
export type TypeRef<T = unknown> = Function & { readonly prototype: T };

/** Property key of a decorated class member. */
export type MemberKey = string | symbol;

/**
 * Supported lifecycles for declared components.
 *
 *   - **Singleton**: built once, registered, and reused for every resolution
 *   - **Transient**: built fresh for every resolution, never registered
 *
 * @example
 * ```typescript
 * @Component({ lifecycle: Lifecycle.Transient })
 * class RequestHandler {}
 * ```
 */
export const Lifecycle = {
  /** Single registered instance per (type, qualifier) (default) */
  Singleton: 'singleton',
  /** Fresh instance for every resolution - never registered */
  Transient: 'transient',
} as const;

export type LifecycleType = (typeof Lifecycle)[keyof typeof Lifecycle];
export type Lifecycle = LifecycleType;

/**
 * Immutable record describing one managed component.
 *
 * Produced by a scanner (or by `createDeclaration()`) and consumed by the
 * construction engine.
 */
export interface Declaration<T = unknown> {
  /** Registry key the component is registered and resolved under */
  readonly componentType: TypeRef<T>;
  /** Class that is actually instantiated (defaults to componentType) */
  readonly implementation: TypeRef<T>;
  /** Whether the built instance is registered and reused */
  readonly singleton: boolean;
  /** Explicit qualifier, or null for the default qualifier */
  readonly qualifier: string | null;
}

/** Options accepted by the `@Component()` decorator. */
export interface ComponentOptions<T = unknown> {
  /** Qualifier to register the component under */
  qualifier?: string;
  lifecycle?: LifecycleType;
  /**
   * Type to register the component under instead of the decorated class,
   * typically an abstract class the component extends or implements.
   */
  provides?: TypeRef<T>;
}

/** Metadata recorded by the `@Component()` decorator. */
export interface ComponentMetadata {
  readonly qualifier: string | null;
  readonly lifecycle: LifecycleType;
  readonly provides?: TypeRef;
}

/** A single dependency of an injection point. */
export interface Dependency {
  readonly type: TypeRef;
  readonly qualifier: string | null;
}

/**
 * Kinds of injection points a component can declare.
 *
 * Construction dispatches on this small enum instead of reflecting over
 * the class at resolution time.
 */
export type InjectionPointKind = 'constructor' | 'field' | 'setter';

/**
 * A constructor candidate.
 *
 * `key` is null for the class's own constructor and names the static
 * factory method otherwise.
 */
export interface ConstructorPoint {
  readonly kind: 'constructor';
  readonly key: MemberKey | null;
  readonly dependencies: readonly Dependency[];
}

export interface FieldPoint {
  readonly kind: 'field';
  readonly key: MemberKey;
  readonly dependency: Dependency;
  readonly isStatic: boolean;
}

/**
 * A method marked for setter injection.
 *
 * Whether it really qualifies as a setter (name, arity, single dependency)
 * is decided when the instance is injected.
 */
export interface SetterPoint {
  readonly kind: 'setter';
  readonly key: MemberKey;
  readonly dependencies: readonly Dependency[];
}

export type InjectionPoint = ConstructorPoint | FieldPoint | SetterPoint;

/**
 * Immutable view of a class's decorator metadata.
 *
 * Built lazily by the StaticComponentRegistry and cached until the class is
 * decorated again.
 */
export interface ComponentDefinition {
  readonly target: TypeRef;
  /** Present only when the class is decorated with `@Component()` */
  readonly component?: ComponentMetadata;
  /**
   * Constructors explicitly marked with `@Inject()`. A class that marks none
   * of its own inherits the nearest ancestor's marked class constructor.
   */
  readonly constructors: readonly ConstructorPoint[];
  readonly fields: readonly FieldPoint[];
  readonly setters: readonly SetterPoint[];
  /**
   * Nearest ancestor that marks only static factories. Those build the
   * ancestor, not this class, so no constructor can be inherited from it.
   */
  readonly factoryOnlyAncestor?: TypeRef;
}

/** Instrumentation hook invoked after each instantiation. */
export type InstantiateHook = (typeName: string, durationNs: number) => void;

/** Options accepted by the construction engine. */
export interface BeanFactoryOptions {
  /**
   * Declarations the engine may build on demand when a dependency is not
   * registered yet.
   */
  declarations?: Iterable<Declaration>;

  /**
   * Reject methods marked with `@Inject()` that do not follow the setter
   * convention instead of skipping them.
   *
   * @default false
   */
  strictSetters?: boolean;

  /**
   * Optional hook invoked after a component is instantiated.
   *
   * Receives the component type name and the instantiation duration in
   * nanoseconds. Useful for profiling or custom telemetry.
   */
  onInstantiate?: InstantiateHook;
}

/**
 * Container configuration passed to `ApplicationContext`.
 */
export interface ContainerConfig extends Omit<BeanFactoryOptions, 'declarations'> {
  /**
   * Optional name for debugging and error messages.
   *
   * @default 'ApplicationContext'
   */
  name?: string;

  /**
   * Registry used to store singletons. A fresh `DefaultComponentRegistry`
   * is created when omitted.
   */
  registry?: ComponentRegistry;
}
