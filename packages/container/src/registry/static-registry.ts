import { isTypeRef } from '../core/type-ref.js';
import type {
  ComponentDefinition,
  ComponentMetadata,
  ConstructorPoint,
  Dependency,
  FieldPoint,
  MemberKey,
  SetterPoint,
  TypeRef,
} from '../types/types.js';

/**
 * Decorator metadata recorded for one side (static or instance) of a class.
 *
 * Fields:
 * - fields: property key → injected type from @Inject()
 * - methods: method key → injected types from @Inject()
 * - namedMembers: property key → qualifier from @Named() on a property
 * - namedParams: method key → (parameter index → qualifier) from @Named()
 */
type MemberSide = {
  fields: Map<MemberKey, TypeRef>;
  methods: Map<MemberKey, readonly TypeRef[]>;
  namedMembers: Map<MemberKey, string>;
  namedParams: Map<MemberKey, Map<number, string>>;
};

/**
 * Mutable record storing decorator metadata for a single class.
 *
 * Fields:
 * - component: lifecycle, qualifier and registration type from @Component()
 * - namedClass: qualifier from @Named() on the class itself
 * - injectConstructor: constructor argument types from @Inject() on the class
 * - constructorParams: parameter index → qualifier from @Named()
 * - statics / instance: member metadata split by side
 * - cachedDef: precomputed ComponentDefinition, dropped on every change
 */
type MutableComponentRecord = {
  component?: ComponentMetadata;
  namedClass?: string;
  injectConstructor?: readonly TypeRef[];
  constructorParams: Map<number, string>;
  statics: MemberSide;
  instance: MemberSide;
  cachedDef?: ComponentDefinition;
};

/**
 * A bag of component metadata.
 *
 * Fields:
 * - records: WeakMap for garbage collection of unused classes
 * - keys: decoration order, used by scanners
 */
type GlobalBag = {
  records: WeakMap<TypeRef, MutableComponentRecord>;
  keys: Set<TypeRef>;
};

/**
 * Global symbol for storing the static component registry on globalThis.
 *
 * This ensures a single registry instance per process, even if the module
 * is bundled multiple times (e.g., in monorepos or microfrontends).
 */
const GLOBAL_SYMBOL = Symbol.for('beanstalk.staticComponentRegistry');

function createBag(): GlobalBag {
  return { records: new WeakMap(), keys: new Set() };
}

function createSide(): MemberSide {
  return {
    fields: new Map(),
    methods: new Map(),
    namedMembers: new Map(),
    namedParams: new Map(),
  };
}

function isGlobalBag(value: unknown): value is GlobalBag {
  return (
    typeof value === 'object' &&
    value !== null &&
    'records' in value &&
    'keys' in value &&
    value.records instanceof WeakMap &&
    value.keys instanceof Set
  );
}

/**
 * Return the process-wide bag, creating it on first use.
 */
function ensureBag(): GlobalBag {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isGlobalBag(existing)) return existing;
  const fresh = createBag();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Global registry for decorator-based component metadata.
 *
 * This registry stores metadata collected by @Component(), @Inject() and
 * @Named() decorators. It lives on globalThis to ensure a single registry
 * per process.
 *
 * Architecture:
 * - Decorators call the register* methods at module load time
 * - The construction engine calls describe() to obtain the injection points
 * - Scanners call getDecoratedComponents() to enumerate @Component classes
 * - Definitions are computed lazily and cached until the class changes
 */
export class StaticComponentRegistry {
  /**
   * Record metadata from the @Component() decorator.
   *
   * Re-registration (e.g., hot module reloading) replaces the metadata.
   */
  static registerComponent(target: TypeRef, metadata: ComponentMetadata): void {
    this.touch(target).component = metadata;
  }

  /**
   * Record a qualifier from @Named() applied to the class itself.
   */
  static registerClassQualifier(target: TypeRef, qualifier: string): void {
    this.touch(target).namedClass = qualifier;
  }

  /**
   * Record the class's own constructor as marked for injection.
   */
  static registerConstructor(target: TypeRef, types: readonly TypeRef[]): void {
    this.touch(target).injectConstructor = types;
  }

  static registerField(target: TypeRef, key: MemberKey, type: TypeRef, isStatic: boolean): void {
    this.side(target, isStatic).fields.set(key, type);
  }

  /**
   * Record a method marked for injection.
   *
   * Static methods become factory constructors; instance methods become
   * setter candidates.
   */
  static registerMethod(
    target: TypeRef,
    key: MemberKey,
    types: readonly TypeRef[],
    isStatic: boolean
  ): void {
    this.side(target, isStatic).methods.set(key, types);
  }

  /**
   * Record a qualifier from @Named().
   *
   * @param key - Member key, or undefined for the class constructor
   * @param parameterIndex - Parameter position, or undefined for a property
   */
  static registerQualifier(
    target: TypeRef,
    key: MemberKey | undefined,
    parameterIndex: number | undefined,
    qualifier: string,
    isStatic: boolean
  ): void {
    if (key === undefined) {
      if (parameterIndex === undefined) this.registerClassQualifier(target, qualifier);
      else this.touch(target).constructorParams.set(parameterIndex, qualifier);
      return;
    }

    const side = this.side(target, isStatic);
    if (parameterIndex === undefined) {
      side.namedMembers.set(key, qualifier);
      return;
    }
    let params = side.namedParams.get(key);
    if (!params) {
      params = new Map();
      side.namedParams.set(key, params);
    }
    params.set(parameterIndex, qualifier);
  }

  /**
   * Build the ComponentDefinition for a class.
   *
   * Classes that were never decorated get an empty definition, which the
   * engine treats as "zero-argument constructor, nothing to inject", unless
   * an ancestor marks its constructor.
   */
  static describe(target: TypeRef): ComponentDefinition {
    const rec = ensureBag().records.get(target);
    if (!rec) return this.buildDef(target, undefined);
    return rec.cachedDef ?? (rec.cachedDef = this.buildDef(target, rec));
  }

  /**
   * Metadata from @Component(), merged with a class-level @Named().
   */
  static getComponent(target: TypeRef): ComponentMetadata | undefined {
    return this.describe(target).component;
  }

  /**
   * Classes decorated with @Component(), in decoration order.
   */
  static getDecoratedComponents(): TypeRef[] {
    const bag = ensureBag();
    return [...bag.keys].filter((key) => bag.records.get(key)?.component !== undefined);
  }

  /**
   * Reset the registry.
   *
   * ⚠️ This is intended for test environments. Calling reset() in production
   * drops decorator metadata for already imported modules.
   */
  static reset(): void {
    Reflect.set(globalThis, GLOBAL_SYMBOL, createBag());
  }

  // ---- internals ----

  private static touch(target: TypeRef): MutableComponentRecord {
    const bag = ensureBag();
    let rec = bag.records.get(target);
    if (!rec) {
      rec = { constructorParams: new Map(), statics: createSide(), instance: createSide() };
      bag.records.set(target, rec);
      bag.keys.add(target);
    }
    rec.cachedDef = undefined;
    return rec;
  }

  private static side(target: TypeRef, isStatic: boolean): MemberSide {
    const rec = this.touch(target);
    return isStatic ? rec.statics : rec.instance;
  }

  /**
   * Turn a mutable record into a frozen ComponentDefinition.
   *
   * Example:
   *   @Inject(A, B) class X {
   *     constructor(a: A, @Named('b2') b: B) {}
   *     @Inject(C) static create(c: C) {}
   *   }
   *   constructors: [ctor(A, B@b2), create(C)]
   */
  private static buildDef(
    target: TypeRef,
    rec: MutableComponentRecord | undefined
  ): ComponentDefinition {
    const constructors: ConstructorPoint[] = rec ? ownConstructors(rec) : [];
    let factoryOnlyAncestor: TypeRef | undefined;

    // Derived classes without a constructor of their own forward their
    // arguments to the base constructor
    if (constructors.length === 0) {
      const inherited = this.findInheritedConstructor(target);
      if (inherited?.point) constructors.push(inherited.point);
      else factoryOnlyAncestor = inherited?.owner;
    }

    if (!rec) {
      return Object.freeze(
        factoryOnlyAncestor
          ? { target, constructors, fields: [], setters: [], factoryOnlyAncestor }
          : { target, constructors, fields: [], setters: [] }
      );
    }

    const fields: FieldPoint[] = [];
    for (const [side, isStatic] of [
      [rec.instance, false],
      [rec.statics, true],
    ] as const) {
      for (const [key, type] of side.fields) {
        fields.push({
          kind: 'field',
          key,
          dependency: { type, qualifier: side.namedMembers.get(key) ?? null },
          isStatic,
        });
      }
    }

    const setters: SetterPoint[] = [];
    for (const [key, types] of rec.instance.methods) {
      setters.push({
        kind: 'setter',
        key,
        dependencies: toDependencies(types, rec.instance.namedParams.get(key)),
      });
    }

    const component = rec.component
      ? { ...rec.component, qualifier: rec.component.qualifier ?? rec.namedClass ?? null }
      : undefined;

    return Object.freeze(
      factoryOnlyAncestor
        ? { target, component, constructors, fields, setters, factoryOnlyAncestor }
        : { target, component, constructors, fields, setters }
    );
  }

  /**
   * Nearest decorated ancestor that marks a constructor.
   *
   * Returns its class constructor point, or only the owner when the ancestor
   * marks nothing but static factories.
   */
  private static findInheritedConstructor(
    target: TypeRef
  ): { owner: TypeRef; point?: ConstructorPoint } | undefined {
    const bag = ensureBag();
    for (
      let ancestor: unknown = Object.getPrototypeOf(target);
      isTypeRef(ancestor);
      ancestor = Object.getPrototypeOf(ancestor)
    ) {
      const rec = bag.records.get(ancestor);
      if (!rec) continue;
      if (rec.injectConstructor) {
        return { owner: ancestor, point: classConstructor(rec.injectConstructor, rec.constructorParams) };
      }
      if (rec.statics.methods.size > 0) return { owner: ancestor };
    }
    return undefined;
  }
}

function classConstructor(types: readonly TypeRef[], qualifiers: Map<number, string>): ConstructorPoint {
  return { kind: 'constructor', key: null, dependencies: toDependencies(types, qualifiers) };
}

/**
 * Class constructor first, then static factories in decoration order.
 */
function ownConstructors(rec: MutableComponentRecord): ConstructorPoint[] {
  const constructors: ConstructorPoint[] = [];
  if (rec.injectConstructor) {
    constructors.push(classConstructor(rec.injectConstructor, rec.constructorParams));
  }
  for (const [key, types] of rec.statics.methods) {
    constructors.push({
      kind: 'constructor',
      key,
      dependencies: toDependencies(types, rec.statics.namedParams.get(key)),
    });
  }
  return constructors;
}

function toDependencies(
  types: readonly TypeRef[],
  qualifiers: Map<number, string> | undefined
): Dependency[] {
  return types.map((type, index) => ({ type, qualifier: qualifiers?.get(index) ?? null }));
}
