/*
 * Declarations
 * ------------
 * A Declaration is the immutable hand-off between scanning and construction:
 * which type to register, which class to build, whether the result is a
 * singleton, and under which qualifier.
 *
 * DeclarationIndex maps (componentType, qualifier) back to a declaration so
 * the engine can build a dependency on demand when it is not registered yet.
 */
import { DeclarationCollisionError, InvalidArgumentError } from '../errors/index.js';
import type { Declaration, TypeRef } from '../types/types.js';
import { describeType, isTypeRef, normalizeQualifier } from './type-ref.js';

export interface DeclarationOptions<T> {
  /** @default true */
  singleton?: boolean;
  qualifier?: string | null;
  /** Class to instantiate; defaults to the component type */
  implementation?: TypeRef<T>;
}

/**
 * Create a frozen Declaration.
 *
 * @throws InvalidArgumentError if the component type or implementation is
 *         not a class, or the qualifier is not a non-empty string
 *
 * @example
 * ```typescript
 * const circle = createDeclaration(Shape, { qualifier: 'circle', implementation: Circle });
 * ```
 */
export function createDeclaration<T>(
  componentType: TypeRef<T>,
  options: DeclarationOptions<T> = {}
): Declaration<T> {
  if (!isTypeRef(componentType)) {
    throw new InvalidArgumentError('componentType', 'must be a class');
  }
  const implementation = options.implementation ?? componentType;
  if (!isTypeRef(implementation)) {
    throw new InvalidArgumentError('implementation', 'must be a class');
  }
  const qualifier = options.qualifier ?? null;
  if (qualifier !== null && (typeof qualifier !== 'string' || qualifier.length === 0)) {
    throw new InvalidArgumentError('qualifier', 'must be a non-empty string or null');
  }

  return Object.freeze({
    componentType,
    implementation,
    singleton: options.singleton ?? true,
    qualifier,
  });
}

/**
 * Lookup of declarations by (componentType, qualifier).
 */
export class DeclarationIndex {
  private readonly byType = new Map<TypeRef, Map<string, Declaration>>();

  constructor(declarations: Iterable<Declaration> = []) {
    for (const declaration of declarations) this.add(declaration);
  }

  /**
   * @throws DeclarationCollisionError if the pair is already declared
   */
  add(declaration: Declaration): void {
    const qualifier = normalizeQualifier(declaration.qualifier);
    let bucket = this.byType.get(declaration.componentType);
    if (!bucket) {
      bucket = new Map();
      this.byType.set(declaration.componentType, bucket);
    }
    if (bucket.has(qualifier)) {
      throw new DeclarationCollisionError(describeType(declaration.componentType), qualifier);
    }
    bucket.set(qualifier, declaration);
  }

  find(type: TypeRef, qualifier: string): Declaration | undefined {
    return this.byType.get(type)?.get(qualifier);
  }
}
