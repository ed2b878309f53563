import type { TypeRef } from '../types/types.js';

/**
 * Qualifier used whenever no explicit qualifier is given.
 */
export const DEFAULT_QUALIFIER = '__default__';

/**
 * Runtime type guard for component type references.
 *
 * Used for input validation in public APIs, where callers from plain
 * JavaScript may pass anything.
 *
 * @param x - Value to check
 * @returns true if x is a function carrying a prototype object
 */
export function isTypeRef(x: unknown): x is TypeRef {
  return typeof x === 'function' && typeof x.prototype === 'object' && x.prototype !== null;
}

/**
 * Human-readable label for a type in diagnostics.
 */
export function describeType(type: TypeRef): string {
  return type.name || 'anonymous';
}

/**
 * Map "no explicit qualifier" onto the reserved default qualifier.
 */
export function normalizeQualifier(qualifier: string | null | undefined): string {
  return qualifier ?? DEFAULT_QUALIFIER;
}
