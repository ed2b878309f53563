/*
 * ComponentRegistry
 * -----------------
 * Store of finished instances keyed by component type, then by qualifier:
 *
 *   TypeRef -> (qualifier -> instance)
 *
 * Invariants
 *  - a (type, qualifier) pair maps to at most one instance; register() on an
 *    existing pair overwrites it (last write wins)
 *  - a type never keeps an empty bucket: removing its last qualifier removes
 *    the type entry itself
 *  - types are compared by identity, qualifiers by exact string equality
 *
 * Every operation is synchronous and completes within a single turn of the
 * event loop, so operations on the same pair are linearizable and no caller
 * can observe a half-written bucket. Callers never need their own locking.
 */
import { BeanNotFoundError, InvalidArgumentError } from '../errors/index.js';
import { DEFAULT_QUALIFIER, describeType, isTypeRef } from '../core/type-ref.js';
import type { TypeRef } from '../types/types.js';

/**
 * Typed, qualifier-aware store of managed instances.
 */
export interface ComponentRegistry {
  /** Number of registered (type, qualifier) pairs. */
  readonly size: number;

  register<T>(type: TypeRef<T>, instance: T): void;
  register<T>(type: TypeRef<T>, qualifier: string, instance: T): void;

  /**
   * @throws BeanNotFoundError if nothing is registered for the pair
   */
  resolve<T>(type: TypeRef<T>, qualifier?: string): T;

  containsBean(type: TypeRef, qualifier?: string): boolean;

  /** Snapshot of the qualifiers registered for a type; empty when unknown. */
  getQualifiers(type: TypeRef): ReadonlySet<string>;

  /** Snapshot of every type with at least one registered instance. */
  getRegisteredTypes(): TypeRef[];

  deregister(type: TypeRef, qualifier?: string): void;
}

function assertType(type: unknown): asserts type is TypeRef {
  if (type == null) throw new InvalidArgumentError('type', 'must not be null or undefined');
  if (!isTypeRef(type)) throw new InvalidArgumentError('type', 'must be a class');
}

function assertQualifier(qualifier: unknown): asserts qualifier is string {
  if (qualifier == null) {
    throw new InvalidArgumentError('qualifier', 'must not be null or undefined');
  }
  if (typeof qualifier !== 'string') throw new InvalidArgumentError('qualifier', 'must be a string');
}

export class DefaultComponentRegistry implements ComponentRegistry {
  /** Primary storage: type -> qualifier -> instance */
  private readonly beans = new Map<TypeRef, Map<string, unknown>>();

  private count = 0;

  get size(): number {
    return this.count;
  }

  register<T>(type: TypeRef<T>, instance: T): void;
  register<T>(type: TypeRef<T>, qualifier: string, instance: T): void;
  register<T>(...args: [TypeRef<T>, T] | [TypeRef<T>, string, T]): void {
    if (args.length === 2) {
      this.put(args[0], DEFAULT_QUALIFIER, args[1]);
      return;
    }
    this.put(args[0], args[1], args[2]);
  }

  resolve<T>(type: TypeRef<T>, qualifier: string = DEFAULT_QUALIFIER): T {
    assertType(type);
    assertQualifier(qualifier);

    const bucket = this.beans.get(type);
    if (!bucket || !bucket.has(qualifier)) {
      throw new BeanNotFoundError(describeType(type), qualifier, bucket ? [...bucket.keys()] : []);
    }
    // register<T>() only stores instances typed T under TypeRef<T>
    return bucket.get(qualifier) as T;
  }

  containsBean(type: TypeRef, qualifier: string = DEFAULT_QUALIFIER): boolean {
    assertType(type);
    assertQualifier(qualifier);
    return this.beans.get(type)?.has(qualifier) ?? false;
  }

  getQualifiers(type: TypeRef): ReadonlySet<string> {
    assertType(type);
    const bucket = this.beans.get(type);
    return new Set(bucket ? bucket.keys() : []);
  }

  getRegisteredTypes(): TypeRef[] {
    return [...this.beans.keys()];
  }

  deregister(type: TypeRef, qualifier: string = DEFAULT_QUALIFIER): void {
    assertType(type);
    assertQualifier(qualifier);

    const bucket = this.beans.get(type);
    if (!bucket || !bucket.delete(qualifier)) return;
    this.count--;
    if (bucket.size === 0) this.beans.delete(type);
  }

  private put(type: unknown, qualifier: unknown, instance: unknown): void {
    assertType(type);
    assertQualifier(qualifier);
    if (instance == null) {
      throw new InvalidArgumentError('instance', 'must not be null or undefined');
    }

    let bucket = this.beans.get(type);
    if (!bucket) {
      bucket = new Map();
      this.beans.set(type, bucket);
    }
    if (!bucket.has(qualifier)) this.count++;
    bucket.set(qualifier, instance);
  }
}
