import type { TypeRef } from '../types/types.js';
import { describeType } from './type-ref.js';

/** A singleton registered while serving the current request. */
export interface Registration {
  readonly type: TypeRef;
  readonly qualifier: string;
  readonly instance: unknown;
}

/**
 * Types under construction within one root createBean() request.
 *
 * A fresh context is created per request and passed down the recursive
 * construction calls, so unrelated requests never see each other's
 * in-flight types. The chain doubles as the path reported in cycle errors.
 */
export class ConstructionContext {
  private readonly chain: TypeRef[] = [];
  private readonly registrations: Registration[] = [];

  get depth(): number {
    return this.chain.length;
  }

  has(type: TypeRef): boolean {
    return this.chain.includes(type);
  }

  enter(type: TypeRef): void {
    this.chain.push(type);
  }

  /**
   * Remove the most recent entry for `type`.
   *
   * Entries are strictly nested, so this is the top of the chain.
   */
  leave(type: TypeRef): void {
    const index = this.chain.lastIndexOf(type);
    if (index !== -1) this.chain.splice(index, 1);
  }

  /** Position in the registration log, for takeRegistrationsSince(). */
  get registrationMark(): number {
    return this.registrations.length;
  }

  recordRegistration(registration: Registration): void {
    this.registrations.push(registration);
  }

  /**
   * Remove and return, newest first, every registration recorded at or
   * after `mark`.
   */
  takeRegistrationsSince(mark: number): Registration[] {
    return this.registrations.splice(mark).reverse();
  }

  /**
   * Path from the first occurrence of `type` back to `type`, for
   * CyclicDependencyError (e.g. `['A', 'B', 'A']`).
   */
  cycleTo(type: TypeRef): string[] {
    const start = this.chain.indexOf(type);
    return this.chain.slice(start === -1 ? 0 : start).concat(type).map(describeType);
  }
}
