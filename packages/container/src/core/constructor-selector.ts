import { AmbiguousConstructorError, NoViableConstructorError } from '../errors/index.js';
import type { ComponentDefinition, ConstructorPoint } from '../types/types.js';
import { describeType } from './type-ref.js';

/** Candidate used when nothing is marked and the class takes no arguments. */
const IMPLICIT_CONSTRUCTOR: ConstructorPoint = Object.freeze({
  kind: 'constructor',
  key: null,
  dependencies: [],
});

/**
 * Label of a constructor candidate in diagnostics:
 * `new Foo()` for the class constructor, `Foo.create()` for a factory.
 */
export function describeConstructor(definition: ComponentDefinition, point: ConstructorPoint): string {
  const name = describeType(definition.target);
  return point.key === null ? `new ${name}()` : `${name}.${String(point.key)}()`;
}

/**
 * Pick the constructor used to build a component.
 *
 * Policy, in order:
 *  a. exactly one constructor marked with @Inject() → use it
 *  b. more than one marked → AmbiguousConstructorError
 *  c. none marked and the class constructor takes no arguments → use it
 *  d. otherwise → NoViableConstructorError
 *
 * A subclass that marks nothing inherits its nearest ancestor's marked class
 * constructor (see StaticComponentRegistry.describe). When that ancestor
 * marks only static factories and its own constructor takes arguments, (c)
 * does not apply: the derived constructor would call the ancestor's without
 * its dependencies.
 */
export function selectConstructor(definition: ComponentDefinition): ConstructorPoint {
  const marked = definition.constructors;

  if (marked.length === 1) return marked[0];

  if (marked.length > 1) {
    throw new AmbiguousConstructorError(
      describeType(definition.target),
      marked.map((point) => describeConstructor(definition, point))
    );
  }

  const ancestor = definition.factoryOnlyAncestor;
  if (ancestor && ancestor.length > 0) {
    throw new NoViableConstructorError(describeType(definition.target), ancestor.length);
  }

  if (definition.target.length === 0) return IMPLICIT_CONSTRUCTOR;

  throw new NoViableConstructorError(describeType(definition.target), definition.target.length);
}
