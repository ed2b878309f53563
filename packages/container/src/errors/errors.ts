const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * A required argument was absent or of the wrong kind.
 *
 * Always a caller bug.
 */
export class InvalidArgumentError extends Error {
  constructor(
    public argument: string,
    public reason: string
  ) {
    const dev = [
      `Invalid argument '${argument}': ${reason}.`,
      '',
      'Types must be classes, qualifiers must be strings, and instances must not be null or undefined.',
    ];
    super(format(`Invalid argument '${argument}': ${reason}.`, dev));
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Bean not found error with the qualifiers that are registered for the type
 */
export class BeanNotFoundError extends Error {
  constructor(
    public typeName: string,
    public qualifier: string,
    public availableQualifiers: string[]
  ) {
    const summary =
      availableQualifiers.length === 0
        ? `No beans found of type '${typeName}'.`
        : `No bean of type '${typeName}' found for qualifier '${qualifier}'.`;

    const parts: string[] = [summary, ''];

    if (availableQualifiers.length > 0) {
      parts.push('Registered qualifiers:');
      availableQualifiers.forEach((q) => parts.push(`  - ${q}`));
      parts.push('');
    }

    parts.push('To fix this:');
    parts.push(`  1. Decorate ${typeName} (or an implementation of it) with @Component()`);
    parts.push(`  2. Register an instance before it is resolved`);
    parts.push(`  3. Check for typos in @Named('${qualifier}') or the component's qualifier`, '');

    super(format(summary, parts));
    this.name = 'BeanNotFoundError';
  }
}

export class AmbiguousConstructorError extends Error {
  constructor(
    public typeName: string,
    public candidates: string[]
  ) {
    const dev = [
      'Ambiguous constructor',
      '',
      `${typeName} has ${candidates.length} constructors marked with @Inject():`,
      ...candidates.map((c) => `  - ${c}`),
      '',
      'Fix:',
      '  - Keep @Inject() on exactly one of them (the class or a single static factory)',
    ];
    super(format(`Multiple constructors marked with @Inject() in ${typeName}.`, dev));
    this.name = 'AmbiguousConstructorError';
  }
}

export class NoViableConstructorError extends Error {
  constructor(
    public typeName: string,
    public arity: number
  ) {
    const dev = [
      'No viable constructor',
      '',
      `${typeName} has no constructor marked with @Inject() and its constructor takes ${arity} argument(s).`,
      '',
      'Fix:',
      `  - Mark the class with @Inject(...dependencies) to declare the constructor arguments`,
      `  - Or mark a static factory method with @Inject(...dependencies)`,
      '',
      'Example:',
      `  @Component()`,
      `  @Inject(SomeService)`,
      `  class ${typeName} {`,
      `    constructor(private service: SomeService) {}`,
      `  }`,
    ];
    super(
      format(
        `No @Inject() constructor found, and no zero-argument constructor is available for ${typeName}.`,
        dev
      )
    );
    this.name = 'NoViableConstructorError';
  }
}

/**
 * Cyclic dependency detected error
 */
export class CyclicDependencyError extends Error {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const message = format(`Cyclic dependency detected: ${cycleStr}`, [
      'Cyclic dependency detected:',
      '',
      `  ${cycleStr}`,
      '',
      `This means ${cycle[cycle.length - 1]} depends on itself through its constructor arguments.`,
      '',
      'Solutions:',
      `  1. Move one side of the cycle to field or setter injection`,
      `  2. Extract shared logic into a separate component`,
    ]);
    super(message);
    this.name = 'CyclicDependencyError';
  }
}

export type InvalidTargetReason =
  | 'static-field'
  | 'immutable-field'
  | 'not-a-setter'
  | 'missing-factory'
  | 'empty-factory-result';

const TARGET_REASONS: Record<InvalidTargetReason, string> = {
  'static-field': 'static fields cannot be injected',
  'immutable-field': 'the field is not writable on the instance',
  'not-a-setter': 'methods marked with @Inject() must be named setXxx and take exactly one argument',
  'missing-factory': 'the static factory marked with @Inject() is not a function',
  'empty-factory-result': 'the static factory returned null or undefined',
};

/**
 * An injection point violates a structural rule.
 */
export class InvalidTargetError extends Error {
  constructor(
    public typeName: string,
    public member: string,
    public reason: InvalidTargetReason
  ) {
    const detail = TARGET_REASONS[reason];
    const dev = [
      'Invalid injection target',
      '',
      `${typeName}.${member}: ${detail}.`,
      '',
      'The component cannot be built in a consistent state, so construction was aborted.',
    ];
    super(format(`Cannot inject ${typeName}.${member}: ${detail}.`, dev));
    this.name = 'InvalidTargetError';
  }
}

/**
 * Any failure escaping the construction engine.
 *
 * `typeName` names the innermost component that failed; the original
 * failure is kept as `cause`.
 */
export class BeanInstantiationError extends Error {
  constructor(
    public typeName: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const dev = [
      `Unable to instantiate bean of type '${typeName}'.`,
      '',
      'Caused by:',
      ...reason.split('\n').map((line) => (line ? `  ${line}` : line)),
    ];
    super(format(`Unable to instantiate bean of type '${typeName}'.`, dev), { cause });
    this.name = 'BeanInstantiationError';
  }
}

export class DeclarationCollisionError extends Error {
  constructor(
    public typeName: string,
    public qualifier: string
  ) {
    const dev = [
      'Declaration collision',
      '',
      `${typeName} is declared more than once with qualifier '${qualifier}'.`,
      `Give each declaration its own qualifier with @Component({ qualifier }) or @Named().`,
    ];
    super(format(`${typeName} is already declared with qualifier '${qualifier}'.`, dev));
    this.name = 'DeclarationCollisionError';
  }
}

export class InvalidContainerConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid container configuration', '', `Invalid container configuration: ${reason}`];
    super(format(`Invalid container configuration: ${reason}`, dev));
    this.name = 'InvalidContainerConfigError';
  }
}
