import { afterEach, describe, expect, it, vi } from 'vitest';

import { StaticComponentRegistry } from '../src/registry/static-registry.js';

const originalEnv = process.env.NODE_ENV;

describe('Production environment branches', () => {
  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    StaticComponentRegistry.reset();
    vi.resetModules();
  });

  it('uses one-line error messages', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const errors = await import('../src/errors/errors.js');

    expect(new errors.InvalidArgumentError('type', 'must be a class').message).toBe(
      "Invalid argument 'type': must be a class."
    );
    expect(new errors.BeanNotFoundError('Shape', '__default__', []).message).toBe(
      "No beans found of type 'Shape'."
    );
    expect(new errors.BeanNotFoundError('Shape', 'hexagon', ['circle']).message).toBe(
      "No bean of type 'Shape' found for qualifier 'hexagon'."
    );
    expect(new errors.AmbiguousConstructorError('Repo', ['new Repo()', 'Repo.open()']).message).toBe(
      'Multiple constructors marked with @Inject() in Repo.'
    );
    expect(new errors.NoViableConstructorError('Repo', 1).message).toBe(
      'No @Inject() constructor found, and no zero-argument constructor is available for Repo.'
    );
    expect(new errors.CyclicDependencyError(['A', 'B', 'A']).message).toBe('Cyclic dependency detected: A → B → A');
    expect(new errors.InvalidTargetError('Service', 'clock', 'static-field').message).toBe(
      'Cannot inject Service.clock: static fields cannot be injected.'
    );
    expect(new errors.BeanInstantiationError('Storage', new Error('disk offline')).message).toBe(
      "Unable to instantiate bean of type 'Storage'."
    );
    expect(new errors.DeclarationCollisionError('Shape', 'circle').message).toBe(
      "Shape is already declared with qualifier 'circle'."
    );
    expect(new errors.InvalidContainerConfigError("'name' must be a non-empty string.").message).toBe(
      "Invalid container configuration: 'name' must be a non-empty string."
    );
  });

  it('wires components with production decorators', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const { Component } = await import('../src/decorators/component.js');
    const { Inject } = await import('../src/decorators/inject.js');
    const { ApplicationContext } = await import('../src/api/application-context.js');
    const { DecoratorScanner } = await import('../src/api/scanner.js');

    @Component()
    class Leaf {}

    @Component()
    @Inject(Leaf)
    class Root {
      constructor(readonly leaf: Leaf) {}
    }

    const context = new ApplicationContext(new DecoratorScanner());
    context.refresh();

    expect(context.getBean(Root).leaf).toBe(context.getBean(Leaf));
  });
});
