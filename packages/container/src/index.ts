export { ApplicationContext } from './api/application-context.js';
export { DecoratorScanner } from './api/scanner.js';
export type { ComponentScanner, DecoratorScannerOptions } from './api/scanner.js';

export { Component, Inject, Named } from './decorators/index.js';
export type { InjectDecorator, NamedDecorator } from './decorators/index.js';

export { BeanFactory } from './core/bean-factory.js';
export { createDeclaration } from './core/declaration.js';
export type { DeclarationOptions } from './core/declaration.js';
export { DEFAULT_QUALIFIER } from './core/type-ref.js';

export { DefaultComponentRegistry, StaticComponentRegistry } from './registry/index.js';
export type { ComponentRegistry } from './registry/index.js';

export { Lifecycle } from './types/types.js';
export type {
  BeanFactoryOptions,
  ComponentDefinition,
  ComponentMetadata,
  ComponentOptions,
  ConstructorPoint,
  ContainerConfig,
  Declaration,
  Dependency,
  FieldPoint,
  InjectionPoint,
  InjectionPointKind,
  InstantiateHook,
  LifecycleType,
  MemberKey,
  SetterPoint,
  TypeRef,
} from './types/types.js';

// Errors
export {
  AmbiguousConstructorError,
  BeanInstantiationError,
  BeanNotFoundError,
  CyclicDependencyError,
  DeclarationCollisionError,
  InvalidArgumentError,
  InvalidContainerConfigError,
  InvalidTargetError,
  NoViableConstructorError,
} from './errors/errors.js';
export type { InvalidTargetReason } from './errors/errors.js';
