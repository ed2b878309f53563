export { DefaultComponentRegistry, type ComponentRegistry } from './component-registry.js';
export { StaticComponentRegistry } from './static-registry.js';
