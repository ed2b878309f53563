export { Component } from './component.js';
export { Inject, type InjectDecorator } from './inject.js';
export { Named, type NamedDecorator } from './named.js';
