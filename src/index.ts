/**
 * bindery: statically validated dependency injection.
 * Components are built once and shared, providers are built per request, and a
 * module builder swaps either out before the graph is frozen.
 *
 * @example
 * ```typescript
 * import { defineModule, inject, param, provided } from 'bindery';
 *
 * const AppModule = defineModule<AppServices>()
 *   .component('config', { build: () => loadConfig() })
 *   .provider('connection', {
 *     properties: { config: inject('config') },
 *     build: ({ config }) => openConnection(config.url),
 *   })
 *   .provider('userRepo', {
 *     properties: { connection: provided('connection') },
 *     build: ({ connection }) => new PgUserRepo(connection),
 *   })
 *   .compose();
 *
 * const module = AppModule.builder().build();
 * // fresh repository, fresh connection, shared config
 * module.provide('userRepo');
 * ```
 *
 * @packageDocumentation
 */

// Core API
export {
  defineModule,
  ModuleDefinitionBuilder,
} from './application/module-definition-builder.js';
export { ModuleDefinition } from './application/module-definition.js';
export type { ModuleOf } from './application/module-definition.js';
export { ModuleBuilder } from './application/module-builder.js';
export { Module } from './application/module.js';
export { inject, param, provided } from './infrastructure/properties.js';
export { OnceCell } from './infrastructure/once-cell.js';

// Types
export type {
  AsyncProviderFn,
  BindingInfo,
  BindingKind,
  ComponentProperties,
  InjectProperty,
  ModuleGraph,
  ModuleHealth,
  ModuleOptions,
  ModuleWarning,
  ParameterProperty,
  ParametersOf,
  ProvidedProperty,
  ProviderFn,
  ProviderProperties,
  ResolvedProperties,
  ServiceDefinition,
} from './domain/types.js';

// Errors (classes, so exported as values)
export {
  BindingKindError,
  BindingNotFoundError,
  BuilderConsumedError,
  CircularDependencyError,
  ComponentBuildError,
  ComponentDependsOnProviderError,
  CompositionError,
  DependencyKindError,
  DuplicateBindingError,
  IgnoredParametersWarning,
  InjectionError,
  InvalidBindingError,
  MissingBindingError,
  MissingParameterError,
  ReentrantInitializationError,
  UndefinedReturnError,
  UnknownParameterError,
} from './domain/errors.js';
