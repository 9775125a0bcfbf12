import {
  DuplicateBindingError,
  InvalidBindingError,
} from '../domain/errors.js';
import type {
  Binding,
  ComponentProperties,
  ParametersOf,
  Property,
  ProviderProperties,
  ResolvedProperties,
  ServiceDefinition,
} from '../domain/types.js';
import { isProperty } from '../infrastructure/properties.js';
import { ModuleDefinition } from './module-definition.js';

// Array-index names, which object iteration visits before every other key.
const INTEGER_LIKE_NAME = /^(0|[1-9]\d*)$/;

/**
 * Fluent builder that assembles a binding table against a contract interface.
 *
 * The contract maps each key to the service type bound to it. Each
 * registration accumulates the key's kind (and a component's parameter shape)
 * in the builder's type, so the module built from it only accepts `resolve()`
 * for components, `provide()` for providers and parameter overlays that match
 * the declared parameters.
 */
export class ModuleDefinitionBuilder<
  TContract extends object,
  // biome-ignore lint/complexity/noBannedTypes: {} is the correct generic default for "no components registered yet"
  TComponents extends Record<string, object> = {},
  TProviders extends string = never,
  TAsyncProviders extends string = never,
> {
  private readonly bindings = new Map<string, Binding>();

  /**
   * Registers a component: built once, on first `resolve()`, and shared
   * afterwards. Its properties may inject other components and declare
   * parameters.
   */
  component<
    K extends keyof TContract & string,
    // biome-ignore lint/complexity/noBannedTypes: {} is the default for "no properties declared"
    P extends ComponentProperties<keyof TContract & string> = {},
  >(
    key: K,
    definition: ServiceDefinition<TContract, P, TContract[K]>,
  ): ModuleDefinitionBuilder<
    TContract,
    TComponents & Record<K, ParametersOf<P>>,
    TProviders,
    TAsyncProviders
  > {
    const properties = this.checkDefinition(
      key,
      definition.properties ?? {},
      definition.build,
    );
    this.register({
      kind: 'component',
      key,
      implementation: definition.implementation ?? key,
      properties,
      build: (values) =>
        definition.build(values as ResolvedProperties<TContract, P>),
    });
    return this as unknown as ModuleDefinitionBuilder<
      TContract,
      TComponents & Record<K, ParametersOf<P>>,
      TProviders,
      TAsyncProviders
    >;
  }

  /**
   * Registers a provider: built again on every `provide()`.
   * Its properties may inject components, depend on other sync providers and
   * declare parameters with defaults.
   */
  provider<
    K extends keyof TContract & string,
    // biome-ignore lint/complexity/noBannedTypes: {} is the default for "no properties declared"
    P extends ProviderProperties<keyof TContract & string> = {},
  >(
    key: K,
    definition: ServiceDefinition<TContract, P, TContract[K]>,
  ): ModuleDefinitionBuilder<
    TContract,
    TComponents,
    TProviders | K,
    TAsyncProviders
  > {
    const properties = this.checkDefinition(
      key,
      definition.properties ?? {},
      definition.build,
    );
    this.register({
      kind: 'provider',
      key,
      implementation: definition.implementation ?? key,
      properties,
      build: (values) =>
        definition.build(values as ResolvedProperties<TContract, P>),
    });
    return this as unknown as ModuleDefinitionBuilder<
      TContract,
      TComponents,
      TProviders | K,
      TAsyncProviders
    >;
  }

  /**
   * Registers an async provider: built again on every `asyncProvide()`.
   * Provider dependencies are awaited one after another, in declaration order.
   */
  asyncProvider<
    K extends keyof TContract & string,
    // biome-ignore lint/complexity/noBannedTypes: {} is the default for "no properties declared"
    P extends ProviderProperties<keyof TContract & string> = {},
  >(
    key: K,
    definition: ServiceDefinition<TContract, P, Promise<TContract[K]>>,
  ): ModuleDefinitionBuilder<
    TContract,
    TComponents,
    TProviders,
    TAsyncProviders | K
  > {
    const properties = this.checkDefinition(
      key,
      definition.properties ?? {},
      definition.build,
    );
    this.register({
      kind: 'async-provider',
      key,
      implementation: definition.implementation ?? key,
      properties,
      build: (values) =>
        definition.build(values as ResolvedProperties<TContract, P>),
    });
    return this as unknown as ModuleDefinitionBuilder<
      TContract,
      TComponents,
      TProviders,
      TAsyncProviders | K
    >;
  }

  /**
   * Applies a group of registrations, e.g. a feature's bindings kept in their
   * own file.
   */
  use<TResult>(group: (builder: this) => TResult): TResult {
    return group(this);
  }

  /**
   * Validates the binding table and freezes it.
   *
   * @throws MissingBindingError, ComponentDependsOnProviderError,
   *   DependencyKindError, MissingParameterError or CircularDependencyError.
   */
  compose(): ModuleDefinition<
    TContract,
    TComponents,
    TProviders,
    TAsyncProviders
  > {
    return new ModuleDefinition(new Map(this.bindings));
  }

  private register(binding: Binding): void {
    const existing = this.bindings.get(binding.key);
    if (existing) {
      throw new DuplicateBindingError(binding.key, existing.kind, binding.kind);
    }
    this.bindings.set(binding.key, binding);
  }

  private checkDefinition(
    key: string,
    properties: Readonly<Record<string, Property>>,
    build: unknown,
  ): Readonly<Record<string, Property>> {
    if (typeof build !== 'function') {
      throw new InvalidBindingError(
        key,
        `build must be a function, got ${typeof build}`,
      );
    }
    for (const [name, property] of Object.entries(properties)) {
      if (INTEGER_LIKE_NAME.test(name)) {
        throw new InvalidBindingError(
          key,
          `property '${name}' has an integer-like name, which does not keep its declaration order`,
        );
      }
      if (!isProperty(property)) {
        throw new InvalidBindingError(
          key,
          `property '${name}' was not declared with inject(), provided() or param()`,
        );
      }
    }
    return { ...properties };
  }
}

/**
 * Starts a module definition for a contract interface.
 *
 * @example
 * ```typescript
 * interface AppServices { output: Output; writer: DateWriter }
 *
 * const AppModule = defineModule<AppServices>()
 *   .component('output', { build: () => new ConsoleOutput() })
 *   .component('writer', {
 *     implementation: 'TodayWriter',
 *     properties: {
 *       output: inject('output'),
 *       today: param('Jan 1'),
 *       year: param(1970),
 *     },
 *     build: ({ output, today, year }) =>
 *       new TodayWriter(output, today, year),
 *   })
 *   .compose();
 *
 * const module = AppModule.builder()
 *   .withComponentParameters('writer', { today: 'June 19', year: 2020 })
 *   .build();
 * module.resolve('writer').writeDate();
 * ```
 */
export function defineModule<
  TContract extends object,
>(): ModuleDefinitionBuilder<TContract> {
  return new ModuleDefinitionBuilder<TContract>();
}
