import {
  BindingKindError,
  BindingNotFoundError,
  BuilderConsumedError,
} from '../domain/errors.js';
import type {
  AsyncProviderFn,
  Binding,
  BindingKind,
  ModuleOptions,
  ProviderFn,
} from '../domain/types.js';
import { Validator } from '../domain/validation.js';
import { Module } from './module.js';

const validator = new Validator();

/**
 * Mutable staging area for one module: parameter overlays, component
 * instances and provider factories. `build()` consumes it; every method throws
 * afterwards.
 *
 * Repeated calls for the same key replace the earlier value.
 */
export class ModuleBuilder<
  TContract extends object,
  TComponents extends Record<string, object>,
  TProviders extends string,
  TAsyncProviders extends string,
> {
  private readonly parameters = new Map<string, ReadonlyMap<string, unknown>>();
  private readonly instances = new Map<string, unknown>();
  private readonly providers = new Map<
    string,
    ProviderFn<
      Module<TContract, TComponents, TProviders, TAsyncProviders>,
      unknown
    >
  >();
  private readonly asyncProviders = new Map<
    string,
    AsyncProviderFn<
      Module<TContract, TComponents, TProviders, TAsyncProviders>,
      unknown
    >
  >();
  private consumed = false;

  constructor(
    private readonly bindings: ReadonlyMap<string, Binding>,
    private readonly options: ModuleOptions = {},
  ) {}

  /**
   * Sets parameter values for a component, read when it is constructed.
   * Parameters left out, or given as `undefined`, keep their declared
   * defaults.
   */
  withComponentParameters<
    K extends keyof TComponents & keyof TContract & string,
  >(key: K, parameters: Partial<TComponents[K]>): this {
    this.check('withComponentParameters', key, 'component');
    this.parameters.set(
      key,
      new Map<string, unknown>(Object.entries(parameters)),
    );
    return this;
  }

  /**
   * Supplies a ready-made instance for a component. `resolve(key)` returns it
   * and the component's build function never runs.
   */
  withComponentOverride<
    K extends keyof TComponents & keyof TContract & string,
  >(key: K, instance: TContract[K]): this {
    this.check('withComponentOverride', key, 'component');
    this.instances.set(key, instance);
    return this;
  }

  /**
   * Replaces a provider's factory. The override receives the built module and
   * runs on every `provide(key)`, including provides made by other providers.
   */
  withProviderOverride<K extends TProviders & keyof TContract>(
    key: K,
    factory: ProviderFn<
      Module<TContract, TComponents, TProviders, TAsyncProviders>,
      TContract[K]
    >,
  ): this {
    this.check('withProviderOverride', key, 'provider');
    this.providers.set(key, factory);
    return this;
  }

  /**
   * Replaces an async provider's factory.
   */
  withAsyncProviderOverride<K extends TAsyncProviders & keyof TContract>(
    key: K,
    factory: AsyncProviderFn<
      Module<TContract, TComponents, TProviders, TAsyncProviders>,
      TContract[K]
    >,
  ): this {
    this.check('withAsyncProviderOverride', key, 'async-provider');
    this.asyncProviders.set(key, factory);
    return this;
  }

  /**
   * Builds the module and consumes the builder.
   *
   * @throws MissingParameterError when a component that will be constructed
   *   has a parameter with neither a default nor an overlay value.
   * @throws UnknownParameterError when an overlay names an undeclared
   *   parameter.
   */
  build(): Module<TContract, TComponents, TProviders, TAsyncProviders> {
    this.check('build');
    this.consumed = true;
    validator.validateParameters(
      this.bindings,
      this.parameters,
      this.instances,
    );
    return new Module(
      this.bindings,
      {
        parameters: new Map(this.parameters),
        instances: new Map(this.instances),
        providers: new Map(this.providers),
        asyncProviders: new Map(this.asyncProviders),
      },
      this.options,
    );
  }

  private check(method: string, key?: string, expected?: BindingKind): void {
    if (this.consumed) {
      throw new BuilderConsumedError(method);
    }
    if (key === undefined || expected === undefined) return;
    const binding = this.bindings.get(key);
    if (!binding) {
      const registered = [...this.bindings.keys()];
      throw new BindingNotFoundError(
        key,
        registered,
        validator.suggestKey(key, registered),
      );
    }
    if (binding.kind !== expected) {
      throw new BindingKindError(key, expected, binding.kind);
    }
  }
}
