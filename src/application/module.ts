import type {
  Binding,
  BindingInfo,
  ModuleGraph,
  ModuleHealth,
  ModuleOptions,
  StagedOverrides,
} from '../domain/types.js';
import { CycleDetector } from '../infrastructure/cycle-detector.js';
import { moduleLogger } from '../infrastructure/logger.js';
import { Resolver } from '../infrastructure/resolver.js';
import { Introspection } from './introspection.js';

/**
 * A built dependency graph. Bindings are fixed; the only state that changes
 * after construction is each component's one-shot instance cell.
 *
 * Obtain one from `ModuleDefinition.builder().build()` and pass it explicitly
 * to whatever needs services from it.
 */
export class Module<
  TContract extends object,
  TComponents extends Record<string, object>,
  TProviders extends string,
  TAsyncProviders extends string,
> {
  private readonly resolver: Resolver;
  private readonly introspection: Introspection;

  /** @internal Use `ModuleDefinition.builder()`. */
  constructor(
    bindings: ReadonlyMap<string, Binding>,
    staged: StagedOverrides<
      Module<TContract, TComponents, TProviders, TAsyncProviders>
    >,
    options: ModuleOptions = {},
  ) {
    const providerOverrides = new Map<string, () => unknown>();
    for (const [key, factory] of staged.providers) {
      providerOverrides.set(key, () => factory(this));
    }
    const asyncProviderOverrides = new Map<string, () => Promise<unknown>>();
    for (const [key, factory] of staged.asyncProviders) {
      asyncProviderOverrides.set(key, () => factory(this));
    }

    const logger = moduleLogger(options);
    this.resolver = new Resolver({
      bindings,
      parameters: staged.parameters,
      instances: staged.instances,
      providerOverrides,
      asyncProviderOverrides,
      name: options.name,
      logger,
      cycleDetector: new CycleDetector(),
    });
    this.introspection = new Introspection(this.resolver);

    logger.debug(
      {
        bindings: bindings.size,
        overrides:
          staged.instances.size +
          staged.providers.size +
          staged.asyncProviders.size,
      },
      'module built',
    );
  }

  /**
   * Returns the shared instance of a component, constructing it on first
   * access.
   *
   * @example
   * ```typescript
   * const writer = module.resolve('writer');
   * module.resolve('writer') === writer; // true
   * ```
   */
  resolve<K extends keyof TComponents & keyof TContract & string>(
    key: K,
  ): TContract[K] {
    return this.resolver.resolve(key) as TContract[K];
  }

  /**
   * Builds a new instance from a provider (or its override).
   * Whatever the provider throws is rethrown unchanged.
   */
  provide<K extends TProviders & keyof TContract>(key: K): TContract[K] {
    return this.resolver.provide(key) as TContract[K];
  }

  /**
   * Builds a new instance from an async or sync provider (or its override).
   * Whatever the provider rejects with is rethrown unchanged.
   */
  asyncProvide<K extends (TProviders | TAsyncProviders) & keyof TContract>(
    key: K,
  ): Promise<TContract[K]> {
    return this.resolver.asyncProvide(key) as Promise<TContract[K]>;
  }

  /** Whether `key` is bound in this module. */
  has(key: string): boolean {
    return this.resolver.getBindings().has(key);
  }

  /**
   * Returns the full binding graph as a serializable JSON object.
   */
  inspect(): ModuleGraph {
    return this.introspection.inspect();
  }

  /**
   * Returns detailed information about one binding.
   *
   * @example
   * ```typescript
   * module.describe('writer');
   * // { key: 'writer', kind: 'component', resolved: true, ... }
   * ```
   */
  describe(key: keyof TContract & string): BindingInfo {
    return this.introspection.describe(key);
  }

  /**
   * Returns resolution counts and build-time warnings.
   */
  health(): ModuleHealth {
    return this.introspection.health();
  }

  toString(): string {
    return this.introspection.toString();
  }
}
