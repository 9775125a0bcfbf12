import type { Binding, BindingKind, ModuleOptions } from '../domain/types.js';
import { Validator } from '../domain/validation.js';
import type { Module } from './module.js';
import { ModuleBuilder } from './module-builder.js';

const validator = new Validator();

/**
 * A validated, frozen binding table. Create one with
 * `defineModule<Contract>()...compose()`. Every module built from it shares
 * the bindings; each module owns its own instances.
 */
export class ModuleDefinition<
  TContract extends object,
  TComponents extends Record<string, object>,
  TProviders extends string,
  TAsyncProviders extends string,
> {
  private readonly bindings: ReadonlyMap<string, Binding>;

  /**
   * @throws CompositionError when the table is invalid.
   */
  constructor(bindings: ReadonlyMap<string, Binding>) {
    validator.validateBindings(bindings);
    this.bindings = new Map(bindings);
  }

  /**
   * Starts staging overrides for a new module.
   *
   * @example
   * ```typescript
   * const module = AppModule.builder({ name: 'app', logger })
   *   .withComponentOverride('output', new MemoryOutput())
   *   .build();
   * ```
   */
  builder(
    options: ModuleOptions = {},
  ): ModuleBuilder<TContract, TComponents, TProviders, TAsyncProviders> {
    return new ModuleBuilder(this.bindings, options);
  }

  /** Builds a module with no overrides. */
  build(
    options: ModuleOptions = {},
  ): Module<TContract, TComponents, TProviders, TAsyncProviders> {
    return this.builder(options).build();
  }

  /** Bound keys, in registration order. */
  keys(): string[] {
    return [...this.bindings.keys()];
  }

  /** How `key` is bound, or `undefined` if it is not. */
  kindOf(key: string): BindingKind | undefined {
    return this.bindings.get(key)?.kind;
  }
}

/**
 * The module type built from a definition.
 *
 * @example
 * ```typescript
 * const AppModule = defineModule<AppServices>()...compose();
 * type AppModule = ModuleOf<typeof AppModule>;
 *
 * function handler(module: AppModule) { module.resolve('writer'); }
 * ```
 */
export type ModuleOf<D extends { build(options?: ModuleOptions): object }> =
  ReturnType<D['build']>;
