import type { Logger } from 'pino';
import type { AnyWarning } from '../domain/errors.js';
import {
  BindingKindError,
  BindingNotFoundError,
  ComponentBuildError,
  IgnoredParametersWarning,
  InjectionError,
  ReentrantInitializationError,
  UndefinedReturnError,
} from '../domain/errors.js';
import type {
  Binding,
  ComponentBinding,
  ICycleDetector,
  IResolver,
  ParameterProperty,
  ProviderBinding,
} from '../domain/types.js';
import { Validator } from '../domain/validation.js';
import { OnceCell } from './once-cell.js';

type Overlays = ReadonlyMap<string, ReadonlyMap<string, unknown>>;

export interface ResolverDeps {
  bindings: ReadonlyMap<string, Binding>;
  parameters: Overlays;
  instances: ReadonlyMap<string, unknown>;
  providerOverrides: ReadonlyMap<string, () => unknown>;
  asyncProviderOverrides: ReadonlyMap<string, () => Promise<unknown>>;
  name?: string;
  logger: Logger;
  cycleDetector: ICycleDetector;
}

interface ComponentEntry {
  binding: ComponentBinding;
  cell: OnceCell<unknown>;
}

/**
 * Core resolver: lazy component cells, provider invocation and override
 * dispatch. Keys are untyped here; the validated binding table guarantees
 * every declared dependency exists and has the right kind.
 */
export class Resolver implements IResolver {
  private readonly bindings: ReadonlyMap<string, Binding>;
  private readonly components = new Map<string, ComponentEntry>();
  private readonly parameters: Overlays;
  private readonly instances: ReadonlyMap<string, unknown>;
  private readonly providerOverrides: ReadonlyMap<string, () => unknown>;
  private readonly asyncProviderOverrides: ReadonlyMap<
    string,
    () => Promise<unknown>
  >;
  private readonly warnings: AnyWarning[] = [];
  private readonly validator = new Validator();

  private readonly name?: string;
  private readonly logger: Logger;
  private readonly cycleDetector: ICycleDetector;

  constructor(deps: ResolverDeps) {
    this.bindings = deps.bindings;
    this.parameters = deps.parameters;
    this.instances = deps.instances;
    this.providerOverrides = deps.providerOverrides;
    this.asyncProviderOverrides = deps.asyncProviderOverrides;
    this.name = deps.name;
    this.logger = deps.logger;
    this.cycleDetector = deps.cycleDetector;

    for (const binding of this.bindings.values()) {
      if (binding.kind !== 'component') continue;
      const { key } = binding;
      const cell = new OnceCell<unknown>(key);
      if (this.instances.has(key)) {
        cell.set(this.instances.get(key));
        this.logger.debug({ key }, 'component override installed');
        if (this.parameters.has(key)) {
          this.warnings.push(new IgnoredParametersWarning(key));
          this.logger.warn({ key }, 'parameter overlay ignored');
        }
      }
      this.components.set(key, { binding, cell });
    }
  }

  getName(): string | undefined {
    return this.name;
  }

  resolve(key: string, chain: string[] = []): unknown {
    const component = this.components.get(key);
    if (!component) {
      throw new BindingKindError(key, 'component', this.getBinding(key).kind);
    }

    const { binding, cell } = component;
    if (!cell.isInitialized() && this.cycleDetector.isResolving(key)) {
      throw new ReentrantInitializationError(key, [
        ...this.cycleDetector.path(),
        key,
      ]);
    }

    return cell.getOrInit(() => this.construct(binding, [...chain, key]));
  }

  provide(key: string, chain: string[] = []): unknown {
    const binding = this.getBinding(key);
    if (binding.kind !== 'provider') {
      throw new BindingKindError(key, 'provider', binding.kind);
    }

    const currentChain = [...chain, key];
    const override = this.providerOverrides.get(key);
    this.logger.trace(
      { key, overridden: override !== undefined },
      'provider invoked',
    );

    const instance = override
      ? override()
      : binding.build(this.collect(binding, currentChain));
    if (instance === undefined) {
      throw new UndefinedReturnError(key, currentChain);
    }
    return instance;
  }

  async asyncProvide(key: string, chain: string[] = []): Promise<unknown> {
    const binding = this.getBinding(key);
    if (binding.kind === 'provider') {
      return this.provide(key, chain);
    }
    if (binding.kind !== 'async-provider') {
      throw new BindingKindError(key, 'async-provider', binding.kind);
    }

    const currentChain = [...chain, key];
    const override = this.asyncProviderOverrides.get(key);
    this.logger.trace(
      { key, overridden: override !== undefined },
      'provider invoked',
    );

    let instance: unknown;
    if (override) {
      instance = await override();
    } else {
      // One dependency at a time, in declaration order.
      const values: Record<string, unknown> = {};
      for (const [name, property] of Object.entries(binding.properties)) {
        if (property.kind === 'inject') {
          values[name] = this.resolve(property.key, currentChain);
        } else if (property.kind === 'provided') {
          values[name] = await this.asyncProvide(property.key, currentChain);
        } else {
          values[name] = this.parameterValue(key, name, property);
        }
      }
      instance = await binding.build(values);
    }

    if (instance === undefined) {
      throw new UndefinedReturnError(key, currentChain);
    }
    return instance;
  }

  isResolved(key: string): boolean {
    return this.components.get(key)?.cell.isInitialized() ?? false;
  }

  isOverridden(key: string): boolean {
    return (
      this.instances.has(key) ||
      this.providerOverrides.has(key) ||
      this.asyncProviderOverrides.has(key)
    );
  }

  getBindings(): ReadonlyMap<string, Binding> {
    return this.bindings;
  }

  getResolvedKeys(): string[] {
    return [...this.components]
      .filter(([, { cell }]) => cell.isInitialized())
      .map(([key]) => key);
  }

  getWarnings(): AnyWarning[] {
    return [...this.warnings];
  }

  private construct(binding: ComponentBinding, chain: string[]): unknown {
    this.cycleDetector.enter(binding.key);
    try {
      const instance = binding.build(this.collect(binding, chain));
      if (instance === undefined) {
        throw new UndefinedReturnError(binding.key, chain);
      }
      this.logger.debug(
        { key: binding.key, implementation: binding.implementation },
        'component constructed',
      );
      return instance;
    } catch (error) {
      if (error instanceof InjectionError) throw error;
      throw new ComponentBuildError(binding.key, chain, error);
    } finally {
      this.cycleDetector.leave(binding.key);
    }
  }

  /** Gathers a sync binding's property values in declaration order. */
  private collect(
    binding: ComponentBinding | ProviderBinding,
    chain: string[],
  ): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const [name, property] of Object.entries(binding.properties)) {
      if (property.kind === 'inject') {
        values[name] = this.resolve(property.key, chain);
      } else if (property.kind === 'provided') {
        values[name] = this.provide(property.key, chain);
      } else {
        values[name] = this.parameterValue(binding.key, name, property);
      }
    }
    return values;
  }

  /**
   * Overlay value first, declared default second. An overlay entry holding
   * `undefined` counts as absent.
   */
  private parameterValue(
    key: string,
    name: string,
    property: ParameterProperty,
  ): unknown {
    const value = this.parameters.get(key)?.get(name);
    return value === undefined ? property.defaultValue : value;
  }

  private getBinding(key: string): Binding {
    const binding = this.bindings.get(key);
    if (!binding) {
      const registered = [...this.bindings.keys()];
      throw new BindingNotFoundError(
        key,
        registered,
        this.validator.suggestKey(key, registered),
      );
    }
    return binding;
  }
}
