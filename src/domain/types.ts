import type { Logger } from 'pino';
import type { AnyWarning } from './errors.js';

/**
 * Brand carried by every property descriptor created with `inject()`,
 * `provided()` or `param()`.
 */
export const PROPERTY_MARKER = Symbol.for('bindery:property');

/**
 * How a key is bound inside a module.
 * - `component`: constructed at most once, shared by every caller.
 * - `provider`: constructed synchronously on every `provide()` call.
 * - `async-provider`: constructed on every `asyncProvide()` call; its build
 *   may await.
 */
export type BindingKind = 'component' | 'provider' | 'async-provider';

/** A dependency on the component bound to `key`. */
export interface InjectProperty<K extends string = string> {
  readonly [PROPERTY_MARKER]: true;
  readonly kind: 'inject';
  readonly key: K;
}

/**
 * A dependency on the provider bound to `key`, obtained fresh for every
 * construction.
 */
export interface ProvidedProperty<K extends string = string> {
  readonly [PROPERTY_MARKER]: true;
  readonly kind: 'provided';
  readonly key: K;
}

/** A plain value, read from the parameter overlay or from its default. */
export interface ParameterProperty<T = unknown> {
  readonly [PROPERTY_MARKER]: true;
  readonly kind: 'parameter';
  readonly hasDefault: boolean;
  readonly defaultValue?: T;
}

export type Property = InjectProperty | ProvidedProperty | ParameterProperty;

/**
 * Properties a component may declare: other components and parameters, never
 * providers.
 */
export type ComponentProperties<K extends string> = Record<
  string,
  InjectProperty<K> | ParameterProperty
>;

/** Properties a provider may declare. */
export type ProviderProperties<K extends string> = Record<
  string,
  InjectProperty<K> | ProvidedProperty<K> | ParameterProperty
>;

/**
 * Maps declared properties to the values a `build` function receives.
 *
 * @example
 * ```typescript
 * // { output: Output; year: number }
 * type Values = ResolvedProperties<
 *   AppServices,
 *   { output: InjectProperty<'output'>; year: ParameterProperty<number> }
 * >;
 * ```
 */
export type ResolvedProperties<TContract, P> = {
  [N in keyof P]: P[N] extends InjectProperty<infer K>
    ? K extends keyof TContract
      ? TContract[K]
      : never
    : P[N] extends ProvidedProperty<infer K>
      ? K extends keyof TContract
        ? TContract[K]
        : never
      : P[N] extends ParameterProperty<infer T>
        ? T
        : never;
};

/**
 * The parameter overlay shape of a set of properties: parameter names to their
 * value types.
 */
export type ParametersOf<P> = {
  [N in keyof P as P[N] extends ParameterProperty
    ? N
    : never]: P[N] extends ParameterProperty<infer T> ? T : never;
};

/**
 * Declaration of one implementation: its dependencies and how to build it
 * from them.
 *
 * @example
 * ```typescript
 * const writer: ServiceDefinition<
 *   AppServices,
 *   { output: InjectProperty<'output'> },
 *   DateWriter
 * > = {
 *   implementation: 'TodayWriter',
 *   properties: { output: inject('output') },
 *   build: ({ output }) => new TodayWriter(output),
 * };
 * ```
 */
export interface ServiceDefinition<TContract, P, R> {
  /**
   * Implementation name shown in errors, logs and introspection. Defaults to
   * the key.
   */
  implementation?: string;
  /** Declared dependencies. Key order is the order they are resolved in. */
  properties?: P;
  build(properties: ResolvedProperties<TContract, P>): R;
}

/**
 * Replacement factory for a sync provider, installed with
 * `withProviderOverride()`.
 */
export type ProviderFn<M, I> = (module: M) => I;

/**
 * Replacement factory for an async provider, installed with
 * `withAsyncProviderOverride()`.
 */
export type AsyncProviderFn<M, I> = (module: M) => Promise<I>;

interface BindingBase {
  readonly key: string;
  readonly implementation: string;
  readonly properties: Readonly<Record<string, Property>>;
}

export interface ComponentBinding extends BindingBase {
  readonly kind: 'component';
  build(values: Record<string, unknown>): unknown;
}

export interface ProviderBinding extends BindingBase {
  readonly kind: 'provider';
  build(values: Record<string, unknown>): unknown;
}

export interface AsyncProviderBinding extends BindingBase {
  readonly kind: 'async-provider';
  build(values: Record<string, unknown>): Promise<unknown>;
}

/** One entry of the binding table, with its types erased. */
export type Binding = ComponentBinding | ProviderBinding | AsyncProviderBinding;

/**
 * Options for building a module.
 */
export interface ModuleOptions {
  /**
   * Optional name for the module, shown by `String(module)` and bound to
   * every log line.
   */
  name?: string;
  /**
   * pino logger receiving construction and override events. Defaults to a
   * silent logger.
   */
  logger?: Logger;
}

/**
 * Overrides collected by a `ModuleBuilder`, handed to the module it builds.
 * @internal
 */
export interface StagedOverrides<M> {
  parameters: ReadonlyMap<string, ReadonlyMap<string, unknown>>;
  instances: ReadonlyMap<string, unknown>;
  providers: ReadonlyMap<string, ProviderFn<M, unknown>>;
  asyncProviders: ReadonlyMap<string, AsyncProviderFn<M, unknown>>;
}

/**
 * Full binding graph representation of a module.
 */
export interface ModuleGraph {
  /** Optional name of the module. */
  name?: string;
  /** Every bound key. */
  bindings: Record<string, BindingInfo>;
}

/**
 * Detailed metadata about a single binding.
 */
export interface BindingInfo {
  key: string;
  kind: BindingKind;
  /** Implementation name given at registration. */
  implementation: string;
  /** Whether a component's instance exists. Always `false` for providers. */
  resolved: boolean;
  /** Whether the builder replaced this binding's instance or factory. */
  overridden: boolean;
  /** Keys of the declared component and provider dependencies, in order. */
  deps: string[];
  /** Names of the declared parameters. */
  parameters: string[];
}

/**
 * Snapshot of module state and diagnostic warnings.
 */
export interface ModuleHealth {
  totalBindings: number;
  /** Component keys already constructed (or overridden). */
  resolved: string[];
  /** Component keys not constructed yet. */
  unresolved: string[];
  warnings: ModuleWarning[];
}

/**
 * A diagnostic warning detected while building the module.
 */
export interface ModuleWarning {
  /**
   * Warning type:
   * - `ignored_parameters`: a component has both an instance override and a
   *   parameter overlay; the instance wins and the overlay is never read.
   */
  type: 'ignored_parameters';
  message: string;
  details: Record<string, unknown>;
}

/**
 * Validates binding tables and staged parameters, and suggests keys for typos.
 */
export interface IValidator {
  validateBindings(bindings: ReadonlyMap<string, Binding>): void;
  validateParameters(
    bindings: ReadonlyMap<string, Binding>,
    parameters: ReadonlyMap<string, ReadonlyMap<string, unknown>>,
    instances: ReadonlyMap<string, unknown>,
  ): void;
  suggestKey(key: string, registered: string[]): string | undefined;
}

/**
 * Tracks the keys on the current resolution path.
 */
export interface ICycleDetector {
  enter(key: string): void;
  leave(key: string): void;
  isResolving(key: string): boolean;
  path(): string[];
}

/**
 * Core resolver contract. Keys are untyped here; `Module` restores the types.
 */
export interface IResolver {
  resolve(key: string, chain?: string[]): unknown;
  provide(key: string, chain?: string[]): unknown;
  asyncProvide(key: string, chain?: string[]): Promise<unknown>;
  isResolved(key: string): boolean;
  isOverridden(key: string): boolean;
  getBindings(): ReadonlyMap<string, Binding>;
  getResolvedKeys(): string[];
  getWarnings(): AnyWarning[];
  getName(): string | undefined;
}
