import type { BindingKind } from './types.js';

/**
 * Base class for all errors raised by the library itself.
 * Every error includes a human-readable `hint` and structured `details`.
 * Errors thrown by provider code are never wrapped in one of these.
 *
 * @example
 * ```typescript
 * try { definition.compose(); }
 * catch (e) {
 *   if (e instanceof InjectionError) {
 *     console.log(e.hint);    // actionable fix
 *     console.log(e.details); // structured context
 *   }
 * }
 * ```
 */
export abstract class InjectionError extends Error {
  abstract readonly hint: string;
  abstract readonly details: Record<string, unknown>;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Base class for invalid binding tables and invalid builder state.
 * A composition error means no module was built.
 */
export abstract class CompositionError extends InjectionError {}

function capitalize(key: string): string {
  return key.length > 0 ? `${key[0].toUpperCase()}${key.slice(1)}` : key;
}

/**
 * Thrown when the same key is registered twice in a module definition.
 *
 * @example
 * ```typescript
 * defineModule<App>().component('output', ...).provider('output', ...);
 * // DuplicateBindingError: 'output' is already bound as a component.
 * ```
 */
export class DuplicateBindingError extends CompositionError {
  readonly hint: string;
  readonly details: {
    key: string;
    existing: BindingKind;
    attempted: BindingKind;
  };

  constructor(key: string, existing: BindingKind, attempted: BindingKind) {
    super(`'${key}' is already bound as ${article(existing)} ${existing}.`);
    this.hint =
      `Each key has exactly one binding. Remove one of the '${key}' registrations, or use a builder override to replace it in a single module.`;
    this.details = { key, existing, attempted };
  }
}

/**
 * Thrown when a definition or property descriptor is malformed, which only
 * untyped callers can produce.
 */
export class InvalidBindingError extends CompositionError {
  readonly hint: string;
  readonly details: { key: string; reason: string };

  constructor(key: string, reason: string) {
    super(`Binding '${key}' is invalid: ${reason}.`);
    this.hint =
      'Declare properties with inject(), provided() and param(), and give every binding a build function.';
    this.details = { key, reason };
  }
}

/**
 * Thrown by `compose()` when a property names a key that has no binding.
 * Includes a fuzzy suggestion if a similar key exists.
 *
 * @example
 * ```typescript
 * // MissingBindingError: 'writer' depends on 'ouput' (property 'output'), which is not bound.
 * // Did you mean 'output'?
 * ```
 */
export class MissingBindingError extends CompositionError {
  readonly hint: string;
  readonly details: {
    from: string;
    property: string;
    key: string;
    registered: string[];
    suggestion: string | undefined;
  };

  constructor(
    from: string,
    property: string,
    key: string,
    registered: string[],
    suggestion?: string,
  ) {
    const suggestionStr = suggestion
      ? `\n\nDid you mean '${suggestion}'?`
      : '';
    super(
      `'${from}' depends on '${key}' (property '${property}'), which is not bound.\nRegistered keys: [${registered.join(', ')}]${suggestionStr}`,
    );
    this.hint = suggestion
      ? `Did you mean '${suggestion}'? Or bind '${key}':\n  .component('${key}', { build: () => new ${capitalize(key)}() })`
      : `Bind '${key}':\n  .component('${key}', { build: () => new ${capitalize(key)}() })`;
    this.details = { from, property, key, registered, suggestion };
  }
}

/**
 * Thrown by `compose()` when a component reaches a provider through its
 * dependencies.
 * The provided value would be frozen inside the long-lived component.
 *
 * @example
 * ```typescript
 * // ComponentDependsOnProviderError: Component 'service' depends on provider 'connection'.
 * // Path: service -> repository -> connection
 * ```
 */
export class ComponentDependsOnProviderError extends CompositionError {
  readonly hint: string;
  readonly details: { component: string; provider: string; path: string[] };

  constructor(path: string[]) {
    const component = path[0];
    const provider = path[path.length - 1];
    super(
      `Component '${component}' depends on provider '${provider}'.\n\nPath: ${path.join(' -> ')}`,
    );
    this.hint = [
      'A component lives as long as the module, so a provided value would be trapped inside it.',
      '',
      'To fix:',
      `  1. Register '${path[path.length - 2]}' as a provider too`,
      `  2. Register '${provider}' as a component if one shared instance is enough`,
    ].join('\n');
    this.details = { component, provider, path };
  }
}

/**
 * Thrown by `compose()` when a property points at a binding of the wrong kind:
 * `inject()` of a provider from a provider, `provided()` of a component,
 * or a sync provider's `provided()` of an async provider.
 */
export class DependencyKindError extends CompositionError {
  readonly hint: string;
  readonly details: {
    from: string;
    property: string;
    key: string;
    expected: BindingKind[];
    actual: BindingKind;
  };

  constructor(
    from: string,
    property: string,
    key: string,
    expected: BindingKind[],
    actual: BindingKind,
  ) {
    super(
      `'${from}' property '${property}' expects ${expected.join(' or ')} '${key}', but it is bound as ${article(actual)} ${actual}.`,
    );
    this.hint =
      actual === 'async-provider'
        ? `Only async providers can await '${key}'. Register '${from}' with asyncProvider().`
        : actual === 'component'
          ? `Use inject('${key}') for a component dependency.`
          : `Use provided('${key}') for a provider dependency.`;
    this.details = { from, property, key, expected, actual };
  }
}

/**
 * Thrown when a parameter has neither a default nor an overlay value.
 * Provider parameters are checked by `compose()`, component parameters by
 * `build()`.
 *
 * @example
 * ```typescript
 * // MissingParameterError: Parameter 'today' of 'writer' has no default and no value.
 * ```
 */
export class MissingParameterError extends CompositionError {
  readonly hint: string;
  readonly details: { key: string; parameter: string; kind: BindingKind };

  constructor(key: string, parameter: string, kind: BindingKind) {
    super(`Parameter '${parameter}' of '${key}' has no default and no value.`);
    this.hint =
      kind === 'component'
        ? `Give it a default with param(<value>), or supply it:\n  builder.withComponentParameters('${key}', { ${parameter}: <value> })`
        : `Provider parameters cannot be overlaid. Give it a default with param(<value>).`;
    this.details = { key, parameter, kind };
  }
}

/**
 * Thrown by `build()` when a parameter overlay names a property that is not a
 * parameter.
 */
export class UnknownParameterError extends CompositionError {
  readonly hint: string;
  readonly details: { key: string; parameter: string; declared: string[] };

  constructor(key: string, parameter: string, declared: string[]) {
    super(
      `'${key}' has no parameter '${parameter}'. Declared parameters: [${declared.join(', ')}]`,
    );
    this.hint =
      `Remove '${parameter}' from the overlay, or declare it on '${key}' with param().`;
    this.details = { key, parameter, declared };
  }
}

/**
 * Thrown by `compose()` when bindings depend on each other in a cycle.
 *
 * @example
 * ```typescript
 * // CircularDependencyError: Circular dependency detected while composing 'auth'.
 * // Cycle: auth -> user -> auth
 * ```
 */
export class CircularDependencyError extends CompositionError {
  readonly hint: string;
  readonly details: { key: string; chain: string[]; cycle: string };

  constructor(key: string, chain: string[]) {
    const start = chain.indexOf(key);
    const cycle = [...chain.slice(start === -1 ? 0 : start), key].join(' -> ');
    super(
      `Circular dependency detected while composing '${chain[0] ?? key}'.\n\nCycle: ${cycle}`,
    );
    this.hint = [
      'To fix:',
      '  1. Extract shared logic into a new binding both can use',
      "  2. Restructure so one doesn't depend on the other",
      '  3. Use a mediator/event pattern to decouple them',
    ].join('\n');
    this.details = { key, chain, cycle };
  }
}

/**
 * Thrown when a key is looked up that the module does not bind.
 * Typed callers cannot reach it.
 */
export class BindingNotFoundError extends InjectionError {
  readonly hint: string;
  readonly details: {
    key: string;
    registered: string[];
    suggestion: string | undefined;
  };

  constructor(key: string, registered: string[], suggestion?: string) {
    const suggestionStr = suggestion
      ? `\n\nDid you mean '${suggestion}'?`
      : '';
    super(
      `'${key}' is not bound.\nRegistered keys: [${registered.join(', ')}]${suggestionStr}`,
    );
    this.hint = suggestion
      ? `Did you mean '${suggestion}'?`
      : `Bind '${key}' in the module definition before composing it.`;
    this.details = { key, registered, suggestion };
  }
}

/**
 * Thrown when a key is used through the wrong operation, e.g. `resolve()` on
 * a provider.
 */
export class BindingKindError extends InjectionError {
  readonly hint: string;
  readonly details: { key: string; expected: BindingKind; actual: BindingKind };

  constructor(key: string, expected: BindingKind, actual: BindingKind) {
    super(
      `'${key}' is bound as ${article(actual)} ${actual}, not ${article(expected)} ${expected}.`,
    );
    this.hint =
      actual === 'component'
        ? `Use resolve('${key}').`
        : actual === 'provider'
          ? `Use provide('${key}') or asyncProvide('${key}').`
          : `Use asyncProvide('${key}').`;
    this.details = { key, expected, actual };
  }
}

/**
 * Thrown when a component's construction reaches the same component again.
 * Only dynamic access (a build closing over the module) can get here, since
 * `compose()` rejects declared cycles.
 */
export class ReentrantInitializationError extends InjectionError {
  readonly hint: string;
  readonly details: { key: string; chain: string[] };

  constructor(key: string, chain: string[]) {
    super(
      `Component '${key}' was requested while it was being constructed.\n\nResolution chain: ${chain.join(' -> ')}`,
    );
    this.hint =
      `'${key}' reaches itself at build time. Declare the dependency with inject() so compose() can report the cycle, then break it.`;
    this.details = { key, chain };
  }
}

/**
 * Thrown when a component's build function throws. Components are expected
 * to be infallible; the original error is kept in `cause`.
 *
 * @example
 * ```typescript
 * // ComponentBuildError: Component 'db' threw while building: "Connection refused"
 * ```
 */
export class ComponentBuildError extends InjectionError {
  readonly hint: string;
  readonly details: { key: string; chain: string[]; originalError: string };
  readonly originalError: unknown;

  constructor(key: string, chain: string[], originalError: unknown) {
    const origMessage =
      originalError instanceof Error
        ? originalError.message
        : String(originalError);
    const chainStr =
      chain.length > 1
        ? `\n\nResolution chain: ${[...chain.slice(0, -1), `${key} (build threw)`].join(' -> ')}`
        : '';
    super(
      `Component '${key}' threw while building: "${origMessage}"${chainStr}`,
      { cause: originalError },
    );
    this.hint =
      `Components cannot fail. Move fallible work for '${key}' into a provider.`;
    this.details = { key, chain, originalError: origMessage };
    this.originalError = originalError;
  }
}

/**
 * Thrown when a build function or override factory returns `undefined`.
 */
export class UndefinedReturnError extends InjectionError {
  readonly hint: string;
  readonly details: { key: string; chain: string[] };

  constructor(key: string, chain: string[]) {
    const chainStr =
      chain.length > 1 ? `\n\nResolution chain: ${chain.join(' -> ')}` : '';
    super(`Binding '${key}' returned undefined.${chainStr}`);
    this.hint =
      'The build function returned undefined. Did you forget a return statement?';
    this.details = { key, chain };
  }
}

/**
 * Thrown when a `ModuleBuilder` is used after `build()`.
 */
export class BuilderConsumedError extends CompositionError {
  readonly hint: string;
  readonly details: { method: string };

  constructor(method: string) {
    super(`ModuleBuilder.${method}() called after build().`);
    this.hint =
      'A builder produces one module. Call definition.builder() again for another one.';
    this.details = { method };
  }
}

/**
 * Warning emitted when a component has both an instance override and a
 * parameter overlay.
 * The override is used as-is, so the overlay is never read.
 */
export class IgnoredParametersWarning {
  readonly type = 'ignored_parameters' as const;
  readonly message: string;
  readonly hint: string;
  readonly details: { key: string };

  constructor(key: string) {
    this.message =
      `Parameters for component '${key}' are ignored: an instance override is installed.`;
    this.hint =
      `Drop withComponentParameters('${key}', ...) or withComponentOverride('${key}', ...).`;
    this.details = { key };
  }
}

export type AnyWarning = IgnoredParametersWarning;

function article(kind: string): string {
  return /^[aeiou]/.test(kind) ? 'an' : 'a';
}
