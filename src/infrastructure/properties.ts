import {
  type InjectProperty,
  type ParameterProperty,
  PROPERTY_MARKER,
  type Property,
  type ProvidedProperty,
} from '../domain/types.js';

/**
 * Declares a dependency on the component bound to `key`.
 * The component is resolved once and the same instance is passed to every
 * dependent.
 *
 * @example
 * ```typescript
 * defineModule<AppServices>()
 *   .component('output', { build: () => new ConsoleOutput() })
 *   .component('writer', {
 *     properties: { output: inject('output') },
 *     build: ({ output }) => new TodayWriter(output),
 *   });
 * ```
 */
export function inject<K extends string>(key: K): InjectProperty<K> {
  return { [PROPERTY_MARKER]: true, kind: 'inject', key };
}

/**
 * Declares a dependency on the provider bound to `key`.
 * A fresh instance is provided for every construction of the dependent
 * provider.
 */
export function provided<K extends string>(key: K): ProvidedProperty<K> {
  return { [PROPERTY_MARKER]: true, kind: 'provided', key };
}

/**
 * Declares a parameter. Without a default, a component parameter must be
 * supplied through `withComponentParameters()` before the module is built.
 *
 * @example
 * ```typescript
 * properties: {
 *   today: param('Jan 1'),
 *   year: param(1970),
 *   locale: param<string>(),
 * }
 * ```
 */
export function param<T>(): ParameterProperty<T>;
export function param<T>(defaultValue: T): ParameterProperty<T>;
export function param<T>(...args: [] | [T]): ParameterProperty<T> {
  if (args.length === 0) {
    return { [PROPERTY_MARKER]: true, kind: 'parameter', hasDefault: false };
  }
  return {
    [PROPERTY_MARKER]: true,
    kind: 'parameter',
    hasDefault: true,
    defaultValue: args[0],
  };
}

/**
 * Checks if a value is a property descriptor created by `inject()`,
 * `provided()` or `param()`.
 */
export function isProperty(value: unknown): value is Property {
  return (
    typeof value === 'object' &&
    value !== null &&
    PROPERTY_MARKER in value &&
    value[PROPERTY_MARKER] === true
  );
}
