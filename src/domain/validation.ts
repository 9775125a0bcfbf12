import { CycleDetector } from '../infrastructure/cycle-detector.js';
import {
  CircularDependencyError,
  ComponentDependsOnProviderError,
  DependencyKindError,
  MissingBindingError,
  MissingParameterError,
  UnknownParameterError,
} from './errors.js';
import type { Binding, BindingKind, IValidator } from './types.js';

/**
 * Validates binding tables and staged parameters, and provides fuzzy key
 * matching.
 *
 * @example
 * ```typescript
 * const validator = new Validator();
 * validator.validateBindings(bindings);
 * // throws MissingBindingError, ComponentDependsOnProviderError, ...
 * ```
 */
export class Validator implements IValidator {
  /**
   * Checks the whole binding table once. Order of checks:
   * unbound keys and provider parameters, components reaching providers,
   * property kinds, then cycles.
   */
  validateBindings(bindings: ReadonlyMap<string, Binding>): void {
    const registered = [...bindings.keys()];

    for (const binding of bindings.values()) {
      for (const [name, property] of Object.entries(binding.properties)) {
        if (property.kind === 'parameter') {
          if (binding.kind !== 'component' && !property.hasDefault) {
            throw new MissingParameterError(binding.key, name, binding.kind);
          }
          continue;
        }
        if (!bindings.has(property.key)) {
          throw new MissingBindingError(
            binding.key,
            name,
            property.key,
            registered,
            this.suggestKey(property.key, registered),
          );
        }
      }
    }

    this.checkComponentsAvoidProviders(bindings);

    for (const binding of bindings.values()) {
      this.checkPropertyKinds(binding, bindings);
    }

    this.checkCycles(bindings);
  }

  /**
   * Checks the parameter overlays staged on a builder: every overlaid name
   * must be a declared parameter, and every parameter of a component that will
   * be constructed needs a default or an overlay value. An overlay entry
   * holding `undefined` counts as no value.
   */
  validateParameters(
    bindings: ReadonlyMap<string, Binding>,
    parameters: ReadonlyMap<string, ReadonlyMap<string, unknown>>,
    instances: ReadonlyMap<string, unknown>,
  ): void {
    for (const [key, overlay] of parameters) {
      const binding = bindings.get(key);
      if (!binding) continue;
      const declared = parameterNames(binding);
      for (const name of overlay.keys()) {
        if (!declared.includes(name)) {
          throw new UnknownParameterError(key, name, declared);
        }
      }
    }

    for (const binding of bindings.values()) {
      if (binding.kind !== 'component' || instances.has(binding.key)) continue;
      const overlay = parameters.get(binding.key);
      for (const [name, property] of Object.entries(binding.properties)) {
        if (
          property.kind === 'parameter' &&
          !property.hasDefault &&
          overlay?.get(name) === undefined
        ) {
          throw new MissingParameterError(binding.key, name, binding.kind);
        }
      }
    }
  }

  /**
   * Finds the closest registered key to a missing key using Levenshtein
   * distance.
   * Returns `undefined` below 50% similarity.
   *
   * @example
   * ```typescript
   * validator.suggestKey('ouput', ['output', 'writer']);
   * // 'output'
   * ```
   */
  suggestKey(key: string, registered: string[]): string | undefined {
    let bestMatch: string | undefined;
    let bestDistance = Infinity;

    for (const candidate of registered) {
      const distance = levenshtein(key, candidate);
      if (distance < bestDistance) {
        bestDistance = distance;
        bestMatch = candidate;
      }
    }

    if (!bestMatch) return undefined;
    const maxLen = Math.max(key.length, bestMatch.length);
    const similarity = 1 - bestDistance / maxLen;
    return similarity >= 0.5 ? bestMatch : undefined;
  }

  /**
   * Walks each component's dependencies; any provider on the way rejects the
   * table.
   */
  private checkComponentsAvoidProviders(
    bindings: ReadonlyMap<string, Binding>,
  ): void {
    const cleared = new Set<string>();

    const visit = (binding: Binding, detector: CycleDetector): void => {
      if (cleared.has(binding.key) || detector.isResolving(binding.key)) return;
      detector.enter(binding.key);
      for (const key of dependencyKeys(binding)) {
        const target = bindings.get(key);
        if (!target) continue;
        if (target.kind !== 'component') {
          throw new ComponentDependsOnProviderError([
            ...detector.path(),
            target.key,
          ]);
        }
        visit(target, detector);
      }
      detector.leave(binding.key);
      cleared.add(binding.key);
    };

    for (const binding of bindings.values()) {
      if (binding.kind === 'component') visit(binding, new CycleDetector());
    }
  }

  private checkPropertyKinds(
    binding: Binding,
    bindings: ReadonlyMap<string, Binding>,
  ): void {
    for (const [name, property] of Object.entries(binding.properties)) {
      if (property.kind === 'parameter') continue;
      const target = bindings.get(property.key);
      if (!target) continue;

      let expected: BindingKind[];
      if (property.kind === 'inject') {
        expected = ['component'];
      } else if (binding.kind === 'async-provider') {
        expected = ['provider', 'async-provider'];
      } else {
        expected = ['provider'];
      }

      if (!expected.includes(target.kind)) {
        throw new DependencyKindError(
          binding.key,
          name,
          target.key,
          expected,
          target.kind,
        );
      }
    }
  }

  private checkCycles(bindings: ReadonlyMap<string, Binding>): void {
    const done = new Set<string>();
    const detector = new CycleDetector();

    const visit = (key: string): void => {
      if (done.has(key)) return;
      if (detector.isResolving(key)) {
        throw new CircularDependencyError(key, detector.path());
      }
      const binding = bindings.get(key);
      if (!binding) return;
      detector.enter(key);
      for (const dep of dependencyKeys(binding)) visit(dep);
      detector.leave(key);
      done.add(key);
    };

    for (const key of bindings.keys()) visit(key);
  }
}

/**
 * Keys of a binding's component and provider dependencies, in declaration
 * order.
 */
export function dependencyKeys(binding: Binding): string[] {
  const keys: string[] = [];
  for (const property of Object.values(binding.properties)) {
    if (property.kind !== 'parameter') keys.push(property.key);
  }
  return keys;
}

/** Names of a binding's parameter properties. */
export function parameterNames(binding: Binding): string[] {
  return Object.entries(binding.properties)
    .filter(([, property]) => property.kind === 'parameter')
    .map(([name]) => name);
}

/**
 * Levenshtein distance between two strings.
 * Used for fuzzy key suggestion in error messages.
 */
function levenshtein(a: string, b: string): number {
  const la = a.length;
  const lb = b.length;

  if (la === 0) return lb;
  if (lb === 0) return la;

  let prev = new Array<number>(lb + 1);
  let curr = new Array<number>(lb + 1);

  for (let j = 0; j <= lb; j++) prev[j] = j;

  for (let i = 1; i <= la; i++) {
    curr[0] = i;
    for (let j = 1; j <= lb; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[lb];
}
