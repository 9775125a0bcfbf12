import { BindingNotFoundError } from '../domain/errors.js';
import type {
  Binding,
  BindingInfo,
  IResolver,
  ModuleGraph,
  ModuleHealth,
  ModuleWarning,
} from '../domain/types.js';
import {
  dependencyKeys,
  parameterNames,
  Validator,
} from '../domain/validation.js';

/**
 * Builds introspection data from a Resolver instance.
 * Provides `inspect()`, `describe()`, `health()`, and `toString()`.
 */
export class Introspection {
  private readonly validator = new Validator();

  constructor(private readonly resolver: IResolver) {}

  /**
   * Returns the full binding graph as a serializable JSON object.
   */
  inspect(): ModuleGraph {
    const bindings: Record<string, BindingInfo> = {};
    for (const binding of this.resolver.getBindings().values()) {
      bindings[binding.key] = this.info(binding);
    }
    const name = this.resolver.getName();
    return name ? { name, bindings } : { bindings };
  }

  /**
   * Returns detailed information about a specific binding.
   */
  describe(key: string): BindingInfo {
    const binding = this.resolver.getBindings().get(key);
    if (!binding) {
      const registered = [...this.resolver.getBindings().keys()];
      throw new BindingNotFoundError(
        key,
        registered,
        this.validator.suggestKey(key, registered),
      );
    }
    return this.info(binding);
  }

  /**
   * Returns module health status with warnings.
   */
  health(): ModuleHealth {
    const componentKeys = [...this.resolver.getBindings().values()]
      .filter((b) => b.kind === 'component')
      .map((b) => b.key);
    const resolvedKeys = this.resolver.getResolvedKeys();
    const resolvedSet = new Set(resolvedKeys);

    const warnings: ModuleWarning[] = this.resolver.getWarnings().map((w) => ({
      type: w.type,
      message: w.message,
      details: w.details,
    }));

    return {
      totalBindings: this.resolver.getBindings().size,
      resolved: resolvedKeys,
      unresolved: componentKeys.filter((k) => !resolvedSet.has(k)),
      warnings,
    };
  }

  /**
   * Returns a human-readable representation of the module.
   */
  toString(): string {
    const parts: string[] = [];
    for (const binding of this.resolver.getBindings().values()) {
      const deps = dependencyKeys(binding);
      const depsStr = deps.length > 0 ? ` -> [${deps.join(', ')}]` : '';
      let status: string;
      if (binding.kind === 'component') {
        status = this.resolver.isResolved(binding.key)
          ? '(resolved)'
          : '(pending)';
      } else {
        status = `(${binding.kind})`;
      }
      parts.push(`${binding.key}${depsStr} ${status}`);
    }
    const name = this.resolver.getName();
    const label = name ? `Module(${name})` : 'Module';
    return `${label} { ${parts.join(', ')} }`;
  }

  private info(binding: Binding): BindingInfo {
    return {
      key: binding.key,
      kind: binding.kind,
      implementation: binding.implementation,
      resolved: this.resolver.isResolved(binding.key),
      overridden: this.resolver.isOverridden(binding.key),
      deps: dependencyKeys(binding),
      parameters: parameterNames(binding),
    };
  }
}
