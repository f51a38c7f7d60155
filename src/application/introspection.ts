import type { ContainerGraph, IRegistry, ProviderInfo } from '../domain/types.js';

/**
 * Builds introspection data from a container's registry.
 * Provides `inspect()`, `describe()` and `toString()`.
 */
export class Introspection {
  constructor(private readonly registry: IRegistry) {}

  /**
   * Returns every registration as a serializable object.
   */
  inspect(): ContainerGraph {
    const providers: Record<string, ProviderInfo> = {};
    for (const [name] of this.registry.entries()) {
      providers[name] = this.describe(name);
    }
    const name = this.registry.getName();
    return name ? { name, providers } : { providers };
  }

  describe(name: string): ProviderInfo {
    const registration = this.registry.get(name);
    if (!registration) return { name, kind: undefined, resolved: false };
    return { name, kind: registration.kind, resolved: registration.isResolved() };
  }

  /**
   * Returns a human-readable representation of the container.
   */
  toString(): string {
    const parts: string[] = [];
    for (const [name, registration] of this.registry.entries()) {
      const status = registration.isResolved() ? '(resolved)' : '(pending)';
      parts.push(`${name} -> ${registration.kind} ${status}`);
    }
    const name = this.registry.getName();
    const label = name ? `Container(${name})` : 'Container';
    return `${label} { ${parts.join(', ')} }`;
  }
}
