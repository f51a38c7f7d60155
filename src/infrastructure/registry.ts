import type { IRegistry } from '../domain/types.js';
import type { Provider } from './provider.js';

/**
 * Providers by name, in registration order. Deleting and setting a name
 * again moves it to the end.
 */
export class Registry implements IRegistry {
  private readonly providers = new Map<string, Provider>();

  constructor(private readonly name?: string) {}

  getName(): string | undefined {
    return this.name;
  }

  get(name: string): Provider | undefined {
    return this.providers.get(name);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  set(name: string, provider: Provider): void {
    this.providers.set(name, provider);
  }

  delete(name: string): void {
    this.providers.delete(name);
  }

  keys(): string[] {
    return [...this.providers.keys()];
  }

  values(): Provider[] {
    return [...this.providers.values()];
  }

  entries(): [string, Provider][] {
    return [...this.providers.entries()];
  }
}
