/**
 * Base class for all container errors.
 * Every error includes a human-readable `hint` and structured `details`.
 *
 * Errors thrown by factories and release routines are never wrapped in one
 * of these: callers always see the original failure.
 *
 * @example
 * ```typescript
 * try { container.resolve('userService'); }
 * catch (e) {
 *   if (e instanceof ContainerError) {
 *     console.log(e.hint);    // how to fix it
 *     console.log(e.details); // structured context
 *   }
 * }
 * ```
 */
export abstract class ContainerError extends Error {
  abstract readonly hint: string;
  abstract readonly details: Record<string, unknown>;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when a provider is built from something that is not callable,
 * or when something other than a provider is registered.
 *
 * @example
 * ```typescript
 * new Singleton('sk-123');
 * // ProviderConfigError: Singleton factory must be a function, got string.
 * ```
 */
export class ProviderConfigError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(owner: string, role: string, actualType: string, expected = 'a function') {
    super(`${owner} ${role} must be ${expected}, got ${actualType}.`);
    this.hint =
      role === 'provider'
        ? 'Wrap the value in a provider: new Singleton(() => value).'
        : `Pass a function as the ${role}, e.g. () => value.`;
    this.details = { owner, role, actualType, expected };
  }
}

/**
 * Something looked up by name was absent: a provider or a configuration path.
 * Catch this to handle both without catching cycles or misconfigured providers.
 */
export abstract class NotFoundError extends ContainerError {}

/**
 * Thrown when resolving a name that has no provider.
 * Includes fuzzy suggestion if a similar name exists.
 *
 * @example
 * ```typescript
 * container.resolve('userRepo');
 * // ProviderNotFoundError: Cannot resolve 'userService': dependency 'userRepo' not found.
 * ```
 */
export class ProviderNotFoundError extends NotFoundError {
  readonly hint: string;
  readonly details: Record<string, unknown>;
  readonly key: string;

  constructor(
    key: string,
    chain: string[],
    registered: string[],
    suggestion?: string,
  ) {
    const chainStr =
      chain.length > 0
        ? `\n\nResolution chain: ${[...chain, `${key} (not found)`].join(' -> ')}`
        : '';
    const registeredStr = `\nRegistered keys: [${registered.join(', ')}]`;
    const suggestionStr = suggestion ? `\n\nDid you mean '${suggestion}'?` : '';

    super(
      `Cannot resolve '${chain[0] ?? key}': dependency '${key}' not found.${chainStr}${registeredStr}${suggestionStr}`,
    );

    const register = `container.register('${key}', new Singleton(/* factory */));`;
    this.hint = suggestion
      ? `Did you mean '${suggestion}'? Or register it:\n  ${register}`
      : `Register it before resolving:\n  ${register}`;
    this.key = key;
    this.details = { key, chain, registered, suggestion };
  }
}

/**
 * Thrown when a configuration path is absent and no default was given.
 *
 * @example
 * ```typescript
 * container.config.get('database.url');
 * // ConfigKeyNotFoundError: Configuration path 'database.url' not found (missing 'url').
 * ```
 */
export class ConfigKeyNotFoundError extends NotFoundError {
  readonly hint: string;
  readonly details: Record<string, unknown>;
  readonly path: string;

  constructor(path: string, missingSegment: string) {
    super(`Configuration path '${path}' not found (missing '${missingSegment}').`);
    this.hint = `Add '${path}' to the loaded configuration, or pass a default: config.get('${path}', fallback).`;
    this.path = path;
    this.details = { path, missingSegment };
  }
}

/**
 * Thrown when a name is resolved while it is already being constructed.
 *
 * @example
 * ```typescript
 * // CircularDependencyError: Circular dependency detected while resolving 'authService'.
 * // Cycle: authService -> userService -> authService
 * ```
 */
export class CircularDependencyError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(key: string, chain: string[]) {
    const cycle = [...chain, key].join(' -> ');
    super(
      `Circular dependency detected while resolving '${chain[0] ?? key}'.\n\nCycle: ${cycle}`,
    );
    this.hint = [
      'To fix:',
      `  1. Pass one side as lazy(deferred(container, '${key}')) and call the getter after construction`,
      '  2. Extract shared logic into a new dependency both can use',
      '  3. Use a mediator/event pattern to decouple them',
    ].join('\n');
    this.details = { key, chain, cycle };
  }
}
