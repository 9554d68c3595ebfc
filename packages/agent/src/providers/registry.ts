import type { Provider } from '@chorus/llm';
import { ConfigurationError, getLogger } from '@chorus/llm';

const logger = getLogger('providers');

export type ProviderFactory = () => Provider;

type Registration = {
  readonly name: string;
  readonly factory: ProviderFactory;
};

// Keyed by lower-cased name and alias; several keys share one registration
const registrations = new Map<string, Registration>();

/**
 * Registers a provider under its name and aliases. Registering a name again
 * replaces the earlier factory. The factory runs on every lookup.
 */
export function registerProvider(
  name: string,
  factory: ProviderFactory,
  aliases: ReadonlyArray<string> = [],
): void {
  const registration: Registration = { name: name.toLowerCase(), factory };
  for (const key of [name, ...aliases]) {
    registrations.set(key.toLowerCase(), registration);
  }
  logger.debug(`Registered provider ${name}${aliases.length > 0 ? ` (aliases: ${aliases.join(', ')})` : ''}`);
}

export function getProvider(name: string): Provider {
  const registration = registrations.get(name.toLowerCase());
  if (!registration) {
    const available = providerNames().join(', ');
    throw new ConfigurationError(`Unknown provider '${name}'. Available providers: ${available || '(none)'}`);
  }
  return registration.factory();
}

/**
 * Every registered provider once, whatever number of aliases it has.
 */
export function allProviders(): ReadonlyArray<Provider> {
  const unique = new Set(registrations.values());
  return Array.from(unique, (registration) => registration.factory());
}

export function providerNames(): ReadonlyArray<string> {
  return Array.from(new Set(Array.from(registrations.values(), (r) => r.name))).sort();
}

export function resetProviderRegistry(): void {
  registrations.clear();
}
