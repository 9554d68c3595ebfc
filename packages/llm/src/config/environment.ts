import { ConfigurationError } from '../types/index.js';

/**
 * Values consulted before `process.env`. Tests fill this in and set
 * `useOnly` to keep the host environment out of the picture.
 */
export const agentEnvironment: {
  values: Record<string, string>;
  useOnly: boolean;
} = {
  values: {},
  useOnly: false,
};

export function tryGetEnv(name: string): string | undefined {
  const override = agentEnvironment.values[name];
  if (override !== undefined && override.length > 0) {
    return override;
  }

  if (agentEnvironment.useOnly) {
    return undefined;
  }

  const value = process.env[name];
  return value !== undefined && value.length > 0 ? value : undefined;
}

export function getEnv(name: string): string {
  const value = tryGetEnv(name);
  if (value === undefined) {
    throw new ConfigurationError(`environment variable ${name} is not set`);
  }
  return value;
}

export function resetAgentEnvironment(): void {
  agentEnvironment.values = {};
  agentEnvironment.useOnly = false;
}
