import type {
  ChatModel,
  ChatModelOptions,
  ModelKind,
  Provider,
  ProviderAdapter,
  ProviderCapability,
  RetryPolicy,
} from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { getEnv } from '../config/environment.js';
import { getLogger } from '../logging/logger.js';
import { AdapterChatModel } from './adapter-model.js';

const logger = getLogger('provider');

export type AdapterProviderConfig = {
  readonly name: string;
  readonly displayName?: string;
  readonly aliases?: ReadonlyArray<string>;
  readonly defaultModelNames: Readonly<Partial<Record<ModelKind, string>>>;
  readonly capabilities: ReadonlyArray<ProviderCapability>;
  /** Environment variable holding the API key; omitted for keyless providers. */
  readonly apiKeyName?: string;
  readonly createAdapter: (apiKey: string | null) => ProviderAdapter;
  readonly retryPolicy?: RetryPolicy;
};

/**
 * Turns a wire-level adapter factory into a Provider whose chat models speak
 * the normalized ChatResult stream.
 */
export function createAdapterProvider(config: AdapterProviderConfig): Provider {
  const capabilities: ReadonlySet<ProviderCapability> = new Set(config.capabilities);

  const createChatModel = (options?: ChatModelOptions): ChatModel => {
    const model = options?.name ?? config.defaultModelNames.chat;
    if (!model) {
      throw new ConfigurationError(`provider '${config.name}' has no default chat model; name one explicitly`);
    }

    if (options?.enableThinking && !capabilities.has('thinking')) {
      throw new ConfigurationError(`provider '${config.name}' does not support thinking`);
    }

    const apiKey = config.apiKeyName ? getEnv(config.apiKeyName) : null;

    logger.debug(`Creating chat model ${config.name}:${model}`);

    return new AdapterChatModel({
      adapter: config.createAdapter(apiKey),
      model,
      tools: options?.tools,
      temperature: options?.temperature,
      enableThinking: options?.enableThinking,
      providerOptions: options?.options,
      retryPolicy: config.retryPolicy,
    });
  };

  return {
    name: config.name,
    displayName: config.displayName ?? config.name,
    aliases: config.aliases ?? [],
    defaultModelNames: config.defaultModelNames,
    capabilities,
    createChatModel,
  };
}
