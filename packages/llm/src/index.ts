// @chorus/llm: message model, provider contracts and the adapter-backed chat model

export * from './types/index.js';
export * from './config/environment.js';
export * from './logging/logger.js';
export * from './utils/retry.js';
export * from './utils/json-schema.js';
export { DEFAULT_RETRY_POLICY } from './model/constants.js';
export { StreamEventAccumulator } from './model/stream-accumulator.js';
export { AdapterChatModel, type AdapterChatModelOptions } from './model/adapter-model.js';
export { createAdapterProvider, type AdapterProviderConfig } from './model/adapter-provider.js';
