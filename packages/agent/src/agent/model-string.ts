import { ValidationError } from '@chorus/llm';

export type ModelString = {
  readonly providerName: string;
  readonly chatModelName?: string;
  readonly embeddingsModelName?: string;
  readonly mediaModelName?: string;
};

/**
 * Parses `provider`, `provider:model`, `provider/model` or
 * `provider?chat=…&embeddings=…&media=…`. In the first three forms the
 * model, if any, is the chat model; everything after the first separator
 * belongs to it, so `openrouter/google/gemini-2.5-flash` keeps its slash.
 */
export function parseModelString(value: string): ModelString {
  const trimmed = value.trim();
  const query = trimmed.indexOf('?');

  if (query >= 0) {
    const providerName = trimmed.slice(0, query);
    requireProvider(providerName, value);
    const params = new URLSearchParams(trimmed.slice(query + 1));
    return {
      providerName,
      chatModelName: params.get('chat') || undefined,
      embeddingsModelName: params.get('embeddings') || undefined,
      mediaModelName: params.get('media') || undefined,
    };
  }

  const separator = trimmed.search(/[:/]/);
  if (separator < 0) {
    requireProvider(trimmed, value);
    return { providerName: trimmed };
  }

  const providerName = trimmed.slice(0, separator);
  requireProvider(providerName, value);
  const chatModelName = trimmed.slice(separator + 1);
  return chatModelName.length > 0 ? { providerName, chatModelName } : { providerName };
}

/**
 * Inverse of parseModelString: the shortest form that carries every name.
 */
export function formatModelString(model: ModelString): string {
  const { providerName, chatModelName, embeddingsModelName, mediaModelName } = model;

  if (!embeddingsModelName && !mediaModelName) {
    return chatModelName ? `${providerName}:${chatModelName}` : providerName;
  }

  const params = new URLSearchParams();
  if (chatModelName) params.set('chat', chatModelName);
  if (embeddingsModelName) params.set('embeddings', embeddingsModelName);
  if (mediaModelName) params.set('media', mediaModelName);
  return `${providerName}?${params.toString()}`;
}

function requireProvider(providerName: string, value: string): void {
  if (providerName.length === 0) {
    throw new ValidationError(`Invalid model string '${value}': missing provider name`);
  }
}
