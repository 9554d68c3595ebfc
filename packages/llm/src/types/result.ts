import type { DataPart, LinkPart } from './content.js';
import type { ChatMessage } from './message.js';

export type FinishReason =
  | 'unspecified'
  | 'stop'
  | 'length'
  | 'toolCalls'
  | 'contentFilter'
  | 'recitation'
  | 'error';

export type Usage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
  readonly reasoningTokens: number;
};

export function emptyUsage(): Usage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
    reasoningTokens: 0,
  };
}

export type ChatResult<T> = {
  readonly id: string;
  readonly output: T;
  readonly messages: ReadonlyArray<ChatMessage>;
  readonly finishReason: FinishReason;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly thinking: string | null;
  readonly usage: Usage | null;
};

/**
 * Builds a chunk with every field defaulted; callers override what they carry.
 */
export function chatResult<T>(output: T, fields?: Partial<Omit<ChatResult<T>, 'output'>>): ChatResult<T> {
  return {
    id: fields?.id ?? '',
    output,
    messages: fields?.messages ?? [],
    finishReason: fields?.finishReason ?? 'unspecified',
    metadata: fields?.metadata ?? {},
    thinking: fields?.thinking ?? null,
    usage: fields?.usage ?? null,
  };
}

export type MediaGenerationResult = {
  readonly id: string;
  readonly assets: ReadonlyArray<DataPart>;
  readonly links: ReadonlyArray<LinkPart>;
  readonly messages: ReadonlyArray<ChatMessage>;
  readonly finishReason: FinishReason;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly usage: Usage | null;
};

export type EmbeddingsResult = {
  readonly embedding: ReadonlyArray<number>;
  readonly usage: Usage | null;
};

export type BatchEmbeddingsResult = {
  readonly embeddings: ReadonlyArray<ReadonlyArray<number>>;
  readonly usage: Usage | null;
};
