import type { Part } from './content.js';
import type { ChatMessage } from './message.js';
import type { LLMRequest } from './request.js';
import type {
  BatchEmbeddingsResult,
  ChatResult,
  EmbeddingsResult,
  MediaGenerationResult,
} from './result.js';
import type { StreamEvent } from './stream.js';
import type { Tool } from './tool.js';
import type { JsonSchema } from './config.js';

/**
 * Wire-neutral seam implemented by an HTTP binding for one vendor API.
 */
export interface ProviderAdapter {
  readonly name: string;
  stream(request: LLMRequest): AsyncIterable<StreamEvent>;
  close?(): Promise<void>;
}

export type ChatRequestOptions = {
  readonly outputSchema?: JsonSchema;
  /** Replaces the model's configured tools for this request. */
  readonly tools?: ReadonlyArray<Tool>;
  readonly signal?: AbortSignal;
};

export interface ChatModel {
  readonly name: string;
  readonly tools: ReadonlyArray<Tool>;
  sendStream(
    messages: ReadonlyArray<ChatMessage>,
    options?: ChatRequestOptions,
  ): AsyncIterable<ChatResult<string>>;
  dispose(): Promise<void>;
}

export type MediaRequestOptions = {
  readonly mimeTypes: ReadonlyArray<string>;
  readonly history?: ReadonlyArray<ChatMessage>;
  readonly attachments?: ReadonlyArray<Part>;
  readonly outputSchema?: JsonSchema;
  readonly options?: Readonly<Record<string, unknown>>;
  readonly signal?: AbortSignal;
};

export interface MediaGenerationModel {
  readonly name: string;
  generateMediaStream(
    prompt: string,
    options: MediaRequestOptions,
  ): AsyncIterable<MediaGenerationResult>;
  dispose(): Promise<void>;
}

export interface EmbeddingsModel {
  readonly name: string;
  embedQuery(query: string): Promise<EmbeddingsResult>;
  embedDocuments(texts: ReadonlyArray<string>): Promise<BatchEmbeddingsResult>;
  dispose(): Promise<void>;
}

export type ModelKind = 'chat' | 'embeddings' | 'media';

export type ProviderCapability =
  | 'chat'
  | 'multiToolCalls'
  | 'typedOutput'
  | 'typedOutputWithTools'
  | 'thinking'
  | 'mediaGeneration'
  | 'embeddings';

export type ChatModelOptions = {
  readonly name?: string;
  readonly tools?: ReadonlyArray<Tool>;
  readonly temperature?: number;
  readonly enableThinking?: boolean;
  readonly options?: Readonly<Record<string, unknown>>;
};

export type MediaModelOptions = {
  readonly name?: string;
  readonly tools?: ReadonlyArray<Tool>;
  readonly options?: Readonly<Record<string, unknown>>;
};

export type EmbeddingsModelOptions = {
  readonly name?: string;
  readonly options?: Readonly<Record<string, unknown>>;
};

export interface Provider {
  readonly name: string;
  readonly displayName: string;
  readonly aliases: ReadonlyArray<string>;
  readonly defaultModelNames: Readonly<Partial<Record<ModelKind, string>>>;
  readonly capabilities: ReadonlySet<ProviderCapability>;
  createChatModel(options?: ChatModelOptions): ChatModel;
  createMediaModel?(options?: MediaModelOptions): MediaGenerationModel;
  createEmbeddingsModel?(options?: EmbeddingsModelOptions): EmbeddingsModel;
}
