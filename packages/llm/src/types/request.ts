import type { ChatMessage } from './message.js';
import type { ToolDefinition } from './tool.js';
import type { ResponseFormat } from './config.js';

export type LLMRequest = {
  readonly model: string;
  readonly messages: ReadonlyArray<ChatMessage>;
  readonly tools?: ReadonlyArray<ToolDefinition>;
  readonly responseFormat?: ResponseFormat;
  readonly temperature?: number;
  readonly enableThinking?: boolean;
  readonly signal?: AbortSignal;
  readonly providerOptions?: Readonly<Record<string, unknown>>;
};
