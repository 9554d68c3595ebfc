import type { FinishReason, Usage } from './result.js';

/**
 * Wire-neutral events a `ProviderAdapter` emits while a response
 * streams. Adapters translate their vendor's protocol into these.
 */
export type StreamEvent =
  | { readonly type: 'start'; readonly id: string; readonly model: string }
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'thinking'; readonly text: string }
  | ToolCallEvent
  | { readonly type: 'finish'; readonly finishReason: FinishReason; readonly usage: Usage };

/**
 * Tool calls are keyed by their position in the response. `toolCallId` is
 * empty for providers that do not issue ids.
 */
export type ToolCallEvent =
  | {
      readonly type: 'toolCallStart';
      readonly index: number;
      readonly toolCallId: string;
      readonly toolName: string;
    }
  | { readonly type: 'toolCallArgs'; readonly index: number; readonly argsDelta: string }
  | { readonly type: 'toolCallEnd'; readonly index: number };
