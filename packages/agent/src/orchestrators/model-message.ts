import type { ChatMessage, Part, ToolCallPart } from '@chorus/llm';
import { modelMessage, textPart } from '@chorus/llm';
import type { StreamingState } from '../state/streaming-state.js';

/**
 * Folds the model-message fragments of one streamed response into a single
 * message: all text joined into one leading part, the other parts in arrival
 * order, and a repeated tool call id replacing the earlier call.
 */
export class ModelMessageAccumulator {
  private readonly text: Array<string> = [];
  private readonly parts: Array<Part> = [];
  private metadata: Record<string, unknown> = {};

  add(message: ChatMessage): void {
    if (message.role !== 'model') {
      return;
    }

    for (const part of message.parts) {
      if (part.kind === 'text') {
        this.text.push(part.text);
      } else if (part.kind === 'toolCall' && part.id.length > 0) {
        const existing = this.parts.findIndex((p) => p.kind === 'toolCall' && p.id === part.id);
        if (existing >= 0) {
          this.parts[existing] = part;
        } else {
          this.parts.push(part);
        }
      } else {
        this.parts.push(part);
      }
    }

    this.metadata = { ...this.metadata, ...message.metadata };
  }

  get isEmpty(): boolean {
    return this.text.join('').length === 0 && this.parts.length === 0;
  }

  build(): ChatMessage {
    const text = this.text.join('');
    const parts: Array<Part> = text.length > 0 ? [textPart(text), ...this.parts] : [...this.parts];
    return modelMessage(parts, this.metadata);
  }
}

/**
 * Gives every tool call the provider left without an id a turn-unique one.
 */
export function assignToolCallIds(message: ChatMessage, state: StreamingState): ChatMessage {
  if (!message.parts.some((part) => part.kind === 'toolCall' && part.id.length === 0)) {
    return message;
  }

  const parts = message.parts.map((part): Part => {
    if (part.kind !== 'toolCall' || part.id.length > 0) {
      return part;
    }
    const named: ToolCallPart = { ...part, id: state.nextToolCallId() };
    return named;
  });

  return { ...message, parts };
}
