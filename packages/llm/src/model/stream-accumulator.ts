import type {
  ChatMessage,
  FinishReason,
  Part,
  StreamEvent,
  ToolCallPart,
  Usage,
} from '../types/index.js';
import { modelMessage } from '../types/index.js';

type PendingToolCall = {
  toolCallId: string;
  toolName: string;
  argsParts: Array<string>;
};

/**
 * Folds provider stream events into one model message: a single merged text
 * part followed by the tool calls in stream order.
 */
export class StreamEventAccumulator {
  private textParts: Array<string> = [];
  private thinkingParts: Array<string> = [];
  private toolCalls: Map<number, PendingToolCall> = new Map();
  private finish: FinishReason | null = null;
  private lastUsage: Usage | null = null;
  private id: string = '';
  private model: string = '';

  process(event: StreamEvent): void {
    switch (event.type) {
      case 'start':
        this.id = event.id;
        this.model = event.model;
        break;

      case 'text':
        this.textParts.push(event.text);
        break;

      case 'thinking':
        this.thinkingParts.push(event.text);
        break;

      case 'toolCallStart':
        this.toolCalls.set(event.index, {
          toolCallId: event.toolCallId,
          toolName: event.toolName,
          argsParts: [],
        });
        break;

      case 'toolCallArgs':
        this.toolCalls.get(event.index)?.argsParts.push(event.argsDelta);
        break;

      case 'toolCallEnd':
        // arguments are complete; parsed lazily in getToolCalls()
        break;

      case 'finish':
        this.finish = event.finishReason;
        this.lastUsage = event.usage;
        break;
    }
  }

  getToolCalls(): Array<ToolCallPart> {
    const calls = Array.from(this.toolCalls.entries()).sort(([a], [b]) => a - b);
    return calls.map(([, call]) => ({
      kind: 'toolCall' as const,
      id: call.toolCallId,
      name: call.toolName,
      arguments: parseArguments(call.argsParts.join('')),
    }));
  }

  toMessage(): ChatMessage {
    const parts: Array<Part> = [];
    const text = this.textParts.join('');
    if (text.length > 0) {
      parts.push({ kind: 'text', text });
    }
    parts.push(...this.getToolCalls());

    return modelMessage(parts, this.model ? { model: this.model } : {});
  }

  responseId(): string {
    return this.id;
  }

  thinking(): string {
    return this.thinkingParts.join('');
  }

  finishReason(): FinishReason {
    if (this.finish !== null) {
      return this.finish;
    }
    return this.toolCalls.size > 0 ? 'toolCalls' : 'stop';
  }

  usage(): Usage | null {
    return this.lastUsage;
  }
}

function parseArguments(json: string): Record<string, unknown> {
  if (!json) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(json);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return {};
  } catch {
    // malformed arguments fall back to an empty object
    return {};
  }
}
