import type { ChatMessage, ChatResult, FinishReason, Usage } from '@chorus/llm';
import { messageText } from '@chorus/llm';

export type ChatResponseAccumulatorOptions = {
  /** Output is the last JSON answer rather than all streamed text. */
  readonly typedOutput?: boolean;
};

/**
 * Folds a stream of chunks into one result: output and thinking joined,
 * messages in order, the last meaningful id, finish reason and usage, and
 * metadata merged with later keys winning.
 */
export class ChatResponseAccumulator {
  private readonly output: Array<string> = [];
  private readonly thinking: Array<string> = [];
  private readonly messages: Array<ChatMessage> = [];
  private metadata: Record<string, unknown> = {};
  private id = '';
  private finishReason: FinishReason = 'unspecified';
  private usage: Usage | null = null;
  private readonly typedOutput: boolean;

  constructor(options: ChatResponseAccumulatorOptions = {}) {
    this.typedOutput = options.typedOutput ?? false;
  }

  add(chunk: ChatResult<string>): void {
    if (chunk.output.length > 0) {
      this.output.push(chunk.output);
    }
    if (chunk.thinking !== null) {
      this.thinking.push(chunk.thinking);
    }
    this.messages.push(...chunk.messages);
    this.metadata = { ...this.metadata, ...chunk.metadata };

    if (chunk.id.length > 0) {
      this.id = chunk.id;
    }
    if (chunk.finishReason !== 'unspecified') {
      this.finishReason = chunk.finishReason;
    }
    if (chunk.usage !== null) {
      this.usage = chunk.usage;
    }
  }

  buildFinal(): ChatResult<string> {
    const text = this.output.join('');
    return {
      id: this.id,
      output: this.typedOutput ? (this.lastJsonAnswer() ?? text) : text,
      messages: [...this.messages],
      finishReason: this.finishReason,
      metadata: { ...this.metadata },
      thinking: this.thinking.length > 0 ? this.thinking.join('') : null,
      usage: this.usage,
    };
  }

  private lastJsonAnswer(): string | null {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const message = this.messages[i];
      if (message?.role !== 'model') {
        continue;
      }
      const text = messageText(message);
      if (text.length > 0 && isJson(text)) {
        return text;
      }
    }
    return null;
  }
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}
