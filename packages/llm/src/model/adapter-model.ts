import type {
  ChatMessage,
  ChatModel,
  ChatRequestOptions,
  ChatResult,
  LLMRequest,
  ProviderAdapter,
  RetryPolicy,
  StreamEvent,
  Tool,
} from '../types/index.js';
import { AbortError, chatResult, toolDefinition } from '../types/index.js';
import { getLogger } from '../logging/logger.js';
import { responseFormatFor } from '../utils/json-schema.js';
import { retry } from '../utils/retry.js';
import { DEFAULT_RETRY_POLICY } from './constants.js';
import { StreamEventAccumulator } from './stream-accumulator.js';

const logger = getLogger('model');

export type AdapterChatModelOptions = {
  readonly adapter: ProviderAdapter;
  readonly model: string;
  readonly tools?: ReadonlyArray<Tool>;
  readonly temperature?: number;
  readonly enableThinking?: boolean;
  readonly providerOptions?: Readonly<Record<string, unknown>>;
  readonly retryPolicy?: RetryPolicy;
};

type OpenedStream = {
  readonly iterator: AsyncIterator<StreamEvent>;
  readonly first: IteratorResult<StreamEvent>;
};

/**
 * Chat model over a ProviderAdapter. Text and thinking deltas are passed
 * through as they arrive; the assembled model message follows in the last
 * chunk together with the finish reason and usage.
 */
export class AdapterChatModel implements ChatModel {
  readonly name: string;
  readonly tools: ReadonlyArray<Tool>;
  private readonly adapter: ProviderAdapter;
  private readonly options: AdapterChatModelOptions;

  constructor(options: AdapterChatModelOptions) {
    this.adapter = options.adapter;
    this.name = options.model;
    this.tools = options.tools ?? [];
    this.options = options;
  }

  async *sendStream(
    messages: ReadonlyArray<ChatMessage>,
    options?: ChatRequestOptions,
  ): AsyncGenerator<ChatResult<string>> {
    const tools = options?.tools ?? this.tools;
    const signal = options?.signal;

    const request: LLMRequest = {
      model: this.name,
      messages,
      tools: tools.length > 0 ? tools.map(toolDefinition) : undefined,
      responseFormat: options?.outputSchema ? responseFormatFor(options.outputSchema) : undefined,
      temperature: this.options.temperature,
      enableThinking: this.options.enableThinking,
      signal,
      providerOptions: this.options.providerOptions,
    };

    logger.debug(`Streaming ${this.adapter.name}:${this.name} with ${messages.length} messages and ${tools.length} tools`);

    // Retry only the stream establishment, up to and including the first event
    const opened = await retry(
      async (): Promise<OpenedStream> => {
        const iterator = this.adapter.stream(request)[Symbol.asyncIterator]();
        const first = await iterator.next();
        return { iterator, first };
      },
      {
        policy: this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
        signal,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(`Retrying ${this.adapter.name} stream (attempt ${attempt}, ${Math.round(delayMs)}ms): ${error.message}`);
        },
      },
    );

    const accumulator = new StreamEventAccumulator();
    const { iterator } = opened;
    let next = opened.first;

    try {
      while (!next.done) {
        if (signal?.aborted) {
          throw new AbortError('chat stream aborted');
        }

        const event = next.value;
        accumulator.process(event);

        if (event.type === 'text' && event.text.length > 0) {
          yield chatResult(event.text, { id: accumulator.responseId() });
        } else if (event.type === 'thinking' && event.text.length > 0) {
          yield chatResult('', { id: accumulator.responseId(), thinking: event.text });
        }

        next = await iterator.next();
      }
    } finally {
      if (!next.done) {
        await iterator.return?.();
      }
    }

    yield chatResult('', {
      id: accumulator.responseId(),
      messages: [accumulator.toMessage()],
      finishReason: accumulator.finishReason(),
      usage: accumulator.usage(),
    });
  }

  async dispose(): Promise<void> {
    await this.adapter.close?.();
  }
}
