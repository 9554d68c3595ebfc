import type {
  BatchEmbeddingsResult,
  ChatMessage,
  ChatResult,
  EmbeddingsResult,
  JsonSchema,
  MediaGenerationResult,
  Part,
  Provider,
  Tool,
} from '@chorus/llm';
import {
  AbortError,
  ConfigurationError,
  ValidationError,
  chatResult,
  getLogger,
  messageText,
  userMessage,
  validateJsonSchema,
} from '@chorus/llm';
import { ChatResponseAccumulator } from '../accumulators/chat-accumulator.js';
import { MediaResponseAccumulator } from '../accumulators/media-accumulator.js';
import type { OrchestrationResolver } from '../orchestrators/resolve.js';
import { resolveOrchestration } from '../orchestrators/resolve.js';
import type { OrchestratorResult } from '../orchestrators/types.js';
import { getProvider } from '../providers/registry.js';
import { StreamingState } from '../state/streaming-state.js';
import { assertSingleTextPart } from './invariants.js';
import { formatModelString, parseModelString } from './model-string.js';
import { decodeTypedOutput, tryParsePartial } from './typed-output.js';

const logger = getLogger('agent');

export type AgentOptions = {
  readonly tools?: ReadonlyArray<Tool>;
  readonly temperature?: number;
  readonly enableThinking?: boolean;
  readonly displayName?: string;
  /** Provider-specific settings passed through to each model. */
  readonly chatModelOptions?: Readonly<Record<string, unknown>>;
  readonly mediaModelOptions?: Readonly<Record<string, unknown>>;
  readonly embeddingsModelOptions?: Readonly<Record<string, unknown>>;
};

export type ForProviderOptions = AgentOptions & {
  readonly chatModelName?: string;
  readonly embeddingsModelName?: string;
  readonly mediaModelName?: string;
};

export type SendOptions = {
  readonly history?: ReadonlyArray<ChatMessage>;
  readonly attachments?: ReadonlyArray<Part>;
  readonly outputSchema?: JsonSchema;
  readonly signal?: AbortSignal;
};

export type SendForOptions<T> = Omit<SendOptions, 'outputSchema'> & {
  readonly outputSchema: JsonSchema;
  readonly outputFromJson?: (json: unknown) => T;
};

export type GenerateMediaOptions = {
  readonly mimeTypes: ReadonlyArray<string>;
  readonly history?: ReadonlyArray<ChatMessage>;
  readonly attachments?: ReadonlyArray<Part>;
  readonly outputSchema?: JsonSchema;
  readonly signal?: AbortSignal;
};

/**
 * Entry point for chatting with a provider: streams a turn, runs the tools
 * the model calls and reports every new message exactly once.
 *
 * @example
 * const agent = new Agent('openai:gpt-4o', { tools: [weatherTool] });
 * const result = await agent.send('What is the weather in Paris?');
 */
export class Agent {
  readonly providerName: string;
  readonly chatModelName: string | undefined;
  readonly embeddingsModelName: string | undefined;
  readonly mediaModelName: string | undefined;
  readonly tools: ReadonlyArray<Tool>;
  private readonly provider: Provider;
  private readonly options: AgentOptions;
  private readonly orchestration: OrchestrationResolver;

  /**
   * @param model - a model string such as `anthropic`, `openai:gpt-4o` or
   *   `google?chat=gemini-2.5-flash&embeddings=text-embedding-004`, or a Provider
   */
  constructor(model: string | Provider, options: ForProviderOptions = {}) {
    if (typeof model === 'string') {
      const parsed = parseModelString(model);
      this.provider = getProvider(parsed.providerName);
      this.providerName = parsed.providerName;
      this.chatModelName = parsed.chatModelName;
      this.embeddingsModelName = parsed.embeddingsModelName;
      this.mediaModelName = parsed.mediaModelName;
    } else {
      this.provider = model;
      this.providerName = model.name;
      this.chatModelName = options.chatModelName;
      this.embeddingsModelName = options.embeddingsModelName;
      this.mediaModelName = options.mediaModelName;
    }

    this.tools = options.tools ?? [];
    this.options = options;
    this.orchestration = resolveOrchestration(this.provider.capabilities);

    logger.debug(`Created agent for ${this.model}`);
  }

  static forProvider(provider: Provider, options: ForProviderOptions = {}): Agent {
    return new Agent(provider, options);
  }

  /** Fully qualified model string, provider defaults filled in. */
  get model(): string {
    const defaults = this.provider.defaultModelNames;
    return formatModelString({
      providerName: this.providerName,
      chatModelName: this.chatModelName ?? defaults.chat,
      embeddingsModelName: this.embeddingsModelName ?? defaults.embeddings,
      mediaModelName: this.mediaModelName ?? defaults.media,
    });
  }

  get displayName(): string {
    return this.options.displayName ?? this.provider.displayName;
  }

  async send(prompt: string, options: SendOptions = {}): Promise<ChatResult<string>> {
    const accumulator = new ChatResponseAccumulator({ typedOutput: options.outputSchema !== undefined });
    for await (const chunk of this.sendStream(prompt, options)) {
      accumulator.add(chunk);
    }
    return accumulator.buildFinal();
  }

  async sendFor<T>(prompt: string, options: SendForOptions<T>): Promise<ChatResult<T>> {
    const response = await this.send(prompt, options);
    const output = decodeTypedOutput<T>(response.output, options.outputSchema, options.outputFromJson);
    return { ...response, output };
  }

  /**
   * Streams one turn. The first chunk carries the new user message; every
   * message after it appears in exactly one chunk, so appending each chunk's
   * messages to the history keeps it complete.
   */
  async *sendStream(prompt: string, options: SendOptions = {}): AsyncGenerator<ChatResult<string>> {
    const history = options.history ?? [];
    assertSingleTextPart(history, 'history');
    if (options.outputSchema !== undefined && !validateJsonSchema(options.outputSchema)) {
      throw new ValidationError('outputSchema must declare a type');
    }

    const { orchestrator, tools } = this.orchestration(options.outputSchema, this.tools);
    const toolMap = buildToolMap(tools);

    const model = this.provider.createChatModel({
      name: this.chatModelName,
      tools,
      temperature: this.options.temperature,
      enableThinking: this.options.enableThinking,
      options: this.options.chatModelOptions,
    });

    logger.debug(`Sending to ${this.providerName}:${model.name} via ${orchestrator.name} orchestrator`);

    const controller = new AbortController();
    const detach = linkSignal(options.signal, controller);

    try {
      const newUserMessage = userMessage(prompt, options.attachments);
      assertSingleTextPart([newUserMessage], 'user message');

      const state = new StreamingState({
        conversationHistory: [...history, newUserMessage],
        toolMap,
      });

      yield chatResult('', { messages: [newUserMessage] });

      orchestrator.initialize(state);
      try {
        while (!state.done) {
          if (controller.signal.aborted) {
            throw new AbortError('chat stream aborted');
          }
          const iteration = orchestrator.processIteration(model, state, {
            outputSchema: options.outputSchema,
            signal: controller.signal,
          });
          for await (const result of iteration) {
            yield* splitResult(result, state);
            if (!result.shouldContinue) {
              state.complete();
            }
          }
        }
      } finally {
        orchestrator.finalize(state);
      }
    } finally {
      detach();
      controller.abort();
      await model.dispose();
    }
  }

  /**
   * Streams partial typed objects as the JSON answer arrives. Output from
   * steps that end in tool calls is not part of the answer and is dropped.
   */
  async *sendForStream<T>(prompt: string, options: SendForOptions<T>): AsyncGenerator<Partial<T>> {
    let accumulatedJson = '';
    let lastYieldedPartialJson = '';

    for await (const chunk of this.sendStream(prompt, options)) {
      if (chunk.messages.some((message) => message.role === 'model')) {
        const last = chunk.messages[chunk.messages.length - 1];
        accumulatedJson = last?.role === 'model' && chunk.finishReason !== 'toolCalls' ? messageText(last) : '';
      } else {
        accumulatedJson += chunk.output;
      }

      const parsed = tryParsePartial<T>(accumulatedJson);
      if (parsed !== null) {
        const partialJson = JSON.stringify(parsed);
        if (partialJson !== lastYieldedPartialJson) {
          lastYieldedPartialJson = partialJson;
          yield parsed;
        }
      }
    }
  }

  async generateMedia(prompt: string, options: GenerateMediaOptions): Promise<MediaGenerationResult> {
    const accumulator = new MediaResponseAccumulator();
    for await (const chunk of this.generateMediaStream(prompt, options)) {
      accumulator.add(chunk);
    }
    return accumulator.buildFinal();
  }

  async *generateMediaStream(
    prompt: string,
    options: GenerateMediaOptions,
  ): AsyncGenerator<MediaGenerationResult> {
    if (options.mimeTypes.length === 0) {
      throw new ValidationError('generateMedia requires at least one MIME type');
    }
    const history = options.history ?? [];
    assertSingleTextPart(history, 'history');

    const provider = this.provider;
    if (!provider.createMediaModel) {
      throw new ConfigurationError(`provider '${this.providerName}' does not support media generation`);
    }
    const model = provider.createMediaModel({
      name: this.mediaModelName,
      tools: this.tools,
      options: this.options.mediaModelOptions,
    });

    try {
      const newUserMessage = userMessage(prompt, options.attachments);
      assertSingleTextPart([newUserMessage], 'user message');

      yield {
        id: '',
        assets: [],
        links: [],
        messages: [newUserMessage],
        finishReason: 'unspecified',
        metadata: {},
        usage: null,
      };

      const stream = model.generateMediaStream(prompt, {
        mimeTypes: options.mimeTypes,
        history,
        attachments: options.attachments,
        outputSchema: options.outputSchema,
        signal: options.signal,
      });
      for await (const chunk of stream) {
        assertSingleTextPart(chunk.messages, 'media response');
        yield chunk;
      }
    } finally {
      await model.dispose();
    }
  }

  async embedQuery(query: string): Promise<EmbeddingsResult> {
    const provider = this.provider;
    if (!provider.createEmbeddingsModel) {
      throw new ConfigurationError(`provider '${this.providerName}' does not support embeddings`);
    }
    const model = provider.createEmbeddingsModel({
      name: this.embeddingsModelName,
      options: this.options.embeddingsModelOptions,
    });
    try {
      return await model.embedQuery(query);
    } finally {
      await model.dispose();
    }
  }

  async embedDocuments(texts: ReadonlyArray<string>): Promise<BatchEmbeddingsResult> {
    const provider = this.provider;
    if (!provider.createEmbeddingsModel) {
      throw new ConfigurationError(`provider '${this.providerName}' does not support embeddings`);
    }
    const model = provider.createEmbeddingsModel({
      name: this.embeddingsModelName,
      options: this.options.embeddingsModelOptions,
    });
    try {
      return await model.embedDocuments(texts);
    } finally {
      await model.dispose();
    }
  }
}

/**
 * Re-shapes an orchestrator result into caller chunks that each carry one
 * kind of payload: streamed output and thinking, new messages, or the
 * closing usage.
 */
function* splitResult(result: OrchestratorResult, state: StreamingState): Generator<ChatResult<string>> {
  const id = result.id || state.lastResult.id;
  const streamed =
    result.output.length > 0 || result.thinking !== null || Object.keys(result.metadata).length > 0;
  const hasMessages = result.messages.length > 0;

  if (streamed) {
    yield chatResult(result.output, {
      id,
      finishReason: result.finishReason,
      metadata: result.metadata,
      thinking: result.thinking,
      usage: hasMessages ? null : result.usage,
    });
  }

  if (hasMessages) {
    assertSingleTextPart(result.messages, 'response');
    yield chatResult('', {
      id,
      messages: result.messages,
      finishReason: result.finishReason,
      usage: result.usage,
    });
  }

  if (!streamed && !hasMessages && (result.usage !== null || !result.shouldContinue)) {
    yield chatResult('', { id, finishReason: result.finishReason, usage: result.usage });
  }
}

function buildToolMap(tools: ReadonlyArray<Tool>): ReadonlyMap<string, Tool> {
  const toolMap = new Map<string, Tool>();
  for (const tool of tools) {
    if (toolMap.has(tool.name)) {
      throw new ValidationError(`duplicate tool name: ${tool.name}`);
    }
    toolMap.set(tool.name, tool);
  }
  return toolMap;
}

function linkSignal(signal: AbortSignal | undefined, controller: AbortController): () => void {
  if (!signal) {
    return () => {};
  }
  if (signal.aborted) {
    controller.abort();
    return () => {};
  }
  const onAbort = (): void => controller.abort();
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}
