import type {
  ChatMessage,
  ChatModel,
  ChatRequestOptions,
  FinishReason,
  ToolCallPart,
  ToolResultPart,
  Usage,
} from '@chorus/llm';
import { chatResult, getLogger, messageToolCalls, toolResultMessage } from '@chorus/llm';
import type { StreamingState } from '../state/streaming-state.js';
import { executeToolCalls } from '../tools/execution.js';
import { ModelMessageAccumulator, assignToolCallIds } from './model-message.js';
import type { IterationOptions, OrchestratorResult, StreamingOrchestrator } from './types.js';

const logger = getLogger('orchestrator');

export type OrchestratorOptions = {
  /** Execute the tool calls of one response concurrently. */
  readonly parallelToolCalls: boolean;
  readonly maxConcurrency?: number;
};

/**
 * A fully received model response, ids assigned.
 */
export type ModelResponse = {
  readonly id: string;
  readonly message: ChatMessage;
  readonly empty: boolean;
  readonly finishReason: FinishReason;
  readonly usage: Usage | null;
};

export type StreamResponseOptions = {
  /** Drop text output from the yielded chunks; thinking still streams. */
  readonly suppressOutput?: boolean;
};

/**
 * Stream the model, execute whatever tools it calls, feed the results back,
 * repeat until the model answers without calling a tool.
 */
export class DefaultStreamingOrchestrator implements StreamingOrchestrator {
  readonly name: string = 'default';
  protected readonly options: OrchestratorOptions;

  constructor(options: OrchestratorOptions) {
    this.options = options;
  }

  initialize(state: StreamingState): void {
    logger.debug(`Turn ${state.turnId} starting with ${this.name} orchestrator`);
  }

  async *processIteration(
    model: ChatModel,
    state: StreamingState,
    options: IterationOptions,
  ): AsyncGenerator<OrchestratorResult> {
    state.beginIteration();

    const response = yield* this.streamModelResponse(model, state, {
      outputSchema: options.outputSchema,
      signal: options.signal,
    });

    const toolCalls = messageToolCalls(response.message);
    if (toolCalls.length === 0) {
      yield* this.finishTurn(state, response);
      return;
    }

    yield* this.runToolRound(state, response, toolCalls, options.signal);
  }

  finalize(state: StreamingState): void {
    logger.debug(`Turn ${state.turnId} finished (${state.status})`);
  }

  /**
   * Streams one response, passing output and thinking through as it arrives,
   * and returns the consolidated message without committing it.
   */
  protected async *streamModelResponse(
    model: ChatModel,
    state: StreamingState,
    request: ChatRequestOptions,
    streamOptions: StreamResponseOptions = {},
  ): AsyncGenerator<OrchestratorResult, ModelResponse> {
    const accumulator = new ModelMessageAccumulator();
    let id = '';
    let finishReason: FinishReason = 'unspecified';
    let usage: Usage | null = null;

    for await (const chunk of model.sendStream([...state.conversationHistory], request)) {
      state.updateLastResult(chunk);

      for (const message of chunk.messages) {
        accumulator.add(message);
      }
      if (chunk.id.length > 0) {
        id = chunk.id;
      }
      if (chunk.finishReason !== 'unspecified') {
        finishReason = chunk.finishReason;
      }
      if (chunk.usage !== null) {
        usage = chunk.usage;
      }

      const output = streamOptions.suppressOutput ? '' : chunk.output;
      const hasMetadata = Object.keys(chunk.metadata).length > 0;
      if (output.length > 0 || chunk.thinking !== null || hasMetadata) {
        yield {
          ...chatResult(output, { id, metadata: chunk.metadata, thinking: chunk.thinking }),
          shouldContinue: true,
        };
      }
    }

    return {
      id,
      message: assignToolCallIds(accumulator.build(), state),
      empty: accumulator.isEmpty,
      finishReason,
      usage,
    };
  }

  /**
   * Commits a final answer and ends the turn with a usage-bearing chunk.
   */
  protected async *finishTurn(
    state: StreamingState,
    response: ModelResponse,
  ): AsyncGenerator<OrchestratorResult> {
    const finishReason = response.finishReason === 'unspecified' ? 'stop' : response.finishReason;

    if (!response.empty) {
      state.addToHistory(response.message);
      yield {
        ...chatResult('', { id: response.id, messages: [response.message], finishReason }),
        shouldContinue: true,
      };
    }

    yield {
      ...chatResult('', { id: response.id, finishReason, usage: response.usage }),
      shouldContinue: false,
    };
  }

  /**
   * Yields the tool-calling message, executes the calls and commits the
   * message together with one result message per call.
   */
  protected async *runToolRound(
    state: StreamingState,
    response: ModelResponse,
    toolCalls: ReadonlyArray<ToolCallPart>,
    signal: AbortSignal,
  ): AsyncGenerator<OrchestratorResult, ReadonlyArray<ChatMessage>> {
    yield {
      ...chatResult('', {
        id: response.id,
        messages: [response.message],
        finishReason: 'toolCalls',
        usage: response.usage,
      }),
      shouldContinue: true,
    };

    state.beginToolExecution(toolCalls);
    let results: ReadonlyArray<ToolResultPart>;
    try {
      results = await executeToolCalls(toolCalls, state.toolMap, {
        parallel: this.options.parallelToolCalls,
        maxConcurrency: this.options.maxConcurrency,
        signal,
      });
    } catch (error) {
      state.abandonToolExecution();
      throw error;
    }

    const resultMessages = results.map((result) => {
      state.recordToolResult(result);
      return toolResultMessage(result);
    });
    state.endToolExecution();
    state.addToHistory(response.message, ...resultMessages);

    yield {
      ...chatResult('', { id: response.id, messages: resultMessages }),
      shouldContinue: true,
    };

    return resultMessages;
  }
}
