import type { ChatModel } from '@chorus/llm';
import {
  RETURN_RESULT_TOOL_NAME,
  chatResult,
  getLogger,
  messageToolCalls,
  modelMessage,
  textPart,
} from '@chorus/llm';
import type { StreamingState } from '../state/streaming-state.js';
import { DefaultStreamingOrchestrator } from './default.js';
import type { IterationOptions, OrchestratorResult } from './types.js';

const logger = getLogger('orchestrator');

/**
 * Typed output for providers without a schema mode: the model hands back its
 * answer by calling return_result, whose arguments become the JSON output.
 */
export class ToolBasedTypedOutputOrchestrator extends DefaultStreamingOrchestrator {
  override readonly name: string = 'typed-output-tool';

  override async *processIteration(
    model: ChatModel,
    state: StreamingState,
    options: IterationOptions,
  ): AsyncGenerator<OrchestratorResult> {
    state.beginIteration();

    // The schema travels as the return_result tool, never as a response format
    const response = yield* this.streamModelResponse(model, state, { signal: options.signal });

    const toolCalls = messageToolCalls(response.message);
    if (toolCalls.length === 0) {
      yield* this.finishTurn(state, response);
      return;
    }

    yield* this.runToolRound(state, response, toolCalls, options.signal);

    const returnCall = toolCalls.find((call) => call.name === RETURN_RESULT_TOOL_NAME);
    if (!returnCall) {
      return;
    }

    logger.debug(`Turn ${state.turnId} returned typed output via ${RETURN_RESULT_TOOL_NAME}`);

    const json = JSON.stringify(returnCall.arguments);
    const resultMessage = modelMessage([textPart(json)]);
    state.addToHistory(resultMessage);

    yield { ...chatResult(json, { id: response.id }), shouldContinue: true };
    yield {
      ...chatResult('', { id: response.id, messages: [resultMessage], finishReason: 'stop' }),
      shouldContinue: true,
    };
    yield {
      ...chatResult('', { id: response.id, finishReason: 'stop', usage: response.usage }),
      shouldContinue: false,
    };
  }
}
