import type { ChatModel } from '@chorus/llm';
import { getLogger, messageToolCalls } from '@chorus/llm';
import type { StreamingState } from '../state/streaming-state.js';
import { DefaultStreamingOrchestrator } from './default.js';
import type { IterationOptions, OrchestratorResult } from './types.js';

const logger = getLogger('orchestrator');

export type TwoPhasePhase = 'tools' | 'structured';

/**
 * For providers that take either tools or a response schema in one request
 * but not both. The tools phase runs with tools only and keeps its text to
 * itself; once the model stops calling tools, the structured phase asks again
 * with the schema only and streams the JSON answer.
 */
export class TwoPhaseTypedOutputOrchestrator extends DefaultStreamingOrchestrator {
  override readonly name: string = 'two-phase';
  private currentPhase: TwoPhasePhase = 'tools';

  get phase(): TwoPhasePhase {
    return this.currentPhase;
  }

  override initialize(state: StreamingState): void {
    this.currentPhase = 'tools';
    super.initialize(state);
  }

  override async *processIteration(
    model: ChatModel,
    state: StreamingState,
    options: IterationOptions,
  ): AsyncGenerator<OrchestratorResult> {
    if (!options.outputSchema) {
      yield* super.processIteration(model, state, options);
      return;
    }

    state.beginIteration();

    if (this.currentPhase === 'structured') {
      const response = yield* this.streamModelResponse(model, state, {
        outputSchema: options.outputSchema,
        tools: [],
        signal: options.signal,
      });
      yield* this.finishTurn(state, response);
      return;
    }

    const response = yield* this.streamModelResponse(
      model,
      state,
      { tools: model.tools, signal: options.signal },
      { suppressOutput: true },
    );

    const toolCalls = messageToolCalls(response.message);
    if (toolCalls.length > 0) {
      yield* this.runToolRound(state, response, toolCalls, options.signal);
      return;
    }

    // The tools phase's closing text is discarded; the structured phase answers instead
    logger.debug(`Turn ${state.turnId} switching to structured phase`);
    this.currentPhase = 'structured';
  }
}
