import type { ChatModel, ChatResult, JsonSchema } from '@chorus/llm';
import type { StreamingState } from '../state/streaming-state.js';

/**
 * One chunk of orchestrator output. shouldContinue=false ends the turn.
 */
export type OrchestratorResult = ChatResult<string> & {
  readonly shouldContinue: boolean;
};

export type IterationOptions = {
  readonly outputSchema?: JsonSchema;
  readonly signal: AbortSignal;
};

/**
 * Strategy that drives one turn. A fresh instance serves each sendStream
 * call; processIteration is invoked until the state reports done.
 */
export interface StreamingOrchestrator {
  readonly name: string;
  initialize(state: StreamingState): void;
  processIteration(
    model: ChatModel,
    state: StreamingState,
    options: IterationOptions,
  ): AsyncIterable<OrchestratorResult>;
  finalize(state: StreamingState): void;
}
