// @chorus/agent: streaming chat orchestration over any Provider

export { Agent } from './agent/agent.js';
export type {
  AgentOptions,
  ForProviderOptions,
  GenerateMediaOptions,
  SendForOptions,
  SendOptions,
} from './agent/agent.js';
export { formatModelString, parseModelString } from './agent/model-string.js';
export type { ModelString } from './agent/model-string.js';
export { assertSingleTextPart } from './agent/invariants.js';
export { ChatResponseAccumulator } from './accumulators/chat-accumulator.js';
export type { ChatResponseAccumulatorOptions } from './accumulators/chat-accumulator.js';
export { MediaResponseAccumulator } from './accumulators/media-accumulator.js';
export { StreamingState } from './state/streaming-state.js';
export type { StreamingStateOptions, TurnStatus } from './state/streaming-state.js';
export { executeToolCalls } from './tools/execution.js';
export type { ToolExecutionOptions } from './tools/execution.js';
export { DefaultStreamingOrchestrator } from './orchestrators/default.js';
export type { ModelResponse, OrchestratorOptions } from './orchestrators/default.js';
export { ToolBasedTypedOutputOrchestrator } from './orchestrators/typed-output-tool.js';
export { TwoPhaseTypedOutputOrchestrator } from './orchestrators/two-phase.js';
export type { TwoPhasePhase } from './orchestrators/two-phase.js';
export { resolveOrchestration } from './orchestrators/resolve.js';
export type { Orchestration, OrchestrationResolver } from './orchestrators/resolve.js';
export type { IterationOptions, OrchestratorResult, StreamingOrchestrator } from './orchestrators/types.js';
export {
  allProviders,
  getProvider,
  providerNames,
  registerProvider,
  resetProviderRegistry,
} from './providers/registry.js';
export type { ProviderFactory } from './providers/registry.js';
