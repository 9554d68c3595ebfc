import type { JsonSchema, ProviderCapability, Tool } from '@chorus/llm';
import { createReturnResultTool } from '@chorus/llm';
import { DefaultStreamingOrchestrator } from './default.js';
import { TwoPhaseTypedOutputOrchestrator } from './two-phase.js';
import { ToolBasedTypedOutputOrchestrator } from './typed-output-tool.js';
import type { StreamingOrchestrator } from './types.js';

export type Orchestration = {
  readonly orchestrator: StreamingOrchestrator;
  /** The tools the chat model is created with for this turn. */
  readonly tools: ReadonlyArray<Tool>;
};

export type OrchestrationResolver = (
  outputSchema: JsonSchema | undefined,
  tools: ReadonlyArray<Tool>,
) => Orchestration;

/**
 * Picks the orchestration strategy for a provider's capabilities once; the
 * returned resolver builds a fresh orchestrator for every turn.
 */
export function resolveOrchestration(
  capabilities: ReadonlySet<ProviderCapability>,
): OrchestrationResolver {
  const options = { parallelToolCalls: capabilities.has('multiToolCalls') };
  const byDefault = (tools: ReadonlyArray<Tool>): Orchestration => ({
    orchestrator: new DefaultStreamingOrchestrator(options),
    tools,
  });

  if (!capabilities.has('typedOutput')) {
    return (outputSchema, tools) =>
      outputSchema
        ? {
            orchestrator: new ToolBasedTypedOutputOrchestrator(options),
            tools: [...tools, createReturnResultTool(outputSchema)],
          }
        : byDefault(tools);
  }

  if (!capabilities.has('typedOutputWithTools')) {
    return (outputSchema, tools) =>
      outputSchema && tools.length > 0
        ? { orchestrator: new TwoPhaseTypedOutputOrchestrator(options), tools }
        : byDefault(tools);
  }

  return (_outputSchema, tools) => byDefault(tools);
}
