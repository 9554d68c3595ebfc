import type { JsonSchema } from './config.js';

export type ToolContext = {
  readonly toolCallId: string;
  readonly signal: AbortSignal;
};

export type Tool = {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JsonSchema;
  readonly invoke: (args: Record<string, unknown>, context: ToolContext) => Promise<unknown>;
};

export type ToolDefinition = {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonSchema;
};

export function toolDefinition(tool: Readonly<Tool>): ToolDefinition {
  return {
    name: tool.name,
    description: tool.description,
    parameters: tool.inputSchema,
  };
}
