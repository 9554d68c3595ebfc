import type {
  ChatMessage,
  ChatModel,
  ChatRequestOptions,
  ChatResult,
  LLMRequest,
  Provider,
  ProviderAdapter,
  ProviderCapability,
  StreamEvent,
  Tool,
  Usage,
} from '@chorus/llm';
import { chatResult, createAdapterProvider, modelMessage, textPart, toolCallPart } from '@chorus/llm';
import type { StreamingState } from '../src/state/streaming-state.js';
import type { IterationOptions, OrchestratorResult, StreamingOrchestrator } from '../src/orchestrators/types.js';

export const testUsage: Usage = { inputTokens: 10, outputTokens: 5, totalTokens: 15, reasoningTokens: 0 };

export type ScriptedTurn = ReadonlyArray<ChatResult<string>> | Error;

export type RecordedRequest = {
  readonly messages: ReadonlyArray<ChatMessage>;
  readonly options: ChatRequestOptions;
};

/**
 * Chat model that replays one scripted turn per sendStream call.
 */
export class ScriptedChatModel implements ChatModel {
  readonly name = 'scripted-chat';
  readonly requests: Array<RecordedRequest> = [];
  disposed = 0;
  private readonly turns: ReadonlyArray<ScriptedTurn>;

  constructor(turns: ReadonlyArray<ScriptedTurn>, readonly tools: ReadonlyArray<Tool> = []) {
    this.turns = turns;
  }

  async *sendStream(
    messages: ReadonlyArray<ChatMessage>,
    options: ChatRequestOptions = {},
  ): AsyncGenerator<ChatResult<string>> {
    this.requests.push({ messages: [...messages], options });
    const turn = this.turns[this.requests.length - 1];
    if (turn === undefined) {
      throw new Error(`no scripted turn for request ${this.requests.length}`);
    }
    if (turn instanceof Error) {
      throw turn;
    }
    for (const chunk of turn) {
      yield chunk;
    }
  }

  async dispose(): Promise<void> {
    this.disposed += 1;
  }
}

export function textTurn(deltas: ReadonlyArray<string>, usage: Usage = testUsage): Array<ChatResult<string>> {
  return [
    ...deltas.map((delta) => chatResult(delta, { id: 'resp-text' })),
    chatResult('', {
      id: 'resp-text',
      messages: [modelMessage([textPart(deltas.join(''))])],
      finishReason: 'stop',
      usage,
    }),
  ];
}

export type ScriptedCall = {
  readonly id?: string;
  readonly name: string;
  readonly args: Record<string, unknown>;
};

export function toolCallTurn(calls: ReadonlyArray<ScriptedCall>, usage: Usage = testUsage): Array<ChatResult<string>> {
  return [
    chatResult('', {
      id: 'resp-tools',
      messages: [modelMessage(calls.map((call) => toolCallPart(call.id ?? '', call.name, call.args)))],
      finishReason: 'toolCalls',
      usage,
    }),
  ];
}

/**
 * Wire-level adapter replaying one event script (or error) per request.
 */
export class ScriptedAdapter implements ProviderAdapter {
  readonly name = 'scripted';
  readonly requests: Array<LLMRequest> = [];
  closed = 0;
  private readonly streams: ReadonlyArray<ReadonlyArray<StreamEvent> | Error>;

  constructor(streams: ReadonlyArray<ReadonlyArray<StreamEvent> | Error>) {
    this.streams = streams;
  }

  async *stream(request: LLMRequest): AsyncGenerator<StreamEvent> {
    this.requests.push(request);
    const script = this.streams[this.requests.length - 1];
    if (script === undefined) {
      throw new Error(`no scripted stream for request ${this.requests.length}`);
    }
    if (script instanceof Error) {
      throw script;
    }
    for (const event of script) {
      yield event;
    }
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}

export function textEvents(deltas: ReadonlyArray<string>, usage: Usage = testUsage): Array<StreamEvent> {
  return [
    { type: 'start', id: 'resp-text', model: 'scripted-chat' },
    ...deltas.map((text): StreamEvent => ({ type: 'text', text })),
    { type: 'finish', finishReason: 'stop', usage },
  ];
}

export function toolCallEvents(calls: ReadonlyArray<ScriptedCall>, usage: Usage = testUsage): Array<StreamEvent> {
  const events: Array<StreamEvent> = [{ type: 'start', id: 'resp-tools', model: 'scripted-chat' }];
  calls.forEach((call, index) => {
    events.push(
      { type: 'toolCallStart', index, toolCallId: call.id ?? '', toolName: call.name },
      { type: 'toolCallArgs', index, argsDelta: JSON.stringify(call.args) },
      { type: 'toolCallEnd', index },
    );
  });
  events.push({ type: 'finish', finishReason: 'toolCalls', usage });
  return events;
}

export function scriptedProvider(
  adapter: ScriptedAdapter,
  capabilities: ReadonlyArray<ProviderCapability> = ['chat', 'multiToolCalls', 'typedOutput', 'typedOutputWithTools'],
  name = 'scripted',
): Provider {
  return createAdapterProvider({
    name,
    aliases: [`${name}-alias`],
    defaultModelNames: { chat: 'scripted-chat' },
    capabilities,
    createAdapter: () => adapter,
    retryPolicy: { maxRetries: 0, initialDelayMs: 1, maxDelayMs: 1, backoffMultiplier: 2 },
  });
}

export function recordingTool(
  name: string,
  respond: (args: Record<string, unknown>) => unknown,
): Tool & { readonly calls: Array<Record<string, unknown>> } {
  const calls: Array<Record<string, unknown>> = [];
  return {
    name,
    description: `Test tool ${name}`,
    inputSchema: { type: 'object', properties: {} },
    calls,
    invoke: async (args) => {
      calls.push(args);
      return respond(args);
    },
  };
}

export async function collect<T>(stream: AsyncIterable<T>): Promise<Array<T>> {
  const chunks: Array<T> = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

/**
 * Drives an orchestrator through a whole turn the way Agent.sendStream does.
 */
export async function runTurn(
  orchestrator: StreamingOrchestrator,
  model: ChatModel,
  state: StreamingState,
  options: IterationOptions,
): Promise<Array<OrchestratorResult>> {
  const results: Array<OrchestratorResult> = [];
  orchestrator.initialize(state);
  while (!state.done) {
    for await (const result of orchestrator.processIteration(model, state, options)) {
      results.push(result);
      if (!result.shouldContinue) {
        state.complete();
      }
    }
  }
  orchestrator.finalize(state);
  return results;
}
