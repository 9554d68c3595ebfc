import { describe, it, expect, vi } from 'vitest';
import { AdapterChatModel } from './adapter-model.js';
import type {
  ChatResult,
  LLMRequest,
  ProviderAdapter,
  StreamEvent,
  Tool,
} from '../types/index.js';
import { AuthenticationError, ServerError, userMessage } from '../types/index.js';

const usage = { inputTokens: 5, outputTokens: 2, totalTokens: 7, reasoningTokens: 0 };

type FakeAdapter = ProviderAdapter & {
  readonly requests: Array<LLMRequest>;
  readonly close: ReturnType<typeof vi.fn>;
};

function createFakeAdapter(
  streams: Array<Array<StreamEvent> | Error>,
): FakeAdapter {
  const requests: Array<LLMRequest> = [];
  let index = 0;

  async function* stream(request: LLMRequest): AsyncGenerator<StreamEvent> {
    requests.push(request);
    const next = streams[Math.min(index, streams.length - 1)] ?? [];
    index += 1;
    if (next instanceof Error) {
      throw next;
    }
    for (const event of next) {
      yield event;
    }
  }

  return {
    name: 'fake',
    requests,
    stream,
    close: vi.fn(async () => {}),
  };
}

const textStream: Array<StreamEvent> = [
  { type: 'start', id: 'resp-1', model: 'fake-model' },
  { type: 'text', text: '2+2 ' },
  { type: 'text', text: 'is 4' },
  { type: 'finish', finishReason: 'stop', usage },
];

const weatherTool: Tool = {
  name: 'get_weather',
  description: 'Current weather for a city',
  inputSchema: { type: 'object', properties: { city: { type: 'string' } }, required: ['city'] },
  invoke: async () => ({ temperature: 21 }),
};

async function collect(stream: AsyncIterable<ChatResult<string>>): Promise<Array<ChatResult<string>>> {
  const chunks: Array<ChatResult<string>> = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

const fastRetry = { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5, backoffMultiplier: 2 };

describe('AdapterChatModel', () => {
  it('yields text deltas then one chunk with the assembled message', async () => {
    const adapter = createFakeAdapter([textStream]);
    const model = new AdapterChatModel({ adapter, model: 'fake-model' });

    const chunks = await collect(model.sendStream([userMessage('What is 2+2?')]));

    expect(chunks.map((c) => c.output)).toEqual(['2+2 ', 'is 4', '']);
    const last = chunks[chunks.length - 1];
    expect(last?.messages).toEqual([
      { role: 'model', parts: [{ kind: 'text', text: '2+2 is 4' }], metadata: { model: 'fake-model' } },
    ]);
    expect(last?.finishReason).toBe('stop');
    expect(last?.usage).toEqual(usage);
    expect(chunks.every((c) => c.id === 'resp-1')).toBe(true);
  });

  it('passes thinking deltas through on their own chunks', async () => {
    const adapter = createFakeAdapter([
      [
        { type: 'start', id: 'resp-2', model: 'fake-model' },
        { type: 'thinking', text: 'adding' },
        { type: 'text', text: '4' },
        { type: 'finish', finishReason: 'stop', usage },
      ],
    ]);
    const model = new AdapterChatModel({ adapter, model: 'fake-model', enableThinking: true });

    const chunks = await collect(model.sendStream([userMessage('2+2?')]));

    expect(chunks[0]).toMatchObject({ output: '', thinking: 'adding' });
    expect(chunks[1]).toMatchObject({ output: '4', thinking: null });
    expect(adapter.requests[0]?.enableThinking).toBe(true);
  });

  it('builds the request from history, tools and schema', async () => {
    const adapter = createFakeAdapter([textStream]);
    const model = new AdapterChatModel({
      adapter,
      model: 'fake-model',
      tools: [weatherTool],
      temperature: 0.2,
    });
    const schema = { type: 'object', properties: { answer: { type: 'number' } } };

    await collect(model.sendStream([userMessage('hi')], { outputSchema: schema }));

    const request = adapter.requests[0];
    expect(request?.model).toBe('fake-model');
    expect(request?.messages).toHaveLength(1);
    expect(request?.tools).toEqual([
      { name: 'get_weather', description: 'Current weather for a city', parameters: weatherTool.inputSchema },
    ]);
    expect(request?.responseFormat).toEqual({ type: 'json_schema', schema, name: 'output' });
    expect(request?.temperature).toBe(0.2);
  });

  it('lets a request withhold the configured tools', async () => {
    const adapter = createFakeAdapter([textStream]);
    const model = new AdapterChatModel({ adapter, model: 'fake-model', tools: [weatherTool] });

    await collect(model.sendStream([userMessage('hi')], { tools: [] }));

    expect(adapter.requests[0]?.tools).toBeUndefined();
  });

  it('retries a retryable failure before the first event', async () => {
    const adapter = createFakeAdapter([new ServerError('overloaded', { provider: 'fake', statusCode: 503 }), textStream]);
    const model = new AdapterChatModel({ adapter, model: 'fake-model', retryPolicy: fastRetry });

    const chunks = await collect(model.sendStream([userMessage('hi')]));

    expect(adapter.requests).toHaveLength(2);
    expect(chunks.map((c) => c.output).join('')).toBe('2+2 is 4');
  });

  it('surfaces non-retryable provider errors', async () => {
    const adapter = createFakeAdapter([new AuthenticationError('bad key', { provider: 'fake', statusCode: 401 })]);
    const model = new AdapterChatModel({ adapter, model: 'fake-model', retryPolicy: fastRetry });

    await expect(collect(model.sendStream([userMessage('hi')]))).rejects.toThrow(AuthenticationError);
    expect(adapter.requests).toHaveLength(1);
  });

  it('stops with an AbortError once the signal is aborted mid-stream', async () => {
    const adapter = createFakeAdapter([textStream]);
    const model = new AdapterChatModel({ adapter, model: 'fake-model' });
    const controller = new AbortController();
    const outputs: Array<string> = [];

    await expect(
      (async () => {
        for await (const chunk of model.sendStream([userMessage('hi')], { signal: controller.signal })) {
          outputs.push(chunk.output);
          controller.abort();
        }
      })(),
    ).rejects.toThrow('chat stream aborted');
    expect(outputs).toEqual(['2+2 ']);
  });

  it('closes the adapter on dispose', async () => {
    const adapter = createFakeAdapter([textStream]);
    const model = new AdapterChatModel({ adapter, model: 'fake-model' });

    await model.dispose();

    expect(adapter.close).toHaveBeenCalledTimes(1);
  });
});
