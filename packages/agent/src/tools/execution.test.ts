import { describe, it, expect } from 'vitest';
import type { Tool, ToolCallPart } from '@chorus/llm';
import { AbortError, toolCallPart } from '@chorus/llm';
import { executeToolCalls } from './execution.js';

type Tracker = { active: number; max: number; order: Array<string> };

function slowEcho(name: string, tracker: Tracker): Tool {
  return {
    name,
    description: 'Echo after a short delay',
    inputSchema: { type: 'object', properties: { value: { type: 'string' } } },
    invoke: async (args, context) => {
      tracker.active += 1;
      tracker.max = Math.max(tracker.max, tracker.active);
      tracker.order.push(context.toolCallId);
      await new Promise((resolve) => setTimeout(resolve, 5));
      tracker.active -= 1;
      return { echoed: args['value'] ?? null };
    },
  };
}

function calls(count: number): Array<ToolCallPart> {
  return Array.from({ length: count }, (_, i) => toolCallPart(`c${i}`, 'echo', { value: `v${i}` }));
}

describe('executeToolCalls', () => {
  it('runs calls concurrently when parallel and keeps call order in the results', async () => {
    const tracker: Tracker = { active: 0, max: 0, order: [] };
    const toolMap = new Map([['echo', slowEcho('echo', tracker)]]);

    const results = await executeToolCalls(calls(3), toolMap, {
      parallel: true,
      signal: new AbortController().signal,
    });

    expect(tracker.max).toBe(3);
    expect(results.map((r) => r.id)).toEqual(['c0', 'c1', 'c2']);
    expect(results.map((r) => r.result)).toEqual([{ echoed: 'v0' }, { echoed: 'v1' }, { echoed: 'v2' }]);
    expect(results.every((r) => !r.isError)).toBe(true);
  });

  it('runs calls one at a time when sequential', async () => {
    const tracker: Tracker = { active: 0, max: 0, order: [] };
    const toolMap = new Map([['echo', slowEcho('echo', tracker)]]);

    await executeToolCalls(calls(3), toolMap, { parallel: false, signal: new AbortController().signal });

    expect(tracker.max).toBe(1);
    expect(tracker.order).toEqual(['c0', 'c1', 'c2']);
  });

  it('bounds concurrency when asked', async () => {
    const tracker: Tracker = { active: 0, max: 0, order: [] };
    const toolMap = new Map([['echo', slowEcho('echo', tracker)]]);

    const results = await executeToolCalls(calls(5), toolMap, {
      parallel: true,
      maxConcurrency: 2,
      signal: new AbortController().signal,
    });

    expect(tracker.max).toBe(2);
    expect(results).toHaveLength(5);
  });

  it('turns a throwing tool into an error result', async () => {
    const failing: Tool = {
      name: 'explode',
      description: 'Always fails',
      inputSchema: { type: 'object' },
      invoke: async () => {
        throw new Error('boom');
      },
    };

    const [result] = await executeToolCalls([toolCallPart('c1', 'explode', {})], new Map([['explode', failing]]), {
      parallel: true,
      signal: new AbortController().signal,
    });

    expect(result).toEqual({
      kind: 'toolResult',
      id: 'c1',
      name: 'explode',
      result: { error: 'boom' },
      isError: true,
    });
  });

  it('answers a call to an unknown tool with an error result', async () => {
    const tracker: Tracker = { active: 0, max: 0, order: [] };
    const toolMap = new Map([['echo', slowEcho('echo', tracker)]]);

    const [result] = await executeToolCalls([toolCallPart('c1', 'nope', {})], toolMap, {
      parallel: false,
      signal: new AbortController().signal,
    });

    expect(result?.isError).toBe(true);
    expect(result?.result).toEqual({ error: 'Unknown tool: nope. Available tools: echo' });
  });

  it('stores null for a tool that returns nothing', async () => {
    const silent: Tool = {
      name: 'silent',
      description: 'Returns nothing',
      inputSchema: { type: 'object' },
      invoke: async () => undefined,
    };

    const [result] = await executeToolCalls([toolCallPart('c1', 'silent', {})], new Map([['silent', silent]]), {
      parallel: false,
      signal: new AbortController().signal,
    });

    expect(result?.result).toBeNull();
    expect(result?.isError).toBe(false);
  });

  it('refuses to start once aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      executeToolCalls(calls(1), new Map(), { parallel: true, signal: controller.signal }),
    ).rejects.toThrow(AbortError);
  });

  it('starts no further calls once a tool aborts the turn', async () => {
    const controller = new AbortController();
    const invoked: Array<string> = [];
    const tool = (name: string): Tool => ({
      name,
      description: `Records ${name}`,
      inputSchema: { type: 'object' },
      invoke: async () => {
        invoked.push(name);
        if (name === 'a') {
          controller.abort();
        }
        return name;
      },
    });
    const toolMap = new Map(['a', 'b', 'c'].map((name): [string, Tool] => [name, tool(name)]));
    const round = ['a', 'b', 'c'].map((name) => toolCallPart(`c-${name}`, name, {}));

    await expect(
      executeToolCalls(round, toolMap, { parallel: false, signal: controller.signal }),
    ).rejects.toThrow(AbortError);
    expect(invoked).toEqual(['a']);
  });

  it('stops a bounded parallel round from taking queued calls after an abort', async () => {
    const controller = new AbortController();
    const started: Array<string> = [];
    const aborting: Tool = {
      name: 'echo',
      description: 'Aborts after a short delay',
      inputSchema: { type: 'object' },
      invoke: async (_args, context) => {
        started.push(context.toolCallId);
        await new Promise((resolve) => setTimeout(resolve, 5));
        controller.abort();
        return null;
      },
    };

    await expect(
      executeToolCalls(calls(4), new Map([['echo', aborting]]), {
        parallel: true,
        maxConcurrency: 2,
        signal: controller.signal,
      }),
    ).rejects.toThrow(AbortError);
    expect(started).toEqual(['c0', 'c1']);
  });
});
