import type { Tool, ToolCallPart, ToolResultPart } from '@chorus/llm';
import { AbortError, ToolExecutionError, getLogger, toError } from '@chorus/llm';

const logger = getLogger('tools');

export type ToolExecutionOptions = {
  /** Run the calls concurrently; otherwise one after another in call order. */
  readonly parallel: boolean;
  readonly signal: AbortSignal;
  /** Upper bound on concurrent invocations when running in parallel. */
  readonly maxConcurrency?: number;
};

/**
 * Executes the tool calls of one model message and returns one result per
 * call, in call order. Failures become error results; only an abort throws.
 */
export async function executeToolCalls(
  calls: ReadonlyArray<ToolCallPart>,
  toolMap: ReadonlyMap<string, Tool>,
  options: ToolExecutionOptions,
): Promise<Array<ToolResultPart>> {
  if (options.signal.aborted) {
    throw new AbortError('tool execution aborted');
  }

  logger.debug(`Executing ${calls.length} tool calls (${options.parallel ? 'parallel' : 'sequential'})`);

  const limit = options.parallel ? Math.max(1, options.maxConcurrency ?? calls.length) : 1;
  const settled = await runBounded(calls, limit, options.signal, (call) =>
    executeToolCall(call, toolMap, options.signal),
  );

  if (options.signal.aborted) {
    throw new AbortError('tool execution aborted');
  }

  return calls.map((call, index) => {
    const result = settled[index];
    if (result?.status === 'fulfilled') {
      return result.value;
    }
    const reason: unknown = result?.reason;
    const message = toError(reason ?? 'unknown error').message;
    return errorResult(new ToolExecutionError(message, call, { cause: reason }));
  });
}

async function executeToolCall(
  call: ToolCallPart,
  toolMap: ReadonlyMap<string, Tool>,
  signal: AbortSignal,
): Promise<ToolResultPart> {
  const tool = toolMap.get(call.name);
  if (!tool) {
    const available = Array.from(toolMap.keys()).join(', ');
    logger.warn(`Model called unknown tool ${call.name}`);
    return errorResult(new ToolExecutionError(`Unknown tool: ${call.name}. Available tools: ${available}`, call));
  }

  try {
    const result = await tool.invoke(call.arguments, { toolCallId: call.id, signal });
    logger.debug(`Tool ${call.name} (${call.id}) succeeded`);
    return {
      kind: 'toolResult',
      id: call.id,
      name: call.name,
      result: result ?? null,
      isError: false,
    };
  } catch (error) {
    const failure = new ToolExecutionError(toError(error).message, call, { cause: error });
    logger.warn(`Tool ${call.name} (${call.id}) failed: ${failure.message}`);
    return errorResult(failure);
  }
}

function errorResult(error: ToolExecutionError): ToolResultPart {
  return {
    kind: 'toolResult',
    id: error.toolCallId,
    name: error.toolName,
    result: { error: error.message },
    isError: true,
  };
}

/**
 * Settles every task with at most `limit` of them in flight. No task starts
 * once the signal is aborted.
 */
async function runBounded<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  signal: AbortSignal,
  task: (item: T) => Promise<R>,
): Promise<Array<PromiseSettledResult<Awaited<R>>>> {
  const settled: Array<PromiseSettledResult<Awaited<R>>> = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && !signal.aborted) {
      const index = next;
      next += 1;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      const [result] = await Promise.allSettled([task(item)]);
      if (result) {
        settled[index] = result;
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => worker()));
  return settled;
}
