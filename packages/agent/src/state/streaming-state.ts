import { nanoid } from 'nanoid';
import type { ChatMessage, ChatResult, Tool, ToolCallPart, ToolResultPart } from '@chorus/llm';
import { InvariantViolationError, chatResult } from '@chorus/llm';

export type TurnStatus = 'pending' | 'iterating' | 'toolExecuting' | 'complete';

export type StreamingStateOptions = {
  readonly conversationHistory: ReadonlyArray<ChatMessage>;
  readonly toolMap: ReadonlyMap<string, Tool>;
  readonly turnId?: string;
};

/**
 * Mutable state of one turn, owned by a single sendStream call.
 *
 * History only grows, and only once a model response has been received in
 * full, so a failed iteration leaves the state where the last committed
 * message left it and processIteration can simply be called again.
 */
export class StreamingState {
  readonly toolMap: ReadonlyMap<string, Tool>;
  readonly turnId: string;
  private readonly history: Array<ChatMessage>;
  private readonly pending = new Map<string, ToolCallPart>();
  private currentStatus: TurnStatus = 'pending';
  private toolCallCounter = 0;
  private last: ChatResult<string> = chatResult('');

  constructor(options: StreamingStateOptions) {
    this.history = [...options.conversationHistory];
    this.toolMap = options.toolMap;
    this.turnId = options.turnId ?? nanoid(8);
  }

  get conversationHistory(): ReadonlyArray<ChatMessage> {
    return this.history;
  }

  get status(): TurnStatus {
    return this.currentStatus;
  }

  get done(): boolean {
    return this.currentStatus === 'complete';
  }

  get lastResult(): ChatResult<string> {
    return this.last;
  }

  get pendingToolCalls(): ReadonlyArray<ToolCallPart> {
    return Array.from(this.pending.values());
  }

  updateLastResult(result: ChatResult<string>): void {
    this.last = result;
  }

  addToHistory(...messages: ReadonlyArray<ChatMessage>): void {
    this.history.push(...messages);
  }

  beginIteration(): void {
    if (this.currentStatus === 'complete') {
      throw new InvariantViolationError('cannot start an iteration on a completed turn');
    }
    if (this.currentStatus === 'toolExecuting') {
      throw new InvariantViolationError(
        `cannot start an iteration with ${this.pending.size} tool calls still unanswered`,
      );
    }
    this.currentStatus = 'iterating';
  }

  beginToolExecution(calls: ReadonlyArray<ToolCallPart>): void {
    if (this.currentStatus !== 'iterating') {
      throw new InvariantViolationError(`cannot execute tools while ${this.currentStatus}`);
    }
    for (const call of calls) {
      if (this.pending.has(call.id)) {
        throw new InvariantViolationError(`duplicate tool call id: ${call.id}`);
      }
      this.pending.set(call.id, call);
    }
    this.currentStatus = 'toolExecuting';
  }

  recordToolResult(result: ToolResultPart): void {
    if (!this.pending.delete(result.id)) {
      throw new InvariantViolationError(`tool result ${result.id} matches no pending tool call`);
    }
  }

  endToolExecution(): void {
    if (this.pending.size > 0) {
      const ids = Array.from(this.pending.keys()).join(', ');
      throw new InvariantViolationError(`tool calls without results: ${ids}`);
    }
    this.currentStatus = 'iterating';
  }

  /**
   * Drops the calls of an interrupted tool round. Nothing of the round has
   * reached history, so the next iteration starts from the last commit.
   */
  abandonToolExecution(): void {
    if (this.currentStatus !== 'toolExecuting') {
      return;
    }
    this.pending.clear();
    this.currentStatus = 'iterating';
  }

  complete(): void {
    this.currentStatus = 'complete';
  }

  /**
   * Id for a tool call the provider left unnamed; unique within the turn.
   */
  nextToolCallId(): string {
    const id = `call_${this.turnId}_${this.toolCallCounter}`;
    this.toolCallCounter += 1;
    return id;
  }
}
