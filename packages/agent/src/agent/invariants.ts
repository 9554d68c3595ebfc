import type { ChatMessage } from '@chorus/llm';
import { InvariantViolationError, countTextParts, getLogger } from '@chorus/llm';

const logger = getLogger('agent');

/**
 * Streaming must consolidate text into at most one part per message; a
 * message with more is an orchestration defect and is never passed on.
 */
export function assertSingleTextPart(messages: ReadonlyArray<ChatMessage>, where: string): void {
  for (const [index, message] of messages.entries()) {
    const count = countTextParts(message);
    if (count > 1) {
      const detail = `${where}: ${message.role} message ${index} has ${count} text parts, expected at most 1`;
      logger.error(detail);
      throw new InvariantViolationError(detail);
    }
  }
}
