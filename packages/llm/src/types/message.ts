import type { Part, Role, TextPart, ToolCallPart, ToolResultPart } from './content.js';

export type ChatMessage = {
  readonly role: Role;
  readonly parts: ReadonlyArray<Part>;
  readonly metadata: Readonly<Record<string, unknown>>;
};

export function systemMessage(text: string): ChatMessage {
  return {
    role: 'system',
    parts: [{ kind: 'text', text }],
    metadata: {},
  };
}

/**
 * User turn: the prompt text (when non-empty) followed by the attachments.
 */
export function userMessage(text: string, attachments?: ReadonlyArray<Part>): ChatMessage {
  const parts: Array<Part> = [];
  if (text.length > 0) {
    parts.push({ kind: 'text', text });
  }
  parts.push(...(attachments ?? []));

  return {
    role: 'user',
    parts,
    metadata: {},
  };
}

export function modelMessage(
  parts: ReadonlyArray<Part>,
  metadata?: Readonly<Record<string, unknown>>,
): ChatMessage {
  return {
    role: 'model',
    parts,
    metadata: metadata ?? {},
  };
}

/**
 * Tool results travel back to the model on the user side of the conversation.
 */
export function toolResultMessage(result: ToolResultPart): ChatMessage {
  return {
    role: 'user',
    parts: [result],
    metadata: {},
  };
}

export function messageText(message: Readonly<ChatMessage>): string {
  return message.parts
    .filter((part): part is TextPart => part.kind === 'text')
    .map((part) => part.text)
    .join('');
}

export function messageToolCalls(message: Readonly<ChatMessage>): ReadonlyArray<ToolCallPart> {
  return message.parts.filter((part): part is ToolCallPart => part.kind === 'toolCall');
}

export function countTextParts(message: Readonly<ChatMessage>): number {
  return message.parts.filter((part) => part.kind === 'text').length;
}
