export type Role = 'system' | 'user' | 'model';

export type TextPart = {
  readonly kind: 'text';
  readonly text: string;
};

export type DataPart = {
  readonly kind: 'data';
  readonly bytes: Uint8Array;
  readonly mimeType: string;
  readonly name: string | null;
};

export type LinkPart = {
  readonly kind: 'link';
  readonly uri: string;
  readonly mimeType: string | null;
  readonly name: string | null;
};

export type ToolCallPart = {
  readonly kind: 'toolCall';
  readonly id: string;
  readonly name: string;
  readonly arguments: Record<string, unknown>;
};

export type ToolResultPart = {
  readonly kind: 'toolResult';
  readonly id: string;
  readonly name: string;
  readonly result: unknown;
  readonly isError: boolean;
};

export type Part = TextPart | DataPart | LinkPart | ToolCallPart | ToolResultPart;

export function textPart(text: string): TextPart {
  return { kind: 'text', text };
}

export function dataPart(bytes: Uint8Array, mimeType: string, name?: string): DataPart {
  return { kind: 'data', bytes, mimeType, name: name ?? null };
}

export function linkPart(uri: string, mimeType?: string, name?: string): LinkPart {
  return { kind: 'link', uri, mimeType: mimeType ?? null, name: name ?? null };
}

export function toolCallPart(
  id: string,
  name: string,
  args: Record<string, unknown>,
): ToolCallPart {
  return { kind: 'toolCall', id, name, arguments: args };
}

export function toolResultPart(
  id: string,
  name: string,
  result: unknown,
  isError?: boolean,
): ToolResultPart {
  return { kind: 'toolResult', id, name, result, isError: isError ?? false };
}
