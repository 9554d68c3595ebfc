import { parse, STR, OBJ, ARR, NUM, NULL } from 'partial-json';
import type { JsonSchema } from '@chorus/llm';
import { NoObjectGeneratedError, schemaViolation } from '@chorus/llm';

/**
 * Decodes a complete typed answer and checks it against the schema.
 */
export function decodeTypedOutput<T>(
  text: string,
  schema: JsonSchema,
  outputFromJson?: (json: unknown) => T,
): T {
  if (text.trim() === '') {
    throw new NoObjectGeneratedError('response contained no JSON output', text);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new NoObjectGeneratedError('failed to parse response output as JSON', text, { cause: error });
  }

  const violation = schemaViolation(decoded, schema);
  if (violation !== null) {
    throw new NoObjectGeneratedError(`response output does not match schema: ${violation}`, text);
  }

  return outputFromJson ? outputFromJson(decoded) : (decoded as T);
}

/**
 * Parses a JSON prefix. Returns null until the prefix holds an object or array.
 */
export function tryParsePartial<T>(jsonString: string): Partial<T> | null {
  if (!jsonString || jsonString.trim() === '') {
    return null;
  }

  try {
    const parsed = parse(jsonString, STR | OBJ | ARR | NUM | NULL) as Partial<T>;
    if (typeof parsed === 'object' && parsed !== null) {
      return parsed;
    }
    return null;
  } catch {
    return null;
  }
}
