import type { JsonSchema, ResponseFormat, Tool } from '../types/index.js';

export const RETURN_RESULT_TOOL_NAME = 'return_result';

export function validateJsonSchema(schema: JsonSchema): boolean {
  return typeof schema['type'] === 'string' || Array.isArray(schema['type']);
}

export function responseFormatFor(schema: JsonSchema, name?: string): ResponseFormat {
  return {
    type: 'json_schema',
    schema,
    name: name ?? 'output',
  };
}

/**
 * Tool that providers without a native schema mode call to hand back typed
 * output. Its arguments are the result; invoking it echoes them.
 */
export function createReturnResultTool(schema: JsonSchema): Tool {
  return {
    name: RETURN_RESULT_TOOL_NAME,
    description:
      'Return the final result to the user. Call this exactly once, with arguments matching the schema, when the answer is ready.',
    inputSchema: schema,
    invoke: async (args) => args,
  };
}

/**
 * Checks the top-level type and required fields of a decoded value.
 * Returns the first problem found, or null.
 */
export function schemaViolation(value: unknown, schema: JsonSchema): string | null {
  const type = schema['type'];

  if (type === 'object') {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return 'expected an object';
    }
    const required = schema['required'];
    if (Array.isArray(required)) {
      for (const field of required) {
        if (typeof field === 'string' && !(field in value)) {
          return `missing required field: ${field}`;
        }
      }
    }
    return null;
  }

  if (type === 'array' && !Array.isArray(value)) {
    return 'expected an array';
  }
  if (type === 'string' && typeof value !== 'string') {
    return 'expected a string';
  }
  if ((type === 'number' || type === 'integer') && typeof value !== 'number') {
    return 'expected a number';
  }
  if (type === 'boolean' && typeof value !== 'boolean') {
    return 'expected a boolean';
  }
  return null;
}
