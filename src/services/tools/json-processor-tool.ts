// JSON Processor Tool

import { defineTool, errorResult, successResult } from './base-tool.js';
import { isPlainObject } from './validation.js';

const JSON_OPERATIONS = ['validate', 'pretty_print', 'minify', 'extract_keys', 'get_value'];

/**
 * Walks a dot-separated path through nested objects, e.g. `user.name`.
 */
export function getJsonValue(data: unknown, path: string): unknown {
  let current = data;
  for (const key of path.split('.')) {
    if (!isPlainObject(current)) {
      throw new Error(`cannot access key '${key}' on non-object`);
    }
    if (!(key in current)) {
      throw new Error(`key '${key}' not found`);
    }
    current = current[key];
  }
  return current;
}

export function createJsonProcessorTool() {
  return defineTool({
    name: 'json_processor',
    description: 'Processes and manipulates JSON data',
    parameters: [
      {
        name: 'json_data',
        type: 'string',
        description: 'JSON string to process',
        required: true,
      },
      {
        name: 'operation',
        type: 'string',
        description: 'JSON operation to perform',
        required: true,
        enum: JSON_OPERATIONS,
      },
      {
        name: 'path',
        type: 'string',
        description: "JSON path for get_value operation (e.g., 'user.name')",
        required: false,
      },
    ],
    examples: [
      {
        description: 'Pretty print JSON',
        input: { json_data: '{"name":"Ada","age":36}', operation: 'pretty_print' },
        output: { result: '{\n  "name": "Ada",\n  "age": 36\n}', operation: 'pretty_print' },
      },
    ],
    execute: (_ctx, args) => {
      const jsonData = String(args.json_data ?? '');
      const operation = String(args.operation ?? '');

      let data: unknown;
      try {
        data = JSON.parse(jsonData);
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        return errorResult('INVALID_JSON', `Invalid JSON: ${errorMessage}`);
      }

      switch (operation) {
        case 'validate':
          return successResult({ result: { valid: true, message: 'JSON is valid' }, operation });
        case 'pretty_print':
          return successResult({ result: JSON.stringify(data, null, 2), operation });
        case 'minify':
          return successResult({ result: JSON.stringify(data), operation });
        case 'extract_keys':
          return successResult({ result: isPlainObject(data) ? Object.keys(data) : [], operation });
        case 'get_value': {
          if (typeof args.path !== 'string' || !args.path) {
            return errorResult('MISSING_PATH', 'path is required for get_value operation');
          }
          try {
            return successResult({ result: getJsonValue(data, args.path), operation });
          } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            return errorResult('PROCESSING_ERROR', `Failed to process JSON: ${errorMessage}`);
          }
        }
        default:
          return errorResult('INVALID_OPERATION', `Unknown operation: ${operation}`);
      }
    },
  });
}
