// Text Processor Tool
// Simple string transformations and extractions

import { defineTool, errorResult, successResult } from './base-tool.js';

export const TEXT_OPERATIONS = [
  'uppercase',
  'lowercase',
  'title_case',
  'word_count',
  'char_count',
  'reverse',
  'trim',
  'extract_emails',
  'extract_urls',
] as const;

export type TextOperation = (typeof TEXT_OPERATIONS)[number];

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const URL_REGEX = /https?:\/\/[^\s]+/g;

function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|\s)(\S)/g, (_match, space: string, first: string) => space + first.toUpperCase());
}

function isTextOperation(value: unknown): value is TextOperation {
  return typeof value === 'string' && TEXT_OPERATIONS.some(op => op === value);
}

export function processText(text: string, operation: TextOperation): string | number | string[] {
  switch (operation) {
    case 'uppercase':
      return text.toUpperCase();
    case 'lowercase':
      return text.toLowerCase();
    case 'title_case':
      return titleCase(text);
    case 'word_count':
      return text.split(/\s+/).filter(Boolean).length;
    case 'char_count':
      return Array.from(text).length;
    case 'reverse':
      return Array.from(text).reverse().join('');
    case 'trim':
      return text.trim();
    case 'extract_emails':
      return text.match(EMAIL_REGEX) ?? [];
    case 'extract_urls':
      return text.match(URL_REGEX) ?? [];
  }
}

export function createTextProcessorTool() {
  return defineTool({
    name: 'text_processor',
    description: 'Processes and manipulates text with various operations',
    parameters: [
      {
        name: 'text',
        type: 'string',
        description: 'The text to process',
        required: true,
      },
      {
        name: 'operation',
        type: 'string',
        description: 'Text operation to perform',
        required: true,
        enum: [...TEXT_OPERATIONS],
      },
    ],
    examples: [
      {
        description: 'Convert text to uppercase',
        input: { text: 'hello world', operation: 'uppercase' },
        output: { result: 'HELLO WORLD', operation: 'uppercase' },
      },
      {
        description: 'Count words in text',
        input: { text: 'The quick brown fox', operation: 'word_count' },
        output: { result: 4, operation: 'word_count' },
      },
    ],
    execute: (_ctx, args) => {
      const text = String(args.text ?? '');
      const operation = args.operation;
      if (!isTextOperation(operation)) {
        return errorResult('INVALID_OPERATION', `Unknown operation: ${String(operation)}`);
      }

      return successResult({
        result: processText(text, operation),
        operation,
        original: text,
      });
    },
  });
}
