// Calculator Tool
// Performs mathematical calculations safely using mathjs

import { evaluate } from 'mathjs';
import { defineTool, errorResult, successResult } from './base-tool.js';

export const EXPRESSION_PATTERN = '^[0-9+\\-*/().\\s^%a-z,]+$';

export function createCalculatorTool() {
  return defineTool({
    name: 'calculator',
    description:
      'Perform mathematical calculations. Supports arithmetic, powers, and functions such as sqrt, abs, sin and log. Use this for any mathematical computation.',
    parameters: [
      {
        name: 'expression',
        type: 'string',
        description: 'Mathematical expression to evaluate (e.g., "2 + 2", "sqrt(16)", "2 ^ 10")',
        required: true,
        pattern: EXPRESSION_PATTERN,
      },
    ],
    examples: [
      {
        description: 'Simple arithmetic',
        input: { expression: '2 + 3 * 4' },
        output: { expression: '2 + 3 * 4', result: 14 },
      },
      {
        description: 'Square root calculation',
        input: { expression: 'sqrt(16)' },
        output: { expression: 'sqrt(16)', result: 4 },
      },
    ],
    execute: (_ctx, args) => {
      const expression = String(args.expression ?? '').trim();
      if (!expression) {
        return errorResult('CALCULATION_ERROR', 'Expression is required');
      }

      let result: unknown;
      try {
        result = evaluate(expression);
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        return errorResult('CALCULATION_ERROR', `Failed to evaluate expression: ${errorMessage}`);
      }

      if (typeof result === 'number') {
        if (!Number.isFinite(result)) {
          return errorResult('CALCULATION_ERROR', `Expression did not produce a finite number: ${String(result)}`);
        }
        return successResult({ expression, result });
      }

      // Matrices, units and complex numbers come back in mathjs' own notation
      return successResult({ expression, result: String(result) });
    },
  });
}
