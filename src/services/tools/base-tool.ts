// Base tool implementation
// Most tools are a schema plus an execute function; defineTool builds one

import { ValidationError } from './errors.js';
import type { ExecutionContext, ToolExample, ToolInput, ToolOutput, ToolParameter, ToolSchema, Tool } from './types.js';
import { validateInput } from './validation.js';

export type ToolBody = (
  ctx: ExecutionContext,
  input: ToolInput
) => Promise<ToolOutput | null | undefined> | ToolOutput | null | undefined;

export type AvailabilityCheck = (signal?: AbortSignal) => boolean | Promise<boolean>;

export class BaseTool implements Tool {
  constructor(
    private readonly toolSchema: ToolSchema,
    private readonly body: ToolBody,
    private readonly availability: AvailabilityCheck = () => true
  ) {}

  name(): string {
    return this.toolSchema.name;
  }

  schema(): ToolSchema {
    return this.toolSchema;
  }

  validate(input: ToolInput): ValidationError | null {
    try {
      validateInput(this.toolSchema, input);
      return null;
    } catch (error) {
      if (error instanceof ValidationError) return error;
      throw error;
    }
  }

  async execute(ctx: ExecutionContext, input: ToolInput): Promise<ToolOutput | null | undefined> {
    return this.body(ctx, input);
  }

  isAvailable(signal?: AbortSignal): boolean | Promise<boolean> {
    return this.availability(signal);
  }
}

export interface ToolOptions {
  name: string;
  description: string;
  parameters: ToolParameter[];
  usage?: string;
  examples?: ToolExample[];
  isAvailable?: AvailabilityCheck;
  execute: ToolBody;
}

export function defineTool(options: ToolOptions): BaseTool {
  const { execute, isAvailable, ...schema } = options;
  return new BaseTool(schema, execute, isAvailable);
}

export function successResult(data: unknown, metadata?: Record<string, unknown>): ToolOutput {
  return metadata ? { success: true, data, metadata } : { success: true, data };
}

export function errorResult(errorCode: string, message: string, metadata?: Record<string, unknown>): ToolOutput {
  return metadata
    ? { success: false, error: message, errorCode, metadata }
    : { success: false, error: message, errorCode };
}
