// Tool system types and interfaces
// A tool is described by a ToolSchema and invoked through the ToolExecutor

import type { ValidationError } from './errors.js';

export type ParameterType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  default?: unknown;
  enum?: string[]; // For string parameters
  minimum?: number;
  maximum?: number;
  pattern?: string;
}

export interface ToolExample {
  description: string;
  input: Record<string, unknown>;
  output?: unknown;
}

export interface ToolSchema {
  name: string;
  description: string;
  parameters: ToolParameter[];
  usage?: string;
  examples?: ToolExample[];
}

export type ToolInput = Record<string, unknown>;

/**
 * Per-invocation environment handed to a tool body. Built fresh by the
 * executor for every call and never persisted.
 */
export interface ExecutionContext {
  sessionId: string;
  agentId?: string;
  requestId: string;
  timeoutMs: number;
  deadline: number; // epoch ms
  signal: AbortSignal;
  metadata: Record<string, unknown>;
}

export interface ToolResult {
  success: boolean;
  data?: unknown;
  error?: string;
  errorCode?: string;
  metadata?: Record<string, unknown>;
  durationMs: number;
}

// What a tool body produces; the executor stamps the duration
export type ToolOutput = Omit<ToolResult, 'durationMs'>;

export interface CallInfo {
  toolName: string;
  arguments: ToolInput;
  callId?: string;
}

export interface Tool {
  name(): string;
  schema(): ToolSchema;
  validate(input: ToolInput): ValidationError | null;
  execute(ctx: ExecutionContext, input: ToolInput): Promise<ToolOutput | null | undefined>;
  isAvailable(signal?: AbortSignal): boolean | Promise<boolean>;
}

export interface ExecuteOptions {
  agentId?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
  metadata?: Record<string, unknown>;
}
