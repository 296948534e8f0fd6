// Orchestrator Types

import type { ToolInput } from '../tools/types.js';

export interface TurnRequest {
  sessionId: string;
  message: string;
  metadata?: Record<string, unknown>;
  /** Restricts the turn to these tools; every registered tool when omitted. */
  tools?: string[];
  toolChoice?: 'auto' | 'none';
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ToolCallSummary {
  id: string;
  toolName: string;
  arguments: ToolInput;
  success: boolean;
  result?: unknown;
  error?: string;
  errorCode?: string;
  durationMs: number;
}

export interface TurnResult {
  userMessageId: string;
  assistantMessageId: string;
  response: string;
  toolCalls: ToolCallSummary[];
  metadata: Record<string, unknown>;
  finishReason: string;
  iterations: number;
}

export type StreamEvent =
  | { type: 'delta'; text: string }
  | {
      type: 'done';
      userMessageId: string;
      assistantMessageId: string;
      response: string;
      finishReason: string;
    };

/**
 * A tool call read from a provider response. `error` is set when the
 * arguments could not be decoded into an object.
 */
export interface ParsedToolCall {
  id: string;
  name: string;
  arguments: ToolInput;
  rawArguments: string;
  error?: string;
}

export type ToolCallSource = 'metadata' | 'content';

export interface ParsedToolCalls {
  calls: ParsedToolCall[];
  source?: ToolCallSource;
}

export interface OrchestratorOptions {
  maxIterations?: number;
}
