// Provider Interface
// Common interface that all LLM providers must implement

// Canonical tool call carried on assistant messages sent back to a provider
export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON string
}

export interface JsonSchemaProperty {
  type: string;
  description: string;
  default?: unknown;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  pattern?: string;
}

export interface ProviderTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, JsonSchemaProperty>;
      required: string[];
    };
  };
}

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system' | 'tool';
  content: string;
  tool_calls?: ToolCall[]; // For assistant messages with tool calls
  tool_call_id?: string; // For tool result messages
  name?: string; // Tool name for tool messages
}

export interface ProviderOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  tools?: ProviderTool[];
  tool_choice?: 'auto' | 'none';
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type FinishReason = 'stop' | 'tool_calls' | 'length';

export interface ProviderResponse {
  content: string;
  model: string;
  usage: ProviderUsage;
  finishReason?: FinishReason;
  // Provider-specific extras; structured tool calls live under `tool_calls`
  metadata: Record<string, unknown>;
}

export interface StreamChunk {
  text: string;
  usage?: ProviderUsage;
  finish_reason?: FinishReason;
}

export interface ModelInfo {
  name: string;
  size?: number;
  modifiedAt?: string;
}

export interface Provider {
  name: string;
  sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse>;
  sendChatStream(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<StreamChunk>;
  listModels(signal?: AbortSignal): Promise<ModelInfo[]>;
  isAvailable(signal?: AbortSignal): Promise<boolean>;
}
