// Ollama Provider
// Talks to a local Ollama server: /api/chat for completions, /api/tags for models

import { z } from 'zod';
import type {
  FinishReason,
  ModelInfo,
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  StreamChunk,
  ToolCall,
} from './types.js';

const ollamaToolCallSchema = z.object({
  function: z.object({
    name: z.string(),
    arguments: z.unknown(),
  }),
});

const ollamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z
    .object({
      role: z.string().optional(),
      content: z.string().optional(),
      tool_calls: z.array(ollamaToolCallSchema).optional(),
    })
    .optional(),
  done: z.boolean().optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const ollamaTagsSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        size: z.number().optional(),
        modified_at: z.string().optional(),
      })
    )
    .default([]),
});

type OllamaChatResponse = z.infer<typeof ollamaChatResponseSchema>;

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

// Ollama wants tool call arguments as objects, not JSON strings
function toOllamaToolCalls(toolCalls: ToolCall[]) {
  return toolCalls.map(tc => ({ function: { name: tc.name, arguments: safeJsonParse(tc.arguments) } }));
}

function toOllamaMessage(m: ProviderMessage) {
  if (m.role === 'assistant' && m.tool_calls && m.tool_calls.length > 0) {
    return { role: m.role, content: m.content, tool_calls: toOllamaToolCalls(m.tool_calls) };
  }
  if (m.role === 'tool' && m.name) {
    return { role: m.role, content: m.content, tool_name: m.name };
  }
  return { role: m.role, content: m.content };
}

function toFinishReason(data: OllamaChatResponse): FinishReason {
  if (data.message?.tool_calls && data.message.tool_calls.length > 0) return 'tool_calls';
  return data.done_reason === 'length' ? 'length' : 'stop';
}

function toUsage(data: OllamaChatResponse) {
  const promptTokens = data.prompt_eval_count ?? 0;
  const completionTokens = data.eval_count ?? 0;
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

export class OllamaProvider implements Provider {
  name = 'ollama';
  private baseUrl: string;

  constructor(baseUrl: string) {
    if (!baseUrl) {
      throw new Error('OLLAMA_BASE_URL not configured');
    }
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  private buildRequest(messages: ProviderMessage[], options: ProviderOptions, stream: boolean): RequestInit {
    const useTools = options.tools && options.tools.length > 0 && options.tool_choice !== 'none';
    return {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      signal: options.signal,
      body: JSON.stringify({
        model: options.model,
        messages: messages.map(toOllamaMessage),
        stream,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens,
        },
        tools: useTools ? options.tools : undefined,
      }),
    };
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const response = await fetch(`${this.baseUrl}/api/chat`, this.buildRequest(messages, options, false));

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Ollama API error: ${response.status} - ${error}`);
    }

    const data = ollamaChatResponseSchema.parse(await response.json());
    const metadata: Record<string, unknown> = {
      done: data.done ?? true,
    };
    if (data.message?.tool_calls && data.message.tool_calls.length > 0) {
      metadata.tool_calls = data.message.tool_calls;
    }

    return {
      content: data.message?.content ?? '',
      model: data.model ?? options.model,
      usage: toUsage(data),
      finishReason: toFinishReason(data),
      metadata,
    };
  }

  // Ollama streams newline-delimited JSON objects
  async *sendChatStream(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<StreamChunk> {
    const response = await fetch(`${this.baseUrl}/api/chat`, this.buildRequest(messages, options, true));

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Ollama API error: ${response.status} - ${error}`);
    }

    if (!response.body) {
      throw new Error('No response body');
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() || '';

      for (const line of lines) {
        const chunk = this.parseStreamLine(line);
        if (!chunk) continue;
        yield chunk;
        if (chunk.finish_reason) return;
      }
    }

    const tail = this.parseStreamLine(buffer);
    if (tail) yield tail;
  }

  private parseStreamLine(line: string): StreamChunk | null {
    const trimmed = line.trim();
    if (!trimmed) return null;

    const parsed = ollamaChatResponseSchema.safeParse(safeJsonParse(trimmed));
    if (!parsed.success) return null;

    const data = parsed.data;
    if (data.done) {
      return { text: data.message?.content ?? '', usage: toUsage(data), finish_reason: toFinishReason(data) };
    }
    return { text: data.message?.content ?? '' };
  }

  async listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    const response = await fetch(`${this.baseUrl}/api/tags`, { signal });
    if (!response.ok) {
      throw new Error(`Ollama API error: ${response.status} - ${await response.text()}`);
    }

    const data = ollamaTagsSchema.parse(await response.json());
    return data.models.map(m => ({ name: m.name, size: m.size, modifiedAt: m.modified_at }));
  }

  async isAvailable(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, { signal });
      // Only the status matters; release the connection
      await response.body?.cancel();
      return response.ok;
    } catch {
      return false;
    }
  }
}
