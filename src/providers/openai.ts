// OpenAI-compatible Provider
// Any endpoint speaking /v1/chat/completions with function calling

import { z } from 'zod';
import type {
  FinishReason,
  ModelInfo,
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  StreamChunk,
} from './types.js';

const openAIToolCallSchema = z.object({
  id: z.string().optional(),
  type: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string().default(''),
  }),
});

const usageSchema = z
  .object({
    prompt_tokens: z.number().default(0),
    completion_tokens: z.number().default(0),
    total_tokens: z.number().default(0),
  })
  .optional()
  .nullable();

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(openAIToolCallSchema).optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: usageSchema,
});

const streamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .default([]),
  usage: usageSchema,
});

const modelsSchema = z.object({
  data: z.array(z.object({ id: z.string(), created: z.number().optional() })).default([]),
});

function toFinishReason(reason: string | null | undefined): FinishReason | undefined {
  if (reason === null || reason === undefined) return undefined;
  if (reason === 'length') return 'length';
  if (reason === 'tool_calls') return 'tool_calls';
  // 'stop', 'content_filter' and vendor extensions
  return 'stop';
}

function toUsage(usage: z.infer<typeof usageSchema>) {
  return {
    promptTokens: usage?.prompt_tokens ?? 0,
    completionTokens: usage?.completion_tokens ?? 0,
    totalTokens: usage?.total_tokens ?? 0,
  };
}

function toWireMessage(m: ProviderMessage) {
  if (m.role === 'tool') {
    return { role: m.role, content: m.content, tool_call_id: m.tool_call_id, name: m.name };
  }
  if (m.role === 'assistant' && m.tool_calls && m.tool_calls.length > 0) {
    return {
      role: m.role,
      content: m.content,
      tool_calls: m.tool_calls.map(tc => ({
        id: tc.id,
        type: 'function',
        function: { name: tc.name, arguments: tc.arguments },
      })),
    };
  }
  return { role: m.role, content: m.content };
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export class OpenAIProvider implements Provider {
  name = 'openai';
  private apiKey: string;
  private baseUrl: string;

  constructor(apiKey: string, baseUrl: string = 'https://api.openai.com') {
    this.apiKey = apiKey;
    if (!this.apiKey) {
      throw new Error('OPENAI_API_KEY not configured');
    }
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.apiKey}`,
    };
  }

  private buildBody(messages: ProviderMessage[], options: ProviderOptions, stream: boolean): string {
    const useTools = options.tools && options.tools.length > 0;
    return JSON.stringify({
      model: options.model,
      messages: messages.map(toWireMessage),
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      stream,
      tools: useTools ? options.tools : undefined,
      tool_choice: useTools ? options.tool_choice : undefined,
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: this.headers(),
      body: this.buildBody(messages, options, false),
      signal: options.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} - ${error}`);
    }

    const data = chatCompletionSchema.parse(await response.json());
    const choice = data.choices[0];
    const metadata: Record<string, unknown> = {};
    if (choice.message.tool_calls && choice.message.tool_calls.length > 0) {
      metadata.tool_calls = choice.message.tool_calls;
    }

    return {
      content: choice.message.content ?? '',
      model: data.model ?? options.model,
      usage: toUsage(data.usage),
      finishReason: toFinishReason(choice.finish_reason),
      metadata,
    };
  }

  async *sendChatStream(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<StreamChunk> {
    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: this.headers(),
      body: this.buildBody(messages, options, true),
      signal: options.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} - ${error}`);
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
        const trimmed = line.trim();
        if (!trimmed || !trimmed.startsWith('data: ')) continue;

        const data = trimmed.slice(6);
        if (data === '[DONE]') return;

        // Malformed events are skipped
        const parsed = streamChunkSchema.safeParse(safeJsonParse(data));
        if (!parsed.success) continue;

        const choice = parsed.data.choices[0];
        const text = choice?.delta?.content ?? '';
        const finishReason = toFinishReason(choice?.finish_reason);

        if (text) {
          yield { text };
        }
        if (finishReason || parsed.data.usage) {
          yield {
            text: '',
            finish_reason: finishReason,
            usage: parsed.data.usage ? toUsage(parsed.data.usage) : undefined,
          };
        }
      }
    }
  }

  async listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    const response = await fetch(`${this.baseUrl}/v1/models`, { headers: this.headers(), signal });
    if (!response.ok) {
      throw new Error(`OpenAI API error: ${response.status} - ${await response.text()}`);
    }

    const data = modelsSchema.parse(await response.json());
    return data.data.map(m => ({
      name: m.id,
      modifiedAt: m.created === undefined ? undefined : new Date(m.created * 1000).toISOString(),
    }));
  }

  async isAvailable(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/v1/models`, { headers: this.headers(), signal });
      // Only the status matters; release the connection
      await response.body?.cancel();
      return response.ok;
    } catch {
      return false;
    }
  }
}
