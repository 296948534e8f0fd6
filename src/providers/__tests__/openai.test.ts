import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAIProvider } from '../openai.js';
import { ProviderRegistry, createProviderRegistry } from '../index.js';
import type { Provider, StreamChunk } from '../types.js';

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' } });
}

describe('OpenAIProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should release the response body after an availability check', async () => {
    const cancel = vi.fn();
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => new Response(new ReadableStream({ cancel }), { status: 200 }))
    );

    const provider = new OpenAIProvider('test-secret', 'https://llm.test');

    expect(await provider.isAvailable()).toBe(true);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should require an API key', () => {
    expect(() => new OpenAIProvider('')).toThrow('OPENAI_API_KEY not configured');
  });

  it('should send bearer-authenticated chat completions and keep raw tool calls', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        model: 'gpt-test',
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: 'call_abc', type: 'function', function: { name: 'calculator', arguments: '{"expression":"2 + 3"}' } },
              ],
            },
            finish_reason: 'tool_calls',
          },
        ],
        usage: { prompt_tokens: 20, completion_tokens: 5, total_tokens: 25 },
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OpenAIProvider('test-secret', 'https://llm.test');
    const response = await provider.sendChat([{ role: 'user', content: 'What is 2 + 3?' }], { model: 'gpt-test' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'Authorization': 'Bearer test-secret' });
    expect(response.content).toBe('');
    expect(response.finishReason).toBe('tool_calls');
    expect(response.usage).toEqual({ promptTokens: 20, completionTokens: 5, totalTokens: 25 });
    expect(response.metadata.tool_calls).toEqual([
      { id: 'call_abc', type: 'function', function: { name: 'calculator', arguments: '{"expression":"2 + 3"}' } },
    ]);
  });

  it('should parse server-sent event streams', async () => {
    const events = [
      'data: {"choices":[{"delta":{"content":"Hi"}}]}',
      'data: not-json',
      'data: {"choices":[{"delta":{"content":" there"},"finish_reason":"stop"}]}',
      'data: [DONE]',
    ];
    vi.stubGlobal('fetch', vi.fn<typeof fetch>(async () => new Response(events.join('\n\n') + '\n\n')));

    const provider = new OpenAIProvider('test-secret', 'https://llm.test');
    const chunks: StreamChunk[] = [];
    for await (const chunk of provider.sendChatStream([{ role: 'user', content: 'Hi' }], { model: 'gpt-test' })) {
      chunks.push(chunk);
    }

    expect(chunks).toEqual([
      { text: 'Hi' },
      { text: ' there' },
      { text: '', finish_reason: 'stop', usage: undefined },
    ]);
  });
});

describe('ProviderRegistry', () => {
  function fakeProvider(name: string, available: () => Promise<boolean>): Provider {
    return {
      name,
      sendChat: async () => ({ content: '', model: 'm', usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 }, metadata: {} }),
      sendChatStream: async function* () {
        yield { text: '' };
      },
      listModels: async () => [],
      isAvailable: available,
    };
  }

  it('should cache availability checks', async () => {
    const check = vi.fn(async () => true);
    const registry = new ProviderRegistry(60_000);
    registry.register(fakeProvider('local', check));

    expect(await registry.isAvailable('local')).toBe(true);
    expect(await registry.isAvailable('local')).toBe(true);
    expect(check).toHaveBeenCalledTimes(1);
    expect(await registry.isAvailable('unknown')).toBe(false);

    registry.destroy();
  });

  it('should only register configured providers', () => {
    const registry = createProviderRegistry({
      OLLAMA_BASE_URL: 'http://ollama.test',
      OPENAI_API_KEY: '',
      OPENAI_BASE_URL: 'https://llm.test',
      PROVIDER_AVAILABILITY_TTL_MS: 1000,
    });

    expect(registry.list()).toEqual(['ollama']);
    registry.destroy();
  });
});
