import { describe, it, expect, afterEach } from 'vitest';
import pino from 'pino';
import { ProviderRegistry } from '../../../providers/index.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, StreamChunk } from '../../../providers/types.js';
import { openRepository } from '../../../storage/sqlite-repository.js';
import type { SqliteRepository } from '../../../storage/sqlite-repository.js';
import { AppError, ErrorCode } from '../../../utils/errors.js';
import { StrategyRegistry } from '../../context/index.js';
import { defineTool, successResult } from '../../tools/base-tool.js';
import { createCalculatorTool } from '../../tools/calculator-tool.js';
import { ToolExecutor } from '../../tools/executor.js';
import { ToolRegistry } from '../../tools/registry.js';
import { createTextProcessorTool } from '../../tools/text-processor-tool.js';
import type { Tool } from '../../tools/types.js';
import { ConversationOrchestrator } from '../orchestrator.js';
import type { StreamEvent } from '../types.js';

type Reply = (messages: ProviderMessage[], options: ProviderOptions) => ProviderResponse;

const usage = { promptTokens: 10, completionTokens: 5, totalTokens: 15 };

function answer(content: string): Reply {
  return () => ({ content, model: 'fake-model', usage, finishReason: 'stop', metadata: { done: true } });
}

function toolCall(name: string, args: Record<string, unknown>): Reply {
  return () => ({
    content: '',
    model: 'fake-model',
    usage,
    finishReason: 'tool_calls',
    metadata: { done: true, tool_calls: [{ function: { name, arguments: args } }] },
  });
}

class ScriptedProvider implements Provider {
  readonly name = 'fake';
  available = true;
  streamChunks: string[] = [];
  calls: Array<{ messages: ProviderMessage[]; options: ProviderOptions }> = [];

  constructor(
    private script: Reply[],
    private fallback?: Reply
  ) {}

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    this.calls.push({ messages, options });
    const next = this.script.shift() ?? this.fallback;
    if (!next) {
      throw new Error('script exhausted');
    }
    return next(messages, options);
  }

  async *sendChatStream(messages: ProviderMessage[], options: ProviderOptions): AsyncGenerator<StreamChunk> {
    this.calls.push({ messages, options });
    for (const text of this.streamChunks) {
      yield { text };
    }
    yield { text: '', finish_reason: 'stop', usage };
  }

  async listModels() {
    return [];
  }

  async isAvailable() {
    return this.available;
  }
}

describe('ConversationOrchestrator', () => {
  let repository: SqliteRepository | undefined;
  let providers: ProviderRegistry | undefined;

  afterEach(() => {
    repository?.close();
    providers?.destroy();
  });

  async function setup(provider: ScriptedProvider, maxIterations = 5, extraTools: Tool[] = []) {
    const repo = openRepository(':memory:');
    const registry = new ProviderRegistry(60_000);
    registry.register(provider);
    repository = repo;
    providers = registry;

    const tools = new ToolRegistry();
    tools.register(createCalculatorTool());
    extraTools.forEach(tool => tools.register(tool));
    tools.seal();

    const logger = pino({ level: 'silent' });
    const orchestrator = new ConversationOrchestrator(
      {
        repository: repo,
        providers: registry,
        tools,
        executor: new ToolExecutor(tools, { timeoutMs: 1000, logger }),
        strategies: new StrategyRegistry(),
        logger,
      },
      { maxIterations }
    );

    const agent = await repo.agents.create({
      name: 'Math',
      provider: 'fake',
      model: 'fake-model',
      systemPrompt: 'You are good at math.',
    });
    const session = await repo.sessions.create({ agentId: agent.id });
    return { orchestrator, repository: repo, registry, session };
  }

  it('should run a tool and feed its result back to the model', async () => {
    const provider = new ScriptedProvider([toolCall('calculator', { expression: '2 + 3' }), answer('The answer is 5.')]);
    const { orchestrator, repository, session } = await setup(provider);

    const result = await orchestrator.runTurn({ sessionId: session.id, message: 'What is 2 + 3?' });

    expect(result.response).toBe('The answer is 5.');
    expect(result.iterations).toBe(2);
    expect(result.finishReason).toBe('stop');
    expect(result.toolCalls).toEqual([
      {
        id: 'call_0',
        toolName: 'calculator',
        arguments: { expression: '2 + 3' },
        success: true,
        result: { expression: '2 + 3', result: 5 },
        error: undefined,
        errorCode: undefined,
        durationMs: expect.any(Number),
      },
    ]);

    const toolContent = '{"success":true,"result":{"expression":"2 + 3","result":5}}';
    const [first, second] = provider.calls;
    expect(first.options.tools?.map(t => t.function.name)).toEqual(['calculator']);
    expect(first.options.tool_choice).toBe('auto');
    expect(first.options.temperature).toBe(0.7);
    expect(first.options.maxTokens).toBe(1000);
    expect(first.messages[0].content).toContain('**calculator**');
    expect(first.messages[0].content).toContain('You are good at math.');
    expect(second.messages.slice(1)).toEqual([
      { role: 'user', content: 'What is 2 + 3?' },
      {
        role: 'assistant',
        content: '',
        tool_calls: [{ id: 'call_0', name: 'calculator', arguments: '{"expression":"2 + 3"}' }],
      },
      { role: 'tool', content: toolContent, tool_call_id: 'call_0', name: 'calculator' },
    ]);

    const stored = await repository.messages.listBySession(session.id);
    expect(stored.map(m => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant']);
    expect(stored[0].id).toBe(result.userMessageId);
    expect(stored[3].id).toBe(result.assistantMessageId);
    expect(stored[2].content).toBe(toolContent);
    expect(stored[2].metadata).toEqual({ tool_call_id: 'call_0', tool_name: 'calculator', tool_result: true });
    expect(stored[1].metadata).toMatchObject({
      finish_reason: 'tool_calls',
      tool_calls: [{ function: { name: 'calculator', arguments: { expression: '2 + 3' } } }],
      tool_call_details: [{ id: 'call_0', tool_name: 'calculator', success: true }],
    });
    expect(stored[3].metadata).toMatchObject({
      provider: 'fake',
      model: 'fake-model',
      context_length: 4,
      strategy: 'last_n',
      tools_available: true,
      finish_reason: 'stop',
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
      iterations: 2,
    });

    const logs = await repository.toolExecutions.listBySession(session.id);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({ callId: 'call_0', toolName: 'calculator', success: true, messageId: stored[1].id });
  });

  it('should complete a turn when the model calls an unknown tool', async () => {
    const provider = new ScriptedProvider([toolCall('does_not_exist', {}), answer('I could not find that tool.')]);
    const { orchestrator, repository, session } = await setup(provider);

    const result = await orchestrator.runTurn({ sessionId: session.id, message: 'Use the magic tool' });

    expect(result.response).toBe('I could not find that tool.');
    expect(result.toolCalls[0]).toMatchObject({ success: false, errorCode: 'TOOL_NOT_FOUND' });

    const stored = await repository.messages.listBySession(session.id);
    expect(stored).toHaveLength(4);
    expect(stored[2].content).toBe(
      '{"success":false,"error":"tool \'does_not_exist\' not found","error_code":"TOOL_NOT_FOUND"}'
    );
  });

  it('should refuse a registered tool that was not offered in the turn', async () => {
    const provider = new ScriptedProvider([
      toolCall('text_processor', { text: 'secret', operation: 'uppercase' }),
      answer('That tool is not available.'),
    ]);
    const { orchestrator, repository, session } = await setup(provider, 5, [createTextProcessorTool()]);

    const result = await orchestrator.runTurn({
      sessionId: session.id,
      message: 'Shout this',
      tools: ['calculator'],
    });

    expect(provider.calls.map(call => call.options.tools?.map(t => t.function.name))).toEqual([
      ['calculator'],
      ['calculator'],
    ]);
    expect(result.response).toBe('That tool is not available.');
    expect(result.toolCalls).toEqual([
      {
        id: 'call_0',
        toolName: 'text_processor',
        arguments: { text: 'secret', operation: 'uppercase' },
        success: false,
        result: undefined,
        error: "tool 'text_processor' is not available in this turn",
        errorCode: 'TOOL_UNAVAILABLE',
        durationMs: 0,
      },
    ]);

    const logged = await repository.toolExecutions.listBySession(session.id);
    expect(logged).toHaveLength(1);
    expect(logged[0]).toMatchObject({ toolName: 'text_processor', success: false, errorCode: 'TOOL_UNAVAILABLE' });
  });

  it('should log when a tool ran rather than when the turn was stored', async () => {
    const slowTool = defineTool({
      name: 'slow_echo',
      description: 'Echoes after a pause',
      parameters: [],
      execute: async () => {
        await new Promise(resolve => setTimeout(resolve, 50));
        return successResult('done');
      },
    });
    const provider = new ScriptedProvider([toolCall('slow_echo', {}), answer('Done.')]);
    const { orchestrator, repository, session } = await setup(provider, 5, [slowTool]);

    const before = Date.now();
    await orchestrator.runTurn({ sessionId: session.id, message: 'Go' });

    const [log] = await repository.toolExecutions.listBySession(session.id);
    const stored = await repository.messages.listBySession(session.id);
    const final = stored[stored.length - 1];
    expect(log.executedAt.getTime()).toBeGreaterThanOrEqual(before);
    expect(final.createdAt.getTime() - log.executedAt.getTime()).toBeGreaterThanOrEqual(40);
  });

  it('should fail with partial results when the model never stops calling tools', async () => {
    const provider = new ScriptedProvider([], toolCall('calculator', { expression: '1 + 1' }));
    const { orchestrator, repository, session } = await setup(provider, 3);

    const error = await orchestrator.runTurn({ sessionId: session.id, message: 'Loop forever' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      code: ErrorCode.MAX_ITERATIONS_EXCEEDED,
      statusCode: 500,
      message: 'exceeded maximum tool call iterations (3)',
      details: {
        maxIterations: 3,
        iterations: 3,
        partial_response: '',
        tool_calls: [
          { toolName: 'calculator', success: true },
          { toolName: 'calculator', success: true },
          { toolName: 'calculator', success: true },
        ],
      },
    });
    expect(provider.calls).toHaveLength(3);
    expect(await repository.messages.listBySession(session.id)).toEqual([]);
    expect(await repository.toolExecutions.listBySession(session.id)).toEqual([]);
  });

  it('should persist nothing when the caller cancels mid-turn', async () => {
    const controller = new AbortController();
    const provider = new ScriptedProvider([
      (messages, options) => {
        controller.abort();
        return toolCall('calculator', { expression: '2 + 2' })(messages, options);
      },
    ]);
    const { orchestrator, repository, session } = await setup(provider);

    await expect(
      orchestrator.runTurn({ sessionId: session.id, message: 'What is 2 + 2?', signal: controller.signal })
    ).rejects.toMatchObject({ code: ErrorCode.CANCELLED, statusCode: 499 });

    expect(await repository.messages.listBySession(session.id)).toEqual([]);
  });

  it('should surface provider failures as provider errors', async () => {
    const provider = new ScriptedProvider([
      () => {
        throw new Error('connection refused');
      },
    ]);
    const { orchestrator, repository, session } = await setup(provider);

    await expect(orchestrator.runTurn({ sessionId: session.id, message: 'Hi' })).rejects.toMatchObject({
      code: ErrorCode.PROVIDER_ERROR,
      statusCode: 502,
      message: 'LLM request failed: connection refused',
    });
    expect(await repository.messages.listBySession(session.id)).toEqual([]);
  });

  it('should point the model at tools that fit the request', async () => {
    const provider = new ScriptedProvider([answer('Five.')]);
    const { orchestrator, session } = await setup(provider);

    const result = await orchestrator.runTurn({ sessionId: session.id, message: 'Please calculate 2 + 3' });

    expect(result.metadata.suggested_tools).toEqual(['calculator']);
    const system = provider.calls[0].messages[0];
    expect(system.role).toBe('system');
    expect(system.content).toContain('- calculator: This request involves mathematical calculations');
  });

  it('should not offer tools when tool choice is none', async () => {
    const provider = new ScriptedProvider([answer('Five.')]);
    const { orchestrator, session } = await setup(provider);

    const result = await orchestrator.runTurn({ sessionId: session.id, message: 'What is 2 + 3?', toolChoice: 'none' });

    expect(result.metadata.tools_available).toBe(false);
    expect(provider.calls[0].options.tools).toBeUndefined();
    expect(provider.calls[0].options.tool_choice).toBeUndefined();
    expect(provider.calls[0].messages[0]).toEqual({ role: 'system', content: 'You are good at math.' });
  });

  it('should report malformed arguments as failed tool calls', async () => {
    const provider = new ScriptedProvider([
      () => ({
        content: '',
        model: 'fake-model',
        usage,
        finishReason: 'tool_calls',
        metadata: { tool_calls: [{ id: 'bad', function: { name: 'calculator', arguments: '{"expression":' } }] },
      }),
      answer('Sorry about that.'),
    ]);
    const { orchestrator, repository, session } = await setup(provider);

    const result = await orchestrator.runTurn({ sessionId: session.id, message: 'Compute' });

    expect(result.toolCalls[0]).toMatchObject({
      id: 'bad',
      success: false,
      errorCode: 'INVALID_ARGUMENTS',
      durationMs: 0,
    });
    const [log] = await repository.toolExecutions.listBySession(session.id);
    expect(log.errorCode).toBe('INVALID_ARGUMENTS');
  });

  it('should fall back to tool calls written in the content', async () => {
    const provider = new ScriptedProvider([
      answer('```json\n{"tool":"calculator","args":{"expression":"6 * 7"}}\n```'),
      answer('42'),
    ]);
    const { orchestrator, repository, session } = await setup(provider);

    const result = await orchestrator.runTurn({ sessionId: session.id, message: 'What is 6 times 7?' });

    expect(result.toolCalls[0].result).toEqual({ expression: '6 * 7', result: 42 });
    const stored = await repository.messages.listBySession(session.id);
    expect(stored[1].metadata).toMatchObject({
      tool_call_source: 'content',
      tool_calls: [{ id: 'call_0', function: { name: 'calculator', arguments: '{"expression":"6 * 7"}' } }],
    });
  });

  it('should include persisted history in the context', async () => {
    const provider = new ScriptedProvider([answer('ok')]);
    const { orchestrator, repository, session } = await setup(provider);
    await repository.messages.appendMany([
      { sessionId: session.id, role: 'user', content: 'Hi' },
      { sessionId: session.id, role: 'assistant', content: 'Hello' },
    ]);

    await orchestrator.runTurn({ sessionId: session.id, message: 'Thanks' });

    expect(provider.calls[0].messages.map(m => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(provider.calls[0].messages[3].content).toBe('Thanks');
  });

  it('should reject unknown sessions, unavailable providers and unknown strategies', async () => {
    const provider = new ScriptedProvider([answer('unused')]);
    provider.available = false;
    const { orchestrator, repository, registry, session } = await setup(provider);

    await expect(orchestrator.runTurn({ sessionId: 'missing', message: 'Hi' })).rejects.toMatchObject({
      code: ErrorCode.NOT_FOUND,
    });
    await expect(orchestrator.runTurn({ sessionId: session.id, message: 'Hi' })).rejects.toMatchObject({
      code: ErrorCode.PROVIDER_UNAVAILABLE,
      statusCode: 503,
    });

    provider.available = true;
    registry.register(provider);
    await repository.sessions.update(session.id, { contextStrategy: 'nope' });
    await expect(orchestrator.runTurn({ sessionId: session.id, message: 'Hi' })).rejects.toMatchObject({
      code: ErrorCode.BAD_REQUEST,
    });
  });

  it('should stream deltas and persist the exchange once complete', async () => {
    const provider = new ScriptedProvider([]);
    provider.streamChunks = ['Hel', 'lo'];
    const { orchestrator, repository, session } = await setup(provider);

    const events: StreamEvent[] = [];
    for await (const event of orchestrator.streamTurn({ sessionId: session.id, message: 'Hi' })) {
      events.push(event);
    }

    expect(events).toEqual([
      { type: 'delta', text: 'Hel' },
      { type: 'delta', text: 'lo' },
      {
        type: 'done',
        userMessageId: expect.any(String),
        assistantMessageId: expect.any(String),
        response: 'Hello',
        finishReason: 'stop',
      },
    ]);

    const stored = await repository.messages.listBySession(session.id);
    expect(stored.map(m => m.content)).toEqual(['Hi', 'Hello']);
    expect(stored[1].metadata).toMatchObject({ streamed: true, usage: { total_tokens: 15 } });
  });
});
