import pino from 'pino';
import { buildServer } from '../../app.js';
import { ProviderRegistry } from '../../providers/index.js';
import type { ModelInfo, Provider, ProviderResponse, StreamChunk } from '../../providers/types.js';
import { StrategyRegistry } from '../../services/context/index.js';
import { ConversationOrchestrator } from '../../services/orchestrator/index.js';
import { ToolExecutor, initializeTools } from '../../services/tools/index.js';
import { openRepository } from '../../storage/sqlite-repository.js';

const usage = { promptTokens: 8, completionTokens: 4, totalTokens: 12 };

export function answer(content: string): ProviderResponse {
  return { content, model: 'fake-model', usage, finishReason: 'stop', metadata: { done: true } };
}

export function toolCallReply(name: string, args: Record<string, unknown>): ProviderResponse {
  return {
    content: '',
    model: 'fake-model',
    usage,
    finishReason: 'tool_calls',
    metadata: { done: true, tool_calls: [{ function: { name, arguments: args } }] },
  };
}

export class FakeProvider implements Provider {
  readonly name = 'fake';
  replies: ProviderResponse[] = [];
  fallback?: ProviderResponse;
  streamChunks: string[] = [];
  streamError?: Error;
  models: ModelInfo[] = [{ name: 'fake-model' }];

  async sendChat(): Promise<ProviderResponse> {
    const next = this.replies.shift() ?? this.fallback;
    if (!next) {
      throw new Error('no reply scripted');
    }
    return next;
  }

  async *sendChatStream(): AsyncGenerator<StreamChunk> {
    for (const text of this.streamChunks) {
      yield { text };
    }
    if (this.streamError) {
      throw this.streamError;
    }
    yield { text: '', finish_reason: 'stop' };
  }

  async listModels(): Promise<ModelInfo[]> {
    return this.models;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

export async function buildTestApp(options: { maxIterations?: number } = {}) {
  const logger = pino({ level: 'silent' });
  const repository = openRepository(':memory:');
  const providers = new ProviderRegistry(60_000);
  const provider = new FakeProvider();
  providers.register(provider);

  const tools = initializeTools({ TOOLS_ENABLED: true, HTTP_TOOLS_ENABLED: false }, logger, {
    memories: repository.memories,
  });
  const executor = new ToolExecutor(tools, { timeoutMs: 1000, logger });
  const strategies = new StrategyRegistry();
  const orchestrator = new ConversationOrchestrator(
    { repository, providers, tools, executor, strategies, logger },
    { maxIterations: options.maxIterations ?? 5 }
  );

  const app = await buildServer(
    { repository, providers, tools, executor, strategies, orchestrator },
    { corsOrigins: [] }
  );
  await app.ready();

  const close = async () => {
    await app.close();
    providers.destroy();
    repository.close();
  };

  return { app, repository, provider, close };
}

export type TestApp = Awaited<ReturnType<typeof buildTestApp>>;

export async function createAgentAndSession(testApp: TestApp) {
  const agent = await testApp.repository.agents.create({
    name: 'Math',
    provider: 'fake',
    model: 'fake-model',
    systemPrompt: 'You are good at math.',
  });
  const session = await testApp.repository.sessions.create({ agentId: agent.id, title: 'Test chat' });
  return { agent, session };
}
