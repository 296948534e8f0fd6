// Conversation Orchestrator
// Drives one user turn: build context, call the provider, run requested tools,
// feed their results back, until the model answers or the iteration cap is hit.
// Messages produced during a turn stay in memory and are written in one
// transaction when the turn finalizes; a failed or cancelled turn writes nothing.

import { randomUUID } from 'node:crypto';
import type { ProviderRegistry } from '../../providers/index.js';
import type { Provider, ProviderMessage, ProviderResponse, ProviderTool, ProviderUsage } from '../../providers/types.js';
import type { Agent, Message, MessageInput, Repository, Session, ToolExecutionInput } from '../../storage/types.js';
import { AppError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { countMessagesTokens } from '../../utils/token-counter.js';
import type { StrategyRegistry } from '../context/index.js';
import { ContextStrategyError } from '../context/types.js';
import type { ContextMessage, ContextStrategy, MessageRole } from '../context/types.js';
import { toToolDefinition, toToolMessageContent } from '../tools/definitions.js';
import { ToolErrorCode } from '../tools/errors.js';
import type { ToolExecutor } from '../tools/executor.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolResult, ToolSchema } from '../tools/types.js';
import { parseRawToolCalls, parseToolCalls, toProviderToolCalls, toRawToolCalls } from './parser.js';
import { buildSystemPrompt } from './prompt-builder.js';
import { suggestTools } from './tool-suggestions.js';
import type {
  OrchestratorOptions,
  ParsedToolCall,
  StreamEvent,
  ToolCallSource,
  ToolCallSummary,
  TurnRequest,
  TurnResult,
} from './types.js';

export const DEFAULT_MAX_ITERATIONS = 5;

export enum TurnState {
  BUILD_CONTEXT = 'BUILD_CONTEXT',
  CALL_PROVIDER = 'CALL_PROVIDER',
  PARSE_RESPONSE = 'PARSE_RESPONSE',
  EXECUTE_TOOLS = 'EXECUTE_TOOLS',
  APPEND_RESULTS = 'APPEND_RESULTS',
  FINALIZE = 'FINALIZE',
}

type Step =
  | { state: TurnState.BUILD_CONTEXT }
  | { state: TurnState.CALL_PROVIDER; context: ContextMessage[] }
  | { state: TurnState.PARSE_RESPONSE; context: ContextMessage[]; response: ProviderResponse }
  | {
      state: TurnState.EXECUTE_TOOLS;
      context: ContextMessage[];
      response: ProviderResponse;
      calls: ParsedToolCall[];
      source: ToolCallSource;
    }
  | {
      state: TurnState.APPEND_RESULTS;
      context: ContextMessage[];
      response: ProviderResponse;
      calls: ParsedToolCall[];
      source: ToolCallSource;
      results: Map<string, ToolResult>;
      executedAt: Date;
    }
  | { state: TurnState.FINALIZE; context: ContextMessage[]; response: ProviderResponse };

// Messages of the working set always carry their id and timestamp
type WorkingMessage = MessageInput & { id: string; createdAt: Date; metadata: Record<string, unknown> };

export interface OrchestratorDeps {
  repository: Repository;
  providers: ProviderRegistry;
  tools: ToolRegistry;
  executor: ToolExecutor;
  strategies: StrategyRegistry;
  logger: Logger;
}

interface ResolvedTurn {
  session: Session;
  agent: Agent;
  provider: Provider;
  strategy: ContextStrategy;
}

function usageMetadata(usage: ProviderUsage): Record<string, number> {
  return {
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    total_tokens: usage.totalTokens,
  };
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Turns the strategy's window into provider messages. Assistant tool calls are
 * replayed from their stored metadata; a tool message whose call is not in the
 * window (cut off by the strategy) is dropped.
 */
export function toProviderMessages(context: readonly ContextMessage[]): ProviderMessage[] {
  const announced = new Set<string>();
  const messages: ProviderMessage[] = [];

  for (const message of context) {
    const metadata = message.metadata ?? {};

    if (message.role === 'assistant') {
      const calls = parseRawToolCalls(metadata.tool_calls);
      if (calls.length > 0) {
        calls.forEach(call => announced.add(call.id));
        messages.push({ role: 'assistant', content: message.content, tool_calls: toProviderToolCalls(calls) });
        continue;
      }
    }

    if (message.role === 'tool') {
      const callId = readString(metadata.tool_call_id);
      if (!callId || !announced.has(callId)) continue;
      messages.push({ role: 'tool', content: message.content, tool_call_id: callId, name: readString(metadata.tool_name) });
      continue;
    }

    messages.push({ role: message.role, content: message.content });
  }

  return messages;
}

function rejectedCallResult(errorCode: ToolErrorCode, error: string): ToolResult {
  return Object.freeze({ success: false, error, errorCode, durationMs: 0 });
}

export class ConversationOrchestrator {
  private readonly maxIterations: number;
  private readonly logger: Logger;

  constructor(
    private readonly deps: OrchestratorDeps,
    options: OrchestratorOptions = {}
  ) {
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.logger = deps.logger.child({ component: 'orchestrator' });
  }

  async runTurn(request: TurnRequest): Promise<TurnResult> {
    const { session, agent, provider, strategy } = await this.resolve(request.sessionId);
    const { repository } = this.deps;

    const history = await repository.messages.listBySession(session.id);
    const userMessage = this.newMessage(session.id, 'user', request.message, request.metadata ?? {});
    const working: WorkingMessage[] = [...history.map(m => ({ ...m })), userMessage];
    const pending: WorkingMessage[] = [userMessage];
    const executionLog: ToolExecutionInput[] = [];
    const summaries: ToolCallSummary[] = [];

    const availableTools = await this.resolveTools(request);
    const toolsPermitted = request.toolChoice !== 'none' && availableTools.length > 0;
    const knownTools = new Set(availableTools.map(schema => schema.name));
    const suggestions = toolsPermitted ? suggestTools(request.message, knownTools) : [];
    const systemPrompt = buildSystemPrompt('', toolsPermitted ? availableTools : [], suggestions);
    const toolDefinitions: ProviderTool[] | undefined = toolsPermitted ? availableTools.map(toToolDefinition) : undefined;

    let iterations = 0;
    let lastContent = '';
    let step: Step = { state: TurnState.BUILD_CONTEXT };

    for (;;) {
      switch (step.state) {
        case TurnState.BUILD_CONTEXT: {
          if (request.signal?.aborted) {
            throw AppError.cancelled();
          }
          if (iterations >= this.maxIterations) {
            this.logger.warn({ sessionId: session.id, iterations }, 'Turn exceeded maximum tool call iterations');
            throw AppError.maxIterationsExceeded(this.maxIterations, {
              iterations,
              tool_calls: summaries,
              partial_response: lastContent,
            });
          }
          iterations++;
          const context = this.buildContext(strategy, systemPrompt, agent, working, session);
          step = { state: TurnState.CALL_PROVIDER, context };
          break;
        }

        case TurnState.CALL_PROVIDER: {
          const response = await this.callProvider(provider, agent, step.context, request, toolDefinitions);
          lastContent = response.content;
          step = { state: TurnState.PARSE_RESPONSE, context: step.context, response };
          break;
        }

        case TurnState.PARSE_RESPONSE: {
          const parsed = parseToolCalls(step.response, knownTools);
          if (toolsPermitted && parsed.calls.length > 0 && parsed.source) {
            step = {
              state: TurnState.EXECUTE_TOOLS,
              context: step.context,
              response: step.response,
              calls: parsed.calls,
              source: parsed.source,
            };
          } else {
            step = { state: TurnState.FINALIZE, context: step.context, response: step.response };
          }
          break;
        }

        case TurnState.EXECUTE_TOOLS: {
          const executedAt = new Date();
          const results = await this.executeCalls(session.id, agent.id, step.calls, knownTools, request.signal);
          step = {
            state: TurnState.APPEND_RESULTS,
            context: step.context,
            response: step.response,
            calls: step.calls,
            source: step.source,
            results,
            executedAt,
          };
          break;
        }

        case TurnState.APPEND_RESULTS: {
          const { response, calls, results, source, executedAt } = step;
          const assistant = this.newMessage(session.id, 'assistant', response.content, {
            provider: provider.name,
            model: response.model,
            context_length: step.context.length,
            strategy: strategy.name,
            finish_reason: 'tool_calls',
            usage: usageMetadata(response.usage),
            iteration: iterations,
            tool_calls: source === 'metadata' ? response.metadata.tool_calls : toRawToolCalls(calls),
            ...(source === 'content' ? { tool_call_source: 'content' } : {}),
            tool_call_details: calls.map(call => {
              const result = this.resultFor(results, call);
              return {
                id: call.id,
                tool_name: call.name,
                success: result.success,
                duration_ms: result.durationMs,
                error_code: result.errorCode,
              };
            }),
          });
          working.push(assistant);
          pending.push(assistant);

          for (const call of calls) {
            const result = this.resultFor(results, call);
            const toolMessage = this.newMessage(session.id, 'tool', toToolMessageContent(result), {
              tool_call_id: call.id,
              tool_name: call.name,
              tool_result: true,
            });
            working.push(toolMessage);
            pending.push(toolMessage);

            summaries.push({
              id: call.id,
              toolName: call.name,
              arguments: call.arguments,
              success: result.success,
              result: result.data,
              error: result.error,
              errorCode: result.errorCode,
              durationMs: result.durationMs,
            });
            executionLog.push({
              sessionId: session.id,
              messageId: assistant.id,
              callId: call.id,
              toolName: call.name,
              arguments: call.arguments,
              success: result.success,
              result: result.data,
              error: result.error,
              errorCode: result.errorCode,
              durationMs: result.durationMs,
              executedAt,
            });
          }

          step = { state: TurnState.BUILD_CONTEXT };
          break;
        }

        case TurnState.FINALIZE: {
          const { response, context } = step;
          const finishReason = response.finishReason ?? 'stop';
          const metadata: Record<string, unknown> = {
            provider: provider.name,
            model: response.model,
            context_length: context.length,
            context_tokens: countMessagesTokens(context),
            strategy: strategy.name,
            tools_available: toolsPermitted,
            ...(suggestions.length > 0 ? { suggested_tools: suggestions.map(s => s.tool) } : {}),
            finish_reason: finishReason,
            usage: usageMetadata(response.usage),
            iterations,
          };
          const assistant = this.newMessage(session.id, 'assistant', response.content, metadata);
          pending.push(assistant);

          await repository.messages.appendMany(pending, executionLog);

          this.logger.info(
            { sessionId: session.id, iterations, toolCalls: summaries.length, messages: pending.length },
            'Turn completed'
          );

          return {
            userMessageId: userMessage.id,
            assistantMessageId: assistant.id,
            response: response.content,
            toolCalls: summaries,
            metadata,
            finishReason,
            iterations,
          };
        }
      }
    }
  }

  /**
   * Tool-less turn streamed from the provider. The user and assistant messages
   * are written together once the stream has completed.
   */
  async *streamTurn(request: TurnRequest): AsyncGenerator<StreamEvent> {
    const { session, agent, provider, strategy } = await this.resolve(request.sessionId);
    const { repository } = this.deps;

    const history = await repository.messages.listBySession(session.id);
    const userMessage = this.newMessage(session.id, 'user', request.message, request.metadata ?? {});
    const context = this.buildContext(strategy, '', agent, [...history, userMessage], session);

    let content = '';
    let finishReason = 'stop';
    let usage: ProviderUsage | undefined;

    try {
      for await (const chunk of provider.sendChatStream(toProviderMessages(context), {
        model: agent.model,
        temperature: request.temperature ?? agent.temperature,
        maxTokens: request.maxTokens ?? agent.maxTokens,
        signal: request.signal,
      })) {
        if (chunk.text) {
          content += chunk.text;
          yield { type: 'delta', text: chunk.text };
        }
        if (chunk.finish_reason) finishReason = chunk.finish_reason;
        if (chunk.usage) usage = chunk.usage;
      }
    } catch (error) {
      throw this.providerFailure(provider, error, request.signal);
    }

    if (request.signal?.aborted) {
      throw AppError.cancelled();
    }

    const assistant = this.newMessage(session.id, 'assistant', content, {
      provider: provider.name,
      model: agent.model,
      context_length: context.length,
      context_tokens: countMessagesTokens(context),
      strategy: strategy.name,
      tools_available: false,
      finish_reason: finishReason,
      ...(usage ? { usage: usageMetadata(usage) } : {}),
      streamed: true,
    });
    await repository.messages.appendMany([userMessage, assistant]);

    yield {
      type: 'done',
      userMessageId: userMessage.id,
      assistantMessageId: assistant.id,
      response: content,
      finishReason,
    };
  }

  private async resolve(sessionId: string): Promise<ResolvedTurn> {
    const { repository, providers, strategies } = this.deps;

    const session = await repository.sessions.get(sessionId);
    if (!session) {
      throw AppError.notFound('Session not found');
    }

    const agent = await repository.agents.get(session.agentId);
    if (!agent) {
      throw AppError.notFound('Agent not found');
    }

    const provider = providers.get(agent.provider);
    if (!provider || !(await providers.isAvailable(agent.provider))) {
      throw AppError.providerUnavailable(agent.provider);
    }

    const strategy = strategies.get(session.contextStrategy);
    if (!strategy) {
      throw AppError.badRequest(`Unknown context strategy: ${session.contextStrategy}`);
    }

    return { session, agent, provider, strategy };
  }

  private buildContext(
    strategy: ContextStrategy,
    systemPrompt: string,
    agent: Agent,
    history: readonly ContextMessage[],
    session: Session
  ): ContextMessage[] {
    try {
      return strategy.buildContext(systemPrompt, agent.systemPrompt, history, session.contextConfig);
    } catch (error) {
      if (error instanceof ContextStrategyError) {
        throw AppError.badRequest(`Invalid context configuration: ${error.message}`, { strategy: error.strategy });
      }
      throw error;
    }
  }

  private async resolveTools(request: TurnRequest): Promise<ToolSchema[]> {
    const { tools } = this.deps;
    const candidates = request.tools
      ? request.tools.flatMap(name => {
          const tool = tools.get(name);
          return tool ? [tool] : [];
        })
      : tools.list();

    const available: ToolSchema[] = [];
    for (const tool of candidates) {
      try {
        if (await tool.isAvailable(request.signal)) {
          available.push(tool.schema());
        }
      } catch (error) {
        this.logger.warn({ tool: tool.name(), err: error }, 'Tool availability check failed');
      }
    }
    return available;
  }

  private async callProvider(
    provider: Provider,
    agent: Agent,
    context: readonly ContextMessage[],
    request: TurnRequest,
    tools: ProviderTool[] | undefined
  ): Promise<ProviderResponse> {
    try {
      return await provider.sendChat(toProviderMessages(context), {
        model: agent.model,
        temperature: request.temperature ?? agent.temperature,
        maxTokens: request.maxTokens ?? agent.maxTokens,
        signal: request.signal,
        tools,
        tool_choice: tools ? 'auto' : undefined,
      });
    } catch (error) {
      throw this.providerFailure(provider, error, request.signal);
    }
  }

  private providerFailure(provider: Provider, error: unknown, signal?: AbortSignal): AppError {
    if (error instanceof AppError) return error;
    if (signal?.aborted) return AppError.cancelled();

    this.logger.error({ provider: provider.name, err: error }, 'Provider request failed');
    return AppError.providerError(provider.name, error);
  }

  private async executeCalls(
    sessionId: string,
    agentId: string,
    calls: readonly ParsedToolCall[],
    offered: ReadonlySet<string>,
    signal?: AbortSignal
  ): Promise<Map<string, ToolResult>> {
    const rejected = new Map<string, ToolResult>();
    for (const call of calls) {
      if (call.error) {
        rejected.set(call.id, rejectedCallResult(ToolErrorCode.INVALID_ARGUMENTS, call.error));
      } else if (this.deps.tools.has(call.name) && !offered.has(call.name)) {
        // Registered, but not offered to the model in this turn
        rejected.set(
          call.id,
          rejectedCallResult(ToolErrorCode.TOOL_UNAVAILABLE, `tool '${call.name}' is not available in this turn`)
        );
      }
    }

    const runnable = calls.filter(call => !rejected.has(call.id));
    const results = await this.deps.executor.executeMultiple(
      sessionId,
      runnable.map(call => ({ toolName: call.name, arguments: call.arguments, callId: call.id })),
      { agentId, signal }
    );

    for (const [id, result] of rejected) {
      results.set(id, result);
    }
    return results;
  }

  private resultFor(results: Map<string, ToolResult>, call: ParsedToolCall): ToolResult {
    return (
      results.get(call.id) ??
      Object.freeze({
        success: false,
        error: 'no result recorded for tool call',
        errorCode: ToolErrorCode.EXECUTION_ERROR,
        durationMs: 0,
      })
    );
  }

  private newMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown>
  ): WorkingMessage & Message {
    return { id: randomUUID(), sessionId, role, content, metadata, createdAt: new Date() };
  }
}
