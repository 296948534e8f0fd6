// Tool Executor
// Runs tools in isolation: every call gets its own deadline and abort signal,
// and whatever the body does (throw, hang, return nothing) becomes a ToolResult

import { randomUUID } from 'node:crypto';
import type { Logger } from '../../utils/logger.js';
import { ExecutionError, ToolErrorCode, ValidationError } from './errors.js';
import type { ToolRegistry } from './registry.js';
import type { CallInfo, ExecuteOptions, ExecutionContext, Tool, ToolInput, ToolOutput, ToolResult } from './types.js';
import { sanitizeInput } from './validation.js';

export const DEFAULT_TOOL_TIMEOUT_MS = 60_000;

export interface ToolExecutorOptions {
  timeoutMs?: number;
  logger?: Logger;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Assigns a unique id to every call of a batch. Missing ids become
 * `call_<index>`, repeated ids become `<id>#<index>` after the first use.
 */
export function assignCallIds(calls: CallInfo[]): string[] {
  const used = new Set<string>();
  return calls.map((call, index) => {
    let id = call.callId || `call_${index}`;
    if (used.has(id)) {
      id = `${id}#${index}`;
    }
    used.add(id);
    return id;
  });
}

export class ToolExecutor {
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(
    private readonly registry: ToolRegistry,
    options: ToolExecutorOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.logger = options.logger?.child({ component: 'tool-executor' });
  }

  async execute(
    toolName: string,
    sessionId: string,
    input: ToolInput,
    options: ExecuteOptions = {}
  ): Promise<ToolResult> {
    const startedAt = Date.now();
    const finish = (output: ToolOutput): ToolResult => {
      const result = Object.freeze({ ...output, durationMs: Date.now() - startedAt });
      this.logger?.debug(
        { tool: toolName, sessionId, success: result.success, errorCode: result.errorCode, durationMs: result.durationMs },
        'Tool execution finished'
      );
      return result;
    };

    const tool = this.registry.get(toolName);
    if (!tool) {
      return finish({
        success: false,
        error: `tool '${toolName}' not found`,
        errorCode: ToolErrorCode.TOOL_NOT_FOUND,
      });
    }

    if (!(await this.checkAvailable(tool, options.signal))) {
      return finish({
        success: false,
        error: `tool '${toolName}' is not available`,
        errorCode: ToolErrorCode.TOOL_UNAVAILABLE,
      });
    }

    let sanitized: ToolInput;
    try {
      const invalid = tool.validate(input);
      if (invalid) throw invalid;
      sanitized = sanitizeInput(tool.schema(), input);
    } catch (error) {
      return finish({
        success: false,
        error: describeError(error),
        errorCode: ToolErrorCode.VALIDATION_ERROR,
        metadata: error instanceof ValidationError ? { parameter: error.parameter } : undefined,
      });
    }

    if (options.signal?.aborted) {
      return finish({
        success: false,
        error: 'execution cancelled',
        errorCode: ToolErrorCode.CANCELLED,
      });
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const ctx: ExecutionContext = {
      sessionId,
      agentId: options.agentId,
      requestId: randomUUID(),
      timeoutMs,
      deadline: startedAt + timeoutMs,
      signal: controller.signal,
      metadata: { ...options.metadata },
    };

    return finish(await this.runIsolated(tool, ctx, sanitized, controller, options.signal));
  }

  /**
   * Runs every call concurrently. The returned map holds exactly one result
   * per submitted call, keyed by its (deduplicated) call id.
   */
  async executeMultiple(
    sessionId: string,
    calls: CallInfo[],
    options: ExecuteOptions = {}
  ): Promise<Map<string, ToolResult>> {
    const ids = assignCallIds(calls);
    const results = await Promise.all(
      calls.map(call => this.execute(call.toolName, sessionId, call.arguments, options))
    );

    const byId = new Map<string, ToolResult>();
    ids.forEach((id, index) => byId.set(id, results[index]));
    return byId;
  }

  private async checkAvailable(tool: Tool, signal?: AbortSignal): Promise<boolean> {
    try {
      return await tool.isAvailable(signal);
    } catch (error) {
      this.logger?.warn({ tool: tool.name(), err: error }, 'Tool availability check failed');
      return false;
    }
  }

  private runIsolated(
    tool: Tool,
    ctx: ExecutionContext,
    input: ToolInput,
    controller: AbortController,
    parent?: AbortSignal
  ): Promise<ToolOutput> {
    return new Promise<ToolOutput>(resolve => {
      // First settlement wins; a body that outlives its deadline is abandoned
      const timer = setTimeout(() => {
        controller.abort(new Error('execution timeout'));
        settle({
          success: false,
          error: `execution timeout after ${ctx.timeoutMs}ms`,
          errorCode: ToolErrorCode.TIMEOUT,
        });
      }, ctx.timeoutMs);

      const onParentAbort = () => {
        controller.abort(parent?.reason);
        settle({ success: false, error: 'execution cancelled', errorCode: ToolErrorCode.CANCELLED });
      };
      parent?.addEventListener('abort', onParentAbort, { once: true });

      const settle = (output: ToolOutput) => {
        clearTimeout(timer);
        parent?.removeEventListener('abort', onParentAbort);
        resolve(output);
      };

      let pending: Promise<ToolOutput | null | undefined>;
      try {
        pending = tool.execute(ctx, input);
      } catch (error) {
        pending = Promise.reject(error);
      }

      pending.then(
        output => {
          if (output === null || output === undefined) {
            settle({ success: false, error: 'tool returned nil result', errorCode: ToolErrorCode.NIL_RESULT });
            return;
          }
          if (!output.success && !output.errorCode) {
            settle({ ...output, errorCode: ToolErrorCode.EXECUTION_ERROR });
            return;
          }
          settle(output);
        },
        (error: unknown) => settle(this.toFailure(tool.name(), error))
      );
    });
  }

  private toFailure(toolName: string, error: unknown): ToolOutput {
    if (error instanceof ExecutionError) {
      return {
        success: false,
        error: error.message,
        errorCode: error.code || ToolErrorCode.EXECUTION_ERROR,
        metadata: error.cause === undefined ? undefined : { cause: describeError(error.cause) },
      };
    }

    this.logger?.error({ tool: toolName, err: error }, 'Tool execution panicked');
    return {
      success: false,
      error: 'tool execution panicked',
      errorCode: ToolErrorCode.PANIC,
      metadata: { panic: describeError(error) },
    };
  }
}
