// Tool routes: discovery and direct execution
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteOptions } from '../app.js';
import { requireAuth } from '../security/route-guards.js';
import { fromWireCall, toToolDefinition, toWireResult } from '../services/tools/definitions.js';
import type { WireToolResult } from '../services/tools/definitions.js';
import { assignCallIds } from '../services/tools/executor.js';
import { AppError } from '../utils/errors.js';

const ExecuteToolSchema = z.object({
  sessionId: z.string().min(1).default('direct'),
  agentId: z.string().min(1).optional(),
  arguments: z.record(z.unknown()).default({}),
  timeoutMs: z.number().int().min(1).max(300000).optional(),
});

const WireCallSchema = z.object({
  tool_name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
  call_id: z.string().min(1).optional(),
});

const ExecuteBatchSchema = z.object({
  sessionId: z.string().min(1).default('direct'),
  agentId: z.string().min(1).optional(),
  calls: z.array(WireCallSchema).min(1).max(20),
  timeoutMs: z.number().int().min(1).max(300000).optional(),
});

const SchemasQuerySchema = z.object({
  names: z.string().optional(),
  format: z.enum(['native', 'openai']).default('native'),
});

const StatsQuerySchema = z.object({
  tool_name: z.string().min(1).optional(),
  days: z.coerce.number().int().min(1).max(365).default(7),
});

const DAY_MS = 24 * 60 * 60 * 1000;

export async function toolRoutes(server: FastifyInstance, opts: RouteOptions) {
  const { tools, executor, repository } = opts.deps;

  // Calls made on behalf of an agent must name one that exists
  async function resolveAgentId(agentId: string | undefined): Promise<string | undefined> {
    if (agentId !== undefined && !(await repository.agents.get(agentId))) {
      throw AppError.notFound('Agent not found');
    }
    return agentId;
  }

  // GET /v1/tools - Registered tools with availability
  server.get('/tools', async (request) => {
    const list = await Promise.all(
      tools.list().map(async tool => {
        const schema = tool.schema();
        let available: boolean;
        try {
          available = await tool.isAvailable();
        } catch (err) {
          request.log.warn({ err, tool: schema.name }, 'Tool availability check failed');
          available = false;
        }
        return { name: schema.name, description: schema.description, available };
      })
    );
    return { tools: list, count: list.length };
  });

  // GET /v1/tools/schemas?names=a,b&format=openai - Schemas, optionally as function definitions
  server.get('/tools/schemas', async (request) => {
    const query = SchemasQuerySchema.parse(request.query);
    const names = query.names
      ?.split(',')
      .map(name => name.trim())
      .filter(Boolean);

    const schemas = tools.getSchemas(names);
    if (query.format === 'openai') {
      return { tools: schemas.map(toToolDefinition) };
    }
    return { schemas };
  });

  // GET /v1/tools/stats?tool_name=calculator&days=7 - Call counts from the execution log
  server.get('/tools/stats', async (request) => {
    const query = StatsQuerySchema.parse(request.query);
    if (query.tool_name !== undefined && !tools.has(query.tool_name)) {
      throw AppError.notFound(`Tool '${query.tool_name}' not found`);
    }

    const since = new Date(Date.now() - query.days * DAY_MS);
    const logged = await repository.toolExecutions.stats({ toolName: query.tool_name, since });
    const byName = new Map(logged.map(entry => [entry.toolName, entry]));

    // Every registered tool is listed, including ones never called
    const names = query.tool_name !== undefined ? [query.tool_name] : tools.names();
    const stats = names.map(
      name =>
        byName.get(name) ?? {
          toolName: name,
          totalCalls: 0,
          successfulCalls: 0,
          failedCalls: 0,
          avgDurationMs: 0,
          lastUsedAt: null,
        }
    );
    return { stats, days: query.days, since: since.toISOString() };
  });

  // GET /v1/tools/:name - One tool's schema
  server.get<{ Params: { name: string } }>('/tools/:name', async (request) => {
    const tool = tools.get(request.params.name);
    if (!tool) {
      throw AppError.notFound(`Tool '${request.params.name}' not found`);
    }
    return { schema: tool.schema(), available: await tool.isAvailable() };
  });

  // POST /v1/tools/:name/execute - Run a tool directly
  server.post<{ Params: { name: string } }>(
    '/tools/:name/execute',
    { preHandler: requireAuth },
    async (request) => {
      const body = ExecuteToolSchema.parse(request.body ?? {});
      if (!tools.has(request.params.name)) {
        throw AppError.notFound(`Tool '${request.params.name}' not found`);
      }

      const result = await executor.execute(request.params.name, body.sessionId, body.arguments, {
        agentId: await resolveAgentId(body.agentId),
        timeoutMs: body.timeoutMs,
        metadata: { source: 'api' },
      });
      return { result: toWireResult(result) };
    }
  );

  // POST /v1/tools/execute - Run a batch of calls concurrently
  server.post('/tools/execute', { preHandler: requireAuth }, async (request) => {
    const body = ExecuteBatchSchema.parse(request.body);
    const calls = body.calls.map(fromWireCall);

    const results = await executor.executeMultiple(body.sessionId, calls, {
      agentId: await resolveAgentId(body.agentId),
      timeoutMs: body.timeoutMs,
      metadata: { source: 'api' },
    });

    const ids = assignCallIds(calls);
    const wire: Record<string, WireToolResult> = {};
    for (const id of ids) {
      const result = results.get(id);
      if (result) {
        wire[id] = toWireResult(result);
      }
    }
    return { results: wire, count: ids.length };
  });
}
