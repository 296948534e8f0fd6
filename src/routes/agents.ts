// Agent routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteOptions } from '../app.js';
import { requireAuth } from '../security/route-guards.js';
import { AppError } from '../utils/errors.js';

const CreateAgentSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().max(500).optional(),
  provider: z.string().min(1),
  model: z.string().min(1),
  systemPrompt: z.string().max(10000).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().min(1).max(100000).optional(),
  config: z.record(z.unknown()).optional(),
});

const UpdateAgentSchema = CreateAgentSchema.partial();

export const ContextStrategySchema = z.enum(['last_n', 'sliding_window', 'summarize']);

const CreateSessionSchema = z.object({
  title: z.string().max(200).optional(),
  contextStrategy: ContextStrategySchema.optional(),
  contextConfig: z.record(z.unknown()).optional(),
});

export async function agentRoutes(server: FastifyInstance, opts: RouteOptions) {
  const { repository, providers } = opts.deps;

  const assertKnownProvider = (provider: string | undefined) => {
    if (provider !== undefined && !providers.get(provider)) {
      throw AppError.badRequest(`Unknown provider: ${provider}`, { available: providers.list() });
    }
  };

  // GET /v1/agents - List agents
  server.get('/agents', async () => {
    const agents = await repository.agents.list();
    return { agents };
  });

  // POST /v1/agents - Create an agent
  server.post('/agents', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateAgentSchema.parse(request.body);
    assertKnownProvider(body.provider);

    const agent = await repository.agents.create(body);
    return reply.code(201).send({ agent });
  });

  // GET /v1/agents/:id - Get an agent
  server.get<{ Params: { id: string } }>('/agents/:id', async (request) => {
    const agent = await repository.agents.get(request.params.id);
    if (!agent) {
      throw AppError.notFound('Agent not found');
    }
    return { agent };
  });

  // PUT /v1/agents/:id - Update an agent
  server.put<{ Params: { id: string } }>('/agents/:id', { preHandler: requireAuth }, async (request) => {
    const body = UpdateAgentSchema.parse(request.body);
    assertKnownProvider(body.provider);

    const agent = await repository.agents.update(request.params.id, body);
    if (!agent) {
      throw AppError.notFound('Agent not found');
    }
    return { agent };
  });

  // DELETE /v1/agents/:id - Delete an agent and its sessions
  server.delete<{ Params: { id: string } }>('/agents/:id', { preHandler: requireAuth }, async (request) => {
    const deleted = await repository.agents.delete(request.params.id);
    if (!deleted) {
      throw AppError.notFound('Agent not found');
    }
    return { ok: true };
  });

  // POST /v1/agents/:id/sessions - Start a session with an agent
  server.post<{ Params: { id: string } }>(
    '/agents/:id/sessions',
    { preHandler: requireAuth },
    async (request, reply) => {
      const body = CreateSessionSchema.parse(request.body ?? {});

      const agent = await repository.agents.get(request.params.id);
      if (!agent) {
        throw AppError.notFound('Agent not found');
      }

      const session = await repository.sessions.create({ agentId: agent.id, ...body });
      return reply.code(201).send({ session });
    }
  );

  // GET /v1/agents/:id/sessions - List an agent's sessions
  server.get<{ Params: { id: string } }>('/agents/:id/sessions', async (request) => {
    const agent = await repository.agents.get(request.params.id);
    if (!agent) {
      throw AppError.notFound('Agent not found');
    }

    const sessions = await repository.sessions.listByAgent(agent.id);
    return { sessions };
  });
}
