// Session and message routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteOptions } from '../app.js';
import { requireAuth } from '../security/route-guards.js';
import { AppError } from '../utils/errors.js';
import { ContextStrategySchema } from './agents.js';

const UpdateSessionSchema = z.object({
  title: z.string().max(200).optional(),
  contextStrategy: ContextStrategySchema.optional(),
  contextConfig: z.record(z.unknown()).optional(),
});

// Client-facing schema: only user and assistant messages; tool and system
// messages are written by the orchestrator
const CreateMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string().min(1),
  metadata: z.record(z.unknown()).optional(),
});

const ListMessagesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export async function sessionRoutes(server: FastifyInstance, opts: RouteOptions) {
  const { repository } = opts.deps;

  const loadSession = async (id: string) => {
    const session = await repository.sessions.get(id);
    if (!session) {
      throw AppError.notFound('Session not found');
    }
    return session;
  };

  // GET /v1/sessions/:id - Get a session
  server.get<{ Params: { id: string } }>('/sessions/:id', async (request) => {
    const session = await loadSession(request.params.id);
    return { session };
  });

  // PUT /v1/sessions/:id - Update title or context settings
  server.put<{ Params: { id: string } }>('/sessions/:id', { preHandler: requireAuth }, async (request) => {
    const body = UpdateSessionSchema.parse(request.body);

    const session = await repository.sessions.update(request.params.id, body);
    if (!session) {
      throw AppError.notFound('Session not found');
    }
    return { session };
  });

  // DELETE /v1/sessions/:id - Delete a session and its messages
  server.delete<{ Params: { id: string } }>('/sessions/:id', { preHandler: requireAuth }, async (request) => {
    const deleted = await repository.sessions.delete(request.params.id);
    if (!deleted) {
      throw AppError.notFound('Session not found');
    }
    return { ok: true };
  });

  // GET /v1/sessions/:id/messages - List messages, oldest first
  server.get<{ Params: { id: string } }>('/sessions/:id/messages', async (request) => {
    const { limit } = ListMessagesQuerySchema.parse(request.query);
    const session = await loadSession(request.params.id);

    const messages = await repository.messages.listBySession(session.id, { limit });
    return { messages };
  });

  // POST /v1/sessions/:id/messages - Append a message without running the agent
  server.post<{ Params: { id: string } }>(
    '/sessions/:id/messages',
    { preHandler: requireAuth },
    async (request, reply) => {
      const body = CreateMessageSchema.parse(request.body);
      const session = await loadSession(request.params.id);

      const message = await repository.messages.append({ sessionId: session.id, ...body });
      return reply.code(201).send({ message });
    }
  );

  // DELETE /v1/sessions/:id/messages - Clear the conversation history
  server.delete<{ Params: { id: string } }>(
    '/sessions/:id/messages',
    { preHandler: requireAuth },
    async (request) => {
      const session = await loadSession(request.params.id);
      const deleted = await repository.messages.deleteBySession(session.id);
      return { ok: true, deleted };
    }
  );
}
