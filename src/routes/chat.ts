// Chat routes: run an agent turn, stream one, inspect tool calls
import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { RouteOptions } from '../app.js';
import { env } from '../env.js';
import { rateLimit, requireAuth } from '../security/route-guards.js';
import type { StreamEvent } from '../services/orchestrator/index.js';
import { AppError, ErrorCode } from '../utils/errors.js';

const ChatSchema = z.object({
  message: z.string().min(1),
  metadata: z.record(z.unknown()).optional(),
  tools: z.array(z.string().min(1)).optional(),
  toolChoice: z.enum(['auto', 'none']).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().min(1).max(100000).optional(),
});

const ToolCallsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

// Aborts the turn when the client goes away before the response is written
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableEnded) {
      controller.abort(new Error('client disconnected'));
    }
  });
  return controller;
}

export async function chatRoutes(server: FastifyInstance, opts: RouteOptions) {
  const { orchestrator, repository } = opts.deps;
  const chatGuards = [
    requireAuth,
    rateLimit({ routeKey: 'chat', maxRequests: () => env.RATE_LIMIT_CHAT_PER_WINDOW }),
  ];

  // POST /v1/sessions/:id/chat - Run one turn, tools included
  server.post<{ Params: { id: string } }>(
    '/sessions/:id/chat',
    { preHandler: chatGuards },
    async (request, reply) => {
      const body = ChatSchema.parse(request.body);
      const controller = abortOnDisconnect(reply);

      return orchestrator.runTurn({ sessionId: request.params.id, ...body, signal: controller.signal });
    }
  );

  // POST /v1/sessions/:id/stream - Tool-less turn over server-sent events
  server.post<{ Params: { id: string } }>(
    '/sessions/:id/stream',
    { preHandler: chatGuards },
    async (request, reply) => {
      const body = ChatSchema.parse(request.body);
      const controller = abortOnDisconnect(reply);

      const events = orchestrator.streamTurn({ sessionId: request.params.id, ...body, signal: controller.signal });

      // Lookup failures surface before any byte is sent, as regular JSON errors
      let next = await events.next();

      reply.hijack();
      reply.raw.setHeader('Content-Type', 'text/event-stream');
      reply.raw.setHeader('Cache-Control', 'no-cache');
      reply.raw.setHeader('Connection', 'keep-alive');

      const sendEvent = (event: StreamEvent | { type: 'error'; error: string; message: string }) => {
        const { type, ...data } = event;
        reply.raw.write(`event: ${type}\n`);
        reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
      };

      try {
        while (!next.done) {
          sendEvent(next.value);
          next = await events.next();
        }
      } catch (err) {
        const error = err instanceof AppError ? err : AppError.internal();
        if (error.code === ErrorCode.INTERNAL_ERROR) {
          request.log.error({ err }, 'Stream failed');
        }
        sendEvent({ type: 'error', error: error.code, message: error.message });
      }
      reply.raw.end();
    }
  );

  // GET /v1/sessions/:id/tool-calls - Recent tool executions, newest first
  server.get<{ Params: { id: string } }>('/sessions/:id/tool-calls', async (request) => {
    const { limit } = ToolCallsQuerySchema.parse(request.query);

    const session = await repository.sessions.get(request.params.id);
    if (!session) {
      throw AppError.notFound('Session not found');
    }

    const toolCalls = await repository.toolExecutions.listBySession(session.id, limit);
    return { toolCalls };
  });
}
