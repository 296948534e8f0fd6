// HTTP server assembly
// Routes get their collaborators through plugin options so tests can build
// a server around an in-memory database and fake providers

import Fastify from 'fastify';
import type { FastifyInstance, FastifyPluginOptions, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env } from './env.js';
import type { ProviderRegistry } from './providers/index.js';
import { agentRoutes } from './routes/agents.js';
import { chatRoutes } from './routes/chat.js';
import { providerRoutes } from './routes/providers.js';
import { sessionRoutes } from './routes/sessions.js';
import { toolRoutes } from './routes/tools.js';
import type { StrategyRegistry } from './services/context/index.js';
import type { ConversationOrchestrator } from './services/orchestrator/index.js';
import type { ToolExecutor } from './services/tools/executor.js';
import type { ToolRegistry } from './services/tools/registry.js';
import type { Repository } from './storage/types.js';
import { AppError, ErrorCode, formatErrorResponse } from './utils/errors.js';

export const API_VERSION = '1.0.0';

export interface AppDeps {
  repository: Repository;
  providers: ProviderRegistry;
  tools: ToolRegistry;
  executor: ToolExecutor;
  strategies: StrategyRegistry;
  orchestrator: ConversationOrchestrator;
}

export interface RouteOptions extends FastifyPluginOptions {
  deps: AppDeps;
}

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: string[];
}

export async function buildServer(deps: AppDeps, options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({ logger: options.logger ?? false });

  await server.register(cors, {
    origin: options.corsOrigins ?? env.CORS_ORIGINS,
    credentials: true,
  });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    if (error instanceof ZodError) {
      return reply.code(400).send({
        error: ErrorCode.VALIDATION_ERROR,
        message: 'Invalid request body',
        statusCode: 400,
        details: error.errors,
      });
    }

    // Fastify's own 4xx (malformed JSON, unsupported media type, ...)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: ErrorCode.BAD_REQUEST,
        message: error.message,
        statusCode: error.statusCode,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send(formatErrorResponse(AppError.internal()));
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      providers: deps.providers.list(),
      tools: deps.tools.count(),
    };
  });

  server.get('/health', async (_request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  const routeOptions: RouteOptions = { prefix: '/v1', deps };
  await server.register(agentRoutes, routeOptions);
  await server.register(sessionRoutes, routeOptions);
  await server.register(chatRoutes, routeOptions);
  await server.register(toolRoutes, routeOptions);
  await server.register(providerRoutes, routeOptions);

  return server;
}
