// Agent server entry point

// Load environment variables from .env file
import 'dotenv/config';

import { buildServer } from './app.js';
import { env, logConfiguration } from './env.js';
import { createProviderRegistry } from './providers/index.js';
import { StrategyRegistry } from './services/context/index.js';
import { ConversationOrchestrator } from './services/orchestrator/index.js';
import { ToolExecutor, initializeTools } from './services/tools/index.js';
import { openRepository } from './storage/sqlite-repository.js';
import { logger } from './utils/logger.js';

const repository = openRepository(env.DATABASE_PATH);
const providers = createProviderRegistry(env);
const tools = initializeTools(env, logger, { memories: repository.memories });

const purged = await repository.memories.deleteExpired();
if (purged > 0) {
  logger.info({ purged }, 'Removed expired memories');
}

const executor = new ToolExecutor(tools, { timeoutMs: env.TOOL_TIMEOUT_MS, logger });
const strategies = new StrategyRegistry();
const orchestrator = new ConversationOrchestrator(
  { repository, providers, tools, executor, strategies, logger },
  { maxIterations: env.ORCHESTRATOR_MAX_ITERATIONS }
);

const server = await buildServer(
  { repository, providers, tools, executor, strategies, orchestrator },
  { logger }
);

const shutdown = async (signal: string) => {
  server.log.info(`Received ${signal}, shutting down`);
  try {
    await server.close();
  } finally {
    providers.destroy();
    repository.close();
  }
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch(err => {
      server.log.error(err);
      process.exit(1);
    });
  });
}

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  console.log(`Agent server listening on http://${env.HOST}:${env.PORT}`);
  console.log(`Health: http://${env.HOST}:${env.PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
