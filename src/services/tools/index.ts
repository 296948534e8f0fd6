// Tool System Initialization
// Builds the registry of built-in tools on startup

import type { Env } from '../../env.js';
import type { MemoryRepository } from '../../storage/types.js';
import type { Logger } from '../../utils/logger.js';
import { createCalculatorTool } from './calculator-tool.js';
import { createHttpGetTool } from './http-get-tool.js';
import { createHttpPostTool } from './http-post-tool.js';
import { createJsonProcessorTool } from './json-processor-tool.js';
import { createMemoryTool } from './memory-tool.js';
import { ToolRegistry } from './registry.js';
import { createTextProcessorTool } from './text-processor-tool.js';
import { createWebScraperTool } from './web-scraper-tool.js';

export { ToolRegistry } from './registry.js';
export { ToolExecutor, assignCallIds } from './executor.js';
export { BaseTool, defineTool, successResult, errorResult } from './base-tool.js';
export { ToolErrorCode, ExecutionError, ValidationError, ToolRegistryError, RegistryErrorCode } from './errors.js';
export { toToolDefinition, toToolMessageContent, toWireResult } from './definitions.js';
export type { Tool, ToolSchema, ToolParameter, ToolResult, ToolOutput, CallInfo, ExecutionContext } from './types.js';

type ToolConfig = Pick<Env, 'TOOLS_ENABLED' | 'HTTP_TOOLS_ENABLED'>;

/** Storage the stateful tools need; a tool is skipped when its store is absent. */
export interface ToolServices {
  memories?: MemoryRepository;
}

export function registerBuiltinTools(
  registry: ToolRegistry,
  config: ToolConfig,
  logger: Logger,
  services: ToolServices = {}
): void {
  if (!config.TOOLS_ENABLED) {
    logger.info('Tools disabled (TOOLS_ENABLED=false)');
    return;
  }

  registry.register(createCalculatorTool());
  registry.register(createTextProcessorTool());
  registry.register(createJsonProcessorTool());

  if (services.memories) {
    registry.register(createMemoryTool(services.memories));
  }

  // Reaches the network, disabled by default
  if (config.HTTP_TOOLS_ENABLED) {
    registry.register(createHttpGetTool());
    registry.register(createHttpPostTool());
    registry.register(createWebScraperTool());
    logger.warn('HTTP tools registered: agents can reach the network');
  }
}

/**
 * Registry populated with the built-in tools and sealed against later writes.
 */
export function initializeTools(config: ToolConfig, logger: Logger, services: ToolServices = {}): ToolRegistry {
  const registry = new ToolRegistry();
  registerBuiltinTools(registry, config, logger, services);
  registry.seal();

  logger.info({ tools: registry.names() }, `Tool system initialized with ${registry.count()} tool(s)`);
  return registry;
}
