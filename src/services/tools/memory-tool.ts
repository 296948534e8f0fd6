// Memory Tool
// Lets an agent keep facts and preferences across sessions. Memories are
// scoped to the calling agent; other agents' memories cannot be changed.

import type { Memory, MemoryRepository, MemoryType } from '../../storage/types.js';
import { defineTool, errorResult, successResult } from './base-tool.js';
import type { ToolInput, ToolOutput } from './types.js';

const MEMORY_ACTIONS = ['store', 'recall', 'search', 'update', 'delete', 'stats'] as const;
type MemoryAction = (typeof MEMORY_ACTIONS)[number];

const MEMORY_TYPES: readonly MemoryType[] = ['preference', 'fact', 'conversation', 'behavior'];

const DEFAULT_IMPORTANCE = 5;
const DEFAULT_LIMIT = 10;
const DAY_MS = 24 * 60 * 60 * 1000;

function isMemoryAction(value: unknown): value is MemoryAction {
  return typeof value === 'string' && MEMORY_ACTIONS.some(action => action === value);
}

function isMemoryType(value: unknown): value is MemoryType {
  return typeof value === 'string' && MEMORY_TYPES.some(type => type === value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function readTags(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((tag): tag is string => typeof tag === 'string').map(tag => tag.trim()).filter(Boolean);
}

function readNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? Math.floor(value) : undefined;
}

function toView(memory: Memory) {
  return {
    id: memory.id,
    topic: memory.topic,
    content: memory.content,
    memory_type: memory.memoryType,
    importance: memory.importance,
    tags: memory.tags,
    created_at: memory.createdAt.toISOString(),
    updated_at: memory.updatedAt.toISOString(),
  };
}

type ActionHandler = (agentId: string, sessionId: string, args: ToolInput) => Promise<ToolOutput>;

export function createMemoryTool(memories: MemoryRepository) {
  async function owned(agentId: string, args: ToolInput, verb: string): Promise<Memory | ToolOutput> {
    const memoryId = nonEmptyString(args.memory_id);
    if (!memoryId) {
      return errorResult('MISSING_MEMORY_ID', `memory_id is required for ${verb} action`);
    }
    const memory = await memories.get(memoryId);
    if (!memory) {
      return errorResult('MEMORY_NOT_FOUND', 'Memory not found', { memory_id: memoryId });
    }
    if (memory.agentId !== agentId) {
      return errorResult('ACCESS_DENIED', `Cannot ${verb} memory belonging to another agent`);
    }
    return memory;
  }

  const handlers: Record<MemoryAction, ActionHandler> = {
    store: async (agentId, sessionId, args) => {
      const topic = nonEmptyString(args.topic);
      if (!topic) return errorResult('MISSING_TOPIC', 'topic is required for store action');
      const content = nonEmptyString(args.content);
      if (!content) return errorResult('MISSING_CONTENT', 'content is required for store action');

      const days = readNumber(args.expires_in_days);
      const memory = await memories.create({
        agentId,
        sessionId,
        topic,
        content,
        memoryType: isMemoryType(args.memory_type) ? args.memory_type : 'fact',
        importance: readNumber(args.importance) ?? DEFAULT_IMPORTANCE,
        tags: readTags(args.tags),
        expiresAt: days === undefined ? null : new Date(Date.now() + days * DAY_MS),
      });

      return successResult({
        memory_id: memory.id,
        message: 'Memory stored successfully',
        topic: memory.topic,
        importance: memory.importance,
      });
    },

    recall: async (agentId, _sessionId, args) => {
      const topic = nonEmptyString(args.topic);
      if (!topic) return errorResult('MISSING_TOPIC', 'topic is required for recall action');

      const found = await memories.search({ agentId, topic, limit: readNumber(args.limit) ?? DEFAULT_LIMIT });
      return successResult({ memories: found.map(toView), count: found.length, topic });
    },

    search: async (agentId, _sessionId, args) => {
      const query = nonEmptyString(args.query);
      const found = await memories.search({
        agentId,
        query,
        topic: nonEmptyString(args.topic),
        memoryType: isMemoryType(args.memory_type) ? args.memory_type : undefined,
        minImportance: readNumber(args.importance),
        tags: readTags(args.tags),
        limit: readNumber(args.limit) ?? DEFAULT_LIMIT,
      });
      return successResult({ memories: found.map(toView), count: found.length, query: query ?? '' });
    },

    update: async (agentId, _sessionId, args) => {
      const memory = await owned(agentId, args, 'update');
      if (!('agentId' in memory)) return memory;

      await memories.update(memory.id, {
        content: nonEmptyString(args.content),
        importance: readNumber(args.importance),
        tags: readTags(args.tags),
      });
      return successResult({ memory_id: memory.id, message: 'Memory updated successfully' });
    },

    delete: async (agentId, _sessionId, args) => {
      const memory = await owned(agentId, args, 'delete');
      if (!('agentId' in memory)) return memory;

      await memories.delete(memory.id);
      return successResult({ memory_id: memory.id, message: 'Memory deleted successfully' });
    },

    stats: async agentId => {
      const stats = await memories.stats(agentId);
      return successResult({
        total_memories: stats.totalMemories,
        memories_by_type: stats.memoriesByType,
        memories_by_topic: stats.memoriesByTopic,
        average_importance: stats.averageImportance,
        oldest_memory: stats.oldestMemory?.toISOString() ?? null,
        newest_memory: stats.newestMemory?.toISOString() ?? null,
      });
    },
  };

  return defineTool({
    name: 'memory',
    description: 'Stores and recalls long-term memories about the user, facts and preferences across sessions',
    parameters: [
      {
        name: 'action',
        type: 'string',
        description: 'Memory action to perform',
        required: true,
        enum: [...MEMORY_ACTIONS],
      },
      {
        name: 'topic',
        type: 'string',
        description: 'Topic or category of the memory (required for store and recall)',
        required: false,
      },
      {
        name: 'content',
        type: 'string',
        description: 'Content to remember (required for store)',
        required: false,
      },
      {
        name: 'memory_type',
        type: 'string',
        description: 'Kind of memory (default: fact)',
        required: false,
        enum: [...MEMORY_TYPES],
      },
      {
        name: 'importance',
        type: 'number',
        description: `Importance from 1 to 10 (default: ${DEFAULT_IMPORTANCE}); the minimum importance when searching`,
        required: false,
        minimum: 1,
        maximum: 10,
      },
      {
        name: 'tags',
        type: 'array',
        description: 'Tags for categorizing the memory',
        required: false,
      },
      {
        name: 'query',
        type: 'string',
        description: 'Text to look for in memory content or topics (search)',
        required: false,
      },
      {
        name: 'memory_id',
        type: 'string',
        description: 'ID of the memory to update or delete',
        required: false,
      },
      {
        name: 'limit',
        type: 'number',
        description: `Maximum number of memories to return (default: ${DEFAULT_LIMIT})`,
        required: false,
        minimum: 1,
        maximum: 100,
      },
      {
        name: 'expires_in_days',
        type: 'number',
        description: 'Forget the memory after this many days',
        required: false,
        minimum: 1,
      },
    ],
    usage:
      'Use memory to store user preferences and facts worth keeping, and recall them by topic before answering questions about the user.',
    examples: [
      {
        description: 'Remember a preference',
        input: { action: 'store', topic: 'user_preferences', content: 'Prefers metric units', memory_type: 'preference' },
      },
      {
        description: 'Recall memories on a topic',
        input: { action: 'recall', topic: 'user_preferences' },
      },
    ],
    execute: async (ctx, args) => {
      if (!ctx.agentId) {
        return errorResult('MISSING_AGENT', 'memory requires an agent context');
      }
      const action = args.action;
      if (!isMemoryAction(action)) {
        return errorResult('UNKNOWN_ACTION', `Unknown action: ${String(action)}`);
      }

      try {
        return await handlers[action](ctx.agentId, ctx.sessionId, args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return errorResult(`${action.toUpperCase()}_FAILED`, `Failed to ${action} memory: ${message}`);
      }
    },
  });
}
