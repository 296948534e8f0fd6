// SQLite repository (better-sqlite3 + drizzle)

import { randomUUID } from 'node:crypto';
import { and, asc, desc, eq, gt, gte, isNotNull, isNull, like, lte, or, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { createDatabase } from '../db/index.js';
import type { AppDatabase, DatabaseHandle } from '../db/index.js';
import { agents, memories, messages, sessions, toolExecutions } from '../db/schema.js';
import { DEFAULT_STRATEGY } from '../services/context/index.js';
import type {
  Agent,
  AgentInput,
  AgentRepository,
  AgentUpdate,
  ListMessagesOptions,
  Memory,
  MemoryInput,
  MemoryRepository,
  MemorySearch,
  MemoryStats,
  MemoryUpdate,
  Message,
  MessageInput,
  MessageRepository,
  Repository,
  Session,
  SessionInput,
  SessionRepository,
  SessionUpdate,
  ToolExecutionInput,
  ToolExecutionLog,
  ToolExecutionRepository,
  ToolUsageQuery,
  ToolUsageStats,
} from './types.js';

type ToolExecutionRow = typeof toolExecutions.$inferSelect;
type MessageRow = typeof messages.$inferInsert;
type ToolExecutionRowInput = typeof toolExecutions.$inferInsert;

function toToolExecutionLog(row: ToolExecutionRow): ToolExecutionLog {
  return {
    id: row.id,
    sessionId: row.sessionId,
    messageId: row.messageId,
    callId: row.callId,
    toolName: row.toolName,
    arguments: row.arguments,
    success: row.success,
    result: row.result ?? undefined,
    error: row.error ?? undefined,
    errorCode: row.errorCode ?? undefined,
    durationMs: row.durationMs,
    executedAt: row.executedAt,
  };
}

function toMessageRow(input: MessageInput): MessageRow {
  return {
    id: input.id ?? randomUUID(),
    sessionId: input.sessionId,
    role: input.role,
    content: input.content,
    metadata: input.metadata ?? {},
    createdAt: input.createdAt ?? new Date(),
  };
}

function toToolExecutionRow(input: ToolExecutionInput): ToolExecutionRowInput {
  return {
    id: input.id ?? randomUUID(),
    sessionId: input.sessionId,
    messageId: input.messageId,
    callId: input.callId,
    toolName: input.toolName,
    arguments: input.arguments,
    success: input.success,
    result: input.result ?? null,
    error: input.error ?? null,
    errorCode: input.errorCode ?? null,
    durationMs: Math.round(input.durationMs),
    executedAt: input.executedAt ?? new Date(),
  };
}

class SqliteAgentRepository implements AgentRepository {
  constructor(private db: AppDatabase) {}

  async create(input: AgentInput): Promise<Agent> {
    const now = new Date();
    const row: Agent = {
      id: randomUUID(),
      name: input.name,
      description: input.description ?? '',
      provider: input.provider,
      model: input.model,
      systemPrompt: input.systemPrompt ?? '',
      temperature: input.temperature ?? 0.7,
      maxTokens: input.maxTokens ?? 1000,
      config: input.config ?? {},
      createdAt: now,
      updatedAt: now,
    };
    this.db.insert(agents).values(row).run();
    return row;
  }

  async get(id: string): Promise<Agent | undefined> {
    return this.db.select().from(agents).where(eq(agents.id, id)).get();
  }

  async list(): Promise<Agent[]> {
    return this.db.select().from(agents).orderBy(desc(agents.updatedAt)).all();
  }

  async update(id: string, patch: AgentUpdate): Promise<Agent | undefined> {
    const existing = await this.get(id);
    if (!existing) return undefined;

    const updated: Agent = {
      ...existing,
      name: patch.name ?? existing.name,
      description: patch.description ?? existing.description,
      provider: patch.provider ?? existing.provider,
      model: patch.model ?? existing.model,
      systemPrompt: patch.systemPrompt ?? existing.systemPrompt,
      temperature: patch.temperature ?? existing.temperature,
      maxTokens: patch.maxTokens ?? existing.maxTokens,
      config: patch.config ?? existing.config,
      updatedAt: new Date(),
    };
    this.db
      .update(agents)
      .set({
        name: updated.name,
        description: updated.description,
        provider: updated.provider,
        model: updated.model,
        systemPrompt: updated.systemPrompt,
        temperature: updated.temperature,
        maxTokens: updated.maxTokens,
        config: updated.config,
        updatedAt: updated.updatedAt,
      })
      .where(eq(agents.id, id))
      .run();
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const result = this.db.delete(agents).where(eq(agents.id, id)).run();
    return result.changes > 0;
  }
}

class SqliteSessionRepository implements SessionRepository {
  constructor(private db: AppDatabase) {}

  async create(input: SessionInput): Promise<Session> {
    const now = new Date();
    const row: Session = {
      id: randomUUID(),
      agentId: input.agentId,
      title: input.title ?? '',
      contextStrategy: input.contextStrategy ?? DEFAULT_STRATEGY,
      contextConfig: input.contextConfig ?? {},
      createdAt: now,
      updatedAt: now,
    };
    this.db.insert(sessions).values(row).run();
    return row;
  }

  async get(id: string): Promise<Session | undefined> {
    return this.db.select().from(sessions).where(eq(sessions.id, id)).get();
  }

  async listByAgent(agentId: string): Promise<Session[]> {
    return this.db
      .select()
      .from(sessions)
      .where(eq(sessions.agentId, agentId))
      .orderBy(desc(sessions.updatedAt))
      .all();
  }

  async update(id: string, patch: SessionUpdate): Promise<Session | undefined> {
    const existing = await this.get(id);
    if (!existing) return undefined;

    const updated: Session = {
      ...existing,
      title: patch.title ?? existing.title,
      contextStrategy: patch.contextStrategy ?? existing.contextStrategy,
      contextConfig: patch.contextConfig ?? existing.contextConfig,
      updatedAt: new Date(),
    };
    this.db
      .update(sessions)
      .set({
        title: updated.title,
        contextStrategy: updated.contextStrategy,
        contextConfig: updated.contextConfig,
        updatedAt: updated.updatedAt,
      })
      .where(eq(sessions.id, id))
      .run();
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const result = this.db.delete(sessions).where(eq(sessions.id, id)).run();
    return result.changes > 0;
  }
}

class SqliteMessageRepository implements MessageRepository {
  constructor(private db: AppDatabase) {}

  async append(input: MessageInput): Promise<Message> {
    const [message] = await this.appendMany([input]);
    return message;
  }

  async appendMany(
    inputs: readonly MessageInput[],
    executions: readonly ToolExecutionInput[] = []
  ): Promise<Message[]> {
    const rows = inputs.map(toMessageRow);
    const logRows = executions.map(toToolExecutionRow);

    // better-sqlite3 transactions are synchronous; a throw rolls everything back
    return this.db.transaction((tx) => {
      const written: Message[] = [];
      for (const row of rows) {
        written.push(tx.insert(messages).values(row).returning().get());
      }
      for (const row of logRows) {
        tx.insert(toolExecutions).values(row).run();
      }

      const touched = new Set(rows.map(row => row.sessionId));
      const now = new Date();
      for (const sessionId of touched) {
        tx.update(sessions).set({ updatedAt: now }).where(eq(sessions.id, sessionId)).run();
      }
      return written;
    });
  }

  async listBySession(sessionId: string, options: ListMessagesOptions = {}): Promise<Message[]> {
    if (options.limit !== undefined) {
      const newest = this.db
        .select()
        .from(messages)
        .where(eq(messages.sessionId, sessionId))
        .orderBy(desc(messages.createdAt), sql`rowid desc`)
        .limit(Math.max(0, options.limit))
        .all();
      return newest.reverse();
    }

    return this.db
      .select()
      .from(messages)
      .where(eq(messages.sessionId, sessionId))
      .orderBy(asc(messages.createdAt), sql`rowid`)
      .all();
  }

  async deleteBySession(sessionId: string): Promise<number> {
    const result = this.db.delete(messages).where(eq(messages.sessionId, sessionId)).run();
    return result.changes;
  }
}

class SqliteToolExecutionRepository implements ToolExecutionRepository {
  constructor(private db: AppDatabase) {}

  async listBySession(sessionId: string, limit = 100): Promise<ToolExecutionLog[]> {
    const rows = this.db
      .select()
      .from(toolExecutions)
      .where(eq(toolExecutions.sessionId, sessionId))
      .orderBy(desc(toolExecutions.executedAt), sql`rowid desc`)
      .limit(limit)
      .all();
    return rows.map(toToolExecutionLog);
  }

  async stats(query: ToolUsageQuery = {}): Promise<ToolUsageStats[]> {
    const filters: SQL[] = [];
    if (query.toolName !== undefined) filters.push(eq(toolExecutions.toolName, query.toolName));
    if (query.since !== undefined) filters.push(gte(toolExecutions.executedAt, query.since));

    const rows = this.db
      .select({
        toolName: toolExecutions.toolName,
        totalCalls: sql<number>`count(*)`.mapWith(Number),
        successfulCalls: sql<number>`coalesce(sum(${toolExecutions.success}), 0)`.mapWith(Number),
        avgDurationMs: sql<number>`coalesce(avg(${toolExecutions.durationMs}), 0)`.mapWith(Number),
        lastUsedAt: sql<number | null>`max(${toolExecutions.executedAt})`,
      })
      .from(toolExecutions)
      .where(and(...filters))
      .groupBy(toolExecutions.toolName)
      .orderBy(asc(toolExecutions.toolName))
      .all();

    return rows.map(row => ({
      toolName: row.toolName,
      totalCalls: row.totalCalls,
      successfulCalls: row.successfulCalls,
      failedCalls: row.totalCalls - row.successfulCalls,
      avgDurationMs: Math.round(row.avgDurationMs * 100) / 100,
      lastUsedAt: row.lastUsedAt === null ? null : new Date(row.lastUsedAt),
    }));
  }
}

function notExpired(now: Date): SQL | undefined {
  return or(isNull(memories.expiresAt), gt(memories.expiresAt, now));
}

class SqliteMemoryRepository implements MemoryRepository {
  constructor(private db: AppDatabase) {}

  async create(input: MemoryInput): Promise<Memory> {
    const now = new Date();
    const row: Memory = {
      id: randomUUID(),
      agentId: input.agentId,
      sessionId: input.sessionId ?? null,
      topic: input.topic,
      content: input.content,
      memoryType: input.memoryType ?? 'fact',
      importance: input.importance ?? 5,
      tags: input.tags ?? [],
      metadata: input.metadata ?? {},
      createdAt: now,
      updatedAt: now,
      expiresAt: input.expiresAt ?? null,
    };
    this.db.insert(memories).values(row).run();
    return row;
  }

  async get(id: string): Promise<Memory | undefined> {
    return this.db
      .select()
      .from(memories)
      .where(and(eq(memories.id, id), notExpired(new Date())))
      .get();
  }

  async update(id: string, patch: MemoryUpdate): Promise<Memory | undefined> {
    const existing = await this.get(id);
    if (!existing) return undefined;

    const updated: Memory = {
      ...existing,
      content: patch.content ?? existing.content,
      importance: patch.importance ?? existing.importance,
      tags: patch.tags ?? existing.tags,
      metadata: patch.metadata ?? existing.metadata,
      updatedAt: new Date(),
    };
    this.db
      .update(memories)
      .set({
        content: updated.content,
        importance: updated.importance,
        tags: updated.tags,
        metadata: updated.metadata,
        updatedAt: updated.updatedAt,
      })
      .where(eq(memories.id, id))
      .run();
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const result = this.db.delete(memories).where(eq(memories.id, id)).run();
    return result.changes > 0;
  }

  async search(filter: MemorySearch): Promise<Memory[]> {
    const filters: (SQL | undefined)[] = [eq(memories.agentId, filter.agentId), notExpired(new Date())];
    if (filter.topic) filters.push(eq(memories.topic, filter.topic));
    if (filter.memoryType) filters.push(eq(memories.memoryType, filter.memoryType));
    if (filter.minImportance !== undefined) filters.push(gte(memories.importance, filter.minImportance));
    if (filter.query) {
      const pattern = `%${filter.query}%`;
      filters.push(or(like(memories.content, pattern), like(memories.topic, pattern)));
    }
    if (filter.tags && filter.tags.length > 0) {
      // Tags are stored as a JSON array, so match the quoted element
      filters.push(or(...filter.tags.map(tag => like(memories.tags, `%${JSON.stringify(tag)}%`))));
    }

    return this.db
      .select()
      .from(memories)
      .where(and(...filters))
      .orderBy(desc(memories.importance), desc(memories.createdAt), sql`rowid desc`)
      .limit(filter.limit ?? 10)
      .all();
  }

  async stats(agentId: string): Promise<MemoryStats> {
    const scope = and(eq(memories.agentId, agentId), notExpired(new Date()));

    const totals = this.db
      .select({
        total: sql<number>`count(*)`.mapWith(Number),
        averageImportance: sql<number>`coalesce(avg(${memories.importance}), 0)`.mapWith(Number),
        oldest: sql<number | null>`min(${memories.createdAt})`,
        newest: sql<number | null>`max(${memories.createdAt})`,
      })
      .from(memories)
      .where(scope)
      .get();

    const count = sql<number>`count(*)`.mapWith(Number);
    const byType = this.db
      .select({ memoryType: memories.memoryType, count })
      .from(memories)
      .where(scope)
      .groupBy(memories.memoryType)
      .all();
    const byTopic = this.db
      .select({ topic: memories.topic, count })
      .from(memories)
      .where(scope)
      .groupBy(memories.topic)
      .orderBy(sql`count(*) desc`, asc(memories.topic))
      .limit(10)
      .all();

    const oldest = totals?.oldest ?? null;
    const newest = totals?.newest ?? null;
    return {
      totalMemories: totals?.total ?? 0,
      memoriesByType: Object.fromEntries(byType.map(row => [row.memoryType, row.count])),
      memoriesByTopic: Object.fromEntries(byTopic.map(row => [row.topic, row.count])),
      averageImportance: Math.round((totals?.averageImportance ?? 0) * 100) / 100,
      oldestMemory: oldest === null ? null : new Date(oldest),
      newestMemory: newest === null ? null : new Date(newest),
    };
  }

  async deleteExpired(now: Date = new Date()): Promise<number> {
    const result = this.db
      .delete(memories)
      .where(and(isNotNull(memories.expiresAt), lte(memories.expiresAt, now)))
      .run();
    return result.changes;
  }
}

export class SqliteRepository implements Repository {
  readonly agents: AgentRepository;
  readonly sessions: SessionRepository;
  readonly messages: MessageRepository;
  readonly toolExecutions: ToolExecutionRepository;
  readonly memories: MemoryRepository;

  constructor(private handle: DatabaseHandle) {
    this.agents = new SqliteAgentRepository(handle.db);
    this.sessions = new SqliteSessionRepository(handle.db);
    this.messages = new SqliteMessageRepository(handle.db);
    this.toolExecutions = new SqliteToolExecutionRepository(handle.db);
    this.memories = new SqliteMemoryRepository(handle.db);
  }

  close(): void {
    this.handle.sqlite.close();
  }
}

export function openRepository(dbPath: string): SqliteRepository {
  return new SqliteRepository(createDatabase(dbPath));
}
