import { integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// --- Agents ---
export const agents = sqliteTable('agents', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  description: text('description').notNull().default(''),
  provider: text('provider').notNull(),
  model: text('model').notNull(),
  systemPrompt: text('system_prompt').notNull().default(''),
  temperature: real('temperature').notNull().default(0.7),
  maxTokens: integer('max_tokens').notNull().default(1000),
  config: text('config', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

// --- Sessions ---
export const sessions = sqliteTable('sessions', {
  id: text('id').primaryKey(),
  agentId: text('agent_id')
    .notNull()
    .references(() => agents.id, { onDelete: 'cascade' }),
  title: text('title').notNull().default(''),
  contextStrategy: text('context_strategy').notNull().default('last_n'),
  contextConfig: text('context_config', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

// --- Messages ---
export const messages = sqliteTable('messages', {
  id: text('id').primaryKey(),
  sessionId: text('session_id')
    .notNull()
    .references(() => sessions.id, { onDelete: 'cascade' }),
  role: text('role', { enum: ['system', 'user', 'assistant', 'tool'] }).notNull(),
  content: text('content').notNull(),
  metadata: text('metadata', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

// --- Tool execution log ---
export const toolExecutions = sqliteTable('tool_executions', {
  id: text('id').primaryKey(),
  sessionId: text('session_id')
    .notNull()
    .references(() => sessions.id, { onDelete: 'cascade' }),
  messageId: text('message_id'),
  callId: text('call_id').notNull(),
  toolName: text('tool_name').notNull(),
  arguments: text('arguments', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
  success: integer('success', { mode: 'boolean' }).notNull(),
  result: text('result', { mode: 'json' }).$type<unknown>(),
  error: text('error'),
  errorCode: text('error_code'),
  durationMs: integer('duration_ms').notNull(),
  executedAt: integer('executed_at', { mode: 'timestamp_ms' }).notNull(),
});

// --- Agent memories ---
export const memories = sqliteTable('memories', {
  id: text('id').primaryKey(),
  agentId: text('agent_id')
    .notNull()
    .references(() => agents.id, { onDelete: 'cascade' }),
  // Memories outlive their session, so this is not a foreign key
  sessionId: text('session_id'),
  topic: text('topic').notNull(),
  content: text('content').notNull(),
  memoryType: text('memory_type', { enum: ['preference', 'fact', 'conversation', 'behavior'] }).notNull(),
  importance: integer('importance').notNull().default(5),
  tags: text('tags', { mode: 'json' }).$type<string[]>().notNull(),
  metadata: text('metadata', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  expiresAt: integer('expires_at', { mode: 'timestamp_ms' }),
});
