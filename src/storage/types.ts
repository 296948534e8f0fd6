// Persistence port
// The orchestrator and routes only see these interfaces; SQLite lives behind them

import type { MessageRole } from '../services/context/types.js';

export interface Agent {
  id: string;
  name: string;
  description: string;
  provider: string;
  model: string;
  systemPrompt: string;
  temperature: number;
  maxTokens: number;
  config: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export interface AgentInput {
  name: string;
  description?: string;
  provider: string;
  model: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  config?: Record<string, unknown>;
}

export type AgentUpdate = Partial<AgentInput>;

export interface Session {
  id: string;
  agentId: string;
  title: string;
  contextStrategy: string;
  contextConfig: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export interface SessionInput {
  agentId: string;
  title?: string;
  contextStrategy?: string;
  contextConfig?: Record<string, unknown>;
}

export type SessionUpdate = Partial<Omit<SessionInput, 'agentId'>>;

export interface Message {
  id: string;
  sessionId: string;
  role: MessageRole;
  content: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

/** A message not yet written. `id` and `createdAt` are filled in when omitted. */
export interface MessageInput {
  id?: string;
  sessionId: string;
  role: MessageRole;
  content: string;
  metadata?: Record<string, unknown>;
  createdAt?: Date;
}

export interface ToolExecutionLog {
  id: string;
  sessionId: string;
  messageId: string | null;
  callId: string;
  toolName: string;
  arguments: Record<string, unknown>;
  success: boolean;
  result?: unknown;
  error?: string;
  errorCode?: string;
  durationMs: number;
  executedAt: Date;
}

export type ToolExecutionInput = Omit<ToolExecutionLog, 'id' | 'executedAt'> & {
  id?: string;
  executedAt?: Date;
};

export type MemoryType = 'preference' | 'fact' | 'conversation' | 'behavior';

export interface Memory {
  id: string;
  agentId: string;
  sessionId: string | null;
  topic: string;
  content: string;
  memoryType: MemoryType;
  importance: number;
  tags: string[];
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date | null;
}

export interface MemoryInput {
  agentId: string;
  sessionId?: string | null;
  topic: string;
  content: string;
  memoryType?: MemoryType;
  importance?: number;
  tags?: string[];
  metadata?: Record<string, unknown>;
  expiresAt?: Date | null;
}

export type MemoryUpdate = Partial<Pick<Memory, 'content' | 'importance' | 'tags' | 'metadata'>>;

/** Filters for a memory lookup. Expired memories are never returned. */
export interface MemorySearch {
  agentId: string;
  topic?: string;
  memoryType?: MemoryType;
  minImportance?: number;
  /** Substring of the content or the topic. */
  query?: string;
  /** Matches memories carrying any of these tags. */
  tags?: string[];
  limit?: number;
}

export interface MemoryStats {
  totalMemories: number;
  memoriesByType: Record<string, number>;
  /** The ten most used topics. */
  memoriesByTopic: Record<string, number>;
  averageImportance: number;
  oldestMemory: Date | null;
  newestMemory: Date | null;
}

export interface ToolUsageStats {
  toolName: string;
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  avgDurationMs: number;
  lastUsedAt: Date | null;
}

export interface ToolUsageQuery {
  toolName?: string;
  since?: Date;
}

export interface AgentRepository {
  create(input: AgentInput): Promise<Agent>;
  get(id: string): Promise<Agent | undefined>;
  list(): Promise<Agent[]>;
  update(id: string, patch: AgentUpdate): Promise<Agent | undefined>;
  delete(id: string): Promise<boolean>;
}

export interface SessionRepository {
  create(input: SessionInput): Promise<Session>;
  get(id: string): Promise<Session | undefined>;
  listByAgent(agentId: string): Promise<Session[]>;
  update(id: string, patch: SessionUpdate): Promise<Session | undefined>;
  delete(id: string): Promise<boolean>;
}

export interface ListMessagesOptions {
  /** Keep only the newest `limit` messages (still returned oldest first). */
  limit?: number;
}

export interface MessageRepository {
  append(input: MessageInput): Promise<Message>;
  /**
   * Writes every message, plus any tool execution log entries, in one transaction.
   * Either all rows land or none do.
   */
  appendMany(inputs: readonly MessageInput[], toolExecutions?: readonly ToolExecutionInput[]): Promise<Message[]>;
  listBySession(sessionId: string, options?: ListMessagesOptions): Promise<Message[]>;
  deleteBySession(sessionId: string): Promise<number>;
}

export interface ToolExecutionRepository {
  listBySession(sessionId: string, limit?: number): Promise<ToolExecutionLog[]>;
  /** Per-tool call counts, one entry per tool that has logged calls. */
  stats(query?: ToolUsageQuery): Promise<ToolUsageStats[]>;
}

export interface MemoryRepository {
  create(input: MemoryInput): Promise<Memory>;
  /** Expired memories read as absent. */
  get(id: string): Promise<Memory | undefined>;
  update(id: string, patch: MemoryUpdate): Promise<Memory | undefined>;
  delete(id: string): Promise<boolean>;
  search(filter: MemorySearch): Promise<Memory[]>;
  stats(agentId: string): Promise<MemoryStats>;
  deleteExpired(now?: Date): Promise<number>;
}

export interface Repository {
  agents: AgentRepository;
  sessions: SessionRepository;
  messages: MessageRepository;
  toolExecutions: ToolExecutionRepository;
  memories: MemoryRepository;
  close(): void;
}
