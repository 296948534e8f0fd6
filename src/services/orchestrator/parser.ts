// Tool call parser
// Structured tool calls come from provider metadata. Scanning the text content
// is a degraded fallback for models that write the call out as JSON.

import { z } from 'zod';
import type { ProviderResponse, ToolCall } from '../../providers/types.js';
import { assignCallIds } from '../tools/executor.js';
import { isPlainObject } from '../tools/validation.js';
import type { ToolInput } from '../tools/types.js';
import type { ParsedToolCall, ParsedToolCalls } from './types.js';

// Ollama sends arguments as an object, OpenAI as a JSON string
const rawToolCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({
    name: z.string().min(1),
    arguments: z.union([z.string(), z.record(z.unknown())]).optional(),
  }),
});

// {"tool": "...", "args": {...}} or {"name": "...", "arguments": {...}}
const contentToolCallSchema = z.union([
  z.object({ tool: z.string().min(1), args: z.record(z.unknown()).optional() }),
  z.object({ name: z.string().min(1), arguments: z.union([z.string(), z.record(z.unknown())]).optional() }),
]);

interface DecodedArguments {
  value: ToolInput;
  raw: string;
  error?: string;
}

function decodeArguments(args: string | Record<string, unknown> | undefined): DecodedArguments {
  if (args === undefined) {
    return { value: {}, raw: '{}' };
  }
  if (typeof args !== 'string') {
    return { value: args, raw: JSON.stringify(args) };
  }
  if (args.trim() === '') {
    return { value: {}, raw: args };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(args);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { value: {}, raw: args, error: `invalid tool call arguments: ${reason}` };
  }
  if (!isPlainObject(parsed)) {
    return { value: {}, raw: args, error: 'invalid tool call arguments: expected a JSON object' };
  }
  return { value: parsed, raw: args };
}

function withIds(calls: Array<Omit<ParsedToolCall, 'id'> & { id?: string }>): ParsedToolCall[] {
  const ids = assignCallIds(calls.map(call => ({ toolName: call.name, arguments: call.arguments, callId: call.id })));
  return calls.map((call, index) => ({ ...call, id: ids[index] }));
}

/**
 * Reads a `tool_calls` list as providers put it in response metadata (and as
 * it is stored on assistant messages). Entries that aren't tool calls are skipped.
 */
export function parseRawToolCalls(raw: unknown): ParsedToolCall[] {
  if (!Array.isArray(raw)) return [];

  const calls: Array<Omit<ParsedToolCall, 'id'> & { id?: string }> = [];
  for (const item of raw) {
    const parsed = rawToolCallSchema.safeParse(item);
    if (!parsed.success) continue;

    const decoded = decodeArguments(parsed.data.function.arguments);
    calls.push({
      id: parsed.data.id || undefined,
      name: parsed.data.function.name,
      arguments: decoded.value,
      rawArguments: decoded.raw,
      error: decoded.error,
    });
  }
  return withIds(calls);
}

function candidateJson(content: string): string[] {
  const candidates: string[] = [];
  const trimmed = content.trim();
  if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
    candidates.push(trimmed);
  }

  const fence = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/g;
  let match: RegExpExecArray | null;
  while ((match = fence.exec(content)) !== null) {
    candidates.push(match[1]);
  }
  return candidates;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Best-effort scan of the text content. Only names in `knownTools` count,
 * so an answer that merely contains JSON is left alone.
 */
export function parseContentToolCalls(content: string, knownTools: ReadonlySet<string>): ParsedToolCall[] {
  const calls: Array<Omit<ParsedToolCall, 'id'> & { id?: string }> = [];

  for (const candidate of candidateJson(content)) {
    const value = parseJson(candidate);
    if (!isPlainObject(value)) continue;

    if (Array.isArray(value.tool_calls)) {
      calls.push(...parseRawToolCalls(value.tool_calls).filter(call => knownTools.has(call.name)));
      continue;
    }

    const parsed = contentToolCallSchema.safeParse(value);
    if (!parsed.success) continue;

    const name = 'tool' in parsed.data ? parsed.data.tool : parsed.data.name;
    if (!knownTools.has(name)) continue;

    const decoded = decodeArguments('tool' in parsed.data ? parsed.data.args : parsed.data.arguments);
    calls.push({ name, arguments: decoded.value, rawArguments: decoded.raw, error: decoded.error });
  }

  return withIds(calls);
}

export function parseToolCalls(
  response: ProviderResponse,
  knownTools: ReadonlySet<string> = new Set()
): ParsedToolCalls {
  const structured = parseRawToolCalls(response.metadata.tool_calls);
  if (structured.length > 0) {
    return { calls: structured, source: 'metadata' };
  }

  const scanned = parseContentToolCalls(response.content, knownTools);
  if (scanned.length > 0) {
    return { calls: scanned, source: 'content' };
  }

  return { calls: [] };
}

/**
 * Canonical form sent back to providers on assistant messages.
 */
export function toProviderToolCalls(calls: readonly ParsedToolCall[]): ToolCall[] {
  return calls.map(call => ({ id: call.id, name: call.name, arguments: call.rawArguments }));
}

/**
 * Raw list stored on the assistant message when the calls were found in the content.
 */
export function toRawToolCalls(calls: readonly ParsedToolCall[]): Array<Record<string, unknown>> {
  return calls.map(call => ({ id: call.id, function: { name: call.name, arguments: call.rawArguments } }));
}
