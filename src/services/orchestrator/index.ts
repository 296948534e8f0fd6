// Orchestrator Module - Main exports

export { ConversationOrchestrator, DEFAULT_MAX_ITERATIONS, TurnState, toProviderMessages } from './orchestrator.js';
export type { OrchestratorDeps } from './orchestrator.js';
export { parseToolCalls, parseRawToolCalls, parseContentToolCalls } from './parser.js';
export { buildSystemPrompt, TOOL_ENABLED_PROMPT } from './prompt-builder.js';
export { suggestTools } from './tool-suggestions.js';
export type { ToolSuggestion } from './tool-suggestions.js';
export type {
  OrchestratorOptions,
  ParsedToolCall,
  StreamEvent,
  ToolCallSummary,
  TurnRequest,
  TurnResult,
} from './types.js';
