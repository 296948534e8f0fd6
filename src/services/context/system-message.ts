import type { ContextMessage, StrategyConfig } from './types.js';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful AI assistant.';

export function buildSystemMessage(systemPrompt: string, agentPrompt: string): ContextMessage {
  let content: string;
  if (systemPrompt && agentPrompt) {
    content = `${systemPrompt}\n\n${agentPrompt}`;
  } else {
    content = systemPrompt || agentPrompt || DEFAULT_SYSTEM_PROMPT;
  }
  return { role: 'system', content };
}

// Numbers are truncated toward zero; anything else falls back to the default
export function readIntConfig(config: StrategyConfig | undefined, key: string, fallback: number): number {
  const value = config?.[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  return fallback;
}
