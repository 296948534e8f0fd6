// Summarize strategy: older messages collapse into one synthetic system
// message, the most recent `keep_recent` are sent verbatim

import { buildSystemMessage, readIntConfig } from './system-message.js';
import { ContextStrategyError } from './types.js';
import type { ContextMessage, ContextStrategy, StrategyConfig } from './types.js';

const TOPIC_WORDS = ['code', 'programming', 'bug', 'error', 'help', 'question', 'problem', 'solution'];

export function extractTopics(messages: readonly ContextMessage[]): string[] {
  const contents = messages.map(m => m.content.toLowerCase());
  return TOPIC_WORDS.filter(topic => contents.some(content => content.includes(topic)));
}

export function summarizeMessages(messages: readonly ContextMessage[]): string {
  const userMessages = messages.filter(m => m.role === 'user').length;
  const assistantMessages = messages.filter(m => m.role === 'assistant').length;

  let summary = `The conversation included ${userMessages} user messages and ${assistantMessages} assistant responses`;
  const topics = extractTopics(messages);
  if (topics.length > 0) {
    summary += `. Topics discussed: ${topics.join(', ')}`;
  }
  return `${summary}.`;
}

export class SummarizeStrategy implements ContextStrategy {
  readonly name = 'summarize';

  defaultConfig(): StrategyConfig {
    return { max_context_length: 20, keep_recent: 5 };
  }

  buildContext(
    systemPrompt: string,
    agentPrompt: string,
    history: readonly ContextMessage[],
    config?: StrategyConfig
  ): ContextMessage[] {
    const maxContextLength = readIntConfig(config, 'max_context_length', 20);
    const keepRecent = readIntConfig(config, 'keep_recent', 5);

    if (maxContextLength <= 0 || keepRecent <= 0) {
      throw new ContextStrategyError(this.name, 'max_context_length and keep_recent must be positive');
    }

    const system = buildSystemMessage(systemPrompt, agentPrompt);
    const toSummarize = history.length - keepRecent;
    if (history.length <= maxContextLength || toSummarize <= 0) {
      return [system, ...history];
    }

    return [
      system,
      {
        role: 'system',
        content: `Previous conversation summary: ${summarizeMessages(history.slice(0, toSummarize))}`,
        metadata: { summarized_messages: toSummarize },
      },
      ...history.slice(toSummarize),
    ];
  }
}
