// Last-N strategy: the most recent `count` messages

import { buildSystemMessage, readIntConfig } from './system-message.js';
import { ContextStrategyError } from './types.js';
import type { ContextMessage, ContextStrategy, StrategyConfig } from './types.js';

export class LastNStrategy implements ContextStrategy {
  readonly name = 'last_n';

  defaultConfig(): StrategyConfig {
    return { count: 10 };
  }

  buildContext(
    systemPrompt: string,
    agentPrompt: string,
    history: readonly ContextMessage[],
    config?: StrategyConfig
  ): ContextMessage[] {
    const count = readIntConfig(config, 'count', 10);
    if (count <= 0) {
      throw new ContextStrategyError(this.name, 'count must be positive');
    }

    const start = Math.max(0, history.length - count);
    return [buildSystemMessage(systemPrompt, agentPrompt), ...history.slice(start)];
  }
}
