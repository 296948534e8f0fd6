// Sliding window strategy: the last `window_size` messages plus `overlap`
// messages from the window before it

import { buildSystemMessage, readIntConfig } from './system-message.js';
import { ContextStrategyError } from './types.js';
import type { ContextMessage, ContextStrategy, StrategyConfig } from './types.js';

export class SlidingWindowStrategy implements ContextStrategy {
  readonly name = 'sliding_window';

  defaultConfig(): StrategyConfig {
    return { window_size: 5, overlap: 2 };
  }

  buildContext(
    systemPrompt: string,
    agentPrompt: string,
    history: readonly ContextMessage[],
    config?: StrategyConfig
  ): ContextMessage[] {
    const windowSize = readIntConfig(config, 'window_size', 5);
    const overlap = readIntConfig(config, 'overlap', 2);

    if (windowSize <= 0) {
      throw new ContextStrategyError(this.name, 'window_size must be positive');
    }
    if (overlap < 0 || overlap >= windowSize) {
      throw new ContextStrategyError(this.name, 'overlap must be between 0 and window_size-1');
    }

    const system = buildSystemMessage(systemPrompt, agentPrompt);
    if (history.length <= windowSize) {
      return [system, ...history];
    }

    const start = history.length - windowSize;
    // Too little history before the window to fill the overlap: send it all
    const from = start > overlap ? start - overlap : 0;
    return [system, ...history.slice(from)];
  }
}
