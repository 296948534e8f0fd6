// Context strategy registry

import { LastNStrategy } from './last-n.js';
import { SlidingWindowStrategy } from './sliding-window.js';
import { SummarizeStrategy } from './summarize.js';
import type { ContextStrategy } from './types.js';

export const DEFAULT_STRATEGY = 'last_n';

export class StrategyRegistry {
  private strategies: Map<string, ContextStrategy> = new Map();

  constructor(strategies: ContextStrategy[] = [new LastNStrategy(), new SlidingWindowStrategy(), new SummarizeStrategy()]) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  register(strategy: ContextStrategy): void {
    this.strategies.set(strategy.name, strategy);
  }

  get(name: string): ContextStrategy | undefined {
    return this.strategies.get(name);
  }

  has(name: string): boolean {
    return this.strategies.has(name);
  }

  list(): string[] {
    return Array.from(this.strategies.keys());
  }
}

export { LastNStrategy, SlidingWindowStrategy, SummarizeStrategy };
export { buildSystemMessage, DEFAULT_SYSTEM_PROMPT } from './system-message.js';
export { ContextStrategyError } from './types.js';
export type { ContextMessage, ContextStrategy, MessageRole, StrategyConfig } from './types.js';
