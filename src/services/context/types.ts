// Context strategy types
// A strategy bounds a session's history into the message window sent to the model

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ContextMessage {
  role: MessageRole;
  content: string;
  metadata?: Record<string, unknown>;
}

export type StrategyConfig = Record<string, unknown>;

export interface ContextStrategy {
  readonly name: string;
  defaultConfig(): StrategyConfig;
  /**
   * Returns `[system, ...selected history]`. Must not mutate `history`.
   */
  buildContext(
    systemPrompt: string,
    agentPrompt: string,
    history: readonly ContextMessage[],
    config?: StrategyConfig
  ): ContextMessage[];
}

export class ContextStrategyError extends Error {
  constructor(
    public strategy: string,
    message: string
  ) {
    super(message);
    this.name = 'ContextStrategyError';
  }
}
