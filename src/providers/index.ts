// Provider Registry
// Holds the LLM providers configured for this process

import { isProviderConfigured } from '../env.js';
import type { Env } from '../env.js';
import { TTLCache } from '../utils/ttl-cache.js';
import { OllamaProvider } from './ollama.js';
import { OpenAIProvider } from './openai.js';
import type { Provider } from './types.js';

const AVAILABILITY_CHECK_TIMEOUT_MS = 5_000;

export class ProviderRegistry {
  private providers: Map<string, Provider> = new Map();
  private availability: TTLCache<string, boolean>;

  constructor(availabilityTtlMs: number = 10_000) {
    this.availability = new TTLCache<string, boolean>(availabilityTtlMs);
  }

  register(provider: Provider): void {
    this.providers.set(provider.name, provider);
    this.availability.delete(provider.name);
  }

  get(name: string): Provider | undefined {
    return this.providers.get(name);
  }

  list(): string[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Health check with a short-lived cache; an unknown provider is never available.
   * The check is shared between callers, so it runs on its own deadline
   * rather than on any one request's signal.
   */
  async isAvailable(name: string): Promise<boolean> {
    const provider = this.providers.get(name);
    if (!provider) return false;

    return this.availability.getOrLoad(name, () =>
      provider.isAvailable(AbortSignal.timeout(AVAILABILITY_CHECK_TIMEOUT_MS))
    );
  }

  destroy(): void {
    this.availability.clear();
  }
}

type ProviderConfig = Pick<Env, 'OLLAMA_BASE_URL' | 'OPENAI_API_KEY' | 'OPENAI_BASE_URL' | 'PROVIDER_AVAILABILITY_TTL_MS'>;

export function createProviderRegistry(config: ProviderConfig): ProviderRegistry {
  const registry = new ProviderRegistry(config.PROVIDER_AVAILABILITY_TTL_MS);

  if (isProviderConfigured('ollama', config)) {
    registry.register(new OllamaProvider(config.OLLAMA_BASE_URL));
  }
  if (isProviderConfigured('openai', config)) {
    registry.register(new OpenAIProvider(config.OPENAI_API_KEY, config.OPENAI_BASE_URL));
  }

  return registry;
}

export { OllamaProvider } from './ollama.js';
export { OpenAIProvider } from './openai.js';
export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, StreamChunk, ToolCall } from './types.js';
