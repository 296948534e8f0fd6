// Environment configuration for the agent server
// Provider endpoints, persistence, tool runtime and orchestrator limits come from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

const NODE_ENV = process.env.NODE_ENV || 'development';

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8080),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV,
  DATABASE_PATH: strEnv(process.env.DATABASE_PATH, './data/agents.db'),
  CORS_ORIGINS: strEnv(process.env.CORS_ORIGINS, 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(origin => origin.trim())
    .filter(Boolean),

  // Ollama (no credentials required)
  OLLAMA_BASE_URL: strEnv(process.env.OLLAMA_BASE_URL, 'http://localhost:11434'),

  // OpenAI-compatible chat completions
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL, 'https://api.openai.com'),

  PROVIDER_AVAILABILITY_TTL_MS: parsePositiveInt(
    process.env.PROVIDER_AVAILABILITY_TTL_MS,
    10000,
    'PROVIDER_AVAILABILITY_TTL_MS',
  ),

  // Tools
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  HTTP_TOOLS_ENABLED: process.env.HTTP_TOOLS_ENABLED === 'true', // Default false, reaches the network
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 60000, 'TOOL_TIMEOUT_MS'),

  // Orchestrator
  ORCHESTRATOR_MAX_ITERATIONS: parsePositiveInt(
    process.env.ORCHESTRATOR_MAX_ITERATIONS,
    5,
    'ORCHESTRATOR_MAX_ITERATIONS',
  ),

  // Route guards
  AUTH_ENFORCEMENT_ENABLED: process.env.AUTH_ENFORCEMENT_ENABLED === 'true',
  RATE_LIMITING_ENABLED: process.env.RATE_LIMITING_ENABLED === 'true',
  RATE_LIMIT_WINDOW_MS: parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 60000, 'RATE_LIMIT_WINDOW_MS'),
  RATE_LIMIT_CHAT_PER_WINDOW: parsePositiveInt(process.env.RATE_LIMIT_CHAT_PER_WINDOW, 30, 'RATE_LIMIT_CHAT_PER_WINDOW'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_PRETTY: process.env.LOG_PRETTY ? process.env.LOG_PRETTY === 'true' : NODE_ENV === 'development',
};

export type Env = typeof env;

type ProviderCredentials = Pick<Env, 'OLLAMA_BASE_URL' | 'OPENAI_API_KEY'>;

export function isProviderConfigured(provider: string, config: ProviderCredentials = env): boolean {
  switch (provider) {
    case 'ollama':
      return !!config.OLLAMA_BASE_URL;
    case 'openai':
      return !!config.OPENAI_API_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(config: ProviderCredentials = env): string[] {
  const providers = ['ollama', 'openai'];
  return providers.filter(name => isProviderConfigured(name, config));
}

// Log configuration on startup (secrets are never printed)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  console.log('Agent server configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Database: ${env.DATABASE_PATH}`);
  console.log(`  CORS origins: ${env.CORS_ORIGINS.join(', ') || 'none'}`);
  console.log(`  Configured providers: ${configured.join(', ') || 'none'}`);
  console.log(`  Tools enabled: ${env.TOOLS_ENABLED}`);
  if (env.HTTP_TOOLS_ENABLED) {
    console.log(`  ⚠️  HTTP TOOLS ENABLED - agents can reach the network`);
  }
  console.log(`  Tool timeout ms: ${env.TOOL_TIMEOUT_MS}`);
  console.log(`  Max orchestrator iterations: ${env.ORCHESTRATOR_MAX_ITERATIONS}`);
  console.log(`  Auth enforcement enabled: ${env.AUTH_ENFORCEMENT_ENABLED}`);
  console.log(`  Rate limiting enabled: ${env.RATE_LIMITING_ENABLED}`);
  if (env.RATE_LIMITING_ENABLED) {
    console.log(`  Rate limit window ms: ${env.RATE_LIMIT_WINDOW_MS}`);
    console.log(`  /chat max per window: ${env.RATE_LIMIT_CHAT_PER_WINDOW}`);
  }
}
