/**
 * Application configuration
 * Loaded from environment variables with sensible defaults
 */

function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    return defaultValue;
  }
  return parsed;
}

// setTimeout cannot wait longer than 2^31-1 ms
const MAX_TIMER_MS = 2_147_483_647;

export function parseTimeoutMs(value: string | undefined, defaultValue: number): number {
  return Math.min(parsePositiveInt(value, defaultValue), MAX_TIMER_MS);
}

function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(/\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

export type OracleProviderName = 'openai' | 'mock';
export type CatalogRefreshMode = 'turn' | 'once';

function resolveOracleProvider(): OracleProviderName {
  if (process.env.ORACLE_PROVIDER === 'mock') return 'mock';
  if (process.env.ORACLE_PROVIDER === 'openai') return 'openai';
  // Without an API key the offline oracle keeps the demo usable
  return process.env.OPENAI_API_KEY ? 'openai' : 'mock';
}

function resolveCatalogRefresh(): CatalogRefreshMode {
  return process.env.CATALOG_REFRESH === 'once' ? 'once' : 'turn';
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config = {
  // Server
  server: {
    port: parsePositiveInt(process.env.PORT, 8000),
    host: process.env.HOST || '127.0.0.1',
  },

  // Environment
  env: nodeEnv,
  isDev: nodeEnv === 'development',
  isProd: nodeEnv === 'production',
  isTest: nodeEnv === 'test',

  // Logging
  log: {
    level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'debug'),
  },

  // Decision oracle
  oracle: {
    provider: resolveOracleProvider(),
    apiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    temperature: 0.2,
    timeoutMs: parseTimeoutMs(process.env.ORACLE_TIMEOUT_MS, 60000),
  },

  // Orchestration loop
  orchestration: {
    maxRounds: parsePositiveInt(process.env.MAX_ROUNDS, 5),
  },

  // Tool server (MCP)
  toolServer: {
    url: process.env.TOOL_SERVER_URL || undefined,
    command: process.env.TOOL_SERVER_COMMAND || 'npx',
    args: process.env.TOOL_SERVER_ARGS
      ? parseList(process.env.TOOL_SERVER_ARGS)
      : ['tsx', '../tool-server/src/index.ts'],
    toolTimeoutMs: parseTimeoutMs(process.env.TOOL_TIMEOUT_MS, 15000),
    catalogRefresh: resolveCatalogRefresh(),
  },

  // Session
  session: {
    idleTtlMs: parsePositiveInt(process.env.SESSION_IDLE_TTL_MS, 60 * 60 * 1000),
    sweepIntervalMs: 60 * 1000,
  },
} as const;

export type Config = typeof config;
