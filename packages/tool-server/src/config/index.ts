/**
 * Tool server configuration
 */

function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    return defaultValue;
  }
  return parsed;
}

export type ToolServerTransport = 'stdio' | 'http';

function resolveTransport(): ToolServerTransport {
  return process.env.TOOL_SERVER_TRANSPORT === 'http' ? 'http' : 'stdio';
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config = {
  env: nodeEnv,
  isDev: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  transport: resolveTransport(),

  // Streamable HTTP transport only
  server: {
    port: parsePositiveInt(process.env.PORT, 8001),
    host: process.env.HOST || '127.0.0.1',
  },

  log: {
    level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
  },
} as const;

export type Config = typeof config;
