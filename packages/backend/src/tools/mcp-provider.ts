/**
 * MCP tool provider
 * Talks to the Cassandra tool server through the Model Context Protocol
 */

import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ToolInvocationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ToolCallOptions, ToolProvider } from './types.js';

export type TransportFactory = () => Transport;

export interface McpTransportOptions {
  url?: string;
  command: string;
  args: readonly string[];
}

const ContentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const CallToolResponseSchema = z.object({
  content: z.array(ContentPartSchema).default([]),
  structuredContent: z.record(z.unknown()).optional(),
  isError: z.boolean().optional(),
});

const ReadResourceResponseSchema = z.object({
  contents: z.array(
    z
      .object({
        uri: z.string(),
        mimeType: z.string().optional(),
        text: z.string().optional(),
      })
      .passthrough()
  ),
});

/**
 * Streamable HTTP when a URL is configured, otherwise spawn the server over stdio
 */
export function createTransportFactory(options: McpTransportOptions): TransportFactory {
  if (options.url) {
    const url = new URL(options.url);
    return () => new StreamableHTTPClientTransport(url);
  }
  return () =>
    new StdioClientTransport({
      command: options.command,
      args: [...options.args],
      stderr: 'inherit',
    });
}

export class McpToolProvider implements ToolProvider {
  private connection: Promise<Client> | null = null;
  private active: Client | null = null;

  constructor(private readonly createTransport: TransportFactory) {}

  async listTools(): Promise<unknown[]> {
    const client = await this.connect();
    const tools: unknown[] = [];
    let cursor: string | undefined;
    do {
      const page = await client.listTools(cursor ? { cursor } : undefined);
      tools.push(...page.tools);
      cursor = page.nextCursor;
    } while (cursor);
    return tools;
  }

  async listResources(): Promise<{ resources: unknown[]; resourceTemplates: unknown[] }> {
    const client = await this.connect();
    if (!client.getServerCapabilities()?.resources) {
      return { resources: [], resourceTemplates: [] };
    }

    const resources: unknown[] = [];
    let cursor: string | undefined;
    do {
      const page = await client.listResources(cursor ? { cursor } : undefined);
      resources.push(...page.resources);
      cursor = page.nextCursor;
    } while (cursor);

    const resourceTemplates: unknown[] = [];
    cursor = undefined;
    do {
      const page = await client.listResourceTemplates(cursor ? { cursor } : undefined);
      resourceTemplates.push(...page.resourceTemplates);
      cursor = page.nextCursor;
    } while (cursor);

    return { resources, resourceTemplates };
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    options: ToolCallOptions = {}
  ): Promise<unknown> {
    const client = await this.connect();
    const raw = await client.callTool({ name, arguments: args }, undefined, {
      signal: options.signal,
      timeout: options.timeoutMs,
    });

    const parsed = CallToolResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ToolInvocationError(`Tool '${name}' returned a malformed response`, name, parsed.error);
    }

    const text = joinText(parsed.data.content);
    if (parsed.data.isError) {
      throw new ToolInvocationError(text || `Tool '${name}' reported an error`, name);
    }
    if (parsed.data.structuredContent) {
      return parsed.data.structuredContent;
    }
    return text ? parseText(text) : '(no result)';
  }

  async readResource(uri: string, options: ToolCallOptions = {}): Promise<unknown> {
    const client = await this.connect();
    const raw = await client.readResource(
      { uri },
      { signal: options.signal, timeout: options.timeoutMs }
    );

    const parsed = ReadResourceResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ToolInvocationError(`Resource '${uri}' returned a malformed response`, 'read_resource', parsed.error);
    }

    const text = joinText(parsed.data.contents);
    return text ? parseText(text) : '(no content)';
  }

  async close(): Promise<void> {
    const pending = this.connection;
    this.connection = null;
    this.active = null;
    if (pending) {
      const client = await pending.catch(() => null);
      await client?.close();
    }
  }

  private connect(): Promise<Client> {
    if (this.connection) {
      return this.connection;
    }
    const attempt = this.open();
    this.connection = attempt;
    // A failed connect is reported to the caller; forget it so the next call retries
    attempt.catch(() => {
      if (this.connection === attempt) {
        this.connection = null;
      }
    });
    return attempt;
  }

  private async open(): Promise<Client> {
    const client = new Client({ name: 'cassandra-doctor-backend', version: '1.0.0' });

    // Next call reconnects once the transport goes away
    client.onclose = () => {
      if (this.active === client) {
        logger.warn('Tool server connection closed');
        this.active = null;
        this.connection = null;
      }
    };
    client.onerror = (error) => {
      logger.warn({ error: error.message }, 'Tool server transport error');
    };

    await client.connect(this.createTransport());
    this.active = client;
    logger.info({ server: client.getServerVersion()?.name }, 'Connected to tool server');
    return client;
  }
}

function joinText(parts: Array<{ text?: string }>): string {
  return parts
    .map((part) => part.text)
    .filter((text): text is string => text !== undefined)
    .join('\n');
}

/**
 * Tool servers return JSON as text; fall back to the raw text otherwise
 */
function parseText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
