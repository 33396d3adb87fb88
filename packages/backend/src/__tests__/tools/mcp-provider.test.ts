/**
 * MCP tool provider tests against an in-process server
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { FastifyInstance } from 'fastify';
import { buildHttpApp } from '@cassandra-doctor/tool-server/http';
import { createMockProviders } from '@cassandra-doctor/tool-server/providers/mock';
import { McpToolProvider, createTransportFactory } from '../../tools/mcp-provider.js';
import { ToolCatalog } from '../../tools/catalog.js';
import { ToolInvocationError } from '../../utils/errors.js';

function buildServer(withResources: boolean): McpServer {
  const server = new McpServer({ name: 'test-server', version: '0.0.1' });

  server.registerTool(
    'list_clusters',
    { description: 'List clusters', inputSchema: { customer: z.string().optional() } },
    async ({ customer }) => ({
      content: [{ type: 'text', text: JSON.stringify(customer ? [`${customer}-prod`] : ['A', 'B', 'C']) }],
    })
  );

  server.registerTool(
    'greet',
    { description: 'Plain text reply', inputSchema: { name: z.string() } },
    async ({ name }) => ({ content: [{ type: 'text', text: `hello ${name}` }] })
  );

  server.registerTool(
    'explode',
    { description: 'Always fails', inputSchema: { node: z.string() } },
    async ({ node }) => ({ content: [{ type: 'text', text: `node ${node} unreachable` }], isError: true })
  );

  server.registerTool(
    'count',
    {
      description: 'Structured result',
      inputSchema: { n: z.number() },
      outputSchema: { value: z.number() },
    },
    async ({ n }) => ({
      content: [{ type: 'text', text: String(n + 1) }],
      structuredContent: { value: n + 1 },
    })
  );

  if (withResources) {
    server.registerResource(
      'customers',
      'cassandra://inventory/customers',
      { mimeType: 'application/json' },
      async (uri) => ({
        contents: [{ uri: uri.href, mimeType: 'application/json', text: '{"customers":["Contoso","Fabrikam"]}' }],
      })
    );
    server.registerResource(
      'runbook',
      'cassandra://runbooks/twcs.md',
      { mimeType: 'text/markdown' },
      async (uri) => ({ contents: [{ uri: uri.href, mimeType: 'text/markdown', text: '# TWCS' }] })
    );
  }

  return server;
}

describe('McpToolProvider', () => {
  let server: McpServer;
  let provider: McpToolProvider;
  let connects: number;

  async function connect(withResources = true): Promise<void> {
    server = buildServer(withResources);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    connects = 0;
    provider = new McpToolProvider(() => {
      connects++;
      return clientTransport;
    });
  }

  beforeEach(async () => {
    await connect();
  });

  afterEach(async () => {
    await provider.close();
    await server.close();
  });

  it('should list tools with their input schemas', async () => {
    const tools = await provider.listTools();
    const names = tools.map((t) => (typeof t === 'object' && t !== null && 'name' in t ? t.name : undefined));
    expect(names).toEqual(['list_clusters', 'greet', 'explode', 'count']);
  });

  it('should connect once and reuse the client', async () => {
    await provider.listTools();
    await provider.callTool('list_clusters', {});
    expect(connects).toBe(1);
  });

  it('should list resources when the server has them', async () => {
    const { resources, resourceTemplates } = await provider.listResources();
    expect(resources).toHaveLength(2);
    expect(resourceTemplates).toEqual([]);
  });

  it('should skip resource discovery without the capability', async () => {
    await provider.close();
    await server.close();
    await connect(false);

    await expect(provider.listResources()).resolves.toEqual({ resources: [], resourceTemplates: [] });
  });

  it('should feed a catalog', async () => {
    const snapshot = await new ToolCatalog(provider).refresh();
    expect(snapshot.tools.map((t) => t.name)).toEqual(['list_clusters', 'greet', 'explode', 'count', 'read_resource']);
    expect(snapshot.resources.map((r) => r.uri)).toEqual([
      'cassandra://inventory/customers',
      'cassandra://runbooks/twcs.md',
    ]);
  });

  it('should parse JSON text results', async () => {
    await expect(provider.callTool('list_clusters', {})).resolves.toEqual(['A', 'B', 'C']);
    await expect(provider.callTool('list_clusters', { customer: 'Contoso' })).resolves.toEqual(['Contoso-prod']);
  });

  it('should return non-JSON text as is', async () => {
    await expect(provider.callTool('greet', { name: 'ops' })).resolves.toBe('hello ops');
  });

  it('should prefer structured content', async () => {
    await expect(provider.callTool('count', { n: 41 })).resolves.toEqual({ value: 42 });
  });

  it('should raise ToolInvocationError for tool-reported errors', async () => {
    const error = await provider.callTool('explode', { node: '10.0.0.10' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolInvocationError);
    if (error instanceof ToolInvocationError) {
      expect(error.message).toBe('node 10.0.0.10 unreachable');
      expect(error.toolName).toBe('explode');
    }
  });

  it('should read JSON and text resources', async () => {
    await expect(provider.readResource('cassandra://inventory/customers')).resolves.toEqual({
      customers: ['Contoso', 'Fabrikam'],
    });
    await expect(provider.readResource('cassandra://runbooks/twcs.md')).resolves.toBe('# TWCS');
  });

  it('should reject unknown resources', async () => {
    await expect(provider.readResource('cassandra://nope')).rejects.toThrow();
  });
});

describe('McpToolProvider over Streamable HTTP', () => {
  let app: FastifyInstance;
  let provider: McpToolProvider;

  beforeEach(async () => {
    app = buildHttpApp(createMockProviders());
    const address = await app.listen({ port: 0, host: '127.0.0.1' });
    provider = new McpToolProvider(
      createTransportFactory({ url: `${address}/mcp`, command: 'unused', args: [] })
    );
  });

  afterEach(async () => {
    await provider.close();
    await app.close();
  });

  it('should discover tools and resources', async () => {
    const snapshot = await new ToolCatalog(provider).refresh();

    expect(snapshot.tools.map((t) => t.name)).toEqual([
      'list_clusters',
      'cluster_overview',
      'node_health',
      'query_metrics',
      'fetch_logs',
      'restart_node',
      'advise_capacity',
      'read_resource',
    ]);
    expect(snapshot.resources.map((r) => r.uri)).toEqual([
      'cassandra://inventory/customers',
      'cassandra://runbooks/twcs.md',
    ]);
  });

  it('should call tools', async () => {
    await expect(provider.callTool('list_clusters', { customer: 'Fabrikam' })).resolves.toEqual([
      { name: 'fab-analytics', version: '3.11.16', dcs: ['IND', 'WEU'] },
    ]);
  });

  it('should reject calls the server refuses', async () => {
    await expect(provider.callTool('node_health', { customer: 'Contoso' })).rejects.toThrow();
  });

  it('should read resources', async () => {
    await expect(provider.readResource('cassandra://inventory/customers')).resolves.toEqual({
      customers: ['Contoso', 'Fabrikam'],
    });
  });
});
