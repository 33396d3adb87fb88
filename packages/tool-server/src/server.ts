/**
 * MCP server exposing Cassandra administration tools and resources
 */

import { z } from 'zod';
import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { logger } from './utils/logger.js';
import type { Providers, Topology } from './providers/types.js';

export const SERVER_NAME = 'cass-doctor';
export const SERVER_VERSION = '1.0.0';

export const TWCS_RUNBOOK = `# TWCS Runbook (Mock)
- Check table options: compaction = 'TimeWindowCompactionStrategy'
- Ensure proper \`compaction_window_unit\` and \`compaction_window_size\`
- Verify TTL and tombstone purge grace settings
`;

const ClusterShape = {
  customer: z.string().describe('Customer name, e.g. Contoso'),
  cluster: z.string().describe('Cluster name, e.g. nova-prod'),
};

const NodeShape = {
  ...ClusterShape,
  node: z.string().describe('Node address, e.g. 10.0.0.10'),
};

function json(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value) }] };
}

function jsonResource(uri: URL, value: unknown): ReadResourceResult {
  return {
    contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(value) }],
  };
}

/** Template variables may repeat; these templates only take single values */
function single(value: string | string[] | undefined): string {
  if (Array.isArray(value)) return value[0] ?? '';
  return value ?? '';
}

function dcCounts(topology: Topology): Array<{ dc: string; nodes: number }> {
  return topology.dcs.map((dc) => ({
    dc: dc.name,
    nodes: dc.racks.reduce((sum, rack) => sum + rack.nodes.length, 0),
  }));
}

export function buildToolServer(providers: Providers): McpServer {
  const { inventory, metrics, logs, nodes } = providers;
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  // Resources

  server.registerResource(
    'customers',
    'cassandra://inventory/customers',
    { title: 'Customers', description: 'All known customers', mimeType: 'application/json' },
    async (uri) => jsonResource(uri, { customers: await inventory.listCustomers() })
  );

  server.registerResource(
    'customer-clusters',
    new ResourceTemplate('cassandra://inventory/{customer}/clusters', { list: undefined }),
    { title: 'Customer clusters', description: 'Clusters owned by a customer', mimeType: 'application/json' },
    async (uri, variables) => {
      const customer = single(variables.customer);
      return jsonResource(uri, { customer, clusters: await inventory.listClusters(customer) });
    }
  );

  server.registerResource(
    'cluster-topology',
    new ResourceTemplate('cassandra://cluster/{customer}/{cluster}/topology', { list: undefined }),
    { title: 'Cluster topology', description: 'Datacenters, racks and nodes of a cluster', mimeType: 'application/json' },
    async (uri, variables) =>
      jsonResource(uri, await inventory.topology(single(variables.customer), single(variables.cluster)))
  );

  server.registerResource(
    'runbook-twcs',
    'cassandra://runbooks/twcs.md',
    { title: 'TWCS runbook', description: 'Time-window compaction checklist', mimeType: 'text/markdown' },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: 'text/markdown', text: TWCS_RUNBOOK }],
    })
  );

  // Tools

  server.registerTool(
    'list_clusters',
    {
      title: 'List clusters',
      description: 'List clusters across all customers, or for a specific customer.',
      inputSchema: { customer: z.string().optional().describe('Restrict to one customer') },
    },
    async ({ customer }) => json(await inventory.listClusters(customer))
  );

  server.registerTool(
    'cluster_overview',
    {
      title: 'Cluster overview',
      description: 'Return a compact overview: topology plus a couple of synthetic KPIs.',
      inputSchema: ClusterShape,
    },
    async ({ customer, cluster }) => {
      const topology = await inventory.topology(customer, cluster);
      const counts = 'error' in topology ? [] : dcCounts(topology);
      const total = counts.reduce((sum, dc) => sum + dc.nodes, 0);
      return json({
        topology,
        dc_counts: counts,
        kpis: { replication_ok: true, recent_alerts: 1, approx_total_nodes: total },
      });
    }
  );

  server.registerTool(
    'node_health',
    {
      title: 'Node health',
      description: 'Health snapshot for a node (status, load, p99, timeouts, disk%).',
      inputSchema: NodeShape,
    },
    async ({ customer, cluster, node }) => json(await metrics.nodeHealth(customer, cluster, node))
  );

  server.registerTool(
    'query_metrics',
    {
      title: 'Query metrics',
      description: "Query a metric time series. Metric examples: 'read_p99_ms', 'cpu_pct'.",
      inputSchema: {
        ...ClusterShape,
        metric: z.string(),
        window: z.string().default('15m'),
      },
    },
    async ({ customer, cluster, metric, window }) =>
      json(await metrics.query(customer, cluster, metric, window))
  );

  server.registerTool(
    'fetch_logs',
    {
      title: 'Fetch logs',
      description: 'Fetch recent logs matching a pattern.',
      inputSchema: {
        ...ClusterShape,
        node: z.string().optional(),
        pattern: z.string().optional(),
        since: z.string().default('15m'),
        limit: z.number().int().positive().default(200),
      },
    },
    async (args) => json(await logs.fetch(args))
  );

  server.registerTool(
    'restart_node',
    {
      title: 'Restart node',
      description: 'Restart a node (simulated, no side effects).',
      inputSchema: NodeShape,
    },
    async ({ customer, cluster, node }) => json(await nodes.restartNode(customer, cluster, node))
  );

  server.registerTool(
    'advise_capacity',
    {
      title: 'Advise capacity',
      description: 'Capacity advice. Suggests a new node count and rationale.',
      inputSchema: ClusterShape,
    },
    async ({ customer, cluster }) => json(await nodes.adviseCapacity(customer, cluster))
  );

  logger.debug({ server: SERVER_NAME }, 'Tools and resources registered');

  return server;
}
