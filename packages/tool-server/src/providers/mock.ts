/**
 * Mock providers: fixed inventory and topologies, random metrics
 */

import { logger } from '../utils/logger.js';
import type {
  CapacityAdvice,
  ClusterInventory,
  ClusterSummary,
  CustomerCluster,
  LogBatch,
  LogQuery,
  LogsProvider,
  MetricSeries,
  MetricsProvider,
  NodeActionResult,
  NodeController,
  NodeHealth,
  Providers,
  Topology,
  TopologyLookup,
} from './types.js';

const CUSTOMERS = ['Contoso', 'Fabrikam'];

const CLUSTERS: Record<string, ClusterSummary[]> = {
  Contoso: [
    { name: 'nova-preprod', version: '4.1.3', dcs: ['WEU', 'WUS'] },
    { name: 'nova-prod', version: '4.1.3', dcs: ['WEU', 'EUS2'] },
  ],
  Fabrikam: [{ name: 'fab-analytics', version: '3.11.16', dcs: ['IND', 'WEU'] }],
};

const TOPOLOGIES: Record<string, Topology> = {
  'Contoso/nova-preprod': {
    cluster: 'nova-preprod',
    version: '4.1.3',
    dcs: [
      { name: 'WEU', racks: [{ name: 'rack1', nodes: ['10.0.0.10', '10.0.0.11'] }] },
      { name: 'WUS', racks: [{ name: 'rack1', nodes: ['10.1.0.20', '10.1.0.21'] }] },
    ],
  },
  'Contoso/nova-prod': {
    cluster: 'nova-prod',
    version: '4.1.3',
    dcs: [{ name: 'WEU', racks: [{ name: 'rack1', nodes: ['10.0.1.10', '10.0.1.11', '10.0.1.12'] }] }],
  },
  'Fabrikam/fab-analytics': {
    cluster: 'fab-analytics',
    version: '3.11.16',
    dcs: [{ name: 'IND', racks: [{ name: 'rack1', nodes: ['10.9.0.5', '10.9.0.6'] }] }],
  },
};

const DEFAULT_NODE_COUNT = 3;
const SERIES_POINTS = 15;
const MAX_LOG_LINES = 10;

export type RandomSource = () => number;
export type Clock = () => Date;

function findTopology(customer: string, cluster: string): Topology | undefined {
  return TOPOLOGIES[`${customer}/${cluster}`];
}

export function countNodes(topology: Topology): number {
  return topology.dcs.reduce(
    (total, dc) => total + dc.racks.reduce((sum, rack) => sum + rack.nodes.length, 0),
    0
  );
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export class MockInventory implements ClusterInventory {
  async listCustomers(): Promise<string[]> {
    return [...CUSTOMERS];
  }

  async listClusters(customer?: string): Promise<ClusterSummary[] | CustomerCluster[]> {
    if (customer) {
      return CLUSTERS[customer] ?? [];
    }
    return Object.entries(CLUSTERS).flatMap(([owner, clusters]) =>
      clusters.map((c) => ({ customer: owner, ...c }))
    );
  }

  async topology(customer: string, cluster: string): Promise<TopologyLookup> {
    return findTopology(customer, cluster) ?? { error: 'not found' };
  }
}

export class MockMetrics implements MetricsProvider {
  constructor(
    private readonly random: RandomSource = Math.random,
    private readonly clock: Clock = () => new Date()
  ) {}

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  private integer(min: number, max: number): number {
    return Math.floor(this.uniform(min, max + 1));
  }

  async query(customer: string, cluster: string, metric: string, window: string): Promise<MetricSeries> {
    const now = Math.floor(this.clock().getTime() / 1000);
    // Oldest point first, one per minute
    const series = Array.from({ length: SERIES_POINTS }, (_, i) => ({
      t: now - (SERIES_POINTS - 1 - i) * 60,
      v: round(this.uniform(1, 20), 2),
    }));
    return { customer, cluster, metric, window, series };
  }

  async nodeHealth(customer: string, cluster: string, node: string): Promise<NodeHealth> {
    return {
      customer,
      cluster,
      node,
      status: 'UN',
      load_gb: round(this.uniform(50, 300), 1),
      pending_compactions: this.integer(0, 30),
      latency_ms_p99: round(this.uniform(2, 40), 1),
      read_timeout_rate: round(this.uniform(0, 0.5), 3),
      disk_pct: this.integer(35, 85),
    };
  }
}

export class MockLogs implements LogsProvider {
  constructor(private readonly clock: Clock = () => new Date()) {}

  async fetch(query: LogQuery): Promise<LogBatch> {
    const timestamp = this.clock().toISOString().slice(0, 19);
    const node = query.node ?? '10.0.0.10';
    let lines = Array.from(
      { length: Math.min(query.limit, MAX_LOG_LINES) },
      () => `${timestamp} [${node}] INFO CompactionTask - Completed SSTable compaction.`
    );
    if (query.pattern) {
      const needle = query.pattern.toLowerCase();
      lines = lines.filter((line) => line.toLowerCase().includes(needle));
    }
    return {
      customer: query.customer,
      cluster: query.cluster,
      node: query.node ?? null,
      since: query.since,
      count: lines.length,
      lines,
    };
  }
}

export class MockNodeController implements NodeController {
  async restartNode(customer: string, cluster: string, node: string): Promise<NodeActionResult> {
    // No side effects
    logger.info({ customer, cluster, node }, 'Simulated node restart');
    return { customer, cluster, node, action: 'restart', status: 'SIMULATED_OK' };
  }

  async adviseCapacity(customer: string, cluster: string): Promise<CapacityAdvice> {
    const topology = findTopology(customer, cluster);
    const current = topology ? countNodes(topology) : DEFAULT_NODE_COUNT;
    return {
      customer,
      cluster,
      advice: {
        current_nodes: current,
        suggested_nodes: current + 2,
        rationale: 'High tail latency and/or disk > 80% in last 1h (mock).',
      },
    };
  }
}

export function createMockProviders(): Providers {
  return {
    inventory: new MockInventory(),
    metrics: new MockMetrics(),
    logs: new MockLogs(),
    nodes: new MockNodeController(),
  };
}
