/**
 * Provider interfaces behind the tool server.
 * The MCP surface only depends on these; mock and real backends are swappable.
 */

export interface ClusterSummary {
  name: string;
  version: string;
  dcs: string[];
}

export interface CustomerCluster extends ClusterSummary {
  customer: string;
}

export interface Rack {
  name: string;
  nodes: string[];
}

export interface Datacenter {
  name: string;
  racks: Rack[];
}

export interface Topology {
  cluster: string;
  version: string;
  dcs: Datacenter[];
}

export type TopologyLookup = Topology | { error: 'not found' };

export interface MetricPoint {
  t: number;
  v: number;
}

export interface MetricSeries {
  customer: string;
  cluster: string;
  metric: string;
  window: string;
  series: MetricPoint[];
}

export interface NodeHealth {
  customer: string;
  cluster: string;
  node: string;
  status: 'UN' | 'DN';
  load_gb: number;
  pending_compactions: number;
  latency_ms_p99: number;
  read_timeout_rate: number;
  disk_pct: number;
}

export interface LogQuery {
  customer: string;
  cluster: string;
  node?: string;
  pattern?: string;
  since: string;
  limit: number;
}

export interface LogBatch {
  customer: string;
  cluster: string;
  node: string | null;
  since: string;
  count: number;
  lines: string[];
}

export interface NodeActionResult {
  customer: string;
  cluster: string;
  node: string;
  action: 'restart';
  status: 'SIMULATED_OK';
}

export interface CapacityAdvice {
  customer: string;
  cluster: string;
  advice: {
    current_nodes: number;
    suggested_nodes: number;
    rationale: string;
  };
}

export interface ClusterInventory {
  listCustomers(): Promise<string[]>;
  /** All clusters tagged with their customer when no customer is given */
  listClusters(customer?: string): Promise<ClusterSummary[] | CustomerCluster[]>;
  topology(customer: string, cluster: string): Promise<TopologyLookup>;
}

export interface MetricsProvider {
  query(customer: string, cluster: string, metric: string, window: string): Promise<MetricSeries>;
  nodeHealth(customer: string, cluster: string, node: string): Promise<NodeHealth>;
}

export interface LogsProvider {
  fetch(query: LogQuery): Promise<LogBatch>;
}

export interface NodeController {
  restartNode(customer: string, cluster: string, node: string): Promise<NodeActionResult>;
  adviseCapacity(customer: string, cluster: string): Promise<CapacityAdvice>;
}

export interface Providers {
  inventory: ClusterInventory;
  metrics: MetricsProvider;
  logs: LogsProvider;
  nodes: NodeController;
}
