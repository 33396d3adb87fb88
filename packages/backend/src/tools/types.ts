/**
 * Tool framework types
 */

/**
 * A remote tool as advertised by the tool server
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

/**
 * A read-only resource exposed by the tool server
 */
export interface ResourceDescriptor {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface ResourceTemplateDescriptor {
  uriTemplate: string;
  name: string;
  description?: string;
  mimeType?: string;
}

/**
 * Immutable result of one discovery pass
 */
export interface CatalogSnapshot {
  tools: ToolDescriptor[];
  resources: ResourceDescriptor[];
  resourceTemplates: ResourceTemplateDescriptor[];
  fetchedAt: Date;
}

/**
 * Tool invocation requested by the decision oracle
 */
export interface ToolCallRequest {
  id: string;
  toolName: string;
  arguments: Record<string, unknown>;
}

export type ToolErrorCode = 'UNKNOWN_TOOL' | 'INVALID_ARGUMENTS' | 'TOOL_INVOCATION_ERROR' | 'TIMEOUT';

/** Codes for calls rejected before anything is sent to the tool server */
export const LOCAL_REJECTION_CODES: readonly ToolErrorCode[] = ['UNKNOWN_TOOL', 'INVALID_ARGUMENTS'];

export type ToolOutcome =
  | { success: true; data: unknown }
  | { success: false; error: { code: ToolErrorCode; message: string } };

export interface ToolCallResult {
  toolCallId: string;
  toolName: string;
  arguments: Record<string, unknown>;
  outcome: ToolOutcome;
}

export interface ToolCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Remote capability set: discovery separate from invocation,
 * each call failing independently.
 */
export interface ToolProvider {
  listTools(): Promise<unknown[]>;
  listResources(): Promise<{ resources: unknown[]; resourceTemplates: unknown[] }>;
  callTool(
    name: string,
    args: Record<string, unknown>,
    options?: ToolCallOptions
  ): Promise<unknown>;
  readResource(uri: string, options?: ToolCallOptions): Promise<unknown>;
  close(): Promise<void>;
}
