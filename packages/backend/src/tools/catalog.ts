/**
 * Tool Catalog
 * Holds the tool/resource descriptors discovered from the tool server
 */

import { z } from 'zod';
import { CatalogNotInitializedError, DiscoveryError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CatalogSnapshot, ToolDescriptor, ToolProvider } from './types.js';

export const READ_RESOURCE_TOOL = 'read_resource';

const readResourceDescriptor: ToolDescriptor = {
  name: READ_RESOURCE_TOOL,
  description: 'Read a resource by URI exposed by the tool server.',
  inputSchema: {
    type: 'object',
    properties: { uri: { type: 'string' } },
    required: ['uri'],
    additionalProperties: false,
  },
};

const ToolDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()),
});

const ResourceDescriptorSchema = z.object({
  uri: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

const ResourceTemplateDescriptorSchema = z.object({
  uriTemplate: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

export class ToolCatalog {
  private snapshot: CatalogSnapshot | null = null;

  constructor(private readonly provider: ToolProvider) {}

  /**
   * Fetch a fresh snapshot. A failed refresh leaves the previous snapshot in place.
   */
  async refresh(): Promise<CatalogSnapshot> {
    let rawTools: unknown[];
    let rawResources: { resources: unknown[]; resourceTemplates: unknown[] };

    try {
      rawTools = await this.provider.listTools();
      rawResources = await this.provider.listResources();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Tool discovery failed');
      throw new DiscoveryError(`Tool server unreachable: ${errorMessage(error)}`, error);
    }

    const tools = rawTools.map((raw, index) => parseTool(raw, index));
    const resources = rawResources.resources.map((raw, index) =>
      parseDescriptor(ResourceDescriptorSchema, raw, `resources[${index}]`)
    );
    const resourceTemplates = rawResources.resourceTemplates.map((raw, index) =>
      parseDescriptor(ResourceTemplateDescriptorSchema, raw, `resourceTemplates[${index}]`)
    );

    if (resources.length > 0 || resourceTemplates.length > 0) {
      tools.push(readResourceDescriptor);
    }

    const seen = new Set<string>();
    for (const tool of tools) {
      if (seen.has(tool.name)) {
        throw new DiscoveryError(`Tool server advertised '${tool.name}' more than once`);
      }
      seen.add(tool.name);
    }

    this.snapshot = Object.freeze({
      tools,
      resources,
      resourceTemplates,
      fetchedAt: new Date(),
    });

    logger.info(
      {
        tools: tools.map((t) => t.name),
        resources: resources.length,
        resourceTemplates: resourceTemplates.length,
      },
      'Tool catalog refreshed'
    );

    return this.snapshot;
  }

  get(): CatalogSnapshot {
    if (!this.snapshot) {
      throw new CatalogNotInitializedError();
    }
    return this.snapshot;
  }

  isInitialized(): boolean {
    return this.snapshot !== null;
  }

  has(toolName: string): boolean {
    return this.get().tools.some((t) => t.name === toolName);
  }

  toolNames(): string[] {
    return this.get().tools.map((t) => t.name);
  }
}

function parseTool(raw: unknown, index: number): ToolDescriptor {
  const tool = parseDescriptor(ToolDescriptorSchema, raw, `tools[${index}]`);
  return {
    name: tool.name,
    description: tool.description ?? '',
    inputSchema: tool.inputSchema,
  };
}

function parseDescriptor<T>(schema: z.ZodType<T>, raw: unknown, path: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new DiscoveryError(`Malformed descriptor at ${path}: ${issues}`);
  }
  return parsed.data;
}
