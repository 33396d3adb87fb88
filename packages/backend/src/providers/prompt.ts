/**
 * System prompt built from the discovered catalog
 */

import type { CatalogSnapshot, ToolOutcome } from '../tools/types.js';

export const BASE_SYSTEM_PROMPT = `You are Cassandra Doctor, an expert SRE/DBA assistant for Apache Cassandra clusters.

IMPORTANT: Always use the available tools to answer questions. The tools and their schemas are provided to you dynamically.

ALWAYS call the appropriate tool(s) first before providing an answer. If you don't have the data, use the tools to get it.

Be concise and specific. Warn before any disruptive actions. Return clear steps and brief rationale.`;

export function buildSystemPrompt(catalog: CatalogSnapshot): string {
  const sections = [BASE_SYSTEM_PROMPT];

  if (catalog.tools.length > 0) {
    const lines = ['AVAILABLE TOOLS:'];
    for (const tool of catalog.tools) {
      lines.push(`- ${tool.name}: ${tool.description || 'No description'}`);
      lines.push(`  Parameters: ${JSON.stringify(tool.inputSchema)}`);
    }
    sections.push(lines.join('\n'));
  }

  if (catalog.resources.length > 0 || catalog.resourceTemplates.length > 0) {
    const lines = ['AVAILABLE RESOURCES:'];
    for (const resource of catalog.resources) {
      lines.push(`- ${resource.uri}: ${resource.description || resource.name}`);
    }
    for (const template of catalog.resourceTemplates) {
      lines.push(`- ${template.uriTemplate}: ${template.description || template.name}`);
    }
    sections.push(lines.join('\n'));
  }

  sections.push(
    'Use the tools and resources above to answer questions. Always call the appropriate tool first to get data before responding.'
  );

  return sections.join('\n\n');
}

/**
 * Text the oracle sees for a tool result
 */
export function renderToolOutcome(outcome: ToolOutcome): string {
  if (outcome.success) {
    return typeof outcome.data === 'string' ? outcome.data : JSON.stringify(outcome.data);
  }
  return JSON.stringify({ error: outcome.error });
}
