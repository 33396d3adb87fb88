/**
 * Mock Oracle Adapter
 * Offline, keyword-driven stand-in for the language model:
 * - "cluster" questions trigger list_clusters
 * - "customer" questions read the customers resource
 * - tool results are summarized back to the user
 */

import { READ_RESOURCE_TOOL } from '../tools/catalog.js';
import type { ToolCallRequest } from '../tools/types.js';
import { renderToolOutcome } from './prompt.js';
import type { ChatMessage, DecisionOracle, OracleDecision, OracleRequest, ToolMessage } from './types.js';

const CUSTOMERS_URI = 'cassandra://inventory/customers';

export class MockOracle implements DecisionOracle {
  readonly name = 'mock';
  private callCounter = 0;

  async decide(request: OracleRequest): Promise<OracleDecision> {
    const last = request.messages[request.messages.length - 1];

    // Second call of a round: tool results are the newest messages
    if (last?.role === 'tool') {
      return { content: this.summarize(trailingToolMessages(request.messages)), toolCalls: [] };
    }

    const text = last?.role === 'user' ? last.content : '';
    const lower = text.toLowerCase();
    const available = new Set(request.catalog.tools.map((t) => t.name));

    if (lower.includes('cluster') && available.has('list_clusters')) {
      return { content: '', toolCalls: [this.toolCall('list_clusters', {})] };
    }

    if (lower.includes('customer') && available.has(READ_RESOURCE_TOOL)) {
      return { content: '', toolCalls: [this.toolCall(READ_RESOURCE_TOOL, { uri: CUSTOMERS_URI })] };
    }

    return { content: this.generateMockResponse(text, [...available]), toolCalls: [] };
  }

  private toolCall(toolName: string, args: Record<string, unknown>): ToolCallRequest {
    this.callCounter++;
    return { id: `call_mock_${this.callCounter}`, toolName, arguments: args };
  }

  private summarize(results: ToolMessage[]): string {
    const lines = results.map((result) =>
      result.outcome.success
        ? `- ${result.toolName}: ${renderToolOutcome(result.outcome)}`
        : `- ${result.toolName} failed: ${result.outcome.error.message}`
    );
    return `Here is what I found:\n${lines.join('\n')}`;
  }

  private generateMockResponse(userMessage: string, tools: string[]): string {
    const lowerMessage = userMessage.toLowerCase();

    if (/\b(hello|hi)\b/.test(lowerMessage)) {
      return "Hello! I'm Cassandra Doctor. Ask me about your clusters, nodes, metrics or logs.";
    }

    if (lowerMessage.includes('help')) {
      return `I can use these tools:\n${tools.map((t) => `- ${t}`).join('\n')}`;
    }

    return `I understand you're asking about "${userMessage.substring(0, 50)}${userMessage.length > 50 ? '...' : ''}". Try asking about clusters or customers.`;
  }
}

function trailingToolMessages(messages: readonly ChatMessage[]): ToolMessage[] {
  const results: ToolMessage[] = [];
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message.role !== 'tool') break;
    results.unshift(message);
  }
  return results;
}
