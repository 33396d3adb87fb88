/**
 * Decision oracle types
 * Defines the conversation model and the interface for LLM adapters
 */

import type { CatalogSnapshot, ToolCallRequest, ToolOutcome } from '../tools/types.js';

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  toolCalls?: ToolCallRequest[];
}

export interface ToolMessage {
  role: 'tool';
  toolCallId: string;
  toolName: string;
  arguments: Record<string, unknown>;
  outcome: ToolOutcome;
}

/**
 * Message in conversation history
 */
export type ChatMessage = UserMessage | AssistantMessage | ToolMessage;

/**
 * Request to send to the oracle
 */
export interface OracleRequest {
  systemPrompt: string;
  messages: readonly ChatMessage[];
  catalog: CatalogSnapshot;
  signal: AbortSignal;
}

/**
 * Normalized oracle reply: either final content or tool requests
 */
export interface OracleDecision {
  content?: string;
  toolCalls: ToolCallRequest[];
}

/**
 * Oracle adapter interface
 * Each model vendor implements this interface
 */
export interface DecisionOracle {
  readonly name: string;

  decide(request: OracleRequest): Promise<OracleDecision>;
}
