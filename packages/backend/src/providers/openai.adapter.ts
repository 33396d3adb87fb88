/**
 * OpenAI Provider Adapter
 * Chat Completions with function tools as the decision oracle
 */

import OpenAI from 'openai';
import { logger } from '../utils/logger.js';
import type { CatalogSnapshot, ToolCallRequest } from '../tools/types.js';
import { renderToolOutcome } from './prompt.js';
import type { ChatMessage, DecisionOracle, OracleDecision, OracleRequest } from './types.js';

type MessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;
type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;

export interface OpenAIOracleOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature: number;
}

export class OpenAIOracle implements DecisionOracle {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIOracleOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      // A failed oracle call ends the turn; the user retries
      maxRetries: 0,
    });
  }

  async decide(request: OracleRequest): Promise<OracleDecision> {
    const startTime = Date.now();
    const tools = toChatTools(request.catalog);

    const completion = await this.client.chat.completions.create(
      {
        model: this.options.model,
        messages: toChatMessages(request.systemPrompt, request.messages),
        tools: tools.length > 0 ? tools : undefined,
        tool_choice: tools.length > 0 ? 'auto' : undefined,
        temperature: this.options.temperature,
      },
      { signal: request.signal }
    );

    logger.debug(
      {
        model: completion.model,
        tokensIn: completion.usage?.prompt_tokens ?? 0,
        tokensOut: completion.usage?.completion_tokens ?? 0,
        latencyMs: Date.now() - startTime,
      },
      'OpenAI completion received'
    );

    return fromCompletion(completion);
  }
}

/**
 * Conversation history in Chat Completions form, system prompt first
 */
export function toChatMessages(systemPrompt: string, messages: readonly ChatMessage[]): MessageParam[] {
  const params: MessageParam[] = [{ role: 'system', content: systemPrompt }];

  for (const message of messages) {
    switch (message.role) {
      case 'user':
        params.push({ role: 'user', content: message.content });
        break;
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          params.push({
            role: 'assistant',
            content: message.content,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.toolName, arguments: JSON.stringify(call.arguments) },
            })),
          });
        } else {
          params.push({ role: 'assistant', content: message.content });
        }
        break;
      case 'tool':
        params.push({
          role: 'tool',
          tool_call_id: message.toolCallId,
          content: renderToolOutcome(message.outcome),
        });
        break;
    }
  }

  return params;
}

export function toChatTools(catalog: CatalogSnapshot): ChatTool[] {
  return catalog.tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

export function fromCompletion(completion: ChatCompletion): OracleDecision {
  const choice = completion.choices[0];
  if (!choice) {
    throw new Error('OpenAI returned a completion without choices');
  }

  const toolCalls: ToolCallRequest[] = (choice.message.tool_calls ?? []).map((call) => ({
    id: call.id,
    toolName: call.function.name,
    arguments: parseArguments(call.function.arguments, call.function.name),
  }));

  return {
    content: choice.message.content ?? undefined,
    toolCalls,
  };
}

function parseArguments(raw: string, toolName: string): Record<string, unknown> {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    parsed = undefined;
  }
  if (isRecord(parsed)) {
    return parsed;
  }
  logger.warn({ toolName, raw }, 'Unparseable tool arguments, using {}');
  return {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
