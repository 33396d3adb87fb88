/**
 * OpenAI adapter mapping tests
 */

import { describe, it, expect } from 'vitest';
import type OpenAI from 'openai';
import { fromCompletion, toChatMessages, toChatTools } from '../../providers/openai.adapter.js';
import type { CatalogSnapshot } from '../../tools/types.js';

type ToolCallParam = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;

function completion(content: string | null, toolCalls?: ToolCallParam[]): OpenAI.Chat.Completions.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        finish_reason: toolCalls ? 'tool_calls' : 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null, tool_calls: toolCalls },
      },
    ],
  };
}

function fnCall(id: string, name: string, args: string): ToolCallParam {
  return { id, type: 'function', function: { name, arguments: args } };
}

describe('OpenAI adapter', () => {
  describe('toChatMessages', () => {
    it('should put the system prompt first and map every role', () => {
      const params = toChatMessages('SYSTEM', [
        { role: 'user', content: 'List all clusters' },
        {
          role: 'assistant',
          content: '',
          toolCalls: [{ id: 'call_1', toolName: 'list_clusters', arguments: { customer: 'Contoso' } }],
        },
        {
          role: 'tool',
          toolCallId: 'call_1',
          toolName: 'list_clusters',
          arguments: { customer: 'Contoso' },
          outcome: { success: true, data: ['nova-prod'] },
        },
        { role: 'assistant', content: 'You have 1 cluster.' },
      ]);

      expect(params).toEqual([
        { role: 'system', content: 'SYSTEM' },
        { role: 'user', content: 'List all clusters' },
        {
          role: 'assistant',
          content: '',
          tool_calls: [
            {
              id: 'call_1',
              type: 'function',
              function: { name: 'list_clusters', arguments: '{"customer":"Contoso"}' },
            },
          ],
        },
        { role: 'tool', tool_call_id: 'call_1', content: '["nova-prod"]' },
        { role: 'assistant', content: 'You have 1 cluster.' },
      ]);
    });
  });

  describe('toChatTools', () => {
    it('should expose catalog tools as functions', () => {
      const catalog: CatalogSnapshot = {
        tools: [{ name: 'node_health', description: 'Node health', inputSchema: { type: 'object' } }],
        resources: [],
        resourceTemplates: [],
        fetchedAt: new Date(0),
      };

      expect(toChatTools(catalog)).toEqual([
        {
          type: 'function',
          function: { name: 'node_health', description: 'Node health', parameters: { type: 'object' } },
        },
      ]);
    });
  });

  describe('fromCompletion', () => {
    it('should return final content without tool calls', () => {
      expect(fromCompletion(completion('You have 3 clusters.'))).toEqual({
        content: 'You have 3 clusters.',
        toolCalls: [],
      });
    });

    it('should parse tool calls in order', () => {
      const decision = fromCompletion(
        completion(null, [
          fnCall('call_a', 'list_clusters', '{}'),
          fnCall('call_b', 'node_health', '{"customer":"Contoso","cluster":"nova-prod","node":"10.0.1.10"}'),
        ])
      );

      expect(decision).toEqual({
        content: undefined,
        toolCalls: [
          { id: 'call_a', toolName: 'list_clusters', arguments: {} },
          {
            id: 'call_b',
            toolName: 'node_health',
            arguments: { customer: 'Contoso', cluster: 'nova-prod', node: '10.0.1.10' },
          },
        ],
      });
    });

    it('should fall back to empty arguments for malformed JSON', () => {
      const decision = fromCompletion(completion(null, [fnCall('call_x', 'list_clusters', '{not json')]));
      expect(decision.toolCalls[0]?.arguments).toEqual({});
    });

    it('should fall back to empty arguments for non-object JSON', () => {
      const decision = fromCompletion(completion(null, [fnCall('call_y', 'list_clusters', '[1,2]')]));
      expect(decision.toolCalls[0]?.arguments).toEqual({});
    });

    it('should throw when there are no choices', () => {
      expect(() => fromCompletion({ ...completion('x'), choices: [] })).toThrow(
        'OpenAI returned a completion without choices'
      );
    });
  });
});
