/**
 * Provider module exports
 */

import type { Config } from '../config/index.js';
import { MockOracle } from './mock.adapter.js';
import { OpenAIOracle } from './openai.adapter.js';
import type { DecisionOracle } from './types.js';

export * from './types.js';
export { buildSystemPrompt, renderToolOutcome } from './prompt.js';
export { OpenAIOracle } from './openai.adapter.js';
export { MockOracle } from './mock.adapter.js';

export function createOracle(oracleConfig: Config['oracle']): DecisionOracle {
  if (oracleConfig.provider === 'mock') {
    return new MockOracle();
  }
  if (!oracleConfig.apiKey) {
    throw new Error('OPENAI_API_KEY not set');
  }
  return new OpenAIOracle({
    apiKey: oracleConfig.apiKey,
    model: oracleConfig.model,
    baseUrl: oracleConfig.baseUrl,
    temperature: oracleConfig.temperature,
  });
}
