/**
 * Orchestration loop
 * Drives one turn: ask the oracle, run the tools it requests, feed the
 * results back, until it answers or the round cap is reached.
 *
 *   AWAITING_ORACLE --(content, no tool calls)--> DONE (complete)
 *   AWAITING_ORACLE --(tool calls)--> EXECUTING_TOOLS
 *   EXECUTING_TOOLS --(round < maxRounds)--> AWAITING_ORACLE
 *   EXECUTING_TOOLS --(round = maxRounds)--> DONE (round_cap_exceeded)
 *
 * Tool failures are recorded in the history and never end the turn.
 * Oracle failures end the turn with OracleError.
 */

import { OracleError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { buildSystemPrompt } from '../providers/prompt.js';
import type { ChatMessage, DecisionOracle, OracleDecision } from '../providers/types.js';
import type { InvocationContext, ToolInvoker } from '../tools/invoker.js';
import { LOCAL_REJECTION_CODES, type CatalogSnapshot, type ToolCallRequest } from '../tools/types.js';

export type TurnState = 'AWAITING_ORACLE' | 'EXECUTING_TOOLS' | 'DONE';
export type TurnStatus = 'complete' | 'round_cap_exceeded';

export interface OrchestratorOptions {
  maxRounds: number;
  oracleTimeoutMs: number;
}

export interface TurnInput {
  /** Committed history before this turn; not modified */
  history: readonly ChatMessage[];
  userMessage: string;
  catalog: CatalogSnapshot;
  context: InvocationContext;
}

export interface TurnOutcome {
  status: TurnStatus;
  reply: string;
  /** Tools that reached the tool server, first-invocation order, no duplicates */
  toolsInvoked: string[];
  rounds: number;
  /** Messages produced by this turn, user message first */
  messages: ChatMessage[];
}

export class Orchestrator {
  constructor(
    private readonly oracle: DecisionOracle,
    private readonly invoker: ToolInvoker,
    private readonly options: OrchestratorOptions
  ) {
    if (!Number.isInteger(options.maxRounds) || options.maxRounds < 1) {
      throw new Error(`maxRounds must be a positive integer, got ${options.maxRounds}`);
    }
  }

  async runTurn(input: TurnInput): Promise<TurnOutcome> {
    const log = logger.child({
      correlationId: input.context.correlationId,
      sessionId: input.context.sessionId,
    });

    const working: ChatMessage[] = [...input.history];
    const produced: ChatMessage[] = [];
    const record = (message: ChatMessage): void => {
      working.push(message);
      produced.push(message);
    };

    record({ role: 'user', content: input.userMessage });

    const systemPrompt = buildSystemPrompt(input.catalog);
    const toolsInvoked: string[] = [];
    let state: TurnState = 'AWAITING_ORACLE';
    let status: TurnStatus = 'complete';
    let rounds = 0;
    let lastContent = '';
    let pending: ToolCallRequest[] = [];

    while (state !== 'DONE') {
      if (state === 'AWAITING_ORACLE') {
        rounds++;
        log.info({ round: rounds, messages: working.length }, 'Consulting oracle');

        const decision = await this.consult(systemPrompt, working, input.catalog, rounds);
        lastContent = decision.content ?? '';

        if (decision.toolCalls.length === 0) {
          record({ role: 'assistant', content: lastContent });
          state = 'DONE';
          continue;
        }

        log.info(
          { round: rounds, toolCalls: decision.toolCalls.map((c) => c.toolName) },
          'Oracle requested tools'
        );
        record({ role: 'assistant', content: lastContent, toolCalls: decision.toolCalls });
        pending = decision.toolCalls;
        state = 'EXECUTING_TOOLS';
        continue;
      }

      // EXECUTING_TOOLS: sequential, in the order the oracle gave
      for (const call of pending) {
        const result = await this.invoker.invoke(call, input.context);
        const reachedServer =
          result.outcome.success || !LOCAL_REJECTION_CODES.includes(result.outcome.error.code);
        if (reachedServer && !toolsInvoked.includes(call.toolName)) {
          toolsInvoked.push(call.toolName);
        }
        record({ role: 'tool', ...result });
      }
      pending = [];

      if (rounds >= this.options.maxRounds) {
        log.warn({ rounds, maxRounds: this.options.maxRounds }, 'Round cap reached without final answer');
        record({ role: 'assistant', content: lastContent });
        status = 'round_cap_exceeded';
        state = 'DONE';
      } else {
        state = 'AWAITING_ORACLE';
      }
    }

    log.info({ status, rounds, toolsInvoked }, 'Turn finished');

    return {
      status,
      reply: lastContent,
      toolsInvoked,
      rounds,
      messages: produced,
    };
  }

  private async consult(
    systemPrompt: string,
    messages: readonly ChatMessage[],
    catalog: CatalogSnapshot,
    round: number
  ): Promise<OracleDecision> {
    try {
      return await withTimeout(
        (signal) =>
          this.oracle.decide({
            systemPrompt,
            messages: [...messages],
            catalog,
            signal,
          }),
        this.options.oracleTimeoutMs,
        `Oracle '${this.oracle.name}'`
      );
    } catch (error) {
      logger.error({ round, oracle: this.oracle.name, error: errorMessage(error) }, 'Oracle call failed');
      throw new OracleError(`Decision oracle call failed: ${errorMessage(error)}`, round, error);
    }
  }
}
