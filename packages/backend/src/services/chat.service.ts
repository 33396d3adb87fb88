/**
 * Chat service
 * Core message processing with:
 * - Session locking (one turn in flight per session)
 * - Catalog discovery
 * - Orchestration loop
 * - Commit of the finished turn to the session store
 */

import type { CatalogRefreshMode } from '../config/index.js';
import { generateCorrelationId, generateId } from '../utils/crypto.js';
import { SessionBusyError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ToolCatalog } from '../tools/catalog.js';
import type { CatalogSnapshot } from '../tools/types.js';
import type { Orchestrator } from './orchestration.service.js';
import type { SessionStore } from './session.service.js';

export interface SendMessageInput {
  message: string;
  sessionId?: string;
  correlationId?: string;
}

export interface ChatReply {
  sessionId: string;
  reply: string;
  tools: string[];
  complete: boolean;
  rounds: number;
}

export interface ChatServiceOptions {
  catalogRefresh: CatalogRefreshMode;
  sweepIntervalMs?: number;
}

export class ChatService {
  private sweeper: NodeJS.Timeout | null = null;

  constructor(
    private readonly sessions: SessionStore,
    private readonly catalog: ToolCatalog,
    private readonly orchestrator: Orchestrator,
    private readonly options: ChatServiceOptions
  ) {}

  /**
   * Run one turn for a session:
   * 1. Acquire session lock
   * 2. Ensure the tool catalog
   * 3. Run the orchestration loop on a copy of the history
   * 4. Commit the turn's messages
   * 5. Release lock
   */
  async sendMessage(input: SendMessageInput): Promise<ChatReply> {
    const content = input.message.trim();
    if (!content) {
      throw new ValidationError('Empty message', [{ field: 'message', message: 'Message must not be empty' }]);
    }

    const sessionId = input.sessionId?.trim() || generateId('sess');
    const correlationId = input.correlationId || generateCorrelationId();
    const log = logger.child({ correlationId, sessionId });

    if (!this.sessions.tryLock(sessionId)) {
      log.warn('Failed to acquire session lock');
      throw new SessionBusyError(sessionId);
    }
    log.debug('Session lock acquired');

    try {
      const catalog = await this.ensureCatalog();
      // The session is created by the commit, so a failed first turn leaves nothing behind
      const history = this.sessions.get(sessionId)?.history ?? [];

      log.info({ historyLength: history.length, tools: catalog.tools.length }, 'Processing message');

      const outcome = await this.orchestrator.runTurn({
        history: [...history],
        userMessage: content,
        catalog,
        context: { correlationId, sessionId },
      });

      this.sessions.append(sessionId, ...outcome.messages);
      log.info(
        { status: outcome.status, rounds: outcome.rounds, appended: outcome.messages.length },
        'Turn committed'
      );

      return {
        sessionId,
        reply: outcome.reply,
        tools: outcome.toolsInvoked,
        complete: outcome.status === 'complete',
        rounds: outcome.rounds,
      };
    } finally {
      this.sessions.unlock(sessionId);
      log.debug('Session lock released');
    }
  }

  /**
   * Catalog for the next turn, per the configured refresh cadence
   */
  async ensureCatalog(): Promise<CatalogSnapshot> {
    if (this.options.catalogRefresh === 'once' && this.catalog.isInitialized()) {
      return this.catalog.get();
    }
    return this.catalog.refresh();
  }

  /**
   * Periodically evict idle sessions
   */
  startSweeper(): void {
    if (this.sweeper || !this.options.sweepIntervalMs) return;
    this.sweeper = setInterval(() => this.sessions.evictIdle(), this.options.sweepIntervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }
}
