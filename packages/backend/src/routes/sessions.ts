/**
 * Session routes
 */

import type { FastifyPluginAsync } from 'fastify';
import { SessionParamsSchema } from '../schemas/index.js';
import type { SessionStore } from '../services/session.service.js';
import { ValidationError } from '../utils/errors.js';

export interface SessionRoutesOptions {
  sessions: SessionStore;
}

const sessionRoutes: FastifyPluginAsync<SessionRoutesOptions> = async (fastify, { sessions }) => {
  /**
   * Committed conversation history of a session
   */
  fastify.get('/sessions/:sessionId/messages', async (request) => {
    const parseResult = SessionParamsSchema.safeParse(request.params);
    if (!parseResult.success) {
      throw new ValidationError('Invalid session id',
        parseResult.error.issues.map(i => ({ field: i.path.join('.'), message: i.message }))
      );
    }

    const { sessionId } = parseResult.data;
    return {
      session_id: sessionId,
      busy: sessions.isLocked(sessionId),
      messages: sessions.history(sessionId),
    };
  });
};

export default sessionRoutes;
