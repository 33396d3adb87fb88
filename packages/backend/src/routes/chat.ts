/**
 * Chat routes
 */

import type { FastifyPluginAsync } from 'fastify';
import { ChatRequestSchema } from '../schemas/index.js';
import type { ChatService } from '../services/chat.service.js';
import { ValidationError } from '../utils/errors.js';

export interface ChatRoutesOptions {
  chatService: ChatService;
}

const chatRoutes: FastifyPluginAsync<ChatRoutesOptions> = async (fastify, { chatService }) => {
  /**
   * Send a message and run one turn
   */
  fastify.post('/chat', async (request) => {
    const parseResult = ChatRequestSchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new ValidationError('Invalid request body',
        parseResult.error.issues.map(i => ({ field: i.path.join('.'), message: i.message }))
      );
    }

    const result = await chatService.sendMessage({
      message: parseResult.data.message,
      sessionId: parseResult.data.session_id,
      correlationId: request.correlationId,
    });

    return {
      reply: result.reply,
      tools: result.tools,
      session_id: result.sessionId,
      complete: result.complete,
      rounds: result.rounds,
    };
  });
};

export default chatRoutes;
