/**
 * Request/Response validation schemas using Zod
 */

import { z } from 'zod';

// ============================================================================
// Chat
// ============================================================================

export const SessionIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .regex(/^[\w.:-]+$/, 'Session id may only contain letters, digits, _ . : -');

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, 'Empty message').max(20000),
  session_id: SessionIdSchema.optional(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

// ============================================================================
// Sessions
// ============================================================================

export const SessionParamsSchema = z.object({
  sessionId: SessionIdSchema,
});

export type SessionParams = z.infer<typeof SessionParamsSchema>;
