/**
 * Fastify type augmentations
 */

declare module 'fastify' {
  interface FastifyRequest {
    // Request tracing
    correlationId: string;
  }
}

export {};
