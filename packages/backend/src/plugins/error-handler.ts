/**
 * Global error handler plugin
 * Ensures consistent error responses without leaking internal details
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { AppError, ValidationError, InternalError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error, request, reply) => {
    const correlationId = request.correlationId;

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      const validationError = new ValidationError(
        'Invalid request',
        error.errors.map((e) => ({
          field: e.path.join('.'),
          message: e.message,
        }))
      );

      logger.warn(
        {
          error: 'VALIDATION_ERROR',
          validationErrors: validationError.details,
          correlationId,
          method: request.method,
          url: request.url,
        },
        'Request validation failed'
      );

      return reply
        .status(validationError.statusCode)
        .send(validationError.toResponse(correlationId));
    }

    // Handle application errors
    if (error instanceof AppError) {
      const logContext = {
        errorCode: error.code,
        errorMessage: error.message,
        errorDetails: error.details,
        statusCode: error.statusCode,
        correlationId,
        method: request.method,
        url: request.url,
      };

      // Log non-client errors
      if (error.statusCode >= 500) {
        logger.error({ ...logContext, stack: error.stack }, `${error.code}: ${error.message}`);
      } else {
        logger.warn(logContext, `${error.code}: ${error.message}`);
      }

      return reply.status(error.statusCode).send(error.toResponse(correlationId));
    }

    // Handle Fastify validation errors
    if (error.validation) {
      const validationError = new ValidationError(
        'Invalid request',
        error.validation.map((v) => ({
          field: v.instancePath.replace(/^\//, ''),
          message: v.message || 'Invalid value',
        }))
      );
      return reply
        .status(validationError.statusCode)
        .send(validationError.toResponse(correlationId));
    }

    // Malformed JSON bodies and other client errors raised by Fastify itself
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      const validationError = new ValidationError(error.message);
      return reply.status(error.statusCode).send(validationError.toResponse(correlationId));
    }

    // Handle unknown errors - don't leak details
    logger.error(
      {
        errorName: error.name,
        errorCode: error.code,
        errorMessage: error.message,
        correlationId,
        method: request.method,
        url: request.url,
        stack: error.stack,
      },
      `Unhandled error: ${error.name} - ${error.message}`
    );

    const internalError = new InternalError();
    return reply
      .status(internalError.statusCode)
      .send(internalError.toResponse(correlationId));
  });

  // Handle 404
  fastify.setNotFoundHandler((request, reply) => {
    reply.status(404).send({
      error: {
        code: 'NOT_FOUND',
        message: 'Route not found',
        correlationId: request.correlationId,
      },
    });
  });
};

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
});
