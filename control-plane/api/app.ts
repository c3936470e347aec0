import formbody from '@fastify/formbody';
import Fastify, { type FastifyInstance } from 'fastify';

import { AppError, ErrorCodes, type ErrorCode } from '@errors';
import { sendError } from '@errors/responses';
import { getLogger, toError } from '@kernel/logger';

import { exportRoutes, type ExportRouteDeps } from './routes/export';

const logger = getLogger('http');

export interface BuildAppOptions extends ExportRouteDeps {
  /** Enable Fastify's own request logging */
  requestLogging?: boolean;
}

function statusCodeOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}

/**
* Error code for a client error raised by Fastify itself (bad JSON,
* unsupported content type, oversized body)
*/
function clientErrorCode(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
      return ErrorCodes.VALIDATION_ERROR;
    case 404:
      return ErrorCodes.NOT_FOUND;
    case 405:
      return ErrorCodes.METHOD_NOT_ALLOWED;
    case 413:
      return ErrorCodes.PAYLOAD_TOO_LARGE;
    case 415:
      return ErrorCodes.UNSUPPORTED_MEDIA_TYPE;
    default:
      return ErrorCodes.INVALID_INPUT;
  }
}

/**
* Build the control-plane HTTP app. No listening, no database access:
* collaborators arrive through `options`.
*/
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.requestLogging ?? false,
    bodyLimit: 1024 * 1024,
    requestIdHeader: 'x-request-id',
  });

  // Admin forms post application/x-www-form-urlencoded
  await app.register(formbody);

  app.addHook('onSend', async (request, reply, payload) => {
    void reply.header('X-Request-ID', request.id);
    return payload;
  });

  // Global error handler: canonical { error, code, requestId, details? } body
  app.setErrorHandler((error: unknown, request, reply) => {
    if (error instanceof AppError) {
      void sendError(reply, error.statusCode, error.code, error.message, { details: error.details });
      return;
    }

    const statusCode = statusCodeOf(error);
    if (statusCode >= 500) {
      logger.error('Unhandled request error', toError(error), { url: request.url });
      void sendError(reply, 500, ErrorCodes.INTERNAL_ERROR, 'Internal server error');
      return;
    }
    void sendError(reply, statusCode, clientErrorCode(statusCode), toError(error).message);
  });

  app.setNotFoundHandler((_request, reply) => {
    void sendError(reply, 404, ErrorCodes.NOT_FOUND, 'Route not found');
  });

  await exportRoutes(app, { exporter: options.exporter });

  return app;
}
