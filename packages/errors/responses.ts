/**
 * Standardized API response helpers.
 *
 * Every error response from every route conforms to the canonical shape:
 * { error: string, code: string, requestId: string, details?: unknown }
 */

import type { FastifyReply } from 'fastify';
import { ErrorCodes, type ErrorCode, type ErrorResponse } from './index';

/**
 * Send a standardized error response.
 * Reads X-Request-ID from the request; only includes `details` in development.
 */
export function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: ErrorCode,
  message: string,
  opts?: { details?: unknown }
): FastifyReply {
  const rawRequestId = reply.request.headers['x-request-id'];
  const requestId = (typeof rawRequestId === 'string' ? rawRequestId : Array.isArray(rawRequestId) ? rawRequestId[0] : undefined) ?? reply.request.id;
  const isDevelopment = process.env['NODE_ENV'] === 'development';
  const body: ErrorResponse = {
    error: message,
    code,
    requestId,
  };
  if (opts?.details !== undefined && isDevelopment) {
    body.details = opts.details;
  }
  return reply.status(statusCode).send(body);
}

/** Convenience helpers for common error responses. */
export const errors = {
  validationFailed: (reply: FastifyReply, details?: unknown) =>
    sendError(reply, 400, ErrorCodes.VALIDATION_ERROR, 'Validation failed', { details }),

  internal: (reply: FastifyReply, msg = 'An error occurred processing your request', code: ErrorCode = ErrorCodes.INTERNAL_ERROR) =>
    sendError(reply, 500, code, msg),
} as const;
