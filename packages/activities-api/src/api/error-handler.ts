/**
 * Error handling middleware for API
 */

import type { Request, Response, NextFunction } from 'express';
import {
  RegistryError,
  ErrorCodes,
  ValidationError,
  wrapError,
} from '@mergington/activities-core';
import { DebugLogger } from '@mergington/activities-core/debug-logger';
import { ApiError, type ApiErrorCode, type ApiErrorResponse } from './types.js';

const logger = new DebugLogger('api');

/**
 * Express error handling middleware
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const apiError = err instanceof ApiError ? err : toClientApiError(err);
  if (apiError) {
    logger.warn(`${req.method} ${req.path} -> ${apiError.statusCode}: ${err.message}`);
    res.status(apiError.statusCode).json(apiError.toResponse());
    return;
  }

  if (err instanceof RegistryError) {
    const statusCode = getStatusCodeForRegistryError(err.code);
    logger.warn(`${req.method} ${req.path} -> ${statusCode}: ${err.message}`);
    const response: ApiErrorResponse = {
      detail: err.message,
      code: mapRegistryErrorCode(err.code),
    };
    res.status(statusCode).json(response);
    return;
  }

  logger.error(wrapError(err, `${req.method} ${req.path}`).toJSON());
  const response: ApiErrorResponse = {
    detail: 'Internal Server Error',
    code: 'INTERNAL_ERROR',
  };
  res.status(500).json(response);
}

/**
 * Turn a 4xx status set by Express or its middleware (e.g. a route param
 * with malformed percent-encoding) into a Bad Request
 */
function toClientApiError(err: Error): ApiError | undefined {
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status <= 499) {
    return new ApiError('Bad Request', status, 'BAD_REQUEST');
  }
  return undefined;
}

/**
 * Map RegistryError code to HTTP status code
 */
function getStatusCodeForRegistryError(code: string): number {
  switch (code) {
    case ErrorCodes.ACTIVITY_NOT_FOUND:
      return 404;
    case ErrorCodes.ALREADY_SIGNED_UP:
    case ErrorCodes.NOT_SIGNED_UP:
    case ErrorCodes.ACTIVITY_FULL:
      return 400;
    case ErrorCodes.INVALID_INPUT:
      return 422;
    default:
      return 500;
  }
}

/**
 * Map RegistryError code to ApiErrorCode
 */
function mapRegistryErrorCode(code: string): ApiErrorCode {
  switch (code) {
    case ErrorCodes.ACTIVITY_NOT_FOUND:
      return 'NOT_FOUND';
    case ErrorCodes.ALREADY_SIGNED_UP:
      return 'ALREADY_SIGNED_UP';
    case ErrorCodes.NOT_SIGNED_UP:
      return 'NOT_SIGNED_UP';
    case ErrorCodes.ACTIVITY_FULL:
      return 'ACTIVITY_FULL';
    case ErrorCodes.INVALID_INPUT:
      return 'VALIDATION_ERROR';
    default:
      return 'INTERNAL_ERROR';
  }
}

/**
 * Read a required, non-empty query string parameter
 *
 * Surrounding whitespace is trimmed. A repeated parameter uses its last value.
 */
export function requireQueryParam(req: Request, name: string): string {
  const raw = req.query[name];
  const value = Array.isArray(raw) ? raw[raw.length - 1] : raw;

  if (value === undefined) {
    throw new ValidationError(name, 'query parameter is required');
  }
  if (typeof value !== 'string') {
    throw new ValidationError(name, 'must be a string');
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(name, 'must not be empty', value);
  }
  return trimmed;
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response, _next: NextFunction): void {
  logger.debug(`Route not found: ${req.method} ${req.path}`);
  const response: ApiErrorResponse = {
    detail: 'Not Found',
    code: 'NOT_FOUND',
  };
  res.status(404).json(response);
}
