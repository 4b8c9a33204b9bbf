/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - ERROR HANDLING MIDDLEWARE
 * ============================================================================
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import logger from '../config/logger';
import type { FieldError } from '../types';

export type ErrorDetails = Record<string, unknown>;

export const GENERIC_ERROR_MESSAGE = 'An unexpected error occurred. Please try again later.';

/**
 * Custom error classes
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly errorCode: string;
  public readonly details?: ErrorDetails;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    errorCode: string = 'INTERNAL_ERROR',
    details?: ErrorDetails
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.errorCode = errorCode;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * One message per field; the first failure reported for a field wins.
 */
export function toFieldMessages(errors: FieldError[]): Record<string, string> {
  const messages: Record<string, string> = {};
  for (const { field, message } of errors) {
    if (!(field in messages)) {
      messages[field] = message;
    }
  }
  return messages;
}

export class ValidationError extends AppError {
  constructor(message: string, fieldErrors: FieldError[] = []) {
    super(
      message,
      400,
      true,
      'VALIDATION_ERROR',
      fieldErrors.length > 0 ? toFieldMessages(fieldErrors) : undefined
    );
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, true, 'NOT_FOUND_ERROR');
  }
}

/**
 * A FHIR server answered with an error status, or could not be reached.
 * `statusCode` is the remote status when there was one, 502 otherwise.
 */
export class FHIRServerError extends AppError {
  public readonly operation: string;
  public readonly remoteStatus?: number;

  constructor(operation: string, message: string, remoteStatus?: number) {
    super(message, remoteStatus ?? 502, true, 'FHIR_SERVER_ERROR', {
      operation,
      ...(remoteStatus !== undefined ? { remoteStatus } : {}),
    });
    this.operation = operation;
    this.remoteStatus = remoteStatus;
  }

  get isNotFound(): boolean {
    return this.remoteStatus === 404 || this.remoteStatus === 410;
  }
}

/**
 * Error response interface
 */
export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  errorCode: string;
  details?: ErrorDetails;
  timestamp: string;
  path: string;
  requestId?: string;
}

interface BodyParserError extends Error {
  type: string;
  status?: number;
}

function isBodyParserError(error: Error): error is BodyParserError {
  return 'type' in error && typeof error.type === 'string' && error.type.startsWith('entity.');
}

/**
 * Convert anything thrown inside a request into an AppError
 */
export function normalizeError(error: Error): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (isBodyParserError(error)) {
    if (error.type === 'entity.parse.failed') {
      return new ValidationError('Malformed JSON request body', [
        { field: 'body', message: 'Request body must be valid JSON' },
      ]);
    }
    if (error.type === 'entity.too.large') {
      return new AppError('Request body too large', 413, true, 'PAYLOAD_TOO_LARGE');
    }
    return new ValidationError(error.message);
  }

  return new AppError(GENERIC_ERROR_MESSAGE, 500, false);
}

function requestIdOf(res: Response): string | undefined {
  const { requestId } = res.locals;
  return typeof requestId === 'string' ? requestId : undefined;
}

/**
 * Format error response
 */
function formatErrorResponse(error: AppError, req: Request, res: Response): ErrorResponse {
  return {
    error: error.name,
    message: error.isOperational ? error.message : GENERIC_ERROR_MESSAGE,
    statusCode: error.statusCode,
    errorCode: error.errorCode,
    details: error.isOperational ? error.details : undefined,
    timestamp: new Date().toISOString(),
    path: req.originalUrl,
    requestId: requestIdOf(res),
  };
}

/**
 * Log error with appropriate level
 */
function logError(original: Error, appError: AppError, req: Request, res: Response): void {
  const logData = {
    error: original.message,
    errorCode: appError.errorCode,
    stack: appError.isOperational ? undefined : original.stack,
    statusCode: appError.statusCode,
    details: appError.details,
    method: req.method,
    path: req.originalUrl,
    requestId: requestIdOf(res),
  };

  if (appError.statusCode >= 500 || appError instanceof FHIRServerError) {
    logger.error('Server error', logData);
  } else {
    logger.warn('Client error', logData);
  }
}

/**
 * Main error handling middleware
 */
export function errorHandler() {
  return (error: Error, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const appError = normalizeError(error);
    logError(error, appError, req, res);

    res.status(appError.statusCode).json(formatErrorResponse(appError, req, res));
  };
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler() {
  return (req: Request, res: Response, next: NextFunction): void => {
    next(new AppError(`${req.method} ${req.originalUrl} is not a valid endpoint`, 404, true, 'ROUTE_NOT_FOUND'));
  };
}

/**
 * Async error wrapper
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
