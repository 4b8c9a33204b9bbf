/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - REQUEST LOGGER MIDDLEWARE
 * ============================================================================
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger from '../config/logger';

/**
 * Request logger middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const incoming = req.headers['x-request-id'];
  const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : uuidv4();

  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  logger.debug('Request started', {
    requestId,
    method: req.method,
    url: req.originalUrl,
    ipAddress: req.ip,
  });

  res.on('finish', () => {
    logger.api('Request completed', {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
      requestId,
      ipAddress: req.ip,
      userAgent: req.headers['user-agent'],
    });
  });

  next();
}

export default requestLogger;
