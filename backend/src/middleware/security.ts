/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - SECURITY MIDDLEWARE
 * ============================================================================
 */

import type { RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import cors from 'cors';
import type { Config } from '../config/config';
import logger from '../config/logger';
import { AppError } from './errorHandler';

/**
 * CORS configuration
 */
export function configureCORS(config: Config): RequestHandler {
  const { allowedOrigins } = config.cors;

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Allow requests with no origin (server-to-server, curl)
      if (!origin || allowedOrigins.includes(origin) || allowedOrigins.includes('*')) {
        callback(null, true);
        return;
      }

      logger.warn('CORS origin blocked', { origin, allowedOrigins });
      callback(new AppError(`Origin ${origin} is not allowed`, 403, true, 'CORS_ORIGIN_DENIED'));
    },
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Origin', 'X-Requested-With', 'Content-Type', 'Accept', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'RateLimit', 'RateLimit-Policy'],
    maxAge: 86400, // 24 hours
    optionsSuccessStatus: 204,
  };

  return cors(corsOptions);
}

/**
 * Helmet security headers configuration. The API serves JSON only.
 */
export function configureHelmet(): RequestHandler {
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    crossOriginEmbedderPolicy: false,
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'no-referrer' },
  });
}

/**
 * General API rate limiting
 */
export function configureRateLimiter(config: Config): RequestHandler {
  return rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.max,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    skip: (req) => !config.rateLimit.enabled || req.path === '/api/health',
    handler: (req, res, next) => {
      logger.warn('Rate limit exceeded', {
        ipAddress: req.ip,
        path: req.path,
      });

      next(new AppError('Rate limit exceeded. Please try again later.', 429, true, 'RATE_LIMIT_EXCEEDED'));
    },
  });
}
