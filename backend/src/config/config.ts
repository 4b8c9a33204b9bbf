/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - MAIN CONFIGURATION
 * ============================================================================
 */

import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const numberString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

const booleanString = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((value) => value === 'true');

/**
 * Environment validation schema
 */
const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: numberString('8080'),
  APP_NAME: z.string().default('FHIR Patient Gateway'),
  API_VERSION: z.string().default('1.0.0'),

  // FHIR Server
  FHIR_SERVER_URL: z.string().url().default('https://hapi.fhir.org/baseR4'),
  FHIR_CONNECT_TIMEOUT_MS: numberString('30000'),
  FHIR_RESPONSE_TIMEOUT_MS: numberString('30000'),

  // Patients
  PATIENT_LIST_DEFAULT_COUNT: numberString('20'),

  // HTTP
  CORS_ORIGIN: z.string().default('*'),
  BODY_LIMIT: z.string().default('1mb'),

  // Rate Limiting
  RATE_LIMIT_ENABLED: booleanString('true'),
  RATE_LIMIT_WINDOW_MS: numberString('900000'), // 15 minutes
  RATE_LIMIT_MAX_REQUESTS: numberString('300'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_FILE_ENABLED: booleanString('false'),
  LOG_FILE_PATH: z.string().default('./logs'),
  LOG_MAX_SIZE: z.string().default('20m'),
  LOG_MAX_FILES: z.string().default('14d'),
});

/**
 * Build the configuration object from a set of environment variables
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }
  const env = parsed.data;

  return {
    env: env.NODE_ENV,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',

    app: {
      name: env.APP_NAME,
      version: env.API_VERSION,
    },

    server: {
      port: env.PORT,
      bodyLimit: env.BODY_LIMIT,
    },

    fhir: {
      serverUrl: env.FHIR_SERVER_URL,
      connectTimeoutMs: env.FHIR_CONNECT_TIMEOUT_MS,
      responseTimeoutMs: env.FHIR_RESPONSE_TIMEOUT_MS,
    },

    patients: {
      defaultListCount: env.PATIENT_LIST_DEFAULT_COUNT,
    },

    cors: {
      allowedOrigins: env.CORS_ORIGIN.split(',').map((origin) => origin.trim()),
    },

    rateLimit: {
      enabled: env.RATE_LIMIT_ENABLED,
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX_REQUESTS,
    },

    logging: {
      level: env.LOG_LEVEL,
      file: {
        enabled: env.LOG_FILE_ENABLED,
        path: env.LOG_FILE_PATH,
        maxSize: env.LOG_MAX_SIZE,
        maxFiles: env.LOG_MAX_FILES,
      },
    },
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

/**
 * Process-wide configuration, validated once at start-up
 */
export const config: Config = loadConfig();

export default config;
