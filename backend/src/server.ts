/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - SERVER ENTRY POINT
 * ============================================================================
 */

import App from './app';
import { config } from './config/config';
import logger from './config/logger';
import { AxiosFHIRTransport } from './services/fhirTransport';
import { PatientGateway } from './services/patientGateway';

/**
 * Wire the transport, gateway and HTTP application together
 */
export function createApplication(): App {
  const transport = new AxiosFHIRTransport({
    baseUrl: config.fhir.serverUrl,
    connectTimeoutMs: config.fhir.connectTimeoutMs,
    responseTimeoutMs: config.fhir.responseTimeoutMs,
  });

  const gateway = new PatientGateway(transport, {
    defaultListCount: config.patients.defaultListCount,
  });

  return new App({ config, gateway, transport });
}

function registerProcessHandlers(app: App): void {
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    app.shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    process.exit(1);
  });
}

/**
 * Main server entry point
 */
async function main(): Promise<void> {
  logger.info('Starting FHIR Patient Gateway...', {
    version: config.app.version,
    environment: config.env,
    nodeVersion: process.version,
    pid: process.pid,
  });

  const app = createApplication();
  registerProcessHandlers(app);
  await app.start();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Failed to start FHIR Patient Gateway', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}

export default main;
