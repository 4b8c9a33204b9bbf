/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - MAIN APPLICATION SERVER
 * ============================================================================
 */

import express, { type Application, type Request, type Response } from 'express';
import compression from 'compression';
import morgan from 'morgan';
import type { Server } from 'http';
import type { Config } from './config/config';
import logger, { morganStream } from './config/logger';
import createRoutes from './routes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { configureCORS, configureHelmet, configureRateLimiter } from './middleware/security';
import type { FHIRTransport } from './services/fhirTransport';
import type { PatientGateway } from './services/patientGateway';

export interface AppDependencies {
  config: Config;
  gateway: PatientGateway;
  transport: FHIRTransport;
}

class App {
  public readonly app: Application;
  private server?: Server;
  private readonly config: Config;

  constructor(private readonly deps: AppDependencies) {
    this.config = deps.config;
    this.app = express();
    this.initializeMiddleware();
    this.initializeRoutes();
    this.initializeErrorHandling();
  }

  /**
   * Initialize middleware
   */
  private initializeMiddleware(): void {
    // Trust proxy (for rate limiting and IP detection)
    this.app.set('trust proxy', 1);
    this.app.disable('x-powered-by');

    // Security middleware
    this.app.use(configureHelmet());
    this.app.use(configureCORS(this.config));

    this.app.use(compression());

    // Body parsing middleware
    this.app.use(express.json({
      limit: this.config.server.bodyLimit,
      type: ['application/json', 'application/*+json'],
    }));

    // Request logging
    this.app.use(morgan(this.config.isDevelopment ? 'dev' : 'combined', { stream: morganStream }));
    this.app.use(requestLogger);

    this.app.use(configureRateLimiter(this.config));
  }

  /**
   * Initialize routes
   */
  private initializeRoutes(): void {
    this.app.get('/', (req: Request, res: Response) => {
      res.json({
        name: this.config.app.name,
        version: this.config.app.version,
        health: '/api/health',
        patients: '/api/patients',
        environment: this.config.env,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.use('/api', createRoutes(this.deps));

    // Catch-all for undefined routes
    this.app.use(notFoundHandler());
  }

  /**
   * Initialize error handling
   */
  private initializeErrorHandling(): void {
    this.app.use(errorHandler());
  }

  /**
   * Start the server
   */
  public async start(): Promise<void> {
    const port = this.config.server.port;

    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(port, () => {
        logger.info('FHIR Patient Gateway started', {
          port,
          environment: this.config.env,
          fhirServer: this.config.fhir.serverUrl,
          version: this.config.app.version,
        });
        resolve();
      });

      server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error(`Port ${port} is already in use`);
        } else if (error.code === 'EACCES') {
          logger.error(`Port ${port} requires elevated privileges`);
        }
        reject(error);
      });

      this.server = server;
    });
  }

  /**
   * Graceful shutdown
   */
  public async shutdown(): Promise<void> {
    logger.info('Shutting down server gracefully...');

    const server = this.server;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
    this.server = undefined;

    logger.info('HTTP server closed');
  }
}

export { App };
export default App;
