/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - ROUTES INDEX
 * ============================================================================
 *
 * Central routing configuration: health check plus the patient resource.
 */

import { Router, type Request, type Response } from 'express';
import logger from '../config/logger';
import type { Config } from '../config/config';
import { asyncHandler } from '../middleware/errorHandler';
import type { FHIRTransport } from '../services/fhirTransport';
import type { PatientGateway } from '../services/patientGateway';
import type { HealthReport } from '../types';
import { createPatientRouter } from './patients';

export interface RouteDependencies {
  config: Config;
  gateway: PatientGateway;
  transport: FHIRTransport;
}

export function createRoutes({ config, gateway, transport }: RouteDependencies): Router {
  const router = Router();

  /**
   * @route   GET /api/health
   * @desc    Process health and FHIR server reachability
   */
  router.get('/health', asyncHandler(async (req: Request, res: Response) => {
    const report: HealthReport = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: config.app.version,
      environment: config.env,
      uptime: process.uptime(),
      fhirServer: {
        status: 'up',
        url: config.fhir.serverUrl,
      },
    };

    const startedAt = Date.now();
    try {
      const statement = await transport.capabilities();
      report.fhirServer.fhirVersion = statement.fhirVersion;
      report.fhirServer.software = statement.software?.name;
      report.fhirServer.latency = Date.now() - startedAt;
    } catch (error) {
      logger.warn('FHIR server health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      report.status = 'degraded';
      report.fhirServer.status = 'down';
    }

    res.status(report.status === 'healthy' ? 200 : 503).json(report);
  }));

  router.use('/patients', createPatientRouter(gateway));

  return router;
}

export default createRoutes;
