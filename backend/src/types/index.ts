/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - TYPE DEFINITIONS
 * ============================================================================
 */

export * from './fhir';
export * from './patient';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  version: string;
  environment: string;
  uptime: number;
  fhirServer: {
    status: 'up' | 'down';
    url: string;
    fhirVersion?: string;
    software?: string;
    latency?: number;
  };
}
