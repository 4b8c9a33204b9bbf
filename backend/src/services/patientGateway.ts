/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - PATIENT GATEWAY SERVICE
 * ============================================================================
 *
 * Validates input, maps it onto FHIR, issues one remote operation and maps
 * the answer back. Holds nothing but the transport handle it was given.
 */

import logger from '../config/logger';
import { FHIRServerError, NotFoundError, ValidationError } from '../middleware/errorHandler';
import type { FHIRTransport } from './fhirTransport';
import { patientsFromBundle, toRecord, toResource } from './patientMapper';
import { parsePatientRecord } from './patientValidation';
import type { PatientLookup, PatientRecord, PatientSearchParams } from '../types';

export const DEFAULT_LIST_COUNT = 20;

export interface PatientGatewayOptions {
  defaultListCount?: number;
}

function requireText(field: string, value: string, message: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError('Validation failed', [{ field, message }]);
  }
  return value;
}

export class PatientGateway {
  private readonly defaultListCount: number;

  constructor(
    private readonly transport: FHIRTransport,
    options: PatientGatewayOptions = {}
  ) {
    this.defaultListCount = options.defaultListCount ?? DEFAULT_LIST_COUNT;
  }

  async create(body: unknown): Promise<PatientRecord> {
    const record = parsePatientRecord(body);
    logger.info('Creating patient', { givenName: record.givenName, familyName: record.familyName });

    const outcome = await this.transport.create(toResource(record));

    logger.info('Patient created', { patientId: outcome.id });
    return { id: outcome.id, ...record };
  }

  /**
   * Read a patient. A 404 or 410 from the server is reported as
   * `{ found: false }`; every other fault is thrown.
   */
  async getById(id: string): Promise<PatientLookup> {
    requireText('id', id, 'Patient id is required');

    try {
      const resource = await this.transport.read(id);
      return { found: true, patient: toRecord(resource) };
    } catch (error) {
      if (error instanceof FHIRServerError && error.isNotFound) {
        logger.info('Patient not found', { patientId: id });
        return { found: false, id };
      }
      throw error;
    }
  }

  async list(count: number = this.defaultListCount): Promise<PatientRecord[]> {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError('Validation failed', [
        { field: 'count', message: 'Count must be a non-negative integer' },
      ]);
    }

    const patients = await this.search({ _count: count });
    logger.info('Listed patients', { requested: count, returned: patients.length });
    return patients;
  }

  /**
   * Match across every name part; the server applies its usual
   * case-insensitive, starts-with string matching.
   */
  async searchByName(name: string): Promise<PatientRecord[]> {
    requireText('name', name, 'Search name is required');
    return this.search({ name });
  }

  async searchByFamilyName(name: string): Promise<PatientRecord[]> {
    requireText('name', name, 'Search name is required');
    return this.search({ family: name });
  }

  async searchByIdentifier(system: string, value: string): Promise<PatientRecord[]> {
    requireText('system', system, 'Identifier system is required');
    requireText('value', value, 'Identifier value is required');
    return this.search({ identifier: `${system}|${value}` });
  }

  /**
   * Full replacement. The existence probe costs a second round trip but lets
   * us answer 404 precisely instead of relying on how the server treats a PUT
   * to an unknown id (many create it).
   */
  async update(id: string, body: unknown): Promise<PatientRecord> {
    requireText('id', id, 'Patient id is required');
    const record = parsePatientRecord(body);

    await this.requireExisting(id);

    await this.transport.update(id, { ...toResource(record), id });

    logger.info('Patient updated', { patientId: id });
    return { id, ...record };
  }

  /**
   * Delete, after the same existence probe as update
   */
  async delete(id: string): Promise<void> {
    requireText('id', id, 'Patient id is required');

    await this.requireExisting(id);
    await this.transport.delete(id);

    logger.info('Patient deleted', { patientId: id });
  }

  private async requireExisting(id: string): Promise<void> {
    const lookup = await this.getById(id);
    if (!lookup.found) {
      throw new NotFoundError('Patient');
    }
  }

  private async search(params: PatientSearchParams): Promise<PatientRecord[]> {
    logger.debug('Searching patients', { params });
    const bundle = await this.transport.search(params);
    return patientsFromBundle(bundle);
  }
}
