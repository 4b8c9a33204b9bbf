/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - FHIR TRANSPORT
 * ============================================================================
 *
 * The remote operations the gateway needs from a FHIR R4 server, and an axios
 * implementation of them. Every failure leaves this module as a
 * FHIRServerError; raw axios errors never escape.
 */

import axios, { type AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import logger from '../config/logger';
import { FHIRServerError } from '../middleware/errorHandler';
import {
  isBundle,
  isCapabilityStatement,
  isOperationOutcome,
  isPatientResource,
  type Bundle,
  type CapabilityStatement,
  type FHIRPatient,
  type PatientSearchParams,
} from '../types/fhir';

export interface CreateOutcome {
  id: string;
  resource?: FHIRPatient;
}

export interface FHIRTransport {
  create(resource: FHIRPatient): Promise<CreateOutcome>;
  read(id: string): Promise<FHIRPatient>;
  update(id: string, resource: FHIRPatient): Promise<FHIRPatient | undefined>;
  delete(id: string): Promise<void>;
  search(params: PatientSearchParams): Promise<Bundle>;
  capabilities(): Promise<CapabilityStatement>;
}

export interface FHIRTransportOptions {
  baseUrl: string;
  connectTimeoutMs: number;
  responseTimeoutMs: number;
}

const FHIR_JSON = 'application/fhir+json';
const PATIENT_PATH = '/Patient';

/**
 * Pull the diagnostics out of an OperationOutcome body, if the server sent one
 */
export function describeOutcome(body: unknown): string | undefined {
  if (!isOperationOutcome(body)) {
    return undefined;
  }

  const messages = body.issue
    .map((issue) => issue.diagnostics ?? issue.details?.text)
    .filter((message): message is string => typeof message === 'string' && message.length > 0);

  return messages.length > 0 ? messages.join('; ') : undefined;
}

/**
 * Extract the logical id from a Location header such as
 * `http://server/baseR4/Patient/123/_history/1`
 */
export function idFromLocation(location: unknown): string | undefined {
  if (typeof location !== 'string') {
    return undefined;
  }
  const match = /(?:^|\/)Patient\/([^/?#]+)/.exec(location);
  return match?.[1];
}

export class AxiosFHIRTransport implements FHIRTransport {
  private readonly client: AxiosInstance;
  private readonly deadlineMs: number;

  constructor(options: FHIRTransportOptions) {
    // axios' `timeout` is a socket inactivity timer in Node, so it bounds both
    // the connect and the wait for the response. The abort signal caps the
    // whole exchange at the two budgets combined.
    this.deadlineMs = options.connectTimeoutMs + options.responseTimeoutMs;

    this.client = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: Math.max(options.connectTimeoutMs, options.responseTimeoutMs),
      headers: {
        'Content-Type': FHIR_JSON,
        Accept: FHIR_JSON,
      },
    });
  }

  async create(resource: FHIRPatient): Promise<CreateOutcome> {
    return this.call('create', async (signal) => {
      const response = await this.client.post<unknown>(PATIENT_PATH, resource, {
        signal,
        headers: { Prefer: 'return=representation' },
      });

      const created = isPatientResource(response.data) ? response.data : undefined;
      const id = created?.id ?? idFromLocation(response.headers['location'] ?? response.headers['content-location']);

      if (id === undefined) {
        throw new FHIRServerError('create', 'FHIR server did not return an id for the created Patient');
      }

      return { id, resource: created };
    });
  }

  async read(id: string): Promise<FHIRPatient> {
    return this.call('read', async (signal) => {
      const response = await this.client.get<unknown>(`${PATIENT_PATH}/${encodeURIComponent(id)}`, { signal });
      return this.expectPatient('read', response);
    });
  }

  async update(id: string, resource: FHIRPatient): Promise<FHIRPatient | undefined> {
    return this.call('update', async (signal) => {
      const response = await this.client.put<unknown>(`${PATIENT_PATH}/${encodeURIComponent(id)}`, resource, { signal });
      return isPatientResource(response.data) ? response.data : undefined;
    });
  }

  async delete(id: string): Promise<void> {
    await this.call('delete', async (signal) => {
      await this.client.delete(`${PATIENT_PATH}/${encodeURIComponent(id)}`, { signal });
    });
  }

  async search(params: PatientSearchParams): Promise<Bundle> {
    return this.call('search', async (signal) => {
      const response = await this.client.get<unknown>(PATIENT_PATH, { params, signal });

      if (!isBundle(response.data)) {
        throw new FHIRServerError('search', 'FHIR server returned something other than a Bundle');
      }
      return response.data;
    });
  }

  async capabilities(): Promise<CapabilityStatement> {
    return this.call('capabilities', async (signal) => {
      const response = await this.client.get<unknown>('/metadata', { signal });

      if (!isCapabilityStatement(response.data)) {
        throw new FHIRServerError('capabilities', 'FHIR server returned something other than a CapabilityStatement');
      }
      return response.data;
    });
  }

  private expectPatient(operation: string, response: AxiosResponse<unknown>): FHIRPatient {
    if (!isPatientResource(response.data)) {
      throw new FHIRServerError(operation, 'FHIR server returned something other than a Patient');
    }
    return response.data;
  }

  /**
   * Issue one remote call under the deadline, log it, and translate failures
   */
  private async call<T>(operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const startedAt = Date.now();

    try {
      const result = await fn(AbortSignal.timeout(this.deadlineMs));

      logger.integration('fhir', {
        operation,
        success: true,
        duration: Date.now() - startedAt,
      });

      return result;
    } catch (error) {
      const fault = error instanceof FHIRServerError
        ? error
        : axios.isAxiosError(error)
          ? this.toFault(operation, error)
          : undefined;

      if (fault === undefined) {
        throw error;
      }

      if (fault.isNotFound) {
        logger.warn('FHIR resource not found', { operation, statusCode: fault.remoteStatus });
      } else {
        logger.integration('fhir', {
          operation,
          success: false,
          duration: Date.now() - startedAt,
          statusCode: fault.statusCode,
          error: fault.message,
        });
      }

      throw fault;
    }
  }

  private toFault(operation: string, error: AxiosError): FHIRServerError {
    const status = error.response?.status;

    if (status !== undefined) {
      const message = describeOutcome(error.response?.data) ?? `FHIR server responded with HTTP ${status}`;
      return new FHIRServerError(operation, message, status);
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.code === 'ERR_CANCELED') {
      return new FHIRServerError(operation, `FHIR server did not respond within ${this.deadlineMs}ms`);
    }

    return new FHIRServerError(operation, `FHIR server is unreachable: ${error.message}`);
  }
}
