/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - PATIENT RECORD TYPES
 * ============================================================================
 */

import type { AdministrativeGender } from './fhir';

/**
 * Flat patient shape exposed by the REST API. Field names are part of the
 * wire contract.
 */
export interface PatientRecord {
  /** Assigned by the FHIR server; never taken from a create request */
  id?: string;
  givenName: string;
  familyName: string;
  gender?: AdministrativeGender;
  /** YYYY-MM-DD */
  birthDate?: string;
  /** e.g. a medical record number */
  identifier?: string;
  /** Namespace of `identifier`, only meaningful alongside it */
  identifierSystem?: string;
}

export interface FieldError {
  field: string;
  message: string;
}

export type PatientValidationResult =
  | { valid: true; record: PatientRecord }
  | { valid: false; errors: FieldError[] };

/**
 * Outcome of a read by id. A missing patient is a normal result, not an error.
 */
export type PatientLookup =
  | { found: true; patient: PatientRecord }
  | { found: false; id: string };
