/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - PATIENT MAPPER
 * ============================================================================
 *
 * Pure conversion between the flat PatientRecord and the FHIR Patient
 * resource. Only the first name and the first identifier of a resource are
 * represented in the flat form.
 */

import {
  isAdministrativeGender,
  isFHIRPatient,
  type AdministrativeGender,
  type Bundle,
  type FHIRPatient,
  type HumanName,
  type Identifier,
} from '../types/fhir';
import type { PatientRecord } from '../types';
import { ValidationError } from '../middleware/errorHandler';

/**
 * Decode a gender string against the administrative gender code set
 */
export function decodeGender(code: string): AdministrativeGender {
  if (!isAdministrativeGender(code)) {
    throw new ValidationError(`Unknown administrative gender code: ${code}`, [
      { field: 'gender', message: 'Gender must be: male, female, other, or unknown' },
    ]);
  }
  return code;
}

/**
 * Encode a resource gender back to its code, or undefined when the server
 * sent something outside the code set
 */
export function encodeGender(gender: string | undefined): AdministrativeGender | undefined {
  return isAdministrativeGender(gender) ? gender : undefined;
}

export function toResource(record: PatientRecord): FHIRPatient {
  const name: HumanName = {
    family: record.familyName ?? '',
    given: [record.givenName],
  };

  const resource: FHIRPatient = {
    resourceType: 'Patient',
    name: [name],
  };

  if (record.gender !== undefined) {
    resource.gender = decodeGender(record.gender);
  }

  if (record.birthDate !== undefined) {
    resource.birthDate = record.birthDate;
  }

  if (record.identifier !== undefined) {
    const identifier: Identifier = { value: record.identifier };
    if (record.identifierSystem !== undefined) {
      identifier.system = record.identifierSystem;
    }
    resource.identifier = [identifier];
  }

  return resource;
}

export function toRecord(resource: FHIRPatient): PatientRecord {
  const name = resource.name?.[0];

  const record: PatientRecord = {
    ...(resource.id !== undefined ? { id: resource.id } : {}),
    givenName: name?.given?.join(' ') ?? '',
    familyName: name?.family ?? '',
  };

  const gender = encodeGender(resource.gender);
  if (gender !== undefined) {
    record.gender = gender;
  }

  if (resource.birthDate !== undefined) {
    record.birthDate = resource.birthDate;
  }

  const identifier = resource.identifier?.[0];
  if (identifier?.value !== undefined) {
    record.identifier = identifier.value;
  }
  if (identifier?.system !== undefined) {
    record.identifierSystem = identifier.system;
  }

  return record;
}

/**
 * Map the Patient entries of a search bundle, in server order. Other entry
 * types (OperationOutcome, included resources) are skipped.
 */
export function patientsFromBundle(bundle: Bundle): PatientRecord[] {
  return (bundle.entry ?? [])
    .map((entry) => entry.resource)
    .filter(isFHIRPatient)
    .map(toRecord);
}
