/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - PATIENT RECORD VALIDATION
 * ============================================================================
 *
 * Turns an untrusted request body into a PatientRecord, or into a list of
 * field/message pairs. Runs before any mapping or remote call.
 */

import { z } from 'zod';
import { ADMINISTRATIVE_GENDERS } from '../types/fhir';
import type { FieldError, PatientRecord, PatientValidationResult } from '../types';
import { ValidationError } from '../middleware/errorHandler';

export const BIRTH_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const GENDER_MESSAGE = 'Gender must be: male, female, other, or unknown';
const BIRTH_DATE_MESSAGE = 'Birth date must be in YYYY-MM-DD format';

// JSON null on an optional field means "not provided"
const absentWhenNull = (value: unknown): unknown => (value === null ? undefined : value);

const requiredName = (label: string) =>
  z.preprocess(
    absentWhenNull,
    z
      .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a string` })
      .regex(/\S/, `${label} is required`)
  );

const optionalText = (label: string) =>
  z.preprocess(
    absentWhenNull,
    z.string({ invalid_type_error: `${label} must be a string` }).optional()
  );

const patientRecordSchema = z.object(
  {
    givenName: requiredName('Given name'),
    familyName: requiredName('Family name'),
    gender: z.preprocess(
      absentWhenNull,
      z.enum(ADMINISTRATIVE_GENDERS, { errorMap: () => ({ message: GENDER_MESSAGE }) }).optional()
    ),
    birthDate: z.preprocess(
      absentWhenNull,
      z
        .string({ invalid_type_error: BIRTH_DATE_MESSAGE })
        .regex(BIRTH_DATE_PATTERN, BIRTH_DATE_MESSAGE)
        .optional()
    ),
    identifier: optionalText('Identifier'),
    identifierSystem: optionalText('Identifier system'),
  },
  {
    required_error: 'Patient record is required',
    invalid_type_error: 'Patient record must be a JSON object',
  }
);

type ParsedPatient = z.infer<typeof patientRecordSchema>;

const blankToUndefined = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim().length > 0 ? value : undefined;

function toPatientRecord(parsed: ParsedPatient): PatientRecord {
  const record: PatientRecord = {
    givenName: parsed.givenName,
    familyName: parsed.familyName,
  };

  if (parsed.gender !== undefined) record.gender = parsed.gender;
  if (parsed.birthDate !== undefined) record.birthDate = parsed.birthDate;

  const identifier = blankToUndefined(parsed.identifier);
  const identifierSystem = blankToUndefined(parsed.identifierSystem);
  // A system without a value has nothing to qualify and is not kept
  if (identifier !== undefined) {
    record.identifier = identifier;
    if (identifierSystem !== undefined) record.identifierSystem = identifierSystem;
  }

  return record;
}

/**
 * Validate a patient body. Any `id` in the input is dropped: ids come from the
 * FHIR server or from the request path, never from the body.
 */
export function validatePatientRecord(input: unknown): PatientValidationResult {
  const result = patientRecordSchema.safeParse(input);

  if (result.success) {
    return { valid: true, record: toPatientRecord(result.data) };
  }

  const errors: FieldError[] = result.error.errors.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    message: issue.message,
  }));

  return { valid: false, errors };
}

/**
 * Same as validatePatientRecord, but throws ValidationError on failure
 */
export function parsePatientRecord(input: unknown): PatientRecord {
  const result = validatePatientRecord(input);
  if (!result.valid) {
    throw new ValidationError('Validation failed', result.errors);
  }
  return result.record;
}
