/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - FHIR R4 RESOURCE TYPES
 * ============================================================================
 *
 * The subset of the FHIR R4 model this gateway reads and writes. Fields we do
 * not map are still typed so they pass through untouched.
 */

export const ADMINISTRATIVE_GENDERS = ['male', 'female', 'other', 'unknown'] as const;

export type AdministrativeGender = typeof ADMINISTRATIVE_GENDERS[number];

export interface FHIRMeta {
  versionId?: string;
  lastUpdated?: string;
  source?: string;
  profile?: string[];
}

export interface FHIRResource {
  resourceType: string;
  id?: string;
  meta?: FHIRMeta;
}

export interface Coding {
  system?: string;
  code?: string;
  display?: string;
}

export interface CodeableConcept {
  coding?: Coding[];
  text?: string;
}

export interface HumanName {
  use?: 'usual' | 'official' | 'temp' | 'nickname' | 'anonymous' | 'old' | 'maiden';
  text?: string;
  family?: string;
  given?: string[];
  prefix?: string[];
  suffix?: string[];
}

export interface Identifier {
  use?: 'usual' | 'official' | 'temp' | 'secondary' | 'old';
  type?: CodeableConcept;
  system?: string;
  value?: string;
}

export interface ContactPoint {
  system?: 'phone' | 'fax' | 'email' | 'pager' | 'url' | 'sms' | 'other';
  value?: string;
  use?: 'home' | 'work' | 'temp' | 'old' | 'mobile';
}

export interface Address {
  use?: string;
  line?: string[];
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
}

export interface FHIRPatient extends FHIRResource {
  resourceType: 'Patient';
  identifier?: Identifier[];
  active?: boolean;
  name?: HumanName[];
  telecom?: ContactPoint[];
  // Servers are not trusted to stay inside the administrative gender code set
  gender?: string;
  birthDate?: string;
  address?: Address[];
}

export interface OperationOutcomeIssue {
  severity: 'fatal' | 'error' | 'warning' | 'information';
  code: string;
  details?: CodeableConcept;
  diagnostics?: string;
  location?: string[];
  expression?: string[];
}

export interface OperationOutcome extends FHIRResource {
  resourceType: 'OperationOutcome';
  issue: OperationOutcomeIssue[];
}

export interface BundleLink {
  relation: string;
  url: string;
}

export interface BundleEntry {
  fullUrl?: string;
  resource?: FHIRResource;
  search?: {
    mode?: 'match' | 'include' | 'outcome';
    score?: number;
  };
}

export interface Bundle extends FHIRResource {
  resourceType: 'Bundle';
  type: 'searchset' | 'collection' | 'history' | 'batch-response' | 'transaction-response';
  total?: number;
  link?: BundleLink[];
  entry?: BundleEntry[];
}

/**
 * Search parameters understood by the remote Patient endpoint
 */
export interface PatientSearchParams {
  name?: string;
  family?: string;
  identifier?: string;
  _count?: number;
}

export interface CapabilityStatement extends FHIRResource {
  resourceType: 'CapabilityStatement';
  fhirVersion?: string;
  software?: {
    name?: string;
    version?: string;
  };
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAdministrativeGender(value: unknown): value is AdministrativeGender {
  return ADMINISTRATIVE_GENDERS.some((code) => code === value);
}

export function isFHIRPatient(resource: FHIRResource | undefined): resource is FHIRPatient {
  return resource?.resourceType === 'Patient';
}

export function isBundle(value: unknown): value is Bundle {
  return isRecord(value) && value.resourceType === 'Bundle';
}

export function isOperationOutcome(value: unknown): value is OperationOutcome {
  return isRecord(value) && value.resourceType === 'OperationOutcome' && Array.isArray(value.issue);
}

export function isPatientResource(value: unknown): value is FHIRPatient {
  return isRecord(value) && value.resourceType === 'Patient';
}

export function isCapabilityStatement(value: unknown): value is CapabilityStatement {
  return isRecord(value) && value.resourceType === 'CapabilityStatement';
}
