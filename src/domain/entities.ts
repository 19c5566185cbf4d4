import type { ErrorCode } from '../utils/errors';

export type OrganizationStatus = 'PENDING' | 'ACTIVE' | 'SUSPENDED' | 'BLACKLISTED';

export interface Organization {
  orgId: string;
  name: string;
  contactEmail: string | null;
  country: string | null;
  status: OrganizationStatus;
  stake: number;
  statusReason: string | null;
  joinedAt: string;
  updatedAt: string;
}

export const KEY_FIELDS = [
  'studentName',
  'degreeName',
  'institutionName',
  'issuanceDate',
  'certificateNumber'
] as const;

export type KeyField = (typeof KEY_FIELDS)[number];

export type SubjectFields = Partial<Record<KeyField, string>>;

export type DegreeStatus = 'ACTIVE' | 'REVOKED';

export interface Revocation {
  reason: string;
  revokedBy: string;
  revokedAt: string;
}

export interface DegreeRecord {
  degreeId: string;
  certificateHash: string;
  issuerOrgId: string;
  subjectFields: SubjectFields;
  status: DegreeStatus;
  verificationCount: number;
  lastVerifiedAt: string | null;
  submittedAt: string;
  revocation: Revocation | null;
}

export type VerificationMethod = 'HASH_NOT_FOUND' | 'DEGREE_REVOKED' | 'HASH_ONLY' | 'HASH_AND_FIELDS';

export interface VerificationEvent {
  kind: 'VERIFICATION';
  eventId: string;
  degreeId: string;
  verifierOrgId: string;
  method: VerificationMethod;
  verified: boolean;
  confidence: number;
  extractedHash: string;
  timestamp: string;
}

export interface RevocationEntry {
  kind: 'REVOCATION';
  eventId: string;
  degreeId: string;
  actingOrgId: string;
  reason: string;
  timestamp: string;
}

export type AuditEntry = VerificationEvent | RevocationEntry;

export type AuditEntryKind = AuditEntry['kind'];

export interface FieldComparison {
  field: KeyField;
  expected: string;
  presented: string;
  similarity: number;
  credit: number;
}

export interface VerificationOutcome {
  verified: boolean;
  confidence: number;
  method: VerificationMethod;
  degreeId?: string;
  fieldConfidence?: number;
  comparisons: FieldComparison[];
  discrepancies: KeyField[];
}

export interface IssuerStatistics {
  issuerOrgId: string;
  totalDegrees: number;
  activeDegrees: number;
  revokedDegrees: number;
  totalVerifications: number;
}

export interface VerifierStatistics {
  verifierOrgId: string;
  totalVerifications: number;
  successfulVerifications: number;
  failedVerifications: number;
  /** successful / total, 0 when there are none */
  successRate: number;
  lastVerificationAt: string | null;
}

export interface VerificationPage {
  items: VerificationEvent[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export interface VerificationRequest {
  certificateHash: string;
  ocrFields?: SubjectFields;
  verifierOrgId: string;
}

export interface BatchVerificationResult {
  certificateHash: string;
  verifierOrgId: string;
  verified: boolean;
  /** null when the request itself failed */
  outcome: VerificationOutcome | null;
  error: { code: ErrorCode; message: string } | null;
}
