import { z } from 'zod';
import { AppError, ErrorCodes } from './errors';
import type { SubjectFields } from '../domain/entities';

export const CERTIFICATE_HASH_PATTERN = /^[0-9a-f]{64}$/;

export const CertificateHashSchema = z.string().regex(CERTIFICATE_HASH_PATTERN, 'must be 64 lowercase hex characters');

const fieldValue = z.string().max(512);

export const SubjectFieldsSchema = z
  .object({
    studentName: fieldValue.optional(),
    degreeName: fieldValue.optional(),
    institutionName: fieldValue.optional(),
    issuanceDate: fieldValue.optional(),
    certificateNumber: fieldValue.optional()
  })
  .strict();

export const OrgIdSchema = z.string().regex(/^[A-Za-z0-9_-]{2,64}$/, 'must be 2-64 characters of letters, digits, "_" or "-"');

export const OrganizationMetadataSchema = z.object({
  name: z.string().trim().min(1).max(200),
  contactEmail: z.string().trim().toLowerCase().email().optional(),
  country: z.string().trim().min(1).max(100).optional()
});

export const StakeSchema = z.number().finite().nonnegative();

export const ReasonSchema = z.string().trim().min(1, 'reason is required').max(1000);

export const ActorIdSchema = z.string().trim().min(1, 'caller organization is required');

export const PagingSchema = z.object({
  limit: z.number().int().positive().max(100).default(20),
  offset: z.number().int().nonnegative().default(0)
});

export const VerifierHistoryQuerySchema = PagingSchema.extend({
  verified: z.boolean().optional()
});

export const MAX_BATCH_SIZE = 100;

export const BatchSizeSchema = z.array(z.unknown()).min(1, 'at least one request is required').max(MAX_BATCH_SIZE);

export type OrganizationMetadata = z.infer<typeof OrganizationMetadataSchema>;
export type Paging = z.input<typeof PagingSchema>;
export type VerifierHistoryQuery = z.input<typeof VerifierHistoryQuerySchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

/** Parses `value`, raising VALIDATION_ERROR naming `field` on failure. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, field: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new AppError(ErrorCodes.VALIDATION_ERROR, `Invalid ${field}: ${describeIssues(parsed.error)}`, { field });
  }
  return parsed.data;
}

export function parseCertificateHash(value: unknown): string {
  const parsed = CertificateHashSchema.safeParse(value);
  if (!parsed.success) {
    throw new AppError(ErrorCodes.INVALID_HASH, 'certificateHash must be 64 lowercase hex characters', {
      field: 'certificateHash',
      certificateHash: typeof value === 'string' ? value : null
    });
  }
  return parsed.data;
}

export function parseSubjectFields(value: unknown, field = 'subjectFields'): SubjectFields {
  return parseOrThrow(SubjectFieldsSchema, value ?? {}, field);
}
