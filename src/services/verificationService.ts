import crypto from 'crypto';
import type {
  BatchVerificationResult,
  DegreeRecord,
  SubjectFields,
  VerificationEvent,
  VerificationMethod,
  VerificationOutcome,
  VerificationRequest
} from '../domain/entities';
import { config, resolveConfidencePolicy, type ConfidencePolicy } from '../config/secrets';
import { moduleLogger, type Logger } from '../infra/logging';
import type { RegistryEvents } from '../notifications/events';
import { ErrorCodes, isAppError } from '../utils/errors';
import {
  ActorIdSchema,
  BatchSizeSchema,
  parseCertificateHash,
  parseOrThrow,
  parseSubjectFields
} from '../utils/validation';
import type { AuditTrail } from './auditService';
import type { CertificateRegistry } from './certificateRegistry';
import { compareFields, type FieldSimilarityResult } from './fieldSimilarity';

export const HASH_MATCH_CONFIDENCE = 1.0;

/** Combined confidence at or above this is a positive decision. */
export const VERIFICATION_THRESHOLD = 0.8;

export interface VerificationEngineOptions {
  policy?: ConfidencePolicy;
  fieldMatchThreshold?: number;
  events?: RegistryEvents;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

interface Decision {
  degree: DegreeRecord;
  outcome: VerificationOutcome;
  event: VerificationEvent;
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Blends the authoritative hash match with the field score. `average` weighs
 * both equally; `weighted` gives the hash 0.7 and the fields 0.3.
 */
export function combineConfidence(policy: ConfidencePolicy, fieldConfidence: number | undefined): number {
  if (fieldConfidence === undefined) return HASH_MATCH_CONFIDENCE;
  switch (policy) {
    case 'weighted':
      return clamp(HASH_MATCH_CONFIDENCE * 0.7 + fieldConfidence * 0.3);
    case 'average':
      return clamp((HASH_MATCH_CONFIDENCE + fieldConfidence) / 2);
  }
}

function rejected(method: VerificationMethod, degreeId?: string): VerificationOutcome {
  return { verified: false, confidence: 0, method, degreeId, comparisons: [], discrepancies: [] };
}

export class VerificationEngine {
  readonly policy: ConfidencePolicy;
  readonly fieldMatchThreshold: number;
  private events?: RegistryEvents;
  private log: Logger;
  private now: () => Date;
  private generateId: () => string;

  constructor(
    private registry: CertificateRegistry,
    private audit: AuditTrail,
    options: VerificationEngineOptions = {}
  ) {
    this.policy = options.policy ?? resolveConfidencePolicy();
    this.fieldMatchThreshold = options.fieldMatchThreshold ?? config.fieldMatchThreshold;
    this.events = options.events;
    this.log = options.logger ?? moduleLogger('verification');
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  async verify(certificateHash: string, ocrFields: SubjectFields | undefined, verifierOrgId: string): Promise<VerificationOutcome> {
    // Extraction output may differ in case from the registered hash.
    const hash = parseCertificateHash(certificateHash.trim().toLowerCase());
    const verifier = parseOrThrow(ActorIdSchema, verifierOrgId, 'verifierOrgId');
    const presented = ocrFields === undefined ? undefined : parseSubjectFields(ocrFields, 'ocrFields');

    const degree = await this.registry.lookup(hash);
    if (!degree) {
      this.log.info({ certificateHash: hash, verifierOrgId: verifier }, '[verify] hash not found');
      return rejected('HASH_NOT_FOUND');
    }

    if (degree.status === 'REVOKED') {
      const outcome = rejected('DEGREE_REVOKED', degree.degreeId);
      const event = await this.record(degree.degreeId, outcome, hash, verifier);
      return this.publish({ degree, outcome, event });
    }

    const similarity: FieldSimilarityResult = presented
      ? compareFields(degree.subjectFields, presented, this.fieldMatchThreshold)
      : { fieldConfidence: undefined, comparisons: [], discrepancies: [] };
    const confidence = combineConfidence(this.policy, similarity.fieldConfidence);
    const outcome: VerificationOutcome = {
      verified: confidence >= VERIFICATION_THRESHOLD,
      confidence,
      method: similarity.fieldConfidence === undefined ? 'HASH_ONLY' : 'HASH_AND_FIELDS',
      degreeId: degree.degreeId,
      fieldConfidence: similarity.fieldConfidence,
      comparisons: similarity.comparisons,
      discrepancies: similarity.discrepancies
    };

    // The count and its audit event commit together; a failed append rolls the count back.
    const decision = await this.registry.recordVerification(degree.degreeId, async ({ record, counted }): Promise<Decision> => {
      if (!counted) {
        this.log.info({ degreeId: record.degreeId }, '[verify] degree revoked while verifying');
      }
      const final = counted ? outcome : rejected('DEGREE_REVOKED', record.degreeId);
      const event = await this.record(record.degreeId, final, hash, verifier);
      return { degree: record, outcome: final, event };
    });
    return this.publish(decision);
  }

  /**
   * Verifies each request independently. A request that throws becomes a
   * not-verified result carrying the error; the rest of the batch proceeds.
   */
  async verifyBatch(requests: VerificationRequest[]): Promise<BatchVerificationResult[]> {
    parseOrThrow(BatchSizeSchema, requests, 'requests');
    const settled = await Promise.allSettled(
      requests.map((request) => this.verify(request.certificateHash, request.ocrFields, request.verifierOrgId))
    );

    const results = settled.map((result, index): BatchVerificationResult => {
      const { certificateHash, verifierOrgId } = requests[index];
      if (result.status === 'fulfilled') {
        return { certificateHash, verifierOrgId, verified: result.value.verified, outcome: result.value, error: null };
      }
      const reason: unknown = result.reason;
      this.log.warn({ err: reason, certificateHash, verifierOrgId }, '[verify] batch item failed');
      return {
        certificateHash,
        verifierOrgId,
        verified: false,
        outcome: null,
        error: isAppError(reason)
          ? { code: reason.code, message: reason.message }
          : { code: ErrorCodes.INTERNAL_ERROR, message: reason instanceof Error ? reason.message : String(reason) }
      };
    });

    const verified = results.filter((result) => result.verified).length;
    this.log.info({ total: results.length, verified, notVerified: results.length - verified }, '[verify] batch completed');
    return results;
  }

  private async record(degreeId: string, outcome: VerificationOutcome, extractedHash: string, verifierOrgId: string) {
    const event: VerificationEvent = {
      kind: 'VERIFICATION',
      eventId: this.generateId(),
      degreeId,
      verifierOrgId,
      method: outcome.method,
      verified: outcome.verified,
      confidence: outcome.confidence,
      extractedHash,
      timestamp: this.now().toISOString()
    };
    await this.audit.append(event);
    return event;
  }

  private publish({ degree, outcome, event }: Decision): VerificationOutcome {
    this.log.info(
      {
        degreeId: degree.degreeId,
        verifierOrgId: event.verifierOrgId,
        method: outcome.method,
        confidence: outcome.confidence,
        verified: outcome.verified
      },
      '[verify] decision recorded'
    );
    this.events?.emit('verification.completed', { event, outcome, degree });
    return outcome;
  }
}
