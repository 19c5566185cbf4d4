import crypto from 'crypto';
import type { DegreeRecord, IssuerStatistics, Organization, RevocationEntry, SubjectFields } from '../domain/entities';
import { assertDegreeTransition } from '../domain/lifecycle';
import type { LedgerStore } from '../adapters/ledgerStore';
import { moduleLogger, type Logger } from '../infra/logging';
import type { RegistryEvents } from '../notifications/events';
import { AppError, ErrorCodes, guardStore } from '../utils/errors';
import { KeyedLock } from '../utils/keyedLock';
import { ReasonSchema, parseCertificateHash, parseOrThrow, parseSubjectFields } from '../utils/validation';
import type { AuditTrail } from './auditService';
import type { OrganizationDirectory } from './organizationDirectory';

export interface CertificateRegistryOptions {
  events?: RegistryEvents;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

export interface RecordedVerification {
  record: DegreeRecord;
  /** false when the degree had been revoked by the time the count was taken */
  counted: boolean;
}

export class CertificateRegistry {
  private hashLocks = new KeyedLock();
  private degreeLocks = new KeyedLock();
  private events?: RegistryEvents;
  private log: Logger;
  private now: () => Date;
  private generateId: () => string;

  constructor(
    private store: LedgerStore,
    private directory: OrganizationDirectory,
    private audit: AuditTrail,
    options: CertificateRegistryOptions = {}
  ) {
    this.events = options.events;
    this.log = options.logger ?? moduleLogger('registry');
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  async submit(issuerOrgId: string, certificateHash: string, subjectFields: SubjectFields): Promise<DegreeRecord> {
    if (!(await this.directory.isEligibleIssuer(issuerOrgId))) {
      throw new AppError(ErrorCodes.ISSUER_NOT_ELIGIBLE, `Organization ${issuerOrgId} is not an active issuer`, { issuerOrgId });
    }
    const hash = parseCertificateHash(certificateHash);
    const fields = parseSubjectFields(subjectFields);

    const record = await this.hashLocks.run(hash, async () => {
      const degree: DegreeRecord = {
        degreeId: this.generateId(),
        certificateHash: hash,
        issuerOrgId,
        subjectFields: fields,
        status: 'ACTIVE',
        verificationCount: 0,
        lastVerifiedAt: null,
        submittedAt: this.now().toISOString(),
        revocation: null
      };

      // Claiming the hash index is the uniqueness point; the lock only keeps
      // same-process submissions from racing to it.
      const claimed = await guardStore('certificateHashes.putIfAbsent', () =>
        this.store.certificateHashes.putIfAbsent(hash, degree.degreeId)
      );
      if (!claimed) {
        throw new AppError(ErrorCodes.DUPLICATE_CERTIFICATE, `Certificate hash ${hash} is already registered`, { certificateHash: hash });
      }

      try {
        const inserted = await guardStore('degrees.putIfAbsent', () => this.store.degrees.putIfAbsent(degree.degreeId, degree));
        if (!inserted) {
          throw new AppError(ErrorCodes.INTERNAL_ERROR, `Degree id ${degree.degreeId} collided with an existing record`, {
            degreeId: degree.degreeId
          });
        }
      } catch (err) {
        await this.releaseHashClaim(hash);
        throw err;
      }
      return degree;
    });

    this.log.info({ degreeId: record.degreeId, issuerOrgId, certificateHash: hash }, 'degree submitted');
    this.events?.emit('degree.submitted', { degree: record });
    return record;
  }

  async lookup(certificateHash: string): Promise<DegreeRecord | null> {
    const index = await guardStore('certificateHashes.get', () => this.store.certificateHashes.get(certificateHash));
    if (!index) return null;
    return this.getById(index.value);
  }

  async getById(degreeId: string): Promise<DegreeRecord | null> {
    const row = await guardStore('degrees.get', () => this.store.degrees.get(degreeId));
    return row ? row.value : null;
  }

  async revoke(degreeId: string, reason: string, actingOrgId: string): Promise<DegreeRecord> {
    this.directory.requireAuthority(actingOrgId, 'revoke degrees');
    const why = parseOrThrow(ReasonSchema, reason, 'reason');

    const revoked = await this.degreeLocks.run(degreeId, async () => {
      const row = await guardStore('degrees.get', () => this.store.degrees.get(degreeId));
      if (!row) throw new AppError(ErrorCodes.DEGREE_NOT_FOUND, `Degree ${degreeId} not found`, { degreeId });
      assertDegreeTransition(degreeId, row.value.status, 'REVOKED');

      const revokedAt = this.now().toISOString();
      const next: DegreeRecord = {
        ...row.value,
        status: 'REVOKED',
        revocation: { reason: why, revokedBy: actingOrgId, revokedAt }
      };
      const swapped = await guardStore('degrees.compareAndSwap', () => this.store.degrees.compareAndSwap(degreeId, row.version, next));
      if (!swapped) {
        throw new AppError(ErrorCodes.INTERNAL_ERROR, `Degree ${degreeId} was modified concurrently`, { degreeId });
      }

      const entry: RevocationEntry = {
        kind: 'REVOCATION',
        eventId: this.generateId(),
        degreeId,
        actingOrgId,
        reason: why,
        timestamp: revokedAt
      };
      try {
        await this.audit.append(entry);
      } catch (err) {
        await this.restoreRecord(degreeId, row.version + 1, row.value, 'revocation');
        throw err;
      }
      return next;
    });

    this.log.warn({ degreeId, actingOrgId, reason: why }, 'degree revoked');
    const issuer = await this.issuerFor(revoked.issuerOrgId);
    this.events?.emit('degree.revoked', { degree: revoked, issuer });
    return revoked;
  }

  /**
   * Counts one verification against an ACTIVE degree and runs `commit` while
   * the degree is still locked. A degree revoked since the caller read it is
   * passed through untouched with `counted: false`. If `commit` throws, the
   * count is rolled back before the error propagates.
   */
  async recordVerification<T>(degreeId: string, commit: (result: RecordedVerification) => Promise<T>): Promise<T> {
    return this.degreeLocks.run(degreeId, async () => {
      const row = await guardStore('degrees.get', () => this.store.degrees.get(degreeId));
      if (!row) throw new AppError(ErrorCodes.DEGREE_NOT_FOUND, `Degree ${degreeId} not found`, { degreeId });
      if (row.value.status !== 'ACTIVE') return commit({ record: row.value, counted: false });

      const next: DegreeRecord = {
        ...row.value,
        verificationCount: row.value.verificationCount + 1,
        lastVerifiedAt: this.now().toISOString()
      };
      const swapped = await guardStore('degrees.compareAndSwap', () => this.store.degrees.compareAndSwap(degreeId, row.version, next));
      if (!swapped) {
        throw new AppError(ErrorCodes.INTERNAL_ERROR, `Degree ${degreeId} was modified concurrently`, { degreeId });
      }
      try {
        return await commit({ record: next, counted: true });
      } catch (err) {
        await this.restoreRecord(degreeId, row.version + 1, row.value, 'verification');
        throw err;
      }
    });
  }

  async statistics(issuerOrgId: string): Promise<IssuerStatistics> {
    const degrees = await guardStore('degrees.values', () => this.store.degrees.values());
    const issued = degrees.filter((degree) => degree.issuerOrgId === issuerOrgId);
    return {
      issuerOrgId,
      totalDegrees: issued.length,
      activeDegrees: issued.filter((degree) => degree.status === 'ACTIVE').length,
      revokedDegrees: issued.filter((degree) => degree.status === 'REVOKED').length,
      totalVerifications: issued.reduce((sum, degree) => sum + degree.verificationCount, 0)
    };
  }

  private async restoreRecord(degreeId: string, version: number, previous: DegreeRecord, change: string): Promise<void> {
    try {
      await this.store.degrees.compareAndSwap(degreeId, version, previous);
    } catch (err) {
      this.log.error({ err, degreeId, change }, 'failed to restore degree after audit write failed');
    }
  }

  /** Issuer for the revocation notice; null when it cannot be read. */
  private async issuerFor(issuerOrgId: string): Promise<Organization | null> {
    try {
      return await this.directory.get(issuerOrgId);
    } catch (err) {
      this.log.warn({ err, issuerOrgId }, 'issuer lookup failed after revocation');
      return null;
    }
  }

  private async releaseHashClaim(hash: string): Promise<void> {
    try {
      const claim = await this.store.certificateHashes.get(hash);
      if (claim) await this.store.certificateHashes.delete(hash, claim.version);
    } catch (err) {
      this.log.error({ err, certificateHash: hash }, 'failed to release certificate hash claim after aborted submit');
    }
  }
}
