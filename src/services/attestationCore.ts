import type {
  DegreeRecord,
  BatchVerificationResult,
  IssuerStatistics,
  Organization,
  OrganizationStatus,
  SubjectFields,
  VerificationEvent,
  VerificationOutcome,
  VerificationPage,
  VerificationRequest,
  VerifierStatistics
} from '../domain/entities';
import { createInMemoryLedgerStore, type LedgerStore } from '../adapters/ledgerStore';
import { validateConfigAtStartup, type ConfidencePolicy } from '../config/secrets';
import { logger as rootLogger, moduleLogger, type Logger } from '../infra/logging';
import { EmailNotifier, type EmailClient } from '../notifications/email';
import { RegistryEvents } from '../notifications/events';
import { AppError, ErrorCodes } from '../utils/errors';
import { computeCertificateHash } from '../utils/crypto';
import {
  CERTIFICATE_HASH_PATTERN,
  type OrganizationMetadata,
  type Paging,
  type VerifierHistoryQuery
} from '../utils/validation';
import { AuditTrail } from './auditService';
import { CertificateRegistry } from './certificateRegistry';
import { OrganizationDirectory } from './organizationDirectory';
import { VerificationEngine } from './verificationService';

export interface AttestationCoreOptions {
  store?: LedgerStore;
  authorityOrgId?: string;
  minimumStake?: number;
  confidencePolicy?: ConfidencePolicy;
  fieldMatchThreshold?: number;
  /** Pass a client to enable email notifications; `false` disables them. */
  email?: EmailClient | false;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

export interface AttestationCore {
  events: RegistryEvents;
  directory: OrganizationDirectory;
  registry: CertificateRegistry;
  engine: VerificationEngine;
  audit: AuditTrail;

  submitDegree(issuerOrgId: string, certificateHash: string, subjectFields: SubjectFields): Promise<DegreeRecord>;
  verify(certificateHash: string, ocrFields: SubjectFields | undefined, verifierOrgId: string): Promise<VerificationOutcome>;
  revoke(degreeId: string, reason: string, actingOrgId: string): Promise<DegreeRecord>;
  getDegree(degreeIdOrHash: string): Promise<DegreeRecord>;
  getVerificationHistory(degreeId: string, paging?: Paging): Promise<VerificationEvent[]>;
  verifyBatch(requests: VerificationRequest[]): Promise<BatchVerificationResult[]>;
  getVerifierHistory(verifierOrgId: string, query?: VerifierHistoryQuery): Promise<VerificationPage>;
  getVerifierStatistics(verifierOrgId: string): Promise<VerifierStatistics>;

  registerOrganization(orgId: string, metadata: OrganizationMetadata, stake: number): Promise<Organization>;
  approveOrganization(orgId: string, actingOrgId: string): Promise<Organization>;
  suspendOrganization(orgId: string, reason: string, actingOrgId: string): Promise<Organization>;
  reinstateOrganization(orgId: string, actingOrgId: string): Promise<Organization>;
  blacklistOrganization(orgId: string, reason: string, actingOrgId: string): Promise<Organization>;
  getOrganization(orgId: string): Promise<Organization>;
  listOrganizations(status?: OrganizationStatus): Promise<Organization[]>;
  getOrganizationStatistics(orgId: string): Promise<IssuerStatistics>;

  computeCertificateHash(document: Buffer | Uint8Array): string;
}

/**
 * Wires the core components around one store and one event channel and
 * seeds the attestation authority. Every component is reachable on the
 * returned object for callers that need more than the facade.
 */
export async function createAttestationCore(options: AttestationCoreOptions = {}): Promise<AttestationCore> {
  validateConfigAtStartup();
  const base = options.logger ?? rootLogger;
  const store = options.store ?? createInMemoryLedgerStore();
  const events = new RegistryEvents(moduleLogger('events', base));
  const audit = new AuditTrail(store);
  const directory = new OrganizationDirectory(store, {
    authorityOrgId: options.authorityOrgId,
    minimumStake: options.minimumStake,
    events,
    logger: moduleLogger('organizations', base),
    now: options.now
  });
  const registry = new CertificateRegistry(store, directory, audit, {
    events,
    logger: moduleLogger('registry', base),
    now: options.now,
    generateId: options.generateId
  });
  const engine = new VerificationEngine(registry, audit, {
    policy: options.confidencePolicy,
    fieldMatchThreshold: options.fieldMatchThreshold,
    events,
    logger: moduleLogger('verification', base),
    now: options.now,
    generateId: options.generateId
  });

  if (options.email !== false) {
    new EmailNotifier({ client: options.email, logger: moduleLogger('email', base) }).attach(events);
  }

  await directory.initialize();

  async function getOrganization(orgId: string): Promise<Organization> {
    const org = await directory.get(orgId);
    if (!org) throw new AppError(ErrorCodes.ORGANIZATION_NOT_FOUND, `Organization ${orgId} not found`, { orgId });
    return org;
  }

  return {
    events,
    directory,
    registry,
    engine,
    audit,

    submitDegree: (issuerOrgId, certificateHash, subjectFields) => registry.submit(issuerOrgId, certificateHash, subjectFields),
    verify: (certificateHash, ocrFields, verifierOrgId) => engine.verify(certificateHash, ocrFields, verifierOrgId),
    revoke: (degreeId, reason, actingOrgId) => registry.revoke(degreeId, reason, actingOrgId),

    async getDegree(degreeIdOrHash) {
      const degree = CERTIFICATE_HASH_PATTERN.test(degreeIdOrHash)
        ? await registry.lookup(degreeIdOrHash)
        : await registry.getById(degreeIdOrHash);
      if (!degree) {
        throw new AppError(ErrorCodes.DEGREE_NOT_FOUND, `Degree ${degreeIdOrHash} not found`, { degree: degreeIdOrHash });
      }
      return degree;
    },

    async getVerificationHistory(degreeId, paging) {
      if (!(await registry.getById(degreeId))) {
        throw new AppError(ErrorCodes.DEGREE_NOT_FOUND, `Degree ${degreeId} not found`, { degreeId });
      }
      return audit.verificationHistory(degreeId, paging);
    },

    verifyBatch: (requests) => engine.verifyBatch(requests),
    getVerifierHistory: (verifierOrgId, query) => audit.verificationsByVerifier(verifierOrgId, query),
    getVerifierStatistics: (verifierOrgId) => audit.verifierStatistics(verifierOrgId),

    registerOrganization: (orgId, metadata, stake) => directory.register(orgId, metadata, stake),
    approveOrganization: (orgId, actingOrgId) => directory.approve(orgId, actingOrgId),
    suspendOrganization: (orgId, reason, actingOrgId) => directory.suspend(orgId, reason, actingOrgId),
    reinstateOrganization: (orgId, actingOrgId) => directory.reinstate(orgId, actingOrgId),
    blacklistOrganization: (orgId, reason, actingOrgId) => directory.blacklist(orgId, reason, actingOrgId),
    getOrganization,
    listOrganizations: (status) => directory.list(status),

    async getOrganizationStatistics(orgId) {
      await getOrganization(orgId);
      return registry.statistics(orgId);
    },

    computeCertificateHash
  };
}
