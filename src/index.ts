export { createAttestationCore } from './services/attestationCore';
export type { AttestationCore, AttestationCoreOptions } from './services/attestationCore';
export { OrganizationDirectory } from './services/organizationDirectory';
export { CertificateRegistry } from './services/certificateRegistry';
export { VerificationEngine, combineConfidence, VERIFICATION_THRESHOLD } from './services/verificationService';
export { AuditTrail } from './services/auditService';
export { compareFields, editDistance, stringSimilarity } from './services/fieldSimilarity';
export { createInMemoryLedgerStore } from './adapters/ledgerStore';
export type { LedgerStore, KeyValueTable, AppendLog, Versioned, LogRecord } from './adapters/ledgerStore';
export { RegistryEvents } from './notifications/events';
export type { RegistryEventMap, RegistryEventType } from './notifications/events';
export { EmailNotifier } from './notifications/email';
export type { EmailClient } from './notifications/email';
export { AppError, ErrorCodes, isAppError } from './utils/errors';
export type { ErrorCode } from './utils/errors';
export { computeCertificateHash } from './utils/crypto';
export { MAX_BATCH_SIZE } from './utils/validation';
export * from './domain/entities';
export * from './domain/lifecycle';
