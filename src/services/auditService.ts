import type { AuditEntry, AuditEntryKind, VerificationEvent, VerificationPage, VerifierStatistics } from '../domain/entities';
import type { LedgerStore, LogRecord } from '../adapters/ledgerStore';
import { guardStore } from '../utils/errors';
import {
  PagingSchema,
  VerifierHistoryQuerySchema,
  parseOrThrow,
  type Paging,
  type VerifierHistoryQuery
} from '../utils/validation';

function streamFor(degreeId: string) {
  return `degree:${degreeId}`;
}

function newestFirst(a: LogRecord<AuditEntry>, b: LogRecord<AuditEntry>) {
  if (a.entry.timestamp !== b.entry.timestamp) return a.entry.timestamp < b.entry.timestamp ? 1 : -1;
  return b.sequence - a.sequence;
}

function* iterate(records: Array<LogRecord<AuditEntry>>): Generator<AuditEntry, void, undefined> {
  for (const record of records) yield Object.freeze(record.entry);
}

/** Append-only per-degree log of verification and revocation entries. */
export class AuditTrail {
  constructor(private store: LedgerStore) {}

  async append<E extends AuditEntry>(entry: E): Promise<Readonly<E>> {
    await guardStore('audit.append', () => this.store.audit.append(streamFor(entry.degreeId), entry));
    return Object.freeze<E>({ ...entry });
  }

  /**
   * Snapshot of a degree's entries, newest first. The iterator is single-use:
   * once drained it stays empty.
   */
  async queryByDegree(degreeId: string, filter: { kind?: AuditEntryKind } = {}): Promise<IterableIterator<AuditEntry>> {
    const records = await guardStore('audit.read', () => this.store.audit.read(streamFor(degreeId)));
    const matching = records.filter((record) => !filter.kind || record.entry.kind === filter.kind).sort(newestFirst);
    return iterate(matching);
  }

  async verificationHistory(degreeId: string, paging: Paging = {}): Promise<VerificationEvent[]> {
    const { limit, offset } = parseOrThrow(PagingSchema, paging, 'paging');
    const events: VerificationEvent[] = [];
    for (const entry of await this.queryByDegree(degreeId, { kind: 'VERIFICATION' })) {
      if (entry.kind === 'VERIFICATION') events.push(entry);
    }
    return events.slice(offset, offset + limit);
  }

  async verificationsByVerifier(verifierOrgId: string, query: VerifierHistoryQuery = {}): Promise<VerificationPage> {
    const { limit, offset, verified } = parseOrThrow(VerifierHistoryQuerySchema, query, 'query');
    const matching = (await this.verifierEvents(verifierOrgId)).filter(
      (event) => verified === undefined || event.verified === verified
    );
    return {
      items: matching.slice(offset, offset + limit),
      total: matching.length,
      limit,
      offset,
      hasMore: offset + limit < matching.length
    };
  }

  async verifierStatistics(verifierOrgId: string): Promise<VerifierStatistics> {
    const events = await this.verifierEvents(verifierOrgId);
    const successful = events.filter((event) => event.verified).length;
    return {
      verifierOrgId,
      totalVerifications: events.length,
      successfulVerifications: successful,
      failedVerifications: events.length - successful,
      successRate: events.length === 0 ? 0 : successful / events.length,
      lastVerificationAt: events.length === 0 ? null : events[0].timestamp
    };
  }

  /** Verification events recorded for one verifier, newest first. */
  private async verifierEvents(verifierOrgId: string): Promise<VerificationEvent[]> {
    const records = await guardStore('audit.scan', () => this.store.audit.scan());
    const events: VerificationEvent[] = [];
    for (const record of records.sort(newestFirst)) {
      if (record.entry.kind === 'VERIFICATION' && record.entry.verifierOrgId === verifierOrgId) events.push(record.entry);
    }
    return events;
  }
}
