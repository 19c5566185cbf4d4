import type { AuditEntry, DegreeRecord, Organization } from '../domain/entities';

export interface Versioned<T> {
  value: T;
  version: number;
}

export interface LogRecord<T> {
  sequence: number;
  entry: T;
}

/** Key/value table with optimistic versioning. Versions start at 1 on insert. */
export interface KeyValueTable<T> {
  get(key: string): Promise<Versioned<T> | null>;
  /** Inserts only when the key is absent; false means someone got there first. */
  putIfAbsent(key: string, value: T): Promise<boolean>;
  /** Replaces the value only while the stored version still equals `expectedVersion`. */
  compareAndSwap(key: string, expectedVersion: number, value: T): Promise<boolean>;
  delete(key: string, expectedVersion: number): Promise<boolean>;
  values(): Promise<T[]>;
}

export interface AppendLog<T> {
  append(stream: string, entry: T): Promise<number>;
  read(stream: string): Promise<Array<LogRecord<T>>>;
  /** Every record across all streams, in append order. */
  scan(): Promise<Array<LogRecord<T>>>;
}

export interface LedgerStore {
  organizations: KeyValueTable<Organization>;
  degrees: KeyValueTable<DegreeRecord>;
  /** certificateHash -> degreeId */
  certificateHashes: KeyValueTable<string>;
  audit: AppendLog<AuditEntry>;
}

class InMemoryTable<T> implements KeyValueTable<T> {
  private rows = new Map<string, Versioned<T>>();

  async get(key: string): Promise<Versioned<T> | null> {
    const row = this.rows.get(key);
    return row ? { value: structuredClone(row.value), version: row.version } : null;
  }

  async putIfAbsent(key: string, value: T): Promise<boolean> {
    if (this.rows.has(key)) return false;
    this.rows.set(key, { value: structuredClone(value), version: 1 });
    return true;
  }

  async compareAndSwap(key: string, expectedVersion: number, value: T): Promise<boolean> {
    const row = this.rows.get(key);
    if (!row || row.version !== expectedVersion) return false;
    this.rows.set(key, { value: structuredClone(value), version: row.version + 1 });
    return true;
  }

  async delete(key: string, expectedVersion: number): Promise<boolean> {
    const row = this.rows.get(key);
    if (!row || row.version !== expectedVersion) return false;
    this.rows.delete(key);
    return true;
  }

  async values(): Promise<T[]> {
    return Array.from(this.rows.values(), (row) => structuredClone(row.value));
  }
}

class InMemoryLog<T> implements AppendLog<T> {
  private streams = new Map<string, Array<LogRecord<T>>>();
  private nextSequence = 1;

  async append(stream: string, entry: T): Promise<number> {
    const sequence = this.nextSequence++;
    const records = this.streams.get(stream) ?? [];
    records.push({ sequence, entry: structuredClone(entry) });
    this.streams.set(stream, records);
    return sequence;
  }

  async read(stream: string): Promise<Array<LogRecord<T>>> {
    const records = this.streams.get(stream) ?? [];
    return records.map((record) => ({ sequence: record.sequence, entry: structuredClone(record.entry) }));
  }

  async scan(): Promise<Array<LogRecord<T>>> {
    const all: Array<LogRecord<T>> = [];
    for (const records of this.streams.values()) {
      for (const record of records) all.push({ sequence: record.sequence, entry: structuredClone(record.entry) });
    }
    return all.sort((a, b) => a.sequence - b.sequence);
  }
}

/**
 * Process-lifetime store. Every read and write copies, so callers can never
 * mutate committed state through a returned object.
 */
export function createInMemoryLedgerStore(): LedgerStore {
  return {
    organizations: new InMemoryTable<Organization>(),
    degrees: new InMemoryTable<DegreeRecord>(),
    certificateHashes: new InMemoryTable<string>(),
    audit: new InMemoryLog<AuditEntry>()
  };
}
