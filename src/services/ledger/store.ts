// =============================================================================
// SEALED RATINGS — Ledger Substrate Interface
//
// Durable ordered storage with atomic, serialized transactions and an
// append-only event log.
//
//   ILedgerStore       — transaction boundary
//   PgLedgerStore      — PostgreSQL; serialized by an advisory lock
//   MemoryLedgerStore  — development and tests; serialized by a promise chain
//
// Every mutating protocol operation runs inside exactly one transaction.
// If the work function throws, nothing it wrote becomes visible.
// =============================================================================

import {
  AggregateDisclosure,
  EncryptedRecord,
  LedgerEvent,
  LedgerEventInput,
  PendingDecryptionRequest,
  PendingRequestStatus,
  RevealState,
  Subject,
  SubjectAggregate,
  TagFingerprint,
} from '../../types/ratings';

export interface ListRecordsFilter {
  subjectId?: string;
  limit: number;
  offset: number;
}

export interface ListEventsFilter {
  /** Return events with a sequence strictly greater than this */
  afterSequence: number;
  limit: number;
}

export type SubjectAggregateTotals = Omit<SubjectAggregate, 'tagFingerprints'>;

export interface LedgerReader {
  getRecord(id: number): Promise<EncryptedRecord | null>;
  listRecords(filter: ListRecordsFilter): Promise<EncryptedRecord[]>;
  /** Null only when the record does not exist */
  getReveal(recordId: number): Promise<RevealState | null>;

  getPending(requestId: number): Promise<PendingDecryptionRequest | null>;
  listPending(status?: PendingRequestStatus): Promise<PendingDecryptionRequest[]>;

  getSubject(id: string): Promise<Subject | null>;
  listSubjects(): Promise<Subject[]>;

  getAggregate(subjectId: string): Promise<SubjectAggregate | null>;
  getLatestDisclosure(subjectId: string): Promise<AggregateDisclosure | null>;

  listEvents(filter: ListEventsFilter): Promise<LedgerEvent[]>;

  /** Ledger-wide settings such as the key fingerprint */
  getMeta(key: string): Promise<string | null>;
}

export interface LedgerTransaction extends LedgerReader {
  /** Next record id: 1, 2, 3, … with no gaps across committed transactions */
  allocateRecordId(): Promise<number>;
  /** Insert the record together with its default (unrevealed) reveal slot */
  insertRecord(record: EncryptedRecord): Promise<void>;
  putReveal(recordId: number, reveal: RevealState): Promise<void>;

  /** @throws when `requestId` is already mapped */
  insertPending(request: PendingDecryptionRequest): Promise<void>;
  settlePending(requestId: number, status: Exclude<PendingRequestStatus, 'requested'>, at: Date): Promise<void>;

  insertSubject(subject: Subject): Promise<void>;

  putAggregate(totals: SubjectAggregateTotals): Promise<void>;
  appendTagFingerprint(subjectId: string, fingerprint: TagFingerprint): Promise<void>;
  insertDisclosure(disclosure: AggregateDisclosure): Promise<void>;

  /** Sequence, chain and persist an event */
  appendEvent(input: LedgerEventInput, occurredAt: Date): Promise<LedgerEvent>;

  putMeta(key: string, value: string): Promise<void>;
}

export interface ILedgerStore {
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
  read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
