// =============================================================================
// SEALED RATINGS — In-Memory Ledger
//
// Development and test substrate. Transactions run one at a time on a
// promise chain against a private copy of the state; the copy replaces
// the live state only when the work function resolves.
//
// WARNING: state is lost on process restart.
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
  UNREVEALED,
} from '../../types/ratings';
import { sealEvent } from './events';
import {
  ILedgerStore,
  LedgerReader,
  LedgerTransaction,
  ListEventsFilter,
  ListRecordsFilter,
  SubjectAggregateTotals,
} from './store';

interface MemoryState {
  lastRecordId: number;
  records: Map<number, EncryptedRecord>;
  reveals: Map<number, RevealState>;
  pending: Map<number, PendingDecryptionRequest>;
  subjects: Map<string, Subject>;
  aggregates: Map<string, SubjectAggregate>;
  disclosures: AggregateDisclosure[];
  events: LedgerEvent[];
  meta: Map<string, string>;
}

function emptyState(): MemoryState {
  return {
    lastRecordId: 0,
    records: new Map(),
    reveals: new Map(),
    pending: new Map(),
    subjects: new Map(),
    aggregates: new Map(),
    disclosures: [],
    events: [],
    meta: new Map(),
  };
}

function copyOf<T>(value: T): T {
  return structuredClone(value);
}

class MemoryReader implements LedgerReader {
  constructor(protected readonly state: MemoryState) {}

  async getRecord(id: number): Promise<EncryptedRecord | null> {
    const record = this.state.records.get(id);
    return record ? copyOf(record) : null;
  }

  async listRecords(filter: ListRecordsFilter): Promise<EncryptedRecord[]> {
    return [...this.state.records.values()]
      .filter((r) => filter.subjectId === undefined || r.subjectId === filter.subjectId)
      .sort((a, b) => a.id - b.id)
      .slice(filter.offset, filter.offset + filter.limit)
      .map(copyOf);
  }

  async getReveal(recordId: number): Promise<RevealState | null> {
    const reveal = this.state.reveals.get(recordId);
    return reveal ? copyOf(reveal) : null;
  }

  async getPending(requestId: number): Promise<PendingDecryptionRequest | null> {
    const request = this.state.pending.get(requestId);
    return request ? copyOf(request) : null;
  }

  async listPending(status?: PendingRequestStatus): Promise<PendingDecryptionRequest[]> {
    return [...this.state.pending.values()]
      .filter((r) => status === undefined || r.status === status)
      .sort((a, b) => a.requestId - b.requestId)
      .map(copyOf);
  }

  async getSubject(id: string): Promise<Subject | null> {
    const subject = this.state.subjects.get(id);
    return subject ? copyOf(subject) : null;
  }

  async listSubjects(): Promise<Subject[]> {
    return [...this.state.subjects.values()]
      .sort((a, b) => a.registeredAt.getTime() - b.registeredAt.getTime() || a.id.localeCompare(b.id))
      .map(copyOf);
  }

  async getAggregate(subjectId: string): Promise<SubjectAggregate | null> {
    const aggregate = this.state.aggregates.get(subjectId);
    return aggregate ? copyOf(aggregate) : null;
  }

  async getLatestDisclosure(subjectId: string): Promise<AggregateDisclosure | null> {
    const matches = this.state.disclosures.filter((d) => d.subjectId === subjectId);
    const latest = matches[matches.length - 1];
    return latest ? copyOf(latest) : null;
  }

  async listEvents(filter: ListEventsFilter): Promise<LedgerEvent[]> {
    return this.state.events
      .filter((e) => e.sequence > filter.afterSequence)
      .slice(0, filter.limit)
      .map(copyOf);
  }

  async getMeta(key: string): Promise<string | null> {
    return this.state.meta.get(key) ?? null;
  }
}

class MemoryTransaction extends MemoryReader implements LedgerTransaction {
  async allocateRecordId(): Promise<number> {
    this.state.lastRecordId += 1;
    return this.state.lastRecordId;
  }

  async insertRecord(record: EncryptedRecord): Promise<void> {
    if (this.state.records.has(record.id)) {
      throw new Error(`Record ${record.id} already exists`);
    }
    this.state.records.set(record.id, copyOf(record));
    this.state.reveals.set(record.id, { ...UNREVEALED });
  }

  async putReveal(recordId: number, reveal: RevealState): Promise<void> {
    const current = this.state.reveals.get(recordId);
    if (!current) throw new Error(`Record ${recordId} has no reveal slot`);
    if (current.revealed) throw new Error(`Reveal state of record ${recordId} is immutable`);
    this.state.reveals.set(recordId, { ...reveal });
  }

  async insertPending(request: PendingDecryptionRequest): Promise<void> {
    if (this.state.pending.has(request.requestId)) {
      throw new Error(`Decryption request ${request.requestId} is already mapped`);
    }
    this.state.pending.set(request.requestId, copyOf(request));
  }

  async settlePending(
    requestId: number,
    status: Exclude<PendingRequestStatus, 'requested'>,
    at: Date,
  ): Promise<void> {
    const request = this.state.pending.get(requestId);
    if (!request || request.status !== 'requested') {
      throw new Error(`Decryption request ${requestId} is not outstanding`);
    }
    request.status = status;
    request.settledAt = at;
  }

  async insertSubject(subject: Subject): Promise<void> {
    if (this.state.subjects.has(subject.id)) {
      throw new Error(`Subject ${subject.id} already exists`);
    }
    this.state.subjects.set(subject.id, copyOf(subject));
  }

  async putAggregate(totals: SubjectAggregateTotals): Promise<void> {
    const current = this.state.aggregates.get(totals.subjectId);
    this.state.aggregates.set(totals.subjectId, {
      ...totals,
      tagFingerprints: current ? current.tagFingerprints : [],
    });
  }

  async appendTagFingerprint(subjectId: string, fingerprint: TagFingerprint): Promise<void> {
    const aggregate = this.state.aggregates.get(subjectId);
    if (!aggregate) throw new Error(`No aggregate for subject ${subjectId}`);
    aggregate.tagFingerprints.push({ ...fingerprint });
  }

  async insertDisclosure(disclosure: AggregateDisclosure): Promise<void> {
    this.state.disclosures.push(copyOf(disclosure));
  }

  async appendEvent(input: LedgerEventInput, occurredAt: Date): Promise<LedgerEvent> {
    const previous = this.state.events[this.state.events.length - 1];
    const event = sealEvent(input, this.state.events.length + 1, previous ? previous.hash : null, occurredAt);
    this.state.events.push(event);
    return copyOf(event);
  }

  async putMeta(key: string, value: string): Promise<void> {
    this.state.meta.set(key, value);
  }
}

export class MemoryLedgerStore implements ILedgerStore {
  private state: MemoryState = emptyState();
  private tail: Promise<unknown> = Promise.resolve();

  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const draft = copyOf(this.state);
      const result = await work(new MemoryTransaction(draft));
      this.state = draft;
      return result;
    };

    const next = this.tail.then(run);
    this.tail = next.catch(() => undefined);
    return next;
  }

  async read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T> {
    return work(new MemoryReader(this.state));
  }

  async ping(): Promise<void> {
    // always reachable
  }

  async close(): Promise<void> {
    await this.tail;
  }
}
