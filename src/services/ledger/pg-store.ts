// =============================================================================
// SEALED RATINGS — PostgreSQL Ledger
//
// Every transaction takes the same transaction-scoped advisory lock right
// after BEGIN, so writers are fully serialized: record ids come from a
// counter row and event sequences from MAX(sequence) without gaps or races.
// Reads run outside the lock against committed state.
// =============================================================================

import { Pool, PoolClient } from 'pg';
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
import { parseLedgerEventInput, sealEvent } from './events';
import {
  ILedgerStore,
  LedgerReader,
  LedgerTransaction,
  ListEventsFilter,
  ListRecordsFilter,
  SubjectAggregateTotals,
} from './store';

/** pg_advisory_xact_lock key shared by every ledger writer */
const LEDGER_LOCK_KEY = 0x52415447;

// ── Row Shapes ─────────────────────────────────────────────────────────
// BIGINT and NUMERIC columns arrive as strings.

interface RecordRow {
  id: number;
  subject_id: string;
  encrypted_score: string;
  encrypted_tags: string;
  created_at: Date;
}

interface RevealRow {
  score: string;
  tags: string;
  revealed: boolean;
}

interface PendingRow {
  request_id: string;
  kind: string;
  record_id: number | null;
  subject_id: string | null;
  rating_count: number | null;
  status: string;
  requested_at: Date;
  settled_at: Date | null;
}

interface SubjectRow {
  id: string;
  display_name: string;
  registered_at: Date;
}

interface AggregateRow {
  subject_id: string;
  encrypted_score_sum: string;
  rating_count: number;
  updated_at: Date | null;
}

interface FingerprintRow {
  record_id: number;
  fingerprint: string;
}

interface DisclosureRow {
  request_id: string;
  subject_id: string;
  sum: string;
  rating_count: number;
  disclosed_at: Date;
}

interface EventRow {
  sequence: string;
  type: string;
  payload: unknown;
  occurred_at: Date;
  previous_hash: string | null;
  hash: string;
}

function toRecord(row: RecordRow): EncryptedRecord {
  return {
    id: row.id,
    subjectId: row.subject_id,
    encryptedScore: row.encrypted_score,
    encryptedTags: row.encrypted_tags,
    createdAt: row.created_at,
  };
}

function toStatus(value: string): PendingRequestStatus {
  if (value === 'requested' || value === 'resolved' || value === 'expired') return value;
  throw new Error(`Unknown pending request status in ledger: ${value}`);
}

function toPending(row: PendingRow): PendingDecryptionRequest {
  const base = {
    requestId: Number(row.request_id),
    status: toStatus(row.status),
    requestedAt: row.requested_at,
    settledAt: row.settled_at,
  };
  if (row.kind === 'record_reveal' && row.record_id !== null) {
    return { ...base, kind: 'record_reveal', recordId: row.record_id };
  }
  if (row.kind === 'aggregate_reveal' && row.subject_id !== null && row.rating_count !== null) {
    return { ...base, kind: 'aggregate_reveal', subjectId: row.subject_id, ratingCount: row.rating_count };
  }
  throw new Error(`Inconsistent pending request row ${row.request_id}`);
}

function toSubject(row: SubjectRow): Subject {
  return { id: row.id, displayName: row.display_name, registeredAt: row.registered_at };
}

function toDisclosure(row: DisclosureRow): AggregateDisclosure {
  return {
    requestId: Number(row.request_id),
    subjectId: row.subject_id,
    sum: BigInt(row.sum),
    ratingCount: row.rating_count,
    disclosedAt: row.disclosed_at,
  };
}

function toEvent(row: EventRow): LedgerEvent {
  const input = parseLedgerEventInput(row.type, row.payload);
  return {
    ...input,
    sequence: Number(row.sequence),
    occurredAt: row.occurred_at,
    previousHash: row.previous_hash,
    hash: row.hash,
  };
}

// ── Reader ─────────────────────────────────────────────────────────────

class PgReader implements LedgerReader {
  constructor(protected readonly client: PoolClient) {}

  async getRecord(id: number): Promise<EncryptedRecord | null> {
    const result = await this.client.query<RecordRow>(
      `SELECT id, subject_id, encrypted_score, encrypted_tags, created_at
       FROM encrypted_records WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
  }

  async listRecords(filter: ListRecordsFilter): Promise<EncryptedRecord[]> {
    const result = await this.client.query<RecordRow>(
      `SELECT id, subject_id, encrypted_score, encrypted_tags, created_at
       FROM encrypted_records
       WHERE ($1::text IS NULL OR subject_id = $1)
       ORDER BY id
       LIMIT $2 OFFSET $3`,
      [filter.subjectId ?? null, filter.limit, filter.offset]
    );
    return result.rows.map(toRecord);
  }

  async getReveal(recordId: number): Promise<RevealState | null> {
    const result = await this.client.query<RevealRow>(
      `SELECT score, tags, revealed FROM record_reveals WHERE record_id = $1`,
      [recordId]
    );
    if (result.rows.length === 0) return null;
    const row = result.rows[0];
    return { score: Number(row.score), tags: row.tags, revealed: row.revealed };
  }

  async getPending(requestId: number): Promise<PendingDecryptionRequest | null> {
    const result = await this.client.query<PendingRow>(
      `SELECT request_id, kind, record_id, subject_id, rating_count, status, requested_at, settled_at
       FROM pending_decryptions WHERE request_id = $1`,
      [requestId]
    );
    return result.rows.length > 0 ? toPending(result.rows[0]) : null;
  }

  async listPending(status?: PendingRequestStatus): Promise<PendingDecryptionRequest[]> {
    const result = await this.client.query<PendingRow>(
      `SELECT request_id, kind, record_id, subject_id, rating_count, status, requested_at, settled_at
       FROM pending_decryptions
       WHERE ($1::text IS NULL OR status = $1)
       ORDER BY request_id`,
      [status ?? null]
    );
    return result.rows.map(toPending);
  }

  async getSubject(id: string): Promise<Subject | null> {
    const result = await this.client.query<SubjectRow>(
      `SELECT id, display_name, registered_at FROM subjects WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toSubject(result.rows[0]) : null;
  }

  async listSubjects(): Promise<Subject[]> {
    const result = await this.client.query<SubjectRow>(
      `SELECT id, display_name, registered_at FROM subjects ORDER BY registered_at, id`
    );
    return result.rows.map(toSubject);
  }

  async getAggregate(subjectId: string): Promise<SubjectAggregate | null> {
    const result = await this.client.query<AggregateRow>(
      `SELECT subject_id, encrypted_score_sum, rating_count, updated_at
       FROM subject_aggregates WHERE subject_id = $1`,
      [subjectId]
    );
    if (result.rows.length === 0) return null;
    const row = result.rows[0];

    const fingerprints = await this.client.query<FingerprintRow>(
      `SELECT record_id, fingerprint FROM aggregate_tag_fingerprints
       WHERE subject_id = $1 ORDER BY position`,
      [subjectId]
    );

    return {
      subjectId: row.subject_id,
      encryptedScoreSum: row.encrypted_score_sum,
      ratingCount: row.rating_count,
      tagFingerprints: fingerprints.rows.map((f) => ({ recordId: f.record_id, fingerprint: f.fingerprint })),
      updatedAt: row.updated_at,
    };
  }

  async getLatestDisclosure(subjectId: string): Promise<AggregateDisclosure | null> {
    const result = await this.client.query<DisclosureRow>(
      `SELECT request_id, subject_id, sum, rating_count, disclosed_at
       FROM aggregate_disclosures
       WHERE subject_id = $1
       ORDER BY disclosed_at DESC, request_id DESC
       LIMIT 1`,
      [subjectId]
    );
    return result.rows.length > 0 ? toDisclosure(result.rows[0]) : null;
  }

  async listEvents(filter: ListEventsFilter): Promise<LedgerEvent[]> {
    const result = await this.client.query<EventRow>(
      `SELECT sequence, type, payload, occurred_at, previous_hash, hash
       FROM ledger_events
       WHERE sequence > $1
       ORDER BY sequence
       LIMIT $2`,
      [filter.afterSequence, filter.limit]
    );
    return result.rows.map(toEvent);
  }

  async getMeta(key: string): Promise<string | null> {
    const result = await this.client.query<{ value: string }>(
      `SELECT value FROM ledger_meta WHERE key = $1`,
      [key]
    );
    return result.rows.length > 0 ? result.rows[0].value : null;
  }
}

// ── Transaction ────────────────────────────────────────────────────────

class PgTransaction extends PgReader implements LedgerTransaction {
  async allocateRecordId(): Promise<number> {
    const result = await this.client.query<{ value: string }>(
      `UPDATE ledger_counters SET value = value + 1 WHERE name = 'record_id' RETURNING value`
    );
    if (result.rows.length === 0) {
      throw new Error('Ledger counter "record_id" is missing; run the schema migration');
    }
    return Number(result.rows[0].value);
  }

  async insertRecord(record: EncryptedRecord): Promise<void> {
    await this.client.query(
      `INSERT INTO encrypted_records (id, subject_id, encrypted_score, encrypted_tags, created_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [record.id, record.subjectId, record.encryptedScore, record.encryptedTags, record.createdAt]
    );
    await this.client.query(
      `INSERT INTO record_reveals (record_id) VALUES ($1)`,
      [record.id]
    );
  }

  async putReveal(recordId: number, reveal: RevealState): Promise<void> {
    const result = await this.client.query(
      `UPDATE record_reveals SET score = $2, tags = $3, revealed = $4
       WHERE record_id = $1`,
      [recordId, reveal.score, reveal.tags, reveal.revealed]
    );
    if (result.rowCount !== 1) {
      throw new Error(`Record ${recordId} has no reveal slot`);
    }
  }

  async insertPending(request: PendingDecryptionRequest): Promise<void> {
    const recordId = request.kind === 'record_reveal' ? request.recordId : null;
    const subjectId = request.kind === 'aggregate_reveal' ? request.subjectId : null;
    const ratingCount = request.kind === 'aggregate_reveal' ? request.ratingCount : null;

    await this.client.query(
      `INSERT INTO pending_decryptions
         (request_id, kind, record_id, subject_id, rating_count, status, requested_at, settled_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        request.requestId, request.kind, recordId, subjectId, ratingCount,
        request.status, request.requestedAt, request.settledAt,
      ]
    );
  }

  async settlePending(
    requestId: number,
    status: Exclude<PendingRequestStatus, 'requested'>,
    at: Date,
  ): Promise<void> {
    const result = await this.client.query(
      `UPDATE pending_decryptions SET status = $2, settled_at = $3
       WHERE request_id = $1 AND status = 'requested'`,
      [requestId, status, at]
    );
    if (result.rowCount !== 1) {
      throw new Error(`Decryption request ${requestId} is not outstanding`);
    }
  }

  async insertSubject(subject: Subject): Promise<void> {
    await this.client.query(
      `INSERT INTO subjects (id, display_name, registered_at) VALUES ($1, $2, $3)`,
      [subject.id, subject.displayName, subject.registeredAt]
    );
  }

  async putAggregate(totals: SubjectAggregateTotals): Promise<void> {
    await this.client.query(
      `INSERT INTO subject_aggregates (subject_id, encrypted_score_sum, rating_count, updated_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (subject_id) DO UPDATE
         SET encrypted_score_sum = EXCLUDED.encrypted_score_sum,
             rating_count = EXCLUDED.rating_count,
             updated_at = EXCLUDED.updated_at`,
      [totals.subjectId, totals.encryptedScoreSum, totals.ratingCount, totals.updatedAt]
    );
  }

  async appendTagFingerprint(subjectId: string, fingerprint: TagFingerprint): Promise<void> {
    await this.client.query(
      `INSERT INTO aggregate_tag_fingerprints (subject_id, record_id, fingerprint)
       VALUES ($1, $2, $3)`,
      [subjectId, fingerprint.recordId, fingerprint.fingerprint]
    );
  }

  async insertDisclosure(disclosure: AggregateDisclosure): Promise<void> {
    await this.client.query(
      `INSERT INTO aggregate_disclosures (request_id, subject_id, sum, rating_count, disclosed_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [
        disclosure.requestId, disclosure.subjectId, disclosure.sum.toString(),
        disclosure.ratingCount, disclosure.disclosedAt,
      ]
    );
  }

  async appendEvent(input: LedgerEventInput, occurredAt: Date): Promise<LedgerEvent> {
    const head = await this.client.query<{ sequence: string; hash: string }>(
      `SELECT sequence, hash FROM ledger_events ORDER BY sequence DESC LIMIT 1`
    );
    const previous = head.rows.length > 0 ? head.rows[0] : null;
    const sequence = previous ? Number(previous.sequence) + 1 : 1;
    const event = sealEvent(input, sequence, previous ? previous.hash : null, occurredAt);

    await this.client.query(
      `INSERT INTO ledger_events (sequence, type, payload, occurred_at, previous_hash, hash)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        event.sequence, event.type, JSON.stringify(event.payload),
        event.occurredAt, event.previousHash, event.hash,
      ]
    );
    return event;
  }

  async putMeta(key: string, value: string): Promise<void> {
    await this.client.query(
      `INSERT INTO ledger_meta (key, value) VALUES ($1, $2)
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`,
      [key, value]
    );
  }
}

// ── Store ──────────────────────────────────────────────────────────────

export class PgLedgerStore implements ILedgerStore {
  constructor(private readonly pool: Pool) {}

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      await client.query('SELECT pg_advisory_xact_lock($1)', [LEDGER_LOCK_KEY]);

      const result = await work(new PgTransaction(client));

      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(new PgReader(client));
    } finally {
      client.release();
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
