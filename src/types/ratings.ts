// =============================================================================
// SEALED RATINGS — Ledger Types
//
// Records, reveal slots, pending decryption requests, subject aggregates
// and the append-only event log.
// =============================================================================

import { CiphertextHandle } from './fhe';

// ── Encrypted Record Store ─────────────────────────────────────────────

/**
 * A submitted rating. Only ciphertext handles are stored; the plaintext
 * never reaches the service until the oracle reveals it.
 */
export interface EncryptedRecord {
  /** Sequential id starting at 1. 0 is reserved as "no record". */
  id: number;
  subjectId: string;
  encryptedScore: CiphertextHandle;
  encryptedTags: CiphertextHandle;
  createdAt: Date;
}

/** Reveal slot of a record. Immutable once `revealed` is true. */
export interface RevealState {
  score: number;
  tags: string;
  revealed: boolean;
}

export const UNREVEALED: Readonly<RevealState> = Object.freeze({
  score: 0,
  tags: '',
  revealed: false,
});

// ── Decryption Correlation ─────────────────────────────────────────────

export type PendingRequestStatus = 'requested' | 'resolved' | 'expired';

interface PendingRequestBase {
  /** Correlation handle issued by the decryption oracle. Never 0. */
  requestId: number;
  status: PendingRequestStatus;
  requestedAt: Date;
  /** Set when the row leaves the `requested` state. */
  settledAt: Date | null;
}

export interface RecordRevealRequest extends PendingRequestBase {
  kind: 'record_reveal';
  recordId: number;
}

export interface AggregateRevealRequest extends PendingRequestBase {
  kind: 'aggregate_reveal';
  subjectId: string;
  /** Rating count of the subject when the reveal was requested */
  ratingCount: number;
}

export type PendingDecryptionRequest = RecordRevealRequest | AggregateRevealRequest;

export type PendingRequestKind = PendingDecryptionRequest['kind'];

// ── Aggregation Ledger ─────────────────────────────────────────────────

export interface TagFingerprint {
  recordId: number;
  /** SHA-256 of the revealed tag text, hex encoded (64 chars) */
  fingerprint: string;
}

export interface SubjectAggregate {
  subjectId: string;
  encryptedScoreSum: CiphertextHandle;
  ratingCount: number;
  tagFingerprints: TagFingerprint[];
  updatedAt: Date | null;
}

/** Plaintext result of a completed aggregate reveal. */
export interface AggregateDisclosure {
  requestId: number;
  subjectId: string;
  sum: bigint;
  ratingCount: number;
  disclosedAt: Date;
}

// ── Subjects ───────────────────────────────────────────────────────────

export interface Subject {
  id: string;
  displayName: string;
  registeredAt: Date;
}

// ── Event Log ──────────────────────────────────────────────────────────

export interface LedgerEventPayloads {
  SubjectRegistered: { subjectId: string };
  RecordCreated: { id: number; subjectId: string; timestamp: string };
  DecryptionRequested: {
    requestId: number;
    kind: PendingRequestKind;
    /** Record id or subject id, depending on `kind` */
    id: number | string;
  };
  RecordRevealed: { id: number; requestId: number };
  AggregateDecrypted: { subjectId: string; requestId: number };
  DecryptionRequestExpired: { requestId: number; kind: PendingRequestKind };
}

export type LedgerEventType = keyof LedgerEventPayloads;

export interface LedgerEventOf<T extends LedgerEventType> {
  sequence: number;
  type: T;
  payload: LedgerEventPayloads[T];
  occurredAt: Date;
  previousHash: string | null;
  hash: string;
}

export type LedgerEvent = { [T in LedgerEventType]: LedgerEventOf<T> }[LedgerEventType];

/** Event as submitted by the protocol, before sequencing and hashing. */
export type LedgerEventInput = {
  [T in LedgerEventType]: { type: T; payload: LedgerEventPayloads[T] };
}[LedgerEventType];
