// =============================================================================
// SEALED RATINGS — Response Presenters
//
// JSON shapes for values JSON cannot carry directly: bigint sums become
// decimal strings, dates ISO 8601.
// =============================================================================

import { DisclosureView } from '../services/ratings/aggregates';
import { CallbackOutcome } from '../services/ratings/correlation';
import { AggregateDisclosure, SubjectAggregate } from '../types/ratings';

export interface DisclosureJson {
  requestId: number;
  subjectId: string;
  sum: string;
  ratingCount: number;
  disclosedAt: string;
  average?: number | null;
}

export function presentDisclosure(disclosure: AggregateDisclosure | DisclosureView): DisclosureJson {
  return {
    requestId: disclosure.requestId,
    subjectId: disclosure.subjectId,
    sum: disclosure.sum.toString(),
    ratingCount: disclosure.ratingCount,
    disclosedAt: disclosure.disclosedAt.toISOString(),
    ...('average' in disclosure ? { average: disclosure.average } : {}),
  };
}

export function presentOutcome(outcome: CallbackOutcome) {
  if (outcome.outcome === 'aggregate_disclosed') {
    return { ...outcome, disclosure: presentDisclosure(outcome.disclosure) };
  }
  return outcome;
}

export function presentAggregate(aggregate: SubjectAggregate, initialized: boolean) {
  return {
    subjectId: aggregate.subjectId,
    encryptedScoreSum: aggregate.encryptedScoreSum,
    initialized,
    ratingCount: aggregate.ratingCount,
    tagFingerprints: aggregate.tagFingerprints,
    updatedAt: aggregate.updatedAt,
  };
}
