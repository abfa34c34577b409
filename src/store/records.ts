import { createSimilarityScorer, type SimilarityScorer } from '../matching/similarity';
import type {
  CandidateMatch,
  PersonAttributes,
  PersonSearchOptions,
  PersonRecord,
  PersonUpdate,
  RelationshipRecord,
} from './types';

/** Store-wide defaults; per-call options win over everything but a custom scorer. */
export interface StoreSearchOptions extends PersonSearchOptions {
  scorer?: SimilarityScorer;
}

const DEFAULT_MIN_CANDIDATE_SCORE = 0.5;
const DEFAULT_MAX_CANDIDATES = 10;

export function scoreCandidates(
  records: Iterable<PersonRecord>,
  query: string,
  attributes: PersonAttributes | undefined,
  defaults: StoreSearchOptions,
  request: PersonSearchOptions = {},
): CandidateMatch[] {
  const floor =
    request.minCandidateScore ?? defaults.minCandidateScore ?? DEFAULT_MIN_CANDIDATE_SCORE;
  const limit = request.maxCandidates ?? defaults.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
  const scorer =
    defaults.scorer ?? createSimilarityScorer({ ...defaults.similarity, ...request.similarity });
  const matches: CandidateMatch[] = [];
  for (const record of records) {
    const score = scorer.score(query, record.displayName, {
      a: { location: attributes?.location },
      b: { location: record.location },
    });
    if (score >= floor) {
      matches.push({ personId: record.personId, score, matchedOn: record.displayName });
    }
  }
  return matches.sort((a, b) => b.score - a.score).slice(0, limit);
}

function hasValue<T>(value: T | null | undefined): value is T {
  if (value === null || value === undefined) return false;
  return typeof value !== 'string' || value.trim().length > 0;
}

/**
 * Stored attributes win; a new mention only fills gaps. A family code is the
 * exception: the latest grouping result replaces it.
 */
export function applyPersonUpdate(
  record: PersonRecord,
  fields: PersonUpdate,
  now: string,
): PersonRecord {
  const next: PersonRecord = { ...record, mentions: [...record.mentions], updatedAt: now };
  if (!hasValue(next.surname) && hasValue(fields.surname)) next.surname = fields.surname;
  if (!hasValue(next.location) && hasValue(fields.location)) next.location = fields.location;
  if (!hasValue(next.age) && hasValue(fields.age)) next.age = fields.age;
  if (!hasValue(next.occupation) && hasValue(fields.occupation)) next.occupation = fields.occupation;
  if (!hasValue(next.gender) && hasValue(fields.gender)) next.gender = fields.gender;
  if (hasValue(fields.familyCode)) next.familyCode = fields.familyCode;
  for (const mention of fields.mentions ?? []) {
    if (mention && !next.mentions.includes(mention)) next.mentions.push(mention);
  }
  return next;
}

const SYMMETRIC_KINDS = new Set(['spouse', 'sibling', 'other']);

/** Identity of an edge: symmetric kinds ignore endpoint order. */
export function relationshipKey(edge: RelationshipRecord): string {
  const ends = SYMMETRIC_KINDS.has(edge.relationKind)
    ? [edge.personAId, edge.personBId].sort()
    : [edge.personAId, edge.personBId];
  return `${ends.join('|')}|${edge.relationKind}`;
}

export function familyLookupKey(surname: string, location: string): string {
  return `${surname.trim().toUpperCase()}|${location.trim().toUpperCase()}`;
}
