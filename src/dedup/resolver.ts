import { normalizeName } from '../matching/similarity';
import type { CandidateMatch } from '../store/types';
import type { TrajectoryChannel } from '../trajectory/types';
import type {
  DuplicateResolver,
  MergeDecision,
  ResolvablePerson,
  ResolverThresholds,
} from './types';

export const DEFAULT_RESOLVER_THRESHOLDS: ResolverThresholds = {
  clarifyThreshold: 0.85,
  autoMergeThreshold: 0.95,
  competitorMargin: 0.05,
};

// Score differences like 0.97 - 0.92 land a hair under the margin in floating point.
const GAP_EPSILON = 1e-9;

/**
 * Drops non-finite scores, clamps the rest into [0, 1] and orders them by
 * descending score. Equal scores keep the store's order.
 */
export function rankCandidates(candidates: readonly CandidateMatch[]): CandidateMatch[] {
  return candidates
    .filter((candidate) => Number.isFinite(candidate.score))
    .map((candidate, index) => ({
      candidate: { ...candidate, score: Math.min(1, Math.max(0, candidate.score)) },
      index,
    }))
    .sort((a, b) => b.candidate.score - a.candidate.score || a.index - b.index)
    .map((entry) => entry.candidate);
}

function formatScore(score: number): string {
  return score.toFixed(2);
}

function isContested(ranked: readonly CandidateMatch[], margin: number): boolean {
  const best = ranked[0];
  const runnerUp = ranked[1];
  return (
    best !== undefined &&
    runnerUp !== undefined &&
    best.score - runnerUp.score + GAP_EPSILON < margin
  );
}

/**
 * The one candidate whose stored name equals the query, ignoring case and
 * spacing but not honorifics. None when zero or several qualify.
 */
function findExactNameMatch(
  ranked: readonly CandidateMatch[],
  queryName: string,
): CandidateMatch | undefined {
  const key = normalizeName(queryName, false);
  const exact = ranked.filter((candidate) => normalizeName(candidate.matchedOn, false) === key);
  return exact.length === 1 ? exact[0] : undefined;
}

/**
 * Tiers the ranked candidates. With `queryName`, a near tie at the top is
 * settled in favour of a unique exact-name candidate that clears auto-merge.
 */
export function decideMerge(
  ranked: readonly CandidateMatch[],
  thresholds: ResolverThresholds = DEFAULT_RESOLVER_THRESHOLDS,
  queryName?: string,
): MergeDecision {
  const best = ranked[0];
  if (!best || best.score < thresholds.clarifyThreshold) return { kind: 'create_new' };

  if (best.score >= thresholds.autoMergeThreshold) {
    if (!isContested(ranked, thresholds.competitorMargin)) {
      return { kind: 'auto_merge', targetPersonId: best.personId, confidence: best.score };
    }
    const exact = queryName === undefined ? undefined : findExactNameMatch(ranked, queryName);
    if (exact && exact.score >= thresholds.autoMergeThreshold) {
      return { kind: 'auto_merge', targetPersonId: exact.personId, confidence: exact.score };
    }
  }
  return {
    kind: 'needs_clarification',
    candidates: ranked.filter((candidate) => candidate.score >= thresholds.clarifyThreshold),
    fallback: 'create_new',
  };
}

function explain(
  decision: MergeDecision,
  ranked: readonly CandidateMatch[],
  thresholds: ResolverThresholds,
): string {
  const best = ranked[0];
  if (decision.kind === 'create_new') {
    return best
      ? `best score ${formatScore(best.score)} is below ${formatScore(thresholds.clarifyThreshold)}`
      : 'no stored person resembles this name';
  }
  if (decision.kind === 'auto_merge') {
    if (isContested(ranked, thresholds.competitorMargin)) {
      const scores = ranked
        .filter((candidate) => candidate.score >= thresholds.autoMergeThreshold)
        .map((candidate) => formatScore(candidate.score))
        .join(', ');
      return `exact name match settles a near tie (${scores})`;
    }
    const runnerUp = ranked[1];
    const rival = runnerUp ? `, next best ${formatScore(runnerUp.score)}` : '';
    return `best score ${formatScore(decision.confidence)} clears ${formatScore(thresholds.autoMergeThreshold)}${rival}`;
  }
  const scores = decision.candidates.map((candidate) => formatScore(candidate.score)).join(', ');
  return best && best.score >= thresholds.autoMergeThreshold
    ? `top candidates too close to call (${scores})`
    : `plausible match below auto-merge threshold (${scores})`;
}

export function createDuplicateResolver(
  thresholds: Partial<ResolverThresholds> = {},
): DuplicateResolver {
  const effective: ResolverThresholds = { ...DEFAULT_RESOLVER_THRESHOLDS, ...thresholds };

  return {
    resolve(
      person: ResolvablePerson,
      candidates: readonly CandidateMatch[],
      trajectory: TrajectoryChannel,
    ): MergeDecision {
      const ranked = rankCandidates(candidates);
      trajectory.observe(`${person.displayName}: ${ranked.length} candidate(s)`, {
        person: person.displayName,
        candidates: ranked.map((candidate) => ({
          personId: candidate.personId,
          score: candidate.score,
          matchedOn: candidate.matchedOn,
        })),
        dropped: candidates.length - ranked.length,
      });

      const decision = decideMerge(ranked, effective, person.displayName);
      trajectory.reason(explain(decision, ranked, effective), {
        person: person.displayName,
        thresholds: { ...effective },
      });

      if (decision.kind === 'auto_merge') {
        trajectory.result(`merge ${person.displayName} into ${decision.targetPersonId}`, {
          person: person.displayName,
          decision: decision.kind,
          targetPersonId: decision.targetPersonId,
          confidence: decision.confidence,
        });
      } else if (decision.kind === 'create_new') {
        trajectory.result(`create ${person.displayName} as a new person`, {
          person: person.displayName,
          decision: decision.kind,
        });
      } else {
        trajectory.result(`${person.displayName} needs clarification`, {
          person: person.displayName,
          decision: decision.kind,
          candidateIds: decision.candidates.map((candidate) => candidate.personId),
        });
        trajectory.reason('no reviewer in the loop; applying fallback policy', {
          person: person.displayName,
          fallback: decision.fallback,
        });
        trajectory.result(`fallback: create ${person.displayName} as a new person`, {
          person: person.displayName,
          decision: decision.fallback,
        });
      }
      return decision;
    },
  };
}
