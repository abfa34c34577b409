import type { CandidateMatch } from '../store/types';
import type { TrajectoryChannel } from '../trajectory/types';

export type MergeDecisionKind = 'auto_merge' | 'needs_clarification' | 'create_new';

export type MergeDecision =
  | { kind: 'auto_merge'; targetPersonId: string; confidence: number }
  | {
      kind: 'needs_clarification';
      candidates: CandidateMatch[];
      /** What the pipeline does with the person until someone confirms a match. */
      fallback: 'create_new';
    }
  | { kind: 'create_new' };

export interface ResolvablePerson {
  displayName: string;
  location?: string | null;
}

export interface DuplicateResolver {
  resolve(
    person: ResolvablePerson,
    candidates: readonly CandidateMatch[],
    trajectory: TrajectoryChannel,
  ): MergeDecision;
}

export interface ResolverThresholds {
  clarifyThreshold: number;
  autoMergeThreshold: number;
  competitorMargin: number;
}
