import type { PipelineConfigInput } from '../config/schema';
import type { DuplicateResolver, MergeDecision, MergeDecisionKind } from '../dedup/types';
import type { ExtractionProvider, ExtractionResult } from '../extraction/types';
import type { FamilyGroup, FamilyGroupingEngine } from '../grouping/types';
import type { FamilyStore, PersonStore, RelationshipStore } from '../store/types';
import type { TrajectorySink, TrajectoryStep } from '../trajectory/types';
import type { KeyedLock } from '../utils/keyed-lock';

export const PIPELINE_STAGES = ['extracted', 'deduplicated', 'grouped', 'persisted'] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export type PipelinePhase = 'idle' | PipelineStage | 'done' | 'aborted';

export type IssueScope = 'run' | 'person' | 'group' | 'relationship';

export interface PipelineIssue {
  scope: IssueScope;
  /** Display name, group id or `personA -> personB`. */
  subject: string;
  code: string;
  message: string;
}

export interface DecisionEntry {
  extractedName: string;
  decision: MergeDecision;
  decisionKind: MergeDecisionKind;
  /** What persistence does with the person once fallbacks are applied. */
  action: 'merge' | 'create';
  targetPersonId?: string;
  confidence?: number;
  lookupFailed: boolean;
}

export type PersonWriteOutcome =
  | { name: string; status: 'created' | 'merged'; personId: string; familyCode: string | null }
  | { name: string; status: 'failed'; error: string }
  | { name: string; status: 'skipped'; reason: string };

export interface GroupStorageOutcome {
  groupId: string;
  familyCode: string | null;
  status: 'stored' | 'failed' | 'skipped';
  persons: PersonWriteOutcome[];
  linked: number;
  error?: string;
}

export interface PipelineCounts {
  persons: number;
  created: number;
  merged: number;
  clarified: number;
  groups: number;
  grouped: number;
  unassigned: number;
  codesMinted: number;
  codesReused: number;
  linked: number;
  warnings: number;
  errors: number;
}

export interface PipelineResult {
  sessionId: string;
  success: boolean;
  phase: PipelinePhase;
  /** The stage the run could not reach. */
  abortedAt?: PipelineStage;
  cancelled: boolean;
  decisions: DecisionEntry[];
  groups: FamilyGroup[];
  storage: GroupStorageOutcome[];
  counts: PipelineCounts;
  warnings: PipelineIssue[];
  errors: PipelineIssue[];
  trajectory: TrajectoryStep[];
  summary: string;
  fatalError?: { code: string; message: string };
}

export interface FamilyPipelineDeps {
  persons: PersonStore;
  families: FamilyStore;
  relationships: RelationshipStore;
  extractor?: ExtractionProvider;
  resolver?: DuplicateResolver;
  grouping?: FamilyGroupingEngine;
  /** Serializes code minting and group writes per family key. */
  lock?: KeyedLock;
  sink?: TrajectorySink;
}

export interface FamilyPipelineOptions {
  /**
   * `similarity` and `search` travel with every `PersonStore.search` call and
   * override the bundled stores' own defaults.
   */
  config?: PipelineConfigInput;
  /** Enables the file trajectory archive when `trajectory.archive` is set. */
  projectDir?: string;
  clock?: () => Date;
  createSessionId?: () => string;
}

export interface PipelineRunOptions {
  sessionId?: string;
  signal?: AbortSignal;
}

export interface FamilyPipeline {
  /** The extraction is validated at run time; a malformed one aborts the run. */
  run(extraction: ExtractionResult, options?: PipelineRunOptions): Promise<PipelineResult>;
  runFromText(text: string, options?: PipelineRunOptions): Promise<PipelineResult>;
}
