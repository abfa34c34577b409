export { loadPipelineConfig, parsePipelineConfig } from './config/loader';
export { getAuditDir, getConfigPath, getDataRootDir, getStoreDir } from './config/paths';
export {
  DEFAULT_PIPELINE_CONFIG,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
} from './config/schema';
export { createDuplicateResolver, decideMerge, rankCandidates } from './dedup/resolver';
export type { DuplicateResolver, MergeDecision, MergeDecisionKind } from './dedup/types';
export {
  ConfigError,
  ExtractionError,
  FamilyIntakeError,
  GroupingError,
  NotFoundError,
  StoreUnavailableError,
  type FamilyIntakeErrorCode,
} from './errors';
export { cleanName, inferRelationKind, parseExtractionPayload } from './extraction/payload';
export {
  createCompletionExtractionProvider,
  type CompletionExtractionOptions,
} from './extraction/provider';
export {
  ExtractionResultSchema,
  type ExtractedPerson,
  type ExtractedRelationship,
  type ExtractionProvider,
  type ExtractionResult,
  type RelationKind,
} from './extraction/types';
export { createFamilyGroupingEngine } from './grouping/engine';
export { composeFamilyCode, FAMILY_CODE_PATTERN, normalizeCodeToken } from './grouping/family-code';
export type { FamilyGroup, FamilyGroupingEngine, FamilyGroupStatus } from './grouping/types';
export { createSimilarityScorer, type SimilarityScorer } from './matching/similarity';
export { createFamilyPipeline } from './pipeline/orchestrator';
export type {
  DecisionEntry,
  FamilyPipeline,
  FamilyPipelineDeps,
  FamilyPipelineOptions,
  PipelineIssue,
  PipelineResult,
  PipelineRunOptions,
} from './pipeline/types';
export { createFileStores } from './store/file-store';
export { createMemoryStores } from './store/memory';
export type {
  CandidateMatch,
  FamilyRecord,
  FamilyStore,
  PersonRecord,
  PersonSearchOptions,
  PersonStore,
  RelationshipRecord,
  RelationshipStore,
} from './store/types';
export {
  FileTrajectoryArchive,
  listTrajectoryArchive,
  verifyTrajectoryArchive,
} from './trajectory/archive';
export { formatTrajectory, TrajectoryRecorder } from './trajectory/recorder';
export type { TrajectoryStep, TrajectoryStepType } from './trajectory/types';
