import { z } from 'zod';

export const DedupConfigSchema = z
  .object({
    clarifyThreshold: z.number().min(0).max(1).default(0.85),
    autoMergeThreshold: z.number().min(0).max(1).default(0.95),
    competitorMargin: z.number().min(0).max(1).default(0.05),
  })
  .refine((value) => value.autoMergeThreshold >= value.clarifyThreshold, {
    message: 'autoMergeThreshold must be >= clarifyThreshold',
    path: ['autoMergeThreshold'],
  });

export type DedupConfig = z.infer<typeof DedupConfigSchema>;

export const SimilarityConfigSchema = z.object({
  locationBonus: z.number().min(0).max(0.2).default(0.05),
  stripHonorifics: z.boolean().default(true),
});

export type SimilarityConfig = z.infer<typeof SimilarityConfigSchema>;

export const ConcurrencyConfigSchema = z.object({
  maxConcurrentLookups: z.number().int().min(1).max(32).default(4),
  maxConcurrentGroups: z.number().int().min(1).max(32).default(4),
});

export type ConcurrencyConfig = z.infer<typeof ConcurrencyConfigSchema>;

// Used by the bundled stores when answering PersonStore.search.
export const SearchConfigSchema = z.object({
  minCandidateScore: z.number().min(0).max(1).default(0.5),
  maxCandidates: z.number().int().min(1).max(50).default(10),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const TrajectoryConfigSchema = z.object({
  archive: z.boolean().default(false),
  maxContentChars: z.number().int().min(80).max(20_000).default(2000),
});

export type TrajectoryConfig = z.infer<typeof TrajectoryConfigSchema>;

export const PipelineConfigSchema = z.object({
  dedup: DedupConfigSchema.default({}),
  similarity: SimilarityConfigSchema.default({}),
  concurrency: ConcurrencyConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  trajectory: TrajectoryConfigSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = PipelineConfigSchema.parse({});
