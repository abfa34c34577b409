import { z } from 'zod';

export const RelationKindSchema = z.enum(['spouse', 'parent_child', 'sibling', 'other']);

export type RelationKind = z.infer<typeof RelationKindSchema>;

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.replace(/\s+/g, ' ').trim();
    return trimmed ? trimmed : undefined;
  });

export const ExtractedPersonSchema = z.object({
  displayName: z.string(),
  surname: optionalText,
  location: optionalText,
  age: z.number().int().min(0).max(150).nullish().transform((value) => value ?? undefined),
  occupation: optionalText,
  gender: optionalText,
  isSpeaker: z.boolean().default(false),
  rawMentionText: optionalText,
});

export type ExtractedPerson = z.input<typeof ExtractedPersonSchema>;
export type NormalizedPerson = z.output<typeof ExtractedPersonSchema>;

export const ExtractedRelationshipSchema = z.object({
  personA: z.string(),
  personB: z.string(),
  relationKind: RelationKindSchema,
  relationTerm: optionalText,
});

export type ExtractedRelationship = z.input<typeof ExtractedRelationshipSchema>;
export type NormalizedRelationship = z.output<typeof ExtractedRelationshipSchema>;

export const ExtractionResultSchema = z.object({
  persons: z.array(ExtractedPersonSchema),
  relationships: z.array(ExtractedRelationshipSchema).default([]),
  speakerName: optionalText,
  rawText: z.string().optional(),
});

export type ExtractionResult = z.input<typeof ExtractionResultSchema>;
export type NormalizedExtraction = z.output<typeof ExtractionResultSchema>;

export interface ExtractionProvider {
  /** Throws ExtractionError on empty or malformed output. */
  extract(text: string): Promise<ExtractionResult>;
}
