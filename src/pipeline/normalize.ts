import { ExtractionError, formatSchemaIssues } from '../errors';
import {
  ExtractionResultSchema,
  type NormalizedPerson,
  type NormalizedRelationship,
} from '../extraction/types';
import { personKey } from '../grouping/graph';
import type { PipelineIssue } from './types';

export interface NormalizedBatch {
  persons: NormalizedPerson[];
  relationships: NormalizedRelationship[];
  warnings: PipelineIssue[];
}

function mergeInto(target: NormalizedPerson, extra: NormalizedPerson): void {
  target.surname ??= extra.surname;
  target.location ??= extra.location;
  target.age ??= extra.age;
  target.occupation ??= extra.occupation;
  target.gender ??= extra.gender;
  target.rawMentionText ??= extra.rawMentionText;
  target.isSpeaker = target.isSpeaker || extra.isSpeaker;
}

/**
 * Validates an extraction and reduces it to one entry per display name.
 * Blank names are dropped and repeated names folded into their first
 * mention, each with a warning. Throws ExtractionError on a malformed input;
 * an empty person list is left to the caller.
 */
export function normalizeExtraction(input: unknown): NormalizedBatch {
  const parsed = ExtractionResultSchema.safeParse(input);
  if (!parsed.success) {
    throw new ExtractionError(
      `malformed extraction result: ${formatSchemaIssues(parsed.error.issues).join('; ')}`,
      { cause: parsed.error },
    );
  }

  const warnings: PipelineIssue[] = [];
  const byKey = new Map<string, NormalizedPerson>();
  const speakerKey = parsed.data.speakerName ? personKey(parsed.data.speakerName) : '';

  parsed.data.persons.forEach((person, index) => {
    const displayName = person.displayName.replace(/\s+/g, ' ').trim();
    if (!displayName) {
      warnings.push({
        scope: 'person',
        subject: `#${index + 1}`,
        code: 'blank_name',
        message: `person #${index + 1} has no display name and was dropped`,
      });
      return;
    }
    const key = personKey(displayName);
    const entry: NormalizedPerson = {
      ...person,
      displayName,
      isSpeaker: person.isSpeaker || (speakerKey !== '' && key === speakerKey),
    };
    const existing = byKey.get(key);
    if (existing) {
      mergeInto(existing, entry);
      warnings.push({
        scope: 'person',
        subject: displayName,
        code: 'duplicate_person',
        message: `${displayName} is mentioned more than once; mentions were merged`,
      });
      return;
    }
    byKey.set(key, entry);
  });

  return { persons: [...byKey.values()], relationships: parsed.data.relationships, warnings };
}
