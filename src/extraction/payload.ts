import { z } from 'zod';
import { ExtractionError, formatSchemaIssues } from '../errors';
import type {
  ExtractedPerson,
  ExtractedRelationship,
  ExtractionResult,
  RelationKind,
} from './types';

const nullableText = z.string().nullish();

const RawPersonSchema = z.object({
  name: nullableText,
  gender: nullableText,
  age: z.union([z.number(), z.string()]).nullish(),
  location: nullableText,
  occupation: nullableText,
  is_speaker: z.boolean().nullish(),
});

const RawRelationshipSchema = z.object({
  person1: nullableText,
  person2: nullableText,
  relation_term: nullableText,
});

const RawPayloadSchema = z.object({
  speaker_name: nullableText,
  persons: z.array(RawPersonSchema).nullish(),
  relationships: z.array(RawRelationshipSchema).nullish(),
});

type RawPayload = z.infer<typeof RawPayloadSchema>;

const RELATION_TERMS: Record<string, RelationKind> = {
  husband: 'spouse',
  wife: 'spouse',
  spouse: 'spouse',
  partner: 'spouse',
  father: 'parent_child',
  mother: 'parent_child',
  dad: 'parent_child',
  mom: 'parent_child',
  parent: 'parent_child',
  son: 'parent_child',
  daughter: 'parent_child',
  child: 'parent_child',
  brother: 'sibling',
  sister: 'sibling',
  sibling: 'sibling',
};

export function inferRelationKind(term: string | null | undefined): RelationKind {
  const key = (term ?? '').trim().toLowerCase().replace(/\s+/g, ' ');
  return RELATION_TERMS[key] ?? 'other';
}

export function cleanName(name: string): string {
  return name
    .replace(/\s+/g, ' ')
    .trim()
    .split(' ')
    .map((word) => (word ? word.charAt(0).toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

function stripTrailingCommas(text: string): string {
  return text.replace(/,\s*}/g, '}').replace(/,\s*]/g, ']');
}

/**
 * Finds the JSON object in model output that may wrap it in prose or code
 * fences. Tries the outermost braces first, then each balanced top-level
 * object in turn.
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;

  const outer = tryJson(stripTrailingCommas(text.slice(start, end + 1)));
  if (outer !== undefined) return outer;

  let depth = 0;
  let open = -1;
  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (char === '{') {
      if (depth === 0) open = index;
      depth += 1;
    } else if (char === '}' && depth > 0) {
      depth -= 1;
      if (depth === 0 && open !== -1) {
        const candidate = tryJson(stripTrailingCommas(text.slice(open, index + 1)));
        if (candidate !== undefined) return candidate;
      }
    }
  }
  return undefined;
}

function toAge(value: number | string | null | undefined): number | undefined {
  const parsed = typeof value === 'string' ? Number.parseInt(value, 10) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed)) return undefined;
  return parsed >= 0 && parsed <= 150 ? parsed : undefined;
}

function toResult(payload: RawPayload, rawText: string): ExtractionResult {
  const speakerName = payload.speaker_name ? cleanName(payload.speaker_name) : undefined;
  const persons: ExtractedPerson[] = [];
  for (const raw of payload.persons ?? []) {
    const displayName = cleanName(raw.name ?? '');
    if (!displayName) continue;
    persons.push({
      displayName,
      gender: raw.gender,
      age: toAge(raw.age),
      location: raw.location,
      occupation: raw.occupation,
      isSpeaker:
        raw.is_speaker === true ||
        (speakerName !== undefined && displayName.toLowerCase() === speakerName.toLowerCase()),
    });
  }

  const relationships: ExtractedRelationship[] = [];
  for (const raw of payload.relationships ?? []) {
    const personA = cleanName(raw.person1 ?? '');
    const personB = cleanName(raw.person2 ?? '');
    const term = raw.relation_term?.trim();
    if (!personA || !personB || !term) continue;
    relationships.push({
      personA,
      personB,
      relationKind: inferRelationKind(term),
      relationTerm: term,
    });
  }

  return { persons, relationships, speakerName, rawText };
}

/** Turns raw completion text into an ExtractionResult. */
export function parseExtractionPayload(text: string): ExtractionResult {
  if (!text.trim()) throw new ExtractionError('extractor returned empty output');
  const json = extractJsonObject(text);
  if (json === undefined) throw new ExtractionError('extractor output contains no JSON object');

  const parsed = RawPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExtractionError(
      `extractor output has an unexpected shape: ${formatSchemaIssues(parsed.error.issues).join('; ')}`,
      { cause: parsed.error },
    );
  }
  return toResult(parsed.data, text);
}
