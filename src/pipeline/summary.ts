import type { FamilyGroup } from '../grouping/types';
import type {
  DecisionEntry,
  GroupStorageOutcome,
  PipelineCounts,
  PipelinePhase,
  PipelineStage,
} from './types';

export function tallyCounts(input: {
  persons: number;
  decisions: readonly DecisionEntry[];
  groups: readonly FamilyGroup[];
  storage: readonly GroupStorageOutcome[];
  warnings: number;
  errors: number;
}): PipelineCounts {
  const groupById = new Map(input.groups.map((group) => [group.groupId, group]));
  const minted = new Set<string>();
  const reused = new Set<string>();
  let created = 0;
  let merged = 0;
  let linked = 0;
  for (const outcome of input.storage) {
    linked += outcome.linked;
    for (const person of outcome.persons) {
      if (person.status === 'created') created += 1;
      if (person.status === 'merged') merged += 1;
    }
    const group = groupById.get(outcome.groupId);
    if (outcome.status !== 'stored' || !group?.familyCode) continue;
    if (group.codeSource === 'minted') minted.add(group.familyCode);
    if (group.codeSource === 'reused') reused.add(group.familyCode);
  }
  const membersWith = (status: FamilyGroup['status']) =>
    input.groups
      .filter((group) => group.status === status)
      .reduce((total, group) => total + group.memberNames.length, 0);

  return {
    persons: input.persons,
    created,
    merged,
    clarified: input.decisions.filter((entry) => entry.decisionKind === 'needs_clarification')
      .length,
    groups: input.groups.length,
    grouped: membersWith('assigned'),
    unassigned: membersWith('unassigned'),
    codesMinted: minted.size,
    codesReused: [...reused].filter((code) => !minted.has(code)).length,
    linked,
    warnings: input.warnings,
    errors: input.errors,
  };
}

/** One-line, human-readable outcome, e.g. `Created 1 family code(s), Added 4 new person(s)`. */
export function summarizeRun(input: {
  counts: PipelineCounts;
  phase: PipelinePhase;
  abortedAt?: PipelineStage;
  cancelled: boolean;
  fatalError?: { message: string };
}): string {
  if (input.cancelled) return `Cancelled before ${input.abortedAt ?? 'completion'}`;
  if (input.phase === 'aborted') {
    return `Aborted before ${input.abortedAt ?? 'completion'}: ${input.fatalError?.message ?? 'unknown error'}`;
  }
  const { counts } = input;
  const parts: string[] = [];
  if (counts.codesMinted > 0) parts.push(`Created ${counts.codesMinted} family code(s)`);
  if (counts.codesReused > 0) parts.push(`Reused ${counts.codesReused} family code(s)`);
  if (counts.created > 0) parts.push(`Added ${counts.created} new person(s)`);
  if (counts.merged > 0) parts.push(`Merged ${counts.merged} existing person(s)`);
  if (counts.unassigned > 0) parts.push(`${counts.unassigned} person(s) unassigned`);
  if (counts.warnings > 0) parts.push(`${counts.warnings} warning(s)`);
  if (counts.errors > 0) parts.push(`${counts.errors} error(s)`);
  return parts.length > 0 ? parts.join(', ') : 'No changes';
}
