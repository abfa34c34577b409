import { randomUUID } from 'node:crypto';
import { parsePipelineConfig } from '../config/loader';
import type { PipelineConfig } from '../config/schema';
import { createDuplicateResolver } from '../dedup/resolver';
import type { DuplicateResolver } from '../dedup/types';
import { errorCode, ExtractionError, toErrorMessage } from '../errors';
import type {
  ExtractionResult,
  NormalizedPerson,
  NormalizedRelationship,
} from '../extraction/types';
import { createFamilyGroupingEngine, familyKeyId } from '../grouping/engine';
import { personKey } from '../grouping/graph';
import type { FamilyGroup, FamilyGroupingEngine } from '../grouping/types';
import type { FamilyRecord, PersonSearchOptions } from '../store/types';
import { FileTrajectoryArchive } from '../trajectory/archive';
import { TrajectoryRecorder } from '../trajectory/recorder';
import type { TrajectoryChannel, TrajectorySink } from '../trajectory/types';
import { mapWithConcurrency } from '../utils/concurrency';
import { KeyedLock } from '../utils/keyed-lock';
import { createLogger, type Logger } from '../utils/logger';
import { normalizeExtraction } from './normalize';
import { summarizeRun, tallyCounts } from './summary';
import type {
  DecisionEntry,
  FamilyPipeline,
  FamilyPipelineDeps,
  FamilyPipelineOptions,
  GroupStorageOutcome,
  PersonWriteOutcome,
  PipelineIssue,
  PipelinePhase,
  PipelineResult,
  PipelineRunOptions,
  PipelineStage,
} from './types';

interface RunState {
  sessionId: string;
  logger: Logger;
  recorder: TrajectoryRecorder;
  orchestrator: TrajectoryChannel;
  phase: PipelinePhase;
  abortedAt?: PipelineStage;
  cancelled: boolean;
  fatalError?: { code: string; message: string };
  persons: NormalizedPerson[];
  relationships: NormalizedRelationship[];
  decisions: DecisionEntry[];
  groups: FamilyGroup[];
  storage: GroupStorageOutcome[];
  warnings: PipelineIssue[];
  errors: PipelineIssue[];
}

const NEXT_STAGE: Record<PipelinePhase, PipelineStage | undefined> = {
  idle: 'extracted',
  extracted: 'deduplicated',
  deduplicated: 'grouped',
  grouped: 'persisted',
  persisted: undefined,
  done: undefined,
  aborted: undefined,
};

function toDecisionEntry(
  extractedName: string,
  decision: DecisionEntry['decision'],
  lookupFailed: boolean,
): DecisionEntry {
  if (decision.kind === 'auto_merge') {
    return {
      extractedName,
      decision,
      decisionKind: decision.kind,
      action: 'merge',
      targetPersonId: decision.targetPersonId,
      confidence: decision.confidence,
      lookupFailed,
    };
  }
  return { extractedName, decision, decisionKind: decision.kind, action: 'create', lookupFailed };
}

/**
 * Disconnected groups can share a family key and so a code. The stored family
 * counts all of them and keeps the first group's anchor.
 */
function familyRecordsByCode(groups: readonly FamilyGroup[]): Map<string, FamilyRecord> {
  const records = new Map<string, FamilyRecord>();
  for (const group of groups) {
    if (group.status !== 'assigned' || !group.familyCode || !group.familyKey) continue;
    const existing = records.get(group.familyCode);
    if (existing) {
      existing.memberCount += group.memberNames.length;
      continue;
    }
    records.set(group.familyCode, {
      familyCode: group.familyCode,
      surname: group.familyKey.surname,
      location: group.familyKey.location,
      sequence: group.sequence ?? 0,
      anchorName: group.anchorName ?? '',
      memberCount: group.memberNames.length,
    });
  }
  return records;
}

function mentionsOf(person: NormalizedPerson): string[] {
  return [person.rawMentionText ?? person.displayName];
}

export function createFamilyPipeline(
  deps: FamilyPipelineDeps,
  options: FamilyPipelineOptions = {},
): FamilyPipeline {
  const config: PipelineConfig = parsePipelineConfig(options.config ?? {});
  const clock = options.clock ?? (() => new Date());
  const createSessionId = options.createSessionId ?? (() => `intake_${randomUUID()}`);
  const lock = deps.lock ?? new KeyedLock();
  const resolver: DuplicateResolver = deps.resolver ?? createDuplicateResolver(config.dedup);
  const grouping: FamilyGroupingEngine =
    deps.grouping ?? createFamilyGroupingEngine({ families: deps.families, lock });
  const searchOptions: PersonSearchOptions = { ...config.search, similarity: config.similarity };
  const sink: TrajectorySink | undefined =
    deps.sink ??
    (config.trajectory.archive && options.projectDir
      ? new FileTrajectoryArchive(options.projectDir, clock)
      : undefined);

  function transition(state: RunState, phase: PipelineStage | 'done', detail: string): void {
    const from = state.phase;
    state.phase = phase;
    state.orchestrator.result(`${from} -> ${phase}: ${detail}`, { from, to: phase });
    state.logger.log('transition', { from, to: phase, detail });
  }

  function abort(state: RunState, error: unknown): void {
    const stage = NEXT_STAGE[state.phase] ?? 'persisted';
    const message = toErrorMessage(error);
    const code = errorCode(error);
    state.fatalError = { code, message };
    state.errors.push({ scope: 'run', subject: state.sessionId, code, message });
    state.abortedAt = stage;
    state.orchestrator.error(`aborted before ${stage}: ${message}`, { code, from: state.phase });
    state.logger.log('aborted', { stage, error });
    state.phase = 'aborted';
  }

  function cancelledBetweenStages(state: RunState, signal: AbortSignal | undefined): boolean {
    if (!signal?.aborted) return false;
    const stage = NEXT_STAGE[state.phase] ?? 'persisted';
    state.cancelled = true;
    state.abortedAt = stage;
    state.orchestrator.result(`cancelled before ${stage}`, { from: state.phase });
    state.logger.log('cancelled', { stage });
    state.phase = 'aborted';
    return true;
  }

  async function deduplicate(state: RunState): Promise<void> {
    state.orchestrator.act(`look up ${state.persons.length} person(s)`, {
      concurrency: config.concurrency.maxConcurrentLookups,
    });
    const channel = state.recorder.forAgent('duplicate_resolver');
    state.decisions = await mapWithConcurrency(
      state.persons,
      config.concurrency.maxConcurrentLookups,
      async (person) => {
        try {
          const candidates = await deps.persons.search(
            person.displayName,
            { surname: person.surname, location: person.location },
            searchOptions,
          );
          const decision = resolver.resolve(person, candidates, channel);
          if (decision.kind === 'needs_clarification') {
            state.warnings.push({
              scope: 'person',
              subject: person.displayName,
              code: 'ambiguous_match',
              message: `${person.displayName} matches ${decision.candidates.length} stored person(s) too closely to merge; created as new`,
            });
          }
          return toDecisionEntry(person.displayName, decision, false);
        } catch (error) {
          const message = toErrorMessage(error);
          channel.error(`lookup failed for ${person.displayName}: ${message}`, {
            person: person.displayName,
            code: errorCode(error, 'lookup_failed'),
          });
          state.logger.log('lookup failed', { person: person.displayName, error });
          state.warnings.push({
            scope: 'person',
            subject: person.displayName,
            code: 'lookup_failed',
            message: `lookup failed for ${person.displayName}: ${message}; created as new`,
          });
          return toDecisionEntry(person.displayName, { kind: 'create_new' }, true);
        }
      },
    );
  }

  async function persistGroup(
    state: RunState,
    group: FamilyGroup,
    families: ReadonlyMap<string, FamilyRecord>,
    channel: TrajectoryChannel,
  ): Promise<GroupStorageOutcome> {
    const byName = new Map(state.persons.map((person) => [personKey(person.displayName), person]));
    const decisionByName = new Map(
      state.decisions.map((entry) => [personKey(entry.extractedName), entry]),
    );
    const skipAll = (reason: string): PersonWriteOutcome[] =>
      group.memberNames.map((name) => ({ name, status: 'skipped', reason }));

    if (group.status === 'code_failed') {
      channel.result(`${group.groupId}: skipped, no family code`, { groupId: group.groupId });
      return {
        groupId: group.groupId,
        familyCode: null,
        status: 'skipped',
        persons: skipAll('family_code_unavailable'),
        linked: 0,
        error: group.error,
      };
    }

    const family = group.familyCode ? families.get(group.familyCode) : undefined;
    if (family) {
      channel.act(`upsert family ${family.familyCode}`, {
        groupId: group.groupId,
        memberCount: family.memberCount,
      });
      try {
        await deps.families.upsert({ ...family });
      } catch (error) {
        const message = toErrorMessage(error);
        channel.error(`${group.groupId}: family upsert failed: ${message}`, {
          groupId: group.groupId,
        });
        state.logger.log('family upsert failed', { groupId: group.groupId, error });
        state.errors.push({
          scope: 'group',
          subject: group.groupId,
          code: errorCode(error, 'family_upsert_failed'),
          message: `family ${group.familyCode} could not be stored: ${message}`,
        });
        return {
          groupId: group.groupId,
          familyCode: group.familyCode,
          status: 'failed',
          persons: skipAll('family_upsert_failed'),
          linked: 0,
          error: message,
        };
      }
    }

    const personIds = new Map<string, string>();
    const outcomes: PersonWriteOutcome[] = [];
    for (const name of group.memberNames) {
      const key = personKey(name);
      const person = byName.get(key);
      const entry = decisionByName.get(key);
      if (!person || !entry) continue;
      const attributes = {
        surname: person.surname,
        location: person.location,
        age: person.age,
        occupation: person.occupation,
        gender: person.gender,
      };
      try {
        if (entry.action === 'merge' && entry.targetPersonId) {
          await deps.persons.update(entry.targetPersonId, {
            ...attributes,
            familyCode: group.familyCode,
            mentions: mentionsOf(person),
          });
          personIds.set(key, entry.targetPersonId);
          outcomes.push({
            name,
            status: 'merged',
            personId: entry.targetPersonId,
            familyCode: group.familyCode,
          });
          channel.result(`merged ${name} into ${entry.targetPersonId}`, { groupId: group.groupId });
        } else {
          const personId = await deps.persons.create({
            displayName: person.displayName,
            ...attributes,
            familyCode: group.familyCode,
            mentions: mentionsOf(person),
          });
          personIds.set(key, personId);
          outcomes.push({ name, status: 'created', personId, familyCode: group.familyCode });
          channel.result(`created ${name} as ${personId}`, { groupId: group.groupId });
        }
      } catch (error) {
        const message = toErrorMessage(error);
        channel.error(`write failed for ${name}: ${message}`, { groupId: group.groupId });
        state.logger.log('person write failed', { person: name, error });
        state.errors.push({
          scope: 'person',
          subject: name,
          code: errorCode(error, 'person_write_failed'),
          message: `${name} could not be stored: ${message}`,
        });
        outcomes.push({ name, status: 'failed', error: message });
      }
    }

    let linked = 0;
    for (const edge of group.edges) {
      const personAId = personIds.get(personKey(edge.personA));
      const personBId = personIds.get(personKey(edge.personB));
      const subject = `${edge.personA} -> ${edge.personB}`;
      if (!personAId || !personBId) {
        state.warnings.push({
          scope: 'relationship',
          subject,
          code: 'relationship_skipped',
          message: `${subject} was not linked because an endpoint was not stored`,
        });
        continue;
      }
      try {
        await deps.relationships.link({
          personAId,
          personBId,
          relationKind: edge.relationKind,
          ...(edge.relationTerm ? { relationTerm: edge.relationTerm } : {}),
        });
        linked += 1;
      } catch (error) {
        const message = toErrorMessage(error);
        channel.error(`link failed for ${subject}: ${message}`, { groupId: group.groupId });
        state.errors.push({
          scope: 'relationship',
          subject,
          code: errorCode(error, 'relationship_link_failed'),
          message: `${subject} could not be linked: ${message}`,
        });
      }
    }
    if (linked > 0) channel.result(`${group.groupId}: linked ${linked} relationship(s)`, { groupId: group.groupId });

    return {
      groupId: group.groupId,
      familyCode: group.familyCode,
      status: 'stored',
      persons: outcomes,
      linked,
    };
  }

  async function persist(state: RunState): Promise<void> {
    state.orchestrator.act(`store ${state.groups.length} group(s)`, {
      concurrency: config.concurrency.maxConcurrentGroups,
    });
    const channel = state.recorder.forAgent('storage');
    const families = familyRecordsByCode(state.groups);
    state.storage = await mapWithConcurrency(
      state.groups,
      config.concurrency.maxConcurrentGroups,
      (group) =>
        lock.run(group.familyKey ? familyKeyId(group.familyKey) : `unassigned:${group.groupId}`, () =>
          persistGroup(state, group, families, channel),
        ),
    );
  }

  async function finish(state: RunState): Promise<PipelineResult> {
    if (state.phase !== 'aborted') transition(state, 'done', 'run complete');
    const trajectory = state.recorder.seal();
    if (sink) {
      try {
        await sink.archive(state.sessionId, trajectory);
      } catch (error) {
        state.logger.log('trajectory archive failed', { error });
        state.warnings.push({
          scope: 'run',
          subject: state.sessionId,
          code: 'trajectory_archive_failed',
          message: `trajectory could not be archived: ${toErrorMessage(error)}`,
        });
      }
    }
    const counts = tallyCounts({
      persons: state.persons.length,
      decisions: state.decisions,
      groups: state.groups,
      storage: state.storage,
      warnings: state.warnings.length,
      errors: state.errors.length,
    });
    const result: PipelineResult = {
      sessionId: state.sessionId,
      success: state.phase === 'done',
      phase: state.phase,
      ...(state.abortedAt ? { abortedAt: state.abortedAt } : {}),
      cancelled: state.cancelled,
      decisions: state.decisions,
      groups: state.groups,
      storage: state.storage,
      counts,
      warnings: state.warnings,
      errors: state.errors,
      trajectory,
      summary: summarizeRun({
        counts,
        phase: state.phase,
        abortedAt: state.abortedAt,
        cancelled: state.cancelled,
        fatalError: state.fatalError,
      }),
      ...(state.fatalError ? { fatalError: state.fatalError } : {}),
    };
    state.logger.log('finished', { phase: result.phase, summary: result.summary });
    return result;
  }

  function startRun(runOptions: PipelineRunOptions): RunState {
    const sessionId = runOptions.sessionId?.trim() || createSessionId();
    const recorder = new TrajectoryRecorder(sessionId, {
      clock,
      maxContentChars: config.trajectory.maxContentChars,
    });
    return {
      sessionId,
      logger: createLogger('pipeline', { sessionId }),
      recorder,
      orchestrator: recorder.forAgent('orchestrator'),
      phase: 'idle',
      cancelled: false,
      persons: [],
      relationships: [],
      decisions: [],
      groups: [],
      storage: [],
      warnings: [],
      errors: [],
    };
  }

  async function execute(
    state: RunState,
    extraction: ExtractionResult,
    signal: AbortSignal | undefined,
  ): Promise<PipelineResult> {
    if (cancelledBetweenStages(state, signal)) return finish(state);

    try {
      const batch = normalizeExtraction(extraction);
      state.persons = batch.persons;
      state.relationships = batch.relationships;
      state.warnings.push(...batch.warnings);
      if (batch.persons.length === 0) {
        throw new ExtractionError('extraction result contains no persons');
      }
      state.orchestrator.observe(
        `extraction holds ${batch.persons.length} person(s) and ${batch.relationships.length} relationship(s)`,
        { droppedOrMerged: batch.warnings.length },
      );
    } catch (error) {
      abort(state, error);
      return finish(state);
    }
    transition(state, 'extracted', `${state.persons.length} person(s) accepted`);

    if (cancelledBetweenStages(state, signal)) return finish(state);
    await deduplicate(state);
    transition(state, 'deduplicated', `${state.decisions.length} decision(s)`);

    if (cancelledBetweenStages(state, signal)) return finish(state);
    try {
      state.orchestrator.act('group persons into families');
      state.groups = await grouping.group(
        state.persons,
        state.relationships,
        state.recorder.forAgent('family_grouping'),
      );
    } catch (error) {
      abort(state, error);
      return finish(state);
    }
    for (const group of state.groups) {
      if (group.status !== 'code_failed') continue;
      state.errors.push({
        scope: 'group',
        subject: group.groupId,
        code: 'family_code_failed',
        message: `no family code for ${group.memberNames.join(', ')}: ${group.error ?? 'unknown error'}`,
      });
    }
    transition(state, 'grouped', `${state.groups.length} group(s)`);

    if (cancelledBetweenStages(state, signal)) return finish(state);
    await persist(state);
    transition(
      state,
      'persisted',
      `${state.storage.filter((outcome) => outcome.status === 'stored').length} of ${state.storage.length} group(s) stored`,
    );
    return finish(state);
  }

  return {
    async run(extraction, runOptions = {}) {
      const state = startRun(runOptions);
      state.orchestrator.observe('extraction received', { source: 'structured' });
      return execute(state, extraction, runOptions.signal);
    },

    async runFromText(text, runOptions = {}) {
      const state = startRun(runOptions);
      state.orchestrator.observe(`transcript received (${text.length} chars)`, { source: 'text' });
      let extraction: ExtractionResult;
      try {
        if (!deps.extractor) throw new ExtractionError('no extraction provider configured');
        state.orchestrator.act('extract persons and relationships');
        extraction = await deps.extractor.extract(text);
      } catch (error) {
        abort(
          state,
          error instanceof ExtractionError
            ? error
            : new ExtractionError(toErrorMessage(error), { cause: error }),
        );
        return finish(state);
      }
      return execute(state, extraction, runOptions.signal);
    },
  };
}
