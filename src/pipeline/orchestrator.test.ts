import { describe, expect, test } from 'vitest';
import { fixedClock, loadExtraction, sequentialSessionIds } from '../../test/fixtures';
import { ConfigError, StoreUnavailableError } from '../errors';
import { createMemoryStores, MemoryFamilyStore, MemoryPersonStore } from '../store/memory';
import type {
  CandidateMatch,
  FamilyRecord,
  NewPersonRecord,
  PersonAttributes,
  PersonSearchOptions,
} from '../store/types';
import type { TrajectorySink } from '../trajectory/types';
import { createFamilyPipeline } from './orchestrator';
import type { FamilyPipelineDeps } from './types';

function pipelineWith(overrides: Partial<FamilyPipelineDeps> = {}) {
  const stores = createMemoryStores({ clock: fixedClock() });
  const deps: FamilyPipelineDeps = { ...stores, ...overrides };
  const pipeline = createFamilyPipeline(deps, {
    clock: fixedClock(),
    createSessionId: sequentialSessionIds('run'),
  });
  return { pipeline, stores };
}

class ScriptedPersonStore extends MemoryPersonStore {
  constructor(private readonly scripted: Record<string, CandidateMatch[]>) {
    super();
  }

  override async search(
    query: string,
    attributes?: PersonAttributes,
    options?: PersonSearchOptions,
  ): Promise<CandidateMatch[]> {
    return this.scripted[query] ?? super.search(query, attributes, options);
  }
}

class FlakyPersonStore extends MemoryPersonStore {
  constructor(
    private readonly failSearchFor: string[] = [],
    private readonly failCreateFor: string[] = [],
  ) {
    super();
  }

  override async search(
    query: string,
    attributes?: PersonAttributes,
    options?: PersonSearchOptions,
  ): Promise<CandidateMatch[]> {
    if (this.failSearchFor.includes(query)) throw new StoreUnavailableError('person index offline');
    return super.search(query, attributes, options);
  }

  override async create(record: NewPersonRecord): Promise<string> {
    if (this.failCreateFor.includes(record.displayName)) {
      throw new StoreUnavailableError('write rejected');
    }
    return super.create(record);
  }
}

describe('family pipeline', () => {
  test('stores the speaker household under one family code', async () => {
    const { pipeline, stores } = pipelineWith();
    const result = await pipeline.run(loadExtraction('smith-household'));

    expect(result.success).toBe(true);
    expect(result.phase).toBe('done');
    expect(result.sessionId).toBe('run-1');
    expect(result.groups.map((group) => [group.familyCode, group.anchorName])).toEqual([
      ['SMITH-SEATTLE-001', 'John Smith'],
    ]);
    expect(result.decisions.map((entry) => entry.decisionKind)).toEqual([
      'create_new',
      'create_new',
      'create_new',
      'create_new',
    ]);
    expect(result.counts).toEqual({
      persons: 4,
      created: 4,
      merged: 0,
      clarified: 0,
      groups: 1,
      grouped: 4,
      unassigned: 0,
      codesMinted: 1,
      codesReused: 0,
      linked: 3,
      warnings: 0,
      errors: 0,
    });
    expect(result.summary).toBe('Created 1 family code(s), Added 4 new person(s)');
    expect(stores.persons.list().map((person) => [person.displayName, person.familyCode])).toEqual([
      ['John Smith', 'SMITH-SEATTLE-001'],
      ['Sarah Smith', 'SMITH-SEATTLE-001'],
      ['Tom Smith', 'SMITH-SEATTLE-001'],
      ['Lisa Smith', 'SMITH-SEATTLE-001'],
    ]);
    expect(stores.persons.get('person-2')?.mentions).toEqual(['my wife Sarah']);
    expect(stores.families.get('SMITH-SEATTLE-001')).toEqual({
      familyCode: 'SMITH-SEATTLE-001',
      surname: 'SMITH',
      location: 'SEATTLE',
      sequence: 1,
      anchorName: 'John Smith',
      memberCount: 4,
    });
    expect(stores.relationships.list()).toEqual([
      { personAId: 'person-1', personBId: 'person-2', relationKind: 'spouse', relationTerm: 'wife' },
      { personAId: 'person-1', personBId: 'person-3', relationKind: 'parent_child', relationTerm: 'son' },
      {
        personAId: 'person-1',
        personBId: 'person-4',
        relationKind: 'parent_child',
        relationTerm: 'daughter',
      },
    ]);
  });

  test('records every transition in order on the orchestrator channel', async () => {
    const { pipeline } = pipelineWith();
    const result = await pipeline.run(loadExtraction('smith-household'));
    const transitions = result.trajectory
      .filter((step) => step.agentName === 'orchestrator' && step.stepType === 'result')
      .map((step) => step.content);
    expect(transitions).toEqual([
      'idle -> extracted: 4 person(s) accepted',
      'extracted -> deduplicated: 4 decision(s)',
      'deduplicated -> grouped: 1 group(s)',
      'grouped -> persisted: 1 of 1 group(s) stored',
      'persisted -> done: run complete',
    ]);
    expect(result.trajectory.map((step) => step.sequence)).toEqual(
      result.trajectory.map((_, index) => index + 1),
    );
    expect(new Set(result.trajectory.map((step) => step.agentName))).toEqual(
      new Set(['orchestrator', 'duplicate_resolver', 'family_grouping', 'storage']),
    );
  });

  test('auto-merges a clear match and links the merged person', async () => {
    const persons = new ScriptedPersonStore({
      'John Smith': [
        { personId: 'person-1', score: 0.97, matchedOn: 'John Smith' },
        { personId: 'person-2', score: 0.91, matchedOn: 'Jon Smith' },
      ],
    });
    await persons.create({ displayName: 'John Smith', familyCode: null, mentions: [] });
    await persons.create({ displayName: 'Jon Smith', familyCode: null, mentions: [] });
    const { pipeline } = pipelineWith({ persons });

    const result = await pipeline.run(loadExtraction('smith-household'));
    expect(result.decisions[0]).toMatchObject({
      extractedName: 'John Smith',
      decisionKind: 'auto_merge',
      action: 'merge',
      targetPersonId: 'person-1',
      confidence: 0.97,
    });
    expect(result.counts.merged).toBe(1);
    expect(result.counts.created).toBe(3);
    expect(persons.get('person-1')?.familyCode).toBe('SMITH-SEATTLE-001');
    expect(persons.get('person-1')?.location).toBe('Seattle');
  });

  test('falls back to a new person on an ambiguous match and warns', async () => {
    const persons = new ScriptedPersonStore({
      'John Smith': [
        { personId: 'person-1', score: 0.96, matchedOn: 'John Smyth' },
        { personId: 'person-2', score: 0.94, matchedOn: 'Jon Smith' },
      ],
    });
    const { pipeline } = pipelineWith({ persons });
    const result = await pipeline.run(loadExtraction('smith-household'));

    expect(result.success).toBe(true);
    expect(result.decisions[0]?.decisionKind).toBe('needs_clarification');
    expect(result.decisions[0]?.action).toBe('create');
    expect(result.counts.clarified).toBe(1);
    expect(result.counts.created).toBe(4);
    expect(result.warnings).toEqual([
      {
        scope: 'person',
        subject: 'John Smith',
        code: 'ambiguous_match',
        message: 'John Smith matches 2 stored person(s) too closely to merge; created as new',
      },
    ]);
    expect(result.errors).toEqual([]);
  });

  test('defaults to create_new when a lookup fails', async () => {
    const { pipeline } = pipelineWith({ persons: new FlakyPersonStore(['Tom Smith']) });
    const result = await pipeline.run(loadExtraction('smith-household'));

    expect(result.success).toBe(true);
    expect(result.decisions[2]).toMatchObject({
      extractedName: 'Tom Smith',
      decisionKind: 'create_new',
      lookupFailed: true,
    });
    expect(result.warnings.map((issue) => issue.code)).toEqual(['lookup_failed']);
    expect(result.counts.created).toBe(4);
  });

  test('keeps sibling writes going when one person cannot be stored', async () => {
    const { pipeline, stores } = pipelineWith({
      persons: new FlakyPersonStore([], ['Tom Smith']),
    });
    const result = await pipeline.run(loadExtraction('smith-household'));

    expect(result.success).toBe(true);
    expect(result.storage[0]?.persons.map((outcome) => outcome.status)).toEqual([
      'created',
      'created',
      'failed',
      'created',
    ]);
    expect(result.errors).toEqual([
      {
        scope: 'person',
        subject: 'Tom Smith',
        code: 'store_unavailable',
        message: 'Tom Smith could not be stored: write rejected',
      },
    ]);
    expect(result.warnings.map((issue) => issue.subject)).toEqual(['John Smith -> Tom Smith']);
    expect(result.counts.linked).toBe(2);
    expect(stores.relationships.list()).toHaveLength(2);
  });

  test('skips a group whose family record cannot be stored', async () => {
    class BrokenFamilyStore extends MemoryFamilyStore {
      override async upsert(_family: FamilyRecord): Promise<void> {
        throw new StoreUnavailableError('family table locked');
      }
    }
    const { pipeline, stores } = pipelineWith({ families: new BrokenFamilyStore() });
    const result = await pipeline.run(loadExtraction('smith-household'));

    expect(result.success).toBe(true);
    expect(result.storage[0]?.status).toBe('failed');
    expect(result.errors.map((issue) => [issue.scope, issue.code])).toEqual([
      ['group', 'store_unavailable'],
    ]);
    expect(stores.persons.list()).toEqual([]);
    expect(result.counts.codesMinted).toBe(0);
  });

  test('aborts at grouping on an unknown relationship endpoint and keeps the decisions', async () => {
    const { pipeline, stores } = pipelineWith();
    const extraction = loadExtraction('smith-household');
    const result = await pipeline.run({
      ...extraction,
      relationships: [
        ...(extraction.relationships ?? []),
        { personA: 'Ghost', personB: 'John Smith', relationKind: 'sibling' },
      ],
    });

    expect(result.success).toBe(false);
    expect(result.phase).toBe('aborted');
    expect(result.abortedAt).toBe('grouped');
    expect(result.decisions).toHaveLength(4);
    expect(result.groups).toEqual([]);
    expect(result.fatalError).toEqual({
      code: 'grouping_unknown_person',
      message: 'relationship references unknown person(s): Ghost',
    });
    expect(result.summary).toBe(
      'Aborted before grouped: relationship references unknown person(s): Ghost',
    );
    expect(stores.persons.list()).toEqual([]);
  });

  test('aborts before any stage on an empty or malformed extraction', async () => {
    const { pipeline } = pipelineWith();
    const empty = await pipeline.run({ persons: [{ displayName: '   ' }] });
    expect(empty.abortedAt).toBe('extracted');
    expect(empty.fatalError).toEqual({
      code: 'extraction_failed',
      message: 'extraction result contains no persons',
    });
    expect(empty.warnings.map((issue) => issue.code)).toEqual(['blank_name']);

    const malformed = await pipeline.run(JSON.parse('{"persons":"nobody"}'));
    expect(malformed.success).toBe(false);
    expect(malformed.fatalError?.code).toBe('extraction_failed');
    expect(malformed.decisions).toEqual([]);
  });

  test('folds repeated names into one person with a warning', async () => {
    const { pipeline, stores } = pipelineWith();
    const result = await pipeline.run({
      persons: [
        { displayName: 'Maya Rao' },
        { displayName: ' maya  rao ', location: 'Pune' },
      ],
    });
    expect(result.warnings.map((issue) => issue.code)).toEqual(['duplicate_person']);
    expect(stores.persons.list().map((person) => [person.displayName, person.location])).toEqual([
      ['Maya Rao', 'Pune'],
    ]);
    expect(result.groups[0]?.familyCode).toBe('RAO-PUNE-001');
  });

  test('returns a cancelled partial result between stages', async () => {
    const controller = new AbortController();
    class CancellingStore extends MemoryPersonStore {
      override async search(query: string): Promise<CandidateMatch[]> {
        controller.abort();
        return super.search(query);
      }
    }
    const { pipeline, stores } = pipelineWith({ persons: new CancellingStore() });
    const result = await pipeline.run(loadExtraction('smith-household'), {
      signal: controller.signal,
    });

    expect(result.cancelled).toBe(true);
    expect(result.success).toBe(false);
    expect(result.phase).toBe('aborted');
    expect(result.abortedAt).toBe('grouped');
    expect(result.decisions).toHaveLength(4);
    expect(result.summary).toBe('Cancelled before grouped');
    expect(stores.persons.list()).toEqual([]);
  });

  test('does nothing when cancelled before starting', async () => {
    const controller = new AbortController();
    controller.abort();
    const { pipeline } = pipelineWith();
    const result = await pipeline.run(loadExtraction('smith-household'), {
      signal: controller.signal,
      sessionId: 'given-id',
    });
    expect(result.sessionId).toBe('given-id');
    expect(result.abortedAt).toBe('extracted');
    expect(result.summary).toBe('Cancelled before extracted');
  });

  test('warns when the trajectory sink fails', async () => {
    const sink: TrajectorySink = {
      archive: () => {
        throw new Error('disk full');
      },
    };
    const { pipeline } = pipelineWith({ sink });
    const result = await pipeline.run({ persons: [{ displayName: 'Meera' }] });
    expect(result.success).toBe(true);
    expect(result.counts.unassigned).toBe(1);
    expect(result.warnings.map((issue) => [issue.code, issue.message])).toEqual([
      ['trajectory_archive_failed', 'trajectory could not be archived: disk full'],
    ]);
    expect(result.summary).toBe('Added 1 new person(s), 1 person(s) unassigned, 1 warning(s)');
  });

  test('rejects invalid configuration up front', () => {
    const stores = createMemoryStores();
    expect(() =>
      createFamilyPipeline(stores, { config: { dedup: { clarifyThreshold: 0.99 } } }),
    ).toThrow(ConfigError);
  });

  test('runs extraction from text and aborts on extractor failure', async () => {
    const stores = createMemoryStores();
    const pipeline = createFamilyPipeline({
      ...stores,
      extractor: {
        extract: async (text) => {
          if (text === 'silence') throw new Error('nothing heard');
          return { persons: [{ displayName: 'Asha Iyer', location: 'Chennai' }] };
        },
      },
    });
    const ok = await pipeline.runFromText('My name is Asha Iyer from Chennai.');
    expect(ok.groups[0]?.familyCode).toBe('IYER-CHENNAI-001');

    const failed = await pipeline.runFromText('silence');
    expect(failed.abortedAt).toBe('extracted');
    expect(failed.fatalError).toEqual({ code: 'extraction_failed', message: 'nothing heard' });

    const missing = await createFamilyPipeline(stores).runFromText('hi');
    expect(missing.success).toBe(false);
    expect(missing.abortedAt).toBe('extracted');
    expect(missing.fatalError).toEqual({
      code: 'extraction_failed',
      message: 'no extraction provider configured',
    });
    expect(missing.summary).toBe('Aborted before extracted: no extraction provider configured');
  });

  test('scores lookups with the configured similarity settings', async () => {
    const decideWith = async (locationBonus: number) => {
      const stores = createMemoryStores();
      await stores.persons.create({
        displayName: 'Devi Sharma',
        location: 'Hyderabad',
        familyCode: null,
        mentions: [],
      });
      const pipeline = createFamilyPipeline(stores, { config: { similarity: { locationBonus } } });
      const result = await pipeline.run({
        persons: [{ displayName: 'Dev Sharma', location: 'Hyderabad' }],
      });
      return result.decisions[0]?.decision;
    };

    expect(await decideWith(0.05)).toEqual({
      kind: 'auto_merge',
      targetPersonId: 'person-1',
      confidence: 0.9591,
    });
    expect(await decideWith(0)).toEqual({
      kind: 'needs_clarification',
      candidates: [{ personId: 'person-1', score: 0.9091, matchedOn: 'Devi Sharma' }],
      fallback: 'create_new',
    });
  });

  test('stores one family record covering every group that shares a code', async () => {
    const { pipeline, stores } = pipelineWith();
    const result = await pipeline.run({
      persons: [
        { displayName: 'Ravi Kumar', location: 'Bangalore' },
        { displayName: 'Sita Kumar', location: 'Bangalore' },
      ],
    });

    expect(result.groups.map((group) => [group.familyCode, group.memberNames])).toEqual([
      ['KUMAR-BANGALORE-001', ['Ravi Kumar']],
      ['KUMAR-BANGALORE-001', ['Sita Kumar']],
    ]);
    expect(stores.families.list()).toEqual([
      {
        familyCode: 'KUMAR-BANGALORE-001',
        surname: 'KUMAR',
        location: 'BANGALORE',
        sequence: 1,
        anchorName: 'Ravi Kumar',
        memberCount: 2,
      },
    ]);
  });
});
