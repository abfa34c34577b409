import { describe, expect, test } from 'vitest';
import {
  createCompletionExtractionProvider,
  createFamilyPipeline,
  createMemoryStores,
  FAMILY_CODE_PATTERN,
  formatTrajectory,
} from '../../src';
import { fixedClock } from '../fixtures';

const REPLY = JSON.stringify({
  speaker_name: 'Priya Nair',
  persons: [
    { name: 'priya nair', gender: 'F', location: 'Kochi', is_speaker: true },
    { name: 'arjun', gender: 'M' },
    { name: 'leela nair', age: 70 },
  ],
  relationships: [
    { person1: 'Priya Nair', person2: 'Arjun', relation_term: 'husband' },
    { person1: 'Leela Nair', person2: 'Priya Nair', relation_term: 'daughter' },
  ],
});

describe('text to family records', () => {
  test('extracts, groups and stores a transcript through the package entry point', async () => {
    const stores = createMemoryStores();
    const pipeline = createFamilyPipeline(
      {
        ...stores,
        extractor: createCompletionExtractionProvider({ complete: async () => REPLY }),
      },
      { clock: fixedClock(), createSessionId: () => 'transcript-1' },
    );

    const result = await pipeline.runFromText('I am Priya, I live in Kochi with Arjun and my mother.');

    expect(result.success).toBe(true);
    expect(result.groups).toHaveLength(1);
    expect(result.groups[0]?.anchorName).toBe('Priya Nair');
    expect(result.groups[0]?.familyCode).toBe('NAIR-KOCHI-001');
    expect(FAMILY_CODE_PATTERN.test(result.groups[0]?.familyCode ?? '')).toBe(true);
    expect(stores.relationships.list().map((edge) => edge.relationKind)).toEqual([
      'spouse',
      'parent_child',
    ]);
    expect(formatTrajectory(result.trajectory).split('\n')[0]).toBe(
      '#1 [orchestrator#1] observation: transcript received (53 chars)',
    );
  });
});
