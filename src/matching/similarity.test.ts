import * as fc from 'fast-check';
import { describe, expect, test } from 'vitest';
import {
  createSimilarityScorer,
  levenshteinDistance,
  normalizeName,
  scoreNames,
  sequenceSimilarity,
} from './similarity';

describe('name normalization', () => {
  test('lower-cases, collapses whitespace and drops honorifics', () => {
    expect(normalizeName('  Mr.   John   SMITH ')).toBe('john smith');
    expect(normalizeName('Dr John Smith', false)).toBe('dr john smith');
  });
});

describe('levenshtein distance', () => {
  test('counts single-character edits', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('same', 'same')).toBe(0);
  });

  test('sequence similarity is 1 for two empty strings and 0 against one', () => {
    expect(sequenceSimilarity('', '')).toBe(1);
    expect(sequenceSimilarity('', 'a')).toBe(0);
  });
});

describe('scoreNames', () => {
  test('one edit in a ten-letter name scores 0.9', () => {
    expect(scoreNames('John Smith', 'Jon Smith')).toBe(0.9);
  });

  test('equal after normalization scores 1', () => {
    expect(scoreNames('Mr. John Smith', 'john  smith')).toBe(1);
  });

  test('keeps honorifics when stripping is disabled', () => {
    expect(scoreNames('Dr John Smith', 'John Smith', {}, { stripHonorifics: false })).toBe(0.7692);
  });

  test('adds the location bonus for a shared location', () => {
    expect(
      scoreNames('John Smith', 'Jon Smith', {
        a: { location: 'Seattle' },
        b: { location: ' seattle ' },
      }),
    ).toBe(0.95);
  });

  test('location bonus never lifts the score above 1', () => {
    const scorer = createSimilarityScorer({ locationBonus: 0.2 });
    expect(
      scorer.score('John Smith', 'Jon Smith', {
        a: { location: 'Seattle' },
        b: { location: 'Seattle' },
      }),
    ).toBe(1);
  });

  test('different locations add nothing', () => {
    expect(
      scoreNames('John Smith', 'Jon Smith', {
        a: { location: 'Seattle' },
        b: { location: 'Portland' },
      }),
    ).toBe(0.9);
  });

  test('identity holds for any string', () => {
    fc.assert(
      fc.property(fc.string(), (name) => {
        expect(scoreNames(name, name)).toBe(1);
      }),
    );
  });

  test('identity holds across case and surrounding whitespace', () => {
    fc.assert(
      fc.property(fc.string(), (name) => {
        expect(scoreNames(`  ${name.toUpperCase()} `, name.toUpperCase())).toBe(1);
      }),
    );
  });

  test('is commutative and bounded', () => {
    fc.assert(
      fc.property(
        fc.string(),
        fc.string(),
        fc.option(fc.constantFrom('Seattle', 'Hyderabad', 'Pune'), { nil: undefined }),
        fc.option(fc.constantFrom('Seattle', 'Hyderabad', 'Pune'), { nil: undefined }),
        (a, b, locationA, locationB) => {
          const forward = scoreNames(a, b, {
            a: { location: locationA },
            b: { location: locationB },
          });
          const backward = scoreNames(b, a, {
            a: { location: locationB },
            b: { location: locationA },
          });
          expect(forward).toBe(backward);
          expect(forward).toBeGreaterThanOrEqual(0);
          expect(forward).toBeLessThanOrEqual(1);
        },
      ),
    );
  });
});
