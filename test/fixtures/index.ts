import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ExtractionResultSchema, type ExtractionResult } from '../../src/extraction/types';

const FIXTURES_DIR = path.dirname(fileURLToPath(import.meta.url));

export function loadExtraction(name: 'smith-household' | 'two-households'): ExtractionResult {
  const file = path.join(FIXTURES_DIR, 'extractions', `${name}.json`);
  return ExtractionResultSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

export function fixedClock(iso = '2026-03-01T10:00:00.000Z'): () => Date {
  return () => new Date(iso);
}

export function sequentialSessionIds(prefix = 'session'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export function tempProjectDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'family-intake-it-'));
}
