import { createHash } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { getAuditDir } from '../config/paths';
import { TRAJECTORY_STEP_TYPES } from './types';
import type { TrajectorySink, TrajectoryStep } from './types';

const GENESIS = 'GENESIS';

export interface ArchivedTrajectoryStep extends TrajectoryStep {
  archivedAt: string;
  previousHash: string;
  entryHash: string;
}

export interface TrajectoryArchiveIssue {
  line: number;
  sessionId?: string;
  reason: string;
}

export interface TrajectoryArchiveVerificationReport {
  ok: boolean;
  total: number;
  valid: number;
  issues: TrajectoryArchiveIssue[];
}

const ArchivedStepSchema = z.object({
  sessionId: z.string(),
  agentName: z.string(),
  stepType: z.enum(TRAJECTORY_STEP_TYPES),
  content: z.string(),
  metadata: z.record(z.unknown()),
  timestamp: z.string(),
  sequence: z.number(),
  agentSequence: z.number(),
  archivedAt: z.string(),
  previousHash: z.string(),
  entryHash: z.string(),
});

function archiveFile(projectDir: string): string {
  return path.join(getAuditDir(projectDir), 'trajectory.jsonl');
}

function digest(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function canonicalSerialize(value: unknown, seen = new WeakSet<object>()): string {
  if (value === null) return 'null';
  if (value === undefined) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean') return JSON.stringify(value);
  if (typeof value === 'bigint') return `"${value.toString()}n"`;
  if (typeof value === 'function') return '"[function]"';
  if (typeof value === 'symbol') return JSON.stringify(String(value));
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalSerialize(item, seen)).join(',')}]`;
  }
  if (value instanceof Date) return JSON.stringify(value.toISOString());
  if (typeof value === 'object') {
    if (seen.has(value)) return '"[circular]"';
    seen.add(value);
    // Mirrors JSON.stringify so a row hashes the same before and after a round trip.
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined && typeof item !== 'function')
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalSerialize(item, seen)}`)
      .join(',')}}`;
  }
  return JSON.stringify(String(value));
}

function entryHashFor(step: TrajectoryStep, archivedAt: string, previousHash: string): string {
  return digest(
    [
      step.sessionId,
      String(step.sequence),
      step.agentName,
      String(step.agentSequence),
      step.stepType,
      step.timestamp,
      digest(step.content),
      digest(canonicalSerialize(step.metadata)),
      archivedAt,
      previousHash,
    ].join('|'),
  );
}

function readLines(file: string): string[] {
  if (!fs.existsSync(file)) return [];
  return fs.readFileSync(file, 'utf-8').split(/\r?\n/).filter(Boolean);
}

function parseRow(line: string): ArchivedTrajectoryStep | null {
  try {
    const parsed = ArchivedStepSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function lastEntryHash(file: string): string {
  const lines = readLines(file);
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    const row = parseRow(lines[index] ?? '');
    if (row) return row.entryHash;
  }
  return GENESIS;
}

/** Appends a finished session's steps to the hash-chained JSONL archive. */
export function appendTrajectoryArchive(
  projectDir: string,
  steps: readonly TrajectoryStep[],
  now: () => Date = () => new Date(),
): ArchivedTrajectoryStep[] {
  if (steps.length === 0) return [];
  const file = archiveFile(projectDir);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  let previousHash = lastEntryHash(file);
  const archivedAt = now().toISOString();
  const rows: ArchivedTrajectoryStep[] = [];
  for (const step of steps) {
    const entryHash = entryHashFor(step, archivedAt, previousHash);
    rows.push({ ...step, archivedAt, previousHash, entryHash });
    previousHash = entryHash;
  }
  fs.appendFileSync(file, rows.map((row) => `${JSON.stringify(row)}\n`).join(''), 'utf-8');
  return rows;
}

export function listTrajectoryArchive(
  projectDir: string,
  options: { sessionId?: string; limit?: number } = {},
): ArchivedTrajectoryStep[] {
  const limit = Math.max(1, Math.min(5000, Math.floor(options.limit ?? 500)));
  const rows = readLines(archiveFile(projectDir))
    .map(parseRow)
    .filter((row): row is ArchivedTrajectoryStep => row !== null)
    .filter((row) => options.sessionId === undefined || row.sessionId === options.sessionId);
  return rows.slice(-limit).reverse();
}

export function verifyTrajectoryArchive(projectDir: string): TrajectoryArchiveVerificationReport {
  const lines = readLines(archiveFile(projectDir));
  const issues: TrajectoryArchiveIssue[] = [];
  let expectedPreviousHash = GENESIS;
  let valid = 0;
  lines.forEach((line, index) => {
    const lineNo = index + 1;
    const row = parseRow(line);
    if (!row) {
      issues.push({ line: lineNo, reason: 'malformed_json' });
      return;
    }
    let ok = true;
    if (row.previousHash !== expectedPreviousHash) {
      ok = false;
      issues.push({
        line: lineNo,
        sessionId: row.sessionId,
        reason: `previous_hash_mismatch(expected=${expectedPreviousHash},actual=${row.previousHash || '(empty)'})`,
      });
    }
    if (row.entryHash !== entryHashFor(row, row.archivedAt, row.previousHash)) {
      ok = false;
      issues.push({ line: lineNo, sessionId: row.sessionId, reason: 'entry_hash_mismatch' });
    }
    expectedPreviousHash = row.entryHash;
    if (ok) valid += 1;
  });
  return { ok: issues.length === 0, total: lines.length, valid, issues };
}

export class FileTrajectoryArchive implements TrajectorySink {
  constructor(
    private readonly projectDir: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  archive(_sessionId: string, steps: readonly TrajectoryStep[]): void {
    appendTrajectoryArchive(this.projectDir, steps, this.clock);
  }
}
