import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, describe, expect, test } from 'vitest';
import { StoreUnavailableError } from '../errors';
import { createLogger, formatLogLine, log } from './logger';

const originalEnv = process.env.FAMILY_INTAKE_LOG_FILE;

afterEach(() => {
  if (typeof originalEnv === 'string') {
    process.env.FAMILY_INTAKE_LOG_FILE = originalEnv;
  } else {
    delete process.env.FAMILY_INTAKE_LOG_FILE;
  }
});

describe('logger', () => {
  test('formats timestamp, message and payload on one line', () => {
    const line = formatLogLine(
      '[pipeline] stage',
      { stage: 'grouped' },
      new Date('2025-01-02T03:04:05.000Z'),
    );
    expect(line).toBe('[2025-01-02T03:04:05.000Z] [pipeline] stage {"stage":"grouped"}\n');
  });

  test('omits payload when no data is given', () => {
    const line = formatLogLine('hello', undefined, new Date('2025-01-02T03:04:05.000Z'));
    expect(line).toBe('[2025-01-02T03:04:05.000Z] hello\n');
  });

  test('serializes errors with their code and tolerates cycles', () => {
    const cyclic: Record<string, unknown> = { name: 'loop' };
    cyclic.self = cyclic;
    const line = formatLogLine(
      'x',
      { error: new StoreUnavailableError('search offline'), cyclic },
      new Date('2025-01-02T03:04:05.000Z'),
    );
    expect(line).toContain(
      '"error":{"name":"StoreUnavailableError","message":"search offline","code":"store_unavailable"}',
    );
    expect(line).toContain('"self":"[circular]"');
  });

  test('appends to the file named by the environment', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'family-intake-log-'));
    const file = path.join(dir, 'run.log');
    process.env.FAMILY_INTAKE_LOG_FILE = file;
    log('first');
    log('second', { n: 2 });
    const lines = fs.readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]?.endsWith('] first')).toBe(true);
    expect(lines[1]?.endsWith('] second {"n":2}')).toBe(true);
  });

  test('scoped loggers prefix the scope and carry their context', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'family-intake-log-'));
    const file = path.join(dir, 'scoped.log');
    process.env.FAMILY_INTAKE_LOG_FILE = file;
    const run = createLogger('pipeline', { sessionId: 's-1' });
    run.log('transition', { to: 'extracted' });
    run.child({ groupId: 'group-2' }).log('stored');
    createLogger('config').log('loaded');
    const lines = fs.readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines.map((line) => line.slice(line.indexOf('] ') + 2))).toEqual([
      '[pipeline] transition {"sessionId":"s-1","to":"extracted"}',
      '[pipeline] stored {"sessionId":"s-1","groupId":"group-2"}',
      '[config] loaded',
    ]);
  });
});
