import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import type { AttemptResult } from '../../../src/engine/types.js';
import { ApplicationLog, logEntryOf } from '../../../src/sessions/ApplicationLog.js';
import { captureLogger, silentLogger } from '../../fixtures/testData.js';

const FIXED = new Date('2026-01-02T03:04:05.000Z');

function result(overrides: Partial<AttemptResult> = {}): AttemptResult {
  return {
    success: true,
    message: 'application submitted',
    status: 'success',
    url: 'https://jobs.example.test/posting/1',
    iterations: 2,
    navigationSteps: 3,
    navigationPattern: [],
    obstacles: [],
    pageTypes: ['application_form', 'success_page'],
    attempts: 1,
    ...overrides,
  };
}

const failed = result({ success: false, status: 'failure', message: 'max iterations exceeded' });

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'application-log-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('logEntryOf', () => {
  test('keeps the outcome summary and the job labels', () => {
    expect(logEntryOf(result(), { attemptId: 'attempt-1', title: 'Engineer', company: 'Example Co' }, FIXED)).toEqual({
      recordedAt: '2026-01-02T03:04:05.000Z',
      attemptId: 'attempt-1',
      url: 'https://jobs.example.test/posting/1',
      title: 'Engineer',
      company: 'Example Co',
      status: 'success',
      success: true,
      message: 'application submitted',
      attempts: 1,
      iterations: 2,
      navigationSteps: 3,
    });
  });

  test('carries failure screenshots', () => {
    const entry = logEntryOf(result({ ...failed, screenshots: ['shots/a.png'] }), { attemptId: 'attempt-2' }, FIXED);
    expect(entry).toMatchObject({ success: false, screenshots: ['shots/a.png'] });
    expect(entry).not.toHaveProperty('title');
  });
});

describe('ApplicationLog', () => {
  test('appends one JSON line per attempt', async () => {
    const path = join(dir, 'logs', 'applications.jsonl');
    const log = new ApplicationLog({ path, logger: silentLogger, now: () => FIXED });

    await Promise.all([log.record(result(), { attemptId: 'a' }), log.record(failed, { attemptId: 'b' })]);

    const lines = (await readFile(path, 'utf8')).trimEnd().split('\n');
    expect(lines.map((line) => JSON.parse(line).attemptId)).toEqual(['a', 'b']);
  });

  test('stats count successes and the success rate', async () => {
    const log = new ApplicationLog({ logger: silentLogger });
    expect(log.stats()).toEqual({ total: 0, successful: 0, failed: 0, successRate: 0 });

    await log.record(result(), { attemptId: 'a' });
    await log.record(failed, { attemptId: 'b' });
    await log.record(failed, { attemptId: 'c' });
    await log.record(result(), { attemptId: 'd' });

    expect(log.stats()).toEqual({ total: 4, successful: 2, failed: 2, successRate: 50 });
  });

  test('earlier entries are loaded and unreadable lines skipped', async () => {
    const path = join(dir, 'applications.jsonl');
    const earlier = logEntryOf(result(), { attemptId: 'old' }, FIXED);
    await writeFile(path, `${JSON.stringify(earlier)}\nnot json\n{"attemptId": "partial"}\n`, 'utf8');
    const { logger, lines } = captureLogger();
    const log = new ApplicationLog({ path, logger, now: () => FIXED });

    await log.record(failed, { attemptId: 'new' });

    expect(log.all().map((e) => e.attemptId)).toEqual(['old', 'new']);
    expect(lines.find((l) => l.entry.msg === 'application_log_lines_skipped')?.entry.skipped).toBe(2);
    expect((await readFile(path, 'utf8')).trimEnd().split('\n')).toHaveLength(4);
  });
});
