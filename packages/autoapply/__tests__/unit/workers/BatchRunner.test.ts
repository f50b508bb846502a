import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { MockDriver } from '../../../src/adapters/mock.js';
import { CompatibilityAssessor } from '../../../src/engine/CompatibilityAssessor.js';
import type { ReasoningOracle } from '../../../src/oracle/types.js';
import { AttemptRunner } from '../../../src/workers/AttemptRunner.js';
import { BatchRunner, isApplicableUrl, type BatchRunnerOptions, type JobSpec } from '../../../src/workers/BatchRunner.js';
import { createTestEngine, mockDriver, profile, silentLogger } from '../../fixtures/testData.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'batch-runner-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function setup(drivers: MockDriver[], concurrency = 1, extra: Pick<BatchRunnerOptions, 'assessor' | 'minCompatibility'> = {}) {
  const engine = createTestEngine({ mode: 'heuristic', resumeDir: dir, policy: { maxIterations: 2 } });
  const queue = [...drivers];
  const driverFactory = vi.fn(async () => {
    const next = queue.shift();
    if (!next) throw new Error('no driver left');
    return next;
  });
  const runner = new AttemptRunner({
    driverFactory,
    loop: engine.loop,
    policy: engine.policy,
    pacer: engine.pacer,
    logger: silentLogger,
  });
  const times = [1_000, 1_600];
  const batch = new BatchRunner({
    runner,
    concurrency,
    pacer: engine.pacer,
    logger: silentLogger,
    now: () => times.shift() ?? 0,
    ...extra,
  });
  return { batch, driverFactory };
}

describe('isApplicableUrl', () => {
  test('http and https only', () => {
    expect(isApplicableUrl('https://jobs.example.test/1')).toBe(true);
    expect(isApplicableUrl('http://jobs.example.test/1')).toBe(true);
    expect(isApplicableUrl('mailto:jobs@example.test')).toBe(false);
    expect(isApplicableUrl('jobs.example.test/1')).toBe(false);
  });
});

describe('BatchRunner', () => {
  test('runs valid jobs, skips the rest and tallies outcomes', async () => {
    const { batch } = setup([mockDriver(['application-form', 'submitted']), mockDriver(['captcha'])]);
    const credentials = vi.fn((_host: string) => undefined);
    const jobs: JobSpec[] = [
      { url: 'https://jobs.example.test/posting/1', title: 'Engineer' },
      { url: 'mailto:jobs@example.test' },
      { url: 'https://careers.example.test/posting/2' },
    ];

    const report = await batch.run(jobs, { profile: profile(), credentials });

    expect(report.stats).toEqual({ total: 3, submitted: 1, failed: 1, skipped: 1, durationMs: 600 });
    expect(report.outcomes.map((o) => o.status)).toEqual(['completed', 'skipped', 'completed']);
    expect(report.outcomes[1]).toEqual({ job: jobs[1], status: 'skipped', reason: 'invalid url' });
    const last = report.outcomes[2];
    expect(last.status === 'completed' && last.result.message).toBe('max iterations exceeded');
    expect(credentials.mock.calls).toEqual([['jobs.example.test'], ['careers.example.test']]);
  });

  test('outcomes keep input order under concurrency', async () => {
    const drivers = [1, 2, 3].map(() => mockDriver(['application-form', 'submitted']));
    const { batch, driverFactory } = setup(drivers, 2);
    const jobs = [1, 2, 3].map((n) => ({ url: `https://jobs.example.test/posting/${n}` }));

    const report = await batch.run(jobs, { profile: profile() });

    expect(driverFactory).toHaveBeenCalledTimes(3);
    expect(report.stats.submitted).toBe(3);
    expect(report.outcomes.map((o) => (o.status === 'completed' ? o.result.url : o.reason))).toEqual(
      jobs.map((j) => j.url),
    );
  });

  // ── Compatibility ───────────────────────────────────────────────────

  /** Scores each job by the number in its title; anything else is an unusable reply. */
  function scoringAssessor() {
    const call = vi.fn(async (prompt: string, _signal?: AbortSignal): Promise<string> => {
      const score = /Title: Role (\d+)/.exec(prompt);
      return score ? `{"relevance_score": ${score[1]}}` : 'no idea';
    });
    const oracle = { name: 'stub', call } satisfies ReasoningOracle;
    return { call, assessor: new CompatibilityAssessor(oracle, { logger: silentLogger }) };
  }

  test('jobs scored below the minimum are skipped without a browser', async () => {
    const { assessor } = scoringAssessor();
    const { batch, driverFactory } = setup([mockDriver(['application-form', 'submitted'])], 1, {
      assessor,
      minCompatibility: 60,
    });
    const jobs: JobSpec[] = [
      { url: 'https://jobs.example.test/posting/1', title: 'Role 40' },
      { url: 'https://jobs.example.test/posting/2', title: 'Role 75' },
    ];

    const report = await batch.run(jobs, { profile: profile() });

    expect(driverFactory).toHaveBeenCalledTimes(1);
    expect(report.stats).toMatchObject({ total: 2, submitted: 1, skipped: 1 });
    expect(report.outcomes[0]).toMatchObject({
      status: 'skipped',
      reason: 'low compatibility (40 < 60)',
      compatibility: { score: 40, fallback: false },
    });
    expect(report.outcomes[1]).toMatchObject({ status: 'completed', compatibility: { score: 75 } });
  });

  test('an unusable score never skips, and no minimum only annotates', async () => {
    const { assessor, call } = scoringAssessor();
    const drivers = [1, 2].map(() => mockDriver(['application-form', 'submitted']));
    const { batch } = setup(drivers, 1, { assessor });
    const jobs: JobSpec[] = [
      { url: 'https://jobs.example.test/posting/1', title: 'Untitled' },
      { url: 'https://jobs.example.test/posting/2', title: 'Role 10' },
    ];

    const report = await batch.run(jobs, { profile: profile() });

    expect(call).toHaveBeenCalledTimes(2);
    expect(report.outcomes.map((o) => [o.status, o.compatibility?.score, o.compatibility?.fallback])).toEqual([
      ['completed', 50, true],
      ['completed', 10, false],
    ]);
  });

  test('a cancelled batch skips the jobs it has not started', async () => {
    const { batch, driverFactory } = setup([mockDriver(['application-form'])]);
    const controller = new AbortController();
    controller.abort();

    const report = await batch.run([{ url: 'https://jobs.example.test/posting/1' }], {
      profile: profile(),
      signal: controller.signal,
    });

    expect(report.outcomes).toEqual([
      { job: { url: 'https://jobs.example.test/posting/1' }, status: 'skipped', reason: 'cancelled' },
    ]);
    expect(report.stats.skipped).toBe(1);
    expect(driverFactory).not.toHaveBeenCalled();
  });
});
