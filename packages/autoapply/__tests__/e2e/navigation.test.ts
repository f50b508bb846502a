/**
 * End-to-end navigation over MockDriver: analysis, recommendation, execution
 * and obstacle handling wired together the way AttemptRunner wires them.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { MockDriver } from '../../src/adapters/mock.js';
import { DEFAULT_POLICY } from '../../src/config/policy.js';
import { MAX_ITERATIONS_REASON, toAttemptResult } from '../../src/engine/NavigationLoop.js';
import { OracleAdvisor } from '../../src/engine/OracleAdvisor.js';
import { SessionState } from '../../src/engine/SessionState.js';
import type { ReasoningOracle } from '../../src/oracle/types.js';
import { createTestEngine, mockDriver, page, profile, silentLogger } from '../fixtures/testData.js';

const JOB_URL = 'https://jobs.example.test/posting/1';
const credentials = { username: 'test-user', password: 'test-secret' };

let resumeDir: string;

beforeEach(async () => {
  resumeDir = await mkdtemp(join(tmpdir(), 'navigation-e2e-'));
});

afterEach(async () => {
  await rm(resumeDir, { recursive: true, force: true });
});

describe('navigation loop', () => {
  // ── Happy path ──────────────────────────────────────────────────────

  test('fills and submits a direct application form', async () => {
    const { loop } = createTestEngine({ mode: 'heuristic', resumeDir });
    const driver = mockDriver(['application-form', 'submitted']);
    const classified: string[] = [];
    loop.events.on('page_classified', ({ pageType }) => classified.push(pageType));

    const session = await loop.run({ driver, profile: profile() });
    const result = toAttemptResult(session, { url: JOB_URL, attempts: 1 });

    expect(result).toMatchObject({
      success: true,
      status: 'success',
      message: 'application submitted',
      iterations: 2,
      navigationSteps: 3,
      pageTypes: ['application_form', 'success_page'],
      obstacles: [],
      attempts: 1,
    });
    expect(result).not.toHaveProperty('error');
    expect(classified).toEqual(['application_form', 'success_page']);
    expect(driver.clicks).toEqual([{ target: "button[type='submit']", method: 'native' }]);
    expect(driver.values.get('#email')).toBe('ada@example.test');
    expect(driver.uploads).toHaveLength(1);
    expect(driver.uploads[0].target).toBe('#resume');
    expect(result.navigationPattern.every((entry) => entry.iteration === 1 && entry.succeeded)).toBe(true);
  });

  // ── Iteration cap ───────────────────────────────────────────────────

  test('a captcha that never clears runs out of iterations', async () => {
    const { loop } = createTestEngine({ mode: 'heuristic', resumeDir, policy: { maxIterations: 3 } });
    const driver = mockDriver(['captcha']);
    const fallbacks = vi.fn();
    loop.events.on('fallback_actions_used', fallbacks);

    const result = toAttemptResult(await loop.run({ driver, profile: profile() }), { url: JOB_URL, attempts: 1 });

    expect(result).toMatchObject({
      success: false,
      status: 'failure',
      message: MAX_ITERATIONS_REASON,
      error: MAX_ITERATIONS_REASON,
      iterations: 3,
      navigationSteps: 18,
      pageTypes: ['unknown', 'unknown', 'unknown'],
    });
    expect(result.obstacles.map((o) => [o.iteration, o.obstacle, o.mitigated])).toEqual([
      [1, 'captcha', true],
      [2, 'captcha', true],
      [3, 'captcha', true],
    ]);
    expect(result.navigationPattern.every((entry) => entry.fallback && !entry.succeeded)).toBe(true);
    expect(fallbacks).toHaveBeenCalledTimes(3);
    expect(fallbacks).toHaveBeenLastCalledWith({ iteration: 3, succeeded: false });
  });

  // ── Oracle degradation ──────────────────────────────────────────────

  test('hybrid mode keeps going when the oracle reply is unusable', async () => {
    const call = vi.fn(async (_prompt: string, _signal?: AbortSignal): Promise<string> => {
      return 'Sure! Here is the JSON: {not valid json';
    });
    const oracle = { name: 'stub', call } satisfies ReasoningOracle;
    const advisor = new OracleAdvisor(oracle, { logger: silentLogger });
    const { loop } = createTestEngine({ mode: 'hybrid', advisor, resumeDir });
    const driver = mockDriver(['application-form', 'submitted']);

    const result = toAttemptResult(await loop.run({ driver, profile: profile() }), { url: JOB_URL, attempts: 1 });

    expect(result.success).toBe(true);
    expect(result.iterations).toBe(2);
    expect(result.navigationSteps).toBe(4);
    expect(result.navigationPattern[3].action).toMatchObject({ type: 'wait', value: '2' });
    expect(result.obstacles.map((o) => [o.iteration, o.obstacle, o.mitigated])).toEqual([[1, 'analysis_failed', null]]);
    expect(call).toHaveBeenCalledTimes(2);
  });

  // ── Obstacles ───────────────────────────────────────────────────────

  test('a login wall without credentials blocks the attempt', async () => {
    const { loop } = createTestEngine({ mode: 'heuristic', resumeDir });
    const driver = mockDriver(['login-wall', 'submitted']);
    const seen: string[] = [];
    for (const name of ['iteration_started', 'page_classified', 'obstacle_detected', 'mitigation_finished'] as const) {
      loop.events.on(name, () => seen.push(name));
    }

    const result = toAttemptResult(await loop.run({ driver, profile: profile() }), { url: JOB_URL, attempts: 1 });

    expect(result).toMatchObject({
      success: false,
      status: 'obstacle_blocked',
      message: 'login required and could not be completed',
      iterations: 1,
      navigationSteps: 0,
      pageTypes: ['login_page'],
    });
    expect(result.obstacles.map((o) => [o.obstacle, o.mitigated])).toEqual([['login_required', false]]);
    expect(seen).toEqual(['iteration_started', 'page_classified', 'obstacle_detected', 'mitigation_finished']);
    expect(driver.events.some((e) => e.startsWith('type:'))).toBe(false);
  });

  test('logs in with supplied credentials and carries on', async () => {
    const { loop } = createTestEngine({ mode: 'heuristic', resumeDir });
    const driver = mockDriver(['login-wall', 'submitted']);

    const result = toAttemptResult(await loop.run({ driver, profile: profile(), credentials }), {
      url: JOB_URL,
      attempts: 1,
    });

    expect(result).toMatchObject({ success: true, iterations: 2, navigationSteps: 3 });
    expect(result.navigationPattern.map((h) => [h.iteration, h.action.description, h.mitigation])).toEqual([
      [1, 'Login: fill username', 'login_required'],
      [1, 'Login: fill password', 'login_required'],
      [1, 'Login: submit', 'login_required'],
    ]);
    expect(result.obstacles.map((o) => [o.iteration, o.obstacle, o.mitigated])).toEqual([[1, 'login_required', true]]);
    expect(driver.values.get('#username')).toBe('test-user');
    expect(driver.values.get('#password')).toBe('test-secret');
    expect(driver.clicks).toEqual([{ target: "button[type='submit']", method: 'native' }]);
  });

  test('bot detection is countered before moving on', async () => {
    const { loop } = createTestEngine({ mode: 'heuristic', resumeDir });
    const driver = new MockDriver({
      url: JOB_URL,
      pages: ['<html><body><h1>Checking your browser</h1><p>One moment please.</p></body></html>', page('submitted')],
    });

    const result = toAttemptResult(await loop.run({ driver, profile: profile() }), { url: JOB_URL, attempts: 1 });

    expect(result.success).toBe(true);
    expect(result.pageTypes).toEqual(['unknown', 'success_page']);
    expect(result.obstacles.map((o) => [o.obstacle, o.mitigated])).toEqual([['bot_detection', true]]);
    expect(driver.userAgents).toEqual([DEFAULT_POLICY.userAgents[0]]);
    expect(driver.pointerMoves).toHaveLength(5);
  });

  // ── Fatal conditions ────────────────────────────────────────────────

  test('a browser crash escapes with the partial session intact', async () => {
    const { loop } = createTestEngine({ mode: 'heuristic', resumeDir });
    const driver = mockDriver(['job-listing', 'application-form'], { crashOnRead: 2 });
    const session = new SessionState(5);

    await expect(loop.run({ driver, profile: profile(), session })).rejects.toThrow('browser disconnected');
    expect(session.iteration).toBe(2);
    expect(session.pageTypes).toEqual(['job_listing']);
    expect(session.isTerminal).toBe(false);
  });

  test('an aborted signal stops before the first iteration', async () => {
    const { loop } = createTestEngine({ mode: 'heuristic', resumeDir });
    const driver = mockDriver(['application-form']);
    const controller = new AbortController();
    controller.abort();

    await expect(loop.run({ driver, profile: profile(), signal: controller.signal })).rejects.toThrow(
      'attempt cancelled',
    );
    expect(driver.reads).toBe(0);
  });
});
