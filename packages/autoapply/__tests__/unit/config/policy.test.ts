import { describe, expect, test } from 'vitest';
import { parseEnv } from '../../../src/config/env.js';
import { DEFAULT_POLICY, buildPolicy, policyFromEnv } from '../../../src/config/policy.js';

describe('buildPolicy', () => {
  test('no overrides yields the defaults', () => {
    expect(buildPolicy()).toEqual(DEFAULT_POLICY);
  });

  test('nested groups merge one level deep', () => {
    const policy = buildPolicy({ pacing: { captchaWaitMs: 0 }, extract: { maxElements: 5 } });

    expect(policy.pacing.captchaWaitMs).toBe(0);
    expect(policy.pacing.betweenSteps).toEqual(DEFAULT_POLICY.pacing.betweenSteps);
    expect(policy.extract.maxElements).toBe(5);
    expect(policy.extract.maxTotalChars).toBe(4000);
    expect(DEFAULT_POLICY.pacing.captchaWaitMs).toBe(30_000);
  });

  test('arrays and scalars replace', () => {
    const policy = buildPolicy({ userAgents: ['test-agent'], maxIterations: 4 });
    expect(policy.userAgents).toEqual(['test-agent']);
    expect(policy.maxIterations).toBe(4);
    expect(policy.fallbackSelectors).toBe(DEFAULT_POLICY.fallbackSelectors);
  });
});

describe('policyFromEnv', () => {
  test('takes caps from the environment', () => {
    const policy = policyFromEnv(parseEnv({ AUTOAPPLY_MAX_ITERATIONS: '7', AUTOAPPLY_MAX_ATTEMPTS: '2' }));
    expect(policy.maxIterations).toBe(7);
    expect(policy.maxAttempts).toBe(2);
  });

  test('explicit overrides win over the environment', () => {
    const policy = policyFromEnv(parseEnv({ AUTOAPPLY_MAX_ITERATIONS: '7' }), { maxIterations: 2 });
    expect(policy.maxIterations).toBe(2);
    expect(policy.maxAttempts).toBe(3);
  });
});
