import { describe, expect, test, vi } from 'vitest';
import { buildPolicy } from '../../../src/config/policy.js';
import { HumanPacer, realSleep } from '../../../src/engine/HumanPacer.js';

function pacerWith(random: number) {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  return { sleep, pacer: new HumanPacer({ sleep, random: () => random }) };
}

describe('HumanPacer', () => {
  test('pick spans the range', () => {
    expect(pacerWith(0).pacer.pick({ minMs: 1000, maxMs: 3000 })).toBe(1000);
    expect(pacerWith(0.5).pacer.pick({ minMs: 1000, maxMs: 3000 })).toBe(2000);
  });

  test('between is inclusive of both ends', () => {
    expect(pacerWith(0).pacer.between(100, 800)).toBe(100);
    expect(pacerWith(0.999).pacer.between(100, 800)).toBe(800);
  });

  test('named delays draw from their policy ranges', async () => {
    const { sleep, pacer } = pacerWith(0);
    await pacer.keystroke();
    await pacer.betweenSteps();
    await pacer.betweenIterations();
    await pacer.betweenAttempts();
    await pacer.betweenApplications();

    expect(sleep.mock.calls.map((c) => c[0])).toEqual([50, 500, 1000, 3000, 5000]);
  });

  test('custom policy ranges apply', async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const policy = buildPolicy({ pacing: { betweenSteps: { minMs: 7, maxMs: 7 } } });
    await new HumanPacer({ policy, sleep }).betweenSteps();
    expect(sleep).toHaveBeenCalledWith(7, undefined);
  });

  test('withSignal binds the signal to every sleep', async () => {
    const { sleep, pacer } = pacerWith(0);
    const controller = new AbortController();
    await pacer.withSignal(controller.signal).pause(25);
    expect(sleep).toHaveBeenCalledWith(25, controller.signal);
  });

  test('real sleep rejects once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(realSleep(60_000, controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
    await expect(realSleep(0, controller.signal)).resolves.toBeUndefined();
  });
});
