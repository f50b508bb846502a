import { setTimeout as delay } from 'node:timers/promises';
import { DEFAULT_POLICY, type DelayRange, type NavigationPolicy } from '../config/policy.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const realSleep: SleepFn = async (ms, signal) => {
  if (ms <= 0) return;
  await delay(ms, undefined, { signal });
};

export interface HumanPacerOptions {
  policy?: NavigationPolicy;
  /** Uniform [0, 1) source; injectable for deterministic tests */
  random?: () => number;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

/**
 * Randomised, abortable delays between keystrokes, steps and iterations.
 * An abort rejects the pending sleep with the signal's AbortError.
 */
export class HumanPacer {
  readonly random: () => number;
  private policy: NavigationPolicy;
  private sleepFn: SleepFn;
  private signal?: AbortSignal;

  constructor(options: HumanPacerOptions = {}) {
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.random = options.random ?? Math.random;
    this.sleepFn = options.sleep ?? realSleep;
    this.signal = options.signal;
  }

  /** Same pacing, bound to another cancellation signal. */
  withSignal(signal: AbortSignal | undefined): HumanPacer {
    return new HumanPacer({ policy: this.policy, random: this.random, sleep: this.sleepFn, signal });
  }

  pick(range: DelayRange): number {
    return Math.round(range.minMs + this.random() * (range.maxMs - range.minMs));
  }

  /** Integer in [min, max]. */
  between(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  keystroke(): Promise<void> {
    return this.pause(this.pick(this.policy.pacing.keystroke));
  }

  betweenSteps(): Promise<void> {
    return this.pause(this.pick(this.policy.pacing.betweenSteps));
  }

  betweenIterations(): Promise<void> {
    return this.pause(this.pick(this.policy.pacing.betweenIterations));
  }

  betweenAttempts(): Promise<void> {
    return this.pause(this.pick(this.policy.pacing.betweenAttempts));
  }

  betweenApplications(): Promise<void> {
    return this.pause(this.pick(this.policy.pacing.betweenApplications));
  }

  pause(ms: number): Promise<void> {
    return this.sleepFn(ms, this.signal);
  }
}
