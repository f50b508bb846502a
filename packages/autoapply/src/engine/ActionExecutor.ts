/**
 * ActionExecutor: performs NavigationActions against a BrowserDriver.
 *
 * Targets are located through the ElementResolver fallback chain; planned
 * actions may wait for their target, fallback guesses look once. Every
 * failure comes back as an ActionOutcome; only cancellation and a lost
 * browser escape as exceptions.
 */

import type { BrowserDriver, DriverElement, LookupOptions } from '../adapters/types.js';
import { DEFAULT_POLICY, type NavigationPolicy } from '../config/policy.js';
import { AttemptCancelledError, BrowserDisconnectedError, errorMessage } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { resolveResumeArtifact, type ResumeArtifact } from '../profile/resumeSurrogate.js';
import { resolveFieldValue } from './fieldValues.js';
import { HumanPacer } from './HumanPacer.js';
import { ElementResolver, type Resolution } from './ResolutionStrategies.js';
import type { SessionState } from './SessionState.js';
import type { ApplicantProfile, HistoryEntry, NavigationAction } from './types.js';

export const CLICK_SCRIPT = 'element.click();';

const WAIT_FOR_TARGET: LookupOptions = { wait: true };
const LOOK_ONCE: LookupOptions = {};

export type ClickMethod = 'native' | 'script' | 'pointer';

export interface ActionOutcome {
  succeeded: boolean;
  /** Resolution strategy that located the target */
  strategy?: string;
  /** How the interaction finally went through, e.g. a click method or 'scripted' fill */
  method?: string;
  error?: string;
}

export interface ExecutionContext {
  profile: ApplicantProfile;
  signal?: AbortSignal;
}

export interface ExecuteAllResult {
  success: boolean;
  stepsCompleted: number;
  failedStepIndex?: number;
  error?: string;
}

export interface ActionExecutorOptions {
  policy?: NavigationPolicy;
  pacer?: HumanPacer;
  resolver?: ElementResolver;
  logger?: Logger;
  /** Directory for synthesized resume files; defaults to the OS temp dir */
  resumeDir?: string;
}

export class ActionExecutor {
  private policy: NavigationPolicy;
  private pacer: HumanPacer;
  private resolver: ElementResolver;
  private log: Logger;
  private resumeDir?: string;
  private resumes = new WeakMap<ApplicantProfile, Promise<ResumeArtifact>>();

  constructor(options: ActionExecutorOptions = {}) {
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.pacer = options.pacer ?? new HumanPacer({ policy: this.policy });
    this.resolver = options.resolver ?? new ElementResolver();
    this.log = (options.logger ?? getLogger()).child({ component: 'ActionExecutor' });
    this.resumeDir = options.resumeDir;
  }

  /**
   * Execute actions in order, recording every outcome in the session history.
   * Stops at the first failure and reports its index.
   */
  async executeAll(
    actions: NavigationAction[],
    driver: BrowserDriver,
    session: SessionState,
    ctx: ExecutionContext,
    onStep?: (entry: HistoryEntry) => void,
  ): Promise<ExecuteAllResult> {
    for (let i = 0; i < actions.length; i++) {
      const action = actions[i];
      const outcome = await this.execute(action, driver, ctx);
      const entry = session.recordAction(action, outcome.succeeded, { strategy: outcome.strategy, error: outcome.error });
      onStep?.(entry);

      if (!outcome.succeeded) {
        return { success: false, stepsCompleted: i, failedStepIndex: i, error: outcome.error };
      }
      if (i < actions.length - 1) {
        await this.pacer.withSignal(ctx.signal).betweenSteps();
      }
    }
    return { success: true, stepsCompleted: actions.length };
  }

  /** Click the generic apply-button guesses until one goes through. */
  async tryFallbackActions(
    driver: BrowserDriver,
    session: SessionState,
    ctx: ExecutionContext,
    onStep?: (entry: HistoryEntry) => void,
  ): Promise<boolean> {
    for (const selector of this.policy.fallbackSelectors) {
      const action: NavigationAction = {
        type: 'click',
        selector,
        description: `Fallback click ${selector}`,
        confidence: 10,
      };
      const outcome = await this.execute(action, driver, ctx, LOOK_ONCE);
      const entry = session.recordAction(action, outcome.succeeded, {
        strategy: outcome.strategy,
        error: outcome.error,
        fallback: true,
      });
      onStep?.(entry);
      if (outcome.succeeded) return true;
    }
    return false;
  }

  async execute(
    action: NavigationAction,
    driver: BrowserDriver,
    ctx: ExecutionContext,
    lookup: LookupOptions = WAIT_FOR_TARGET,
  ): Promise<ActionOutcome> {
    try {
      switch (action.type) {
        case 'click':
          return await this.click(action.selector, driver, ctx.signal, lookup);
        case 'fill': {
          const value = resolveFieldValue(action.value ?? '', ctx.profile);
          return await this.fill(action.selector, value, driver, ctx.signal, lookup);
        }
        case 'select':
          return await this.select(action.selector, resolveFieldValue(action.value ?? '', ctx.profile), driver, lookup);
        case 'upload':
          return await this.upload(action.selector, driver, ctx.profile, lookup);
        case 'wait':
          return await this.wait(action.value, ctx.signal);
        case 'scroll':
          return await this.scroll(action.selector, driver, lookup);
        default:
          return { succeeded: false, error: 'unsupported action type' };
      }
    } catch (err) {
      this.rethrowFatal(err, driver, ctx.signal);
      this.log.warn('action_failed', { type: action.type, selector: action.selector, error: errorMessage(err) });
      return { succeeded: false, error: errorMessage(err) };
    }
  }

  // --- Interactions ---

  async click(
    hint: string,
    driver: BrowserDriver,
    signal?: AbortSignal,
    lookup: LookupOptions = WAIT_FOR_TARGET,
  ): Promise<ActionOutcome> {
    const resolved = await this.locate(hint, driver, lookup);
    if (!resolved) return notFound(hint);
    const { element, strategy } = resolved;

    try {
      await driver.scrollIntoView(element);
      await this.pacer.withSignal(signal).pause(this.policy.pacing.scrollSettleMs);
    } catch (err) {
      this.rethrowFatal(err, driver, signal);
      this.log.debug('scroll_into_view_failed', { selector: hint, error: errorMessage(err) });
    }

    const attempts: [ClickMethod, (el: DriverElement) => Promise<unknown>][] = [
      ['native', (el) => driver.click(el)],
      ['script', (el) => driver.executeScript(CLICK_SCRIPT, el)],
      ['pointer', (el) => driver.pointerClick(el)],
    ];

    const errors: string[] = [];
    for (const [method, perform] of attempts) {
      try {
        await perform(element);
        return { succeeded: true, strategy, method };
      } catch (err) {
        this.rethrowFatal(err, driver, signal);
        errors.push(`${method}: ${errorMessage(err)}`);
      }
    }

    this.log.warn('click_failed', { selector: hint, strategy, errors });
    return { succeeded: false, strategy, error: `click rejected (${errors.join('; ')})` };
  }

  async fill(
    hint: string,
    text: string,
    driver: BrowserDriver,
    signal?: AbortSignal,
    lookup: LookupOptions = WAIT_FOR_TARGET,
  ): Promise<ActionOutcome> {
    const resolved = await this.locate(hint, driver, lookup);
    if (!resolved) return notFound(hint);
    const { element, strategy } = resolved;
    const pacer = this.pacer.withSignal(signal);

    try {
      await driver.clear(element);
      for (const char of text) {
        await driver.typeText(element, char);
        await pacer.keystroke();
      }
      return { succeeded: true, strategy, method: 'typed' };
    } catch (err) {
      this.rethrowFatal(err, driver, signal);
      this.log.debug('typing_rejected', { selector: hint, error: errorMessage(err) });
    }

    try {
      await driver.setValue(element, text);
      return { succeeded: true, strategy, method: 'scripted' };
    } catch (err) {
      this.rethrowFatal(err, driver, signal);
      this.log.warn('fill_failed', { selector: hint, strategy, error: errorMessage(err) });
      return { succeeded: false, strategy, error: `fill rejected: ${errorMessage(err)}` };
    }
  }

  private async select(hint: string, wanted: string, driver: BrowserDriver, lookup: LookupOptions): Promise<ActionOutcome> {
    const resolved = await this.locate(hint, driver, lookup);
    if (!resolved) return notFound(hint);
    const { element, strategy } = resolved;

    const target = wanted.trim();
    if (target.length === 0) return { succeeded: false, strategy, error: 'no value to select' };

    const labels = await driver.getOptionLabels(element);
    const label =
      labels.find((l) => l.trim() === target) ??
      labels.find((l) => l.trim().toLowerCase().includes(target.toLowerCase()));
    if (label === undefined) {
      return { succeeded: false, strategy, error: `no option matching "${target}"` };
    }

    await driver.selectOption(element, label);
    return { succeeded: true, strategy, method: label === target ? 'exact' : 'substring' };
  }

  private async upload(
    hint: string,
    driver: BrowserDriver,
    profile: ApplicantProfile,
    lookup: LookupOptions,
  ): Promise<ActionOutcome> {
    const resolved = await this.locate(hint, driver, lookup);
    if (!resolved) return notFound(hint);

    const artifact = await this.resumeFor(profile);
    await driver.uploadFile(resolved.element, artifact.path);
    return {
      succeeded: true,
      strategy: resolved.strategy,
      method: artifact.synthesized ? 'surrogate' : 'artifact',
    };
  }

  private async wait(value: string | undefined, signal?: AbortSignal): Promise<ActionOutcome> {
    const parsed = value === undefined ? Number.NaN : Number(value);
    const seconds = Number.isFinite(parsed) && parsed >= 0 ? parsed : this.policy.pacing.defaultWaitSeconds;
    await this.pacer.withSignal(signal).pause(seconds * 1000);
    return { succeeded: true };
  }

  private async scroll(hint: string, driver: BrowserDriver, lookup: LookupOptions): Promise<ActionOutcome> {
    const resolved = await this.locate(hint, driver, lookup);
    if (!resolved) return notFound(hint);
    await driver.scrollIntoView(resolved.element);
    return { succeeded: true, strategy: resolved.strategy };
  }

  // --- Helpers ---

  private async locate(hint: string, driver: BrowserDriver, lookup: LookupOptions): Promise<Resolution | null> {
    const resolved = await this.resolver.resolve(hint, driver, lookup);
    if (!resolved) {
      // Strategies treat driver errors as misses; a dead browser is not a miss
      if (!driver.isConnected()) throw new BrowserDisconnectedError();
      this.log.warn('element_resolution_failed', { selector: hint });
    }
    return resolved;
  }

  private resumeFor(profile: ApplicantProfile): Promise<ResumeArtifact> {
    let artifact = this.resumes.get(profile);
    if (!artifact) {
      // A failed write is retried on the next upload
      artifact = resolveResumeArtifact(profile, this.resumeDir).catch((err: unknown) => {
        this.resumes.delete(profile);
        throw err;
      });
      this.resumes.set(profile, artifact);
    }
    return artifact;
  }

  /** Cancellation and a lost browser end the attempt; everything else is a step failure. */
  private rethrowFatal(err: unknown, driver: BrowserDriver, signal?: AbortSignal): void {
    if (err instanceof AttemptCancelledError || err instanceof BrowserDisconnectedError) throw err;
    if (signal?.aborted) throw new AttemptCancelledError();
    if (!driver.isConnected()) throw new BrowserDisconnectedError();
  }
}

function notFound(hint: string): ActionOutcome {
  return { succeeded: false, error: `element not found: ${hint}` };
}
