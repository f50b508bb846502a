/**
 * ObstacleHandler: mitigation routines for blocking obstacles.
 *
 * bot_detection and captcha are best-effort and always report success.
 * login_required fails closed: without out-of-band credentials it reports
 * failure at once, and it never guesses credentials. Each login step lands in
 * the session history; typed values never do.
 */

import type { BrowserDriver } from '../adapters/types.js';
import { DEFAULT_POLICY, type NavigationPolicy } from '../config/policy.js';
import { AttemptCancelledError, BrowserDisconnectedError, errorMessage } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { ActionExecutor, ActionOutcome } from './ActionExecutor.js';
import { HumanPacer } from './HumanPacer.js';
import type { SessionState } from './SessionState.js';
import type { BlockingObstacle, HistoryEntry, NavigationAction, SiteCredentials } from './types.js';

const USERNAME_HINTS = [
  'input[type="email"]',
  'input[name*="user" i]',
  'input[name*="email" i]',
  'input[id*="user" i]',
  'input[type="text"]',
];
const PASSWORD_HINTS = ['input[type="password"]'];
const SUBMIT_HINTS = ['button[type="submit"]', 'input[type="submit"]', 'Sign in', 'Log in'];

export interface MitigationContext {
  driver: BrowserDriver;
  credentials?: SiteCredentials;
  signal?: AbortSignal;
  /** Receives the steps a mitigation takes on the page */
  session?: SessionState;
  onStep?: (entry: HistoryEntry) => void;
}

type LoginStep = { type: NavigationAction['type']; description: string; hints: string[] };

export interface ObstacleHandlerOptions {
  executor: ActionExecutor;
  policy?: NavigationPolicy;
  pacer?: HumanPacer;
  logger?: Logger;
}

export class ObstacleHandler {
  private executor: ActionExecutor;
  private policy: NavigationPolicy;
  private pacer: HumanPacer;
  private log: Logger;
  private loginAttempts = 0;

  constructor(options: ObstacleHandlerOptions) {
    this.executor = options.executor;
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.pacer = options.pacer ?? new HumanPacer({ policy: this.policy });
    this.log = (options.logger ?? getLogger()).child({ component: 'ObstacleHandler' });
  }

  /** Login submissions made so far by this handler. */
  get loginAttemptCount(): number {
    return this.loginAttempts;
  }

  async mitigate(obstacle: BlockingObstacle, ctx: MitigationContext): Promise<boolean> {
    switch (obstacle) {
      case 'bot_detection':
        return this.handleBotDetection(ctx);
      case 'captcha':
        return this.handleCaptcha(ctx);
      case 'login_required':
        return this.handleLogin(ctx);
    }
  }

  private async handleBotDetection(ctx: MitigationContext): Promise<boolean> {
    const pacer = this.pacer.withSignal(ctx.signal);
    const agents = this.policy.userAgents;

    try {
      if (agents.length > 0) {
        await ctx.driver.setUserAgent(agents[pacer.between(0, agents.length - 1)]);
      }
      for (let i = 0; i < this.policy.pacing.pointerMoves; i++) {
        await ctx.driver.movePointer(pacer.between(100, 800), pacer.between(100, 600));
      }
    } catch (err) {
      this.rethrowFatal(err, ctx);
      this.log.warn('bot_detection_countermeasure_failed', { error: errorMessage(err) });
    }

    await pacer.pause(pacer.pick(this.policy.pacing.botBackoff));
    this.log.info('bot_detection_mitigated');
    return true;
  }

  private async handleCaptcha(ctx: MitigationContext): Promise<boolean> {
    // No solving capability: wait and hope the challenge clears
    this.log.warn('captcha_wait', { waitMs: this.policy.pacing.captchaWaitMs });
    await this.pacer.withSignal(ctx.signal).pause(this.policy.pacing.captchaWaitMs);
    return true;
  }

  private async handleLogin(ctx: MitigationContext): Promise<boolean> {
    if (!ctx.credentials) {
      this.log.warn('login_required_no_credentials');
      return false;
    }
    if (this.loginAttempts >= this.policy.loginAttemptLimit) {
      this.log.warn('login_attempts_exhausted', { attempts: this.loginAttempts });
      return false;
    }
    this.loginAttempts += 1;

    const { driver, signal, credentials } = ctx;
    const filledUser = await this.loginStep(
      ctx,
      { type: 'fill', description: 'Login: fill username', hints: USERNAME_HINTS },
      (hint) => this.executor.fill(hint, credentials.username, driver, signal),
    );
    const filledPassword =
      filledUser &&
      (await this.loginStep(
        ctx,
        { type: 'fill', description: 'Login: fill password', hints: PASSWORD_HINTS },
        (hint) => this.executor.fill(hint, credentials.password, driver, signal),
      ));
    if (!filledPassword) {
      this.log.warn('login_form_not_found', { filledUser, filledPassword });
      return false;
    }

    const submitted = await this.loginStep(
      ctx,
      { type: 'click', description: 'Login: submit', hints: SUBMIT_HINTS },
      (hint) => this.executor.click(hint, driver, signal),
    );
    this.log.info('login_submitted', { submitted, attempt: this.loginAttempts });
    return submitted;
  }

  /** Try each hint until one lands, then record the landing hint (or the last miss). */
  private async loginStep(
    ctx: MitigationContext,
    step: LoginStep,
    run: (hint: string) => Promise<ActionOutcome>,
  ): Promise<boolean> {
    let selector = '';
    let outcome: ActionOutcome = { succeeded: false };
    for (const hint of step.hints) {
      selector = hint;
      outcome = await run(hint);
      if (outcome.succeeded) break;
    }

    if (ctx.session) {
      const action: NavigationAction = { type: step.type, selector, description: step.description, confidence: 100 };
      const entry = ctx.session.recordAction(action, outcome.succeeded, {
        strategy: outcome.strategy,
        error: outcome.error,
        mitigation: 'login_required',
      });
      ctx.onStep?.(entry);
    }
    return outcome.succeeded;
  }

  private rethrowFatal(err: unknown, ctx: MitigationContext): void {
    if (err instanceof AttemptCancelledError || err instanceof BrowserDisconnectedError) throw err;
    if (ctx.signal?.aborted) throw new AttemptCancelledError();
    if (!ctx.driver.isConnected()) throw new BrowserDisconnectedError();
  }
}
