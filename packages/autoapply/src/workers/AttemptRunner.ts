/**
 * AttemptRunner: one application attempt end to end.
 *
 * Each try gets a fresh browser and a fresh SessionState:
 *   create driver → navigate → restore cookies → navigation loop →
 *   save cookies → release driver
 * The driver is released on every exit path. Exceptions that escape the loop
 * (lost browser, navigation failure) are retried up to maxAttempts;
 * cancellation never is. Terminal loop outcomes are final: once the loop has
 * settled the outcome, a failing cookie save is logged and the result stands.
 * A try that ends without success leaves a screenshot when a directory is set.
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { createDriver } from '../adapters/index.js';
import type { BrowserDriver } from '../adapters/types.js';
import type { Env } from '../config/env.js';
import { DEFAULT_POLICY, policyFromEnv, type NavigationPolicy, type PolicyOverrides } from '../config/policy.js';
import { AttemptCancelledError, errorMessage } from '../errors.js';
import type { AttemptEmitter } from '../events/AttemptEventTypes.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { ActionExecutor } from '../engine/ActionExecutor.js';
import { ActionRecommender } from '../engine/ActionRecommender.js';
import { HumanPacer } from '../engine/HumanPacer.js';
import { NavigationLoop, toAttemptResult } from '../engine/NavigationLoop.js';
import { OracleAdvisor } from '../engine/OracleAdvisor.js';
import { SessionState } from '../engine/SessionState.js';
import type { ApplicantProfile, AttemptResult, SiteCredentials } from '../engine/types.js';
import { createOracle } from '../oracle/anthropic.js';
import { ApplicationLog } from '../sessions/ApplicationLog.js';
import { CookieStore, hostOf } from '../sessions/CookieStore.js';
import { PatternStore } from '../sessions/PatternStore.js';

export const CANCELLED_MESSAGE = 'cancelled';

export type DriverFactory = () => Promise<BrowserDriver>;

export interface AttemptRequest {
  url: string;
  profile: ApplicantProfile;
  credentials?: SiteCredentials;
  signal?: AbortSignal;
  attemptId?: string;
  /** Carried into the application log */
  title?: string;
  company?: string;
}

export interface AttemptRunnerOptions {
  driverFactory: DriverFactory;
  loop: NavigationLoop;
  cookies?: CookieStore;
  patterns?: PatternStore;
  applications?: ApplicationLog;
  /** Failure screenshots go here; none are taken when omitted */
  screenshotDir?: string;
  policy?: NavigationPolicy;
  pacer?: HumanPacer;
  logger?: Logger;
}

/** Try-scoped details handed to runOnce */
interface TryContext {
  attemptId: string;
  host: string;
  attempt: number;
  session: SessionState;
  screenshots: string[];
  log: Logger;
}

export function screenshotPath(dir: string, host: string, attemptId: string, attempt: number): string {
  const safe = (value: string) => value.replace(/[^\w.-]/g, '_').slice(0, 100);
  return join(dir, `${safe(host)}-${safe(attemptId)}-${attempt}.png`);
}

export class AttemptRunner {
  private driverFactory: DriverFactory;
  private loop: NavigationLoop;
  private cookies?: CookieStore;
  private patterns?: PatternStore;
  private applications?: ApplicationLog;
  private screenshotDir?: string;
  private policy: NavigationPolicy;
  private pacer: HumanPacer;
  private log: Logger;

  constructor(options: AttemptRunnerOptions) {
    this.driverFactory = options.driverFactory;
    this.loop = options.loop;
    this.cookies = options.cookies;
    this.patterns = options.patterns;
    this.applications = options.applications;
    this.screenshotDir = options.screenshotDir;
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.pacer = options.pacer ?? new HumanPacer({ policy: this.policy });
    this.log = options.logger ?? getLogger();
  }

  get events(): AttemptEmitter {
    return this.loop.events;
  }

  async run(request: AttemptRequest): Promise<AttemptResult> {
    const attemptId = request.attemptId ?? randomUUID();
    const log = this.log.child({ attemptId, url: request.url });

    let host: string;
    try {
      host = hostOf(request.url);
    } catch (err) {
      log.warn('invalid_url', { error: errorMessage(err) });
      const result = toAttemptResult(new SessionState(1), {
        url: request.url,
        attempts: 0,
        error: `invalid url: ${request.url}`,
      });
      this.events.emit('attempt_finished', { attemptId, result });
      return result;
    }

    const screenshots: string[] = [];
    const finish = (result: AttemptResult) =>
      this.finish(request, attemptId, host, screenshots.length > 0 ? { ...result, screenshots } : result, log);

    for (let attempt = 1; ; attempt++) {
      const session = new SessionState(this.policy.maxIterations);
      this.events.emit('attempt_started', { attemptId, url: request.url, attempt });
      log.info('attempt_started', { attempt, maxAttempts: this.policy.maxAttempts });

      let result: AttemptResult | undefined;
      let failure: unknown;
      try {
        result = await this.runOnce(request, { attemptId, host, attempt, session, screenshots, log });
      } catch (err) {
        failure = err;
      }
      if (result) return finish(result);

      const details = { url: request.url, attempts: attempt };
      if (isCancellation(failure, request.signal)) {
        log.info('attempt_cancelled', { attempt });
        return finish(toAttemptResult(session, { ...details, error: CANCELLED_MESSAGE }));
      }
      if (attempt >= this.policy.maxAttempts) {
        log.error('attempt_failed', { attempt, error: errorMessage(failure) });
        return finish(toAttemptResult(session, { ...details, error: errorMessage(failure) }));
      }

      log.warn('attempt_retry', { attempt, error: errorMessage(failure) });
      this.events.emit('attempt_retry', { attemptId, attempt, error: errorMessage(failure) });
      try {
        await this.pacer.withSignal(request.signal).betweenAttempts();
      } catch (err) {
        if (!isCancellation(err, request.signal)) throw err;
        return finish(toAttemptResult(session, { ...details, error: CANCELLED_MESSAGE }));
      }
    }
  }

  private async runOnce(request: AttemptRequest, tryCtx: TryContext): Promise<AttemptResult> {
    const { host, attempt, session, log } = tryCtx;
    if (request.signal?.aborted) throw new AttemptCancelledError();
    const driver = await this.driverFactory();
    try {
      await driver.navigate(request.url);

      if (this.cookies) {
        const restored = await this.cookies.restore(driver, host);
        if (restored > 0) {
          this.events.emit('cookies_restored', { domain: host, count: restored });
          log.info('cookies_restored', { count: restored });
        }
      }

      await this.loop.run({
        driver,
        profile: request.profile,
        credentials: request.credentials,
        signal: request.signal,
        session,
        afterIteration: () => this.saveCookies(driver, host),
      });
      if (session.isTerminal) {
        try {
          await this.saveCookies(driver, host);
        } catch (err) {
          log.warn('cookie_save_failed', { host, error: errorMessage(err) });
        }
      } else {
        await this.saveCookies(driver, host);
      }

      const result = toAttemptResult(session, { url: request.url, attempts: attempt });
      if (!result.success) await this.captureFailure(driver, request, tryCtx);
      return result;
    } catch (err) {
      await this.captureFailure(driver, request, tryCtx);
      throw err;
    } finally {
      await this.release(driver, log);
    }
  }

  /** Best effort: a lost browser or a failing capture only logs. */
  private async captureFailure(driver: BrowserDriver, request: AttemptRequest, tryCtx: TryContext): Promise<void> {
    if (!this.screenshotDir || request.signal?.aborted || !driver.isConnected()) return;
    const { attemptId, host, attempt, screenshots, log } = tryCtx;
    const path = screenshotPath(this.screenshotDir, host, attemptId, attempt);
    try {
      await driver.screenshot(path);
    } catch (err) {
      log.warn('screenshot_failed', { path, error: errorMessage(err) });
      return;
    }
    screenshots.push(path);
    this.events.emit('screenshot_captured', { attemptId, attempt, path });
    log.info('screenshot_captured', { attempt, path });
  }

  private async saveCookies(driver: BrowserDriver, host: string): Promise<void> {
    if (!this.cookies) return;
    const count = await this.cookies.persist(driver, host);
    this.events.emit('cookies_saved', { domain: host, count });
  }

  private async release(driver: BrowserDriver, log: Logger): Promise<void> {
    try {
      await driver.quit();
    } catch (err) {
      log.warn('driver_quit_failed', { error: errorMessage(err) });
    }
  }

  private async finish(
    request: AttemptRequest,
    attemptId: string,
    host: string,
    result: AttemptResult,
    log: Logger,
  ): Promise<AttemptResult> {
    if (this.patterns) {
      try {
        await this.patterns.record(host, result);
      } catch (err) {
        log.warn('pattern_record_failed', { error: errorMessage(err) });
      }
    }
    if (this.applications) {
      try {
        await this.applications.record(result, { attemptId, title: request.title, company: request.company });
      } catch (err) {
        log.warn('application_log_failed', { error: errorMessage(err) });
      }
    }
    log.info('attempt_finished', {
      status: result.status,
      message: result.message,
      iterations: result.iterations,
      navigationSteps: result.navigationSteps,
      attempts: result.attempts,
    });
    this.events.emit('attempt_finished', { attemptId, result });
    return result;
  }
}

function isCancellation(err: unknown, signal?: AbortSignal): boolean {
  return err instanceof AttemptCancelledError || signal?.aborted === true;
}

// ── Wiring ──────────────────────────────────────────────────────────────

export interface CreateAttemptRunnerOptions {
  env: Env;
  policy?: PolicyOverrides;
  driverFactory?: DriverFactory;
  logger?: Logger;
}

/** Assemble a runner from environment configuration: oracle, recommender mode, stores, browser. */
export function createAttemptRunner(options: CreateAttemptRunnerOptions): AttemptRunner {
  const { env } = options;
  const log = options.logger ?? getLogger();
  const policy = policyFromEnv(env, options.policy);
  const pacer = new HumanPacer({ policy });

  const oracle = createOracle(env);
  const recommender = new ActionRecommender({
    mode: env.AUTOAPPLY_RECOMMENDER,
    advisor: oracle ? new OracleAdvisor(oracle, { logger: log }) : null,
    policy,
    logger: log,
  });
  if (!oracle && env.AUTOAPPLY_RECOMMENDER !== 'heuristic') {
    log.warn('oracle_unconfigured', { requestedMode: env.AUTOAPPLY_RECOMMENDER, mode: recommender.mode });
  }

  const executor = new ActionExecutor({ policy, pacer, logger: log });
  const loop = new NavigationLoop({ recommender, executor, policy, pacer, logger: log });

  return new AttemptRunner({
    driverFactory: options.driverFactory ?? (() => createDriver('playwright', { env })),
    loop,
    cookies: new CookieStore({ dir: env.AUTOAPPLY_COOKIE_DIR, logger: log }),
    patterns: new PatternStore({ path: env.AUTOAPPLY_PATTERN_STORE, logger: log }),
    applications: new ApplicationLog({ path: env.AUTOAPPLY_ATTEMPT_LOG, logger: log }),
    screenshotDir: env.AUTOAPPLY_SCREENSHOT_DIR,
    policy,
    pacer,
    logger: log,
  });
}
