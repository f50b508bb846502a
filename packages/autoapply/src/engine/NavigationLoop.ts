/**
 * NavigationLoop: the per-attempt state machine.
 *
 *   INIT → ITERATING → SUCCESS | FAILURE | OBSTACLE_BLOCKED
 *
 * Each iteration: fetch markup → extract → classify (+ oracle advice) →
 * gate on page type and blocking obstacles → recommend → execute, with the
 * generic fallback clicks when the step sequence fails. Per-iteration errors
 * are logged and the loop goes on; cancellation and a lost browser propagate.
 */

import type { BrowserDriver } from '../adapters/types.js';
import { DEFAULT_POLICY, type NavigationPolicy } from '../config/policy.js';
import { AttemptCancelledError, BrowserDisconnectedError, errorMessage } from '../errors.js';
import { createAttemptEmitter, type AttemptEmitter } from '../events/AttemptEventTypes.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { ActionExecutor, ExecutionContext } from './ActionExecutor.js';
import type { ActionRecommender } from './ActionRecommender.js';
import { ElementExtractor } from './ElementExtractor.js';
import { HumanPacer } from './HumanPacer.js';
import { ObstacleHandler } from './ObstacleHandler.js';
import { PageClassifier, combineAnalyses } from './PageClassifier.js';
import { SessionState } from './SessionState.js';
import {
  BLOCKING_OBSTACLES,
  type ApplicantProfile,
  type AttemptResult,
  type BlockingObstacle,
  type PageAnalysis,
  type SiteCredentials,
} from './types.js';

export const MAX_ITERATIONS_REASON = 'max iterations exceeded';

export interface NavigationLoopOptions {
  recommender: ActionRecommender;
  executor: ActionExecutor;
  extractor?: ElementExtractor;
  classifier?: PageClassifier;
  policy?: NavigationPolicy;
  pacer?: HumanPacer;
  logger?: Logger;
  events?: AttemptEmitter;
}

export interface LoopRunOptions {
  driver: BrowserDriver;
  profile: ApplicantProfile;
  credentials?: SiteCredentials;
  signal?: AbortSignal;
  /** Caller-owned state, so partial progress survives an escaping error */
  session?: SessionState;
  /** Runs after every non-terminal iteration, e.g. to persist cookies */
  afterIteration?: (session: SessionState) => Promise<void>;
}

type IterationStep = 'continue' | 'done';

export class NavigationLoop {
  readonly events: AttemptEmitter;
  private recommender: ActionRecommender;
  private executor: ActionExecutor;
  private extractor: ElementExtractor;
  private classifier: PageClassifier;
  private policy: NavigationPolicy;
  private pacer: HumanPacer;
  private log: Logger;

  constructor(options: NavigationLoopOptions) {
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.recommender = options.recommender;
    this.executor = options.executor;
    this.log = options.logger ?? getLogger();
    this.extractor = options.extractor ?? new ElementExtractor({ policy: this.policy, logger: this.log });
    this.classifier = options.classifier ?? new PageClassifier({ policy: this.policy, logger: this.log });
    this.pacer = options.pacer ?? new HumanPacer({ policy: this.policy });
    this.events = options.events ?? createAttemptEmitter();
  }

  async run(options: LoopRunOptions): Promise<SessionState> {
    const { driver, signal } = options;
    const session = options.session ?? new SessionState(this.policy.maxIterations);
    const handler = new ObstacleHandler({
      executor: this.executor,
      policy: this.policy,
      pacer: this.pacer,
      logger: this.log,
    });

    while (!session.isTerminal) {
      if (!session.hasIterationsLeft) {
        session.fail(MAX_ITERATIONS_REASON);
        break;
      }
      throwIfCancelled(signal);
      if (!driver.isConnected()) throw new BrowserDisconnectedError();

      const iteration = session.beginIteration();
      const log = this.log.child({ iteration });
      this.events.emit('iteration_started', { iteration });

      try {
        await this.runIteration(iteration, session, handler, options, log);
      } catch (err) {
        rethrowFatal(err, driver, signal);
        log.warn('iteration_failed', { error: errorMessage(err) });
        this.events.emit('iteration_failed', { iteration, error: errorMessage(err) });
      }

      if (session.isTerminal) break;

      try {
        await options.afterIteration?.(session);
        if (session.hasIterationsLeft) {
          await this.pacer.withSignal(signal).betweenIterations();
        }
      } catch (err) {
        rethrowFatal(err, driver, signal);
        log.warn('iteration_teardown_failed', { error: errorMessage(err) });
      }
    }

    return session;
  }

  private async runIteration(
    iteration: number,
    session: SessionState,
    handler: ObstacleHandler,
    options: LoopRunOptions,
    log: Logger,
  ): Promise<void> {
    const { driver, profile, signal } = options;
    const markup = await this.fetchMarkup(driver, log);
    const analysis = await this.analyze(markup, iteration, session, options);

    session.recordPageType(analysis.pageType);
    this.events.emit('page_classified', {
      iteration,
      pageType: analysis.pageType,
      confidence: analysis.confidence,
      obstacles: analysis.obstacles,
      elements: analysis.elements.length,
    });
    log.info('page_classified', {
      pageType: analysis.pageType,
      confidence: analysis.confidence,
      obstacles: analysis.obstacles,
    });

    if (analysis.pageType === 'success_page') {
      session.succeed('application submitted');
      return;
    }
    if (analysis.pageType === 'error_page') {
      session.fail(`error page: ${analysis.obstacles.join(', ') || 'no details'}`);
      return;
    }

    if ((await this.handleObstacles(iteration, analysis, session, handler, options)) === 'done') return;

    const actions = this.recommender.recommend(
      analysis,
      profile,
      iteration,
      session.recentHistory(this.policy.recommender.historyWindow),
    );
    const ctx: ExecutionContext = { profile, signal };

    const result =
      actions.length > 0
        ? await this.executor.executeAll(actions, driver, session, ctx, (entry) =>
            this.events.emit('action_executed', entry),
          )
        : { success: false, stepsCompleted: 0, error: 'no actions recommended' };

    if (!result.success) {
      log.info('step_sequence_failed', { stepsCompleted: result.stepsCompleted, error: result.error });
      const succeeded = await this.executor.tryFallbackActions(driver, session, ctx, (entry) =>
        this.events.emit('action_executed', entry),
      );
      this.events.emit('fallback_actions_used', { iteration, succeeded });
    }
  }

  private async analyze(
    markup: string,
    iteration: number,
    session: SessionState,
    options: LoopRunOptions,
  ): Promise<PageAnalysis> {
    const snippets = this.extractor.extract(markup);
    const heuristic = this.classifier.classify(markup);
    if (!this.recommender.usesOracle) return heuristic;

    const advice = await this.recommender.consult(
      {
        iteration,
        url: await safeUrl(options.driver),
        elements: this.extractor.render(snippets),
        recentHistory: session.recentHistory(this.policy.recommender.historyWindow),
        profile: options.profile,
      },
      options.signal,
    );
    return advice ? combineAnalyses(heuristic, advice) : heuristic;
  }

  /**
   * Mitigate blocking obstacles in fixed order. A failed mitigation blocks the
   * attempt. Wait-style mitigations continue into the action phase; a login
   * submission changes the page, so the iteration ends there.
   */
  private async handleObstacles(
    iteration: number,
    analysis: PageAnalysis,
    session: SessionState,
    handler: ObstacleHandler,
    options: LoopRunOptions,
  ): Promise<IterationStep> {
    const blocking = BLOCKING_OBSTACLES.filter(
      (obstacle) => analysis.obstacles.includes(obstacle) || analysis.pageType === obstacle,
    );

    for (const obstacle of analysis.obstacles) {
      if (!(BLOCKING_OBSTACLES as readonly string[]).includes(obstacle)) {
        session.recordObstacle(obstacle, null);
        this.events.emit('obstacle_detected', { iteration, obstacle });
      }
    }

    for (const obstacle of blocking) {
      this.events.emit('obstacle_detected', { iteration, obstacle });
      const mitigated = await handler.mitigate(obstacle, {
        driver: options.driver,
        credentials: options.credentials,
        signal: options.signal,
        session,
        onStep: (entry) => this.events.emit('action_executed', entry),
      });
      session.recordObstacle(obstacle, mitigated);
      this.events.emit('mitigation_finished', { iteration, obstacle, mitigated });

      if (!mitigated) {
        session.block(blockedReason(obstacle));
        return 'done';
      }
      if (obstacle === 'login_required') return 'done';
    }
    return 'continue';
  }

  private async fetchMarkup(driver: BrowserDriver, log: Logger): Promise<string> {
    try {
      return await driver.getMarkup();
    } catch (err) {
      if (!driver.isConnected()) throw new BrowserDisconnectedError();
      log.warn('markup_fetch_failed', { error: errorMessage(err) });
      return '';
    }
  }
}

// --- Helpers ---

function blockedReason(obstacle: BlockingObstacle): string {
  switch (obstacle) {
    case 'login_required':
      return 'login required and could not be completed';
    case 'captcha':
      return 'captcha could not be cleared';
    case 'bot_detection':
      return 'blocked by bot detection';
  }
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new AttemptCancelledError();
}

function rethrowFatal(err: unknown, driver: BrowserDriver, signal?: AbortSignal): void {
  if (err instanceof AttemptCancelledError || err instanceof BrowserDisconnectedError) throw err;
  if (signal?.aborted) throw new AttemptCancelledError();
  if (!driver.isConnected()) throw new BrowserDisconnectedError();
}

async function safeUrl(driver: BrowserDriver): Promise<string> {
  try {
    return await driver.currentUrl();
  } catch {
    return 'unknown';
  }
}

export interface ResultDetails {
  url: string;
  attempts: number;
  error?: string;
}

/** Snapshot a session into the caller-facing result, terminal or not. */
export function toAttemptResult(session: SessionState, details: ResultDetails): AttemptResult {
  const outcome = session.outcome;
  const base = {
    url: details.url,
    iterations: session.iteration,
    navigationSteps: session.history.length,
    navigationPattern: [...session.history],
    obstacles: [...session.obstacles],
    pageTypes: [...session.pageTypes],
    attempts: details.attempts,
  };

  switch (outcome.status) {
    case 'success':
      return { ...base, success: true, status: 'success', message: outcome.message };
    case 'failure':
      return { ...base, success: false, status: 'failure', message: outcome.reason, error: outcome.reason };
    case 'obstacle_blocked':
      return { ...base, success: false, status: 'obstacle_blocked', message: outcome.reason, error: outcome.reason };
    case 'in_progress': {
      const error = details.error ?? 'attempt ended before a terminal outcome';
      return { ...base, success: false, status: 'failure', message: error, error };
    }
  }
}
