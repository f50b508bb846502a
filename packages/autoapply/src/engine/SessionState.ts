import { SessionStateError } from '../errors.js';
import type {
  AttemptOutcome,
  BlockingObstacle,
  HistoryEntry,
  NavigationAction,
  ObstacleEncounter,
  ObstacleKind,
  PageType,
} from './types.js';

export interface RecordOptions {
  strategy?: string;
  error?: string;
  fallback?: boolean;
  mitigation?: BlockingObstacle;
}

/**
 * Mutable state of one attempt. The iteration counter only moves forward and
 * never past maxIterations; history and obstacle encounters are append-only;
 * the outcome leaves in_progress exactly once.
 */
export class SessionState {
  readonly maxIterations: number;
  private _iteration = 0;
  private _history: HistoryEntry[] = [];
  private _obstacles: ObstacleEncounter[] = [];
  private _pageTypes: PageType[] = [];
  private _outcome: AttemptOutcome = { status: 'in_progress' };

  constructor(maxIterations: number) {
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new SessionStateError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }
    this.maxIterations = maxIterations;
  }

  get iteration(): number {
    return this._iteration;
  }

  get history(): readonly HistoryEntry[] {
    return this._history;
  }

  get obstacles(): readonly ObstacleEncounter[] {
    return this._obstacles;
  }

  get pageTypes(): readonly PageType[] {
    return this._pageTypes;
  }

  get outcome(): AttemptOutcome {
    return this._outcome;
  }

  get isTerminal(): boolean {
    return this._outcome.status !== 'in_progress';
  }

  get hasIterationsLeft(): boolean {
    return this._iteration < this.maxIterations;
  }

  /** Advance to the next iteration and return its 1-based number. */
  beginIteration(): number {
    if (this.isTerminal) {
      throw new SessionStateError(`attempt already finished (${this._outcome.status})`);
    }
    if (!this.hasIterationsLeft) {
      throw new SessionStateError(`iteration cap of ${this.maxIterations} reached`);
    }
    this._iteration += 1;
    return this._iteration;
  }

  recordAction(action: NavigationAction, succeeded: boolean, options: RecordOptions = {}): HistoryEntry {
    const entry: HistoryEntry = {
      iteration: this._iteration,
      action,
      succeeded,
      fallback: options.fallback ?? false,
      timestamp: new Date().toISOString(),
    };
    if (options.strategy) entry.strategy = options.strategy;
    if (options.error) entry.error = options.error;
    if (options.mitigation) entry.mitigation = options.mitigation;
    this._history.push(entry);
    return entry;
  }

  recordObstacle(obstacle: ObstacleKind, mitigated: boolean | null): void {
    this._obstacles.push({
      iteration: this._iteration,
      obstacle,
      mitigated,
      timestamp: new Date().toISOString(),
    });
  }

  recordPageType(pageType: PageType): void {
    this._pageTypes.push(pageType);
  }

  /** Trailing window of history for oracle context. */
  recentHistory(count: number): HistoryEntry[] {
    return count > 0 ? this._history.slice(-count) : [];
  }

  succeed(message: string): void {
    this.finish({ status: 'success', message });
  }

  fail(reason: string): void {
    this.finish({ status: 'failure', reason });
  }

  block(reason: string): void {
    this.finish({ status: 'obstacle_blocked', reason });
  }

  private finish(outcome: Exclude<AttemptOutcome, { status: 'in_progress' }>): void {
    if (this.isTerminal) {
      throw new SessionStateError(`outcome already set to ${this._outcome.status}`);
    }
    this._outcome = outcome;
  }
}
