import { z } from 'zod';
import { DEFAULT_POLICY, type NavigationPolicy } from '../config/policy.js';
import { errorMessage } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { CompatibilityAssessment, CompatibilityAssessor } from '../engine/CompatibilityAssessor.js';
import { HumanPacer } from '../engine/HumanPacer.js';
import type { ApplicantProfile, AttemptResult, SiteCredentials } from '../engine/types.js';
import type { AttemptRunner } from './AttemptRunner.js';

export const JobSpecSchema = z.object({
  url: z.string(),
  title: z.string().optional(),
  company: z.string().optional(),
  location: z.string().optional(),
  description: z.string().optional(),
});

export type JobSpec = z.infer<typeof JobSpecSchema>;

export interface RunStats {
  total: number;
  submitted: number;
  failed: number;
  skipped: number;
  durationMs: number;
}

export type JobOutcome =
  | { job: JobSpec; status: 'completed'; result: AttemptResult; compatibility?: CompatibilityAssessment }
  | { job: JobSpec; status: 'skipped'; reason: string; compatibility?: CompatibilityAssessment };

export interface BatchReport {
  stats: RunStats;
  outcomes: JobOutcome[];
}

export interface BatchRunOptions {
  profile: ApplicantProfile;
  /** Looked up per job host */
  credentials?: (host: string) => SiteCredentials | undefined;
  signal?: AbortSignal;
}

export interface BatchRunnerOptions {
  runner: AttemptRunner;
  concurrency?: number;
  /** Scores each job before its attempt; required for minCompatibility to apply */
  assessor?: CompatibilityAssessor;
  /** Jobs scored below this are skipped; a fallback score never skips */
  minCompatibility?: number;
  policy?: NavigationPolicy;
  pacer?: HumanPacer;
  logger?: Logger;
  now?: () => number;
}

export function isApplicableUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Runs many jobs over a bounded pool. Every job gets its own attempt (own
 * browser, own session); only the read-only profile is shared. Outcomes keep
 * input order regardless of completion order. With an assessor, each job is
 * scored first and poor matches are skipped without opening a browser.
 */
export class BatchRunner {
  private runner: AttemptRunner;
  private concurrency: number;
  private assessor?: CompatibilityAssessor;
  private minCompatibility?: number;
  private pacer: HumanPacer;
  private log: Logger;
  private now: () => number;

  constructor(options: BatchRunnerOptions) {
    const policy = options.policy ?? DEFAULT_POLICY;
    this.runner = options.runner;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.assessor = options.assessor;
    this.minCompatibility = options.minCompatibility;
    this.pacer = options.pacer ?? new HumanPacer({ policy });
    this.log = (options.logger ?? getLogger()).child({ component: 'BatchRunner' });
    this.now = options.now ?? Date.now;
  }

  async run(jobs: JobSpec[], options: BatchRunOptions): Promise<BatchReport> {
    const startedAt = this.now();
    const outcomes: (JobOutcome | undefined)[] = new Array(jobs.length);
    const queue: number[] = [];

    jobs.forEach((job, index) => {
      if (isApplicableUrl(job.url)) {
        queue.push(index);
      } else {
        this.log.warn('job_skipped_invalid_url', { url: job.url });
        outcomes[index] = { job, status: 'skipped', reason: 'invalid url' };
      }
    });

    const pacer = this.pacer.withSignal(options.signal);
    const worker = async (): Promise<void> => {
      let first = true;
      for (let index = queue.shift(); index !== undefined; index = queue.shift()) {
        const job = jobs[index];
        if (!first) {
          try {
            await pacer.betweenApplications();
          } catch (err) {
            if (!options.signal?.aborted) throw err;
          }
        }
        first = false;
        if (options.signal?.aborted) {
          outcomes[index] = { job, status: 'skipped', reason: 'cancelled' };
          continue;
        }

        const compatibility = await this.assessor?.assess(job, options.profile, options.signal);
        if (compatibility) {
          const reason = this.skipReason(compatibility);
          if (reason) {
            this.log.info('job_skipped_low_compatibility', { url: job.url, score: compatibility.score });
            outcomes[index] = { job, status: 'skipped', reason, compatibility };
            continue;
          }
          if (options.signal?.aborted) {
            outcomes[index] = { job, status: 'skipped', reason: 'cancelled', compatibility };
            continue;
          }
        }

        this.log.info('job_started', { url: job.url, title: job.title, company: job.company });
        const result = await this.runner.run({
          url: job.url,
          profile: options.profile,
          credentials: options.credentials?.(new URL(job.url).hostname),
          signal: options.signal,
          title: job.title,
          company: job.company,
        });
        outcomes[index] = compatibility
          ? { job, status: 'completed', result, compatibility }
          : { job, status: 'completed', result };
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, queue.length) }, () => worker());
    const settled = await Promise.allSettled(workers);
    for (const s of settled) {
      if (s.status === 'rejected') {
        this.log.error('batch_worker_failed', { error: errorMessage(s.reason) });
      }
    }

    const finalOutcomes = outcomes.map(
      (outcome, index): JobOutcome => outcome ?? { job: jobs[index], status: 'skipped', reason: 'not run' },
    );
    const stats: RunStats = {
      total: jobs.length,
      submitted: finalOutcomes.filter((o) => o.status === 'completed' && o.result.success).length,
      failed: finalOutcomes.filter((o) => o.status === 'completed' && !o.result.success).length,
      skipped: finalOutcomes.filter((o) => o.status === 'skipped').length,
      durationMs: this.now() - startedAt,
    };
    this.log.info('batch_finished', { ...stats });
    return { stats, outcomes: finalOutcomes };
  }

  private skipReason(compatibility: CompatibilityAssessment): string | null {
    const min = this.minCompatibility;
    if (min === undefined || compatibility.fallback || compatibility.score >= min) return null;
    return `low compatibility (${compatibility.score} < ${min})`;
  }
}
