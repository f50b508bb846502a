/**
 * ApplicationLog: one JSON line per finished application attempt.
 *
 * Lines are appended through a single write chain, so concurrent attempts
 * never interleave partial lines. Unreadable lines are skipped on load.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { AttemptResult } from '../engine/types.js';

export const ApplicationLogEntrySchema = z.object({
  recordedAt: z.string(),
  attemptId: z.string(),
  url: z.string(),
  title: z.string().optional(),
  company: z.string().optional(),
  status: z.enum(['success', 'failure', 'obstacle_blocked']),
  success: z.boolean(),
  message: z.string(),
  attempts: z.number().int().nonnegative(),
  iterations: z.number().int().nonnegative(),
  navigationSteps: z.number().int().nonnegative(),
  screenshots: z.array(z.string()).optional(),
});

export type ApplicationLogEntry = z.infer<typeof ApplicationLogEntrySchema>;

export interface ApplicationStats {
  total: number;
  successful: number;
  failed: number;
  /** Percentage of successful entries, 0 when the log is empty */
  successRate: number;
}

export interface ApplicationMeta {
  attemptId: string;
  title?: string;
  company?: string;
}

export interface ApplicationLogOptions {
  /** JSON-lines file to append to; in-memory only when omitted */
  path?: string;
  logger?: Logger;
  now?: () => Date;
}

export function logEntryOf(result: AttemptResult, meta: ApplicationMeta, now: Date = new Date()): ApplicationLogEntry {
  const entry: ApplicationLogEntry = {
    recordedAt: now.toISOString(),
    attemptId: meta.attemptId,
    url: result.url,
    status: result.status,
    success: result.success,
    message: result.message,
    attempts: result.attempts,
    iterations: result.iterations,
    navigationSteps: result.navigationSteps,
  };
  if (meta.title) entry.title = meta.title;
  if (meta.company) entry.company = meta.company;
  if (result.screenshots && result.screenshots.length > 0) entry.screenshots = [...result.screenshots];
  return entry;
}

export class ApplicationLog {
  private entries: ApplicationLogEntry[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private loading: Promise<void> | null = null;
  private path?: string;
  private now: () => Date;
  private log: Logger;

  constructor(options: ApplicationLogOptions = {}) {
    this.path = options.path;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? getLogger()).child({ component: 'ApplicationLog' });
  }

  /** Read earlier entries once; later calls share the first read. record() loads implicitly. */
  load(): Promise<void> {
    this.loading ??= this.readLog();
    return this.loading;
  }

  private async readLog(): Promise<void> {
    if (!this.path) return;
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      this.log.debug('application_log_missing', { path: this.path, error: errorMessage(err) });
      return;
    }

    const loaded: ApplicationLogEntry[] = [];
    let skipped = 0;
    for (const line of text.split('\n')) {
      if (line.trim().length === 0) continue;
      try {
        loaded.push(ApplicationLogEntrySchema.parse(JSON.parse(line)));
      } catch {
        skipped += 1;
      }
    }
    if (skipped > 0) this.log.warn('application_log_lines_skipped', { path: this.path, skipped });
    this.entries = [...loaded, ...this.entries];
  }

  record(result: AttemptResult, meta: ApplicationMeta): Promise<ApplicationLogEntry> {
    const entry = logEntryOf(result, meta, this.now());
    const path = this.path;
    const write = this.writeChain.then(async () => {
      await this.load();
      this.entries.push(entry);
      if (!path) return;
      await mkdir(dirname(path), { recursive: true });
      await appendFile(path, `${JSON.stringify(entry)}\n`, 'utf8');
    });
    // Later appends queue behind this one whether or not its write succeeded
    this.writeChain = write.then(
      () => undefined,
      () => undefined,
    );
    return write.then(() => entry);
  }

  all(): ApplicationLogEntry[] {
    return [...this.entries];
  }

  stats(): ApplicationStats {
    const total = this.entries.length;
    const successful = this.entries.filter((e) => e.success).length;
    return {
      total,
      successful,
      failed: total - successful,
      successRate: total > 0 ? (successful / total) * 100 : 0,
    };
  }
}
