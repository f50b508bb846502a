/**
 * PatternStore: per-domain log of attempt fingerprints.
 *
 * Append-only. Appends for the same domain are serialised through a promise
 * chain per key, and file writes through one chain for the whole store, so
 * concurrent attempts never interleave a read-modify-write. Nothing reads the
 * fingerprints back into recommendations; they are telemetry.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { ActionTypeSchema, PageTypeSchema, type AttemptResult } from '../engine/types.js';

export const PatternFingerprintSchema = z.object({
  outcome: z.enum(['success', 'failure', 'obstacle_blocked']),
  pageTypes: z.array(PageTypeSchema),
  actions: z.array(
    z.object({
      type: ActionTypeSchema,
      selector: z.string(),
      succeeded: z.boolean(),
    }),
  ),
  error: z.string().optional(),
  recordedAt: z.string(),
});

export type PatternFingerprint = z.infer<typeof PatternFingerprintSchema>;

const StoreFileSchema = z.record(z.array(PatternFingerprintSchema));

export interface PatternStoreOptions {
  /** JSON file to persist to; in-memory only when omitted */
  path?: string;
  logger?: Logger;
  now?: () => Date;
}

export function fingerprintOf(result: AttemptResult, now: Date = new Date()): PatternFingerprint {
  const fingerprint: PatternFingerprint = {
    outcome: result.status,
    pageTypes: [...result.pageTypes],
    actions: result.navigationPattern.map((entry) => ({
      type: entry.action.type,
      selector: entry.action.selector,
      succeeded: entry.succeeded,
    })),
    recordedAt: now.toISOString(),
  };
  if (result.error) fingerprint.error = result.error;
  return fingerprint;
}

export class PatternStore {
  private patterns = new Map<string, PatternFingerprint[]>();
  private chains = new Map<string, Promise<void>>();
  private writeChain: Promise<void> = Promise.resolve();
  private loading: Promise<void> | null = null;
  private path?: string;
  private now: () => Date;
  private log: Logger;

  constructor(options: PatternStoreOptions = {}) {
    this.path = options.path;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? getLogger()).child({ component: 'PatternStore' });
  }

  /**
   * Read a previously persisted store once; later calls share the first read.
   * A missing or invalid file leaves the store empty. record() loads implicitly.
   */
  load(): Promise<void> {
    this.loading ??= this.readStore();
    return this.loading;
  }

  private async readStore(): Promise<void> {
    if (!this.path) return;
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      this.log.debug('pattern_store_missing', { path: this.path, error: errorMessage(err) });
      return;
    }
    try {
      const parsed = StoreFileSchema.parse(JSON.parse(text));
      for (const [domain, entries] of Object.entries(parsed)) {
        this.patterns.set(domain, [...(this.patterns.get(domain) ?? []), ...entries]);
      }
    } catch (err) {
      this.log.warn('pattern_store_invalid', { path: this.path, error: errorMessage(err) });
    }
  }

  /** Append the fingerprint of a finished attempt under its domain. */
  record(domain: string, result: AttemptResult): Promise<PatternFingerprint> {
    const fingerprint = fingerprintOf(result, this.now());
    const previous = this.chains.get(domain) ?? Promise.resolve();
    const next = previous.then(async () => {
      await this.load();
      this.patterns.set(domain, [...(this.patterns.get(domain) ?? []), fingerprint]);
      await this.flush();
    });
    // Later appends queue behind this one whether or not its write succeeded
    this.chains.set(
      domain,
      next.then(
        () => undefined,
        () => undefined,
      ),
    );
    return next.then(() => fingerprint);
  }

  successes(domain: string): PatternFingerprint[] {
    return this.entries(domain).filter((p) => p.outcome === 'success');
  }

  failures(domain: string): PatternFingerprint[] {
    return this.entries(domain).filter((p) => p.outcome !== 'success');
  }

  entries(domain: string): PatternFingerprint[] {
    return [...(this.patterns.get(domain) ?? [])];
  }

  domains(): string[] {
    return [...this.patterns.keys()];
  }

  toJSON(): Record<string, PatternFingerprint[]> {
    return Object.fromEntries(this.patterns);
  }

  private flush(): Promise<void> {
    const path = this.path;
    if (!path) return Promise.resolve();
    const write = this.writeChain.then(async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, JSON.stringify(this.toJSON(), null, 2), 'utf8');
    });
    this.writeChain = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }
}
