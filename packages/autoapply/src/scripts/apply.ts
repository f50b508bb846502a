#!/usr/bin/env node
/**
 * Apply to one job URL, or a batch of them, with a local browser.
 *
 * Usage:
 *   npx tsx --env-file=.env packages/autoapply/src/scripts/apply.ts -- --url=<job-url> --profile=<profile.json>
 *   npx tsx --env-file=.env packages/autoapply/src/scripts/apply.ts -- --jobs=<jobs.json> --profile=<profile.json>
 *
 * Flags:
 *   --url=<url>              Job page to apply on
 *   --jobs=<file>            JSON array of {url, title?, company?, location?, description?} (instead of --url)
 *   --profile=<file>         (required) Applicant profile JSON, camelCase or snake_case keys
 *   --credentials=<file>     (optional) JSON object of host → {username, password}
 *
 * With AUTOAPPLY_MIN_COMPATIBILITY and an oracle key set, batch jobs the
 * oracle scores below the minimum are skipped. Ctrl-C cancels the running
 * attempt and closes the browser.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { getEnv } from '../config/env.js';
import { ProfileValidationError, errorMessage } from '../errors.js';
import { getLogger } from '../monitoring/logger.js';
import { loadProfile } from '../profile/profileLoader.js';
import { CompatibilityAssessor } from '../engine/CompatibilityAssessor.js';
import type { ApplicantProfile, SiteCredentials } from '../engine/types.js';
import { createOracle } from '../oracle/anthropic.js';
import { createAttemptRunner } from '../workers/AttemptRunner.js';
import { BatchRunner, JobSpecSchema } from '../workers/BatchRunner.js';

// --- Parse args ---

function parseArg(flag: string): string | null {
  const arg = process.argv.find((a) => a.startsWith(`--${flag}=`));
  if (!arg) return null;
  const value = arg.split('=').slice(1).join('=');
  return value || null;
}

const CredentialsFileSchema = z.record(z.object({ username: z.string(), password: z.string() }));

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'));
}

// --- Main ---

async function main(): Promise<number> {
  const url = parseArg('url');
  const jobsFile = parseArg('jobs');
  const profileFile = parseArg('profile');
  const credentialsFile = parseArg('credentials');

  if (!profileFile || (!url && !jobsFile)) {
    console.error('Usage:');
    console.error('  apply.ts -- --url=<job-url> --profile=<profile.json> [--credentials=<file>]');
    console.error('  apply.ts -- --jobs=<jobs.json> --profile=<profile.json> [--credentials=<file>]');
    return 1;
  }

  const env = getEnv();
  const logger = getLogger();

  let profile: ApplicantProfile;
  try {
    profile = await loadProfile(profileFile);
  } catch (err) {
    if (err instanceof ProfileValidationError) {
      console.error('Profile is invalid:');
      for (const issue of err.issues) console.error(`  - ${issue}`);
    } else {
      console.error(`Failed to read profile: ${errorMessage(err)}`);
    }
    return 1;
  }

  const credentials: Record<string, SiteCredentials> = credentialsFile
    ? CredentialsFileSchema.parse(await readJson(credentialsFile))
    : {};
  const credentialsFor = (host: string): SiteCredentials | undefined =>
    Object.hasOwn(credentials, host) ? credentials[host] : undefined;

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nCancelling...');
    controller.abort();
  });

  const runner = createAttemptRunner({ env, logger });
  runner.events.on('page_classified', (e) => {
    console.log(`[${e.iteration}] ${e.pageType} (confidence ${e.confidence}, ${e.elements} elements)`);
  });
  runner.events.on('obstacle_detected', (e) => console.log(`[${e.iteration}] obstacle: ${e.obstacle}`));
  runner.events.on('action_executed', (entry) => {
    const mark = entry.succeeded ? 'ok' : 'failed';
    console.log(`[${entry.iteration}]   ${entry.action.type} ${entry.action.selector} → ${mark}`);
  });
  runner.events.on('attempt_retry', (e) => console.log(`Attempt ${e.attempt} failed (${e.error}), retrying`));
  runner.events.on('screenshot_captured', (e) => console.log(`Screenshot saved: ${e.path}`));

  if (url) {
    const result = await runner.run({
      url,
      profile,
      credentials: credentialsFor(hostOrEmpty(url)),
      signal: controller.signal,
    });
    console.log(`\n${result.status}: ${result.message}`);
    console.log(`  iterations: ${result.iterations}, steps: ${result.navigationSteps}, attempts: ${result.attempts}`);
    return result.success ? 0 : 2;
  }

  const jobs = z.array(JobSpecSchema).parse(await readJson(jobsFile ?? ''));
  const oracle = env.AUTOAPPLY_MIN_COMPATIBILITY === undefined ? null : createOracle(env);
  const batch = new BatchRunner({
    runner,
    concurrency: env.AUTOAPPLY_CONCURRENCY,
    assessor: oracle ? new CompatibilityAssessor(oracle, { logger }) : undefined,
    minCompatibility: env.AUTOAPPLY_MIN_COMPATIBILITY,
    logger,
  });
  const report = await batch.run(jobs, { profile, credentials: credentialsFor, signal: controller.signal });

  for (const outcome of report.outcomes) {
    const label = outcome.job.title ?? outcome.job.url;
    if (outcome.status === 'skipped') {
      console.log(`  skipped  ${label} (${outcome.reason})`);
    } else {
      console.log(`  ${outcome.result.status.padEnd(8)} ${label}: ${outcome.result.message}`);
    }
  }
  const { stats } = report;
  console.log(
    `\n${stats.submitted}/${stats.total} submitted, ${stats.failed} failed, ${stats.skipped} skipped in ${Math.round(stats.durationMs / 1000)}s`,
  );
  return stats.failed === 0 ? 0 : 2;
}

function hostOrEmpty(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return '';
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error('Fatal:', errorMessage(err));
    process.exit(1);
  },
);
