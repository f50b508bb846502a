/**
 * Cookie Persistence
 *
 * Per-domain cookie files so a later attempt can reuse a logged-in session.
 * Files hold a JSON array of DriverCookie objects named after the host
 * (`boards.example.com` → `boards_example_com.json`). Exports from browser
 * extensions (`expirationDate`, lowercase `sameSite`) are accepted on load.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { BrowserDriver, DriverCookie, SameSite } from '../adapters/types.js';
import { errorMessage } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';

// ── Types ──────────────────────────────────────────────────────────────────

const RawCookieSchema = z
  .object({
    name: z.string().default(''),
    value: z.string().default(''),
    domain: z.string().default(''),
    path: z.string().default('/'),
    secure: z.boolean().default(false),
    httpOnly: z.boolean().default(false),
    expiry: z.number().optional(),
    expirationDate: z.number().optional(),
    sameSite: z.string().nullable().optional(),
  })
  .passthrough();

export type RawCookie = z.input<typeof RawCookieSchema>;

const SAME_SITE: Record<string, SameSite> = { strict: 'Strict', lax: 'Lax', none: 'None' };

export interface CookieStoreOptions {
  dir: string;
  logger?: Logger;
}

// ── Conversion ─────────────────────────────────────────────────────────────

/**
 * Normalise one stored or extension-exported cookie. Returns null for entries
 * that are malformed or lack a name or value.
 */
export function convertCookie(raw: unknown): DriverCookie | null {
  const parsed = RawCookieSchema.safeParse(raw);
  if (!parsed.success) return null;
  const c = parsed.data;
  if (!c.name || !c.value) return null;

  const cookie: DriverCookie = {
    name: c.name,
    value: c.value,
    domain: c.domain,
    path: c.path,
    secure: c.secure,
    httpOnly: c.httpOnly,
  };
  const expiry = c.expiry ?? c.expirationDate;
  if (expiry !== undefined && expiry > 0) cookie.expiry = Math.trunc(expiry);
  const sameSite = c.sameSite ? SAME_SITE[c.sameSite.toLowerCase()] : undefined;
  if (sameSite) cookie.sameSite = sameSite;
  return cookie;
}

/** Loose match in both directions, so `.example.com` covers `jobs.example.com` and vice versa. */
export function cookieMatchesHost(cookieDomain: string, host: string): boolean {
  const domain = cookieDomain.replace(/^\./, '').toLowerCase();
  const target = host.toLowerCase();
  if (!domain) return false;
  return target.includes(domain) || domain.includes(target);
}

export function cookieFileName(host: string): string {
  return `${host.toLowerCase().replace(/\./g, '_')}.json`;
}

export function hostOf(url: string): string {
  return new URL(url).hostname;
}

// ── Implementation ─────────────────────────────────────────────────────────

export class CookieStore {
  readonly dir: string;
  private log: Logger;

  constructor(options: CookieStoreOptions) {
    this.dir = options.dir;
    this.log = (options.logger ?? getLogger()).child({ component: 'CookieStore' });
  }

  pathFor(host: string): string {
    return join(this.dir, cookieFileName(host));
  }

  /** Stored cookies for a host that pass conversion and the domain filter. */
  async load(host: string): Promise<DriverCookie[]> {
    let text: string;
    try {
      text = await readFile(this.pathFor(host), 'utf8');
    } catch (err) {
      this.log.debug('cookie_file_missing', { host, error: errorMessage(err) });
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      this.log.warn('cookie_file_invalid', { host, error: errorMessage(err) });
      return [];
    }
    if (!Array.isArray(raw)) {
      this.log.warn('cookie_file_invalid', { host, error: 'expected a JSON array' });
      return [];
    }

    const cookies: DriverCookie[] = [];
    let skipped = 0;
    for (const entry of raw) {
      const cookie = convertCookie(entry);
      if (cookie && cookieMatchesHost(cookie.domain, host)) {
        cookies.push(cookie);
      } else {
        skipped++;
      }
    }
    this.log.debug('cookies_loaded', { host, loaded: cookies.length, skipped });
    return cookies;
  }

  async save(host: string, cookies: DriverCookie[]): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathFor(host), JSON.stringify(cookies, null, 2), 'utf8');
  }

  /** Load stored cookies into the browser. Returns how many were applied. */
  async restore(driver: BrowserDriver, host: string): Promise<number> {
    const cookies = await this.load(host);
    if (cookies.length === 0) return 0;
    try {
      await driver.setCookies(cookies);
      return cookies.length;
    } catch (err) {
      if (!driver.isConnected()) throw err;
      this.log.warn('cookie_restore_failed', { host, error: errorMessage(err) });
      return 0;
    }
  }

  /** Write the browser's current cookies to disk. Returns how many were saved. */
  async persist(driver: BrowserDriver, host: string): Promise<number> {
    try {
      const cookies = await driver.getCookies();
      await this.save(host, cookies);
      return cookies.length;
    } catch (err) {
      if (!driver.isConnected()) throw err;
      this.log.warn('cookie_save_failed', { host, error: errorMessage(err) });
      return 0;
    }
  }
}
