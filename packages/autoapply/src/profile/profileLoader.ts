import { readFile } from 'node:fs/promises';
import { ProfileValidationError, errorMessage } from '../errors.js';
import { ApplicantProfileSchema, type ApplicantProfile } from '../engine/types.js';

const ALIASES: Record<string, string> = {
  name: 'fullName',
  zip: 'zipCode',
  postalCode: 'zipCode',
  linkedinUrl: 'linkedin',
  portfolio: 'website',
  salary: 'expectedSalary',
  resume: 'resumePath',
  summary: 'experienceSummary',
};

function camelCase(key: string): string {
  return key.replace(/[_-]+([a-z0-9])/gi, (_, c: string) => c.toUpperCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Rewrite keys to the canonical camelCase names and scalar values to strings.
 * An explicit canonical key wins over an alias for the same field.
 */
export function normalizeProfileInput(raw: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const aliased: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined || value === '') continue;
    const camel = camelCase(key);
    const canonical = Object.hasOwn(ALIASES, camel) ? ALIASES[camel] : undefined;
    const normalized =
      typeof value === 'number'
        ? String(value)
        : camel === 'skills' && typeof value === 'string'
          ? value
              .split(',')
              .map((s) => s.trim())
              .filter((s) => s.length > 0)
          : value;
    if (canonical) {
      aliased[canonical] = normalized;
    } else {
      out[camel] = normalized;
    }
  }

  for (const [key, value] of Object.entries(aliased)) {
    if (!(key in out)) out[key] = value;
  }

  const first = typeof out.firstName === 'string' ? out.firstName.trim() : '';
  const last = typeof out.lastName === 'string' ? out.lastName.trim() : '';
  if (!out.fullName && (first || last)) {
    out.fullName = [first, last].filter(Boolean).join(' ');
  }
  if (typeof out.fullName === 'string') {
    const parts = out.fullName.trim().split(/\s+/);
    if (!first && parts[0]) out.firstName = parts[0];
    if (!last && parts.length > 1) out.lastName = parts[parts.length - 1];
  }
  return out;
}

export function parseProfile(raw: unknown): ApplicantProfile {
  if (!isRecord(raw)) {
    throw new ProfileValidationError(['profile: expected a JSON object']);
  }
  const result = ApplicantProfileSchema.safeParse(normalizeProfileInput(raw));
  if (!result.success) {
    throw new ProfileValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'profile'}: ${issue.message}`),
    );
  }
  return result.data;
}

export async function loadProfile(path: string): Promise<ApplicantProfile> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ProfileValidationError([`profile: invalid JSON (${errorMessage(err)})`]);
  }
  return parseProfile(raw);
}
