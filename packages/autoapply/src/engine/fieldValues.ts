import type { ApplicantProfile } from './types.js';

type FieldResolver = (profile: ApplicantProfile) => string | undefined;

function nameTokens(profile: ApplicantProfile): string[] {
  return profile.fullName.trim().split(/\s+/).filter((t) => t.length > 0);
}

/**
 * Symbolic field name → profile value. Keys are matched case-insensitively
 * with spaces and dashes folded to underscores.
 */
const FIELD_RESOLVERS: Record<string, FieldResolver> = {
  name: (p) => p.fullName,
  full_name: (p) => p.fullName,
  first_name: (p) => p.firstName ?? nameTokens(p)[0],
  last_name: (p) => p.lastName ?? nameTokens(p).at(-1),
  email: (p) => p.email,
  phone: (p) => p.phone,
  address: (p) => p.address,
  city: (p) => p.city,
  state: (p) => p.state,
  zip: (p) => p.zipCode,
  zip_code: (p) => p.zipCode,
  country: (p) => p.country,
  linkedin: (p) => p.linkedin,
  website: (p) => p.website,
  cover_letter: (p) => p.coverLetter,
  summary: (p) => p.experienceSummary,
  experience: (p) => p.experienceYears,
  salary: (p) => p.expectedSalary,
  skills: (p) => (p.skills.length > 0 ? p.skills.join(', ') : undefined),
};

function normalizeKey(name: string): string {
  return name.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function isSymbolicField(name: string): boolean {
  return Object.hasOwn(FIELD_RESOLVERS, normalizeKey(name));
}

/**
 * Resolve a fill value against the profile. A known key with no profile
 * value gives ''; an unknown key is returned unchanged, so literals pass through.
 */
export function resolveFieldValue(name: string, profile: ApplicantProfile): string {
  const key = normalizeKey(name);
  if (!Object.hasOwn(FIELD_RESOLVERS, key)) return name;
  return FIELD_RESOLVERS[key](profile) ?? '';
}
