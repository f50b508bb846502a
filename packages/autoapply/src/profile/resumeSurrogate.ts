import { access, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import type { ApplicantProfile } from '../engine/types.js';

export function renderResumeText(profile: ApplicantProfile): string {
  const lines: string[] = [profile.fullName, profile.email];
  if (profile.phone) lines.push(profile.phone);

  const location = [profile.address, profile.city, profile.state, profile.zipCode, profile.country]
    .filter((part): part is string => Boolean(part))
    .join(', ');
  if (location) lines.push(location);
  if (profile.linkedin) lines.push(profile.linkedin);
  if (profile.website) lines.push(profile.website);

  if (profile.experienceSummary || profile.experienceYears) {
    lines.push('', 'EXPERIENCE');
    if (profile.experienceYears) lines.push(`${profile.experienceYears} years`);
    if (profile.experienceSummary) lines.push(profile.experienceSummary);
  }
  if (profile.skills.length > 0) {
    lines.push('', 'SKILLS', profile.skills.join(', '));
  }
  return `${lines.join('\n')}\n`;
}

/** Write a plain-text resume into a fresh temp directory and return its absolute path. */
export async function writeResumeSurrogate(profile: ApplicantProfile, baseDir: string = tmpdir()): Promise<string> {
  const dir = await mkdtemp(join(baseDir, 'autoapply-resume-'));
  const slug = profile.fullName.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'applicant';
  const path = join(dir, `${slug}_resume.txt`);
  await writeFile(path, renderResumeText(profile), 'utf8');
  return path;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export interface ResumeArtifact {
  path: string;
  synthesized: boolean;
}

/** The configured resume when it exists on disk, otherwise a synthesized surrogate. */
export async function resolveResumeArtifact(profile: ApplicantProfile, baseDir?: string): Promise<ResumeArtifact> {
  if (profile.resumePath) {
    const absolute = resolve(profile.resumePath);
    if (await exists(absolute)) return { path: absolute, synthesized: false };
  }
  return { path: await writeResumeSurrogate(profile, baseDir), synthesized: true };
}
