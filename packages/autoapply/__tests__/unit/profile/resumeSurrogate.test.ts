import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  renderResumeText,
  resolveResumeArtifact,
  writeResumeSurrogate,
} from '../../../src/profile/resumeSurrogate.js';
import { profile } from '../../fixtures/testData.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'resume-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('renderResumeText', () => {
  test('contact lines only for a minimal profile', () => {
    expect(renderResumeText(profile())).toBe('Ada Tester\nada@example.test\n');
  });

  test('location, experience and skills sections', () => {
    const text = renderResumeText(
      profile({
        phone: '555-0100',
        city: 'Toronto',
        country: 'Canada',
        experienceYears: '5',
        skills: ['TypeScript', 'Playwright'],
      }),
    );
    expect(text).toBe(
      'Ada Tester\nada@example.test\n555-0100\nToronto, Canada\n\nEXPERIENCE\n5 years\n\nSKILLS\nTypeScript, Playwright\n',
    );
  });
});

describe('writeResumeSurrogate', () => {
  test('writes a named text file in a fresh directory', async () => {
    const path = await writeResumeSurrogate(profile(), dir);

    expect(basename(path)).toBe('ada_tester_resume.txt');
    expect(dirname(path).startsWith(join(dir, 'autoapply-resume-'))).toBe(true);
    expect(await readFile(path, 'utf8')).toBe('Ada Tester\nada@example.test\n');
  });

  test('falls back to a generic slug', async () => {
    const path = await writeResumeSurrogate(profile({ fullName: '!!!' }), dir);
    expect(basename(path)).toBe('applicant_resume.txt');
  });
});

describe('resolveResumeArtifact', () => {
  test('prefers an existing resume', async () => {
    const resumePath = join(dir, 'cv.pdf');
    await writeFile(resumePath, 'pdf');
    expect(await resolveResumeArtifact(profile({ resumePath }), dir)).toEqual({ path: resumePath, synthesized: false });
  });

  test('synthesizes when the configured file is missing', async () => {
    const artifact = await resolveResumeArtifact(profile({ resumePath: join(dir, 'missing.pdf') }), dir);
    expect(artifact.synthesized).toBe(true);
    expect(basename(artifact.path)).toBe('ada_tester_resume.txt');
  });
});
