import { describe, expect, test, vi } from 'vitest';
import {
  CompatibilityAssessor,
  NEUTRAL_ASSESSMENT,
  buildCompatibilityPrompt,
  parseAssessment,
  type JobPosting,
} from '../../../src/engine/CompatibilityAssessor.js';
import type { ReasoningOracle } from '../../../src/oracle/types.js';
import { captureLogger, profile, silentLogger } from '../../fixtures/testData.js';

function stubOracle(reply: string | Error) {
  const call = vi.fn(async (_prompt: string, _signal?: AbortSignal): Promise<string> => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  return { name: 'stub', call } satisfies ReasoningOracle;
}

const job: JobPosting = {
  url: 'https://jobs.example.test/posting/1',
  title: 'Backend Engineer',
  company: 'Example Co',
};

const applicant = profile({ experienceYears: '5', skills: ['TypeScript', 'Postgres'] });

describe('buildCompatibilityPrompt', () => {
  test('lists the posting and the candidate', () => {
    const prompt = buildCompatibilityPrompt(job, applicant);

    expect(prompt).toContain(
      'JOB POSTING:\nTitle: Backend Engineer\nCompany: Example Co\nLocation: N/A\nURL: https://jobs.example.test/posting/1\n\nCANDIDATE:',
    );
    expect(prompt).toContain('CANDIDATE:\nName: Ada Tester\nExperience: 5 years\nSkills: TypeScript, Postgres\n');
  });

  test('caps the description', () => {
    const prompt = buildCompatibilityPrompt({ ...job, description: 'd'.repeat(5000) }, profile());

    expect(prompt).toContain(`Description:\n${'d'.repeat(2000)}\n\nCANDIDATE:`);
    expect(prompt).toContain('Skills: none listed');
  });
});

describe('parseAssessment', () => {
  test('maps the reply fields', () => {
    const result = parseAssessment(
      'Here you go: {"relevance_score": 82, "match_reasons": ["TypeScript"], "concerns": [], ' +
        '"suggested_skills_to_highlight": ["Postgres"], "application_strategy": "Lead with backend work"}',
    );

    expect(result).toEqual({
      ok: true,
      assessment: {
        score: 82,
        matchReasons: ['TypeScript'],
        concerns: [],
        skillsToHighlight: ['Postgres'],
        strategy: 'Lead with backend work',
        fallback: false,
      },
    });
  });

  test('a score is required and bounded', () => {
    expect(parseAssessment('{"match_reasons": []}').ok).toBe(false);
    expect(parseAssessment('{"relevance_score": 140}')).toMatchObject({ ok: false });
    expect(parseAssessment('no json')).toEqual({ ok: false, error: 'no JSON object in response' });
  });
});

describe('CompatibilityAssessor', () => {
  test('returns the parsed assessment', async () => {
    const oracle = stubOracle('{"relevance_score": 30, "concerns": ["No Go experience"]}');
    const assessment = await new CompatibilityAssessor(oracle, { logger: silentLogger }).assess(job, applicant);

    expect(assessment).toEqual({
      score: 30,
      matchReasons: [],
      concerns: ['No Go experience'],
      skillsToHighlight: [],
      strategy: '',
      fallback: false,
    });
    expect(oracle.call).toHaveBeenCalledWith(buildCompatibilityPrompt(job, applicant), undefined);
  });

  test('an unusable reply becomes the neutral assessment', async () => {
    const { logger, lines } = captureLogger();
    const assessment = await new CompatibilityAssessor(stubOracle('{"relevance_score": "high"}'), { logger }).assess(
      job,
      applicant,
    );

    expect(assessment).toMatchObject({ score: 50, fallback: true, strategy: 'Standard application approach' });
    expect(assessment.error).toContain('relevance_score');
    expect(lines.map((l) => l.entry.msg)).toContain('compatibility_response_unparseable');
  });

  test('a failed call becomes the neutral assessment with the error', async () => {
    const assessor = new CompatibilityAssessor(stubOracle(new Error('timeout')), { logger: silentLogger });
    const assessment = await assessor.assess(job, applicant);

    expect(assessment).toEqual({ ...NEUTRAL_ASSESSMENT, error: 'timeout' });
    assessment.concerns.push('mutated');
    expect(NEUTRAL_ASSESSMENT.concerns).toEqual(['Unable to perform detailed analysis']);
  });
});
