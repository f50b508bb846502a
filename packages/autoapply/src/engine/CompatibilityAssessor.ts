/**
 * CompatibilityAssessor: asks the reasoning oracle how well a job posting
 * fits the applicant, before any browser is opened.
 *
 * Same parse-or-fallback contract as OracleAdvisor: a reply that does not
 * yield one schema-valid JSON object becomes NEUTRAL_ASSESSMENT.
 */

import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { ReasoningOracle } from '../oracle/types.js';
import { truncate } from './markup.js';
import { extractJsonObject } from './OracleAdvisor.js';
import type { ApplicantProfile } from './types.js';

export interface JobPosting {
  url: string;
  title?: string;
  company?: string;
  location?: string;
  description?: string;
}

export interface CompatibilityAssessment {
  /** 0-100 */
  score: number;
  matchReasons: string[];
  concerns: string[];
  skillsToHighlight: string[];
  strategy: string;
  /** True when the oracle gave no usable answer */
  fallback: boolean;
  error?: string;
}

const MAX_DESCRIPTION_CHARS = 2000;

const RawAssessmentSchema = z.object({
  relevance_score: z.number().min(0).max(100),
  match_reasons: z.array(z.string()).default([]),
  concerns: z.array(z.string()).default([]),
  suggested_skills_to_highlight: z.array(z.string()).default([]),
  application_strategy: z.string().default(''),
});

export const NEUTRAL_ASSESSMENT: CompatibilityAssessment = {
  score: 50,
  matchReasons: ['General compatibility'],
  concerns: ['Unable to perform detailed analysis'],
  skillsToHighlight: [],
  strategy: 'Standard application approach',
  fallback: true,
};

export function buildCompatibilityPrompt(job: JobPosting, profile: ApplicantProfile): string {
  const posting = [
    `Title: ${job.title ?? 'N/A'}`,
    `Company: ${job.company ?? 'N/A'}`,
    `Location: ${job.location ?? 'N/A'}`,
    `URL: ${job.url}`,
    job.description ? `Description:\n${truncate(job.description, MAX_DESCRIPTION_CHARS)}` : null,
  ]
    .filter((line): line is string => line !== null)
    .join('\n');

  const candidate = [
    `Name: ${profile.fullName}`,
    profile.experienceYears ? `Experience: ${profile.experienceYears} years` : null,
    profile.experienceSummary ? `Summary: ${truncate(profile.experienceSummary, 500)}` : null,
    `Skills: ${profile.skills.length > 0 ? profile.skills.join(', ') : 'none listed'}`,
  ]
    .filter((line): line is string => line !== null)
    .join('\n');

  return `Assess how well this candidate fits the job posting.

JOB POSTING:
${posting}

CANDIDATE:
${candidate}

Respond with a single JSON object:
{"relevance_score": 0-100,
 "match_reasons": ["..."],
 "concerns": ["..."],
 "suggested_skills_to_highlight": ["..."],
 "application_strategy": "..."}`;
}

export type AssessmentParseResult = { ok: true; assessment: CompatibilityAssessment } | { ok: false; error: string };

export function parseAssessment(text: string): AssessmentParseResult {
  const json = extractJsonObject(text);
  if (json === null) return { ok: false, error: 'no JSON object in response' };

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    return { ok: false, error: `malformed JSON: ${errorMessage(err)}` };
  }

  const parsed = RawAssessmentSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }

  return {
    ok: true,
    assessment: {
      score: parsed.data.relevance_score,
      matchReasons: parsed.data.match_reasons,
      concerns: parsed.data.concerns,
      skillsToHighlight: parsed.data.suggested_skills_to_highlight,
      strategy: parsed.data.application_strategy,
      fallback: false,
    },
  };
}

function neutral(error: string): CompatibilityAssessment {
  return {
    ...NEUTRAL_ASSESSMENT,
    matchReasons: [...NEUTRAL_ASSESSMENT.matchReasons],
    concerns: [...NEUTRAL_ASSESSMENT.concerns],
    skillsToHighlight: [],
    error,
  };
}

export interface CompatibilityAssessorOptions {
  logger?: Logger;
}

export class CompatibilityAssessor {
  private log: Logger;

  constructor(
    private readonly oracle: ReasoningOracle,
    options: CompatibilityAssessorOptions = {},
  ) {
    this.log = (options.logger ?? getLogger()).child({ component: 'CompatibilityAssessor', oracle: oracle.name });
  }

  /** Never throws; every failure becomes the neutral assessment. */
  async assess(job: JobPosting, profile: ApplicantProfile, signal?: AbortSignal): Promise<CompatibilityAssessment> {
    let response: string;
    try {
      response = await this.oracle.call(buildCompatibilityPrompt(job, profile), signal);
    } catch (err) {
      this.log.warn('compatibility_call_failed', { url: job.url, error: errorMessage(err) });
      return neutral(errorMessage(err));
    }

    const result = parseAssessment(response);
    if (!result.ok) {
      this.log.warn('compatibility_response_unparseable', {
        url: job.url,
        error: result.error,
        preview: response.slice(0, 200),
      });
      return neutral(result.error);
    }

    this.log.info('compatibility_assessed', { url: job.url, score: result.assessment.score });
    return result.assessment;
  }
}
