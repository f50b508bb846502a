/**
 * OracleAdvisor: builds the bounded page prompt, calls the reasoning oracle
 * and turns its free-form reply into validated OracleAdvice.
 *
 * Parse-or-fallback: the reply must contain exactly one JSON object that
 * passes the schema in full. Anything else yields FALLBACK_ADVICE.
 */

import { z } from 'zod';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { errorMessage } from '../errors.js';
import type { ReasoningOracle } from '../oracle/types.js';
import { truncate } from './markup.js';
import {
  ActionTypeSchema,
  ObstacleKindSchema,
  PageTypeSchema,
  type ApplicantProfile,
  type HistoryEntry,
  type NavigationAction,
  type OracleAdvice,
} from './types.js';

// ── Response schema ──────────────────────────────────────────────────────

const RawActionSchema = z
  .object({
    action_type: ActionTypeSchema,
    selector: z.string().default(''),
    value: z
      .union([z.string(), z.number(), z.null()])
      .optional()
      .transform((v) => (v === null || v === undefined ? undefined : String(v))),
    description: z.string().default(''),
    confidence: z.number().min(0).max(100).default(70),
  })
  .refine((a) => a.action_type === 'wait' || a.selector.trim().length > 0, {
    message: 'non-wait actions need a selector',
  });

const RawAdviceSchema = z.object({
  page_type: PageTypeSchema,
  obstacles: z.array(ObstacleKindSchema).default([]),
  suggested_actions: z.array(RawActionSchema).default([]),
  confidence_score: z.number().min(0).max(100).default(50),
});

export const FALLBACK_ADVICE: OracleAdvice = {
  pageType: 'unknown',
  obstacles: ['analysis_failed'],
  actions: [
    {
      type: 'wait',
      selector: '',
      value: '2',
      description: 'Oracle analysis failed - wait and re-evaluate',
      confidence: 10,
    },
  ],
  confidence: 10,
  fallback: true,
};

// ── Prompt ───────────────────────────────────────────────────────────────

export interface AdviceContext {
  iteration: number;
  url: string;
  /** Rendered extract, already size-bounded */
  elements: string;
  recentHistory: HistoryEntry[];
  profile: ApplicantProfile;
}

/** Cap on each selector and error echoed back from history */
export const MAX_HISTORY_TEXT = 160;

function historyLine(h: HistoryEntry): string {
  const target = h.action.selector ? truncate(h.action.selector, MAX_HISTORY_TEXT) : '(no target)';
  const status = h.succeeded ? 'ok' : `failed${h.error ? ` (${truncate(h.error, MAX_HISTORY_TEXT)})` : ''}`;
  return `- ${h.action.type} ${target}: ${status}`;
}

export function buildPrompt(ctx: AdviceContext): string {
  const history = ctx.recentHistory.length === 0 ? 'none' : ctx.recentHistory.map(historyLine).join('\n');

  const applicant = [
    `Name: ${ctx.profile.fullName}`,
    `Email: ${ctx.profile.email}`,
    ctx.profile.phone ? `Phone: ${ctx.profile.phone}` : null,
    ctx.profile.experienceYears ? `Experience: ${ctx.profile.experienceYears} years` : null,
    ctx.profile.skills.length > 0 ? `Skills: ${ctx.profile.skills.slice(0, 10).join(', ')}` : null,
  ]
    .filter((line): line is string => line !== null)
    .join('\n');

  return `You are navigating a website to submit a job application.

URL: ${ctx.url}
Iteration: ${ctx.iteration}

Recent actions:
${history}

Applicant:
${applicant}

Relevant page elements:
${ctx.elements}

Classify the page and propose the next actions. For fill and select actions use a symbolic field name as value (first_name, last_name, name, email, phone, address, city, state, zip, country, linkedin, website, cover_letter, experience, salary) unless a literal is needed. Wait values are seconds.

Respond with a single JSON object:
{"page_type": "job_listing|application_form|careers_page|company_page|login_page|success_page|error_page|bot_detection|captcha|unknown",
 "obstacles": ["login_required|captcha|bot_detection|premium_required|complex_form"],
 "suggested_actions": [{"action_type": "click|fill|select|upload|wait|scroll", "selector": "css selector", "value": "optional", "description": "why", "confidence": 0-100}],
 "confidence_score": 0-100}`;
}

// ── Parsing ──────────────────────────────────────────────────────────────

/** Slice from the first `{` to the last `}`; prose around it is ignored. */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

export type ParseResult = { ok: true; advice: OracleAdvice } | { ok: false; error: string };

export function parseAdvice(text: string): ParseResult {
  const json = extractJsonObject(text);
  if (json === null) return { ok: false, error: 'no JSON object in response' };

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    return { ok: false, error: `malformed JSON: ${errorMessage(err)}` };
  }

  const parsed = RawAdviceSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }

  const actions: NavigationAction[] = parsed.data.suggested_actions.map((a) => {
    const selector = a.selector.trim();
    return {
      type: a.action_type,
      selector,
      value: a.value,
      description: a.description || `${a.action_type} ${selector}`.trim(),
      confidence: a.confidence,
    };
  });

  return {
    ok: true,
    advice: {
      pageType: parsed.data.page_type,
      obstacles: [...new Set(parsed.data.obstacles)],
      actions,
      confidence: parsed.data.confidence_score,
      fallback: false,
    },
  };
}

function fallback(error: string): OracleAdvice {
  return { ...FALLBACK_ADVICE, actions: FALLBACK_ADVICE.actions.map((a) => ({ ...a })), error };
}

// ── Advisor ──────────────────────────────────────────────────────────────

export interface OracleAdvisorOptions {
  logger?: Logger;
}

export class OracleAdvisor {
  private log: Logger;

  constructor(
    private readonly oracle: ReasoningOracle,
    options: OracleAdvisorOptions = {},
  ) {
    this.log = (options.logger ?? getLogger()).child({ component: 'OracleAdvisor', oracle: oracle.name });
  }

  /** Never throws; every failure becomes the fallback advice. */
  async advise(ctx: AdviceContext, signal?: AbortSignal): Promise<OracleAdvice> {
    let response: string;
    try {
      response = await this.oracle.call(buildPrompt(ctx), signal);
    } catch (err) {
      this.log.warn('oracle_call_failed', { iteration: ctx.iteration, error: errorMessage(err) });
      return fallback(errorMessage(err));
    }

    const result = parseAdvice(response);
    if (!result.ok) {
      this.log.warn('oracle_response_unparseable', {
        iteration: ctx.iteration,
        error: result.error,
        preview: response.slice(0, 200),
      });
      return fallback(result.error);
    }

    this.log.debug('oracle_advice', {
      iteration: ctx.iteration,
      pageType: result.advice.pageType,
      actions: result.advice.actions.length,
    });
    return result.advice;
  }
}
