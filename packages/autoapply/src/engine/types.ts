/**
 * Core types for the page analysis and navigation engine.
 *
 * PageElement, PageAnalysis, NavigationAction and ApplicantProfile flow
 * through ElementExtractor, PageClassifier, ActionRecommender, ActionExecutor
 * and NavigationLoop. Everything parsed from outside the process (oracle
 * responses, profile files) is validated against these schemas.
 */

import { z } from 'zod';

// ── Page types & obstacles ───────────────────────────────────────────────

export const PageTypeSchema = z.enum([
  'job_listing',
  'application_form',
  'careers_page',
  'company_page',
  'login_page',
  'success_page',
  'error_page',
  'bot_detection',
  'captcha',
  'unknown',
]);

export type PageType = z.infer<typeof PageTypeSchema>;

export const ObstacleKindSchema = z.enum([
  'login_required',
  'captcha',
  'bot_detection',
  'premium_required',
  'complex_form',
  'analysis_failed',
]);

export type ObstacleKind = z.infer<typeof ObstacleKindSchema>;

/** Obstacles that have a dedicated mitigation routine, in handling order. */
export const BLOCKING_OBSTACLES = ['bot_detection', 'captcha', 'login_required'] as const;

export type BlockingObstacle = (typeof BLOCKING_OBSTACLES)[number];

export function isBlockingObstacle(kind: ObstacleKind): kind is BlockingObstacle {
  return (BLOCKING_OBSTACLES as readonly string[]).includes(kind);
}

// ── PageElement ──────────────────────────────────────────────────────────

export const ElementCategorySchema = z.enum(['apply_button', 'form_field', 'navigation_link', 'unknown']);
export type ElementCategory = z.infer<typeof ElementCategorySchema>;

export const FieldKindSchema = z.enum([
  'first_name',
  'last_name',
  'name',
  'email',
  'phone',
  'resume',
  'cover_letter',
  'linkedin',
  'website',
  'address',
  'city',
  'state',
  'zip',
  'country',
  'salary',
  'experience',
]);

export type FieldKind = z.infer<typeof FieldKindSchema>;

export const PageElementSchema = z.object({
  tag: z.string(),
  /** Advisory CSS hint, see generateSelector(); not guaranteed unique */
  selector: z.string(),
  text: z.string(),
  attributes: z.record(z.string()),
  category: ElementCategorySchema,
  /** 0-100 */
  confidence: z.number().min(0).max(100),
  /** Set on form fields whose purpose was recognised */
  fieldKind: FieldKindSchema.optional(),
});

export type PageElement = z.infer<typeof PageElementSchema>;

// ── NavigationAction ─────────────────────────────────────────────────────

export const ActionTypeSchema = z.enum(['click', 'fill', 'select', 'upload', 'wait', 'scroll']);
export type ActionType = z.infer<typeof ActionTypeSchema>;

export const NavigationActionSchema = z.object({
  type: ActionTypeSchema,
  selector: z.string(),
  /** Literal text, or a symbolic field name resolved against the profile */
  value: z.string().optional(),
  description: z.string(),
  confidence: z.number().min(0).max(100),
});

export type NavigationAction = z.infer<typeof NavigationActionSchema>;

// ── PageAnalysis ─────────────────────────────────────────────────────────

export interface PageAnalysis {
  pageType: PageType;
  /** Apply buttons (best first), then form fields and navigation links in document order */
  elements: PageElement[];
  /** Set semantics: no duplicates */
  obstacles: ObstacleKind[];
  /** 0-100 */
  confidence: number;
  recommendations: string[];
  /** Actions proposed by the oracle, empty for heuristic-only analyses */
  suggestedActions: NavigationAction[];
}

// ── Oracle advice ────────────────────────────────────────────────────────

/** Validated oracle answer, or the fallback used when the oracle fails. */
export interface OracleAdvice {
  pageType: PageType;
  obstacles: ObstacleKind[];
  actions: NavigationAction[];
  confidence: number;
  /** True when the response could not be used and the fallback was substituted */
  fallback: boolean;
  error?: string;
}

// ── ApplicantProfile ─────────────────────────────────────────────────────

export const ApplicantProfileSchema = z.object({
  fullName: z.string().min(1),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  email: z.string().email(),
  phone: z.string().optional(),
  address: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  zipCode: z.string().optional(),
  country: z.string().optional(),
  linkedin: z.string().optional(),
  website: z.string().optional(),
  coverLetter: z.string().optional(),
  experienceSummary: z.string().optional(),
  experienceYears: z.string().optional(),
  expectedSalary: z.string().optional(),
  skills: z.array(z.string()).default([]),
  /** Path to a prepared resume artifact */
  resumePath: z.string().optional(),
});

export type ApplicantProfile = z.infer<typeof ApplicantProfileSchema>;

/** Supplied out-of-band; never part of the profile and never logged. */
export interface SiteCredentials {
  username: string;
  password: string;
}

// ── History & results ────────────────────────────────────────────────────

export interface HistoryEntry {
  iteration: number;
  action: NavigationAction;
  succeeded: boolean;
  /** Resolution strategy that located the element, if any */
  strategy?: string;
  error?: string;
  /** Whether the entry came from the generic fallback list */
  fallback: boolean;
  /** Set when the step was taken to clear an obstacle rather than to advance */
  mitigation?: BlockingObstacle;
  timestamp: string;
}

export interface ObstacleEncounter {
  iteration: number;
  obstacle: ObstacleKind;
  mitigated: boolean | null;
  timestamp: string;
}

export type AttemptOutcome =
  | { status: 'in_progress' }
  | { status: 'success'; message: string }
  | { status: 'failure'; reason: string }
  | { status: 'obstacle_blocked'; reason: string };

export interface AttemptResult {
  success: boolean;
  /** Human-readable reason or confirmation */
  message: string;
  error?: string;
  status: Exclude<AttemptOutcome['status'], 'in_progress'>;
  url: string;
  iterations: number;
  /** Number of executed action outcomes (successful or not) */
  navigationSteps: number;
  navigationPattern: HistoryEntry[];
  obstacles: ObstacleEncounter[];
  pageTypes: PageType[];
  attempts: number;
  /** Failure screenshots, one per failed try, when capture is enabled */
  screenshots?: string[];
}
