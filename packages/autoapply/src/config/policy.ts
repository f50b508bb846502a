/**
 * Navigation policy: every tunable constant the engine consults.
 *
 * Keyword tables, extract caps, confidence weights, pacing ranges and the
 * generic fallback selectors live here so call sites never hard-code them.
 * Keyword matching is case-insensitive throughout.
 */

import type { FieldKind } from '../engine/types.js';
import { getEnv, type Env } from './env.js';

// --- Types ---

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export type TextObstacle = 'login_required' | 'captcha' | 'bot_detection' | 'premium_required';

export interface ObstacleSelectorPattern {
  kind: TextObstacle;
  selector: string;
}

export interface FieldKindPattern {
  kind: FieldKind;
  pattern: RegExp;
}

export interface NavigationPolicy {
  keywords: {
    /** Substrings marking a button/link as worth extracting */
    clickable: string[];
    /** Substrings of class/id marking a container as worth extracting */
    container: string[];
    applyButton: RegExp[];
    navigationLink: RegExp[];
    pageType: {
      applicationForm: RegExp[];
      jobListing: RegExp[];
      careers: RegExp[];
      company: RegExp[];
      login: RegExp[];
      success: RegExp[];
    };
    obstacleText: Record<TextObstacle, RegExp[]>;
    obstacleSelectors: ObstacleSelectorPattern[];
    /** Evaluated in order, first match wins */
    fieldKinds: FieldKindPattern[];
  };
  extract: {
    maxElements: number;
    maxFormChars: number;
    maxElementChars: number;
    maxContainerChars: number;
    maxTotalChars: number;
  };
  classifier: {
    maxApplyButtons: number;
    complexFormThreshold: number;
    element: {
      base: number;
      idBonus: number;
      classBonus: number;
      testIdBonus: number;
      applyTextBonus: number;
      urgencyTextBonus: number;
      requiredBonus: number;
      placeholderBonus: number;
    };
    page: {
      base: number;
      favorableTypeBonus: number;
      careersBonus: number;
      applyButtonWeight: number;
      perFieldBonus: number;
      maxFieldBonus: number;
    };
  };
  recommender: {
    maxActionsPerIteration: number;
    maxPathSteps: number;
    maxPaths: number;
    directButtons: number;
    directFields: number;
    navLinks: number;
    navButtons: number;
    navFields: number;
    historyWindow: number;
  };
  pacing: {
    keystroke: DelayRange;
    betweenSteps: DelayRange;
    betweenIterations: DelayRange;
    botBackoff: DelayRange;
    /** Retry back-off and the gap between jobs in a batch */
    betweenAttempts: DelayRange;
    betweenApplications: DelayRange;
    captchaWaitMs: number;
    defaultWaitSeconds: number;
    scrollSettleMs: number;
    pointerMoves: number;
  };
  fallbackSelectors: string[];
  userAgents: string[];
  loginAttemptLimit: number;
  maxIterations: number;
  maxAttempts: number;
}

// --- Defaults ---

export const DEFAULT_POLICY: NavigationPolicy = {
  keywords: {
    clickable: ['apply', 'submit', 'job', 'application', 'continue', 'next'],
    container: ['job', 'apply', 'application', 'form', 'career'],
    applyButton: [
      /apply\s*(now|for|to)?/i,
      /submit\s*application/i,
      /quick\s*apply/i,
      /easy\s*apply/i,
      /one\s*click\s*apply/i,
      /apply\s*online/i,
    ],
    navigationLink: [
      /careers?/i,
      /jobs?/i,
      /employment/i,
      /opportunities/i,
      /work\s*with\s*us/i,
      /join\s*(us|our\s*team)/i,
      /hiring/i,
    ],
    pageType: {
      applicationForm: [/resume/i, /apply/i, /application/i, /\bcv\b/i],
      jobListing: [/job description/i, /responsibilities/i, /requirements/i, /qualifications/i],
      careers: [/careers/i, /jobs/i, /employment opportunities/i],
      company: [/about us/i, /company/i, /our team/i],
      login: [/login/i, /log in/i, /sign in/i, /account/i],
      success: [/thank you/i, /application submitted/i, /success/i],
    },
    obstacleText: {
      login_required: [
        /sign in/i,
        /login/i,
        /log in/i,
        /account required/i,
        /sign in to continue/i,
        /please (log|sign) ?in/i,
      ],
      captcha: [
        /captcha/i,
        /verify you('re| are) (a )?human/i,
        /prove you('re| are) not a robot/i,
        /i'm not a robot/i,
      ],
      bot_detection: [
        /access denied/i,
        /\bblocked\b/i,
        /suspicious activity/i,
        /checking your browser/i,
        /are you a (ro)?bot/i,
      ],
      premium_required: [/premium/i, /subscription/i, /upgrade required/i],
    },
    obstacleSelectors: [
      { kind: 'captcha', selector: 'iframe[src*="recaptcha"]' },
      { kind: 'captcha', selector: 'iframe[src*="hcaptcha"]' },
      { kind: 'captcha', selector: 'iframe[src*="challenges.cloudflare.com"]' },
      { kind: 'captcha', selector: '.g-recaptcha' },
      { kind: 'captcha', selector: '.h-captcha' },
      { kind: 'bot_detection', selector: '#challenge-running' },
      { kind: 'bot_detection', selector: '#cf-challenge-running' },
      { kind: 'bot_detection', selector: '.cf-browser-verification' },
      { kind: 'bot_detection', selector: '#px-captcha' },
      { kind: 'login_required', selector: 'form[action*="login"]' },
      { kind: 'login_required', selector: 'form[action*="signin"]' },
      { kind: 'login_required', selector: '#login-form' },
    ],
    fieldKinds: [
      { kind: 'first_name', pattern: /first.?name|given.?name|fname/i },
      { kind: 'last_name', pattern: /last.?name|surname|family.?name|lname/i },
      { kind: 'email', pattern: /e.?mail/i },
      { kind: 'phone', pattern: /phone|telephone|mobile|\btel\b/i },
      { kind: 'resume', pattern: /resume|\bcv\b|upload/i },
      { kind: 'cover_letter', pattern: /cover.?letter|motivation|additional.?info|message/i },
      { kind: 'linkedin', pattern: /linkedin/i },
      { kind: 'website', pattern: /website|portfolio|personal.?site/i },
      { kind: 'address', pattern: /address|street/i },
      { kind: 'city', pattern: /\bcity\b|\btown\b/i },
      { kind: 'state', pattern: /\bstate\b|province|region/i },
      { kind: 'zip', pattern: /\bzip|postal|postcode/i },
      { kind: 'country', pattern: /country/i },
      { kind: 'salary', pattern: /salary|compensation|\bpay\b|wage/i },
      { kind: 'experience', pattern: /experience|years/i },
      { kind: 'name', pattern: /name/i },
    ],
  },
  extract: {
    maxElements: 50,
    maxFormChars: 1000,
    maxElementChars: 300,
    maxContainerChars: 500,
    maxTotalChars: 4000,
  },
  classifier: {
    maxApplyButtons: 10,
    complexFormThreshold: 10,
    element: {
      base: 50,
      idBonus: 20,
      classBonus: 15,
      testIdBonus: 25,
      applyTextBonus: 30,
      urgencyTextBonus: 10,
      requiredBonus: 15,
      placeholderBonus: 10,
    },
    page: {
      base: 30,
      favorableTypeBonus: 30,
      careersBonus: 20,
      applyButtonWeight: 0.3,
      perFieldBonus: 2,
      maxFieldBonus: 20,
    },
  },
  recommender: {
    maxActionsPerIteration: 8,
    maxPathSteps: 8,
    maxPaths: 5,
    directButtons: 3,
    directFields: 5,
    navLinks: 2,
    navButtons: 2,
    navFields: 3,
    historyWindow: 3,
  },
  pacing: {
    keystroke: { minMs: 50, maxMs: 150 },
    betweenSteps: { minMs: 500, maxMs: 1500 },
    betweenIterations: { minMs: 1000, maxMs: 3000 },
    botBackoff: { minMs: 3000, maxMs: 7000 },
    betweenAttempts: { minMs: 3000, maxMs: 8000 },
    betweenApplications: { minMs: 5000, maxMs: 15000 },
    captchaWaitMs: 30_000,
    defaultWaitSeconds: 2,
    scrollSettleMs: 500,
    pointerMoves: 5,
  },
  fallbackSelectors: [
    "//button[contains(text(),'Apply')]",
    "//a[contains(text(),'Apply')]",
    '.apply-button',
    '#apply-btn',
    "[data-testid*='apply']",
    '.job-apply-button',
  ],
  userAgents: [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36',
  ],
  loginAttemptLimit: 2,
  maxIterations: 20,
  maxAttempts: 3,
};

// --- Builders ---

export type PolicyOverrides = {
  [K in keyof NavigationPolicy]?: NavigationPolicy[K] extends unknown[]
    ? NavigationPolicy[K]
    : NavigationPolicy[K] extends object
      ? Partial<NavigationPolicy[K]>
      : NavigationPolicy[K];
};

/**
 * Merge partial overrides onto the defaults. Nested groups merge one level
 * deep; arrays and scalars replace.
 */
export function buildPolicy(overrides: PolicyOverrides = {}, base: NavigationPolicy = DEFAULT_POLICY): NavigationPolicy {
  return {
    keywords: { ...base.keywords, ...overrides.keywords },
    extract: { ...base.extract, ...overrides.extract },
    classifier: { ...base.classifier, ...overrides.classifier },
    recommender: { ...base.recommender, ...overrides.recommender },
    pacing: { ...base.pacing, ...overrides.pacing },
    fallbackSelectors: overrides.fallbackSelectors ?? base.fallbackSelectors,
    userAgents: overrides.userAgents ?? base.userAgents,
    loginAttemptLimit: overrides.loginAttemptLimit ?? base.loginAttemptLimit,
    maxIterations: overrides.maxIterations ?? base.maxIterations,
    maxAttempts: overrides.maxAttempts ?? base.maxAttempts,
  };
}

export function policyFromEnv(env: Env = getEnv(), overrides: PolicyOverrides = {}): NavigationPolicy {
  return buildPolicy({
    maxIterations: env.AUTOAPPLY_MAX_ITERATIONS,
    maxAttempts: env.AUTOAPPLY_MAX_ATTEMPTS,
    ...overrides,
  });
}
