/**
 * PageClassifier: rule-based page understanding.
 *
 * classify() labels the page (first matching rule wins), collects apply
 * buttons, recognisable form fields and navigation links as PageElements,
 * detects obstacles, and scores its own confidence. combineAnalyses() folds
 * oracle advice into a heuristic analysis.
 */

import type * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { DEFAULT_POLICY, type NavigationPolicy } from '../config/policy.js';
import { ObstacleDetector } from '../detection/ObstacleDetector.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { errorMessage } from '../errors.js';
import { attributesOf, collapseWhitespace, loadVisible, textOf } from './markup.js';
import { generateSelector } from './selectors.js';
import type {
  FieldKind,
  ObstacleKind,
  OracleAdvice,
  PageAnalysis,
  PageElement,
  PageType,
} from './types.js';

const APPLY_CANDIDATES = 'button, a, input[type="submit"], input[type="button"], input[type="image"]';
const FIELD_CANDIDATES = 'input, textarea, select';
const SKIPPED_INPUT_TYPES = new Set(['hidden', 'submit', 'button', 'image', 'reset']);
const ORACLE_AUTHORITATIVE: PageType[] = ['success_page', 'error_page', 'captcha', 'bot_detection'];

export interface PageClassifierOptions {
  policy?: NavigationPolicy;
  logger?: Logger;
}

export class PageClassifier {
  private policy: NavigationPolicy;
  private obstacles: ObstacleDetector;
  private log: Logger;

  constructor(options: PageClassifierOptions = {}) {
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.obstacles = new ObstacleDetector(this.policy);
    this.log = (options.logger ?? getLogger()).child({ component: 'PageClassifier' });
  }

  classify(markup: string): PageAnalysis {
    try {
      const $ = loadVisible(markup);
      const pageType = this.detectPageType($);
      const applyButtons = this.findApplyButtons($);
      const formFields = this.findFormFields($);
      const navigationLinks = this.findNavigationLinks($, applyButtons);
      const obstacles = this.obstacles.detect($);

      return {
        pageType,
        elements: [...applyButtons, ...formFields, ...navigationLinks],
        obstacles,
        confidence: this.pageConfidence(pageType, applyButtons, formFields),
        recommendations: buildRecommendations(applyButtons, formFields, obstacles),
        suggestedActions: [],
      };
    } catch (err) {
      this.log.warn('page_classification_failed', { error: errorMessage(err) });
      return {
        pageType: 'unknown',
        elements: [],
        obstacles: ['analysis_failed'],
        confidence: 0,
        recommendations: [],
        suggestedActions: [],
      };
    }
  }

  // --- Page type ---

  private detectPageType($: cheerio.CheerioAPI): PageType {
    const types = this.policy.keywords.pageType;
    const matches = (patterns: RegExp[], text: string) => patterns.some((p) => p.test(text));

    const forms = $('form').toArray();
    if (forms.some((form) => matches(types.applicationForm, textOf($, form)))) {
      return 'application_form';
    }

    const pageText = collapseWhitespace($.root().text()).toLowerCase();
    if (matches(types.jobListing, pageText)) return 'job_listing';
    if (matches(types.careers, pageText)) return 'careers_page';
    if (matches(types.company, pageText)) return 'company_page';
    if (matches(types.login, pageText)) return 'login_page';
    if (matches(types.success, pageText)) return 'success_page';
    return 'unknown';
  }

  // --- Elements ---

  private findApplyButtons($: cheerio.CheerioAPI): PageElement[] {
    const patterns = this.policy.keywords.applyButton;
    const buttons: PageElement[] = [];

    for (const el of $(APPLY_CANDIDATES).toArray()) {
      const attrs = attributesOf(el);
      const text = el.name === 'input' ? (attrs.value ?? '').trim().toLowerCase() : textOf($, el);
      const attrText = [attrs.class, attrs.id, attrs['data-testid'], attrs['aria-label']]
        .filter((part): part is string => typeof part === 'string')
        .join(' ')
        .toLowerCase();

      const isApply = patterns.some((p) => p.test(text)) || patterns.some((p) => p.test(attrText));
      if (!isApply) continue;

      buttons.push({
        tag: el.name,
        selector: generateSelector(el.name, attrs, visibleLabel($, el, attrs)),
        text,
        attributes: attrs,
        category: 'apply_button',
        confidence: this.elementConfidence(attrs, text, 'apply_button'),
      });
    }

    // Stable sort keeps document order among equal confidences
    buttons.sort((a, b) => b.confidence - a.confidence);
    return buttons.slice(0, this.policy.classifier.maxApplyButtons);
  }

  private findFormFields($: cheerio.CheerioAPI): PageElement[] {
    const fields: PageElement[] = [];

    for (const el of $(FIELD_CANDIDATES).toArray()) {
      const attrs = attributesOf(el);
      const type = (attrs.type ?? (el.name === 'input' ? 'text' : el.name)).toLowerCase();
      if (el.name === 'input' && SKIPPED_INPUT_TYPES.has(type)) continue;

      const fieldKind = this.classifyField($, el, attrs, type);
      if (!fieldKind) continue;

      fields.push({
        tag: el.name,
        selector: generateSelector(el.name, attrs),
        text: labelText($, el, attrs),
        attributes: attrs,
        category: 'form_field',
        confidence: this.elementConfidence(attrs, '', 'form_field'),
        fieldKind,
      });
    }

    return fields;
  }

  private classifyField(
    $: cheerio.CheerioAPI,
    el: Element,
    attrs: Record<string, string>,
    type: string,
  ): FieldKind | null {
    if (el.name === 'input' && type === 'file') return 'resume';

    const hints = [attrs.name, attrs.id, attrs.placeholder, attrs['aria-label'], attrs.class, labelText($, el, attrs)]
      .filter((part): part is string => typeof part === 'string')
      .join(' ');

    const match = this.policy.keywords.fieldKinds.find(({ pattern }) => pattern.test(hints));
    if (match) return match.kind;

    if (type === 'email') return 'email';
    if (type === 'tel') return 'phone';
    return null;
  }

  private findNavigationLinks($: cheerio.CheerioAPI, applyButtons: PageElement[]): PageElement[] {
    const patterns = this.policy.keywords.navigationLink;
    const taken = new Set(applyButtons.map((b) => b.selector));
    const links: PageElement[] = [];

    for (const el of $('a[href]').toArray()) {
      const text = textOf($, el);
      if (!patterns.some((p) => p.test(text))) continue;

      const attrs = attributesOf(el);
      const selector = generateSelector(el.name, attrs, visibleLabel($, el, attrs));
      if (taken.has(selector)) continue;

      links.push({
        tag: el.name,
        selector,
        text,
        attributes: attrs,
        category: 'navigation_link',
        confidence: this.elementConfidence(attrs, text, 'navigation_link'),
      });
    }

    return links;
  }

  // --- Scoring ---

  private elementConfidence(attrs: Record<string, string>, text: string, category: PageElement['category']): number {
    const w = this.policy.classifier.element;
    let score = w.base;

    if (attrs.id) score += w.idBonus;
    if (attrs.class) score += w.classBonus;
    if (attrs['data-testid']) score += w.testIdBonus;

    if (category === 'apply_button') {
      if (text.includes('apply')) score += w.applyTextBonus;
      if (text.includes('now') || text.includes('quick')) score += w.urgencyTextBonus;
    }

    if (category === 'form_field') {
      if ('required' in attrs) score += w.requiredBonus;
      if (attrs.placeholder) score += w.placeholderBonus;
    }

    return clamp(score);
  }

  private pageConfidence(pageType: PageType, applyButtons: PageElement[], formFields: PageElement[]): number {
    const w = this.policy.classifier.page;
    let score = w.base;

    if (pageType === 'application_form' || pageType === 'job_listing') {
      score += w.favorableTypeBonus;
    } else if (pageType === 'careers_page') {
      score += w.careersBonus;
    }

    // Best button rather than the mean, so an extra weak button never lowers the score
    if (applyButtons.length > 0) {
      score += Math.max(...applyButtons.map((b) => b.confidence)) * w.applyButtonWeight;
    }

    score += Math.min(w.maxFieldBonus, formFields.length * w.perFieldBonus);
    return clamp(score);
  }
}

// --- Helpers ---

function clamp(score: number): number {
  return Math.max(0, Math.min(100, score));
}

/** Visible caption of a clickable in its original case; inputs show their value. */
function visibleLabel($: cheerio.CheerioAPI, el: Element, attrs: Record<string, string>): string {
  return el.name === 'input' ? (attrs.value ?? '') : $(el).text();
}

/** Text of the label bound by `for`, or of a wrapping label. Never sibling or parent text. */
function labelText($: cheerio.CheerioAPI, el: Element, attrs: Record<string, string>): string {
  if (attrs.id) {
    const bound = $('label')
      .filter((_, label) => label.attribs.for === attrs.id)
      .first();
    if (bound.length > 0) return collapseWhitespace(bound.text());
  }
  const wrapping = $(el).closest('label');
  return wrapping.length > 0 ? collapseWhitespace(wrapping.text()) : '';
}

function buildRecommendations(
  applyButtons: PageElement[],
  formFields: PageElement[],
  obstacles: ObstacleKind[],
): string[] {
  const recommendations: string[] = [];

  if (applyButtons.length === 0) {
    recommendations.push('No apply buttons found - may need to navigate to a different page');
  } else if (applyButtons.length > 1) {
    recommendations.push('Multiple apply options found - prioritize the highest confidence button');
  }

  if (formFields.length > 0) {
    recommendations.push(`Found ${formFields.length} form fields - prepare applicant data for auto-fill`);
  }
  if (obstacles.includes('login_required')) {
    recommendations.push('Login required - ensure credentials are available');
  }
  if (obstacles.includes('captcha')) {
    recommendations.push('CAPTCHA detected - may require manual intervention');
  }
  if (obstacles.includes('complex_form')) {
    recommendations.push('Complex form detected - allow extra time for completion');
  }
  if (obstacles.length === 0) {
    recommendations.push('No major obstacles detected');
  }

  return recommendations;
}

/**
 * Fold oracle advice into a heuristic analysis. The heuristic page type
 * stands unless it is unknown or the oracle reports a terminal or blocking
 * type. Obstacles are unioned and confidence averaged.
 */
export function combineAnalyses(heuristic: PageAnalysis, advice: OracleAdvice): PageAnalysis {
  const pageType =
    heuristic.pageType === 'unknown' || ORACLE_AUTHORITATIVE.includes(advice.pageType)
      ? advice.pageType
      : heuristic.pageType;

  const obstacles = [...heuristic.obstacles];
  for (const obstacle of advice.obstacles) {
    if (!obstacles.includes(obstacle)) obstacles.push(obstacle);
  }

  return {
    pageType,
    elements: heuristic.elements,
    obstacles,
    confidence: clamp((heuristic.confidence + advice.confidence) / 2),
    recommendations: advice.fallback
      ? [...heuristic.recommendations, 'Oracle analysis unavailable - relying on heuristics']
      : heuristic.recommendations,
    suggestedActions: advice.actions,
  };
}
