/**
 * ObstacleDetector: markup-level detection of login walls, CAPTCHAs,
 * bot checks, paywalls and oversized forms.
 *
 * Two passes over the parsed page:
 *   1. Selector patterns (challenge iframes, login forms, bot-check markers).
 *   2. Text patterns over the visible body text.
 * Plus one structural rule: any form with more inputs than the threshold
 * is a complex form.
 *
 * Detections are independent of the page type and of each other.
 */

import type * as cheerio from 'cheerio';
import { DEFAULT_POLICY, type NavigationPolicy, type TextObstacle } from '../config/policy.js';
import type { ObstacleKind } from '../engine/types.js';

export type DetectionSource = 'selector' | 'text' | 'structure';

export interface ObstacleMatch {
  kind: ObstacleKind;
  source: DetectionSource;
  /** Selector or pattern source that matched */
  evidence: string;
}

const TEXT_OBSTACLE_ORDER: TextObstacle[] = ['login_required', 'captcha', 'bot_detection', 'premium_required'];

export class ObstacleDetector {
  constructor(private readonly policy: NavigationPolicy = DEFAULT_POLICY) {}

  /** Unique obstacle kinds in detection order. */
  detect($: cheerio.CheerioAPI): ObstacleKind[] {
    const kinds: ObstacleKind[] = [];
    for (const match of this.matches($)) {
      if (!kinds.includes(match.kind)) kinds.push(match.kind);
    }
    return kinds;
  }

  /** Every match with its evidence, for diagnostics. */
  matches($: cheerio.CheerioAPI): ObstacleMatch[] {
    const found: ObstacleMatch[] = [];
    const { obstacleText, obstacleSelectors } = this.policy.keywords;

    const pageText = $.root().text().replace(/\s+/g, ' ');
    for (const kind of TEXT_OBSTACLE_ORDER) {
      const pattern = obstacleText[kind].find((p) => p.test(pageText));
      if (pattern) found.push({ kind, source: 'text', evidence: pattern.source });
    }

    for (const { kind, selector } of obstacleSelectors) {
      if ($(selector).length > 0) found.push({ kind, source: 'selector', evidence: selector });
    }

    const threshold = this.policy.classifier.complexFormThreshold;
    $('form').each((_, form) => {
      const inputs = $(form).find('input, textarea, select').length;
      if (inputs > threshold) {
        found.push({ kind: 'complex_form', source: 'structure', evidence: `form with ${inputs} inputs` });
        return false;
      }
      return undefined;
    });

    return found;
  }
}
