/**
 * ActionRecommender: turns a PageAnalysis into an ordered action list.
 *
 * Heuristic mode builds candidate navigation paths from the detected
 * elements; oracle mode uses the advisor's suggestions; hybrid merges both,
 * deduplicating on (type, selector) and keeping the higher confidence.
 */

import { DEFAULT_POLICY, type NavigationPolicy } from '../config/policy.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { resolveFieldValue } from './fieldValues.js';
import type { AdviceContext, OracleAdvisor } from './OracleAdvisor.js';
import type { ApplicantProfile, HistoryEntry, NavigationAction, OracleAdvice, PageAnalysis, PageElement } from './types.js';

export type RecommenderMode = 'heuristic' | 'oracle' | 'hybrid';

export interface NavigationPath {
  steps: PageElement[];
  confidence: number;
  description: string;
}

export interface ActionRecommenderOptions {
  mode?: RecommenderMode;
  /** Without an advisor every mode degrades to heuristic */
  advisor?: OracleAdvisor | null;
  policy?: NavigationPolicy;
  logger?: Logger;
}

const RECENT_FAILURE_PENALTY = 20;

export class ActionRecommender {
  readonly mode: RecommenderMode;
  private advisor: OracleAdvisor | null;
  private policy: NavigationPolicy;
  private log: Logger;

  constructor(options: ActionRecommenderOptions = {}) {
    this.advisor = options.advisor ?? null;
    this.mode = this.advisor ? (options.mode ?? 'hybrid') : 'heuristic';
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.log = (options.logger ?? getLogger()).child({ component: 'ActionRecommender' });
  }

  get usesOracle(): boolean {
    return this.mode !== 'heuristic';
  }

  /** Ask the oracle for advice; null in heuristic mode. */
  async consult(ctx: AdviceContext, signal?: AbortSignal): Promise<OracleAdvice | null> {
    if (!this.advisor || !this.usesOracle) return null;
    return this.advisor.advise(ctx, signal);
  }

  recommend(
    analysis: PageAnalysis,
    profile: ApplicantProfile,
    iteration: number,
    recentHistory: HistoryEntry[] = [],
  ): NavigationAction[] {
    const heuristic = this.mode === 'oracle' ? [] : this.heuristicActions(analysis, profile);
    const oracle = this.mode === 'heuristic' ? [] : analysis.suggestedActions;

    const merged = this.mode === 'hybrid' ? mergeActions(heuristic, oracle) : [...heuristic, ...oracle];
    const adjusted = penalizeRecentFailures(merged, recentHistory);
    const actions = adjusted.slice(0, this.policy.recommender.maxActionsPerIteration);

    this.log.debug('actions_recommended', {
      iteration,
      mode: this.mode,
      heuristic: heuristic.length,
      oracle: oracle.length,
      returned: actions.length,
    });
    return actions;
  }

  // --- Heuristic path ---

  heuristicActions(analysis: PageAnalysis, profile: ApplicantProfile): NavigationAction[] {
    const actions: NavigationAction[] = [];
    const seen = new Set<string>();

    for (const path of this.generatePaths(analysis.elements)) {
      for (const element of path.steps.slice(0, this.policy.recommender.maxPathSteps)) {
        const action = elementToAction(element);
        const key = actionKey(action);
        if (seen.has(key)) continue;
        // A known field with nothing to put in it is skipped
        if ((action.type === 'fill' || action.type === 'select') && action.value !== undefined) {
          if (resolveFieldValue(action.value, profile) === '') continue;
        }
        seen.add(key);
        actions.push(action);
      }
    }
    return actions;
  }

  generatePaths(elements: PageElement[]): NavigationPath[] {
    const r = this.policy.recommender;
    const buttons = elements.filter((e) => e.category === 'apply_button');
    const fields = elements.filter((e) => e.category === 'form_field');
    const links = elements.filter((e) => e.category === 'navigation_link');
    const paths: NavigationPath[] = [];

    for (const button of buttons.slice(0, r.directButtons)) {
      paths.push({
        steps: [button, ...fields.slice(0, r.directFields)],
        confidence: button.confidence,
        description: `Direct application via "${button.text}"`,
      });
    }

    if (buttons.length > 0) {
      for (const link of links.slice(0, r.navLinks)) {
        for (const button of buttons.slice(0, r.navButtons)) {
          paths.push({
            steps: [link, button, ...fields.slice(0, r.navFields)],
            confidence: (link.confidence + button.confidence) / 2,
            description: `Navigate via "${link.text}" then apply`,
          });
        }
      }
    } else {
      if (fields.length > 0) {
        const top = fields.slice(0, r.directFields);
        paths.push({
          steps: top,
          confidence: top.reduce((sum, f) => sum + f.confidence, 0) / top.length,
          description: 'Fill the visible form',
        });
      }
      for (const link of links.slice(0, r.navLinks)) {
        paths.push({ steps: [link], confidence: link.confidence, description: `Navigate via "${link.text}"` });
      }
    }

    // Stable: equal-confidence paths keep generation order
    paths.sort((a, b) => b.confidence - a.confidence);
    return paths.slice(0, r.maxPaths);
  }
}

// --- Helpers ---

export function actionKey(action: NavigationAction): string {
  return `${action.type}\u0000${action.selector}`;
}

export function elementToAction(element: PageElement): NavigationAction {
  const label = element.text || element.fieldKind || element.selector;

  if (element.category !== 'form_field') {
    return {
      type: 'click',
      selector: element.selector,
      description: `Click "${label}"`,
      confidence: element.confidence,
    };
  }

  if (element.fieldKind === 'resume' || element.attributes.type?.toLowerCase() === 'file') {
    return { type: 'upload', selector: element.selector, description: 'Upload resume', confidence: element.confidence };
  }

  const value = element.fieldKind;
  return {
    type: element.tag === 'select' ? 'select' : 'fill',
    selector: element.selector,
    value,
    description: `${element.tag === 'select' ? 'Select' : 'Fill'} ${value ?? label}`,
    confidence: element.confidence,
  };
}

/**
 * Concatenate with the more confident source first (ties favour the first
 * argument), then drop (type, selector) duplicates. A duplicate keeps the
 * first occurrence's position and the higher-confidence record.
 */
export function mergeActions(heuristic: NavigationAction[], oracle: NavigationAction[]): NavigationAction[] {
  const top = (list: NavigationAction[]) => list.reduce((max, a) => Math.max(max, a.confidence), -1);
  const ordered = top(oracle) > top(heuristic) ? [...oracle, ...heuristic] : [...heuristic, ...oracle];

  const merged: NavigationAction[] = [];
  const index = new Map<string, number>();
  for (const action of ordered) {
    const key = actionKey(action);
    const at = index.get(key);
    if (at === undefined) {
      index.set(key, merged.length);
      merged.push(action);
    } else if (action.confidence > merged[at].confidence) {
      merged[at] = action;
    }
  }
  return merged;
}

function penalizeRecentFailures(actions: NavigationAction[], recentHistory: HistoryEntry[]): NavigationAction[] {
  const failed = new Set(recentHistory.filter((h) => !h.succeeded).map((h) => actionKey(h.action)));
  if (failed.size === 0) return actions;

  return actions
    .map((action, position) => ({
      action: failed.has(actionKey(action))
        ? { ...action, confidence: Math.max(0, action.confidence - RECENT_FAILURE_PENALTY) }
        : action,
      position,
      demoted: failed.has(actionKey(action)),
    }))
    .sort((a, b) => Number(a.demoted) - Number(b.demoted) || a.position - b.position)
    .map((entry) => entry.action);
}
