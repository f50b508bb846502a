/**
 * Element resolution fallback chain.
 *
 * Each strategy reinterprets the selector hint one way and returns the first
 * matching element or null. Driver errors (invalid query syntax, unsupported
 * query language, timeouts) count as "no match" so the chain moves on.
 * Only the first strategy may wait for the page; later ones look once.
 */

import type { BrowserDriver, DriverElement, LookupBy, LookupOptions } from '../adapters/types.js';
import { isSimpleHint } from './selectors.js';

export interface ResolutionStrategy {
  readonly name: string;
  tryResolve(hint: string, driver: BrowserDriver, options?: LookupOptions): Promise<DriverElement | null>;
}

export interface Resolution {
  element: DriverElement;
  strategy: string;
}

async function first(
  driver: BrowserDriver,
  by: LookupBy,
  query: string,
  options?: LookupOptions,
): Promise<DriverElement | null> {
  if (query.length === 0) return null;
  try {
    const found = await driver.findElements(by, query, options);
    return found[0] ?? null;
  } catch {
    // Unparseable or unsupported queries are a miss for this strategy
    return null;
  }
}

function cssString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

// ── Strategies ───────────────────────────────────────────────────────────

export const cssStrategy: ResolutionStrategy = {
  name: 'css',
  tryResolve: (hint, driver, options) => first(driver, 'css', hint, options),
};

export const xpathStrategy: ResolutionStrategy = {
  name: 'xpath',
  tryResolve: (hint, driver, options) => first(driver, 'xpath', hint, options),
};

/** `#id` → id lookup, `.a.b` → class lookup. Bare hints are left to later strategies. */
export const strippedPrefixStrategy: ResolutionStrategy = {
  name: 'stripped-prefix',
  tryResolve: async (hint, driver, options) => {
    if (hint.startsWith('#')) return first(driver, 'id', hint.slice(1), options);
    if (hint.startsWith('.')) return first(driver, 'className', hint.slice(1).split('.').join(' '), options);
    return null;
  },
};

export const linkTextStrategy: ResolutionStrategy = {
  name: 'link-text',
  tryResolve: async (hint, driver, options) => {
    const text = hint.trim();
    return (await first(driver, 'linkText', text, options)) ?? first(driver, 'partialLinkText', text);
  },
};

export function synthesizedAlternates(hint: string): string[] {
  const h = hint.trim();
  if (h.length === 0) return [];
  const q = cssString(h);
  const alternates = isSimpleHint(h) ? [`#${h}`, `.${h}`] : [];
  return [
    ...alternates,
    `[id*="${q}"]`,
    `[class*="${q}"]`,
    `[name*="${q}"]`,
    `[data-testid*="${q}"]`,
    `[aria-label*="${q}" i]`,
  ];
}

export const synthesizedStrategy: ResolutionStrategy = {
  name: 'synthesized',
  tryResolve: async (hint, driver, options) => {
    let lookup = options;
    for (const alternate of synthesizedAlternates(hint)) {
      const element = await first(driver, 'css', alternate, lookup);
      if (element) return element;
      lookup = undefined;
    }
    return null;
  },
};

/** Fixed order; the first strategy that yields an element wins. */
export const STRATEGIES: readonly ResolutionStrategy[] = [
  cssStrategy,
  xpathStrategy,
  strippedPrefixStrategy,
  linkTextStrategy,
  synthesizedStrategy,
];

export class ElementResolver {
  constructor(private readonly strategies: readonly ResolutionStrategy[] = STRATEGIES) {}

  /** With `wait`, the first lookup of the first strategy may wait for the page to render the target. */
  async resolve(hint: string, driver: BrowserDriver, options: LookupOptions = {}): Promise<Resolution | null> {
    let lookup: LookupOptions | undefined = options;
    for (const strategy of this.strategies) {
      const element = await strategy.tryResolve(hint, driver, lookup);
      if (element) return { element, strategy: strategy.name };
      lookup = undefined;
    }
    return null;
  }
}
