/**
 * ElementExtractor: reduces a page to the markup worth reasoning about.
 *
 * Output is a strict function of the input: forms first, then keyword
 * clickables, then inputs, then keyword containers, document order within
 * each group, bounded by element count and total character length.
 */

import type * as cheerio from 'cheerio';
import { isTag, type Element, type ParentNode } from 'domhandler';
import { DEFAULT_POLICY, type NavigationPolicy } from '../config/policy.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { errorMessage } from '../errors.js';
import { collapseWhitespace, loadVisible, truncate } from './markup.js';

const CLICKABLE = 'button, a, [role="button"], input[type="submit"], input[type="button"]';
const FIELD = 'input:not([type="hidden"]), textarea, select';
const CONTAINER_SKIP = new Set(['html', 'head', 'body', 'form', 'button', 'a', 'input', 'textarea', 'select']);
const SEPARATOR = '\n';

export interface ElementExtractorOptions {
  policy?: NavigationPolicy;
  logger?: Logger;
}

interface Group {
  elements: Element[];
  cap: number;
}

export class ElementExtractor {
  private policy: NavigationPolicy;
  private log: Logger;

  constructor(options: ElementExtractorOptions = {}) {
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.log = (options.logger ?? getLogger()).child({ component: 'ElementExtractor' });
  }

  /** Never throws; malformed input degrades to an empty extract. */
  extract(markup: string): string[] {
    try {
      return this.collect(markup);
    } catch (err) {
      this.log.warn('element_extraction_failed', { error: errorMessage(err) });
      return [];
    }
  }

  /** Join an extract into the block sent to the oracle. */
  render(snippets: string[]): string {
    return snippets.join(SEPARATOR);
  }

  private collect(markup: string): string[] {
    const $ = loadVisible(markup);
    const caps = this.policy.extract;

    const groups: Group[] = [
      { elements: $('form').toArray(), cap: caps.maxFormChars },
      { elements: this.clickables($), cap: caps.maxElementChars },
      { elements: $(FIELD).toArray(), cap: caps.maxElementChars },
      { elements: this.containers($), cap: caps.maxContainerChars },
    ];

    const taken = new Set<Element>();
    const snippets: string[] = [];
    let total = 0;

    for (const group of groups) {
      for (const el of group.elements) {
        if (snippets.length >= caps.maxElements) return snippets;
        if (this.isCovered(el, taken)) continue;

        const html = truncate(collapseWhitespace($.html(el)), group.cap);
        if (html.length === 0) continue;

        const separator = snippets.length > 0 ? SEPARATOR.length : 0;
        const remaining = caps.maxTotalChars - total - separator;
        if (remaining <= 0) return snippets;

        const snippet = truncate(html, remaining);
        snippets.push(snippet);
        taken.add(el);
        total += separator + snippet.length;
        if (snippet.length < html.length) return snippets;
      }
    }

    return snippets;
  }

  private clickables($: cheerio.CheerioAPI): Element[] {
    const keywords = this.policy.keywords.clickable;
    return $(CLICKABLE)
      .toArray()
      .filter((el) => {
        const attrs = el.attribs;
        const haystack = [
          $(el).text(),
          attrs.id,
          attrs.class,
          attrs.value,
          attrs['aria-label'],
          attrs['data-testid'],
        ]
          .filter((part): part is string => typeof part === 'string')
          .join(' ')
          .toLowerCase();
        return keywords.some((keyword) => haystack.includes(keyword));
      });
  }

  private containers($: cheerio.CheerioAPI): Element[] {
    const keywords = this.policy.keywords.container;
    return $('[class], [id]')
      .toArray()
      .filter((el) => {
        if (CONTAINER_SKIP.has(el.name)) return false;
        const haystack = `${el.attribs.class ?? ''} ${el.attribs.id ?? ''}`.toLowerCase();
        return keywords.some((keyword) => haystack.includes(keyword));
      });
  }

  /** An element already inside a collected snippet adds nothing. */
  private isCovered(el: Element, taken: Set<Element>): boolean {
    for (let node: ParentNode | null = el; node && isTag(node); node = node.parent) {
      if (taken.has(node)) return true;
    }
    return false;
  }
}
