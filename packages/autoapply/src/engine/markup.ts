import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';

const NON_CONTENT = 'script, style, noscript, template, svg, iframe:not([src]), [hidden], [aria-hidden="true"]';
const HIDDEN_STYLE = /display\s*:\s*none|visibility\s*:\s*hidden/i;

/**
 * Parse markup and drop nodes a user cannot see. Iframes with a src are kept
 * so challenge frames stay detectable.
 */
export function loadVisible(markup: string): cheerio.CheerioAPI {
  const $ = cheerio.load(markup);
  $(NON_CONTENT).remove();
  $('[style]')
    .filter((_, el) => HIDDEN_STYLE.test(el.attribs.style ?? ''))
    .remove();
  return $;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Lowercased visible text of a node, whitespace-collapsed. */
export function textOf($: cheerio.CheerioAPI, el: Element): string {
  return collapseWhitespace($(el).text()).toLowerCase();
}

/** Attribute map copy with every value as a string. */
export function attributesOf(el: Element): Record<string, string> {
  return { ...el.attribs };
}

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}
