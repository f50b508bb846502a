import * as cheerio from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { generateSelector } from '../engine/selectors.js';
import type { BrowserDriver, DriverCookie, DriverElement, LookupBy, LookupOptions } from './types.js';

export interface MockDriverConfig {
  /** Markup served by successive getMarkup() calls; the last page repeats */
  pages?: string[];
  rejectNativeClick?: boolean;
  rejectScriptClick?: boolean;
  rejectPointerClick?: boolean;
  /** Reject clear() and typeText(), forcing the scripted fill fallback */
  rejectTyping?: boolean;
  rejectSetValue?: boolean;
  /** Start in a disconnected/crashed state (default: false) */
  startDisconnected?: boolean;
  /** Crash on this getMarkup() call (1-based) */
  crashOnRead?: number;
  cookies?: DriverCookie[];
  url?: string;
}

export type ClickRecord = { target: string; method: 'native' | 'script' | 'pointer' };

class MockElement implements DriverElement {
  constructor(
    readonly page: number,
    readonly node: Element,
    readonly description: string,
  ) {}
}

const CLICKABLE = 'a, button, [role="button"], input[type="submit"], input[type="button"]';
const TYPEABLE = new Set(['input', 'textarea']);

/**
 * In-process BrowserDriver over a scripted sequence of pages.
 * Does NOT launch a browser; every interaction is recorded for assertions.
 * Elements found on an earlier page are stale once the next page is served.
 */
export class MockDriver implements BrowserDriver {
  readonly type = 'mock' as const;

  readonly clicks: ClickRecord[] = [];
  readonly values = new Map<string, string>();
  readonly scripted: { target: string; value: string }[] = [];
  readonly uploads: { target: string; path: string }[] = [];
  readonly selections: { target: string; label: string }[] = [];
  readonly userAgents: string[] = [];
  readonly pointerMoves: { x: number; y: number }[] = [];
  /** Paths passed to screenshot(); nothing is written */
  readonly screenshots: string[] = [];
  readonly navigations: string[] = [];
  readonly lookups: { by: LookupBy; query: string; wait: boolean }[] = [];
  /** Ordered log of every interaction, e.g. `click:#apply` or `type:#email` */
  readonly events: string[] = [];
  reads = 0;
  quitCalled = false;

  private config: MockDriverConfig;
  private pages: string[];
  private current = -1;
  private parsed = new Map<number, cheerio.CheerioAPI>();
  private cookies: DriverCookie[];
  private url: string;
  private connected: boolean;

  constructor(config: MockDriverConfig = {}) {
    this.config = config;
    this.pages = config.pages && config.pages.length > 0 ? config.pages : ['<html><body></body></html>'];
    this.cookies = [...(config.cookies ?? [])];
    this.url = config.url ?? 'about:blank';
    this.connected = !config.startDisconnected;
  }

  /** Index of the page lookups currently run against. */
  get pageIndex(): number {
    return Math.max(this.current, 0);
  }

  async navigate(url: string): Promise<void> {
    this.assertConnected();
    this.url = url;
    this.navigations.push(url);
    this.events.push(`navigate:${url}`);
  }

  async currentUrl(): Promise<string> {
    this.assertConnected();
    return this.url;
  }

  async getMarkup(): Promise<string> {
    this.assertConnected();
    this.reads += 1;
    if (this.config.crashOnRead === this.reads) {
      this.connected = false;
      throw new Error('Target page, context or browser has been closed');
    }
    this.current = Math.min(this.current + 1, this.pages.length - 1);
    return this.pages[this.current];
  }

  async findElements(by: LookupBy, query: string, options: LookupOptions = {}): Promise<DriverElement[]> {
    this.assertConnected();
    this.lookups.push({ by, query, wait: options.wait === true });
    const $ = this.dom();
    const nodes = this.lookup($, by, query);
    return nodes.map((node) => new MockElement(this.pageIndex, node, generateSelector(node.name, node.attribs)));
  }

  async click(element: DriverElement): Promise<void> {
    const el = this.live(element);
    if (this.config.rejectNativeClick) throw new Error('Element is not clickable at point (intercepted)');
    this.recordClick(el, 'native');
  }

  async pointerClick(element: DriverElement): Promise<void> {
    const el = this.live(element);
    if (this.config.rejectPointerClick) throw new Error('Pointer click did not reach the element');
    this.recordClick(el, 'pointer');
  }

  async clear(element: DriverElement): Promise<void> {
    const el = this.typeable(element);
    this.values.set(el.description, '');
  }

  async typeText(element: DriverElement, text: string): Promise<void> {
    const el = this.typeable(element);
    this.values.set(el.description, (this.values.get(el.description) ?? '') + text);
    this.events.push(`type:${el.description}`);
  }

  async setValue(element: DriverElement, text: string): Promise<void> {
    const el = this.live(element);
    if (this.config.rejectSetValue) throw new Error('Cannot set value on this element');
    this.values.set(el.description, text);
    this.scripted.push({ target: el.description, value: text });
    this.events.push(`setValue:${el.description}`);
  }

  async scrollIntoView(element: DriverElement): Promise<void> {
    this.live(element);
  }

  async getOptionLabels(element: DriverElement): Promise<string[]> {
    const el = this.live(element);
    const $ = this.dom();
    if (el.node.name !== 'select') throw new Error('Element is not a <select>');
    return $(el.node)
      .find('option')
      .toArray()
      .map((option) => $(option).text().trim());
  }

  async selectOption(element: DriverElement, label: string): Promise<void> {
    const labels = await this.getOptionLabels(element);
    if (!labels.includes(label)) throw new Error(`No option "${label}"`);
    const el = this.live(element);
    this.selections.push({ target: el.description, label });
    this.events.push(`select:${el.description}`);
  }

  async uploadFile(element: DriverElement, path: string): Promise<void> {
    const el = this.live(element);
    if (el.node.name !== 'input' || el.node.attribs.type !== 'file') {
      throw new Error('Element is not a file input');
    }
    this.uploads.push({ target: el.description, path });
    this.events.push(`upload:${el.description}`);
  }

  async executeScript(script: string, element?: DriverElement): Promise<unknown> {
    this.assertConnected();
    if (element && script.includes('.click()')) {
      const el = this.live(element);
      if (this.config.rejectScriptClick) throw new Error('Script click failed');
      this.recordClick(el, 'script');
    } else {
      this.events.push('script');
    }
    return undefined;
  }

  async getCookies(): Promise<DriverCookie[]> {
    this.assertConnected();
    return this.cookies.map((c) => ({ ...c }));
  }

  async setCookies(cookies: DriverCookie[]): Promise<void> {
    this.assertConnected();
    for (const cookie of cookies) {
      this.cookies = this.cookies.filter((c) => !(c.name === cookie.name && c.domain === cookie.domain));
      this.cookies.push({ ...cookie });
    }
    this.events.push(`cookies:${cookies.length}`);
  }

  async setUserAgent(userAgent: string): Promise<void> {
    this.assertConnected();
    this.userAgents.push(userAgent);
    this.events.push('userAgent');
  }

  async movePointer(x: number, y: number): Promise<void> {
    this.assertConnected();
    this.pointerMoves.push({ x, y });
  }

  async screenshot(path: string): Promise<void> {
    this.assertConnected();
    this.screenshots.push(path);
    this.events.push(`screenshot:${path}`);
  }

  isConnected(): boolean {
    return this.connected && !this.quitCalled;
  }

  /** Simulate a browser crash mid-attempt. */
  disconnect(): void {
    this.connected = false;
  }

  async quit(): Promise<void> {
    this.quitCalled = true;
    this.events.push('quit');
  }

  // --- Internals ---

  private dom(): cheerio.CheerioAPI {
    const index = this.pageIndex;
    let $ = this.parsed.get(index);
    if (!$) {
      $ = cheerio.load(this.pages[index]);
      this.parsed.set(index, $);
    }
    return $;
  }

  private lookup($: cheerio.CheerioAPI, by: LookupBy, query: string): Element[] {
    switch (by) {
      case 'css':
        return $(query).toArray().filter(isTag);
      case 'xpath':
        throw new Error('XPath lookups are not supported by MockDriver');
      case 'id':
        return $('[id]')
          .toArray()
          .filter((el) => el.attribs.id === query);
      case 'className': {
        const wanted = query.split(/\s+/).filter((c) => c.length > 0);
        if (wanted.length === 0) return [];
        return $('[class]')
          .toArray()
          .filter((el) => {
            const classes = (el.attribs.class ?? '').split(/\s+/);
            return wanted.every((c) => classes.includes(c));
          });
      }
      case 'linkText':
        return $(CLICKABLE)
          .toArray()
          .filter((el) => visibleText($, el) === query);
      case 'partialLinkText':
        return $(CLICKABLE)
          .toArray()
          .filter((el) => query.length > 0 && visibleText($, el).includes(query));
    }
  }

  private live(element: DriverElement): MockElement {
    this.assertConnected();
    if (!(element instanceof MockElement)) throw new Error('Foreign element handle');
    if (element.page !== this.pageIndex) throw new Error('stale element reference: element is not attached to the page document');
    return element;
  }

  private typeable(element: DriverElement): MockElement {
    const el = this.live(element);
    if (this.config.rejectTyping) throw new Error('element not interactable');
    if (!TYPEABLE.has(el.node.name)) throw new Error('element not interactable');
    return el;
  }

  private recordClick(el: MockElement, method: ClickRecord['method']): void {
    this.clicks.push({ target: el.description, method });
    this.events.push(`click:${el.description}`);
  }

  private assertConnected(): void {
    if (!this.isConnected()) throw new Error('Browser has been closed');
  }
}

function visibleText($: cheerio.CheerioAPI, el: Element): string {
  const text = el.name === 'input' ? (el.attribs.value ?? '') : $(el).text();
  return text.replace(/\s+/g, ' ').trim();
}
