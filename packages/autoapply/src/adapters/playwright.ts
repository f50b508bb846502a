import {
  chromium,
  errors,
  type Browser,
  type BrowserContext,
  type Cookie,
  type ElementHandle,
  type Page,
} from 'playwright-core';
import type {
  BrowserDriver,
  DriverCookie,
  DriverElement,
  DriverStartOptions,
  LookupBy,
  LookupOptions,
} from './types.js';

export interface PlaywrightDriverOptions extends DriverStartOptions {
  /** Bounded wait for a lookup to find at least one element */
  elementTimeoutMs?: number;
  pageLoadTimeoutMs?: number;
}

class PlaywrightElement implements DriverElement {
  constructor(
    readonly handle: ElementHandle<Node>,
    readonly description: string,
  ) {}
}

/**
 * BrowserDriver over a local Chromium launched through playwright-core.
 * No browser is downloaded: pass executablePath or have a Chromium channel installed.
 */
export class PlaywrightDriver implements BrowserDriver {
  readonly type = 'playwright' as const;

  private constructor(
    private browser: Browser,
    private context: BrowserContext,
    private page: Page,
    private elementTimeoutMs: number,
    private pageLoadTimeoutMs: number,
  ) {}

  static async launch(options: PlaywrightDriverOptions = {}): Promise<PlaywrightDriver> {
    const browser = await chromium.launch({
      headless: options.headless ?? false,
      executablePath: options.executablePath,
      channel: options.executablePath ? undefined : 'chrome',
      args: ['--disable-blink-features=AutomationControlled'],
    });
    try {
      const context = await browser.newContext({
        userAgent: options.userAgent,
        viewport: { width: 1366, height: 900 },
      });
      const page = await context.newPage();
      return new PlaywrightDriver(
        browser,
        context,
        page,
        options.elementTimeoutMs ?? 10_000,
        options.pageLoadTimeoutMs ?? 30_000,
      );
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.pageLoadTimeoutMs });
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async getMarkup(): Promise<string> {
    await this.page.waitForLoadState('domcontentloaded', { timeout: this.pageLoadTimeoutMs });
    return this.page.content();
  }

  async findElements(by: LookupBy, query: string, options: LookupOptions = {}): Promise<DriverElement[]> {
    const selector = toPlaywrightSelector(by, query);
    if (options.wait) {
      try {
        await this.page.locator(selector).first().waitFor({ state: 'attached', timeout: this.elementTimeoutMs });
      } catch (err) {
        if (err instanceof errors.TimeoutError) return [];
        throw err;
      }
    }
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightElement(handle, `${by}=${query}`));
  }

  async click(element: DriverElement): Promise<void> {
    await this.handle(element).click({ timeout: this.elementTimeoutMs });
  }

  async pointerClick(element: DriverElement): Promise<void> {
    const box = await this.handle(element).boundingBox();
    if (!box) throw new Error(`${element.description} has no layout box`);
    await this.page.mouse.move(box.x + box.width / 2, box.y + box.height / 2, { steps: 4 });
    await this.page.mouse.click(box.x + box.width / 2, box.y + box.height / 2);
  }

  async clear(element: DriverElement): Promise<void> {
    await this.handle(element).fill('', { timeout: this.elementTimeoutMs });
  }

  async typeText(element: DriverElement, text: string): Promise<void> {
    await this.handle(element).type(text, { timeout: this.elementTimeoutMs });
  }

  async setValue(element: DriverElement, text: string): Promise<void> {
    await this.handle(element).evaluate((el, value) => {
      if (!(el instanceof HTMLInputElement) && !(el instanceof HTMLTextAreaElement)) {
        throw new Error('not a text control');
      }
      el.value = value;
      el.dispatchEvent(new Event('input', { bubbles: true }));
      el.dispatchEvent(new Event('change', { bubbles: true }));
    }, text);
  }

  async scrollIntoView(element: DriverElement): Promise<void> {
    await this.handle(element).scrollIntoViewIfNeeded({ timeout: this.elementTimeoutMs });
  }

  async getOptionLabels(element: DriverElement): Promise<string[]> {
    return this.handle(element).$$eval('option', (options) => options.map((o) => (o.textContent ?? '').trim()));
  }

  async selectOption(element: DriverElement, label: string): Promise<void> {
    await this.handle(element).selectOption({ label }, { timeout: this.elementTimeoutMs });
  }

  async uploadFile(element: DriverElement, path: string): Promise<void> {
    await this.handle(element).setInputFiles(path, { timeout: this.elementTimeoutMs });
  }

  async executeScript(script: string, element?: DriverElement): Promise<unknown> {
    // Both callbacks are serialized into the page, so neither may close over local state
    if (element) {
      return this.handle(element).evaluate((target: Node, body: string): unknown => {
        const fn = new Function('element', body);
        const result: unknown = fn(target);
        return result;
      }, script);
    }
    return this.page.evaluate((body: string): unknown => {
      const fn = new Function('element', body);
      const result: unknown = fn(null);
      return result;
    }, script);
  }

  async getCookies(): Promise<DriverCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map(fromPlaywrightCookie);
  }

  async setCookies(cookies: DriverCookie[]): Promise<void> {
    await this.context.addCookies(
      cookies.map((c) => ({
        name: c.name,
        value: c.value,
        domain: c.domain,
        path: c.path,
        secure: c.secure,
        httpOnly: c.httpOnly,
        expires: c.expiry ?? -1,
        sameSite: c.sameSite,
      })),
    );
  }

  async setUserAgent(userAgent: string): Promise<void> {
    // Contexts fix their user agent at creation; override through CDP instead
    const cdp = await this.context.newCDPSession(this.page);
    try {
      await cdp.send('Network.setUserAgentOverride', { userAgent });
    } finally {
      await cdp.detach();
    }
  }

  async movePointer(x: number, y: number): Promise<void> {
    await this.page.mouse.move(x, y, { steps: 3 });
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true, timeout: this.pageLoadTimeoutMs });
  }

  isConnected(): boolean {
    return this.browser.isConnected() && !this.page.isClosed();
  }

  async quit(): Promise<void> {
    if (this.browser.isConnected()) {
      await this.browser.close();
    }
  }

  private handle(element: DriverElement): ElementHandle<Node> {
    if (!(element instanceof PlaywrightElement)) {
      throw new Error(`element ${element.description} was not located by this driver`);
    }
    return element.handle;
  }
}

function toPlaywrightSelector(by: LookupBy, query: string): string {
  switch (by) {
    case 'css':
      return `css=${query}`;
    case 'xpath':
      return `xpath=${query}`;
    case 'id':
      return `id=${query}`;
    case 'className':
      return query
        .split(/\s+/)
        .filter((c) => c.length > 0)
        .map((c) => `[class~=${JSON.stringify(c)}]`)
        .join('');
    case 'linkText':
      return `:is(a, button, [role="button"]):text-is(${JSON.stringify(query)})`;
    case 'partialLinkText':
      return `:is(a, button, [role="button"]):has-text(${JSON.stringify(query)})`;
  }
}

function fromPlaywrightCookie(cookie: Cookie): DriverCookie {
  const converted: DriverCookie = {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    secure: cookie.secure,
    httpOnly: cookie.httpOnly,
    sameSite: cookie.sameSite,
  };
  if (cookie.expires > 0) converted.expiry = Math.floor(cookie.expires);
  return converted;
}
