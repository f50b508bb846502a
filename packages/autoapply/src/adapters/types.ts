/**
 * BrowserDriver: the engine's only view of a browser.
 *
 * Lookups never throw for "not found": they return an empty list. A lookup
 * is immediate unless it asks to wait, and a bounded wait that times out is
 * also an empty list. Interaction
 * methods throw when the browser rejects the interaction (detached,
 * not interactable, intercepted); the executor turns those into fallbacks.
 */

export type DriverType = 'playwright' | 'mock';

export type LookupBy = 'css' | 'xpath' | 'id' | 'className' | 'linkText' | 'partialLinkText';

export interface LookupOptions {
  /** Wait up to the driver's element timeout for a first match */
  wait?: boolean;
}

/** Opaque handle to a located element. Drivers narrow it to their own type. */
export interface DriverElement {
  readonly description: string;
}

export type SameSite = 'Strict' | 'Lax' | 'None';

export interface DriverCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  secure: boolean;
  httpOnly: boolean;
  /** Unix seconds */
  expiry?: number;
  sameSite?: SameSite;
}

export interface DriverStartOptions {
  headless?: boolean;
  userAgent?: string;
  executablePath?: string;
}

export interface BrowserDriver {
  readonly type: DriverType;

  navigate(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  /** Full serialized DOM of the current page */
  getMarkup(): Promise<string>;

  findElements(by: LookupBy, query: string, options?: LookupOptions): Promise<DriverElement[]>;

  click(element: DriverElement): Promise<void>;
  /** Click at the element's on-screen centre through simulated pointer input */
  pointerClick(element: DriverElement): Promise<void>;
  clear(element: DriverElement): Promise<void>;
  typeText(element: DriverElement, text: string): Promise<void>;
  /** Scripted value assignment followed by synthetic input/change events */
  setValue(element: DriverElement, text: string): Promise<void>;
  scrollIntoView(element: DriverElement): Promise<void>;
  getOptionLabels(element: DriverElement): Promise<string[]>;
  selectOption(element: DriverElement, label: string): Promise<void>;
  uploadFile(element: DriverElement, path: string): Promise<void>;
  /** Run a script body with the element bound to `element` */
  executeScript(script: string, element?: DriverElement): Promise<unknown>;

  getCookies(): Promise<DriverCookie[]>;
  setCookies(cookies: DriverCookie[]): Promise<void>;

  setUserAgent(userAgent: string): Promise<void>;
  movePointer(x: number, y: number): Promise<void>;

  /** Write a PNG of the full page to `path`, creating missing directories */
  screenshot(path: string): Promise<void>;

  isConnected(): boolean;
  quit(): Promise<void>;
}
