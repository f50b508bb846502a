export type {
  BrowserDriver,
  DriverCookie,
  DriverElement,
  DriverStartOptions,
  DriverType,
  LookupBy,
  LookupOptions,
  SameSite,
} from './types.js';
export { MockDriver, type MockDriverConfig, type ClickRecord } from './mock.js';
export { PlaywrightDriver, type PlaywrightDriverOptions } from './playwright.js';

import type { Env } from '../config/env.js';
import { MockDriver, type MockDriverConfig } from './mock.js';
import { PlaywrightDriver } from './playwright.js';
import type { BrowserDriver, DriverType } from './types.js';

export interface CreateDriverOptions {
  env?: Env;
  userAgent?: string;
  mock?: MockDriverConfig;
}

/** Start a fresh browser session of the requested kind. */
export async function createDriver(type: DriverType, options: CreateDriverOptions = {}): Promise<BrowserDriver> {
  switch (type) {
    case 'playwright':
      return PlaywrightDriver.launch({
        headless: options.env?.AUTOAPPLY_HEADLESS,
        executablePath: options.env?.AUTOAPPLY_BROWSER_EXECUTABLE,
        elementTimeoutMs: options.env?.AUTOAPPLY_ELEMENT_TIMEOUT_MS,
        pageLoadTimeoutMs: options.env?.AUTOAPPLY_PAGE_LOAD_TIMEOUT_MS,
        userAgent: options.userAgent,
      });
    case 'mock':
      return new MockDriver(options.mock);
  }
}
