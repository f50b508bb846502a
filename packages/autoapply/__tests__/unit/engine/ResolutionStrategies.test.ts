import { describe, expect, test } from 'vitest';
import { MockDriver } from '../../../src/adapters/mock.js';
import {
  ElementResolver,
  cssStrategy,
  linkTextStrategy,
  synthesizedAlternates,
  type ResolutionStrategy,
} from '../../../src/engine/ResolutionStrategies.js';
import { page } from '../../fixtures/testData.js';

const resolver = new ElementResolver();

function driverFor(markup: string): MockDriver {
  return new MockDriver({ pages: [markup] });
}

describe('ElementResolver', () => {
  // ── Strategy chain ──────────────────────────────────────────────────

  test('css hint resolves directly', async () => {
    const resolved = await resolver.resolve('#email', driverFor(page('application-form')));
    expect(resolved?.strategy).toBe('css');
    expect(resolved?.element.description).toBe('#email');
  });

  test('id lookup when the hint is not the CSS it looks like', async () => {
    const resolved = await resolver.resolve('#a.b', driverFor('<input id="a.b" name="q">'));
    expect(resolved?.strategy).toBe('stripped-prefix');
    expect(resolved?.element.description).toBe("[id='a.b']");
  });

  test('class lookup from a dotted hint', async () => {
    const resolved = await resolver.resolve('.apply.primary', driverFor('<a class="primary apply" href="#">Go</a>'));
    expect(resolved?.strategy).toBe('css');

    const loose = await resolver.resolve('.btn.x:y', driverFor('<a class="btn x:y" href="#">Go</a>'));
    expect(loose?.strategy).toBe('stripped-prefix');
  });

  test('visible text, exact then partial', async () => {
    const driver = driverFor(page('application-form'));
    expect((await resolver.resolve('Apply Now', driver))?.strategy).toBe('link-text');
    expect((await resolver.resolve('Apply', driver))?.element.description).toBe("button[type='submit']");
  });

  test('bare words are tried as id, class and attribute fragments', async () => {
    const resolved = await resolver.resolve('resume', driverFor(page('application-form')));
    expect(resolved?.strategy).toBe('synthesized');
    expect(resolved?.element.description).toBe('#resume');
  });

  test('xpath hints miss on a driver without xpath support', async () => {
    expect(await resolver.resolve("//button[contains(text(),'Apply')]", driverFor(page('application-form')))).toBeNull();
  });

  test('only the first lookup of a resolve waits', async () => {
    const driver = driverFor(page('captcha'));
    expect(await resolver.resolve('apply', driver, { wait: true })).toBeNull();

    expect(driver.lookups[0]).toEqual({ by: 'css', query: 'apply', wait: true });
    expect(driver.lookups.slice(1).every((l) => !l.wait)).toBe(true);
    expect(driver.lookups.map((l) => l.by)).toEqual([
      'css',
      'xpath',
      'linkText',
      'partialLinkText',
      ...Array.from({ length: 7 }, () => 'css'),
    ]);
  });

  test('lookups are immediate unless asked to wait', async () => {
    const driver = driverFor(page('application-form'));
    await resolver.resolve('#email', driver);
    expect(driver.lookups).toEqual([{ by: 'css', query: '#email', wait: false }]);
  });

  test('empty hint resolves nothing', async () => {
    expect(await resolver.resolve('', driverFor(page('application-form')))).toBeNull();
  });

  test('custom strategies run in the given order', async () => {
    const tried: string[] = [];
    const spy = (strategy: ResolutionStrategy): ResolutionStrategy => ({
      name: strategy.name,
      tryResolve: async (hint, driver) => {
        tried.push(strategy.name);
        return strategy.tryResolve(hint, driver);
      },
    });
    const custom = new ElementResolver([spy(linkTextStrategy), spy(cssStrategy)]);
    const resolved = await custom.resolve('#email', driverFor(page('application-form')));

    expect(resolved?.strategy).toBe('css');
    expect(tried).toEqual(['link-text', 'css']);
  });
});

describe('synthesizedAlternates', () => {
  test('simple hints also try id and class', () => {
    expect(synthesizedAlternates('apply')).toEqual([
      '#apply',
      '.apply',
      '[id*="apply"]',
      '[class*="apply"]',
      '[name*="apply"]',
      '[data-testid*="apply"]',
      '[aria-label*="apply" i]',
    ]);
  });

  test('other hints only as quoted fragments', () => {
    expect(synthesizedAlternates('say "hi"')).toEqual([
      '[id*="say \\"hi\\""]',
      '[class*="say \\"hi\\""]',
      '[name*="say \\"hi\\""]',
      '[data-testid*="say \\"hi\\""]',
      '[aria-label*="say \\"hi\\"" i]',
    ]);
    expect(synthesizedAlternates('   ')).toEqual([]);
  });
});
