import { describe, expect, test } from 'vitest';
import { MockDriver } from '../../../src/adapters/mock.js';
import type { DriverCookie } from '../../../src/adapters/types.js';
import { page } from '../../fixtures/testData.js';

function cookie(name: string, value: string, domain = '.example.test'): DriverCookie {
  return { name, value, domain, path: '/', secure: true, httpOnly: false };
}

describe('MockDriver', () => {
  // ── Pages ───────────────────────────────────────────────────────────

  test('serves pages in order and repeats the last', async () => {
    const driver = new MockDriver({ pages: ['<p>one</p>', '<p>two</p>'] });
    expect(await driver.getMarkup()).toBe('<p>one</p>');
    expect(await driver.getMarkup()).toBe('<p>two</p>');
    expect(await driver.getMarkup()).toBe('<p>two</p>');
    expect(driver.reads).toBe(3);
    expect(driver.pageIndex).toBe(1);
  });

  test('elements from an earlier page are stale', async () => {
    const driver = new MockDriver({ pages: [page('application-form'), page('submitted')] });
    await driver.getMarkup();
    const [button] = await driver.findElements('css', 'button');
    await driver.getMarkup();

    await expect(driver.click(button)).rejects.toThrow(/^stale element reference/);
  });

  test('crashes on the configured read', async () => {
    const driver = new MockDriver({ crashOnRead: 2 });
    await driver.getMarkup();
    await expect(driver.getMarkup()).rejects.toThrow('Target page, context or browser has been closed');
    expect(driver.isConnected()).toBe(false);
    await expect(driver.currentUrl()).rejects.toThrow('Browser has been closed');
  });

  // ── Lookups ─────────────────────────────────────────────────────────

  test('supports css, id, class and text lookups but not xpath', async () => {
    const driver = new MockDriver({
      pages: ['<a id="go" class="btn primary" href="#">Apply now</a><input type="submit" value="Send">'],
    });

    expect(await driver.findElements('css', 'a.btn')).toHaveLength(1);
    expect(await driver.findElements('id', 'go')).toHaveLength(1);
    expect(await driver.findElements('className', 'primary btn')).toHaveLength(1);
    expect(await driver.findElements('linkText', 'Apply now')).toHaveLength(1);
    expect(await driver.findElements('linkText', 'Send')).toHaveLength(1);
    expect(await driver.findElements('partialLinkText', 'now')).toHaveLength(1);
    await expect(driver.findElements('xpath', '//a')).rejects.toThrow('XPath lookups are not supported');
  });

  test('css lookups yield element handles with generated selectors', async () => {
    const driver = new MockDriver({ pages: [page('application-form')] });
    const inputs = await driver.findElements('css', 'input');

    expect(inputs.map((el) => el.description)).toEqual(['#email', '#resume']);
  });

  // ── Interactions ────────────────────────────────────────────────────

  test('the driver kind does not hide the typing method', async () => {
    const driver = new MockDriver({ pages: [page('application-form')] });
    const [email] = await driver.findElements('id', 'email');

    expect(driver.type).toBe('mock');
    expect(typeof driver.typeText).toBe('function');
    await driver.typeText(email, 'x');
    expect(driver.values.get('#email')).toBe('x');
  });

  test('records typing, clicks and uploads', async () => {
    const driver = new MockDriver({ pages: [page('application-form')] });
    const [email] = await driver.findElements('id', 'email');
    const [resume] = await driver.findElements('id', 'resume');
    const [button] = await driver.findElements('css', 'button');

    await driver.clear(email);
    await driver.typeText(email, 'a');
    await driver.typeText(email, 'b');
    await driver.uploadFile(resume, '/tmp/cv.pdf');
    await driver.click(button);

    expect(driver.values.get('#email')).toBe('ab');
    expect(driver.uploads).toEqual([{ target: '#resume', path: '/tmp/cv.pdf' }]);
    expect(driver.clicks).toEqual([{ target: "button[type='submit']", method: 'native' }]);
    expect(driver.events).toEqual(['type:#email', 'type:#email', 'upload:#resume', "click:button[type='submit']"]);
  });

  test('only text inputs take keystrokes and only file inputs take uploads', async () => {
    const driver = new MockDriver({ pages: [page('application-form')] });
    const [button] = await driver.findElements('css', 'button');
    const [email] = await driver.findElements('id', 'email');

    await expect(driver.typeText(button, 'x')).rejects.toThrow('element not interactable');
    await expect(driver.uploadFile(email, '/tmp/cv.pdf')).rejects.toThrow('Element is not a file input');
  });

  test('script clicks are recorded as clicks', async () => {
    const driver = new MockDriver({ pages: [page('application-form')] });
    const [button] = await driver.findElements('css', 'button');
    await driver.executeScript('element.click();', button);
    await driver.executeScript('window.scrollTo(0, 0);');

    expect(driver.clicks).toEqual([{ target: "button[type='submit']", method: 'script' }]);
    expect(driver.events).toEqual(["click:button[type='submit']", 'script']);
  });

  test('select options by label', async () => {
    const driver = new MockDriver({ pages: [page('full-form')] });
    const [country] = await driver.findElements('id', 'country');

    expect(await driver.getOptionLabels(country)).toEqual(['Canada', 'United States of America']);
    await driver.selectOption(country, 'Canada');
    expect(driver.selections).toEqual([{ target: '#country', label: 'Canada' }]);
    await expect(driver.selectOption(country, 'Mexico')).rejects.toThrow('No option "Mexico"');
  });

  // ── Session ─────────────────────────────────────────────────────────

  test('setCookies replaces by name and domain', async () => {
    const driver = new MockDriver({ cookies: [cookie('sid', 'old'), cookie('pref', 'dark')] });
    await driver.setCookies([cookie('sid', 'new'), cookie('sid', 'other', 'jobs.example.test')]);

    expect((await driver.getCookies()).map((c) => `${c.name}@${c.domain}=${c.value}`)).toEqual([
      'pref@.example.test=dark',
      'sid@.example.test=new',
      'sid@jobs.example.test=other',
    ]);
  });

  test('screenshots are recorded and refused once the browser is gone', async () => {
    const driver = new MockDriver();
    await driver.screenshot('shots/form.png');
    driver.disconnect();

    await expect(driver.screenshot('shots/late.png')).rejects.toThrow('Browser has been closed');
    expect(driver.screenshots).toEqual(['shots/form.png']);
    expect(driver.events).toEqual(['screenshot:shots/form.png']);
  });

  test('quit disconnects', async () => {
    const driver = new MockDriver();
    await driver.navigate('https://jobs.example.test/');
    await driver.quit();

    expect(driver.isConnected()).toBe(false);
    expect(driver.events).toEqual(['navigate:https://jobs.example.test/', 'quit']);
  });
});
