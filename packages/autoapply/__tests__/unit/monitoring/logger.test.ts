import { describe, expect, test } from 'vitest';
import { Logger, getLogger, redactObject } from '../../../src/monitoring/logger.js';

function capture(level: 'debug' | 'info' | 'warn' | 'error' = 'debug', attemptId?: string) {
  const lines: { level: string; entry: Record<string, unknown> }[] = [];
  const logger = new Logger({
    level,
    attemptId,
    sink: (lvl, line) => lines.push({ level: lvl, entry: JSON.parse(line) }),
  });
  return { logger, lines };
}

describe('Logger', () => {
  test('writes one JSON line per entry', () => {
    const { logger, lines } = capture();
    logger.info('page_classified', { pageType: 'job_listing', confidence: 90 });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('info');
    expect(lines[0].entry).toMatchObject({
      level: 'info',
      msg: 'page_classified',
      service: 'autoapply',
      pageType: 'job_listing',
      confidence: 90,
    });
    expect(typeof lines[0].entry.timestamp).toBe('string');
  });

  test('drops entries below the configured level', () => {
    const { logger, lines } = capture('warn');
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(lines.map((l) => l.entry.msg)).toEqual(['c', 'd']);
  });

  test('children carry parent and own bindings', () => {
    const { logger, lines } = capture('debug', 'attempt-1');
    logger.child({ component: 'ActionExecutor' }).child({ iteration: 2 }).debug('step');

    expect(lines[0].entry).toMatchObject({ attemptId: 'attempt-1', component: 'ActionExecutor', iteration: 2 });
  });

  test('redacts sensitive data before writing', () => {
    const { logger, lines } = capture();
    logger.warn('login', { password: 'test-secret', note: 'contact ada@example.test' });

    expect(lines[0].entry.password).toBe('[REDACTED]');
    expect(lines[0].entry.note).toBe('contact [REDACTED]');
  });

  test('getLogger replaces the singleton when given options', () => {
    const first = getLogger({ level: 'error', sink: () => {} });
    expect(getLogger()).toBe(first);
    expect(getLogger({ level: 'error', sink: () => {} })).not.toBe(first);
  });
});

describe('redactObject', () => {
  test('sensitive keys, nested records and arrays', () => {
    expect(
      redactObject({
        credentials: { username: 'test-user' },
        headers: { Authorization: 'Bearer x', accept: 'text/html' },
        urls: ['wss://127.0.0.1:9222/devtools', 'https://jobs.example.test/'],
        ssn: '123-45-6789',
      }),
    ).toEqual({
      credentials: '[REDACTED]',
      headers: { Authorization: '[REDACTED]', accept: 'text/html' },
      urls: ['[REDACTED]', 'https://jobs.example.test/'],
      ssn: '[REDACTED]',
    });
  });

  test('errors reduce to their redacted message', () => {
    expect(redactObject({ error: new Error('no account for ada@example.test') })).toEqual({
      error: 'no account for [REDACTED]',
    });
  });
});
