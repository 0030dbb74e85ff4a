import { describe, it, expect, afterEach } from 'vitest';
import { configureLogger, createLogger, getRootLogger, resolveLogLevel } from '../src/index.js';

describe('resolveLogLevel', () => {
  it('uses LOG_LEVEL when it names a level', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'debug' })).toBe('debug');
    expect(resolveLogLevel({ LOG_LEVEL: 'WARN' })).toBe('warn');
  });

  it('ignores unknown levels', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'loud' })).toBe('info');
  });

  it('is silent under test and info otherwise', () => {
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('silent');
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info');
    expect(resolveLogLevel({})).toBe('info');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    configureLogger({ level: 'silent' });
  });

  it('binds the component name', () => {
    const lines: Array<Record<string, unknown>> = [];
    configureLogger({
      level: 'info',
      destination: {
        write(line: string) {
          lines.push(JSON.parse(line));
        },
      },
    });

    createLogger('messenger').info({ bytes: 3 }, 'wrote');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ name: 'lanwire', component: 'messenger', bytes: 3, msg: 'wrote', level: 30 });
  });

  it('derives from a given parent', () => {
    const root = configureLogger({ level: 'warn' });

    expect(getRootLogger()).toBe(root);
    expect(createLogger('codec', root).level).toBe('warn');
  });
});
