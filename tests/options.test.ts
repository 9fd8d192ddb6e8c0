import { describe, expect, it } from 'vitest';
import { LOG_LEVEL_ENV, parseCliOptions } from '../src/config/options.js';
import { UsageError } from '../src/errors.js';

function usageMessage(argv: string[]): string {
  try {
    parseCliOptions(argv, {});
  } catch (err) {
    if (err instanceof UsageError) return err.message;
    throw err;
  }
  throw new Error('expected a UsageError');
}

describe('parseCliOptions', () => {
  it('applies defaults', () => {
    expect(parseCliOptions([], {})).toEqual({
      path: '.',
      json: false,
      failOnCritical: false,
      logLevel: 'warn',
      help: false,
      version: false,
    });
  });

  it('maps every flag', () => {
    const options = parseCliOptions(
      ['--path', '/srv/app', '--json', '--fail-on-critical', '--out', 'reports', '--log-level', 'debug'],
      {},
    );
    expect(options).toEqual({
      path: '/srv/app',
      json: true,
      failOnCritical: true,
      out: 'reports',
      logLevel: 'debug',
      help: false,
      version: false,
    });
  });

  it('accepts short help and version switches', () => {
    expect(parseCliOptions(['-h'], {}).help).toBe(true);
    expect(parseCliOptions(['-v'], {}).version).toBe(true);
  });

  it('reads the log level from the environment', () => {
    expect(parseCliOptions([], { [LOG_LEVEL_ENV]: 'debug' }).logLevel).toBe('debug');
    expect(parseCliOptions(['--log-level', 'error'], { [LOG_LEVEL_ENV]: 'debug' }).logLevel).toBe(
      'error',
    );
  });

  it('rejects unknown options', () => {
    expect(usageMessage(['--bogus'])).toBe('Unknown option: --bogus');
    expect(usageMessage(['-x'])).toBe('Unknown option: -x');
  });

  it('rejects stray arguments', () => {
    expect(usageMessage(['src'])).toBe('Unexpected argument: src');
  });

  it('names the flag with an invalid value', () => {
    expect(usageMessage(['--path'])).toMatch(/^--path: /);
    expect(usageMessage(['--log-level', 'loud'])).toMatch(/^--log-level: /);
  });
});
