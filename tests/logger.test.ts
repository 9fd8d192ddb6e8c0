import { describe, expect, it } from 'vitest';
import { Logger, type LogLevel } from '../src/utils/logger.js';

function capture(level: LogLevel, json = true) {
  const lines: string[] = [];
  const logger = new Logger({ level, json }, (line) => lines.push(line));
  return { logger, lines };
}

describe('Logger', () => {
  it('drops messages below the level', () => {
    const { logger, lines } = capture('warn');
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(lines.map((l) => JSON.parse(l).msg)).toEqual(['c', 'd']);
  });

  it('writes nothing when silent', () => {
    const { logger, lines } = capture('silent');
    logger.error('boom');

    expect(lines).toEqual([]);
  });

  it('merges child context into every line', () => {
    const { logger, lines } = capture('info');
    logger.child({ analyzer: 'docker' }).info('done', { findings: 7 });

    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'info',
      msg: 'done',
      analyzer: 'docker',
      findings: 7,
    });
  });

  it('formats plain lines with level and context', () => {
    const { logger, lines } = capture('info', false);
    logger.warn('slow', { ms: 5 });

    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN  slow \{"ms":5\}$/);
  });

  it('times an operation at debug level', () => {
    const { logger, lines } = capture('debug');
    const stop = logger.time('Scan', { root: '/repo' });
    stop();

    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'debug',
      msg: 'Scan completed',
      root: '/repo',
    });
  });
});
