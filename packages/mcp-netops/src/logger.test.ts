import { describe, it, expect } from 'vitest';
import { ConsoleLogger, levelFromFlags } from './logger.js';

describe('ConsoleLogger', () => {
  it('drops messages below the configured level', () => {
    const lines: string[] = [];
    const logger = new ConsoleLogger('warn', undefined, (line) => lines.push(line));

    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('shown');
    logger.error('also shown');

    expect(lines).toEqual(['WARN  shown', 'ERROR also shown']);
  });

  it('prefixes child loggers with a nested scope', () => {
    const lines: string[] = [];
    const logger = new ConsoleLogger('debug', 'run', (line) => lines.push(line));

    logger.child('10.0.0.1').debug('connecting');

    expect(lines).toEqual(['DEBUG [run:10.0.0.1] connecting']);
  });

  it('children inherit the parent level', () => {
    const lines: string[] = [];
    const logger = new ConsoleLogger('error', undefined, (line) => lines.push(line));

    logger.child('sw1').info('not printed');

    expect(lines).toHaveLength(0);
  });
});

describe('levelFromFlags', () => {
  it('maps the quiet and verbose flags', () => {
    expect(levelFromFlags({ quiet: false, verbose: false })).toBe('info');
    expect(levelFromFlags({ quiet: true, verbose: false })).toBe('error');
    expect(levelFromFlags({ quiet: false, verbose: true })).toBe('debug');
  });
});
