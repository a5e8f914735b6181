import { describe, it, expect } from 'vitest';
import { Logger } from '../logger.js';

function capture(level: ConstructorParameters<typeof Logger>[0] = 'info') {
  const lines: string[] = [];
  const logger = new Logger(level, (line) => lines.push(line));
  return { lines, logger };
}

const TIMESTAMP = /^\d{2}:\d{2}:\d{2}\.\d{3} /;

describe('Logger', () => {
  it('writes level, scope, message and metadata on one line', () => {
    const { lines, logger } = capture();
    logger.child('servers').child('memory').warn('Server failed', { detail: 'exit 1' });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(TIMESTAMP);
    expect(lines[0]?.replace(TIMESTAMP, '')).toBe('[WARN ] (servers/memory) Server failed {"detail":"exit 1"}');
  });

  it('drops entries below the level and omits empty metadata', () => {
    const { lines, logger } = capture('warn');
    logger.info('hidden');
    logger.error('shown', {});
    expect(lines.map((l) => l.replace(TIMESTAMP, ''))).toEqual(['[ERROR] shown']);
  });

  it('shares the level between a logger and its children', () => {
    const { lines, logger } = capture();
    const child = logger.child('session');
    expect(child.toggleDebug()).toBe(true);
    logger.debug('now visible');
    expect(logger.level).toBe('debug');
    expect(child.toggleDebug()).toBe(false);
    logger.debug('hidden again');
    expect(lines.map((l) => l.replace(TIMESTAMP, ''))).toEqual(['[DEBUG] now visible']);
  });
});
