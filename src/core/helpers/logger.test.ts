import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel } from './logger.js';

describe('createLogger', () => {
  it('writes JSON lines at or above the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger('openobserve-mcp', 'info', (line) => lines.push(line));

    logger.debug('hidden');
    logger.info('visible', { rows: 3 });
    logger.child('client').error('failed');

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 'info', component: 'openobserve-mcp', msg: 'visible', data: { rows: 3 } });
    expect(JSON.parse(lines[1])).toMatchObject({ level: 'error', component: 'openobserve-mcp:client', msg: 'failed' });
    expect(JSON.parse(lines[1])).not.toHaveProperty('data');
  });
});

describe('isLogLevel', () => {
  it('accepts only the four levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
