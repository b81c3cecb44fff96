import { describe, expect, it } from 'vitest';

import { createLogger, formatLogEntry, type EmittingLevel } from '../../core/logger.js';

function capture() {
  const lines: Array<[EmittingLevel, string]> = [];
  const logger = createLogger({
    level: 'info',
    colors: false,
    timestamps: false,
    sink: (level, line) => lines.push([level, line]),
  });
  return { lines, logger };
}

describe('formatLogEntry', () => {
  it('renders the level tag, scope path and message', () => {
    expect(formatLogEntry({ level: 'info', scope: ['tessera', 'model'], message: 'hi' })).toEqual([
      'INFO  tessera:model: hi',
    ]);
  });

  it('indents meta as JSON under the header', () => {
    expect(formatLogEntry({ level: 'error', scope: ['tessera'], message: 'failed', meta: { code: 7 } })).toEqual([
      'ERROR tessera: failed',
      '  {',
      '    "code": 7',
      '  }',
    ]);
    expect(formatLogEntry({ level: 'error', scope: ['tessera'], message: 'bare', meta: {} })).toEqual([
      'ERROR tessera: bare',
    ]);
  });

  it('adds the time of day and colours when asked', () => {
    const time = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));

    expect(formatLogEntry({ level: 'warn', scope: ['tessera'], message: 'careful', time }, true)).toEqual([
      '[03:04:05.006] \x1b[33mWARN \x1b[0m tessera: careful',
    ]);
  });
});

describe('ConsoleLogger', () => {
  it('writes entries at or above its level to the sink', () => {
    const { lines, logger } = capture();

    logger.debug('hidden');
    logger.info('shown');
    logger.warn('also shown');

    expect(lines).toEqual([
      ['info', 'INFO  tessera: shown'],
      ['warn', 'WARN  tessera: also shown'],
    ]);
  });

  it('extends the scope path for children', () => {
    const { lines, logger } = capture();

    logger.child('agent').child('tools').info('ready');

    expect(lines).toEqual([['info', 'INFO  tessera:agent:tools: ready']]);
  });

  it('retunes children when the parent level changes', () => {
    const { lines, logger } = capture();
    const child = logger.child('model');

    logger.setLevel('debug');
    child.debug('now visible');
    logger.setLevel('silent');
    child.error('muted');

    expect(lines).toEqual([['debug', 'DEBUG tessera:model: now visible']]);
    expect(child.isEnabled('error')).toBe(false);
  });

  it('reports timers at debug level', () => {
    const { lines, logger } = capture();
    logger.setLevel('debug');

    logger.startTimer('tool:echo')();

    expect(lines[0]).toEqual(['debug', 'DEBUG tessera: tool:echo completed']);
    expect(lines[1]).toEqual(['debug', '  {']);
    expect(lines[2][1]).toMatch(/^ {4}"durationMs": \d+$/);
  });
});
