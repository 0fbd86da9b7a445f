import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, errorMessage, formatMessage, setLogLevel, setLogSink } from './logger.js';

describe('logger', () => {
  const lines: string[] = [];
  const previousSink = setLogSink((line) => lines.push(line));

  afterEach(() => {
    lines.length = 0;
    setLogLevel('info');
  });

  it('formats level, component, message and metadata on one line', () => {
    expect(formatMessage('warn', 'pool', 'Slot broken', { slot: 2 })).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[WARN\] \[pool\] Slot broken \{"slot":2\}$/,
    );
  });

  it('omits metadata when none is given', () => {
    expect(formatMessage('info', 'http', 'Listening')).toMatch(/\] \[INFO\] \[http\] Listening$/);
  });

  it('drops messages below the configured level', () => {
    setLogLevel('warn');
    const log = createLogger('test');

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown too');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('[WARN] [test] shown');
    expect(lines[1]).toContain('[ERROR] [test] shown too');
  });

  it('writes debug output once the level allows it', () => {
    setLogLevel('debug');
    createLogger('test').debug('visible', { n: 1 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/\[DEBUG\] \[test\] visible \{"n":1\}$/);
  });

  it('describes thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });

  it('returns the sink it replaces', () => {
    const mine = setLogSink(previousSink);
    expect(setLogSink(mine)).toBe(previousSink);
  });
});
