import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, LogLevel } from './logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats the level, message and defined context values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = new Logger(LogLevel.WARN);

    log.warn('Ignoring upload', { component: 'SessionStore', itemId: undefined, phase: 'ANALYZING' });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[[^\]]+\] \[WARN\] Ignoring upload \| component=SessionStore phase=ANALYZING$/);
  });

  it('drops messages below the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = new Logger(LogLevel.WARN);

    log.info('hidden');
    log.debug('hidden');
    expect(info).not.toHaveBeenCalled();
    expect(debug).not.toHaveBeenCalled();

    log.setLevel(LogLevel.DEBUG);
    log.info('shown');
    expect(info).toHaveBeenCalledTimes(1);
  });

  it('prints error details after the message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('boom');

    new Logger(LogLevel.ERROR).error('Analysis failed', cause);

    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[1]).toEqual(['Error details:', cause]);
  });
});
